import { Body, Controller, HttpCode, Logger, Post } from '@nestjs/common';
import { parseInput } from '../common/parse-input';
import { GatewayReadingBatchSchema } from './dto/gateway-reading.dto';
import { IngestionResult, IngestionService } from './ingestion.service';

/**
 * IngestionController
 *
 * Receives inverter production responses forwarded by the gateway poller.
 *
 * Usage:
 *   POST /ingest/readings
 *   Content-Type: application/json
 *   Body: the gateway's /api/v1/production/inverters array
 */
@Controller('ingest')
export class IngestionController {
  private readonly logger = new Logger(IngestionController.name);

  constructor(private readonly ingestionService: IngestionService) {}

  /**
   * @example
   * curl -X POST http://localhost:3000/ingest/readings \
   *   -H 'Content-Type: application/json' \
   *   -d '[{"serialNumber":"121900012345","lastReportDate":1717225200,"devType":1,"lastReportWatts":212}]'
   */
  @Post('readings')
  @HttpCode(200)
  async ingestReadings(@Body() body: unknown): Promise<IngestionResult> {
    const readings = parseInput(GatewayReadingBatchSchema, body);
    this.logger.log(`Ingestion request: ${readings.length} readings`);
    return this.ingestionService.ingestReadings(readings);
  }
}
