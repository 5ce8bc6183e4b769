// Re-export public API
export { IngestionModule } from './ingestion.module';
export { IngestionService } from './ingestion.service';
export type { IngestionResult } from './ingestion.service';
export { ReadingDedupStore } from './reading-dedup.store';
export type { DedupDecision, KnownReading } from './reading-dedup.store';
export {
  GatewayReadingSchema,
  GatewayReadingBatchSchema,
  INVERTER_DEV_TYPE,
} from './dto/gateway-reading.dto';
export type { GatewayReading } from './dto/gateway-reading.dto';
