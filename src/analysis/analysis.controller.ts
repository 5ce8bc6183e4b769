import {
  BadRequestException,
  Controller,
  Get,
  Logger,
  NotFoundException,
  Param,
  Query,
} from '@nestjs/common';
import { AnalysisError } from './analysis.errors';
import { AnalysisReport, AnalysisService } from './analysis.service';
import { AnalysisSettings, DeviceDayOutcome } from './analysis.types';
import {
  DiagnosticsParamsSchema,
  DiagnosticsQuerySchema,
  ReportQuerySchema,
} from './dto/analysis-query.dto';
import { DiagnosticsCollector } from '../diagnostics/diagnostics-collector';
import { DayDiagnostics } from '../diagnostics/diagnostics.types';
import { parseInput } from '../common/parse-input';

/**
 * Response of the diagnostics endpoint
 */
export interface DiagnosticsResponse {
  outcome: DeviceDayOutcome;
  /** Null when the day was not fitted or the filter rejected it */
  diagnostics: DayDiagnostics | null;
}

/**
 * AnalysisController
 *
 * Endpoints:
 * - GET /analysis/report - Energy report over a date range
 * - GET /analysis/:serialNumber/:date/diagnostics - Fit artifacts for one inverter day
 */
@Controller('analysis')
export class AnalysisController {
  private readonly logger = new Logger(AnalysisController.name);

  constructor(private readonly analysisService: AnalysisService) {}

  /**
   * @example
   * GET /analysis/report?start=2024-06-01&end=2024-06-30&detail=true
   * GET /analysis/report?start=2024-06-01&end=2024-06-01&ceiling=300&strictness=forced
   */
  @Get('report')
  async getReport(
    @Query() query: Record<string, unknown>,
  ): Promise<AnalysisReport> {
    const { start, end, detail, serialNumber, ceiling, strictness } =
      parseInput(ReportQuerySchema, query);
    this.logger.log(`GET /analysis/report ${start}..${end}`);

    return this.withInputErrors(() =>
      this.analysisService.report(
        { startDate: start, endDate: end },
        {
          detail,
          serialNumber,
          settings: overrides(ceiling, strictness),
        },
      ),
    );
  }

  /**
   * @example
   * GET /analysis/121900012345/2024-06-01/diagnostics?mode=SHAVED&limit=0.5
   */
  @Get(':serialNumber/:date/diagnostics')
  async getDiagnostics(
    @Param() params: Record<string, unknown>,
    @Query() query: Record<string, unknown>,
  ): Promise<DiagnosticsResponse> {
    const { serialNumber, date } = parseInput(DiagnosticsParamsSchema, params);
    const { mode, limit, ceiling, strictness } = parseInput(
      DiagnosticsQuerySchema,
      query,
    );
    this.logger.log(`GET /analysis/${serialNumber}/${date}/diagnostics`);

    const collector = new DiagnosticsCollector({ mode, limitWattHours: limit });
    const outcomes = await this.withInputErrors(async () => {
      const all: DeviceDayOutcome[] = [];
      for await (const outcome of this.analysisService.outcomes(
        { startDate: date, endDate: date },
        {
          serialNumber,
          diagnostics: collector,
          settings: overrides(ceiling, strictness),
        },
      )) {
        all.push(outcome);
      }
      return all;
    });

    const outcome = outcomes.find((o) => o.serialNumber === serialNumber);
    if (!outcome) {
      throw new NotFoundException(
        `No readings for SN${serialNumber} on ${date}`,
      );
    }

    return { outcome, diagnostics: collector.collected[0] ?? null };
  }

  /**
   * Invalid dates surface from the service as AnalysisError; report them as 400.
   */
  private async withInputErrors<T>(run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (error) {
      if (error instanceof AnalysisError) {
        throw new BadRequestException(error.message);
      }
      throw error;
    }
  }
}

function overrides(
  ceiling: number | undefined,
  strictness: AnalysisSettings['strictness'] | undefined,
): Partial<AnalysisSettings> {
  return { ceilingWatts: ceiling, strictness };
}
