import { DayDiagnostics, DiagnosticSink } from './diagnostics.types';
import {
  VisualizationFilter,
  admitsDaysWithoutExceedance,
  selectsDay,
} from './visualization-filter';

/**
 * In-memory diagnostic sink that keeps the days a filter selects.
 * Used by the diagnostics endpoint and the CLI's JSON export.
 */
export class DiagnosticsCollector implements DiagnosticSink {
  private readonly days: DayDiagnostics[] = [];

  constructor(private readonly filter: VisualizationFilter) {}

  get wantsDaysWithoutExceedance(): boolean {
    return admitsDaysWithoutExceedance(this.filter.mode);
  }

  emit(diagnostics: DayDiagnostics): void {
    if (selectsDay(this.filter, diagnostics)) {
      this.days.push(diagnostics);
    }
  }

  get collected(): readonly DayDiagnostics[] {
    return this.days;
  }
}
