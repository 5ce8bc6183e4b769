#!/usr/bin/env node
/**
 * Inverter energy report
 *
 * Reads stored inverter telemetry for a date range and prints, per run, the
 * generated, exceedance and shaved energy totals. Warnings go to stderr so
 * the report on stdout can be redirected.
 *
 * Usage:
 *   npm run analyze -- --start 2024-06-01 --end 2024-06-30
 *   npm run analyze -- --start 2024-06-01 --end 2024-06-30 --detail
 *   npm run analyze -- --ceiling 300 --strictness forced
 *   npm run analyze -- --plot-mode SHAVED --plot-limit 0.5 --diagnostics-out diag.json
 */
import 'reflect-metadata';
import { writeFile } from 'node:fs/promises';
import { parseArgs } from 'node:util';
import { ConsoleLogger, LogLevel, Module } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { z } from 'zod';
import { AnalysisModule, AnalysisService } from './analysis';
import { STRICTNESS_MODES } from './analysis/analysis.types';
import { DatabaseModule } from './database/database.module';
import { DiagnosticsCollector } from './diagnostics/diagnostics-collector';
import { VISUALIZATION_MODES } from './diagnostics/visualization-filter';

const USAGE = `Usage: inverter-analyze [options]

  --start <YYYY-MM-DD>        First day to report (default 2006-01-01)
  --end <YYYY-MM-DD>          Last day to report (default 9999-12-31)
  --ceiling <watts>           Maximum continuous power (default from ANALYSIS_CEILING_WATTS)
  --strictness <gated|forced> Quality gate mode (default from ANALYSIS_STRICTNESS)
  --detail                    Print one line per inverter day
  --plot-mode <mode>          ${VISUALIZATION_MODES.join(' | ')} (default NONE)
  --plot-limit <Whr>          Threshold for EXCEEDANCE / SHAVED (default 0)
  --diagnostics-out <file>    Write selected day diagnostics as JSON
  -h, --help                  Show this help
`;

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'use YYYY-MM-DD');

const CliOptionsSchema = z.object({
  start: isoDate.default('2006-01-01'),
  end: isoDate.default('9999-12-31'),
  ceiling: z.coerce.number().int().positive().optional(),
  strictness: z.enum(STRICTNESS_MODES).optional(),
  detail: z.boolean().default(false),
  'plot-mode': z.enum(VISUALIZATION_MODES).default('NONE'),
  'plot-limit': z.coerce.number().min(0).default(0),
  'diagnostics-out': z.string().min(1).optional(),
});

export type CliOptions = z.infer<typeof CliOptionsSchema>;

/**
 * Parse command line arguments.
 *
 * @throws Error with the usage text appended on invalid input
 */
export function parseCliOptions(argv: string[]): CliOptions | null {
  const { values } = parseArgs({
    args: argv,
    options: {
      start: { type: 'string' },
      end: { type: 'string' },
      ceiling: { type: 'string' },
      strictness: { type: 'string' },
      detail: { type: 'boolean' },
      'plot-mode': { type: 'string' },
      'plot-limit': { type: 'string' },
      'diagnostics-out': { type: 'string' },
      help: { type: 'boolean', short: 'h' },
    },
    strict: true,
  });

  if (values.help) {
    return null;
  }

  const { help: _help, ...options } = values;
  const parsed = CliOptionsSchema.safeParse(options);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `--${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`${issues}\n\n${USAGE}`);
  }
  return parsed.data;
}

/**
 * Nest logger that keeps stdout for the report.
 */
class StderrLogger extends ConsoleLogger {
  protected printMessages(
    messages: unknown[],
    context?: string,
    logLevel?: LogLevel,
  ): void {
    super.printMessages(messages, context, logLevel, 'stderr');
  }
}

@Module({
  imports: [DatabaseModule, AnalysisModule],
})
class ReportCliModule {}

async function run(argv: string[]): Promise<void> {
  const options = parseCliOptions(argv);
  if (!options) {
    process.stdout.write(USAGE);
    return;
  }

  const app = await NestFactory.createApplicationContext(ReportCliModule, {
    logger: new StderrLogger(),
  });

  try {
    const analysisService = app.get(AnalysisService);
    const collector = new DiagnosticsCollector({
      mode: options['plot-mode'],
      limitWattHours: options['plot-limit'],
    });

    const report = await analysisService.report(
      { startDate: options.start, endDate: options.end },
      {
        detail: options.detail,
        diagnostics: options['diagnostics-out'] ? collector : undefined,
        settings: {
          ceilingWatts: options.ceiling,
          strictness: options.strictness,
        },
      },
    );

    for (const line of report.detailLines ?? []) {
      console.log(line);
    }
    for (const line of report.summaryLines) {
      console.log(line);
    }

    const diagnosticsOut = options['diagnostics-out'];
    if (diagnosticsOut) {
      await writeFile(
        diagnosticsOut,
        JSON.stringify(collector.collected, null, 2),
        'utf-8',
      );
      console.error(
        `Wrote ${collector.collected.length} day diagnostics to ${diagnosticsOut}`,
      );
    }
  } finally {
    await app.close();
  }
}

if (require.main === module) {
  run(process.argv.slice(2)).catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  });
}
