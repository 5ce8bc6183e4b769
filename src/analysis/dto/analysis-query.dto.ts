import { z } from 'zod';
import { STRICTNESS_MODES } from '../analysis.types';
import { VISUALIZATION_MODES } from '../../diagnostics/visualization-filter';

const isoDate = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'expected a date formatted YYYY-MM-DD');

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

/**
 * Per-request overrides of the configured analysis settings.
 */
const settingsOverrides = {
  ceiling: z.coerce.number().int().positive().optional(),
  strictness: z.enum(STRICTNESS_MODES).optional(),
};

/**
 * GET /analysis/report query
 */
export const ReportQuerySchema = z.object({
  start: isoDate,
  end: isoDate,
  detail: booleanFlag.optional(),
  serialNumber: z.coerce.number().int().positive().optional(),
  ...settingsOverrides,
});

export type ReportQuery = z.infer<typeof ReportQuerySchema>;

/**
 * GET /analysis/:serialNumber/:date/diagnostics params and query
 */
export const DiagnosticsParamsSchema = z.object({
  serialNumber: z.coerce.number().int().positive(),
  date: isoDate,
});

export const DiagnosticsQuerySchema = z.object({
  mode: z.enum(VISUALIZATION_MODES).default('ALL'),
  limit: z.coerce.number().min(0).default(0),
  ...settingsOverrides,
});

export type DiagnosticsParams = z.infer<typeof DiagnosticsParamsSchema>;
export type DiagnosticsQuery = z.infer<typeof DiagnosticsQuerySchema>;
