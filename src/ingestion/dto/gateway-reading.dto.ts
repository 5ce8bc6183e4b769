import { z } from 'zod';

/**
 * Device type the gateway reports for micro-inverters.
 */
export const INVERTER_DEV_TYPE = 1;

/**
 * One entry of the gateway's inverter production response
 * (`/api/v1/production/inverters`).
 *
 * @example
 * {
 *   "serialNumber": "121900012345",
 *   "lastReportDate": 1717225200,
 *   "devType": 1,
 *   "lastReportWatts": 212,
 *   "maxReportWatts": 350
 * }
 */
export const GatewayReadingSchema = z.object({
  serialNumber: z
    .union([z.string().regex(/^\d{1,15}$/), z.number().int().nonnegative()])
    .transform((value) => Number(value)),
  /** Epoch seconds */
  lastReportDate: z.number().int().nonnegative(),
  devType: z.number().int(),
  lastReportWatts: z.number().int().min(0).max(32767),
  maxReportWatts: z.number().int().optional(),
});

export const GatewayReadingBatchSchema = z.array(GatewayReadingSchema);

export type GatewayReading = z.infer<typeof GatewayReadingSchema>;
