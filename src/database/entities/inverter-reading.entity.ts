import { Entity, Column, PrimaryColumn, ValueTransformer } from 'typeorm';

/**
 * Drivers hand bigint columns back as strings; serial numbers have 12 digits
 * and fit safely in a JS number.
 */
const serialNumberTransformer: ValueTransformer = {
  to: (value: number) => value,
  from: (value: string | number | null) =>
    value === null ? null : Number(value),
};

/**
 * InverterReading Entity
 *
 * One row per power change reported by an inverter. The capture side only
 * inserts a row when the watts value differs from the previous one, so a
 * device's history is sparse and must be reconstructed before integration.
 *
 * Composite Primary Key: [lastReportDate, serialNumber]
 * - Matches the time-then-device order the analysis reads in
 *
 * `lastReportDate` is a local (zone-less) timestamp: day boundaries and
 * seconds past midnight are taken in the process's local time.
 */
@Entity('inverter_readings')
export class InverterReading {
  /**
   * Timestamp of the gateway report.
   * Column type is derived from Date: timestamp on PostgreSQL, datetime on SQLite.
   */
  @PrimaryColumn()
  lastReportDate!: Date;

  /**
   * Inverter serial number (12 digits).
   */
  @PrimaryColumn({ type: 'bigint', transformer: serialNumberTransformer })
  serialNumber!: number;

  /**
   * Last reported AC output in watts.
   */
  @Column({ type: 'smallint' })
  watts!: number;
}
