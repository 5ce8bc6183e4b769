import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { QueryDeepPartialEntity } from 'typeorm/query-builder/QueryPartialEntity';
import { InverterReading } from '../database/entities/inverter-reading.entity';
import { GatewayReading, INVERTER_DEV_TYPE } from './dto/gateway-reading.dto';
import { ReadingDedupStore } from './reading-dedup.store';

/**
 * Ingestion Result Summary
 */
export interface IngestionResult {
  success: boolean;
  received: number;
  stored: number;
  resends: number;
  unchanged: number;
  conflicts: number;
  rejected: number;
  errors: string[];
  durationMs: number;
}

/**
 * IngestionService - stores gateway inverter readings, changes only
 *
 * Responsibilities:
 * 1. Filtering: only micro-inverter entries (devType 1) are accepted
 * 2. Deduplication: resends and unchanged values never reach the database
 * 3. Insertion: one insert-or-ignore per batch on the composite primary key
 */
@Injectable()
export class IngestionService implements OnModuleInit {
  private readonly logger = new Logger(IngestionService.name);

  constructor(
    @InjectRepository(InverterReading)
    private readonly readingRepository: Repository<InverterReading>,
    private readonly dedupStore: ReadingDedupStore,
  ) {}

  async onModuleInit(): Promise<void> {
    await this.primeDedupStore();
  }

  /**
   * Load the latest stored reading of every inverter into the dedup store.
   */
  async primeDedupStore(): Promise<number> {
    const latest = await this.readingRepository
      .createQueryBuilder('r')
      .where((query) => {
        const newest = query
          .subQuery()
          .select('MAX(l.lastReportDate)')
          .from(InverterReading, 'l')
          .where('l.serialNumber = r.serialNumber')
          .getQuery();
        return `r.lastReportDate = ${newest}`;
      })
      .getMany();

    this.dedupStore.prime(
      latest.map((row) => ({
        serialNumber: row.serialNumber,
        reportedAt: row.lastReportDate,
        watts: row.watts,
      })),
    );

    const producing = latest.reduce((sum, row) => sum + row.watts, 0);
    this.logger.log(
      `Found ${latest.length} inverters in the database producing ${producing} watts`,
    );
    return latest.length;
  }

  /**
   * Ingest one gateway response.
   *
   * @param readings - Validated gateway entries
   * @param receivedAt - Receive time, used when a report date is reused
   */
  async ingestReadings(
    readings: GatewayReading[],
    receivedAt: Date = new Date(),
  ): Promise<IngestionResult> {
    const startTime = Date.now();
    const result: IngestionResult = {
      success: false,
      received: readings.length,
      stored: 0,
      resends: 0,
      unchanged: 0,
      conflicts: 0,
      rejected: 0,
      errors: [],
      durationMs: 0,
    };

    const pending: InverterReading[] = [];

    for (const reading of readings) {
      if (reading.devType !== INVERTER_DEV_TYPE) {
        result.rejected++;
        result.errors.push(
          `SN${reading.serialNumber}: invalid devType ${reading.devType}`,
        );
        this.logger.warn(
          `Invalid devType: ${reading.devType} in reading for SN${reading.serialNumber}`,
        );
        continue;
      }

      const reportedAt = new Date(reading.lastReportDate * 1000);
      const decision = this.dedupStore.decide(
        reading.serialNumber,
        reportedAt,
        reading.lastReportWatts,
        receivedAt,
      );

      switch (decision.action) {
        case 'resend':
          result.resends++;
          break;
        case 'unchanged':
          result.unchanged++;
          break;
        case 'store': {
          if (decision.conflict) {
            result.conflicts++;
            this.logger.warn(
              `Duplicate SN${reading.serialNumber}(${reportedAt.toISOString()}): old ${this.dedupStore.lastWattsOf(reading.serialNumber)} new ${reading.lastReportWatts}`,
            );
          }
          const row = new InverterReading();
          row.lastReportDate = decision.reportedAt;
          row.serialNumber = reading.serialNumber;
          row.watts = reading.lastReportWatts;
          pending.push(row);
          break;
        }
      }
    }

    if (pending.length > 0) {
      const inserted = await this.insertBatch(pending);
      result.stored = inserted.length;
      for (const row of inserted) {
        this.dedupStore.remember(row.serialNumber, row.lastReportDate, row.watts);
      }
    }

    result.success = result.rejected === 0;
    result.durationMs = Date.now() - startTime;
    this.logger.log(
      `Stored ${result.stored} readings (ignored ${result.resends} resends, ${result.unchanged} unchanged, ${result.rejected} rejected)`,
    );
    return result;
  }

  /**
   * Insert batch, ignoring rows whose primary key already exists.
   * Returns the rows that were actually written.
   */
  private async insertBatch(
    batch: InverterReading[],
  ): Promise<InverterReading[]> {
    try {
      const existing = await this.readingRepository.find({
        where: batch.map((r) => ({
          lastReportDate: r.lastReportDate,
          serialNumber: r.serialNumber,
        })),
      });
      const existingKeys = new Set(existing.map(readingKey));

      const fresh: InverterReading[] = [];
      for (const row of batch) {
        if (existingKeys.has(readingKey(row))) {
          this.logger.warn(
            `No row inserted for SN${row.serialNumber} at ${row.lastReportDate.toISOString()}`,
          );
        } else {
          fresh.push(row);
        }
      }
      if (fresh.length === 0) return fresh;

      const values: QueryDeepPartialEntity<InverterReading>[] = fresh.map(
        (r) => ({
          lastReportDate: r.lastReportDate,
          serialNumber: r.serialNumber,
          watts: r.watts,
        }),
      );

      await this.readingRepository
        .createQueryBuilder()
        .insert()
        .into(InverterReading)
        .values(values)
        .orIgnore()
        .execute();

      return fresh;
    } catch (error) {
      this.logger.error('Batch insert failed', {
        batchSize: batch.length,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }
}

function readingKey(
  row: Pick<InverterReading, 'lastReportDate' | 'serialNumber'>,
): string {
  return `${row.serialNumber}@${row.lastReportDate.getTime()}`;
}
