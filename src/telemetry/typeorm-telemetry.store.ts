import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { Brackets, Repository } from 'typeorm';
import { RawReading } from '../analysis/reconstructor';
import { Environment } from '../config/environment';
import { InverterReading } from '../database/entities/inverter-reading.entity';
import { ReadingFilter, TelemetryStore } from './telemetry-store.interface';

/**
 * TelemetryStore over the inverter_readings table.
 *
 * Uses keyset pagination on the (lastReportDate, serialNumber) primary key
 * rather than a driver cursor, so it behaves the same on PostgreSQL and
 * SQLite and never holds more than one page in memory.
 */
@Injectable()
export class TypeOrmTelemetryStore implements TelemetryStore {
  private readonly logger = new Logger(TypeOrmTelemetryStore.name);
  private readonly pageSize: number;

  constructor(
    @InjectRepository(InverterReading)
    private readonly readingRepository: Repository<InverterReading>,
    config: ConfigService<Environment, true>,
  ) {
    this.pageSize = config.get('TELEMETRY_PAGE_SIZE', { infer: true });
  }

  async *readings(
    start: Date,
    end: Date,
    filter: ReadingFilter = {},
  ): AsyncGenerator<RawReading> {
    let last: InverterReading | undefined;
    let pages = 0;

    for (;;) {
      const query = this.readingRepository
        .createQueryBuilder('r')
        .where('r.lastReportDate >= :start AND r.lastReportDate < :end', {
          start,
          end,
        });

      if (filter.serialNumber !== undefined) {
        query.andWhere('r.serialNumber = :filterSerialNumber', {
          filterSerialNumber: filter.serialNumber,
        });
      }

      if (last) {
        const { lastReportDate, serialNumber } = last;
        query.andWhere(
          new Brackets((keyset) => {
            keyset
              .where('r.lastReportDate > :lastReportDate', { lastReportDate })
              .orWhere(
                'r.lastReportDate = :lastReportDate AND r.serialNumber > :serialNumber',
                { lastReportDate, serialNumber },
              );
          }),
        );
      }

      const page = await query
        .orderBy('r.lastReportDate', 'ASC')
        .addOrderBy('r.serialNumber', 'ASC')
        .limit(this.pageSize)
        .getMany();
      pages++;
      this.logger.debug(`Page ${pages}: ${page.length} readings`);

      for (const row of page) {
        yield {
          reportedAt: row.lastReportDate,
          serialNumber: row.serialNumber,
          watts: row.watts,
        };
      }

      if (page.length < this.pageSize) {
        return;
      }
      last = page[page.length - 1];
    }
  }
}
