import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { InverterReading } from '../database/entities/inverter-reading.entity';
import { IngestionController } from './ingestion.controller';
import { IngestionService } from './ingestion.service';
import { ReadingDedupStore } from './reading-dedup.store';

/**
 * IngestionModule
 *
 * Components:
 * - IngestionController: REST endpoint for gateway reading batches
 * - IngestionService: dedup and insertion
 * - ReadingDedupStore: per-inverter last report date / watts, one per process
 */
@Module({
  imports: [TypeOrmModule.forFeature([InverterReading])],
  controllers: [IngestionController],
  providers: [
    IngestionService,
    { provide: ReadingDedupStore, useFactory: () => new ReadingDedupStore() },
  ],
  exports: [IngestionService],
})
export class IngestionModule {}
