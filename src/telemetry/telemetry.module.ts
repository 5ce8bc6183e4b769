import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { InverterReading } from '../database/entities/inverter-reading.entity';
import { TELEMETRY_STORE } from './telemetry-store.interface';
import { TypeOrmTelemetryStore } from './typeorm-telemetry.store';

/**
 * TelemetryModule
 *
 * Binds the TelemetryStore token to the TypeORM-backed implementation.
 */
@Module({
  imports: [TypeOrmModule.forFeature([InverterReading])],
  providers: [{ provide: TELEMETRY_STORE, useClass: TypeOrmTelemetryStore }],
  exports: [TELEMETRY_STORE],
})
export class TelemetryModule {}
