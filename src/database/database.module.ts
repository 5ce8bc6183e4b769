import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule, TypeOrmModuleOptions } from '@nestjs/typeorm';
import { Environment, validateEnvironment } from '../config/environment';
import { InverterReading } from './entities/inverter-reading.entity';

/**
 * SQLite when DB_FILE is set, PostgreSQL otherwise.
 */
export function databaseOptions(
  config: ConfigService<Environment, true>,
): TypeOrmModuleOptions {
  const common = {
    entities: [InverterReading],
    synchronize: config.get('DB_SYNCHRONIZE', { infer: true }),
    logging: config.get('NODE_ENV', { infer: true }) === 'debug',
  };

  const file = config.get('DB_FILE', { infer: true });
  if (file) {
    return { type: 'better-sqlite3', database: file, ...common };
  }

  return {
    type: 'postgres',
    host: config.get('DB_HOST', { infer: true }),
    port: config.get('DB_PORT', { infer: true }),
    username: config.get('DB_USERNAME', { infer: true }),
    password: config.get('DB_PASSWORD', { infer: true }),
    database: config.get('DB_DATABASE', { infer: true }),
    ...common,
  };
}

/**
 * DatabaseModule
 *
 * Validated configuration plus the TypeORM connection, shared by the HTTP
 * application and the report CLI.
 */
@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate: validateEnvironment,
    }),
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: databaseOptions,
      inject: [ConfigService],
    }),
  ],
})
export class DatabaseModule {}
