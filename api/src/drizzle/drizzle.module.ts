import { Module, Global } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import * as schema from './schema';
import { isPerfEnabled } from '../common/perf-logger';
import { PerfDrizzleLogger } from './perf-drizzle-logger';
import type { EnvConfig } from '../config/env.validation';

export const DrizzleAsyncProvider = 'drizzleProvider';

@Global()
@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: DrizzleAsyncProvider,
      inject: [ConfigService],
      useFactory: (configService: ConfigService<EnvConfig, true>) => {
        const client = postgres(
          configService.get('DATABASE_URL', { infer: true }),
          {
            max: configService.get('DB_POOL_MAX', { infer: true }),
            idle_timeout: configService.get('DB_IDLE_TIMEOUT', { infer: true }),
          },
        );
        const db = drizzle(client, {
          schema,
          logger: isPerfEnabled() ? new PerfDrizzleLogger() : undefined,
        });
        return db;
      },
    },
  ],
  exports: [DrizzleAsyncProvider],
})
export class DrizzleModule {}
