import { Injectable, Inject, Logger } from '@nestjs/common';
import { DrizzleAsyncProvider } from './drizzle/drizzle.module';
import { sql } from 'drizzle-orm';
import type { PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import type * as schema from './drizzle/schema';
import { DiscordBotClientService } from './discord-bot/discord-bot-client.service';

export interface DatabaseHealth {
  connected: boolean;
  latencyMs: number;
}

@Injectable()
export class AppService {
  private readonly logger = new Logger(AppService.name);

  constructor(
    @Inject(DrizzleAsyncProvider)
    private db: PostgresJsDatabase<typeof schema>,
    private readonly discordClient: DiscordBotClientService,
  ) {}

  async checkDatabaseHealth(): Promise<DatabaseHealth> {
    const start = Date.now();
    try {
      await this.db.execute(sql`SELECT 1`);
      return { connected: true, latencyMs: Date.now() - start };
    } catch (error) {
      this.logger.warn(
        `Database health check failed: ${error instanceof Error ? error.message : String(error)}`,
      );
      return { connected: false, latencyMs: Date.now() - start };
    }
  }

  /** Informational: an offline bot only delays DMs, it does not fail health */
  isBotConnected(): boolean {
    return this.discordClient.isConnected();
  }
}
