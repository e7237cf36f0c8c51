import {
  Injectable,
  Logger,
  OnModuleInit,
  OnModuleDestroy,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DiscordBotClientService } from './discord-bot-client.service';
import type { EnvConfig } from '../config/env.validation';

/**
 * Owns the bot's connection lifecycle: connect on startup when a token is
 * configured, disconnect on shutdown.
 */
@Injectable()
export class DiscordBotService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(DiscordBotService.name);

  constructor(
    private readonly clientService: DiscordBotClientService,
    private readonly configService: ConfigService<EnvConfig, true>,
  ) {}

  /**
   * Auto-connect on startup if a token is configured.
   * A failed login leaves the API running; DMs then count as transient failures.
   */
  async onModuleInit(): Promise<void> {
    const token = this.configService.get('DISCORD_BOT_TOKEN', { infer: true });
    if (!token) {
      this.logger.warn(
        'DISCORD_BOT_TOKEN is not set; the bot stays offline and no DMs will be delivered',
      );
      return;
    }

    try {
      this.logger.log('Discord bot token configured, connecting...');
      await this.clientService.connect(token);
    } catch (error) {
      this.logger.error(
        'Failed to auto-connect Discord bot on startup:',
        error instanceof Error ? error.message : error,
      );
    }
  }

  /**
   * Graceful shutdown.
   */
  async onModuleDestroy(): Promise<void> {
    await this.clientService.disconnect();
  }
}
