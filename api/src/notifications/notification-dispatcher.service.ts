import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { DeliveryOutcome, DeliveryTally } from '@event-pulse/contract';
import {
  DiscordBotClientService,
  type DirectMessage,
} from '../discord-bot/discord-bot-client.service';
import { classifyDeliveryError, withTimeout } from './delivery-classification';
import type { EnvConfig } from '../config/env.validation';
import { startPerfTimer } from '../common/perf-logger';

export function emptyTally(total = 0): DeliveryTally {
  return { total, delivered: 0, unreachable: 0, failed: 0 };
}

/**
 * Sends direct messages and classifies each result.
 *
 * `send` never throws: every failure becomes an outcome, so callers can
 * fan out without a try/catch per recipient.
 */
@Injectable()
export class NotificationDispatcherService {
  private readonly logger = new Logger(NotificationDispatcherService.name);

  constructor(
    private readonly discordClient: DiscordBotClientService,
    private readonly configService: ConfigService<EnvConfig, true>,
  ) {}

  async send(
    recipientId: string,
    message: DirectMessage,
  ): Promise<DeliveryOutcome> {
    if (!this.discordClient.isConnected()) {
      this.logger.warn(`Discord bot is offline; DM to ${recipientId} deferred`);
      return 'failed';
    }

    const timeoutMs = this.configService.get('DELIVERY_TIMEOUT_MS', {
      infer: true,
    });

    try {
      await withTimeout(
        this.discordClient.sendDirectMessage(recipientId, message),
        timeoutMs,
        `DM to ${recipientId}`,
      );
      return 'delivered';
    } catch (error) {
      const outcome = classifyDeliveryError(error);
      const reason = error instanceof Error ? error.message : String(error);
      if (outcome === 'unreachable') {
        this.logger.log(`User ${recipientId} is unreachable: ${reason}`);
      } else {
        this.logger.warn(`DM to ${recipientId} failed: ${reason}`);
      }
      return outcome;
    }
  }

  /**
   * Send the same message to many recipients, a bounded number at a time.
   * One recipient's failure never stops the batch.
   */
  async sendBatch(
    recipientIds: readonly string[],
    message: DirectMessage,
  ): Promise<DeliveryTally> {
    const endTimer = startPerfTimer('DISPATCH', 'batch');
    const tally = emptyTally(recipientIds.length);
    const concurrency = this.configService.get('BROADCAST_CONCURRENCY', {
      infer: true,
    });

    for (let i = 0; i < recipientIds.length; i += concurrency) {
      const chunk = recipientIds.slice(i, i + concurrency);
      const outcomes = await Promise.all(
        chunk.map((recipientId) => this.send(recipientId, message)),
      );
      for (const outcome of outcomes) {
        tally[outcome]++;
      }
    }

    if (tally.total > 0) {
      this.logger.log(
        `Batch delivery: ${tally.delivered}/${tally.total} delivered, ` +
          `${tally.unreachable} unreachable, ${tally.failed} failed`,
      );
    }
    endTimer({ recipients: tally.total, delivered: tally.delivered });
    return tally;
  }
}
