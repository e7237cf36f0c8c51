import {
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnApplicationShutdown,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SchedulerRegistry } from '@nestjs/schedule';
import type { DeliveryRunSummary } from '@event-pulse/contract';
import { RemindersService, type DueReminder } from './reminders.service';
import { NotificationDispatcherService } from '../notifications/notification-dispatcher.service';
import { buildReminderMessage } from '../notifications/notification-messages';
import { startPerfTimer } from '../common/perf-logger';
import type { EnvConfig } from '../config/env.validation';

/** SchedulerRegistry name of the polling interval */
export const REMINDER_DELIVERY_INTERVAL = 'reminder-delivery';

type ReminderResult = Exclude<keyof DeliveryRunSummary, 'due' | 'errored'>;

function emptySummary(due: number): DeliveryRunSummary {
  return {
    due,
    delivered: 0,
    unreachable: 0,
    retrying: 0,
    abandoned: 0,
    errored: 0,
  };
}

/**
 * Polls for due reminders and sends them.
 *
 * A tick that starts while the previous one is still running is skipped,
 * so a slow batch never overlaps the next. Each reminder is handled in
 * isolation: one failure is logged and counted, and the batch continues.
 * A scan that cannot reach storage is logged and retried on the next tick.
 */
@Injectable()
export class ReminderDeliveryService
  implements OnApplicationBootstrap, OnApplicationShutdown
{
  private readonly logger = new Logger(ReminderDeliveryService.name);
  private running = false;

  constructor(
    private readonly remindersService: RemindersService,
    private readonly dispatcher: NotificationDispatcherService,
    private readonly configService: ConfigService<EnvConfig, true>,
    private readonly schedulerRegistry: SchedulerRegistry,
  ) {}

  onApplicationBootstrap(): void {
    if (!this.configService.get('REMINDER_LOOP_ENABLED', { infer: true })) {
      this.logger.warn('Reminder delivery loop is disabled');
      return;
    }
    this.start();
  }

  onApplicationShutdown(): void {
    this.stop();
  }

  start(): void {
    if (this.isStarted()) return;

    const intervalMs = this.configService.get('REMINDER_INTERVAL_MS', {
      infer: true,
    });
    const handle = setInterval(() => {
      void this.tick();
    }, intervalMs);
    this.schedulerRegistry.addInterval(REMINDER_DELIVERY_INTERVAL, handle);
    this.logger.log(`Reminder delivery loop started (every ${intervalMs}ms)`);
  }

  stop(): void {
    if (!this.isStarted()) return;

    this.schedulerRegistry.deleteInterval(REMINDER_DELIVERY_INTERVAL);
    this.logger.log('Reminder delivery loop stopped');
  }

  isStarted(): boolean {
    return this.schedulerRegistry.doesExist(
      'interval',
      REMINDER_DELIVERY_INTERVAL,
    );
  }

  /**
   * One timer firing. Returns null when skipped because a run is in
   * progress, or when the scan itself failed.
   */
  async tick(now: Date = new Date()): Promise<DeliveryRunSummary | null> {
    if (this.running) {
      this.logger.debug('Previous delivery run still in progress, skipping');
      return null;
    }

    this.running = true;
    try {
      return await this.runOnce(now);
    } catch (error) {
      this.logger.error(
        `Reminder scan failed: ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
      return null;
    } finally {
      this.running = false;
    }
  }

  /**
   * Scan and dispatch once. Storage errors from the scan propagate;
   * errors while handling a single reminder do not.
   */
  async runOnce(now: Date = new Date()): Promise<DeliveryRunSummary> {
    const endTimer = startPerfTimer('REMINDER', REMINDER_DELIVERY_INTERVAL);
    const due = await this.remindersService.findDue(
      now,
      this.configService.get('REMINDER_BATCH_SIZE', { infer: true }),
    );
    const summary = emptySummary(due.length);

    for (const item of due) {
      try {
        summary[await this.deliver(item)]++;
      } catch (error) {
        summary.errored++;
        this.logger.error(
          `Failed to process reminder ${item.reminder.id}: ${error instanceof Error ? error.message : String(error)}`,
        );
      }
    }

    if (summary.due > 0) {
      this.logger.log(
        `Reminder run: ${summary.due} due, ${summary.delivered} delivered, ` +
          `${summary.unreachable} unreachable, ${summary.retrying} retrying, ` +
          `${summary.abandoned} abandoned, ${summary.errored} errored`,
      );
    }
    endTimer({
      due: summary.due,
      delivered: summary.delivered,
    });

    return summary;
  }

  private async deliver(item: DueReminder): Promise<ReminderResult> {
    const { reminder, event, user } = item;
    const outcome = await this.dispatcher.send(
      user.id,
      buildReminderMessage(reminder.reminderType, event, reminder.registrationId),
    );

    if (outcome === 'failed') {
      const maxAttempts = this.configService.get('REMINDER_MAX_ATTEMPTS', {
        infer: true,
      });
      const result = await this.remindersService.recordFailedAttempt(
        reminder.id,
        maxAttempts,
      );
      if (result?.abandoned) {
        this.logger.warn(
          `Giving up on ${reminder.reminderType} reminder ${reminder.id} for user ${user.id} after ${result.attempts} attempts`,
        );
        return 'abandoned';
      }
      return 'retrying';
    }

    await this.remindersService.markSent(reminder.id);
    if (outcome === 'unreachable') {
      this.logger.debug(
        `Reminder ${reminder.id} retired: user ${user.id} is unreachable`,
      );
    }
    return outcome;
  }
}
