import { Module } from '@nestjs/common';
import { DiscordBotModule } from '../discord-bot/discord-bot.module';
import { NotificationDispatcherService } from './notification-dispatcher.service';

@Module({
  imports: [DiscordBotModule],
  providers: [NotificationDispatcherService],
  exports: [NotificationDispatcherService],
})
export class NotificationModule {}
