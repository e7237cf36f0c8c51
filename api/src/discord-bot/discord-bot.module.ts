import { Module } from '@nestjs/common';
import { DiscordBotClientService } from './discord-bot-client.service';
import { DiscordBotService } from './discord-bot.service';

/**
 * Bot connection only. Slash commands and component handlers live in
 * DiscordInteractionsModule, which depends on the domain modules.
 */
@Module({
  providers: [DiscordBotClientService, DiscordBotService],
  exports: [DiscordBotClientService],
})
export class DiscordBotModule {}
