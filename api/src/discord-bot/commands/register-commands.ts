import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { OnEvent } from '@nestjs/event-emitter';
import {
  REST,
  Routes,
  type RESTPostAPIChatInputApplicationCommandsJSONBody,
} from 'discord.js';
import { DiscordBotClientService } from '../discord-bot-client.service';
import { DISCORD_BOT_EVENTS } from '../discord-bot.constants';
import type { EnvConfig } from '../../config/env.validation';
import { EventsListCommand } from './events-list.command';
import { MyEventsCommand } from './my-events.command';
import { NotificationsCommand } from './notifications.command';

/**
 * Describes a slash command handler that can be registered with Discord.
 */
export interface SlashCommandHandler {
  /** The command definition for Discord API registration */
  getDefinition(): RESTPostAPIChatInputApplicationCommandsJSONBody;
}

/**
 * Registers all slash commands with the Discord API whenever the bot connects.
 */
@Injectable()
export class RegisterCommandsService {
  private readonly logger = new Logger(RegisterCommandsService.name);

  constructor(
    private readonly clientService: DiscordBotClientService,
    private readonly configService: ConfigService<EnvConfig, true>,
    private readonly eventsListCommand: EventsListCommand,
    private readonly myEventsCommand: MyEventsCommand,
    private readonly notificationsCommand: NotificationsCommand,
  ) {}

  private getCommandHandlers(): SlashCommandHandler[] {
    return [
      this.eventsListCommand,
      this.myEventsCommand,
      this.notificationsCommand,
    ];
  }

  @OnEvent(DISCORD_BOT_EVENTS.CONNECTED)
  async registerCommands(): Promise<void> {
    const token = this.configService.get('DISCORD_BOT_TOKEN', { infer: true });
    if (!token) {
      this.logger.warn('No bot token configured, skipping slash command registration');
      return;
    }

    const clientId = this.clientService.getClientId();
    if (!clientId) {
      this.logger.warn(
        'Cannot determine bot client ID, skipping command registration',
      );
      return;
    }

    const commands = this.getCommandHandlers().map((h) => h.getDefinition());

    try {
      const rest = new REST({ version: '10' }).setToken(token);
      // Global registration so commands work in both guild channels and DMs
      await rest.put(Routes.applicationCommands(clientId), { body: commands });
      this.logger.log(`Registered ${commands.length} global slash command(s)`);
    } catch (error) {
      this.logger.error('Failed to register slash commands:', error);
    }
  }
}
