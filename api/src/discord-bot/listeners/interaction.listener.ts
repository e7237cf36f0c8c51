import { Injectable, Logger } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import {
  Events,
  type ChatInputCommandInteraction,
  type Interaction,
  type InteractionReplyOptions,
  type MessageComponentInteraction,
  type User as DiscordUser,
} from 'discord.js';
import { DiscordBotClientService } from '../discord-bot-client.service';
import { DISCORD_BOT_EVENTS } from '../discord-bot.constants';
import { UsersService, type UserProfile } from '../../users/users.service';
import { parseCustomId } from '../utils/custom-id';
import { EventsListCommand } from '../commands/events-list.command';
import { MyEventsCommand } from '../commands/my-events.command';
import { NotificationsCommand } from '../commands/notifications.command';
import { RegistrationInteractionListener } from './registration-interaction.listener';

/**
 * Describes a command that can handle slash command interactions.
 */
export interface CommandInteractionHandler {
  readonly commandName: string;
  handleInteraction(interaction: ChatInputCommandInteraction): Promise<void>;
}

/**
 * Handles buttons and select menus whose custom ID starts with one of
 * `componentIds` (the part before the first colon).
 */
export interface ComponentInteractionHandler {
  readonly componentIds: readonly string[];
  handleComponent(interaction: MessageComponentInteraction): Promise<void>;
}

const ERROR_REPLY = 'Something went wrong. Please try again later.';

/** What the router needs from a command or component interaction */
interface RoutedInteraction {
  readonly user: DiscordUser;
  readonly replied: boolean;
  readonly deferred: boolean;
  reply(options: InteractionReplyOptions): Promise<unknown>;
  followUp(options: InteractionReplyOptions): Promise<unknown>;
}

export function toUserProfile(user: DiscordUser): UserProfile {
  return {
    id: user.id,
    displayName: user.globalName ?? user.username,
    handle: user.username,
  };
}

/**
 * Listens for Discord interactions (slash commands, buttons, select menus)
 * and routes them to the matching handler. The user record is refreshed
 * before every handler runs.
 */
@Injectable()
export class InteractionListener {
  private readonly logger = new Logger(InteractionListener.name);
  private listenerAttached = false;

  constructor(
    private readonly clientService: DiscordBotClientService,
    private readonly usersService: UsersService,
    private readonly eventsListCommand: EventsListCommand,
    private readonly myEventsCommand: MyEventsCommand,
    private readonly notificationsCommand: NotificationsCommand,
    private readonly registrationListener: RegistrationInteractionListener,
  ) {}

  private getCommandHandlers(): CommandInteractionHandler[] {
    return [
      this.eventsListCommand,
      this.myEventsCommand,
      this.notificationsCommand,
    ];
  }

  private getComponentHandlers(): ComponentInteractionHandler[] {
    return [
      this.eventsListCommand,
      this.notificationsCommand,
      this.registrationListener,
    ];
  }

  /**
   * Attach the interaction listener when the bot connects.
   */
  @OnEvent(DISCORD_BOT_EVENTS.CONNECTED)
  attachListener(): void {
    const client = this.clientService.getClient();
    if (!client || this.listenerAttached) return;

    client.on(Events.InteractionCreate, (interaction: Interaction) => {
      this.handleInteraction(interaction).catch((err: unknown) => {
        this.logger.error('Unhandled error in interaction handler:', err);
      });
    });

    this.listenerAttached = true;
    this.logger.log('Interaction listener attached');
  }

  /**
   * Reset listener state when bot disconnects (will re-attach on reconnect).
   */
  @OnEvent(DISCORD_BOT_EVENTS.DISCONNECTED)
  detachListener(): void {
    this.listenerAttached = false;
  }

  async handleInteraction(interaction: Interaction): Promise<void> {
    if (interaction.isChatInputCommand()) {
      const handler = this.getCommandHandlers().find(
        (h) => h.commandName === interaction.commandName,
      );
      if (!handler) {
        this.logger.warn(`No handler for command: ${interaction.commandName}`);
        return;
      }
      await this.run(interaction, `/${interaction.commandName}`, () =>
        handler.handleInteraction(interaction),
      );
    } else if (interaction.isMessageComponent()) {
      const { prefix } = parseCustomId(interaction.customId);
      const handler = this.getComponentHandlers().find((h) =>
        h.componentIds.includes(prefix),
      );
      if (!handler) {
        this.logger.debug(`No handler for component: ${interaction.customId}`);
        return;
      }
      await this.run(interaction, interaction.customId, () =>
        handler.handleComponent(interaction),
      );
    }
  }

  private async run(
    interaction: RoutedInteraction,
    label: string,
    handle: () => Promise<void>,
  ): Promise<void> {
    try {
      await this.usersService.upsert(toUserProfile(interaction.user));
      await handle();
    } catch (error) {
      this.logger.error(`Error handling ${label}:`, error);
      try {
        if (interaction.replied || interaction.deferred) {
          await interaction.followUp({ content: ERROR_REPLY, ephemeral: true });
        } else {
          await interaction.reply({ content: ERROR_REPLY, ephemeral: true });
        }
      } catch (replyError) {
        this.logger.debug(
          `Could not report the error to the user: ${replyError instanceof Error ? replyError.message : String(replyError)}`,
        );
      }
    }
  }
}
