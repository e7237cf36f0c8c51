import { Injectable, Logger } from '@nestjs/common';
import {
  SlashCommandBuilder,
  type ChatInputCommandInteraction,
  type MessageComponentInteraction,
  type RESTPostAPIChatInputApplicationCommandsJSONBody,
} from 'discord.js';
import {
  CATEGORY_PREFERENCE_KEYS,
  EventCategorySchema,
  type EventCategory,
  type UpdateNotificationPreferencesDto,
} from '@event-pulse/contract';
import { UsersService } from '../../users/users.service';
import type { User } from '../../drizzle/schema';
import { NOTIFICATION_TOGGLE_ID } from '../discord-bot.constants';
import { buildNotificationSettingsView } from '../utils/interaction-views';
import { parseCustomId } from '../utils/custom-id';
import type { SlashCommandHandler } from './register-commands';
import type {
  CommandInteractionHandler,
  ComponentInteractionHandler,
} from '../listeners/interaction.listener';

/** The update that flips one category's announcement flag */
export function toggleFor(
  user: User,
  category: EventCategory,
): UpdateNotificationPreferencesDto {
  switch (category) {
    case 'it':
      return { notifyIt: !user.notifyIt };
    case 'sport':
      return { notifySport: !user.notifySport };
    case 'books':
      return { notifyBooks: !user.notifyBooks };
  }
}

/**
 * /notifications: per-category announcement opt-ins, toggled in place.
 */
@Injectable()
export class NotificationsCommand
  implements
    SlashCommandHandler,
    CommandInteractionHandler,
    ComponentInteractionHandler
{
  readonly commandName = 'notifications';
  readonly componentIds = [NOTIFICATION_TOGGLE_ID];
  private readonly logger = new Logger(NotificationsCommand.name);

  constructor(private readonly usersService: UsersService) {}

  getDefinition(): RESTPostAPIChatInputApplicationCommandsJSONBody {
    return new SlashCommandBuilder()
      .setName('notifications')
      .setDescription('Choose which event categories are announced to you')
      .setDMPermission(true)
      .toJSON();
  }

  async handleInteraction(
    interaction: ChatInputCommandInteraction,
  ): Promise<void> {
    const user = await this.usersService.findById(interaction.user.id);
    if (!user) {
      throw new Error(`User ${interaction.user.id} missing after upsert`);
    }

    await interaction.reply({
      ...buildNotificationSettingsView(user),
      ephemeral: true,
    });
  }

  async handleComponent(
    interaction: MessageComponentInteraction,
  ): Promise<void> {
    if (!interaction.isButton()) return;

    const parsed = EventCategorySchema.safeParse(
      parseCustomId(interaction.customId).arg,
    );
    if (!parsed.success) {
      this.logger.warn(`Unknown notification toggle: ${interaction.customId}`);
      return;
    }

    const user = await this.usersService.findById(interaction.user.id);
    if (!user) {
      throw new Error(`User ${interaction.user.id} missing after upsert`);
    }

    const updated = await this.usersService.updateNotificationPreferences(
      user.id,
      toggleFor(user, parsed.data),
    );
    if (!updated) {
      throw new Error(`User ${user.id} disappeared during toggle`);
    }

    const enabled = updated[CATEGORY_PREFERENCE_KEYS[parsed.data]];
    this.logger.log(
      `User ${user.id} turned ${parsed.data} announcements ${enabled ? 'on' : 'off'}`,
    );
    await interaction.update(buildNotificationSettingsView(updated));
  }
}
