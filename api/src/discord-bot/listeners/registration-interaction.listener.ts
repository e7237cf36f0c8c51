import { Injectable, Logger } from '@nestjs/common';
import type { MessageComponentInteraction } from 'discord.js';
import { RegistrationLifecycleService } from '../../events/registration-lifecycle.service';
import {
  REGISTRATION_BUTTON_IDS,
  REMINDER_BUTTON_IDS,
} from '../discord-bot.constants';
import { parseCustomId, parseIdArg } from '../utils/custom-id';
import {
  cancelRegistrationReply,
  confirmAttendanceReply,
  declineReply,
  registerReply,
} from '../utils/interaction-views';
import type { ComponentInteractionHandler } from './interaction.listener';

/**
 * Register / Cancel buttons (announcements and the event detail view) and
 * the confirm / decline buttons of the 24h reminder.
 */
@Injectable()
export class RegistrationInteractionListener
  implements ComponentInteractionHandler
{
  readonly componentIds = [
    REGISTRATION_BUTTON_IDS.REGISTER,
    REGISTRATION_BUTTON_IDS.UNREGISTER,
    REMINDER_BUTTON_IDS.CONFIRM,
    REMINDER_BUTTON_IDS.DECLINE,
  ];
  private readonly logger = new Logger(RegistrationInteractionListener.name);

  constructor(
    private readonly registrationLifecycle: RegistrationLifecycleService,
  ) {}

  async handleComponent(
    interaction: MessageComponentInteraction,
  ): Promise<void> {
    if (!interaction.isButton()) return;

    const { prefix, arg } = parseCustomId(interaction.customId);
    const id = parseIdArg(arg);
    if (id === null) {
      this.logger.warn(`Malformed button ID: ${interaction.customId}`);
      await interaction.reply({
        content: 'This button is no longer valid.',
        ephemeral: true,
      });
      return;
    }

    const content = await this.dispatch(prefix, interaction.user.id, id);
    await interaction.reply({ content, ephemeral: true });
  }

  private async dispatch(
    prefix: string,
    userId: string,
    id: number,
  ): Promise<string> {
    switch (prefix) {
      case REGISTRATION_BUTTON_IDS.REGISTER:
        return registerReply(await this.registrationLifecycle.register(userId, id));
      case REGISTRATION_BUTTON_IDS.UNREGISTER:
        return cancelRegistrationReply(
          await this.registrationLifecycle.cancel(userId, id),
        );
      case REMINDER_BUTTON_IDS.CONFIRM:
        return confirmAttendanceReply(
          await this.registrationLifecycle.confirmAttendance(userId, id),
        );
      case REMINDER_BUTTON_IDS.DECLINE:
        return declineReply(await this.registrationLifecycle.decline(userId, id));
      default:
        throw new Error(`Unexpected button prefix: ${prefix}`);
    }
  }
}
