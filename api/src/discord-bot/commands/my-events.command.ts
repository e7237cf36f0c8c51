import { Injectable } from '@nestjs/common';
import {
  SlashCommandBuilder,
  type ChatInputCommandInteraction,
  type RESTPostAPIChatInputApplicationCommandsJSONBody,
} from 'discord.js';
import { RegistrationsService } from '../../events/registrations.service';
import { buildMyEventsView } from '../utils/interaction-views';
import type { SlashCommandHandler } from './register-commands';
import type { CommandInteractionHandler } from '../listeners/interaction.listener';

@Injectable()
export class MyEventsCommand
  implements SlashCommandHandler, CommandInteractionHandler
{
  readonly commandName = 'my-events';

  constructor(private readonly registrationsService: RegistrationsService) {}

  getDefinition(): RESTPostAPIChatInputApplicationCommandsJSONBody {
    return new SlashCommandBuilder()
      .setName('my-events')
      .setDescription('Show the upcoming events you are registered for')
      .setDMPermission(true)
      .toJSON();
  }

  async handleInteraction(
    interaction: ChatInputCommandInteraction,
  ): Promise<void> {
    await interaction.deferReply({ ephemeral: true });

    const rows = await this.registrationsService.listByUser(
      interaction.user.id,
      { startingAfter: new Date() },
    );
    if (rows.length === 0) {
      await interaction.editReply(
        "You're not registered for any upcoming events. Use /events to find one.",
      );
      return;
    }

    await interaction.editReply(buildMyEventsView(rows));
  }
}
