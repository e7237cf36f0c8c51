import { Injectable, Logger } from '@nestjs/common';
import {
  SlashCommandBuilder,
  type ChatInputCommandInteraction,
  type MessageComponentInteraction,
  type RESTPostAPIChatInputApplicationCommandsJSONBody,
} from 'discord.js';
import {
  EVENT_CATEGORIES,
  EVENT_CATEGORY_LABELS,
  EventCategorySchema,
} from '@event-pulse/contract';
import { EventsService } from '../../events/events.service';
import { RegistrationsService } from '../../events/registrations.service';
import { EVENT_SELECT_ID } from '../discord-bot.constants';
import {
  buildEventDetailView,
  buildEventListView,
} from '../utils/interaction-views';
import { parseIdArg } from '../utils/custom-id';
import type { SlashCommandHandler } from './register-commands';
import type {
  CommandInteractionHandler,
  ComponentInteractionHandler,
} from '../listeners/interaction.listener';

/**
 * /events [category]: upcoming events with a select menu that opens the
 * detail view. The same select menu is used by /my-events.
 */
@Injectable()
export class EventsListCommand
  implements
    SlashCommandHandler,
    CommandInteractionHandler,
    ComponentInteractionHandler
{
  readonly commandName = 'events';
  readonly componentIds = [EVENT_SELECT_ID];
  private readonly logger = new Logger(EventsListCommand.name);

  constructor(
    private readonly eventsService: EventsService,
    private readonly registrationsService: RegistrationsService,
  ) {}

  getDefinition(): RESTPostAPIChatInputApplicationCommandsJSONBody {
    return new SlashCommandBuilder()
      .setName('events')
      .setDescription('List upcoming events')
      .setDMPermission(true)
      .addStringOption((option) =>
        option
          .setName('category')
          .setDescription('Only show one category')
          .setRequired(false)
          .addChoices(
            ...EVENT_CATEGORIES.map((category) => ({
              name: EVENT_CATEGORY_LABELS[category],
              value: category,
            })),
          ),
      )
      .toJSON();
  }

  async handleInteraction(
    interaction: ChatInputCommandInteraction,
  ): Promise<void> {
    await interaction.deferReply({ ephemeral: true });

    const parsed = EventCategorySchema.safeParse(
      interaction.options.getString('category'),
    );
    const category = parsed.success ? parsed.data : undefined;

    const events = await this.eventsService.findUpcoming({ category });
    if (events.length === 0) {
      await interaction.editReply('No upcoming events found.');
      return;
    }

    await interaction.editReply(buildEventListView(events, category));
  }

  /** Event picked from a listing: swap the message for its detail view */
  async handleComponent(
    interaction: MessageComponentInteraction,
  ): Promise<void> {
    if (!interaction.isStringSelectMenu()) return;

    const eventId = parseIdArg(interaction.values[0] ?? null);
    const event = eventId ? await this.eventsService.findOne(eventId) : null;
    if (!event) {
      this.logger.debug(`Selected event ${interaction.values[0]} not found`);
      await interaction.update({
        content: 'That event is no longer available.',
        embeds: [],
        components: [],
      });
      return;
    }

    const [registration, activeRegistrations] = await Promise.all([
      this.registrationsService.findOne(interaction.user.id, event.id),
      this.registrationsService.countActive(event.id),
    ]);

    await interaction.update({
      content: '',
      ...buildEventDetailView(event, {
        isRegistered: registration?.status === 'active',
        activeRegistrations,
      }),
    });
  }
}
