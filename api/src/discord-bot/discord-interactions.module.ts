import { Module } from '@nestjs/common';
import { DiscordBotModule } from './discord-bot.module';
import { UsersModule } from '../users/users.module';
import { EventsModule } from '../events/events.module';
import { RegisterCommandsService } from './commands/register-commands';
import { EventsListCommand } from './commands/events-list.command';
import { MyEventsCommand } from './commands/my-events.command';
import { NotificationsCommand } from './commands/notifications.command';
import { InteractionListener } from './listeners/interaction.listener';
import { RegistrationInteractionListener } from './listeners/registration-interaction.listener';

/**
 * Slash commands and component handlers. Kept apart from DiscordBotModule
 * so the notification path can depend on the bot without depending on the
 * domain modules these handlers call into.
 */
@Module({
  imports: [DiscordBotModule, UsersModule, EventsModule],
  providers: [
    RegisterCommandsService,
    EventsListCommand,
    MyEventsCommand,
    NotificationsCommand,
    InteractionListener,
    RegistrationInteractionListener,
  ],
})
export class DiscordInteractionsModule {}
