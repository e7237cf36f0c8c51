import { Module } from '@nestjs/common';
import { EventsService } from './events.service';
import { RegistrationsService } from './registrations.service';
import { RegistrationLifecycleService } from './registration-lifecycle.service';
import { EventLifecycleService } from './event-lifecycle.service';
import { UsersModule } from '../users/users.module';
import { RemindersModule } from '../reminders/reminders.module';
import { NotificationModule } from '../notifications/notification.module';

@Module({
  imports: [UsersModule, RemindersModule, NotificationModule],
  providers: [
    EventsService,
    RegistrationsService,
    RegistrationLifecycleService,
    EventLifecycleService,
  ],
  exports: [
    EventsService,
    RegistrationsService,
    RegistrationLifecycleService,
    EventLifecycleService,
  ],
})
export class EventsModule {}
