import { Module } from '@nestjs/common';
import { NotificationModule } from '../notifications/notification.module';
import { RemindersService } from './reminders.service';
import { ReminderDeliveryService } from './reminder-delivery.service';

@Module({
  imports: [NotificationModule],
  providers: [RemindersService, ReminderDeliveryService],
  exports: [RemindersService, ReminderDeliveryService],
})
export class RemindersModule {}
