import { Module } from '@nestjs/common';
import { EventsModule } from '../events/events.module';
import { EventsAdminController } from './events-admin.controller';
import { AdminGuard } from './admin.guard';

@Module({
  imports: [EventsModule],
  controllers: [EventsAdminController],
  providers: [AdminGuard],
})
export class AdminModule {}
