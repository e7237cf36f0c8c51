import { Module } from '@nestjs/common';
import { APP_INTERCEPTOR } from '@nestjs/core';
import { ConfigModule } from '@nestjs/config';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { ScheduleModule } from '@nestjs/schedule';
import { AppController } from './app.controller';
import { AppService } from './app.service';
import { validateEnv } from './config/env.validation';
import { DrizzleModule } from './drizzle/drizzle.module';
import { PerfLoggingInterceptor } from './common/perf-logging.interceptor';

import { UsersModule } from './users/users.module';
import { EventsModule } from './events/events.module';
import { RemindersModule } from './reminders/reminders.module';
import { NotificationModule } from './notifications/notification.module';
import { DiscordBotModule } from './discord-bot/discord-bot.module';
import { DiscordInteractionsModule } from './discord-bot/discord-interactions.module';
import { AdminModule } from './admin/admin.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
      validate: validateEnv,
    }),
    EventEmitterModule.forRoot(),
    ScheduleModule.forRoot(),
    DrizzleModule,
    UsersModule,
    EventsModule,
    RemindersModule,
    NotificationModule,
    DiscordBotModule,
    DiscordInteractionsModule,
    AdminModule,
  ],
  controllers: [AppController],
  providers: [
    AppService,
    { provide: APP_INTERCEPTOR, useClass: PerfLoggingInterceptor },
  ],
})
export class AppModule {}
