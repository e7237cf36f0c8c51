import {
  BadRequestException,
  Body,
  Controller,
  Get,
  Header,
  HttpCode,
  HttpStatus,
  NotFoundException,
  Param,
  ParseIntPipe,
  Post,
  Query,
  Res,
  UseGuards,
} from '@nestjs/common';
import type { Response } from 'express';
import {
  BroadcastSchema,
  CreateEventSchema,
  IncludeCancelledQuerySchema,
  type BroadcastResponseDto,
  type CancelEventResponseDto,
  type CreateEventResponseDto,
  type EventListResponseDto,
  type EventResponseDto,
  type ParticipantListResponseDto,
} from '@event-pulse/contract';
import { AdminGuard } from './admin.guard';
import { EventsService, toEventResponse } from '../events/events.service';
import { RegistrationsService } from '../events/registrations.service';
import { EventLifecycleService } from '../events/event-lifecycle.service';
import { handleValidationError } from '../common/validation.util';
import { participantsCsvFilename, participantsToCsv } from './participants-csv';

/**
 * Organizer endpoints: publish, inspect, cancel and message events.
 */
@Controller('admin/events')
@UseGuards(AdminGuard)
export class EventsAdminController {
  constructor(
    private readonly eventsService: EventsService,
    private readonly registrationsService: RegistrationsService,
    private readonly eventLifecycle: EventLifecycleService,
  ) {}

  /**
   * Create an event and announce it to the category's subscribers.
   */
  @Post()
  async create(@Body() body: unknown): Promise<CreateEventResponseDto> {
    try {
      const dto = CreateEventSchema.parse(body);
      const { event, announcement } = await this.eventLifecycle.publish(dto);
      return { event: toEventResponse(event, 0), announcement };
    } catch (error) {
      handleValidationError(error);
    }
  }

  @Get()
  async findAll(
    @Query() query: Record<string, string>,
  ): Promise<EventListResponseDto> {
    try {
      const { includeCancelled } = IncludeCancelledQuerySchema.parse(query);
      const events = await this.eventsService.findAll({ includeCancelled });
      const counts = await this.registrationsService.countActiveByEvent(
        events.map((event) => event.id),
      );
      return {
        data: events.map((event) =>
          toEventResponse(event, counts.get(event.id) ?? 0),
        ),
        total: events.length,
      };
    } catch (error) {
      handleValidationError(error);
    }
  }

  @Get(':id')
  async findOne(
    @Param('id', ParseIntPipe) id: number,
  ): Promise<EventResponseDto> {
    const event = await this.eventsService.findOne(id);
    if (!event) {
      throw new NotFoundException(`Event with ID ${id} not found`);
    }
    const activeRegistrations = await this.registrationsService.countActive(id);
    return toEventResponse(event, activeRegistrations);
  }

  /**
   * Cancel an event: pending reminders are retired and participants are
   * told by DM. Registrations are kept for the record.
   */
  @Post(':id/cancel')
  @HttpCode(HttpStatus.OK)
  async cancel(
    @Param('id', ParseIntPipe) id: number,
  ): Promise<CancelEventResponseDto> {
    const result = await this.eventLifecycle.cancel(id);
    switch (result.status) {
      case 'not_found':
        throw new NotFoundException(`Event with ID ${id} not found`);
      case 'already_cancelled':
        throw new BadRequestException('Event is already cancelled');
      case 'cancelled': {
        const activeRegistrations =
          await this.registrationsService.countActive(id);
        return {
          event: toEventResponse(result.event, activeRegistrations),
          suppressedReminders: result.suppressedReminders,
          notifications: result.notifications,
        };
      }
    }
  }

  @Get(':id/participants')
  async listParticipants(
    @Param('id', ParseIntPipe) id: number,
    @Query() query: Record<string, string>,
  ): Promise<ParticipantListResponseDto> {
    const rows = await this.loadParticipants(id, query);
    return {
      eventId: id,
      data: rows.map((row) => ({
        ...row,
        registeredAt: row.registeredAt.toISOString(),
      })),
      total: rows.length,
    };
  }

  /** Same list as a CSV download */
  @Get(':id/participants/export')
  @Header('Content-Type', 'text/csv; charset=utf-8')
  async exportParticipants(
    @Param('id', ParseIntPipe) id: number,
    @Query() query: Record<string, string>,
    @Res({ passthrough: true }) res: Response,
  ): Promise<string> {
    const rows = await this.loadParticipants(id, query);
    res.setHeader(
      'Content-Disposition',
      `attachment; filename="${participantsCsvFilename(id)}"`,
    );
    return participantsToCsv(rows);
  }

  /** DM a message to every active participant */
  @Post(':id/broadcast')
  @HttpCode(HttpStatus.OK)
  async broadcast(
    @Param('id', ParseIntPipe) id: number,
    @Body() body: unknown,
  ): Promise<BroadcastResponseDto> {
    let message: string;
    try {
      message = BroadcastSchema.parse(body).message;
    } catch (error) {
      handleValidationError(error);
    }

    const result = await this.eventLifecycle.broadcast(id, message);
    switch (result.status) {
      case 'not_found':
        throw new NotFoundException(`Event with ID ${id} not found`);
      case 'no_participants':
        throw new BadRequestException('Event has no active participants');
      case 'sent':
        return { eventId: id, tally: result.tally };
    }
  }

  private async loadParticipants(id: number, query: Record<string, string>) {
    let includeCancelled: boolean;
    try {
      includeCancelled = IncludeCancelledQuerySchema.parse(query).includeCancelled;
    } catch (error) {
      handleValidationError(error);
    }

    const event = await this.eventsService.findOne(id);
    if (!event) {
      throw new NotFoundException(`Event with ID ${id} not found`);
    }
    return this.registrationsService.listByEvent(id, { includeCancelled });
  }
}
