import { Test, TestingModule } from '@nestjs/testing';
import { BadRequestException, NotFoundException } from '@nestjs/common';
import type { Response } from 'express';
import { EventsAdminController } from './events-admin.controller';
import { AdminGuard } from './admin.guard';
import { EventsService } from '../events/events.service';
import { RegistrationsService } from '../events/registrations.service';
import { EventLifecycleService } from '../events/event-lifecycle.service';
import { createMockEvent } from '../common/testing/factories';

describe('EventsAdminController', () => {
  let controller: EventsAdminController;
  let eventsService: { findOne: jest.Mock; findAll: jest.Mock };
  let registrationsService: {
    countActive: jest.Mock;
    countActiveByEvent: jest.Mock;
    listByEvent: jest.Mock;
  };
  let eventLifecycle: {
    publish: jest.Mock;
    cancel: jest.Mock;
    broadcast: jest.Mock;
  };

  const event = createMockEvent();
  const tally = { total: 2, delivered: 2, unreachable: 0, failed: 0 };
  const participant = {
    registrationId: 3,
    userId: '100000000000000001',
    displayName: 'Test User',
    handle: 'testuser',
    status: 'active',
    registeredAt: new Date('2026-02-05T12:00:00Z'),
  };

  beforeEach(async () => {
    eventsService = {
      findOne: jest.fn().mockResolvedValue(event),
      findAll: jest.fn().mockResolvedValue([event]),
    };
    registrationsService = {
      countActive: jest.fn().mockResolvedValue(2),
      countActiveByEvent: jest.fn().mockResolvedValue(new Map([[1, 2]])),
      listByEvent: jest.fn().mockResolvedValue([participant]),
    };
    eventLifecycle = {
      publish: jest.fn().mockResolvedValue({ event, announcement: tally }),
      cancel: jest.fn(),
      broadcast: jest.fn(),
    };

    const module: TestingModule = await Test.createTestingModule({
      controllers: [EventsAdminController],
      providers: [
        { provide: EventsService, useValue: eventsService },
        { provide: RegistrationsService, useValue: registrationsService },
        { provide: EventLifecycleService, useValue: eventLifecycle },
      ],
    })
      .overrideGuard(AdminGuard)
      .useValue({ canActivate: () => true })
      .compile();

    controller = module.get(EventsAdminController);
  });

  describe('create', () => {
    const body = {
      title: 'TypeScript Meetup',
      category: 'it',
      format: 'offline',
      startsAt: '2099-03-10T18:00:00Z',
      location: 'Main Library, Room 4',
      organizerContact: '@organizer',
    };

    it('should publish a valid event', async () => {
      const result = await controller.create(body);

      expect(eventLifecycle.publish).toHaveBeenCalledWith(body);
      expect(result.announcement).toEqual(tally);
      expect(result.event).toMatchObject({
        id: 1,
        startsAt: '2026-03-10T18:00:00.000Z',
        activeRegistrations: 0,
      });
    });

    it('should reject a short title', async () => {
      await expect(controller.create({ ...body, title: 'TS' })).rejects.toThrow(
        BadRequestException,
      );
      expect(eventLifecycle.publish).not.toHaveBeenCalled();
    });

    it('should reject an online event without a link', async () => {
      await expect(
        controller.create({ ...body, format: 'online' }),
      ).rejects.toThrow(BadRequestException);
    });
  });

  describe('findAll', () => {
    it('should list events with their active counts', async () => {
      const result = await controller.findAll({});

      expect(eventsService.findAll).toHaveBeenCalledWith({
        includeCancelled: false,
      });
      expect(registrationsService.countActiveByEvent).toHaveBeenCalledWith([1]);
      expect(result.total).toBe(1);
      expect(result.data[0].activeRegistrations).toBe(2);
    });

    it('should pass includeCancelled through', async () => {
      await controller.findAll({ includeCancelled: 'true' });

      expect(eventsService.findAll).toHaveBeenCalledWith({
        includeCancelled: true,
      });
    });

    it('should reject an invalid includeCancelled value', async () => {
      await expect(
        controller.findAll({ includeCancelled: 'maybe' }),
      ).rejects.toThrow(BadRequestException);
    });
  });

  describe('findOne', () => {
    it('should return the event with its count', async () => {
      await expect(controller.findOne(1)).resolves.toMatchObject({
        id: 1,
        activeRegistrations: 2,
      });
    });

    it('should 404 for an unknown event', async () => {
      eventsService.findOne.mockResolvedValueOnce(null);

      await expect(controller.findOne(99)).rejects.toThrow(NotFoundException);
    });
  });

  describe('cancel', () => {
    it('should return the cascade summary', async () => {
      const cancelled = createMockEvent({ isCancelled: true });
      eventLifecycle.cancel.mockResolvedValueOnce({
        status: 'cancelled',
        event: cancelled,
        suppressedReminders: 4,
        notifications: tally,
      });

      const result = await controller.cancel(1);

      expect(result.event.isCancelled).toBe(true);
      expect(result.suppressedReminders).toBe(4);
      expect(result.notifications).toEqual(tally);
    });

    it('should 404 for an unknown event', async () => {
      eventLifecycle.cancel.mockResolvedValueOnce({ status: 'not_found' });

      await expect(controller.cancel(99)).rejects.toThrow(NotFoundException);
    });

    it('should 400 when the event is already cancelled', async () => {
      eventLifecycle.cancel.mockResolvedValueOnce({
        status: 'already_cancelled',
        event,
      });

      await expect(controller.cancel(1)).rejects.toThrow(
        'Event is already cancelled',
      );
    });
  });

  describe('listParticipants', () => {
    it('should serialize participants', async () => {
      const result = await controller.listParticipants(1, {});

      expect(registrationsService.listByEvent).toHaveBeenCalledWith(1, {
        includeCancelled: false,
      });
      expect(result).toEqual({
        eventId: 1,
        data: [{ ...participant, registeredAt: '2026-02-05T12:00:00.000Z' }],
        total: 1,
      });
    });

    it('should 404 for an unknown event', async () => {
      eventsService.findOne.mockResolvedValueOnce(null);

      await expect(controller.listParticipants(99, {})).rejects.toThrow(
        NotFoundException,
      );
      expect(registrationsService.listByEvent).not.toHaveBeenCalled();
    });
  });

  describe('exportParticipants', () => {
    it('should return CSV and set the download filename', async () => {
      const res = { setHeader: jest.fn() };

      const csv = await controller.exportParticipants(
        1,
        { includeCancelled: 'true' },
        res as unknown as Response,
      );

      expect(res.setHeader).toHaveBeenCalledWith(
        'Content-Disposition',
        'attachment; filename="event-1-participants.csv"',
      );
      expect(registrationsService.listByEvent).toHaveBeenCalledWith(1, {
        includeCancelled: true,
      });
      expect(csv.split('\r\n')[1]).toBe(
        '1,Test User,@testuser,100000000000000001,active,2026-02-05T12:00:00.000Z',
      );
    });
  });

  describe('broadcast', () => {
    it('should return the tally', async () => {
      eventLifecycle.broadcast.mockResolvedValueOnce({
        status: 'sent',
        event,
        tally,
      });

      await expect(
        controller.broadcast(1, { message: '  Doors open at 17:30  ' }),
      ).resolves.toEqual({ eventId: 1, tally });
      expect(eventLifecycle.broadcast).toHaveBeenCalledWith(
        1,
        'Doors open at 17:30',
      );
    });

    it('should reject a message shorter than 3 characters', async () => {
      await expect(controller.broadcast(1, { message: 'hi' })).rejects.toThrow(
        BadRequestException,
      );
      expect(eventLifecycle.broadcast).not.toHaveBeenCalled();
    });

    it('should 400 when nobody is registered', async () => {
      eventLifecycle.broadcast.mockResolvedValueOnce({
        status: 'no_participants',
        event,
      });

      await expect(
        controller.broadcast(1, { message: 'Anyone there?' }),
      ).rejects.toThrow('Event has no active participants');
    });

    it('should 404 for an unknown event', async () => {
      eventLifecycle.broadcast.mockResolvedValueOnce({ status: 'not_found' });

      await expect(
        controller.broadcast(99, { message: 'Anyone there?' }),
      ).rejects.toThrow(NotFoundException);
    });
  });
});
