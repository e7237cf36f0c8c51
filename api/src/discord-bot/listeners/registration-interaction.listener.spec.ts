/* eslint-disable @typescript-eslint/unbound-method */
import { Test, TestingModule } from '@nestjs/testing';
import type { MessageComponentInteraction } from 'discord.js';
import { RegistrationInteractionListener } from './registration-interaction.listener';
import { RegistrationLifecycleService } from '../../events/registration-lifecycle.service';
import {
  createMockEvent,
  createMockRegistration,
  createMockReminder,
} from '../../common/testing/factories';

describe('RegistrationInteractionListener', () => {
  let listener: RegistrationInteractionListener;
  let lifecycle: jest.Mocked<RegistrationLifecycleService>;

  const makeButton = (customId: string) => {
    const interaction = {
      customId,
      user: { id: '100000000000000001' },
      isButton: jest.fn().mockReturnValue(true),
      reply: jest.fn().mockResolvedValue(undefined),
    };
    return {
      interaction,
      asComponent: interaction as unknown as MessageComponentInteraction,
    };
  };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        RegistrationInteractionListener,
        {
          provide: RegistrationLifecycleService,
          useValue: {
            register: jest.fn(),
            cancel: jest.fn(),
            confirmAttendance: jest.fn(),
            decline: jest.fn(),
          },
        },
      ],
    }).compile();

    listener = module.get(RegistrationInteractionListener);
    lifecycle = module.get(RegistrationLifecycleService);
  });

  it('should claim the registration and reminder button prefixes', () => {
    expect(listener.componentIds).toEqual([
      'event_register',
      'event_unregister',
      'reminder_confirm',
      'reminder_decline',
    ]);
  });

  it('should register and describe the scheduled reminders', async () => {
    lifecycle.register.mockResolvedValue({
      status: 'registered',
      event: createMockEvent(),
      registration: createMockRegistration(),
      reminders: [
        createMockReminder(),
        createMockReminder({ id: 2, reminderType: '15min' }),
      ],
    });
    const { interaction, asComponent } = makeButton('event_register:1');

    await listener.handleComponent(asComponent);

    expect(lifecycle.register).toHaveBeenCalledWith('100000000000000001', 1);
    expect(interaction.reply).toHaveBeenCalledWith({
      content:
        "✅ You're registered for **TypeScript Meetup**. I'll remind you 24 hours and 15 minutes before it starts.",
      ephemeral: true,
    });
  });

  it('should cancel a registration', async () => {
    lifecycle.cancel.mockResolvedValue({ status: 'not_registered' });
    const { interaction, asComponent } = makeButton('event_unregister:7');

    await listener.handleComponent(asComponent);

    expect(lifecycle.cancel).toHaveBeenCalledWith('100000000000000001', 7);
    expect(interaction.reply).toHaveBeenCalledWith({
      content: "You're not registered for this event.",
      ephemeral: true,
    });
  });

  it('should confirm attendance by registration id', async () => {
    lifecycle.confirmAttendance.mockResolvedValue({
      status: 'confirmed',
      event: createMockEvent(),
    });
    const { interaction, asComponent } = makeButton('reminder_confirm:12');

    await listener.handleComponent(asComponent);

    expect(lifecycle.confirmAttendance).toHaveBeenCalledWith(
      '100000000000000001',
      12,
    );
    expect(interaction.reply).toHaveBeenCalledWith({
      content: '👍 Great, see you at **TypeScript Meetup**!',
      ephemeral: true,
    });
  });

  it('should reject a decline for someone else', async () => {
    lifecycle.decline.mockResolvedValue({ status: 'forbidden' });
    const { interaction, asComponent } = makeButton('reminder_decline:12');

    await listener.handleComponent(asComponent);

    expect(interaction.reply).toHaveBeenCalledWith({
      content: 'This reminder is no longer valid.',
      ephemeral: true,
    });
  });

  it('should answer a malformed id without calling the lifecycle', async () => {
    const { interaction, asComponent } = makeButton('event_register:abc');

    await listener.handleComponent(asComponent);

    expect(lifecycle.register).not.toHaveBeenCalled();
    expect(interaction.reply).toHaveBeenCalledWith({
      content: 'This button is no longer valid.',
      ephemeral: true,
    });
  });

  it('should ignore non-button components', async () => {
    const { interaction, asComponent } = makeButton('event_register:1');
    interaction.isButton.mockReturnValue(false);

    await listener.handleComponent(asComponent);

    expect(interaction.reply).not.toHaveBeenCalled();
  });
});
