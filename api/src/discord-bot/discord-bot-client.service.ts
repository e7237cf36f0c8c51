import { Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import {
  Client,
  GatewayIntentBits,
  Events,
  type MessageCreateOptions,
} from 'discord.js';
import {
  DISCORD_BOT_EVENTS,
  friendlyDiscordErrorMessage,
} from './discord-bot.constants';

/** What a direct message may carry */
export type DirectMessage = Pick<
  MessageCreateOptions,
  'content' | 'embeds' | 'components'
>;

/** How long login may take before connect() gives up */
const CONNECT_TIMEOUT_MS = 15_000;

@Injectable()
export class DiscordBotClientService {
  private readonly logger = new Logger(DiscordBotClientService.name);
  private client: Client | null = null;
  private connecting = false;

  constructor(private readonly eventEmitter: EventEmitter2) {}

  async connect(token: string): Promise<void> {
    // Disconnect any existing client first
    if (this.client) {
      await this.disconnect();
    }

    // DMs to users do not need the DirectMessages intent; it is only for
    // receiving them, which the bot never does.
    const client = new Client({
      intents: [GatewayIntentBits.Guilds],
    });
    this.client = client;
    this.connecting = true;

    return new Promise<void>((resolve, reject) => {
      const timeout = setTimeout(() => {
        this.connecting = false;
        reject(new Error('Discord bot connection timed out after 15s'));
      }, CONNECT_TIMEOUT_MS);

      client.once(Events.ClientReady, () => {
        clearTimeout(timeout);
        this.connecting = false;
        this.logger.log(`Discord bot connected as ${client.user?.tag}`);

        // Use emitAsync so async @OnEvent(CONNECTED) handlers (command
        // registration, interaction listeners) are awaited before connect()
        // resolves. Errors in handlers are logged but do not reject connect().
        this.eventEmitter
          .emitAsync(DISCORD_BOT_EVENTS.CONNECTED)
          .catch((err: unknown) => {
            this.logger.error(
              'Error in CONNECTED event handlers:',
              err instanceof Error ? err.message : err,
            );
          })
          .finally(() => {
            resolve();
          });
      });

      client.once(Events.Error, (error: Error) => {
        clearTimeout(timeout);
        this.connecting = false;
        const message = friendlyDiscordErrorMessage(error);
        this.logger.error('Discord bot connection error:', message);
        this.eventEmitter.emit(DISCORD_BOT_EVENTS.ERROR, error);
        reject(new Error(message));
      });

      client.login(token).catch((err: unknown) => {
        clearTimeout(timeout);
        this.connecting = false;
        const message = friendlyDiscordErrorMessage(err);
        this.logger.error('Discord bot login failed:', message);
        this.client = null;
        reject(new Error(message));
      });
    });
  }

  async disconnect(): Promise<void> {
    this.connecting = false;

    if (!this.client) return;

    try {
      await this.client.destroy();
      this.logger.log('Discord bot disconnected');
      this.eventEmitter.emit(DISCORD_BOT_EVENTS.DISCONNECTED);
    } catch (error) {
      this.logger.error('Error disconnecting Discord bot:', error);
    } finally {
      this.client = null;
    }
  }

  isConnected(): boolean {
    return this.client?.isReady() ?? false;
  }

  isConnecting(): boolean {
    return this.connecting;
  }

  /**
   * Get the underlying Discord.js Client instance.
   * Used by interaction handlers to register event listeners.
   */
  getClient(): Client | null {
    return this.client;
  }

  /**
   * Get the bot's application/client ID.
   * Used for slash command registration.
   */
  getClientId(): string | null {
    if (!this.client?.isReady()) return null;
    return this.client.user.id;
  }

  /**
   * Send a DM to a user by their Discord ID.
   * Errors propagate untouched so callers can classify them.
   */
  async sendDirectMessage(
    discordId: string,
    message: DirectMessage,
  ): Promise<void> {
    if (!this.client?.isReady()) {
      throw new Error('Discord bot is not connected');
    }

    const user = await this.client.users.fetch(discordId);
    await user.send(message);
  }
}
