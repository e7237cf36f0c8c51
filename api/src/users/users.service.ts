import { Inject, Injectable } from '@nestjs/common';
import { DrizzleAsyncProvider } from '../drizzle/drizzle.module';
import type { PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import * as schema from '../drizzle/schema';
import { eq } from 'drizzle-orm';
import type {
  EventCategory,
  UpdateNotificationPreferencesDto,
} from '@event-pulse/contract';

/** Identity fields Discord hands us on every interaction */
export interface UserProfile {
  id: string;
  displayName: string;
  handle?: string | null;
}

type PreferenceColumns = Pick<
  schema.NewUser,
  'notifyIt' | 'notifySport' | 'notifyBooks'
>;

@Injectable()
export class UsersService {
  constructor(
    @Inject(DrizzleAsyncProvider)
    private db: PostgresJsDatabase<typeof schema>,
  ) {}

  /**
   * Insert the user or refresh their display fields.
   * Notification flags are left untouched on conflict.
   */
  async upsert(profile: UserProfile): Promise<schema.User> {
    const [user] = await this.db
      .insert(schema.users)
      .values({
        id: profile.id,
        displayName: profile.displayName,
        handle: profile.handle ?? null,
      })
      .onConflictDoUpdate({
        target: schema.users.id,
        set: {
          displayName: profile.displayName,
          handle: profile.handle ?? null,
        },
      })
      .returning();
    return user;
  }

  async findById(id: string): Promise<schema.User | null> {
    const [user] = await this.db
      .select()
      .from(schema.users)
      .where(eq(schema.users.id, id))
      .limit(1);
    return user ?? null;
  }

  /**
   * Apply only the flags present in `prefs`, in one UPDATE.
   * Returns null when the user does not exist.
   */
  async updateNotificationPreferences(
    id: string,
    prefs: UpdateNotificationPreferencesDto,
  ): Promise<schema.User | null> {
    const changes: PreferenceColumns = {};
    if (prefs.notifyIt !== undefined) changes.notifyIt = prefs.notifyIt;
    if (prefs.notifySport !== undefined) changes.notifySport = prefs.notifySport;
    if (prefs.notifyBooks !== undefined) changes.notifyBooks = prefs.notifyBooks;

    if (Object.keys(changes).length === 0) {
      return this.findById(id);
    }

    const [updated] = await this.db
      .update(schema.users)
      .set(changes)
      .where(eq(schema.users.id, id))
      .returning();
    return updated ?? null;
  }

  /** Users who opted into announcements for the category */
  async findSubscribers(category: EventCategory): Promise<schema.User[]> {
    const column = {
      it: schema.users.notifyIt,
      sport: schema.users.notifySport,
      books: schema.users.notifyBooks,
    }[category];

    return this.db.select().from(schema.users).where(eq(column, true));
  }
}
