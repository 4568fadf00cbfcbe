import { DateTime } from 'luxon';
import { env } from '../config/env';
import { createLogger } from '../config/logger';
import { errorMessage } from '../errors';
import { validatePreference } from '../schemas/validation';
import { PreferenceBackend } from '../stores/store.types';
import {
  Clock,
  NOTIFICATION_TYPES,
  NotificationType,
  Preference,
  systemClock,
} from '../types/notification.types';

const log = createLogger('preference-store');

type PreferenceDefaults = Pick<Preference, 'channels' | 'priorityThreshold' | 'frequencyLimit'>;

const GENERIC_DEFAULTS: PreferenceDefaults = {
  channels: ['email'],
  priorityThreshold: 'low',
};

const TYPE_DEFAULTS: Partial<Record<NotificationType, PreferenceDefaults>> = {
  trading_alert: { channels: ['email', 'push'], priorityThreshold: 'normal', frequencyLimit: 10 },
  risk_warning: { channels: ['email', 'sms', 'push'], priorityThreshold: 'high', frequencyLimit: 5 },
  security_alert: { channels: ['email', 'sms', 'push'], priorityThreshold: 'critical', frequencyLimit: 20 },
};

export function getDefaultPreference(userId: string, type: NotificationType): Preference {
  const defaults = TYPE_DEFAULTS[type] ?? GENERIC_DEFAULTS;
  return {
    userId,
    type,
    channels: [...defaults.channels],
    enabled: true,
    timezone: 'UTC',
    priorityThreshold: defaults.priorityThreshold,
    frequencyLimit: defaults.frequencyLimit,
  };
}

export type PreferenceUpdate = Partial<Omit<Preference, 'userId' | 'type' | 'createdAt' | 'updatedAt'>>;

interface CacheEntry {
  preference: Preference;
  cachedAt: number;
}

function toMinutes(time: string): number {
  const [hours, minutes] = time.split(':').map((part) => parseInt(part, 10));
  return hours * 60 + minutes;
}

export class PreferenceStore {
  private readonly cache = new Map<string, CacheEntry>();
  private readonly cacheTtlMs: number;
  private readonly clock: Clock;

  constructor(
    private readonly backend: PreferenceBackend,
    options: { cacheTtlSeconds?: number; clock?: Clock } = {}
  ) {
    this.cacheTtlMs = (options.cacheTtlSeconds ?? env.PREFERENCE_CACHE_TTL) * 1000;
    this.clock = options.clock ?? systemClock;
  }

  async get(userId: string, type: NotificationType): Promise<Preference> {
    const key = this.cacheKey(userId, type);
    const now = this.clock().getTime();
    const cached = this.cache.get(key);
    if (cached && now - cached.cachedAt < this.cacheTtlMs) {
      return cached.preference;
    }

    let preference: Preference;
    try {
      preference = (await this.backend.load(userId, type)) ?? getDefaultPreference(userId, type);
    } catch (error) {
      // Serve defaults without caching them so the next call retries the backend
      log.error('Failed to load preference', { userId, type, error: errorMessage(error) });
      return getDefaultPreference(userId, type);
    }

    this.cache.set(key, { preference, cachedAt: now });
    return preference;
  }

  /** One preference per notification type, defaults filled in */
  async getAll(userId: string): Promise<Preference[]> {
    return Promise.all(NOTIFICATION_TYPES.map((type) => this.get(userId, type)));
  }

  async set(preference: Preference): Promise<boolean> {
    validatePreference(preference);
    const now = this.clock();
    const saved = await this.backend.save({
      ...preference,
      createdAt: preference.createdAt ?? now,
      updatedAt: now,
    });
    this.cache.delete(this.cacheKey(preference.userId, preference.type));

    if (saved) {
      log.info('Preference updated', { userId: preference.userId, type: preference.type });
    }
    return saved;
  }

  async update(userId: string, type: NotificationType, changes: PreferenceUpdate): Promise<Preference> {
    const current = await this.get(userId, type);
    const updated: Preference = { ...current, ...changes, userId, type };
    await this.set(updated);
    return updated;
  }

  async delete(userId: string, type: NotificationType): Promise<boolean> {
    const deleted = await this.backend.delete(userId, type);
    this.cache.delete(this.cacheKey(userId, type));
    return deleted;
  }

  /** Remove every stored preference of a user; returns how many existed */
  async reset(userId: string): Promise<number> {
    let removed = 0;
    for (const type of NOTIFICATION_TYPES) {
      if (await this.delete(userId, type)) {
        removed++;
      }
    }
    log.info('Preferences reset to defaults', { userId, removed });
    return removed;
  }

  clearCache(userId?: string): void {
    if (userId === undefined) {
      this.cache.clear();
      return;
    }
    for (const type of NOTIFICATION_TYPES) {
      this.cache.delete(this.cacheKey(userId, type));
    }
  }

  /**
   * Whether `now` falls in the preference's quiet window, read in the
   * preference's own timezone. The window is [start, end) and wraps past
   * midnight when start > end; start == end means no quiet window.
   */
  isQuietHours(preference: Preference, now: Date = this.clock()): boolean {
    const { quietHoursStart, quietHoursEnd } = preference;
    if (!quietHoursStart || !quietHoursEnd) {
      return false;
    }

    const start = toMinutes(quietHoursStart);
    const end = toMinutes(quietHoursEnd);
    if (start === end) {
      return false;
    }

    const local = DateTime.fromJSDate(now, { zone: preference.timezone });
    if (!local.isValid) {
      log.warn('Invalid timezone on preference', {
        userId: preference.userId,
        timezone: preference.timezone,
      });
      return false;
    }
    const current = local.hour * 60 + local.minute;

    if (start < end) {
      return current >= start && current < end;
    }
    return current >= start || current < end;
  }

  private cacheKey(userId: string, type: NotificationType): string {
    return `${userId}:${type}`;
  }
}
