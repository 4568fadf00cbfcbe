import { describe, it, expect, beforeEach, jest } from '@jest/globals';
import { ValidationError } from '../../../src/errors';
import { PreferenceStore, getDefaultPreference } from '../../../src/services/preference-store';
import { MemoryPreferenceBackend } from '../../../src/stores/memory-preference.backend';
import { PreferenceBackend } from '../../../src/stores/store.types';
import { ManualClock, T0, buildPreference } from '../../helpers/fixtures';

describe('PreferenceStore', () => {
  let clock: ManualClock;
  let backend: MemoryPreferenceBackend;
  let store: PreferenceStore;

  beforeEach(() => {
    clock = new ManualClock();
    backend = new MemoryPreferenceBackend();
    store = new PreferenceStore(backend, { cacheTtlSeconds: 60, clock: clock.now });
  });

  describe('getDefaultPreference', () => {
    it('should use type-specific defaults', () => {
      expect(getDefaultPreference('user-1', 'trading_alert')).toEqual({
        userId: 'user-1',
        type: 'trading_alert',
        channels: ['email', 'push'],
        enabled: true,
        timezone: 'UTC',
        priorityThreshold: 'normal',
        frequencyLimit: 10,
      });
      expect(getDefaultPreference('user-1', 'security_alert').priorityThreshold).toBe('critical');
    });

    it('should fall back to email only for other types', () => {
      const preference = getDefaultPreference('user-1', 'account_update');
      expect(preference.channels).toEqual(['email']);
      expect(preference.priorityThreshold).toBe('low');
      expect(preference.frequencyLimit).toBeUndefined();
    });
  });

  describe('get', () => {
    it('should serve defaults when nothing is stored', async () => {
      expect(await store.get('user-1', 'risk_warning')).toEqual(getDefaultPreference('user-1', 'risk_warning'));
    });

    it('should cache loads until the TTL runs out', async () => {
      const load = jest.spyOn(backend, 'load');

      await store.get('user-1', 'custom');
      await store.get('user-1', 'custom');
      expect(load).toHaveBeenCalledTimes(1);

      clock.advance(60000);
      await store.get('user-1', 'custom');
      expect(load).toHaveBeenCalledTimes(2);
    });

    it('should serve uncached defaults when the backend fails', async () => {
      const failing: PreferenceBackend = {
        load: jest.fn(async () => {
          throw new Error('connection refused');
        }),
        save: jest.fn(async () => true),
        delete: jest.fn(async () => false),
      };
      const fallback = new PreferenceStore(failing, { clock: clock.now });

      expect(await fallback.get('user-1', 'custom')).toEqual(getDefaultPreference('user-1', 'custom'));
      await fallback.get('user-1', 'custom');
      expect(failing.load).toHaveBeenCalledTimes(2);
    });
  });

  describe('set', () => {
    it('should store the preference and drop the cached copy', async () => {
      await store.get('user-1', 'custom');
      await store.set(buildPreference({ channels: ['sms'] }));

      const preference = await store.get('user-1', 'custom');
      expect(preference.channels).toEqual(['sms']);
      expect(preference.createdAt).toEqual(T0);
      expect(preference.updatedAt).toEqual(T0);
    });

    it('should reject an invalid preference', async () => {
      await expect(store.set(buildPreference({ timezone: 'Nowhere/Special' }))).rejects.toThrow(ValidationError);
    });
  });

  describe('update', () => {
    it('should merge changes over the current preference', async () => {
      const updated = await store.update('user-1', 'trading_alert', { enabled: false });

      expect(updated.enabled).toBe(false);
      expect(updated.channels).toEqual(['email', 'push']);
      expect((await store.get('user-1', 'trading_alert')).enabled).toBe(false);
    });
  });

  describe('getAll and reset', () => {
    it('should list every type and remove stored ones on reset', async () => {
      await store.set(buildPreference({ type: 'custom' }));
      await store.set(buildPreference({ type: 'price_alert' }));

      expect(await store.getAll('user-1')).toHaveLength(9);
      expect(await store.reset('user-1')).toBe(2);
      expect(await store.get('user-1', 'price_alert')).toEqual(getDefaultPreference('user-1', 'price_alert'));
    });
  });

  describe('isQuietHours', () => {
    it('should read the window in the preference timezone and wrap past midnight', () => {
      const preference = buildPreference({
        quietHoursStart: '22:00',
        quietHoursEnd: '07:00',
        timezone: 'America/New_York',
      });

      // 23:00 and 06:59 in New York
      expect(store.isQuietHours(preference, new Date('2026-01-01T04:00:00Z'))).toBe(true);
      expect(store.isQuietHours(preference, new Date('2026-01-01T11:59:00Z'))).toBe(true);
      // 07:00 and 21:59 in New York
      expect(store.isQuietHours(preference, new Date('2026-01-01T12:00:00Z'))).toBe(false);
      expect(store.isQuietHours(preference, new Date('2026-01-02T02:59:00Z'))).toBe(false);
    });

    it('should treat the end of a daytime window as outside it', () => {
      const preference = buildPreference({ quietHoursStart: '09:00', quietHoursEnd: '17:00' });

      expect(store.isQuietHours(preference, new Date('2026-01-01T09:00:00Z'))).toBe(true);
      expect(store.isQuietHours(preference, new Date('2026-01-01T17:00:00Z'))).toBe(false);
    });

    it('should see no window when start equals end or bounds are missing', () => {
      expect(store.isQuietHours(buildPreference({ quietHoursStart: '08:00', quietHoursEnd: '08:00' }), T0)).toBe(false);
      expect(store.isQuietHours(buildPreference(), T0)).toBe(false);
    });
  });
});
