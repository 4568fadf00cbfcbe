import { PreferenceBackend } from './store.types';
import { NotificationType, Preference } from '../types/notification.types';

export class MemoryPreferenceBackend implements PreferenceBackend {
  private readonly preferences = new Map<string, Preference>();

  async load(userId: string, type: NotificationType): Promise<Preference | null> {
    const stored = this.preferences.get(this.key(userId, type));
    return stored ? { ...stored, channels: [...stored.channels] } : null;
  }

  async save(preference: Preference): Promise<boolean> {
    this.preferences.set(this.key(preference.userId, preference.type), {
      ...preference,
      channels: [...preference.channels],
    });
    return true;
  }

  async delete(userId: string, type: NotificationType): Promise<boolean> {
    return this.preferences.delete(this.key(userId, type));
  }

  private key(userId: string, type: NotificationType): string {
    return `${userId}:${type}`;
  }
}
