import {
  DeliveryRecord,
  Notification,
  NotificationType,
  Preference,
} from '../types/notification.types';

/**
 * Durable delivery history. Records are upserted by id, so saving the same
 * record after every state change keeps the latest state.
 */
export interface HistoryStore {
  saveNotification(notification: Notification): Promise<void>;
  saveHistory(record: DeliveryRecord): Promise<void>;
  /** Records of one notification, oldest first */
  loadHistory(notificationId: string): Promise<DeliveryRecord[]>;
  /**
   * Notifications with at least one channel whose most recent record is a
   * final failure updated within the last `hoursBack` hours.
   */
  loadFailed(notificationId: string | undefined, hoursBack: number, now: Date): Promise<Notification[]>;
}

export interface PreferenceBackend {
  load(userId: string, type: NotificationType): Promise<Preference | null>;
  save(preference: Preference): Promise<boolean>;
  delete(userId: string, type: NotificationType): Promise<boolean>;
}
