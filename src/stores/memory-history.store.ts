import { HistoryStore } from './store.types';
import { DeliveryRecord, NotificationChannel, Notification } from '../types/notification.types';

function cloneRecord(record: DeliveryRecord): DeliveryRecord {
  return { ...record, attempts: [...record.attempts], metadata: { ...record.metadata } };
}

/** A failed record with a retry queued is not final */
export function isFinalFailure(record: DeliveryRecord): boolean {
  return record.status === 'failed' && record.nextRetryAt === undefined;
}

/** Most recent record per channel, in first-seen channel order */
export function latestPerChannel(records: DeliveryRecord[]): Map<NotificationChannel, DeliveryRecord> {
  const latest = new Map<NotificationChannel, DeliveryRecord>();
  for (const record of records) {
    latest.set(record.channel, record);
  }
  return latest;
}

/**
 * Process-local history store. Suitable for tests and single-instance
 * deployments; everything is lost on restart.
 */
export class MemoryHistoryStore implements HistoryStore {
  private readonly notifications = new Map<string, Notification>();
  // Insertion-ordered per notification so the last record per channel is the latest
  private readonly records = new Map<string, Map<string, DeliveryRecord>>();

  async saveNotification(notification: Notification): Promise<void> {
    this.notifications.set(notification.id, notification);
  }

  async saveHistory(record: DeliveryRecord): Promise<void> {
    let byId = this.records.get(record.notificationId);
    if (!byId) {
      byId = new Map();
      this.records.set(record.notificationId, byId);
    }
    byId.set(record.id, cloneRecord(record));
  }

  async loadHistory(notificationId: string): Promise<DeliveryRecord[]> {
    const byId = this.records.get(notificationId);
    return byId ? [...byId.values()].map(cloneRecord) : [];
  }

  async loadFailed(
    notificationId: string | undefined,
    hoursBack: number,
    now: Date
  ): Promise<Notification[]> {
    const cutoff = now.getTime() - hoursBack * 3600 * 1000;
    const ids = notificationId !== undefined ? [notificationId] : [...this.records.keys()];
    const failed: Notification[] = [];

    for (const id of ids) {
      const notification = this.notifications.get(id);
      const byId = this.records.get(id);
      if (!notification || !byId) {
        continue;
      }
      const latest = latestPerChannel([...byId.values()]);
      const hasRecentFailure = [...latest.values()].some(
        (record) => isFinalFailure(record) && record.updatedAt.getTime() >= cutoff
      );
      if (hasRecentFailure) {
        failed.push(notification);
      }
    }

    return failed;
  }

  clear(): void {
    this.notifications.clear();
    this.records.clear();
  }
}
