import { DeliveryRecord, RetryPolicy } from '../types/notification.types';

/**
 * Backoff before retry `attempt` (0-indexed: 0 is the first retry).
 * Grows geometrically from retryDelaySeconds and is capped at maxDelaySeconds.
 */
export function calculateBackoffSeconds(policy: RetryPolicy, attempt: number): number {
  const delay = policy.retryDelaySeconds * Math.pow(policy.backoffMultiplier, attempt);
  return Math.min(delay, policy.maxDelaySeconds);
}

export function calculateBackoffMs(policy: RetryPolicy, attempt: number): number {
  return Math.round(calculateBackoffSeconds(policy, attempt) * 1000);
}

export function lastAttemptAt(record: DeliveryRecord): Date | undefined {
  return record.attempts.length > 0 ? record.attempts[record.attempts.length - 1] : undefined;
}

/**
 * Whether another attempt is allowed for this record at `now`: the policy must
 * leave retries over and the backoff for the next attempt must have elapsed
 * since the previous attempt.
 */
export function shouldRetry(
  policy: RetryPolicy | undefined,
  record: DeliveryRecord,
  now: Date
): boolean {
  if (!policy) {
    return false;
  }
  if (record.retryCount >= policy.maxRetries) {
    return false;
  }
  const last = lastAttemptAt(record);
  if (!last) {
    return true;
  }
  return now.getTime() - last.getTime() >= calculateBackoffMs(policy, record.retryCount);
}
