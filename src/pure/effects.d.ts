/**
 * EFFECTS LAYER
 *
 * All outbound IO is expressed as small interfaces at the level the
 * coordinators need ("find the messages ready for delivery") rather than at
 * the level of the backend ("run this query"). Production implementations
 * live in effects/EffectsFactory.ts; tests hand in plain objects.
 */

import {MediaFile, MessageStatus, NewScheduledMessage, ScheduledMessage, UserProfile} from '../domain';
import {Clock, NotificationPayload, PushNotification} from '../types';
import {AnalyticsEvent, DeliveryFailureAlert} from './types';

// ============================================================================
// Effect Interfaces
// ============================================================================

export interface ScheduledMessageRepository {
  insert(message: NewScheduledMessage): Promise<ScheduledMessage>;
  getById(id: string): Promise<ScheduledMessage | null>;
  findPendingBySender(senderId: string): Promise<ScheduledMessage[]>;
  // delivered messages plus pending ones whose time has come
  findReceived(recipientId: string, now: Date): Promise<ScheduledMessage[]>;
  countSentByStatus(senderId: string): Promise<Record<MessageStatus, number>>;
  countDeliveredTo(recipientId: string): Promise<number>;
  findReadyForDelivery(now: Date, limit: number): Promise<ScheduledMessage[]>;
  findFailed(maxRetryCount: number, limit: number): Promise<ScheduledMessage[]>;
  /** Flips pending to delivered; false when the message was no longer pending. */
  markDelivered(id: string, deliveredAt: Date): Promise<boolean>;
  markFailed(id: string, reason: string, failedAt: Date): Promise<void>;
  /** Flips failed back to pending; false when the message was not failed. */
  resetToPending(id: string): Promise<boolean>;
  delete(id: string): Promise<void>;
  deleteDeliveredBefore(cutoff: Date, limit: number): Promise<number>;
}

export interface UserProfileRepository {
  getById(id: string): Promise<UserProfile | null>;
  updateProfilePicture(userId: string, url: string | null): Promise<void>;
}

export interface BlobStorage {
  /** Stores the file under the given path and returns its public URL. */
  upload(path: string, file: MediaFile): Promise<string>;
  remove(path: string): Promise<void>;
}

export interface RateLimitStore {
  /** Epoch milliseconds of the user's requests for the operation since the given instant. */
  history(userId: string, operation: string, since: Date): Promise<number[]>;
  record(userId: string, operation: string, at: Date): Promise<void>;
}

export interface NotificationService {
  sendPush(notification: PushNotification): Promise<void>;
  sendEmail(payload: NotificationPayload): Promise<void>;
}

export interface MonitoringService {
  recordDeliveryFailure(alert: DeliveryFailureAlert): Promise<void>;
}

export interface AnalyticsService {
  trackEvent(event: AnalyticsEvent): Promise<void>;
}

export interface DeliveryScheduler {
  schedule(message: ScheduledMessage): Promise<void>;
  cancel(messageId: string): Promise<void>;
}

// ============================================================================
// Combined Dependencies
// ============================================================================

export type AppEffects = {
  readonly messages: ScheduledMessageRepository;
  readonly profiles: UserProfileRepository;
  readonly storage: BlobStorage;
  readonly rateLimits: RateLimitStore;
  readonly notifications: NotificationService;
  readonly monitoring: MonitoringService;
  readonly analytics: AnalyticsService;
  readonly scheduler: DeliveryScheduler;
  readonly clock: Clock;
}

// What the periodic delivery sweeps need
export type DeliveryEffects = Pick<
  AppEffects,
  'messages' | 'profiles' | 'notifications' | 'monitoring' | 'analytics' | 'clock'
>;

// What delivering a single message needs; a durable workflow provides this from activities
export type MessageDeliveryEffects = {
  readonly messages: Pick<ScheduledMessageRepository, 'getById' | 'markDelivered' | 'markFailed'>;
  readonly profiles: Pick<UserProfileRepository, 'getById'>;
  readonly notifications: NotificationService;
  readonly monitoring: MonitoringService;
  readonly analytics: AnalyticsService;
  readonly clock: Clock;
};
