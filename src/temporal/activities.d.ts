/**
 * TEMPORAL ACTIVITIES TYPE DEFINITIONS
 *
 * Flattened activity methods registered in worker.ts, typed for use with
 * proxyActivities in workflows.
 *
 * Arguments and results cross the Temporal boundary as JSON, so instants
 * travel as ISO-8601 strings and the workflow turns them back into Dates.
 */

import {MessageStatus, UserProfile} from '../domain';
import {NotificationPayload, PushNotification} from '../types';
import {AnalyticsEvent, DeliveryFailureAlert} from '../pure/types';

export type SerializedMessage = {
  readonly id: string;
  readonly senderId: string;
  readonly recipientId: string;
  readonly textContent: string;
  readonly imageUrls: string[];
  readonly videoUrl: string | null;
  readonly scheduledFor: string;
  readonly createdAt: string;
  readonly status: MessageStatus;
  readonly deliveredAt: string | null;
  readonly failureReason: string | null;
  readonly retryCount: number;
};

export interface Activities {
  // ScheduledMessageRepository methods
  getMessageById(id: string): Promise<SerializedMessage | null>;
  markMessageDelivered(id: string, deliveredAt: string): Promise<boolean>;
  markMessageFailed(id: string, reason: string, failedAt: string): Promise<void>;

  // UserProfileRepository methods
  getProfileById(id: string): Promise<UserProfile | null>;

  // NotificationService methods
  sendPush(notification: PushNotification): Promise<void>;
  sendEmail(payload: NotificationPayload): Promise<void>;

  // MonitoringService methods
  recordDeliveryFailure(alert: DeliveryFailureAlert): Promise<void>;

  // AnalyticsService methods
  trackEvent(event: AnalyticsEvent): Promise<void>;
}

/** What a delivery workflow run reports back to whoever awaits it. */
export type DeliveryReport =
  | { readonly status: 'delivered'; readonly messageId: string; readonly deliveredAt: string; readonly notified: boolean }
  | { readonly status: 'skipped'; readonly messageId: string; readonly reason: string }
  | { readonly status: 'failed'; readonly messageId: string; readonly errors: string[] };
