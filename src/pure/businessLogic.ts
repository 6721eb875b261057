/**
 * PURE BUSINESS LOGIC
 *
 * These functions take values and return values. No effects whatsoever:
 * the current time, counts and histories are all handed in by the caller.
 */

import {MediaFile, MessageDraft, MessageStatus, NewScheduledMessage, ScheduledMessage} from '../domain';
import {NotificationPayload, PushNotification} from '../types';
import {
  AnalyticsEvent,
  DeliveryFailureAlert,
  DeliveryStats,
  MediaUrls,
  RateLimitPolicy,
  ValidatedFile,
} from './types';
import {describeSpan, describeTimeError, toDeliveryTime, validateDeliveryTime} from './timeValidation';
import {Either, Left, Maybe, NonEmptyList, Right} from 'purify-ts';

export const MAX_MESSAGE_LENGTH = 5000;
export const MAX_PENDING_MESSAGES_PER_USER = 50;
export const NOTIFICATION_PREVIEW_LENGTH = 100;

export const SCHEDULED_MESSAGE_RATE_LIMIT: RateLimitPolicy = {
  maxRequests: 10,
  windowMs: 60 * 60 * 1000,
  minIntervalMs: 60 * 1000,
};

const MB = 1024 * 1024;
export const IMAGE_EXTENSIONS = ['.jpg', '.jpeg', '.png', '.gif', '.webp'];
export const VIDEO_EXTENSIONS = ['.mp4', '.mov', '.avi', '.mkv', '.webm'];
export const MAX_IMAGE_BYTES = 10 * MB;
export const MAX_VIDEO_BYTES = 100 * MB;
export const MAX_PROFILE_PICTURE_BYTES = 5 * MB;

export type ValidatedMessage = {
  readonly senderId: string;
  readonly recipientId: string;
  readonly textContent: string;
  readonly scheduledFor: Date;
  readonly imageUrls: string[];
  readonly videoUrl: string | null;
};

// ============================================================================
// Content
// ============================================================================

const UNSAFE_PATTERNS = [/<script/i, /javascript:/i, /data:text\/html/i];

export function sanitizeText(text: string): string {
  return text
    .trim()
    .replace(/<script[^>]*>[\s\S]*?<\/script>/gi, '')
    .replace(/javascript:/gi, '')
    .replace(/data:text\/html[^,]*,?/gi, '');
}

export function isSafeForDisplay(text: string): boolean {
  return !UNSAFE_PATTERNS.some(pattern => pattern.test(text));
}

export function validateMessageContent(text: string): Either<string, string> {
  if (text.trim().length === 0) {
    return Left('Message content cannot be empty');
  }
  if (text.length > MAX_MESSAGE_LENGTH) {
    return Left(`Message content cannot exceed ${MAX_MESSAGE_LENGTH} characters`);
  }
  const sanitized = sanitizeText(text);
  if (sanitized.length === 0 || !isSafeForDisplay(sanitized)) {
    return Left('Message content contains invalid or unsafe characters');
  }
  return Right(sanitized);
}

export function validateParticipants(senderId: string, recipientId: string): Either<string, void> {
  if (senderId.trim().length === 0) return Left('Sender is required');
  if (recipientId.trim().length === 0) return Left('Recipient is required');
  return Right(undefined);
}

export function checkPendingQuota(pendingCount: number): Either<string, void> {
  return pendingCount >= MAX_PENDING_MESSAGES_PER_USER
    ? Left(`Maximum scheduled messages limit reached (${MAX_PENDING_MESSAGES_PER_USER} per user)`)
    : Right(undefined);
}

/**
 * Runs every check on a draft and reports all failures at once.
 */
export function validateScheduledMessage(
  draft: MessageDraft,
  now: Date,
  pendingCount: number
): Either<NonEmptyList<string>, ValidatedMessage> {
  const content = validateMessageContent(draft.textContent);
  const scheduledFor = toDeliveryTime(draft.scheduledFor)
    .chain(at => validateDeliveryTime(at, now).map(() => at))
    .mapLeft(describeTimeError);

  const checks: Either<string, unknown>[] = [
    validateParticipants(draft.senderId, draft.recipientId),
    content,
    scheduledFor,
    checkPendingQuota(pendingCount),
  ];

  return NonEmptyList.fromArray(Either.lefts(checks)).caseOf<Either<NonEmptyList<string>, ValidatedMessage>>({
    Just: errors => Left(errors),
    Nothing: () => content
      .chain(textContent => scheduledFor.map(at => ({
        senderId: draft.senderId,
        recipientId: draft.recipientId,
        textContent,
        scheduledFor: at,
        imageUrls: draft.imageUrls ?? [],
        videoUrl: draft.videoUrl ?? null,
      })))
      .mapLeft(error => NonEmptyList([error])),
  });
}

export function toNewScheduledMessage(message: ValidatedMessage, now: Date): NewScheduledMessage {
  return {
    ...message,
    createdAt: now,
    status: 'pending',
    deliveredAt: null,
    failureReason: null,
    retryCount: 0,
  };
}

// ============================================================================
// Rate limiting
// ============================================================================

/**
 * Left carries how long the user has to wait, in milliseconds.
 */
export function evaluateRateLimit(
  history: number[],
  now: number,
  policy: RateLimitPolicy
): Either<number, void> {
  const recent = history
    .filter(at => at > now - policy.windowMs && at <= now)
    .sort((a, b) => a - b);

  // once the window is full, the oldest request that keeps it full has to age out
  const windowWait = recent.length >= policy.maxRequests
    ? recent[recent.length - policy.maxRequests] + policy.windowMs - now
    : 0;

  const last = recent.length > 0 ? recent[recent.length - 1] : undefined;
  const intervalWait = last !== undefined && now - last < policy.minIntervalMs
    ? last + policy.minIntervalMs - now
    : 0;

  const wait = Math.max(windowWait, intervalWait);
  return wait > 0 ? Left(wait) : Right(undefined);
}

export function describeRateLimit(waitMs: number): string {
  const rounded = Math.ceil(waitMs / 1000) * 1000;
  return `Too many scheduled messages. Please wait ${describeSpan(rounded)} before creating another.`;
}

// ============================================================================
// Message state
// ============================================================================

export function isSelfMessage(message: ScheduledMessage): boolean {
  return message.senderId === message.recipientId;
}

export function isReadyForDelivery(message: ScheduledMessage, now: Date): boolean {
  return message.status === 'pending' && message.scheduledFor.getTime() <= now.getTime();
}

export function timeUntilDelivery(message: ScheduledMessage, now: Date): Maybe<number> {
  return Maybe.fromPredicate(
    ms => message.status === 'pending' && ms > 0,
    message.scheduledFor.getTime() - now.getTime()
  );
}

export function hasMedia(message: Pick<ScheduledMessage, 'imageUrls' | 'videoUrl'>): boolean {
  return message.imageUrls.length > 0 || message.videoUrl !== null;
}

/**
 * Delivered messages and pending ones whose time has come; delivered first,
 * then most recent first.
 */
export function toReceivedMessages(messages: ScheduledMessage[], now: Date): ScheduledMessage[] {
  const displayTime = (message: ScheduledMessage) =>
    (message.status === 'delivered' ? message.deliveredAt ?? message.scheduledFor : message.scheduledFor).getTime();

  return messages
    .filter(message => message.status === 'delivered' || isReadyForDelivery(message, now))
    .sort((a, b) => {
      const aDelivered = a.status === 'delivered';
      const bDelivered = b.status === 'delivered';
      if (aDelivered !== bDelivered) {
        return aDelivered ? -1 : 1;
      }
      return displayTime(b) - displayTime(a);
    });
}

export function toDeliveryStats(counts: Record<MessageStatus, number>): DeliveryStats {
  return {
    pending: counts.pending,
    delivered: counts.delivered,
    failed: counts.failed,
    total: counts.pending + counts.delivered + counts.failed,
  };
}

/**
 * The delivery job only checks that the required fields survived storage;
 * content rules were enforced at creation.
 */
export function validateDeliverable(message: ScheduledMessage): Either<string, ScheduledMessage> {
  return message.senderId && message.recipientId && message.textContent
    ? Right(message)
    : Left('Invalid message data: missing required fields');
}

// ============================================================================
// Media
// ============================================================================

export function fileExtension(fileName: string): string {
  const dot = fileName.lastIndexOf('.');
  return dot < 0 ? '' : fileName.slice(dot).toLowerCase();
}

export function validateMediaFile(file: MediaFile, index: number): Either<string, ValidatedFile> {
  const extension = fileExtension(file.fileName);
  const prefix = `File ${index + 1}: `;

  if (IMAGE_EXTENSIONS.includes(extension)) {
    return file.data.byteLength > MAX_IMAGE_BYTES
      ? Left(`${prefix}Image size must be less than ${MAX_IMAGE_BYTES / MB}MB`)
      : Right({index, kind: 'image', extension});
  }
  if (VIDEO_EXTENSIONS.includes(extension)) {
    return file.data.byteLength > MAX_VIDEO_BYTES
      ? Left(`${prefix}Video size must be less than ${MAX_VIDEO_BYTES / MB}MB`)
      : Right({index, kind: 'video', extension});
  }
  return Left(`${prefix}Unsupported file type. Only images and videos are allowed.`);
}

export function validateProfilePicture(file: MediaFile): Either<string, ValidatedFile> {
  const extension = fileExtension(file.fileName);
  if (!IMAGE_EXTENSIONS.includes(extension)) {
    return Left(`Please select a valid image file (${IMAGE_EXTENSIONS.join(', ')})`);
  }
  if (file.data.byteLength > MAX_PROFILE_PICTURE_BYTES) {
    return Left(`Profile picture must be less than ${MAX_PROFILE_PICTURE_BYTES / MB}MB`);
  }
  return Right({index: 0, kind: 'image', extension});
}

export function buildMediaPath(senderId: string, timestamp: number, file: ValidatedFile): string {
  return `scheduled_messages/${senderId}/${timestamp}-${file.index}${file.extension}`;
}

export function buildProfilePicturePath(userId: string, timestamp: number, file: ValidatedFile): string {
  return `profile_pictures/${userId}/${timestamp}${file.extension}`;
}

export function partitionMediaUrls(uploads: Array<{ kind: ValidatedFile['kind']; url: string }>): MediaUrls {
  return {
    imageUrls: uploads.filter(upload => upload.kind === 'image').map(upload => upload.url),
    videoUrl: uploads.find(upload => upload.kind === 'video')?.url ?? null,
  };
}

// ============================================================================
// Notifications & External Data Preparation
// ============================================================================

function notificationTitle(message: ScheduledMessage, senderUsername: string | null): string {
  return isSelfMessage(message)
    ? 'Time Capsule Message Delivered'
    : `Message from ${senderUsername ?? 'Someone'}`;
}

export function previewText(text: string): string {
  return text.length > NOTIFICATION_PREVIEW_LENGTH
    ? `${text.substring(0, NOTIFICATION_PREVIEW_LENGTH)}...`
    : text;
}

export function buildDeliveryNotification(
  message: ScheduledMessage,
  senderUsername: string | null,
  endpoint: string,
  deliveredAt: Date
): PushNotification {
  return {
    endpoint,
    title: notificationTitle(message, senderUsername),
    body: previewText(message.textContent),
    data: {
      type: 'scheduled_message_delivered',
      messageId: message.id,
      senderId: message.senderId,
      hasVideo: String(message.videoUrl !== null),
      hasImages: String(message.imageUrls.length > 0),
      deliveredAt: deliveredAt.toISOString(),
    },
  };
}

export function buildDeliveryEmail(
  message: ScheduledMessage,
  senderUsername: string | null,
  recipientEmail: string
): NotificationPayload {
  return {
    to: recipientEmail,
    subject: notificationTitle(message, senderUsername),
    body: `
A message scheduled on ${message.createdAt.toISOString().slice(0, 10)} has arrived:

${previewText(message.textContent)}

Open Time Capsule to read it in full.
    `.trim(),
  };
}

export function buildAnalyticsEvent(
  message: ScheduledMessage,
  event: AnalyticsEvent['event']
): AnalyticsEvent {
  return {
    event,
    messageId: message.id,
    senderId: message.senderId,
    recipientId: message.recipientId,
    selfMessage: isSelfMessage(message),
    hasMedia: hasMedia(message),
  };
}

export function buildDeliveryFailureAlert(message: ScheduledMessage, reason: string): DeliveryFailureAlert {
  return {
    type: 'delivery_failed',
    messageId: message.id,
    reason,
    retryCount: message.retryCount + 1,
  };
}
