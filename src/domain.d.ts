// Domain types shared across the application

export type MessageStatus = 'pending' | 'delivered' | 'failed';

export type ScheduledMessage = {
  readonly id: string;
  readonly senderId: string;
  readonly recipientId: string;
  readonly textContent: string;
  readonly imageUrls: string[];
  readonly videoUrl: string | null;
  readonly scheduledFor: Date;
  readonly createdAt: Date;
  readonly status: MessageStatus;
  readonly deliveredAt: Date | null;
  readonly failureReason: string | null;
  readonly retryCount: number;
};

/**
 * What a sender submits. The scheduled time is either an absolute instant or
 * an ISO-8601 string carrying an explicit offset.
 */
export type MessageDraft = {
  readonly senderId: string;
  readonly recipientId: string;
  readonly textContent: string;
  readonly scheduledFor: Date | string;
  readonly imageUrls?: string[];
  readonly videoUrl?: string | null;
};

export type NewScheduledMessage = Omit<ScheduledMessage, 'id'>;

export type UserProfile = {
  readonly id: string;
  readonly username: string;
  readonly email: string | null;
  readonly profilePictureUrl: string | null;
  // SNS platform endpoint registered for the user's device, if any
  readonly pushEndpoint: string | null;
};

export type MediaKind = 'image' | 'video';

export type MediaFile = {
  readonly fileName: string;
  readonly contentType: string;
  readonly data: Uint8Array;
};
