// Module product types

import {MediaKind} from "../domain";

export type TimeError =
    | { readonly kind: 'PastTime'; readonly elapsedMs: number }
    | { readonly kind: 'TooSoon'; readonly remainingMs: number; readonly minLeadMs: number }
    | { readonly kind: 'TooFar'; readonly maxAheadMs: number }
    | { readonly kind: 'InvalidTime'; readonly input: string };

export type MessageCounts = {
    readonly scheduled: number;
    readonly received: number;
};

export type DeliveryStats = {
    readonly pending: number;
    readonly delivered: number;
    readonly failed: number;
    readonly total: number;
};

export type RateLimitPolicy = {
    readonly maxRequests: number;
    readonly windowMs: number;
    readonly minIntervalMs: number;
};

export type ValidatedFile = {
    readonly index: number;
    readonly kind: MediaKind;
    readonly extension: string;
};

export type MediaUrls = {
    readonly imageUrls: string[];
    readonly videoUrl: string | null;
};

export type MediaUploadResult = MediaUrls & {
    // storage paths of every file that made it, for cleanup
    readonly paths: string[];
    readonly errors: string[];
};

export type AnalyticsEvent = {
    readonly event: 'message_scheduled' | 'message_delivered' | 'message_cancelled';
    readonly messageId: string;
    readonly senderId: string;
    readonly recipientId: string;
    readonly selfMessage: boolean;
    readonly hasMedia: boolean;
};

export type DeliveryFailureAlert = {
    readonly type: 'delivery_failed';
    readonly messageId: string;
    readonly reason: string;
    readonly retryCount: number;
};

export type DeliveryOutcome =
    | { readonly status: 'delivered'; readonly messageId: string; readonly deliveredAt: Date; readonly notified: boolean }
    | { readonly status: 'skipped'; readonly messageId: string; readonly reason: string };

export type SweepResult = {
    readonly processedCount: number;
    readonly failedCount: number;
    readonly totalFound: number;
};

export type RetrySweepResult = {
    // reset to pending and attempted again
    readonly retriedCount: number;
    readonly deliveredCount: number;
    readonly failedCount: number;
    readonly totalFailed: number;
};
