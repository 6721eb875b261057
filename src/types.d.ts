// Non domain types

export type NotificationPayload = {
    readonly to: string;
    readonly subject: string;
    readonly body: string;
};

export type PushNotification = {
    readonly endpoint: string;
    readonly title: string;
    readonly body: string;
    readonly data: Readonly<Record<string, string>>;
};

export type CacheEntry<V> = {
    readonly key: string;
    readonly value: V;
    readonly lastUpdated: number;
    readonly ttlMs: number;
};

export type CacheEvent<V> =
    | { readonly type: 'set'; readonly key: string; readonly value: V }
    | { readonly type: 'invalidate'; readonly key: string }
    | { readonly type: 'reset' };

export type RetryPolicy = {
    readonly maxAttempts: number;
    readonly baseDelayMs: number;
    readonly backoffMultiplier: number;
    readonly maxDelayMs?: number;
};

export type Clock = {
    now(): Date;
};
