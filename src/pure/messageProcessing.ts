/**
 * SCHEDULED MESSAGES - The Coordinators
 *
 * Thin effectful shell around businessLogic.ts:
 * 1. Call effects to gather inputs (counts, histories, the current time)
 * 2. Hand them to pure functions
 * 3. Call effects to persist the outcome
 *
 * Business rule failures come back as Left; effect failures throw.
 */

import {MessageDraft, ScheduledMessage} from '../domain';
import {AppEffects} from './effects';
import {DeliveryStats, MessageCounts} from './types';
import {
    buildAnalyticsEvent,
    describeRateLimit,
    evaluateRateLimit,
    SCHEDULED_MESSAGE_RATE_LIMIT,
    toDeliveryStats,
    toNewScheduledMessage,
    toReceivedMessages,
    validateScheduledMessage,
    ValidatedMessage,
} from './businessLogic';
import {EffectsError} from '../effects/EffectsError';
import {FatalError, RateLimitError, toError} from '../resilience/errors';
import {RETRY_POLICIES, withRetry} from '../resilience/withRetry';
import {Either, EitherAsync, Left, NonEmptyList, Right} from 'purify-ts';

export const SCHEDULE_OPERATION = 'scheduled_message';

type Coordinator<T> = (appEffects: AppEffects) => Promise<Either<NonEmptyList<string>, T>>;

/**
 * Create a scheduled message.
 * Orchestrates:
 * 1. Rate limit and pending quota lookups (effects)
 * 2. Validation and sanitising of the draft (pure)
 * 3. Persisting, scheduling and tracking the message (effects)
 *
 * @return either the validation errors or the stored message
 * @throws RateLimitError when the sender is over the limit
 * @throws EffectsError
 */
export function createScheduledMessage(draft: MessageDraft): Coordinator<ScheduledMessage> {
    return async (appEffects: AppEffects) => {
        const now = appEffects.clock.now();
        const validated = await prepareScheduledMessage(draft, now)(appEffects);
        return validated.caseOf<Promise<Either<NonEmptyList<string>, ScheduledMessage>>>({
            Left: (errors) => Promise.resolve(Left(errors)),
            Right: async (message) => Right(await persistScheduledMessage(message, now)(appEffects)),
        });
    };
}

/**
 * Gather the inputs a draft is validated against and run the pure checks.
 * @throws RateLimitError
 */
export function prepareScheduledMessage(
    draft: MessageDraft,
    now: Date
): (appEffects: Pick<AppEffects, 'messages' | 'rateLimits'>) => Promise<Either<NonEmptyList<string>, ValidatedMessage>> {
    return async (appEffects) => {
        const policy = SCHEDULED_MESSAGE_RATE_LIMIT;
        const [history, pending] = await Promise.all([
            appEffects.rateLimits.history(draft.senderId, SCHEDULE_OPERATION, new Date(now.getTime() - policy.windowMs)),
            appEffects.messages.findPendingBySender(draft.senderId),
        ]);

        evaluateRateLimit(history, now.getTime(), policy).ifLeft(waitMs => {
            throw new RateLimitError(describeRateLimit(waitMs), waitMs);
        });

        return validateScheduledMessage(draft, now, pending.length);
    };
}

/**
 * Store a validated message, then record the rate limit hit, hand the message
 * to the delivery scheduler and track it.
 * @throws EffectsError when any follow-up effect fails
 */
export function persistScheduledMessage(
    message: ValidatedMessage,
    now: Date
): (appEffects: AppEffects) => Promise<ScheduledMessage> {
    return async (appEffects: AppEffects) => {
        const stored = await withRetry(
            () => appEffects.messages.insert(toNewScheduledMessage(message, now)),
            RETRY_POLICIES.scheduledMessage
        );

        const effects = [
            () => appEffects.rateLimits.record(stored.senderId, SCHEDULE_OPERATION, now),
            () => appEffects.scheduler.schedule(stored),
            () => appEffects.analytics.trackEvent(buildAnalyticsEvent(stored, 'message_scheduled')),
        ];

        const results = await Promise.all(effects.map(e => EitherAsync(e).run()));
        const errors = Either.lefts(results).map(toError);
        if (errors.length) throw new EffectsError(errors);

        console.log(`📅 Scheduled message ${stored.id} for ${stored.scheduledFor.toISOString()}`);
        return stored;
    };
}

/**
 * Runs the effects for a user-scoped read once the user id is known to be usable.
 */
function forUser<T>(userId: string, run: (id: string) => Promise<T>): Promise<Either<NonEmptyList<string>, T>> {
    const checked: Either<NonEmptyList<string>, string> = userId.trim().length > 0
        ? Right(userId)
        : Left(NonEmptyList(['User id is required']));
    return checked.caseOf<Promise<Either<NonEmptyList<string>, T>>>({
        Left: (errors) => Promise.resolve(Left(errors)),
        Right: async (id) => Right(await run(id)),
    });
}

/**
 * The user's pending outgoing messages, soonest first.
 */
export function getScheduledMessages(userId: string): Coordinator<ScheduledMessage[]> {
    return (appEffects: AppEffects) => forUser(userId, async id => {
        const pending = await appEffects.messages.findPendingBySender(id);
        return [...pending].sort((a, b) => a.scheduledFor.getTime() - b.scheduledFor.getTime());
    });
}

/**
 * Messages the user can open now: delivered ones first, then pending ones
 * whose time has come, newest first within each group.
 */
export function getReceivedMessages(userId: string): Coordinator<ScheduledMessage[]> {
    return (appEffects: AppEffects) => forUser(userId, async id => {
        const now = appEffects.clock.now();
        return toReceivedMessages(await appEffects.messages.findReceived(id, now), now);
    });
}

/**
 * Cancel a pending message. Only its sender may do so.
 * @throws FatalError not-found / permission-denied
 */
export function cancelScheduledMessage(messageId: string, requesterId: string): Coordinator<ScheduledMessage> {
    return async (appEffects: AppEffects) => {
        const message = await appEffects.messages.getById(messageId);
        if (!message) {
            throw new FatalError('not-found', `Message ${messageId} not found`);
        }
        if (message.senderId !== requesterId) {
            throw new FatalError('permission-denied', `User ${requesterId} cannot cancel message ${messageId}`);
        }
        if (message.status !== 'pending') {
            return Left(NonEmptyList([`Only pending messages can be cancelled; this one is ${message.status}`]));
        }

        await appEffects.messages.delete(message.id);

        const effects = [
            () => appEffects.scheduler.cancel(message.id),
            () => appEffects.analytics.trackEvent(buildAnalyticsEvent(message, 'message_cancelled')),
        ];
        const results = await Promise.all(effects.map(e => EitherAsync(e).run()));
        const errors = Either.lefts(results).map(toError);
        if (errors.length) throw new EffectsError(errors);

        console.log(`🗑️  Cancelled message ${message.id}`);
        return Right(message);
    };
}

export function getMessageCounts(userId: string): Coordinator<MessageCounts> {
    return (appEffects: AppEffects) => forUser(userId, async id => {
        const [sent, received] = await Promise.all([
            appEffects.messages.countSentByStatus(id),
            appEffects.messages.countDeliveredTo(id),
        ]);
        return {scheduled: sent.pending, received};
    });
}

export function getDeliveryStats(userId: string): Coordinator<DeliveryStats> {
    return (appEffects: AppEffects) => forUser(userId, async id =>
        toDeliveryStats(await appEffects.messages.countSentByStatus(id))
    );
}
