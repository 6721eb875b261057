/**
 * MESSAGE DELIVERY - The Coordinators
 *
 * Flips due messages from pending to delivered and tells the recipient.
 * deliverMessage runs inside a Temporal workflow with activities as its
 * effects, or from the periodic sweep; it must stay deterministic and only
 * read the time through the clock effect.
 *
 * Rules:
 * - the status flip is a conditional update, so two deliverers racing on one
 *   message deliver it once
 * - a message that cannot be delivered is marked failed with its reason and a
 *   bumped retry count, and a metric is recorded
 * - notifying the recipient is best effort; it never fails a delivery
 */

import {ScheduledMessage, UserProfile} from '../domain';
import {DeliveryEffects, MessageDeliveryEffects} from './effects';
import {DeliveryOutcome, RetrySweepResult, SweepResult} from './types';
import {
    buildAnalyticsEvent,
    buildDeliveryEmail,
    buildDeliveryFailureAlert,
    buildDeliveryNotification,
    isSelfMessage,
    validateDeliverable,
} from './businessLogic';
import {RETRY_POLICIES, withRetry} from '../resilience/withRetry';
import {toError, toUserMessage} from '../resilience/errors';
import {Either, EitherAsync, Just, Left, Maybe, NonEmptyList, Nothing, Right} from 'purify-ts';

export const SWEEP_BATCH_SIZE = 50;
export const MAX_DELIVERY_RETRIES = 3;
export const RETRY_BATCH_SIZE = 10;
export const CLEANUP_BATCH_SIZE = 100;
export const DELIVERED_RETENTION_MS = 365 * 24 * 60 * 60 * 1000;

/**
 * Deliver one message.
 *
 * @return Left when the message does not exist or could not be delivered
 * (it is then marked failed); Right with either the delivery or the reason it
 * was skipped
 * @throws when marking the message failed itself fails
 */
export function deliverMessage(
    messageId: string
): (effects: MessageDeliveryEffects) => Promise<Either<NonEmptyList<string>, DeliveryOutcome>> {
    return async (effects: MessageDeliveryEffects) => {
        const message = await effects.messages.getById(messageId);
        if (!message) {
            return Left(NonEmptyList([`Message ${messageId} not found`]));
        }
        if (message.status !== 'pending') {
            return Right(skipped(message, `Message is already ${message.status}`));
        }

        const now = effects.clock.now();
        if (message.scheduledFor.getTime() > now.getTime()) {
            return Right(skipped(message, `Message is not due until ${message.scheduledFor.toISOString()}`));
        }

        const deliverable = validateDeliverable(message);
        if (deliverable.isLeft()) {
            return markFailed(message, deliverable.extract(), now)(effects);
        }

        const flipped = await EitherAsync(() => withRetry(
            () => effects.messages.markDelivered(message.id, now),
            RETRY_POLICIES.scheduledMessage
        )).run();

        return flipped.caseOf<Promise<Either<NonEmptyList<string>, DeliveryOutcome>>>({
            Left: (error) => {
                console.error(`❌ Status update for ${message.id} failed: ${toError(error).message}`);
                return markFailed(message, toUserMessage(error), now)(effects);
            },
            Right: async (wasPending) => {
                if (!wasPending) {
                    return Right(skipped(message, 'Message was delivered by another worker'));
                }
                const notified = await notifyRecipient(message, now)(effects);
                await EitherAsync(() => effects.analytics.trackEvent(buildAnalyticsEvent(message, 'message_delivered')))
                    .run()
                    .then(result => result.ifLeft(error =>
                        console.warn(`⚠️  Analytics failed for ${message.id}: ${toError(error).message}`)
                    ));
                console.log(`📬 Delivered message ${message.id} to ${message.recipientId}`);
                const delivered: DeliveryOutcome = {status: 'delivered', messageId: message.id, deliveredAt: now, notified};
                return Right(delivered);
            },
        });
    };
}

function skipped(message: ScheduledMessage, reason: string): DeliveryOutcome {
    return {status: 'skipped', messageId: message.id, reason};
}

function markFailed(
    message: ScheduledMessage,
    reason: string,
    now: Date
): (effects: MessageDeliveryEffects) => Promise<Either<NonEmptyList<string>, DeliveryOutcome>> {
    return async (effects: MessageDeliveryEffects) => {
        console.error(`❌ Delivery of message ${message.id} failed: ${reason}`);
        await effects.messages.markFailed(message.id, reason, now);
        await EitherAsync(() => effects.monitoring.recordDeliveryFailure(buildDeliveryFailureAlert(message, reason)))
            .run()
            .then(result => result.ifLeft(error =>
                console.warn(`⚠️  Could not record delivery failure metric: ${toError(error).message}`)
            ));
        return Left(NonEmptyList([`Delivery of message ${message.id} failed: ${reason}`]));
    };
}

/**
 * Push to the recipient's device, falling back to email.
 * @return whether any channel accepted the notification
 */
function notifyRecipient(
    message: ScheduledMessage,
    deliveredAt: Date
): (effects: MessageDeliveryEffects) => Promise<boolean> {
    return async (effects: MessageDeliveryEffects) => {
        const result = await EitherAsync(async () => {
            const recipient = await effects.profiles.getById(message.recipientId);
            if (!recipient) {
                throw new Error(`Recipient ${message.recipientId} has no profile`);
            }
            const sender = isSelfMessage(message) ? recipient : await effects.profiles.getById(message.senderId);
            return sendNotification(message, recipient, sender, deliveredAt)(effects);
        }).run();

        return result.caseOf({
            Left: (error) => {
                console.warn(`⚠️  Could not notify recipient of ${message.id}: ${toError(error).message}`);
                return false;
            },
            Right: (sent) => sent,
        });
    };
}

function sendNotification(
    message: ScheduledMessage,
    recipient: UserProfile,
    sender: UserProfile | null,
    deliveredAt: Date
): (effects: MessageDeliveryEffects) => Promise<boolean> {
    return async (effects: MessageDeliveryEffects) => {
        const senderName = sender?.username ?? null;
        const email = recipient.email;
        const sendEmail = email
            ? () => effects.notifications.sendEmail(buildDeliveryEmail(message, senderName, email))
            : undefined;

        if (recipient.pushEndpoint) {
            const notification = buildDeliveryNotification(message, senderName, recipient.pushEndpoint, deliveredAt);
            await withRetry(() => effects.notifications.sendPush(notification), RETRY_POLICIES.notification, {
                fallback: sendEmail,
                // a dead endpoint should still fall through to email
                isRetryable: () => true,
            });
            return true;
        }
        if (sendEmail) {
            await withRetry(sendEmail, RETRY_POLICIES.notification);
            return true;
        }
        console.log(`🔕 Recipient ${recipient.id} has no push endpoint or email`);
        return false;
    };
}

/**
 * Deliver every pending message whose time has come, one at a time.
 */
export function processReadyMessages(
    limit: number = SWEEP_BATCH_SIZE
): (effects: DeliveryEffects) => Promise<SweepResult> {
    return async (effects: DeliveryEffects) => {
        const ready = await effects.messages.findReadyForDelivery(effects.clock.now(), limit);
        let processedCount = 0;
        let failedCount = 0;

        for (const message of ready) {
            const result = await EitherAsync(() => deliverMessage(message.id)(effects)).run();
            result.caseOf({
                Left: (error) => {
                    failedCount++;
                    console.error(`❌ Delivery of ${message.id} errored: ${toError(error).message}`);
                },
                Right: (outcome) => outcome.caseOf({
                    Left: () => {
                        failedCount++;
                    },
                    Right: (delivery) => {
                        if (delivery.status === 'delivered') processedCount++;
                    },
                }),
            });
        }

        if (ready.length > 0) {
            console.log(`🚚 Sweep: ${processedCount} delivered, ${failedCount} failed of ${ready.length}`);
        }
        return {processedCount, failedCount, totalFound: ready.length};
    };
}

/**
 * Give failed messages that still have retries left another delivery attempt.
 * Each message is reset to pending and delivered on the spot; one that fails
 * again is marked failed with a bumped retry count.
 */
export function retryFailedMessages(
    maxRetries: number = MAX_DELIVERY_RETRIES,
    limit: number = RETRY_BATCH_SIZE
): (effects: DeliveryEffects) => Promise<RetrySweepResult> {
    return async (effects: DeliveryEffects) => {
        const failed = await effects.messages.findFailed(maxRetries, limit);
        let retriedCount = 0;
        let deliveredCount = 0;
        let failedCount = 0;

        for (const message of failed) {
            const attempt = await EitherAsync(() => retryMessage(message.id)(effects)).run();
            attempt.caseOf({
                Left: (error) => {
                    failedCount++;
                    console.warn(`⚠️  Retry of ${message.id} errored: ${toError(error).message}`);
                },
                Right: (retried) => {
                    retried.ifJust(outcome => {
                        retriedCount++;
                        outcome.caseOf({
                            Left: () => {
                                failedCount++;
                            },
                            Right: (delivery) => {
                                if (delivery.status === 'delivered') deliveredCount++;
                            },
                        });
                    });
                },
            });
        }

        if (failed.length > 0) {
            console.log(`🔁 Retried ${retriedCount} of ${failed.length} failed messages: ${deliveredCount} delivered, ${failedCount} failed`);
        }
        return {retriedCount, deliveredCount, failedCount, totalFailed: failed.length};
    };
}

/**
 * @return Nothing when the message was no longer failed
 */
function retryMessage(
    messageId: string
): (effects: DeliveryEffects) => Promise<Maybe<Either<NonEmptyList<string>, DeliveryOutcome>>> {
    return async (effects: DeliveryEffects) => {
        const reset = await effects.messages.resetToPending(messageId);
        return reset ? Just(await deliverMessage(messageId)(effects)) : Nothing;
    };
}

/**
 * Delete delivered messages older than the retention period, in batches.
 * @return how many were deleted
 */
export function cleanupOldMessages(
    retentionMs: number = DELIVERED_RETENTION_MS
): (effects: Pick<DeliveryEffects, 'messages' | 'clock'>) => Promise<number> {
    return async (effects) => {
        const cutoff = new Date(effects.clock.now().getTime() - retentionMs);
        let total = 0;
        let deleted: number;
        do {
            deleted = await effects.messages.deleteDeliveredBefore(cutoff, CLEANUP_BATCH_SIZE);
            total += deleted;
        } while (deleted === CLEANUP_BATCH_SIZE);

        if (total > 0) {
            console.log(`🧹 Removed ${total} delivered messages older than ${cutoff.toISOString()}`);
        }
        return total;
    };
}
