/**
 * TEMPORAL WORKFLOW - Durable delivery of one scheduled message
 *
 * Sleeps on a durable timer until the message is due, then runs the same
 * deliverMessage coordinator the sweep uses, with activities standing in for
 * the effects. Cancelling the workflow while it sleeps cancels the delivery.
 */
import {deliverMessage} from '../pure/messageDelivery';
import type {MessageDeliveryEffects} from '../pure/effects';
import {Activities, DeliveryReport} from './activities';
import {reviveMessage, toDeliveryReport} from './serialization';
import {ActivityOptions, proxyActivities, sleep} from '@temporalio/workflow';

const databaseActivityOptions: ActivityOptions = {
  startToCloseTimeout: '120s',
  retry: {
    initialInterval: 500,
    backoffCoefficient: 2,
    maximumAttempts: 9,
    maximumInterval: 1600,
  },
}

const notificationActivityOptions: ActivityOptions = {
  startToCloseTimeout: '60s',
  // push falls back to email inside the coordinator; keep these short
  retry: {
    initialInterval: 1000,
    backoffCoefficient: 2,
    maximumAttempts: 3,
    maximumInterval: 5000,
  },
}

const defaultActivityOptions: ActivityOptions = {
  startToCloseTimeout: '120s',
  retry: {
    initialInterval: 1000,
    backoffCoefficient: 2,
    maximumAttempts: 10,
    maximumInterval: 30000,
  },
}

// Database activities (messages, profiles)
const {
  getMessageById,
  markMessageDelivered,
  markMessageFailed,
  getProfileById,
} = proxyActivities<Pick<Activities,
  'getMessageById' |
  'markMessageDelivered' |
  'markMessageFailed' |
  'getProfileById'
>>(databaseActivityOptions);

// Notification activities
const {
  sendPush,
  sendEmail,
} = proxyActivities<Pick<Activities, 'sendPush' | 'sendEmail'>>(notificationActivityOptions);

// Default activities (monitoring, analytics)
const {
  recordDeliveryFailure,
  trackEvent,
} = proxyActivities<Pick<Activities, 'recordDeliveryFailure' | 'trackEvent'>>(defaultActivityOptions);

/**
 * @param messageId - the message to deliver
 * @param scheduledFor - ISO-8601 instant the message becomes due
 */
export async function deliverMessageWorkflow(messageId: string, scheduledFor: string): Promise<DeliveryReport> {
  // Date.now() is deterministic inside a workflow
  const waitMs = new Date(scheduledFor).getTime() - Date.now();
  if (waitMs > 0) {
    await sleep(waitMs);
  }

  const temporalEffects: MessageDeliveryEffects = {
    messages: {
      getById: async (id) => {
        const message = await getMessageById(id);
        return message && reviveMessage(message);
      },
      markDelivered: (id, deliveredAt) => markMessageDelivered(id, deliveredAt.toISOString()),
      markFailed: (id, reason, failedAt) => markMessageFailed(id, reason, failedAt.toISOString()),
    },
    profiles: {
      getById: getProfileById,
    },
    notifications: {
      sendPush,
      sendEmail,
    },
    monitoring: {
      recordDeliveryFailure,
    },
    analytics: {
      trackEvent,
    },
    clock: {
      now: () => new Date(),
    },
  };

  return toDeliveryReport(messageId, await deliverMessage(messageId)(temporalEffects));
}
