/**
 * TEMPORAL WORKER
 *
 * Registers the effect implementations as flattened activities and runs the
 * delivery workflows. Activities that carry instants convert between Date
 * and the ISO strings the workflow sends.
 */
import {AppEffects} from '../pure/effects';
import {TemporalConfig} from '../effects/types';
import {Activities} from './activities';
import {serializeMessage} from './serialization';
import {NativeConnection, Worker} from '@temporalio/worker';

export function makeActivities(effects: AppEffects): Activities {
  // Bind methods to preserve 'this' context
  return {
    // ScheduledMessageRepository methods
    getMessageById: async (id) => {
      const message = await effects.messages.getById(id);
      return message && serializeMessage(message);
    },
    markMessageDelivered: (id, deliveredAt) => effects.messages.markDelivered(id, new Date(deliveredAt)),
    markMessageFailed: (id, reason, failedAt) => effects.messages.markFailed(id, reason, new Date(failedAt)),

    // UserProfileRepository methods
    getProfileById: effects.profiles.getById.bind(effects.profiles),

    // NotificationService methods
    sendPush: effects.notifications.sendPush.bind(effects.notifications),
    sendEmail: effects.notifications.sendEmail.bind(effects.notifications),

    // MonitoringService methods
    recordDeliveryFailure: effects.monitoring.recordDeliveryFailure.bind(effects.monitoring),

    // AnalyticsService methods
    trackEvent: effects.analytics.trackEvent.bind(effects.analytics),
  };
}

/**
 * Create a Temporal worker for the delivery task queue
 *
 * @param effects - the application's effect implementations
 * @param config - Temporal address, namespace and task queue
 */
export async function createWorker(effects: AppEffects, config: TemporalConfig): Promise<Worker> {
  const connection = await NativeConnection.connect({
    address: config.address,
  });

  return await Worker.create({
    connection,
    namespace: config.namespace,
    taskQueue: config.taskQueue,
    workflowsPath: require.resolve('./deliverMessage.workflow'),
    activities: makeActivities(effects),
    maxConcurrentActivityTaskExecutions: 10,
    maxConcurrentWorkflowTaskExecutions: 10,
  });
}

/**
 * Start the worker; resolves once the worker shuts down.
 */
export async function runWorker(effects: AppEffects, config: TemporalConfig): Promise<void> {
  const worker = await createWorker(effects, config);

  console.log('🏃 Temporal worker starting...');
  console.log('📦 Task queue:', config.taskQueue);
  console.log('🌐 Temporal address:', config.address);

  await worker.run();
}
