/**
 * WORKER STARTUP SCRIPT
 *
 * This script starts:
 * 1. A Temporal worker that runs the per-message delivery workflows
 * 2. An HTTP API server
 * 3. A periodic sweep that delivers anything the workflows missed, requeues
 *    failed messages and removes old delivered ones
 *
 * Run this with: npm start
 */
import {loadConfigFromEnv, makeAppEffects, ProductionEffects} from '../effects/EffectsFactory';
import {ProfilePictureService} from '../cache/ProfilePictureService';
import {cleanupOldMessages, processReadyMessages, retryFailedMessages} from '../pure/messageDelivery';
import {createApiServer, startApiServer} from '../api/server';
import {TemporalDeliveryScheduler} from './client';
import {runWorker} from './worker';

const SWEEP_INTERVAL_MS = 5 * 60 * 1000;
const CLEANUP_INTERVAL_MS = 24 * 60 * 60 * 1000;

function every(intervalMs: number, name: string, task: () => Promise<unknown>): NodeJS.Timeout {
  let running = false;
  return setInterval(() => {
    // A slow run is never overlapped by the next tick
    if (running) return;
    running = true;
    task()
      .catch((error: unknown) => console.error(`❌ ${name} failed:`, error))
      .finally(() => {
        running = false;
      });
  }, intervalMs);
}

async function main() {
  console.log('🚀 Starting Time Capsule worker and API server...\n');

  const config = loadConfigFromEnv();
  const scheduler = new TemporalDeliveryScheduler(config.temporal);
  let appEffects: ProductionEffects | undefined;

  try {
    appEffects = await makeAppEffects(scheduler, config);
    const effects = appEffects;

    console.log('📋 Configuration:');
    console.log('   - Temporal Server:', config.temporal.address);
    console.log('   - Namespace:', config.temporal.namespace);
    console.log('   - Task Queue:', config.temporal.taskQueue);
    console.log('   - Workflows: deliverMessageWorkflow');
    console.log('');

    const profilePictures = new ProfilePictureService(effects, {ttlMs: config.profileCacheTtlMs});
    await startApiServer(createApiServer(effects, profilePictures), config.apiPort);

    const timers = [
      every(SWEEP_INTERVAL_MS, 'Delivery sweep', async () => {
        await processReadyMessages()(effects);
        await retryFailedMessages()(effects);
      }),
      every(CLEANUP_INTERVAL_MS, 'Cleanup', () => cleanupOldMessages()(effects)),
    ];

    const shutdown = (signal: string) => {
      console.log(`\n⏸️  Received ${signal}, shutting down gracefully...`);
      console.log('   (Sleeping delivery workflows resume on the next worker)');
      timers.forEach(clearInterval);
      profilePictures.dispose();
      Promise.all([effects.close(), scheduler.close()])
        .catch((error: unknown) => console.error('❌ Error while closing connections:', error))
        .finally(() => process.exit(0));
    };
    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));

    // Start the worker (runs indefinitely)
    await runWorker(effects, config.temporal);
  } catch (error) {
    console.error('❌ Failed to start worker:', error);
    await appEffects?.close();
    process.exit(1);
  }
}

// Start the worker
main().catch((error) => {
  console.error('💥 Unhandled error:', error);
  process.exit(1);
});
