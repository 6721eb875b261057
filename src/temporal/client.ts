/**
 * TEMPORAL CLIENT
 *
 * Starts and cancels delivery workflows. One workflow per message, with the
 * message id in the workflow id, so scheduling the same message twice is
 * rejected by Temporal rather than delivering twice.
 */

import {ScheduledMessage} from '../domain';
import {DeliveryScheduler} from '../pure/effects';
import {TemporalConfig} from '../effects/types';
import {Client, Connection, WorkflowExecutionAlreadyStartedError, WorkflowNotFoundError} from '@temporalio/client';
import type {deliverMessageWorkflow} from './deliverMessage.workflow';

export function deliveryWorkflowId(messageId: string): string {
  return `delivery-${messageId}`;
}

export class TemporalDeliveryScheduler implements DeliveryScheduler {
  private client: Client | null = null;

  constructor(private config: TemporalConfig) {}

  /**
   * Get or create the Temporal client; it is reused across requests.
   */
  private async getClient(): Promise<Client> {
    if (!this.client) {
      const connection = await Connection.connect({
        address: this.config.address,
      });
      this.client = new Client({
        connection,
        namespace: this.config.namespace,
      });
    }
    return this.client;
  }

  async schedule(message: ScheduledMessage): Promise<void> {
    const client = await this.getClient();
    try {
      const handle = await client.workflow.start<typeof deliverMessageWorkflow>('deliverMessageWorkflow', {
        workflowId: deliveryWorkflowId(message.id),
        taskQueue: this.config.taskQueue,
        args: [message.id, message.scheduledFor.toISOString()],
      });
      console.log(`⏰ Delivery workflow ${handle.workflowId} started`);
    } catch (error) {
      if (error instanceof WorkflowExecutionAlreadyStartedError) {
        console.log(`⏰ Delivery of ${message.id} is already scheduled`);
        return;
      }
      throw error;
    }
  }

  async cancel(messageId: string): Promise<void> {
    const client = await this.getClient();
    try {
      await client.workflow.getHandle(deliveryWorkflowId(messageId)).cancel();
    } catch (error) {
      // Already finished or never started: nothing left to cancel
      if (error instanceof WorkflowNotFoundError) {
        return;
      }
      throw error;
    }
  }

  async close(): Promise<void> {
    await this.client?.connection.close();
  }
}
