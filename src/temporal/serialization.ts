import {ScheduledMessage} from '../domain';
import {DeliveryOutcome} from '../pure/types';
import {DeliveryReport, SerializedMessage} from './activities';
import {Either, NonEmptyList} from 'purify-ts';

const toIso = (date: Date | null) => date === null ? null : date.toISOString();
const fromIso = (value: string | null) => value === null ? null : new Date(value);

export function serializeMessage(message: ScheduledMessage): SerializedMessage {
  return {
    ...message,
    scheduledFor: message.scheduledFor.toISOString(),
    createdAt: message.createdAt.toISOString(),
    deliveredAt: toIso(message.deliveredAt),
  };
}

export function reviveMessage(message: SerializedMessage): ScheduledMessage {
  return {
    ...message,
    scheduledFor: new Date(message.scheduledFor),
    createdAt: new Date(message.createdAt),
    deliveredAt: fromIso(message.deliveredAt),
  };
}

export function toDeliveryReport(
  messageId: string,
  result: Either<NonEmptyList<string>, DeliveryOutcome>
): DeliveryReport {
  return result.caseOf<DeliveryReport>({
    Left: (errors) => ({status: 'failed', messageId, errors: [...errors]}),
    Right: (outcome) => outcome.status === 'delivered'
      ? {...outcome, deliveredAt: outcome.deliveredAt.toISOString()}
      : outcome,
  });
}
