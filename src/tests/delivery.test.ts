/**
 * DELIVERY TESTS
 *
 * deliverMessage and the periodic sweeps against mocked effects.
 */

import {ScheduledMessage, UserProfile} from '../domain';
import {DeliveryEffects} from '../pure/effects';
import {cleanupOldMessages, deliverMessage, processReadyMessages, retryFailedMessages} from '../pure/messageDelivery';

const NOW = new Date('2025-03-01T13:00:00.000Z');

const dueMessage: ScheduledMessage = {
  id: 'msg-1',
  senderId: 'user-1',
  recipientId: 'user-2',
  textContent: 'Happy birthday from last year',
  imageUrls: [],
  videoUrl: null,
  scheduledFor: new Date('2025-03-01T13:00:00.000Z'),
  createdAt: new Date('2024-03-01T13:00:00.000Z'),
  status: 'pending',
  deliveredAt: null,
  failureReason: null,
  retryCount: 0,
};

const alice: UserProfile = {
  id: 'user-1',
  username: 'alice',
  email: 'alice@example.com',
  profilePictureUrl: null,
  pushEndpoint: null,
};

const bob: UserProfile = {
  id: 'user-2',
  username: 'bob',
  email: 'bob@example.com',
  profilePictureUrl: null,
  pushEndpoint: 'arn:aws:sns:us-east-1:000000000000:endpoint/test/bob',
};

function byId<T extends { id: string }>(items: T[]) {
  return jest.fn().mockImplementation((id: string) =>
    Promise.resolve(items.find(item => item.id === id) ?? null)
  );
}

function createMockEffects(
  messages: ScheduledMessage[] = [dueMessage],
  profiles: UserProfile[] = [alice, bob]
): DeliveryEffects {
  return {
    messages: {
      insert: jest.fn(),
      getById: byId(messages),
      findPendingBySender: jest.fn().mockResolvedValue([]),
      findReceived: jest.fn().mockResolvedValue([]),
      countSentByStatus: jest.fn(),
      countDeliveredTo: jest.fn(),
      findReadyForDelivery: jest.fn().mockResolvedValue(messages),
      findFailed: jest.fn().mockResolvedValue([]),
      markDelivered: jest.fn().mockResolvedValue(true),
      markFailed: jest.fn().mockResolvedValue(undefined),
      resetToPending: jest.fn().mockResolvedValue(true),
      delete: jest.fn(),
      deleteDeliveredBefore: jest.fn().mockResolvedValue(0),
    },
    profiles: {
      getById: byId(profiles),
      updateProfilePicture: jest.fn(),
    },
    notifications: {
      sendPush: jest.fn().mockResolvedValue(undefined),
      sendEmail: jest.fn().mockResolvedValue(undefined),
    },
    monitoring: {
      recordDeliveryFailure: jest.fn().mockResolvedValue(undefined),
    },
    analytics: {
      trackEvent: jest.fn().mockResolvedValue(undefined),
    },
    clock: {
      now: () => NOW,
    },
  };
}

afterEach(() => {
  jest.restoreAllMocks();
});

describe('deliverMessage', () => {
  it('marks a due message delivered and pushes to the recipient', async () => {
    const effects = createMockEffects();

    const result = await deliverMessage('msg-1')(effects);

    expect(result.extract()).toEqual({status: 'delivered', messageId: 'msg-1', deliveredAt: NOW, notified: true});
    expect(effects.messages.markDelivered).toHaveBeenCalledWith('msg-1', NOW);
    expect(effects.notifications.sendPush).toHaveBeenCalledWith({
      endpoint: bob.pushEndpoint,
      title: 'Message from alice',
      body: 'Happy birthday from last year',
      data: {
        type: 'scheduled_message_delivered',
        messageId: 'msg-1',
        senderId: 'user-1',
        hasVideo: 'false',
        hasImages: 'false',
        deliveredAt: '2025-03-01T13:00:00.000Z',
      },
    });
    expect(effects.notifications.sendEmail).not.toHaveBeenCalled();
    expect(effects.analytics.trackEvent).toHaveBeenCalledWith(expect.objectContaining({event: 'message_delivered'}));
  });

  it('falls back to email when the push keeps failing', async () => {
    const effects = createMockEffects();
    effects.notifications.sendPush = jest.fn().mockRejectedValue(new Error('Endpoint is disabled'));

    const result = await deliverMessage('msg-1')(effects);

    expect(result.extract()).toEqual(expect.objectContaining({status: 'delivered', notified: true}));
    expect(effects.notifications.sendPush).toHaveBeenCalledTimes(2);
    expect(effects.notifications.sendEmail).toHaveBeenCalledWith(expect.objectContaining({
      to: 'bob@example.com',
      subject: 'Message from alice',
    }));
  });

  it('emails a recipient without a device', async () => {
    const effects = createMockEffects([dueMessage], [alice, {...bob, pushEndpoint: null}]);

    await deliverMessage('msg-1')(effects);

    expect(effects.notifications.sendPush).not.toHaveBeenCalled();
    expect(effects.notifications.sendEmail).toHaveBeenCalledTimes(1);
  });

  it('still delivers when the recipient cannot be reached', async () => {
    const effects = createMockEffects([dueMessage], [alice, {...bob, pushEndpoint: null, email: null}]);

    const result = await deliverMessage('msg-1')(effects);

    expect(result.extract()).toEqual({status: 'delivered', messageId: 'msg-1', deliveredAt: NOW, notified: false});
  });

  it('still delivers when the recipient has no profile', async () => {
    const effects = createMockEffects([dueMessage], [alice]);

    const result = await deliverMessage('msg-1')(effects);

    expect(result.extract()).toEqual(expect.objectContaining({status: 'delivered', notified: false}));
  });

  it('still delivers when analytics fails', async () => {
    const effects = createMockEffects();
    effects.analytics.trackEvent = jest.fn().mockRejectedValue(new Error('stream missing'));

    const result = await deliverMessage('msg-1')(effects);

    expect(result.isRight()).toBe(true);
  });

  it('reports an unknown message', async () => {
    const effects = createMockEffects();

    const result = await deliverMessage('missing')(effects);

    expect(result.extract()).toEqual(['Message missing not found']);
  });

  it('skips a message that is no longer pending', async () => {
    const effects = createMockEffects([{...dueMessage, status: 'delivered'}]);

    const result = await deliverMessage('msg-1')(effects);

    expect(result.extract()).toEqual({status: 'skipped', messageId: 'msg-1', reason: 'Message is already delivered'});
    expect(effects.messages.markDelivered).not.toHaveBeenCalled();
  });

  it('skips a message that is not due yet', async () => {
    const effects = createMockEffects([{...dueMessage, scheduledFor: new Date('2025-03-01T13:00:01.000Z')}]);

    const result = await deliverMessage('msg-1')(effects);

    expect(result.extract()).toEqual({
      status: 'skipped',
      messageId: 'msg-1',
      reason: 'Message is not due until 2025-03-01T13:00:01.000Z',
    });
  });

  it('skips without notifying when another worker won the race', async () => {
    const effects = createMockEffects();
    effects.messages.markDelivered = jest.fn().mockResolvedValue(false);

    const result = await deliverMessage('msg-1')(effects);

    expect(result.extract()).toEqual({
      status: 'skipped',
      messageId: 'msg-1',
      reason: 'Message was delivered by another worker',
    });
    expect(effects.notifications.sendPush).not.toHaveBeenCalled();
  });

  it('marks a broken message failed and records the failure', async () => {
    const effects = createMockEffects([{...dueMessage, textContent: '', retryCount: 1}]);

    const result = await deliverMessage('msg-1')(effects);

    expect(result.extract()).toEqual(['Delivery of message msg-1 failed: Invalid message data: missing required fields']);
    expect(effects.messages.markFailed)
      .toHaveBeenCalledWith('msg-1', 'Invalid message data: missing required fields', NOW);
    expect(effects.monitoring.recordDeliveryFailure).toHaveBeenCalledWith({
      type: 'delivery_failed',
      messageId: 'msg-1',
      reason: 'Invalid message data: missing required fields',
      retryCount: 2,
    });
    expect(effects.messages.markDelivered).not.toHaveBeenCalled();
  });

  it('marks the message failed with a user-safe reason when the status update is rejected', async () => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const effects = createMockEffects();
    effects.messages.markDelivered = jest.fn().mockRejectedValue(new Error('check constraint violated'));

    const result = await deliverMessage('msg-1')(effects);

    expect(result.extract()).toEqual(['Delivery of message msg-1 failed: Something went wrong. Please try again later.']);
    expect(effects.messages.markFailed)
      .toHaveBeenCalledWith('msg-1', 'Something went wrong. Please try again later.', NOW);
  });
});

describe('processReadyMessages', () => {
  it('delivers every ready message and counts the failures', async () => {
    const broken = {...dueMessage, id: 'msg-2', recipientId: ''};
    const effects = createMockEffects([dueMessage, broken]);

    const result = await processReadyMessages()(effects);

    expect(result).toEqual({processedCount: 1, failedCount: 1, totalFound: 2});
    expect(effects.messages.findReadyForDelivery).toHaveBeenCalledWith(NOW, 50);
  });

  it('keeps going when one delivery throws', async () => {
    const second = {...dueMessage, id: 'msg-2'};
    const effects = createMockEffects([dueMessage, second]);
    effects.messages.getById = jest.fn()
      .mockRejectedValueOnce(new Error('row lock not available'))
      .mockResolvedValueOnce(second);

    const result = await processReadyMessages(10)(effects);

    expect(result).toEqual({processedCount: 1, failedCount: 1, totalFound: 2});
  });

  it('does not count skipped messages', async () => {
    const effects = createMockEffects();
    effects.messages.markDelivered = jest.fn().mockResolvedValue(false);

    expect(await processReadyMessages()(effects)).toEqual({processedCount: 0, failedCount: 0, totalFound: 1});
  });
});

describe('retryFailedMessages', () => {
  const failedCopy = (message: ScheduledMessage) => ({...message, status: 'failed' as const, retryCount: 1});

  it('resets failed messages and delivers them straight away', async () => {
    const effects = createMockEffects();
    effects.messages.findFailed = jest.fn().mockResolvedValue([
      failedCopy(dueMessage),
      failedCopy({...dueMessage, id: 'msg-2'}),
    ]);
    effects.messages.resetToPending = jest.fn().mockResolvedValueOnce(true).mockResolvedValueOnce(false);

    const result = await retryFailedMessages()(effects);

    expect(result).toEqual({retriedCount: 1, deliveredCount: 1, failedCount: 0, totalFailed: 2});
    expect(effects.messages.findFailed).toHaveBeenCalledWith(3, 10);
    expect(effects.messages.resetToPending).toHaveBeenCalledWith('msg-2');
    expect(effects.messages.markDelivered).toHaveBeenCalledTimes(1);
    expect(effects.messages.markDelivered).toHaveBeenCalledWith('msg-1', NOW);
  });

  it('keeps going when one reset throws', async () => {
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    const messages = ['a', 'b', 'c'].map(id => ({...dueMessage, id}));
    const effects = createMockEffects(messages);
    effects.messages.findFailed = jest.fn().mockResolvedValue(messages.map(failedCopy));
    effects.messages.resetToPending = jest.fn().mockImplementation((id: string) =>
      id === 'b'
        ? Promise.reject(Object.assign(new Error('read ECONNRESET'), {code: 'ECONNRESET'}))
        : Promise.resolve(true)
    );

    const result = await retryFailedMessages()(effects);

    expect(result).toEqual({retriedCount: 2, deliveredCount: 2, failedCount: 1, totalFailed: 3});
    expect(effects.messages.markDelivered).toHaveBeenCalledWith('a', NOW);
    expect(effects.messages.markDelivered).toHaveBeenCalledWith('c', NOW);
    expect(effects.messages.markDelivered).not.toHaveBeenCalledWith('b', NOW);
  });

  it('marks a message failed again when the retry cannot deliver it', async () => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const broken = {...dueMessage, textContent: ''};
    const effects = createMockEffects([broken]);
    effects.messages.findFailed = jest.fn().mockResolvedValue([failedCopy(broken)]);

    const result = await retryFailedMessages()(effects);

    expect(result).toEqual({retriedCount: 1, deliveredCount: 0, failedCount: 1, totalFailed: 1});
    expect(effects.messages.markFailed)
      .toHaveBeenCalledWith('msg-1', 'Invalid message data: missing required fields', NOW);
  });
});

describe('cleanupOldMessages', () => {
  it('deletes in batches until a short batch comes back', async () => {
    const effects = createMockEffects();
    effects.messages.deleteDeliveredBefore = jest.fn()
      .mockResolvedValueOnce(100)
      .mockResolvedValueOnce(100)
      .mockResolvedValueOnce(7);

    const total = await cleanupOldMessages()(effects);

    expect(total).toBe(207);
    expect(effects.messages.deleteDeliveredBefore).toHaveBeenCalledTimes(3);
    expect(effects.messages.deleteDeliveredBefore)
      .toHaveBeenCalledWith(new Date('2024-03-01T13:00:00.000Z'), 100);
  });
});
