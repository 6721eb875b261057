/**
 * MEDIA ATTACHMENT TESTS
 */

import {MediaFile, NewScheduledMessage} from '../domain';
import {AppEffects} from '../pure/effects';
import {createScheduledMessageWithMedia, uploadMessageMedia} from '../pure/mediaUpload';

const NOW = new Date('2025-03-01T12:00:00.000Z');
const TS = NOW.getTime();

function file(fileName: string): MediaFile {
  return {fileName, contentType: 'application/octet-stream', data: new Uint8Array(8)};
}

function createMockEffects(): AppEffects {
  return {
    messages: {
      insert: jest.fn().mockImplementation((message: NewScheduledMessage) =>
        Promise.resolve({...message, id: 'msg-1'})
      ),
      getById: jest.fn(),
      findPendingBySender: jest.fn().mockResolvedValue([]),
      findReceived: jest.fn(),
      countSentByStatus: jest.fn(),
      countDeliveredTo: jest.fn(),
      findReadyForDelivery: jest.fn(),
      findFailed: jest.fn(),
      markDelivered: jest.fn(),
      markFailed: jest.fn(),
      resetToPending: jest.fn(),
      delete: jest.fn(),
      deleteDeliveredBefore: jest.fn(),
    },
    profiles: {
      getById: jest.fn(),
      updateProfilePicture: jest.fn(),
    },
    storage: {
      upload: jest.fn().mockImplementation((path: string) => Promise.resolve(`https://cdn.test/${path}`)),
      remove: jest.fn().mockResolvedValue(undefined),
    },
    rateLimits: {
      history: jest.fn().mockResolvedValue([]),
      record: jest.fn().mockResolvedValue(undefined),
    },
    notifications: {
      sendPush: jest.fn(),
      sendEmail: jest.fn(),
    },
    monitoring: {
      recordDeliveryFailure: jest.fn(),
    },
    analytics: {
      trackEvent: jest.fn().mockResolvedValue(undefined),
    },
    scheduler: {
      schedule: jest.fn().mockResolvedValue(undefined),
      cancel: jest.fn(),
    },
    clock: {
      now: () => NOW,
    },
  };
}

describe('uploadMessageMedia', () => {
  it('uploads images and the video under the sender folder', async () => {
    const effects = createMockEffects();

    const result = await uploadMessageMedia('user-1', [file('a.png'), file('clip.MP4'), file('b.jpg')])(effects);

    expect(result.extract()).toEqual({
      imageUrls: [
        `https://cdn.test/scheduled_messages/user-1/${TS}-0.png`,
        `https://cdn.test/scheduled_messages/user-1/${TS}-2.jpg`,
      ],
      videoUrl: `https://cdn.test/scheduled_messages/user-1/${TS}-1.mp4`,
      paths: [
        `scheduled_messages/user-1/${TS}-0.png`,
        `scheduled_messages/user-1/${TS}-1.mp4`,
        `scheduled_messages/user-1/${TS}-2.jpg`,
      ],
      errors: [],
    });
  });

  it('keeps the files that made it and reports the rest', async () => {
    const effects = createMockEffects();

    const result = await uploadMessageMedia('user-1', [file('a.png'), file('notes.pdf')])(effects);

    expect(result.extract()).toEqual({
      imageUrls: [`https://cdn.test/scheduled_messages/user-1/${TS}-0.png`],
      videoUrl: null,
      paths: [`scheduled_messages/user-1/${TS}-0.png`],
      errors: ['File 2: Unsupported file type. Only images and videos are allowed.'],
    });
    expect(effects.storage.upload).toHaveBeenCalledTimes(1);
  });

  it('fails when no file made it', async () => {
    const effects = createMockEffects();
    effects.storage.upload = jest.fn().mockRejectedValue(new Error('Access Denied'));

    const result = await uploadMessageMedia('user-1', [file('a.png'), file('notes.txt')])(effects);

    expect(result.isLeft()).toBe(true);
    expect(result.extract()).toEqual([
      'File 1: upload failed (Access Denied)',
      'File 2: Unsupported file type. Only images and videos are allowed.',
    ]);
  });

  it('refuses a second video before uploading anything', async () => {
    const effects = createMockEffects();

    const result = await uploadMessageMedia('user-1', [file('a.mp4'), file('b.mov')])(effects);

    expect(result.extract()).toEqual(['Only one video can be attached to a message']);
    expect(effects.storage.upload).not.toHaveBeenCalled();
  });

  it('has nothing to do without files', async () => {
    const result = await uploadMessageMedia('user-1', [])(createMockEffects());

    expect(result.extract()).toEqual({imageUrls: [], videoUrl: null, paths: [], errors: []});
  });
});

describe('createScheduledMessageWithMedia', () => {
  const draft = {
    senderId: 'user-1',
    recipientId: 'user-1',
    textContent: 'Look how small the dog was',
    scheduledFor: '2026-03-01T12:00:00Z',
  };

  it('stores the message with the uploaded URLs', async () => {
    const effects = createMockEffects();

    const result = await createScheduledMessageWithMedia(draft, [file('dog.png'), file('x.exe')])(effects);

    expect(effects.messages.insert).toHaveBeenCalledWith(expect.objectContaining({
      imageUrls: [`https://cdn.test/scheduled_messages/user-1/${TS}-0.png`],
      videoUrl: null,
    }));
    result.ifRight(({message, mediaErrors}) => {
      expect(message.id).toBe('msg-1');
      expect(mediaErrors).toEqual(['File 2: Unsupported file type. Only images and videos are allowed.']);
    });
    expect(result.isRight()).toBe(true);
  });

  it('does not upload when the draft is invalid', async () => {
    const effects = createMockEffects();

    const result = await createScheduledMessageWithMedia({...draft, textContent: ''}, [file('dog.png')])(effects);

    expect(result.extract()).toEqual(['Message content cannot be empty']);
    expect(effects.storage.upload).not.toHaveBeenCalled();
  });

  it('removes the uploads when the message cannot be stored', async () => {
    const effects = createMockEffects();
    effects.messages.insert = jest.fn().mockRejectedValue(new Error('value too long for type'));

    await expect(createScheduledMessageWithMedia(draft, [file('dog.png'), file('cat.gif')])(effects))
      .rejects.toThrow('value too long for type');
    expect(effects.storage.remove).toHaveBeenCalledWith(`scheduled_messages/user-1/${TS}-0.png`);
    expect(effects.storage.remove).toHaveBeenCalledWith(`scheduled_messages/user-1/${TS}-1.gif`);
  });
});
