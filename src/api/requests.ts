/**
 * Request body parsing for the HTTP API. Bodies arrive as untrusted JSON;
 * everything here narrows them into domain values or explains what is wrong.
 */

import {MediaFile, MessageDraft} from '../domain';
import {Either, Left, NonEmptyList, Right} from 'purify-ts';

type JsonObject = { readonly [field: string]: unknown };

export type MessageRequest = {
  readonly draft: MessageDraft;
  readonly files: MediaFile[];
};

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// standard alphabet, padded
const BASE64 = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

/**
 * Attachments travel inline as `{ fileName, contentType, data }` with the
 * bytes base64-encoded.
 */
export function parseMediaFile(value: unknown, label: string): Either<string, MediaFile> {
  if (!isObject(value)) {
    return Left(`${label} must be an object`);
  }
  const {fileName, contentType, data} = value;
  if (typeof fileName !== 'string' || fileName.length === 0) {
    return Left(`${label}: fileName is required`);
  }
  if (typeof data !== 'string' || data.length === 0 || !BASE64.test(data)) {
    return Left(`${label}: data must be a base64 string`);
  }
  return Right({
    fileName,
    contentType: typeof contentType === 'string' ? contentType : 'application/octet-stream',
    data: Buffer.from(data, 'base64'),
  });
}

export function parseMessageRequest(body: unknown, senderId: string): Either<NonEmptyList<string>, MessageRequest> {
  if (!isObject(body)) {
    return Left(NonEmptyList(['Request body must be a JSON object']));
  }

  const errors: string[] = [];
  const {recipientId, textContent, scheduledFor, imageUrls, videoUrl, attachments} = body;

  if (typeof recipientId !== 'string') errors.push('recipientId must be a string');
  if (typeof textContent !== 'string') errors.push('textContent must be a string');
  if (typeof scheduledFor !== 'string') errors.push('scheduledFor must be an ISO-8601 string');
  if (imageUrls !== undefined && !isStringArray(imageUrls)) errors.push('imageUrls must be an array of strings');
  if (videoUrl !== undefined && videoUrl !== null && typeof videoUrl !== 'string') errors.push('videoUrl must be a string');
  if (attachments !== undefined && !Array.isArray(attachments)) errors.push('attachments must be an array');

  const parsedFiles = Array.isArray(attachments)
    ? attachments.map((file, index) => parseMediaFile(file, `Attachment ${index + 1}`))
    : [];
  errors.push(...Either.lefts(parsedFiles));

  return NonEmptyList.fromArray(errors).caseOf<Either<NonEmptyList<string>, MessageRequest>>({
    Just: (all) => Left(all),
    Nothing: () => Right({
      draft: {
        senderId,
        recipientId: typeof recipientId === 'string' ? recipientId : '',
        textContent: typeof textContent === 'string' ? textContent : '',
        scheduledFor: typeof scheduledFor === 'string' ? scheduledFor : '',
        imageUrls: isStringArray(imageUrls) ? imageUrls : [],
        videoUrl: typeof videoUrl === 'string' ? videoUrl : null,
      },
      files: Either.rights(parsedFiles),
    }),
  });
}
