/**
 * MEDIA ATTACHMENTS
 *
 * Uploads the images and video attached to a scheduled message. A message is
 * still worth sending when some attachments fail, so partial success is kept
 * and reported; only a batch where every file failed is rejected.
 */

import {MediaFile, MessageDraft, ScheduledMessage} from '../domain';
import {AppEffects} from './effects';
import {MediaUploadResult, ValidatedFile} from './types';
import {buildMediaPath, partitionMediaUrls, validateMediaFile, ValidatedMessage} from './businessLogic';
import {persistScheduledMessage, prepareScheduledMessage} from './messageProcessing';
import {RETRY_POLICIES, withRetry} from '../resilience/withRetry';
import {toError} from '../resilience/errors';
import {Either, EitherAsync, Left, NonEmptyList, Right} from 'purify-ts';

export type ScheduledWithMedia = {
    readonly message: ScheduledMessage;
    // files that were dropped, one line each
    readonly mediaErrors: string[];
};

type UploadAttempt = Either<string, { kind: ValidatedFile['kind']; url: string; path: string }>;

/**
 * Validate and upload every file under the sender's folder.
 *
 * @return Left when at least one file was given and none made it
 */
export function uploadMessageMedia(
    senderId: string,
    files: MediaFile[]
): (appEffects: Pick<AppEffects, 'storage' | 'clock'>) => Promise<Either<NonEmptyList<string>, MediaUploadResult>> {
    return async (appEffects) => {
        if (files.length === 0) {
            return Right({imageUrls: [], videoUrl: null, paths: [], errors: []});
        }

        const validated = files.map(validateMediaFile);
        const videos = Either.rights(validated).filter(file => file.kind === 'video');
        if (videos.length > 1) {
            return Left(NonEmptyList(['Only one video can be attached to a message']));
        }

        const timestamp = appEffects.clock.now().getTime();
        const attempts: UploadAttempt[] = await Promise.all(validated.map((check, index) =>
            check.caseOf<Promise<UploadAttempt>>({
                Left: (reason) => Promise.resolve(Left(reason)),
                Right: async (file) => {
                    const path = buildMediaPath(senderId, timestamp, file);
                    const uploaded = await EitherAsync(() => withRetry(
                        () => appEffects.storage.upload(path, files[index]),
                        RETRY_POLICIES.mediaUpload
                    )).run();
                    return uploaded
                        .map(url => ({kind: file.kind, url, path}))
                        .mapLeft(error => `File ${index + 1}: upload failed (${toError(error).message})`);
                },
            })
        ));

        const uploads = Either.rights(attempts);
        const errors = Either.lefts(attempts);
        errors.forEach(error => console.warn(`⚠️  ${error}`));

        return NonEmptyList.fromArray(errors)
            .filter(() => uploads.length === 0)
            .caseOf<Either<NonEmptyList<string>, MediaUploadResult>>({
                Just: (all) => Left(all),
                Nothing: () => Right({
                    ...partitionMediaUrls(uploads),
                    paths: uploads.map(upload => upload.path),
                    errors,
                }),
            });
    };
}

/**
 * Create a scheduled message with attachments.
 * The draft is checked before anything is uploaded; if storing the message
 * fails afterwards, the uploaded files are removed again.
 *
 * @throws RateLimitError
 * @throws EffectsError
 */
export function createScheduledMessageWithMedia(
    draft: MessageDraft,
    files: MediaFile[]
): (appEffects: AppEffects) => Promise<Either<NonEmptyList<string>, ScheduledWithMedia>> {
    return async (appEffects: AppEffects) => {
        const now = appEffects.clock.now();
        const validated = await prepareScheduledMessage(draft, now)(appEffects);
        return validated.caseOf<Promise<Either<NonEmptyList<string>, ScheduledWithMedia>>>({
            Left: (errors) => Promise.resolve(Left(errors)),
            Right: (message) => attachAndPersist(message, files, now)(appEffects),
        });
    };
}

function attachAndPersist(
    message: ValidatedMessage,
    files: MediaFile[],
    now: Date
): (appEffects: AppEffects) => Promise<Either<NonEmptyList<string>, ScheduledWithMedia>> {
    return async (appEffects: AppEffects) => {
        const media = await uploadMessageMedia(message.senderId, files)(appEffects);
        return media.caseOf<Promise<Either<NonEmptyList<string>, ScheduledWithMedia>>>({
            Left: (errors) => Promise.resolve(Left(errors)),
            Right: async (uploaded) => {
                const withMedia = {
                    ...message,
                    imageUrls: [...message.imageUrls, ...uploaded.imageUrls],
                    videoUrl: uploaded.videoUrl ?? message.videoUrl,
                };
                try {
                    const stored = await persistScheduledMessage(withMedia, now)(appEffects);
                    return Right({message: stored, mediaErrors: uploaded.errors});
                } catch (error) {
                    await removeUploads(uploaded.paths)(appEffects);
                    throw error;
                }
            },
        });
    };
}

function removeUploads(paths: string[]): (appEffects: Pick<AppEffects, 'storage'>) => Promise<void> {
    return async (appEffects) => {
        const results = await Promise.all(paths.map(path => EitherAsync(() => appEffects.storage.remove(path)).run()));
        Either.lefts(results).forEach(error =>
            console.error(`❌ Could not remove orphaned upload: ${toError(error).message}`)
        );
    };
}
