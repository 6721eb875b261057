/**
 * PROFILE PICTURES
 *
 * Profile picture URLs are read on nearly every screen, so they sit behind a
 * KeyedCache keyed by user id. Reads fail soft: when the backend cannot be
 * reached, whatever is cached (even stale) is served, and `null` otherwise.
 * Writes go to storage and the profile first, then into the cache, which
 * tells every subscriber.
 */

import {MediaFile} from '../domain';
import {AppEffects} from '../pure/effects';
import {buildProfilePicturePath, validateProfilePicture} from '../pure/businessLogic';
import {RETRY_POLICIES, RetryOptions, withRetry} from '../resilience/withRetry';
import {toError} from '../resilience/errors';
import {CacheListener, KeyedCache, Unsubscribe} from './KeyedCache';
import {Either, EitherAsync, Left, Right} from 'purify-ts';

export type ProfilePictureUrl = string | null;

export type ProfilePictureServiceOptions = {
  readonly ttlMs?: number;
  readonly sleep?: RetryOptions<unknown>['sleep'];
};

type ProfilePictureEffects = Pick<AppEffects, 'profiles' | 'storage' | 'clock'>;

export class ProfilePictureService {
  private readonly cache: KeyedCache<ProfilePictureUrl>;

  constructor(
    private readonly effects: ProfilePictureEffects,
    private readonly options: ProfilePictureServiceOptions = {}
  ) {
    this.cache = new KeyedCache<ProfilePictureUrl>({
      ttlMs: options.ttlMs,
      now: () => effects.clock.now().getTime(),
      loader: userId => this.loadUrl(userId),
      retryPolicy: RETRY_POLICIES.profileFetch,
      sleep: options.sleep,
    });
  }

  async getProfilePictureUrl(userId: string, {forceRefresh = false} = {}): Promise<ProfilePictureUrl> {
    if (userId.trim().length === 0) {
      return null;
    }
    const loaded = await EitherAsync(() =>
      forceRefresh ? this.cache.refresh(userId) : this.cache.fetch(userId)
    ).run();

    return loaded.caseOf({
      Left: (error) => {
        const fallback = this.cache.peek(userId)?.value ?? null;
        console.warn(`⚠️  Profile picture for ${userId} unavailable, serving ${fallback === null ? 'none' : 'cached value'}: ${toError(error).message}`);
        return fallback;
      },
      Right: (url) => url,
    });
  }

  /**
   * Upload a new picture and point the profile at it.
   * @return Left with the reason when the file is rejected, otherwise the new URL
   */
  async updateProfilePicture(userId: string, file: MediaFile): Promise<Either<string, string>> {
    return validateProfilePicture(file).caseOf<Promise<Either<string, string>>>({
      Left: (reason) => Promise.resolve(Left(reason)),
      Right: async (validated) => {
        const path = buildProfilePicturePath(userId, this.effects.clock.now().getTime(), validated);
        const url = await this.store(userId, path, file);
        this.cache.set(userId, url);
        console.log(`🖼️  Updated profile picture for ${userId}`);
        return Right(url);
      },
    });
  }

  async removeProfilePicture(userId: string): Promise<void> {
    await withRetry(
      () => this.effects.profiles.updateProfilePicture(userId, null),
      RETRY_POLICIES.profileUpdate,
      {sleep: this.options.sleep}
    );
    this.cache.set(userId, null);
  }

  /** Drop what was cached for the previous identity when the signed-in user changes. */
  switchUser(previousUserId: string | null): void {
    if (previousUserId) {
      this.cache.invalidate(previousUserId);
    }
  }

  clear(): void {
    this.cache.invalidateAll();
  }

  subscribe(listener: CacheListener<ProfilePictureUrl>): Unsubscribe {
    return this.cache.subscribe(listener);
  }

  dispose(): void {
    this.cache.dispose();
  }

  private async store(userId: string, path: string, file: MediaFile): Promise<string> {
    const url = await withRetry(
      () => this.effects.storage.upload(path, file),
      RETRY_POLICIES.mediaUpload,
      {sleep: this.options.sleep}
    );
    try {
      await withRetry(
        () => this.effects.profiles.updateProfilePicture(userId, url),
        RETRY_POLICIES.profileUpdate,
        {sleep: this.options.sleep}
      );
    } catch (error) {
      await this.effects.storage.remove(path).catch((removeError: unknown) =>
        console.error(`❌ Could not remove orphaned profile picture ${path}: ${toError(removeError).message}`)
      );
      throw error;
    }
    return url;
  }

  private async loadUrl(userId: string): Promise<ProfilePictureUrl> {
    const profile = await this.effects.profiles.getById(userId);
    return profile?.profilePictureUrl ?? null;
  }
}
