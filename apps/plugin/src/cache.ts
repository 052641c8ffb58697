import { Mutex } from "async-mutex";

import type { ProfileReader } from "@keywordmarks/db";
import type {
  BookmarkEntry,
  BookmarkMap,
} from "@keywordmarks/shared/types/bookmarks";
import type { ProfileSpec } from "@keywordmarks/shared/types/profiles";
import {
  CacheLoadError,
  NoProfilesConfiguredError,
  StoreUnavailableError,
} from "@keywordmarks/shared/errors";
import logger from "@keywordmarks/shared/logger";

/**
 * Merged keyword bookmarks of every configured profile.
 *
 * The map is built on first lookup and then kept until an explicit reload.
 * A failed load leaves the cache unloaded so that the next lookup tries
 * again from scratch.
 */
export class BookmarkCache {
  private entries: ReadonlyMap<string, BookmarkEntry> | null = null;
  // Guards building and swapping `entries`. Lookups against a loaded map
  // don't take it.
  private mutex = new Mutex();

  constructor(private readProfile: ProfileReader) {}

  isLoaded(): boolean {
    return this.entries !== null;
  }

  get size(): number {
    return this.entries?.size ?? 0;
  }

  async lookup(
    keyword: string,
    profiles: readonly ProfileSpec[],
  ): Promise<BookmarkEntry | undefined> {
    const entries = this.entries ?? (await this.ensureLoaded(profiles));
    return entries.get(keyword);
  }

  async reload(profiles: readonly ProfileSpec[]): Promise<void> {
    await this.mutex.runExclusive(() => this.load(profiles));
  }

  private async ensureLoaded(
    profiles: readonly ProfileSpec[],
  ): Promise<ReadonlyMap<string, BookmarkEntry>> {
    return this.mutex.runExclusive(async () => {
      // Another lookup may have finished loading while we were waiting
      if (this.entries) {
        return this.entries;
      }
      return this.load(profiles);
    });
  }

  // Must be called with the mutex held
  private async load(
    profiles: readonly ProfileSpec[],
  ): Promise<ReadonlyMap<string, BookmarkEntry>> {
    if (profiles.length === 0) {
      this.entries = null;
      throw new NoProfilesConfiguredError();
    }

    const startTime = Date.now();
    const working: BookmarkMap = new Map();
    for (const profile of profiles) {
      let bookmarks: BookmarkMap;
      try {
        bookmarks = await this.readProfile(profile);
      } catch (error) {
        this.entries = null;
        const storeError =
          error instanceof StoreUnavailableError
            ? error
            : new StoreUnavailableError(profile.path, { cause: error });
        logger.error(`[Cache] Aborting load: ${storeError.message}`);
        throw new CacheLoadError(storeError);
      }
      for (const [keyword, entry] of bookmarks) {
        working.set(keyword, entry);
      }
    }

    this.entries = working;
    logger.info(
      `[Cache] Loaded ${working.size} keyword bookmarks from ${profiles.length} profile(s) in ${Date.now() - startTime}ms`,
    );
    return working;
  }
}
