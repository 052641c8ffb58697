/**
 * Raised when the profile path setting is missing or holds no usable line.
 * The user fixes this from the plugin settings.
 */
export class NoProfilesConfiguredError extends Error {
  constructor() {
    super("No profile data path configured");
    this.name = "NoProfilesConfiguredError";
  }
}

/**
 * The bookmark store of a single profile could not be opened or queried
 * (missing file, locked database, unexpected schema).
 */
export class StoreUnavailableError extends Error {
  constructor(
    public readonly profilePath: string,
    options?: { cause?: unknown },
  ) {
    super(`Unable to read the bookmark store of profile "${profilePath}"`, options);
    this.name = "StoreUnavailableError";
  }
}

/**
 * A cache load was aborted because one of the profiles failed. The cache is
 * left unloaded when this is thrown.
 */
export class CacheLoadError extends Error {
  public readonly profilePath: string;

  constructor(cause: StoreUnavailableError) {
    super(`Failed to load bookmarks: ${cause.message}`, { cause });
    this.name = "CacheLoadError";
    this.profilePath = cause.profilePath;
  }
}
