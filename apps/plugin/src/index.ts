import { readProfile } from "@keywordmarks/db";

import type { LauncherApi } from "./launcher";
import { BookmarkCache } from "./cache";
import { KeywordBookmarksPlugin } from "./plugin";

export { BookmarkCache } from "./cache";
export { KeywordBookmarksPlugin } from "./plugin";
export type { PluginDeps } from "./plugin";
export { launchFirefox } from "./browser";
export type { BrowserLauncher, FirefoxLaunchOptions } from "./browser";
export type { ExecuteResult, LauncherApi } from "./launcher";
export type {
  BookmarkContext,
  ContextData,
  ErrorContext,
  PluginAction,
  ResultItem,
} from "./results";
export { resolveSettings, SETTING_KEYS, settingsFromRecord } from "./settings";
export type {
  PluginSettings,
  SettingKey,
  SettingLookup,
  SettingsSource,
} from "./settings";

/**
 * Wires the plugin against the on-disk profile stores. Call once at process
 * start; the returned instance owns the bookmark cache for the process
 * lifetime.
 */
export function createPlugin(api: LauncherApi): KeywordBookmarksPlugin {
  return new KeywordBookmarksPlugin({
    api,
    cache: new BookmarkCache(readProfile),
  });
}
