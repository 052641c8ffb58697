import path from "path";

import serverConfig from "@keywordmarks/shared/config";
import logger from "@keywordmarks/shared/logger";
import { tryCatch } from "@keywordmarks/shared/tryCatch";

import type { BrowserLauncher } from "./browser";
import type { BookmarkCache } from "./cache";
import type { ExecuteResult, LauncherApi } from "./launcher";
import type { ContextData, PluginAction, ResultItem } from "./results";
import type { SettingsSource } from "./settings";
import { launchFirefox } from "./browser";
import {
  bookmarkResult,
  contextMenuResults,
  errorResult,
  MESSAGE_TITLE,
  noProfileDataResult,
  PLUGIN_ICON,
} from "./results";
import { resolveSettings } from "./settings";

export interface PluginDeps {
  api: LauncherApi;
  cache: BookmarkCache;
  launchBrowser?: BrowserLauncher;
  logFile?: string | null;
  guideUrl?: string;
}

export class KeywordBookmarksPlugin {
  private api: LauncherApi;
  private cache: BookmarkCache;
  private launchBrowser: BrowserLauncher;
  private logFile: string | null;
  private guideUrl: string;

  constructor(deps: PluginDeps) {
    this.api = deps.api;
    this.cache = deps.cache;
    this.launchBrowser = deps.launchBrowser ?? launchFirefox;
    this.logFile =
      deps.logFile !== undefined ? deps.logFile : serverConfig.logFile;
    this.guideUrl = deps.guideUrl ?? serverConfig.profileGuideUrl;
  }

  async query(text: string, settings: SettingsSource): Promise<ResultItem[]> {
    const startTime = Date.now();
    logger.info(`[Query] Received query "${text}"`);

    const { profiles, firefoxDir } = resolveSettings(settings);
    if (profiles.length === 0) {
      logger.warn("[Query] No profile data path configured");
      return [noProfileDataResult()];
    }
    // Nothing to match, don't pay for opening the stores yet
    if (text.length === 0) {
      return [];
    }

    const { data: entry, error } = await tryCatch(
      this.cache.lookup(text, profiles),
    );
    logger.info(`[Query] Finished in ${Date.now() - startTime}ms`);
    if (error) {
      logger.error(`[Query] Failed to look up "${text}": ${error.message}`);
      return [errorResult(error)];
    }
    return entry ? [bookmarkResult(entry, firefoxDir)] : [];
  }

  contextMenu(data: ContextData): ResultItem[] {
    logger.debug(`[ContextMenu] Received ${JSON.stringify(data)}`);
    return contextMenuResults(data);
  }

  async execute(
    action: PluginAction,
    settings: SettingsSource,
  ): Promise<ExecuteResult> {
    logger.debug(`[Action] Executing ${action.type}`);
    const { data: result, error } = await tryCatch(
      this.runAction(action, settings),
    );
    if (error) {
      logger.error(`[Action] ${action.type} failed: ${error.message}`);
      const { error: messageError } = await tryCatch(
        this.api.showMessage(MESSAGE_TITLE, `Error: ${error.message}`, PLUGIN_ICON),
      );
      if (messageError) {
        logger.error(
          `[Action] Failed to report the error to the launcher: ${messageError.message}`,
        );
      }
      return { hide: false };
    }
    return result;
  }

  private async runAction(
    action: PluginAction,
    settings: SettingsSource,
  ): Promise<ExecuteResult> {
    switch (action.type) {
      case "openUrl":
        if (action.firefoxDir) {
          const { error } = await tryCatch(
            this.launchBrowser({
              firefoxDir: action.firefoxDir,
              profilePath: action.profilePath,
              url: action.url,
            }),
          );
          if (error) {
            throw new Error(
              `Unable to start Firefox from "${action.firefoxDir}" (${error.message}). Check the Firefox directory setting.`,
              { cause: error },
            );
          }
        } else {
          await this.api.openUrl(action.url);
        }
        return { hide: true };
      case "openSettings":
        await this.api.openSettingsMenu();
        return { hide: true };
      case "openGuide":
        await this.api.openUrl(this.guideUrl);
        return { hide: true };
      case "copyText":
        await this.api.copyToClipboard(action.text);
        await this.api.showMessage(
          MESSAGE_TITLE,
          `Successfully copied "${action.text}"`,
          PLUGIN_ICON,
        );
        return { hide: false };
      case "reloadCache":
        await this.reloadCache(settings);
        return { hide: false };
      case "revealLogFile":
        await this.revealLogFile();
        return { hide: true };
      default: {
        const exhaustiveCheck: never = action;
        throw new Error(`Unhandled action: ${JSON.stringify(exhaustiveCheck)}`);
      }
    }
  }

  private async reloadCache(settings: SettingsSource) {
    const { profiles } = resolveSettings(settings);
    const { error } = await tryCatch(this.cache.reload(profiles));
    if (error) {
      logger.error(`[Action] Cache reload failed: ${error.message}`);
      await this.api.showMessage(
        MESSAGE_TITLE,
        errorResult(error).title,
        PLUGIN_ICON,
      );
      return;
    }
    logger.info(`[Action] Cache reloaded with ${this.cache.size} keywords`);
    await this.api.showMessage(
      MESSAGE_TITLE,
      "Cache successfully reloaded",
      PLUGIN_ICON,
    );
  }

  private async revealLogFile() {
    if (!this.logFile) {
      await this.api.showMessage(
        MESSAGE_TITLE,
        "File logging is disabled, set LOG_FILE to enable it",
        PLUGIN_ICON,
      );
      return;
    }
    const logFile = path.resolve(this.logFile);
    logger.info(`[Action] Revealing log file ${logFile}`);
    await this.api.revealFile(logFile);
  }
}
