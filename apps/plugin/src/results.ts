import type { BookmarkEntry } from "@keywordmarks/shared/types/bookmarks";
import {
  CacheLoadError,
  NoProfilesConfiguredError,
} from "@keywordmarks/shared/errors";

export const PLUGIN_ICON = "Images/app.png";
export const MESSAGE_TITLE = "Keyword Bookmarks";

/**
 * Actions are plain data so the host can hand them back later, out of line
 * from the query that produced them.
 */
export type PluginAction =
  | {
      type: "openUrl";
      url: string;
      profilePath: string;
      firefoxDir: string | null;
    }
  | { type: "openSettings" }
  | { type: "openGuide" }
  | { type: "copyText"; text: string }
  | { type: "reloadCache" }
  | { type: "revealLogFile" };

export interface ErrorContext {
  kind: "error";
}

export interface BookmarkContext {
  kind: "bookmark";
  profilePath: string;
  firefoxDir: string | null;
  keyword: string;
  url: string;
}

export type ContextData = ErrorContext | BookmarkContext;

export interface ResultItem {
  title: string;
  subTitle?: string;
  icon?: string;
  action?: PluginAction;
  contextData?: ContextData;
}

export function bookmarkResult(
  entry: BookmarkEntry,
  firefoxDir: string | null,
): ResultItem {
  return {
    title: entry.keyword,
    subTitle: entry.url,
    icon: PLUGIN_ICON,
    action: {
      type: "openUrl",
      url: entry.url,
      profilePath: entry.sourceProfile,
      firefoxDir,
    },
    contextData: {
      kind: "bookmark",
      profilePath: entry.sourceProfile,
      firefoxDir,
      keyword: entry.keyword,
      url: entry.url,
    },
  };
}

export function noProfileDataResult(): ResultItem {
  return {
    title: "Error: No profile data path given",
    subTitle: "Open context menu for more options",
    icon: PLUGIN_ICON,
    action: { type: "openSettings" },
    contextData: { kind: "error" },
  };
}

export function errorResult(error: Error): ResultItem {
  if (error instanceof NoProfilesConfiguredError) {
    return noProfileDataResult();
  }
  if (error instanceof CacheLoadError) {
    return {
      title: `Error: Unable to open profile database file. Profile: ${error.profilePath}`,
      subTitle:
        "Are you sure the profile exists and is correct? Click this to open settings menu.",
      icon: PLUGIN_ICON,
      action: { type: "openSettings" },
      contextData: { kind: "error" },
    };
  }
  return {
    title: `Error: ${error.message}`,
    subTitle: "Open context menu for more options",
    icon: PLUGIN_ICON,
    contextData: { kind: "error" },
  };
}

function copyOption(name: string, value: string): ResultItem {
  return {
    title: `Copy ${name}`,
    subTitle: value,
    icon: PLUGIN_ICON,
    action: { type: "copyText", text: value },
  };
}

export function contextMenuResults(data: ContextData): ResultItem[] {
  switch (data.kind) {
    case "error":
      return [
        { title: "Open Settings Menu", action: { type: "openSettings" } },
        { title: "Open Guide", action: { type: "openGuide" } },
      ];
    case "bookmark":
      return [
        {
          title: "Reload Cache",
          icon: PLUGIN_ICON,
          action: { type: "reloadCache" },
        },
        {
          title: "Open log file",
          subTitle: "Show the plugin log file in the file manager",
          icon: PLUGIN_ICON,
          action: { type: "revealLogFile" },
        },
        copyOption("Keyword", data.keyword),
        copyOption("Url", data.url),
      ];
    default: {
      const exhaustiveCheck: never = data;
      throw new Error(`Unhandled context data: ${JSON.stringify(exhaustiveCheck)}`);
    }
  }
}
