import { z } from "zod";

import type { ProfileSpec } from "@keywordmarks/shared/types/profiles";
import { parseProfileSpecs } from "@keywordmarks/shared/types/profiles";

export const SETTING_KEYS = {
  profilePathData: "profile_path_data",
  firefoxDir: "firefox_fp",
} as const;

export type SettingKey = (typeof SETTING_KEYS)[keyof typeof SETTING_KEYS];

export type SettingLookup =
  | { found: true; value: string }
  | { found: false };

export interface SettingsSource {
  read(key: SettingKey): SettingLookup;
}

export interface PluginSettings {
  profiles: ProfileSpec[];
  firefoxDir: string | null;
}

/**
 * Adapts the settings object a host delivers alongside each request.
 * Keys that are missing or don't hold a string are reported as not found.
 */
export function settingsFromRecord(
  record: Record<string, unknown>,
): SettingsSource {
  return {
    read(key) {
      const parsed = z.string().safeParse(record[key]);
      return parsed.success
        ? { found: true, value: parsed.data }
        : { found: false };
    },
  };
}

function readNonBlank(settings: SettingsSource, key: SettingKey) {
  const lookup = settings.read(key);
  if (!lookup.found || lookup.value.trim().length === 0) {
    return null;
  }
  return lookup.value;
}

export function resolveSettings(settings: SettingsSource): PluginSettings {
  const profilePathData = readNonBlank(settings, SETTING_KEYS.profilePathData);
  const firefoxDir = readNonBlank(settings, SETTING_KEYS.firefoxDir);
  return {
    profiles: profilePathData ? parseProfileSpecs(profilePathData) : [],
    firefoxDir: firefoxDir?.trim() ?? null,
  };
}
