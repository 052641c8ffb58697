import "dotenv/config";

import { z } from "zod";

const stringBool = (defaultValue: string) =>
  z
    .string()
    .default(defaultValue)
    .refine((s) => s === "true" || s === "false")
    .transform((s) => s === "true");

const allEnv = z.object({
  LOG_LEVEL: z
    .enum(["error", "warn", "info", "http", "verbose", "debug", "silly"])
    .default("info"),
  LOG_FILE: z.string().optional(),
  LOG_SILENT: stringBool("false"),
  FIREFOX_EXECUTABLE: z
    .string()
    .default(process.platform === "win32" ? "firefox.exe" : "firefox"),
  PROFILE_GUIDE_URL: z
    .string()
    .url()
    .default(
      "https://support.mozilla.org/kb/profiles-where-firefox-stores-user-data",
    ),
});

const serverConfigSchema = allEnv.transform((val) => {
  return {
    logLevel: val.LOG_LEVEL,
    logSilent: val.LOG_SILENT,
    // Empty means file logging is off
    logFile: val.LOG_FILE && val.LOG_FILE.length > 0 ? val.LOG_FILE : null,
    firefox: {
      executable: val.FIREFOX_EXECUTABLE,
    },
    profileGuideUrl: val.PROFILE_GUIDE_URL,
  };
});

const serverConfig = serverConfigSchema.parse(process.env);

export type ServerConfig = typeof serverConfig;

export default serverConfig;
