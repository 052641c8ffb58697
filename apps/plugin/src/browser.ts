import { once } from "events";
import path from "path";
import { execa } from "execa";

import serverConfig from "@keywordmarks/shared/config";
import logger from "@keywordmarks/shared/logger";

export interface FirefoxLaunchOptions {
  firefoxDir: string;
  profilePath: string;
  url: string;
}

export type BrowserLauncher = (options: FirefoxLaunchOptions) => Promise<void>;

/**
 * Opens the url in the Firefox installation at `firefoxDir`, using the
 * profile the bookmark was read from. Resolves once the process has started;
 * the browser is left running after the plugin exits.
 */
export const launchFirefox: BrowserLauncher = async ({
  firefoxDir,
  profilePath,
  url,
}) => {
  const executable = path.join(firefoxDir, serverConfig.firefox.executable);
  logger.debug(
    `[Browser] Running "${executable}" "${url}" -profile "${profilePath}"`,
  );

  const subprocess = execa(executable, [url, "-profile", profilePath], {
    cwd: firefoxDir,
    detached: true,
    stdio: "ignore",
    cleanup: false,
  });
  subprocess.unref();
  void subprocess.catch((error: unknown) => {
    logger.error(`[Browser] Firefox exited with an error: ${String(error)}`);
  });

  await once(subprocess, "spawn");
};
