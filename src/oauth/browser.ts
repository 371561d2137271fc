/**
 * Cross-platform browser opener for OAuth flows.
 *
 * Opening the browser is best-effort: the authorization URL is always
 * printed as well, so a failure here never aborts the flow.
 *
 * @module oauth/browser
 */

import { spawn } from "node:child_process";

/**
 * Opens a URL in the user's default browser.
 */
export type BrowserOpener = (url: string) => Promise<boolean>;

/**
 * Command and arguments that open `url` on the given platform.
 *
 * - macOS: `open "url"`
 * - Windows: `powershell Start-Process "url"`
 * - Linux and other Unix-like systems: `xdg-open "url"`
 */
export function browserCommand(
  url: string,
  platform: NodeJS.Platform = process.platform,
): { command: string; args: string[] } {
  switch (platform) {
    case "darwin":
      return { command: "open", args: [url] };
    case "win32":
      // cmd.exe would split the URL at `&`
      return {
        command: "powershell",
        args: [
          "-NoProfile",
          "-NonInteractive",
          "-Command",
          `Start-Process ${JSON.stringify(url)}`,
        ],
      };
    default:
      return { command: "xdg-open", args: [url] };
  }
}

/**
 * Opens the default browser to the specified URL.
 *
 * @param url - URL to open in the browser
 * @returns true once the browser process spawned, false if it could not be started
 */
export const openBrowser: BrowserOpener = (url) => {
  const { command, args } = browserCommand(url);

  return new Promise((resolve) => {
    const child = spawn(command, args, {
      detached: true,
      stdio: "ignore",
    });

    child.on("error", () => {
      resolve(false);
    });

    child.on("spawn", () => {
      // Detach from parent process so it doesn't block exit
      child.unref();
      resolve(true);
    });
  });
};
