import { chromium } from "playwright-core";
import type { BrowserLauncher } from "./types";

/**
 * Launches Chromium through playwright-core. Without `executablePath` the
 * browser installed by `playwright-core install chromium` is used.
 */
export const launchChromium: BrowserLauncher = (settings) =>
  chromium.launch({
    headless: settings.headless,
    slowMo: settings.slowMo,
    args: settings.launchArgs,
    executablePath: settings.executablePath,
  });
