import { chromium, type Browser, type BrowserContext, type LaunchOptions, type Page } from "playwright-core";
import { mkdir, access } from "fs/promises";
import { logger } from "../core/logger";
import { env } from "../core/config";
import { SessionError } from "../core/errors";
import type { StorageState } from "./playwright-session-state";

export async function ensureProfileDir(dir: string): Promise<void> {
  try {
    await access(dir);
  } catch {
    await mkdir(dir, { recursive: true });
    logger.debug({ profileDir: dir }, "Created persistent browser profile directory");
  }
}

export async function profileExists(dir: string): Promise<boolean> {
  try {
    await access(dir);
    return true;
  } catch {
    return false;
  }
}

export interface BrowserSessionHandle {
  browser: Browser | null;
  context: BrowserContext;
  page: Page;
  persistent: boolean;
}

const BLOCK_CHALLENGE_PATTERNS = [
  /\/authwall/i,
  /\/checkpoint\//i,
  /\/uas\/login/i,
  /\/login(?:[/?]|$)/i,
  /\/signup(?:[/?]|$)/i,
  /\/challenge\//i,
  /security.*verification/i,
];

const UNAVAILABLE_PATTERNS = [/\/404\/?/i, /\/in\/unavailable/i, /\/pub\/dir\//i];

export function detectBlockChallenge(url: string): { isBlocked: boolean; reason: string | null } {
  for (const pattern of BLOCK_CHALLENGE_PATTERNS) {
    const match = url.match(pattern);
    if (match) {
      return { isBlocked: true, reason: `BLOCK_DETECTED:url_pattern:${match[0]}` };
    }
  }
  return { isBlocked: false, reason: null };
}

export interface LandingState {
  url: string;
  status: number | null;
  loginMarkers: number;
  unavailableMarkers: number;
}

export type LandingVerdict =
  | { kind: "ok" }
  | { kind: "session_invalid"; reason: string }
  | { kind: "unreachable"; reason: string };

/**
 * Decides what a profile navigation actually landed on. LinkedIn answers
 * unauthenticated or throttled clients with status 999 or a login wall
 * rather than an error page.
 */
export function classifyLanding(state: LandingState): LandingVerdict {
  if (state.status === 999) {
    return { kind: "session_invalid", reason: "request denied (HTTP 999)" };
  }

  const block = detectBlockChallenge(state.url);
  if (block.isBlocked && block.reason) {
    return { kind: "session_invalid", reason: block.reason };
  }

  if (state.status === 404 || state.status === 410) {
    return { kind: "unreachable", reason: `HTTP ${state.status}` };
  }

  for (const pattern of UNAVAILABLE_PATTERNS) {
    if (pattern.test(state.url)) {
      return { kind: "unreachable", reason: `redirected to ${state.url}` };
    }
  }

  if (state.unavailableMarkers > 0) {
    return { kind: "unreachable", reason: "profile unavailable page rendered" };
  }

  if (state.loginMarkers > 0) {
    return { kind: "session_invalid", reason: `login form visible (${state.loginMarkers})` };
  }

  return { kind: "ok" };
}

function launchOptions(): LaunchOptions {
  return {
    headless: env.PLAYWRIGHT_HEADLESS,
    slowMo: env.PLAYWRIGHT_SLOW_MO,
    channel: env.PLAYWRIGHT_CHANNEL,
    executablePath: env.PLAYWRIGHT_EXECUTABLE_PATH,
    args: ["--disable-blink-features=AutomationControlled"],
    // Cancellation belongs to the caller's AbortSignal; the browser must stay
    // up until the partial set is flushed.
    handleSIGINT: false,
    handleSIGTERM: false,
    handleSIGHUP: false,
  };
}

export async function launchBrowserSession(options: {
  profileDir?: string;
  storageState?: StorageState;
}): Promise<BrowserSessionHandle> {
  try {
    if (options.profileDir) {
      await ensureProfileDir(options.profileDir);
      const isNew = !(await profileExists(`${options.profileDir}/Default`));

      const context = await chromium.launchPersistentContext(options.profileDir, {
        ...launchOptions(),
        viewport: { width: 1280, height: 900 },
        locale: "en-US",
      });

      if (isNew && options.storageState && options.storageState.cookies.length > 0) {
        await context.addCookies(options.storageState.cookies);
        logger.info(
          { profileDir: options.profileDir, cookieCount: options.storageState.cookies.length },
          "Hydrated new persistent context from storageState"
        );
      }

      const page = context.pages()[0] ?? (await context.newPage());
      logger.info({ profileDir: options.profileDir, isNew }, "Launched persistent browser context");
      return { browser: null, context, page, persistent: true };
    }

    if (!options.storageState) {
      throw new SessionError("No session state or browser profile directory configured", "SESSION_INVALID");
    }

    const browser = await chromium.launch(launchOptions());
    const context = await browser.newContext({
      storageState: options.storageState,
      viewport: { width: 1280, height: 900 },
      locale: "en-US",
    });
    const page = await context.newPage();
    logger.info({ cookieCount: options.storageState.cookies.length }, "Launched browser context from storageState");
    return { browser, context, page, persistent: false };
  } catch (error) {
    if (error instanceof SessionError) throw error;
    const reason = error instanceof Error ? error.message : String(error);
    throw new SessionError(`Browser could not be launched: ${reason}`, "BROWSER_UNAVAILABLE");
  }
}

export async function closeSessionSafely(handle: BrowserSessionHandle | null): Promise<void> {
  if (!handle) return;

  try {
    for (const page of handle.context.pages()) {
      await page.close().catch((error: unknown) => logger.debug({ error }, "Error closing page (non-fatal)"));
    }
    await handle.context.close();
    if (handle.browser) await handle.browser.close();
  } catch (error) {
    logger.debug({ error }, "Error closing browser context (non-fatal)");
  }
}
