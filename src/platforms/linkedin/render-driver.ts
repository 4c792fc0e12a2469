import { errors } from "playwright-core";
import type { ProfileReference, RawSnapshot } from "../../domain/models";
import type { ScrollOptions } from "../../domain/scrape-types";
import type { RenderDriver } from "../driver";
import type { LifecycleLog } from "../../core/logger";
import { SessionError } from "../../core/errors";
import { DEFAULT_RETRY_OPTIONS, retryWithBackoff, type RetryOptions } from "../../core/retry";
import { actionDelay, settle } from "../../core/cooldown";
import { classifyLanding, closeSessionSafely, detectBlockChallenge, launchBrowserSession } from "../../services/browser-session";
import { loadStorageState, type StorageState } from "../../services/playwright-session-state";
import { LINKEDIN_SELECTORS } from "./selectors";

export interface FeedLocator {
  count(): Promise<number>;
  first(): FeedLocator;
  isVisible(): Promise<boolean>;
  click(options: { timeout: number }): Promise<void>;
  waitFor(options: { state: "attached"; timeout: number }): Promise<void>;
}

/** The part of a Playwright page the driver works through. */
export interface FeedPage {
  readonly mouse: { wheel(deltaX: number, deltaY: number): Promise<void> };
  goto(url: string, options: { waitUntil: "domcontentloaded"; timeout: number }): Promise<{ status(): number } | null>;
  url(): string;
  isClosed(): boolean;
  content(): Promise<string>;
  locator(selector: string): FeedLocator;
  evaluate(expression: string): Promise<unknown>;
  setDefaultTimeout(timeout: number): void;
  setDefaultNavigationTimeout(timeout: number): void;
}

export interface FeedPageHandle {
  page: FeedPage;
  close(): Promise<void>;
}

export interface LinkedInSession {
  profile: ProfileReference;
  handle: FeedPageHandle;
}

export interface LinkedInDriverOptions {
  navigationTimeoutMs: number;
  navigationMaxAttempts: number;
  sessionStatePath: string;
  profileDir?: string;
  log: LifecycleLog;
  /** Backoff between navigation attempts. */
  retryDelays?: Pick<RetryOptions, "baseDelayMs" | "maxDelayMs" | "jitterMs">;
  /** Opens the browser page; defaults to a Playwright launch. */
  launch?: () => Promise<FeedPageHandle>;
}

const SCROLL_STEP_PX = 2400;
const SHOW_MORE_CLICK_TIMEOUT_MS = 2000;

export class LinkedInRenderDriver implements RenderDriver<LinkedInSession> {
  readonly platform = "linkedin";

  constructor(private options: LinkedInDriverOptions) {}

  async open(profile: ProfileReference): Promise<LinkedInSession> {
    const handle = await (this.options.launch ?? (() => this.launchPlaywright()))();

    try {
      handle.page.setDefaultNavigationTimeout(this.options.navigationTimeoutMs);
      handle.page.setDefaultTimeout(this.options.navigationTimeoutMs);

      await this.navigateToActivity(handle.page, profile);
      await actionDelay();

      return { profile, handle };
    } catch (error) {
      await handle.close();
      throw error;
    }
  }

  async scrollToLoadMore(session: LinkedInSession, options: ScrollOptions): Promise<boolean> {
    const page = this.livePage(session);

    try {
      const before = await this.measureFeed(page);

      await this.clickShowMore(page);
      await page.mouse.wheel(0, SCROLL_STEP_PX);
      await settle(options.settleMs);

      const after = await this.measureFeed(page);
      this.assertStillAuthenticated(page);

      return after.posts > before.posts || after.height > before.height;
    } catch (error) {
      throw this.toSessionError(error, page, "scroll");
    }
  }

  async captureSnapshot(session: LinkedInSession, scroll: number): Promise<RawSnapshot> {
    const page = this.livePage(session);

    try {
      const html = await page.content();
      return { html, url: page.url(), capturedAt: new Date(), scroll };
    } catch (error) {
      throw this.toSessionError(error, page, "capture");
    }
  }

  async close(session: LinkedInSession): Promise<void> {
    await session.handle.close();
  }

  private async launchPlaywright(): Promise<FeedPageHandle> {
    const storageState = await this.resolveStorageState();
    const browser = await launchBrowserSession({ profileDir: this.options.profileDir, storageState });
    return { page: browser.page, close: () => closeSessionSafely(browser) };
  }

  private async resolveStorageState(): Promise<StorageState | undefined> {
    if (!this.options.profileDir) {
      return loadStorageState(this.options.sessionStatePath);
    }

    // A persistent profile carries its own cookies; the exported state only
    // seeds a brand-new profile directory.
    try {
      return await loadStorageState(this.options.sessionStatePath);
    } catch (error) {
      this.options.log.log("debug", "no usable storage state for persistent profile", {
        reason: error instanceof Error ? error.message : String(error),
      });
      return undefined;
    }
  }

  private async navigateToActivity(page: FeedPage, profile: ProfileReference): Promise<void> {
    const timeout = this.options.navigationTimeoutMs;

    const response = await retryWithBackoff(
      async (attempt) => {
        try {
          return await page.goto(profile.activityUrl, { waitUntil: "domcontentloaded", timeout });
        } catch (error) {
          if (error instanceof errors.TimeoutError) {
            this.options.log.log("warn", "navigation timed out", { attempt, url: profile.activityUrl, timeout });
            throw new SessionError(
              `Navigation to ${profile.activityUrl} timed out after ${timeout}ms`,
              "NAVIGATION_TIMEOUT",
              profile.activityUrl
            );
          }
          const reason = error instanceof Error ? error.message : String(error);
          throw new SessionError(`Navigation failed: ${reason}`, "PROFILE_UNREACHABLE", profile.activityUrl);
        }
      },
      {
        ...DEFAULT_RETRY_OPTIONS,
        ...this.options.retryDelays,
        maxAttempts: this.options.navigationMaxAttempts,
        shouldRetry: (error) => error instanceof SessionError && error.retryable,
      },
      `navigate:${profile.handle}`
    );

    await page
      .locator(`${LINKEDIN_SELECTORS.FEED.POST_CONTAINER}, ${LINKEDIN_SELECTORS.FEED.EMPTY_STATE}`)
      .first()
      .waitFor({ state: "attached", timeout })
      .catch((error: unknown) => {
        this.options.log.log("debug", "feed markers did not appear before timeout", {
          url: page.url(),
          reason: error instanceof Error ? error.message : String(error),
        });
      });

    const verdict = classifyLanding({
      url: page.url(),
      status: response ? response.status() : null,
      loginMarkers: await page.locator(LINKEDIN_SELECTORS.AUTH.LOGIN_FORM).count(),
      unavailableMarkers: await page.locator(LINKEDIN_SELECTORS.UNAVAILABLE.MARKERS).count(),
    });

    if (verdict.kind === "session_invalid") {
      throw new SessionError(`LinkedIn session is not authenticated: ${verdict.reason}`, "SESSION_INVALID", page.url());
    }
    if (verdict.kind === "unreachable") {
      throw new SessionError(`Profile ${profile.handle} is not reachable: ${verdict.reason}`, "PROFILE_UNREACHABLE", page.url());
    }
  }

  /** The button can detach between the visibility check and the click; that only means there is nothing to click. */
  private async clickShowMore(page: FeedPage): Promise<void> {
    const showMore = page.locator(LINKEDIN_SELECTORS.FEED.SHOW_MORE_BUTTON).first();
    if (!(await showMore.isVisible())) return;

    try {
      await showMore.click({ timeout: SHOW_MORE_CLICK_TIMEOUT_MS });
    } catch (error) {
      this.options.log.log("debug", "show more button click failed", {
        reason: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private async measureFeed(page: FeedPage): Promise<{ posts: number; height: number }> {
    const posts = await page.locator(LINKEDIN_SELECTORS.FEED.POST_CONTAINER).count();
    const height = await page.evaluate("document.documentElement.scrollHeight");
    return { posts, height: typeof height === "number" ? height : 0 };
  }

  private assertStillAuthenticated(page: FeedPage): void {
    const block = detectBlockChallenge(page.url());
    if (block.isBlocked) {
      throw new SessionError(`Session was redirected mid-run: ${block.reason}`, "SESSION_INVALID", page.url());
    }
  }

  private livePage(session: LinkedInSession): FeedPage {
    const page = session.handle.page;
    if (page.isClosed()) {
      throw new SessionError("Browser page was closed", "PAGE_CLOSED", session.profile.activityUrl);
    }
    return page;
  }

  private toSessionError(error: unknown, page: FeedPage, stage: string): SessionError {
    if (error instanceof SessionError) return error;
    if (error instanceof errors.TimeoutError) {
      return new SessionError(`Timed out during ${stage}: ${error.message}`, "NAVIGATION_TIMEOUT", page.url());
    }
    const reason = error instanceof Error ? error.message : String(error);
    return new SessionError(`Browser failed during ${stage}: ${reason}`, "PAGE_CLOSED", page.isClosed() ? undefined : page.url());
  }
}
