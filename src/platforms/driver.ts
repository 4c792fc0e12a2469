import type { ProfileReference, RawSnapshot } from "../domain/models";
import type { ScrollOptions } from "../domain/scrape-types";

/**
 * Browser primitives the pipeline needs from a platform. Every method that
 * touches the page is bounded by the driver's own timeouts.
 */
export interface RenderDriver<S> {
  readonly platform: string;

  /** Throws SessionError when the session is invalid or the profile cannot be reached. */
  open(profile: ProfileReference): Promise<S>;

  /** Resolves true when the feed grew (more posts or a taller document). */
  scrollToLoadMore(session: S, options: ScrollOptions): Promise<boolean>;

  captureSnapshot(session: S, scroll: number): Promise<RawSnapshot>;

  close(session: S): Promise<void>;
}

export async function withSession<S, T>(
  driver: RenderDriver<S>,
  profile: ProfileReference,
  fn: (session: S) => Promise<T>
): Promise<T> {
  const session = await driver.open(profile);
  try {
    return await fn(session);
  } finally {
    await driver.close(session);
  }
}
