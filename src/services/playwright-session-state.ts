import { readFile } from "fs/promises";
import { z } from "zod";
import { SessionError } from "../core/errors";

const CookieSchema = z.object({
  name: z.string(),
  value: z.string(),
  domain: z.string(),
  path: z.string().default("/"),
  expires: z.number().default(-1),
  httpOnly: z.boolean().default(false),
  secure: z.boolean().default(false),
  sameSite: z.enum(["Strict", "Lax", "None"]).default("Lax"),
});

const OriginSchema = z.object({
  origin: z.string(),
  localStorage: z
    .array(
      z.object({
        name: z.string(),
        value: z.string(),
      })
    )
    .default([]),
});

export const StorageStateSchema = z.object({
  cookies: z.array(CookieSchema).default([]),
  origins: z.array(OriginSchema).default([]),
});

export type StorageState = z.infer<typeof StorageStateSchema>;

export const LINKEDIN_AUTH_COOKIE = "li_at";

export function parseStorageState(json: string): StorageState {
  const parsed: unknown = JSON.parse(json);
  return StorageStateSchema.parse(parsed);
}

export function hasLinkedInAuthCookie(state: StorageState, nowSeconds = Date.now() / 1000): boolean {
  return state.cookies.some(
    (c) =>
      c.name === LINKEDIN_AUTH_COOKIE &&
      c.domain.includes("linkedin.com") &&
      c.value.length > 0 &&
      (c.expires <= 0 || c.expires > nowSeconds)
  );
}

/**
 * Loads the exported browser session. The file is produced outside this tool
 * (any Playwright `storageState` export of a logged-in LinkedIn session).
 */
export async function loadStorageState(path: string): Promise<StorageState> {
  let json: string;
  try {
    json = await readFile(path, "utf8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new SessionError(`Session state could not be read from ${path}: ${reason}`, "SESSION_INVALID");
  }

  let state: StorageState;
  try {
    state = parseStorageState(json);
  } catch (error) {
    const reason = error instanceof Error ? error.message : "invalid JSON";
    throw new SessionError(`Session state at ${path} is not a valid storage state: ${reason}`, "SESSION_INVALID");
  }

  if (!hasLinkedInAuthCookie(state)) {
    throw new SessionError(`Session state at ${path} has no live ${LINKEDIN_AUTH_COOKIE} cookie`, "SESSION_INVALID");
  }

  return state;
}
