import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import path from "path";
import {
  hasLinkedInAuthCookie,
  loadStorageState,
  parseStorageState,
} from "../../src/services/playwright-session-state";
import { SessionError } from "../../src/core/errors";

const NOW = 1_714_564_800;

function stateJson(cookies: Array<Record<string, unknown>>): string {
  return JSON.stringify({ cookies, origins: [] });
}

describe("parseStorageState", () => {
  it("should fill cookie defaults", () => {
    const state = parseStorageState(stateJson([{ name: "li_at", value: "test-secret", domain: ".www.linkedin.com" }]));

    expect(state.cookies[0]).toEqual({
      name: "li_at",
      value: "test-secret",
      domain: ".www.linkedin.com",
      path: "/",
      expires: -1,
      httpOnly: false,
      secure: false,
      sameSite: "Lax",
    });
  });
});

describe("hasLinkedInAuthCookie", () => {
  it("should accept a live session cookie", () => {
    const state = parseStorageState(
      stateJson([{ name: "li_at", value: "test-secret", domain: ".www.linkedin.com", expires: NOW + 3600 }])
    );
    expect(hasLinkedInAuthCookie(state, NOW)).toBe(true);
  });

  it("should reject expired, empty or foreign cookies", () => {
    const expired = parseStorageState(
      stateJson([{ name: "li_at", value: "test-secret", domain: ".www.linkedin.com", expires: NOW - 1 }])
    );
    const empty = parseStorageState(stateJson([{ name: "li_at", value: "", domain: ".www.linkedin.com" }]));
    const foreign = parseStorageState(stateJson([{ name: "li_at", value: "test-secret", domain: ".example.com" }]));

    expect(hasLinkedInAuthCookie(expired, NOW)).toBe(false);
    expect(hasLinkedInAuthCookie(empty, NOW)).toBe(false);
    expect(hasLinkedInAuthCookie(foreign, NOW)).toBe(false);
  });
});

describe("loadStorageState", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "session-state-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("should load a state with a session cookie", async () => {
    const file = path.join(dir, "linkedin.json");
    await writeFile(file, stateJson([{ name: "li_at", value: "test-secret", domain: ".www.linkedin.com" }]), "utf8");

    const state = await loadStorageState(file);
    expect(state.cookies).toHaveLength(1);
  });

  it.each([
    ["a missing file", null],
    ["invalid JSON", "{"],
    ["no session cookie", stateJson([{ name: "JSESSIONID", value: "test-secret", domain: ".www.linkedin.com" }])],
  ])("should raise SESSION_INVALID for %s", async (_label, content) => {
    const file = path.join(dir, "linkedin.json");
    if (content !== null) await writeFile(file, content, "utf8");

    await expect(loadStorageState(file)).rejects.toBeInstanceOf(SessionError);
    await expect(loadStorageState(file)).rejects.toMatchObject({ code: "SESSION_INVALID" });
  });
});
