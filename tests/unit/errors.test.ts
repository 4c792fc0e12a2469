import { describe, it, expect } from "vitest";
import {
  ConfigError,
  EXIT_CODES,
  PersistenceError,
  SessionError,
  describeError,
  exitCodeForError,
} from "../../src/core/errors";

describe("errors", () => {
  it("should map each error kind to its exit code", () => {
    expect(exitCodeForError(new ConfigError("bad"))).toBe(EXIT_CODES.CONFIG);
    expect(exitCodeForError(new SessionError("expired", "SESSION_INVALID"))).toBe(EXIT_CODES.SESSION);
    expect(exitCodeForError(new PersistenceError("disk", "WRITE_FAILED", "/tmp/x.json"))).toBe(EXIT_CODES.PERSISTENCE);
    expect(exitCodeForError(new Error("boom"))).toBe(EXIT_CODES.UNEXPECTED);
  });

  it("should only retry navigation timeouts", () => {
    expect(new SessionError("slow", "NAVIGATION_TIMEOUT").retryable).toBe(true);
    expect(new SessionError("wall", "SESSION_INVALID").retryable).toBe(false);
  });

  it("should describe errors on a single line", () => {
    expect(describeError(new PersistenceError("rename failed", "RENAME_FAILED", "/data/a.posts.json"))).toBe(
      "PersistenceError [RENAME_FAILED] rename failed (destination: /data/a.posts.json)"
    );
    expect(describeError(new SessionError("login wall", "SESSION_INVALID", "https://www.linkedin.com/authwall"))).toBe(
      "SessionError [SESSION_INVALID] login wall (url: https://www.linkedin.com/authwall)"
    );
    expect(describeError(new ConfigError("no data dir"))).toBe("ConfigError: no data dir");
    expect(describeError("plain")).toBe("plain");
  });
});
