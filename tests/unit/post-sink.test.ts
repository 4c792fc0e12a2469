import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, mkdir, readFile, readdir, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import path from "path";
import {
  PostSink,
  destinationFor,
  ensureDataDir,
  readStoredPosts,
  serializePostsFile,
} from "../../src/services/post-sink";
import { parseProfileReference } from "../../src/domain/profile-reference";
import { ConfigError, PersistenceError } from "../../src/core/errors";
import { computeDigest } from "../../src/core/hash";
import { record } from "../helpers/records";

const profile = parseProfileReference("jane-doe");
const contract = "test-contract@1";

describe("PostSink", () => {
  let dataDir: string;

  beforeEach(async () => {
    dataDir = await mkdtemp(path.join(tmpdir(), "post-sink-"));
  });

  afterEach(async () => {
    await rm(dataDir, { recursive: true, force: true });
  });

  it("should write the profile-scoped file with a stable encoding", async () => {
    const sink = new PostSink({ dataDir, writeMode: "replace", contract });
    const posts = [record("a"), record("b", { postedAt: null, mediaRefs: ["https://media.licdn.com/b.jpg"] })];

    const result = await sink.write(posts, profile);
    const content = await readFile(result.destination, "utf8");

    expect(result.destination).toBe(path.join(dataDir, "jane-doe.posts.json"));
    expect(result.count).toBe(2);
    expect(content).toBe(serializePostsFile(profile, posts, contract));
    expect(content.endsWith("}\n")).toBe(true);
    expect(content.split("\n")[1]).toBe('  "schemaVersion": 1,');
    expect(result.digest).toBe(computeDigest(content));
    expect(JSON.parse(content)).toEqual({ schemaVersion: 1, contract, profile, posts });
  });

  it("should produce byte-identical files for the same set", async () => {
    const sink = new PostSink({ dataDir, writeMode: "replace", contract });
    const posts = [record("a"), record("b")];

    const first = await sink.write(posts, profile);
    const firstContent = await readFile(first.destination);
    const second = await sink.write(posts, profile);
    const secondContent = await readFile(second.destination);

    expect(secondContent.equals(firstContent)).toBe(true);
    expect(second.digest).toBe(first.digest);
    expect(await readdir(dataDir)).toEqual(["jane-doe.posts.json"]);
  });

  it("should replace earlier content in replace mode", async () => {
    const sink = new PostSink({ dataDir, writeMode: "replace", contract });
    await sink.write([record("a"), record("b")], profile);

    await sink.write([record("c")], profile);

    const stored = await readStoredPosts(destinationFor(dataDir, profile));
    expect(stored?.posts.map((p) => p.postId)).toEqual(["c"]);
  });

  it("should merge with stored history in merge mode", async () => {
    await new PostSink({ dataDir, writeMode: "replace", contract }).write(
      [record("a"), record("b", { postedAt: null })],
      profile
    );

    const result = await new PostSink({ dataDir, writeMode: "merge", contract }).write(
      [record("c"), record("b", { text: "Changed", postedAt: "2d" })],
      profile
    );

    const stored = await readStoredPosts(result.destination);
    expect(result.count).toBe(3);
    expect(stored?.posts.map((p) => [p.postId, p.text, p.postedAt])).toEqual([
      ["c", "Text of c", "2024-04-28T09:30:00.000Z"],
      ["b", "Text of b", "2d"],
      ["a", "Text of a", "2024-04-28T09:30:00.000Z"],
    ]);
  });

  it("should refuse to merge into an invalid history file and leave it untouched", async () => {
    const destination = destinationFor(dataDir, profile);
    await writeFile(destination, "{not json", "utf8");
    const sink = new PostSink({ dataDir, writeMode: "merge", contract });

    await expect(sink.write([record("a")], profile)).rejects.toMatchObject({
      name: "PersistenceError",
      code: "HISTORY_INVALID",
      destination,
    });
    expect(await readFile(destination, "utf8")).toBe("{not json");
  });

  it("should remove the temporary file when the rename fails", async () => {
    await mkdir(destinationFor(dataDir, profile));
    const sink = new PostSink({ dataDir, writeMode: "replace", contract });

    const failure = sink.write([record("a")], profile);

    await expect(failure).rejects.toBeInstanceOf(PersistenceError);
    await expect(failure).rejects.toMatchObject({ code: "RENAME_FAILED" });
    expect(await readdir(dataDir)).toEqual(["jane-doe.posts.json"]);
  });
});

describe("readStoredPosts", () => {
  it("should return null when nothing was stored yet", async () => {
    const dir = await mkdtemp(path.join(tmpdir(), "post-sink-"));
    try {
      expect(await readStoredPosts(path.join(dir, "missing.posts.json"))).toBeNull();
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});

describe("ensureDataDir", () => {
  it("should create nested directories", async () => {
    const root = await mkdtemp(path.join(tmpdir(), "post-sink-"));
    try {
      const resolved = await ensureDataDir(path.join(root, "nested", "posts"));
      expect(resolved).toBe(path.join(root, "nested", "posts"));
      expect(await readdir(path.join(root, "nested"))).toEqual(["posts"]);
    } finally {
      await rm(root, { recursive: true, force: true });
    }
  });

  it("should raise a ConfigError when a file is in the way", async () => {
    const root = await mkdtemp(path.join(tmpdir(), "post-sink-"));
    try {
      await writeFile(path.join(root, "blocked"), "", "utf8");
      await expect(ensureDataDir(path.join(root, "blocked", "posts"))).rejects.toBeInstanceOf(ConfigError);
    } finally {
      await rm(root, { recursive: true, force: true });
    }
  });
});
