import { access, mkdir, readFile, rename, rm, writeFile } from "fs/promises";
import { constants } from "fs";
import path from "path";
import { logger } from "../core/logger";
import { computeDigest } from "../core/hash";
import { ConfigError, PersistenceError } from "../core/errors";
import {
  STORED_SCHEMA_VERSION,
  StoredPostsFileSchema,
  type PostRecord,
  type ProfileReference,
  type StoredPostsFile,
  type WriteMode,
} from "../domain/models";
import { mergeWithHistory } from "../domain/post-merge";

export interface PostSinkOptions {
  dataDir: string;
  writeMode: WriteMode;
  /** Identifier of the markup rules that produced the records. */
  contract: string;
}

export interface SinkWriteResult {
  destination: string;
  count: number;
  bytes: number;
  digest: string;
}

export function destinationFor(dataDir: string, profile: ProfileReference): string {
  return path.join(dataDir, `${profile.handle}.posts.json`);
}

/**
 * Creates the data directory if needed and checks it is writable. Runs before
 * any browser work, so failures are configuration problems.
 */
export async function ensureDataDir(dataDir: string): Promise<string> {
  const resolved = path.resolve(dataDir);
  try {
    await mkdir(resolved, { recursive: true });
    await access(resolved, constants.W_OK);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Data directory ${resolved} is not usable: ${reason}`);
  }
  return resolved;
}

/**
 * Stable encoding: fixed key order, two-space indent, trailing newline and
 * nothing time-dependent beyond what the records carry.
 */
export function serializePostsFile(profile: ProfileReference, posts: readonly PostRecord[], contract: string): string {
  const file: StoredPostsFile = {
    schemaVersion: STORED_SCHEMA_VERSION,
    contract,
    profile: {
      handle: profile.handle,
      profileUrl: profile.profileUrl,
      activityUrl: profile.activityUrl,
    },
    posts: posts.map((post) => ({
      postId: post.postId,
      idSource: post.idSource,
      author: post.author,
      text: post.text,
      postedAt: post.postedAt,
      mediaRefs: [...post.mediaRefs],
      extractedAt: post.extractedAt,
    })),
  };

  return `${JSON.stringify(file, null, 2)}\n`;
}

export async function readStoredPosts(destination: string): Promise<StoredPostsFile | null> {
  let raw: string;
  try {
    raw = await readFile(destination, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") return null;
    const reason = error instanceof Error ? error.message : String(error);
    throw new PersistenceError(`Stored posts could not be read: ${reason}`, "READ_FAILED", destination);
  }

  try {
    return StoredPostsFileSchema.parse(JSON.parse(raw));
  } catch (error) {
    const reason = error instanceof Error ? error.message : "invalid content";
    throw new PersistenceError(`Stored posts file is not valid: ${reason}`, "HISTORY_INVALID", destination);
  }
}

async function removeTempFile(tmpPath: string): Promise<void> {
  await rm(tmpPath, { force: true }).catch((error: unknown) => {
    logger.warn({ tmpPath, error }, "Failed to remove temporary file");
  });
}

/**
 * Writes next to the destination and renames into place, so readers see the
 * old file or the new one and never a partial write.
 */
export async function writeFileAtomic(destination: string, content: string): Promise<void> {
  const dir = path.dirname(destination);
  const tmpPath = path.join(dir, `.${path.basename(destination)}.${process.pid}.${Date.now()}.tmp`);

  try {
    await writeFile(tmpPath, content, "utf8");
  } catch (error) {
    await removeTempFile(tmpPath);
    const reason = error instanceof Error ? error.message : String(error);
    throw new PersistenceError(`Temporary file could not be written: ${reason}`, "WRITE_FAILED", destination);
  }

  try {
    await rename(tmpPath, destination);
  } catch (error) {
    await removeTempFile(tmpPath);
    const reason = error instanceof Error ? error.message : String(error);
    throw new PersistenceError(`Temporary file could not be moved into place: ${reason}`, "RENAME_FAILED", destination);
  }
}

export class PostSink {
  constructor(private readonly options: PostSinkOptions) {}

  destinationFor(profile: ProfileReference): string {
    return destinationFor(this.options.dataDir, profile);
  }

  async write(posts: readonly PostRecord[], profile: ProfileReference): Promise<SinkWriteResult> {
    const destination = this.destinationFor(profile);

    let toWrite: readonly PostRecord[] = posts;
    if (this.options.writeMode === "merge") {
      const history = await readStoredPosts(destination);
      if (history) {
        toWrite = mergeWithHistory(posts, history.posts);
        logger.debug(
          { destination, current: posts.length, historical: history.posts.length, merged: toWrite.length },
          "Merged collected posts with stored history"
        );
      }
    }

    const content = serializePostsFile(profile, toWrite, this.options.contract);
    await writeFileAtomic(destination, content);

    return {
      destination,
      count: toWrite.length,
      bytes: Buffer.byteLength(content, "utf8"),
      digest: computeDigest(content),
    };
  }
}
