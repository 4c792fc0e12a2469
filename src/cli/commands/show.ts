import type { Command } from "commander";
import { env } from "../../core/config";
import { logger } from "../../core/logger";
import { describeError, exitCodeForError } from "../../core/errors";
import { parseProfileReference } from "../../domain/profile-reference";
import { resolveDataDir } from "../../domain/run-options";
import { destinationFor, readStoredPosts } from "../../services/post-sink";

const PREVIEW_LENGTH = 80;

function preview(text: string): string {
  const line = text.replace(/\s+/g, " ").trim();
  if (line.length === 0) return "(no text)";
  return line.length > PREVIEW_LENGTH ? `${line.slice(0, PREVIEW_LENGTH - 1)}…` : line;
}

export const commands = (program: Command) => {
  program
    .command("show")
    .description("Summarize the posts stored for a profile")
    .argument("<profile>", "Profile handle, @handle, or linkedin.com/in/ URL")
    .option("--data-dir <path>", "Directory holding the posts file")
    .action(async (input: string, flags: { dataDir?: string }) => {
      try {
        const dataDir = resolveDataDir(flags.dataDir, env);
        const profile = parseProfileReference(input);
        const destination = destinationFor(dataDir, profile);

        const stored = await readStoredPosts(destination);
        if (!stored) {
          console.log(`No posts stored for ${profile.handle} (${destination})`);
          return;
        }

        console.log(`${stored.profile.handle}: ${stored.posts.length} posts (${stored.contract})`);
        for (const post of stored.posts) {
          const media = post.mediaRefs.length > 0 ? ` [${post.mediaRefs.length} media]` : "";
          console.log(`  ${post.postId} ${post.postedAt ?? "-"} ${preview(post.text)}${media}`);
        }
      } catch (error) {
        logger.error(describeError(error));
        process.exitCode = exitCodeForError(error);
      }
    });
};
