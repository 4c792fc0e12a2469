import type { Command } from "commander";
import { env } from "../../core/config";
import { createLifecycleLog, logger } from "../../core/logger";
import { describeError, EXIT_CODES, exitCodeForError } from "../../core/errors";
import { parseProfileReference } from "../../domain/profile-reference";
import { resolveRunOptions, type RunOptionsInput } from "../../domain/run-options";
import { LinkedInRenderDriver } from "../../platforms/linkedin/render-driver";
import { EXTRACTION_CONTRACT } from "../../platforms/linkedin/selectors";
import { ProfileExtractionRunner } from "../../orchestration/profile-extraction-runner";

export interface ExtractFlags {
  count?: string;
  maxScrolls?: string;
  settleMs?: string;
  stallThreshold?: string;
  dataDir?: string;
  merge?: boolean;
  writeMode?: string;
}

/** `--write-mode` wins over `--merge`; both win over WRITE_MODE. */
export function runOptionsFromFlags(flags: ExtractFlags): RunOptionsInput {
  return {
    postCount: flags.count,
    maxScrollAttempts: flags.maxScrolls,
    settleDelayMs: flags.settleMs,
    stallThreshold: flags.stallThreshold,
    dataDir: flags.dataDir,
    writeMode: flags.writeMode ?? (flags.merge ? "merge" : undefined),
  };
}

function abortOnSignals(): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals) => {
    if (controller.signal.aborted) {
      logger.warn({ signal }, "Second interrupt received, exiting immediately");
      process.exit(EXIT_CODES.CANCELLED);
    }
    logger.warn({ signal }, "Cancellation requested, finishing current step");
    controller.abort();
  };

  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  return {
    signal: controller.signal,
    dispose: () => {
      process.off("SIGINT", onSignal);
      process.off("SIGTERM", onSignal);
    },
  };
}

export const commands = (program: Command) => {
  program
    .command("extract")
    .description("Collect recent posts from a LinkedIn profile's activity feed")
    .argument("<profile>", "Profile handle, @handle, or linkedin.com/in/ URL")
    .option("--count <n>", "Number of posts to collect")
    .option("--max-scrolls <n>", "Maximum scroll attempts")
    .option("--settle-ms <ms>", "Delay after each scroll before capturing")
    .option("--stall-threshold <n>", "Consecutive non-growing scrolls before stopping")
    .option("--data-dir <path>", "Directory for the posts file")
    .option("--merge", "Merge with posts already stored for this profile")
    .option("--write-mode <mode>", "replace or merge; overrides --merge and WRITE_MODE")
    .action(async (input: string, flags: ExtractFlags) => {
      const { signal, dispose } = abortOnSignals();

      try {
        const options = resolveRunOptions(runOptionsFromFlags(flags), env);
        const profile = parseProfileReference(input);

        logger.info({ handle: profile.handle, ...options }, "Starting profile extraction");

        const driver = new LinkedInRenderDriver({
          navigationTimeoutMs: env.NAVIGATION_TIMEOUT_MS,
          navigationMaxAttempts: env.NAVIGATION_MAX_ATTEMPTS,
          sessionStatePath: env.LINKEDIN_SESSION_STATE_PATH,
          profileDir: env.LINKEDIN_PROFILE_DIR,
          log: createLifecycleLog({ component: "linkedin-driver", handle: profile.handle }),
        });
        const runner = new ProfileExtractionRunner(driver, { contract: EXTRACTION_CONTRACT });

        const result = await runner.run({ profile, options, signal });

        if (result.status === "failed") {
          logger.error({ runId: result.runId, flushed: result.flushed }, describeError(result.error));
          process.exitCode = exitCodeForError(result.error);
          return;
        }

        console.log(`${result.posts.length} posts written to ${result.destination}`);
        process.exitCode = result.partial ? EXIT_CODES.CANCELLED : EXIT_CODES.OK;
      } catch (error) {
        logger.error(describeError(error));
        process.exitCode = exitCodeForError(error);
      } finally {
        dispose();
      }
    });
};
