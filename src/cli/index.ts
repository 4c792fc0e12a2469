#!/usr/bin/env node
import { Command } from "commander";
import { commands as extractCommands } from "./commands/extract";
import { commands as showCommands } from "./commands/show";

const program = new Command();

program
  .name("profile-feed-extractor")
  .description("Extract recent posts from a LinkedIn profile's activity feed")
  .version("0.1.0");

extractCommands(program);
showCommands(program);

program.parseAsync().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
