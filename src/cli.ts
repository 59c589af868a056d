#!/usr/bin/env node
import { Command } from "commander";
import { registerCheckCommand } from "./commands/check.js";

const program = new Command()
  .name("larder")
  .description("Check recipe drafts against the recipe model")
  .version("1.0.0");

registerCheckCommand(program);

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
