import { Command } from "commander";
import ora from "ora";
import chalk from "chalk";
import fs from "fs/promises";
import path from "path";
import { DraftFormatSchema } from "../types/config.js";
import type { Config, DraftFormat } from "../types/config.js";
import { ConfigManager } from "../managers/config.js";
import { checkDraft } from "../utils/draft.js";
import { enableDebug } from "../utils/debug.js";

export interface CheckOptions {
  files: string[];
  format?: DraftFormat; // used when the file extension does not say
}

export function draftFormatFor(
  filePath: string,
  fallback: DraftFormat
): DraftFormat {
  switch (path.extname(filePath).toLowerCase()) {
    case ".json":
      return "json";
    case ".yaml":
    case ".yml":
      return "yaml";
    default:
      return fallback;
  }
}

/**
 * Checks each draft in turn and resolves to the number that would not
 * build (unreadable, malformed or incomplete).
 */
export async function executeCheck(
  options: CheckOptions,
  config: Config
): Promise<number> {
  const fallback = options.format ?? config.drafts.format;
  let failures = 0;

  for (const file of options.files) {
    const spinner = ora(`Checking ${file}`).start();
    try {
      const content = await fs.readFile(file, "utf-8");
      const report = checkDraft(content, draftFormatFor(file, fallback));

      if (report.ok) {
        spinner.succeed(
          `${file}: ${report.recipe.name} (${report.recipe.id})`
        );
      } else {
        failures++;
        spinner.fail(`${file}: missing ${report.missing.join(", ")}`);
      }
    } catch (error) {
      failures++;
      spinner.fail(
        `${file}: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }

  const summary = `${options.files.length - failures}/${options.files.length} drafts complete`;
  console.log(failures === 0 ? chalk.green(summary) : chalk.yellow(summary));
  return failures;
}

export function registerCheckCommand(program: Command): void {
  program
    .command("check <files...>")
    .description("Check that recipe drafts hold every required field")
    .option(
      "-f, --format <format>",
      "Draft format when the extension does not say (json|yaml)"
    )
    .action(async (files: string[], cmdOptions: { format?: string }) => {
      try {
        const config = await ConfigManager.load();
        enableDebug(config.debug);
        const format =
          cmdOptions.format === undefined
            ? undefined
            : DraftFormatSchema.parse(cmdOptions.format);

        const failures = await executeCheck({ files, format }, config);
        if (failures > 0) process.exit(1);
      } catch (error) {
        console.error(
          chalk.red("Error:"),
          error instanceof Error ? error.message : error
        );
        process.exit(1);
      }
    });
}
