#!/usr/bin/env node

import { Command, Option } from "commander";
import { initLogger, logger } from "./logging";
import { toExitCode } from "./errors";
import { collectValues, executeCommand, parseInteger, setupInterruptHandler } from "./cli-utils";
import { compileCommand } from "./commands/compile";
import { scssCommand } from "./commands/scss";
import { DEFAULT_CONFIG_FILE, resolveCwd } from "./fs/paths";
import { EncodingSchema, SassFormatSchema } from "./schemas";

const ENCODINGS = EncodingSchema.options;
const SASS_FORMATS = SassFormatSchema.options;

export const program = new Command();

program
  .name("assetwright")
  .description(
    "Compile style sheets, scripts and templates into content-addressed assets",
  )
  .version("0.1.0")
  .option("-v, --verbose", "Enable verbose output")
  .option("-q, --quiet", "Suppress non-essential output")
  .option("--debug", "Output structured JSON logs (ndjson format)")
  .option("--no-color", "Disable colored output")
  .option("--dry-run", "Report what would change without writing files")
  .addOption(new Option("--test-run", "Alias of --dry-run").hideHelp())
  .option("--cwd <path>", "Override the working directory");

program
  .command("compile", { isDefault: true })
  .description("Compile the files listed in a configuration file")
  .option("-c, --config <path>", "Configuration file", DEFAULT_CONFIG_FILE)
  .addOption(
    new Option("--sass-format <format>", "Output style for style sheets").choices(SASS_FORMATS),
  )
  .option("--sass-sourcemap", "Write a source map beside each style sheet")
  .addOption(new Option("--sass-encoding <encoding>", "Style sheet encoding").choices(ENCODINGS))
  .option("--js-comments", "Keep /*! legal comments in scripts")
  .addOption(new Option("--js-encoding <encoding>", "Script encoding").choices(ENCODINGS))
  .addOption(
    new Option("--template-encoding <encoding>", "Template encoding").choices(ENCODINGS),
  )
  .option("--git-add", "Stage newly created files (default)")
  .option("--no-git-add", "Do not stage newly created files")
  .option("--continue-on-error", "Keep compiling after a failure")
  .option("--exit-code <n>", "Exit status when files changed (default: 3)", parseInteger)
  .action(async (options, cmd) => {
    const globalOpts = cmd.optsWithGlobals();
    const cwd = resolveCwd(globalOpts.cwd);
    const dryRun = globalOpts.dryRun || globalOpts.testRun ? true : undefined;
    await executeCommand(
      () =>
        compileCommand(
          {
            config: options.config,
            cwd,
            sassFormat: options.sassFormat,
            sassSourcemap: options.sassSourcemap,
            sassEncoding: options.sassEncoding,
            jsComments: options.jsComments,
            jsEncoding: options.jsEncoding,
            templateEncoding: options.templateEncoding,
            gitAdd: options.gitAdd,
            continueOnError: options.continueOnError,
            exitCode: options.exitCode,
            dryRun,
            quiet: globalOpts.quiet,
            verbose: globalOpts.verbose,
            noColor: globalOpts.color === false,
          },
          logger,
        ),
      logger,
      {
        verbose: globalOpts.verbose,
        quiet: globalOpts.quiet,
        dryRun,
        cwd,
      },
    );
  });

program
  .command("scss")
  .description("Compile style sheets in place, following partials to their importers")
  .argument("[paths...]", "Files or directories to compile")
  .option("-c, --config <path>", "Read defaults from the file's scss section")
  .option("--recurse", "Search directories recursively (default)")
  .option("--no-recurse", "Only search the top level of each directory")
  .option(
    "-d, --partial-depth <n>",
    "Ancestor directories searched for importers of a partial (default: 0)",
    parseInteger,
  )
  .option("-s, --stop-on-error", "Stop at the first failure")
  .addOption(new Option("-e, --encoding <encoding>", "Input and output encoding").choices(ENCODINGS))
  .addOption(
    new Option("-f, --output-format <format>", "Output style (default: compressed)").choices(
      SASS_FORMATS,
    ),
  )
  .option("-m, --sourcemap", "Write a source map beside each output")
  .option("--hash-filenames", "Name outputs <stem>#<hash>.css")
  .option(
    "-t, --translate <src:dest>",
    "Write outputs for inputs under src to dest (repeatable)",
    collectValues,
  )
  .option("--git-add", "Stage newly created files (default)")
  .option("--no-git-add", "Do not stage newly created files")
  .option("--exit-code <n>", "Exit status when files changed (default: 2)", parseInteger)
  .action(async (paths: string[], options, cmd) => {
    const globalOpts = cmd.optsWithGlobals();
    const cwd = resolveCwd(globalOpts.cwd);
    const dryRun = Boolean(globalOpts.dryRun || globalOpts.testRun);
    await executeCommand(
      () =>
        scssCommand(
          {
            paths,
            config: options.config,
            cwd,
            dryRun,
            recurse: options.recurse,
            partialDepth: options.partialDepth,
            stopOnError: options.stopOnError,
            encoding: options.encoding,
            format: options.outputFormat,
            sourcemap: options.sourcemap,
            hashFilenames: options.hashFilenames,
            translate: options.translate,
            gitAdd: options.gitAdd,
            exitCode: options.exitCode,
          },
          logger,
        ),
      logger,
      {
        verbose: globalOpts.verbose,
        quiet: globalOpts.quiet,
        dryRun,
        cwd,
      },
    );
  });

export async function main(argv: string[] = process.argv): Promise<void> {
  setupInterruptHandler(logger);

  process.on("unhandledRejection", (reason) => {
    const msg = reason instanceof Error ? reason.message : String(reason);
    logger.error(`[FATAL] Unhandled Rejection: ${msg}`);
    process.exit(1);
  });

  program.hook("preAction", (thisCommand) => {
    const opts = thisCommand.opts();
    initLogger({
      verbose: opts.verbose,
      quiet: opts.quiet,
      debug: opts.debug,
      noColor: opts.color === false,
    });
  });

  try {
    await program.parseAsync(argv);
  } catch (error) {
    logger.error(error instanceof Error ? error.message : String(error));
    process.exit(toExitCode(error));
  }
}

if (require.main === module) {
  void main();
}
