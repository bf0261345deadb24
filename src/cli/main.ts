// src/cli/main.ts

import { Command } from "commander";
import { runOnce } from "../core/runner";
import { getTemplatesDir, listTemplates } from "../core/templates";
import { defaultLogger, type Logger } from "../util/logger";
import { cliLogLevel } from "./log-level";
import { askYesNo } from "./prompt";

interface CliOptions {
  output: string;
  dry?: boolean;
  from?: string;
  template?: string;
  default?: string;
  listTemplates?: boolean;
  quiet?: boolean;
  debug?: boolean;
}

/**
 * Create a logger with the appropriate level from CLI flags.
 */
function createCliLogger(opts: { quiet?: boolean; debug?: boolean }): Logger {
  const level = cliLogLevel(opts);
  if (level) {
    defaultLogger.setLevel(level);
  }
  return defaultLogger.child("[cli]");
}

function handleListTemplates(logger: Logger) {
  const names = listTemplates();
  if (!names.length) {
    logger.info(`No templates found in ${getTemplatesDir()}`);
    return;
  }
  process.stdout.write(names.join("\n") + "\n");
}

async function handleRunCommand(cwd: string, paths: string[], opts: CliOptions) {
  const logger = createCliLogger(opts);

  if (opts.listTemplates) {
    handleListTemplates(logger);
    return;
  }

  logger.debug(
    `Starting treegen (cwd=${cwd}, output=${opts.output}, dry=${opts.dry ? "yes" : "no"})`,
  );

  await runOnce({
    cwd,
    output: opts.output,
    dry: opts.dry,
    template: opts.template,
    from: opts.from,
    defaultLang: opts.default,
    tokens: paths,
    confirm: (question) => askYesNo(question),
    logger,
  });
}

async function main() {
  const cwd = process.cwd();

  const program = new Command();

  program
    .name("treegen")
    .description("Generate directory and file structures easily")
    .version("0.1.0")
    .argument(
      "[paths...]",
      'Path tokens; ":" starts a new group, ".." goes up one directory',
    )
    .option("-o, --output <dir>", "Base output directory", ".")
    .option("--dry", "Preview the tree and ask before creating it")
    .option("--from <file>", "Load the structure from a text file")
    .option("--template <name>", "Load the structure from a saved template")
    .option("--default <lang>", "Use the built-in structure for a language (py, rs, web)")
    .option("--list-templates", "List saved templates and exit")
    .option("--quiet", "Only log errors")
    .option("--debug", "Enable debug logging")
    .action(async (paths: string[], opts: CliOptions) => {
      await handleRunCommand(cwd, paths, opts);
    });

  await program.parseAsync(process.argv);
}

// Run and handle errors
main().catch((err) => {
  defaultLogger.error(err);
  process.exit(1);
});
