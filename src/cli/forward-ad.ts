#!/usr/bin/env tsx
/**
 * forward-ad CLI - evaluate derivatives of sample functions and run gradient
 * descent on sample objectives.
 *
 * Built with Yargs + Zod: yargs parses the command line, zod validates it.
 */

import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { ExitCode, toCliError } from "./cli-error";
import { runDerive, runList, runMinimize } from "./commands";
import { deriveSchema, minimizeSchema, parseArgs } from "./options";

const terminalWidth = typeof process.stdout.columns === "number" ? process.stdout.columns : 120;

function print(lines: string[]): void {
  for (const line of lines) console.log(line);
}

yargs(hideBin(process.argv))
  .scriptName("forward-ad")
  .usage("$0 <command> [options]")
  .strict()
  .demandCommand(1, "Specify a command.")
  .command(
    "list",
    "List the sample functions and objectives.",
    cmd => cmd,
    () => print(runList())
  )
  .command(
    "derive",
    "Evaluate a sample function and its derivative at a point.",
    cmd => cmd
      .option("fn", { type: "string", demandOption: true, describe: "Sample function name (see list)." })
      .option("at", { type: "number", demandOption: true, describe: "Point of evaluation." }),
    argv => print(runDerive(parseArgs(deriveSchema, argv)))
  )
  .command(
    "minimize",
    "Run gradient descent on a sample objective.",
    cmd => cmd
      .option("fn", { type: "string", demandOption: true, describe: "Sample objective name (see list)." })
      .option("start", { type: "string", demandOption: true, describe: "Starting point, e.g. --start=3,-4" })
      .option("learning-rate", { type: "number", default: 0.25, describe: "Step size." })
      .option("tolerance", { type: "number", default: 1e-5, describe: "Largest allowed |partial derivative| at the minimum." })
      .option("max-iterations", { type: "number", default: 10000, describe: "Iteration cap." })
      .option("verbose", { type: "boolean", default: false, describe: "Print every iteration." }),
    argv => print(runMinimize(parseArgs(minimizeSchema, argv)))
  )
  .fail((msg, err, instance) => {
    const cliError = toCliError(err);
    if (cliError) {
      console.error(cliError.message);
      process.exit(cliError.exitCode);
    }
    if (msg) {
      console.error(msg);
    }
    if (err) {
      console.error(err.message);
    }
    console.log(instance.help());
    process.exit(ExitCode.usage);
  })
  .help()
  .wrap(Math.min(terminalWidth, 120))
  .parseSync();
