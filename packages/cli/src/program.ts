/**
 * pathtable command line program
 *
 * Every command prints JSON on stdout. Errors go to stderr and map to exit
 * codes (see lib/errors.ts).
 */

import { Command, CommanderError, type OutputConfiguration } from "commander";
import {
  loadConfig,
  openFromConfig,
  type Constraints,
  type DataRecord,
  type Logger,
  type PathTable,
} from "@pathtable/sdk";
import { parseConstraints, parseNonNegativeInt, parseRecords } from "./lib/arg.js";
import { isVerbose, resolveConfigPath, resolveRoot } from "./lib/env.js";
import { CliError, EXIT_NOT_FOUND, EXIT_OK, formatCliError, mapSdkErrorToExitCode } from "./lib/errors.js";
import { isStdinTTY, readStdin, readTextFile } from "./lib/io.js";
import { colorize, printJson } from "./lib/render.js";
import { cliEventSink, createCliLogger, withTiming } from "./lib/telemetry.js";

export const VERSION = "0.1.0";

type GlobalOptions = {
  config?: string;
  root?: string;
  verbose?: boolean;
  raw?: boolean;
};

interface InputOptions {
  data?: string;
  file?: string;
}

interface LockOptions {
  lock?: string;
  timeout?: number;
}

export interface ProgramOptions {
  /** Replaces commander's stdout/stderr writers */
  output?: OutputConfiguration;
}

/**
 * Read records from --data, --file or piped stdin
 */
async function readInput(options: InputOptions): Promise<DataRecord[]> {
  if (options.data !== undefined && options.file !== undefined) {
    throw new CliError("Cannot use both --file and --data; choose one or use stdin");
  }
  if (options.data !== undefined) {
    return parseRecords(options.data, "--data");
  }
  if (options.file !== undefined) {
    return parseRecords(await readTextFile(options.file), options.file);
  }
  if (isStdinTTY()) {
    throw new CliError("No input provided. Use --file, --data, or pipe JSON to stdin");
  }
  const stdin = await readStdin();
  if (!stdin.trim()) {
    throw new CliError("stdin is empty");
  }
  return parseRecords(stdin, "stdin");
}

/**
 * Build the commander program
 */
export function createProgram(options: ProgramOptions = {}): Command {
  const program = new Command();

  program
    .configureOutput({
      writeErr: (str) => process.stderr.write(colorize(str, "red", process.stderr)),
      ...options.output,
    })
    .exitOverride();

  program
    .name("pathtable")
    .description("Query and write templated file trees as tables")
    .version(VERSION)
    .option("--config <path>", "Configuration file (default: PATHTABLE_CONFIG or ./pathtable.config.json)")
    .option("--root <path>", "Storage root, replacing the configured one")
    .option("--raw", "Print compact JSON")
    .option("--verbose", "Log SDK events and timings to stderr");

  const globals = () => program.opts<GlobalOptions>();

  let logger: Logger | undefined;
  const getLogger = (): Logger | undefined => {
    if (isVerbose(globals().verbose)) {
      logger ??= createCliLogger();
      return logger;
    }
    return undefined;
  };

  const open = async (): Promise<PathTable> => {
    const opts = globals();
    const config = await loadConfig(resolveConfigPath(opts.config));
    return openFromConfig(config, { root: resolveRoot(opts.root), events: cliEventSink(getLogger()) });
  };

  const print = (data: unknown) => printJson(data, { raw: globals().raw });

  /**
   * Run fn, inside the named lock when --lock is given
   */
  const locked = async <T>(table: PathTable, lockOptions: LockOptions, fn: () => Promise<T>): Promise<T> => {
    if (lockOptions.lock === undefined) {
      return fn();
    }
    return table.locks.withLock(lockOptions.lock, fn, {
      ...table.lockDefaults,
      ...(lockOptions.timeout !== undefined ? { timeoutMs: lockOptions.timeout } : {}),
    });
  };

  const timeoutOption = (value: string) => parseNonNegativeInt(value, "--timeout");

  // Paths command
  program
    .command("paths <source>")
    .description("List the files of a source matching the constraints")
    .option("--where <json>", "Equality constraints as a JSON object", parseConstraints)
    .action(async (source: string, cmdOptions: { where?: Constraints }) => {
      await withTiming("cli.paths", getLogger(), async () => {
        const table = await open();
        print(await table.source(source).listPaths(cmdOptions.where));
      });
    });

  // Read command
  program
    .command("read [source]")
    .description("Read the records of a source, or the joined rows of every source")
    .option("--where <json>", "Equality constraints as a JSON object", parseConstraints)
    .option("--single", "Read exactly one record; --where must bind every placeholder")
    .action(async (source: string | undefined, cmdOptions: { where?: Constraints; single?: boolean }) => {
      await withTiming("cli.read", getLogger(), async () => {
        const table = await open();
        if (source === undefined) {
          if (cmdOptions.single) {
            throw new CliError("--single needs a source");
          }
          print(await table.composite().readAll(cmdOptions.where));
          return;
        }
        const target = table.source(source);
        print(
          cmdOptions.single
            ? await target.readRecord(cmdOptions.where ?? {})
            : await target.readRecords(cmdOptions.where)
        );
      });
    });

  // Write command
  program
    .command("write [source]")
    .description("Write records to a source, or joined rows to every source")
    .option("--data <json>", "Inline JSON record or array of records")
    .option("--file <path>", "Read records from a JSON file")
    .option("--dry-run", "Report the target files without writing")
    .option("--lock <name>", "Hold the named lock while writing")
    .option("--timeout <ms>", "Lock wait limit in milliseconds", timeoutOption)
    .action(
      async (source: string | undefined, cmdOptions: InputOptions & LockOptions & { dryRun?: boolean }) => {
        await withTiming("cli.write", getLogger(), async () => {
          const records = await readInput(cmdOptions);
          const table = await open();
          const writeOptions = { dryRun: cmdOptions.dryRun };

          if (source === undefined) {
            const written = await locked(table, cmdOptions, () => table.composite().writeAll(records, writeOptions));
            print({ written: Object.fromEntries(written), dryRun: cmdOptions.dryRun === true });
            return;
          }
          const target = table.source(source);
          const written = await locked(table, cmdOptions, () => target.writeRecords(records, writeOptions));
          print({ written, dryRun: cmdOptions.dryRun === true });
        });
      }
    );

  // Delete command
  program
    .command("delete <source>")
    .description("Delete the files of a source matching the constraints")
    .option("--where <json>", "Equality constraints as a JSON object", parseConstraints)
    .option("--all", "Allow deleting every file of the source")
    .option("--dry-run", "Report the files without deleting")
    .option("--lock <name>", "Hold the named lock while deleting")
    .option("--timeout <ms>", "Lock wait limit in milliseconds", timeoutOption)
    .action(
      async (
        source: string,
        cmdOptions: LockOptions & { where?: Constraints; all?: boolean; dryRun?: boolean }
      ) => {
        await withTiming("cli.delete", getLogger(), async () => {
          const hasConstraints = cmdOptions.where !== undefined && Object.keys(cmdOptions.where).length > 0;
          if (!hasConstraints && !cmdOptions.all) {
            throw new CliError(`Refusing to delete every file of "${source}" without --all`);
          }
          const table = await open();
          const target = table.source(source);
          const deleted = await locked(table, cmdOptions, () =>
            target.delete(cmdOptions.where, { dryRun: cmdOptions.dryRun })
          );
          print({ deleted, dryRun: cmdOptions.dryRun === true });
        });
      }
    );

  // Lock commands
  const lock = program.command("lock").description("Inspect and clear lock sentinels");

  lock
    .command("info <name>")
    .description("Show who holds a lock")
    .action(async (name: string) => {
      await withTiming("cli.lock.info", getLogger(), async () => {
        const table = await open();
        const info = await table.locks.info(name);
        if (!info) {
          throw new CliError(`Lock "${name}" is not held`, { exitCode: EXIT_NOT_FOUND });
        }
        print(info);
      });
    });

  lock
    .command("release <name>")
    .description("Remove a lock sentinel left by a crashed process")
    .action(async (name: string) => {
      await withTiming("cli.lock.release", getLogger(), async () => {
        const table = await open();
        print({ released: await table.locks.forceRelease(name) });
      });
    });

  return program;
}

/**
 * Parse arguments, run the command and return the exit code
 * @param argv - Arguments after the executable and script
 */
export async function run(argv: readonly string[], options: ProgramOptions = {}): Promise<number> {
  const program = createProgram(options);
  try {
    await program.parseAsync([...argv], { from: "user" });
    return EXIT_OK;
  } catch (err) {
    // Commander has already written its own usage errors
    if (err instanceof CommanderError) {
      return err.exitCode;
    }
    const verbose = isVerbose(program.opts<GlobalOptions>().verbose);
    console.error(`Error: ${formatCliError(err, verbose)}`);
    return mapSdkErrorToExitCode(err);
  }
}
