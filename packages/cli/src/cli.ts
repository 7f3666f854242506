import type { FetcherOptions, HttpClient, SourceRegistry } from "@sdg-harvest/connectors";
import { errorMessage, isHarvestError } from "@sdg-harvest/shared";

import { listCommand } from "./commands/list";
import { parseRunArgs, printRunUsage, runCommand } from "./commands/run";
import { type CliIo, consoleIo, UsageError } from "./io";

export interface CliDeps {
  registry: SourceRegistry;
  io?: CliIo;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  signal?: AbortSignal;
  createHttp?: (options: FetcherOptions) => HttpClient;
}

export function printHelp(io: CliIo): void {
  io.out("sdg-harvest: download SDG-labelled publications");
  io.out("");
  io.out("Commands:");
  io.out("  list                         Print available sources (id and name)");
  io.out("  run <source> [options]       Harvest a source; see `run --help`");
  io.out("  help                         Show this message");
}

/**
 * Run one CLI invocation and resolve with its exit code:
 * 0 success, 1 a harvest or argument error, 2 a usage error.
 */
export async function runCli(argv: string[], deps: CliDeps): Promise<number> {
  const io = deps.io ?? consoleIo;

  let [cmd, ...rest] = argv;
  // npm forwards the argument separator through to the script as a literal "--".
  if (cmd === "--") {
    [cmd, ...rest] = rest;
  }

  try {
    switch (cmd) {
      case "list":
        return listCommand(deps.registry, io);
      case "run":
        return await runCommand(parseRunArgs(rest), {
          registry: deps.registry,
          io,
          env: deps.env ?? process.env,
          cwd: deps.cwd ?? process.cwd(),
          signal: deps.signal,
          createHttp: deps.createHttp,
        });
      case undefined:
      case "help":
      case "--help":
      case "-h":
        printHelp(io);
        return 0;
      default:
        io.err(`Unknown command: ${cmd}`);
        io.err("");
        printHelp(io);
        return 2;
    }
  } catch (err) {
    if (err instanceof UsageError) {
      io.err(err.message);
      io.err("");
      printRunUsage(io);
      return 2;
    }
    if (isHarvestError(err)) {
      io.err(`error: ${err.message}`);
      return 1;
    }
    throw new Error(`Unexpected failure: ${errorMessage(err)}`, { cause: err });
  }
}
