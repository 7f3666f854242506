import { resolve } from "node:path";

import {
  Fetcher,
  type FetcherOptions,
  fetcherOptionsFromEnv,
  type HttpClient,
  type SourceRegistry,
} from "@sdg-harvest/connectors";
import { FileSystemSink, HarvestPipeline } from "@sdg-harvest/pipeline";
import {
  ConfigError,
  DEFAULT_PAGE_RANGE,
  loadHarvestEnv,
  type PageRange,
  parsePageRange,
  setLogLevel,
} from "@sdg-harvest/shared";

import { type CliIo, UsageError } from "../io";
import { renderFailures, renderSummary } from "../ui/render";

export interface RunOptions {
  source: string;
  pages: { start: string; end: string } | null;
  folder: string;
  maxConnections: number | null;
  verbose: boolean;
  help: boolean;
}

export interface RunDeps {
  registry: SourceRegistry;
  io: CliIo;
  env: NodeJS.ProcessEnv;
  cwd: string;
  signal?: AbortSignal;
  createHttp?: (options: FetcherOptions) => HttpClient;
}

export function printRunUsage(io: CliIo): void {
  io.out("Usage: sdg-harvest run <source> [options]");
  io.out("");
  io.out("Options:");
  io.out("  -p, --pages START END        Inclusive listing page range (default: 0 1)");
  io.out("  -f, --folder DEST            Existing destination directory (default: .)");
  io.out("  -c, --max-connections N      Simultaneous requests (default: MAX_CONNECTIONS or 4)");
  io.out("  -v, --verbose                Debug logging on stderr");
}

function parsePositiveInt(flag: string, raw: string): number {
  if (!/^\d+$/.test(raw.trim()) || Number.parseInt(raw, 10) <= 0) {
    throw new ConfigError(`Invalid ${flag}: "${raw}" (expected a positive integer)`);
  }
  return Number.parseInt(raw, 10);
}

export function parseRunArgs(args: string[]): RunOptions {
  const opts: RunOptions = {
    source: "",
    pages: null,
    folder: ".",
    maxConnections: null,
    verbose: false,
    help: false,
  };

  for (let i = 0; i < args.length; i += 1) {
    const a = args[i] ?? "";
    switch (a) {
      case "-p":
      case "--pages": {
        const start = args[i + 1];
        const end = args[i + 2];
        if (start === undefined || end === undefined) {
          throw new UsageError(`${a} expects two values: START END`);
        }
        opts.pages = { start, end };
        i += 2;
        break;
      }
      case "-f":
      case "--folder": {
        const next = args[i + 1];
        if (next === undefined || next.trim().length === 0) {
          throw new UsageError(`${a} expects a directory`);
        }
        opts.folder = next;
        i += 1;
        break;
      }
      case "-c":
      case "--max-connections": {
        const next = args[i + 1];
        if (next === undefined) throw new UsageError(`${a} expects a number`);
        opts.maxConnections = parsePositiveInt("--max-connections", next);
        i += 1;
        break;
      }
      case "-v":
      case "--verbose":
        opts.verbose = true;
        break;
      case "-h":
      case "--help":
        opts.help = true;
        break;
      default:
        if (a.startsWith("-") && !/^-\d+$/.test(a)) {
          throw new UsageError(`Unknown option: ${a}`);
        }
        if (opts.source) throw new UsageError(`Unexpected argument: ${a}`);
        opts.source = a;
    }
  }

  if (!opts.source && !opts.help) throw new UsageError("Missing <source>");
  return opts;
}

export async function runCommand(opts: RunOptions, deps: RunDeps): Promise<number> {
  const { io } = deps;
  if (opts.help) {
    printRunUsage(io);
    return 0;
  }

  const env = loadHarvestEnv(deps.env);
  if (opts.verbose) setLogLevel("debug");

  const adapter = deps.registry.resolve(opts.source);
  const range: PageRange = opts.pages
    ? parsePageRange(opts.pages.start, opts.pages.end)
    : { ...DEFAULT_PAGE_RANGE };
  const concurrency = opts.maxConnections ?? env.maxConnections;

  const fetcherOptions = fetcherOptionsFromEnv(env, {
    maxConcurrency: concurrency,
    signal: deps.signal,
  });
  const http = deps.createHttp ? deps.createHttp(fetcherOptions) : new Fetcher(fetcherOptions);
  const sink = new FileSystemSink(resolve(deps.cwd, opts.folder));

  const summary = await new HarvestPipeline({
    adapter,
    http,
    sink,
    range,
    concurrency,
    signal: deps.signal,
  }).run();

  for (const line of renderSummary(summary)) io.out(line);
  if (summary.failures.length > 0) {
    io.err(`${summary.failures.length} publication(s) failed:`);
    for (const line of renderFailures(summary.failures)) io.err(line);
  }
  return 0;
}
