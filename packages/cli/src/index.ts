export { type CliDeps, printHelp, runCli } from "./cli";
export { type CliIo, consoleIo, UsageError } from "./io";
