#!/usr/bin/env -S node --import tsx
import { createDefaultRegistry } from "@sdg-harvest/connectors";
import { createLogger, errorMessage, loadDotEnvIfPresent } from "@sdg-harvest/shared";

import { runCli } from "./cli";

const log = createLogger({ component: "cli" });

async function main(): Promise<void> {
  loadDotEnvIfPresent();

  const controller = new AbortController();
  process.once("SIGINT", () => {
    console.error("Interrupted: finishing the current page, then stopping.");
    controller.abort(new Error("SIGINT"));
  });

  process.exitCode = await runCli(process.argv.slice(2), {
    registry: createDefaultRegistry(),
    signal: controller.signal,
  });
}

main().catch((err: unknown) => {
  log.error({ err }, "CLI failed");
  console.error(errorMessage(err));
  process.exitCode = 1;
});
