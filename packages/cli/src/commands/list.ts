import type { SourceRegistry } from "@sdg-harvest/connectors";

import type { CliIo } from "../io";
import { renderSourceList } from "../ui/render";

export function listCommand(registry: SourceRegistry, io: CliIo): number {
  for (const line of renderSourceList(registry.listSources())) io.out(line);
  return 0;
}
