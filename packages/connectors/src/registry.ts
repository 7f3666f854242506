import { UnknownSourceError } from "@sdg-harvest/shared";

import { iomSource } from "./iom";
import { sdgfundSource } from "./sdgfund";
import type { SourceAdapter, SourceDescriptor } from "./types";
import { undesaSource } from "./undesa";
import { undpSource } from "./undp";

export const SOURCE_ADAPTERS: readonly SourceAdapter[] = [
  undpSource,
  undesaSource,
  sdgfundSource,
  iomSource,
];

/**
 * Source id -> adapter. Built once at process start and passed to whoever runs the
 * pipeline; read-only after construction.
 */
export class SourceRegistry {
  private readonly byId: ReadonlyMap<string, SourceDescriptor>;

  constructor(adapters: readonly SourceAdapter[]) {
    const byId = new Map<string, SourceDescriptor>();
    for (const adapter of adapters) {
      if (byId.has(adapter.id)) {
        throw new Error(`Duplicate source id: ${adapter.id}`);
      }
      byId.set(adapter.id, {
        id: adapter.id,
        name: adapter.name,
        homepage: adapter.homepage,
        adapter,
      });
    }
    this.byId = byId;
  }

  listSources(): SourceDescriptor[] {
    return [...this.byId.values()].sort((a, b) => a.id.localeCompare(b.id));
  }

  has(id: string): boolean {
    return this.byId.has(id);
  }

  resolve(id: string): SourceAdapter {
    const descriptor = this.byId.get(id);
    if (!descriptor) {
      throw new UnknownSourceError(id, [...this.byId.keys()].sort());
    }
    return descriptor.adapter;
  }
}

export function createDefaultRegistry(): SourceRegistry {
  return new SourceRegistry(SOURCE_ADAPTERS);
}
