import type { SourceDescriptor } from "@sdg-harvest/connectors";
import type { DocumentFailure, RunSummary } from "@sdg-harvest/shared";

export function renderSourceList(sources: readonly SourceDescriptor[]): string[] {
  return sources.map((source) => `${source.id}\t${source.name}`);
}

export function renderSummary(summary: RunSummary): string[] {
  const { source, range, attempted, succeeded, failed, duplicates } = summary;
  const lines = [
    `Harvested ${source} pages ${range.start}-${range.end}: ` +
      `${succeeded}/${attempted} saved, ${failed} failed, ${duplicates} duplicates skipped`,
  ];
  for (const page of summary.pages) {
    if (page.status === "skipped") {
      lines.push(`  page ${page.page} skipped: ${page.error?.message ?? "unknown error"}`);
    }
  }
  if (summary.metadataFile) lines.push(`  export: ${summary.metadataFile}`);
  if (summary.cancelled) lines.push("  cancelled: remaining pages were not processed");
  return lines;
}

export function renderFailures(failures: readonly DocumentFailure[]): string[] {
  return failures.map((f) => {
    const status = f.statusCode === undefined ? "" : ` (HTTP ${f.statusCode})`;
    return `  ${f.kind} ${f.url}${status}: ${f.message}`;
  });
}
