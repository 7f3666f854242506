import { randomUUID } from "node:crypto";
import { constants } from "node:fs";
import { access, rename, rm, stat, writeFile } from "node:fs/promises";
import { basename, join, resolve } from "node:path";

import {
  createLogger,
  type DocumentPayload,
  type DocumentReference,
  errorMessage,
  IOError,
  type RunSummary,
  sha256Hex,
} from "@sdg-harvest/shared";

import type { PublicationRecord, Sink, StoredFile } from "./types";

const log = createLogger({ component: "sink" });

interface PendingWrite {
  path: string;
  data: string | Uint8Array;
}

export interface FileSystemSinkOptions {
  now?: () => Date;
}

function fileName(id: string, index: number, extension: string): string {
  return index === 0 ? `${id}.${extension}` : `${id}-${index}.${extension}`;
}

/** "2024-03-05T07:08:09.000Z" -> "240305-070809" */
export function exportTimestamp(iso: string): string {
  const d = new Date(iso);
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    pad(d.getUTCFullYear() % 100) +
    pad(d.getUTCMonth() + 1) +
    pad(d.getUTCDate()) +
    "-" +
    pad(d.getUTCHours()) +
    pad(d.getUTCMinutes()) +
    pad(d.getUTCSeconds())
  );
}

/**
 * Stores each publication as `<id>.<ext>` files plus a `<id>.json` sidecar in one
 * existing directory, and a `publications-YYMMDD-HHMMSS.jsonl` export per run.
 */
export class FileSystemSink implements Sink {
  readonly dir: string;
  private readonly now: () => Date;
  private readonly records: PublicationRecord[] = [];
  private tail: Promise<unknown> = Promise.resolve();

  constructor(dir: string, options: FileSystemSinkOptions = {}) {
    this.dir = resolve(dir);
    this.now = options.now ?? (() => new Date());
  }

  /** Publications saved so far, in commit order. */
  get saved(): readonly PublicationRecord[] {
    return this.records;
  }

  async open(): Promise<void> {
    let isDirectory: boolean;
    try {
      isDirectory = (await stat(this.dir)).isDirectory();
    } catch (error) {
      throw new IOError(`Destination does not exist: ${this.dir}`, this.dir, error);
    }
    if (!isDirectory) {
      throw new IOError(`Destination is not a directory: ${this.dir}`, this.dir);
    }
    try {
      await access(this.dir, constants.W_OK);
    } catch (error) {
      throw new IOError(`Destination is not writable: ${this.dir}`, this.dir, error);
    }
  }

  save(ref: DocumentReference, payload: DocumentPayload): Promise<PublicationRecord> {
    const task = this.tail.then(() => this.write(ref, payload));
    // The chain only orders writes; the caller observes failures through `task`.
    this.tail = task.then(
      () => undefined,
      () => undefined,
    );
    return task;
  }

  async finalize(summary: RunSummary): Promise<string | null> {
    await this.tail;
    if (this.records.length === 0) return null;

    const path = join(this.dir, `publications-${exportTimestamp(summary.startedAt)}.jsonl`);
    const body = this.records.map((record) => JSON.stringify(record)).join("\n") + "\n";
    await this.commit([{ path, data: body }]);
    log.info({ path, publications: this.records.length }, "Wrote run export");
    return path;
  }

  private async write(ref: DocumentReference, payload: DocumentPayload): Promise<PublicationRecord> {
    const entries: PendingWrite[] = [];
    const files: StoredFile[] = payload.files.map((file, index) => {
      const name = fileName(ref.id, index, file.extension);
      entries.push({ path: join(this.dir, name), data: file.bytes });
      return {
        url: file.url,
        name,
        bytes: file.bytes.byteLength,
        sha256: sha256Hex(file.bytes),
      };
    });

    const record: PublicationRecord = {
      id: ref.id,
      source: ref.sourceId,
      url: ref.downloadUrl,
      title: payload.title,
      type: payload.metadata.type ?? null,
      year: payload.metadata.year ?? null,
      labels: payload.metadata.labels ?? [],
      author: payload.metadata.author ?? null,
      publishedAt: payload.metadata.publishedAt ?? null,
      page: ref.page,
      files,
      harvestedAt: this.now().toISOString(),
    };
    entries.push({
      path: join(this.dir, `${ref.id}.json`),
      data: JSON.stringify(record, null, 2) + "\n",
    });

    await this.commit(entries);
    this.records.push(record);
    log.debug({ refId: ref.id, files: files.length }, "Saved publication");
    return record;
  }

  /**
   * Stage every entry under a temporary name, then rename them all into place.
   * On failure, temporaries and already renamed entries are removed.
   */
  private async commit(entries: readonly PendingWrite[]): Promise<void> {
    const staged: Array<{ tmp: string; path: string }> = [];
    const committed: string[] = [];
    let current = this.dir;
    try {
      for (const { path, data } of entries) {
        current = path;
        const tmp = join(this.dir, `.${basename(path)}.${randomUUID()}.tmp`);
        staged.push({ tmp, path });
        await writeFile(tmp, data);
      }
      for (const { tmp, path } of staged) {
        current = path;
        await rename(tmp, path);
        committed.push(path);
      }
    } catch (error) {
      await this.discard([...staged.map((s) => s.tmp), ...committed]);
      throw new IOError(`Could not write ${current}: ${errorMessage(error)}`, current, error);
    }
  }

  private async discard(paths: readonly string[]): Promise<void> {
    for (const path of paths) {
      await rm(path, { force: true }).catch((cleanupError: unknown) => {
        log.warn({ path, err: errorMessage(cleanupError) }, "Could not remove file");
      });
    }
  }
}
