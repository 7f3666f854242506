import { mkdir, mkdtemp, readdir, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import {
  type DocumentPayload,
  type DocumentReference,
  IOError,
  type RunSummary,
  sha256Hex,
} from "@sdg-harvest/shared";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { exportTimestamp, FileSystemSink } from "./filesystem";

const NOW = new Date("2024-03-05T07:08:09.000Z");

function ref(id: string, page = 0): DocumentReference {
  return {
    id,
    sourceId: "undp",
    title: `Title ${id}`,
    page,
    downloadUrl: `https://www.undp.org/publications/${id}`,
    metadata: {},
  };
}

function payload(files: Array<[string, string]>): DocumentPayload {
  return {
    title: "Water Report",
    metadata: { labels: [6], year: 2022, type: "Report" },
    files: files.map(([extension, body], i) => ({
      url: `https://www.undp.org/files/${i}.${extension}`,
      bytes: new TextEncoder().encode(body),
      extension,
    })),
  };
}

function summary(startedAt: string): RunSummary {
  return {
    runId: "run-1",
    source: "undp",
    range: { start: 0, end: 0 },
    attempted: 0,
    succeeded: 0,
    failed: 0,
    duplicates: 0,
    pages: [],
    failures: [],
    cancelled: false,
    startedAt,
    finishedAt: startedAt,
    metadataFile: null,
  };
}

describe("exportTimestamp", () => {
  it("formats UTC as YYMMDD-HHMMSS", () => {
    expect(exportTimestamp("2024-03-05T07:08:09.000Z")).toBe("240305-070809");
  });
});

describe("FileSystemSink", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "sdg-sink-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("opens an existing writable directory", async () => {
    await expect(new FileSystemSink(dir).open()).resolves.toBeUndefined();
  });

  it("fails to open a missing directory", async () => {
    const sink = new FileSystemSink(join(dir, "missing"));
    await expect(sink.open()).rejects.toBeInstanceOf(IOError);
  });

  it("fails to open a path that is a file", async () => {
    const file = join(dir, "plain.txt");
    await writeFile(file, "x");
    await expect(new FileSystemSink(file).open()).rejects.toThrow(
      `Destination is not a directory: ${file}`,
    );
  });

  it("writes numbered files and a sidecar record", async () => {
    const sink = new FileSystemSink(dir, { now: () => NOW });

    const record = await sink.save(ref("undp-aaaa", 2), payload([["pdf", "one"], ["pdf", "two"]]));

    expect((await readdir(dir)).sort()).toEqual([
      "undp-aaaa-1.pdf",
      "undp-aaaa.json",
      "undp-aaaa.pdf",
    ]);
    expect(await readFile(join(dir, "undp-aaaa-1.pdf"), "utf8")).toBe("two");
    expect(record).toEqual({
      id: "undp-aaaa",
      source: "undp",
      url: "https://www.undp.org/publications/undp-aaaa",
      title: "Water Report",
      type: "Report",
      year: 2022,
      labels: [6],
      author: null,
      publishedAt: null,
      page: 2,
      files: [
        {
          url: "https://www.undp.org/files/0.pdf",
          name: "undp-aaaa.pdf",
          bytes: 3,
          sha256: sha256Hex("one"),
        },
        {
          url: "https://www.undp.org/files/1.pdf",
          name: "undp-aaaa-1.pdf",
          bytes: 3,
          sha256: sha256Hex("two"),
        },
      ],
      harvestedAt: "2024-03-05T07:08:09.000Z",
    });
    expect(JSON.parse(await readFile(join(dir, "undp-aaaa.json"), "utf8"))).toEqual(record);
  });

  it("commits concurrent saves in call order", async () => {
    const sink = new FileSystemSink(dir, { now: () => NOW });

    await Promise.all([
      sink.save(ref("undp-1"), payload([["pdf", "a"]])),
      sink.save(ref("undp-2"), payload([["pdf", "b"]])),
      sink.save(ref("undp-3"), payload([["txt", "c"]])),
    ]);

    expect(sink.saved.map((r) => r.id)).toEqual(["undp-1", "undp-2", "undp-3"]);
  });

  it("leaves no temporary file behind when a write fails", async () => {
    const sink = new FileSystemSink(dir, { now: () => NOW });

    const error = await sink
      .save(ref("undp-bad"), payload([["missing/dir", "x"]]))
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(IOError);
    expect(await readdir(dir)).toEqual([]);
    expect(sink.saved).toEqual([]);
  });

  it("removes already committed files when a later file of the publication fails", async () => {
    // A directory where the second file belongs makes its rename fail.
    await mkdir(join(dir, "undp-x-1.pdf"));
    const sink = new FileSystemSink(dir, { now: () => NOW });

    const error = await sink
      .save(ref("undp-x"), payload([["pdf", "first"], ["pdf", "second"]]))
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(IOError);
    expect(await readdir(dir)).toEqual(["undp-x-1.pdf"]);
    expect(sink.saved).toEqual([]);
  });

  it("keeps accepting saves after a failed one", async () => {
    const sink = new FileSystemSink(dir, { now: () => NOW });

    const failed = sink.save(ref("undp-bad"), payload([["missing/dir", "x"]]));
    const ok = sink.save(ref("undp-ok"), payload([["pdf", "y"]]));

    await expect(failed).rejects.toBeInstanceOf(IOError);
    await expect(ok).resolves.toMatchObject({ id: "undp-ok" });
  });

  it("exports one JSON line per saved publication", async () => {
    const sink = new FileSystemSink(dir, { now: () => NOW });
    await sink.save(ref("undp-1"), payload([["pdf", "a"]]));
    await sink.save(ref("undp-2"), payload([["pdf", "b"]]));

    const path = await sink.finalize(summary("2024-03-05T07:08:09.000Z"));

    expect(path).toBe(join(dir, "publications-240305-070809.jsonl"));
    const lines = (await readFile(join(dir, "publications-240305-070809.jsonl"), "utf8"))
      .trimEnd()
      .split("\n")
      .map((line): unknown => JSON.parse(line));
    expect(lines).toMatchObject([{ id: "undp-1" }, { id: "undp-2" }]);
  });

  it("writes no export when nothing was saved", async () => {
    const sink = new FileSystemSink(dir);

    await expect(sink.finalize(summary("2024-03-05T07:08:09.000Z"))).resolves.toBeNull();
    expect(await readdir(dir)).toEqual([]);
  });
});
