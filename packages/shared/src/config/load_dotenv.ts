import { existsSync, readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";

import { errorMessage } from "../errors";
import { createLogger } from "../logging";

const log = createLogger({ component: "config" });

function hasWorkspaces(pkgPath: string): boolean {
  try {
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, "utf8"));
    return typeof pkg === "object" && pkg !== null && "workspaces" in pkg;
  } catch (err) {
    log.debug({ pkgPath, err: errorMessage(err) }, "Unreadable package.json while locating root");
    return false;
  }
}

/**
 * Find the project root by searching up for a directory containing .env or the
 * workspaces package.json. Falls back to `startDir`.
 */
export function findProjectRoot(startDir: string): string {
  let dir = startDir;

  for (;;) {
    if (existsSync(resolve(dir, ".env"))) return dir;
    const pkgPath = resolve(dir, "package.json");
    if (existsSync(pkgPath) && hasWorkspaces(pkgPath)) return dir;

    const parent = dirname(dir);
    if (parent === dir) return startDir;
    dir = parent;
  }
}

function stripInlineComment(value: string): string {
  // " # ..." starts a comment for unquoted values; a `#` glued to the value is kept.
  for (let i = 0; i < value.length; i += 1) {
    if (value[i] !== "#") continue;
    const prev = i > 0 ? value[i - 1] : "";
    if (prev === " " || prev === "\t") {
      return value.slice(0, i).trimEnd();
    }
  }
  return value;
}

export function parseEnvValue(raw: string): string {
  const trimmed = raw.trim();
  if (trimmed.length === 0) return "";

  const quote = trimmed[0];
  if (quote === '"' || quote === "'") {
    let out = "";
    let escaped = false;
    for (const ch of trimmed.slice(1)) {
      if (escaped) {
        out += ch;
        escaped = false;
        continue;
      }
      if (ch === "\\") {
        escaped = true;
        continue;
      }
      if (ch === quote) {
        return out;
      }
      out += ch;
    }
    // Unclosed quote
    return stripInlineComment(trimmed);
  }

  return stripInlineComment(trimmed);
}

/**
 * Load environment variables from .env and .env.local files.
 * Does not override existing environment variables.
 * Call before loadHarvestEnv().
 */
export function loadDotEnvIfPresent(
  cwd: string = process.cwd(),
  target: NodeJS.ProcessEnv = process.env,
): string[] {
  const projectRoot = findProjectRoot(cwd);
  const loaded: string[] = [];
  for (const filename of [".env", ".env.local"]) {
    const fullPath = resolve(projectRoot, filename);
    if (!existsSync(fullPath)) continue;
    let raw: string;
    try {
      raw = readFileSync(fullPath, "utf8");
    } catch (err) {
      log.warn({ filename, err: errorMessage(err) }, "Failed to read env file");
      continue;
    }
    for (const line of raw.split(/\r?\n/)) {
      const trimmed = line.trim();
      if (!trimmed || trimmed.startsWith("#")) continue;
      const idx = trimmed.indexOf("=");
      if (idx <= 0) continue;
      const key = trimmed.slice(0, idx).trim();
      const value = parseEnvValue(trimmed.slice(idx + 1));
      if (target[key] === undefined) target[key] = value;
    }
    loaded.push(fullPath);
  }
  return loaded;
}
