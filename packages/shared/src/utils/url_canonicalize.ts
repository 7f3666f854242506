// URL canonicalization used for de-duplicating document references.
//
// - normalize scheme/host
// - strip fragments and common tracking params (utm_*, fbclid, gclid, ...)
// - normalize trailing slashes
// - keep every other query param: listing sites use them for identity (?page=, ?id=)

const TRACKING_PARAM_PREFIXES = ["utm_"];
const TRACKING_PARAMS = new Set(["fbclid", "gclid", "mc_cid", "mc_eid", "_ga"]);

export function canonicalizeUrl(input: string): string {
  const url = new URL(input);
  url.hash = "";
  url.protocol = url.protocol.toLowerCase();
  url.hostname = url.hostname.toLowerCase();

  // Remove tracking params
  const toDelete: string[] = [];
  url.searchParams.forEach((_, key) => {
    const lower = key.toLowerCase();
    if (TRACKING_PARAMS.has(lower)) toDelete.push(key);
    if (TRACKING_PARAM_PREFIXES.some((p) => lower.startsWith(p))) toDelete.push(key);
  });
  for (const key of toDelete) url.searchParams.delete(key);

  // Normalize trailing slash
  if (url.pathname !== "/" && url.pathname.endsWith("/")) {
    url.pathname = url.pathname.slice(0, -1);
  }

  return url.toString();
}

/**
 * Resolve a possibly relative href against a base URL. Returns null for hrefs that
 * cannot point at a document (empty, javascript:, mailto:, unparseable).
 */
export function resolveUrl(href: string | undefined | null, base: string): string | null {
  const trimmed = href?.trim();
  if (!trimmed) return null;
  if (/^(javascript|mailto|tel):/i.test(trimmed)) return null;
  try {
    return new URL(trimmed, base).toString();
  } catch {
    return null;
  }
}
