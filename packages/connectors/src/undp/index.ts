import { createHtmlSourceAdapter } from "../html/adapter";
import { parseUndpListing, parseUndpPublication, UNDP_BASE_URL } from "./parse";

export const undpSource = createHtmlSourceAdapter({
  id: "undp",
  name: "UNDP Publications",
  homepage: UNDP_BASE_URL,
  mode: "files",
  listingUrl: (page) => `${UNDP_BASE_URL}/publications?page=${page}`,
  parseListing: parseUndpListing,
  parsePublication: (html) => parseUndpPublication(html),
});
