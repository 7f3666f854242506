import { createHtmlSourceAdapter } from "../html/adapter";
import { parseUndesaListing, parseUndesaPublication, UNDESA_BASE_URL } from "./parse";

export const undesaSource = createHtmlSourceAdapter({
  id: "undesa",
  name: "UN DESA Publications",
  homepage: UNDESA_BASE_URL,
  mode: "files",
  listingUrl: (page) => `${UNDESA_BASE_URL}/publications?page=${page}`,
  parseListing: parseUndesaListing,
  parsePublication: (html) => parseUndesaPublication(html),
});
