import { createHtmlSourceAdapter } from "../html/adapter";
import { parseSdgFundListing, parseSdgFundPublication, SDGFUND_BASE_URL } from "./parse";

export const sdgfundSource = createHtmlSourceAdapter({
  id: "sdgfund",
  name: "SDG Fund Library",
  homepage: SDGFUND_BASE_URL,
  mode: "files",
  listingUrl: (page) => `${SDGFUND_BASE_URL}/library?submit=search&page=${page}`,
  parseListing: parseSdgFundListing,
  parsePublication: (html) => parseSdgFundPublication(html),
});
