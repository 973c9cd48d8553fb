const TRACKING_PARAM_PATTERN = /^(utm_|fbclid$|gclid$|mc_cid$|mc_eid$|srsltid$)/i;

export type Retailer = "target" | "walmart" | "amazon";

export interface RetailerProductLink {
  retailer: Retailer;
  url: string;
  /** Lowercased words recovered from the URL path, used for name matching. */
  nameKey: string;
  productId?: string;
}

export function normalizeUrl(input: string, base?: string): string | null {
  let parsed: URL;

  try {
    parsed = base ? new URL(input, base) : new URL(input);
  } catch {
    return null;
  }

  if (!(parsed.protocol === "http:" || parsed.protocol === "https:")) {
    return null;
  }

  parsed.hash = "";
  parsed.hostname = parsed.hostname.toLowerCase();

  if ((parsed.protocol === "http:" && parsed.port === "80") || (parsed.protocol === "https:" && parsed.port === "443")) {
    parsed.port = "";
  }

  const keptParams: Array<[string, string]> = [];
  for (const [key, value] of parsed.searchParams.entries()) {
    if (!TRACKING_PARAM_PATTERN.test(key)) {
      keptParams.push([key, value]);
    }
  }
  keptParams.sort(([aKey, aValue], [bKey, bValue]) => (aKey === bKey ? aValue.localeCompare(bValue) : aKey.localeCompare(bKey)));

  parsed.search = "";
  for (const [key, value] of keptParams) {
    parsed.searchParams.append(key, value);
  }

  let pathname = parsed.pathname.replace(/\/+/g, "/");
  if (pathname !== "/") {
    pathname = pathname.replace(/\/+$/, "");
  }
  parsed.pathname = pathname;

  return parsed.toString();
}

export function hostOf(url: string): string | null {
  try {
    return new URL(url).hostname.replace(/^www\./i, "").toLowerCase();
  } catch {
    return null;
  }
}

/** True when the URL's host is the domain itself or one of its subdomains. */
export function hostMatchesDomain(url: string, domain: string): boolean {
  const host = hostOf(url);
  const wanted = domain.replace(/^www\./i, "").toLowerCase();
  return host !== null && (host === wanted || host.endsWith(`.${wanted}`));
}

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

function slugWords(segment: string): string {
  return decodeSegment(segment).replace(/[-_+]+/g, " ").replace(/\s+/g, " ").trim().toLowerCase();
}

/**
 * Recognizes product-page URLs of the large retailers:
 * `target.com/p/<slug>/-/A-<id>`, `walmart.com/ip/<slug>/<id>` and `amazon.com/dp/<asin>`.
 */
export function parseRetailerProductUrl(url: string): RetailerProductLink | null {
  const normalized = normalizeUrl(url);
  if (!normalized) {
    return null;
  }
  const parsed = new URL(normalized);
  const segments = parsed.pathname.split("/").filter((segment) => segment.length > 0);

  if (hostMatchesDomain(normalized, "target.com") && segments[0] === "p" && segments[1]) {
    const productId = segments.find((segment) => /^A-\d+$/.test(segment))?.slice(2);
    const nameKey = slugWords(segments[1]);
    if (!nameKey) {
      return null;
    }
    return { retailer: "target", url: normalized, nameKey, ...(productId ? { productId } : {}) };
  }

  if (hostMatchesDomain(normalized, "walmart.com") && segments[0] === "ip" && segments[1]) {
    const productId = segments[2] && /^\d+$/.test(segments[2]) ? segments[2] : undefined;
    const nameKey = slugWords(segments[1]);
    if (!nameKey) {
      return null;
    }
    return { retailer: "walmart", url: normalized, nameKey, ...(productId ? { productId } : {}) };
  }

  if (hostMatchesDomain(normalized, "amazon.com")) {
    const index = segments.indexOf("dp");
    const asin = index >= 0 ? segments[index + 1] : undefined;
    if (!asin) {
      return null;
    }
    const nameKey = index > 0 ? slugWords(segments[index - 1]) : `amazon product ${asin.toLowerCase()}`;
    return { retailer: "amazon", url: normalized, nameKey, productId: asin };
  }

  return null;
}

export function derivedImageUrl(link: RetailerProductLink): string | undefined {
  if (link.retailer === "target" && link.productId) {
    return `https://target.scene7.com/is/image/Target/${link.productId}?wid=1200&hei=1200&qlt=80&fmt=webp`;
  }
  return undefined;
}
