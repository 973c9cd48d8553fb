import { ProductRecord, RawSourceResponse } from "../types";
import { normText } from "./normalize";
import { derivedImageUrl, parseRetailerProductUrl, RetailerProductLink } from "./url";

export interface MatchTarget {
  name: string;
  brand?: string;
}

export const CITATION_MATCH_THRESHOLD = 0.3;
export const ENHANCE_MATCH_THRESHOLD = 0.2;
export const RECONCILE_MATCH_THRESHOLD = 0.5;

function wordSet(value: string): Set<string> {
  return new Set(normText(value).split(/\s+/).filter(Boolean));
}

/** Shared words over the larger word count, in [0, 1]. */
export function wordOverlap(left: string, right: string): number {
  const leftWords = wordSet(left);
  const rightWords = wordSet(right);
  const size = Math.max(leftWords.size, rightWords.size);
  if (size === 0) {
    return 0;
  }
  let common = 0;
  for (const word of leftWords) {
    if (rightWords.has(word)) {
      common += 1;
    }
  }
  return common / size;
}

/** Word overlap, +0.3 when the brand appears in the candidate, +0.5 when either name contains the other. */
export function scoreMatch(target: MatchTarget, candidateName: string): number {
  const name = normText(target.name);
  const candidate = normText(candidateName);
  if (!name || !candidate) {
    return 0;
  }

  let score = wordOverlap(name, candidate);
  const brand = normText(target.brand);
  if (brand && candidate.includes(brand)) {
    score += 0.3;
  }
  if (name.includes(candidate) || candidate.includes(name)) {
    score += 0.5;
  }
  return score;
}

export function findBestMatch<T>(
  target: MatchTarget,
  candidates: readonly T[],
  nameOf: (candidate: T) => string,
  threshold: number
): T | undefined {
  let best: T | undefined;
  let bestScore = threshold;
  for (const candidate of candidates) {
    const score = scoreMatch(target, nameOf(candidate));
    if (score > bestScore) {
      best = candidate;
      bestScore = score;
    }
  }
  return best;
}

/** Retailer product pages among the citations and related results, first occurrence per URL. */
export function collectProductLinks(response: Pick<RawSourceResponse, "citations" | "relatedResults">): RetailerProductLink[] {
  const links = new Map<string, RetailerProductLink>();
  const urls = [...response.citations, ...response.relatedResults.map((result) => result.url)];
  for (const url of urls) {
    const link = parseRetailerProductUrl(url);
    if (link && !links.has(link.url)) {
      links.set(link.url, link);
    }
  }
  return [...links.values()];
}

export function enrichWithCitations(products: ProductRecord[], links: readonly RetailerProductLink[]): ProductRecord[] {
  if (links.length === 0) {
    return products;
  }

  return products.map((product) => {
    if (product.productUrl) {
      return product;
    }

    let best: RetailerProductLink | undefined;
    let bestScore = CITATION_MATCH_THRESHOLD;
    for (const link of links) {
      const score = wordOverlap(product.name, link.nameKey);
      if (score > bestScore) {
        best = link;
        bestScore = score;
      }
    }
    if (!best) {
      return product;
    }

    const imageUrl = product.imageUrl ?? derivedImageUrl(best);
    return { ...product, productUrl: best.url, ...(imageUrl ? { imageUrl } : {}) };
  });
}

/**
 * Picks the identity a brand-less, size-less record should group under.
 * The candidate's brand, when it has one, must appear in the record name.
 */
export function findReconciliationTarget<T extends MatchTarget>(record: MatchTarget, identities: readonly T[]): T | undefined {
  const recordName = normText(record.name);
  let best: T | undefined;
  let bestScore = -1;
  for (const identity of identities) {
    const brand = normText(identity.brand);
    if (brand && !recordName.includes(brand)) {
      continue;
    }
    const score = scoreMatch(identity, record.name);
    if (score >= RECONCILE_MATCH_THRESHOLD && score > bestScore) {
      best = identity;
      bestScore = score;
    }
  }
  return best;
}
