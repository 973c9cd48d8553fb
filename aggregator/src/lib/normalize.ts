const NAME_STOP_WORDS = new Set(["brand", "original", "the"]);

// Applied in order; later rules see the output of earlier ones.
const SIZE_REWRITES: Array<[string, string]> = [
  ["fluid ounces", "fl oz"],
  ["fluid ounce", "fl oz"],
  ["ounces", "oz"],
  ["ounce", "oz"],
  ["fl. oz", "fl oz"],
  ["fl-oz", "fl oz"],
  ["packs", "pack"],
  [" ct", " count"],
  ["ct", "count"]
];

function collapseWhitespace(value: string): string {
  return value.split(/\s+/).filter(Boolean).join(" ");
}

export function asString(value: unknown): string | undefined {
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : undefined;
  }

  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }

  return undefined;
}

export function normText(value: string | null | undefined): string {
  return (value ?? "").toLowerCase().trim();
}

/**
 * Filler words are only dropped between other words, so `Silk Original`
 * keeps its second word while `Silk the Original Oat` loses `the`.
 */
export function normName(value: string | null | undefined): string {
  const words = normText(value).split(/\s+/).filter(Boolean);
  const kept = words.filter(
    (word, index) => index === 0 || index === words.length - 1 || !NAME_STOP_WORDS.has(word)
  );
  return collapseWhitespace(kept.join(" ").replace(/-/g, " "));
}

export function normSize(value: string | null | undefined): string {
  let size = normText(value);
  for (const [from, to] of SIZE_REWRITES) {
    size = size.split(from).join(to);
  }
  return collapseWhitespace(size);
}

export function groupKey(
  brand: string | null | undefined,
  name: string | null | undefined,
  size: string | null | undefined
): string {
  return [normText(brand), normName(name), normSize(size)].join("|");
}

/** Lower-cased, trimmed, single-spaced; the form queries are hashed in. */
export function normQuery(value: string): string {
  return collapseWhitespace(value.toLowerCase());
}

const DOLLAR_PRICE_PATTERN = /\$(\d+(?:\.\d+)?)/;

/** First `$12.34` in the text as a number, otherwise the text itself. */
export function parsePriceText(text: string): number | string {
  const match = text.match(DOLLAR_PRICE_PATTERN);
  if (match) {
    const parsed = Number.parseFloat(match[1]);
    if (Number.isFinite(parsed)) {
      return parsed;
    }
  }
  return text;
}

/** Shopping feeds send `$5.49`, `5.49 USD` or `$1,299.00`; returns undefined when no number is present. */
export function toNumericPrice(value: unknown): number | undefined {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }

  const raw = asString(value);
  if (!raw) {
    return undefined;
  }

  const match = raw.replace(/,/g, "").match(/\d+(?:\.\d+)?/);
  if (!match) {
    return undefined;
  }

  const parsed = Number.parseFloat(match[0]);
  return Number.isFinite(parsed) ? parsed : undefined;
}
