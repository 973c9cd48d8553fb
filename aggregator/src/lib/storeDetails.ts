export interface StoreDetails {
  hours: Record<string, string>;
  services: string[];
  contact: { phone?: string; website?: string };
  address?: string;
  features: string[];
}

const WEEKDAYS = ["monday", "tuesday", "wednesday", "thursday", "friday", "saturday", "sunday"] as const;
const TIME_RANGE_PATTERN = /\d{1,2}(?::\d{2})?\s*(?:AM|PM)\s*[-–]\s*\d{1,2}(?::\d{2})?\s*(?:AM|PM)/i;
const PHONE_PATTERN = /\(?\d{3}\)?[-.\s]?\d{3}[-.\s]?\d{4}/;
const WEBSITE_PATTERN = /https?:\/\/[^\s)\]>]+/i;
const ADDRESS_PATTERN =
  /\b\d+\s+[A-Za-z0-9.' ]*\b(?:street|st|avenue|ave|road|rd|boulevard|blvd|drive|dr|lane|ln|way|court|ct|place|pl|parkway|pkwy|highway|hwy)\b/i;
const FEATURE_PATTERN = /\b(pharmacy|bakery|deli|floral|fuel)\b/i;

function stripMarkup(line: string): string {
  return line
    .replace(/\*\*/g, "")
    .replace(/^(?:[-*•]\s+|\d+[.)]\s+|#+\s+)/, "")
    .trim();
}

function pushUnique(values: string[], value: string): void {
  if (!values.includes(value)) {
    values.push(value);
  }
}

/**
 * Line-oriented scan of a free-text store description. Unknown lines are
 * ignored, so any input yields a (possibly empty) result.
 */
export function parseStoreDetails(text: string, serviceAliases: Readonly<Record<string, string>>): StoreDetails {
  const details: StoreDetails = { hours: {}, services: [], contact: {}, features: [] };
  const aliases = Object.entries(serviceAliases).sort(([left], [right]) => right.length - left.length);

  for (const rawLine of text.replace(/\r\n?/g, "\n").split("\n")) {
    const line = stripMarkup(rawLine);
    if (!line) {
      continue;
    }
    const lower = line.toLowerCase();

    const day = WEEKDAYS.find((weekday) => lower.includes(weekday));
    if (day) {
      details.hours[day] = line.match(TIME_RANGE_PATTERN)?.[0] ?? line;
    }

    for (const [alias, service] of aliases) {
      if (lower.includes(alias)) {
        pushUnique(details.services, service);
      }
    }

    const website = line.match(WEBSITE_PATTERN)?.[0];
    if (website && !details.contact.website) {
      details.contact.website = website.replace(/[.,;]+$/, "");
    }
    const phone = website ? undefined : line.match(PHONE_PATTERN)?.[0];
    if (phone && !details.contact.phone) {
      details.contact.phone = phone;
    }

    if (!details.address && !day && ADDRESS_PATTERN.test(line)) {
      details.address = line.replace(/^address\s*:\s*/i, "");
    }

    if (FEATURE_PATTERN.test(line)) {
      pushUnique(details.features, line);
    }
  }

  return details;
}
