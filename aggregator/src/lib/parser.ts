import { ParsedRecord, ProductRecord, RecordKind, StoreRecord } from "../types";
import { normText, parsePriceText } from "./normalize";
import { slugifyStoreId } from "./slugify";
import { PRODUCT_FIELDS, ProductField, STORE_FIELDS, StoreField } from "./templates";

export interface ParserVocabulary {
  readonly knownStoreNames: readonly string[];
  readonly productKeywords: readonly string[];
  readonly serviceAliases: Readonly<Record<string, string>>;
}

interface StoreDraft {
  storeName?: string;
  address?: string;
  services: string[];
  website?: string;
  status?: string;
}

type ProductDraft = Omit<ProductRecord, "kind" | "name"> & { name?: string };

const FIELD_LINE_PATTERN = /^([A-Za-z_]+)\s*:\s*(.*)$/;
const LIST_MARKER_PATTERN = /^(?:[-*•]\s+|\d+[.)]\s+)/;
const IMAGE_URL_PATTERN = /https?:\/\/[^\s)\]"'<>]+\.(?:jpe?g|png|gif|webp|svg)\b/i;
const BRACKETED_PATTERN = /^\[[^\]]*\]$/;
const SIZE_PATTERN =
  /\b(\d+(?:\.\d+)?\s*(?:fl\.?\s*oz|fluid\s+ounces?|ounces?|oz|gallons?|gal|quarts?|qt|pints?|pack|count|ct|ml|lbs?|kg|g|l))\b/i;
const AVAILABILITY_PATTERN = /\b(in stock|out of stock|unavailable|available|limited)\b/i;
const DEAL_PATTERN = /\b(discounts?|sales?|off|deals?|promotions?|bogo)\b/i;
const NOT_AVAILABLE_FIELDS = new Set<string>(["WEBSITE", "IMAGE_URL"]);

function cleanLine(line: string): string {
  return line.replace(/\*\*/g, "").trim().replace(LIST_MARKER_PATTERN, "").trim();
}

function splitSections(text: string): string[][] {
  return text
    .replace(/\r\n?/g, "\n")
    .split(/\n[ \t]*\n/)
    .map((section) => section.split("\n").map(cleanLine).filter((line) => line.length > 0))
    .filter((lines) => lines.length > 0);
}

function hasField<T extends Readonly<Record<string, string>>>(
  fields: T,
  key: string
): key is Extract<keyof T, string> {
  return Object.prototype.hasOwnProperty.call(fields, key);
}

/**
 * `KEY: value` for keys in the vocabulary. An echoed template placeholder
 * (or any fully bracketed value) comes back as an absent value.
 */
function readField<T extends Readonly<Record<string, string>>>(
  line: string,
  fields: T
): { key: Extract<keyof T, string>; value?: string } | null {
  const match = line.match(FIELD_LINE_PATTERN);
  if (!match) {
    return null;
  }
  const key = match[1].toUpperCase();
  if (!hasField(fields, key)) {
    return null;
  }

  const value = match[2].trim();
  const placeholder = fields[key];
  if (
    value.length === 0 ||
    value === placeholder ||
    BRACKETED_PATTERN.test(value) ||
    (NOT_AVAILABLE_FIELDS.has(key) && value.toUpperCase() === "N/A")
  ) {
    return { key };
  }
  return { key, value };
}

function firstImageUrl(line: string): string | undefined {
  return line.match(IMAGE_URL_PATTERN)?.[0];
}

function dedupeBy<T>(records: T[], keyOf: (record: T) => string): T[] {
  const seen = new Set<string>();
  const output: T[] = [];
  for (const record of records) {
    const key = keyOf(record);
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    output.push(record);
  }
  return output;
}

/**
 * Turns free-text source answers into store or product records. Strict
 * parsing reads the `KEY: value` template section by section; when that
 * yields nothing, a keyword scan over the whole text takes over.
 */
export class TextRecordParser {
  constructor(private readonly vocabulary: ParserVocabulary) {}

  parse(text: string, kind: "store"): StoreRecord[];
  parse(text: string, kind: "product"): ProductRecord[];
  parse(text: string, kind: RecordKind): ParsedRecord[];
  parse(text: string, kind: RecordKind): ParsedRecord[] {
    return kind === "store" ? this.parseStores(text) : this.parseProducts(text);
  }

  parseStores(text: string): StoreRecord[] {
    if (typeof text !== "string" || text.trim().length === 0) {
      return [];
    }
    const structured = this.structuredStores(text);
    const records = structured.length > 0 ? structured : this.storesByName(text);
    return dedupeBy(records, (record) => record.storeId);
  }

  parseProducts(text: string): ProductRecord[] {
    if (typeof text !== "string" || text.trim().length === 0) {
      return [];
    }
    const structured = this.structuredProducts(text);
    const records = structured.length > 0 ? structured : this.productsByKeyword(text);
    return dedupeBy(records, (record) => normText(record.name));
  }

  parseServices(text: string): string[] {
    const services: string[] = [];
    for (const entry of text.split(/[,;/]/)) {
      const service = this.vocabulary.serviceAliases[normText(entry)];
      if (service && !services.includes(service)) {
        services.push(service);
      }
    }
    return services;
  }

  private structuredStores(text: string): StoreRecord[] {
    const records: StoreRecord[] = [];

    const flush = (draft: StoreDraft): void => {
      if (!draft.storeName) {
        return;
      }
      const storeId = slugifyStoreId(draft.storeName);
      if (!storeId) {
        return;
      }
      records.push({
        kind: "store",
        storeId,
        storeName: draft.storeName,
        ...(draft.address ? { address: draft.address } : {}),
        services: draft.services,
        ...(draft.website ? { website: draft.website } : {}),
        status: draft.status ?? "active"
      });
    };

    for (const lines of splitSections(text)) {
      let draft: StoreDraft = { services: [] };
      for (const line of lines) {
        const field = readField(line, STORE_FIELDS);
        if (!field) {
          continue;
        }
        // A second STORE marker in one section starts the next record.
        if (field.key === "STORE" && draft.storeName) {
          flush(draft);
          draft = { services: [] };
        }
        this.applyStoreField(field.key, field.value, draft);
      }
      flush(draft);
    }

    return records;
  }

  private applyStoreField(key: StoreField, value: string | undefined, draft: StoreDraft): void {
    if (value === undefined) {
      return;
    }
    switch (key) {
      case "STORE":
        draft.storeName = value;
        break;
      case "ADDRESS":
        draft.address = value;
        break;
      case "SERVICES":
        draft.services = this.parseServices(value);
        break;
      case "WEBSITE":
        draft.website = value;
        break;
      case "STATUS":
        draft.status = value;
        break;
    }
  }

  private structuredProducts(text: string): ProductRecord[] {
    const records: ProductRecord[] = [];

    const flush = (draft: ProductDraft): void => {
      const { name, ...rest } = draft;
      if (name) {
        records.push({ kind: "product", name, ...rest });
      }
    };

    for (const lines of splitSections(text)) {
      let draft: ProductDraft = {};
      for (const line of lines) {
        const field = readField(line, PRODUCT_FIELDS);
        if (!field) {
          // Bare image links count only until an image is known; IMAGE_URL overrides them.
          const recovered = draft.imageUrl ? undefined : firstImageUrl(line);
          if (recovered) {
            draft.imageUrl = recovered;
          }
          continue;
        }
        if (field.key === "PRODUCT" && draft.name) {
          flush(draft);
          draft = {};
        }
        applyProductField(field.key, field.value, draft);
      }
      flush(draft);
    }

    return records;
  }

  private storesByName(text: string): StoreRecord[] {
    const haystack = text.toLowerCase();
    return this.vocabulary.knownStoreNames
      .filter((storeName) => haystack.includes(storeName.toLowerCase()))
      .map((storeName) => ({
        kind: "store" as const,
        storeId: slugifyStoreId(storeName),
        storeName,
        services: [],
        status: "active"
      }));
  }

  private productsByKeyword(text: string): ProductRecord[] {
    const records: ProductRecord[] = [];
    const keywords = this.vocabulary.productKeywords.map((keyword) => keyword.toLowerCase());
    let draft: ProductDraft = {};

    const flush = (): void => {
      const { name, ...rest } = draft;
      if (name) {
        records.push({ kind: "product", name, ...rest });
      }
      draft = {};
    };

    for (const rawLine of text.replace(/\r\n?/g, "\n").split("\n")) {
      const line = cleanLine(rawLine);
      if (!line) {
        flush();
        continue;
      }

      // Template lines contribute their filled-in value only, never the placeholder text.
      const field = readField(line, PRODUCT_FIELDS);
      if (field) {
        if (field.key === "PRODUCT" && field.value !== undefined && draft.name) {
          flush();
        }
        applyProductField(field.key, field.value, draft);
        continue;
      }

      const lower = line.toLowerCase();
      const price = line.match(/\$\d+(?:\.\d+)?/)?.[0];
      const size = line.match(SIZE_PATTERN)?.[1];

      if (keywords.some((keyword) => lower.includes(keyword)) && !FIELD_LINE_PATTERN.test(line)) {
        if (draft.name) {
          flush();
        }
        draft.name = line;
        if (price) {
          draft.price = parsePriceText(price);
        }
        if (size) {
          draft.size = size;
        }
        continue;
      }

      if (price) {
        draft.price = parsePriceText(price);
        continue;
      }

      if (AVAILABILITY_PATTERN.test(line)) {
        draft.availability = line;
        continue;
      }

      if (DEAL_PATTERN.test(line)) {
        draft.deals = line;
        continue;
      }

      if (size) {
        draft.size = size;
        continue;
      }

      const image = firstImageUrl(line);
      if (image && !draft.imageUrl) {
        draft.imageUrl = image;
      }
    }
    flush();

    return records;
  }
}

function applyProductField(key: ProductField, value: string | undefined, fields: ProductDraft): void {
  if (value === undefined) {
    return;
  }
  switch (key) {
    case "PRODUCT":
      fields.name = value;
      break;
    case "BRAND":
      fields.brand = value;
      break;
    case "PRICE":
      fields.price = parsePriceText(value);
      break;
    case "SIZE":
      fields.size = value;
      break;
    case "CATEGORY":
      fields.category = value;
      break;
    case "AVAILABILITY":
      fields.availability = value;
      break;
    case "DESCRIPTION":
      fields.description = value;
      break;
    case "IMAGE_URL":
      fields.imageUrl = value;
      break;
    case "DEALS":
      fields.deals = value;
      break;
  }
}
