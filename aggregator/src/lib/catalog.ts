import { z } from "zod";
import catalogJson from "../data/catalog.json";
import coverageJson from "../data/coverage.json";
import { CandidateStore } from "../types";
import { titleCaseStoreId } from "./slugify";

const ZipRangeSchema = z.string().regex(/^\d{5}-\d{5}$/);

export const CatalogDataSchema = z.object({
  stores: z.array(
    z.object({
      id: z.string().min(1),
      name: z.string().min(1),
      domain: z.string().min(1).optional()
    })
  ),
  knownStoreNames: z.array(z.string().min(1)),
  productKeywords: z.array(z.string().min(1)),
  serviceAliases: z.record(z.string())
});

export const CoverageDataSchema = z.record(z.array(ZipRangeSchema));

export type CatalogData = z.infer<typeof CatalogDataSchema>;
export type CoverageData = z.infer<typeof CoverageDataSchema>;

/** Static store lookups: display names, shopping domains, keyword lists and zip coverage. */
export class StoreCatalog {
  private readonly names = new Map<string, string>();
  private readonly domains = new Map<string, string>();

  constructor(
    private readonly data: CatalogData,
    private readonly coverage: CoverageData = {}
  ) {
    for (const store of data.stores) {
      this.names.set(store.id, store.name);
      if (store.domain) {
        this.domains.set(store.id, store.domain.toLowerCase());
      }
    }
  }

  static load(): StoreCatalog {
    return new StoreCatalog(CatalogDataSchema.parse(catalogJson), CoverageDataSchema.parse(coverageJson));
  }

  displayName(storeId: string): string {
    return this.names.get(storeId) ?? titleCaseStoreId(storeId);
  }

  domainFor(storeId: string): string | undefined {
    return this.domains.get(storeId);
  }

  get knownStoreNames(): readonly string[] {
    return this.data.knownStoreNames;
  }

  get productKeywords(): readonly string[] {
    return this.data.productKeywords;
  }

  get serviceAliases(): Readonly<Record<string, string>> {
    return this.data.serviceAliases;
  }

  /** Chains whose zip ranges contain the postal code, in coverage-table order. */
  storesCovering(zipcode: string): CandidateStore[] {
    const numeric = Number.parseInt(zipcode, 10);
    if (!Number.isFinite(numeric)) {
      return [];
    }

    const matches: CandidateStore[] = [];
    for (const [storeId, ranges] of Object.entries(this.coverage)) {
      const covered = ranges.some((range) => {
        const [start, end] = range.split("-").map((part) => Number.parseInt(part, 10));
        return numeric >= start && numeric <= end;
      });
      if (covered) {
        matches.push({ storeId, storeName: this.displayName(storeId) });
      }
    }
    return matches;
  }
}
