/**
 * Canonical store id for a store name: `Trader Joe's` -> `trader_joes`,
 * `Stop & Shop` -> `stop_and_shop`. Idempotent on its own output.
 */
export function slugifyStoreId(storeName: string): string {
  return storeName
    .toLowerCase()
    .replace(/[\s-]+/g, "_")
    .replace(/['’]/g, "")
    .replace(/&/g, "and")
    .replace(/[^a-z0-9_]/g, "")
    .replace(/_{2,}/g, "_")
    .replace(/^_+|_+$/g, "");
}

/** `whole_foods` -> `Whole Foods`, used when a store id has no catalog entry. */
export function titleCaseStoreId(storeId: string): string {
  return storeId
    .split("_")
    .filter(Boolean)
    .map((part) => part.slice(0, 1).toUpperCase() + part.slice(1))
    .join(" ");
}
