// Field markers the primary source is asked to fill in, with the placeholder
// text shown to it. The parser treats an echoed placeholder as a missing value.
export const STORE_FIELDS = {
  STORE: "[Store Name]",
  ADDRESS: "[Complete street address with city, state, zip]",
  SERVICES: "[comma-separated list: delivery, pickup, curbside, in-store]",
  WEBSITE: '[full URL if available, or "N/A"]',
  STATUS: "[open/closed/temporarily closed]"
} as const;

export const PRODUCT_FIELDS = {
  PRODUCT: "[Product Name]",
  BRAND: "[Brand Name]",
  PRICE: '[Price with $ symbol, or "Price not available"]',
  SIZE: '[Size/quantity, e.g., "32 oz", "1 gallon", "12 pack"]',
  CATEGORY: '[Product category, e.g., "Dairy", "Beverages", "Organic"]',
  AVAILABILITY: "[in stock/out of stock/limited]",
  DESCRIPTION: "[Brief product description]",
  IMAGE_URL: '[Actual product image URL from store website, or "N/A" if not found]',
  DEALS: '[Any current deals, discounts, or "None"]'
} as const;

export type StoreField = keyof typeof STORE_FIELDS;
export type ProductField = keyof typeof PRODUCT_FIELDS;

function templateBlock(fields: Readonly<Record<string, string>>): string {
  return Object.entries(fields)
    .map(([key, placeholder]) => `${key}: ${placeholder}`)
    .join("\n");
}

export function buildStorePrompt(zipcode: string): string {
  return `Find all grocery stores and supermarkets serving zip code ${zipcode}.

Return results in this EXACT format (one store per section, separated by blank lines):

${templateBlock(STORE_FIELDS)}

Example format:
STORE: Giant Eagle
ADDRESS: 123 Main Street, Pittsburgh, PA 15213
SERVICES: delivery, pickup, curbside, in-store
WEBSITE: https://www.gianteagle.com
STATUS: open

Focus on major chains: Walmart, Target, Kroger, Safeway, Publix, Whole Foods, Trader Joe's, ALDI, Wegmans, Giant Eagle, Meijer, Hy-Vee, Food Lion, Stop & Shop, and local grocery stores. Provide accurate addresses and current service availability.`;
}

export function buildProductPrompt(query: string, storeName: string, location: string): string {
  return `Find current product information for "${query}" at ${storeName} in ${location}.

Include product image URLs when available, taken from the store's website or product listings.

Return results in this EXACT format (one product per section, separated by blank lines):

${templateBlock(PRODUCT_FIELDS)}

Example format:
PRODUCT: Organic Whole Milk
BRAND: Horizon
PRICE: $5.29
SIZE: 64 oz
CATEGORY: Dairy
AVAILABILITY: in stock
DESCRIPTION: Organic whole milk, ultra-pasteurized
IMAGE_URL: https://images.example.com/products/horizon-whole-64oz.jpg
DEALS: None

Always include the IMAGE_URL field for each product; use "N/A" when no image URL can be found.
Focus on current availability and accurate pricing.`;
}

export function buildStoreDetailsPrompt(storeName: string, location: string): string {
  return `Find detailed information about ${storeName} in ${location}.
Please provide:
1. Current store hours (day by day)
2. Available services (delivery, pickup, curbside, in-store shopping)
3. Contact information (phone number, website)
4. Store address
5. Any special features or notes

Format the response as structured data.`;
}
