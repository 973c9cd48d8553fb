import assert from "node:assert/strict";
import test from "node:test";
import { TextRecordParser } from "./parser";
import { buildProductPrompt } from "./templates";

const parser = new TextRecordParser({
  knownStoreNames: ["Whole Foods", "Trader Joe's", "Target"],
  productKeywords: ["oatly", "silk", "oat", "milk"],
  serviceAliases: { pickup: "pickup", delivery: "delivery", "in-store": "in-store" }
});

test("parseProducts reads one record per blank-line section", () => {
  const text = [
    "PRODUCT: Oatly Original",
    "BRAND: Oatly",
    "PRICE: $4.99",
    "SIZE: 32 oz",
    "AVAILABILITY: in stock",
    "IMAGE_URL: N/A",
    "",
    "PRODUCT: Silk Original",
    "BRAND: Silk",
    "PRICE: Price not available",
    "SIZE: 59 oz",
    "DEALS: None"
  ].join("\n");

  assert.deepEqual(parser.parseProducts(text), [
    { kind: "product", name: "Oatly Original", brand: "Oatly", price: 4.99, size: "32 oz", availability: "in stock" },
    { kind: "product", name: "Silk Original", brand: "Silk", price: "Price not available", size: "59 oz", deals: "None" }
  ]);
});

test("parseProducts treats echoed placeholders as missing values", () => {
  const text = [
    "PRODUCT: [Product Name]",
    "BRAND: [Brand Name]",
    'PRICE: [Price with $ symbol, or "Price not available"]',
    "",
    "PRODUCT: Chobani Oat",
    "BRAND: [Brand Name]",
    "CATEGORY: [Dairy or similar]"
  ].join("\n");

  assert.deepEqual(parser.parseProducts(text), [{ kind: "product", name: "Chobani Oat" }]);
});

test("parseProducts tolerates markdown bullets, bold markers and CRLF", () => {
  const text = "- **PRODUCT:** Oatly Barista\r\n- **PRICE:** $5.49\r\n";

  assert.deepEqual(parser.parseProducts(text), [{ kind: "product", name: "Oatly Barista", price: 5.49 }]);
});

test("parseProducts splits repeated PRODUCT markers inside one section", () => {
  const text = "PRODUCT: Oatly Original\nPRICE: $4.99\nPRODUCT: Silk Oat\nPRICE: $3.79";

  assert.deepEqual(parser.parseProducts(text), [
    { kind: "product", name: "Oatly Original", price: 4.99 },
    { kind: "product", name: "Silk Oat", price: 3.79 }
  ]);
});

test("parseProducts recovers a bare image link when IMAGE_URL is missing", () => {
  const text = "PRODUCT: Oatly Barista\nPhoto: https://cdn.example.com/img/oatly-barista.png";

  assert.deepEqual(parser.parseProducts(text), [
    { kind: "product", name: "Oatly Barista", imageUrl: "https://cdn.example.com/img/oatly-barista.png" }
  ]);
});

test("parseProducts lets an explicit IMAGE_URL replace a recovered link", () => {
  const text = [
    "PRODUCT: Oatly Barista",
    "https://cdn.example.com/a.jpg",
    "IMAGE_URL: https://cdn.example.com/b.webp"
  ].join("\n");

  assert.equal(parser.parseProducts(text)[0]?.imageUrl, "https://cdn.example.com/b.webp");
});

test("parseProducts ignores bare image links after IMAGE_URL is set", () => {
  const text = [
    "IMAGE_URL: https://cdn.example.com/b.webp",
    "https://cdn.example.com/a.jpg",
    "PRODUCT: Oatly Barista"
  ].join("\n");

  assert.equal(parser.parseProducts(text)[0]?.imageUrl, "https://cdn.example.com/b.webp");
});

test("parseProducts keeps the first record per product name", () => {
  const text = "PRODUCT: Silk Oat\nPRICE: $3.79\n\nPRODUCT: silk oat\nPRICE: $9.99";

  assert.deepEqual(parser.parseProducts(text), [{ kind: "product", name: "Silk Oat", price: 3.79 }]);
});

test("parseProducts falls back to keyword scanning when no template is present", () => {
  const text = [
    "Here are some options:",
    "Oatly Oat Milk Original",
    "$4.99",
    "Available in 64 oz cartons",
    "",
    "Silk Oat Milk - $3.79 - 59 oz",
    "Out of stock"
  ].join("\n");

  assert.deepEqual(parser.parseProducts(text), [
    { kind: "product", name: "Oatly Oat Milk Original", price: 4.99, availability: "Available in 64 oz cartons" },
    { kind: "product", name: "Silk Oat Milk - $3.79 - 59 oz", price: 3.79, size: "59 oz", availability: "Out of stock" }
  ]);
});

test("keyword fallback skips echoed template lines and keeps filled-in values", () => {
  const template = buildProductPrompt("oat milk", "Target", "60622")
    .split("\n")
    .filter((line) => /^[A-Z_]+: \[/.test(line));
  const sentence = "I could not find exact listings for oat milk at this store.";

  assert.equal(template.length, 9);
  assert.deepEqual(parser.parseProducts([sentence, ...template].join("\n")), [{ kind: "product", name: sentence }]);

  const partlyFilled = template.map((line) => (line.startsWith("SIZE:") ? "SIZE: 64 oz" : line));
  assert.deepEqual(parser.parseProducts([sentence, ...partlyFilled].join("\n")), [
    { kind: "product", name: sentence, size: "64 oz" }
  ]);
});

test("parse never throws and returns a list for hostile input", () => {
  const inputs = ["", "   \n\n  ", "\u0000\u0001garbage\n\n\n:::", "PRODUCT:", "BRAND: Foo\nPRICE: $3", "STORE:\n\nSTORE: [Store Name]"];
  for (const input of inputs) {
    assert.deepEqual(parser.parse(input, "product"), []);
    assert.deepEqual(parser.parse(input, "store"), []);
  }
});

test("parseStores reads the store template and derives store ids", () => {
  const text = [
    "STORE: Trader Joe's",
    "ADDRESS: 1840 N Clybourn Ave, Chicago, IL 60614",
    "SERVICES: pickup, In-Store, teleportation",
    "WEBSITE: N/A",
    "STATUS: open",
    "",
    "STORE: [Store Name]",
    "ADDRESS: 1 Nowhere Rd",
    "",
    "STORE: Target",
    "SERVICES: [comma-separated list: delivery, pickup, curbside, in-store]"
  ].join("\n");

  assert.deepEqual(parser.parse(text, "store"), [
    {
      kind: "store",
      storeId: "trader_joes",
      storeName: "Trader Joe's",
      address: "1840 N Clybourn Ave, Chicago, IL 60614",
      services: ["pickup", "in-store"],
      status: "open"
    },
    { kind: "store", storeId: "target", storeName: "Target", services: [], status: "active" }
  ]);
});

test("parseStores keeps the first record per store id", () => {
  const text = "STORE: Target\nSTATUS: open\n\nSTORE: TARGET\nSTATUS: closed";

  assert.deepEqual(parser.parseStores(text), [
    { kind: "store", storeId: "target", storeName: "Target", services: [], status: "open" }
  ]);
});

test("parseStores falls back to known store names in free text", () => {
  const text = "You can shop at whole foods or at Trader Joe's near you.";

  assert.deepEqual(parser.parseStores(text), [
    { kind: "store", storeId: "whole_foods", storeName: "Whole Foods", services: [], status: "active" },
    { kind: "store", storeId: "trader_joes", storeName: "Trader Joe's", services: [], status: "active" }
  ]);
});
