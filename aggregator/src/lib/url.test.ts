import assert from "node:assert/strict";
import test from "node:test";
import { derivedImageUrl, hostMatchesDomain, normalizeUrl, parseRetailerProductUrl } from "./url";

test("normalizeUrl removes tracking params and fragments", () => {
  assert.equal(normalizeUrl("https://Example.com/search?q=bottle&utm_source=ads#top"), "https://example.com/search?q=bottle");
});

test("normalizeUrl sorts params and collapses slashes", () => {
  assert.equal(normalizeUrl("https://www.target.com/p/oat//milk/?b=2&a=1"), "https://www.target.com/p/oat/milk?a=1&b=2");
});

test("normalizeUrl rejects non-http input", () => {
  assert.equal(normalizeUrl("ftp://files.example.com/a"), null);
  assert.equal(normalizeUrl("not a url"), null);
});

test("hostMatchesDomain accepts subdomains and rejects lookalikes", () => {
  assert.equal(hostMatchesDomain("https://www.target.com/p/x", "target.com"), true);
  assert.equal(hostMatchesDomain("https://shop.wholefoodsmarket.com/a", "wholefoodsmarket.com"), true);
  assert.equal(hostMatchesDomain("https://nottarget.com/", "target.com"), false);
  assert.equal(hostMatchesDomain("garbage", "target.com"), false);
});

test("parseRetailerProductUrl reads Target product pages", () => {
  const link = parseRetailerProductUrl("https://www.target.com/p/oatly-oat-milk-original-64-fl-oz/-/A-53527582#lnk");

  assert.deepEqual(link, {
    retailer: "target",
    url: "https://www.target.com/p/oatly-oat-milk-original-64-fl-oz/-/A-53527582",
    nameKey: "oatly oat milk original 64 fl oz",
    productId: "53527582"
  });
  assert.equal(
    link && derivedImageUrl(link),
    "https://target.scene7.com/is/image/Target/53527582?wid=1200&hei=1200&qlt=80&fmt=webp"
  );
});

test("parseRetailerProductUrl reads Walmart and Amazon product pages", () => {
  const walmart = parseRetailerProductUrl("https://www.walmart.com/ip/Silk-Oat-Milk-Original-59-fl-oz/123456789");
  assert.equal(walmart?.nameKey, "silk oat milk original 59 fl oz");
  assert.equal(walmart?.productId, "123456789");
  assert.equal(walmart && derivedImageUrl(walmart), undefined);

  assert.equal(parseRetailerProductUrl("https://www.amazon.com/dp/B08XYZ1234")?.nameKey, "amazon product b08xyz1234");
  assert.equal(
    parseRetailerProductUrl("https://www.amazon.com/Califia-Farms-Oat-Barista/dp/B07ABC/ref=sr_1")?.nameKey,
    "califia farms oat barista"
  );
});

test("parseRetailerProductUrl ignores other pages", () => {
  assert.equal(parseRetailerProductUrl("https://www.example.com/p/thing"), null);
  assert.equal(parseRetailerProductUrl("https://www.target.com/c/dairy"), null);
});
