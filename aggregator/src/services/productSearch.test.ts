import assert from "node:assert/strict";
import test from "node:test";
import { ConfigurationError, SourceError } from "../errors";
import { StoreCatalog } from "../lib/catalog";
import { Logger } from "../lib/logger";
import { TextRecordParser } from "../lib/parser";
import { StubPrimary, StubSecondary, textResponse } from "../testing/stubs";
import { ProductSearchService } from "./productSearch";

const logger = new Logger("aggregator", "silent");
const parser = new TextRecordParser(StoreCatalog.load());
const target = { storeId: "target", storeName: "Target" };

test("searchStore parses the primary answer and fills URLs from citations", async () => {
  const primary = new StubPrimary(async () =>
    textResponse(
      "PRODUCT: Oatly Oat Milk Original\nBRAND: Oatly\nPRICE: $4.99\n\nPRODUCT: Silk Vanilla Soymilk\nPRICE: $3.79",
      ["https://www.target.com/p/oatly-oat-milk-original/-/A-111"]
    )
  );
  const service = new ProductSearchService({ primary, secondary: null, parser, enhanceMaxProducts: 5, logger });

  const products = await service.searchStore("oat milk", target, "60622");

  assert.deepEqual(products, [
    {
      record: {
        kind: "product",
        name: "Oatly Oat Milk Original",
        brand: "Oatly",
        price: 4.99,
        productUrl: "https://www.target.com/p/oatly-oat-milk-original/-/A-111",
        imageUrl: "https://target.scene7.com/is/image/Target/111?wid=1200&hei=1200&qlt=80&fmt=webp"
      },
      sources: ["perplexity_sonar"]
    },
    { record: { kind: "product", name: "Silk Vanilla Soymilk", price: 3.79 }, sources: ["perplexity_sonar"] }
  ]);
  assert.equal(primary.prompts.length, 1);
  assert.ok(primary.prompts[0]?.includes('"oat milk" at Target in 60622'));
});

test("searchStore with enhance borrows links from the secondary source", async () => {
  const primary = new StubPrimary(async () =>
    textResponse(
      [
        "PRODUCT: Oatly Barista Edition",
        "BRAND: Oatly",
        "",
        "PRODUCT: Silk Vanilla Soymilk",
        "",
        "PRODUCT: Califia Farms Oat Milk"
      ].join("\n")
    )
  );
  const secondary = new StubSecondary(async (search) => {
    if (search.query === "Silk Vanilla Soymilk") {
      throw new SourceError("serper_shopping", "rate_limited", "slow down", 429);
    }
    return [
      {
        kind: "product",
        name: "Oatly Barista Edition Oat Milk 32 oz",
        productUrl: "https://www.target.com/p/oatly-barista/-/A-9",
        imageUrl: "https://img.example.com/oatly.jpg"
      }
    ];
  });
  const service = new ProductSearchService({ primary, secondary, parser, enhanceMaxProducts: 2, logger });

  const products = await service.searchStore("oat milk", target, "60622", { enhance: true });

  assert.deepEqual(products, [
    {
      record: {
        kind: "product",
        name: "Oatly Barista Edition",
        brand: "Oatly",
        imageUrl: "https://img.example.com/oatly.jpg",
        productUrl: "https://www.target.com/p/oatly-barista/-/A-9"
      },
      sources: ["perplexity_sonar", "serper_shopping"]
    },
    { record: { kind: "product", name: "Silk Vanilla Soymilk" }, sources: ["perplexity_sonar"] },
    { record: { kind: "product", name: "Califia Farms Oat Milk" }, sources: ["perplexity_sonar"] }
  ]);
  assert.deepEqual(
    secondary.calls.map((call) => [call.query, call.storeId, call.location]),
    [
      ["Oatly Barista Edition", "target", "60622"],
      ["Silk Vanilla Soymilk", "target", "60622"]
    ]
  );
});

test("searchStore propagates primary failures", async () => {
  const primary = new StubPrimary(async () => {
    throw new SourceError("perplexity_sonar", "authentication_failed", "bad key", 401);
  });
  const service = new ProductSearchService({ primary, secondary: null, parser, enhanceMaxProducts: 5, logger });

  await assert.rejects(
    service.searchStore("oat milk", target, "60622"),
    (error: unknown) => error instanceof SourceError && error.reason === "authentication_failed"
  );
});

test("searchStore requires a primary source", async () => {
  const service = new ProductSearchService({ primary: null, secondary: null, parser, enhanceMaxProducts: 5, logger });

  assert.equal(service.hasPrimary(), false);
  await assert.rejects(service.searchStore("oat milk", target, "60622"), ConfigurationError);
});

test("searchSecondary tags shopping rows and is empty without a client", async () => {
  const secondary = new StubSecondary(async () => [{ kind: "product", name: "Silk Oat Milk", price: 3.99 }]);
  const withSecondary = new ProductSearchService({ primary: null, secondary, parser, enhanceMaxProducts: 5, logger });
  const without = new ProductSearchService({ primary: null, secondary: null, parser, enhanceMaxProducts: 5, logger });

  assert.deepEqual(await withSecondary.searchSecondary("oat milk", target, "60622"), [
    { record: { kind: "product", name: "Silk Oat Milk", price: 3.99 }, sources: ["serper_shopping"] }
  ]);
  assert.equal(secondary.calls[0]?.location, "60622");
  assert.deepEqual(await without.searchSecondary("oat milk", target, "60622"), []);
});
