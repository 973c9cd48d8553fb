import assert from "node:assert/strict";
import test from "node:test";
import { SourceError, SourceTimeoutError } from "../errors";
import { parseShoppingResults, SerperShoppingClient } from "./serper";

const payload = {
  searchParameters: { q: "oat milk site:target.com" },
  shopping: [
    {
      title: "Oatly Oat Milk Original 64 fl oz",
      source: "Target",
      link: "https://www.target.com/p/oatly/-/A-1",
      price: "$5.49",
      imageUrl: "https://target.scene7.com/is/image/Target/1"
    },
    { title: "Silk Oat Milk", link: "https://www.walmart.com/ip/silk/2", price: "$3.99" },
    { title: "Planet Oat Extra Creamy", link: "https://target.com/p/planet/-/A-3", price: "Check site", imageUrl: "data:image/png;base64,AAAA" },
    { link: "https://www.target.com/p/untitled" }
  ]
};

test("parseShoppingResults keeps rows on the expected domain", () => {
  assert.deepEqual(parseShoppingResults(payload, "target.com"), [
    {
      kind: "product",
      name: "Oatly Oat Milk Original 64 fl oz",
      price: 5.49,
      availability: "In Stock",
      productUrl: "https://www.target.com/p/oatly/-/A-1",
      imageUrl: "https://target.scene7.com/is/image/Target/1"
    },
    {
      kind: "product",
      name: "Planet Oat Extra Creamy",
      availability: "In Stock",
      productUrl: "https://target.com/p/planet/-/A-3"
    }
  ]);
});

test("parseShoppingResults keeps every titled row without a domain", () => {
  assert.deepEqual(
    parseShoppingResults(payload).map((record) => record.name),
    ["Oatly Oat Milk Original 64 fl oz", "Silk Oat Milk", "Planet Oat Extra Creamy"]
  );
  assert.deepEqual(parseShoppingResults({ organic: [] }), []);
});

test("parseShoppingResults rejects non-object payloads", () => {
  assert.throws(
    () => parseShoppingResults("oops"),
    (error: unknown) => error instanceof SourceError && error.reason === "malformed_payload"
  );
});

const config = { apiKey: "test-secret", baseUrl: "https://shopping.example.test", maxResults: 20, timeoutMs: 1000, logLevel: "silent" };
const domains: Record<string, string> = { target: "target.com" };

test("SerperShoppingClient scopes the query to the store domain", async (t) => {
  const requests: Array<{ url: string; body: string }> = [];
  t.mock.method(globalThis, "fetch", async (input: string | URL | Request, init?: RequestInit) => {
    requests.push({ url: String(input), body: typeof init?.body === "string" ? init.body : "" });
    return new Response(JSON.stringify(payload), { status: 200 });
  });

  const client = new SerperShoppingClient(config, (storeId) => domains[storeId]);
  const records = await client.searchShopping({ query: "oat milk", storeId: "target", storeName: "Target" });
  await client.searchShopping({ query: "oat milk", storeId: "jewel_osco", storeName: "Jewel-Osco" });

  assert.equal(records.length, 2);
  assert.equal(requests[0]?.url, "https://shopping.example.test/shopping");
  assert.deepEqual(JSON.parse(requests[0]?.body ?? "{}"), { q: "oat milk site:target.com", gl: "us", hl: "en", num: 20 });
  assert.equal(JSON.parse(requests[1]?.body ?? "{}").q, "oat milk Jewel-Osco");
});

test("SerperShoppingClient sends the location hint with the search", async (t) => {
  const bodies: string[] = [];
  t.mock.method(globalThis, "fetch", async (_input: string | URL | Request, init?: RequestInit) => {
    bodies.push(typeof init?.body === "string" ? init.body : "");
    return new Response(JSON.stringify(payload), { status: 200 });
  });

  const client = new SerperShoppingClient(config, (storeId) => domains[storeId]);
  await client.searchShopping({ query: "oat milk", storeId: "target", storeName: "Target", location: "60622" });

  assert.deepEqual(JSON.parse(bodies[0] ?? "{}"), {
    q: "oat milk site:target.com",
    gl: "us",
    hl: "en",
    num: 20,
    location: "60622"
  });
});

test("SerperShoppingClient maps HTTP failures to source errors", async (t) => {
  t.mock.method(globalThis, "fetch", async () => new Response("denied", { status: 401 }));

  const client = new SerperShoppingClient(config, (storeId) => domains[storeId]);
  await assert.rejects(
    client.searchShopping({ query: "oat milk", storeId: "target", storeName: "Target" }),
    (error: unknown) => error instanceof SourceError && error.reason === "authentication_failed" && error.status === 401
  );
});

test("SerperShoppingClient reports an aborted call as a timeout", async (t) => {
  t.mock.method(globalThis, "fetch", async (_input: string | URL | Request, init?: RequestInit) => {
    await new Promise<void>((resolve) => init?.signal?.addEventListener("abort", () => resolve(), { once: true }));
    throw new DOMException("aborted", "AbortError");
  });

  const client = new SerperShoppingClient(config, (storeId) => domains[storeId]);
  const controller = new AbortController();
  const pending = client.searchShopping({ query: "oat milk", storeId: "target", storeName: "Target", signal: controller.signal });
  controller.abort();
  await assert.rejects(pending, (error: unknown) => error instanceof SourceTimeoutError && error.source === "serper_shopping");
});
