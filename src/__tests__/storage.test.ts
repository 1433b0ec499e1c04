import { describe, it, expect } from "vitest";
import { brotliCompressSync } from "node:zlib";
import { UrlLedger } from "../frontier/ledger.js";
import { CompressedStorage, PlainStorage, getStorage } from "../frontier/storage/index.js";
import { FrontierError } from "../frontier/errors.js";

const ledgerOptions = { trailingSlash: true };

function makeLedger(): UrlLedger {
  const ledger = new UrlLedger(ledgerOptions);
  ledger.addMany(["/a", "/b"]);
  ledger.markVisited("/a", 9);
  return ledger;
}

describe("getStorage", () => {
  it("should pick the strategy matching the compressed flag", () => {
    expect(getStorage(false, ledgerOptions)).toBeInstanceOf(PlainStorage);
    expect(getStorage(true, ledgerOptions)).toBeInstanceOf(CompressedStorage);
  });
});

describe("PlainStorage", () => {
  const storage = new PlainStorage();

  it("should hold the live ledger", () => {
    const ledger = makeLedger();
    expect(storage.unpackLedger(storage.packLedger(ledger))).toBe(ledger);
  });

  it("should refuse a compressed buffer", () => {
    expect(() => storage.unpackLedger(Buffer.from("x"))).toThrow(FrontierError);
  });
});

describe("CompressedStorage", () => {
  const storage = new CompressedStorage(ledgerOptions);

  it("should pack a ledger into a buffer", () => {
    expect(Buffer.isBuffer(storage.packLedger(makeLedger()))).toBe(true);
  });

  it("should unpack to an equivalent ledger", () => {
    const restored = storage.unpackLedger(storage.packLedger(makeLedger()));
    expect(restored.toJSON()).toEqual([
      { path: "/a", visited: true, visitedAt: 9 },
      { path: "/b", visited: false },
    ]);
    expect(restored.popNext(10)).toBe("/b");
  });

  it("should round trip rules text", () => {
    const text = "User-agent: *\nDisallow: /private\n";
    const packed = storage.packText(text);
    expect(Buffer.isBuffer(packed)).toBe(true);
    expect(storage.unpackText(packed)).toBe(text);
  });

  it("should reject a buffer that does not hold ledger entries", () => {
    const bogus = brotliCompressSync(Buffer.from('[{"path":1}]', "utf-8"));
    expect(() => storage.unpackLedger(bogus)).toThrow();
  });
});
