import { describe, it, expect } from "vitest";
import { UrlLedger, trailingSlashVariant } from "../frontier/ledger.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function makeLedger(trailingSlash = true): UrlLedger {
  return new UrlLedger({ trailingSlash });
}

// ---------------------------------------------------------------------------
// trailingSlashVariant
// ---------------------------------------------------------------------------
describe("trailingSlashVariant", () => {
  it("should add a slash to a path without one", () => {
    expect(trailingSlashVariant("/a")).toBe("/a/");
  });

  it("should strip the slash from a path ending in one", () => {
    expect(trailingSlashVariant("/a/")).toBe("/a");
  });

  it("should have no variant for the root", () => {
    expect(trailingSlashVariant("/")).toBeUndefined();
    expect(trailingSlashVariant("")).toBeUndefined();
  });
});

// ---------------------------------------------------------------------------
// UrlLedger
// ---------------------------------------------------------------------------
describe("UrlLedger", () => {
  describe("addUrl", () => {
    it("should report added, then unchanged for a duplicate", () => {
      const ledger = makeLedger();
      expect(ledger.addUrl("/a")).toBe("added");
      expect(ledger.addUrl("/a")).toBe("unchanged");
      expect(ledger.size).toBe(1);
    });

    it("should flip an unvisited entry to visited and report updated", () => {
      const ledger = makeLedger();
      ledger.addUrl("/a");
      expect(ledger.addUrl("/a", true, false, 42)).toBe("updated");
      expect(ledger.hasBeenVisited("/a")).toBe(true);
      expect(ledger.unvisitedCount).toBe(0);
    });

    it("should never flip a visited entry back to unvisited", () => {
      const ledger = makeLedger();
      ledger.addUrl("/a", true, false, 1);
      expect(ledger.addUrl("/a")).toBe("unchanged");
      expect(ledger.hasBeenVisited("/a")).toBe(true);
    });

    it("should record the visit time of entries added as visited", () => {
      const ledger = makeLedger();
      ledger.addUrl("/a", true, false, 5);
      expect(ledger.toJSON()).toEqual([{ path: "/a", visited: true, visitedAt: 5 }]);
    });
  });

  describe("trailing slashes", () => {
    it("should treat /a and /a/ as one entry when enabled", () => {
      const ledger = makeLedger(true);
      ledger.addUrl("/a");
      expect(ledger.addUrl("/a/")).toBe("unchanged");
      expect(ledger.isKnown("/a/")).toBe(true);
      expect(ledger.size).toBe(1);
    });

    it("should keep /a and /a/ apart when disabled", () => {
      const ledger = makeLedger(false);
      ledger.addUrl("/a");
      expect(ledger.addUrl("/a/")).toBe("added");
      expect(ledger.size).toBe(2);
    });
  });

  describe("addMany", () => {
    it("should return the number of entries created", () => {
      const ledger = makeLedger();
      expect(ledger.addMany(["/a", "/a/", "/b"])).toBe(2);
    });

    it("should place a prepended batch at the head in its own order", () => {
      const ledger = makeLedger();
      ledger.addMany(["/a", "/b"]);
      ledger.addMany(["/x", "/y"], { prepend: true });
      expect(ledger.findKnown()).toEqual(["/x", "/y", "/a", "/b"]);
      expect(ledger.popNext(1)).toBe("/x");
    });

    it("should count entries flipped to visited", () => {
      const ledger = makeLedger();
      ledger.addMany(["/a", "/b"]);
      expect(ledger.addMany(["/a", "/c"], { visited: true, timestamp: 3 })).toBe(2);
      expect(ledger.findUnvisited()).toEqual(["/b"]);
    });
  });

  describe("popNext", () => {
    it("should hand out paths in insertion order", () => {
      const ledger = makeLedger();
      ledger.addMany(["/a", "/b"]);
      expect(ledger.popNext(1)).toBe("/a");
      expect(ledger.popNext(2)).toBe("/b");
      expect(ledger.popNext(3)).toBeUndefined();
      expect(ledger.isExhausted()).toBe(true);
    });

    it("should skip entries visited by other means", () => {
      const ledger = makeLedger();
      ledger.addMany(["/a", "/b"]);
      ledger.markVisited("/a", 1);
      expect(ledger.popNext(2)).toBe("/b");
    });

    it("should mark the popped entry visited at the given time", () => {
      const ledger = makeLedger();
      ledger.addUrl("/a");
      ledger.popNext(7);
      expect(ledger.toJSON()).toEqual([{ path: "/a", visited: true, visitedAt: 7 }]);
    });

    it("should keep queue order across prepends while popping past visited heads", () => {
      const ledger = makeLedger();
      ledger.addMany(["/a", "/b"]);
      ledger.addMany(["/p1", "/p2"], { prepend: true });
      ledger.markVisited("/p1", 1);

      expect(ledger.popNext(2)).toBe("/p2");
      expect(ledger.findKnown()).toEqual(["/p1", "/p2", "/a", "/b"]);

      ledger.addUrl("/p0", false, true);
      expect(ledger.popNext(3)).toBe("/p0");
      expect(ledger.findKnown()).toEqual(["/p0", "/p1", "/p2", "/a", "/b"]);
      expect(ledger.popNext(4)).toBe("/a");
      expect(ledger.findUnvisited()).toEqual(["/b"]);
    });
  });

  describe("markVisited", () => {
    it("should return false for an unknown path", () => {
      expect(makeLedger().markVisited("/nope", 1)).toBe(false);
    });

    it("should return true and keep the first visit time", () => {
      const ledger = makeLedger();
      ledger.addUrl("/a");
      expect(ledger.markVisited("/a", 1)).toBe(true);
      expect(ledger.markVisited("/a", 2)).toBe(true);
      expect(ledger.toJSON()).toEqual([{ path: "/a", visited: true, visitedAt: 1 }]);
    });
  });

  describe("fromEntries / toJSON", () => {
    it("should rebuild a ledger and drop duplicate paths", () => {
      const ledger = UrlLedger.fromEntries(
        [
          { path: "/a", visited: true, visitedAt: 3 },
          { path: "/b", visited: false },
          { path: "/a", visited: false },
        ],
        { trailingSlash: true },
      );
      expect(ledger.size).toBe(2);
      expect(ledger.unvisitedCount).toBe(1);
      expect(ledger.popNext(4)).toBe("/b");
    });

    it("should return copies that do not alias the live entries", () => {
      const ledger = makeLedger();
      ledger.addUrl("/a");
      const json = ledger.toJSON();
      json[0].visited = true;
      expect(ledger.hasBeenVisited("/a")).toBe(false);
    });
  });
});
