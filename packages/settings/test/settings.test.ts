import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { Selector, SelectorParseError } from "@snapbind/core";

import { Settings } from "../src/index.js";
import type { RedactionEntry } from "../src/index.js";

function sources(entries: Iterable<RedactionEntry>): string[] {
  return [...entries].map(([selector]) => selector.source);
}

function kinds(entries: Iterable<RedactionEntry>): string[] {
  return [...entries].map(([, redaction]) => redaction.kind);
}

describe("Settings defaults", () => {
  it("starts with map sorting off, the default directory and no redactions", () => {
    const settings = new Settings();
    assert.equal(settings.sortMaps(), false);
    assert.equal(settings.snapshotPath(), "snapshots");
    assert.equal(settings.redactionCount(), 0);
    assert.deepEqual([...settings.iterRedactions()], []);
  });

  it("Settings.new() is the same as new Settings()", () => {
    assert.ok(Settings.new().equals(new Settings()));
  });

  it("shares the default snapshot instead of allocating one", () => {
    const a = new Settings();
    const b = new Settings();
    assert.ok(a.sharesSnapshotWith(b));
  });
});

describe("Settings copy-on-write", () => {
  it("clone shares storage until a write", () => {
    const a = new Settings();
    const b = a.clone();
    assert.ok(a.sharesSnapshotWith(b));
  });

  it("writes to one clone do not reach the other", () => {
    const a = new Settings();
    const b = a.clone();
    a.setSortMaps(true);
    a.setSnapshotPath("__snapshots__");

    assert.equal(a.sortMaps(), true);
    assert.equal(a.snapshotPath(), "__snapshots__");
    assert.equal(b.sortMaps(), false);
    assert.equal(b.snapshotPath(), "snapshots");
    assert.ok(!a.sharesSnapshotWith(b));
  });

  it("writes never reach the process default", () => {
    const a = new Settings();
    a.setSortMaps(true);
    a.addRedaction(".id", "[id]");
    const fresh = new Settings();
    assert.equal(fresh.sortMaps(), false);
    assert.equal(fresh.redactionCount(), 0);
  });

  it("redaction lists are copied, not shared, on write", () => {
    const a = new Settings();
    a.addRedaction(".a", 1);
    const b = a.clone();
    b.addRedaction(".b", 2);
    a.clearRedactions();

    assert.deepEqual(sources(a.iterRedactions()), []);
    assert.deepEqual(sources(b.iterRedactions()), [".a", ".b"]);
  });

  it("siblings stay isolated across repeated clone and write rounds", () => {
    const a = new Settings();
    a.setSortMaps(true);
    const b = a.clone();
    b.setSortMaps(false);
    const before = a.clone();
    before.setSnapshotPath("elsewhere");
    a.setSnapshotPath("mine");
    assert.equal(a.snapshotPath(), "mine");
    assert.equal(before.snapshotPath(), "elsewhere");
    assert.equal(b.snapshotPath(), "snapshots");
    assert.equal(b.sortMaps(), false);
    assert.equal(before.sortMaps(), true);
  });
});

describe("Settings.equals", () => {
  it("compares tunables, not storage", () => {
    const a = new Settings();
    a.setSortMaps(true);
    const b = new Settings();
    b.setSortMaps(true);
    assert.ok(!a.sharesSnapshotWith(b));
    assert.ok(a.equals(b));
  });

  it("differs when a tunable differs", () => {
    const a = new Settings();
    const b = new Settings();
    b.setSnapshotPath("other");
    assert.ok(!a.equals(b));
  });

  it("compares static redactions by value", () => {
    const a = new Settings();
    const b = new Settings();
    a.addRedaction(".id", { masked: true });
    b.addRedaction(".id", { masked: true });
    assert.ok(a.equals(b));
    b.addRedaction(".name", "x");
    assert.ok(!a.equals(b));
  });

  it("compares callbacks by identity", () => {
    const replace = () => "[id]";
    const a = new Settings();
    const b = new Settings();
    a.addDynamicRedaction(".id", replace);
    b.addDynamicRedaction(".id", replace);
    assert.ok(a.equals(b));

    const c = new Settings();
    c.addDynamicRedaction(".id", () => "[id]");
    assert.ok(!a.equals(c));
  });
});

describe("Settings redactions", () => {
  it("keeps registration order across kinds", () => {
    const settings = new Settings();
    settings.addRedaction(".a", "[a]");
    settings.addDynamicRedaction(".a.b", () => "[b]");
    settings.addAssertion(".c", () => {});

    assert.deepEqual(sources(settings.iterRedactions()), [".a", ".a.b", ".c"]);
    assert.deepEqual(kinds(settings.iterRedactions()), ["static", "dynamic", "assertion"]);
    assert.equal(settings.redactionCount(), 3);
  });

  it("serializes static replacement values up front", () => {
    const settings = new Settings();
    settings.addRedaction(".at", new Date(0));
    const [[, redaction]] = [...settings.iterRedactions()];
    assert.deepEqual(redaction, { kind: "static", value: "1970-01-01T00:00:00.000Z" });
  });

  it("accepts parsed selectors", () => {
    const selector = Selector.parse(".items[]");
    const settings = new Settings();
    settings.addRedaction(selector, null);
    const [[stored]] = [...settings.iterRedactions()];
    assert.equal(stored, selector);
  });

  it("rejects malformed selectors without registering anything", () => {
    const settings = new Settings();
    settings.addRedaction(".ok", 1);
    assert.throws(() => settings.addRedaction(".a[", "x"), SelectorParseError);
    assert.throws(() => settings.addDynamicRedaction("", () => 1), SelectorParseError);
    assert.throws(() => settings.addAssertion("id", () => {}), SelectorParseError);
    assert.deepEqual(sources(settings.iterRedactions()), [".ok"]);
  });

  it("does not detach from siblings when parsing fails", () => {
    const a = new Settings();
    const b = a.clone();
    assert.throws(() => a.addRedaction("??", 1));
    assert.ok(a.sharesSnapshotWith(b));
  });

  it("setRedactions replaces the list from a record", () => {
    const settings = new Settings();
    settings.addAssertion(".old", () => {});
    settings.setRedactions({ ".id": "[id]", ".**.token": "[token]" });
    assert.deepEqual(sources(settings.iterRedactions()), [".id", ".**.token"]);
    assert.deepEqual(kinds(settings.iterRedactions()), ["static", "static"]);
  });

  it("setRedactions accepts pairs", () => {
    const settings = new Settings();
    const pairs: [string | Selector, unknown][] = [
      [".b", 2],
      [Selector.parse(".a"), 1],
    ];
    settings.setRedactions(pairs);
    assert.deepEqual(sources(settings.iterRedactions()), [".b", ".a"]);
  });

  it("setRedactions keeps the old list when a selector is malformed", () => {
    const settings = new Settings();
    settings.addRedaction(".keep", 1);
    assert.throws(() => settings.setRedactions({ ".fine": 1, "broken": 2 }), SelectorParseError);
    assert.deepEqual(sources(settings.iterRedactions()), [".keep"]);
  });

  it("clearRedactions empties the list however long it was", () => {
    const settings = new Settings();
    for (let i = 0; i < 5; i++) settings.addRedaction(`.f${i}`, i);
    settings.clearRedactions();
    assert.deepEqual([...settings.iterRedactions()], []);
    settings.clearRedactions();
    assert.equal(settings.redactionCount(), 0);
  });
});
