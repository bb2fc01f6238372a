import { afterEach, describe, it, mock } from "node:test";
import assert from "node:assert/strict";

import { Settings, setVerbose, withSettings } from "@snapbind/settings";

import { prepareSnapshotValue } from "../src/index.js";

afterEach(() => {
  new Settings().bindToThread();
});

describe("prepareSnapshotValue", () => {
  it("serializes with the default settings", () => {
    const prepared = prepareSnapshotValue({ b: 1, a: undefined });
    assert.equal(JSON.stringify(prepared.content), '{"b":1,"a":null}');
    assert.equal(prepared.snapshotPath, "snapshots");
    assert.equal(prepared.stats.totalMatches, 0);
  });

  it("uses the handle bound for the current scope", () => {
    const settings = new Settings();
    settings.setSortMaps(true);
    settings.setSnapshotPath("__snapshots__");
    settings.addRedaction(".token", "[token]");

    const prepared = settings.bind(() => prepareSnapshotValue({ token: "t-1", b: 2, a: 1 }));
    assert.equal(JSON.stringify(prepared.content), '{"a":1,"b":2,"token":"[token]"}');
    assert.equal(prepared.snapshotPath, "__snapshots__");
  });

  it("sorts after redacting, so replacement maps are sorted too", () => {
    const prepared = withSettings(
      { sortMaps: true, redactions: { ".meta": { z: 1, y: 2 } } },
      () => prepareSnapshotValue({ meta: "x" }),
    );
    assert.equal(JSON.stringify(prepared.content), '{"meta":{"y":2,"z":1}}');
  });

  it("uses the permanently bound handle outside any scope", () => {
    const settings = new Settings();
    settings.addRedaction(".id", "[id]");
    settings.bindToThread();
    assert.deepEqual(prepareSnapshotValue({ id: 9 }).content, { id: "[id]" });
  });

  it("propagates assertion failures and restores the binding", () => {
    const settings = new Settings();
    settings.setSnapshotPath("strict");
    settings.addAssertion(".count", (value) => {
      assert.equal(value, 2);
    });

    assert.throws(
      () => settings.bind(() => prepareSnapshotValue({ count: 3 })),
      assert.AssertionError,
    );
    assert.equal(prepareSnapshotValue(null).snapshotPath, "snapshots");
  });

  it("logs redaction counts when verbose", () => {
    const errorMock = mock.method(console, "error", () => {});
    const settings = new Settings();
    settings.addRedaction(".a[]", 0);
    settings.addAssertion(".b", () => {});
    settings.bindToThread();
    setVerbose(true);
    try {
      prepareSnapshotValue({ a: [1, 2], b: true });
    } finally {
      setVerbose(false);
      errorMock.mock.restore();
    }
    const lines = errorMock.mock.calls.map((call) => call.arguments[0]);
    assert.deepEqual(lines, ["[redact] Redacted 3 match(es): static=2, assertion=1"]);
  });
});
