import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { Shared, ThreadSlot, makeMut } from "../src/index.js";

describe("makeMut", () => {
  it("returns a unique box unchanged", () => {
    const box = new Shared({ n: 1 });
    const result = makeMut(box, (v) => ({ ...v }));
    assert.equal(result, box);
  });

  it("clones a shared box and releases the caller's reference", () => {
    const box = new Shared({ n: 1 });
    box.retain();
    let clones = 0;
    const result = makeMut(box, (v) => {
      clones++;
      return { ...v };
    });

    assert.notEqual(result, box);
    assert.deepEqual(result.value, { n: 1 });
    assert.equal(result.refCount, 1);
    assert.equal(box.refCount, 1);
    assert.ok(box.isUnique);
    assert.equal(clones, 1);
  });

  it("leaves the other holder's value untouched", () => {
    const box = new Shared({ n: 1 });
    const other = box.retain();
    const mine = makeMut(box, (v) => ({ ...v }));
    mine.value.n = 2;
    assert.equal(other.value.n, 1);
  });
});

describe("ThreadSlot", () => {
  it("runs the initializer lazily, once", () => {
    let calls = 0;
    const slot = new ThreadSlot(() => {
      calls++;
      return "initial";
    });
    assert.equal(slot.initialized, false);
    assert.equal(calls, 0);
    assert.equal(slot.get(), "initial");
    assert.equal(slot.get(), "initial");
    assert.equal(calls, 1);
  });

  it("replace returns the previous value", () => {
    const slot = new ThreadSlot(() => 1);
    assert.equal(slot.replace(2), 1);
    assert.equal(slot.replace(3), 2);
    assert.equal(slot.get(), 3);
  });

  it("belongs to the main thread in a test process", () => {
    const slot = new ThreadSlot(() => null);
    assert.equal(slot.threadId, 0);
  });
});
