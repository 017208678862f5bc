import { strict as assert } from "assert";
import {
  canonicalEncode,
  hashState,
  chainHash,
  TranscriptBuilder,
  findBrokenLink,
  resolveLogLevel,
} from "./index";

describe("canonicalEncode", () => {
  it("sorts keys and drops undefined members", () => {
    assert.equal(
      canonicalEncode({ b: 1, a: { d: 2, c: undefined } }),
      '{"a":{"d":2},"b":1}'
    );
  });

  it("writes sets and map values as arrays", () => {
    assert.equal(canonicalEncode(new Set([3, 1])), "[3,1]");
    assert.equal(
      canonicalEncode(new Map([["0,1", { col: 1, row: 0 }]])),
      '[{"col":1,"row":0}]'
    );
  });
});

describe("hashState", () => {
  it("ignores key order", () => {
    assert.equal(hashState({ row: 1, col: 2 }), hashState({ col: 2, row: 1 }));
  });

  it("returns a 0x-prefixed 32-byte hex digest", () => {
    assert.match(hashState({ mines: 8 }), /^0x[0-9a-f]{64}$/);
  });

  it("chainHash depends on the previous link", () => {
    const data = { sequence: 0 };
    assert.notEqual(chainHash("0x00", data), chainHash("0x01", data));
  });
});

describe("TranscriptBuilder", () => {
  it("links entries through prevHash", () => {
    const builder = new TranscriptBuilder("m1", "minesweeper", { turn: 0 });
    const initial = builder.getCurrentHash();

    const first = builder.addEntry("agent", { type: "reveal" }, { turn: 1 }, 1000);
    const second = builder.addEntry("agent", { type: "flag" }, { turn: 2 }, 2000);

    assert.equal(first.sequence, 0);
    assert.equal(first.prevHash, initial);
    assert.equal(second.prevHash, chainHash(initial, first));
    assert.equal(builder.getEntryCount(), 2);
    assert.equal(builder.getTranscript().rootHash, builder.getCurrentHash());
  });

  it("findBrokenLink reports -1 for an intact chain and the tampered index otherwise", () => {
    const builder = new TranscriptBuilder("m2", "minesweeper", { turn: 0 });
    const initial = builder.getCurrentHash();
    builder.addEntry("agent", { type: "reveal" }, { turn: 1 }, 1);
    builder.addEntry("agent", { type: "reveal" }, { turn: 2 }, 2);
    builder.addEntry("agent", { type: "resign" }, { turn: 3 }, 3);

    const transcript = builder.getTranscript();
    assert.equal(findBrokenLink(transcript, initial), -1);

    transcript.entries[1] = { ...transcript.entries[1], stateHash: "0xbad" };
    assert.equal(findBrokenLink(transcript, initial), 2);
  });
});

describe("resolveLogLevel", () => {
  it("accepts bunyan level names", () => {
    assert.equal(resolveLogLevel("debug"), "debug");
  });

  it("falls back to info", () => {
    assert.equal(resolveLogLevel("verbose"), "info");
    assert.equal(resolveLogLevel(undefined), "info");
  });
});
