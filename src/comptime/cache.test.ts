/**
 * Tests for the comptime cache: lookups, staleness and the on-disk store.
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { afterEach, beforeEach, describe, test, expect } from "vitest";
import { CacheEntry, CacheKey, ComptimeCache, keyString } from "./cache";
import { HostOperations, HostResult, ShellOutput } from "./host";
import { readHash } from "./intrinsics";
import { intValue, strValue } from "./value";

class MemoryHost implements HostOperations {
  readonly files = new Map<string, string>();

  readFile(file: string): HostResult<string> {
    const text = this.files.get(file);
    return text === undefined ? { ok: false, error: `no such file: ${file}` } : { ok: true, value: text };
  }

  writeFile(file: string, text: string): HostResult<number> {
    this.files.set(file, text);
    return { ok: true, value: text.length };
  }

  httpGet(url: string): HostResult<string> {
    return { ok: false, error: `offline: ${url}` };
  }

  shell(): HostResult<ShellOutput> {
    return { ok: false, error: "no shell" };
  }
}

const key: CacheKey = { fn: "fib", identity: "id-1", args: "args-1", capabilities: "build:all" };

function valueEntry(value = intValue(55n)): CacheEntry {
  return { outcome: { kind: "value", value }, reads: [], insertions: [] };
}

describe("ComptimeCache", () => {
  let host: MemoryHost;

  beforeEach(() => {
    host = new MemoryHost();
  });

  test("a lookup before any store misses", () => {
    const cache = new ComptimeCache();
    expect(cache.lookup(key, host)).toBeUndefined();
    expect(cache.stats).toEqual({ hits: 0, misses: 1, stale: 0, stores: 0 });
  });

  test("stores once and hits afterwards", () => {
    const cache = new ComptimeCache();
    expect(cache.store(key, valueEntry())).toBe(true);
    expect(cache.store(key, valueEntry(intValue(1n)))).toBe(false);
    expect(cache.lookup(key, host)?.outcome).toEqual({ kind: "value", value: intValue(55n) });
    expect(cache.stats).toEqual({ hits: 1, misses: 0, stale: 0, stores: 1 });
    expect(cache.size).toBe(1);
  });

  test("every key component separates entries", () => {
    const cache = new ComptimeCache();
    cache.store(key, valueEntry());
    expect(cache.lookup({ ...key, args: "args-2" }, host)).toBeUndefined();
    expect(cache.lookup({ ...key, identity: "id-2" }, host)).toBeUndefined();
    expect(cache.lookup({ ...key, capabilities: "lsp-sandbox:all" }, host)).toBeUndefined();
    expect(cache.stats.misses).toBe(3);
  });

  test("an entry whose file changed is stale", () => {
    host.files.set("data.txt", "one");
    const cache = new ComptimeCache();
    cache.store(key, {
      ...valueEntry(strValue("one")),
      reads: [{ path: "data.txt", hash: readHash(host.readFile("data.txt")) }],
    });
    expect(cache.lookup(key, host)).toBeDefined();

    host.files.set("data.txt", "two");
    expect(cache.lookup(key, host)).toBeUndefined();
    expect(cache.stats.stale).toBe(1);
    expect(cache.size).toBe(0);
  });

  test("a file that appears after a failed read makes the entry stale", () => {
    const cache = new ComptimeCache();
    cache.store(key, { ...valueEntry(), reads: [{ path: "late.txt", hash: readHash(host.readFile("late.txt")) }] });
    expect(cache.lookup(key, host)).toBeDefined();
    host.files.set("late.txt", "here now");
    expect(cache.lookup(key, host)).toBeUndefined();
  });

  test("keys hash the capability fingerprint", () => {
    expect(keyString(key).startsWith("fib|id-1|args-1|")).toBe(true);
    expect(keyString(key)).not.toContain("build:all");
  });
});

describe("ComptimeCache on disk", () => {
  let dir: string;
  let host: MemoryHost;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "wisp-cache-"));
    host = new MemoryHost();
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  test("a saved cache loads into a new session", () => {
    const cache = new ComptimeCache();
    cache.store(key, {
      outcome: { kind: "value", value: strValue("cfg") },
      reads: [{ path: "cfg.txt", hash: readHash(host.readFile("cfg.txt")) }],
      insertions: [{ code: { kind: "text", text: "fn a() {}" }, insertSpan: { file: "main.wisp", from: 3, to: 9 } }],
    });
    expect(cache.save(dir)).toBe(1);

    const next = new ComptimeCache();
    expect(next.load(dir)).toEqual({ loaded: 1, skipped: 0 });
    const entry = next.lookup(key, host);
    expect(entry?.outcome).toEqual({ kind: "value", value: strValue("cfg") });
    expect(entry?.insertions).toEqual([
      { code: { kind: "text", text: "fn a() {}" }, insertSpan: { file: "main.wisp", from: 3, to: 9 } },
    ]);
  });

  test("error entries stay in memory", () => {
    const cache = new ComptimeCache();
    cache.store(key, {
      outcome: {
        kind: "error",
        error: {
          kind: "ComptimeError",
          stage: "comptime",
          message: "evaluation panicked: boom",
          span: { file: "main.wisp", from: 0, to: 1 },
          generatedFrom: [],
          notes: [],
        },
      },
      reads: [],
      insertions: [],
    });
    cache.store({ ...key, args: "args-2" }, valueEntry());
    expect(cache.save(dir)).toBe(1);
  });

  test("a missing store loads nothing", () => {
    expect(new ComptimeCache().load(path.join(dir, "absent"))).toEqual({ loaded: 0, skipped: 0 });
  });

  test("a corrupt store is skipped", () => {
    fs.writeFileSync(path.join(dir, "comptime-cache.json"), "{ not json");
    expect(new ComptimeCache().load(dir)).toEqual({ loaded: 0, skipped: 1 });
  });

  test("a store from another format version is skipped", () => {
    fs.writeFileSync(path.join(dir, "comptime-cache.json"), JSON.stringify({ version: 99, entries: [] }));
    expect(new ComptimeCache().load(dir)).toEqual({ loaded: 0, skipped: 1 });
  });

  test("records that do not decode are counted", () => {
    const good = {
      key: keyString(key),
      value: { k: "int", w: 64, s: true, v: "7" },
      reads: [],
      insertions: [],
    };
    const bad = { key: "other", value: { k: "nope" }, reads: [], insertions: [] };
    fs.writeFileSync(path.join(dir, "comptime-cache.json"), JSON.stringify({ version: 1, entries: [good, bad] }));
    const cache = new ComptimeCache();
    expect(cache.load(dir)).toEqual({ loaded: 1, skipped: 1 });
    expect(cache.lookup(key, host)?.outcome).toEqual({ kind: "value", value: intValue(7n) });
  });
});
