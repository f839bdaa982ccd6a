/**
 * Comptime Cache - memoizes compile-time evaluations.
 *
 * A key is (function identity, argument snapshot hash, capability
 * fingerprint). Entries remember the external files the evaluation read,
 * with content hashes; a lookup whose files changed since is a miss.
 *
 * Evaluations run on one thread; concurrent workers interleave only between
 * evaluations, so `store` as insert-if-absent on a Map is enough.
 */

import * as fs from "fs";
import * as path from "path";
import { CompileError, ErrorRecord, Span } from "../diagnostics/errors";
import { MirFunction, Operand, forEachOperand, operandFunctions } from "../mir/mir";
import { printFunction } from "../mir/print";
import { HostOperations } from "./host";
import { ReadRecord, readHash } from "./intrinsics";
import { DecodeError, Encoded, contentHash, decodeValue, encodeValue } from "./serialize";
import { CodeFragment, ComptimeValue } from "./value";

/** An `#insert` replayed on a cache hit, attached to the hitting call site. */
export type CachedInsertion = { code: CodeFragment; insertSpan: Span };

export type CacheOutcome = { kind: "value"; value: ComptimeValue } | { kind: "error"; error: ErrorRecord };

export type CacheEntry = {
  outcome: CacheOutcome;
  reads: ReadRecord[];
  insertions: CachedInsertion[];
};

export type CacheKey = {
  fn: string;
  identity: string; // hash of everything the function's result depends on besides arguments
  args: string;
  capabilities: string;
};

export type CacheStats = { hits: number; misses: number; stale: number; stores: number };

export type LoadResult = { loaded: number; skipped: number };

const CACHE_FILE = "comptime-cache.json";
const FORMAT_VERSION = 1;

export function keyString(key: CacheKey): string {
  return `${key.fn}|${key.identity}|${key.args}|${contentHash(key.capabilities)}`;
}

export class ComptimeCache {
  private readonly entries = new Map<string, CacheEntry>();
  readonly stats: CacheStats = { hits: 0, misses: 0, stale: 0, stores: 0 };

  /**
   * The entry for `key` if every file it read still hashes the same.
   */
  lookup(key: CacheKey, host: HostOperations): CacheEntry | undefined {
    const k = keyString(key);
    const entry = this.entries.get(k);
    if (!entry) {
      this.stats.misses++;
      return undefined;
    }
    const changed = entry.reads.some((read) => readHash(host.readFile(read.path)) !== read.hash);
    if (changed) {
      this.entries.delete(k);
      this.stats.stale++;
      return undefined;
    }
    this.stats.hits++;
    return entry;
  }

  /**
   * Insert if absent. Returns false when another worker stored the key first.
   */
  store(key: CacheKey, entry: CacheEntry): boolean {
    const k = keyString(key);
    if (this.entries.has(k)) return false;
    this.entries.set(k, entry);
    this.stats.stores++;
    return true;
  }

  get size(): number {
    return this.entries.size;
  }

  // ============================================
  // On-disk store
  // ============================================

  /**
   * Write value entries to `dir`. Error entries stay in memory only.
   */
  save(dir: string): number {
    const records: Encoded[] = [];
    const keys = [...this.entries.keys()].sort();
    for (const key of keys) {
      const entry = this.entries.get(key);
      if (!entry || entry.outcome.kind !== "value") continue;
      const insertions: Encoded[] = entry.insertions.map((insertion) => ({
        text: insertion.code.text,
        span: encodeSpan(insertion.insertSpan),
      }));
      records.push({
        key,
        value: encodeValue(entry.outcome.value),
        reads: entry.reads.map((r) => ({ path: r.path, hash: r.hash })),
        insertions,
      });
    }
    fs.mkdirSync(dir, { recursive: true });
    fs.writeFileSync(path.join(dir, CACHE_FILE), JSON.stringify({ version: FORMAT_VERSION, entries: records }, null, 2));
    return records.length;
  }

  /**
   * Merge entries stored by an earlier session. Records that do not decode
   * are skipped and counted.
   */
  load(dir: string): LoadResult {
    const file = path.join(dir, CACHE_FILE);
    if (!fs.existsSync(file)) return { loaded: 0, skipped: 0 };
    let data: Encoded;
    try {
      data = parseJson(fs.readFileSync(file, "utf8"));
    } catch (e) {
      if (e instanceof SyntaxError) return { loaded: 0, skipped: 1 };
      throw e;
    }
    if (!isObject(data) || data.version !== FORMAT_VERSION || !Array.isArray(data.entries)) {
      return { loaded: 0, skipped: 1 };
    }
    let loaded = 0;
    let skipped = 0;
    for (const record of data.entries) {
      try {
        const [key, entry] = decodeEntry(record);
        if (this.entries.has(key)) continue;
        this.entries.set(key, entry);
        loaded++;
      } catch (e) {
        if (!(e instanceof DecodeError || e instanceof SyntaxError)) throw e;
        skipped++;
      }
    }
    return { loaded, skipped };
  }
}

// ============================================
// Function identity
// ============================================

export type IdentityInputs = {
  functions: ReadonlyMap<string, MirFunction>;
  /** Current value of a const or call-site operand the function reads. */
  operandValue(operand: Extract<Operand, { kind: "global" | "site" }>): ComptimeValue;
  /** Fingerprint of the type table, mixed in when reflection is used. */
  typesFingerprint(): string;
};

const REFLECTION = new Set(["type_info", "type_name", "size_of", "align_of"]);

/**
 * Hash of the MIR of `fnId` and every function it can reach, the values of
 * the consts and call sites they read, the type table when any of them
 * reflects, and the spans of their `#insert`s.
 */
export function functionIdentity(fnId: string, inputs: IdentityInputs): string {
  const reachable = new Set<string>();
  const queue = [fnId];
  const parts: string[] = [];
  const operands = new Map<string, string>();
  let reflects = false;

  while (queue.length > 0) {
    const id = queue.shift();
    if (id === undefined || reachable.has(id)) continue;
    reachable.add(id);
    const fn = inputs.functions.get(id);
    if (!fn) {
      parts.push(`missing ${id}`);
      continue;
    }
    forEachOperand(fn, (operand) => {
      queue.push(...operandFunctions(operand));
      if (operand.kind === "global" || operand.kind === "site") {
        const name = operand.kind === "global" ? `const ${operand.name}` : `site ${operand.site}`;
        if (!operands.has(name)) operands.set(name, JSON.stringify(encodeValue(inputs.operandValue(operand))));
      }
    });
    for (const block of fn.blocks) {
      const term = block.terminator;
      if (term.kind !== "intrinsic") continue;
      if (REFLECTION.has(term.name)) reflects = true;
      if (term.name === "insert") parts.push(`insert ${term.span.file}:${term.span.from}-${term.span.to}`);
    }
  }

  for (const id of [...reachable].sort()) {
    const fn = inputs.functions.get(id);
    if (fn) parts.push(printFunction(fn));
  }
  for (const name of [...operands.keys()].sort()) {
    parts.push(`${name} = ${operands.get(name)}`);
  }
  if (reflects) parts.push(`types ${inputs.typesFingerprint()}`);
  return contentHash(parts.join("\n"));
}

/**
 * Errors that would not repeat on a rerun are not cached.
 */
export function isCacheableError(error: CompileError): boolean {
  return error.kind !== "ComptimeBudgetExceeded" && error.kind !== "InternalError";
}

// ============================================
// Decoding
// ============================================

type Obj = { [key: string]: Encoded };

function parseJson(text: string): Encoded {
  const parsed: unknown = JSON.parse(text);
  return toEncoded(parsed);
}

function toEncoded(value: unknown): Encoded {
  if (value === null || typeof value === "boolean" || typeof value === "number" || typeof value === "string") {
    return value;
  }
  if (Array.isArray(value)) return value.map(toEncoded);
  if (typeof value === "object") {
    const out: Obj = {};
    for (const [k, v] of Object.entries(value)) out[k] = toEncoded(v);
    return out;
  }
  throw new DecodeError(`unexpected ${typeof value} in cache file`);
}

function isObject(data: Encoded): data is Obj {
  return data !== null && typeof data === "object" && !Array.isArray(data);
}

function field(obj: Obj, name: string): Encoded {
  const value = obj[name];
  if (value === undefined) throw new DecodeError(`missing '${name}'`);
  return value;
}

function str(data: Encoded): string {
  if (typeof data !== "string") throw new DecodeError("expected a string");
  return data;
}

function num(data: Encoded): number {
  if (typeof data !== "number") throw new DecodeError("expected a number");
  return data;
}

function list(data: Encoded): Encoded[] {
  if (!Array.isArray(data)) throw new DecodeError("expected an array");
  return data;
}

function obj(data: Encoded): Obj {
  if (!isObject(data)) throw new DecodeError("expected an object");
  return data;
}

function encodeSpan(at: Span): Encoded {
  return { file: at.file, from: at.from, to: at.to };
}

function decodeSpan(data: Encoded): Span {
  const o = obj(data);
  return { file: str(field(o, "file")), from: num(field(o, "from")), to: num(field(o, "to")) };
}

function decodeEntry(data: Encoded): [string, CacheEntry] {
  const o = obj(data);
  const reads = list(field(o, "reads")).map((r) => {
    const read = obj(r);
    return { path: str(field(read, "path")), hash: str(field(read, "hash")) };
  });
  const insertions = list(field(o, "insertions")).map((i) => {
    const insertion = obj(i);
    const code: CodeFragment = { kind: "text", text: str(field(insertion, "text")) };
    return { code, insertSpan: decodeSpan(field(insertion, "span")) };
  });
  return [
    str(field(o, "key")),
    { outcome: { kind: "value", value: decodeValue(field(o, "value")) }, reads, insertions },
  ];
}
