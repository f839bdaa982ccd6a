/**
 * Tests for effectful intrinsics under each capability policy, against a
 * NodeHost rooted in a temporary directory.
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { CompileFailure, CompileResult, NodeHost, SessionConfig, compile, formatValue } from "../src/index";

const WRITE = `
fn save() -> u64 {
    match #write_file("out.txt", "data") {
        WriteResult::Ok(n) => n,
        WriteResult::Err(e) => #panic(e),
    }
}
const N: u64 = comptime save();
`;

const READ = `
fn config() -> str {
    match #read_file("config.txt") {
        IoResult::Ok(text) => text,
        IoResult::Err(e) => "missing",
    }
}
const C: str = comptime config();
`;

const SHELL = `
fn run() -> i32 {
    match #shell("echo hi") {
        ShellResult::Ok(status, out) => status,
        ShellResult::Err(e) => #panic(e),
    }
}
const S: i32 = comptime run();
`;

const FETCH = `
fn fetch() -> str {
    match #http_get("http://example.test/data") {
        IoResult::Ok(body) => body,
        IoResult::Err(e) => e,
    }
}
const F: str = comptime fetch();
`;

const STAMP = `
fn stamp() -> str {
    let written = match #write_file("stamp.txt", "hello") {
        WriteResult::Ok(n) => n,
        WriteResult::Err(e) => #panic(e),
    };
    match #read_file("input.txt") {
        IoResult::Ok(text) => text + #to_string(written),
        IoResult::Err(e) => e,
    }
}
const S: str = comptime stamp();
`;

describe("Effects", () => {
  let dir: string;
  let host: NodeHost;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "wisp-effects-"));
    host = new NodeHost({ baseDir: dir });
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  async function build(text: string, config: Partial<SessionConfig> = {}, target = host): Promise<CompileResult> {
    return compile([{ file: "main.wisp", text }], config, { host: target });
  }

  async function failure(text: string, config: Partial<SessionConfig> = {}): Promise<CompileFailure> {
    try {
      await build(text, config);
    } catch (e) {
      if (e instanceof CompileFailure) return e;
      throw e;
    }
    throw new Error("expected compilation to fail");
  }

  function constValue(result: CompileResult, name: string): string {
    const info = result.program.consts.get(name);
    const value = info && result.siteValues.get(info.site);
    if (!value) throw new Error(`no value for const '${name}'`);
    return formatValue(value);
  }

  describe("build mode", () => {
    it("writes files", async () => {
      const result = await build(WRITE);
      expect(constValue(result, "N")).toBe("4u64");
      expect(fs.readFileSync(path.join(dir, "out.txt"), "utf8")).toBe("data");
    });

    it("reads files", async () => {
      fs.writeFileSync(path.join(dir, "config.txt"), "level=3");
      expect(constValue(await build(READ), "C")).toBe('"level=3"');
    });

    it("reports a missing file as a value", async () => {
      expect(constValue(await build(READ), "C")).toBe('"missing"');
    });

    it("fetches through the network handler", async () => {
      const online = new NodeHost({ baseDir: dir, network: (url) => ({ ok: true, value: `body of ${url}` }) });
      expect(constValue(await build(FETCH, {}, online), "F")).toBe('"body of http://example.test/data"');
    });

    it("fails requests without a network handler", async () => {
      expect(constValue(await build(FETCH), "F")).toBe('"no network handler configured for http://example.test/data"');
    });
  });

  describe("lsp-sandbox mode", () => {
    it("skips writes but reports success", async () => {
      const result = await build(WRITE, { mode: "lsp-sandbox" });
      expect(constValue(result, "N")).toBe("4u64");
      expect(fs.existsSync(path.join(dir, "out.txt"))).toBe(false);
    });

    it("still reads files", async () => {
      fs.writeFileSync(path.join(dir, "config.txt"), "level=3");
      expect(constValue(await build(READ, { mode: "lsp-sandbox" }), "C")).toBe('"level=3"');
    });

    it("denies shell commands", async () => {
      const error = await failure(SHELL, { mode: "lsp-sandbox" });
      expect(error.errors).toHaveLength(1);
      const [first] = error.errors;
      expect(first.kind).toBe("CapabilityDenied");
      expect(first.message).toBe("Shell effect denied in lsp-sandbox mode");
      expect(first.notes[0].message).toBe("the lsp-sandbox policy maps Shell to Deny");
    });

    it("denies network requests", async () => {
      const error = await failure(FETCH, { mode: "lsp-sandbox" });
      expect(error.errors[0].message).toBe("Network effect denied in lsp-sandbox mode");
    });
  });

  describe("mode parity", () => {
    it("gives the same result in both modes and writes only in build mode", async () => {
      fs.writeFileSync(path.join(dir, "input.txt"), "hello");
      const sandboxed = await build(STAMP, { mode: "lsp-sandbox" });
      expect(fs.existsSync(path.join(dir, "stamp.txt"))).toBe(false);

      const built = await build(STAMP);
      expect(constValue(sandboxed, "S")).toBe('"hello5"');
      expect(constValue(built, "S")).toBe('"hello5"');
      expect(fs.readFileSync(path.join(dir, "stamp.txt"), "utf8")).toBe("hello");
    });
  });

  describe("host failures", () => {
    it("fail their own call site and keep the errors of the others", async () => {
      const broken = new NodeHost({
        baseDir: dir,
        network: () => {
          throw new Error("connection refused");
        },
      });
      const text = FETCH + `fn boom() -> i64 { #panic("late") }\nconst B: i64 = comptime boom();\n`;
      let caught: unknown;
      try {
        await build(text, {}, broken);
      } catch (e) {
        caught = e;
      }
      expect(caught).toBeInstanceOf(CompileFailure);
      if (!(caught instanceof CompileFailure)) return;
      expect(caught.errors.map((e) => e.kind)).toEqual(["InternalError", "ComptimeError"]);
      expect(caught.errors.map((e) => e.message)).toEqual([
        "compile-time evaluation failed: connection refused",
        "evaluation panicked: late",
      ]);
    });
  });

  describe("policy overrides", () => {
    it("can deny an effect the mode allows", async () => {
      const error = await failure(WRITE, { policy: { Write: "Deny" } });
      expect(error.errors[0].kind).toBe("CapabilityDenied");
      expect(error.errors[0].message).toBe("Write effect denied in build mode");
      expect(fs.existsSync(path.join(dir, "out.txt"))).toBe(false);
    });

    it("can turn an effect into a no-op", async () => {
      const result = await build(SHELL, { policy: { Shell: "NoOpSucceed" } });
      expect(constValue(result, "S")).toBe("0i32");
    });
  });
});
