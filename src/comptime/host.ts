/**
 * Host operations behind the effectful intrinsics.
 *
 * All operations are synchronous and success/failure shaped; the interpreter
 * turns them into `IoResult` / `WriteResult` / `ShellResult` values.
 */

import * as fs from "fs";
import * as path from "path";
import { spawnSync } from "child_process";

export type HostResult<T> = { ok: true; value: T } | { ok: false; error: string };

export type ShellOutput = { status: number; output: string };

export interface HostOperations {
  readFile(file: string): HostResult<string>;
  writeFile(file: string, text: string): HostResult<number>;
  httpGet(url: string): HostResult<string>;
  shell(command: string): HostResult<ShellOutput>;
}

export type NetworkHandler = (url: string) => HostResult<string>;

export type NodeHostOptions = {
  /** Relative paths and shell commands resolve against this directory. */
  baseDir?: string;
  /** Serves `#http_get`; without one every request fails. */
  network?: NetworkHandler;
};

export class NodeHost implements HostOperations {
  private readonly baseDir: string;
  private readonly network?: NetworkHandler;

  constructor(options: NodeHostOptions = {}) {
    this.baseDir = options.baseDir ?? process.cwd();
    this.network = options.network;
  }

  readFile(file: string): HostResult<string> {
    try {
      return { ok: true, value: fs.readFileSync(this.resolve(file), "utf8") };
    } catch (e) {
      return { ok: false, error: errorMessage(e) };
    }
  }

  writeFile(file: string, text: string): HostResult<number> {
    try {
      const target = this.resolve(file);
      fs.mkdirSync(path.dirname(target), { recursive: true });
      fs.writeFileSync(target, text, "utf8");
      return { ok: true, value: Buffer.byteLength(text, "utf8") };
    } catch (e) {
      return { ok: false, error: errorMessage(e) };
    }
  }

  httpGet(url: string): HostResult<string> {
    if (!this.network) return { ok: false, error: `no network handler configured for ${url}` };
    return this.network(url);
  }

  shell(command: string): HostResult<ShellOutput> {
    const result = spawnSync(command, { shell: true, cwd: this.baseDir, encoding: "utf8" });
    if (result.error) return { ok: false, error: result.error.message };
    return { ok: true, value: { status: result.status ?? -1, output: result.stdout } };
  }

  private resolve(file: string): string {
    return path.resolve(this.baseDir, file);
  }
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
