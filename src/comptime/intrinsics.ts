/**
 * Intrinsic dispatch for the interpreter.
 *
 * Reflection goes to the Reflection Provider, effects go through the
 * Capability Context to the host, and `#insert` only records a pending
 * insertion for the driver.
 */

import { Span, comptimeError, internalError } from "../diagnostics/errors";
import { IntrinsicName } from "../mir/mir";
import { Type } from "../types/types";
import { CapabilityContext, Decision, Effect } from "./capability";
import { HostOperations, HostResult } from "./host";
import { ReflectionProvider } from "./reflect";
import { contentHash } from "./serialize";
import {
  CodeFragment,
  ComptimeValue,
  UNIT_VALUE,
  codeText,
  displayValue,
  intValue,
  resultValue,
  strValue,
  typeValue,
} from "./value";

/** A file read during evaluation, with the hash of what was observed. */
export type ReadRecord = { path: string; hash: string };

/** An effect decision taken during evaluation. */
export type EffectRecord = { effect: Effect; decision: Exclude<Decision, "Deny">; target: string };

export interface IntrinsicEnv {
  readonly reflection: ReflectionProvider;
  readonly capabilities: CapabilityContext;
  readonly host: HostOperations;
  onRead(record: ReadRecord): void;
  onEffect(record: EffectRecord): void;
  onInsert(code: CodeFragment, at: Span): void;
}

/**
 * Hash of a read result as the cache sees it. Failed reads hash their error
 * so a file appearing later invalidates the entry.
 */
export function readHash(result: HostResult<string>): string {
  return contentHash(result.ok ? `ok:${result.value}` : `err:${result.error}`);
}

export function callIntrinsic(name: IntrinsicName, args: readonly ComptimeValue[], env: IntrinsicEnv, at: Span): ComptimeValue {
  switch (name) {
    case "type_info":
      return env.reflection.typeInfo(typeArg(args, at), at);
    case "type_name":
      return strValue(env.reflection.typeName(typeArg(args, at), at));
    case "size_of":
      return intValue(env.reflection.sizeOf(typeArg(args, at), at), 64, false);
    case "align_of":
      return intValue(env.reflection.alignOf(typeArg(args, at), at), 64, false);
    case "type_of":
      return typeValue(typeArg(args, at));

    case "insert": {
      const code = args[0];
      if (code?.kind === "code") env.onInsert(code.code, at);
      else env.onInsert({ kind: "text", text: strArg(args, 0, at) }, at);
      return UNIT_VALUE;
    }
    case "code":
      return codeText(strArg(args, 0, at));

    case "read_file":
      return readFile(strArg(args, 0, at), env, at);
    case "write_file":
      return writeFile(strArg(args, 0, at), strArg(args, 1, at), env, at);
    case "http_get":
      return httpGet(strArg(args, 0, at), env, at);
    case "shell":
      return shell(strArg(args, 0, at), env, at);

    case "panic":
      throw comptimeError(`evaluation panicked: ${strArg(args, 0, at)}`, at);
    case "assert": {
      const cond = args[0];
      if (cond?.kind !== "bool") throw internalError("#assert expects a bool", at);
      if (!cond.value) throw comptimeError(`assertion failed: ${strArg(args, 1, at)}`, at);
      return UNIT_VALUE;
    }
    case "to_string": {
      const value = args[0];
      if (!value) throw internalError("#to_string expects one argument", at);
      return strValue(displayValue(value));
    }
    case "len": {
      const value = args[0];
      if (value?.kind === "array") return intValue(BigInt(value.elements.length), 64, false);
      if (value?.kind === "str") return intValue(BigInt([...value.value].length), 64, false);
      throw internalError("#len expects an array or str", at);
    }
  }
}

// ============================================
// Effects
// ============================================

function readFile(file: string, env: IntrinsicEnv, at: Span): ComptimeValue {
  const decision = env.capabilities.require("Read", at);
  env.onEffect({ effect: "Read", decision, target: file });
  if (decision === "NoOpSucceed") return resultValue("IoResult", true, [strValue("")]);
  const result = env.host.readFile(file);
  env.onRead({ path: file, hash: readHash(result) });
  return result.ok
    ? resultValue("IoResult", true, [strValue(result.value)])
    : resultValue("IoResult", false, [strValue(result.error)]);
}

function writeFile(file: string, text: string, env: IntrinsicEnv, at: Span): ComptimeValue {
  const decision = env.capabilities.require("Write", at);
  env.onEffect({ effect: "Write", decision, target: file });
  if (decision === "NoOpSucceed") {
    // Same shape as a real write of `text`.
    return resultValue("WriteResult", true, [intValue(BigInt(Buffer.byteLength(text, "utf8")), 64, false)]);
  }
  const result = env.host.writeFile(file, text);
  return result.ok
    ? resultValue("WriteResult", true, [intValue(BigInt(result.value), 64, false)])
    : resultValue("WriteResult", false, [strValue(result.error)]);
}

function httpGet(url: string, env: IntrinsicEnv, at: Span): ComptimeValue {
  const decision = env.capabilities.require("Network", at);
  env.onEffect({ effect: "Network", decision, target: url });
  if (decision === "NoOpSucceed") return resultValue("IoResult", true, [strValue("")]);
  const result = env.host.httpGet(url);
  return result.ok
    ? resultValue("IoResult", true, [strValue(result.value)])
    : resultValue("IoResult", false, [strValue(result.error)]);
}

function shell(command: string, env: IntrinsicEnv, at: Span): ComptimeValue {
  const decision = env.capabilities.require("Shell", at);
  env.onEffect({ effect: "Shell", decision, target: command });
  if (decision === "NoOpSucceed") return resultValue("ShellResult", true, [intValue(0n, 32, true), strValue("")]);
  const result = env.host.shell(command);
  return result.ok
    ? resultValue("ShellResult", true, [intValue(BigInt(result.value.status), 32, true), strValue(result.value.output)])
    : resultValue("ShellResult", false, [strValue(result.error)]);
}

// ============================================
// Argument access
// ============================================

function typeArg(args: readonly ComptimeValue[], at: Span): Type {
  const value = args[0];
  if (value?.kind !== "type") throw internalError("reflection intrinsic expects a type handle", at);
  return value.type;
}

function strArg(args: readonly ComptimeValue[], index: number, at: Span): string {
  const value = args[index];
  if (value?.kind !== "str") throw internalError(`argument ${index + 1} must be a str`, at);
  return value.value;
}
