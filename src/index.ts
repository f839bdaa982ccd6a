/**
 * Wisp compiler: compile-time evaluation over MIR, code insertion and a
 * JavaScript backend.
 */

// Driver
export { compile, CompileFailure } from "./driver/driver";
export type { CompileOptions, CompileResult, Phase, SourceFile } from "./driver/driver";
export { runPool } from "./driver/scheduler";
export type { PoolOptions } from "./driver/scheduler";

// Configuration
export { resolveConfig, DEFAULT_CONFIG, ConfigError, isEffect, isDecision, isMode } from "./config";
export type { SessionConfig } from "./config";

// Front end
export { parseSource, parseExpression } from "./parser/parser";
export { Program } from "./frontend/program";
export type { ConstInfo } from "./frontend/program";
export type { CallSite } from "./frontend/symbols";

// Diagnostics
export {
  CompileError,
  CompileErrors,
  span,
  dummySpan,
  parseError,
  resolveError,
  typeError,
  comptimeError,
  internalError,
} from "./diagnostics/errors";
export type { Span, DiagnosticKind, CompileStage, CompilerNote, ErrorRecord } from "./diagnostics/errors";
export { SourceMap, formatDiagnostic, formatErrors, formatSpan } from "./diagnostics/format";

// Types
export { TypeTable, isComptimeOnlyType, intType, floatType, namedType } from "./types/types";
export type { Type, IntWidth, FloatWidth, TypeDecl } from "./types/types";
export { formatType } from "./types/format";
export { LayoutCalculator } from "./types/layout";
export type { Layout } from "./types/layout";

// MIR
export type { MirFunction, BasicBlock, Statement, Terminator, Operand, Place, Rvalue } from "./mir/mir";
export { printFunction } from "./mir/print";

// Compile-time evaluation
export { Interpreter } from "./comptime/interpreter";
export type { Budget, EvaluationOutcome, EvaluationResult, PendingInsertion, SiteContext } from "./comptime/interpreter";
export {
  intValue,
  floatValue,
  boolValue,
  charValue,
  strValue,
  arrayValue,
  structValue,
  enumValue,
  typeValue,
  codeText,
  closureValue,
  UNIT_VALUE,
  valueEquals,
  formatValue,
  displayValue,
} from "./comptime/value";
export type { ComptimeValue, CodeFragment } from "./comptime/value";
export { CapabilityContext, EFFECTS, DECISIONS, MODES, POLICY_TABLES } from "./comptime/capability";
export type { Effect, Decision, Mode, Policy } from "./comptime/capability";
export { NodeHost } from "./comptime/host";
export type { HostOperations, HostResult, NetworkHandler, NodeHostOptions, ShellOutput } from "./comptime/host";
export { ComptimeCache } from "./comptime/cache";
export type { CacheEntry, CacheKey, CacheStats } from "./comptime/cache";
export { ReflectionProvider } from "./comptime/reflect";
export { analyzeEligibility, checkRuntimeCalls, runtimeRoots } from "./comptime/eligibility";
export type { EligibilityTable } from "./comptime/eligibility";

// Code insertion
export { InsertionPipeline } from "./insertion/pipeline";

// JavaScript backend
export { generateModule, mangle } from "./codegen/js-emit";
export { runtime, loadModule, callFunction, WChar, WUnit, WStruct, WVariant, WispPanic } from "./codegen/runtime";
export type { LoadedModule, RuntimeValue, WispRuntime } from "./codegen/runtime";
