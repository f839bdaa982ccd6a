/**
 * Driver - runs a compilation session from source text to JavaScript.
 *
 * Parsed -> Resolved -> TypeChecked(1) -> ComptimeExecuting
 *   -> { Reinjecting -> TypeChecked(n) -> ComptimeExecuting }*
 *   -> TypeChecked(final) -> MIRLowered -> CodeGenerated
 *
 * Call sites run in dependency waves: a site is ready once every function it
 * can reach is lowered and every const or call site it reads has a value.
 * Sites of one wave are independent and run on the worker pool. Errors from
 * independent sites are collected, then the session aborts.
 */

import { generateModule } from "../codegen/js-emit";
import { ComptimeCache, CacheKey, functionIdentity, isCacheableError } from "../comptime/cache";
import { CapabilityContext } from "../comptime/capability";
import { analyzeEligibility, checkRuntimeCalls } from "../comptime/eligibility";
import { HostOperations, NodeHost } from "../comptime/host";
import { Budget, EvaluationOutcome, EvaluationResult, Interpreter, PendingInsertion, SiteContext } from "../comptime/interpreter";
import { ReflectionProvider, typeTableFingerprint } from "../comptime/reflect";
import { argumentsHash } from "../comptime/serialize";
import { ComptimeValue } from "../comptime/value";
import { SessionConfig, resolveConfig } from "../config";
import { CompileError, CompileErrors, Span, collectErrors, comptimeError, dummySpan, internalError } from "../diagnostics/errors";
import { SourceMap } from "../diagnostics/format";
import { Program } from "../frontend/program";
import { CallSite } from "../frontend/symbols";
import { InsertionPipeline } from "../insertion/pipeline";
import { MirFunction, forEachOperand, operandFunctions } from "../mir/mir";
import { parseSource } from "../parser/parser";
import { runPool } from "./scheduler";

export type SourceFile = { file: string; text: string };

export type Phase =
  | "Parsed"
  | "Resolved"
  | `TypeChecked(${number})`
  | "ComptimeExecuting"
  | "Reinjecting"
  | "TypeChecked(final)"
  | "MIRLowered"
  | "CodeGenerated";

export type CompileOptions = {
  /** Progress sink; library code does not print. */
  log?: (message: string) => void;
  /** Effects go here; a `NodeHost` in the working directory by default. */
  host?: HostOperations;
  /** Shared between sessions to observe cache hits. */
  cache?: ComptimeCache;
  /** Stop after final type checking, without generating code. */
  stopAfter?: "typecheck";
};

export type CompileResult = {
  /** Generated JavaScript, absent when stopped after type checking. */
  code?: string;
  program: Program;
  /** Value of every comptime call site, by site id. */
  siteValues: ReadonlyMap<string, ComptimeValue>;
  phases: Phase[];
  sources: SourceMap;
  cache: ComptimeCache;
  /** Synthetic files created by insertions, in creation order. */
  insertedFiles: string[];
  config: SessionConfig;
};

/**
 * The session aborted. Carries the sources so spans can be rendered,
 * including those inside inserted code.
 */
export class CompileFailure extends CompileErrors {
  constructor(errors: CompileError[], readonly sources: SourceMap) {
    super(errors);
    this.name = "CompileFailure";
  }
}

export async function compile(
  sources: SourceFile[],
  config: Partial<SessionConfig> = {},
  options: CompileOptions = {}
): Promise<CompileResult> {
  return new Session(resolveConfig(config), options).run(sources);
}

type SiteOutcome = { site: CallSite; result: EvaluationResult; insertions: PendingInsertion[] };

class Session {
  private readonly program = new Program();
  private readonly sources = new SourceMap();
  private readonly phases: Phase[] = [];
  private readonly values = new Map<string, ComptimeValue>();
  private readonly failed = new Set<string>();
  private readonly errors: CompileError[] = [];
  private readonly insertedFiles: string[] = [];
  private waiting: CallSite[] = [];

  private readonly host: HostOperations;
  private readonly cache: ComptimeCache;
  private readonly capabilities: CapabilityContext;
  private readonly interpreter: Interpreter;
  private readonly pipeline: InsertionPipeline;
  private readonly budget: Budget;
  private readonly log: (message: string) => void;
  private readonly stopAfter?: "typecheck";

  constructor(private readonly config: SessionConfig, options: CompileOptions) {
    this.host = options.host ?? new NodeHost();
    this.cache = options.cache ?? new ComptimeCache();
    this.capabilities = CapabilityContext.forMode(config.mode, config.policy);
    this.log = options.log ?? (() => undefined);
    this.budget = { maxSteps: config.maxSteps, timeBudgetMs: config.timeBudgetMs };
    this.pipeline = new InsertionPipeline(this.program, this.sources, config.maxInsertionPasses);
    this.interpreter = new Interpreter({
      functions: this.program.functions,
      reflection: new ReflectionProvider(this.program.types),
      capabilities: this.capabilities,
      host: this.host,
      siteValue: (site, at) => this.siteValue(site, at),
      constValue: (name, at) => this.constValue(name, at),
    });
    this.stopAfter = options.stopAfter;
  }

  async run(sourceFiles: SourceFile[]): Promise<CompileResult> {
    if (this.config.cacheDir !== undefined) {
      const { loaded, skipped } = this.cache.load(this.config.cacheDir);
      this.log(`cache: loaded ${loaded} entries from ${this.config.cacheDir}` + (skipped > 0 ? `, skipped ${skipped}` : ""));
    }
    try {
      return await this.compile(sourceFiles);
    } finally {
      if (this.config.cacheDir !== undefined) {
        const saved = this.cache.save(this.config.cacheDir);
        this.log(`cache: saved ${saved} entries`);
      }
    }
  }

  private async compile(sourceFiles: SourceFile[]): Promise<CompileResult> {
    // Parsed
    const parsed = sourceFiles.map((source) => {
      this.sources.add(source.file, source.text);
      try {
        return parseSource(source.text, source.file);
      } catch (e) {
        this.errors.push(...collectErrors(e, dummySpan(source.file)));
        return [];
      }
    });
    this.enter("Parsed");
    this.abortOnErrors();

    // Resolved, TypeChecked(1)
    for (const items of parsed) {
      this.errors.push(...this.program.addItems(items, { kind: "module" }));
    }
    this.errors.push(...this.program.recheckDeferred());
    this.enter("Resolved");
    this.enter("TypeChecked(1)");
    this.abortOnErrors();
    this.errors.push(...checkRuntimeCalls(this.program.functions, analyzeEligibility(this.program.functions)));
    this.abortOnErrors();
    this.enqueue(this.program.takeNewSites());

    // ComptimeExecuting, Reinjecting
    let round = 0;
    for (;;) {
      this.enter("ComptimeExecuting");
      const pending = await this.runSites();
      this.abortOnErrors();
      if (pending.length === 0) break;

      round++;
      const divergence = this.pipeline.checkPassLimit(round, pending);
      if (divergence) this.errors.push(divergence);
      this.abortOnErrors();
      this.enter("Reinjecting");
      this.log(`insertion round ${round}: ${pending.length} chunk(s)`);
      const inserted = this.pipeline.apply(round, pending);
      this.insertedFiles.push(...inserted.files);
      this.errors.push(...inserted.errors);
      this.abortOnErrors();
      this.enqueue(inserted.sites);
      this.enter(`TypeChecked(${round + 1})`);
    }

    // TypeChecked(final)
    this.errors.push(...this.program.finalize().map((e) => this.pipeline.mapped(e)));
    this.abortOnErrors();
    this.reportBlockedSites();
    this.abortOnErrors();
    const eligibility = analyzeEligibility(this.program.functions);
    this.errors.push(...checkRuntimeCalls(this.program.functions, eligibility).map((e) => this.pipeline.mapped(e)));
    this.enter("TypeChecked(final)");
    this.abortOnErrors();

    const result: CompileResult = {
      program: this.program,
      siteValues: this.values,
      phases: this.phases,
      sources: this.sources,
      cache: this.cache,
      insertedFiles: this.insertedFiles,
      config: this.config,
    };
    if (this.stopAfter === "typecheck") return result;

    // MIRLowered, CodeGenerated
    this.enter("MIRLowered");
    try {
      result.code = generateModule(this.program, this.values, eligibility);
    } catch (e) {
      this.errors.push(...collectErrors(e, dummySpan()).map((err) => this.pipeline.mapped(err)));
    }
    this.abortOnErrors();
    this.enter("CodeGenerated");
    return result;
  }

  private enter(phase: Phase): void {
    this.phases.push(phase);
    this.log(`phase ${phase}`);
  }

  private abortOnErrors(): void {
    if (this.errors.length === 0) return;
    throw new CompileFailure(this.errors.map((e) => this.pipeline.mapped(e)), this.sources);
  }

  // ============================================
  // Call sites
  // ============================================

  private enqueue(sites: CallSite[]): void {
    this.waiting = [...this.waiting, ...sites].sort((a, b) => a.order - b.order);
  }

  /**
   * Evaluate waves of ready sites until none is ready. Returns the
   * insertions they produced, in call-site order.
   */
  private async runSites(): Promise<PendingInsertion[]> {
    const insertions: PendingInsertion[] = [];
    for (;;) {
      const wave = this.waiting.filter((site) => this.dependencies(site).ready);
      if (wave.length === 0) return insertions;
      this.waiting = this.waiting.filter((site) => !wave.includes(site));
      this.log(`evaluating ${wave.length} call site(s) on ${Math.min(this.config.workers, wave.length)} worker(s)`);

      const outcomes = await runPool(wave, (site) => this.evaluateSite(site), { workers: this.config.workers });
      for (const outcome of outcomes) {
        if (outcome.result.ok) {
          this.values.set(outcome.site.id, outcome.result.value);
          insertions.push(...outcome.insertions);
        } else {
          this.failed.add(outcome.site.id);
          this.errors.push(outcome.result.error);
        }
      }
    }
  }

  /**
   * Sites read by everything `site` can reach. Not ready while a reachable
   * function is still waiting for its body, or a read site has no value.
   */
  private dependencies(site: CallSite): { ready: boolean; blocked: boolean; reads: string[] } {
    const reads = new Set<string>();
    const seen = new Set<string>();
    const queue = [site.callee, ...site.args];
    let lowered = true;
    while (queue.length > 0) {
      const id = queue.shift();
      if (id === undefined || seen.has(id)) continue;
      seen.add(id);
      const fn = this.program.functions.get(id);
      if (!fn) {
        lowered = false;
        continue;
      }
      this.collectReads(fn, reads, queue);
    }
    const list = [...reads].sort();
    const blocked = list.some((id) => this.failed.has(id));
    const ready = lowered && !blocked && list.every((id) => this.values.has(id));
    return { ready, blocked, reads: list };
  }

  private collectReads(fn: MirFunction, reads: Set<string>, queue: string[]): void {
    forEachOperand(fn, (operand) => {
      queue.push(...operandFunctions(operand));
      if (operand.kind === "site") reads.add(operand.site);
      if (operand.kind === "global") {
        const info = this.program.consts.get(operand.name);
        reads.add(info ? info.site : `const ${operand.name}`);
      }
    });
  }

  /**
   * Sites still waiting after the last round read their own result.
   */
  private reportBlockedSites(): void {
    for (const site of this.waiting) {
      const { blocked, reads } = this.dependencies(site);
      if (blocked) continue;
      const error = comptimeError("compile-time value depends on its own result", site.span);
      for (const id of reads.filter((r) => !this.values.has(r))) {
        const other = this.program.sites.get(id);
        if (other && other.id !== site.id) error.addNote("waits for the call site here", other.span);
      }
      this.errors.push(error);
    }
    this.waiting = [];
  }

  /**
   * Failures outside the interpreter, such as a host handler throwing, fail
   * this site alone.
   */
  private evaluateSite(site: CallSite): SiteOutcome {
    try {
      return this.evaluateArgsAndCall(site);
    } catch (e) {
      const error =
        e instanceof CompileError
          ? e
          : internalError(`compile-time evaluation failed: ${e instanceof Error ? e.message : String(e)}`, site.span);
      return { site, result: { ok: false, error }, insertions: [] };
    }
  }

  private evaluateArgsAndCall(site: CallSite): SiteOutcome {
    const context: SiteContext = { id: site.id, span: site.span, scope: site.scope };
    const insertions: PendingInsertion[] = [];
    const args: ComptimeValue[] = [];
    for (const thunk of site.args) {
      const result = this.evaluateCached(thunk, [], context, insertions);
      if (!result.ok) return { site, result, insertions: [] };
      args.push(result.value);
    }
    const result = this.evaluateCached(site.callee, args, context, insertions);
    return { site, result, insertions: result.ok ? insertions : [] };
  }

  private evaluateCached(
    fnId: string,
    args: readonly ComptimeValue[],
    context: SiteContext,
    insertions: PendingInsertion[]
  ): EvaluationResult {
    const key: CacheKey = {
      fn: fnId,
      identity: functionIdentity(fnId, {
        functions: this.program.functions,
        operandValue: (operand) =>
          operand.kind === "site" ? this.siteValue(operand.site, context.span) : this.constValue(operand.name, context.span),
        typesFingerprint: () => typeTableFingerprint(this.program.types),
      }),
      args: argumentsHash(args),
      capabilities: this.capabilities.fingerprint(),
    };

    const hit = this.cache.lookup(key, this.host);
    if (hit) {
      this.log(`cache hit: ${fnId} for ${context.id}`);
      if (hit.outcome.kind === "error") return { ok: false, error: CompileError.fromRecord(hit.outcome.error) };
      for (const insertion of hit.insertions) {
        insertions.push({ ...insertion, site: context.id, siteSpan: context.span, scope: context.scope });
      }
      return { ok: true, value: hit.outcome.value };
    }

    const outcome = this.interpreter.evaluate(fnId, args, context, this.budget);
    const result = outcome.result;
    this.log(`evaluated ${fnId} for ${context.id} in ${outcome.steps} step(s)`);
    if (isCacheable(outcome)) {
      this.cache.store(key, {
        outcome: result.ok ? { kind: "value", value: result.value } : { kind: "error", error: result.error.toRecord() },
        reads: outcome.reads,
        insertions: outcome.insertions.map((i) => ({ code: i.code, insertSpan: i.insertSpan })),
      });
    }
    if (result.ok) insertions.push(...outcome.insertions);
    return result;
  }

  private siteValue(site: string, at: Span): ComptimeValue {
    const value = this.values.get(site);
    if (!value) throw internalError(`call site ${site} has not been evaluated`, at);
    return value;
  }

  private constValue(name: string, at: Span): ComptimeValue {
    const info = this.program.consts.get(name);
    if (!info) throw internalError(`unknown const '${name}'`, at);
    return this.siteValue(info.site, at);
  }
}

/**
 * Evaluations that executed an outward effect, or failed in a way a rerun
 * may not repeat, are not cached.
 */
function isCacheable(outcome: EvaluationOutcome): boolean {
  const outward = outcome.effects.some((e) => e.effect !== "Read" && e.decision === "Execute");
  if (outward) return false;
  const result = outcome.result;
  return result.ok || isCacheableError(result.error);
}
