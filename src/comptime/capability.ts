/**
 * Capability Context - the policy consulted before every effectful intrinsic.
 *
 * A context is built once per session from its mode and never changes, so two
 * evaluations of the same function in one session always see the same
 * decisions. Adding a mode means adding a policy table, nothing else.
 */

import { CompileError, Span } from "../diagnostics/errors";

export type Effect = "Read" | "Write" | "Network" | "Shell";
export type Decision = "Execute" | "NoOpSucceed" | "Deny";
export type Mode = "build" | "lsp-sandbox";

export type Policy = Readonly<Record<Effect, Decision>>;

export const EFFECTS: readonly Effect[] = ["Read", "Write", "Network", "Shell"];
export const DECISIONS: readonly Decision[] = ["Execute", "NoOpSucceed", "Deny"];
export const MODES: readonly Mode[] = ["build", "lsp-sandbox"];

export const POLICY_TABLES: Readonly<Record<Mode, Policy>> = {
  build: { Read: "Execute", Write: "Execute", Network: "Execute", Shell: "Execute" },
  "lsp-sandbox": { Read: "Execute", Write: "NoOpSucceed", Network: "Deny", Shell: "Deny" },
};

export class CapabilityContext {
  private readonly policy: Policy;

  private constructor(readonly mode: Mode, policy: Policy) {
    this.policy = Object.freeze({ ...policy });
    Object.freeze(this);
  }

  static forMode(mode: Mode, overrides: Partial<Record<Effect, Decision>> = {}): CapabilityContext {
    return new CapabilityContext(mode, { ...POLICY_TABLES[mode], ...overrides });
  }

  check(effect: Effect): Decision {
    return this.policy[effect];
  }

  /**
   * Decide `effect` for an intrinsic at `at`, raising `CapabilityDenied` when
   * the policy denies it.
   */
  require(effect: Effect, at: Span): Exclude<Decision, "Deny"> {
    const decision = this.check(effect);
    if (decision === "Deny") {
      throw new CompileError(
        "CapabilityDenied",
        "comptime",
        `${effect} effect denied in ${this.mode} mode`,
        at
      ).addNote(`the ${this.mode} policy maps ${effect} to Deny`);
    }
    return decision;
  }

  /**
   * Identifies the policy for cache keys: entries computed under one policy
   * are never replayed under another.
   */
  fingerprint(): string {
    return `${this.mode}:` + EFFECTS.map((e) => `${e}=${this.policy[e]}`).join(",");
  }
}
