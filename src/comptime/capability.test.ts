import { describe, test, expect } from "vitest";
import { CompileError, span } from "../diagnostics/errors";
import { CapabilityContext, EFFECTS } from "./capability";

const at = span("main.wisp", 4, 12);

describe("CapabilityContext", () => {
  test("build mode executes every effect", () => {
    const ctx = CapabilityContext.forMode("build");
    expect(EFFECTS.map((e) => ctx.check(e))).toEqual([
      "Execute",
      "Execute",
      "Execute",
      "Execute",
    ]);
    expect(ctx.require("Network", at)).toBe("Execute");
  });

  test("the sandbox reads, skips writes and denies the rest", () => {
    const ctx = CapabilityContext.forMode("lsp-sandbox");
    expect(ctx.check("Read")).toBe("Execute");
    expect(ctx.check("Write")).toBe("NoOpSucceed");
    expect(ctx.check("Network")).toBe("Deny");
    expect(ctx.check("Shell")).toBe("Deny");
    expect(ctx.require("Write", at)).toBe("NoOpSucceed");
  });

  test("denial raises CapabilityDenied at the call site", () => {
    const ctx = CapabilityContext.forMode("lsp-sandbox");
    let error: unknown;
    try {
      ctx.require("Shell", at);
    } catch (e) {
      error = e;
    }
    expect(error).toBeInstanceOf(CompileError);
    expect(error).toMatchObject({
      kind: "CapabilityDenied",
      message: "Shell effect denied in lsp-sandbox mode",
      span: at,
      notes: [{ message: "the lsp-sandbox policy maps Shell to Deny" }],
    });
  });

  test("overrides replace single entries of the table", () => {
    const ctx = CapabilityContext.forMode("build", { Network: "Deny" });
    expect(ctx.check("Network")).toBe("Deny");
    expect(ctx.check("Read")).toBe("Execute");
    expect(() => ctx.require("Network", at)).toThrow("Network effect denied in build mode");
  });

  test("the fingerprint names every decision", () => {
    expect(CapabilityContext.forMode("lsp-sandbox").fingerprint()).toBe(
      "lsp-sandbox:Read=Execute,Write=NoOpSucceed,Network=Deny,Shell=Deny"
    );
    expect(CapabilityContext.forMode("build", { Shell: "NoOpSucceed" }).fingerprint()).toBe(
      "build:Read=Execute,Write=Execute,Network=Execute,Shell=NoOpSucceed"
    );
  });

  test("contexts are immutable", () => {
    expect(Object.isFrozen(CapabilityContext.forMode("build"))).toBe(true);
  });
});
