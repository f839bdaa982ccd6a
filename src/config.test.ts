import { describe, test, expect } from "vitest";
import { ConfigError, DEFAULT_CONFIG, resolveConfig } from "./config";

describe("resolveConfig", () => {
  test("fills in defaults", () => {
    expect(resolveConfig()).toEqual({ ...DEFAULT_CONFIG, policy: {} });
    expect(resolveConfig().maxSteps).toBe(1_000_000);
    expect(resolveConfig().maxInsertionPasses).toBe(16);
  });

  test("keeps given values and ignores undefined ones", () => {
    const config = resolveConfig({ mode: "lsp-sandbox", workers: 4, cacheDir: undefined, policy: { Read: "Deny" } });
    expect(config).toMatchObject({ mode: "lsp-sandbox", workers: 4, maxSteps: 1_000_000, policy: { Read: "Deny" } });
    expect("cacheDir" in config).toBe(false);
  });

  test("copies the policy overrides", () => {
    const policy = { Write: "NoOpSucceed" as const };
    const config = resolveConfig({ policy });
    expect(config.policy).not.toBe(policy);
  });

  test("rejects non-positive limits", () => {
    expect(() => resolveConfig({ maxSteps: 0 })).toThrow(ConfigError);
    expect(() => resolveConfig({ maxSteps: 0 })).toThrow("maxSteps must be a positive integer, got 0");
    expect(() => resolveConfig({ workers: 1.5 })).toThrow("workers must be a positive integer, got 1.5");
    expect(() => resolveConfig({ timeBudgetMs: -1 })).toThrow("timeBudgetMs must be a positive integer, got -1");
  });

  test("rejects an empty cache directory", () => {
    expect(() => resolveConfig({ cacheDir: "" })).toThrow("cacheDir must not be empty");
  });
});
