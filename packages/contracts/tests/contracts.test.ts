import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { config } from "@planar/core";
import {
  ContractError,
  PreconditionError,
  getContractConfig,
  requires,
  shouldEmitCheck,
} from "@planar/contracts";

beforeEach(() => {
  config.reset();
});

afterEach(() => {
  config.reset();
  vi.unstubAllEnvs();
  vi.restoreAllMocks();
});

describe("requires", () => {
  it("does nothing when the condition holds", () => {
    expect(() => requires(true, "never shown")).not.toThrow();
  });

  it("throws a PreconditionError with the message", () => {
    expect(() => requires(false, "index 2 is out of range")).toThrow(
      "Precondition failed: index 2 is out of range"
    );
  });

  it("uses a generic message when none is given", () => {
    expect(() => requires(false)).toThrow(/^Precondition failed$/);
  });

  it("throws an error that identifies the contract type", () => {
    let caught: unknown;
    try {
      requires(false, "boom");
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(PreconditionError);
    expect(caught).toBeInstanceOf(ContractError);
    expect(caught).toMatchObject({ name: "PreconditionError", contractType: "precondition" });
  });

  it("skips the check when contracts are off", () => {
    config.set({ contracts: { mode: "none" } });
    expect(() => requires(false, "unchecked")).not.toThrow();
  });

  it("skips the check when preconditions are stripped", () => {
    config.set({ contracts: { strip: { preconditions: true } } });
    expect(() => requires(false, "unchecked")).not.toThrow();
  });

  it("skips the check when PLANAR_CONTRACTS_MODE=none", () => {
    vi.stubEnv("PLANAR_CONTRACTS_MODE", "none");
    expect(() => requires(false, "unchecked")).not.toThrow();
  });
});

describe("getContractConfig", () => {
  it("defaults to full checking", () => {
    expect(getContractConfig()).toEqual({ mode: "full", strip: { preconditions: false } });
    expect(shouldEmitCheck("precondition")).toBe(true);
  });

  it("warns about an unknown mode and keeps checking", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.stubEnv("PLANAR_CONTRACTS_MODE", "lenient");

    expect(getContractConfig().mode).toBe("full");
    expect(shouldEmitCheck("precondition")).toBe(true);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(
      '[planar/contracts] WARN: unknown contracts.mode "lenient", using "full"'
    );
  });
});
