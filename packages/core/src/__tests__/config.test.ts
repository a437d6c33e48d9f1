import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { config, defineConfig } from "../index.js";

describe("config", () => {
  beforeEach(() => {
    config.reset();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    config.reset();
  });

  describe("defaults", () => {
    it("should use the emit backend", () => {
      expect(config.get("backend")).toBe("emit");
    });

    it("should limit arity to 255", () => {
      expect(config.get("limits.arity")).toBe(255);
    });

    it("should leave debug and tracing off", () => {
      expect(config.get("debug")).toBe(false);
      expect(config.get("tracing")).toBe(false);
      expect(config.has("debug")).toBe(false);
    });

    it("should return undefined for unknown paths", () => {
      expect(config.get("limits.depth")).toBeUndefined();
      expect(config.get("backend.name")).toBeUndefined();
    });

    it("should not find a config file in the repository", () => {
      expect(config.getConfigFilePath()).toBeUndefined();
    });
  });

  describe("set", () => {
    it("should deep merge programmatic values", () => {
      config.set({ limits: { arity: 8 } });

      expect(config.get("limits.arity")).toBe(8);
      expect(config.get("backend")).toBe("emit");
    });

    it("should be cleared by reset", () => {
      config.set({ debug: true });
      expect(config.has("debug")).toBe(true);

      config.reset();
      expect(config.get("debug")).toBe(false);
    });

    it("should expose the merged store", () => {
      config.set({ backend: "table" });
      expect(config.getAll()).toMatchObject({ backend: "table", limits: { arity: 255 } });
    });
  });

  describe("environment", () => {
    it("should parse numbers into nested paths", () => {
      vi.stubEnv("LAZYPROXY_LIMITS_ARITY", "32");
      expect(config.get("limits.arity")).toBe(32);
    });

    it("should parse booleans", () => {
      vi.stubEnv("LAZYPROXY_DEBUG", "true");
      vi.stubEnv("LAZYPROXY_TRACING", "0");
      expect(config.get("debug")).toBe(true);
      expect(config.get("tracing")).toBe(false);
    });

    it("should keep other values as strings", () => {
      vi.stubEnv("LAZYPROXY_BACKEND", "table");
      expect(config.get("backend")).toBe("table");
    });
  });

  it("defineConfig should return its argument", () => {
    const cfg = { backend: "table" as const, limits: { arity: 16 } };
    expect(defineConfig(cfg)).toBe(cfg);
  });
});
