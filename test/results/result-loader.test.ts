import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import {
  isResultFileFor,
  loadResultFamilies,
  loadResultFile,
  validateResultFile,
} from "../../src/results/resultLoader.js";
import { ResultFileError } from "../../src/common/errors.js";
import { createTempResultsDir, removeTempDir, silentLogger, writeJson } from "../helpers/fixtures.js";

describe("result loader", () => {
  let dir: string;

  beforeEach(() => {
    dir = createTempResultsDir();
  });

  afterEach(() => {
    removeTempDir(dir);
  });

  describe("isResultFileFor", () => {
    it("matches the source prefix and json extension", () => {
      expect(isResultFileFor("rust", "rust_benchmark_20260101.json")).toBe(true);
      expect(isResultFileFor("nodejs", "nodejs_benchmark_run-7.json")).toBe(true);
    });

    it("rejects other families and extensions", () => {
      expect(isResultFileFor("rust", "nodejs_benchmark_1.json")).toBe(false);
      expect(isResultFileFor("rust", "rust_benchmark_1.txt")).toBe(false);
      expect(isResultFileFor("nodejs", "performance_comparison_20260101_000000.json")).toBe(false);
    });
  });

  describe("validateResultFile", () => {
    it("accepts a timestamp and results map", () => {
      expect(validateResultFile({ timestamp: "t1", results: { a: 0.5 } })).toEqual({
        timestamp: "t1",
        results: { a: 0.5 },
      });
    });

    it("defaults a missing timestamp to an empty string", () => {
      expect(validateResultFile({ results: {} })).toEqual({ timestamp: "", results: {} });
    });

    it("ignores extra fields", () => {
      const parsed = validateResultFile({ timestamp: "t1", results: { a: 1 }, platform: "linux" });
      expect(parsed).toEqual({ timestamp: "t1", results: { a: 1 } });
    });

    it("rejects non-numeric times", () => {
      expect(() => validateResultFile({ timestamp: "t1", results: { a: "fast" } })).toThrow();
    });

    it("rejects a missing results map", () => {
      expect(() => validateResultFile({ timestamp: "t1" })).toThrow();
      expect(() => validateResultFile(null)).toThrow();
    });
  });

  describe("loadResultFile", () => {
    it("returns a result set tagged with its source and path", () => {
      const path = writeJson(dir, "rust_benchmark_1.json", { timestamp: "t1", results: { a: 2 } });

      expect(loadResultFile("rust", path)).toEqual({
        source: "rust",
        filePath: path,
        timestamp: "t1",
        results: { a: 2 },
      });
    });

    it("wraps malformed JSON in a ResultFileError", () => {
      const path = join(dir, "rust_benchmark_bad.json");
      writeFileSync(path, "not valid json {{{");

      expect(() => loadResultFile("rust", path)).toThrow(ResultFileError);
    });

    it("wraps a missing file in a ResultFileError", () => {
      const path = join(dir, "rust_benchmark_missing.json");

      expect(() => loadResultFile("rust", path)).toThrow(`Could not load ${path}`);
    });
  });

  describe("loadResultFamilies", () => {
    it("splits files by source and ignores unrelated files", () => {
      writeJson(dir, "rust_benchmark_1.json", { timestamp: "r1", results: { a: 1 } });
      writeJson(dir, "rust_benchmark_2.json", { timestamp: "r2", results: { a: 2 } });
      writeJson(dir, "nodejs_benchmark_1.json", { timestamp: "n1", results: { a: 3 } });
      writeJson(dir, "summary.json", { timestamp: "x", results: {} });
      writeFileSync(join(dir, "notes.txt"), "hello");

      const families = loadResultFamilies(dir, silentLogger());

      expect(families.rust.map((r) => r.timestamp).sort()).toEqual(["r1", "r2"]);
      expect(families.nodejs.map((r) => r.timestamp)).toEqual(["n1"]);
    });

    it("skips a broken file with a warning and keeps the rest", () => {
      writeJson(dir, "nodejs_benchmark_1.json", { timestamp: "n1", results: { a: 3 } });
      writeFileSync(join(dir, "nodejs_benchmark_2.json"), "{ truncated");
      writeJson(dir, "rust_benchmark_1.json", { timestamp: "r1", results: { a: "slow" } });
      const logger = silentLogger();
      const warn = vi.spyOn(logger, "warn");

      const families = loadResultFamilies(dir, logger);

      expect(families.nodejs.map((r) => r.timestamp)).toEqual(["n1"]);
      expect(families.rust).toEqual([]);
      expect(warn).toHaveBeenCalledTimes(2);
      expect(warn).toHaveBeenCalledWith(
        { file: join(dir, "nodejs_benchmark_2.json"), source: "nodejs" },
        expect.stringContaining(`Could not load ${join(dir, "nodejs_benchmark_2.json")}`),
      );
    });

    it("skips a directory that matches a result pattern", () => {
      mkdirSync(join(dir, "rust_benchmark_old.json"));
      const logger = silentLogger();
      const warn = vi.spyOn(logger, "warn");

      const families = loadResultFamilies(dir, logger);

      expect(families.rust).toEqual([]);
      expect(warn).toHaveBeenCalledTimes(1);
    });

    it("returns empty families for an empty directory", () => {
      expect(loadResultFamilies(dir, silentLogger())).toEqual({ rust: [], nodejs: [] });
    });
  });
});
