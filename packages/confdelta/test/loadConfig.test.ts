import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { describe, expect, it } from "vitest";

import { loadConfig, validateConfig } from "../src/config/loadConfig.js";
import { ConfigError } from "../src/util/errors.js";
import { memoryStream } from "./helpers/memoryStream.js";

async function withTmpDir(fn: (dir: string) => Promise<void>): Promise<void> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "confdelta-config-"));
  try {
    await fn(dir);
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
}

describe("loadConfig", () => {
  it("falls back to defaults when no config file exists", async () => {
    await withTmpDir(async (dir) => {
      expect(await loadConfig({ cwd: dir })).toEqual({ config: { schemaVersion: 1 } });
    });
  });

  it("loads .confdelta.yml from the working directory", async () => {
    await withTmpDir(async (dir) => {
      await fs.writeFile(
        path.join(dir, ".confdelta.yml"),
        [
          "schemaVersion: 1",
          "format: json",
          "keyOrder: sorted",
          "context: 2",
          "maxValueWidth: 60",
          "tolerance:",
          "  abs: 0.001",
          "  rel: 0"
        ].join("\n"),
        "utf8"
      );

      expect(await loadConfig({ cwd: dir })).toEqual({
        configPath: ".confdelta.yml",
        config: {
          schemaVersion: 1,
          format: "json",
          keyOrder: "sorted",
          context: 2,
          maxValueWidth: 60,
          tolAbs: 0.001,
          tolRel: 0
        }
      });
    });
  });

  it("fails when an explicit config file is missing", async () => {
    await withTmpDir(async (dir) => {
      await expect(loadConfig({ cwd: dir, configPath: "nope.yml" })).rejects.toThrowError(
        new ConfigError("config not found: nope.yml")
      );
    });
  });

  it("fails on invalid YAML", async () => {
    await withTmpDir(async (dir) => {
      await fs.writeFile(path.join(dir, "c.yml"), "schemaVersion: [1\n", "utf8");
      await expect(loadConfig({ cwd: dir, configPath: "c.yml" })).rejects.toThrowError(/^invalid YAML in c\.yml: /);
    });
  });

  it("warns about unknown keys", async () => {
    await withTmpDir(async (dir) => {
      await fs.writeFile(path.join(dir, ".confdelta.yml"), "schemaVersion: 1\nextra: 1\ncolour: red\n", "utf8");
      const stderr = memoryStream();

      const loaded = await loadConfig({ cwd: dir, stderr: stderr.stream });

      expect(loaded.config).toEqual({ schemaVersion: 1 });
      expect(stderr.text()).toBe("warning: unknown key(s) in .confdelta.yml: colour, extra (ignoring)\n");
    });
  });
});

describe("validateConfig", () => {
  const stderr = memoryStream().stream;

  it("requires schemaVersion 1", () => {
    expect(() => validateConfig({ schemaVersion: 2 }, "c.yml", stderr)).toThrowError(
      "schemaVersion must be 1 (got 2)"
    );
    expect(() => validateConfig(["x"], "c.yml", stderr)).toThrowError("config root must be an object");
  });

  it("validates field types", () => {
    expect(() => validateConfig({ schemaVersion: 1, format: "xml" }, "c.yml", stderr)).toThrowError(
      "format must be one of: text, json, yaml"
    );
    expect(() => validateConfig({ schemaVersion: 1, keyOrder: "random" }, "c.yml", stderr)).toThrowError(
      "keyOrder must be one of: document, sorted"
    );
    expect(() => validateConfig({ schemaVersion: 1, context: 1.5 }, "c.yml", stderr)).toThrowError(
      "context must be a non-negative integer (got 1.5)"
    );
    expect(() => validateConfig({ schemaVersion: 1, tolerance: { abs: -1 } }, "c.yml", stderr)).toThrowError(
      "tolerance.abs must be a non-negative number (got -1)"
    );
    expect(() => validateConfig({ schemaVersion: 1, tolerance: 0.1 }, "c.yml", stderr)).toThrowError(
      "tolerance must be an object"
    );
    expect(() => validateConfig({ schemaVersion: 1, locations: "yes" }, "c.yml", stderr)).toThrowError(
      'locations must be a boolean (got "yes")'
    );
  });

  it("accepts a locations switch", () => {
    expect(validateConfig({ schemaVersion: 1, locations: true }, "c.yml", stderr)).toEqual({
      schemaVersion: 1,
      locations: true
    });
  });
});
