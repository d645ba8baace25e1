import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ZodError } from "zod";
import { loadConfig, loadDefaultConfig, mergeConfig } from "./load-config";

describe("loadDefaultConfig", () => {
  it("loads the bundled defaults", async () => {
    const config = await loadDefaultConfig();

    expect(config.table.encodings).toEqual(["utf-8", "shift_jis"]);
    expect(config.files.extensions).toEqual([".html", ".js"]);
    expect(config.logging.level).toBe("NONE");
  });
});

describe("mergeConfig", () => {
  it("merges nested sections", async () => {
    const base = await loadDefaultConfig();

    const merged = mergeConfig(base, {
      target: "./site",
      files: { bom: true },
      logging: { level: "DEBUG" },
    });

    expect(merged.target).toBe("./site");
    expect(merged.source).toBe(base.source);
    expect(merged.files).toEqual({ ...base.files, bom: true });
    expect(merged.logging).toEqual({ ...base.logging, level: "DEBUG" });
    expect(merged.table).toEqual(base.table);
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "batrepl-config-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("applies a custom config file", async () => {
    const custom = join(dir, "custom.json");
    await writeFile(
      custom,
      JSON.stringify({ files: { extensions: [".htm", ".mjs"] } }),
    );

    const { config, errors } = await loadConfig(custom);

    expect(config.files.extensions).toEqual([".htm", ".mjs"]);
    expect(config.files.encoding).toBe("utf-8");
    expect(errors.filter((e) => e.path === custom)).toEqual([]);
  });

  it("reports invalid JSON and keeps going", async () => {
    const custom = join(dir, "broken.json");
    await writeFile(custom, "{ not json");

    const { config, errors } = await loadConfig(custom);

    expect(config.files.extensions).toEqual([".html", ".js"]);
    const error = errors.find((e) => e.path === custom)?.error;
    expect(error).toBeInstanceOf(SyntaxError);
  });

  it("rejects unknown encodings", async () => {
    const custom = join(dir, "encodings.json");
    await writeFile(
      custom,
      JSON.stringify({ table: { encodings: ["not-an-encoding"] } }),
    );

    const { config, errors } = await loadConfig(custom);

    expect(config.table.encodings).toEqual(["utf-8", "shift_jis"]);
    const error = errors.find((e) => e.path === custom)?.error;
    expect(error).toBeInstanceOf(ZodError);
  });
});
