import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  CONFIG_FILE_NAME,
  DEFAULT_CONFIG,
  deepMerge,
  findProjectRoot,
  isSourceFile,
  loadConfig,
  normalizeExt,
} from "../../src/language/configuration";

let tmp: string;

beforeEach(() => {
  tmp = fs.mkdtempSync(path.join(os.tmpdir(), "lox-config-"));
});

afterEach(() => {
  fs.rmSync(tmp, { recursive: true, force: true });
});

function write(rel: string, content: string): string {
  const p = path.join(tmp, rel);
  fs.mkdirSync(path.dirname(p), { recursive: true });
  fs.writeFileSync(p, content, "utf8");
  return p;
}

describe("loadConfig", () => {
  it("merges the nearest config file over the defaults", async () => {
    const configPath = write(
      CONFIG_FILE_NAME,
      JSON.stringify({ diagnostics: { maxNumberOfProblems: 5 }, files: { extensions: ["lox", ".txt", "lox"] } })
    );
    const file = write("src/deep/main.lox", "print 1;");

    const cfg = await loadConfig(file);

    expect(cfg.projectRoot).toBe(tmp);
    expect(cfg.configPath).toBe(configPath);
    expect(cfg.warnings).toEqual([]);
    expect(cfg.diagnostics).toEqual({ enabled: true, maxNumberOfProblems: 5 });
    expect(cfg.lint).toEqual({ enabled: true });
    expect(cfg.logging).toEqual({ level: "info" });
    expect(cfg.files.extensions).toEqual([".lox", ".txt"]);
  });

  it("falls back to defaults on invalid JSON and says why", async () => {
    const configPath = write(CONFIG_FILE_NAME, "{ nope");

    const cfg = await loadConfig(path.join(tmp, "main.lox"));

    expect(cfg.configPath).toBe(configPath);
    expect(cfg.warnings).toHaveLength(1);
    expect(cfg.warnings[0].startsWith(`${configPath}: invalid JSON (`)).toBe(true);
    expect(cfg.diagnostics).toEqual(DEFAULT_CONFIG.diagnostics);
    expect(cfg.files).toEqual(DEFAULT_CONFIG.files);
  });

  it("rejects a config that is not an object", async () => {
    const configPath = write(CONFIG_FILE_NAME, "[1, 2]");

    const cfg = await loadConfig(tmp);

    expect(cfg.warnings).toEqual([`${configPath}: config must be a JSON object`]);
  });

  it("keeps defaults for values of the wrong type", async () => {
    write(CONFIG_FILE_NAME, JSON.stringify({ lint: { enabled: "yes" }, logging: { level: "loud" } }));

    const cfg = await loadConfig(tmp);

    expect(cfg.lint.enabled).toBe(true);
    expect(cfg.logging.level).toBe("info");
    expect(cfg.warnings).toEqual([
      '"lint.enabled" has an invalid value; using default',
      '"logging.level" has an invalid value; using default',
    ]);
  });

  it("uses the git root when no config file exists", async () => {
    fs.mkdirSync(path.join(tmp, "repo", ".git"), { recursive: true });
    const file = write("repo/src/a.lox", "");

    const cfg = await loadConfig(file);

    expect(cfg.projectRoot).toBe(path.join(tmp, "repo"));
    expect(cfg.configPath).toBeNull();
    expect(cfg.warnings).toEqual([]);
    expect(cfg.files.extensions).toEqual([".lox"]);
  });
});

describe("findProjectRoot", () => {
  it("stops at the first directory holding a config file", async () => {
    write(`outer/${CONFIG_FILE_NAME}`, "{}");
    write(`outer/inner/${CONFIG_FILE_NAME}`, "{}");
    fs.mkdirSync(path.join(tmp, "outer", "inner", "x"), { recursive: true });

    expect(await findProjectRoot(path.join(tmp, "outer", "inner", "x"))).toBe(path.join(tmp, "outer", "inner"));
  });
});

describe("helpers", () => {
  it("deep-merges objects and replaces arrays", () => {
    const merged = deepMerge({ a: { b: 1, c: 2 }, list: [1, 2] }, { a: { c: 3 }, list: [9] });
    expect(merged).toEqual({ a: { b: 1, c: 3 }, list: [9] });
  });

  it("normalizes extensions to a leading dot", () => {
    expect(["lox", ".lox", "  txt "].map(normalizeExt)).toEqual([".lox", ".lox", ".txt"]);
  });

  it("matches source files by the configured extensions", () => {
    const config = { files: { extensions: [".lox", ".txt"] } };

    expect(isSourceFile("/work/main.lox", config)).toBe(true);
    expect(isSourceFile("/work/NOTES.TXT", config)).toBe(true);
    expect(isSourceFile("/work/main.js", config)).toBe(false);
    expect(isSourceFile("/work/Makefile", config)).toBe(false);
    expect(isSourceFile("/work/main.txt", DEFAULT_CONFIG)).toBe(false);
  });
});
