// src/language/configuration.ts
//
// Lox Project / File Configuration Resolver
// -----------------------------------------
// Reads `lox.config.json` from the filesystem and produces one normalized
// config object used by the language server and tooling.
//
// It gives you:
// - project root detection (config file, else the git root)
// - default diagnostics / lint / logging options
// - which file extensions count as Lox source
//
// A missing config file is normal and yields defaults. A config file that is
// not valid JSON, or holds values of the wrong type, also yields defaults for
// the affected keys, and each problem is listed in `warnings`.
//
// Exports:
//   - LoxConfig / ResolvedLoxConfig (types)
//   - CONFIG_FILE_NAME, DEFAULT_CONFIG
//   - loadConfig(filePath, workspaceRoot?): Promise<ResolvedLoxConfig>
//   - findProjectRoot(startDir): Promise<string | null>
//   - isSourceFile(filePath, config): boolean

import * as fs from "fs";
import * as path from "path";
import { isLogLevel, type LogLevel } from "../utils/logger";

export const CONFIG_FILE_NAME = "lox.config.json";

export type LoxConfig = {
  diagnostics: {
    enabled: boolean;
    // Cap on diagnostics published per document
    maxNumberOfProblems: number;
  };

  lint: {
    enabled: boolean;
  };

  logging: {
    level: LogLevel;
  };

  files: {
    // Which file extensions are treated as Lox source
    extensions: string[];
  };
};

export type ResolvedLoxConfig = LoxConfig & {
  projectRoot: string | null;
  configPath: string | null;
  warnings: string[];
};

export const DEFAULT_CONFIG: LoxConfig = {
  diagnostics: {
    enabled: true,
    maxNumberOfProblems: 100,
  },
  lint: {
    enabled: true,
  },
  logging: {
    level: "info",
  },
  files: {
    extensions: [".lox"],
  },
};

type JsonObject = { [key: string]: unknown };

/* =========================================================
   Public API
   ========================================================= */

export async function loadConfig(filePath: string, workspaceRoot?: string): Promise<ResolvedLoxConfig> {
  const startDir = (await isDirectory(filePath)) ? filePath : path.dirname(filePath);

  const projectRoot = (await findProjectRoot(startDir)) ?? workspaceRoot ?? null;
  const configPath = projectRoot ? await findConfigFile(projectRoot) : null;

  const warnings: string[] = [];
  const userConfig = configPath ? await safeReadJson(configPath, warnings) : null;
  const merged = deepMerge(toJsonObject(DEFAULT_CONFIG), userConfig ?? {});

  return {
    ...normalize(merged, warnings),
    projectRoot,
    configPath,
    warnings,
  };
}

export async function findProjectRoot(startDir: string): Promise<string | null> {
  let dir = path.resolve(startDir);

  for (;;) {
    if (await exists(path.join(dir, CONFIG_FILE_NAME))) return dir;
    if (await exists(path.join(dir, ".git"))) return dir; // Git root fallback

    const parent = path.dirname(dir);
    if (parent === dir) return null; // filesystem root
    dir = parent;
  }
}

/** True when the file's extension is one of `files.extensions` (case-insensitive). */
export function isSourceFile(filePath: string, config: Pick<LoxConfig, "files">): boolean {
  const ext = path.extname(filePath).toLowerCase();
  if (!ext) return false;
  return config.files.extensions.some((e) => e.toLowerCase() === ext);
}

/* =========================================================
   Config file discovery
   ========================================================= */

async function findConfigFile(projectRoot: string): Promise<string | null> {
  const p = path.join(projectRoot, CONFIG_FILE_NAME);
  return (await exists(p)) ? p : null;
}

async function exists(p: string): Promise<boolean> {
  try {
    await fs.promises.access(p, fs.constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

async function isDirectory(p: string): Promise<boolean> {
  try {
    return (await fs.promises.stat(p)).isDirectory();
  } catch {
    return false;
  }
}

/* =========================================================
   JSON utilities
   ========================================================= */

async function safeReadJson(p: string, warnings: string[]): Promise<JsonObject | null> {
  let raw: string;
  try {
    raw = await fs.promises.readFile(p, "utf8");
  } catch (e) {
    warnings.push(`${p}: cannot read config (${errorMessage(e)})`);
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (e) {
    warnings.push(`${p}: invalid JSON (${errorMessage(e)})`);
    return null;
  }

  if (!isObject(parsed)) {
    warnings.push(`${p}: config must be a JSON object`);
    return null;
  }
  return parsed;
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/* =========================================================
   Deep merge (simple & safe for config)
   ========================================================= */

function isObject(x: unknown): x is JsonObject {
  return !!x && typeof x === "object" && !Array.isArray(x);
}

function toJsonObject(config: LoxConfig): JsonObject {
  return { ...config };
}

export function deepMerge(base: JsonObject, override: JsonObject): JsonObject {
  const out: JsonObject = { ...base };

  for (const [k, v] of Object.entries(override)) {
    if (v === undefined) continue;

    if (Array.isArray(v)) {
      out[k] = v.slice();
      continue;
    }

    const current = out[k];
    if (isObject(v) && isObject(current)) {
      out[k] = deepMerge(current, v);
      continue;
    }

    out[k] = v;
  }

  return out;
}

/* =========================================================
   Normalization helpers
   ========================================================= */

function normalize(merged: JsonObject, warnings: string[]): LoxConfig {
  const section = (key: string): JsonObject => {
    const v = merged[key];
    if (isObject(v)) return v;
    warnings.push(`"${key}" must be an object; using defaults`);
    return {};
  };

  const diagnostics = section("diagnostics");
  const lint = section("lint");
  const logging = section("logging");
  const files = section("files");

  const pick = <T>(key: string, value: unknown, guard: (x: unknown) => x is T, fallback: T): T => {
    if (value === undefined) return fallback;
    if (guard(value)) return value;
    warnings.push(`"${key}" has an invalid value; using default`);
    return fallback;
  };

  const maxProblems = pick(
    "diagnostics.maxNumberOfProblems",
    diagnostics.maxNumberOfProblems,
    isNonNegativeInteger,
    DEFAULT_CONFIG.diagnostics.maxNumberOfProblems
  );

  const extensions = pick("files.extensions", files.extensions, isStringArray, DEFAULT_CONFIG.files.extensions);

  return {
    diagnostics: {
      enabled: pick("diagnostics.enabled", diagnostics.enabled, isBoolean, DEFAULT_CONFIG.diagnostics.enabled),
      maxNumberOfProblems: maxProblems,
    },
    lint: {
      enabled: pick("lint.enabled", lint.enabled, isBoolean, DEFAULT_CONFIG.lint.enabled),
    },
    logging: {
      level: pick("logging.level", logging.level, isLogLevel, DEFAULT_CONFIG.logging.level),
    },
    files: {
      extensions: uniqueStrings(extensions.map(normalizeExt)),
    },
  };
}

function isString(x: unknown): x is string {
  return typeof x === "string";
}

function isBoolean(x: unknown): x is boolean {
  return typeof x === "boolean";
}

function isNonNegativeInteger(x: unknown): x is number {
  return typeof x === "number" && Number.isInteger(x) && x >= 0;
}

function isStringArray(x: unknown): x is string[] {
  return Array.isArray(x) && x.every(isString);
}

function uniqueStrings(list: readonly string[]): string[] {
  const set = new Set<string>();
  for (const s of list) {
    const t = s.trim();
    if (t) set.add(t);
  }
  return [...set.values()];
}

export function normalizeExt(ext: string): string {
  const e = ext.trim();
  if (!e) return "";
  return e.startsWith(".") ? e : `.${e}`;
}
