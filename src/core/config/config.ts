// src/core/config/config.ts
// Configuration for the script sandbox

import * as fs from "fs";
import * as path from "path";
import type { Side } from "../capabilities/stdlib";

// =========================================================================
// Configuration Types
// =========================================================================

export type ScriptsConfig = {
  /** Directory holding one sub-directory per module */
  root: string;
  /** Directory inside a module that holds its libraries */
  directory: string;
  /** Library file extension, including the dot */
  extension: string;
};

export type ReloadConfig = {
  /** Poll script files for changes */
  enabled: boolean;
  /** Host ticks between two polls */
  pollTicks: number;
};

export type VmConfig = {
  /** Name of the script realm, shown in inspector tooling */
  contextName: string;
};

export type SandboxConfig = {
  side: Side;
  scripts: ScriptsConfig;
  reload: ReloadConfig;
  vm: VmConfig;
};

export type SandboxConfigInput = {
  side?: Side;
  scripts?: Partial<ScriptsConfig>;
  reload?: Partial<ReloadConfig>;
  vm?: Partial<VmConfig>;
};

// =========================================================================
// Default Configuration
// =========================================================================

export const DEFAULT_SCRIPTS_CONFIG: ScriptsConfig = {
  root: "modules",
  directory: "scripts",
  extension: ".js",
};

export const DEFAULT_RELOAD_CONFIG: ReloadConfig = {
  enabled: false,
  pollTicks: 120,
};

export const DEFAULT_VM_CONFIG: VmConfig = {
  contextName: "modbox",
};

export const DEFAULT_CONFIG: SandboxConfig = {
  side: "server",
  scripts: DEFAULT_SCRIPTS_CONFIG,
  reload: DEFAULT_RELOAD_CONFIG,
  vm: DEFAULT_VM_CONFIG,
};

export const DEFAULT_CONFIG_FILES = ["modbox.config.json", "modbox.config.yaml", "modbox.config.yml"];

// =========================================================================
// Field readers
// =========================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(data: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = data[key];
  return isRecord(value) ? value : {};
}

function readString(data: Record<string, unknown>, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = data[key];
    if (typeof value === "string" && value !== "") return value;
  }
  return undefined;
}

function readNumber(data: Record<string, unknown>, ...keys: string[]): number | undefined {
  for (const key of keys) {
    const value = data[key];
    if (typeof value === "number" && Number.isFinite(value)) return value;
  }
  return undefined;
}

function readBoolean(data: Record<string, unknown>, ...keys: string[]): boolean | undefined {
  for (const key of keys) {
    const value = data[key];
    if (typeof value === "boolean") return value;
  }
  return undefined;
}

function parseSide(value: string | undefined): Side | undefined {
  return value === "client" || value === "server" ? value : undefined;
}

function parseFlag(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  if (["1", "true", "yes", "on"].includes(value.toLowerCase())) return true;
  if (["0", "false", "no", "off"].includes(value.toLowerCase())) return false;
  return undefined;
}

function parseInteger(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = parseInt(value, 10);
  return Number.isNaN(n) ? undefined : n;
}

function setIf<T, K extends keyof T>(target: Partial<T>, key: K, value: T[K] | undefined): void {
  if (value !== undefined) target[key] = value;
}

function nonEmpty<T extends object>(obj: T): T | undefined {
  return Object.keys(obj).length === 0 ? undefined : obj;
}

// =========================================================================
// Configuration Loading
// =========================================================================

/**
 * Read configuration from environment variables. Only variables that are set
 * (and parse) appear in the result.
 */
export function configFromEnv(prefix = "MODBOX", env: NodeJS.ProcessEnv = process.env): SandboxConfigInput {
  const scripts: Partial<ScriptsConfig> = {};
  setIf(scripts, "root", env[`${prefix}_SCRIPTS_ROOT`] || undefined);
  setIf(scripts, "directory", env[`${prefix}_SCRIPTS_DIRECTORY`] || undefined);
  setIf(scripts, "extension", env[`${prefix}_SCRIPTS_EXTENSION`] || undefined);

  const reload: Partial<ReloadConfig> = {};
  setIf(reload, "enabled", parseFlag(env[`${prefix}_RELOAD`]));
  setIf(reload, "pollTicks", parseInteger(env[`${prefix}_RELOAD_POLL_TICKS`]));

  const vm: Partial<VmConfig> = {};
  setIf(vm, "contextName", env[`${prefix}_VM_CONTEXT_NAME`] || undefined);

  const config: SandboxConfigInput = {};
  const side = parseSide(env[`${prefix}_SIDE`]);
  if (side) config.side = side;
  setIf(config, "scripts", nonEmpty(scripts));
  setIf(config, "reload", nonEmpty(reload));
  setIf(config, "vm", nonEmpty(vm));
  return config;
}

/**
 * Load configuration from a JSON or YAML file.
 */
export function configFromFile(filePath: string): SandboxConfigInput {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Config file not found: ${filePath}`);
  }

  const content = fs.readFileSync(filePath, "utf8");
  const ext = path.extname(filePath).toLowerCase();

  let data: unknown;

  if (ext === ".json") {
    data = JSON.parse(content);
  } else if (ext === ".yaml" || ext === ".yml") {
    // Simple YAML parser for basic configs
    data = parseSimpleYaml(content);
  } else {
    throw new Error(`Unsupported config file format: ${ext}`);
  }

  if (!isRecord(data)) {
    throw new Error(`Config file must contain an object: ${filePath}`);
  }
  return configFromObject(data);
}

/**
 * Create configuration from a plain object (e.g., from parsed JSON/YAML).
 * Accepts camelCase and snake_case keys.
 */
export function configFromObject(data: Record<string, unknown>): SandboxConfigInput {
  const scriptsData = section(data, "scripts");
  const reloadData = section(data, "reload");
  const vmData = section(data, "vm");

  const scripts: Partial<ScriptsConfig> = {};
  setIf(scripts, "root", readString(scriptsData, "root"));
  setIf(scripts, "directory", readString(scriptsData, "directory"));
  setIf(scripts, "extension", readString(scriptsData, "extension"));

  const reload: Partial<ReloadConfig> = {};
  setIf(reload, "enabled", readBoolean(reloadData, "enabled"));
  setIf(reload, "pollTicks", readNumber(reloadData, "pollTicks", "poll_ticks"));

  const vm: Partial<VmConfig> = {};
  setIf(vm, "contextName", readString(vmData, "contextName", "context_name"));

  const config: SandboxConfigInput = {};
  const side = parseSide(readString(data, "side"));
  if (side) config.side = side;
  setIf(config, "scripts", nonEmpty(scripts));
  setIf(config, "reload", nonEmpty(reload));
  setIf(config, "vm", nonEmpty(vm));
  return config;
}

/**
 * Merge configs with later ones overriding earlier ones.
 */
export function mergeConfigs(...configs: SandboxConfigInput[]): SandboxConfig {
  const result: SandboxConfig = {
    side: DEFAULT_CONFIG.side,
    scripts: { ...DEFAULT_CONFIG.scripts },
    reload: { ...DEFAULT_CONFIG.reload },
    vm: { ...DEFAULT_CONFIG.vm },
  };

  for (const cfg of configs) {
    if (cfg.side) result.side = cfg.side;
    if (cfg.scripts) result.scripts = { ...result.scripts, ...cfg.scripts };
    if (cfg.reload) result.reload = { ...result.reload, ...cfg.reload };
    if (cfg.vm) result.vm = { ...result.vm, ...cfg.vm };
  }

  return result;
}

/**
 * Auto-detect and load configuration.
 * Priority: overrides > config file > environment > defaults
 */
export function loadConfig(options?: {
  configFile?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: SandboxConfigInput;
}): SandboxConfig {
  const layers: SandboxConfigInput[] = [configFromEnv("MODBOX", options?.env)];

  if (options?.configFile) {
    layers.push(configFromFile(options.configFile));
  } else {
    const cwd = options?.cwd ?? process.cwd();
    const found = DEFAULT_CONFIG_FILES.map((name) => path.join(cwd, name)).find((p) => fs.existsSync(p));
    if (found) layers.push(configFromFile(found));
  }

  if (options?.overrides) {
    layers.push(options.overrides);
  }

  return mergeConfigs(...layers);
}

// =========================================================================
// Simple YAML Parser (for basic configs only)
// =========================================================================

function parseSimpleYaml(content: string): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  const stack: Array<{ obj: Record<string, unknown>; indent: number }> = [{ obj: result, indent: -1 }];

  for (const rawLine of content.split("\n")) {
    const trimmed = rawLine.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;

    const indent = rawLine.search(/\S/);

    let top = stack[stack.length - 1];
    while (stack.length > 1 && top.indent >= indent) {
      stack.pop();
      top = stack[stack.length - 1];
    }
    const parent = top.obj;

    const colonIdx = trimmed.indexOf(":");
    if (colonIdx < 0) continue;

    const key = trimmed.slice(0, colonIdx).trim();
    const value = trimmed.slice(colonIdx + 1).trim();

    if (value === "") {
      const nested: Record<string, unknown> = {};
      parent[key] = nested;
      stack.push({ obj: nested, indent });
    } else if (value === "true") {
      parent[key] = true;
    } else if (value === "false") {
      parent[key] = false;
    } else if (value === "null") {
      parent[key] = null;
    } else if (/^-?\d+$/.test(value)) {
      parent[key] = parseInt(value, 10);
    } else if (/^-?\d+\.\d+$/.test(value)) {
      parent[key] = parseFloat(value);
    } else if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
      parent[key] = value.slice(1, -1);
    } else {
      parent[key] = value;
    }
  }

  return result;
}

// =========================================================================
// Config Validation
// =========================================================================

export type ConfigValidation = {
  valid: boolean;
  errors: string[];
  warnings: string[];
};

export function validateConfig(config: SandboxConfig): ConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (config.side !== "client" && config.side !== "server") {
    errors.push(`side must be "client" or "server", got ${String(config.side)}`);
  }
  if (!Number.isInteger(config.reload.pollTicks) || config.reload.pollTicks < 1) {
    errors.push("reload.pollTicks must be a positive integer");
  }
  if (!config.scripts.extension.startsWith(".")) {
    errors.push("scripts.extension must start with a dot");
  }
  if (/[/\\]|\.\./.test(config.scripts.directory)) {
    errors.push("scripts.directory must be a single directory name");
  }
  if (config.reload.enabled && config.reload.pollTicks < 10) {
    warnings.push("reload.pollTicks is very low, scripts will be polled almost every tick");
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}
