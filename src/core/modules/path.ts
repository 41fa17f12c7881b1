// src/core/modules/path.ts
// Module ids, library references and their script paths

import { InvalidArgumentError } from "../errors";

const MODULE_ID = /^[A-Za-z0-9_\-.]+$/;

export interface ScriptLayout {
  /** Directory inside a module that holds its libraries */
  directory: string;
  /** File extension of library scripts, including the dot */
  extension: string;
}

export const DEFAULT_LAYOUT: ScriptLayout = { directory: "scripts", extension: ".js" };

export function isValidModuleId(id: string): boolean {
  return MODULE_ID.test(id) && id !== "." && id !== "..";
}

export function assertModuleId(id: unknown): string {
  if (typeof id !== "string" || !isValidModuleId(id)) {
    throw new InvalidArgumentError(`Invalid module id: ${typeof id === "string" ? id : typeof id}`);
  }
  return id;
}

/**
 * Split `othermodule:name` at the first colon. Plain names have no module.
 */
export function splitRef(ref: string): { module?: string; name: string } {
  const sep = ref.indexOf(":");
  if (sep < 0) return { name: ref };
  return { module: ref.slice(0, sep), name: ref.slice(sep + 1) };
}

/**
 * Canonical dotted library name, with every path separator and `..`
 * removed. Returns undefined when nothing is left.
 */
export function normalizeLibraryName(name: string): string | undefined {
  const stripped = name.replace(/[/\\]/g, "").replace(/\.\./g, "");
  const segments = stripped.split(".").filter((segment) => segment.length > 0);
  return segments.length === 0 ? undefined : segments.join(".");
}

/** `a.b` -> `scripts/a/b.js` */
export function libraryPath(name: string, layout: ScriptLayout = DEFAULT_LAYOUT): string {
  return `${layout.directory}/${name.split(".").join("/")}${layout.extension}`;
}
