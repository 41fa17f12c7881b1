import * as path from "path";
import type { ScriptSource } from "../ports/source";
import { isValidModuleId } from "../core/modules/path";

type StoredScript = { source: string; version: number };

function fileKey(moduleId: string, relativePath: string): string | undefined {
  if (!isValidModuleId(moduleId)) return undefined;
  const normalized = path.posix.normalize(relativePath);
  if (normalized.startsWith("..") || path.posix.isAbsolute(normalized)) return undefined;
  return `${moduleId}/${normalized}`;
}

/**
 * Script source backed by a map, for embedding hosts that ship scripts in
 * memory and for tests. Every write bumps the file's modification stamp.
 */
export class InMemoryScriptSource implements ScriptSource {
  private readonly files = new Map<string, StoredScript>();
  private version = 0;

  constructor(modules: Record<string, Record<string, string>> = {}) {
    for (const [moduleId, files] of Object.entries(modules)) {
      for (const [relativePath, source] of Object.entries(files)) {
        this.set(moduleId, relativePath, source);
      }
    }
  }

  set(moduleId: string, relativePath: string, source: string): this {
    const key = fileKey(moduleId, relativePath);
    if (key === undefined) {
      throw new Error(`Refusing script path outside module root: ${moduleId}:${relativePath}`);
    }
    this.files.set(key, { source, version: ++this.version });
    return this;
  }

  delete(moduleId: string, relativePath: string): boolean {
    const key = fileKey(moduleId, relativePath);
    return key !== undefined && this.files.delete(key);
  }

  fetch(moduleId: string, relativePath: string): string | undefined {
    const key = fileKey(moduleId, relativePath);
    return key === undefined ? undefined : this.files.get(key)?.source;
  }

  modifiedTime(moduleId: string, relativePath: string): number | undefined {
    const key = fileKey(moduleId, relativePath);
    return key === undefined ? undefined : this.files.get(key)?.version;
  }
}
