import * as fs from "fs";
import * as path from "path";
import type { ScriptSource } from "../ports/source";

function isWithin(parent: string, child: string): boolean {
  const rel = path.relative(parent, child);
  return rel !== "" && !rel.startsWith("..") && !path.isAbsolute(rel);
}

/**
 * Script source reading `<root>/<module>/<relativePath>` from disk. Paths that
 * resolve outside the module's own directory are never served.
 */
export class DirectoryScriptSource implements ScriptSource {
  private readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  private resolve(moduleId: string, relativePath: string): string | undefined {
    const moduleRoot = path.resolve(this.root, moduleId);
    if (!isWithin(this.root, moduleRoot)) return undefined;

    const file = path.resolve(moduleRoot, relativePath);
    if (!isWithin(moduleRoot, file) || !fs.existsSync(file)) return undefined;

    // Symlinks are followed before the check, so a link inside the module
    // cannot serve a file from elsewhere.
    const realFile = fs.realpathSync(file);
    if (!isWithin(fs.realpathSync(moduleRoot), realFile)) return undefined;
    return realFile;
  }

  fetch(moduleId: string, relativePath: string): string | undefined {
    const file = this.resolve(moduleId, relativePath);
    if (!file || !fs.statSync(file).isFile()) return undefined;
    return fs.readFileSync(file, "utf8");
  }

  modifiedTime(moduleId: string, relativePath: string): number | undefined {
    const file = this.resolve(moduleId, relativePath);
    return file ? fs.statSync(file).mtimeMs : undefined;
  }
}
