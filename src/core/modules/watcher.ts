// src/core/modules/watcher.ts
// Polls the modification stamps of every script the loader has read

import type { ScriptSource } from "../../ports/source";

export class ReloadWatcher {
  /** moduleId -> path -> stamp seen at last fetch */
  private readonly stamps = new Map<string, Map<string, number | undefined>>();
  private countdown: number;

  constructor(
    private readonly source: ScriptSource,
    private readonly pollTicks: number,
    private readonly reload: (moduleId: string) => void
  ) {
    this.countdown = pollTicks;
  }

  track(moduleId: string, path: string): void {
    let files = this.stamps.get(moduleId);
    if (!files) {
      files = new Map();
      this.stamps.set(moduleId, files);
    }
    files.set(path, this.source.modifiedTime?.(moduleId, path));
  }

  /**
   * Advance one host tick. Every `pollTicks` ticks, reload the modules whose
   * scripts changed and return their ids.
   */
  tick(): string[] {
    this.countdown -= 1;
    if (this.countdown > 0) return [];
    this.countdown = this.pollTicks;
    return this.poll();
  }

  poll(): string[] {
    const changed: string[] = [];
    for (const [moduleId, files] of this.stamps) {
      let dirty = false;
      for (const [path, stamp] of files) {
        const current = this.source.modifiedTime?.(moduleId, path);
        if (current !== stamp) {
          files.set(path, current);
          dirty = true;
        }
      }
      if (dirty) changed.push(moduleId);
    }
    for (const moduleId of changed) this.reload(moduleId);
    return changed;
  }
}
