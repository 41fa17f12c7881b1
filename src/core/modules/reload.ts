// src/core/modules/reload.ts
// Hot reload with per-library rollback

import type { LogSink } from "../../ports/sink";
import { describeThrown } from "../errors";
import type { LibraryEntry, ModuleRecord } from "./library";
import type { ModuleLoader } from "./loader";

export interface ReloadFailure {
  library: string;
  message: string;
}

export interface ReloadReport {
  module: string;
  /** Libraries executed again */
  reloaded: string[];
  /** Libraries that opted out and kept their scope */
  kept: string[];
  /** Libraries that failed and were rolled back */
  failed: ReloadFailure[];
}

export interface HotReloaderOptions {
  loader: ModuleLoader;
  log: LogSink;
  clearModuleState?: (moduleId: string) => void;
}

export class HotReloader {
  constructor(private readonly options: HotReloaderOptions) {}

  reload(record: ModuleRecord): ReloadReport {
    const { loader, log } = this.options;
    const report: ReloadReport = { module: record.id, reloaded: [], kept: [], failed: [] };

    this.options.clearModuleState?.(record.id);

    const previous = record.libraries;
    const next = new Map<string, LibraryEntry>();
    record.libraries = next;

    for (const [name, entry] of previous) {
      if (entry.reloadable) continue;
      next.set(name, entry);
      report.kept.push(name);
      log.write({ level: "warn", message: `${name} can't be reloaded for ${record.id}`, module: record.id });
    }

    for (const [name, entry] of previous) {
      if (!entry.reloadable) continue;
      try {
        loader.require(record, name);
        report.reloaded.push(name);
      } catch (e) {
        const { message, trace } = describeThrown(e);
        log.write({ level: "error", message: `Failed to reload ${name}: ${message}`, module: record.id, trace });
        next.set(name, entry);
        report.failed.push({ library: name, message });
      }
    }

    return report;
  }
}
