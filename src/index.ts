// src/index.ts
// modbox - Public API
//
// Sandbox for untrusted module scripts embedded in a game client or server.

// ═══════════════════════════════════════════════════════════════════════════════
// SANDBOX
// ═══════════════════════════════════════════════════════════════════════════════

export {
  ScriptSandbox,
  INIT_LIBRARY,
  type ScriptSandboxOptions,
  type SandboxExtensions,
} from "./sandbox";

// ═══════════════════════════════════════════════════════════════════════════════
// ERRORS
// ═══════════════════════════════════════════════════════════════════════════════

export {
  SandboxError,
  ImmutableWriteError,
  ScriptNotFoundError,
  CompileError,
  ExecutionError,
  MissingRequiredFieldError,
  InvalidArgumentError,
  LifecycleError,
  isSandboxError,
  describeThrown,
  type SandboxErrorCode,
} from "./core/errors";

// ═══════════════════════════════════════════════════════════════════════════════
// TABLES & SCOPES
// ═══════════════════════════════════════════════════════════════════════════════

export { lockTable, unwrapLocked, isLocked } from "./core/table/immutable";
export { Scope, Table, type LookupLayer } from "./core/scope/scope";
export { ScopeManager, type ScopeHook } from "./core/scope/manager";
export { CapabilityRegistry, defineBridge, bridgeNamespace, type HostFunction } from "./core/capabilities/registry";
export { installStdlib, type Side, type StdlibOptions } from "./core/capabilities/stdlib";
export { directionOffset, reverseDirection, isDirection, ALL_DIRECTIONS, type Direction } from "./core/capabilities/direction";

// ═══════════════════════════════════════════════════════════════════════════════
// MODULES
// ═══════════════════════════════════════════════════════════════════════════════

export { ModuleLoader, type ModuleLoaderOptions } from "./core/modules/loader";
export { LibraryEntry, NO_RELOAD, type ModuleRecord } from "./core/modules/library";
export { HotReloader, type ReloadReport, type ReloadFailure } from "./core/modules/reload";
export { ReloadWatcher } from "./core/modules/watcher";
export { normalizeLibraryName, libraryPath, isValidModuleId, type ScriptLayout } from "./core/modules/path";
export { ScriptEngine, type ScriptFunction } from "./core/vm/engine";

// ═══════════════════════════════════════════════════════════════════════════════
// FREE ROAM
// ═══════════════════════════════════════════════════════════════════════════════

export { FreeRoamScheduler, type FreeRoamContext } from "./core/concurrency/scheduler";
export { BehaviorHandle, type BehaviorStatus } from "./core/concurrency/behavior";
export { parseSuspension, suspensionKey, type Suspension } from "./core/concurrency/suspension";

// ═══════════════════════════════════════════════════════════════════════════════
// MISSIONS, UI, SERIALIZATION
// ═══════════════════════════════════════════════════════════════════════════════

export { MissionRegistry, missionKey, type Mission } from "./core/missions/registry";
export { UINode, TEXT_NODE, type NodeProperty } from "./core/ui/node";
export { builderEnvironment, defaultNodeFactory } from "./core/ui/builder";
export { EventCompiler } from "./core/ui/events";
export { bitSerializer, defineCodec, parseSchema } from "./core/serialize/codec";

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/config";

// ═══════════════════════════════════════════════════════════════════════════════
// PORTS & ADAPTERS
// ═══════════════════════════════════════════════════════════════════════════════

export type * from "./ports";
export { consoleSink, memorySink, teeSink, type MemorySink } from "./adapters/logging";
export { InMemoryScriptSource } from "./adapters/memorySource";
export { DirectoryScriptSource } from "./adapters/directorySource";
export { DetachedUi, type UiEventRecord, type TooltipState } from "./adapters/detachedUi";

// ═══════════════════════════════════════════════════════════════════════════════
// OUTCOMES
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./outcome";
