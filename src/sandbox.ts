// src/sandbox.ts
// ScriptSandbox - host facade over the module sandbox
//
// Usage:
//   const sandbox = new ScriptSandbox({ source: new DirectoryScriptSource("modules") });
//   sandbox.setup();
//   sandbox.loadModule("base");
//   sandbox.invokeModuleMethod("base", "rooms.office", "on_enter", entity);

import type { AudioPort } from "./ports/audio";
import type { ClockPort } from "./ports/clock";
import type { ControlPort } from "./ports/control";
import type { LevelPort } from "./ports/level";
import type { PortSet } from "./ports/composite";
import type { SerializerPort } from "./ports/serializer";
import type { LogSink } from "./ports/sink";
import type { ScriptSource } from "./ports/source";
import type { UiPort } from "./ports/ui";

import { consoleSink } from "./adapters/logging";
import { DetachedUi } from "./adapters/detachedUi";
import { DirectoryScriptSource } from "./adapters/directorySource";
import { CapabilityRegistry } from "./core/capabilities/registry";
import { installStdlib } from "./core/capabilities/stdlib";
import { loadConfig, validateConfig, type SandboxConfig, type SandboxConfigInput } from "./core/config";
import type { BehaviorHandle } from "./core/concurrency/behavior";
import { FreeRoamScheduler, type FreeRoamContext } from "./core/concurrency/scheduler";
import { InvalidArgumentError, LifecycleError } from "./core/errors";
import { baseHook } from "./core/extensions/base";
import { clientHook } from "./core/extensions/client";
import { serverHook } from "./core/extensions/server";
import { MissionRegistry } from "./core/missions/registry";
import type { ModuleRecord } from "./core/modules/library";
import { ModuleLoader } from "./core/modules/loader";
import { HotReloader, type ReloadReport } from "./core/modules/reload";
import { ReloadWatcher } from "./core/modules/watcher";
import { ScopeManager, type ScopeHook } from "./core/scope/manager";
import type { Scope } from "./core/scope/scope";
import { bitSerializer } from "./core/serialize/codec";
import { lockTable, unwrapLocked } from "./core/table/immutable";
import { EventCompiler } from "./core/ui/events";
import { ScriptEngine, runGuarded, type ScriptFunction } from "./core/vm/engine";
import { done, fail, toFailure, type Outcome } from "./outcome";

/**
 * Host-specific additions to the script surface.
 */
export type SandboxExtensions = {
  /** Extra registry entries, installed by setup before the registry freezes */
  boot?: (registry: CapabilityRegistry) => void;
  /** Run for every module after the built-in base hook */
  base?: ScopeHook[];
  /** Run for every module after the built-in side hook */
  side?: ScopeHook[];
};

export type ScriptSandboxOptions = {
  /** Overrides applied over the config file and MODBOX_* variables */
  config?: SandboxConfigInput;
  /** Config file to read instead of looking for modbox.config.* in the cwd */
  configFile?: string;
  /** Environment read for MODBOX_* variables (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Where module scripts come from (default: scripts.root on disk) */
  source?: ScriptSource;
  /** Log target (default: console) */
  log?: LogSink;
  serializer?: SerializerPort;
  clock?: ClockPort;
  level?: LevelPort;
  /** Client side only (default: a DetachedUi) */
  ui?: UiPort;
  audio?: AudioPort;
  /** Server side only */
  control?: ControlPort;
  /** Called with the module id at the start of every reload */
  clearModuleState?: (moduleId: string) => void;
  extensions?: SandboxExtensions;
};

/** Library every module is entered through */
export const INIT_LIBRARY = "init";

/**
 * ScriptSandbox - owns the registry, the module scopes and everything that
 * runs script code against them.
 */
export class ScriptSandbox {
  readonly config: SandboxConfig;
  readonly registry = new CapabilityRegistry();
  readonly missions = new MissionRegistry();
  readonly ports: PortSet;

  private readonly extensions: SandboxExtensions;
  private readonly engine: ScriptEngine;
  private readonly loader: ModuleLoader;
  private readonly scopes: ScopeManager;
  private readonly reloader: HotReloader;
  private readonly scheduler: FreeRoamScheduler;
  private readonly events: EventCompiler;
  private readonly watcher?: ReloadWatcher;
  private ready = false;

  constructor(options: ScriptSandboxOptions = {}) {
    this.config = loadConfig({ configFile: options.configFile, env: options.env, overrides: options.config });
    const validation = validateConfig(this.config);
    if (!validation.valid) {
      throw new InvalidArgumentError(`Invalid sandbox configuration: ${validation.errors.join("; ")}`);
    }

    const side = this.config.side;
    this.ports = {
      source: options.source ?? new DirectoryScriptSource(this.config.scripts.root),
      log: options.log ?? consoleSink(),
      serializer: options.serializer ?? bitSerializer,
      clock: options.clock,
      level: options.level,
      ui: side === "client" ? (options.ui ?? new DetachedUi()) : undefined,
      audio: side === "client" ? options.audio : undefined,
      control: side === "server" ? options.control : undefined,
    };
    this.extensions = options.extensions ?? {};

    const { source, log } = this.ports;
    if (this.config.reload.enabled && source.modifiedTime) {
      this.watcher = new ReloadWatcher(source, this.config.reload.pollTicks, (id) => {
        this.reloadModule(id);
      });
    }

    this.engine = new ScriptEngine(this.config.vm.contextName);
    this.loader = new ModuleLoader({
      engine: this.engine,
      source,
      layout: this.config.scripts,
      resolveModule: (id) => this.scopes.getScope(id),
      onScriptFetched: (id, path) => this.watcher?.track(id, path),
    });
    this.scopes = new ScopeManager({
      registry: this.registry,
      log,
      require: (record, ref) => this.loader.require(record, ref),
      hooks: this.scopeHooks(),
    });
    this.reloader = new HotReloader({ loader: this.loader, log, clearModuleState: options.clearModuleState });
    this.scheduler = new FreeRoamScheduler((id, library) => this.loader.require(this.scopes.getScope(id), library));
    this.events = new EventCompiler(this.engine);
  }

  private scopeHooks(): ScopeHook[] {
    const { ui, audio, control, level, log } = this.ports;
    const hooks: ScopeHook[] = [baseHook(this.missions, log), ...(this.extensions.base ?? [])];
    if (ui) hooks.push(clientHook(ui, audio));
    if (control) hooks.push(serverHook(control, level));
    hooks.push(...(this.extensions.side ?? []));
    return hooks;
  }

  // ─────────────────────────────────────────────────────────────────
  // Lifecycle
  // ─────────────────────────────────────────────────────────────────

  /**
   * Install the standard surface and freeze the registry. Exactly once,
   * before any module is loaded.
   */
  setup(): void {
    if (this.ready) throw new LifecycleError("setup has already been called");
    installStdlib(this.registry, {
      side: this.config.side,
      serializer: this.ports.serializer,
      clock: this.ports.clock,
      level: this.ports.level,
    });
    this.extensions.boot?.(this.registry);
    this.registry.freeze();
    this.ready = true;
  }

  get isReady(): boolean {
    return this.ready;
  }

  private assertReady(): void {
    if (!this.ready) throw new LifecycleError("setup must be called before modules are loaded");
  }

  // ─────────────────────────────────────────────────────────────────
  // Modules
  // ─────────────────────────────────────────────────────────────────

  /**
   * Load a module by running its init library. Failures are logged and
   * reported as `false`.
   */
  loadModule(moduleId: string): boolean {
    return this.tryLoadModule(moduleId).tag === "Done";
  }

  tryLoadModule(moduleId: string): Outcome<Scope> {
    this.assertReady();
    const { log } = this.ports;
    try {
      const scope = this.loader.require(this.scopes.getScope(moduleId), INIT_LIBRARY);
      log.write({ level: "info", message: `Loaded module: ${moduleId}`, module: moduleId });
      return done(scope, { module: moduleId });
    } catch (e) {
      const failure = toFailure(e);
      log.write({
        level: "error",
        message: `Error loading module: ${moduleId}: ${failure.message}`,
        module: moduleId,
        trace: failure.trace,
      });
      return fail(failure, { module: moduleId });
    }
  }

  /**
   * Re-execute every reloadable library of a loaded module.
   */
  reloadModule(moduleId: string): ReloadReport {
    const record = this.scopes.peek(moduleId);
    if (!record) throw new InvalidArgumentError(`Module not loaded: ${moduleId}`);
    const report = this.reloader.reload(record);
    this.ports.log.write({
      level: report.failed.length === 0 ? "info" : "warn",
      message: `Reloaded module: ${moduleId} (${report.reloaded.length} reloaded, ${report.kept.length} kept, ${report.failed.length} failed)`,
      module: moduleId,
    });
    return report;
  }

  getScope(moduleId: string): ModuleRecord {
    this.assertReady();
    return this.scopes.getScope(moduleId);
  }

  loadedModules(): string[] {
    return this.scopes.modules();
  }

  /**
   * Resolve a library the way a script in `moduleId` would.
   */
  require(moduleId: string, ref: string): Scope {
    return this.loader.require(this.getScope(moduleId), ref);
  }

  /**
   * Advance the reload watcher by one host tick. Returns the modules that
   * were reloaded.
   */
  tick(): string[] {
    return this.watcher?.tick() ?? [];
  }

  // ─────────────────────────────────────────────────────────────────
  // Calls into scripts
  // ─────────────────────────────────────────────────────────────────

  /**
   * Call `library[method](...args)` in a module. Arguments are locked on the
   * way in and the result is unwrapped on the way out.
   */
  invokeModuleMethod(moduleId: string, library: string, method: string, ...args: unknown[]): unknown {
    const scope = this.require(moduleId, library);
    const fn = scope.lookup(method);
    if (typeof fn !== "function") {
      throw new InvalidArgumentError(`${moduleId}:${library} has no method '${method}'`);
    }
    const receiver = scope.view();
    const result = runGuarded(`${moduleId}:${library}#${method}`, () =>
      Reflect.apply(fn, receiver, args.map((arg) => lockTable(arg)))
    );
    return unwrapLocked(result);
  }

  invokeFreeRoam(
    moduleId: string,
    library: string,
    method: string,
    handle: BehaviorHandle | undefined,
    context: FreeRoamContext = {}
  ): BehaviorHandle {
    this.assertReady();
    return this.scheduler.invoke(moduleId, library, method, handle, context);
  }

  compileUiAction(moduleId: string, library: string, snippet: string): ScriptFunction {
    return this.events.compile(this.require(moduleId, library), snippet);
  }

  dispatchUiEvent(moduleId: string, library: string, snippet: string, node: unknown, event: unknown): unknown {
    return unwrapLocked(this.events.dispatch(this.require(moduleId, library), snippet, node, event));
  }
}
