// src/core/table/immutable.ts
// Write-protected tables: read-through, write-reject, no reachable prototype

import { ImmutableWriteError } from "../errors";

const lockedToTarget = new WeakMap<object, object>();
const targetToLocked = new WeakMap<object, object>();

// Keys that would hand out the wrapped value's constructor, prototype or
// caller, or let a script re-point an accessor at a host object.
const HIDDEN_KEYS = new Set<PropertyKey>([
  "constructor",
  "__proto__",
  "__lookupGetter__",
  "__lookupSetter__",
  "__defineGetter__",
  "__defineSetter__",
  "caller",
  "callee",
]);

function isLockable(value: unknown): value is object {
  return (typeof value === "object" && value !== null) || typeof value === "function";
}

function constructorOf(value: object): unknown {
  const proto = Reflect.getPrototypeOf(value);
  return proto === null ? undefined : Reflect.get(proto, "constructor");
}

// Host intrinsics that evaluate code or reach the process. They read as
// undefined through a lock instead of being wrapped.
const SEALED_INTRINSICS = new WeakSet<object>(
  [
    Function,
    Object,
    Reflect,
    Proxy,
    eval,
    globalThis,
    process,
    constructorOf(function* () {}),
    constructorOf(async function () {}),
    constructorOf(async function* () {}),
  ].filter(isLockable)
);

/**
 * Throw an ImmutableWriteError into script code. Errors handed to scripts are
 * locked like any other host object.
 */
export function rejectWrite(key: PropertyKey): never {
  throw lockTable(new ImmutableWriteError(String(key)));
}

function isPlainTable(value: object): boolean {
  if (Array.isArray(value)) return true;
  const proto: unknown = Reflect.getPrototypeOf(value);
  // Tables made in another realm carry that realm's Object.prototype.
  return proto === null || (typeof proto === "object" && Reflect.getPrototypeOf(proto) === null);
}

/**
 * Arrays and plain tables keep the locked receiver, so methods called on them
 * go through the traps. Other host objects (generators, byte arrays, UI nodes)
 * need their real receiver for internal state. Functions never do, so a
 * locked function is never handed out unwrapped.
 */
function methodReceiver(thisArg: unknown): unknown {
  const target = unwrapLocked(thisArg);
  return typeof target === "object" && target !== null && !isPlainTable(target) ? target : thisArg;
}

/**
 * The proxy never targets the real value: an empty, extensible stand-in of
 * the same kind keeps `typeof` and `Array.isArray` right while leaving the
 * traps free to lock every value they report.
 */
function shadowOf(value: object): object {
  if (typeof value === "function") return () => undefined;
  if (Array.isArray(value)) return [];
  const shadow: object = Object.create(null);
  return shadow;
}

function lockHandler(value: object): ProxyHandler<object> {
  return {
    get(_shadow, key) {
      if (HIDDEN_KEYS.has(key)) return undefined;
      return lockTable(Reflect.get(value, key));
    },

    has(_shadow, key) {
      return !HIDDEN_KEYS.has(key) && Reflect.has(value, key);
    },

    ownKeys() {
      return Reflect.ownKeys(value).filter((key) => !HIDDEN_KEYS.has(key));
    },

    getOwnPropertyDescriptor(shadow, key) {
      if (HIDDEN_KEYS.has(key)) return undefined;
      const desc = Reflect.getOwnPropertyDescriptor(value, key);
      if (!desc) return undefined;
      // Only an array's `length` is fixed on the stand-in; it must stay
      // non-configurable and writable there.
      const fixed = Reflect.getOwnPropertyDescriptor(shadow, key)?.configurable === false;
      const enumerable = desc.enumerable ?? false;
      if ("value" in desc) {
        return { value: lockTable(desc.value), writable: fixed, enumerable, configurable: !fixed };
      }
      return { get: lockTable(desc.get), set: lockTable(desc.set), enumerable, configurable: true };
    },

    getPrototypeOf() {
      return null;
    },

    set(_shadow, key) {
      return rejectWrite(key);
    },

    defineProperty(_shadow, key) {
      return rejectWrite(key);
    },

    deleteProperty(_shadow, key) {
      return rejectWrite(key);
    },

    setPrototypeOf() {
      return rejectWrite("[[Prototype]]");
    },

    preventExtensions() {
      return rejectWrite("[[Extensible]]");
    },

    apply(_shadow, thisArg, args) {
      if (typeof value !== "function") throw new TypeError("locked value is not callable");
      try {
        return lockTable(Reflect.apply(value, methodReceiver(thisArg), args));
      } catch (e) {
        throw lockTable(e);
      }
    },
  };
}

/**
 * Wrap a table (object, array or function) so scripts can read it but never
 * change it. Primitives pass through unchanged; wrapping is idempotent and the
 * same target always yields the same wrapper. Locked functions can be called
 * but not constructed. Host intrinsics such as `Function` and `process` come
 * back as undefined.
 */
export function lockTable<T>(value: T): T;
export function lockTable(value: unknown): unknown {
  if (!isLockable(value) || lockedToTarget.has(value)) return value;
  if (SEALED_INTRINSICS.has(value)) return undefined;

  const existing = targetToLocked.get(value);
  if (existing) return existing;

  const locked = new Proxy(shadowOf(value), lockHandler(value));
  lockedToTarget.set(locked, value);
  targetToLocked.set(value, locked);
  return locked;
}

export function isLocked(value: unknown): boolean {
  return isLockable(value) && lockedToTarget.has(value);
}

/**
 * Host-side escape hatch: returns the table a lock wraps. Never exposed to
 * scripts.
 */
export function unwrapLocked<T>(value: T): T;
export function unwrapLocked(value: unknown): unknown {
  if (!isLockable(value)) return value;
  return lockedToTarget.get(value) ?? value;
}
