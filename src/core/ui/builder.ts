// src/core/ui/builder.ts
// Declarative node-tree builder: any identifier is a node constructor

import type { NodeFactory } from "../../ports/ui";
import { InvalidArgumentError } from "../errors";
import { lockTable, unwrapLocked } from "../table/immutable";
import { UINode } from "./node";

export type NodeConstructor = (...args: unknown[]) => UINode;

function isPlainTable(value: unknown): value is object {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  // Tables made in the script realm carry that realm's Object.prototype.
  return proto === null || Object.getPrototypeOf(proto) === null;
}

function applyArgument(node: UINode, arg: unknown, factory: NodeFactory): void {
  const value = unwrapLocked(arg);
  if (typeof value === "string") {
    node.addChild(factory.newTextNode(value));
  } else if (value instanceof UINode) {
    node.addChild(value);
  } else if (Array.isArray(value)) {
    for (const item of value) applyArgument(node, item, factory);
  } else if (isPlainTable(value)) {
    for (const key of Object.keys(value)) node.setProperty(key, Reflect.get(value, key));
  } else {
    throw new InvalidArgumentError(`Invalid UI builder argument: ${value === null ? "null" : typeof value}`);
  }
}

export function nodeConstructor(name: string, factory: NodeFactory): NodeConstructor {
  return (...args: unknown[]) => {
    const node = factory.newNode(name);
    for (const arg of args) applyArgument(node, arg, factory);
    return lockTable(node);
  };
}

/**
 * Environment in which every string key yields a constructor for the node of
 * that name. A new one is made for every builder call.
 */
export function builderEnvironment(factory: NodeFactory): Record<string, NodeConstructor> {
  const target: Record<string, NodeConstructor> = Object.create(null);
  return new Proxy(target, {
    has(_target, key) {
      return typeof key === "string";
    },
    get(_target, key) {
      return typeof key === "string" ? nodeConstructor(key, factory) : undefined;
    },
    set() {
      return false;
    },
  });
}

/**
 * Run `body` with a fresh builder environment and return what it returns.
 */
export function build(body: unknown, factory: NodeFactory): unknown {
  if (typeof body !== "function") throw new InvalidArgumentError("ui.builder expects a function");
  return Reflect.apply(body, undefined, [lockTable(builderEnvironment(factory))]);
}

export const defaultNodeFactory: NodeFactory = {
  newNode: (name) => new UINode(name),
  newTextNode: (text) => UINode.text(text),
};
