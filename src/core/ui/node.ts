// src/core/ui/node.ts
// UI node tree built by scripts

import { unwrapLocked } from "../table/immutable";

export type NodeProperty =
  | { type: "string"; value: string }
  | { type: "float"; value: number }
  | { type: "bool"; value: boolean };

export const TEXT_NODE = "@text";

export class UINode {
  readonly children: UINode[] = [];
  readonly properties = new Map<string, NodeProperty>();
  private parentNode?: UINode;

  constructor(
    public readonly name: string,
    public readonly text?: string
  ) {}

  static text(value: string): UINode {
    return new UINode(TEXT_NODE, value);
  }

  get parent(): UINode | undefined {
    return this.parentNode;
  }

  get isText(): boolean {
    return this.name === TEXT_NODE;
  }

  /**
   * Set a typed property. Values that are not strings, numbers or booleans
   * are ignored; returns whether the property was set.
   */
  setProperty(key: string, value: unknown): boolean {
    switch (typeof value) {
      case "string":
        this.properties.set(key, { type: "string", value });
        return true;
      case "number":
        this.properties.set(key, { type: "float", value });
        return true;
      case "boolean":
        this.properties.set(key, { type: "bool", value });
        return true;
      default:
        return false;
    }
  }

  getProperty(key: string): string | number | boolean | undefined {
    return this.properties.get(key)?.value;
  }

  addChild(node: UINode): void {
    const child = unwrapLocked(node);
    child.parentNode?.removeChild(child);
    child.parentNode = this;
    this.children.push(child);
  }

  removeChild(node: UINode): boolean {
    const child = unwrapLocked(node);
    const i = this.children.indexOf(child);
    if (i < 0) return false;
    this.children.splice(i, 1);
    child.parentNode = undefined;
    return true;
  }

  /** Concatenated text of this node and its descendants */
  textContent(): string {
    if (this.isText) return this.text ?? "";
    return this.children.map((child) => child.textContent()).join("");
  }
}
