import type { UINode } from "../core/ui/node";

/**
 * Node factory used by the declarative builder.
 */
export interface NodeFactory {
  newNode(name: string): UINode;
  newTextNode(text: string): UINode;
}

/**
 * UI port interface (client side).
 */
export interface UiPort extends NodeFactory {
  root(): UINode;
  addNode(node: UINode): void;
  removeNode(node: UINode): void;
  /** Load a node tree from a module asset */
  loadNode(moduleId: string, path: string): UINode | undefined;
  emitEvent(event: string, args: unknown[]): void;
  emitAccept(node: UINode): void;
  emitCancel(node: UINode): void;
  showTooltip(key: string, node: UINode, x: number, y: number): void;
  hideTooltip(key: string): void;
  moveTooltip(key: string, x: number, y: number): void;
  openUrl(url: string): void;
}
