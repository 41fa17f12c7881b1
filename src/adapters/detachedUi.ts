import type { UiPort } from "../ports/ui";
import { UINode } from "../core/ui/node";

export type UiEventRecord = { event: string; args: unknown[] };

export type TooltipState = { node: UINode; x: number; y: number };

/**
 * UI port with no renderer behind it. Keeps the node tree and records what
 * scripts asked for; hosts running headless (and tests) use it as-is.
 */
export class DetachedUi implements UiPort {
  private readonly rootNode = new UINode("root");
  private readonly layouts = new Map<string, () => UINode>();

  readonly events: UiEventRecord[] = [];
  readonly accepted: UINode[] = [];
  readonly cancelled: UINode[] = [];
  readonly tooltips = new Map<string, TooltipState>();
  readonly openedUrls: string[] = [];

  /** Register a node tree that `loadNode(moduleId, path)` will produce */
  defineLayout(moduleId: string, path: string, make: () => UINode): this {
    this.layouts.set(`${moduleId}:${path}`, make);
    return this;
  }

  newNode(name: string): UINode {
    return new UINode(name);
  }

  newTextNode(text: string): UINode {
    return UINode.text(text);
  }

  root(): UINode {
    return this.rootNode;
  }

  addNode(node: UINode): void {
    this.rootNode.addChild(node);
  }

  removeNode(node: UINode): void {
    node.parent?.removeChild(node);
  }

  loadNode(moduleId: string, path: string): UINode | undefined {
    return this.layouts.get(`${moduleId}:${path}`)?.();
  }

  emitEvent(event: string, args: unknown[]): void {
    this.events.push({ event, args });
  }

  emitAccept(node: UINode): void {
    this.accepted.push(node);
  }

  emitCancel(node: UINode): void {
    this.cancelled.push(node);
  }

  showTooltip(key: string, node: UINode, x: number, y: number): void {
    this.tooltips.set(key, { node, x, y });
  }

  hideTooltip(key: string): void {
    this.tooltips.delete(key);
  }

  moveTooltip(key: string, x: number, y: number): void {
    const tooltip = this.tooltips.get(key);
    if (tooltip) this.tooltips.set(key, { ...tooltip, x, y });
  }

  openUrl(url: string): void {
    this.openedUrls.push(url);
  }
}
