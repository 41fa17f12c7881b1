// src/core/extensions/client.ts
// Client-only module names: ui, audio and open_url

import type { AudioPort } from "../../ports/audio";
import type { UiPort } from "../../ports/ui";
import { bridgeNamespace, defineBridge } from "../capabilities/registry";
import { InvalidArgumentError } from "../errors";
import type { ScopeHook } from "../scope/manager";
import { unwrapLocked } from "../table/immutable";
import { build } from "../ui/builder";
import { UINode } from "../ui/node";

function expectNode(value: unknown, fn: string): UINode {
  const node = unwrapLocked(value);
  if (!(node instanceof UINode)) throw new InvalidArgumentError(`${fn}: expected a UI node`);
  return node;
}

function expectString(value: unknown, fn: string): string {
  if (typeof value !== "string") throw new InvalidArgumentError(`${fn}: expected a string`);
  return value;
}

function expectNumber(value: unknown, fn: string): number {
  if (typeof value !== "number") throw new InvalidArgumentError(`${fn}: expected a number`);
  return value;
}

export function uiNamespace(ui: UiPort, moduleId: string): Record<string, unknown> {
  return bridgeNamespace({
    root: () => ui.root(),
    add_node: (node: unknown) => ui.addNode(expectNode(node, "ui.add_node")),
    remove_node: (node: unknown) => ui.removeNode(expectNode(node, "ui.remove_node")),
    load_node: (path: unknown) => ui.loadNode(moduleId, expectString(path, "ui.load_node")),
    new_node: (name: unknown) => ui.newNode(expectString(name, "ui.new_node")),
    new_text_node: (text: unknown) => ui.newTextNode(expectString(text, "ui.new_text_node")),
    emit_event: (event: unknown, ...args: unknown[]) =>
      ui.emitEvent(expectString(event, "ui.emit_event"), args.map((arg) => unwrapLocked(arg))),
    emit_accept: (node: unknown) => ui.emitAccept(expectNode(node, "ui.emit_accept")),
    emit_cancel: (node: unknown) => ui.emitCancel(expectNode(node, "ui.emit_cancel")),
    show_tooltip: (key: unknown, node: unknown, x: unknown, y: unknown) =>
      ui.showTooltip(
        expectString(key, "ui.show_tooltip"),
        expectNode(node, "ui.show_tooltip"),
        expectNumber(x, "ui.show_tooltip"),
        expectNumber(y, "ui.show_tooltip")
      ),
    hide_tooltip: (key: unknown) => ui.hideTooltip(expectString(key, "ui.hide_tooltip")),
    move_tooltip: (key: unknown, x: unknown, y: unknown) =>
      ui.moveTooltip(expectString(key, "ui.move_tooltip"), expectNumber(x, "ui.move_tooltip"), expectNumber(y, "ui.move_tooltip")),
    builder: (body: unknown) => build(body, ui),
  });
}

export function audioNamespace(audio: AudioPort, moduleId: string): Record<string, unknown> {
  return bridgeNamespace({
    play_sound: (sound: unknown) => audio.playSound(moduleId, expectString(sound, "audio.play_sound")),
    play_sound_at: (sound: unknown, x: unknown, y: unknown) =>
      audio.playSoundAt(
        moduleId,
        expectString(sound, "audio.play_sound_at"),
        expectNumber(x, "audio.play_sound_at"),
        expectNumber(y, "audio.play_sound_at")
      ),
  });
}

export function clientHook(ui: UiPort, audio?: AudioPort): ScopeHook {
  return (record) => {
    const { scope, id } = record;
    scope.define("ui", uiNamespace(ui, id));
    if (audio) scope.define("audio", audioNamespace(audio, id));
    scope.define(
      "open_url",
      defineBridge((url) => ui.openUrl(expectString(url, "open_url")))
    );
  };
}
