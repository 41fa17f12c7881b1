import type { AudioPort } from "./audio";
import type { ClockPort } from "./clock";
import type { ControlPort } from "./control";
import type { LevelPort } from "./level";
import type { SerializerPort } from "./serializer";
import type { LogSink } from "./sink";
import type { ScriptSource } from "./source";
import type { UiPort } from "./ui";

/**
 * Every collaborator the sandbox talks to. Only the script source is
 * mandatory; the domain bridges are installed when present.
 */
export interface PortSet {
  source: ScriptSource;
  log: LogSink;
  serializer: SerializerPort;
  clock?: ClockPort;
  level?: LevelPort;
  ui?: UiPort;
  audio?: AudioPort;
  control?: ControlPort;
}
