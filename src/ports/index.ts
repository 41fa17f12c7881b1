export type { ScriptSource } from "./source";
export type { LogLevel, LogRecord, LogSink } from "./sink";
export type { ClockPort } from "./clock";
export type { LevelPort, TileInfo } from "./level";
export type { NodeFactory, UiPort } from "./ui";
export type { AudioPort } from "./audio";
export type { ControlPort } from "./control";
export type { Codec, SerializerPort } from "./serializer";
export type { PortSet } from "./composite";
