// src/core/serialize/codec.ts
// Default serializer: schema-driven, bit-packed records

import type { Codec, SerializerPort } from "../../ports/serializer";
import { InvalidArgumentError, MissingRequiredFieldError } from "../errors";
import { unwrapLocked } from "../table/immutable";
import { BitReader, BitWriter } from "./bits";

export type FieldType =
  | { tag: "string" }
  | { tag: "bool" }
  | { tag: "f32" }
  | { tag: "f64" }
  | { tag: "int"; signed: boolean; width: number };

export type SchemaField = { name: string; type: FieldType };

const MAX_STRING_BYTES = 0xffff;

export function parseFieldType(name: string): FieldType {
  switch (name) {
    case "string":
    case "bool":
    case "f32":
    case "f64":
      return { tag: name };
  }
  const match = /^([iu])(\d+)$/.exec(name);
  const width = match ? Number(match[2]) : 0;
  if (!match || width < 1 || width > 32) {
    throw new InvalidArgumentError(`serialize: unknown field type '${name}'`);
  }
  return { tag: "int", signed: match[1] === "i", width };
}

/**
 * Parse `[[name, type], ...]`.
 */
export function parseSchema(schema: unknown): SchemaField[] {
  const raw = unwrapLocked(schema);
  if (!Array.isArray(raw)) throw new InvalidArgumentError("serialize: schema must be a list of [name, type] pairs");
  return raw.map((entry: unknown) => {
    const pair = unwrapLocked(entry);
    if (!Array.isArray(pair) || pair.length !== 2 || typeof pair[0] !== "string" || typeof pair[1] !== "string") {
      throw new InvalidArgumentError("serialize: schema entries must be [name, type] pairs");
    }
    return { name: pair[0], type: parseFieldType(pair[1]) };
  });
}

function intRange(type: { signed: boolean; width: number }): [number, number] {
  return type.signed ? [-(2 ** (type.width - 1)), 2 ** (type.width - 1) - 1] : [0, 2 ** type.width - 1];
}

function writeField(out: BitWriter, field: SchemaField, value: unknown): void {
  const { type } = field;
  const mismatch = () => new InvalidArgumentError(`serialize: field '${field.name}' is not a valid ${type.tag}`);

  switch (type.tag) {
    case "bool":
      if (typeof value !== "boolean") throw mismatch();
      out.writeBit(value);
      return;
    case "string": {
      if (typeof value !== "string") throw mismatch();
      const bytes = new TextEncoder().encode(value);
      if (bytes.length > MAX_STRING_BYTES) throw mismatch();
      out.writeUnsigned(bytes.length, 16);
      out.writeBytes(bytes);
      return;
    }
    case "f32":
    case "f64": {
      if (typeof value !== "number") throw mismatch();
      const size = type.tag === "f32" ? 4 : 8;
      const view = new DataView(new ArrayBuffer(size));
      if (size === 4) view.setFloat32(0, value);
      else view.setFloat64(0, value);
      out.writeBytes(new Uint8Array(view.buffer));
      return;
    }
    case "int": {
      const [min, max] = intRange(type);
      if (typeof value !== "number" || !Number.isInteger(value) || value < min || value > max) throw mismatch();
      out.writeUnsigned(value < 0 ? value + 2 ** type.width : value, type.width);
      return;
    }
  }
}

function readField(input: BitReader, type: FieldType): unknown {
  switch (type.tag) {
    case "bool":
      return input.readBit();
    case "string":
      return new TextDecoder().decode(input.readBytes(input.readUnsigned(16)));
    case "f32":
      return new DataView(input.readBytes(4).buffer).getFloat32(0);
    case "f64":
      return new DataView(input.readBytes(8).buffer).getFloat64(0);
    case "int": {
      const raw = input.readUnsigned(type.width);
      return type.signed && raw >= 2 ** (type.width - 1) ? raw - 2 ** type.width : raw;
    }
  }
}

export function defineCodec(schema: unknown): Codec {
  const fields = parseSchema(schema);
  return {
    encode(value: unknown): Uint8Array {
      const record = unwrapLocked(value);
      if (typeof record !== "object" || record === null) {
        throw new InvalidArgumentError("serialize: encode expects a table");
      }
      const out = new BitWriter();
      for (const field of fields) {
        const fieldValue: unknown = Reflect.get(record, field.name);
        if (fieldValue === undefined) throw new MissingRequiredFieldError(field.name, "serialize");
        writeField(out, field, fieldValue);
      }
      return out.finish();
    },
    decode(bytes: Uint8Array): Record<string, unknown> {
      const input = new BitReader(bytes);
      const result: Record<string, unknown> = {};
      for (const field of fields) result[field.name] = readField(input, field.type);
      return result;
    },
  };
}

export const bitSerializer: SerializerPort = {
  define: defineCodec,
};
