export interface Codec {
  encode(value: unknown): Uint8Array;
  decode(bytes: Uint8Array): Record<string, unknown>;
}

/**
 * Serializer port interface.
 * Compiles a schema into an encode/decode pair; scripts only ever see the
 * two resulting calls.
 */
export interface SerializerPort {
  define(schema: unknown): Codec;
}
