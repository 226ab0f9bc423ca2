// Snapshot codecs - turn snapshot objects into text and back.
//
// jsonCodec writes plain JSON. superjsonCodec keeps Date, Map and Set values
// inside field data intact across a round trip.

import superjson from 'superjson';

export type CodecName = 'json' | 'superjson';

export type SnapshotCodec = {
  readonly name: CodecName;
  encode(value: unknown): string;
  decode(text: string): unknown;
};

export const jsonCodec: SnapshotCodec = {
  name: 'json',
  encode: (value) => JSON.stringify(value, null, 2),
  decode: (text): unknown => JSON.parse(text),
};

export const superjsonCodec: SnapshotCodec = {
  name: 'superjson',
  encode: (value) => superjson.stringify(value),
  decode: (text) => superjson.parse<unknown>(text),
};

const CODECS: Record<CodecName, SnapshotCodec> = {
  json: jsonCodec,
  superjson: superjsonCodec,
};

/**
 * Look up a codec by name.
 */
export function getCodec(name: CodecName): SnapshotCodec {
  return CODECS[name];
}
