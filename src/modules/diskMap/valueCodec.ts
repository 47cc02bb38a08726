import { Encoder } from 'cbor-x';

/**
 * Binary serialization of entry values. Both directions may throw; DiskMap
 * turns those throws into typed failures.
 */
export interface ValueCodec<V> {
  encode(value: V): Uint8Array;
  decode(bytes: Uint8Array): V;
}

/**
 * CBOR codec backed by cbor-x. Records are disabled so files hold plain,
 * self-describing CBOR readable by any decoder. CBOR maps decode as plain
 * objects, so a stored `Map` comes back as an object keyed by its entries' keys.
 */
export function cborValues<V>(): ValueCodec<V> {
  const encoder = new Encoder({ useRecords: false, mapsAsObjects: true });
  return {
    encode: (value) => encoder.encode(value),
    decode(bytes) {
      if (bytes.length === 0) throw new Error('entry file is empty');
      return encoder.decode(bytes);
    },
  };
}
