/**
 * Little-endian packed encodings used by the wire schema: float32 vectors,
 * float64 number arrays, int64 integer arrays, and 16-byte UUIDs.
 */

import { DecodeError } from "../errors";

function view(bytes: Uint8Array): DataView {
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

/** Packed arrays must hold a whole number of elements. */
function aligned(bytes: Uint8Array, size: number, kind: string): DataView {
  if (bytes.byteLength % size !== 0) {
    throw new DecodeError(`Packed ${kind} array of ${bytes.byteLength} bytes is not a multiple of ${size}`);
  }
  return view(bytes);
}

export function packFloat32(values: ArrayLike<number>): Uint8Array {
  const out = new Uint8Array(values.length * 4);
  const dv = view(out);
  for (let i = 0; i < values.length; i++) {
    dv.setFloat32(i * 4, values[i], true);
  }
  return out;
}

export function unpackFloat32(bytes: Uint8Array): number[] {
  const dv = aligned(bytes, 4, "float32");
  const out: number[] = [];
  for (let offset = 0; offset + 4 <= bytes.byteLength; offset += 4) {
    out.push(dv.getFloat32(offset, true));
  }
  return out;
}

export function packFloat64(values: ArrayLike<number>): Uint8Array {
  const out = new Uint8Array(values.length * 8);
  const dv = view(out);
  for (let i = 0; i < values.length; i++) {
    dv.setFloat64(i * 8, values[i], true);
  }
  return out;
}

export function unpackFloat64(bytes: Uint8Array): number[] {
  const dv = aligned(bytes, 8, "float64");
  const out: number[] = [];
  for (let offset = 0; offset + 8 <= bytes.byteLength; offset += 8) {
    out.push(dv.getFloat64(offset, true));
  }
  return out;
}

export function packInt64(values: ArrayLike<number>): Uint8Array {
  const out = new Uint8Array(values.length * 8);
  const dv = view(out);
  for (let i = 0; i < values.length; i++) {
    dv.setBigInt64(i * 8, BigInt(values[i]), true);
  }
  return out;
}

/** Values beyond `Number.MAX_SAFE_INTEGER` lose precision. */
export function unpackInt64(bytes: Uint8Array): number[] {
  const dv = aligned(bytes, 8, "int64");
  const out: number[] = [];
  for (let offset = 0; offset + 8 <= bytes.byteLength; offset += 8) {
    out.push(Number(dv.getBigInt64(offset, true)));
  }
  return out;
}

/** Format 16 raw bytes as a canonical 8-4-4-4-12 UUID string. */
export function uuidFromBytes(bytes: Uint8Array): string | undefined {
  if (bytes.byteLength !== 16) return undefined;
  const hex = Array.from(bytes, (b) => b.toString(16).padStart(2, "0")).join("");
  return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20)}`;
}
