/**
 * Content-octet decoders for the elementary ASN.1 types used by X.509.
 * All functions take content octets only (no identifier or length).
 */
import { X509Error, X509ErrorCode } from "./errors.js";
import type { BitString } from "./types.js";

/** View an input as bytes without copying. */
export function toBytes(input: ArrayBuffer | Uint8Array): Uint8Array {
  return input instanceof Uint8Array ? input : new Uint8Array(input);
}

export function toHex(input: ArrayBuffer | Uint8Array): string {
  return Array.from(toBytes(input))
    .map((b) => b.toString(16).padStart(2, "0"))
    .join("");
}

export function toHexUpper(input: ArrayBuffer | Uint8Array): string {
  return toHex(input).toUpperCase();
}

/** Lower-case hex pairs joined by ':' (e.g. "12:34:ab"). */
export function toColonHex(input: ArrayBuffer | Uint8Array): string {
  return Array.from(toBytes(input))
    .map((b) => b.toString(16).padStart(2, "0"))
    .join(":");
}

export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.byteLength !== b.byteLength) return false;
  for (let i = 0; i < a.byteLength; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

export function decodeUtf8(bytes: Uint8Array): string {
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
  } catch (err) {
    throw new X509Error(X509ErrorCode.InvalidValue, "Invalid UTF-8 string", {
      cause: err,
    });
  }
}

function decodeRestricted(
  bytes: Uint8Array,
  allowed: (b: number) => boolean,
  typeName: string,
): string {
  let s = "";
  for (let i = 0; i < bytes.length; i++) {
    const b = bytes[i];
    if (!allowed(b)) {
      throw new X509Error(
        X509ErrorCode.InvalidValue,
        `Invalid character 0x${b.toString(16).padStart(2, "0")} in ${typeName} at index ${i}`,
      );
    }
    s += String.fromCharCode(b);
  }
  return s;
}

export function decodeAscii(bytes: Uint8Array): string {
  return decodeRestricted(bytes, (b) => b < 0x80, "IA5String");
}

const PRINTABLE_EXTRA = new Set(
  Array.from(" '()+,-./:=?", (c) => c.charCodeAt(0)),
);

export function decodePrintable(bytes: Uint8Array): string {
  return decodeRestricted(
    bytes,
    (b) =>
      (b >= 0x30 && b <= 0x39) ||
      (b >= 0x41 && b <= 0x5a) ||
      (b >= 0x61 && b <= 0x7a) ||
      PRINTABLE_EXTRA.has(b),
    "PrintableString",
  );
}

export function decodeNumeric(bytes: Uint8Array): string {
  return decodeRestricted(
    bytes,
    (b) => b === 0x20 || (b >= 0x30 && b <= 0x39),
    "NumericString",
  );
}

/** BMPString (UCS-2 big-endian). */
export function decodeBmpString(bytes: Uint8Array): string {
  if (bytes.length % 2 !== 0) {
    throw new X509Error(
      X509ErrorCode.InvalidValue,
      `BMPString has odd length ${bytes.length}`,
    );
  }
  let s = "";
  for (let i = 0; i < bytes.length; i += 2) {
    s += String.fromCharCode((bytes[i] << 8) | bytes[i + 1]);
  }
  return s;
}

/**
 * Decode INTEGER content octets as an unsigned big-endian magnitude.
 * The sign bit is not interpreted (serial numbers are treated as unsigned).
 */
export function decodeUnsignedBigInt(bytes: Uint8Array): bigint {
  if (bytes.length === 0) {
    throw new X509Error(X509ErrorCode.InvalidValue, "Empty INTEGER encoding");
  }
  let n = 0n;
  for (const b of bytes) n = (n << 8n) | BigInt(b);
  return n;
}

/** Decode a non-negative INTEGER that must fit in 32 bits. */
export function decodeSmallUint(bytes: Uint8Array): number {
  if (bytes.length === 0) {
    throw new X509Error(X509ErrorCode.InvalidValue, "Empty INTEGER encoding");
  }
  if (bytes[0] & 0x80) {
    throw new X509Error(X509ErrorCode.InvalidValue, "Negative INTEGER");
  }
  let i = 0;
  while (i < bytes.length - 1 && bytes[i] === 0x00) i++;
  if (bytes.length - i > 4) {
    throw new X509Error(
      X509ErrorCode.InvalidValue,
      `INTEGER too large (${bytes.length} bytes)`,
    );
  }
  let n = 0;
  for (; i < bytes.length; i++) n = n * 256 + bytes[i];
  return n;
}

export function decodeBoolean(bytes: Uint8Array): boolean {
  if (bytes.length !== 1) {
    throw new X509Error(
      X509ErrorCode.InvalidValue,
      `BOOLEAN must be one byte; got ${bytes.length}`,
    );
  }
  return bytes[0] !== 0x00;
}

export function decodeNull(bytes: Uint8Array): null {
  if (bytes.length !== 0) {
    throw new X509Error(X509ErrorCode.InvalidValue, "NULL with content");
  }
  return null;
}

/** Sub-identifiers are accumulated as bigint so that 128-bit arcs (2.25.x) survive. */
export function decodeOID(bytes: Uint8Array): string {
  if (bytes.length === 0) {
    throw new X509Error(X509ErrorCode.InvalidValue, "Empty OID encoding (0 bytes)");
  }
  const subIds: bigint[] = [];
  let i = 0;
  while (i < bytes.length) {
    if (bytes[i] === 0x80) {
      throw new X509Error(
        X509ErrorCode.InvalidValue,
        `Non-minimal OID sub-identifier at byte index ${i}`,
      );
    }
    let val = 0n;
    let b: number;
    do {
      if (i >= bytes.length) {
        throw new X509Error(
          X509ErrorCode.InvalidValue,
          `Truncated OID at byte index ${i}`,
        );
      }
      b = bytes[i++];
      val = (val << 7n) | BigInt(b & 0x7f);
    } while (b & 0x80);
    subIds.push(val);
  }
  const first = subIds[0];
  const arcs =
    first < 40n
      ? [0n, first]
      : first < 80n
        ? [1n, first - 40n]
        : [2n, first - 80n];
  return [...arcs, ...subIds.slice(1)].map((a) => a.toString()).join(".");
}

export function decodeBitString(bytes: Uint8Array): BitString {
  if (bytes.length === 0) {
    throw new X509Error(X509ErrorCode.InvalidValue, "Empty BIT STRING encoding");
  }
  const unusedBits = bytes[0];
  if (unusedBits > 7 || (unusedBits > 0 && bytes.length === 1)) {
    throw new X509Error(
      X509ErrorCode.InvalidValue,
      `Invalid BIT STRING unused-bits count ${unusedBits}`,
    );
  }
  return { unusedBits, data: bytes.subarray(1) };
}
