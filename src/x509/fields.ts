import { toColonHex } from "../common/codecs.js";
import { X509ErrorCode, decodeField } from "../common/errors.js";
import { BitString, DerResult } from "../common/types.js";
import {
  readBitString,
  readInteger,
  readOptionalExplicit,
  readSmallUint,
} from "../parser/der-reader.js";

export const X509Version = {
  V1: 0,
  V2: 1,
  V3: 2,
} as const;
export type X509Version = number;

export function formatVersion(version: X509Version): string {
  switch (version) {
    case X509Version.V1:
      return "V1";
    case X509Version.V2:
      return "V2";
    case X509Version.V3:
      return "V3";
  }
  return `X509Version(${version})`;
}

/** `[0] EXPLICIT Version DEFAULT v1`; when the tag is absent nothing is consumed. */
export function readExplicitVersion(input: Uint8Array): DerResult<X509Version> {
  return decodeField(X509ErrorCode.InvalidVersion, "version", () => {
    const { value, rest } = readOptionalExplicit(input, 0, "version", (c) =>
      readSmallUint(c, "version"),
    );
    return { value: value ?? X509Version.V1, rest };
  });
}

/** A plain `Version ::= INTEGER`. */
export function readPlainVersion(input: Uint8Array): DerResult<X509Version> {
  return decodeField(X509ErrorCode.InvalidVersion, "version", () =>
    readSmallUint(input, "version"),
  );
}

export interface SerialNumber {
  value: bigint;
  /** Content octets of the INTEGER, exactly as encoded. */
  raw: Uint8Array;
}

export function readSerialNumber(input: Uint8Array): DerResult<SerialNumber> {
  return decodeField(X509ErrorCode.InvalidSerialNumber, "serialNumber", () =>
    readInteger(input, "serialNumber"),
  );
}

export function serialToString(raw: Uint8Array): string {
  return toColonHex(raw);
}

export function readSignatureValue(input: Uint8Array): DerResult<BitString> {
  return decodeField(X509ErrorCode.InvalidSignatureValue, "signatureValue", () =>
    readBitString(input, "signatureValue"),
  );
}
