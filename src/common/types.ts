export const TagClass = {
  Universal: 0,
  Application: 1,
  ContextSpecific: 2,
  Private: 3,
} as const;
export type TagClass = (typeof TagClass)[keyof typeof TagClass];

/** Universal tag numbers read by the X.509 decoders. */
export const UniversalTag = {
  Boolean: 1,
  Integer: 2,
  BitString: 3,
  OctetString: 4,
  Null: 5,
  ObjectIdentifier: 6,
  Enumerated: 10,
  Utf8String: 12,
  Sequence: 16,
  Set: 17,
  NumericString: 18,
  PrintableString: 19,
  TeletexString: 20,
  Ia5String: 22,
  UtcTime: 23,
  GeneralizedTime: 24,
  UniversalString: 28,
  BmpString: 30,
} as const;

export interface TagInfo {
  tagClass: TagClass;
  constructed: boolean;
  tagNumber: number;
}

export interface TLVResult {
  tag: TagInfo;
  length: number;
  /** Number of bytes taken by the identifier and length octets. */
  headerLength: number;
  /** Content octets, a view into the parsed input. */
  value: Uint8Array;
  endOffset: number;
}

/**
 * Outcome of a decode step: the decoded value and the unconsumed
 * remainder of the input (a view into the same buffer).
 */
export interface DerResult<T> {
  value: T;
  rest: Uint8Array;
}

export interface BitString {
  unusedBits: number;
  data: Uint8Array;
}

/** An undecoded ASN.1 value (ANY). */
export interface DerObject {
  tag: TagInfo;
  /** Content octets. */
  value: Uint8Array;
  /** Identifier, length and content octets. */
  raw: Uint8Array;
}
