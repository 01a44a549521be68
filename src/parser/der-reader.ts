/**
 * Positional DER readers.
 *
 * Every reader takes the input at the current position and returns the
 * decoded value together with `rest`, the view of the bytes that follow.
 * Nothing is copied: values and `rest` are subarrays of the input.
 */
import {
  decodeBitString,
  decodeBoolean,
  decodeNull,
  decodeOID,
  decodeSmallUint,
  decodeUnsignedBigInt,
} from "../common/codecs.js";
import { X509Error, X509ErrorCode } from "../common/errors.js";
import {
  BitString,
  DerObject,
  DerResult,
  TLVResult,
  TagClass,
  TagInfo,
  UniversalTag,
} from "../common/types.js";
import { BasicTLVParser } from "./basic-parser.js";

export interface ExpectedTag {
  tagClass?: TagClass;
  tagNumber: number;
  constructed: boolean;
}

const TAG_CLASS_NAMES = ["UNIVERSAL", "APPLICATION", "CONTEXT", "PRIVATE"];

export function describeTag(tag: ExpectedTag): string {
  const cls = TAG_CLASS_NAMES[tag.tagClass ?? TagClass.Universal];
  return `[${cls} ${tag.tagNumber}${tag.constructed ? " constructed" : ""}]`;
}

export function matchesTag(tag: TagInfo | null, expected: ExpectedTag): boolean {
  return (
    tag !== null &&
    tag.tagClass === (expected.tagClass ?? TagClass.Universal) &&
    tag.tagNumber === expected.tagNumber &&
    tag.constructed === expected.constructed
  );
}

/** The bytes consumed between `input` and `rest`. */
export function consumed(input: Uint8Array, rest: Uint8Array): Uint8Array {
  return input.subarray(0, input.byteLength - rest.byteLength);
}

export function readTlv(
  input: Uint8Array,
  expected?: ExpectedTag,
  field = "value",
): DerResult<TLVResult> {
  const tlv = BasicTLVParser.parse(input);
  if (expected && !matchesTag(tlv.tag, expected)) {
    throw new X509Error(
      X509ErrorCode.InvalidTag,
      `Expected ${describeTag(expected)} for ${field} but found ${describeTag(tlv.tag)}`,
    );
  }
  return { value: tlv, rest: input.subarray(tlv.endOffset) };
}

/**
 * Read a constructed TLV and decode its content. The content decoder must
 * consume the whole content; leftover bytes are an error.
 */
export function readConstructed<T>(
  input: Uint8Array,
  expected: ExpectedTag,
  field: string,
  decodeContent: (content: Uint8Array) => DerResult<T>,
): DerResult<T> {
  const { value: tlv, rest } = readTlv(input, expected, field);
  const inner = decodeContent(tlv.value);
  if (inner.rest.byteLength !== 0) {
    throw new X509Error(
      X509ErrorCode.InvalidValue,
      `Unexpected ${inner.rest.byteLength} trailing byte(s) inside ${field}`,
    );
  }
  return { value: inner.value, rest };
}

export function readSequence<T>(
  input: Uint8Array,
  decodeContent: (content: Uint8Array) => DerResult<T>,
  field = "SEQUENCE",
): DerResult<T> {
  return readConstructed(
    input,
    { tagNumber: UniversalTag.Sequence, constructed: true },
    field,
    decodeContent,
  );
}

export function readSet<T>(
  input: Uint8Array,
  decodeContent: (content: Uint8Array) => DerResult<T>,
  field = "SET",
): DerResult<T> {
  return readConstructed(
    input,
    { tagNumber: UniversalTag.Set, constructed: true },
    field,
    decodeContent,
  );
}

/** Decode items until the content is exhausted. */
export function readItems<T>(
  content: Uint8Array,
  decodeItem: (input: Uint8Array) => DerResult<T>,
): DerResult<T[]> {
  const items: T[] = [];
  let rest = content;
  while (rest.byteLength > 0) {
    const item = decodeItem(rest);
    items.push(item.value);
    rest = item.rest;
  }
  return { value: items, rest };
}

export function readSequenceOf<T>(
  input: Uint8Array,
  decodeItem: (input: Uint8Array) => DerResult<T>,
  field = "SEQUENCE OF",
): DerResult<T[]> {
  return readSequence(input, (content) => readItems(content, decodeItem), field);
}

export function readPrimitive<T>(
  input: Uint8Array,
  tagNumber: number,
  field: string,
  decode: (content: Uint8Array) => T,
): DerResult<T> {
  const { value: tlv, rest } = readTlv(
    input,
    { tagNumber, constructed: false },
    field,
  );
  return { value: decode(tlv.value), rest };
}

export function readOid(input: Uint8Array, field = "OBJECT IDENTIFIER"): DerResult<string> {
  return readPrimitive(input, UniversalTag.ObjectIdentifier, field, decodeOID);
}

/** INTEGER as an unsigned bigint together with its exact content octets. */
export function readInteger(
  input: Uint8Array,
  field = "INTEGER",
): DerResult<{ value: bigint; raw: Uint8Array }> {
  return readPrimitive(input, UniversalTag.Integer, field, (content) => ({
    value: decodeUnsignedBigInt(content),
    raw: content,
  }));
}

export function readSmallUint(input: Uint8Array, field = "INTEGER"): DerResult<number> {
  return readPrimitive(input, UniversalTag.Integer, field, decodeSmallUint);
}

export function readBoolean(input: Uint8Array, field = "BOOLEAN"): DerResult<boolean> {
  return readPrimitive(input, UniversalTag.Boolean, field, decodeBoolean);
}

export function readNull(input: Uint8Array, field = "NULL"): DerResult<null> {
  return readPrimitive(input, UniversalTag.Null, field, decodeNull);
}

export function readBitString(input: Uint8Array, field = "BIT STRING"): DerResult<BitString> {
  return readPrimitive(input, UniversalTag.BitString, field, decodeBitString);
}

export function readOctetString(
  input: Uint8Array,
  field = "OCTET STRING",
): DerResult<Uint8Array> {
  return readPrimitive(input, UniversalTag.OctetString, field, (content) => content);
}

/** Read one TLV of any type without interpreting its content. */
export function readAny(input: Uint8Array, field = "ANY"): DerResult<DerObject> {
  const { value: tlv, rest } = readTlv(input, undefined, field);
  return {
    value: { tag: tlv.tag, value: tlv.value, raw: consumed(input, rest) },
    rest,
  };
}

/**
 * Read `[tagNumber] EXPLICIT` when present. When the next TLV carries another
 * tag (or the input is empty) nothing is consumed and the value is undefined.
 */
export function readOptionalExplicit<T>(
  input: Uint8Array,
  tagNumber: number,
  field: string,
  decodeContent: (content: Uint8Array) => DerResult<T>,
): DerResult<T | undefined> {
  const expected = {
    tagClass: TagClass.ContextSpecific,
    tagNumber,
    constructed: true,
  };
  if (!matchesTag(BasicTLVParser.peekTag(input), expected)) {
    return { value: undefined, rest: input };
  }
  return readConstructed(input, expected, field, decodeContent);
}

/**
 * Read `[tagNumber] IMPLICIT` when present; the content octets are handed to
 * `decodeContent` as if they carried the underlying type's tag.
 */
export function readOptionalImplicit<T>(
  input: Uint8Array,
  tagNumber: number,
  constructed: boolean,
  field: string,
  decodeContent: (content: Uint8Array) => T,
): DerResult<T | undefined> {
  const expected = { tagClass: TagClass.ContextSpecific, tagNumber, constructed };
  if (!matchesTag(BasicTLVParser.peekTag(input), expected)) {
    return { value: undefined, rest: input };
  }
  const { value: tlv, rest } = readTlv(input, expected, field);
  return { value: decodeContent(tlv.value), rest };
}

/** Run `read` only when the next TLV carries the expected tag. */
export function readOptional<T>(
  input: Uint8Array,
  expected: ExpectedTag,
  read: (input: Uint8Array) => DerResult<T>,
): DerResult<T | undefined> {
  if (!matchesTag(BasicTLVParser.peekTag(input), expected)) {
    return { value: undefined, rest: input };
  }
  return read(input);
}
