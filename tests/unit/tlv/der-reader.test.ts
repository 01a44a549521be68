// tests/unit/tlv/der-reader.test.ts
import { describe, expect, it } from "vitest";
import assert from "assert";
import {
  consumed,
  readAny,
  readBoolean,
  readInteger,
  readOctetString,
  readOid,
  readOptional,
  readOptionalExplicit,
  readOptionalImplicit,
  readSequence,
  readSequenceOf,
  readSmallUint,
} from "../../../src/parser/der-reader.js";
import { X509Error, X509ErrorCode } from "../../../src/common/errors.js";
import { TagClass, UniversalTag } from "../../../src/common/types.js";
import { concat, der, fromHexString } from "../../helpers/der.js";

describe("der-reader: positional readers", () => {
  it("returns the value and the remaining bytes", () => {
    const input = concat(der.oid("2.5.4.3"), der.int(5));
    const oid = readOid(input);
    assert.strictEqual(oid.value, "2.5.4.3");
    const n = readSmallUint(oid.rest);
    assert.strictEqual(n.value, 5);
    assert.strictEqual(n.rest.byteLength, 0);
  });

  it("consumed spans exactly the bytes read", () => {
    const input = concat(der.bool(true), der.null());
    const { rest } = readBoolean(input);
    assert.deepStrictEqual(Array.from(consumed(input, rest)), [0x01, 0x01, 0xff]);
  });

  it("readInteger keeps the exact content octets", () => {
    const { value } = readInteger(fromHexString("020500ff00ff00"));
    assert.strictEqual(value.value, 0xff00ff00n);
    assert.deepStrictEqual(Array.from(value.raw), [0x00, 0xff, 0x00, 0xff, 0x00]);
  });

  it("a tag mismatch is InvalidTag and names the field", () => {
    try {
      readOid(der.int(1), "algorithm");
      assert.fail("expected InvalidTag");
    } catch (err) {
      assert.ok(err instanceof X509Error);
      assert.strictEqual(err.code, X509ErrorCode.InvalidTag);
      assert.strictEqual(
        err.message,
        "InvalidTag: Expected [UNIVERSAL 6] for algorithm but found [UNIVERSAL 2]",
      );
    }
  });

  it("readSequence rejects content the decoder leaves behind", () => {
    const input = der.seq(der.int(1), der.int(2));
    expect(() => readSequence(input, (c) => readSmallUint(c))).toThrow(
      "Unexpected 3 trailing byte(s) inside SEQUENCE",
    );
  });

  it("readSequenceOf decodes every item", () => {
    const input = der.seq(der.int(1), der.int(2), der.int(3));
    assert.deepStrictEqual(readSequenceOf(input, (i) => readSmallUint(i)).value, [1, 2, 3]);
  });

  it("readAny keeps the whole TLV", () => {
    const input = concat(der.printable("FR"), der.null());
    const { value, rest } = readAny(input);
    assert.strictEqual(value.tag.tagNumber, UniversalTag.PrintableString);
    assert.deepStrictEqual(Array.from(value.raw), [0x13, 0x02, 0x46, 0x52]);
    assert.deepStrictEqual(Array.from(value.value), [0x46, 0x52]);
    assert.strictEqual(rest.byteLength, 2);
  });
});

describe("der-reader: optional and tagged fields", () => {
  it("readOptionalExplicit consumes nothing when the tag is absent", () => {
    const input = der.int(7);
    const result = readOptionalExplicit(input, 0, "version", (c) => readSmallUint(c));
    assert.strictEqual(result.value, undefined);
    assert.strictEqual(result.rest, input);
  });

  it("readOptionalExplicit unwraps the tagged value", () => {
    const input = concat(der.explicit(0, der.int(2)), der.int(9));
    const result = readOptionalExplicit(input, 0, "version", (c) => readSmallUint(c));
    assert.strictEqual(result.value, 2);
    assert.strictEqual(readSmallUint(result.rest).value, 9);
  });

  it("readOptionalImplicit hands over the content octets", () => {
    const input = der.implicit(0, fromHexString("0102"));
    const result = readOptionalImplicit(input, 0, false, "keyIdentifier", (c) => Array.from(c));
    assert.deepStrictEqual(result.value, [1, 2]);
    assert.strictEqual(result.rest.byteLength, 0);
  });

  it("readOptionalImplicit checks the constructed bit", () => {
    const input = der.implicit(1, der.int(1), true);
    const result = readOptionalImplicit(input, 1, false, "x", (c) => c);
    assert.strictEqual(result.value, undefined);
  });

  it("readOptional runs the reader only on a matching tag", () => {
    const tag = { tagClass: TagClass.Universal, tagNumber: UniversalTag.Boolean, constructed: false };
    assert.strictEqual(readOptional(der.octetString(new Uint8Array(0)), tag, readBoolean).value, undefined);
    assert.strictEqual(readOptional(der.bool(true), tag, readBoolean).value, true);
    const empty = readOptional(new Uint8Array(0), tag, readOctetString);
    assert.strictEqual(empty.value, undefined);
  });
});
