// tests/unit/schema/schema-parser.test.ts
import { describe, expect, it } from "vitest";
import assert from "assert";
import { Schema, SchemaParser } from "../../../src/parser/index.js";
import { decodeBoolean, decodeOID, decodeSmallUint } from "../../../src/common/codecs.js";
import { X509ErrorCode } from "../../../src/common/errors.js";
import { TagClass } from "../../../src/common/types.js";
import { der, fromHexString } from "../../helpers/der.js";
import { expectX509Error } from "../../helpers/errors.js";

const basicConstraints = Schema.constructed("basicConstraints", {}, [
  Schema.primitive("cA", { tagNumber: 1, optional: true }, decodeBoolean),
  Schema.primitive("pathLen", { tagNumber: 2, optional: true }, decodeSmallUint),
]);

const keyPurposes = Schema.constructed("extKeyUsage", {}, [
  Schema.repeated("purposes", {}, Schema.primitive("purpose", { tagNumber: 6 }, decodeOID)),
]);

describe("SchemaParser: constructed fields", () => {
  it("skips absent optional fields", () => {
    const parser = new SchemaParser(basicConstraints);
    assert.deepStrictEqual(parser.parse(der.seq(der.int(3))), { pathLen: 3 });
    assert.deepStrictEqual(parser.parse(der.seq()), {});
    assert.deepStrictEqual(parser.parse(der.seq(der.bool(true), der.int(0))), {
      cA: true,
      pathLen: 0,
    });
  });

  it("collects consecutive repeated items", () => {
    const parser = new SchemaParser(keyPurposes);
    const result = parser.parse(der.seq(der.oid("1.3.6.1.5.5.7.3.1"), der.oid("1.3.6.1.5.5.7.3.2")));
    assert.deepStrictEqual(result.purposes, ["1.3.6.1.5.5.7.3.1", "1.3.6.1.5.5.7.3.2"]);
  });

  it("a required repeated field needs at least one item", () => {
    const err = expectX509Error(
      () => new SchemaParser(keyPurposes).parse(der.seq()),
      X509ErrorCode.InvalidValue,
    );
    expect(err.message).toContain("Repeated property 'purposes'");
  });

  it("hands the content of context-specific fields to the default decoder", () => {
    const schema = Schema.constructed("aki", {}, [
      Schema.primitive("keyIdentifier", {
        tagClass: TagClass.ContextSpecific,
        tagNumber: 0,
        optional: true,
      }),
    ]);
    const result = new SchemaParser(schema).parse(der.seq(der.implicit(0, fromHexString("0102"))));
    assert.ok(result.keyIdentifier);
    assert.deepStrictEqual(Array.from(result.keyIdentifier), [1, 2]);
  });
});

describe("SchemaParser: rejected input", () => {
  it("a wrong top-level tag is InvalidTag", () => {
    const parser = new SchemaParser(Schema.primitive("n", { tagNumber: 2 }, decodeSmallUint));
    expectX509Error(() => parser.parse(der.bool(true)), X509ErrorCode.InvalidTag);
  });

  it("a missing required field at the end of content is InvalidValue", () => {
    const schema = Schema.constructed("pair", {}, [
      Schema.primitive("a", { tagNumber: 2 }, decodeSmallUint),
      Schema.primitive("b", { tagNumber: 2 }, decodeSmallUint),
    ]);
    const err = expectX509Error(
      () => new SchemaParser(schema).parse(der.seq(der.int(1))),
      X509ErrorCode.InvalidValue,
    );
    expect(err.message).toContain("found end of content");
  });

  it("an extra child is InvalidValue", () => {
    expectX509Error(
      () => new SchemaParser(basicConstraints).parse(der.seq(der.bool(false), der.int(1), der.int(2))),
      X509ErrorCode.InvalidValue,
    );
  });

  it("trailing bytes after the top-level TLV depend on strict", () => {
    const input = fromHexString("300302010700");
    expectX509Error(() => new SchemaParser(basicConstraints).parse(input), X509ErrorCode.InvalidValue);
    const lenient = new SchemaParser(basicConstraints, { strict: false });
    assert.deepStrictEqual(lenient.parse(input), { pathLen: 7 });
  });

  it("nesting beyond maxDepth is MaxDepthExceeded", () => {
    const schema = Schema.constructed("outer", {}, [
      Schema.constructed("inner", {}, [Schema.primitive("n", { tagNumber: 2 }, decodeSmallUint)]),
    ]);
    const input = der.seq(der.seq(der.int(1)));
    assert.deepStrictEqual(new SchemaParser(schema).parse(input), { inner: { n: 1 } });
    expectX509Error(
      () => new SchemaParser(schema, { maxDepth: 2 }).parse(input),
      X509ErrorCode.MaxDepthExceeded,
    );
  });

  it("a top-level repeated schema is refused", () => {
    const schema = Schema.repeated("items", {}, Schema.primitive("n", { tagNumber: 2 }));
    expect(() => new SchemaParser(schema).parse(der.int(1))).toThrow(
      "Top-level repeated schema 'items' is not supported",
    );
  });
});
