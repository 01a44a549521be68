// tests/types/parse.types.test.ts
import { describe, it } from "vitest";
import assert from "assert";
import { Schema, SchemaParser } from "../../src/parser/index.js";
import { decodeBoolean, decodeOID, decodeSmallUint } from "../../src/common/codecs.js";
import { TagClass } from "../../src/common/types.js";
import { der } from "../helpers/der.js";
import { AssertTypeCompatible, assertTypeTrue } from "../helpers/errors.js";

describe("ParsedResult type inference", () => {
  it("required, optional and repeated fields", () => {
    const schema = Schema.constructed("policy", {}, [
      Schema.primitive("id", { tagNumber: 6 }, decodeOID),
      Schema.primitive("flag", { tagNumber: 1, optional: true }, decodeBoolean),
      Schema.primitive("skip", { tagClass: TagClass.ContextSpecific, tagNumber: 0, optional: true }),
      Schema.repeated("counts", { optional: true }, Schema.primitive("n", { tagNumber: 2 }, decodeSmallUint)),
    ]);

    type Expected = {
      id: string;
      flag?: boolean;
      skip?: Uint8Array;
      counts?: number[];
    };

    const parser = new SchemaParser(schema);
    type ParserReturn = ReturnType<typeof parser.parse>;
    assertTypeTrue<AssertTypeCompatible<ParserReturn, Expected>>(true);

    const parsed = parser.parse(der.seq(der.oid("2.5.29.32.0"), der.int(4)));
    assert.deepStrictEqual(parsed, { id: "2.5.29.32.0", counts: [4] });
  });
});
