// tests/unit/tlv/basic-tlv.length-exceed.test.ts
import { describe, it } from "vitest";
import assert from "assert";
import { BasicTLVParser } from "../../../src/parser/index.js";
import { X509Error, X509ErrorCode } from "../../../src/common/errors.js";
import { fromHexString } from "../../helpers/der.js";

function assertCode(fn: () => unknown, code: X509ErrorCode): void {
  assert.throws(fn, (err: unknown) => err instanceof X509Error && err.code === code);
}

describe("BasicTLVParser.readValue: declared length exceeds available bytes", () => {
  it("short-form length: declared length 5 but only 2 bytes available -> Truncated", () => {
    assertCode(() => BasicTLVParser.parse(fromHexString("c105aabb")), X509ErrorCode.Truncated);
  });

  it("long-form length: declared length 130 but only 1 byte available -> Truncated", () => {
    assertCode(() => BasicTLVParser.parse(fromHexString("c1818200")), X509ErrorCode.Truncated);
  });

  it("length octets cut short -> Truncated", () => {
    assertCode(() => BasicTLVParser.parse(fromHexString("0482")), X509ErrorCode.Truncated);
    assertCode(() => BasicTLVParser.parse(fromHexString("04")), X509ErrorCode.Truncated);
    assertCode(() => BasicTLVParser.parse(new Uint8Array(0)), X509ErrorCode.Truncated);
  });
});

describe("BasicTLVParser.readLength: DER restrictions", () => {
  it("rejects indefinite length", () => {
    assertCode(
      () => BasicTLVParser.parse(fromHexString("30800201010000")),
      X509ErrorCode.InvalidLength,
    );
  });

  it("rejects the reserved 0xff length octet", () => {
    assertCode(() => BasicTLVParser.parse(fromHexString("04ff")), X509ErrorCode.InvalidLength);
  });

  it("rejects lengths encoded in more than 4 octets", () => {
    assertCode(
      () => BasicTLVParser.parse(fromHexString("04850000000001aa")),
      X509ErrorCode.InvalidLength,
    );
  });
});
