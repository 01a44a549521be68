import { decodeAscii, decodeOID } from "../../common/codecs.js";
import { X509Error, X509ErrorCode } from "../../common/errors.js";
import { DerResult, TagClass } from "../../common/types.js";
import {
  readAny,
  readItems,
  readOid,
  readOptionalExplicit,
  readSequence,
} from "../../parser/der-reader.js";
import { parseName } from "../name.js";
import type { GeneralName } from "./types.js";

/**
 * GeneralName ::= CHOICE {
 *   otherName                 [0] OtherName,
 *   rfc822Name                [1] IA5String,
 *   dNSName                   [2] IA5String,
 *   x400Address               [3] ORAddress,
 *   directoryName             [4] Name,
 *   ediPartyName              [5] EDIPartyName,
 *   uniformResourceIdentifier [6] IA5String,
 *   iPAddress                 [7] OCTET STRING,
 *   registeredID              [8] OBJECT IDENTIFIER
 * }
 */
export function readGeneralName(input: Uint8Array): DerResult<GeneralName> {
  const { value: obj, rest } = readAny(input, "GeneralName");
  const { tag, value } = obj;
  if (tag.tagClass !== TagClass.ContextSpecific) {
    throw new X509Error(
      X509ErrorCode.InvalidTag,
      `GeneralName must be context-specific; found class ${tag.tagClass}`,
    );
  }
  const expectConstructed =
    tag.tagNumber === 0 || (tag.tagNumber >= 3 && tag.tagNumber <= 5);
  if (tag.tagNumber <= 8 && tag.constructed !== expectConstructed) {
    throw new X509Error(
      X509ErrorCode.InvalidTag,
      `GeneralName [${tag.tagNumber}] has the wrong constructed bit`,
    );
  }

  switch (tag.tagNumber) {
    case 0: {
      const typeId = readOid(value, "OtherName.type-id");
      const inner = readOptionalExplicit(typeId.rest, 0, "OtherName.value", (c) =>
        readAny(c, "OtherName.value"),
      );
      if (inner.value === undefined || inner.rest.byteLength !== 0) {
        throw new X509Error(X509ErrorCode.InvalidValue, "Malformed OtherName");
      }
      return {
        value: { type: "otherName", typeId: typeId.value, value: inner.value },
        rest,
      };
    }
    case 1:
      return { value: { type: "rfc822Name", value: decodeAscii(value) }, rest };
    case 2:
      return { value: { type: "dNSName", value: decodeAscii(value) }, rest };
    case 3:
      return { value: { type: "x400Address", value: obj }, rest };
    case 4: {
      // Name is a CHOICE, so the tag is explicit.
      const name = parseName(value, "directoryName");
      if (name.rest.byteLength !== 0) {
        throw new X509Error(
          X509ErrorCode.InvalidValue,
          "Trailing bytes after directoryName",
        );
      }
      return { value: { type: "directoryName", value: name.value }, rest };
    }
    case 5:
      return { value: { type: "ediPartyName", value: obj }, rest };
    case 6:
      return {
        value: { type: "uniformResourceIdentifier", value: decodeAscii(value) },
        rest,
      };
    case 7:
      return { value: { type: "iPAddress", value }, rest };
    case 8:
      return { value: { type: "registeredID", value: decodeOID(value) }, rest };
  }
  throw new X509Error(
    X509ErrorCode.InvalidTag,
    `Unknown GeneralName tag [${tag.tagNumber}]`,
  );
}

/** Content octets of `GeneralNames ::= SEQUENCE SIZE (1..MAX) OF GeneralName`. */
export function decodeGeneralNamesContent(content: Uint8Array): GeneralName[] {
  const names = readItems(content, readGeneralName).value;
  if (names.length === 0) {
    throw new X509Error(X509ErrorCode.InvalidValue, "GeneralNames must not be empty");
  }
  return names;
}

export function readGeneralNames(
  input: Uint8Array,
  field = "GeneralNames",
): DerResult<GeneralName[]> {
  return readSequence(
    input,
    (content) => ({
      value: decodeGeneralNamesContent(content),
      rest: content.subarray(content.byteLength),
    }),
    field,
  );
}
