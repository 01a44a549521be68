import { X509Error, X509ErrorCode, decodeField } from "../common/errors.js";
import { DerResult } from "../common/types.js";
import {
  consumed,
  readAny,
  readItems,
  readOid,
  readSequence,
  readSet,
} from "../parser/der-reader.js";
import { Extensions, parseExtensions } from "./extensions/extension.js";
import { AttributeTypeAndValue } from "./name.js";
import { Oid } from "./oid-registry.js";

export type ParsedCriAttribute =
  | { kind: "extensionRequest"; value: Extensions }
  | { kind: "challengePassword"; value: string }
  | { kind: "unsupported"; error?: X509Error };

/**
 * Attribute ::= SEQUENCE {
 *   type    OBJECT IDENTIFIER,
 *   values  SET SIZE(1..MAX) OF ANY DEFINED BY type
 * }
 */
export interface X509CriAttribute {
  readonly oid: string;
  /** The encoded `values` SET. */
  readonly value: Uint8Array;
  readonly parsed: ParsedCriAttribute;
}

export type CriAttributes = ReadonlyMap<string, X509CriAttribute>;

function singleValue<T>(
  set: Uint8Array,
  field: string,
  read: (input: Uint8Array) => DerResult<T>,
): T {
  return readSet(
    set,
    (content) => {
      const item = read(content);
      if (item.rest.byteLength !== 0) {
        throw new X509Error(
          X509ErrorCode.InvalidValue,
          `${field} must carry exactly one value`,
        );
      }
      return item;
    },
    field,
  ).value;
}

function parseAttributeValue(oid: string, set: Uint8Array): ParsedCriAttribute {
  try {
    switch (oid) {
      case Oid.ExtensionRequest:
        return {
          kind: "extensionRequest",
          value: singleValue(set, "extensionRequest", (i) => parseExtensions(i)),
        };
      case Oid.ChallengePassword: {
        const text = singleValue(set, "challengePassword", (i) => {
          const { value: password, rest } = readAny(i, "challengePassword");
          return {
            value: new AttributeTypeAndValue(oid, password).asString(),
            rest,
          };
        });
        return { kind: "challengePassword", value: text };
      }
    }
  } catch (err) {
    // A critical extension the decoder cannot honour still rejects the request.
    if (
      err instanceof X509Error &&
      (err.code === X509ErrorCode.UnsupportedCriticalExtension ||
        err.code === X509ErrorCode.DuplicateExtension)
    ) {
      throw err;
    }
    const error =
      err instanceof X509Error
        ? err
        : new X509Error(X509ErrorCode.InvalidValue, `Failed to decode ${oid}`, {
            cause: err,
          });
    return { kind: "unsupported", error };
  }
  return { kind: "unsupported" };
}

function readAttribute(input: Uint8Array): DerResult<X509CriAttribute> {
  return readSequence(
    input,
    (content) => {
      const oid = readOid(content, "type");
      const values = readSet(
        oid.rest,
        (c) => ({ value: c, rest: c.subarray(c.byteLength) }),
        "values",
      );
      const set = consumed(oid.rest, values.rest);
      const attribute: X509CriAttribute = Object.freeze({
        oid: oid.value,
        value: set,
        parsed: parseAttributeValue(oid.value, set),
      });
      return { value: attribute, rest: values.rest };
    },
    "Attribute",
  );
}

/** Content octets of `[0] IMPLICIT SET OF Attribute`. Repeated OIDs are rejected. */
export function decodeCriAttributesContent(content: Uint8Array): CriAttributes {
  return decodeField(X509ErrorCode.InvalidAttributes, "attributes", () => {
    const map = new Map<string, X509CriAttribute>();
    for (const attr of readItems(content, readAttribute).value) {
      if (map.has(attr.oid)) {
        throw new X509Error(
          X509ErrorCode.DuplicateAttribute,
          `Attribute ${attr.oid} appears more than once`,
        );
      }
      map.set(attr.oid, attr);
    }
    return map;
  });
}
