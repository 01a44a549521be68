import { X509Error, X509ErrorCode, decodeField } from "../../common/errors.js";
import { DerResult, UniversalTag } from "../../common/types.js";
import {
  readBoolean,
  readItems,
  readOctetString,
  readOid,
  readOptional,
  readSequence,
} from "../../parser/der-reader.js";
import { parseExtensionValue } from "./registry.js";
import type { ExtensionView, ParsedExtension } from "./types.js";

/**
 * Extension ::= SEQUENCE {
 *   extnID     OBJECT IDENTIFIER,
 *   critical   BOOLEAN DEFAULT FALSE,
 *   extnValue  OCTET STRING
 * }
 */
export interface X509Extension {
  readonly oid: string;
  readonly critical: boolean;
  /** Content of extnValue, exactly as encoded. */
  readonly value: Uint8Array;
  readonly parsed: ParsedExtension;
}

/** Extensions keyed by OID, in encoded order. */
export type Extensions = ReadonlyMap<string, X509Extension>;

export const EMPTY_EXTENSIONS: Extensions = new Map();

export function readExtension(input: Uint8Array): DerResult<X509Extension> {
  return readSequence(
    input,
    (content) => {
      const oid = readOid(content, "extnID");
      const critical = readOptional(
        oid.rest,
        { tagNumber: UniversalTag.Boolean, constructed: false },
        (i) => readBoolean(i, "critical"),
      );
      const value = readOctetString(critical.rest, "extnValue");
      const isCritical = critical.value ?? false;
      const extension: X509Extension = Object.freeze({
        oid: oid.value,
        critical: isCritical,
        value: value.value,
        parsed: parseExtensionValue(oid.value, value.value, isCritical),
      });
      return { value: extension, rest: value.rest };
    },
    "Extension",
  );
}

/**
 * Content octets of `Extensions ::= SEQUENCE SIZE (1..MAX) OF Extension`,
 * gathered into a map. An OID that appears twice is rejected.
 */
export function decodeExtensionsContent(content: Uint8Array): Extensions {
  const list = readItems(content, readExtension).value;
  const map = new Map<string, X509Extension>();
  for (const ext of list) {
    if (map.has(ext.oid)) {
      throw new X509Error(
        X509ErrorCode.DuplicateExtension,
        `Extension ${ext.oid} appears more than once`,
      );
    }
    map.set(ext.oid, ext);
  }
  return map;
}

export function parseExtensions(
  input: Uint8Array,
  field = "Extensions",
): DerResult<Extensions> {
  return decodeField(X509ErrorCode.InvalidExtensions, field, () =>
    readSequence(
      input,
      (content) => ({
        value: decodeExtensionsContent(content),
        rest: content.subarray(content.byteLength),
      }),
      field,
    ),
  );
}

/** First extension `pick` recognises, with its criticality. */
export function extensionView<T>(
  extensions: Extensions,
  pick: (parsed: ParsedExtension) => T | undefined,
): ExtensionView<T> | undefined {
  for (const ext of extensions.values()) {
    const value = pick(ext.parsed);
    if (value !== undefined) return { critical: ext.critical, value };
  }
  return undefined;
}
