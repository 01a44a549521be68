import { X509ErrorCode, decodeField } from "../common/errors.js";
import { BitString, DerObject, DerResult } from "../common/types.js";
import {
  consumed,
  readAny,
  readBitString,
  readOid,
  readSequence,
} from "../parser/der-reader.js";
import { oidToAbbreviation } from "./oid-registry.js";

/**
 * AlgorithmIdentifier ::= SEQUENCE {
 *   algorithm   OBJECT IDENTIFIER,
 *   parameters  ANY DEFINED BY algorithm OPTIONAL
 * }
 */
export interface AlgorithmIdentifier {
  readonly algorithm: string;
  readonly parameters?: DerObject;
}

/**
 * SubjectPublicKeyInfo ::= SEQUENCE {
 *   algorithm         AlgorithmIdentifier,
 *   subjectPublicKey  BIT STRING
 * }
 */
export interface SubjectPublicKeyInfo {
  readonly algorithm: AlgorithmIdentifier;
  readonly subjectPublicKey: BitString;
  readonly raw: Uint8Array;
}

export function parseAlgorithmIdentifier(
  input: Uint8Array,
  field = "AlgorithmIdentifier",
): DerResult<AlgorithmIdentifier> {
  return decodeField(X509ErrorCode.InvalidAlgorithmIdentifier, field, () =>
    readSequence<AlgorithmIdentifier>(
      input,
      (content) => {
        const oid = readOid(content, "algorithm");
        if (oid.rest.byteLength === 0) {
          return { value: { algorithm: oid.value }, rest: oid.rest };
        }
        const params = readAny(oid.rest, "parameters");
        return {
          value: { algorithm: oid.value, parameters: params.value },
          rest: params.rest,
        };
      },
      field,
    ),
  );
}

export function parseSubjectPublicKeyInfo(
  input: Uint8Array,
): DerResult<SubjectPublicKeyInfo> {
  return decodeField(
    X509ErrorCode.InvalidSubjectPublicKeyInfo,
    "SubjectPublicKeyInfo",
    () => {
      const result = readSequence(
        input,
        (content) => {
          const alg = parseAlgorithmIdentifier(content);
          const key = readBitString(alg.rest, "subjectPublicKey");
          return {
            value: { algorithm: alg.value, subjectPublicKey: key.value },
            rest: key.rest,
          };
        },
        "SubjectPublicKeyInfo",
      );
      return {
        value: {
          ...result.value,
          raw: consumed(input, result.rest),
        },
        rest: result.rest,
      };
    },
  );
}

/** Registry name of the algorithm, or its dotted OID. */
export function algorithmName(alg: AlgorithmIdentifier): string {
  return oidToAbbreviation(alg.algorithm) ?? alg.algorithm;
}
