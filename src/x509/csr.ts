/**
 * CertificationRequest ::= SEQUENCE {
 *   certificationRequestInfo  CertificationRequestInfo,
 *   signatureAlgorithm        AlgorithmIdentifier,
 *   signature                 BIT STRING
 * }
 *
 * CertificationRequestInfo ::= SEQUENCE {
 *   version        INTEGER { v1(0) },
 *   subject        Name,
 *   subjectPKInfo  SubjectPublicKeyInfo,
 *   attributes     [0] IMPLICIT SET OF Attribute
 * }
 */
import { toBytes } from "../common/codecs.js";
import { X509ErrorCode, decodeField } from "../common/errors.js";
import { BitString, DerResult } from "../common/types.js";
import {
  consumed,
  readOptionalImplicit,
  readSequence,
} from "../parser/der-reader.js";
import {
  AlgorithmIdentifier,
  SubjectPublicKeyInfo,
  parseAlgorithmIdentifier,
  parseSubjectPublicKeyInfo,
} from "./algorithm.js";
import { CriAttributes, decodeCriAttributesContent } from "./cri-attributes.js";
import type { Extensions } from "./extensions/extension.js";
import { X509Version, readPlainVersion, readSignatureValue } from "./fields.js";
import { X509Name, parseName } from "./name.js";
import { Oid } from "./oid-registry.js";

export interface CertificationRequestInfo {
  readonly version: X509Version;
  readonly subject: X509Name;
  readonly subjectPublicKeyInfo: SubjectPublicKeyInfo;
  readonly attributes: CriAttributes;
  /** The encoded CertificationRequestInfo: the bytes covered by the signature. */
  readonly raw: Uint8Array;
}

const NO_ATTRIBUTES: CriAttributes = new Map();

export function parseCertificationRequestInfo(
  input: Uint8Array,
): DerResult<CertificationRequestInfo> {
  return decodeField(X509ErrorCode.InvalidTbs, "CertificationRequestInfo", () => {
    const { value, rest } = readSequence(
      input,
      (content) => {
        const version = readPlainVersion(content);
        const subject = parseName(version.rest, "subject");
        const spki = parseSubjectPublicKeyInfo(subject.rest);
        const attributes = decodeField(
          X509ErrorCode.InvalidAttributes,
          "attributes",
          () =>
            readOptionalImplicit(
              spki.rest,
              0,
              true,
              "attributes",
              decodeCriAttributesContent,
            ),
        );
        return {
          value: {
            version: version.value,
            subject: subject.value,
            subjectPublicKeyInfo: spki.value,
            attributes: attributes.value ?? NO_ATTRIBUTES,
          },
          rest: attributes.rest,
        };
      },
      "CertificationRequestInfo",
    );
    return { value: { ...value, raw: consumed(input, rest) }, rest };
  });
}

export class CertificationRequest {
  public constructor(
    public readonly certificationRequestInfo: CertificationRequestInfo,
    public readonly signatureAlgorithm: AlgorithmIdentifier,
    public readonly signatureValue: BitString,
    public readonly raw: Uint8Array,
  ) {}

  public static fromDer(input: Uint8Array | ArrayBuffer): DerResult<CertificationRequest> {
    return parseCertificationRequest(input);
  }

  public get subject(): X509Name {
    return this.certificationRequestInfo.subject;
  }

  public get publicKey(): SubjectPublicKeyInfo {
    return this.certificationRequestInfo.subjectPublicKeyInfo;
  }

  public get attributes(): CriAttributes {
    return this.certificationRequestInfo.attributes;
  }

  /** Extensions carried by the extensionRequest attribute, if any. */
  public requestedExtensions(): Extensions | undefined {
    const parsed = this.attributes.get(Oid.ExtensionRequest)?.parsed;
    return parsed?.kind === "extensionRequest" ? parsed.value : undefined;
  }
}

export function parseCertificationRequest(
  input: Uint8Array | ArrayBuffer,
): DerResult<CertificationRequest> {
  const bytes = toBytes(input);
  return decodeField(
    X509ErrorCode.InvalidCertificationRequest,
    "CertificationRequest",
    () => {
      const { value, rest } = readSequence(
        bytes,
        (content) => {
          const info = parseCertificationRequestInfo(content);
          const algorithm = parseAlgorithmIdentifier(info.rest, "signatureAlgorithm");
          const signature = readSignatureValue(algorithm.rest);
          return {
            value: {
              info: info.value,
              algorithm: algorithm.value,
              signature: signature.value,
            },
            rest: signature.rest,
          };
        },
        "CertificationRequest",
      );
      return {
        value: new CertificationRequest(
          value.info,
          value.algorithm,
          value.signature,
          consumed(bytes, rest),
        ),
        rest,
      };
    },
  );
}
