/**
 * Certificate ::= SEQUENCE {
 *   tbsCertificate       TBSCertificate,
 *   signatureAlgorithm   AlgorithmIdentifier,
 *   signatureValue       BIT STRING
 * }
 *
 * TBSCertificate ::= SEQUENCE {
 *   version         [0] EXPLICIT Version DEFAULT v1,
 *   serialNumber         CertificateSerialNumber,
 *   signature            AlgorithmIdentifier,
 *   issuer               Name,
 *   validity             Validity,
 *   subject              Name,
 *   subjectPublicKeyInfo SubjectPublicKeyInfo,
 *   issuerUniqueID  [1] IMPLICIT UniqueIdentifier OPTIONAL,
 *   subjectUniqueID [2] IMPLICIT UniqueIdentifier OPTIONAL,
 *   extensions      [3] EXPLICIT Extensions OPTIONAL
 * }
 */
import { decodeBitString, toBytes } from "../common/codecs.js";
import { X509ErrorCode, decodeField } from "../common/errors.js";
import { BitString, DerResult } from "../common/types.js";
import {
  consumed,
  readOptionalExplicit,
  readOptionalImplicit,
  readSequence,
} from "../parser/der-reader.js";
import {
  AlgorithmIdentifier,
  SubjectPublicKeyInfo,
  parseAlgorithmIdentifier,
  parseSubjectPublicKeyInfo,
} from "./algorithm.js";
import {
  EMPTY_EXTENSIONS,
  Extensions,
  extensionView,
  parseExtensions,
} from "./extensions/extension.js";
import type {
  BasicConstraints,
  ExtendedKeyUsage,
  ExtensionView,
  GeneralName,
  InhibitAnyPolicy,
  KeyUsage,
  NameConstraints,
  PolicyConstraints,
  PolicyMapping,
} from "./extensions/types.js";
import {
  X509Version,
  readExplicitVersion,
  readSerialNumber,
  readSignatureValue,
  serialToString,
} from "./fields.js";
import { X509Name, parseName } from "./name.js";
import { Validity, parseValidity } from "./validity.js";

export interface TbsCertificate {
  readonly version: X509Version;
  readonly serial: bigint;
  readonly rawSerial: Uint8Array;
  readonly signature: AlgorithmIdentifier;
  readonly issuer: X509Name;
  readonly validity: Validity;
  readonly subject: X509Name;
  readonly subjectPublicKeyInfo: SubjectPublicKeyInfo;
  readonly issuerUid?: BitString;
  readonly subjectUid?: BitString;
  readonly extensions: Extensions;
  /** The encoded TBSCertificate: the bytes covered by the signature. */
  readonly raw: Uint8Array;
}

function readUniqueId(
  input: Uint8Array,
  tagNumber: 1 | 2,
): DerResult<BitString | undefined> {
  const field = tagNumber === 1 ? "issuerUniqueID" : "subjectUniqueID";
  const code =
    tagNumber === 1 ? X509ErrorCode.InvalidIssuerUid : X509ErrorCode.InvalidSubjectUid;
  return decodeField(code, field, () =>
    readOptionalImplicit(input, tagNumber, false, field, decodeBitString),
  );
}

export function parseTbsCertificate(input: Uint8Array): DerResult<TbsCertificate> {
  return decodeField(X509ErrorCode.InvalidTbs, "TBSCertificate", () => {
    const { value, rest } = readSequence(
      input,
      (content) => {
        const version = readExplicitVersion(content);
        const serial = readSerialNumber(version.rest);
        const signature = parseAlgorithmIdentifier(serial.rest, "signature");
        const issuer = parseName(signature.rest, "issuer");
        const validity = parseValidity(issuer.rest);
        const subject = parseName(validity.rest, "subject");
        const spki = parseSubjectPublicKeyInfo(subject.rest);
        const issuerUid = readUniqueId(spki.rest, 1);
        const subjectUid = readUniqueId(issuerUid.rest, 2);
        const extensions = decodeField(
          X509ErrorCode.InvalidExtensions,
          "extensions",
          () => readOptionalExplicit(subjectUid.rest, 3, "extensions", parseExtensions),
        );
        const tbs = {
          version: version.value,
          serial: serial.value.value,
          rawSerial: serial.value.raw,
          signature: signature.value,
          issuer: issuer.value,
          validity: validity.value,
          subject: subject.value,
          subjectPublicKeyInfo: spki.value,
          ...(issuerUid.value !== undefined ? { issuerUid: issuerUid.value } : {}),
          ...(subjectUid.value !== undefined ? { subjectUid: subjectUid.value } : {}),
          extensions: extensions.value ?? EMPTY_EXTENSIONS,
        };
        return { value: tbs, rest: extensions.rest };
      },
      "TBSCertificate",
    );
    return { value: { ...value, raw: consumed(input, rest) }, rest };
  });
}

export class X509Certificate {
  public constructor(
    public readonly tbsCertificate: TbsCertificate,
    public readonly signatureAlgorithm: AlgorithmIdentifier,
    public readonly signatureValue: BitString,
    /** The whole encoded Certificate. */
    public readonly raw: Uint8Array,
  ) {}

  public static fromDer(input: Uint8Array | ArrayBuffer): DerResult<X509Certificate> {
    return parseX509Certificate(input);
  }

  public get version(): X509Version {
    return this.tbsCertificate.version;
  }

  public get serial(): bigint {
    return this.tbsCertificate.serial;
  }

  public get rawSerial(): Uint8Array {
    return this.tbsCertificate.rawSerial;
  }

  /** Serial number bytes as colon-separated hex, e.g. "12:34:ab:cd". */
  public rawSerialAsString(): string {
    return serialToString(this.tbsCertificate.rawSerial);
  }

  public get issuer(): X509Name {
    return this.tbsCertificate.issuer;
  }

  public get subject(): X509Name {
    return this.tbsCertificate.subject;
  }

  public get validity(): Validity {
    return this.tbsCertificate.validity;
  }

  public get publicKey(): SubjectPublicKeyInfo {
    return this.tbsCertificate.subjectPublicKeyInfo;
  }

  public get extensions(): Extensions {
    return this.tbsCertificate.extensions;
  }

  public basicConstraints(): ExtensionView<BasicConstraints> | undefined {
    return extensionView(this.extensions, (p) =>
      p.kind === "basicConstraints" ? p.value : undefined,
    );
  }

  public keyUsage(): ExtensionView<KeyUsage> | undefined {
    return extensionView(this.extensions, (p) =>
      p.kind === "keyUsage" ? p.value : undefined,
    );
  }

  public extendedKeyUsage(): ExtensionView<ExtendedKeyUsage> | undefined {
    return extensionView(this.extensions, (p) =>
      p.kind === "extendedKeyUsage" ? p.value : undefined,
    );
  }

  public policyConstraints(): ExtensionView<PolicyConstraints> | undefined {
    return extensionView(this.extensions, (p) =>
      p.kind === "policyConstraints" ? p.value : undefined,
    );
  }

  public inhibitAnyPolicy(): ExtensionView<InhibitAnyPolicy> | undefined {
    return extensionView(this.extensions, (p) =>
      p.kind === "inhibitAnyPolicy" ? p.value : undefined,
    );
  }

  public policyMappings(): ExtensionView<PolicyMapping[]> | undefined {
    return extensionView(this.extensions, (p) =>
      p.kind === "policyMappings" ? p.value : undefined,
    );
  }

  public subjectAlternativeName(): ExtensionView<GeneralName[]> | undefined {
    return extensionView(this.extensions, (p) =>
      p.kind === "subjectAlternativeName" ? p.value : undefined,
    );
  }

  public nameConstraints(): ExtensionView<NameConstraints> | undefined {
    return extensionView(this.extensions, (p) =>
      p.kind === "nameConstraints" ? p.value : undefined,
    );
  }

  public isCA(): boolean {
    return this.basicConstraints()?.value.ca ?? false;
  }
}

export function parseX509Certificate(
  input: Uint8Array | ArrayBuffer,
): DerResult<X509Certificate> {
  const bytes = toBytes(input);
  return decodeField(X509ErrorCode.InvalidCertificate, "Certificate", () => {
    const { value, rest } = readSequence(
      bytes,
      (content) => {
        const tbs = parseTbsCertificate(content);
        const algorithm = parseAlgorithmIdentifier(tbs.rest, "signatureAlgorithm");
        const signature = readSignatureValue(algorithm.rest);
        return {
          value: {
            tbs: tbs.value,
            algorithm: algorithm.value,
            signature: signature.value,
          },
          rest: signature.rest,
        };
      },
      "Certificate",
    );
    return {
      value: new X509Certificate(
        value.tbs,
        value.algorithm,
        value.signature,
        consumed(bytes, rest),
      ),
      rest,
    };
  });
}
