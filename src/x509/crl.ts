/**
 * CertificateList ::= SEQUENCE {
 *   tbsCertList          TBSCertList,
 *   signatureAlgorithm   AlgorithmIdentifier,
 *   signatureValue       BIT STRING
 * }
 *
 * TBSCertList ::= SEQUENCE {
 *   version              Version OPTIONAL, -- if present, MUST be v2
 *   signature            AlgorithmIdentifier,
 *   issuer               Name,
 *   thisUpdate           Time,
 *   nextUpdate           Time OPTIONAL,
 *   revokedCertificates  SEQUENCE OF SEQUENCE {
 *     userCertificate      CertificateSerialNumber,
 *     revocationDate       Time,
 *     crlEntryExtensions   Extensions OPTIONAL
 *   } OPTIONAL,
 *   crlExtensions        [0] EXPLICIT Extensions OPTIONAL
 * }
 */
import { toBytes } from "../common/codecs.js";
import { X509ErrorCode, decodeField } from "../common/errors.js";
import { BitString, DerResult, TagClass, UniversalTag } from "../common/types.js";
import { BasicTLVParser } from "../parser/basic-parser.js";
import {
  consumed,
  readItems,
  readOptional,
  readOptionalExplicit,
  readSequence,
} from "../parser/der-reader.js";
import { AlgorithmIdentifier, parseAlgorithmIdentifier } from "./algorithm.js";
import {
  EMPTY_EXTENSIONS,
  Extensions,
  extensionView,
  parseExtensions,
} from "./extensions/extension.js";
import type { ExtensionView } from "./extensions/types.js";
import {
  X509Version,
  readPlainVersion,
  readSerialNumber,
  readSignatureValue,
  serialToString,
} from "./fields.js";
import { X509Name, parseName } from "./name.js";
import { ASN1Time, readTime } from "./time.js";

const SEQUENCE_TAG = { tagNumber: UniversalTag.Sequence, constructed: true };
const INTEGER_TAG = { tagNumber: UniversalTag.Integer, constructed: false };

export class RevokedCertificate {
  public constructor(
    public readonly serial: bigint,
    public readonly rawSerial: Uint8Array,
    public readonly revocationDate: ASN1Time,
    public readonly extensions: Extensions,
    public readonly raw: Uint8Array,
  ) {}

  public rawSerialAsString(): string {
    return serialToString(this.rawSerial);
  }

  /** CRLReason entry extension. */
  public reasonCode(): ExtensionView<number> | undefined {
    return extensionView(this.extensions, (p) =>
      p.kind === "reasonCode" ? p.value : undefined,
    );
  }

  public invalidityDate(): ExtensionView<ASN1Time> | undefined {
    return extensionView(this.extensions, (p) =>
      p.kind === "invalidityDate" ? p.value : undefined,
    );
  }
}

function readRevokedCertificate(input: Uint8Array): DerResult<RevokedCertificate> {
  const { value, rest } = readSequence(
    input,
    (content) => {
      const serial = readSerialNumber(content);
      const date = decodeField(X509ErrorCode.InvalidDate, "revocationDate", () =>
        readTime(serial.rest, "revocationDate"),
      );
      const extensions = readOptional(date.rest, SEQUENCE_TAG, (i) =>
        parseExtensions(i, "crlEntryExtensions"),
      );
      return {
        value: {
          serial: serial.value,
          date: date.value,
          extensions: extensions.value ?? EMPTY_EXTENSIONS,
        },
        rest: extensions.rest,
      };
    },
    "revokedCertificate",
  );
  return {
    value: new RevokedCertificate(
      value.serial.value,
      value.serial.raw,
      value.date,
      value.extensions,
      consumed(input, rest),
    ),
    rest,
  };
}

export interface TbsCertList {
  readonly version?: X509Version;
  readonly signature: AlgorithmIdentifier;
  readonly issuer: X509Name;
  readonly thisUpdate: ASN1Time;
  readonly nextUpdate?: ASN1Time;
  readonly revokedCertificates: readonly RevokedCertificate[];
  readonly extensions: Extensions;
  /** The encoded TBSCertList: the bytes covered by the signature. */
  readonly raw: Uint8Array;
}

function isTime(input: Uint8Array): boolean {
  const tag = BasicTLVParser.peekTag(input);
  return (
    tag !== null &&
    tag.tagClass === TagClass.Universal &&
    !tag.constructed &&
    (tag.tagNumber === UniversalTag.UtcTime ||
      tag.tagNumber === UniversalTag.GeneralizedTime)
  );
}

export function parseTbsCertList(input: Uint8Array): DerResult<TbsCertList> {
  return decodeField(X509ErrorCode.InvalidTbs, "TBSCertList", () => {
    const { value, rest } = readSequence(
      input,
      (content) => {
        const version = readOptional(content, INTEGER_TAG, readPlainVersion);
        const signature = parseAlgorithmIdentifier(version.rest, "signature");
        const issuer = parseName(signature.rest, "issuer");
        const thisUpdate = decodeField(X509ErrorCode.InvalidDate, "thisUpdate", () =>
          readTime(issuer.rest, "thisUpdate"),
        );
        const nextUpdate = isTime(thisUpdate.rest)
          ? decodeField(X509ErrorCode.InvalidDate, "nextUpdate", () =>
              readTime(thisUpdate.rest, "nextUpdate"),
            )
          : { value: undefined, rest: thisUpdate.rest };
        const revoked = readOptional(nextUpdate.rest, SEQUENCE_TAG, (i) =>
          readSequence(
            i,
            (c) => readItems(c, readRevokedCertificate),
            "revokedCertificates",
          ),
        );
        const extensions = decodeField(
          X509ErrorCode.InvalidExtensions,
          "crlExtensions",
          () => readOptionalExplicit(revoked.rest, 0, "crlExtensions", parseExtensions),
        );
        const tbs = {
          ...(version.value !== undefined ? { version: version.value } : {}),
          signature: signature.value,
          issuer: issuer.value,
          thisUpdate: thisUpdate.value,
          ...(nextUpdate.value !== undefined ? { nextUpdate: nextUpdate.value } : {}),
          revokedCertificates: Object.freeze(revoked.value ?? []),
          extensions: extensions.value ?? EMPTY_EXTENSIONS,
        };
        return { value: tbs, rest: extensions.rest };
      },
      "TBSCertList",
    );
    return { value: { ...value, raw: consumed(input, rest) }, rest };
  });
}

export class CertificateRevocationList {
  public constructor(
    public readonly tbsCertList: TbsCertList,
    public readonly signatureAlgorithm: AlgorithmIdentifier,
    public readonly signatureValue: BitString,
    public readonly raw: Uint8Array,
  ) {}

  public static fromDer(
    input: Uint8Array | ArrayBuffer,
  ): DerResult<CertificateRevocationList> {
    return parseCertificateList(input);
  }

  public get version(): X509Version | undefined {
    return this.tbsCertList.version;
  }

  public get issuer(): X509Name {
    return this.tbsCertList.issuer;
  }

  public get lastUpdate(): ASN1Time {
    return this.tbsCertList.thisUpdate;
  }

  public get nextUpdate(): ASN1Time | undefined {
    return this.tbsCertList.nextUpdate;
  }

  public get revokedCertificates(): readonly RevokedCertificate[] {
    return this.tbsCertList.revokedCertificates;
  }

  public get extensions(): Extensions {
    return this.tbsCertList.extensions;
  }

  public crlNumber(): ExtensionView<bigint> | undefined {
    return extensionView(this.extensions, (p) =>
      p.kind === "crlNumber" ? p.value : undefined,
    );
  }
}

export function parseCertificateList(
  input: Uint8Array | ArrayBuffer,
): DerResult<CertificateRevocationList> {
  const bytes = toBytes(input);
  return decodeField(X509ErrorCode.InvalidCertificateList, "CertificateList", () => {
    const { value, rest } = readSequence(
      bytes,
      (content) => {
        const tbs = parseTbsCertList(content);
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
      "CertificateList",
    );
    return {
      value: new CertificateRevocationList(
        value.tbs,
        value.algorithm,
        value.signature,
        consumed(bytes, rest),
      ),
      rest,
    };
  });
}
