import { X509Error, X509ErrorCode } from "../../common/errors.js";
import { oidToDescription, Oid } from "../oid-registry.js";
import {
  decodeAuthorityKeyIdentifier,
  decodeBasicConstraints,
  decodeCertificatePolicies,
  decodeCrlDistributionPoints,
  decodeCrlNumber,
  decodeExtendedKeyUsage,
  decodeGeneralNames,
  decodeInfoAccess,
  decodeInhibitAnyPolicy,
  decodeInvalidityDate,
  decodeKeyUsage,
  decodeNameConstraints,
  decodePolicyConstraints,
  decodePolicyMappings,
  decodeReasonCode,
  decodeSignedCertificateTimestamps,
  decodeSubjectKeyIdentifier,
} from "./decoders.js";
import type { ParsedExtension } from "./types.js";

type ExtensionDecoder = (raw: Uint8Array) => ParsedExtension;

const EXTENSION_DECODERS: ReadonlyMap<string, ExtensionDecoder> = new Map<
  string,
  ExtensionDecoder
>([
  [
    Oid.AuthorityKeyIdentifier,
    (raw) => ({
      kind: "authorityKeyIdentifier",
      value: decodeAuthorityKeyIdentifier(raw),
    }),
  ],
  [
    Oid.SubjectKeyIdentifier,
    (raw) => ({
      kind: "subjectKeyIdentifier",
      value: decodeSubjectKeyIdentifier(raw),
    }),
  ],
  [
    Oid.KeyUsage,
    (raw) => ({ kind: "keyUsage", value: decodeKeyUsage(raw) }),
  ],
  [
    Oid.CertificatePolicies,
    (raw) => ({
      kind: "certificatePolicies",
      value: decodeCertificatePolicies(raw),
    }),
  ],
  [
    Oid.PolicyMappings,
    (raw) => ({ kind: "policyMappings", value: decodePolicyMappings(raw) }),
  ],
  [
    Oid.SubjectAltName,
    (raw) => ({
      kind: "subjectAlternativeName",
      value: decodeGeneralNames(raw),
    }),
  ],
  [
    Oid.IssuerAltName,
    (raw) => ({
      kind: "issuerAlternativeName",
      value: decodeGeneralNames(raw),
    }),
  ],
  [
    Oid.BasicConstraints,
    (raw) => ({ kind: "basicConstraints", value: decodeBasicConstraints(raw) }),
  ],
  [
    Oid.NameConstraints,
    (raw) => ({ kind: "nameConstraints", value: decodeNameConstraints(raw) }),
  ],
  [
    Oid.PolicyConstraints,
    (raw) => ({
      kind: "policyConstraints",
      value: decodePolicyConstraints(raw),
    }),
  ],
  [
    Oid.ExtendedKeyUsage,
    (raw) => ({ kind: "extendedKeyUsage", value: decodeExtendedKeyUsage(raw) }),
  ],
  [
    Oid.CrlDistributionPoints,
    (raw) => ({
      kind: "crlDistributionPoints",
      value: decodeCrlDistributionPoints(raw),
    }),
  ],
  [
    Oid.FreshestCrl,
    (raw) => ({ kind: "freshestCrl", value: decodeCrlDistributionPoints(raw) }),
  ],
  [
    Oid.InhibitAnyPolicy,
    (raw) => ({ kind: "inhibitAnyPolicy", value: decodeInhibitAnyPolicy(raw) }),
  ],
  [
    Oid.AuthorityInfoAccess,
    (raw) => ({ kind: "authorityInfoAccess", value: decodeInfoAccess(raw) }),
  ],
  [
    Oid.SubjectInfoAccess,
    (raw) => ({ kind: "subjectInfoAccess", value: decodeInfoAccess(raw) }),
  ],
  [
    Oid.CrlNumber,
    (raw) => ({ kind: "crlNumber", value: decodeCrlNumber(raw) }),
  ],
  [
    Oid.DeltaCrlIndicator,
    (raw) => ({ kind: "deltaCrlIndicator", value: decodeCrlNumber(raw) }),
  ],
  [
    Oid.ReasonCode,
    (raw) => ({ kind: "reasonCode", value: decodeReasonCode(raw) }),
  ],
  [
    Oid.InvalidityDate,
    (raw) => ({ kind: "invalidityDate", value: decodeInvalidityDate(raw) }),
  ],
  [
    Oid.CertificateIssuer,
    (raw) => ({ kind: "certificateIssuer", value: decodeGeneralNames(raw) }),
  ],
  [
    Oid.SignedCertificateTimestamps,
    (raw) => ({
      kind: "signedCertificateTimestamps",
      value: decodeSignedCertificateTimestamps(raw),
    }),
  ],
]);

export function isRegisteredExtension(oid: string): boolean {
  return EXTENSION_DECODERS.has(oid);
}

/**
 * Decode an extension value by OID.
 *
 * Unknown OIDs and values the registered decoder rejects become
 * `{ kind: "unsupported" }`, unless the extension is critical, in which
 * case `UnsupportedCriticalExtension` is thrown.
 */
export function parseExtensionValue(
  oid: string,
  raw: Uint8Array,
  critical: boolean,
): ParsedExtension {
  const decoder = EXTENSION_DECODERS.get(oid);
  if (decoder === undefined) {
    if (critical) {
      throw new X509Error(
        X509ErrorCode.UnsupportedCriticalExtension,
        `Unrecognized critical extension ${oid}`,
      );
    }
    return { kind: "unsupported" };
  }
  try {
    return decoder(raw);
  } catch (err) {
    const label = oidToDescription(oid) ?? oid;
    if (critical) {
      throw new X509Error(
        X509ErrorCode.UnsupportedCriticalExtension,
        `Critical extension ${label} could not be decoded`,
        { cause: err },
      );
    }
    const error =
      err instanceof X509Error
        ? err
        : new X509Error(
            X509ErrorCode.InvalidValue,
            `Failed to decode ${label}`,
            { cause: err },
          );
    return { kind: "unsupported", error };
  }
}
