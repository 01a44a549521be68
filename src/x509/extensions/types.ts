import type { X509Error } from "../../common/errors.js";
import type { DerObject } from "../../common/types.js";
import type { RelativeDistinguishedName, X509Name } from "../name.js";
import type { ASN1Time } from "../time.js";

/** GeneralName ::= CHOICE (RFC 5280 4.2.1.6) */
export type GeneralName =
  | { type: "otherName"; typeId: string; value: DerObject }
  | { type: "rfc822Name"; value: string }
  | { type: "dNSName"; value: string }
  | { type: "x400Address"; value: DerObject }
  | { type: "directoryName"; value: X509Name }
  | { type: "ediPartyName"; value: DerObject }
  | { type: "uniformResourceIdentifier"; value: string }
  | { type: "iPAddress"; value: Uint8Array }
  | { type: "registeredID"; value: string };

export interface AuthorityKeyIdentifier {
  keyIdentifier?: Uint8Array;
  authorityCertIssuer?: GeneralName[];
  authorityCertSerialNumber?: Uint8Array;
}

export interface KeyUsage {
  digitalSignature: boolean;
  nonRepudiation: boolean;
  keyEncipherment: boolean;
  dataEncipherment: boolean;
  keyAgreement: boolean;
  keyCertSign: boolean;
  cRLSign: boolean;
  encipherOnly: boolean;
  decipherOnly: boolean;
}

export interface PolicyQualifierInfo {
  policyQualifierId: string;
  qualifier: DerObject;
}

export interface PolicyInformation {
  policyIdentifier: string;
  policyQualifiers?: PolicyQualifierInfo[];
}

export interface PolicyMapping {
  issuerDomainPolicy: string;
  subjectDomainPolicy: string;
}

export interface BasicConstraints {
  ca: boolean;
  pathLenConstraint?: number;
}

export interface GeneralSubtree {
  base: GeneralName;
  minimum: number;
  maximum?: number;
}

export interface NameConstraints {
  permittedSubtrees?: GeneralSubtree[];
  excludedSubtrees?: GeneralSubtree[];
}

export interface PolicyConstraints {
  requireExplicitPolicy?: number;
  inhibitPolicyMapping?: number;
}

export interface ExtendedKeyUsage {
  keyPurposes: string[];
}

export type DistributionPointName =
  | { type: "fullName"; value: GeneralName[] }
  | { type: "nameRelativeToCrlIssuer"; value: RelativeDistinguishedName };

export interface DistributionPoint {
  distributionPoint?: DistributionPointName;
  /** ReasonFlags bit string. */
  reasons?: Uint8Array;
  crlIssuer?: GeneralName[];
}

export interface AccessDescription {
  accessMethod: string;
  accessLocation: GeneralName;
}

export interface InhibitAnyPolicy {
  skipCerts: number;
}

/** CRLReason ::= ENUMERATED */
export const ReasonCode = {
  Unspecified: 0,
  KeyCompromise: 1,
  CACompromise: 2,
  AffiliationChanged: 3,
  Superseded: 4,
  CessationOfOperation: 5,
  CertificateHold: 6,
  RemoveFromCRL: 8,
  PrivilegeWithdrawn: 9,
  AACompromise: 10,
} as const;
export type ReasonCode = (typeof ReasonCode)[keyof typeof ReasonCode];

export type ParsedExtension =
  | { kind: "authorityKeyIdentifier"; value: AuthorityKeyIdentifier }
  | { kind: "subjectKeyIdentifier"; value: Uint8Array }
  | { kind: "keyUsage"; value: KeyUsage }
  | { kind: "certificatePolicies"; value: PolicyInformation[] }
  | { kind: "policyMappings"; value: PolicyMapping[] }
  | { kind: "subjectAlternativeName"; value: GeneralName[] }
  | { kind: "issuerAlternativeName"; value: GeneralName[] }
  | { kind: "basicConstraints"; value: BasicConstraints }
  | { kind: "nameConstraints"; value: NameConstraints }
  | { kind: "policyConstraints"; value: PolicyConstraints }
  | { kind: "extendedKeyUsage"; value: ExtendedKeyUsage }
  | { kind: "crlDistributionPoints"; value: DistributionPoint[] }
  | { kind: "freshestCrl"; value: DistributionPoint[] }
  | { kind: "inhibitAnyPolicy"; value: InhibitAnyPolicy }
  | { kind: "authorityInfoAccess"; value: AccessDescription[] }
  | { kind: "subjectInfoAccess"; value: AccessDescription[] }
  | { kind: "crlNumber"; value: bigint }
  | { kind: "deltaCrlIndicator"; value: bigint }
  | { kind: "reasonCode"; value: number }
  | { kind: "invalidityDate"; value: ASN1Time }
  | { kind: "certificateIssuer"; value: GeneralName[] }
  /** SignedCertificateTimestampList entries, TLS-encoded. */
  | { kind: "signedCertificateTimestamps"; value: Uint8Array[] }
  | { kind: "unsupported"; error?: X509Error };

export type ParsedExtensionKind = ParsedExtension["kind"];
export type KnownExtensionKind = Exclude<ParsedExtensionKind, "unsupported">;

export type ExtensionValue<K extends KnownExtensionKind> = Extract<
  ParsedExtension,
  { kind: K }
>["value"];

/** A typed extension value together with its criticality. */
export interface ExtensionView<T> {
  critical: boolean;
  value: T;
}
