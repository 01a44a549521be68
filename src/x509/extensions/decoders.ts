import {
  decodeBitString,
  decodeBoolean,
  decodeOID,
  decodeSmallUint,
  decodeUnsignedBigInt,
} from "../../common/codecs.js";
import { X509Error, X509ErrorCode } from "../../common/errors.js";
import { BitString, DerResult, TagClass, UniversalTag } from "../../common/types.js";
import {
  readAny,
  readItems,
  readOctetString,
  readOid,
  readOptionalImplicit,
  readSequence,
  readSequenceOf,
} from "../../parser/der-reader.js";
import { Schema, SchemaParser } from "../../parser/schema-parser.js";
import { readRelativeDistinguishedNameContent } from "../name.js";
import { ASN1Time } from "../time.js";
import {
  decodeGeneralNamesContent,
  readGeneralName,
  readGeneralNames,
} from "./general-name.js";
import type {
  AccessDescription,
  AuthorityKeyIdentifier,
  BasicConstraints,
  DistributionPoint,
  DistributionPointName,
  ExtendedKeyUsage,
  GeneralName,
  GeneralSubtree,
  InhibitAnyPolicy,
  KeyUsage,
  NameConstraints,
  PolicyConstraints,
  PolicyInformation,
  PolicyMapping,
  PolicyQualifierInfo,
} from "./types.js";

/** Decode `raw` completely; anything left over is malformed. */
function whole<T>(
  raw: Uint8Array,
  read: (input: Uint8Array) => DerResult<T>,
  field: string,
): T {
  const { value, rest } = read(raw);
  if (rest.byteLength !== 0) {
    throw new X509Error(
      X509ErrorCode.InvalidValue,
      `Unexpected ${rest.byteLength} trailing byte(s) after ${field}`,
    );
  }
  return value;
}

// Schema-driven decoders for the extensions with a flat layout.

const basicConstraintsSchema = Schema.constructed("basicConstraints", {}, [
  Schema.primitive("cA", { tagNumber: UniversalTag.Boolean, optional: true }, decodeBoolean),
  Schema.primitive(
    "pathLenConstraint",
    { tagNumber: UniversalTag.Integer, optional: true },
    decodeSmallUint,
  ),
]);

const keyUsageSchema = Schema.primitive(
  "keyUsage",
  { tagNumber: UniversalTag.BitString },
  decodeBitString,
);

const extendedKeyUsageSchema = Schema.constructed("extendedKeyUsage", {}, [
  Schema.repeated(
    "keyPurposeIds",
    {},
    Schema.primitive("keyPurposeId", { tagNumber: UniversalTag.ObjectIdentifier }, decodeOID),
  ),
]);

const policyMappingsSchema = Schema.constructed("policyMappings", {}, [
  Schema.repeated(
    "mappings",
    {},
    Schema.constructed("mapping", {}, [
      Schema.primitive(
        "issuerDomainPolicy",
        { tagNumber: UniversalTag.ObjectIdentifier },
        decodeOID,
      ),
      Schema.primitive(
        "subjectDomainPolicy",
        { tagNumber: UniversalTag.ObjectIdentifier },
        decodeOID,
      ),
    ]),
  ),
]);

const policyConstraintsSchema = Schema.constructed("policyConstraints", {}, [
  Schema.primitive(
    "requireExplicitPolicy",
    { tagClass: TagClass.ContextSpecific, tagNumber: 0, optional: true },
    decodeSmallUint,
  ),
  Schema.primitive(
    "inhibitPolicyMapping",
    { tagClass: TagClass.ContextSpecific, tagNumber: 1, optional: true },
    decodeSmallUint,
  ),
]);

const skipCertsSchema = Schema.primitive(
  "skipCerts",
  { tagNumber: UniversalTag.Integer },
  decodeSmallUint,
);

const keyIdentifierSchema = Schema.primitive("keyIdentifier", {
  tagNumber: UniversalTag.OctetString,
});

const crlNumberSchema = Schema.primitive(
  "crlNumber",
  { tagNumber: UniversalTag.Integer },
  decodeUnsignedBigInt,
);

const reasonCodeSchema = Schema.primitive(
  "reasonCode",
  { tagNumber: UniversalTag.Enumerated },
  decodeSmallUint,
);

const invalidityDateSchema = Schema.primitive(
  "invalidityDate",
  { tagNumber: UniversalTag.GeneralizedTime },
  (content) => ASN1Time.fromGeneralizedTime(content),
);

export function decodeBasicConstraints(raw: Uint8Array): BasicConstraints {
  const v = new SchemaParser(basicConstraintsSchema).parse(raw);
  const out: BasicConstraints = { ca: v.cA ?? false };
  if (v.pathLenConstraint !== undefined) out.pathLenConstraint = v.pathLenConstraint;
  return out;
}

function isBitSet(bits: BitString, bitIndex: number): boolean {
  const byte = Math.floor(bitIndex / 8);
  const bit = 7 - (bitIndex % 8);
  if (byte >= bits.data.byteLength) return false;
  return (bits.data[byte] & (1 << bit)) !== 0;
}

export function decodeKeyUsage(raw: Uint8Array): KeyUsage {
  const bits = new SchemaParser(keyUsageSchema).parse(raw);
  return {
    digitalSignature: isBitSet(bits, 0),
    nonRepudiation: isBitSet(bits, 1),
    keyEncipherment: isBitSet(bits, 2),
    dataEncipherment: isBitSet(bits, 3),
    keyAgreement: isBitSet(bits, 4),
    keyCertSign: isBitSet(bits, 5),
    cRLSign: isBitSet(bits, 6),
    encipherOnly: isBitSet(bits, 7),
    decipherOnly: isBitSet(bits, 8),
  };
}

export function decodeExtendedKeyUsage(raw: Uint8Array): ExtendedKeyUsage {
  const v = new SchemaParser(extendedKeyUsageSchema).parse(raw);
  return { keyPurposes: v.keyPurposeIds };
}

export function decodePolicyMappings(raw: Uint8Array): PolicyMapping[] {
  const v = new SchemaParser(policyMappingsSchema).parse(raw);
  return v.mappings.map((m) => ({
    issuerDomainPolicy: m.issuerDomainPolicy,
    subjectDomainPolicy: m.subjectDomainPolicy,
  }));
}

export function decodePolicyConstraints(raw: Uint8Array): PolicyConstraints {
  const v = new SchemaParser(policyConstraintsSchema).parse(raw);
  const out: PolicyConstraints = {};
  if (v.requireExplicitPolicy !== undefined) out.requireExplicitPolicy = v.requireExplicitPolicy;
  if (v.inhibitPolicyMapping !== undefined) out.inhibitPolicyMapping = v.inhibitPolicyMapping;
  return out;
}

export function decodeInhibitAnyPolicy(raw: Uint8Array): InhibitAnyPolicy {
  return { skipCerts: new SchemaParser(skipCertsSchema).parse(raw) };
}

export function decodeSubjectKeyIdentifier(raw: Uint8Array): Uint8Array {
  return new SchemaParser(keyIdentifierSchema).parse(raw);
}

export function decodeCrlNumber(raw: Uint8Array): bigint {
  return new SchemaParser(crlNumberSchema).parse(raw);
}

export function decodeReasonCode(raw: Uint8Array): number {
  return new SchemaParser(reasonCodeSchema).parse(raw);
}

export function decodeInvalidityDate(raw: Uint8Array): ASN1Time {
  return new SchemaParser(invalidityDateSchema).parse(raw);
}

// Decoders below walk CHOICE-heavy structures with the positional readers.

export function decodeGeneralNames(raw: Uint8Array): GeneralName[] {
  return whole(raw, readGeneralNames, "GeneralNames");
}

/**
 * AuthorityKeyIdentifier ::= SEQUENCE {
 *   keyIdentifier             [0] KeyIdentifier           OPTIONAL,
 *   authorityCertIssuer       [1] GeneralNames            OPTIONAL,
 *   authorityCertSerialNumber [2] CertificateSerialNumber OPTIONAL }
 */
export function decodeAuthorityKeyIdentifier(raw: Uint8Array): AuthorityKeyIdentifier {
  return whole(
    raw,
    (input) =>
      readSequence(
        input,
        (content) => {
          const keyId = readOptionalImplicit(content, 0, false, "keyIdentifier", (c) => c);
          const issuer = readOptionalImplicit(
            keyId.rest,
            1,
            true,
            "authorityCertIssuer",
            decodeGeneralNamesContent,
          );
          const serial = readOptionalImplicit(
            issuer.rest,
            2,
            false,
            "authorityCertSerialNumber",
            (c) => {
              decodeUnsignedBigInt(c);
              return c;
            },
          );
          const value: AuthorityKeyIdentifier = {};
          if (keyId.value !== undefined) value.keyIdentifier = keyId.value;
          if (issuer.value !== undefined) value.authorityCertIssuer = issuer.value;
          if (serial.value !== undefined) value.authorityCertSerialNumber = serial.value;
          return { value, rest: serial.rest };
        },
        "AuthorityKeyIdentifier",
      ),
    "AuthorityKeyIdentifier",
  );
}

function readPolicyQualifierInfo(input: Uint8Array): DerResult<PolicyQualifierInfo> {
  return readSequence(
    input,
    (content) => {
      const id = readOid(content, "policyQualifierId");
      const qualifier = readAny(id.rest, "qualifier");
      return {
        value: { policyQualifierId: id.value, qualifier: qualifier.value },
        rest: qualifier.rest,
      };
    },
    "PolicyQualifierInfo",
  );
}

function readPolicyInformation(input: Uint8Array): DerResult<PolicyInformation> {
  return readSequence(
    input,
    (content) => {
      const id = readOid(content, "policyIdentifier");
      const value: PolicyInformation = { policyIdentifier: id.value };
      if (id.rest.byteLength === 0) return { value, rest: id.rest };
      const qualifiers = readSequenceOf(id.rest, readPolicyQualifierInfo, "policyQualifiers");
      value.policyQualifiers = qualifiers.value;
      return { value, rest: qualifiers.rest };
    },
    "PolicyInformation",
  );
}

export function decodeCertificatePolicies(raw: Uint8Array): PolicyInformation[] {
  const policies = whole(
    raw,
    (input) => readSequenceOf(input, readPolicyInformation, "certificatePolicies"),
    "certificatePolicies",
  );
  if (policies.length === 0) {
    throw new X509Error(X509ErrorCode.InvalidValue, "certificatePolicies must not be empty");
  }
  return policies;
}

function readGeneralSubtree(input: Uint8Array): DerResult<GeneralSubtree> {
  return readSequence(
    input,
    (content) => {
      const base = readGeneralName(content);
      const min = readOptionalImplicit(base.rest, 0, false, "minimum", decodeSmallUint);
      const max = readOptionalImplicit(min.rest, 1, false, "maximum", decodeSmallUint);
      const value: GeneralSubtree = { base: base.value, minimum: min.value ?? 0 };
      if (max.value !== undefined) value.maximum = max.value;
      return { value, rest: max.rest };
    },
    "GeneralSubtree",
  );
}

function decodeGeneralSubtrees(content: Uint8Array): GeneralSubtree[] {
  return readItems(content, readGeneralSubtree).value;
}

export function decodeNameConstraints(raw: Uint8Array): NameConstraints {
  return whole(
    raw,
    (input) =>
      readSequence(
        input,
        (content) => {
          const permitted = readOptionalImplicit(
            content,
            0,
            true,
            "permittedSubtrees",
            decodeGeneralSubtrees,
          );
          const excluded = readOptionalImplicit(
            permitted.rest,
            1,
            true,
            "excludedSubtrees",
            decodeGeneralSubtrees,
          );
          const value: NameConstraints = {};
          if (permitted.value !== undefined) value.permittedSubtrees = permitted.value;
          if (excluded.value !== undefined) value.excludedSubtrees = excluded.value;
          return { value, rest: excluded.rest };
        },
        "NameConstraints",
      ),
    "NameConstraints",
  );
}

/**
 * DistributionPointName ::= CHOICE {
 *   fullName                [0] GeneralNames,
 *   nameRelativeToCRLIssuer [1] RelativeDistinguishedName }
 */
function decodeDistributionPointName(content: Uint8Array): DistributionPointName {
  const full = readOptionalImplicit(content, 0, true, "fullName", decodeGeneralNamesContent);
  if (full.value !== undefined) {
    if (full.rest.byteLength !== 0) {
      throw new X509Error(X509ErrorCode.InvalidValue, "Trailing bytes after fullName");
    }
    return { type: "fullName", value: full.value };
  }
  const relative = readOptionalImplicit(
    content,
    1,
    true,
    "nameRelativeToCRLIssuer",
    readRelativeDistinguishedNameContent,
  );
  if (relative.value === undefined || relative.rest.byteLength !== 0) {
    throw new X509Error(X509ErrorCode.InvalidValue, "Malformed DistributionPointName");
  }
  return { type: "nameRelativeToCrlIssuer", value: relative.value };
}

function readDistributionPoint(input: Uint8Array): DerResult<DistributionPoint> {
  return readSequence(
    input,
    (content) => {
      const name = readOptionalImplicit(
        content,
        0,
        true,
        "distributionPoint",
        decodeDistributionPointName,
      );
      const reasons = readOptionalImplicit(name.rest, 1, false, "reasons", (c) => {
        decodeBitString(c);
        return c;
      });
      const issuer = readOptionalImplicit(
        reasons.rest,
        2,
        true,
        "cRLIssuer",
        decodeGeneralNamesContent,
      );
      const value: DistributionPoint = {};
      if (name.value !== undefined) value.distributionPoint = name.value;
      if (reasons.value !== undefined) value.reasons = reasons.value;
      if (issuer.value !== undefined) value.crlIssuer = issuer.value;
      return { value, rest: issuer.rest };
    },
    "DistributionPoint",
  );
}

export function decodeCrlDistributionPoints(raw: Uint8Array): DistributionPoint[] {
  return whole(
    raw,
    (input) => readSequenceOf(input, readDistributionPoint, "CRLDistributionPoints"),
    "CRLDistributionPoints",
  );
}

function readAccessDescription(input: Uint8Array): DerResult<AccessDescription> {
  return readSequence(
    input,
    (content) => {
      const method = readOid(content, "accessMethod");
      const location = readGeneralName(method.rest);
      return {
        value: { accessMethod: method.value, accessLocation: location.value },
        rest: location.rest,
      };
    },
    "AccessDescription",
  );
}

export function decodeInfoAccess(raw: Uint8Array): AccessDescription[] {
  return whole(
    raw,
    (input) => readSequenceOf(input, readAccessDescription, "InfoAccessSyntax"),
    "InfoAccessSyntax",
  );
}

/**
 * The extension wraps a TLS-encoded SignedCertificateTimestampList in an
 * OCTET STRING: a 2-byte list length, then 2-byte length-prefixed entries.
 */
export function decodeSignedCertificateTimestamps(raw: Uint8Array): Uint8Array[] {
  const list = whole(
    raw,
    (input) => readOctetString(input, "SignedCertificateTimestampList"),
    "SignedCertificateTimestampList",
  );
  if (list.byteLength < 2) {
    throw new X509Error(X509ErrorCode.InvalidValue, "SCT list is too short");
  }
  const total = (list[0] << 8) | list[1];
  if (total !== list.byteLength - 2) {
    throw new X509Error(
      X509ErrorCode.InvalidValue,
      `SCT list length ${total} does not match ${list.byteLength - 2} available bytes`,
    );
  }
  const entries: Uint8Array[] = [];
  let offset = 2;
  while (offset < list.byteLength) {
    if (offset + 2 > list.byteLength) {
      throw new X509Error(X509ErrorCode.Truncated, "Truncated SCT length");
    }
    const len = (list[offset] << 8) | list[offset + 1];
    const end = offset + 2 + len;
    if (end > list.byteLength) {
      throw new X509Error(X509ErrorCode.Truncated, "Truncated SCT entry");
    }
    entries.push(list.subarray(offset + 2, end));
    offset = end;
  }
  return entries;
}
