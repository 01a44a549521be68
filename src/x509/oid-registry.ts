import registryJson from "./oid-registry.json" with { type: "json" };

export interface OidEntry {
  readonly abbrev: string;
  readonly description: string;
}

const REGISTRY: ReadonlyMap<string, OidEntry> = Object.freeze(
  new Map<string, OidEntry>(
    Object.entries(registryJson).map(([oid, entry]) => [
      oid,
      Object.freeze({ abbrev: entry.abbrev, description: entry.description }),
    ]),
  ),
);

/** Short name of an OID (e.g. "CN" for 2.5.4.3). */
export function oidToAbbreviation(oid: string): string | undefined {
  return REGISTRY.get(oid)?.abbrev;
}

export function oidToDescription(oid: string): string | undefined {
  return REGISTRY.get(oid)?.description;
}

/** Well-known OIDs referenced by the decoders. */
export const Oid = {
  CommonName: "2.5.4.3",
  Country: "2.5.4.6",
  Locality: "2.5.4.7",
  StateOrProvince: "2.5.4.8",
  Organization: "2.5.4.10",
  OrganizationalUnit: "2.5.4.11",
  EmailAddress: "1.2.840.113549.1.9.1",
  ChallengePassword: "1.2.840.113549.1.9.7",
  ExtensionRequest: "1.2.840.113549.1.9.14",

  SubjectKeyIdentifier: "2.5.29.14",
  KeyUsage: "2.5.29.15",
  SubjectAltName: "2.5.29.17",
  IssuerAltName: "2.5.29.18",
  BasicConstraints: "2.5.29.19",
  CrlNumber: "2.5.29.20",
  ReasonCode: "2.5.29.21",
  InvalidityDate: "2.5.29.24",
  DeltaCrlIndicator: "2.5.29.27",
  CertificateIssuer: "2.5.29.29",
  NameConstraints: "2.5.29.30",
  CrlDistributionPoints: "2.5.29.31",
  CertificatePolicies: "2.5.29.32",
  PolicyMappings: "2.5.29.33",
  AuthorityKeyIdentifier: "2.5.29.35",
  PolicyConstraints: "2.5.29.36",
  ExtendedKeyUsage: "2.5.29.37",
  FreshestCrl: "2.5.29.46",
  InhibitAnyPolicy: "2.5.29.54",
  AuthorityInfoAccess: "1.3.6.1.5.5.7.1.1",
  SubjectInfoAccess: "1.3.6.1.5.5.7.1.11",
  SignedCertificateTimestamps: "1.3.6.1.4.1.11129.2.4.2",
} as const;
