import { concat, der, fromHexString } from "./der.js";

export const OID = {
  commonName: "2.5.4.3",
  country: "2.5.4.6",
  stateOrProvince: "2.5.4.8",
  organization: "2.5.4.10",
  ecdsaWithSha256: "1.2.840.10045.4.3.2",
  ecPublicKey: "1.2.840.10045.2.1",
  prime256v1: "1.2.840.10045.3.1.7",
  basicConstraints: "2.5.29.19",
  keyUsage: "2.5.29.15",
  subjectKeyIdentifier: "2.5.29.14",
  subjectAltName: "2.5.29.17",
  nameConstraints: "2.5.29.30",
  policyMappings: "2.5.29.33",
  authorityKeyIdentifier: "2.5.29.35",
  policyConstraints: "2.5.29.36",
  extKeyUsage: "2.5.29.37",
  inhibitAnyPolicy: "2.5.29.54",
  invalidityDate: "2.5.29.24",
  crlNumber: "2.5.29.20",
  reasonCode: "2.5.29.21",
  extensionRequest: "1.2.840.113549.1.9.14",
  challengePassword: "1.2.840.113549.1.9.7",
  /** Private arc, never registered. */
  unknownExtension: "1.3.6.1.4.1.99999.1",
} as const;

export type Rdn = Array<[oid: string, value: Uint8Array]>;

export function name(...rdns: Rdn[]): Uint8Array {
  return der.seq(
    ...rdns.map((rdn) =>
      der.set(...rdn.map(([oid, value]) => der.seq(der.oid(oid), value))),
    ),
  );
}

/** C=FR, ST=Some-State, O=Internet Widgits Pty Ltd, CN=Test CA */
export const DEFAULT_NAME = name(
  [[OID.country, der.printable("FR")]],
  [[OID.stateOrProvince, der.utf8("Some-State")]],
  [[OID.organization, der.utf8("Internet Widgits Pty Ltd")]],
  [[OID.commonName, der.utf8("Test CA")]],
);

export const ECDSA_SHA256 = der.seq(der.oid(OID.ecdsaWithSha256));

export const EC_SPKI = der.seq(
  der.seq(der.oid(OID.ecPublicKey), der.oid(OID.prime256v1)),
  der.bitString(fromHexString("04" + "11".repeat(64))),
);

export const SIGNATURE = der.bitString(fromHexString("3006020101020102"));

export function extension(oid: string, value: Uint8Array, critical?: boolean): Uint8Array {
  return critical === undefined
    ? der.seq(der.oid(oid), der.octetString(value))
    : der.seq(der.oid(oid), der.bool(critical), der.octetString(value));
}

export interface TbsOptions {
  /** Explicit version number; `null` omits the `[0]` field. */
  version?: number | null;
  serial?: Uint8Array;
  issuer?: Uint8Array;
  notBefore?: Uint8Array;
  notAfter?: Uint8Array;
  subject?: Uint8Array;
  issuerUid?: Uint8Array;
  subjectUid?: Uint8Array;
  extensions?: Uint8Array[];
  /** Bytes appended after the last field, inside the TBS SEQUENCE. */
  trailing?: Uint8Array;
}

export function buildTbsCertificate(opts: TbsOptions = {}): Uint8Array {
  const version = opts.version === undefined ? 2 : opts.version;
  const parts: Uint8Array[] = [];
  if (version !== null) parts.push(der.explicit(0, der.int(version)));
  parts.push(
    opts.serial ?? der.int(0x1234abcd),
    ECDSA_SHA256,
    opts.issuer ?? DEFAULT_NAME,
    der.seq(
      opts.notBefore ?? der.utcTime("240101000000Z"),
      opts.notAfter ?? der.utcTime("340101000000Z"),
    ),
    opts.subject ?? DEFAULT_NAME,
    EC_SPKI,
  );
  if (opts.issuerUid) parts.push(opts.issuerUid);
  if (opts.subjectUid) parts.push(opts.subjectUid);
  if (opts.extensions) parts.push(der.explicit(3, der.seq(...opts.extensions)));
  if (opts.trailing) parts.push(opts.trailing);
  return der.seq(...parts);
}

export function buildCertificate(opts: TbsOptions = {}): { der: Uint8Array; tbs: Uint8Array } {
  const tbs = buildTbsCertificate(opts);
  return { der: der.seq(tbs, ECDSA_SHA256, SIGNATURE), tbs };
}

export interface CrlOptions {
  version?: number | null;
  nextUpdate?: Uint8Array | null;
  revoked?: Uint8Array[] | null;
  extensions?: Uint8Array[];
}

export function revokedEntry(
  serial: number,
  date: string,
  extensions?: Uint8Array[],
): Uint8Array {
  return extensions
    ? der.seq(der.int(serial), der.utcTime(date), der.seq(...extensions))
    : der.seq(der.int(serial), der.utcTime(date));
}

export function buildCrl(opts: CrlOptions = {}): { der: Uint8Array; tbs: Uint8Array } {
  const version = opts.version === undefined ? 1 : opts.version;
  const parts: Uint8Array[] = [];
  if (version !== null) parts.push(der.int(version));
  parts.push(ECDSA_SHA256, DEFAULT_NAME, der.utcTime("240301000000Z"));
  const next = opts.nextUpdate === undefined ? der.utcTime("240401000000Z") : opts.nextUpdate;
  if (next !== null) parts.push(next);
  if (opts.revoked) parts.push(der.seq(...opts.revoked));
  if (opts.extensions) parts.push(der.explicit(0, der.seq(...opts.extensions)));
  const tbs = der.seq(...parts);
  return { der: der.seq(tbs, ECDSA_SHA256, SIGNATURE), tbs };
}

export function attribute(oid: string, ...values: Uint8Array[]): Uint8Array {
  return der.seq(der.oid(oid), der.set(...values));
}

/** `attributes` of null omits the `[0]` field. */
export function buildCsr(
  attributes: Uint8Array[] | null = [],
): { der: Uint8Array; info: Uint8Array } {
  const parts = [der.int(0), DEFAULT_NAME, EC_SPKI];
  if (attributes !== null) parts.push(der.implicit(0, concat(...attributes), true));
  const info = der.seq(...parts);
  return { der: der.seq(info, ECDSA_SHA256, SIGNATURE), info };
}
