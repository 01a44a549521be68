// tests/integration/x509/certificate.test.ts
import { describe, expect, it } from "vitest";
import assert from "assert";
import { X509Certificate, parseX509Certificate } from "../../../src/x509/certificate.js";
import { X509Version, formatVersion } from "../../../src/x509/fields.js";
import { algorithmName } from "../../../src/x509/algorithm.js";
import { toHex } from "../../../src/common/codecs.js";
import { X509ErrorCode } from "../../../src/common/errors.js";
import { concat, der, fromHexString } from "../../helpers/der.js";
import { expectX509Error } from "../../helpers/errors.js";
import { readPemFixture } from "../../helpers/fixtures.js";
import { OID, buildCertificate, extension } from "../../helpers/x509.js";

const ascii = (s: string): Uint8Array => new TextEncoder().encode(s);

describe("X509Certificate: fixture", () => {
  const encoded = readPemFixture("ca.pem");
  const { value: cert, rest } = parseX509Certificate(encoded);

  it("consumes the whole encoding", () => {
    assert.strictEqual(encoded.byteLength, 534);
    assert.strictEqual(rest.byteLength, 0);
    assert.strictEqual(cert.raw.byteLength, 534);
  });

  it("tbsCertificate.raw is exactly the signed span", () => {
    assert.deepStrictEqual(Array.from(cert.tbsCertificate.raw), Array.from(encoded.subarray(4, 448)));
  });

  it("reads the header fields", () => {
    assert.strictEqual(cert.version, X509Version.V3);
    assert.strictEqual(formatVersion(cert.version), "V3");
    assert.strictEqual(cert.serial, 305441741n);
    assert.strictEqual(cert.rawSerialAsString(), "12:34:ab:cd");
    assert.strictEqual(algorithmName(cert.signatureAlgorithm), "ecdsa-with-SHA256");
    assert.strictEqual(cert.tbsCertificate.signature.algorithm, cert.signatureAlgorithm.algorithm);
    const dn = "C=FR, ST=Some-State, O=Internet Widgits Pty Ltd, CN=Test CA";
    assert.strictEqual(cert.issuer.toString(), dn);
    assert.strictEqual(cert.subject.toString(), dn);
  });

  it("reads the validity period", () => {
    assert.strictEqual(cert.validity.notBefore.toISOString(), "2026-10-18T20:24:27.000Z");
    assert.strictEqual(cert.validity.notAfter.toISOString(), "2036-10-15T20:24:27.000Z");
  });

  it("reads the public key", () => {
    const spki = cert.publicKey;
    assert.strictEqual(algorithmName(spki.algorithm), "id-ecPublicKey");
    assert.strictEqual(spki.subjectPublicKey.data.byteLength, 65);
    assert.strictEqual(toHex(spki.subjectPublicKey.data.subarray(0, 4)), "04c364c8");
    assert.ok(spki.algorithm.parameters);
    assert.strictEqual(toHex(spki.algorithm.parameters.raw), "06082a8648ce3d030107");
  });

  it("decodes every extension", () => {
    assert.deepStrictEqual(Array.from(cert.extensions.keys()), [
      OID.basicConstraints,
      OID.keyUsage,
      OID.subjectKeyIdentifier,
      OID.subjectAltName,
    ]);
    assert.deepStrictEqual(cert.basicConstraints(), {
      critical: true,
      value: { ca: true, pathLenConstraint: 1 },
    });
    const ku = cert.keyUsage();
    assert.ok(ku);
    assert.strictEqual(ku.critical, true);
    assert.strictEqual(ku.value.keyCertSign, true);
    assert.strictEqual(ku.value.cRLSign, true);
    assert.strictEqual(ku.value.digitalSignature, false);
    const ski = cert.extensions.get(OID.subjectKeyIdentifier)?.parsed;
    assert.ok(ski?.kind === "subjectKeyIdentifier");
    assert.strictEqual(toHex(ski.value), "4f1d4cad0d8766a0046573de28a5da4e1bfae82f");
    assert.deepStrictEqual(cert.subjectAlternativeName(), {
      critical: false,
      value: [
        { type: "dNSName", value: "ca.example.test" },
        { type: "rfc822Name", value: "ca@example.test" },
      ],
    });
    assert.strictEqual(cert.isCA(), true);
    assert.strictEqual(cert.extendedKeyUsage(), undefined);
  });

  it("accepts an ArrayBuffer", () => {
    const copy = new ArrayBuffer(encoded.byteLength);
    new Uint8Array(copy).set(encoded);
    assert.strictEqual(X509Certificate.fromDer(copy).value.rawSerialAsString(), "12:34:ab:cd");
  });
});

describe("X509Certificate: hand-built", () => {
  it("defaults the version to V1 when [0] is absent", () => {
    const { der: input } = buildCertificate({ version: null });
    const { value } = parseX509Certificate(input);
    assert.strictEqual(value.version, X509Version.V1);
    assert.strictEqual(value.serial, 0x1234abcdn);
    assert.strictEqual(value.extensions.size, 0);
    assert.strictEqual(value.isCA(), false);
  });

  it("tbs.raw matches the encoded TBSCertificate", () => {
    const { der: input, tbs } = buildCertificate();
    const { value } = parseX509Certificate(input);
    assert.deepStrictEqual(Array.from(value.tbsCertificate.raw), Array.from(tbs));
  });

  it("returns the bytes after the certificate", () => {
    const { der: input } = buildCertificate();
    const { rest } = parseX509Certificate(concat(input, der.null()));
    assert.deepStrictEqual(Array.from(rest), [0x05, 0x00]);
  });

  it("reads issuer and subject unique identifiers", () => {
    const { der: input } = buildCertificate({
      issuerUid: der.implicit(1, fromHexString("00aa")),
      subjectUid: der.implicit(2, fromHexString("04f0")),
    });
    const tbs = parseX509Certificate(input).value.tbsCertificate;
    assert.deepStrictEqual(Array.from(tbs.issuerUid?.data ?? []), [0xaa]);
    assert.strictEqual(tbs.subjectUid?.unusedBits, 4);
  });

  it("a bad unique identifier is InvalidIssuerUid", () => {
    const { der: input } = buildCertificate({ issuerUid: der.implicit(1, fromHexString("08")) });
    expectX509Error(() => parseX509Certificate(input), X509ErrorCode.InvalidIssuerUid);
  });

  it("exposes typed views of the standard extensions", () => {
    const { der: input } = buildCertificate({
      extensions: [
        extension(OID.basicConstraints, der.seq(der.bool(true), der.int(0)), true),
        extension(OID.extKeyUsage, der.seq(der.oid("1.3.6.1.5.5.7.3.1"))),
        extension(OID.policyConstraints, der.seq(der.implicit(0, fromHexString("01")))),
        extension(OID.inhibitAnyPolicy, der.int(0), true),
        extension(OID.policyMappings, der.seq(der.seq(der.oid("1.2.3.1"), der.oid("1.2.3.2")))),
        extension(
          OID.nameConstraints,
          der.seq(der.implicit(0, der.seq(der.implicit(2, ascii("example.test"))), true)),
          true,
        ),
      ],
    });
    const cert = parseX509Certificate(input).value;
    assert.strictEqual(cert.isCA(), true);
    assert.deepStrictEqual(cert.basicConstraints()?.value, { ca: true, pathLenConstraint: 0 });
    assert.deepStrictEqual(cert.extendedKeyUsage(), {
      critical: false,
      value: { keyPurposes: ["1.3.6.1.5.5.7.3.1"] },
    });
    assert.deepStrictEqual(cert.policyConstraints()?.value, { requireExplicitPolicy: 1 });
    assert.deepStrictEqual(cert.inhibitAnyPolicy(), { critical: true, value: { skipCerts: 0 } });
    assert.deepStrictEqual(cert.policyMappings()?.value, [
      { issuerDomainPolicy: "1.2.3.1", subjectDomainPolicy: "1.2.3.2" },
    ]);
    assert.strictEqual(cert.nameConstraints()?.value.permittedSubtrees?.length, 1);
  });

  it("keeps an unknown non-critical extension as unsupported", () => {
    const { der: input } = buildCertificate({
      extensions: [extension(OID.unknownExtension, fromHexString("0c026869"))],
    });
    const ext = parseX509Certificate(input).value.extensions.get(OID.unknownExtension);
    assert.ok(ext);
    assert.strictEqual(ext.parsed.kind, "unsupported");
    assert.strictEqual(toHex(ext.value), "0c026869");
  });
});

describe("X509Certificate: rejected input", () => {
  it("truncated input is Truncated", () => {
    const { der: input } = buildCertificate();
    expectX509Error(() => parseX509Certificate(input.subarray(0, input.byteLength - 1)), X509ErrorCode.Truncated);
    expectX509Error(() => parseX509Certificate(new Uint8Array(0)), X509ErrorCode.Truncated);
  });

  it("an indefinite length is InvalidLength", () => {
    expectX509Error(() => parseX509Certificate(fromHexString("30800000")), X509ErrorCode.InvalidLength);
  });

  it("a repeated extension is DuplicateExtension", () => {
    const bc = extension(OID.basicConstraints, der.seq());
    const { der: input } = buildCertificate({ extensions: [bc, bc] });
    expectX509Error(() => parseX509Certificate(input), X509ErrorCode.DuplicateExtension);
  });

  it("an unknown critical extension is UnsupportedCriticalExtension", () => {
    const { der: input } = buildCertificate({
      extensions: [extension(OID.unknownExtension, der.null(), true)],
    });
    expectX509Error(() => parseX509Certificate(input), X509ErrorCode.UnsupportedCriticalExtension);
  });

  it("trailing bytes inside TBSCertificate are InvalidTbs", () => {
    const { der: input } = buildCertificate({ trailing: der.null() });
    const err = expectX509Error(() => parseX509Certificate(input), X509ErrorCode.InvalidTbs);
    expect(err.message).toContain("trailing byte(s) inside TBSCertificate");
  });

  it("field errors carry the field's code", () => {
    expectX509Error(
      () => parseX509Certificate(buildCertificate({ serial: der.null() }).der),
      X509ErrorCode.InvalidSerialNumber,
    );
    expectX509Error(
      () => parseX509Certificate(buildCertificate({ issuer: der.set() }).der),
      X509ErrorCode.InvalidName,
    );
    expectX509Error(
      () => parseX509Certificate(buildCertificate({ notBefore: der.utcTime("240230000000Z") }).der),
      X509ErrorCode.InvalidDate,
    );
  });

  it("a non-SEQUENCE certificate is InvalidCertificate", () => {
    expectX509Error(() => parseX509Certificate(der.set()), X509ErrorCode.InvalidCertificate);
  });
});
