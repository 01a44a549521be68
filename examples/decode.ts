/**
 * X.509 Decoding Example
 *
 * Prints the contents of a certificate, CRL or certification request.
 *
 * Usage:
 *   tsx examples/decode.ts <file> [cert|crl|csr]
 *
 * PEM input picks the structure from its BEGIN label; DER input uses the
 * second argument (default: cert).
 */

import { readFile } from "node:fs/promises";

import {
  CertificateRevocationList,
  CertificationRequest,
  Extensions,
  X509Certificate,
  algorithmName,
  formatVersion,
  oidToDescription,
  parseCertificateList,
  parseCertificationRequest,
  parsePem,
  parseX509Certificate,
  toHex,
} from "../src/index.js";

type Kind = "cert" | "crl" | "csr";

const PEM_LABELS: Record<string, Kind | undefined> = {
  CERTIFICATE: "cert",
  "X509 CRL": "crl",
  "CERTIFICATE REQUEST": "csr",
  "NEW CERTIFICATE REQUEST": "csr",
};

function printExtensions(extensions: Extensions): void {
  if (extensions.size === 0) return;
  console.log("\n=== Extensions ===");
  for (const ext of extensions.values()) {
    const name = oidToDescription(ext.oid) ?? ext.oid;
    const critical = ext.critical ? " (Critical)" : "";
    console.log(`${name}${critical}:`);
    if (ext.parsed.kind === "unsupported") {
      console.log(`  Value (hex): ${toHex(ext.value)}`);
    } else {
      console.log(`  ${ext.parsed.kind}: ${JSON.stringify(ext.parsed.value, replacer)}`);
    }
  }
}

// JSON.stringify cannot print bigint or byte arrays on its own.
function replacer(_key: string, value: unknown): unknown {
  if (typeof value === "bigint") return value.toString();
  if (value instanceof Uint8Array) return toHex(value);
  return value;
}

function printCertificate(cert: X509Certificate): void {
  console.log("=== Certificate Information ===\n");
  console.log(`Version: ${formatVersion(cert.version)}`);
  console.log(`Serial Number: ${cert.rawSerialAsString()}`);
  console.log(`Signature Algorithm: ${algorithmName(cert.signatureAlgorithm)}`);
  console.log(`Issuer: ${cert.issuer}`);
  console.log("\nValidity:");
  console.log(`  Not Before: ${cert.validity.notBefore}`);
  console.log(`  Not After:  ${cert.validity.notAfter}`);
  console.log(`\nSubject: ${cert.subject}`);
  console.log(`\nPublic Key Algorithm: ${algorithmName(cert.publicKey.algorithm)}`);
  console.log(`CA: ${cert.isCA()}`);
  printExtensions(cert.extensions);
}

function printCrl(crl: CertificateRevocationList): void {
  console.log("=== Certificate Revocation List ===\n");
  console.log(`Issuer: ${crl.issuer}`);
  console.log(`Last Update: ${crl.lastUpdate}`);
  console.log(`Next Update: ${crl.nextUpdate ?? "(none)"}`);
  console.log(`CRL Number: ${crl.crlNumber()?.value ?? "(none)"}`);
  console.log(`\nRevoked Certificates: ${crl.revokedCertificates.length}`);
  for (const entry of crl.revokedCertificates) {
    const reason = entry.reasonCode()?.value;
    console.log(
      `  ${entry.rawSerialAsString()} revoked ${entry.revocationDate}` +
        (reason !== undefined ? ` (reason ${reason})` : ""),
    );
  }
  printExtensions(crl.extensions);
}

function printCsr(csr: CertificationRequest): void {
  console.log("=== Certification Request ===\n");
  console.log(`Subject: ${csr.subject}`);
  console.log(`Public Key Algorithm: ${algorithmName(csr.publicKey.algorithm)}`);
  console.log(`Signature Algorithm: ${algorithmName(csr.signatureAlgorithm)}`);
  const requested = csr.requestedExtensions();
  if (requested) printExtensions(requested);
}

function decode(kind: Kind, der: Uint8Array): void {
  switch (kind) {
    case "cert":
      printCertificate(parseX509Certificate(der).value);
      return;
    case "crl":
      printCrl(parseCertificateList(der).value);
      return;
    case "csr":
      printCsr(parseCertificationRequest(der).value);
      return;
  }
}

function isKind(value: string): value is Kind {
  return value === "cert" || value === "crl" || value === "csr";
}

async function main() {
  const [file, kindArg = "cert"] = process.argv.slice(2);
  if (file === undefined || !isKind(kindArg)) {
    console.error("Usage: tsx examples/decode.ts <file> [cert|crl|csr]");
    process.exitCode = 2;
    return;
  }

  const data = new Uint8Array(await readFile(file));
  const text = new TextDecoder().decode(data);
  if (text.includes("-----BEGIN ")) {
    for (const block of parsePem(text)) {
      const kind = PEM_LABELS[block.label];
      if (kind === undefined) {
        console.log(`Skipping ${block.label} block`);
        continue;
      }
      decode(kind, block.contents);
    }
  } else {
    decode(kindArg, data);
  }

  console.log("\n=== Decoding Complete ===");
}

main().catch((err) => {
  console.error("Failed to decode:", err);
  process.exit(1);
});
