export const X509ErrorCode = {
  Truncated: "Truncated",
  InvalidTag: "InvalidTag",
  InvalidLength: "InvalidLength",
  InvalidValue: "InvalidValue",
  InvalidVersion: "InvalidVersion",
  InvalidSerialNumber: "InvalidSerialNumber",
  InvalidName: "InvalidName",
  InvalidAlgorithmIdentifier: "InvalidAlgorithmIdentifier",
  InvalidSubjectPublicKeyInfo: "InvalidSubjectPublicKeyInfo",
  InvalidValidity: "InvalidValidity",
  InvalidDate: "InvalidDate",
  InvalidIssuerUid: "InvalidIssuerUid",
  InvalidSubjectUid: "InvalidSubjectUid",
  InvalidExtensions: "InvalidExtensions",
  InvalidAttributes: "InvalidAttributes",
  DuplicateExtension: "DuplicateExtension",
  DuplicateAttribute: "DuplicateAttribute",
  UnsupportedCriticalExtension: "UnsupportedCriticalExtension",
  InvalidSignatureValue: "InvalidSignatureValue",
  InvalidTbs: "InvalidTbs",
  InvalidCertificate: "InvalidCertificate",
  InvalidCertificateList: "InvalidCertificateList",
  InvalidCertificationRequest: "InvalidCertificationRequest",
  MaxDepthExceeded: "MaxDepthExceeded",
  InvalidPem: "InvalidPem",
} as const;
export type X509ErrorCode = (typeof X509ErrorCode)[keyof typeof X509ErrorCode];

export class X509Error extends Error {
  public readonly code: X509ErrorCode;

  public constructor(
    code: X509ErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`${code}: ${message}`, options);
    this.name = "X509Error";
    this.code = code;
  }
}

// Codes raised by the primitive readers that say nothing about which field failed.
const GENERIC_CODES: ReadonlySet<X509ErrorCode> = new Set([
  X509ErrorCode.InvalidTag,
  X509ErrorCode.InvalidValue,
]);

/**
 * Run a field decoder, re-throwing generic tag/content errors under the
 * field's own code. Structural errors (truncation, bad lengths, depth) and
 * errors already tagged with a field code pass through unchanged.
 */
export function decodeField<T>(
  code: X509ErrorCode,
  field: string,
  decode: () => T,
): T {
  try {
    return decode();
  } catch (err) {
    if (err instanceof X509Error && !GENERIC_CODES.has(err.code)) {
      throw err;
    }
    const reason = err instanceof Error ? err.message : String(err);
    throw new X509Error(code, `failed to decode ${field}: ${reason}`, {
      cause: err,
    });
  }
}
