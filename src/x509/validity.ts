import { X509ErrorCode, decodeField } from "../common/errors.js";
import { DerResult } from "../common/types.js";
import { readSequence } from "../parser/der-reader.js";
import { ASN1Time, readTime } from "./time.js";

/**
 * Validity ::= SEQUENCE { notBefore Time, notAfter Time }
 *
 * The period is half-open: valid from `notBefore` up to, but not
 * including, `notAfter`.
 */
export class Validity {
  public constructor(
    public readonly notBefore: ASN1Time,
    public readonly notAfter: ASN1Time,
  ) {}

  public static fromDer(input: Uint8Array): DerResult<Validity> {
    return parseValidity(input);
  }

  public isValidAt(time: ASN1Time): boolean {
    return !time.isBefore(this.notBefore) && time.isBefore(this.notAfter);
  }

  public isValid(): boolean {
    return this.isValidAt(ASN1Time.now());
  }

  /**
   * Milliseconds left before `notAfter`, or undefined when `now` falls
   * outside the validity period (expired or not yet valid).
   */
  public timeToExpiration(now: ASN1Time = ASN1Time.now()): number | undefined {
    if (!this.isValidAt(now)) return undefined;
    return this.notAfter.diff(now);
  }
}

export function parseValidity(input: Uint8Array): DerResult<Validity> {
  return decodeField(X509ErrorCode.InvalidValidity, "Validity", () =>
    readSequence(
      input,
      (content) => {
        const notBefore = readTime(content, "notBefore");
        const notAfter = readTime(notBefore.rest, "notAfter");
        return {
          value: new Validity(notBefore.value, notAfter.value),
          rest: notAfter.rest,
        };
      },
      "Validity",
    ),
  );
}
