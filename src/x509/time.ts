import { decodeAscii } from "../common/codecs.js";
import { X509Error, X509ErrorCode } from "../common/errors.js";
import { DerResult, TagClass, UniversalTag } from "../common/types.js";
import { BasicTLVParser } from "../parser/basic-parser.js";

const UTC_TIME = /^(\d{2})(\d{2})(\d{2})(\d{2})(\d{2})(\d{2})?(Z|[+-]\d{4})$/;
const GENERALIZED_TIME =
  /^(\d{4})(\d{2})(\d{2})(\d{2})(\d{2})(\d{2})(?:\.(\d+))?(Z|[+-]\d{4})$/;

/**
 * A point in time decoded from UTCTime or GeneralizedTime, held as
 * milliseconds since the Unix epoch (UTC).
 */
export class ASN1Time {
  public readonly epochMillis: number;

  public constructor(epochMillis: number) {
    if (!Number.isFinite(epochMillis)) {
      throw new X509Error(X509ErrorCode.InvalidDate, `Not a finite time: ${epochMillis}`);
    }
    this.epochMillis = epochMillis;
  }

  public static now(): ASN1Time {
    return new ASN1Time(Date.now());
  }

  public static fromDate(date: Date): ASN1Time {
    return new ASN1Time(date.getTime());
  }

  /** UTCTime content octets. Two-digit years below 50 are 20YY, others 19YY. */
  public static fromUtcTime(content: Uint8Array): ASN1Time {
    const text = asciiOrInvalidDate(content);
    const m = UTC_TIME.exec(text);
    if (!m) {
      throw new X509Error(X509ErrorCode.InvalidDate, `Malformed UTCTime "${text}"`);
    }
    const yy = Number(m[1]);
    const year = yy < 50 ? 2000 + yy : 1900 + yy;
    return build(text, year, m[2], m[3], m[4], m[5], m[6] ?? "00", undefined, m[7]);
  }

  public static fromGeneralizedTime(content: Uint8Array): ASN1Time {
    const text = asciiOrInvalidDate(content);
    const m = GENERALIZED_TIME.exec(text);
    if (!m) {
      throw new X509Error(
        X509ErrorCode.InvalidDate,
        `Malformed GeneralizedTime "${text}"`,
      );
    }
    return build(text, Number(m[1]), m[2], m[3], m[4], m[5], m[6], m[7], m[8]);
  }

  public compare(other: ASN1Time): number {
    return Math.sign(this.epochMillis - other.epochMillis);
  }

  public isBefore(other: ASN1Time): boolean {
    return this.epochMillis < other.epochMillis;
  }

  public isAfter(other: ASN1Time): boolean {
    return this.epochMillis > other.epochMillis;
  }

  public equals(other: ASN1Time): boolean {
    return this.epochMillis === other.epochMillis;
  }

  public add(millis: number): ASN1Time {
    return new ASN1Time(this.epochMillis + millis);
  }

  /** `this - other`, in milliseconds. */
  public diff(other: ASN1Time): number {
    return this.epochMillis - other.epochMillis;
  }

  public toDate(): Date {
    return new Date(this.epochMillis);
  }

  public toISOString(): string {
    return this.toDate().toISOString();
  }

  public toString(): string {
    return this.toISOString();
  }
}

function asciiOrInvalidDate(content: Uint8Array): string {
  try {
    return decodeAscii(content);
  } catch (err) {
    throw new X509Error(X509ErrorCode.InvalidDate, "Time is not ASCII", { cause: err });
  }
}

function build(
  text: string,
  year: number,
  month: string,
  day: string,
  hour: string,
  minute: string,
  second: string,
  fraction: string | undefined,
  zone: string,
): ASN1Time {
  const mo = Number(month);
  const d = Number(day);
  const h = Number(hour);
  const mi = Number(minute);
  const s = Number(second);
  const inRange =
    mo >= 1 &&
    mo <= 12 &&
    d >= 1 &&
    d <= daysInMonth(year, mo) &&
    h <= 23 &&
    mi <= 59 &&
    s <= 59;
  if (!inRange) {
    throw new X509Error(
      X509ErrorCode.InvalidDate,
      `Out-of-range time "${text}"`,
    );
  }
  const ms = fraction === undefined ? 0 : Math.floor(Number(`0.${fraction}`) * 1000);
  let offsetMinutes = 0;
  if (zone !== "Z") {
    const zh = Number(zone.slice(1, 3));
    const zm = Number(zone.slice(3, 5));
    if (zh > 23 || zm > 59) {
      throw new X509Error(X509ErrorCode.InvalidDate, `Bad UTC offset in "${text}"`);
    }
    offsetMinutes = (zone[0] === "-" ? -1 : 1) * (zh * 60 + zm);
  }
  // Date.UTC reads years 0-99 as 1900-1999; setUTCFullYear does not.
  const date = new Date(Date.UTC(2000, 0, 1, h, mi, s, ms));
  date.setUTCFullYear(year, mo - 1, d);
  return new ASN1Time(date.getTime() - offsetMinutes * 60_000);
}

function daysInMonth(year: number, month: number): number {
  if (month === 2) {
    const leap = (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
    return leap ? 29 : 28;
  }
  return month === 4 || month === 6 || month === 9 || month === 11 ? 30 : 31;
}

/** Read a `Time ::= CHOICE { utcTime UTCTime, generalTime GeneralizedTime }`. */
export function readTime(input: Uint8Array, field = "Time"): DerResult<ASN1Time> {
  const tlv = BasicTLVParser.parse(input);
  const rest = input.subarray(tlv.endOffset);
  if (!tlv.tag.constructed && tlv.tag.tagClass === TagClass.Universal) {
    if (tlv.tag.tagNumber === UniversalTag.UtcTime) {
      return { value: ASN1Time.fromUtcTime(tlv.value), rest };
    }
    if (tlv.tag.tagNumber === UniversalTag.GeneralizedTime) {
      return { value: ASN1Time.fromGeneralizedTime(tlv.value), rest };
    }
  }
  throw new X509Error(
    X509ErrorCode.InvalidDate,
    `Expected UTCTime or GeneralizedTime for ${field}, found tag ${tlv.tag.tagNumber}`,
  );
}
