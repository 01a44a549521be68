import { X509Error, X509ErrorCode } from "../common/errors.js";
import { DerResult } from "../common/types.js";
import { X509Certificate, parseX509Certificate } from "./certificate.js";

export interface PemBlock {
  readonly label: string;
  readonly contents: Uint8Array;
}

const BEGIN = /^-----BEGIN ([A-Z0-9 ]+)-----$/;
const END = /^-----END ([A-Z0-9 ]+)-----$/;
const BASE64_LINE = /^[A-Za-z0-9+/]*={0,2}$/;

function decodeBase64(body: string, label: string): Uint8Array {
  if (body.length % 4 !== 0 || !BASE64_LINE.test(body)) {
    throw new X509Error(X509ErrorCode.InvalidPem, `Bad base64 in ${label} block`);
  }
  const buf = Buffer.from(body, "base64");
  return new Uint8Array(buf.buffer, buf.byteOffset, buf.byteLength);
}

/**
 * Extract every `-----BEGIN X-----` / `-----END X-----` block from `text`.
 * Text outside the blocks is ignored, as are RFC 1421 header lines
 * (`Key: value`) at the start of a block.
 */
export function parsePem(text: string): PemBlock[] {
  const blocks: PemBlock[] = [];
  let label: string | undefined;
  let body: string[] = [];

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (label === undefined) {
      const begin = BEGIN.exec(line);
      if (begin) {
        label = begin[1];
        body = [];
      }
      continue;
    }
    const end = END.exec(line);
    if (end) {
      if (end[1] !== label) {
        throw new X509Error(
          X509ErrorCode.InvalidPem,
          `BEGIN ${label} closed by END ${end[1]}`,
        );
      }
      blocks.push({ label, contents: decodeBase64(body.join(""), label) });
      label = undefined;
      continue;
    }
    if (line === "" || line.includes(":")) continue;
    body.push(line);
  }

  if (label !== undefined) {
    throw new X509Error(X509ErrorCode.InvalidPem, `Missing END ${label} line`);
  }
  return blocks;
}

/** Decode the first CERTIFICATE block of a PEM document. */
export function parseX509Pem(text: string): DerResult<X509Certificate> {
  const block = parsePem(text).find((b) => b.label === "CERTIFICATE");
  if (block === undefined) {
    throw new X509Error(X509ErrorCode.InvalidPem, "No CERTIFICATE block found");
  }
  return parseX509Certificate(block.contents);
}
