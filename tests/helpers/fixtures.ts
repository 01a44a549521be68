import { readFileSync } from "node:fs";

import { parsePem } from "../../src/x509/pem.js";

export function readFixture(file: string): string {
  return readFileSync(new URL(`../fixtures/${file}`, import.meta.url), "utf8");
}

/** DER contents of the first PEM block in a fixture file. */
export function readPemFixture(file: string): Uint8Array {
  const [block] = parsePem(readFixture(file));
  return block.contents;
}
