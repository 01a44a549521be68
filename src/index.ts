export * from "./common/index.js";
export * from "./x509/index.js";
export { BasicTLVParser, Schema, SchemaParser } from "./parser/index.js";
export type { ParsedResult, SchemaParserOptions } from "./parser/index.js";
