export { BasicTLVParser } from "./basic-parser.js";
export * from "./der-reader.js";
export { Schema, SchemaParser } from "./schema-parser.js";
export type { ParsedResult, SchemaParserOptions } from "./schema-parser.js";
export { TagClass, UniversalTag } from "../common/types.js";
export type { DerObject, DerResult, TLVResult, TagInfo } from "../common/types.js";
