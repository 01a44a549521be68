import { X509Error, X509ErrorCode } from "../common/errors.js";
import { TagClass, TagInfo, UniversalTag } from "../common/types.js";
import { BasicTLVParser } from "./basic-parser.js";

type DefaultDecodeType = Uint8Array;
type SchemaOptions = {
  readonly tagClass?: TagClass;
  readonly tagNumber?: number;
  readonly optional?: boolean;
};

type OptionalFlag<O extends SchemaOptions | undefined> = {
  readonly optional: O extends { optional: true } ? true : false;
};

/**
 * Base interface for a TLV schema object.
 */
interface TLVSchemaBase<N extends string = string> {
  readonly name: N;
  readonly tagClass: TagClass;
  readonly tagNumber: number;
  /**
   * When present, this field is optional in a constructed container.
   */
  readonly optional: boolean;
}

/**
 * Interface for defining a primitive TLV schema.
 * @template DecodedType - The type after decoding.
 */
interface PrimitiveTLVSchema<
  N extends string = string,
  DecodedType = DefaultDecodeType,
> extends TLVSchemaBase<N> {
  /**
   * Use a method signature to improve assignability across unions.
   */
  decode(content: Uint8Array): DecodedType;
}

/**
 * Interface for defining a constructed TLV schema.
 * @template F - The array of child field schemas.
 */
interface ConstructedTLVSchema<
  N extends string = string,
  F extends readonly TLVSchema[] = readonly TLVSchema[],
> extends TLVSchemaBase<N> {
  readonly fields: F;
}

// Describes a repeated TLV schema entry (SEQUENCE OF / SET OF items).
interface RepeatedTLVSchema<
  N extends string = string,
  Item extends TLVSchema = TLVSchema,
> extends TLVSchemaBase<N> {
  readonly item: Item;
}

type TLVSchema<N extends string = string, D = unknown> =
  | PrimitiveTLVSchema<N, D>
  | ConstructedTLVSchema<N, readonly TLVSchema[]>
  | RepeatedTLVSchema<N, TLVSchema>;

export type ParsedResult<S extends TLVSchema> = S extends ConstructedTLVSchema
  ? ParsedResultFromConstructed<S>
  : S extends RepeatedTLVSchema
    ? ParsedResultFromRepeated<S>
    : S extends PrimitiveTLVSchema<string, unknown>
      ? ParsedResultFromPrimitive<S>
      : never;

type ParsedResultFromConstructed<S> =
  S extends ConstructedTLVSchema<string, infer Fields>
    ? Fields extends readonly TLVSchema[]
      ? {
          // required fields
          [K in Fields[number] as K["optional"] extends true
            ? never
            : K["name"]]: ParsedResult<K>;
        } & {
          // optional fields
          [K in Fields[number] as K["optional"] extends true
            ? K["name"]
            : never]?: ParsedResult<K>;
        }
      : never
    : never;

type ParsedResultFromRepeated<S> =
  S extends RepeatedTLVSchema<string, infer Item>
    ? ParsedResult<Item>[]
    : never;

type ParsedResultFromPrimitive<S> =
  S extends PrimitiveTLVSchema<string, infer D> ? D : never;

export interface SchemaParserOptions {
  /** Reject bytes after the top-level TLV. Defaults to true. */
  strict?: boolean;
  /** Maximum nesting of constructed values. Defaults to 100. */
  maxDepth?: number;
}

/**
 * A parser that decodes DER data following a declarative schema.
 * Fields are matched positionally, the way DER SEQUENCEs are laid out.
 */
export class SchemaParser<S extends TLVSchema> {
  public readonly schema: S;
  public readonly strict: boolean;
  private depthCounter: number = 0;
  private readonly maxDepth: number;

  public constructor(schema: S, options?: SchemaParserOptions) {
    this.schema = schema;
    this.strict = options?.strict ?? true;
    this.maxDepth = options?.maxDepth ?? 100;
    this.depthCounter = 0;
  }

  // Parses the buffer and returns schema-typed data.
  public parse(buffer: Uint8Array): ParsedResult<S> {
    // Reset depth counter per top-level parse invocation
    this.depthCounter = 0;
    return this.parseTopLevel(this.schema, buffer) as ParsedResult<S>;
  }

  private parseTopLevel(schema: TLVSchema, buffer: Uint8Array): unknown {
    if (this.isConstructed(schema)) {
      return this.parseConstructed(schema, buffer);
    }
    if (this.isRepeated(schema)) {
      // Top-level repeated has no tag to wrap items; disallow to keep TLV well-formed.
      throw new Error(
        `Top-level repeated schema '${schema.name}' is not supported. Wrap it in a constructed container.`,
      );
    }
    return this.parsePrimitive(schema, buffer);
  }

  private parsePrimitive(
    schema: PrimitiveTLVSchema<string, unknown>,
    buffer: Uint8Array,
  ): unknown {
    this.ensureDepth();
    try {
      const tlv = BasicTLVParser.parse(buffer);

      if (!this.matchesFieldTag(schema, tlv.tag)) {
        throw new X509Error(
          X509ErrorCode.InvalidTag,
          `TLV tag mismatch for primitive '${schema.name}' (expected class=${schema.tagClass} number=${schema.tagNumber} constructed=false; found class=${tlv.tag.tagClass} number=${tlv.tag.tagNumber} constructed=${tlv.tag.constructed})`,
        );
      }

      // Enforce full buffer consumption at top-level when strict
      if (this.strict && tlv.endOffset !== buffer.byteLength) {
        throw new X509Error(
          X509ErrorCode.InvalidValue,
          `Unexpected trailing bytes after TLV at offset ${tlv.endOffset} (buffer length ${buffer.byteLength}) for primitive '${schema.name}'`,
        );
      }

      return schema.decode(tlv.value);
    } finally {
      this.depthCounter--;
    }
  }

  private parseConstructed(
    schema: ConstructedTLVSchema<string, readonly TLVSchema[]>,
    buffer: Uint8Array,
  ): Record<string, unknown> {
    this.ensureDepth();
    try {
      const outer = BasicTLVParser.parse(buffer);

      if (!this.matchesFieldTag(schema, outer.tag)) {
        throw new X509Error(
          X509ErrorCode.InvalidTag,
          `Container tag mismatch for constructed '${schema.name}' (expected class=${schema.tagClass} number=${schema.tagNumber} constructed=true; found class=${outer.tag.tagClass} number=${outer.tag.tagNumber} constructed=${outer.tag.constructed})`,
        );
      }

      // Enforce full buffer consumption at top-level when strict
      if (this.strict && outer.endOffset !== buffer.byteLength) {
        throw new X509Error(
          X509ErrorCode.InvalidValue,
          `Unexpected trailing bytes after TLV at offset ${outer.endOffset} (buffer length ${buffer.byteLength}) for constructed '${schema.name}'`,
        );
      }

      return this.parseConstructedSequence(schema, outer.value);
    } finally {
      this.depthCounter--;
    }
  }

  /**
   * Strict, linear matching:
   * - Consumes children in schema order
   * - Optional fields may be skipped
   * - Repeated fields consume zero or more consecutive matching children
   * - Any mismatch immediately fails (independent of 'strict')
   * - No extra children are allowed
   */
  private parseConstructedSequence(
    schema: ConstructedTLVSchema<string, readonly TLVSchema[]>,
    inner: Uint8Array,
  ): Record<string, unknown> {
    const out: Record<string, unknown> = {};
    let offset = 0;

    for (const field of schema.fields) {
      // Repeated field: consume zero or more consecutive children
      if (this.isRepeated(field)) {
        const items: unknown[] = [];
        while (offset < inner.byteLength) {
          const childTLV = BasicTLVParser.parse(inner.subarray(offset));
          if (!this.matchesFieldTag(field.item, childTLV.tag)) break;
          const childRaw = inner.subarray(offset, offset + childTLV.endOffset);
          items.push(this.parseTopLevel(field.item, childRaw));
          offset += childTLV.endOffset;
        }
        if (!field.optional && items.length === 0) {
          throw new X509Error(
            X509ErrorCode.InvalidValue,
            `Repeated property '${field.name}' in constructed '${schema.name}' needs at least one item`,
          );
        }
        out[field.name] = items;
        continue;
      }

      const childTLV =
        offset < inner.byteLength
          ? BasicTLVParser.parse(inner.subarray(offset))
          : undefined;

      if (childTLV === undefined || !this.matchesFieldTag(field, childTLV.tag)) {
        if (field.optional) continue;
        const found = childTLV
          ? `tagClass=${childTLV.tag.tagClass} tagNumber=${childTLV.tag.tagNumber} constructed=${childTLV.tag.constructed}`
          : "end of content";
        throw new X509Error(
          childTLV ? X509ErrorCode.InvalidTag : X509ErrorCode.InvalidValue,
          `Missing required property '${field.name}' in constructed '${schema.name}' (found ${found})`,
        );
      }

      const childRaw = inner.subarray(offset, offset + childTLV.endOffset);
      out[field.name] = this.isConstructed(field)
        ? this.parseConstructed(field, childRaw)
        : this.parsePrimitive(field, childRaw);
      offset += childTLV.endOffset;
    }

    // After consuming all schema fields, no extra children are allowed.
    if (offset < inner.byteLength) {
      const extraTLV = BasicTLVParser.parse(inner.subarray(offset));
      throw new X509Error(
        X509ErrorCode.InvalidValue,
        `Unexpected extra child TLV tagClass=${extraTLV.tag.tagClass} tagNumber=${extraTLV.tag.tagNumber} constructed=${extraTLV.tag.constructed} in constructed '${schema.name}'`,
      );
    }

    return out;
  }

  // Tag match utility for fields vs TLV child
  private matchesFieldTag(field: TLVSchema, tag: TagInfo): boolean {
    return (
      tag.tagClass === field.tagClass &&
      tag.tagNumber === field.tagNumber &&
      tag.constructed === !this.isPrimitive(field)
    );
  }

  // Depth guard to prevent stack overflows and pathological nested inputs
  private ensureDepth(): void {
    if (this.depthCounter >= this.maxDepth) {
      throw new X509Error(
        X509ErrorCode.MaxDepthExceeded,
        `Maximum parsing depth exceeded: ${this.maxDepth}`,
      );
    }
    this.depthCounter++;
  }

  private isPrimitive(
    schema: TLVSchema,
  ): schema is PrimitiveTLVSchema<string, unknown> {
    return !this.isConstructed(schema) && !this.isRepeated(schema);
  }

  private isConstructed(
    schema: TLVSchema,
  ): schema is ConstructedTLVSchema<string, readonly TLVSchema[]> {
    return Object.prototype.hasOwnProperty.call(schema, "fields");
  }

  private isRepeated(
    schema: TLVSchema,
  ): schema is RepeatedTLVSchema<string, TLVSchema> {
    return Object.prototype.hasOwnProperty.call(schema, "item");
  }
}

/**
 * Utility class for creating schema descriptors consumed by SchemaParser.
 */
export class Schema {
  static primitive<
    N extends string,
    O extends SchemaOptions,
    DecodedType = Uint8Array,
  >(
    name: N,
    options: O,
    decode: (content: Uint8Array) => DecodedType = (content: Uint8Array) =>
      content as DecodedType,
  ): PrimitiveTLVSchema<N, NoInfer<DecodedType>> & OptionalFlag<O> {
    const tagNumber = options.tagNumber;
    if (typeof tagNumber !== "number") {
      throw new Error(`Primitive schema '${name}' requires tagNumber`);
    }
    const obj = {
      name,
      decode,
      tagClass: options?.tagClass ?? TagClass.Universal,
      tagNumber,
      optional: options?.optional ? (true as const) : (false as const),
    };
    return obj as PrimitiveTLVSchema<N, DecodedType> & OptionalFlag<O>;
  }

  static constructed<
    N extends string,
    O extends SchemaOptions,
    Fields extends readonly TLVSchema[],
  >(
    name: N,
    options: O,
    fields: Fields,
  ): ConstructedTLVSchema<N, Fields> & OptionalFlag<O> {
    const obj = {
      name,
      fields,
      tagClass: options?.tagClass ?? TagClass.Universal,
      tagNumber: options?.tagNumber ?? UniversalTag.Sequence,
      optional: options?.optional ? (true as const) : (false as const),
    };
    return obj as ConstructedTLVSchema<N, Fields> & OptionalFlag<O>;
  }

  static repeated<
    N extends string,
    O extends SchemaOptions,
    Item extends TLVSchema,
  >(
    name: N,
    options: O,
    item: Item,
  ): RepeatedTLVSchema<N, Item> & OptionalFlag<O> {
    const obj = {
      name,
      item,
      tagClass: item.tagClass,
      tagNumber: item.tagNumber,
      optional: options?.optional ? (true as const) : (false as const),
    };
    return obj as RepeatedTLVSchema<N, Item> & OptionalFlag<O>;
  }
}
