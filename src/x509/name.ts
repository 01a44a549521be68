import {
  decodeAscii,
  decodeNumeric,
  decodePrintable,
  decodeUtf8,
  toHexUpper,
} from "../common/codecs.js";
import { X509Error, X509ErrorCode, decodeField } from "../common/errors.js";
import {
  DerObject,
  DerResult,
  TagClass,
  UniversalTag,
} from "../common/types.js";
import {
  consumed,
  readAny,
  readItems,
  readOid,
  readSequence,
  readSet,
} from "../parser/der-reader.js";
import { Oid, oidToAbbreviation } from "./oid-registry.js";

const INVALID_NAME_PLACEHOLDER = "<X509Error: Invalid X.509 name>";

/**
 * One `type=value` pair of a distinguished name. The value is kept
 * undecoded; its ASN.1 type depends on the attribute type.
 */
export class AttributeTypeAndValue {
  public constructor(
    public readonly attrType: string,
    public readonly attrValue: DerObject,
  ) {}

  /**
   * The value as text, for NumericString, PrintableString, UTF8String and
   * IA5String values.
   */
  public asString(): string {
    const { tag, value } = this.attrValue;
    if (tag.tagClass !== TagClass.Universal || tag.constructed) {
      throw new X509Error(
        X509ErrorCode.InvalidValue,
        `Attribute ${this.attrType} is not a string`,
      );
    }
    switch (tag.tagNumber) {
      case UniversalTag.NumericString:
        return decodeNumeric(value);
      case UniversalTag.PrintableString:
        return decodePrintable(value);
      case UniversalTag.Utf8String:
        return decodeUtf8(value);
      case UniversalTag.Ia5String:
        return decodeAscii(value);
    }
    throw new X509Error(
      X509ErrorCode.InvalidValue,
      `Attribute ${this.attrType} has non-string type ${tag.tagNumber}`,
    );
  }

  /** Content octets of a primitive value. */
  public asBytes(): Uint8Array {
    if (this.attrValue.tag.constructed) {
      throw new X509Error(
        X509ErrorCode.InvalidValue,
        `Attribute ${this.attrType} is constructed`,
      );
    }
    return this.attrValue.value;
  }

  public toString(): string {
    const key = oidToAbbreviation(this.attrType) ?? this.attrType;
    return `${key}=${this.renderValue()}`;
  }

  // Text for the four string types asString reads; any other type, or a
  // value outside its character set, renders as upper-case hex.
  private renderValue(): string {
    try {
      return this.asString();
    } catch (e) {
      if (e instanceof X509Error) {
        return toHexUpper(this.attrValue.value);
      }
      throw e;
    }
  }
}

export class RelativeDistinguishedName {
  public readonly attributes: readonly AttributeTypeAndValue[];

  public constructor(attributes: readonly AttributeTypeAndValue[]) {
    if (attributes.length === 0) {
      throw new X509Error(X509ErrorCode.InvalidName, "Empty RelativeDistinguishedName");
    }
    this.attributes = Object.freeze([...attributes]);
  }

  public toString(): string {
    return this.attributes.map((a) => a.toString()).join(" + ");
  }
}

export class X509Name {
  public readonly rdns: readonly RelativeDistinguishedName[];
  /** The encoded Name, for byte-wise comparisons. */
  public readonly raw: Uint8Array;

  public constructor(rdns: readonly RelativeDistinguishedName[], raw: Uint8Array) {
    this.rdns = Object.freeze([...rdns]);
    this.raw = raw;
  }

  public static fromDer(input: Uint8Array): DerResult<X509Name> {
    return parseName(input);
  }

  /** Never throws; an undisplayable name renders as a placeholder. */
  public toString(): string {
    try {
      return this.rdns.map((rdn) => rdn.toString()).join(", ");
    } catch {
      return INVALID_NAME_PLACEHOLDER;
    }
  }

  public *iterAttributes(): IterableIterator<AttributeTypeAndValue> {
    for (const rdn of this.rdns) {
      yield* rdn.attributes;
    }
  }

  public *iterByOid(oid: string): IterableIterator<AttributeTypeAndValue> {
    for (const attr of this.iterAttributes()) {
      if (attr.attrType === oid) yield attr;
    }
  }

  public iterCommonName(): IterableIterator<AttributeTypeAndValue> {
    return this.iterByOid(Oid.CommonName);
  }

  public iterCountry(): IterableIterator<AttributeTypeAndValue> {
    return this.iterByOid(Oid.Country);
  }

  public iterOrganization(): IterableIterator<AttributeTypeAndValue> {
    return this.iterByOid(Oid.Organization);
  }

  public iterOrganizationalUnit(): IterableIterator<AttributeTypeAndValue> {
    return this.iterByOid(Oid.OrganizationalUnit);
  }

  public iterStateOrProvince(): IterableIterator<AttributeTypeAndValue> {
    return this.iterByOid(Oid.StateOrProvince);
  }

  public iterLocality(): IterableIterator<AttributeTypeAndValue> {
    return this.iterByOid(Oid.Locality);
  }

  public iterEmail(): IterableIterator<AttributeTypeAndValue> {
    return this.iterByOid(Oid.EmailAddress);
  }
}

function readAttributeTypeAndValue(input: Uint8Array): DerResult<AttributeTypeAndValue> {
  return readSequence(
    input,
    (content) => {
      const type = readOid(content, "AttributeType");
      const value = readAny(type.rest, "AttributeValue");
      return {
        value: new AttributeTypeAndValue(type.value, value.value),
        rest: value.rest,
      };
    },
    "AttributeTypeAndValue",
  );
}

/** Content octets of `RelativeDistinguishedName ::= SET OF AttributeTypeAndValue`. */
export function readRelativeDistinguishedNameContent(
  content: Uint8Array,
): RelativeDistinguishedName {
  return new RelativeDistinguishedName(
    readItems(content, readAttributeTypeAndValue).value,
  );
}

function readRdn(input: Uint8Array): DerResult<RelativeDistinguishedName> {
  return readSet(
    input,
    (content) => ({
      value: readRelativeDistinguishedNameContent(content),
      rest: content.subarray(content.byteLength),
    }),
    "RelativeDistinguishedName",
  );
}

/** `Name ::= SEQUENCE OF RelativeDistinguishedName` */
export function parseName(input: Uint8Array, field = "Name"): DerResult<X509Name> {
  return decodeField(X509ErrorCode.InvalidName, field, () => {
    const { value: rdns, rest } = readSequence(
      input,
      (content) => readItems(content, readRdn),
      field,
    );
    return { value: new X509Name(rdns, consumed(input, rest)), rest };
  });
}
