import { X509Error, X509ErrorCode } from "../common/errors.js";
import { TLVResult, TagClass, TagInfo } from "../common/types.js";

export class BasicTLVParser {
  /**
   * Parse the TLV structure at the start of a buffer.
   * Bytes after the TLV are ignored; `endOffset` tells where they start.
   * @param buffer - The TLV data buffer to parse.
   * @returns The parsed result including tag, length, and a view of the value.
   */
  public static parse(buffer: Uint8Array): TLVResult {
    let offset = 0;

    const tagInfo = this.readTagInfo(buffer, offset);
    offset = tagInfo.newOffset;

    const lengthInfo = this.readLength(buffer, offset);
    offset = lengthInfo.newOffset;
    const headerLength = offset;

    const valueInfo = this.readValue(buffer, offset, lengthInfo.length);
    offset = valueInfo.newOffset;

    return {
      tag: tagInfo.tag,
      length: lengthInfo.length,
      headerLength,
      value: valueInfo.value,
      endOffset: offset,
    };
  }

  /**
   * Peek the tag information of the next TLV without consuming it.
   * @param buffer - Buffer that begins with a TLV structure.
   * @returns Tag information, or null when the buffer is empty.
   */
  public static peekTag(buffer: Uint8Array, offset = 0): TagInfo | null {
    if (offset >= buffer.byteLength) {
      return null;
    }
    return this.readTagInfo(buffer, offset).tag;
  }

  protected static readByte(buffer: Uint8Array, offset: number): number {
    if (offset >= buffer.byteLength) {
      throw new X509Error(
        X509ErrorCode.Truncated,
        `Unexpected end of input at offset ${offset}`,
      );
    }
    return buffer[offset];
  }

  /**
   * Read the identifier octets and update the offset.
   * @param offset - The current read position within the buffer.
   * @returns An object containing the parsed tag information and the new offset.
   */
  protected static readTagInfo(
    buffer: Uint8Array,
    offset: number,
  ): { tag: TagInfo; newOffset: number } {
    const firstByte = this.readByte(buffer, offset++);
    const tagClass = this.getTagClass((firstByte & 0xc0) >> 6);
    const isConstructed = !!(firstByte & 0x20);
    let tagNumber = firstByte & 0x1f;

    if (tagNumber === 0x1f) {
      tagNumber = 0;
      let b: number;
      do {
        b = this.readByte(buffer, offset++);
        if (tagNumber > 0x00ffffff) {
          throw new X509Error(X509ErrorCode.InvalidTag, "Tag number too large");
        }
        tagNumber = tagNumber * 128 + (b & 0x7f);
      } while (b & 0x80);
    }
    return {
      tag: { tagClass, constructed: isConstructed, tagNumber },
      newOffset: offset,
    };
  }

  /**
   * Convert tag class bits into a TagClass value.
   * @param bits - The two high bits of the identifier octet.
   */
  protected static getTagClass(bits: number): TagClass {
    switch (bits) {
      case 0:
        return TagClass.Universal;
      case 1:
        return TagClass.Application;
      case 2:
        return TagClass.ContextSpecific;
      case 3:
        return TagClass.Private;
    }
    throw new X509Error(X509ErrorCode.InvalidTag, "Invalid tag class");
  }

  /**
   * Read the length octets and update the offset.
   * @param offset - The current read position within the buffer.
   * @returns An object containing the parsed length and the new offset.
   */
  protected static readLength(
    buffer: Uint8Array,
    offset: number,
  ): { length: number; newOffset: number } {
    const first = this.readByte(buffer, offset++);
    // DER forbids indefinite length (0x80)
    if (first === 0x80) {
      throw new X509Error(
        X509ErrorCode.InvalidLength,
        "Indefinite length encoding is not allowed (DER)",
      );
    }
    if (first === 0xff) {
      throw new X509Error(X509ErrorCode.InvalidLength, "Reserved length octet 0xff");
    }

    let length: number;
    if (first & 0x80) {
      const numBytes = first & 0x7f;
      if (numBytes > 4) {
        throw new X509Error(
          X509ErrorCode.InvalidLength,
          `Length uses ${numBytes} octets; at most 4 are supported`,
        );
      }
      length = 0;
      for (let i = 0; i < numBytes; i++) {
        length = length * 256 + this.readByte(buffer, offset++);
      }
    } else {
      length = first;
    }
    return { length, newOffset: offset };
  }

  /**
   * Take a view of the value octets based on the declared length.
   * @param offset - The current read position within the buffer.
   * @param length - The declared content length.
   * @returns An object containing the value view and the new offset.
   */
  protected static readValue(
    buffer: Uint8Array,
    offset: number,
    length: number,
  ): { value: Uint8Array; newOffset: number } {
    const end = offset + length;
    if (end > buffer.byteLength) {
      throw new X509Error(
        X509ErrorCode.Truncated,
        `Declared length ${length} exceeds available bytes (${buffer.byteLength - offset})`,
      );
    }
    return { value: buffer.subarray(offset, end), newOffset: end };
  }
}
