import { ReadBufferError, WriteBufferError } from "./tap_errors.ts";

/**
 * Sequential fixed-width reader over a byte array.
 */
export class ReadableTap {
  readonly #bytes: Uint8Array;
  readonly #view: DataView;
  #pos: number;

  constructor(bytes: Uint8Array, pos = 0) {
    this.#bytes = bytes;
    this.#view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    this.#pos = pos;
  }

  getPos(): number {
    return this.#pos;
  }

  /**
   * Number of unread bytes.
   */
  remaining(): number {
    return this.#bytes.length - this.#pos;
  }

  #take(size: number): number {
    if (this.#pos + size > this.#bytes.length) {
      throw new ReadBufferError(
        `Operation exceeds buffer bounds (offset ${this.#pos}, size ${size})`,
        this.#pos,
        size,
        this.#bytes.length,
      );
    }
    const offset = this.#pos;
    this.#pos += size;
    return offset;
  }

  /**
   * Reads an unsigned integer. Eight-byte values are returned as bigint.
   */
  readUint(width: number, littleEndian: boolean): number | bigint {
    const offset = this.#take(width);
    switch (width) {
      case 1:
        return this.#view.getUint8(offset);
      case 2:
        return this.#view.getUint16(offset, littleEndian);
      case 4:
        return this.#view.getUint32(offset, littleEndian);
      case 8:
        return this.#view.getBigUint64(offset, littleEndian);
      default:
        throw new RangeError(`Unsupported integer width: ${width}`);
    }
  }

  /**
   * Reads a two's complement integer. Eight-byte values are returned as bigint.
   */
  readInt(width: number, littleEndian: boolean): number | bigint {
    const offset = this.#take(width);
    switch (width) {
      case 1:
        return this.#view.getInt8(offset);
      case 2:
        return this.#view.getInt16(offset, littleEndian);
      case 4:
        return this.#view.getInt32(offset, littleEndian);
      case 8:
        return this.#view.getBigInt64(offset, littleEndian);
      default:
        throw new RangeError(`Unsupported integer width: ${width}`);
    }
  }

  readFloat(width: number, littleEndian: boolean): number {
    const offset = this.#take(width);
    switch (width) {
      case 4:
        return this.#view.getFloat32(offset, littleEndian);
      case 8:
        return this.#view.getFloat64(offset, littleEndian);
      default:
        throw new RangeError(`Unsupported float width: ${width}`);
    }
  }

  readBoolean(): boolean {
    return this.#view.getUint8(this.#take(1)) !== 0;
  }

  /**
   * Reads `len` bytes into a new array.
   */
  readFixed(len: number): Uint8Array {
    const offset = this.#take(len);
    return this.#bytes.slice(offset, offset + len);
  }

  skip(len: number): void {
    this.#take(len);
  }
}

/**
 * Sequential fixed-width writer into a preallocated byte array.
 */
export class WritableTap {
  readonly #bytes: Uint8Array;
  readonly #view: DataView;
  #pos = 0;

  constructor(size: number) {
    this.#bytes = new Uint8Array(size);
    this.#view = new DataView(this.#bytes.buffer);
  }

  getPos(): number {
    return this.#pos;
  }

  #reserve(size: number): number {
    if (this.#pos + size > this.#bytes.length) {
      throw new WriteBufferError(
        `Operation exceeds buffer bounds (offset ${this.#pos}, size ${size})`,
        this.#pos,
        size,
        this.#bytes.length,
      );
    }
    const offset = this.#pos;
    this.#pos += size;
    return offset;
  }

  /**
   * Writes the low `width` bytes of an unsigned value.
   */
  writeUint(width: number, value: bigint, littleEndian: boolean): void {
    const offset = this.#reserve(width);
    switch (width) {
      case 1:
        this.#view.setUint8(offset, Number(value));
        return;
      case 2:
        this.#view.setUint16(offset, Number(value), littleEndian);
        return;
      case 4:
        this.#view.setUint32(offset, Number(value), littleEndian);
        return;
      case 8:
        this.#view.setBigUint64(offset, value, littleEndian);
        return;
      default:
        throw new RangeError(`Unsupported integer width: ${width}`);
    }
  }

  writeInt(width: number, value: bigint, littleEndian: boolean): void {
    this.writeUint(width, BigInt.asUintN(width * 8, value), littleEndian);
  }

  writeFloat(width: number, value: number, littleEndian: boolean): void {
    const offset = this.#reserve(width);
    switch (width) {
      case 4:
        this.#view.setFloat32(offset, value, littleEndian);
        return;
      case 8:
        this.#view.setFloat64(offset, value, littleEndian);
        return;
      default:
        throw new RangeError(`Unsupported float width: ${width}`);
    }
  }

  writeBoolean(value: boolean): void {
    this.#view.setUint8(this.#reserve(1), value ? 1 : 0);
  }

  /**
   * Writes `data` into exactly `width` bytes, truncating or zero-filling.
   */
  writeFixed(data: Uint8Array, width = data.length): void {
    const offset = this.#reserve(width);
    this.#bytes.set(
      data.length > width ? data.subarray(0, width) : data,
      offset,
    );
  }

  writePadding(width: number): void {
    this.#reserve(width);
  }

  /**
   * Returns the underlying bytes.
   */
  getValue(): Uint8Array {
    return this.#bytes;
  }
}
