/**
 * Error classes for tap read and write operations.
 */

/**
 * Error thrown when a tap read runs past the end of its buffer.
 */
export class ReadBufferError extends Error {
  /** The offset where the read operation failed. */
  public readonly offset: number;
  /** The size requested for the read operation. */
  public readonly size: number;
  /** The total buffer length. */
  public readonly bufferLength: number;

  constructor(
    message: string,
    offset: number,
    size: number,
    bufferLength: number,
  ) {
    super(message);
    this.name = "ReadBufferError";
    this.offset = offset;
    this.size = size;
    this.bufferLength = bufferLength;
  }
}

/**
 * Error thrown when a tap write runs past the end of its buffer.
 */
export class WriteBufferError extends Error {
  /** The offset where the write operation failed. */
  public readonly offset: number;
  /** The size of data being written. */
  public readonly dataSize: number;
  /** The total buffer length. */
  public readonly bufferLength: number;

  constructor(
    message: string,
    offset: number,
    dataSize: number,
    bufferLength: number,
  ) {
    super(message);
    this.name = "WriteBufferError";
    this.offset = offset;
    this.dataSize = dataSize;
    this.bufferLength = bufferLength;
  }
}
