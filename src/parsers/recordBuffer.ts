const LF = 0x0a;
const CR = 0x0d;

/**
 * Cuts a byte stream into records on a single delimiter byte.
 *
 * Only the unfinished tail of the input is kept between chunks. A trailing
 * CR is dropped from newline-terminated records. Records are copies, so the
 * chunks they came from can be released.
 */
export class RecordBuffer {
  private pending: Buffer[] = [];
  private pendingLength = 0;

  constructor(private readonly delimiter: number = LF) {}

  *push(chunk: Buffer): Generator<Buffer> {
    let start = 0;
    let end: number;
    while ((end = chunk.indexOf(this.delimiter, start)) !== -1) {
      const piece = chunk.subarray(start, end);
      start = end + 1;
      if (this.pendingLength > 0) {
        this.pending.push(piece);
        const record = Buffer.concat(this.pending, this.pendingLength + piece.length);
        this.pending = [];
        this.pendingLength = 0;
        yield this.trim(record);
      } else {
        yield this.trim(Buffer.from(piece));
      }
    }
    if (start < chunk.length) {
      const rest = Buffer.from(chunk.subarray(start));
      this.pending.push(rest);
      this.pendingLength += rest.length;
    }
  }

  /** Returns the last record when the input did not end with a delimiter. */
  flush(): Buffer | undefined {
    if (this.pendingLength === 0) {
      return undefined;
    }
    const record = Buffer.concat(this.pending, this.pendingLength);
    this.pending = [];
    this.pendingLength = 0;
    return this.trim(record);
  }

  get bufferedBytes(): number {
    return this.pendingLength;
  }

  private trim(record: Buffer): Buffer {
    if (this.delimiter === LF && record.length > 0 && record[record.length - 1] === CR) {
      return record.subarray(0, record.length - 1);
    }
    return record;
  }
}
