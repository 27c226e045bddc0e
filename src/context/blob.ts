/**
 * ContextBlob: an owned compiled-context byte sequence.
 *
 * Ownership moves with `take()`: the blob that gave up its bytes is spent
 * and every later access throws. Whoever holds an unspent blob owns the
 * bytes; there is no shared buffer between holders.
 */

export class ContextBlob {
  private bytes: Uint8Array | null;
  private readonly length: number;

  constructor(bytes: Uint8Array) {
    this.bytes = bytes;
    this.length = bytes.byteLength;
  }

  /** Copy a string's latin1 bytes into a new blob. */
  static fromBinaryString(value: string): ContextBlob {
    return new ContextBlob(new Uint8Array(Buffer.from(value, "latin1")));
  }

  /** Length at construction; stays readable after the bytes move. */
  get byteLength(): number {
    return this.length;
  }

  get spent(): boolean {
    return this.bytes === null;
  }

  /**
   * Borrow the bytes without taking ownership. The view must not outlive
   * this blob's ownership.
   */
  view(): Uint8Array {
    if (this.bytes === null) {
      throw new Error("ContextBlob has already been moved");
    }
    return this.bytes;
  }

  /** Move the bytes out. This blob is spent afterwards. */
  take(): Uint8Array {
    const bytes = this.view();
    this.bytes = null;
    return bytes;
  }

  /** A second owner of the same contents, backed by its own buffer. */
  copy(): ContextBlob {
    return new ContextBlob(Uint8Array.from(this.view()));
  }
}
