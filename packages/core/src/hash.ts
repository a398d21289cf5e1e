/**
 * Content Hash
 *
 * A 32-byte BLAKE3 digest. The raw bytes are the canonical form; the
 * lowercase hex string is used wherever a hash needs to be a map key.
 */

import { blake3 } from '@noble/hashes/blake3';
import { bytesToHex, hexToBytes } from '@noble/hashes/utils';

export class Hash {
  static readonly LENGTH = 32;

  readonly hex: string;

  private constructor(private readonly bytes: Uint8Array) {
    this.hex = bytesToHex(bytes);
  }

  /** BLAKE3 of `data`. */
  static digest(data: Uint8Array): Hash {
    return new Hash(blake3(data));
  }

  static fromBytes(bytes: Uint8Array): Hash {
    if (bytes.length !== Hash.LENGTH) {
      throw new RangeError(`hash must be ${Hash.LENGTH} bytes, got ${bytes.length}`);
    }
    return new Hash(Uint8Array.from(bytes));
  }

  static fromHex(hex: string): Hash {
    if (!/^[0-9a-fA-F]{64}$/.test(hex)) {
      throw new RangeError(`invalid hash hex: ${hex}`);
    }
    return new Hash(hexToBytes(hex.toLowerCase()));
  }

  toBytes(): Uint8Array {
    return Uint8Array.from(this.bytes);
  }

  equals(other: Hash): boolean {
    return this.hex === other.hex;
  }

  /**
   * Raw byte order; negative when `this` sorts first.
   */
  compare(other: Hash): number {
    for (let i = 0; i < Hash.LENGTH; i++) {
      const a = this.bytes[i] ?? 0;
      const b = other.bytes[i] ?? 0;
      if (a !== b) {
        return a - b;
      }
    }
    return 0;
  }

  toString(): string {
    return this.hex;
  }

  toJSON(): string {
    return this.hex;
  }
}

/**
 * Incremental BLAKE3
 */
export class Hasher {
  private readonly state = blake3.create({});

  update(data: Uint8Array): this {
    this.state.update(data);
    return this;
  }

  finalize(): Hash {
    return Hash.fromBytes(this.state.digest());
  }
}
