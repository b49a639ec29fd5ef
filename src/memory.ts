/**
 * Secure memory primitives
 *
 * Zeroing and constant-time comparison for byte buffers, plus SecureBuffer,
 * the owner of secret bytes handed back by the native engine.
 *
 * Note: zeroing in JavaScript is best-effort. The garbage collector may have
 * moved or copied a buffer's backing store before it is overwritten.
 */

import * as crypto from 'crypto';
import { DisposedError } from './exceptions.js';

/**
 * Overwrite every byte of a buffer with zero.
 *
 * @param data - Buffer to clear; null, undefined and empty buffers are ignored
 */
export function zeroBytes(data: Uint8Array | null | undefined): void {
  if (data && data.length > 0) {
    data.fill(0);
  }
}

/**
 * Compare two buffers in constant time.
 *
 * Both inputs are copied into scratch buffers of the longer length so the
 * comparison touches the same number of bytes whether or not the lengths
 * match.
 */
export function constantTimeEquals(a: Uint8Array, b: Uint8Array): boolean {
  const size = Math.max(a.length, b.length, 1);
  const left = Buffer.alloc(size);
  const right = Buffer.alloc(size);
  try {
    left.set(a);
    right.set(b);
    const sameBytes = crypto.timingSafeEqual(left, right);
    const sameLength = (a.length ^ b.length) === 0;
    return sameBytes && sameLength;
  } finally {
    zeroBytes(left);
    zeroBytes(right);
  }
}

const secretFinalizers = new FinalizationRegistry<Uint8Array>((bytes) => {
  zeroBytes(bytes);
});

/**
 * Byte buffer holding secret material.
 *
 * The bytes are zeroed on dispose(). A buffer that is never disposed is
 * zeroed when it is garbage collected.
 */
export class SecureBuffer {
  private data: Uint8Array | null;

  /**
   * Take ownership of `data`. The caller must not keep another reference.
   */
  constructor(data: Uint8Array) {
    this.data = data;
    secretFinalizers.register(this, data, this);
  }

  /**
   * Copy `data` into a new SecureBuffer, leaving the source untouched.
   */
  static copyOf(data: Uint8Array): SecureBuffer {
    return new SecureBuffer(Uint8Array.from(data));
  }

  /**
   * The secret bytes. Valid until dispose().
   * @throws DisposedError after disposal
   */
  get bytes(): Uint8Array {
    if (this.data === null) {
      throw new DisposedError('SecureBuffer');
    }
    return this.data;
  }

  get length(): number {
    return this.data?.length ?? 0;
  }

  get isDisposed(): boolean {
    return this.data === null;
  }

  /**
   * Zero and release the bytes. Safe to call more than once.
   */
  dispose(): void {
    if (this.data === null) {
      return;
    }
    secretFinalizers.unregister(this);
    zeroBytes(this.data);
    this.data = null;
  }
}
