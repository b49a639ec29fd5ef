/**
 * Safety numbers for comparing identity keys out of band.
 */

import type { NativeContext } from './context.js';
import { InvalidArgumentError } from './exceptions.js';
import { NativeTypes } from './ffi/native-types.js';
import { NativeObject, ResourceHandle } from './handle.js';
import { PublicKey } from './keys.js';

/** Hash iterations of a version 2 fingerprint. */
export const DEFAULT_FINGERPRINT_ITERATIONS = 5200;

export const DEFAULT_FINGERPRINT_VERSION = 2;

export interface FingerprintOptions {
  localIdentifier: Uint8Array;
  localKey: PublicKey;
  remoteIdentifier: Uint8Array;
  remoteKey: PublicKey;
  iterations?: number;
  version?: number;
}

export class Fingerprint extends NativeObject<'Fingerprint'> {
  private constructor(handle: ResourceHandle<'Fingerprint'>) {
    super(handle);
  }

  /**
   * @throws InvalidArgumentError for an empty identifier or a
   *   non-positive iteration count
   */
  static create(context: NativeContext, options: FingerprintOptions): Fingerprint {
    const iterations = options.iterations ?? DEFAULT_FINGERPRINT_ITERATIONS;
    const version = options.version ?? DEFAULT_FINGERPRINT_VERSION;
    if (!Number.isInteger(iterations) || iterations <= 0) {
      throw new InvalidArgumentError('iterations', `Must be a positive integer, got ${iterations}`);
    }
    if (options.localIdentifier.length === 0) {
      throw new InvalidArgumentError('localIdentifier', 'Cannot be empty');
    }
    if (options.remoteIdentifier.length === 0) {
      throw new InvalidArgumentError('remoteIdentifier', 'Cannot be empty');
    }
    return options.localKey._handle.use((localKey) =>
      options.remoteKey._handle.use(
        (remoteKey) =>
          new Fingerprint(
            context.create(NativeTypes.Fingerprint, 'signal_fingerprint_new', (out) =>
              context.ffi.signal_fingerprint_new(
                out,
                iterations,
                version,
                context.borrow(options.localIdentifier, 'localIdentifier'),
                localKey,
                context.borrow(options.remoteIdentifier, 'remoteIdentifier'),
                remoteKey
              )
            )
          )
      )
    );
  }

  /**
   * Compare our scannable encoding with the one scanned from the other
   * device. Each side lists its own key first, so equal encodings do not
   * match.
   *
   * @throws NativeError with code FingerprintVersionMismatch when the
   *   encodings use different versions
   * @throws NativeError with code FingerprintParsingError for a malformed
   *   encoding
   */
  static compare(context: NativeContext, local: Uint8Array, remote: Uint8Array): boolean {
    return context.getBoolean('signal_fingerprint_compare', (out) =>
      context.ffi.signal_fingerprint_compare(
        out,
        context.borrow(local, 'local'),
        context.borrow(remote, 'remote')
      )
    );
  }

  /** Sixty digits, the same on both devices. */
  get displayString(): string {
    return this.readString('signal_fingerprint_display_string', (ffi, out, fingerprint) =>
      ffi.signal_fingerprint_display_string(out, fingerprint)
    );
  }

  /** The payload of the QR code. */
  get scannableEncoding(): Uint8Array {
    return this.readBytes('signal_fingerprint_scannable_encoding', (ffi, out, fingerprint) =>
      ffi.signal_fingerprint_scannable_encoding(out, fingerprint)
    );
  }

  clone(): Fingerprint {
    return new Fingerprint(this._handle.clone());
  }
}
