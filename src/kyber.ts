/**
 * Kyber1024 keys for post-quantum pre-keys
 */

import type { NativeContext } from './context.js';
import { NativeTypes } from './ffi/native-types.js';
import { NativeObject, ResourceHandle } from './handle.js';
import { SecureBuffer } from './memory.js';
import { validateKyberPublicKey, validateKyberSecretKey } from './validator.js';

export class KyberPublicKey extends NativeObject<'KyberPublicKey'> {
  private constructor(handle: ResourceHandle<'KyberPublicKey'>) {
    super(handle);
  }

  /** @internal */
  static fromHandle(handle: ResourceHandle<'KyberPublicKey'>): KyberPublicKey {
    return new KyberPublicKey(handle);
  }

  static deserialize(context: NativeContext, data: Uint8Array): KyberPublicKey {
    validateKyberPublicKey(data);
    return new KyberPublicKey(
      context.create(NativeTypes.KyberPublicKey, 'signal_kyber_public_key_deserialize', (out) =>
        context.ffi.signal_kyber_public_key_deserialize(out, context.borrow(data, 'kyberPublicKey'))
      )
    );
  }

  serialize(): Uint8Array {
    return this.readBytes('signal_kyber_public_key_serialize', (ffi, out, key) =>
      ffi.signal_kyber_public_key_serialize(out, key)
    );
  }

  equals(other: KyberPublicKey): boolean {
    return other._handle.use((rhs) =>
      this.readBoolean('signal_kyber_public_key_equals', (ffi, out, lhs) =>
        ffi.signal_kyber_public_key_equals(out, lhs, rhs)
      )
    );
  }

  clone(): KyberPublicKey {
    return new KyberPublicKey(this._handle.clone());
  }
}

export class KyberSecretKey extends NativeObject<'KyberSecretKey'> {
  private constructor(handle: ResourceHandle<'KyberSecretKey'>) {
    super(handle);
  }

  /** @internal */
  static fromHandle(handle: ResourceHandle<'KyberSecretKey'>): KyberSecretKey {
    return new KyberSecretKey(handle);
  }

  static deserialize(context: NativeContext, data: Uint8Array): KyberSecretKey {
    validateKyberSecretKey(data);
    return new KyberSecretKey(
      context.withSecretCopy(
        data,
        (buffer) =>
          context.create(NativeTypes.KyberSecretKey, 'signal_kyber_secret_key_deserialize', (out) =>
            context.ffi.signal_kyber_secret_key_deserialize(out, buffer)
          ),
        'kyberSecretKey'
      )
    );
  }

  serialize(): SecureBuffer {
    return this.readSecret('signal_kyber_secret_key_serialize', (ffi, out, key) =>
      ffi.signal_kyber_secret_key_serialize(out, key)
    );
  }

  clone(): KyberSecretKey {
    return new KyberSecretKey(this._handle.clone());
  }
}

export class KyberKeyPair extends NativeObject<'KyberKeyPair'> {
  private constructor(handle: ResourceHandle<'KyberKeyPair'>) {
    super(handle);
  }

  /** @internal */
  static fromHandle(handle: ResourceHandle<'KyberKeyPair'>): KyberKeyPair {
    return new KyberKeyPair(handle);
  }

  static generate(context: NativeContext): KyberKeyPair {
    return new KyberKeyPair(
      context.create(NativeTypes.KyberKeyPair, 'signal_kyber_key_pair_generate', (out) =>
        context.ffi.signal_kyber_key_pair_generate(out)
      )
    );
  }

  /**
   * A new handle on the public key; dispose it independently.
   */
  getPublicKey(): KyberPublicKey {
    return KyberPublicKey.fromHandle(
      this.readChild(NativeTypes.KyberPublicKey, 'signal_kyber_key_pair_get_public_key', (ffi, out, pair) =>
        ffi.signal_kyber_key_pair_get_public_key(out, pair)
      )
    );
  }

  getSecretKey(): KyberSecretKey {
    return KyberSecretKey.fromHandle(
      this.readChild(NativeTypes.KyberSecretKey, 'signal_kyber_key_pair_get_secret_key', (ffi, out, pair) =>
        ffi.signal_kyber_key_pair_get_secret_key(out, pair)
      )
    );
  }

  clone(): KyberKeyPair {
    return new KyberKeyPair(this._handle.clone());
  }
}
