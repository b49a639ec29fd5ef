/**
 * Curve25519 keys
 */

import type { NativeContext } from './context.js';
import { DisposedError, ValidationError } from './exceptions.js';
import { NativeTypes } from './ffi/native-types.js';
import { Disposable, NativeObject, ResourceHandle } from './handle.js';
import { SecureBuffer } from './memory.js';
import {
  KeySize,
  validateIdentityKeyPair,
  validatePrivateKey,
  validatePublicKey,
} from './validator.js';

export class PublicKey extends NativeObject<'PublicKey'> {
  private constructor(handle: ResourceHandle<'PublicKey'>) {
    super(handle);
  }

  /** @internal */
  static fromHandle(handle: ResourceHandle<'PublicKey'>): PublicKey {
    return new PublicKey(handle);
  }

  /**
   * Deserialize a 33-byte public key.
   * @throws ValidationError for malformed or low-order keys
   */
  static deserialize(context: NativeContext, data: Uint8Array): PublicKey {
    validatePublicKey(data);
    return new PublicKey(
      context.create(NativeTypes.PublicKey, 'signal_publickey_deserialize', (out) =>
        context.ffi.signal_publickey_deserialize(out, context.borrow(data, 'publicKey'))
      )
    );
  }

  serialize(): Uint8Array {
    return this.readBytes('signal_publickey_serialize', (ffi, out, key) =>
      ffi.signal_publickey_serialize(out, key)
    );
  }

  /**
   * The 32 key bytes without the type prefix.
   */
  publicKeyBytes(): Uint8Array {
    return this.readBytes('signal_publickey_get_public_key_bytes', (ffi, out, key) =>
      ffi.signal_publickey_get_public_key_bytes(out, key)
    );
  }

  /**
   * Check an XEdDSA signature made by the matching private key.
   */
  verify(message: Uint8Array, signature: Uint8Array): boolean {
    return this.readBoolean('signal_publickey_verify', (ffi, out, key) =>
      ffi.signal_publickey_verify(
        out,
        key,
        this.context.borrow(message, 'message'),
        this.context.borrow(signature, 'signature')
      )
    );
  }

  equals(other: PublicKey): boolean {
    return other._handle.use((rhs) =>
      this.readBoolean('signal_publickey_equals', (ffi, out, lhs) =>
        ffi.signal_publickey_equals(out, lhs, rhs)
      )
    );
  }

  /**
   * Order keys by their serialized form: negative, zero or positive.
   */
  compare(other: PublicKey): number {
    return other._handle.use((rhs) =>
      this.readNumber('signal_publickey_compare', (ffi, out, lhs) =>
        ffi.signal_publickey_compare(out, lhs, rhs)
      )
    );
  }

  clone(): PublicKey {
    return new PublicKey(this._handle.clone());
  }
}

export class PrivateKey extends NativeObject<'PrivateKey'> {
  private constructor(handle: ResourceHandle<'PrivateKey'>) {
    super(handle);
  }

  /** @internal */
  static fromHandle(handle: ResourceHandle<'PrivateKey'>): PrivateKey {
    return new PrivateKey(handle);
  }

  static generate(context: NativeContext): PrivateKey {
    return new PrivateKey(
      context.create(NativeTypes.PrivateKey, 'signal_privatekey_generate', (out) =>
        context.ffi.signal_privatekey_generate(out)
      )
    );
  }

  /**
   * Deserialize a 32-byte private key. The input is copied for the call and
   * the copy zeroed afterwards; the caller still owns `data`.
   */
  static deserialize(context: NativeContext, data: Uint8Array): PrivateKey {
    validatePrivateKey(data);
    return new PrivateKey(
      context.withSecretCopy(
        data,
        (buffer) =>
          context.create(NativeTypes.PrivateKey, 'signal_privatekey_deserialize', (out) =>
            context.ffi.signal_privatekey_deserialize(out, buffer)
          ),
        'privateKey'
      )
    );
  }

  serialize(): SecureBuffer {
    return this.readSecret('signal_privatekey_serialize', (ffi, out, key) =>
      ffi.signal_privatekey_serialize(out, key)
    );
  }

  getPublicKey(): PublicKey {
    return PublicKey.fromHandle(
      this.readChild(NativeTypes.PublicKey, 'signal_privatekey_get_public_key', (ffi, out, key) =>
        ffi.signal_privatekey_get_public_key(out, key)
      )
    );
  }

  sign(message: Uint8Array): Uint8Array {
    return this.readBytes('signal_privatekey_sign', (ffi, out, key) =>
      ffi.signal_privatekey_sign(out, key, this.context.borrow(message, 'message'))
    );
  }

  /**
   * X25519 agreement with `publicKey`. The peer key is checked against the
   * low-order blocklist first, whatever produced it.
   *
   * @throws ValidationError when the peer key is a low-order point
   */
  agree(publicKey: PublicKey): SecureBuffer {
    return this._handle.use(() => {
      validatePublicKey(publicKey.serialize());
      return publicKey._handle.use((peer) =>
        this.readSecret('signal_privatekey_agree', (ffi, out, key) =>
          ffi.signal_privatekey_agree(out, key, peer)
        )
      );
    });
  }

  clone(): PrivateKey {
    return new PrivateKey(this._handle.clone());
  }
}

const IDENTITY_PUBLIC_TAG = 0x0a;
const IDENTITY_PRIVATE_TAG = 0x12;

/**
 * Long-term identity: a public and private key disposed together.
 */
export class IdentityKeyPair implements Disposable {
  private disposed = false;

  private constructor(
    private readonly publicPart: PublicKey,
    private readonly privatePart: PrivateKey
  ) {}

  static generate(context: NativeContext): IdentityKeyPair {
    const privateKey = PrivateKey.generate(context);
    try {
      return new IdentityKeyPair(privateKey.getPublicKey(), privateKey);
    } catch (error) {
      privateKey.dispose();
      throw error;
    }
  }

  /**
   * Build a pair from independent copies of both keys. The arguments stay
   * owned by the caller.
   */
  static fromKeys(publicKey: PublicKey, privateKey: PrivateKey): IdentityKeyPair {
    const publicCopy = publicKey.clone();
    try {
      return new IdentityKeyPair(publicCopy, privateKey.clone());
    } catch (error) {
      publicCopy.dispose();
      throw error;
    }
  }

  /**
   * Parse `0x0a 0x21 <public key> 0x12 0x20 <private key>`.
   * @throws ValidationError for malformed input
   */
  static deserialize(context: NativeContext, data: Uint8Array): IdentityKeyPair {
    validateIdentityKeyPair(data);
    const publicEnd = 2 + KeySize.publicKey;
    if (
      data[0] !== IDENTITY_PUBLIC_TAG ||
      data[1] !== KeySize.publicKey ||
      data[publicEnd] !== IDENTITY_PRIVATE_TAG ||
      data[publicEnd + 1] !== KeySize.privateKey
    ) {
      throw new ValidationError(
        'identityKeyPair',
        'format',
        'Invalid structure: expected public key (field 1) followed by private key (field 2)'
      );
    }

    const publicKey = PublicKey.deserialize(context, data.subarray(2, publicEnd));
    try {
      const privateKey = PrivateKey.deserialize(context, data.subarray(publicEnd + 2));
      return new IdentityKeyPair(publicKey, privateKey);
    } catch (error) {
      publicKey.dispose();
      throw error;
    }
  }

  /**
   * The public half, owned by this pair.
   * @throws DisposedError after dispose()
   */
  get publicKey(): PublicKey {
    this.ensureLive();
    return this.publicPart;
  }

  /**
   * The private half, owned by this pair.
   * @throws DisposedError after dispose()
   */
  get privateKey(): PrivateKey {
    this.ensureLive();
    return this.privatePart;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  serialize(): SecureBuffer {
    this.ensureLive();
    const context = this.publicPart._handle.context;
    return this.publicPart._handle.use((publicKey) =>
      this.privatePart._handle.use((privateKey) =>
        context.takeSecret('signal_identitykeypair_serialize', (out) =>
          context.ffi.signal_identitykeypair_serialize(out, publicKey, privateKey)
        )
      )
    );
  }

  /**
   * Sign another identity key, vouching that both belong to one account.
   */
  signAlternateIdentity(other: PublicKey): Uint8Array {
    this.ensureLive();
    const context = this.publicPart._handle.context;
    return this.publicPart._handle.use((publicKey) =>
      this.privatePart._handle.use((privateKey) =>
        other._handle.use((otherKey) =>
          context.takeBuffer('signal_identitykeypair_sign_alternate_identity', (out) =>
            context.ffi.signal_identitykeypair_sign_alternate_identity(
              out,
              publicKey,
              privateKey,
              otherKey
            )
          )
        )
      )
    );
  }

  /**
   * Dispose both keys. The pair reports disposed before either key is
   * released.
   */
  dispose(): void {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    try {
      this.publicPart.dispose();
    } finally {
      this.privatePart.dispose();
    }
  }

  private ensureLive(): void {
    if (this.disposed) {
      throw new DisposedError('IdentityKeyPair');
    }
  }
}
