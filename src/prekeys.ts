/**
 * Pre-key records and bundles
 */

import type { NativeContext } from './context.js';
import { NativeTypes } from './ffi/native-types.js';
import type { BorrowedBuffer, ConstPointer } from './ffi/types.js';
import { NativeObject, ResourceHandle } from './handle.js';
import { PrivateKey, PublicKey } from './keys.js';
import { KyberKeyPair, KyberPublicKey, KyberSecretKey } from './kyber.js';
import {
  validateKyberPreKeyRecord,
  validatePreKeyRecord,
  validateSignedPreKeyRecord,
} from './validator.js';

export class PreKeyRecord extends NativeObject<'PreKeyRecord'> {
  private constructor(handle: ResourceHandle<'PreKeyRecord'>) {
    super(handle);
  }

  /** @internal */
  static fromHandle(handle: ResourceHandle<'PreKeyRecord'>): PreKeyRecord {
    return new PreKeyRecord(handle);
  }

  static create(context: NativeContext, id: number, publicKey: PublicKey, privateKey: PrivateKey): PreKeyRecord {
    return publicKey._handle.use((pub) =>
      privateKey._handle.use(
        (priv) =>
          new PreKeyRecord(
            context.create(NativeTypes.PreKeyRecord, 'signal_pre_key_record_new', (out) =>
              context.ffi.signal_pre_key_record_new(out, id, pub, priv)
            )
          )
      )
    );
  }

  static deserialize(context: NativeContext, data: Uint8Array): PreKeyRecord {
    validatePreKeyRecord(data);
    return new PreKeyRecord(
      context.withSecretCopy(
        data,
        (buffer) =>
          context.create(NativeTypes.PreKeyRecord, 'signal_pre_key_record_deserialize', (out) =>
            context.ffi.signal_pre_key_record_deserialize(out, buffer)
          ),
        'preKeyRecord'
      )
    );
  }

  serialize(): Uint8Array {
    return this.readBytes('signal_pre_key_record_serialize', (ffi, out, record) =>
      ffi.signal_pre_key_record_serialize(out, record)
    );
  }

  get id(): number {
    return this.readNumber('signal_pre_key_record_get_id', (ffi, out, record) =>
      ffi.signal_pre_key_record_get_id(out, record)
    );
  }

  getPublicKey(): PublicKey {
    return PublicKey.fromHandle(
      this.readChild(NativeTypes.PublicKey, 'signal_pre_key_record_get_public_key', (ffi, out, record) =>
        ffi.signal_pre_key_record_get_public_key(out, record)
      )
    );
  }

  getPrivateKey(): PrivateKey {
    return PrivateKey.fromHandle(
      this.readChild(NativeTypes.PrivateKey, 'signal_pre_key_record_get_private_key', (ffi, out, record) =>
        ffi.signal_pre_key_record_get_private_key(out, record)
      )
    );
  }

  clone(): PreKeyRecord {
    return new PreKeyRecord(this._handle.clone());
  }
}

export class SignedPreKeyRecord extends NativeObject<'SignedPreKeyRecord'> {
  private constructor(handle: ResourceHandle<'SignedPreKeyRecord'>) {
    super(handle);
  }

  /** @internal */
  static fromHandle(handle: ResourceHandle<'SignedPreKeyRecord'>): SignedPreKeyRecord {
    return new SignedPreKeyRecord(handle);
  }

  /**
   * @param timestamp - Creation time in milliseconds since the epoch
   * @param signature - Identity key signature over the serialized public key
   */
  static create(
    context: NativeContext,
    id: number,
    timestamp: number,
    publicKey: PublicKey,
    privateKey: PrivateKey,
    signature: Uint8Array
  ): SignedPreKeyRecord {
    return publicKey._handle.use((pub) =>
      privateKey._handle.use(
        (priv) =>
          new SignedPreKeyRecord(
            context.create(NativeTypes.SignedPreKeyRecord, 'signal_signed_pre_key_record_new', (out) =>
              context.ffi.signal_signed_pre_key_record_new(
                out,
                id,
                timestamp,
                pub,
                priv,
                context.borrow(signature, 'signature')
              )
            )
          )
      )
    );
  }

  static deserialize(context: NativeContext, data: Uint8Array): SignedPreKeyRecord {
    validateSignedPreKeyRecord(data);
    return new SignedPreKeyRecord(
      context.withSecretCopy(
        data,
        (buffer) =>
          context.create(NativeTypes.SignedPreKeyRecord, 'signal_signed_pre_key_record_deserialize', (out) =>
            context.ffi.signal_signed_pre_key_record_deserialize(out, buffer)
          ),
        'signedPreKeyRecord'
      )
    );
  }

  serialize(): Uint8Array {
    return this.readBytes('signal_signed_pre_key_record_serialize', (ffi, out, record) =>
      ffi.signal_signed_pre_key_record_serialize(out, record)
    );
  }

  get id(): number {
    return this.readNumber('signal_signed_pre_key_record_get_id', (ffi, out, record) =>
      ffi.signal_signed_pre_key_record_get_id(out, record)
    );
  }

  get timestamp(): number {
    return this.readU64('signal_signed_pre_key_record_get_timestamp', (ffi, out, record) =>
      ffi.signal_signed_pre_key_record_get_timestamp(out, record)
    );
  }

  get signature(): Uint8Array {
    return this.readBytes('signal_signed_pre_key_record_get_signature', (ffi, out, record) =>
      ffi.signal_signed_pre_key_record_get_signature(out, record)
    );
  }

  getPublicKey(): PublicKey {
    return PublicKey.fromHandle(
      this.readChild(NativeTypes.PublicKey, 'signal_signed_pre_key_record_get_public_key', (ffi, out, record) =>
        ffi.signal_signed_pre_key_record_get_public_key(out, record)
      )
    );
  }

  getPrivateKey(): PrivateKey {
    return PrivateKey.fromHandle(
      this.readChild(NativeTypes.PrivateKey, 'signal_signed_pre_key_record_get_private_key', (ffi, out, record) =>
        ffi.signal_signed_pre_key_record_get_private_key(out, record)
      )
    );
  }

  clone(): SignedPreKeyRecord {
    return new SignedPreKeyRecord(this._handle.clone());
  }
}

export class KyberPreKeyRecord extends NativeObject<'KyberPreKeyRecord'> {
  private constructor(handle: ResourceHandle<'KyberPreKeyRecord'>) {
    super(handle);
  }

  /** @internal */
  static fromHandle(handle: ResourceHandle<'KyberPreKeyRecord'>): KyberPreKeyRecord {
    return new KyberPreKeyRecord(handle);
  }

  static create(
    context: NativeContext,
    id: number,
    timestamp: number,
    keyPair: KyberKeyPair,
    signature: Uint8Array
  ): KyberPreKeyRecord {
    return keyPair._handle.use(
      (pair) =>
        new KyberPreKeyRecord(
          context.create(NativeTypes.KyberPreKeyRecord, 'signal_kyber_pre_key_record_new', (out) =>
            context.ffi.signal_kyber_pre_key_record_new(out, id, timestamp, pair, context.borrow(signature, 'signature'))
          )
        )
    );
  }

  static deserialize(context: NativeContext, data: Uint8Array): KyberPreKeyRecord {
    validateKyberPreKeyRecord(data);
    return new KyberPreKeyRecord(
      context.withSecretCopy(
        data,
        (buffer) =>
          context.create(NativeTypes.KyberPreKeyRecord, 'signal_kyber_pre_key_record_deserialize', (out) =>
            context.ffi.signal_kyber_pre_key_record_deserialize(out, buffer)
          ),
        'kyberPreKeyRecord'
      )
    );
  }

  serialize(): Uint8Array {
    return this.readBytes('signal_kyber_pre_key_record_serialize', (ffi, out, record) =>
      ffi.signal_kyber_pre_key_record_serialize(out, record)
    );
  }

  get id(): number {
    return this.readNumber('signal_kyber_pre_key_record_get_id', (ffi, out, record) =>
      ffi.signal_kyber_pre_key_record_get_id(out, record)
    );
  }

  get timestamp(): number {
    return this.readU64('signal_kyber_pre_key_record_get_timestamp', (ffi, out, record) =>
      ffi.signal_kyber_pre_key_record_get_timestamp(out, record)
    );
  }

  get signature(): Uint8Array {
    return this.readBytes('signal_kyber_pre_key_record_get_signature', (ffi, out, record) =>
      ffi.signal_kyber_pre_key_record_get_signature(out, record)
    );
  }

  getPublicKey(): KyberPublicKey {
    return KyberPublicKey.fromHandle(
      this.readChild(NativeTypes.KyberPublicKey, 'signal_kyber_pre_key_record_get_public_key', (ffi, out, record) =>
        ffi.signal_kyber_pre_key_record_get_public_key(out, record)
      )
    );
  }

  getSecretKey(): KyberSecretKey {
    return KyberSecretKey.fromHandle(
      this.readChild(NativeTypes.KyberSecretKey, 'signal_kyber_pre_key_record_get_secret_key', (ffi, out, record) =>
        ffi.signal_kyber_pre_key_record_get_secret_key(out, record)
      )
    );
  }

  getKeyPair(): KyberKeyPair {
    return KyberKeyPair.fromHandle(
      this.readChild(NativeTypes.KyberKeyPair, 'signal_kyber_pre_key_record_get_key_pair', (ffi, out, record) =>
        ffi.signal_kyber_pre_key_record_get_key_pair(out, record)
      )
    );
  }

  clone(): KyberPreKeyRecord {
    return new KyberPreKeyRecord(this._handle.clone());
  }
}

/** Id recorded for a pre-key the bundle does not carry. */
export const NO_PRE_KEY_ID = 0xffffffff;

export interface PreKeyBundleOptions {
  registrationId: number;
  deviceId: number;
  /** One-time pre-key; omit when the server had none left */
  preKey?: { id: number; publicKey: PublicKey };
  signedPreKey: { id: number; publicKey: PublicKey; signature: Uint8Array };
  identityKey: PublicKey;
  /** Post-quantum pre-key; omit for a bundle without one */
  kyberPreKey?: { id: number; publicKey: KyberPublicKey; signature: Uint8Array };
}

const EMPTY_BUFFER: BorrowedBuffer = { base: null, length: 0 };

/**
 * Everything needed to start a session with a remote device.
 */
export class PreKeyBundle extends NativeObject<'PreKeyBundle'> {
  private constructor(handle: ResourceHandle<'PreKeyBundle'>) {
    super(handle);
  }

  static create(context: NativeContext, options: PreKeyBundleOptions): PreKeyBundle {
    const { preKey, signedPreKey, kyberPreKey } = options;
    const withPreKey = <R>(fn: (pointer: ConstPointer<'PublicKey'>) => R): R =>
      preKey ? preKey.publicKey._handle.use(fn) : fn({ raw: null });
    const withKyberPreKey = <R>(fn: (pointer: ConstPointer<'KyberPublicKey'>) => R): R =>
      kyberPreKey ? kyberPreKey.publicKey._handle.use(fn) : fn({ raw: null });

    return withPreKey((preKeyPointer) =>
      signedPreKey.publicKey._handle.use((signedPointer) =>
        options.identityKey._handle.use((identityPointer) =>
          withKyberPreKey(
            (kyberPointer) =>
              new PreKeyBundle(
                context.create(NativeTypes.PreKeyBundle, 'signal_pre_key_bundle_new', (out) =>
                  context.ffi.signal_pre_key_bundle_new(
                    out,
                    options.registrationId,
                    options.deviceId,
                    preKey ? preKey.id : NO_PRE_KEY_ID,
                    preKeyPointer,
                    signedPreKey.id,
                    signedPointer,
                    context.borrow(signedPreKey.signature, 'signedPreKeySignature'),
                    identityPointer,
                    kyberPreKey ? kyberPreKey.id : NO_PRE_KEY_ID,
                    kyberPointer,
                    kyberPreKey
                      ? context.borrow(kyberPreKey.signature, 'kyberPreKeySignature')
                      : EMPTY_BUFFER
                  )
                )
              )
          )
        )
      )
    );
  }

  get registrationId(): number {
    return this.readNumber('signal_pre_key_bundle_get_registration_id', (ffi, out, bundle) =>
      ffi.signal_pre_key_bundle_get_registration_id(out, bundle)
    );
  }

  get deviceId(): number {
    return this.readNumber('signal_pre_key_bundle_get_device_id', (ffi, out, bundle) =>
      ffi.signal_pre_key_bundle_get_device_id(out, bundle)
    );
  }

  /**
   * The one-time pre-key id, or null when the bundle has none.
   */
  get preKeyId(): number | null {
    const id = this.readNumber('signal_pre_key_bundle_get_pre_key_id', (ffi, out, bundle) =>
      ffi.signal_pre_key_bundle_get_pre_key_id(out, bundle)
    );
    return id === NO_PRE_KEY_ID ? null : id;
  }

  getPreKeyPublic(): PublicKey | null {
    const handle = this.readOptionalChild(
      NativeTypes.PublicKey,
      'signal_pre_key_bundle_get_pre_key_public',
      (ffi, out, bundle) => ffi.signal_pre_key_bundle_get_pre_key_public(out, bundle)
    );
    return handle ? PublicKey.fromHandle(handle) : null;
  }

  get signedPreKeyId(): number {
    return this.readNumber('signal_pre_key_bundle_get_signed_pre_key_id', (ffi, out, bundle) =>
      ffi.signal_pre_key_bundle_get_signed_pre_key_id(out, bundle)
    );
  }

  getSignedPreKeyPublic(): PublicKey {
    return PublicKey.fromHandle(
      this.readChild(NativeTypes.PublicKey, 'signal_pre_key_bundle_get_signed_pre_key_public', (ffi, out, bundle) =>
        ffi.signal_pre_key_bundle_get_signed_pre_key_public(out, bundle)
      )
    );
  }

  get signedPreKeySignature(): Uint8Array {
    return this.readBytes('signal_pre_key_bundle_get_signed_pre_key_signature', (ffi, out, bundle) =>
      ffi.signal_pre_key_bundle_get_signed_pre_key_signature(out, bundle)
    );
  }

  getIdentityKey(): PublicKey {
    return PublicKey.fromHandle(
      this.readChild(NativeTypes.PublicKey, 'signal_pre_key_bundle_get_identity_key', (ffi, out, bundle) =>
        ffi.signal_pre_key_bundle_get_identity_key(out, bundle)
      )
    );
  }

  /**
   * The Kyber pre-key id, or null when the bundle has none.
   */
  get kyberPreKeyId(): number | null {
    const id = this.readNumber('signal_pre_key_bundle_get_kyber_pre_key_id', (ffi, out, bundle) =>
      ffi.signal_pre_key_bundle_get_kyber_pre_key_id(out, bundle)
    );
    return id === NO_PRE_KEY_ID ? null : id;
  }

  getKyberPreKeyPublic(): KyberPublicKey | null {
    const handle = this.readOptionalChild(
      NativeTypes.KyberPublicKey,
      'signal_pre_key_bundle_get_kyber_pre_key_public',
      (ffi, out, bundle) => ffi.signal_pre_key_bundle_get_kyber_pre_key_public(out, bundle)
    );
    return handle ? KyberPublicKey.fromHandle(handle) : null;
  }

  get kyberPreKeySignature(): Uint8Array {
    return this.readBytes('signal_pre_key_bundle_get_kyber_pre_key_signature', (ffi, out, bundle) =>
      ffi.signal_pre_key_bundle_get_kyber_pre_key_signature(out, bundle)
    );
  }

  clone(): PreKeyBundle {
    return new PreKeyBundle(this._handle.clone());
  }
}
