/**
 * Sealed-sender certificates
 *
 * A ServerCertificate binds a server key to a trust root; a
 * SenderCertificate, signed by that server key, binds an account and device
 * to its identity key until an expiration time.
 */

import type { NativeContext } from './context.js';
import { InvalidArgumentError } from './exceptions.js';
import { NativeTypes } from './ffi/native-types.js';
import type { ConstPointer } from './ffi/types.js';
import { NativeObject, ResourceHandle } from './handle.js';
import { PrivateKey, PublicKey } from './keys.js';
import { validateSenderCertificate, validateServerCertificate } from './validator.js';

export class ServerCertificate extends NativeObject<'ServerCertificate'> {
  private constructor(handle: ResourceHandle<'ServerCertificate'>) {
    super(handle);
  }

  /** @internal */
  static fromHandle(handle: ResourceHandle<'ServerCertificate'>): ServerCertificate {
    return new ServerCertificate(handle);
  }

  /**
   * Issue a certificate for `serverKey`, signed by the trust root.
   */
  static create(
    context: NativeContext,
    keyId: number,
    serverKey: PublicKey,
    trustRoot: PrivateKey
  ): ServerCertificate {
    return serverKey._handle.use((key) =>
      trustRoot._handle.use((root) =>
        new ServerCertificate(
          context.create(NativeTypes.ServerCertificate, 'signal_server_certificate_new', (out) =>
            context.ffi.signal_server_certificate_new(out, keyId, key, root)
          )
        )
      )
    );
  }

  static deserialize(context: NativeContext, data: Uint8Array): ServerCertificate {
    validateServerCertificate(data);
    return new ServerCertificate(
      context.create(NativeTypes.ServerCertificate, 'signal_server_certificate_deserialize', (out) =>
        context.ffi.signal_server_certificate_deserialize(out, context.borrow(data, 'serverCertificate'))
      )
    );
  }

  serialize(): Uint8Array {
    return this.readBytes('signal_server_certificate_get_serialized', (ffi, out, cert) =>
      ffi.signal_server_certificate_get_serialized(out, cert)
    );
  }

  /** The signed body. */
  get certificate(): Uint8Array {
    return this.readBytes('signal_server_certificate_get_certificate', (ffi, out, cert) =>
      ffi.signal_server_certificate_get_certificate(out, cert)
    );
  }

  get signature(): Uint8Array {
    return this.readBytes('signal_server_certificate_get_signature', (ffi, out, cert) =>
      ffi.signal_server_certificate_get_signature(out, cert)
    );
  }

  get keyId(): number {
    return this.readNumber('signal_server_certificate_get_key_id', (ffi, out, cert) =>
      ffi.signal_server_certificate_get_key_id(out, cert)
    );
  }

  getKey(): PublicKey {
    return PublicKey.fromHandle(
      this.readChild(NativeTypes.PublicKey, 'signal_server_certificate_get_key', (ffi, out, cert) =>
        ffi.signal_server_certificate_get_key(out, cert)
      )
    );
  }

  clone(): ServerCertificate {
    return new ServerCertificate(this._handle.clone());
  }
}

export interface SenderCertificateOptions {
  senderUuid: string;
  senderE164?: string | null;
  deviceId: number;
  senderKey: PublicKey;
  /** Milliseconds since the epoch */
  expiration: number;
  signer: ServerCertificate;
  signerKey: PrivateKey;
}

export class SenderCertificate extends NativeObject<'SenderCertificate'> {
  private constructor(handle: ResourceHandle<'SenderCertificate'>) {
    super(handle);
  }

  /** @internal */
  static fromHandle(handle: ResourceHandle<'SenderCertificate'>): SenderCertificate {
    return new SenderCertificate(handle);
  }

  static create(context: NativeContext, options: SenderCertificateOptions): SenderCertificate {
    if (options.senderUuid.length === 0) {
      throw new InvalidArgumentError('senderUuid', 'Cannot be empty');
    }
    const e164 = options.senderE164 ?? null;
    return options.senderKey._handle.use((senderKey) =>
      options.signer._handle.use((signer) =>
        options.signerKey._handle.use((signerKey) =>
          new SenderCertificate(
            context.create(NativeTypes.SenderCertificate, 'signal_sender_certificate_new', (out) =>
              context.ffi.signal_sender_certificate_new(
                out,
                options.senderUuid,
                e164,
                options.deviceId,
                senderKey,
                options.expiration,
                signer,
                signerKey
              )
            )
          )
        )
      )
    );
  }

  static deserialize(context: NativeContext, data: Uint8Array): SenderCertificate {
    validateSenderCertificate(data);
    return new SenderCertificate(
      context.create(NativeTypes.SenderCertificate, 'signal_sender_certificate_deserialize', (out) =>
        context.ffi.signal_sender_certificate_deserialize(out, context.borrow(data, 'senderCertificate'))
      )
    );
  }

  serialize(): Uint8Array {
    return this.readBytes('signal_sender_certificate_get_serialized', (ffi, out, cert) =>
      ffi.signal_sender_certificate_get_serialized(out, cert)
    );
  }

  get certificate(): Uint8Array {
    return this.readBytes('signal_sender_certificate_get_certificate', (ffi, out, cert) =>
      ffi.signal_sender_certificate_get_certificate(out, cert)
    );
  }

  get signature(): Uint8Array {
    return this.readBytes('signal_sender_certificate_get_signature', (ffi, out, cert) =>
      ffi.signal_sender_certificate_get_signature(out, cert)
    );
  }

  get senderUuid(): string {
    return this.readString('signal_sender_certificate_get_sender_uuid', (ffi, out, cert) =>
      ffi.signal_sender_certificate_get_sender_uuid(out, cert)
    );
  }

  /** Phone number, when the certificate carries one. */
  get senderE164(): string | null {
    return this.readOptionalString('signal_sender_certificate_get_sender_e164', (ffi, out, cert) =>
      ffi.signal_sender_certificate_get_sender_e164(out, cert)
    );
  }

  get deviceId(): number {
    return this.readNumber('signal_sender_certificate_get_device_id', (ffi, out, cert) =>
      ffi.signal_sender_certificate_get_device_id(out, cert)
    );
  }

  get expiration(): number {
    return this.readU64('signal_sender_certificate_get_expiration', (ffi, out, cert) =>
      ffi.signal_sender_certificate_get_expiration(out, cert)
    );
  }

  getKey(): PublicKey {
    return PublicKey.fromHandle(
      this.readChild(NativeTypes.PublicKey, 'signal_sender_certificate_get_key', (ffi, out, cert) =>
        ffi.signal_sender_certificate_get_key(out, cert)
      )
    );
  }

  getServerCertificate(): ServerCertificate {
    return ServerCertificate.fromHandle(
      this.readChild(
        NativeTypes.ServerCertificate,
        'signal_sender_certificate_get_server_certificate',
        (ffi, out, cert) => ffi.signal_sender_certificate_get_server_certificate(out, cert)
      )
    );
  }

  /**
   * Check the signature chain against any of `trustRoots` and the
   * expiration against `now`.
   *
   * @param now - Milliseconds since the epoch
   * @throws InvalidArgumentError when no trust root is given
   */
  validate(trustRoots: readonly PublicKey[], now: number = Date.now()): boolean {
    if (trustRoots.length === 0) {
      throw new InvalidArgumentError('trustRoots', 'At least one trust root is required');
    }
    return lendAll(trustRoots, [], (roots) =>
      this.readBoolean('signal_sender_certificate_validate', (ffi, out, cert) =>
        ffi.signal_sender_certificate_validate(out, cert, { base: roots, length: roots.length }, now)
      )
    );
  }

  clone(): SenderCertificate {
    return new SenderCertificate(this._handle.clone());
  }
}

/**
 * Lend every key's pointer for the duration of `fn`.
 */
function lendAll<R>(
  keys: readonly PublicKey[],
  lent: ConstPointer<'PublicKey'>[],
  fn: (pointers: ConstPointer<'PublicKey'>[]) => R
): R {
  const index = lent.length;
  if (index === keys.length) {
    return fn(lent);
  }
  return keys[index]._handle.use((pointer) => lendAll(keys, [...lent, pointer], fn));
}
