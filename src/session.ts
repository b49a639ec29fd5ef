/**
 * One-to-one sessions: building them from pre-key bundles and encrypting
 * with the Double Ratchet.
 *
 * Each operation loads what the engine may need from the async stores,
 * runs the native call against those objects and writes the engine's
 * changes back once it returns.
 */

import type { NativeContext } from './context.js';
import {
  errorFromNativeCode,
  InvalidArgumentError,
  NativeErrorCode,
  SerializationError,
} from './exceptions.js';
import { NativeTypes } from './ffi/native-types.js';
import { NativeObject, ResourceHandle } from './handle.js';
import { PublicKey } from './keys.js';
import type { Logger } from './logger.js';
import { SecureBuffer } from './memory.js';
import { NO_PRE_KEY_ID, PreKeyBundle } from './prekeys.js';
import { ProtocolAddress, SignalMessage } from './protocol.js';
import { requireTrustedIdentity, withStoreBridge } from './store-bridge.js';
import { Direction } from './store.js';
import type {
  IdentityKeyStore,
  KyberPreKeyStore,
  PreKeyStore,
  SessionStore,
  SignedPreKeyStore,
} from './store.js';
import { validatePreKeySignalMessage } from './validator.js';

export enum CiphertextMessageType {
  Whisper = 2,
  PreKey = 3,
  SenderKey = 7,
  Plaintext = 8,
}

/**
 * @throws SerializationError for a value the engine does not define
 */
export function ciphertextMessageType(value: number): CiphertextMessageType {
  switch (value) {
    case CiphertextMessageType.Whisper:
      return CiphertextMessageType.Whisper;
    case CiphertextMessageType.PreKey:
      return CiphertextMessageType.PreKey;
    case CiphertextMessageType.SenderKey:
      return CiphertextMessageType.SenderKey;
    case CiphertextMessageType.Plaintext:
      return CiphertextMessageType.Plaintext;
    default:
      throw new SerializationError('CiphertextMessage', `Unknown message type: ${value}`);
  }
}

/**
 * An encrypted message ready for the wire.
 */
export class CiphertextMessage {
  constructor(
    readonly serialized: Uint8Array,
    readonly type: CiphertextMessageType
  ) {}

  /**
   * Copy the bytes and type out of an engine message. The handle stays
   * owned by the caller.
   * @internal
   */
  static read(context: NativeContext, handle: ResourceHandle<'CiphertextMessage'>): CiphertextMessage {
    return handle.use((message) => {
      const type = context.getNumber('signal_ciphertext_message_type', (out) =>
        context.ffi.signal_ciphertext_message_type(out, message)
      );
      const serialized = context.takeBuffer('signal_ciphertext_message_serialize', (out) =>
        context.ffi.signal_ciphertext_message_serialize(out, message)
      );
      return new CiphertextMessage(serialized, ciphertextMessageType(type));
    });
  }
}

/**
 * The first message of a session: a whisper message plus what the
 * recipient needs to build the session from its pre-keys.
 */
export class PreKeySignalMessage extends NativeObject<'PreKeySignalMessage'> {
  private constructor(handle: ResourceHandle<'PreKeySignalMessage'>) {
    super(handle);
  }

  static deserialize(context: NativeContext, data: Uint8Array): PreKeySignalMessage {
    validatePreKeySignalMessage(data);
    return new PreKeySignalMessage(
      context.create(NativeTypes.PreKeySignalMessage, 'signal_pre_key_signal_message_deserialize', (out) =>
        context.ffi.signal_pre_key_signal_message_deserialize(out, context.borrow(data, 'preKeySignalMessage'))
      )
    );
  }

  serialize(): Uint8Array {
    return this.readBytes('signal_pre_key_signal_message_serialize', (ffi, out, message) =>
      ffi.signal_pre_key_signal_message_serialize(out, message)
    );
  }

  get version(): number {
    return this.readNumber('signal_pre_key_signal_message_get_version', (ffi, out, message) =>
      ffi.signal_pre_key_signal_message_get_version(out, message)
    );
  }

  get registrationId(): number {
    return this.readNumber('signal_pre_key_signal_message_get_registration_id', (ffi, out, message) =>
      ffi.signal_pre_key_signal_message_get_registration_id(out, message)
    );
  }

  /**
   * The one-time pre-key the sender used, or null when it used none.
   */
  get preKeyId(): number | null {
    const id = this.readNumber('signal_pre_key_signal_message_get_pre_key_id', (ffi, out, message) =>
      ffi.signal_pre_key_signal_message_get_pre_key_id(out, message)
    );
    return id === NO_PRE_KEY_ID ? null : id;
  }

  get signedPreKeyId(): number {
    return this.readNumber('signal_pre_key_signal_message_get_signed_pre_key_id', (ffi, out, message) =>
      ffi.signal_pre_key_signal_message_get_signed_pre_key_id(out, message)
    );
  }

  getBaseKey(): PublicKey {
    return PublicKey.fromHandle(
      this.readChild(NativeTypes.PublicKey, 'signal_pre_key_signal_message_get_base_key', (ffi, out, message) =>
        ffi.signal_pre_key_signal_message_get_base_key(out, message)
      )
    );
  }

  getIdentityKey(): PublicKey {
    return PublicKey.fromHandle(
      this.readChild(
        NativeTypes.PublicKey,
        'signal_pre_key_signal_message_get_identity_key',
        (ffi, out, message) => ffi.signal_pre_key_signal_message_get_identity_key(out, message)
      )
    );
  }

  getSignalMessage(): SignalMessage {
    return SignalMessage.fromHandle(
      this.readChild(
        NativeTypes.SignalMessage,
        'signal_pre_key_signal_message_get_signal_message',
        (ffi, out, message) => ffi.signal_pre_key_signal_message_get_signal_message(out, message)
      )
    );
  }

  clone(): PreKeySignalMessage {
    return new PreKeySignalMessage(this._handle.clone());
  }
}

export interface SessionStores {
  sessionStore: SessionStore;
  identityKeyStore: IdentityKeyStore;
}

export interface SessionCipherStores extends SessionStores {
  /** Required to decrypt pre-key messages */
  preKeyStore?: PreKeyStore;
  /** Required to decrypt pre-key messages */
  signedPreKeyStore?: SignedPreKeyStore;
  /** Required to decrypt pre-key messages */
  kyberPreKeyStore?: KyberPreKeyStore;
}

/**
 * Starts sessions with remote devices from their published pre-keys.
 */
export class SessionBuilder {
  private readonly log: Logger;

  constructor(
    private readonly context: NativeContext,
    private readonly stores: SessionStores
  ) {
    this.log = context.logger('SessionBuilder');
  }

  /**
   * Start a session with `remoteAddress` from its bundle. An existing
   * session is archived. The bundle's identity is saved.
   *
   * @param now - Current time in milliseconds since the epoch
   * @throws NativeError with code UntrustedIdentity when the identity store
   *   rejects the bundle's identity
   * @throws CryptoError when the signed pre-key signature does not verify
   */
  async processPreKeyBundle(
    remoteAddress: ProtocolAddress,
    bundle: PreKeyBundle,
    now: number = Date.now()
  ): Promise<void> {
    const operation = 'signal_process_prekey_bundle';
    const { sessionStore, identityKeyStore } = this.stores;
    const identityKey = bundle.getIdentityKey();
    try {
      await requireTrustedIdentity(identityKeyStore, remoteAddress, identityKey, Direction.SENDING, operation);
    } finally {
      identityKey.dispose();
    }

    await withStoreBridge(this.context, operation, async (bridge) => {
      const sessions = await bridge.sessions(sessionStore, remoteAddress);
      const identities = await bridge.identities(identityKeyStore, remoteAddress);
      bundle._handle.use((bundlePointer) =>
        remoteAddress._handle.use((address) =>
          bridge.call(() =>
            this.context.check(
              operation,
              this.context.ffi.signal_process_prekey_bundle(bundlePointer, address, sessions, identities, now)
            )
          )
        )
      );
    });
    this.log.debug(`session started with ${remoteAddress.toString()}`);
  }
}

/**
 * Encrypts to and decrypts from one remote device over an established
 * session.
 */
export class SessionCipher {
  private readonly log: Logger;

  constructor(
    private readonly context: NativeContext,
    private readonly stores: SessionCipherStores
  ) {
    this.log = context.logger('SessionCipher');
  }

  /**
   * Encrypt for `remoteAddress`. Until the remote side answers, the result
   * is a pre-key message.
   *
   * @param now - Current time in milliseconds since the epoch
   * @throws NativeError with code SessionNotFound when there is no session
   */
  async encrypt(
    remoteAddress: ProtocolAddress,
    plaintext: Uint8Array,
    now: number = Date.now()
  ): Promise<CiphertextMessage> {
    const handle = await this.encryptToHandle(remoteAddress, plaintext, now);
    try {
      return CiphertextMessage.read(this.context, handle);
    } finally {
      handle.dispose();
    }
  }

  /**
   * As encrypt, keeping the engine's message for sealed sender.
   * @internal
   */
  async encryptToHandle(
    remoteAddress: ProtocolAddress,
    plaintext: Uint8Array,
    now: number
  ): Promise<ResourceHandle<'CiphertextMessage'>> {
    const operation = 'signal_encrypt_message';
    const { sessionStore, identityKeyStore } = this.stores;
    if (!(await sessionStore.containsSession(remoteAddress))) {
      throw errorFromNativeCode(
        NativeErrorCode.SessionNotFound,
        operation,
        `no session with ${remoteAddress.toString()}`
      );
    }

    return withStoreBridge(this.context, operation, async (bridge) => {
      const sessions = await bridge.sessions(sessionStore, remoteAddress);
      const identities = await bridge.identities(identityKeyStore, remoteAddress);
      return remoteAddress._handle.use((address) =>
        bridge.call(() =>
          this.context.withSecretCopy(
            plaintext,
            (buffer) =>
              this.context.create(NativeTypes.CiphertextMessage, operation, (out) =>
                this.context.ffi.signal_encrypt_message(out, buffer, address, sessions, identities, now)
              ),
            'plaintext'
          )
        )
      );
    });
  }

  /**
   * Decrypt a whisper message from `remoteAddress`.
   *
   * @throws SerializationError when the message does not authenticate
   * @throws NativeError with code DuplicatedMessage for a replayed message
   */
  async decryptSignalMessage(remoteAddress: ProtocolAddress, ciphertext: Uint8Array): Promise<SecureBuffer> {
    const operation = 'signal_decrypt_message';
    const { sessionStore, identityKeyStore } = this.stores;
    const message = SignalMessage.deserialize(this.context, ciphertext);
    try {
      return await withStoreBridge(this.context, operation, async (bridge) => {
        const sessions = await bridge.sessions(sessionStore, remoteAddress);
        const identities = await bridge.identities(identityKeyStore, remoteAddress);
        return message._handle.use((messagePointer) =>
          remoteAddress._handle.use((address) =>
            bridge.call(() =>
              this.context.takeSecret(operation, (out) =>
                this.context.ffi.signal_decrypt_message(out, messagePointer, address, sessions, identities)
              )
            )
          )
        );
      });
    } finally {
      message.dispose();
    }
  }

  /**
   * Decrypt the first message of a session started by `remoteAddress`,
   * building the session from our pre-keys. The one-time pre-key is
   * removed and the Kyber pre-key marked used.
   *
   * @throws InvalidArgumentError when a pre-key store is missing
   * @throws NativeError with code UntrustedIdentity when the identity store
   *   rejects the sender's identity
   * @throws NativeError with code InvalidKeyIdentifier when a pre-key the
   *   message names is not stored
   */
  async decryptPreKeySignalMessage(remoteAddress: ProtocolAddress, ciphertext: Uint8Array): Promise<SecureBuffer> {
    const operation = 'signal_decrypt_pre_key_message';
    const { sessionStore, identityKeyStore, preKeyStore, signedPreKeyStore, kyberPreKeyStore } = this.stores;
    if (preKeyStore === undefined || signedPreKeyStore === undefined || kyberPreKeyStore === undefined) {
      throw new InvalidArgumentError(
        'stores',
        'Pre-key, signed pre-key and Kyber pre-key stores are required for pre-key messages'
      );
    }

    const message = PreKeySignalMessage.deserialize(this.context, ciphertext);
    try {
      const identityKey = message.getIdentityKey();
      try {
        await requireTrustedIdentity(identityKeyStore, remoteAddress, identityKey, Direction.RECEIVING, operation);
      } finally {
        identityKey.dispose();
      }

      const plaintext = await withStoreBridge(this.context, operation, async (bridge) => {
        const sessions = await bridge.sessions(sessionStore, remoteAddress);
        const identities = await bridge.identities(identityKeyStore, remoteAddress);
        const preKeys = await bridge.preKeys(preKeyStore, message.preKeyId);
        const signedPreKeys = await bridge.signedPreKeys(signedPreKeyStore, message.signedPreKeyId);
        const kyberPreKeys = await bridge.kyberPreKeys(kyberPreKeyStore);
        return message._handle.use((messagePointer) =>
          remoteAddress._handle.use((address) =>
            bridge.call(() =>
              this.context.takeSecret(operation, (out) =>
                this.context.ffi.signal_decrypt_pre_key_message(
                  out,
                  messagePointer,
                  address,
                  sessions,
                  identities,
                  preKeys,
                  signedPreKeys,
                  kyberPreKeys
                )
              )
            )
          )
        );
      });
      this.log.debug(`session accepted from ${remoteAddress.toString()}`);
      return plaintext;
    } finally {
      message.dispose();
    }
  }
}
