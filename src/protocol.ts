/**
 * Addresses, sessions and one-to-one messages
 */

import type { NativeContext } from './context.js';
import { InvalidArgumentError } from './exceptions.js';
import { NativeTypes } from './ffi/native-types.js';
import { NativeObject, ResourceHandle } from './handle.js';
import { PublicKey } from './keys.js';
import {
  validateDecryptionErrorMessage,
  validateSessionRecord,
  validateSignalMessage,
} from './validator.js';

/**
 * A device of a remote account: service id plus device number.
 */
export class ProtocolAddress extends NativeObject<'ProtocolAddress'> {
  private constructor(handle: ResourceHandle<'ProtocolAddress'>) {
    super(handle);
  }

  static create(context: NativeContext, name: string, deviceId: number): ProtocolAddress {
    if (name.length === 0) {
      throw new InvalidArgumentError('name', 'Cannot be empty');
    }
    if (!Number.isInteger(deviceId) || deviceId < 0 || deviceId > 0xffffffff) {
      throw new InvalidArgumentError('deviceId', `Must be a 32-bit unsigned integer, got ${deviceId}`);
    }
    return new ProtocolAddress(
      context.create(NativeTypes.ProtocolAddress, 'signal_address_new', (out) =>
        context.ffi.signal_address_new(out, name, deviceId)
      )
    );
  }

  get name(): string {
    return this.readString('signal_address_get_name', (ffi, out, address) =>
      ffi.signal_address_get_name(out, address)
    );
  }

  get deviceId(): number {
    return this.readNumber('signal_address_get_device_id', (ffi, out, address) =>
      ffi.signal_address_get_device_id(out, address)
    );
  }

  override toString(): string {
    return `${this.name}.${this.deviceId}`;
  }

  clone(): ProtocolAddress {
    return new ProtocolAddress(this._handle.clone());
  }
}

/**
 * Current and archived ratchet states for one remote device.
 */
export class SessionRecord extends NativeObject<'SessionRecord'> {
  private constructor(handle: ResourceHandle<'SessionRecord'>) {
    super(handle);
  }

  /** @internal */
  static fromHandle(handle: ResourceHandle<'SessionRecord'>): SessionRecord {
    return new SessionRecord(handle);
  }

  static deserialize(context: NativeContext, data: Uint8Array): SessionRecord {
    validateSessionRecord(data);
    return new SessionRecord(
      context.withSecretCopy(
        data,
        (buffer) =>
          context.create(NativeTypes.SessionRecord, 'signal_session_record_deserialize', (out) =>
            context.ffi.signal_session_record_deserialize(out, buffer)
          ),
        'sessionRecord'
      )
    );
  }

  serialize(): Uint8Array {
    return this.readBytes('signal_session_record_serialize', (ffi, out, record) =>
      ffi.signal_session_record_serialize(out, record)
    );
  }

  /**
   * Move the current state to the archive. The record is modified in place.
   */
  archiveCurrentState(): void {
    this._handle.use((record) =>
      this.context.check(
        'signal_session_record_archive_current_state',
        this.context.ffi.signal_session_record_archive_current_state(record)
      )
    );
  }

  /**
   * @param now - Current time in milliseconds since the epoch
   */
  hasUsableSenderChain(now: number = Date.now()): boolean {
    return this.readBoolean('signal_session_record_has_usable_sender_chain', (ffi, out, record) =>
      ffi.signal_session_record_has_usable_sender_chain(out, record, now)
    );
  }

  currentRatchetKeyMatches(key: PublicKey): boolean {
    return key._handle.use((keyPointer) =>
      this.readBoolean('signal_session_record_current_ratchet_key_matches', (ffi, out, record) =>
        ffi.signal_session_record_current_ratchet_key_matches(out, record, keyPointer)
      )
    );
  }

  get localRegistrationId(): number {
    return this.readNumber('signal_session_record_get_local_registration_id', (ffi, out, record) =>
      ffi.signal_session_record_get_local_registration_id(out, record)
    );
  }

  get remoteRegistrationId(): number {
    return this.readNumber('signal_session_record_get_remote_registration_id', (ffi, out, record) =>
      ffi.signal_session_record_get_remote_registration_id(out, record)
    );
  }

  clone(): SessionRecord {
    return new SessionRecord(this._handle.clone());
  }
}

/**
 * A Double Ratchet whisper message.
 */
export class SignalMessage extends NativeObject<'SignalMessage'> {
  private constructor(handle: ResourceHandle<'SignalMessage'>) {
    super(handle);
  }

  /** @internal */
  static fromHandle(handle: ResourceHandle<'SignalMessage'>): SignalMessage {
    return new SignalMessage(handle);
  }

  static deserialize(context: NativeContext, data: Uint8Array): SignalMessage {
    validateSignalMessage(data);
    return new SignalMessage(
      context.create(NativeTypes.SignalMessage, 'signal_message_deserialize', (out) =>
        context.ffi.signal_message_deserialize(out, context.borrow(data, 'signalMessage'))
      )
    );
  }

  serialize(): Uint8Array {
    return this.readBytes('signal_message_get_serialized', (ffi, out, message) =>
      ffi.signal_message_get_serialized(out, message)
    );
  }

  get body(): Uint8Array {
    return this.readBytes('signal_message_get_body', (ffi, out, message) =>
      ffi.signal_message_get_body(out, message)
    );
  }

  get counter(): number {
    return this.readNumber('signal_message_get_counter', (ffi, out, message) =>
      ffi.signal_message_get_counter(out, message)
    );
  }

  get messageVersion(): number {
    return this.readNumber('signal_message_get_message_version', (ffi, out, message) =>
      ffi.signal_message_get_message_version(out, message)
    );
  }

  getSenderRatchetKey(): PublicKey {
    return PublicKey.fromHandle(
      this.readChild(NativeTypes.PublicKey, 'signal_message_get_sender_ratchet_key', (ffi, out, message) =>
        ffi.signal_message_get_sender_ratchet_key(out, message)
      )
    );
  }

  clone(): SignalMessage {
    return new SignalMessage(this._handle.clone());
  }
}

/**
 * Sent back to a peer whose message could not be decrypted.
 */
export class DecryptionErrorMessage extends NativeObject<'DecryptionErrorMessage'> {
  private constructor(handle: ResourceHandle<'DecryptionErrorMessage'>) {
    super(handle);
  }

  static deserialize(context: NativeContext, data: Uint8Array): DecryptionErrorMessage {
    validateDecryptionErrorMessage(data);
    return new DecryptionErrorMessage(
      context.create(NativeTypes.DecryptionErrorMessage, 'signal_decryption_error_message_deserialize', (out) =>
        context.ffi.signal_decryption_error_message_deserialize(out, context.borrow(data, 'decryptionErrorMessage'))
      )
    );
  }

  serialize(): Uint8Array {
    return this.readBytes('signal_decryption_error_message_serialize', (ffi, out, message) =>
      ffi.signal_decryption_error_message_serialize(out, message)
    );
  }

  /** Timestamp of the message that failed, in milliseconds. */
  get timestamp(): number {
    return this.readU64('signal_decryption_error_message_get_timestamp', (ffi, out, message) =>
      ffi.signal_decryption_error_message_get_timestamp(out, message)
    );
  }

  get deviceId(): number {
    return this.readNumber('signal_decryption_error_message_get_device_id', (ffi, out, message) =>
      ffi.signal_decryption_error_message_get_device_id(out, message)
    );
  }

  /**
   * Ratchet key of the failed message, when it was a whisper message.
   */
  getRatchetKey(): PublicKey | null {
    const handle = this.readOptionalChild(
      NativeTypes.PublicKey,
      'signal_decryption_error_message_get_ratchet_key',
      (ffi, out, message) => ffi.signal_decryption_error_message_get_ratchet_key(out, message)
    );
    return handle ? PublicKey.fromHandle(handle) : null;
  }

  clone(): DecryptionErrorMessage {
    return new DecryptionErrorMessage(this._handle.clone());
  }
}
