/**
 * Sender keys for group messaging
 */

import { stringify as uuidStringify } from 'uuid';
import type { NativeContext } from './context.js';
import { NativeTypes } from './ffi/native-types.js';
import { NativeObject, ResourceHandle } from './handle.js';
import { PublicKey } from './keys.js';
import { SecureBuffer } from './memory.js';
import {
  validateSenderKeyDistributionMessage,
  validateSenderKeyMessage,
  validateSenderKeyRecord,
} from './validator.js';

export class SenderKeyRecord extends NativeObject<'SenderKeyRecord'> {
  private constructor(handle: ResourceHandle<'SenderKeyRecord'>) {
    super(handle);
  }

  /** @internal */
  static fromHandle(handle: ResourceHandle<'SenderKeyRecord'>): SenderKeyRecord {
    return new SenderKeyRecord(handle);
  }

  static deserialize(context: NativeContext, data: Uint8Array): SenderKeyRecord {
    validateSenderKeyRecord(data);
    return new SenderKeyRecord(
      context.withSecretCopy(
        data,
        (buffer) =>
          context.create(NativeTypes.SenderKeyRecord, 'signal_sender_key_record_deserialize', (out) =>
            context.ffi.signal_sender_key_record_deserialize(out, buffer)
          ),
        'senderKeyRecord'
      )
    );
  }

  serialize(): Uint8Array {
    return this.readBytes('signal_sender_key_record_serialize', (ffi, out, record) =>
      ffi.signal_sender_key_record_serialize(out, record)
    );
  }

  clone(): SenderKeyRecord {
    return new SenderKeyRecord(this._handle.clone());
  }
}

export class SenderKeyMessage extends NativeObject<'SenderKeyMessage'> {
  private constructor(handle: ResourceHandle<'SenderKeyMessage'>) {
    super(handle);
  }

  static deserialize(context: NativeContext, data: Uint8Array): SenderKeyMessage {
    validateSenderKeyMessage(data);
    return new SenderKeyMessage(
      context.create(NativeTypes.SenderKeyMessage, 'signal_sender_key_message_deserialize', (out) =>
        context.ffi.signal_sender_key_message_deserialize(out, context.borrow(data, 'senderKeyMessage'))
      )
    );
  }

  serialize(): Uint8Array {
    return this.readBytes('signal_sender_key_message_serialize', (ffi, out, message) =>
      ffi.signal_sender_key_message_serialize(out, message)
    );
  }

  get cipherText(): Uint8Array {
    return this.readBytes('signal_sender_key_message_get_cipher_text', (ffi, out, message) =>
      ffi.signal_sender_key_message_get_cipher_text(out, message)
    );
  }

  get iteration(): number {
    return this.readNumber('signal_sender_key_message_get_iteration', (ffi, out, message) =>
      ffi.signal_sender_key_message_get_iteration(out, message)
    );
  }

  get chainId(): number {
    return this.readNumber('signal_sender_key_message_get_chain_id', (ffi, out, message) =>
      ffi.signal_sender_key_message_get_chain_id(out, message)
    );
  }

  /** Group distribution id as a lowercase UUID string. */
  get distributionId(): string {
    return uuidStringify(
      this.readUuid('signal_sender_key_message_get_distribution_id', (ffi, out, message) =>
        ffi.signal_sender_key_message_get_distribution_id(out, message)
      )
    );
  }

  verifySignature(key: PublicKey): boolean {
    return key._handle.use((keyPointer) =>
      this.readBoolean('signal_sender_key_message_verify_signature', (ffi, out, message) =>
        ffi.signal_sender_key_message_verify_signature(out, message, keyPointer)
      )
    );
  }

  clone(): SenderKeyMessage {
    return new SenderKeyMessage(this._handle.clone());
  }
}

export class SenderKeyDistributionMessage extends NativeObject<'SenderKeyDistributionMessage'> {
  private constructor(handle: ResourceHandle<'SenderKeyDistributionMessage'>) {
    super(handle);
  }

  /** @internal */
  static fromHandle(handle: ResourceHandle<'SenderKeyDistributionMessage'>): SenderKeyDistributionMessage {
    return new SenderKeyDistributionMessage(handle);
  }

  static deserialize(context: NativeContext, data: Uint8Array): SenderKeyDistributionMessage {
    validateSenderKeyDistributionMessage(data);
    return new SenderKeyDistributionMessage(
      context.withSecretCopy(
        data,
        (buffer) =>
          context.create(
            NativeTypes.SenderKeyDistributionMessage,
            'signal_sender_key_distribution_message_deserialize',
            (out) => context.ffi.signal_sender_key_distribution_message_deserialize(out, buffer)
          ),
        'senderKeyDistributionMessage'
      )
    );
  }

  serialize(): Uint8Array {
    return this.readBytes('signal_sender_key_distribution_message_serialize', (ffi, out, message) =>
      ffi.signal_sender_key_distribution_message_serialize(out, message)
    );
  }

  get chainKey(): SecureBuffer {
    return this.readSecret('signal_sender_key_distribution_message_get_chain_key', (ffi, out, message) =>
      ffi.signal_sender_key_distribution_message_get_chain_key(out, message)
    );
  }

  get iteration(): number {
    return this.readNumber('signal_sender_key_distribution_message_get_iteration', (ffi, out, message) =>
      ffi.signal_sender_key_distribution_message_get_iteration(out, message)
    );
  }

  get chainId(): number {
    return this.readNumber('signal_sender_key_distribution_message_get_chain_id', (ffi, out, message) =>
      ffi.signal_sender_key_distribution_message_get_chain_id(out, message)
    );
  }

  get distributionId(): string {
    return uuidStringify(
      this.readUuid('signal_sender_key_distribution_message_get_distribution_id', (ffi, out, message) =>
        ffi.signal_sender_key_distribution_message_get_distribution_id(out, message)
      )
    );
  }

  getSignatureKey(): PublicKey {
    return PublicKey.fromHandle(
      this.readChild(
        NativeTypes.PublicKey,
        'signal_sender_key_distribution_message_get_signature_key',
        (ffi, out, message) => ffi.signal_sender_key_distribution_message_get_signature_key(out, message)
      )
    );
  }

  clone(): SenderKeyDistributionMessage {
    return new SenderKeyDistributionMessage(this._handle.clone());
  }
}
