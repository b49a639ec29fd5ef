/**
 * Group messaging with sender keys.
 *
 * @example
 * ```typescript
 * const session = new GroupSession(context, me, distributionId, senderKeyStore);
 * const distribution = await session.createDistributionMessage();
 * // send distribution.serialize() to every member, then:
 * const ciphertext = await session.encrypt(plaintext);
 * ```
 */

import { stringify as uuidStringify } from 'uuid';
import type { NativeContext } from './context.js';
import { InvalidArgumentError } from './exceptions.js';
import { NativeTypes } from './ffi/native-types.js';
import { SenderKeyDistributionMessage } from './groups.js';
import type { Logger } from './logger.js';
import { SecureBuffer } from './memory.js';
import { ProtocolAddress } from './protocol.js';
import { CiphertextMessage } from './session.js';
import { distributionIdBytes, withStoreBridge } from './store-bridge.js';
import type { SenderKeyStore } from './store.js';

/**
 * The sender keys of one distribution (one group, as seen by one sender).
 */
export class GroupSession {
  /** Lowercase UUID string */
  readonly distributionId: string;
  private readonly distributionBytes: Uint8Array;
  private readonly log: Logger;

  /**
   * @param senderAddress - Our own address, used when we send
   * @param distributionId - UUID string or its 16 bytes
   * @throws InvalidArgumentError for a malformed distribution id
   */
  constructor(
    private readonly context: NativeContext,
    readonly senderAddress: ProtocolAddress,
    distributionId: string | Uint8Array,
    private readonly store: SenderKeyStore
  ) {
    if (typeof distributionId === 'string') {
      this.distributionBytes = distributionIdBytes(distributionId);
      this.distributionId = distributionId.toLowerCase();
    } else {
      if (distributionId.length !== 16) {
        throw new InvalidArgumentError('distributionId', `Must be 16 bytes, got ${distributionId.length}`);
      }
      this.distributionBytes = Uint8Array.from(distributionId);
      this.distributionId = uuidStringify(this.distributionBytes);
    }
    this.log = context.logger('GroupSession');
  }

  /**
   * Create, or reuse, our sender key and describe it for the other members.
   */
  async createDistributionMessage(): Promise<SenderKeyDistributionMessage> {
    const operation = 'signal_sender_key_distribution_message_create';
    return withStoreBridge(this.context, operation, async (bridge) => {
      const store = await bridge.senderKeys(this.store, this.senderAddress, this.distributionId);
      return SenderKeyDistributionMessage.fromHandle(
        this.senderAddress._handle.use((sender) =>
          bridge.call(() =>
            this.context.create(NativeTypes.SenderKeyDistributionMessage, operation, (out) =>
              this.context.ffi.signal_sender_key_distribution_message_create(
                out,
                sender,
                this.distributionBytes,
                store
              )
            )
          )
        )
      );
    });
  }

  /**
   * Store the sender key another member distributed.
   * @throws InvalidArgumentError when the message is for another distribution
   */
  async processDistributionMessage(
    senderAddress: ProtocolAddress,
    message: SenderKeyDistributionMessage
  ): Promise<void> {
    const operation = 'signal_process_sender_key_distribution_message';
    const distributionId = message.distributionId;
    if (distributionId !== this.distributionId) {
      throw new InvalidArgumentError(
        'message',
        `Distribution ${distributionId} does not match ${this.distributionId}`
      );
    }
    await withStoreBridge(this.context, operation, async (bridge) => {
      const store = await bridge.senderKeys(this.store, senderAddress, this.distributionId);
      message._handle.use((messagePointer) =>
        senderAddress._handle.use((sender) =>
          bridge.call(() =>
            this.context.check(
              operation,
              this.context.ffi.signal_process_sender_key_distribution_message(sender, messagePointer, store)
            )
          )
        )
      );
    });
    this.log.debug(`sender key of ${senderAddress.toString()} stored for ${this.distributionId}`);
  }

  /**
   * Encrypt with our sender key.
   * @returns A serialized sender key message
   * @throws NativeError with code InvalidSenderKeySession before
   *   createDistributionMessage
   */
  async encrypt(plaintext: Uint8Array): Promise<Uint8Array> {
    const operation = 'signal_group_encrypt_message';
    return withStoreBridge(this.context, operation, async (bridge) => {
      const store = await bridge.senderKeys(this.store, this.senderAddress, this.distributionId);
      const handle = this.senderAddress._handle.use((sender) =>
        bridge.call(() =>
          this.context.withSecretCopy(
            plaintext,
            (buffer) =>
              this.context.create(NativeTypes.CiphertextMessage, operation, (out) =>
                this.context.ffi.signal_group_encrypt_message(out, sender, this.distributionBytes, buffer, store)
              ),
            'plaintext'
          )
        )
      );
      try {
        return CiphertextMessage.read(this.context, handle).serialized;
      } finally {
        handle.dispose();
      }
    });
  }

  /**
   * Decrypt a sender key message from `senderAddress`.
   *
   * @throws NativeError with code InvalidSenderKeySession when we hold no
   *   sender key for the sender
   * @throws CryptoError when the message signature does not verify
   */
  async decrypt(senderAddress: ProtocolAddress, ciphertext: Uint8Array): Promise<SecureBuffer> {
    const operation = 'signal_group_decrypt_message';
    if (ciphertext.length === 0) {
      throw new InvalidArgumentError('ciphertext', 'Cannot be empty');
    }
    return withStoreBridge(this.context, operation, async (bridge) => {
      const store = await bridge.senderKeys(this.store, senderAddress, this.distributionId);
      return senderAddress._handle.use((sender) =>
        bridge.call(() =>
          this.context.takeSecret(operation, (out) =>
            this.context.ffi.signal_group_decrypt_message(
              out,
              sender,
              this.context.borrow(ciphertext, 'ciphertext'),
              store
            )
          )
        )
      );
    });
  }
}
