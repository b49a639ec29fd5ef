/**
 * Sealed sender: messages whose sender is known only to the recipient.
 */

import { SenderCertificate } from './certificate.js';
import type { NativeContext } from './context.js';
import { DisposedError, InvalidArgumentError } from './exceptions.js';
import { NativeTypes } from './ffi/native-types.js';
import type { BorrowedBuffer } from './ffi/types.js';
import { NativeObject, ResourceHandle } from './handle.js';
import type { Logger } from './logger.js';
import { ProtocolAddress } from './protocol.js';
import { CiphertextMessageType, ciphertextMessageType, SessionCipher } from './session.js';
import type { SessionStores } from './session.js';
import { withStoreBridge } from './store-bridge.js';
import { validateUnidentifiedSenderMessageContent } from './validator.js';

/**
 * What the recipient should do with a message it cannot decrypt.
 */
export enum ContentHint {
  /** Show an error */
  None = 0,
  /** Ask the sender to resend */
  Resendable = 1,
  /** Drop it silently */
  Implicit = 2,
}

const EMPTY_BUFFER: BorrowedBuffer = { base: null, length: 0 };

/**
 * The inner layer of a sealed-sender message: the encrypted message, the
 * sender's certificate and delivery hints.
 */
export class UnidentifiedSenderMessageContent extends NativeObject<'UnidentifiedSenderMessageContent'> {
  private constructor(handle: ResourceHandle<'UnidentifiedSenderMessageContent'>) {
    super(handle);
  }

  /** @internal */
  static fromHandle(
    handle: ResourceHandle<'UnidentifiedSenderMessageContent'>
  ): UnidentifiedSenderMessageContent {
    return new UnidentifiedSenderMessageContent(handle);
  }

  static deserialize(context: NativeContext, data: Uint8Array): UnidentifiedSenderMessageContent {
    validateUnidentifiedSenderMessageContent(data);
    return new UnidentifiedSenderMessageContent(
      context.create(
        NativeTypes.UnidentifiedSenderMessageContent,
        'signal_unidentified_sender_message_content_deserialize',
        (out) =>
          context.ffi.signal_unidentified_sender_message_content_deserialize(
            out,
            context.borrow(data, 'unidentifiedSenderMessageContent')
          )
      )
    );
  }

  serialize(): Uint8Array {
    return this.readBytes('signal_unidentified_sender_message_content_serialize', (ffi, out, content) =>
      ffi.signal_unidentified_sender_message_content_serialize(out, content)
    );
  }

  /** The serialized inner message, of type msgType. */
  get contents(): Uint8Array {
    return this.readBytes('signal_unidentified_sender_message_content_get_contents', (ffi, out, content) =>
      ffi.signal_unidentified_sender_message_content_get_contents(out, content)
    );
  }

  get msgType(): CiphertextMessageType {
    return ciphertextMessageType(
      this.readNumber('signal_unidentified_sender_message_content_get_msg_type', (ffi, out, content) =>
        ffi.signal_unidentified_sender_message_content_get_msg_type(out, content)
      )
    );
  }

  /**
   * Hints outside the known range read as None.
   */
  get contentHint(): ContentHint {
    const hint = this.readNumber(
      'signal_unidentified_sender_message_content_get_content_hint',
      (ffi, out, content) => ffi.signal_unidentified_sender_message_content_get_content_hint(out, content)
    );
    switch (hint) {
      case ContentHint.Resendable:
        return ContentHint.Resendable;
      case ContentHint.Implicit:
        return ContentHint.Implicit;
      default:
        return ContentHint.None;
    }
  }

  /** The group the message was sent to, or null for a direct message. */
  get groupId(): Uint8Array | null {
    const groupId = this.readBytes(
      'signal_unidentified_sender_message_content_get_group_id_or_empty',
      (ffi, out, content) => ffi.signal_unidentified_sender_message_content_get_group_id_or_empty(out, content)
    );
    return groupId.length === 0 ? null : groupId;
  }

  getSenderCertificate(): SenderCertificate {
    return SenderCertificate.fromHandle(
      this.readChild(
        NativeTypes.SenderCertificate,
        'signal_unidentified_sender_message_content_get_sender_cert',
        (ffi, out, content) => ffi.signal_unidentified_sender_message_content_get_sender_cert(out, content)
      )
    );
  }
}

export interface SealedEncryptOptions {
  contentHint?: ContentHint;
  /** Group the message belongs to */
  groupId?: Uint8Array;
  /** Current time in milliseconds since the epoch */
  now?: number;
}

/**
 * Encrypts a session message and seals it so that only the recipient
 * learns the sender.
 */
export class SealedSessionCipher {
  private readonly log: Logger;

  constructor(
    private readonly context: NativeContext,
    private readonly stores: SessionStores
  ) {
    this.log = context.logger('SealedSessionCipher');
  }

  /**
   * Encrypt `plaintext` over the session with `destination`, wrap it with
   * `senderCertificate` and seal the result to the recipient's identity.
   *
   * @throws NativeError with code SessionNotFound when there is no session
   */
  async encrypt(
    destination: ProtocolAddress,
    plaintext: Uint8Array,
    senderCertificate: SenderCertificate,
    options: SealedEncryptOptions = {}
  ): Promise<Uint8Array> {
    const operation = 'signal_sealed_session_cipher_encrypt';
    if (senderCertificate.isDisposed) {
      throw new DisposedError('SenderCertificate');
    }
    const contentHint = options.contentHint ?? ContentHint.None;
    const groupId = options.groupId;

    const message = await new SessionCipher(this.context, this.stores).encryptToHandle(
      destination,
      plaintext,
      options.now ?? Date.now()
    );
    let content: UnidentifiedSenderMessageContent;
    try {
      content = UnidentifiedSenderMessageContent.fromHandle(
        message.use((messagePointer) =>
          senderCertificate._handle.use((certificate) =>
            this.context.create(
              NativeTypes.UnidentifiedSenderMessageContent,
              'signal_unidentified_sender_message_content_new',
              (out) =>
                this.context.ffi.signal_unidentified_sender_message_content_new(
                  out,
                  messagePointer,
                  certificate,
                  contentHint,
                  groupId === undefined ? EMPTY_BUFFER : this.context.borrow(groupId, 'groupId')
                )
            )
          )
        )
      );
    } finally {
      message.dispose();
    }

    try {
      return await withStoreBridge(this.context, operation, async (bridge) => {
        const identities = await bridge.identities(this.stores.identityKeyStore, destination);
        return content._handle.use((contentPointer) =>
          destination._handle.use((address) =>
            bridge.call(() =>
              this.context.takeBuffer(operation, (out) =>
                this.context.ffi.signal_sealed_session_cipher_encrypt(out, address, contentPointer, identities)
              )
            )
          )
        );
      });
    } finally {
      content.dispose();
    }
  }

  /**
   * Open a sealed message with our identity key. The sender certificate is
   * not validated here; check it against the trust root before using the
   * content.
   *
   * @throws SerializationError when the message is not sealed to us
   */
  async decryptToUsmc(ciphertext: Uint8Array): Promise<UnidentifiedSenderMessageContent> {
    const operation = 'signal_sealed_session_cipher_decrypt_to_usmc';
    if (ciphertext.length === 0) {
      throw new InvalidArgumentError('ciphertext', 'Cannot be empty');
    }
    const content = await withStoreBridge(this.context, operation, async (bridge) => {
      const identities = await bridge.identities(this.stores.identityKeyStore);
      return UnidentifiedSenderMessageContent.fromHandle(
        bridge.call(() =>
          this.context.create(NativeTypes.UnidentifiedSenderMessageContent, operation, (out) =>
            this.context.ffi.signal_sealed_session_cipher_decrypt_to_usmc(
              out,
              this.context.borrow(ciphertext, 'ciphertext'),
              identities
            )
          )
        )
      );
    });
    this.log.debug(`unsealed ${ciphertext.length}-byte message`);
    return content;
  }
}
