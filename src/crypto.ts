/**
 * Symmetric primitives exposed by the native engine
 *
 * AES-256-GCM-SIV for nonce-misuse-resistant authenticated encryption and
 * HKDF-SHA256 for key derivation. Key material is handed to the engine
 * through zeroed scratch copies; derived keys come back as SecureBuffers.
 */

import type { NativeContext } from './context.js';
import { InvalidArgumentError } from './exceptions.js';
import { NativeTypes } from './ffi/native-types.js';
import { NativeObject, ResourceHandle } from './handle.js';
import { SecureBuffer, zeroBytes } from './memory.js';

const KEY_LENGTH = 32; // 256 bits
const NONCE_LENGTH = 12; // 96 bits
const TAG_LENGTH = 16; // 128 bits

/** Largest HKDF-SHA256 output: 255 blocks of 32 bytes. */
export const MAX_HKDF_OUTPUT = 255 * 32;

/**
 * An AES-256-GCM-SIV cipher bound to one key.
 *
 * The engine has no clone for cipher contexts; create another from the key
 * when a second instance is needed.
 */
export class Aes256GcmSiv extends NativeObject<'Aes256GcmSiv'> {
  private constructor(handle: ResourceHandle<'Aes256GcmSiv'>) {
    super(handle);
  }

  /**
   * @param key - 32 bytes; copied for the call, never retained
   * @throws InvalidArgumentError for a key of any other length
   */
  static create(context: NativeContext, key: Uint8Array): Aes256GcmSiv {
    if (key.length !== KEY_LENGTH) {
      throw new InvalidArgumentError(
        'key',
        `Invalid length: expected ${KEY_LENGTH} bytes, got ${key.length}`
      );
    }
    return new Aes256GcmSiv(
      context.withSecretCopy(
        key,
        (buffer) =>
          context.create(NativeTypes.Aes256GcmSiv, 'signal_aes256_gcm_siv_new', (out) =>
            context.ffi.signal_aes256_gcm_siv_new(out, buffer)
          ),
        'key'
      )
    );
  }

  /**
   * Encrypt `plaintext`; the result is the ciphertext followed by the
   * 16-byte tag.
   */
  encrypt(plaintext: Uint8Array, nonce: Uint8Array, associatedData: Uint8Array = new Uint8Array(0)): Uint8Array {
    checkNonce(nonce);
    return this.readBytes('signal_aes256_gcm_siv_encrypt', (ffi, out, cipher) =>
      ffi.signal_aes256_gcm_siv_encrypt(
        out,
        cipher,
        this.context.borrow(plaintext, 'plaintext'),
        this.context.borrow(nonce, 'nonce'),
        this.context.borrow(associatedData, 'associatedData')
      )
    );
  }

  /**
   * Decrypt and authenticate.
   * @throws CryptoError when the tag does not verify
   */
  decrypt(ciphertext: Uint8Array, nonce: Uint8Array, associatedData: Uint8Array = new Uint8Array(0)): SecureBuffer {
    checkNonce(nonce);
    if (ciphertext.length < TAG_LENGTH) {
      throw new InvalidArgumentError(
        'ciphertext',
        `Data too short: expected at least ${TAG_LENGTH} bytes, got ${ciphertext.length}`
      );
    }
    return this.readSecret('signal_aes256_gcm_siv_decrypt', (ffi, out, cipher) =>
      ffi.signal_aes256_gcm_siv_decrypt(
        out,
        cipher,
        this.context.borrow(ciphertext, 'ciphertext'),
        this.context.borrow(nonce, 'nonce'),
        this.context.borrow(associatedData, 'associatedData')
      )
    );
  }
}

function checkNonce(nonce: Uint8Array): void {
  if (nonce.length !== NONCE_LENGTH) {
    throw new InvalidArgumentError(
      'nonce',
      `Invalid length: expected ${NONCE_LENGTH} bytes, got ${nonce.length}`
    );
  }
}

/**
 * Derive `outputLength` bytes with HKDF-SHA256.
 *
 * @param ikm - Input key material; copied for the call and the copy zeroed
 * @param info - Context label
 * @throws InvalidArgumentError when outputLength is not in 1..8160
 */
export function hkdf(
  context: NativeContext,
  outputLength: number,
  ikm: Uint8Array,
  info: Uint8Array,
  salt: Uint8Array = new Uint8Array(0)
): SecureBuffer {
  if (!Number.isInteger(outputLength) || outputLength < 1 || outputLength > MAX_HKDF_OUTPUT) {
    throw new InvalidArgumentError(
      'outputLength',
      `Must be between 1 and ${MAX_HKDF_OUTPUT}, got ${outputLength}`
    );
  }
  const output = new Uint8Array(outputLength);
  try {
    context.withSecretCopy(
      ikm,
      (secret) =>
        context.check(
          'signal_hkdf_derive',
          context.ffi.signal_hkdf_derive(
            { base: output, length: output.length },
            secret,
            context.borrow(info, 'info'),
            context.borrow(salt, 'salt')
          )
        ),
      'ikm'
    );
  } catch (error) {
    zeroBytes(output);
    throw error;
  }
  return new SecureBuffer(output);
}
