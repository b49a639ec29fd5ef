/**
 * Destructor and clone entry points per native type.
 */

import type {
  ConstPointer,
  FfiError,
  MutPointer,
  NativeTypeName,
  Out,
  SignalFfi,
} from './types.js';

export interface NativeType<T extends NativeTypeName> {
  readonly name: T;
  destroy(ffi: SignalFfi, pointer: MutPointer<T>): FfiError | null;
  clone?(ffi: SignalFfi, out: Out<MutPointer<T>>, pointer: ConstPointer<T>): FfiError | null;
}

export const NativeTypes = {
  PublicKey: {
    name: 'PublicKey',
    destroy: (ffi, p) => ffi.signal_publickey_destroy(p),
    clone: (ffi, out, p) => ffi.signal_publickey_clone(out, p),
  },
  PrivateKey: {
    name: 'PrivateKey',
    destroy: (ffi, p) => ffi.signal_privatekey_destroy(p),
    clone: (ffi, out, p) => ffi.signal_privatekey_clone(out, p),
  },
  KyberPublicKey: {
    name: 'KyberPublicKey',
    destroy: (ffi, p) => ffi.signal_kyber_public_key_destroy(p),
    clone: (ffi, out, p) => ffi.signal_kyber_public_key_clone(out, p),
  },
  KyberSecretKey: {
    name: 'KyberSecretKey',
    destroy: (ffi, p) => ffi.signal_kyber_secret_key_destroy(p),
    clone: (ffi, out, p) => ffi.signal_kyber_secret_key_clone(out, p),
  },
  KyberKeyPair: {
    name: 'KyberKeyPair',
    destroy: (ffi, p) => ffi.signal_kyber_key_pair_destroy(p),
    clone: (ffi, out, p) => ffi.signal_kyber_key_pair_clone(out, p),
  },
  PreKeyRecord: {
    name: 'PreKeyRecord',
    destroy: (ffi, p) => ffi.signal_pre_key_record_destroy(p),
    clone: (ffi, out, p) => ffi.signal_pre_key_record_clone(out, p),
  },
  SignedPreKeyRecord: {
    name: 'SignedPreKeyRecord',
    destroy: (ffi, p) => ffi.signal_signed_pre_key_record_destroy(p),
    clone: (ffi, out, p) => ffi.signal_signed_pre_key_record_clone(out, p),
  },
  KyberPreKeyRecord: {
    name: 'KyberPreKeyRecord',
    destroy: (ffi, p) => ffi.signal_kyber_pre_key_record_destroy(p),
    clone: (ffi, out, p) => ffi.signal_kyber_pre_key_record_clone(out, p),
  },
  PreKeyBundle: {
    name: 'PreKeyBundle',
    destroy: (ffi, p) => ffi.signal_pre_key_bundle_destroy(p),
    clone: (ffi, out, p) => ffi.signal_pre_key_bundle_clone(out, p),
  },
  ProtocolAddress: {
    name: 'ProtocolAddress',
    destroy: (ffi, p) => ffi.signal_address_destroy(p),
    clone: (ffi, out, p) => ffi.signal_address_clone(out, p),
  },
  SessionRecord: {
    name: 'SessionRecord',
    destroy: (ffi, p) => ffi.signal_session_record_destroy(p),
    clone: (ffi, out, p) => ffi.signal_session_record_clone(out, p),
  },
  SignalMessage: {
    name: 'SignalMessage',
    destroy: (ffi, p) => ffi.signal_message_destroy(p),
    clone: (ffi, out, p) => ffi.signal_message_clone(out, p),
  },
  DecryptionErrorMessage: {
    name: 'DecryptionErrorMessage',
    destroy: (ffi, p) => ffi.signal_decryption_error_message_destroy(p),
    clone: (ffi, out, p) => ffi.signal_decryption_error_message_clone(out, p),
  },
  SenderKeyRecord: {
    name: 'SenderKeyRecord',
    destroy: (ffi, p) => ffi.signal_sender_key_record_destroy(p),
    clone: (ffi, out, p) => ffi.signal_sender_key_record_clone(out, p),
  },
  SenderKeyMessage: {
    name: 'SenderKeyMessage',
    destroy: (ffi, p) => ffi.signal_sender_key_message_destroy(p),
    clone: (ffi, out, p) => ffi.signal_sender_key_message_clone(out, p),
  },
  SenderKeyDistributionMessage: {
    name: 'SenderKeyDistributionMessage',
    destroy: (ffi, p) => ffi.signal_sender_key_distribution_message_destroy(p),
    clone: (ffi, out, p) => ffi.signal_sender_key_distribution_message_clone(out, p),
  },
  ServerCertificate: {
    name: 'ServerCertificate',
    destroy: (ffi, p) => ffi.signal_server_certificate_destroy(p),
    clone: (ffi, out, p) => ffi.signal_server_certificate_clone(out, p),
  },
  SenderCertificate: {
    name: 'SenderCertificate',
    destroy: (ffi, p) => ffi.signal_sender_certificate_destroy(p),
    clone: (ffi, out, p) => ffi.signal_sender_certificate_clone(out, p),
  },
  // The engine exposes no clone for cipher contexts.
  Aes256GcmSiv: {
    name: 'Aes256GcmSiv',
    destroy: (ffi, p) => ffi.signal_aes256_gcm_siv_destroy(p),
  },
  Fingerprint: {
    name: 'Fingerprint',
    destroy: (ffi, p) => ffi.signal_fingerprint_destroy(p),
    clone: (ffi, out, p) => ffi.signal_fingerprint_clone(out, p),
  },
  CiphertextMessage: {
    name: 'CiphertextMessage',
    destroy: (ffi, p) => ffi.signal_ciphertext_message_destroy(p),
  },
  PreKeySignalMessage: {
    name: 'PreKeySignalMessage',
    destroy: (ffi, p) => ffi.signal_pre_key_signal_message_destroy(p),
    clone: (ffi, out, p) => ffi.signal_pre_key_signal_message_clone(out, p),
  },
  UnidentifiedSenderMessageContent: {
    name: 'UnidentifiedSenderMessageContent',
    destroy: (ffi, p) => ffi.signal_unidentified_sender_message_content_destroy(p),
  },
} satisfies { [K in NativeTypeName]: NativeType<K> };
