/**
 * TypeScript view of the native engine's C ABI.
 *
 * Every fallible function returns an error pointer (null on success) and
 * writes its result through the first argument. Pointers are passed inside
 * `{ raw }` structs so each native type stays distinct.
 */

/** Logical types of the native objects this binding owns. */
export type NativeTypeName =
  | 'PublicKey'
  | 'PrivateKey'
  | 'KyberPublicKey'
  | 'KyberSecretKey'
  | 'KyberKeyPair'
  | 'PreKeyRecord'
  | 'SignedPreKeyRecord'
  | 'KyberPreKeyRecord'
  | 'PreKeyBundle'
  | 'ProtocolAddress'
  | 'SessionRecord'
  | 'SignalMessage'
  | 'DecryptionErrorMessage'
  | 'SenderKeyRecord'
  | 'SenderKeyMessage'
  | 'SenderKeyDistributionMessage'
  | 'ServerCertificate'
  | 'SenderCertificate'
  | 'Aes256GcmSiv'
  | 'Fingerprint'
  | 'CiphertextMessage'
  | 'PreKeySignalMessage'
  | 'UnidentifiedSenderMessageContent';

/**
 * Opaque native address. The tag exists only at compile time.
 */
export interface NativePointer<T extends string> {
  readonly __native?: T;
}

export type FfiError = NativePointer<'FfiError'>;

/** Engine-allocated bytes, released with signal_free_buffer. */
export type NativeMemory = NativePointer<'Memory'>;

export interface MutPointer<T extends NativeTypeName> {
  raw: NativePointer<T> | null;
}

export interface ConstPointer<T extends NativeTypeName> {
  raw: NativePointer<T> | null;
}

/** Caller-owned input, valid for one call. */
export interface BorrowedBuffer {
  base: Uint8Array | null;
  length: number;
}

/** Caller-owned output the engine writes into. */
export interface MutableBuffer {
  base: Uint8Array;
  length: number;
}

/** Engine-owned output; copy, then free exactly once. */
export interface OwnedBuffer {
  base: NativeMemory | null;
  length: number;
}

export interface BorrowedSlice<T> {
  base: ReadonlyArray<T>;
  length: number;
}

/** 16-byte fixed array written by the engine. */
export interface Uuid {
  bytes: Uint8Array;
}

/** One-element out-parameter. */
export type Out<T> = [T | null];

type Result = FfiError | null;
type Ptr<T extends NativeTypeName> = ConstPointer<T>;
type New<T extends NativeTypeName> = Out<MutPointer<T>>;
type U64 = number | bigint;

// ============================================================
// Store callbacks
// ============================================================

/**
 * Store callbacks run synchronously inside one engine call. Each returns
 * 0 on success and a negative status to fail the call; objects written
 * through an out-parameter pass to the engine.
 */
export interface FfiSessionStore {
  loadSession(out: New<'SessionRecord'>, address: Ptr<'ProtocolAddress'>): number;
  storeSession(address: Ptr<'ProtocolAddress'>, record: Ptr<'SessionRecord'>): number;
}

/** Wire values of the direction passed to isTrustedIdentity. */
export const FfiDirection = {
  Sending: 0,
  Receiving: 1,
} as const;

export interface FfiIdentityKeyStore {
  getIdentityKeyPair(out: New<'PrivateKey'>): number;
  getLocalRegistrationId(out: Out<number>): number;
  saveIdentity(address: Ptr<'ProtocolAddress'>, key: Ptr<'PublicKey'>): number;
  getIdentity(out: New<'PublicKey'>, address: Ptr<'ProtocolAddress'>): number;
  /** 1 when trusted, 0 when not, negative on failure. */
  isTrustedIdentity(address: Ptr<'ProtocolAddress'>, key: Ptr<'PublicKey'>, direction: number): number;
}

export interface FfiPreKeyStore {
  loadPreKey(out: New<'PreKeyRecord'>, id: number): number;
  storePreKey(id: number, record: Ptr<'PreKeyRecord'>): number;
  removePreKey(id: number): number;
}

export interface FfiSignedPreKeyStore {
  loadSignedPreKey(out: New<'SignedPreKeyRecord'>, id: number): number;
  storeSignedPreKey(id: number, record: Ptr<'SignedPreKeyRecord'>): number;
}

export interface FfiKyberPreKeyStore {
  loadKyberPreKey(out: New<'KyberPreKeyRecord'>, id: number): number;
  storeKyberPreKey(id: number, record: Ptr<'KyberPreKeyRecord'>): number;
  markKyberPreKeyUsed(id: number, signedPreKeyId: number, baseKey: Ptr<'PublicKey'>): number;
}

export interface FfiSenderKeyStore {
  loadSenderKey(
    out: New<'SenderKeyRecord'>,
    sender: Ptr<'ProtocolAddress'>,
    distributionId: Uint8Array
  ): number;
  storeSenderKey(
    sender: Ptr<'ProtocolAddress'>,
    distributionId: Uint8Array,
    record: Ptr<'SenderKeyRecord'>
  ): number;
}

/**
 * Native symbols used by the binding, named as exported by the engine.
 */
export interface SignalFfi {
  signal_error_get_type(error: FfiError): number;
  signal_error_get_message(out: Out<string>, error: FfiError): Result;
  signal_error_free(error: FfiError): void;
  signal_free_buffer(base: NativeMemory, length: number): void;

  signal_publickey_deserialize(out: New<'PublicKey'>, data: BorrowedBuffer): Result;
  signal_publickey_serialize(out: Out<OwnedBuffer>, key: Ptr<'PublicKey'>): Result;
  signal_publickey_get_public_key_bytes(out: Out<OwnedBuffer>, key: Ptr<'PublicKey'>): Result;
  signal_publickey_equals(out: Out<boolean>, lhs: Ptr<'PublicKey'>, rhs: Ptr<'PublicKey'>): Result;
  signal_publickey_compare(out: Out<number>, lhs: Ptr<'PublicKey'>, rhs: Ptr<'PublicKey'>): Result;
  signal_publickey_verify(
    out: Out<boolean>,
    key: Ptr<'PublicKey'>,
    message: BorrowedBuffer,
    signature: BorrowedBuffer
  ): Result;
  signal_publickey_clone(out: New<'PublicKey'>, key: Ptr<'PublicKey'>): Result;
  signal_publickey_destroy(key: MutPointer<'PublicKey'>): Result;

  signal_privatekey_generate(out: New<'PrivateKey'>): Result;
  signal_privatekey_deserialize(out: New<'PrivateKey'>, data: BorrowedBuffer): Result;
  signal_privatekey_serialize(out: Out<OwnedBuffer>, key: Ptr<'PrivateKey'>): Result;
  signal_privatekey_get_public_key(out: New<'PublicKey'>, key: Ptr<'PrivateKey'>): Result;
  signal_privatekey_sign(out: Out<OwnedBuffer>, key: Ptr<'PrivateKey'>, message: BorrowedBuffer): Result;
  signal_privatekey_agree(
    out: Out<OwnedBuffer>,
    privateKey: Ptr<'PrivateKey'>,
    publicKey: Ptr<'PublicKey'>
  ): Result;
  signal_privatekey_clone(out: New<'PrivateKey'>, key: Ptr<'PrivateKey'>): Result;
  signal_privatekey_destroy(key: MutPointer<'PrivateKey'>): Result;

  signal_identitykeypair_serialize(
    out: Out<OwnedBuffer>,
    publicKey: Ptr<'PublicKey'>,
    privateKey: Ptr<'PrivateKey'>
  ): Result;
  signal_identitykeypair_sign_alternate_identity(
    out: Out<OwnedBuffer>,
    publicKey: Ptr<'PublicKey'>,
    privateKey: Ptr<'PrivateKey'>,
    otherIdentity: Ptr<'PublicKey'>
  ): Result;

  signal_kyber_key_pair_generate(out: New<'KyberKeyPair'>): Result;
  signal_kyber_key_pair_get_public_key(out: New<'KyberPublicKey'>, pair: Ptr<'KyberKeyPair'>): Result;
  signal_kyber_key_pair_get_secret_key(out: New<'KyberSecretKey'>, pair: Ptr<'KyberKeyPair'>): Result;
  signal_kyber_key_pair_clone(out: New<'KyberKeyPair'>, pair: Ptr<'KyberKeyPair'>): Result;
  signal_kyber_key_pair_destroy(pair: MutPointer<'KyberKeyPair'>): Result;
  signal_kyber_public_key_deserialize(out: New<'KyberPublicKey'>, data: BorrowedBuffer): Result;
  signal_kyber_public_key_serialize(out: Out<OwnedBuffer>, key: Ptr<'KyberPublicKey'>): Result;
  signal_kyber_public_key_equals(
    out: Out<boolean>,
    lhs: Ptr<'KyberPublicKey'>,
    rhs: Ptr<'KyberPublicKey'>
  ): Result;
  signal_kyber_public_key_clone(out: New<'KyberPublicKey'>, key: Ptr<'KyberPublicKey'>): Result;
  signal_kyber_public_key_destroy(key: MutPointer<'KyberPublicKey'>): Result;
  signal_kyber_secret_key_deserialize(out: New<'KyberSecretKey'>, data: BorrowedBuffer): Result;
  signal_kyber_secret_key_serialize(out: Out<OwnedBuffer>, key: Ptr<'KyberSecretKey'>): Result;
  signal_kyber_secret_key_clone(out: New<'KyberSecretKey'>, key: Ptr<'KyberSecretKey'>): Result;
  signal_kyber_secret_key_destroy(key: MutPointer<'KyberSecretKey'>): Result;

  signal_pre_key_record_new(
    out: New<'PreKeyRecord'>,
    id: number,
    publicKey: Ptr<'PublicKey'>,
    privateKey: Ptr<'PrivateKey'>
  ): Result;
  signal_pre_key_record_deserialize(out: New<'PreKeyRecord'>, data: BorrowedBuffer): Result;
  signal_pre_key_record_serialize(out: Out<OwnedBuffer>, record: Ptr<'PreKeyRecord'>): Result;
  signal_pre_key_record_get_id(out: Out<number>, record: Ptr<'PreKeyRecord'>): Result;
  signal_pre_key_record_get_public_key(out: New<'PublicKey'>, record: Ptr<'PreKeyRecord'>): Result;
  signal_pre_key_record_get_private_key(out: New<'PrivateKey'>, record: Ptr<'PreKeyRecord'>): Result;
  signal_pre_key_record_clone(out: New<'PreKeyRecord'>, record: Ptr<'PreKeyRecord'>): Result;
  signal_pre_key_record_destroy(record: MutPointer<'PreKeyRecord'>): Result;

  signal_signed_pre_key_record_new(
    out: New<'SignedPreKeyRecord'>,
    id: number,
    timestamp: number,
    publicKey: Ptr<'PublicKey'>,
    privateKey: Ptr<'PrivateKey'>,
    signature: BorrowedBuffer
  ): Result;
  signal_signed_pre_key_record_deserialize(out: New<'SignedPreKeyRecord'>, data: BorrowedBuffer): Result;
  signal_signed_pre_key_record_serialize(out: Out<OwnedBuffer>, record: Ptr<'SignedPreKeyRecord'>): Result;
  signal_signed_pre_key_record_get_id(out: Out<number>, record: Ptr<'SignedPreKeyRecord'>): Result;
  signal_signed_pre_key_record_get_timestamp(out: Out<U64>, record: Ptr<'SignedPreKeyRecord'>): Result;
  signal_signed_pre_key_record_get_signature(
    out: Out<OwnedBuffer>,
    record: Ptr<'SignedPreKeyRecord'>
  ): Result;
  signal_signed_pre_key_record_get_public_key(
    out: New<'PublicKey'>,
    record: Ptr<'SignedPreKeyRecord'>
  ): Result;
  signal_signed_pre_key_record_get_private_key(
    out: New<'PrivateKey'>,
    record: Ptr<'SignedPreKeyRecord'>
  ): Result;
  signal_signed_pre_key_record_clone(out: New<'SignedPreKeyRecord'>, record: Ptr<'SignedPreKeyRecord'>): Result;
  signal_signed_pre_key_record_destroy(record: MutPointer<'SignedPreKeyRecord'>): Result;

  signal_kyber_pre_key_record_new(
    out: New<'KyberPreKeyRecord'>,
    id: number,
    timestamp: number,
    keyPair: Ptr<'KyberKeyPair'>,
    signature: BorrowedBuffer
  ): Result;
  signal_kyber_pre_key_record_deserialize(out: New<'KyberPreKeyRecord'>, data: BorrowedBuffer): Result;
  signal_kyber_pre_key_record_serialize(out: Out<OwnedBuffer>, record: Ptr<'KyberPreKeyRecord'>): Result;
  signal_kyber_pre_key_record_get_id(out: Out<number>, record: Ptr<'KyberPreKeyRecord'>): Result;
  signal_kyber_pre_key_record_get_timestamp(out: Out<U64>, record: Ptr<'KyberPreKeyRecord'>): Result;
  signal_kyber_pre_key_record_get_signature(out: Out<OwnedBuffer>, record: Ptr<'KyberPreKeyRecord'>): Result;
  signal_kyber_pre_key_record_get_public_key(
    out: New<'KyberPublicKey'>,
    record: Ptr<'KyberPreKeyRecord'>
  ): Result;
  signal_kyber_pre_key_record_get_secret_key(
    out: New<'KyberSecretKey'>,
    record: Ptr<'KyberPreKeyRecord'>
  ): Result;
  signal_kyber_pre_key_record_get_key_pair(out: New<'KyberKeyPair'>, record: Ptr<'KyberPreKeyRecord'>): Result;
  signal_kyber_pre_key_record_clone(out: New<'KyberPreKeyRecord'>, record: Ptr<'KyberPreKeyRecord'>): Result;
  signal_kyber_pre_key_record_destroy(record: MutPointer<'KyberPreKeyRecord'>): Result;

  signal_pre_key_bundle_new(
    out: New<'PreKeyBundle'>,
    registrationId: number,
    deviceId: number,
    preKeyId: number,
    preKey: Ptr<'PublicKey'>,
    signedPreKeyId: number,
    signedPreKey: Ptr<'PublicKey'>,
    signedPreKeySignature: BorrowedBuffer,
    identityKey: Ptr<'PublicKey'>,
    kyberPreKeyId: number,
    kyberPreKey: Ptr<'KyberPublicKey'>,
    kyberPreKeySignature: BorrowedBuffer
  ): Result;
  signal_pre_key_bundle_get_registration_id(out: Out<number>, bundle: Ptr<'PreKeyBundle'>): Result;
  signal_pre_key_bundle_get_device_id(out: Out<number>, bundle: Ptr<'PreKeyBundle'>): Result;
  signal_pre_key_bundle_get_pre_key_id(out: Out<number>, bundle: Ptr<'PreKeyBundle'>): Result;
  signal_pre_key_bundle_get_pre_key_public(out: New<'PublicKey'>, bundle: Ptr<'PreKeyBundle'>): Result;
  signal_pre_key_bundle_get_signed_pre_key_id(out: Out<number>, bundle: Ptr<'PreKeyBundle'>): Result;
  signal_pre_key_bundle_get_signed_pre_key_public(out: New<'PublicKey'>, bundle: Ptr<'PreKeyBundle'>): Result;
  signal_pre_key_bundle_get_signed_pre_key_signature(
    out: Out<OwnedBuffer>,
    bundle: Ptr<'PreKeyBundle'>
  ): Result;
  signal_pre_key_bundle_get_identity_key(out: New<'PublicKey'>, bundle: Ptr<'PreKeyBundle'>): Result;
  signal_pre_key_bundle_get_kyber_pre_key_id(out: Out<number>, bundle: Ptr<'PreKeyBundle'>): Result;
  signal_pre_key_bundle_get_kyber_pre_key_public(
    out: New<'KyberPublicKey'>,
    bundle: Ptr<'PreKeyBundle'>
  ): Result;
  signal_pre_key_bundle_get_kyber_pre_key_signature(
    out: Out<OwnedBuffer>,
    bundle: Ptr<'PreKeyBundle'>
  ): Result;
  signal_pre_key_bundle_clone(out: New<'PreKeyBundle'>, bundle: Ptr<'PreKeyBundle'>): Result;
  signal_pre_key_bundle_destroy(bundle: MutPointer<'PreKeyBundle'>): Result;

  signal_address_new(out: New<'ProtocolAddress'>, name: string, deviceId: number): Result;
  signal_address_get_name(out: Out<string>, address: Ptr<'ProtocolAddress'>): Result;
  signal_address_get_device_id(out: Out<number>, address: Ptr<'ProtocolAddress'>): Result;
  signal_address_clone(out: New<'ProtocolAddress'>, address: Ptr<'ProtocolAddress'>): Result;
  signal_address_destroy(address: MutPointer<'ProtocolAddress'>): Result;

  signal_session_record_deserialize(out: New<'SessionRecord'>, data: BorrowedBuffer): Result;
  signal_session_record_serialize(out: Out<OwnedBuffer>, record: Ptr<'SessionRecord'>): Result;
  signal_session_record_archive_current_state(record: MutPointer<'SessionRecord'>): Result;
  signal_session_record_has_usable_sender_chain(
    out: Out<boolean>,
    record: Ptr<'SessionRecord'>,
    now: number
  ): Result;
  signal_session_record_current_ratchet_key_matches(
    out: Out<boolean>,
    record: Ptr<'SessionRecord'>,
    key: Ptr<'PublicKey'>
  ): Result;
  signal_session_record_get_local_registration_id(out: Out<number>, record: Ptr<'SessionRecord'>): Result;
  signal_session_record_get_remote_registration_id(out: Out<number>, record: Ptr<'SessionRecord'>): Result;
  signal_session_record_clone(out: New<'SessionRecord'>, record: Ptr<'SessionRecord'>): Result;
  signal_session_record_destroy(record: MutPointer<'SessionRecord'>): Result;

  signal_message_deserialize(out: New<'SignalMessage'>, data: BorrowedBuffer): Result;
  signal_message_get_serialized(out: Out<OwnedBuffer>, message: Ptr<'SignalMessage'>): Result;
  signal_message_get_body(out: Out<OwnedBuffer>, message: Ptr<'SignalMessage'>): Result;
  signal_message_get_counter(out: Out<number>, message: Ptr<'SignalMessage'>): Result;
  signal_message_get_message_version(out: Out<number>, message: Ptr<'SignalMessage'>): Result;
  signal_message_get_sender_ratchet_key(out: New<'PublicKey'>, message: Ptr<'SignalMessage'>): Result;
  signal_message_clone(out: New<'SignalMessage'>, message: Ptr<'SignalMessage'>): Result;
  signal_message_destroy(message: MutPointer<'SignalMessage'>): Result;

  signal_decryption_error_message_deserialize(out: New<'DecryptionErrorMessage'>, data: BorrowedBuffer): Result;
  signal_decryption_error_message_serialize(
    out: Out<OwnedBuffer>,
    message: Ptr<'DecryptionErrorMessage'>
  ): Result;
  signal_decryption_error_message_get_timestamp(out: Out<U64>, message: Ptr<'DecryptionErrorMessage'>): Result;
  signal_decryption_error_message_get_device_id(out: Out<number>, message: Ptr<'DecryptionErrorMessage'>): Result;
  signal_decryption_error_message_get_ratchet_key(
    out: New<'PublicKey'>,
    message: Ptr<'DecryptionErrorMessage'>
  ): Result;
  signal_decryption_error_message_clone(
    out: New<'DecryptionErrorMessage'>,
    message: Ptr<'DecryptionErrorMessage'>
  ): Result;
  signal_decryption_error_message_destroy(message: MutPointer<'DecryptionErrorMessage'>): Result;

  signal_sender_key_record_deserialize(out: New<'SenderKeyRecord'>, data: BorrowedBuffer): Result;
  signal_sender_key_record_serialize(out: Out<OwnedBuffer>, record: Ptr<'SenderKeyRecord'>): Result;
  signal_sender_key_record_clone(out: New<'SenderKeyRecord'>, record: Ptr<'SenderKeyRecord'>): Result;
  signal_sender_key_record_destroy(record: MutPointer<'SenderKeyRecord'>): Result;

  signal_sender_key_message_deserialize(out: New<'SenderKeyMessage'>, data: BorrowedBuffer): Result;
  signal_sender_key_message_serialize(out: Out<OwnedBuffer>, message: Ptr<'SenderKeyMessage'>): Result;
  signal_sender_key_message_get_cipher_text(out: Out<OwnedBuffer>, message: Ptr<'SenderKeyMessage'>): Result;
  signal_sender_key_message_get_iteration(out: Out<number>, message: Ptr<'SenderKeyMessage'>): Result;
  signal_sender_key_message_get_chain_id(out: Out<number>, message: Ptr<'SenderKeyMessage'>): Result;
  signal_sender_key_message_get_distribution_id(out: Out<Uuid>, message: Ptr<'SenderKeyMessage'>): Result;
  signal_sender_key_message_verify_signature(
    out: Out<boolean>,
    message: Ptr<'SenderKeyMessage'>,
    key: Ptr<'PublicKey'>
  ): Result;
  signal_sender_key_message_clone(out: New<'SenderKeyMessage'>, message: Ptr<'SenderKeyMessage'>): Result;
  signal_sender_key_message_destroy(message: MutPointer<'SenderKeyMessage'>): Result;

  signal_sender_key_distribution_message_deserialize(
    out: New<'SenderKeyDistributionMessage'>,
    data: BorrowedBuffer
  ): Result;
  signal_sender_key_distribution_message_serialize(
    out: Out<OwnedBuffer>,
    message: Ptr<'SenderKeyDistributionMessage'>
  ): Result;
  signal_sender_key_distribution_message_get_chain_key(
    out: Out<OwnedBuffer>,
    message: Ptr<'SenderKeyDistributionMessage'>
  ): Result;
  signal_sender_key_distribution_message_get_iteration(
    out: Out<number>,
    message: Ptr<'SenderKeyDistributionMessage'>
  ): Result;
  signal_sender_key_distribution_message_get_chain_id(
    out: Out<number>,
    message: Ptr<'SenderKeyDistributionMessage'>
  ): Result;
  signal_sender_key_distribution_message_get_distribution_id(
    out: Out<Uuid>,
    message: Ptr<'SenderKeyDistributionMessage'>
  ): Result;
  signal_sender_key_distribution_message_get_signature_key(
    out: New<'PublicKey'>,
    message: Ptr<'SenderKeyDistributionMessage'>
  ): Result;
  signal_sender_key_distribution_message_clone(
    out: New<'SenderKeyDistributionMessage'>,
    message: Ptr<'SenderKeyDistributionMessage'>
  ): Result;
  signal_sender_key_distribution_message_destroy(message: MutPointer<'SenderKeyDistributionMessage'>): Result;

  signal_server_certificate_new(
    out: New<'ServerCertificate'>,
    keyId: number,
    serverKey: Ptr<'PublicKey'>,
    trustRoot: Ptr<'PrivateKey'>
  ): Result;
  signal_server_certificate_deserialize(out: New<'ServerCertificate'>, data: BorrowedBuffer): Result;
  signal_server_certificate_get_serialized(out: Out<OwnedBuffer>, cert: Ptr<'ServerCertificate'>): Result;
  signal_server_certificate_get_certificate(out: Out<OwnedBuffer>, cert: Ptr<'ServerCertificate'>): Result;
  signal_server_certificate_get_signature(out: Out<OwnedBuffer>, cert: Ptr<'ServerCertificate'>): Result;
  signal_server_certificate_get_key_id(out: Out<number>, cert: Ptr<'ServerCertificate'>): Result;
  signal_server_certificate_get_key(out: New<'PublicKey'>, cert: Ptr<'ServerCertificate'>): Result;
  signal_server_certificate_clone(out: New<'ServerCertificate'>, cert: Ptr<'ServerCertificate'>): Result;
  signal_server_certificate_destroy(cert: MutPointer<'ServerCertificate'>): Result;

  signal_sender_certificate_new(
    out: New<'SenderCertificate'>,
    senderUuid: string,
    senderE164: string | null,
    senderDeviceId: number,
    senderKey: Ptr<'PublicKey'>,
    expiration: number,
    signerCertificate: Ptr<'ServerCertificate'>,
    signerKey: Ptr<'PrivateKey'>
  ): Result;
  signal_sender_certificate_deserialize(out: New<'SenderCertificate'>, data: BorrowedBuffer): Result;
  signal_sender_certificate_get_serialized(out: Out<OwnedBuffer>, cert: Ptr<'SenderCertificate'>): Result;
  signal_sender_certificate_get_certificate(out: Out<OwnedBuffer>, cert: Ptr<'SenderCertificate'>): Result;
  signal_sender_certificate_get_signature(out: Out<OwnedBuffer>, cert: Ptr<'SenderCertificate'>): Result;
  signal_sender_certificate_get_sender_uuid(out: Out<string>, cert: Ptr<'SenderCertificate'>): Result;
  signal_sender_certificate_get_sender_e164(out: Out<string>, cert: Ptr<'SenderCertificate'>): Result;
  signal_sender_certificate_get_device_id(out: Out<number>, cert: Ptr<'SenderCertificate'>): Result;
  signal_sender_certificate_get_expiration(out: Out<U64>, cert: Ptr<'SenderCertificate'>): Result;
  signal_sender_certificate_get_key(out: New<'PublicKey'>, cert: Ptr<'SenderCertificate'>): Result;
  signal_sender_certificate_get_server_certificate(
    out: New<'ServerCertificate'>,
    cert: Ptr<'SenderCertificate'>
  ): Result;
  signal_sender_certificate_validate(
    out: Out<boolean>,
    cert: Ptr<'SenderCertificate'>,
    trustRoots: BorrowedSlice<Ptr<'PublicKey'>>,
    time: number
  ): Result;
  signal_sender_certificate_clone(out: New<'SenderCertificate'>, cert: Ptr<'SenderCertificate'>): Result;
  signal_sender_certificate_destroy(cert: MutPointer<'SenderCertificate'>): Result;

  signal_aes256_gcm_siv_new(out: New<'Aes256GcmSiv'>, key: BorrowedBuffer): Result;
  signal_aes256_gcm_siv_encrypt(
    out: Out<OwnedBuffer>,
    cipher: Ptr<'Aes256GcmSiv'>,
    plaintext: BorrowedBuffer,
    nonce: BorrowedBuffer,
    associatedData: BorrowedBuffer
  ): Result;
  signal_aes256_gcm_siv_decrypt(
    out: Out<OwnedBuffer>,
    cipher: Ptr<'Aes256GcmSiv'>,
    ciphertext: BorrowedBuffer,
    nonce: BorrowedBuffer,
    associatedData: BorrowedBuffer
  ): Result;
  signal_aes256_gcm_siv_destroy(cipher: MutPointer<'Aes256GcmSiv'>): Result;

  signal_hkdf_derive(
    output: MutableBuffer,
    ikm: BorrowedBuffer,
    label: BorrowedBuffer,
    salt: BorrowedBuffer
  ): Result;

  signal_fingerprint_new(
    out: New<'Fingerprint'>,
    iterations: number,
    version: number,
    localIdentifier: BorrowedBuffer,
    localKey: Ptr<'PublicKey'>,
    remoteIdentifier: BorrowedBuffer,
    remoteKey: Ptr<'PublicKey'>
  ): Result;
  signal_fingerprint_display_string(out: Out<string>, fingerprint: Ptr<'Fingerprint'>): Result;
  signal_fingerprint_scannable_encoding(out: Out<OwnedBuffer>, fingerprint: Ptr<'Fingerprint'>): Result;
  signal_fingerprint_compare(out: Out<boolean>, first: BorrowedBuffer, second: BorrowedBuffer): Result;
  signal_fingerprint_clone(out: New<'Fingerprint'>, fingerprint: Ptr<'Fingerprint'>): Result;
  signal_fingerprint_destroy(fingerprint: MutPointer<'Fingerprint'>): Result;

  signal_ciphertext_message_type(out: Out<number>, message: Ptr<'CiphertextMessage'>): Result;
  signal_ciphertext_message_serialize(out: Out<OwnedBuffer>, message: Ptr<'CiphertextMessage'>): Result;
  signal_ciphertext_message_destroy(message: MutPointer<'CiphertextMessage'>): Result;

  signal_pre_key_signal_message_deserialize(out: New<'PreKeySignalMessage'>, data: BorrowedBuffer): Result;
  signal_pre_key_signal_message_serialize(out: Out<OwnedBuffer>, message: Ptr<'PreKeySignalMessage'>): Result;
  signal_pre_key_signal_message_get_version(out: Out<number>, message: Ptr<'PreKeySignalMessage'>): Result;
  signal_pre_key_signal_message_get_registration_id(
    out: Out<number>,
    message: Ptr<'PreKeySignalMessage'>
  ): Result;
  /** Writes 0xffffffff when the message names no one-time pre-key. */
  signal_pre_key_signal_message_get_pre_key_id(out: Out<number>, message: Ptr<'PreKeySignalMessage'>): Result;
  signal_pre_key_signal_message_get_signed_pre_key_id(
    out: Out<number>,
    message: Ptr<'PreKeySignalMessage'>
  ): Result;
  signal_pre_key_signal_message_get_base_key(out: New<'PublicKey'>, message: Ptr<'PreKeySignalMessage'>): Result;
  signal_pre_key_signal_message_get_identity_key(
    out: New<'PublicKey'>,
    message: Ptr<'PreKeySignalMessage'>
  ): Result;
  signal_pre_key_signal_message_get_signal_message(
    out: New<'SignalMessage'>,
    message: Ptr<'PreKeySignalMessage'>
  ): Result;
  signal_pre_key_signal_message_clone(
    out: New<'PreKeySignalMessage'>,
    message: Ptr<'PreKeySignalMessage'>
  ): Result;
  signal_pre_key_signal_message_destroy(message: MutPointer<'PreKeySignalMessage'>): Result;

  signal_process_prekey_bundle(
    bundle: Ptr<'PreKeyBundle'>,
    address: Ptr<'ProtocolAddress'>,
    sessionStore: FfiSessionStore,
    identityStore: FfiIdentityKeyStore,
    now: number
  ): Result;
  signal_encrypt_message(
    out: New<'CiphertextMessage'>,
    plaintext: BorrowedBuffer,
    address: Ptr<'ProtocolAddress'>,
    sessionStore: FfiSessionStore,
    identityStore: FfiIdentityKeyStore,
    now: number
  ): Result;
  signal_decrypt_message(
    out: Out<OwnedBuffer>,
    message: Ptr<'SignalMessage'>,
    address: Ptr<'ProtocolAddress'>,
    sessionStore: FfiSessionStore,
    identityStore: FfiIdentityKeyStore
  ): Result;
  signal_decrypt_pre_key_message(
    out: Out<OwnedBuffer>,
    message: Ptr<'PreKeySignalMessage'>,
    address: Ptr<'ProtocolAddress'>,
    sessionStore: FfiSessionStore,
    identityStore: FfiIdentityKeyStore,
    preKeyStore: FfiPreKeyStore,
    signedPreKeyStore: FfiSignedPreKeyStore,
    kyberPreKeyStore: FfiKyberPreKeyStore
  ): Result;

  signal_sender_key_distribution_message_create(
    out: New<'SenderKeyDistributionMessage'>,
    sender: Ptr<'ProtocolAddress'>,
    distributionId: Uint8Array,
    store: FfiSenderKeyStore
  ): Result;
  signal_process_sender_key_distribution_message(
    sender: Ptr<'ProtocolAddress'>,
    message: Ptr<'SenderKeyDistributionMessage'>,
    store: FfiSenderKeyStore
  ): Result;
  signal_group_encrypt_message(
    out: New<'CiphertextMessage'>,
    sender: Ptr<'ProtocolAddress'>,
    distributionId: Uint8Array,
    plaintext: BorrowedBuffer,
    store: FfiSenderKeyStore
  ): Result;
  signal_group_decrypt_message(
    out: Out<OwnedBuffer>,
    sender: Ptr<'ProtocolAddress'>,
    ciphertext: BorrowedBuffer,
    store: FfiSenderKeyStore
  ): Result;

  signal_unidentified_sender_message_content_new(
    out: New<'UnidentifiedSenderMessageContent'>,
    message: Ptr<'CiphertextMessage'>,
    sender: Ptr<'SenderCertificate'>,
    contentHint: number,
    groupId: BorrowedBuffer
  ): Result;
  signal_unidentified_sender_message_content_deserialize(
    out: New<'UnidentifiedSenderMessageContent'>,
    data: BorrowedBuffer
  ): Result;
  signal_unidentified_sender_message_content_serialize(
    out: Out<OwnedBuffer>,
    content: Ptr<'UnidentifiedSenderMessageContent'>
  ): Result;
  signal_unidentified_sender_message_content_get_contents(
    out: Out<OwnedBuffer>,
    content: Ptr<'UnidentifiedSenderMessageContent'>
  ): Result;
  signal_unidentified_sender_message_content_get_group_id_or_empty(
    out: Out<OwnedBuffer>,
    content: Ptr<'UnidentifiedSenderMessageContent'>
  ): Result;
  signal_unidentified_sender_message_content_get_sender_cert(
    out: New<'SenderCertificate'>,
    content: Ptr<'UnidentifiedSenderMessageContent'>
  ): Result;
  signal_unidentified_sender_message_content_get_msg_type(
    out: Out<number>,
    content: Ptr<'UnidentifiedSenderMessageContent'>
  ): Result;
  signal_unidentified_sender_message_content_get_content_hint(
    out: Out<number>,
    content: Ptr<'UnidentifiedSenderMessageContent'>
  ): Result;
  signal_unidentified_sender_message_content_destroy(
    content: MutPointer<'UnidentifiedSenderMessageContent'>
  ): Result;

  signal_sealed_session_cipher_encrypt(
    out: Out<OwnedBuffer>,
    destination: Ptr<'ProtocolAddress'>,
    content: Ptr<'UnidentifiedSenderMessageContent'>,
    identityStore: FfiIdentityKeyStore
  ): Result;
  signal_sealed_session_cipher_decrypt_to_usmc(
    out: New<'UnidentifiedSenderMessageContent'>,
    ciphertext: BorrowedBuffer,
    identityStore: FfiIdentityKeyStore
  ): Result;
}

/**
 * A loaded engine: its symbols plus the two memory primitives the binding
 * cannot express through symbols alone.
 */
export interface NativeLibrary {
  readonly symbols: SignalFfi;
  /** Copy `length` engine-owned bytes at `base` into a fresh array. */
  copyBuffer(base: NativeMemory, length: number): Uint8Array;
  close(): void;
}
