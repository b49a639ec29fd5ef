/**
 * signal-native-bridge
 *
 * Bindings to the libsignal native engine with explicit disposal, a GC
 * backstop for leaked handles, zeroed secret buffers and structural
 * validation of every serialized input before it crosses the boundary.
 *
 * @packageDocumentation
 */

// ============================================================
// Native Context
// ============================================================

export { NativeContext, GcFinalizers, DEFAULT_MAX_BUFFER_SIZE } from './context.js';
export type { NativeContextOptions, FinalizerRegistry, Releasable } from './context.js';
export {
  detectPlatform,
  libraryFileName,
  resolveLibraryPath,
  loadLibrary,
  LIBRARY_PATH_ENV,
} from './ffi/library.js';
export type { LoadLibraryOptions, Platform } from './ffi/library.js';
export { FfiDirection } from './ffi/types.js';
export type {
  NativeLibrary,
  NativeTypeName,
  SignalFfi,
  FfiSessionStore,
  FfiIdentityKeyStore,
  FfiPreKeyStore,
  FfiSignedPreKeyStore,
  FfiKyberPreKeyStore,
  FfiSenderKeyStore,
} from './ffi/types.js';

// ============================================================
// Resource Lifecycle
// ============================================================

export { ResourceHandle, NativeObject } from './handle.js';
export type { Disposable } from './handle.js';
export { DisposalScope, withDisposalScope } from './scope.js';

// ============================================================
// Secure Memory
// ============================================================

export { SecureBuffer, zeroBytes, constantTimeEquals } from './memory.js';

// ============================================================
// Logging
// ============================================================

export { LogLevel, consoleSink, createLogger } from './logger.js';
export type { Logger, LogSink } from './logger.js';

// ============================================================
// Validation
// ============================================================

export {
  KeyType,
  KeySize,
  RecordSize,
  LOW_ORDER_POINTS,
  isLowOrderPoint,
  validationRules,
  checkSerialized,
  validateSerialized,
  validatePublicKey,
  validatePrivateKey,
  validateIdentityKeyPair,
  validateKyberPublicKey,
  validateKyberSecretKey,
  validatePreKeyRecord,
  validateSignedPreKeyRecord,
  validateKyberPreKeyRecord,
  validateSessionRecord,
  validateSenderKeyRecord,
  validateSenderCertificate,
  validateServerCertificate,
  validateSignalMessage,
  validateDecryptionErrorMessage,
  validateSenderKeyMessage,
  validateSenderKeyDistributionMessage,
  validatePreKeySignalMessage,
  validateUnidentifiedSenderMessageContent,
} from './validator.js';
export type { SerializedType, ValidationFailure, ValidationRule } from './validator.js';

// ============================================================
// Keys
// ============================================================

export { PublicKey, PrivateKey, IdentityKeyPair } from './keys.js';
export { KyberPublicKey, KyberSecretKey, KyberKeyPair } from './kyber.js';

// ============================================================
// Pre-keys
// ============================================================

export {
  PreKeyRecord,
  SignedPreKeyRecord,
  KyberPreKeyRecord,
  PreKeyBundle,
  NO_PRE_KEY_ID,
} from './prekeys.js';
export type { PreKeyBundleOptions } from './prekeys.js';

// ============================================================
// Protocol
// ============================================================

export { ProtocolAddress, SessionRecord, SignalMessage, DecryptionErrorMessage } from './protocol.js';
export { SenderKeyRecord, SenderKeyMessage, SenderKeyDistributionMessage } from './groups.js';
export { ServerCertificate, SenderCertificate } from './certificate.js';
export type { SenderCertificateOptions } from './certificate.js';

// ============================================================
// Sessions and Messaging
// ============================================================

export {
  CiphertextMessage,
  CiphertextMessageType,
  PreKeySignalMessage,
  SessionBuilder,
  SessionCipher,
} from './session.js';
export type { SessionStores, SessionCipherStores } from './session.js';
export { GroupSession } from './group-session.js';
export { ContentHint, UnidentifiedSenderMessageContent, SealedSessionCipher } from './sealed.js';
export type { SealedEncryptOptions } from './sealed.js';
export { StoreBridge, CALLBACK_OK, CALLBACK_FAILED } from './store-bridge.js';

// ============================================================
// Fingerprints
// ============================================================

export {
  Fingerprint,
  DEFAULT_FINGERPRINT_ITERATIONS,
  DEFAULT_FINGERPRINT_VERSION,
} from './fingerprint.js';
export type { FingerprintOptions } from './fingerprint.js';

// ============================================================
// Cryptography
// ============================================================

export { Aes256GcmSiv, hkdf, MAX_HKDF_OUTPUT } from './crypto.js';

// ============================================================
// Stores
// ============================================================

export {
  MemoryBackend,
  createBackend,
  IdentityTrustDecision,
  Direction,
  InMemorySessionStore,
  InMemoryIdentityKeyStore,
  InMemoryPreKeyStore,
  InMemorySignedPreKeyStore,
  InMemoryKyberPreKeyStore,
  InMemorySenderKeyStore,
} from './store.js';
export type {
  StorageBackend,
  SessionStore,
  IdentityKeyStore,
  PreKeyStore,
  SignedPreKeyStore,
  KyberPreKeyStore,
  SenderKeyStore,
} from './store.js';

// ============================================================
// Exceptions
// ============================================================

export {
  ErrorKind,
  SignalError,
  InvalidArgumentError,
  ValidationError,
  NullPointerError,
  SerializationError,
  CryptoError,
  DisposedError,
  UnsupportedError,
  NativeError,
  NativeErrorCode,
  errorFromNativeCode,
} from './exceptions.js';
export type { ErrorRecord, ValidationReason } from './exceptions.js';

// ============================================================
// Version
// ============================================================

/** Package version */
export const VERSION = '0.1.0';
