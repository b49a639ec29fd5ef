/**
 * Loading the native engine through koffi.
 */

import koffi from 'koffi';
import type { IKoffiCType, IKoffiRegisteredCallback } from 'koffi';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { NativeError, NativeErrorCode, UnsupportedError } from '../exceptions.js';
import type {
  BorrowedSlice,
  ConstPointer,
  FfiError,
  FfiIdentityKeyStore,
  FfiKyberPreKeyStore,
  FfiPreKeyStore,
  FfiSenderKeyStore,
  FfiSessionStore,
  FfiSignedPreKeyStore,
  MutableBuffer,
  MutPointer,
  NativeLibrary,
  NativeTypeName,
  Out,
  SignalFfi,
} from './types.js';

export type Platform = 'linux-x64' | 'linux-arm64' | 'darwin-x64' | 'darwin-arm64' | 'win32-x64';

/** Environment variable naming the engine library to load. */
export const LIBRARY_PATH_ENV = 'SIGNAL_FFI_LIBRARY';

const PACKAGE_ROOT = fileURLToPath(new URL('../../', import.meta.url));

/**
 * Map the running platform to a prebuilt directory name.
 * @throws UnsupportedError for platforms without a build
 */
export function detectPlatform(
  platform: string = process.platform,
  arch: string = process.arch
): Platform {
  const key = `${platform}-${arch}`;
  switch (key) {
    case 'linux-x64':
    case 'linux-arm64':
    case 'darwin-x64':
    case 'darwin-arm64':
    case 'win32-x64':
      return key;
    default:
      throw new UnsupportedError('loadLibrary', `no native build for ${key}`);
  }
}

export function libraryFileName(platform: Platform): string {
  if (platform.startsWith('win32')) {
    return 'signal_ffi.dll';
  }
  return platform.startsWith('darwin') ? 'libsignal_ffi.dylib' : 'libsignal_ffi.so';
}

export interface LoadLibraryOptions {
  /** Explicit path to the engine library */
  path?: string;
  /** Environment to read LIBRARY_PATH_ENV from */
  env?: NodeJS.ProcessEnv;
}

/**
 * Pick the library file: explicit path, then the environment, then the
 * build shipped under native/<platform>/.
 */
export function resolveLibraryPath(options: LoadLibraryOptions = {}): string {
  if (options.path) {
    return options.path;
  }
  const fromEnv = (options.env ?? process.env)[LIBRARY_PATH_ENV];
  if (fromEnv) {
    return fromEnv;
  }
  const platform = detectPlatform();
  return path.join(PACKAGE_ROOT, 'native', platform, libraryFileName(platform));
}

const NATIVE_TYPES = [
  'PublicKey',
  'PrivateKey',
  'KyberPublicKey',
  'KyberSecretKey',
  'KyberKeyPair',
  'PreKeyRecord',
  'SignedPreKeyRecord',
  'KyberPreKeyRecord',
  'PreKeyBundle',
  'ProtocolAddress',
  'SessionRecord',
  'Message',
  'DecryptionErrorMessage',
  'SenderKeyRecord',
  'SenderKeyMessage',
  'SenderKeyDistributionMessage',
  'ServerCertificate',
  'SenderCertificate',
  'Aes256GcmSiv',
  'Fingerprint',
  'CiphertextMessage',
  'PreKeySignalMessage',
  'UnidentifiedSenderMessageContent',
] as const;

/**
 * Store structs the engine calls back through: field name to callback
 * prototype. Out-parameters arrive as plain pointers.
 */
const STORE_STRUCTS = {
  SessionStore: {
    load_session:
      'int SignalLoadSession(void *ctx, SignalMutPointerSessionRecord *recordp, SignalConstPointerProtocolAddress address)',
    store_session:
      'int SignalStoreSession(void *ctx, SignalConstPointerProtocolAddress address, SignalConstPointerSessionRecord record)',
  },
  IdentityKeyStore: {
    get_identity_key_pair: 'int SignalGetIdentityKeyPair(void *ctx, SignalMutPointerPrivateKey *keyp)',
    get_local_registration_id: 'int SignalGetLocalRegistrationId(void *ctx, uint32_t *idp)',
    save_identity:
      'int SignalSaveIdentityKey(void *ctx, SignalConstPointerProtocolAddress address, SignalConstPointerPublicKey public_key)',
    get_identity:
      'int SignalGetIdentityKey(void *ctx, SignalMutPointerPublicKey *public_keyp, SignalConstPointerProtocolAddress address)',
    is_trusted_identity:
      'int SignalIsTrustedIdentity(void *ctx, SignalConstPointerProtocolAddress address, SignalConstPointerPublicKey public_key, unsigned int direction)',
  },
  PreKeyStore: {
    load_pre_key: 'int SignalLoadPreKey(void *ctx, SignalMutPointerPreKeyRecord *recordp, uint32_t id)',
    store_pre_key: 'int SignalStorePreKey(void *ctx, uint32_t id, SignalConstPointerPreKeyRecord record)',
    remove_pre_key: 'int SignalRemovePreKey(void *ctx, uint32_t id)',
  },
  SignedPreKeyStore: {
    load_signed_pre_key:
      'int SignalLoadSignedPreKey(void *ctx, SignalMutPointerSignedPreKeyRecord *recordp, uint32_t id)',
    store_signed_pre_key:
      'int SignalStoreSignedPreKey(void *ctx, uint32_t id, SignalConstPointerSignedPreKeyRecord record)',
  },
  KyberPreKeyStore: {
    load_kyber_pre_key:
      'int SignalLoadKyberPreKey(void *ctx, SignalMutPointerKyberPreKeyRecord *recordp, uint32_t id)',
    store_kyber_pre_key:
      'int SignalStoreKyberPreKey(void *ctx, uint32_t id, SignalConstPointerKyberPreKeyRecord record)',
    mark_kyber_pre_key_used:
      'int SignalMarkKyberPreKeyUsed(void *ctx, uint32_t id, uint32_t ec_prekey_id, SignalConstPointerPublicKey base_key)',
  },
  SenderKeyStore: {
    load_sender_key:
      'int SignalLoadSenderKey(void *ctx, SignalMutPointerSenderKeyRecord *recordp, SignalConstPointerProtocolAddress sender, const uint8_t *distribution_id)',
    store_sender_key:
      'int SignalStoreSenderKey(void *ctx, SignalConstPointerProtocolAddress sender, const uint8_t *distribution_id, SignalConstPointerSenderKeyRecord record)',
  },
} as const;

type StoreStruct = keyof typeof STORE_STRUCTS;

/** Callback field name to its declared function pointer type. */
const callbackTypes = new Map<string, IKoffiCType>();

let typesDeclared = false;
let loads = 0;

// koffi type names are process-wide, so declare them once.
function declareTypes(): void {
  if (typesDeclared) {
    return;
  }
  koffi.opaque('SignalFfiError');
  for (const name of NATIVE_TYPES) {
    koffi.opaque(`Signal${name}`);
    koffi.struct(`SignalMutPointer${name}`, { raw: koffi.pointer(`Signal${name}`) });
    koffi.struct(`SignalConstPointer${name}`, { raw: koffi.pointer(`Signal${name}`) });
  }
  koffi.struct('SignalBorrowedBuffer', { base: 'const uint8_t *', length: 'size_t' });
  koffi.struct('SignalBorrowedMutableBuffer', { base: 'uint8_t *', length: 'size_t' });
  koffi.struct('SignalOwnedBuffer', { base: 'uint8_t *', length: 'size_t' });
  koffi.struct('SignalUuid', { bytes: koffi.array('uint8_t', 16, 'Typed') });
  koffi.struct('SignalBorrowedSliceOfConstPointerPublicKey', {
    base: 'const SignalConstPointerPublicKey *',
    length: 'size_t',
  });
  for (const [store, callbacks] of Object.entries(STORE_STRUCTS)) {
    const fields: Record<string, string | IKoffiCType> = { ctx: 'void *' };
    for (const [field, prototype] of Object.entries(callbacks)) {
      const type = koffi.pointer(koffi.proto(prototype));
      callbackTypes.set(field, type);
      fields[field] = type;
    }
    koffi.struct(`Signal${store}`, fields);
    koffi.struct(`SignalConstPointerFfi${store}Struct`, { raw: `const Signal${store} *` });
  }
  typesDeclared = true;
}

/**
 * Load the engine and bind every symbol the binding uses.
 * @throws NativeError when the library cannot be opened or lacks a symbol
 */
export function loadLibrary(options: LoadLibraryOptions = {}): NativeLibrary {
  const file = resolveLibraryPath(options);
  try {
    declareTypes();
    return bind(koffi.load(file));
  } catch (error) {
    throw new NativeError(
      NativeErrorCode.UnknownError,
      'load',
      `${file}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

function bind(lib: ReturnType<typeof koffi.load>): NativeLibrary {
  const fn = (prototype: string) => lib.func(prototype);
  const call = (name: string, params: string) => fn(`SignalFfiError *${name}(${params})`);

  // Strings are freed by the library that returned them, so each load
  // declares its own disposable type.
  const ownedString = `SignalOwnedString${++loads}`;
  koffi.disposable(ownedString, 'str', fn('void signal_free_string(const char *buf)'));

  // Shapes shared by most of the API.
  const destroy = (name: string, type: string) => call(name, `SignalMutPointer${type} p`);
  const clone = (name: string, type: string) =>
    call(name, `_Out_ SignalMutPointer${type} *out, SignalConstPointer${type} obj`);
  const deserialize = (name: string, type: string) =>
    call(name, `_Out_ SignalMutPointer${type} *out, SignalBorrowedBuffer data`);
  const bytes = (name: string, type: string) =>
    call(name, `_Out_ SignalOwnedBuffer *out, SignalConstPointer${type} obj`);
  const scalar = (name: string, c: string, type: string) =>
    call(name, `_Out_ ${c} *out, SignalConstPointer${type} obj`);
  const string = (name: string, type: string) =>
    call(name, `_Out_ ${ownedString} *out, SignalConstPointer${type} obj`);
  const uuid = (name: string, type: string) =>
    call(name, `_Out_ SignalUuid *out, SignalConstPointer${type} obj`);
  const child = (name: string, type: string, result: string) =>
    call(name, `_Out_ SignalMutPointer${result} *out, SignalConstPointer${type} obj`);

  const hkdf = call(
    'signal_hkdf_derive',
    'SignalBorrowedMutableBuffer output, SignalBorrowedBuffer ikm, SignalBorrowedBuffer label, SignalBorrowedBuffer salt'
  );
  const validate = call(
    'signal_sender_certificate_validate',
    '_Out_ bool *out, SignalConstPointerSenderCertificate cert, SignalBorrowedSliceOfConstPointerPublicKey trust_roots, uint64_t time'
  );

  // Functions taking stores; the symbols below wrap them to register the
  // callbacks for the length of one call.
  const sessionStores =
    'SignalConstPointerFfiSessionStoreStruct session_store, SignalConstPointerFfiIdentityKeyStoreStruct identity_key_store';
  const processPreKeyBundle = call(
    'signal_process_prekey_bundle',
    `SignalConstPointerPreKeyBundle bundle, SignalConstPointerProtocolAddress protocol_address, ${sessionStores}, uint64_t now`
  );
  const encryptMessage = call(
    'signal_encrypt_message',
    `_Out_ SignalMutPointerCiphertextMessage *out, SignalBorrowedBuffer ptext, SignalConstPointerProtocolAddress protocol_address, ${sessionStores}, uint64_t now`
  );
  const decryptMessage = call(
    'signal_decrypt_message',
    `_Out_ SignalOwnedBuffer *out, SignalConstPointerMessage message, SignalConstPointerProtocolAddress protocol_address, ${sessionStores}`
  );
  const decryptPreKeyMessage = call(
    'signal_decrypt_pre_key_message',
    [
      '_Out_ SignalOwnedBuffer *out',
      'SignalConstPointerPreKeySignalMessage message',
      'SignalConstPointerProtocolAddress protocol_address',
      sessionStores,
      'SignalConstPointerFfiPreKeyStoreStruct prekey_store',
      'SignalConstPointerFfiSignedPreKeyStoreStruct signed_prekey_store',
      'SignalConstPointerFfiKyberPreKeyStoreStruct kyber_prekey_store',
    ].join(', ')
  );
  const createDistribution = call(
    'signal_sender_key_distribution_message_create',
    '_Out_ SignalMutPointerSenderKeyDistributionMessage *out, SignalConstPointerProtocolAddress sender, const uint8_t *distribution_id, SignalConstPointerFfiSenderKeyStoreStruct store'
  );
  const processDistribution = call(
    'signal_process_sender_key_distribution_message',
    'SignalConstPointerProtocolAddress sender, SignalConstPointerSenderKeyDistributionMessage sender_key_distribution_message, SignalConstPointerFfiSenderKeyStoreStruct store'
  );
  const groupEncrypt = call(
    'signal_group_encrypt_message',
    '_Out_ SignalMutPointerCiphertextMessage *out, SignalConstPointerProtocolAddress sender, const uint8_t *distribution_id, SignalBorrowedBuffer message, SignalConstPointerFfiSenderKeyStoreStruct store'
  );
  const groupDecrypt = call(
    'signal_group_decrypt_message',
    '_Out_ SignalOwnedBuffer *out, SignalConstPointerProtocolAddress sender, SignalBorrowedBuffer message, SignalConstPointerFfiSenderKeyStoreStruct store'
  );
  const sealedEncrypt = call(
    'signal_sealed_session_cipher_encrypt',
    '_Out_ SignalOwnedBuffer *out, SignalConstPointerProtocolAddress destination, SignalConstPointerUnidentifiedSenderMessageContent content, SignalConstPointerFfiIdentityKeyStoreStruct identity_key_store'
  );
  const sealedDecrypt = call(
    'signal_sealed_session_cipher_decrypt_to_usmc',
    '_Out_ SignalMutPointerUnidentifiedSenderMessageContent *out, SignalBorrowedBuffer ctext, SignalConstPointerFfiIdentityKeyStoreStruct identity_store'
  );

  const symbols: SignalFfi = {
    signal_error_get_type: fn('uint32_t signal_error_get_type(const SignalFfiError *err)'),
    signal_error_get_message: call(
      'signal_error_get_message',
      `_Out_ ${ownedString} *out, const SignalFfiError *err`
    ),
    signal_error_free: fn('void signal_error_free(SignalFfiError *err)'),
    signal_free_buffer: fn('void signal_free_buffer(const uint8_t *buf, size_t buf_len)'),

    signal_publickey_deserialize: deserialize('signal_publickey_deserialize', 'PublicKey'),
    signal_publickey_serialize: bytes('signal_publickey_serialize', 'PublicKey'),
    signal_publickey_get_public_key_bytes: bytes('signal_publickey_get_public_key_bytes', 'PublicKey'),
    signal_publickey_equals: call(
      'signal_publickey_equals',
      '_Out_ bool *out, SignalConstPointerPublicKey lhs, SignalConstPointerPublicKey rhs'
    ),
    signal_publickey_compare: call(
      'signal_publickey_compare',
      '_Out_ int32_t *out, SignalConstPointerPublicKey key1, SignalConstPointerPublicKey key2'
    ),
    signal_publickey_verify: call(
      'signal_publickey_verify',
      '_Out_ bool *out, SignalConstPointerPublicKey key, SignalBorrowedBuffer message, SignalBorrowedBuffer signature'
    ),
    signal_publickey_clone: clone('signal_publickey_clone', 'PublicKey'),
    signal_publickey_destroy: destroy('signal_publickey_destroy', 'PublicKey'),

    signal_privatekey_generate: call('signal_privatekey_generate', '_Out_ SignalMutPointerPrivateKey *out'),
    signal_privatekey_deserialize: deserialize('signal_privatekey_deserialize', 'PrivateKey'),
    signal_privatekey_serialize: bytes('signal_privatekey_serialize', 'PrivateKey'),
    signal_privatekey_get_public_key: child('signal_privatekey_get_public_key', 'PrivateKey', 'PublicKey'),
    signal_privatekey_sign: call(
      'signal_privatekey_sign',
      '_Out_ SignalOwnedBuffer *out, SignalConstPointerPrivateKey key, SignalBorrowedBuffer message'
    ),
    signal_privatekey_agree: call(
      'signal_privatekey_agree',
      '_Out_ SignalOwnedBuffer *out, SignalConstPointerPrivateKey private_key, SignalConstPointerPublicKey public_key'
    ),
    signal_privatekey_clone: clone('signal_privatekey_clone', 'PrivateKey'),
    signal_privatekey_destroy: destroy('signal_privatekey_destroy', 'PrivateKey'),

    signal_identitykeypair_serialize: call(
      'signal_identitykeypair_serialize',
      '_Out_ SignalOwnedBuffer *out, SignalConstPointerPublicKey public_key, SignalConstPointerPrivateKey private_key'
    ),
    signal_identitykeypair_sign_alternate_identity: call(
      'signal_identitykeypair_sign_alternate_identity',
      '_Out_ SignalOwnedBuffer *out, SignalConstPointerPublicKey public_key, SignalConstPointerPrivateKey private_key, SignalConstPointerPublicKey other_identity'
    ),

    signal_kyber_key_pair_generate: call(
      'signal_kyber_key_pair_generate',
      '_Out_ SignalMutPointerKyberKeyPair *out'
    ),
    signal_kyber_key_pair_get_public_key: child(
      'signal_kyber_key_pair_get_public_key',
      'KyberKeyPair',
      'KyberPublicKey'
    ),
    signal_kyber_key_pair_get_secret_key: child(
      'signal_kyber_key_pair_get_secret_key',
      'KyberKeyPair',
      'KyberSecretKey'
    ),
    signal_kyber_key_pair_clone: clone('signal_kyber_key_pair_clone', 'KyberKeyPair'),
    signal_kyber_key_pair_destroy: destroy('signal_kyber_key_pair_destroy', 'KyberKeyPair'),
    signal_kyber_public_key_deserialize: deserialize('signal_kyber_public_key_deserialize', 'KyberPublicKey'),
    signal_kyber_public_key_serialize: bytes('signal_kyber_public_key_serialize', 'KyberPublicKey'),
    signal_kyber_public_key_equals: call(
      'signal_kyber_public_key_equals',
      '_Out_ bool *out, SignalConstPointerKyberPublicKey lhs, SignalConstPointerKyberPublicKey rhs'
    ),
    signal_kyber_public_key_clone: clone('signal_kyber_public_key_clone', 'KyberPublicKey'),
    signal_kyber_public_key_destroy: destroy('signal_kyber_public_key_destroy', 'KyberPublicKey'),
    signal_kyber_secret_key_deserialize: deserialize('signal_kyber_secret_key_deserialize', 'KyberSecretKey'),
    signal_kyber_secret_key_serialize: bytes('signal_kyber_secret_key_serialize', 'KyberSecretKey'),
    signal_kyber_secret_key_clone: clone('signal_kyber_secret_key_clone', 'KyberSecretKey'),
    signal_kyber_secret_key_destroy: destroy('signal_kyber_secret_key_destroy', 'KyberSecretKey'),

    signal_pre_key_record_new: call(
      'signal_pre_key_record_new',
      '_Out_ SignalMutPointerPreKeyRecord *out, uint32_t id, SignalConstPointerPublicKey pub_key, SignalConstPointerPrivateKey priv_key'
    ),
    signal_pre_key_record_deserialize: deserialize('signal_pre_key_record_deserialize', 'PreKeyRecord'),
    signal_pre_key_record_serialize: bytes('signal_pre_key_record_serialize', 'PreKeyRecord'),
    signal_pre_key_record_get_id: scalar('signal_pre_key_record_get_id', 'uint32_t', 'PreKeyRecord'),
    signal_pre_key_record_get_public_key: child('signal_pre_key_record_get_public_key', 'PreKeyRecord', 'PublicKey'),
    signal_pre_key_record_get_private_key: child(
      'signal_pre_key_record_get_private_key',
      'PreKeyRecord',
      'PrivateKey'
    ),
    signal_pre_key_record_clone: clone('signal_pre_key_record_clone', 'PreKeyRecord'),
    signal_pre_key_record_destroy: destroy('signal_pre_key_record_destroy', 'PreKeyRecord'),

    signal_signed_pre_key_record_new: call(
      'signal_signed_pre_key_record_new',
      '_Out_ SignalMutPointerSignedPreKeyRecord *out, uint32_t id, uint64_t timestamp, SignalConstPointerPublicKey pub_key, SignalConstPointerPrivateKey priv_key, SignalBorrowedBuffer signature'
    ),
    signal_signed_pre_key_record_deserialize: deserialize(
      'signal_signed_pre_key_record_deserialize',
      'SignedPreKeyRecord'
    ),
    signal_signed_pre_key_record_serialize: bytes('signal_signed_pre_key_record_serialize', 'SignedPreKeyRecord'),
    signal_signed_pre_key_record_get_id: scalar(
      'signal_signed_pre_key_record_get_id',
      'uint32_t',
      'SignedPreKeyRecord'
    ),
    signal_signed_pre_key_record_get_timestamp: scalar(
      'signal_signed_pre_key_record_get_timestamp',
      'uint64_t',
      'SignedPreKeyRecord'
    ),
    signal_signed_pre_key_record_get_signature: bytes(
      'signal_signed_pre_key_record_get_signature',
      'SignedPreKeyRecord'
    ),
    signal_signed_pre_key_record_get_public_key: child(
      'signal_signed_pre_key_record_get_public_key',
      'SignedPreKeyRecord',
      'PublicKey'
    ),
    signal_signed_pre_key_record_get_private_key: child(
      'signal_signed_pre_key_record_get_private_key',
      'SignedPreKeyRecord',
      'PrivateKey'
    ),
    signal_signed_pre_key_record_clone: clone('signal_signed_pre_key_record_clone', 'SignedPreKeyRecord'),
    signal_signed_pre_key_record_destroy: destroy('signal_signed_pre_key_record_destroy', 'SignedPreKeyRecord'),

    signal_kyber_pre_key_record_new: call(
      'signal_kyber_pre_key_record_new',
      '_Out_ SignalMutPointerKyberPreKeyRecord *out, uint32_t id, uint64_t timestamp, SignalConstPointerKyberKeyPair key_pair, SignalBorrowedBuffer signature'
    ),
    signal_kyber_pre_key_record_deserialize: deserialize(
      'signal_kyber_pre_key_record_deserialize',
      'KyberPreKeyRecord'
    ),
    signal_kyber_pre_key_record_serialize: bytes('signal_kyber_pre_key_record_serialize', 'KyberPreKeyRecord'),
    signal_kyber_pre_key_record_get_id: scalar('signal_kyber_pre_key_record_get_id', 'uint32_t', 'KyberPreKeyRecord'),
    signal_kyber_pre_key_record_get_timestamp: scalar(
      'signal_kyber_pre_key_record_get_timestamp',
      'uint64_t',
      'KyberPreKeyRecord'
    ),
    signal_kyber_pre_key_record_get_signature: bytes(
      'signal_kyber_pre_key_record_get_signature',
      'KyberPreKeyRecord'
    ),
    signal_kyber_pre_key_record_get_public_key: child(
      'signal_kyber_pre_key_record_get_public_key',
      'KyberPreKeyRecord',
      'KyberPublicKey'
    ),
    signal_kyber_pre_key_record_get_secret_key: child(
      'signal_kyber_pre_key_record_get_secret_key',
      'KyberPreKeyRecord',
      'KyberSecretKey'
    ),
    signal_kyber_pre_key_record_get_key_pair: child(
      'signal_kyber_pre_key_record_get_key_pair',
      'KyberPreKeyRecord',
      'KyberKeyPair'
    ),
    signal_kyber_pre_key_record_clone: clone('signal_kyber_pre_key_record_clone', 'KyberPreKeyRecord'),
    signal_kyber_pre_key_record_destroy: destroy('signal_kyber_pre_key_record_destroy', 'KyberPreKeyRecord'),

    signal_pre_key_bundle_new: call(
      'signal_pre_key_bundle_new',
      [
        '_Out_ SignalMutPointerPreKeyBundle *out',
        'uint32_t registration_id',
        'uint32_t device_id',
        'uint32_t prekey_id',
        'SignalConstPointerPublicKey prekey',
        'uint32_t signed_prekey_id',
        'SignalConstPointerPublicKey signed_prekey',
        'SignalBorrowedBuffer signed_prekey_signature',
        'SignalConstPointerPublicKey identity_key',
        'uint32_t kyber_prekey_id',
        'SignalConstPointerKyberPublicKey kyber_prekey',
        'SignalBorrowedBuffer kyber_prekey_signature',
      ].join(', ')
    ),
    signal_pre_key_bundle_get_registration_id: scalar(
      'signal_pre_key_bundle_get_registration_id',
      'uint32_t',
      'PreKeyBundle'
    ),
    signal_pre_key_bundle_get_device_id: scalar('signal_pre_key_bundle_get_device_id', 'uint32_t', 'PreKeyBundle'),
    signal_pre_key_bundle_get_pre_key_id: scalar('signal_pre_key_bundle_get_pre_key_id', 'uint32_t', 'PreKeyBundle'),
    signal_pre_key_bundle_get_pre_key_public: child(
      'signal_pre_key_bundle_get_pre_key_public',
      'PreKeyBundle',
      'PublicKey'
    ),
    signal_pre_key_bundle_get_signed_pre_key_id: scalar(
      'signal_pre_key_bundle_get_signed_pre_key_id',
      'uint32_t',
      'PreKeyBundle'
    ),
    signal_pre_key_bundle_get_signed_pre_key_public: child(
      'signal_pre_key_bundle_get_signed_pre_key_public',
      'PreKeyBundle',
      'PublicKey'
    ),
    signal_pre_key_bundle_get_signed_pre_key_signature: bytes(
      'signal_pre_key_bundle_get_signed_pre_key_signature',
      'PreKeyBundle'
    ),
    signal_pre_key_bundle_get_identity_key: child('signal_pre_key_bundle_get_identity_key', 'PreKeyBundle', 'PublicKey'),
    signal_pre_key_bundle_get_kyber_pre_key_id: scalar(
      'signal_pre_key_bundle_get_kyber_pre_key_id',
      'uint32_t',
      'PreKeyBundle'
    ),
    signal_pre_key_bundle_get_kyber_pre_key_public: child(
      'signal_pre_key_bundle_get_kyber_pre_key_public',
      'PreKeyBundle',
      'KyberPublicKey'
    ),
    signal_pre_key_bundle_get_kyber_pre_key_signature: bytes(
      'signal_pre_key_bundle_get_kyber_pre_key_signature',
      'PreKeyBundle'
    ),
    signal_pre_key_bundle_clone: clone('signal_pre_key_bundle_clone', 'PreKeyBundle'),
    signal_pre_key_bundle_destroy: destroy('signal_pre_key_bundle_destroy', 'PreKeyBundle'),

    signal_address_new: call(
      'signal_address_new',
      '_Out_ SignalMutPointerProtocolAddress *out, const char *name, uint32_t device_id'
    ),
    signal_address_get_name: string('signal_address_get_name', 'ProtocolAddress'),
    signal_address_get_device_id: scalar('signal_address_get_device_id', 'uint32_t', 'ProtocolAddress'),
    signal_address_clone: clone('signal_address_clone', 'ProtocolAddress'),
    signal_address_destroy: destroy('signal_address_destroy', 'ProtocolAddress'),

    signal_session_record_deserialize: deserialize('signal_session_record_deserialize', 'SessionRecord'),
    signal_session_record_serialize: bytes('signal_session_record_serialize', 'SessionRecord'),
    signal_session_record_archive_current_state: call(
      'signal_session_record_archive_current_state',
      'SignalMutPointerSessionRecord session_record'
    ),
    signal_session_record_has_usable_sender_chain: call(
      'signal_session_record_has_usable_sender_chain',
      '_Out_ bool *out, SignalConstPointerSessionRecord s, uint64_t now'
    ),
    signal_session_record_current_ratchet_key_matches: call(
      'signal_session_record_current_ratchet_key_matches',
      '_Out_ bool *out, SignalConstPointerSessionRecord s, SignalConstPointerPublicKey key'
    ),
    signal_session_record_get_local_registration_id: scalar(
      'signal_session_record_get_local_registration_id',
      'uint32_t',
      'SessionRecord'
    ),
    signal_session_record_get_remote_registration_id: scalar(
      'signal_session_record_get_remote_registration_id',
      'uint32_t',
      'SessionRecord'
    ),
    signal_session_record_clone: clone('signal_session_record_clone', 'SessionRecord'),
    signal_session_record_destroy: destroy('signal_session_record_destroy', 'SessionRecord'),

    signal_message_deserialize: deserialize('signal_message_deserialize', 'Message'),
    signal_message_get_serialized: bytes('signal_message_get_serialized', 'Message'),
    signal_message_get_body: bytes('signal_message_get_body', 'Message'),
    signal_message_get_counter: scalar('signal_message_get_counter', 'uint32_t', 'Message'),
    signal_message_get_message_version: scalar('signal_message_get_message_version', 'uint32_t', 'Message'),
    signal_message_get_sender_ratchet_key: child('signal_message_get_sender_ratchet_key', 'Message', 'PublicKey'),
    signal_message_clone: clone('signal_message_clone', 'Message'),
    signal_message_destroy: destroy('signal_message_destroy', 'Message'),

    signal_decryption_error_message_deserialize: deserialize(
      'signal_decryption_error_message_deserialize',
      'DecryptionErrorMessage'
    ),
    signal_decryption_error_message_serialize: bytes(
      'signal_decryption_error_message_serialize',
      'DecryptionErrorMessage'
    ),
    signal_decryption_error_message_get_timestamp: scalar(
      'signal_decryption_error_message_get_timestamp',
      'uint64_t',
      'DecryptionErrorMessage'
    ),
    signal_decryption_error_message_get_device_id: scalar(
      'signal_decryption_error_message_get_device_id',
      'uint32_t',
      'DecryptionErrorMessage'
    ),
    signal_decryption_error_message_get_ratchet_key: child(
      'signal_decryption_error_message_get_ratchet_key',
      'DecryptionErrorMessage',
      'PublicKey'
    ),
    signal_decryption_error_message_clone: clone('signal_decryption_error_message_clone', 'DecryptionErrorMessage'),
    signal_decryption_error_message_destroy: destroy(
      'signal_decryption_error_message_destroy',
      'DecryptionErrorMessage'
    ),

    signal_sender_key_record_deserialize: deserialize('signal_sender_key_record_deserialize', 'SenderKeyRecord'),
    signal_sender_key_record_serialize: bytes('signal_sender_key_record_serialize', 'SenderKeyRecord'),
    signal_sender_key_record_clone: clone('signal_sender_key_record_clone', 'SenderKeyRecord'),
    signal_sender_key_record_destroy: destroy('signal_sender_key_record_destroy', 'SenderKeyRecord'),

    signal_sender_key_message_deserialize: deserialize('signal_sender_key_message_deserialize', 'SenderKeyMessage'),
    signal_sender_key_message_serialize: bytes('signal_sender_key_message_serialize', 'SenderKeyMessage'),
    signal_sender_key_message_get_cipher_text: bytes('signal_sender_key_message_get_cipher_text', 'SenderKeyMessage'),
    signal_sender_key_message_get_iteration: scalar(
      'signal_sender_key_message_get_iteration',
      'uint32_t',
      'SenderKeyMessage'
    ),
    signal_sender_key_message_get_chain_id: scalar('signal_sender_key_message_get_chain_id', 'uint32_t', 'SenderKeyMessage'),
    signal_sender_key_message_get_distribution_id: uuid(
      'signal_sender_key_message_get_distribution_id',
      'SenderKeyMessage'
    ),
    signal_sender_key_message_verify_signature: call(
      'signal_sender_key_message_verify_signature',
      '_Out_ bool *out, SignalConstPointerSenderKeyMessage skm, SignalConstPointerPublicKey pubkey'
    ),
    signal_sender_key_message_clone: clone('signal_sender_key_message_clone', 'SenderKeyMessage'),
    signal_sender_key_message_destroy: destroy('signal_sender_key_message_destroy', 'SenderKeyMessage'),

    signal_sender_key_distribution_message_deserialize: deserialize(
      'signal_sender_key_distribution_message_deserialize',
      'SenderKeyDistributionMessage'
    ),
    signal_sender_key_distribution_message_serialize: bytes(
      'signal_sender_key_distribution_message_serialize',
      'SenderKeyDistributionMessage'
    ),
    signal_sender_key_distribution_message_get_chain_key: bytes(
      'signal_sender_key_distribution_message_get_chain_key',
      'SenderKeyDistributionMessage'
    ),
    signal_sender_key_distribution_message_get_iteration: scalar(
      'signal_sender_key_distribution_message_get_iteration',
      'uint32_t',
      'SenderKeyDistributionMessage'
    ),
    signal_sender_key_distribution_message_get_chain_id: scalar(
      'signal_sender_key_distribution_message_get_chain_id',
      'uint32_t',
      'SenderKeyDistributionMessage'
    ),
    signal_sender_key_distribution_message_get_distribution_id: uuid(
      'signal_sender_key_distribution_message_get_distribution_id',
      'SenderKeyDistributionMessage'
    ),
    signal_sender_key_distribution_message_get_signature_key: child(
      'signal_sender_key_distribution_message_get_signature_key',
      'SenderKeyDistributionMessage',
      'PublicKey'
    ),
    signal_sender_key_distribution_message_clone: clone(
      'signal_sender_key_distribution_message_clone',
      'SenderKeyDistributionMessage'
    ),
    signal_sender_key_distribution_message_destroy: destroy(
      'signal_sender_key_distribution_message_destroy',
      'SenderKeyDistributionMessage'
    ),

    signal_server_certificate_new: call(
      'signal_server_certificate_new',
      '_Out_ SignalMutPointerServerCertificate *out, uint32_t key_id, SignalConstPointerPublicKey server_key, SignalConstPointerPrivateKey trust_root'
    ),
    signal_server_certificate_deserialize: deserialize('signal_server_certificate_deserialize', 'ServerCertificate'),
    signal_server_certificate_get_serialized: bytes('signal_server_certificate_get_serialized', 'ServerCertificate'),
    signal_server_certificate_get_certificate: bytes('signal_server_certificate_get_certificate', 'ServerCertificate'),
    signal_server_certificate_get_signature: bytes('signal_server_certificate_get_signature', 'ServerCertificate'),
    signal_server_certificate_get_key_id: scalar('signal_server_certificate_get_key_id', 'uint32_t', 'ServerCertificate'),
    signal_server_certificate_get_key: child('signal_server_certificate_get_key', 'ServerCertificate', 'PublicKey'),
    signal_server_certificate_clone: clone('signal_server_certificate_clone', 'ServerCertificate'),
    signal_server_certificate_destroy: destroy('signal_server_certificate_destroy', 'ServerCertificate'),

    signal_sender_certificate_new: call(
      'signal_sender_certificate_new',
      [
        '_Out_ SignalMutPointerSenderCertificate *out',
        'const char *sender_uuid',
        'const char *sender_e164',
        'uint32_t sender_device_id',
        'SignalConstPointerPublicKey sender_key',
        'uint64_t expiration',
        'SignalConstPointerServerCertificate signer_cert',
        'SignalConstPointerPrivateKey signer_key',
      ].join(', ')
    ),
    signal_sender_certificate_deserialize: deserialize('signal_sender_certificate_deserialize', 'SenderCertificate'),
    signal_sender_certificate_get_serialized: bytes('signal_sender_certificate_get_serialized', 'SenderCertificate'),
    signal_sender_certificate_get_certificate: bytes('signal_sender_certificate_get_certificate', 'SenderCertificate'),
    signal_sender_certificate_get_signature: bytes('signal_sender_certificate_get_signature', 'SenderCertificate'),
    signal_sender_certificate_get_sender_uuid: string('signal_sender_certificate_get_sender_uuid', 'SenderCertificate'),
    signal_sender_certificate_get_sender_e164: string('signal_sender_certificate_get_sender_e164', 'SenderCertificate'),
    signal_sender_certificate_get_device_id: scalar(
      'signal_sender_certificate_get_device_id',
      'uint32_t',
      'SenderCertificate'
    ),
    signal_sender_certificate_get_expiration: scalar(
      'signal_sender_certificate_get_expiration',
      'uint64_t',
      'SenderCertificate'
    ),
    signal_sender_certificate_get_key: child('signal_sender_certificate_get_key', 'SenderCertificate', 'PublicKey'),
    signal_sender_certificate_get_server_certificate: child(
      'signal_sender_certificate_get_server_certificate',
      'SenderCertificate',
      'ServerCertificate'
    ),
    signal_sender_certificate_validate: (out, cert, trustRoots, time) =>
      withPointerArray(trustRoots, (roots) => validate(out, cert, roots, time)),
    signal_sender_certificate_clone: clone('signal_sender_certificate_clone', 'SenderCertificate'),
    signal_sender_certificate_destroy: destroy('signal_sender_certificate_destroy', 'SenderCertificate'),

    signal_aes256_gcm_siv_new: call(
      'signal_aes256_gcm_siv_new',
      '_Out_ SignalMutPointerAes256GcmSiv *out, SignalBorrowedBuffer key'
    ),
    signal_aes256_gcm_siv_encrypt: call(
      'signal_aes256_gcm_siv_encrypt',
      '_Out_ SignalOwnedBuffer *out, SignalConstPointerAes256GcmSiv aes_gcm_siv_obj, SignalBorrowedBuffer ptext, SignalBorrowedBuffer nonce, SignalBorrowedBuffer associated_data'
    ),
    signal_aes256_gcm_siv_decrypt: call(
      'signal_aes256_gcm_siv_decrypt',
      '_Out_ SignalOwnedBuffer *out, SignalConstPointerAes256GcmSiv aes_gcm_siv_obj, SignalBorrowedBuffer ctext, SignalBorrowedBuffer nonce, SignalBorrowedBuffer associated_data'
    ),
    signal_aes256_gcm_siv_destroy: destroy('signal_aes256_gcm_siv_destroy', 'Aes256GcmSiv'),

    signal_hkdf_derive: (output, ikm, label, salt) =>
      withNativeOutput(output, (native) => hkdf(native, ikm, label, salt)),

    signal_fingerprint_new: call(
      'signal_fingerprint_new',
      [
        '_Out_ SignalMutPointerFingerprint *out',
        'uint32_t iterations',
        'uint32_t version',
        'SignalBorrowedBuffer local_identifier',
        'SignalConstPointerPublicKey local_key',
        'SignalBorrowedBuffer remote_identifier',
        'SignalConstPointerPublicKey remote_key',
      ].join(', ')
    ),
    signal_fingerprint_display_string: string('signal_fingerprint_display_string', 'Fingerprint'),
    signal_fingerprint_scannable_encoding: bytes('signal_fingerprint_scannable_encoding', 'Fingerprint'),
    signal_fingerprint_compare: call(
      'signal_fingerprint_compare',
      '_Out_ bool *out, SignalBorrowedBuffer fprint1, SignalBorrowedBuffer fprint2'
    ),
    signal_fingerprint_clone: clone('signal_fingerprint_clone', 'Fingerprint'),
    signal_fingerprint_destroy: destroy('signal_fingerprint_destroy', 'Fingerprint'),

    signal_ciphertext_message_type: scalar('signal_ciphertext_message_type', 'uint8_t', 'CiphertextMessage'),
    signal_ciphertext_message_serialize: bytes('signal_ciphertext_message_serialize', 'CiphertextMessage'),
    signal_ciphertext_message_destroy: destroy('signal_ciphertext_message_destroy', 'CiphertextMessage'),

    signal_pre_key_signal_message_deserialize: deserialize(
      'signal_pre_key_signal_message_deserialize',
      'PreKeySignalMessage'
    ),
    signal_pre_key_signal_message_serialize: bytes('signal_pre_key_signal_message_serialize', 'PreKeySignalMessage'),
    signal_pre_key_signal_message_get_version: scalar(
      'signal_pre_key_signal_message_get_version',
      'uint32_t',
      'PreKeySignalMessage'
    ),
    signal_pre_key_signal_message_get_registration_id: scalar(
      'signal_pre_key_signal_message_get_registration_id',
      'uint32_t',
      'PreKeySignalMessage'
    ),
    signal_pre_key_signal_message_get_pre_key_id: scalar(
      'signal_pre_key_signal_message_get_pre_key_id',
      'uint32_t',
      'PreKeySignalMessage'
    ),
    signal_pre_key_signal_message_get_signed_pre_key_id: scalar(
      'signal_pre_key_signal_message_get_signed_pre_key_id',
      'uint32_t',
      'PreKeySignalMessage'
    ),
    signal_pre_key_signal_message_get_base_key: child(
      'signal_pre_key_signal_message_get_base_key',
      'PreKeySignalMessage',
      'PublicKey'
    ),
    signal_pre_key_signal_message_get_identity_key: child(
      'signal_pre_key_signal_message_get_identity_key',
      'PreKeySignalMessage',
      'PublicKey'
    ),
    signal_pre_key_signal_message_get_signal_message: child(
      'signal_pre_key_signal_message_get_signal_message',
      'PreKeySignalMessage',
      'Message'
    ),
    signal_pre_key_signal_message_clone: clone('signal_pre_key_signal_message_clone', 'PreKeySignalMessage'),
    signal_pre_key_signal_message_destroy: destroy('signal_pre_key_signal_message_destroy', 'PreKeySignalMessage'),

    signal_process_prekey_bundle: (bundle, address, sessions, identities, now) =>
      withCallbacks((scope) =>
        processPreKeyBundle(bundle, address, scope.sessionStore(sessions), scope.identityStore(identities), now)
      ),
    signal_encrypt_message: (out, plaintext, address, sessions, identities, now) =>
      withCallbacks((scope) =>
        encryptMessage(out, plaintext, address, scope.sessionStore(sessions), scope.identityStore(identities), now)
      ),
    signal_decrypt_message: (out, message, address, sessions, identities) =>
      withCallbacks((scope) =>
        decryptMessage(out, message, address, scope.sessionStore(sessions), scope.identityStore(identities))
      ),
    signal_decrypt_pre_key_message: (out, message, address, sessions, identities, preKeys, signedPreKeys, kyberPreKeys) =>
      withCallbacks((scope) =>
        decryptPreKeyMessage(
          out,
          message,
          address,
          scope.sessionStore(sessions),
          scope.identityStore(identities),
          scope.preKeyStore(preKeys),
          scope.signedPreKeyStore(signedPreKeys),
          scope.kyberPreKeyStore(kyberPreKeys)
        )
      ),

    signal_sender_key_distribution_message_create: (out, sender, distributionId, store) =>
      withCallbacks((scope) => createDistribution(out, sender, distributionId, scope.senderKeyStore(store))),
    signal_process_sender_key_distribution_message: (sender, message, store) =>
      withCallbacks((scope) => processDistribution(sender, message, scope.senderKeyStore(store))),
    signal_group_encrypt_message: (out, sender, distributionId, plaintext, store) =>
      withCallbacks((scope) => groupEncrypt(out, sender, distributionId, plaintext, scope.senderKeyStore(store))),
    signal_group_decrypt_message: (out, sender, ciphertext, store) =>
      withCallbacks((scope) => groupDecrypt(out, sender, ciphertext, scope.senderKeyStore(store))),

    signal_unidentified_sender_message_content_new: call(
      'signal_unidentified_sender_message_content_new',
      '_Out_ SignalMutPointerUnidentifiedSenderMessageContent *out, SignalConstPointerCiphertextMessage message, SignalConstPointerSenderCertificate sender, uint32_t content_hint, SignalBorrowedBuffer group_id'
    ),
    signal_unidentified_sender_message_content_deserialize: deserialize(
      'signal_unidentified_sender_message_content_deserialize',
      'UnidentifiedSenderMessageContent'
    ),
    signal_unidentified_sender_message_content_serialize: bytes(
      'signal_unidentified_sender_message_content_serialize',
      'UnidentifiedSenderMessageContent'
    ),
    signal_unidentified_sender_message_content_get_contents: bytes(
      'signal_unidentified_sender_message_content_get_contents',
      'UnidentifiedSenderMessageContent'
    ),
    signal_unidentified_sender_message_content_get_group_id_or_empty: bytes(
      'signal_unidentified_sender_message_content_get_group_id_or_empty',
      'UnidentifiedSenderMessageContent'
    ),
    signal_unidentified_sender_message_content_get_sender_cert: child(
      'signal_unidentified_sender_message_content_get_sender_cert',
      'UnidentifiedSenderMessageContent',
      'SenderCertificate'
    ),
    signal_unidentified_sender_message_content_get_msg_type: scalar(
      'signal_unidentified_sender_message_content_get_msg_type',
      'uint8_t',
      'UnidentifiedSenderMessageContent'
    ),
    signal_unidentified_sender_message_content_get_content_hint: scalar(
      'signal_unidentified_sender_message_content_get_content_hint',
      'uint32_t',
      'UnidentifiedSenderMessageContent'
    ),
    signal_unidentified_sender_message_content_destroy: destroy(
      'signal_unidentified_sender_message_content_destroy',
      'UnidentifiedSenderMessageContent'
    ),

    signal_sealed_session_cipher_encrypt: (out, destination, content, identities) =>
      withCallbacks((scope) => sealedEncrypt(out, destination, content, scope.identityStore(identities))),
    signal_sealed_session_cipher_decrypt_to_usmc: (out, ciphertext, identities) =>
      withCallbacks((scope) => sealedDecrypt(out, ciphertext, scope.identityStore(identities))),
  };

  return {
    symbols,
    copyBuffer: (base, length) => decodeBytes(base, length),
    close: () => lib.unload(),
  };
}

function decodeBytes(base: unknown, length: number): Uint8Array {
  const bytes: unknown = koffi.decode(base, koffi.array('uint8_t', length, 'Typed'));
  if (!(bytes instanceof Uint8Array)) {
    throw new NativeError(NativeErrorCode.InternalError, 'copyBuffer', 'unexpected buffer type');
  }
  return bytes;
}

/**
 * Give the engine native scratch memory to write into, then copy the result
 * into the caller's buffer. The scratch copy is zeroed before it is freed.
 */
function withNativeOutput(
  output: MutableBuffer,
  fn: (native: { base: unknown; length: number }) => FfiError | null
): FfiError | null {
  const size = Math.max(output.length, 1);
  const scratch: unknown = koffi.alloc('uint8_t', size);
  try {
    const error = fn({ base: scratch, length: output.length });
    if (error === null && output.length > 0) {
      const result = decodeBytes(scratch, output.length);
      output.base.set(result);
      result.fill(0);
    }
    return error;
  } finally {
    koffi.encode(scratch, koffi.array('uint8_t', size), new Array<number>(size).fill(0));
    koffi.free(scratch);
  }
}

/**
 * Lay out a slice of `{ raw }` structs in native memory for one call.
 */
function withPointerArray<R>(
  slice: BorrowedSlice<ConstPointer<'PublicKey'>>,
  fn: (native: { base: unknown; length: number }) => R
): R {
  const count = Math.max(slice.length, 1);
  const memory: unknown = koffi.alloc('SignalConstPointerPublicKey', count);
  try {
    if (slice.length > 0) {
      koffi.encode(memory, koffi.array('SignalConstPointerPublicKey', slice.length), slice.base);
    }
    return fn({ base: memory, length: slice.length });
  } finally {
    koffi.free(memory);
  }
}

/** `{ raw }` argument pointing at a store struct in native memory. */
interface StoreArgument {
  raw: unknown;
}

/**
 * Callbacks and store structs registered for one engine call. Everything
 * is unregistered and freed by release().
 */
class CallbackScope {
  private readonly callbacks: IKoffiRegisteredCallback[] = [];
  private readonly blocks: unknown[] = [];

  sessionStore(store: FfiSessionStore): StoreArgument {
    return this.store('SessionStore', {
      load_session: this.register('load_session', (_ctx: unknown, recordp: unknown, address: ConstPointer<'ProtocolAddress'>) =>
        writeOut<'SessionRecord'>(recordp, 'SignalMutPointerSessionRecord', (out) => store.loadSession(out, address))
      ),
      store_session: this.register(
        'store_session',
        (_ctx: unknown, address: ConstPointer<'ProtocolAddress'>, record: ConstPointer<'SessionRecord'>) =>
          store.storeSession(address, record)
      ),
    });
  }

  identityStore(store: FfiIdentityKeyStore): StoreArgument {
    return this.store('IdentityKeyStore', {
      get_identity_key_pair: this.register('get_identity_key_pair', (_ctx: unknown, keyp: unknown) =>
        writeOut<'PrivateKey'>(keyp, 'SignalMutPointerPrivateKey', (out) => store.getIdentityKeyPair(out))
      ),
      get_local_registration_id: this.register('get_local_registration_id', (_ctx: unknown, idp: unknown) => {
        const out: Out<number> = [null];
        const status = store.getLocalRegistrationId(out);
        if (out[0] !== null) {
          koffi.encode(idp, 'uint32_t', out[0]);
        }
        return status;
      }),
      save_identity: this.register(
        'save_identity',
        (_ctx: unknown, address: ConstPointer<'ProtocolAddress'>, key: ConstPointer<'PublicKey'>) =>
          store.saveIdentity(address, key)
      ),
      get_identity: this.register(
        'get_identity',
        (_ctx: unknown, keyp: unknown, address: ConstPointer<'ProtocolAddress'>) =>
          writeOut<'PublicKey'>(keyp, 'SignalMutPointerPublicKey', (out) => store.getIdentity(out, address))
      ),
      is_trusted_identity: this.register(
        'is_trusted_identity',
        (
          _ctx: unknown,
          address: ConstPointer<'ProtocolAddress'>,
          key: ConstPointer<'PublicKey'>,
          direction: number
        ) => store.isTrustedIdentity(address, key, direction)
      ),
    });
  }

  preKeyStore(store: FfiPreKeyStore): StoreArgument {
    return this.store('PreKeyStore', {
      load_pre_key: this.register('load_pre_key', (_ctx: unknown, recordp: unknown, id: number) =>
        writeOut<'PreKeyRecord'>(recordp, 'SignalMutPointerPreKeyRecord', (out) => store.loadPreKey(out, id))
      ),
      store_pre_key: this.register('store_pre_key', (_ctx: unknown, id: number, record: ConstPointer<'PreKeyRecord'>) =>
        store.storePreKey(id, record)
      ),
      remove_pre_key: this.register('remove_pre_key', (_ctx: unknown, id: number) => store.removePreKey(id)),
    });
  }

  signedPreKeyStore(store: FfiSignedPreKeyStore): StoreArgument {
    return this.store('SignedPreKeyStore', {
      load_signed_pre_key: this.register('load_signed_pre_key', (_ctx: unknown, recordp: unknown, id: number) =>
        writeOut<'SignedPreKeyRecord'>(recordp, 'SignalMutPointerSignedPreKeyRecord', (out) =>
          store.loadSignedPreKey(out, id)
        )
      ),
      store_signed_pre_key: this.register(
        'store_signed_pre_key',
        (_ctx: unknown, id: number, record: ConstPointer<'SignedPreKeyRecord'>) => store.storeSignedPreKey(id, record)
      ),
    });
  }

  kyberPreKeyStore(store: FfiKyberPreKeyStore): StoreArgument {
    return this.store('KyberPreKeyStore', {
      load_kyber_pre_key: this.register('load_kyber_pre_key', (_ctx: unknown, recordp: unknown, id: number) =>
        writeOut<'KyberPreKeyRecord'>(recordp, 'SignalMutPointerKyberPreKeyRecord', (out) =>
          store.loadKyberPreKey(out, id)
        )
      ),
      store_kyber_pre_key: this.register(
        'store_kyber_pre_key',
        (_ctx: unknown, id: number, record: ConstPointer<'KyberPreKeyRecord'>) => store.storeKyberPreKey(id, record)
      ),
      mark_kyber_pre_key_used: this.register(
        'mark_kyber_pre_key_used',
        (_ctx: unknown, id: number, signedPreKeyId: number, baseKey: ConstPointer<'PublicKey'>) =>
          store.markKyberPreKeyUsed(id, signedPreKeyId, baseKey)
      ),
    });
  }

  senderKeyStore(store: FfiSenderKeyStore): StoreArgument {
    return this.store('SenderKeyStore', {
      load_sender_key: this.register(
        'load_sender_key',
        (_ctx: unknown, recordp: unknown, sender: ConstPointer<'ProtocolAddress'>, distributionId: unknown) =>
          writeOut<'SenderKeyRecord'>(recordp, 'SignalMutPointerSenderKeyRecord', (out) =>
            store.loadSenderKey(out, sender, decodeBytes(distributionId, 16))
          )
      ),
      store_sender_key: this.register(
        'store_sender_key',
        (
          _ctx: unknown,
          sender: ConstPointer<'ProtocolAddress'>,
          distributionId: unknown,
          record: ConstPointer<'SenderKeyRecord'>
        ) => store.storeSenderKey(sender, decodeBytes(distributionId, 16), record)
      ),
    });
  }

  release(): void {
    for (const callback of this.callbacks.splice(0)) {
      koffi.unregister(callback);
    }
    for (const block of this.blocks.splice(0)) {
      koffi.free(block);
    }
  }

  private register(field: string, fn: (...args: never[]) => number): IKoffiRegisteredCallback {
    const type = callbackTypes.get(field);
    if (type === undefined) {
      throw new NativeError(NativeErrorCode.InternalError, 'register', `no callback type for ${field}`);
    }
    const callback = koffi.register(fn, type);
    this.callbacks.push(callback);
    return callback;
  }

  private store<S extends StoreStruct>(
    name: S,
    callbacks: Record<keyof (typeof STORE_STRUCTS)[S], IKoffiRegisteredCallback>
  ): StoreArgument {
    const type = `Signal${name}`;
    const block: unknown = koffi.alloc(type, 1);
    this.blocks.push(block);
    koffi.encode(block, type, { ctx: null, ...callbacks });
    return { raw: block };
  }
}

function withCallbacks<R>(fn: (scope: CallbackScope) => R): R {
  const scope = new CallbackScope();
  try {
    return fn(scope);
  } finally {
    scope.release();
  }
}

/**
 * Run a callback with a `{ raw }` out-parameter and write what it set, or
 * null, through the engine's pointer.
 */
function writeOut<T extends NativeTypeName>(
  target: unknown,
  type: string,
  fn: (out: Out<MutPointer<T>>) => number
): number {
  const out: Out<MutPointer<T>> = [null];
  const status = fn(out);
  koffi.encode(target, type, out[0] ?? { raw: null });
  return status;
}
