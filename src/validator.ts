/**
 * Serialization pre-validation
 *
 * Structural checks run on serialized input before it is handed to the
 * native engine for deserialization. Rules are pure: they read the buffer,
 * allocate nothing native, and accept any input including empty buffers.
 *
 * The checks are deliberately shallow (lengths, leading tag or version
 * bytes, a curve point blocklist). They are not a grammar for the wire
 * formats; the engine still performs full parsing.
 */

import { ValidationError, ValidationReason } from './exceptions.js';

/** Leading type bytes of serialized keys. */
export const KeyType = {
  djb: 0x05,
  identityKeyPair: 0x0a,
  kyber1024: 0x08,
} as const;

/** Exact sizes of serialized keys. */
export const KeySize = {
  publicKey: 33,
  privateKey: 32,
  identityKeyPair: 69,
  kyberPublicKey: 1569,
  kyberSecretKey: 3169,
} as const;

/** Minimum sizes of variable-length serialized records and messages. */
export const RecordSize = {
  preKeyRecordMin: 69,
  signedPreKeyRecordMin: 140,
  kyberPreKeyRecordMin: 100,
  sessionRecordMin: 50,
  senderKeyRecordMin: 20,
  senderCertificateMin: 10,
  serverCertificateMin: 10,
  signalMessageMin: 10,
  decryptionErrorMessageMin: 10,
  senderKeyMessageMin: 10,
  senderKeyDistributionMessageMin: 10,
  preKeySignalMessageMin: 10,
  unidentifiedSenderMessageContentMin: 10,
} as const;

/**
 * Curve25519 points of order 1, 2, 4 or 8, including the non-canonical
 * encodings of 0 and 1 (libsodium's x25519 blocklist).
 *
 * This is a fixed list, not an order check: small-order points outside it
 * are left to the engine.
 */
export const LOW_ORDER_POINTS: readonly string[] = [
  // 0 (order 4)
  '0000000000000000000000000000000000000000000000000000000000000000',
  // 1 (order 1)
  '0100000000000000000000000000000000000000000000000000000000000000',
  // order 8
  'e0eb7a7c3b41b8ae1656e3faf19fc46ada098deb9c32b1fd866205165f49b800',
  // order 8
  '5f9c95bca3508c24b1d0b1559c83ef5b04445cc4581c8e86d8224eddd09f1157',
  // p - 1 (order 2)
  'ecffffffffffffffffffffffffffffffffffffffffffffffffffffffffffff7f',
  // p, non-canonical 0
  'edffffffffffffffffffffffffffffffffffffffffffffffffffffffffffff7f',
  // p + 1, non-canonical 1
  'eeffffffffffffffffffffffffffffffffffffffffffffffffffffffffffff7f',
];

const lowOrderPoints = LOW_ORDER_POINTS.map((hex) => Buffer.from(hex, 'hex'));

/**
 * Check whether 32 bytes of key material match a blocklisted point.
 */
export function isLowOrderPoint(point: Uint8Array): boolean {
  if (point.length !== 32) {
    return false;
  }
  return lowOrderPoints.some((blocked) => blocked.equals(point));
}

/**
 * A rejected buffer: which field, and why.
 */
export interface ValidationFailure {
  readonly field: string;
  readonly reason: ValidationReason;
  readonly detail: string;
}

export type ValidationRule = (data: Uint8Array) => ValidationFailure | null;

const hex = (byte: number | undefined): string =>
  `0x${(byte ?? 0).toString(16).padStart(2, '0')}`;

function fail(field: string, reason: ValidationReason, detail: string): ValidationFailure {
  return { field, reason, detail };
}

function exactLength(field: string, size: number, typeByte?: number): ValidationRule {
  return (data) => {
    if (data.length === 0) {
      return fail(field, 'empty', 'Cannot be empty');
    }
    if (data.length !== size) {
      return fail(field, 'length', `Invalid length: expected ${size} bytes, got ${data.length}`);
    }
    if (typeByte !== undefined && data[0] !== typeByte) {
      return fail(
        field,
        'key-type',
        `Invalid key type: expected ${hex(typeByte)}, got ${hex(data[0])}`
      );
    }
    return null;
  };
}

type LeadingByteCheck = (first: number, field: string) => ValidationFailure | null;

function minLength(field: string, min: number, leading: LeadingByteCheck): ValidationRule {
  return (data) => {
    if (data.length === 0) {
      return fail(field, 'empty', 'Cannot be empty');
    }
    if (data.length < min) {
      return fail(
        field,
        'too-short',
        `Data too short: expected at least ${min} bytes, got ${data.length}`
      );
    }
    return leading(data[0] ?? 0, field);
  };
}

function fieldTag(...allowed: number[]): LeadingByteCheck {
  return (first, field) =>
    allowed.includes(first)
      ? null
      : fail(
          field,
          'field-tag',
          `Invalid protobuf structure: expected field tag ${allowed.map(hex).join(' or ')}, got ${hex(first)}`
        );
}

const messageVersion: LeadingByteCheck = (first, field) => {
  const version = (first >> 4) & 0x0f;
  return version >= 2 && version <= 4
    ? null
    : fail(field, 'version', `Invalid message version: expected 2-4, got ${version}`);
};

const wireType: LeadingByteCheck = (first, field) => {
  const type = first & 0x07;
  return type <= 5 ? null : fail(field, 'wire-type', `Invalid protobuf wire type: got ${type}`);
};

const publicKeyShape = exactLength('publicKey', KeySize.publicKey, KeyType.djb);

/**
 * Validation rule per serialized type.
 */
export const validationRules = {
  publicKey: (data) =>
    publicKeyShape(data) ??
    (isLowOrderPoint(data.subarray(1))
      ? fail('publicKey', 'low-order-point', 'Low-order point detected (potential small subgroup attack)')
      : null),
  privateKey: exactLength('privateKey', KeySize.privateKey),
  identityKeyPair: exactLength('identityKeyPair', KeySize.identityKeyPair, KeyType.identityKeyPair),
  kyberPublicKey: exactLength('kyberPublicKey', KeySize.kyberPublicKey, KeyType.kyber1024),
  kyberSecretKey: exactLength('kyberSecretKey', KeySize.kyberSecretKey),
  preKeyRecord: minLength('preKeyRecord', RecordSize.preKeyRecordMin, fieldTag(0x08, 0x12)),
  signedPreKeyRecord: minLength(
    'signedPreKeyRecord',
    RecordSize.signedPreKeyRecordMin,
    fieldTag(0x08, 0x10, 0x12)
  ),
  kyberPreKeyRecord: minLength(
    'kyberPreKeyRecord',
    RecordSize.kyberPreKeyRecordMin,
    fieldTag(0x08, 0x10, 0x12)
  ),
  sessionRecord: minLength('sessionRecord', RecordSize.sessionRecordMin, fieldTag(0x0a, 0x12)),
  senderKeyRecord: minLength('senderKeyRecord', RecordSize.senderKeyRecordMin, fieldTag(0x0a)),
  senderCertificate: minLength(
    'senderCertificate',
    RecordSize.senderCertificateMin,
    fieldTag(0x0a)
  ),
  serverCertificate: minLength(
    'serverCertificate',
    RecordSize.serverCertificateMin,
    fieldTag(0x0a)
  ),
  signalMessage: minLength('signalMessage', RecordSize.signalMessageMin, messageVersion),
  decryptionErrorMessage: minLength(
    'decryptionErrorMessage',
    RecordSize.decryptionErrorMessageMin,
    wireType
  ),
  senderKeyMessage: minLength('senderKeyMessage', RecordSize.senderKeyMessageMin, messageVersion),
  senderKeyDistributionMessage: minLength(
    'senderKeyDistributionMessage',
    RecordSize.senderKeyDistributionMessageMin,
    messageVersion
  ),
  preKeySignalMessage: minLength(
    'preKeySignalMessage',
    RecordSize.preKeySignalMessageMin,
    messageVersion
  ),
  unidentifiedSenderMessageContent: minLength(
    'unidentifiedSenderMessageContent',
    RecordSize.unidentifiedSenderMessageContentMin,
    fieldTag(0x08)
  ),
} satisfies Record<string, ValidationRule>;

export type SerializedType = keyof typeof validationRules;

/**
 * Run the rule for `type` without throwing.
 */
export function checkSerialized(type: SerializedType, data: Uint8Array): ValidationFailure | null {
  const rule: ValidationRule = validationRules[type];
  return rule(data);
}

/**
 * Run the rule for `type`.
 * @throws ValidationError naming the field and reason
 */
export function validateSerialized(type: SerializedType, data: Uint8Array): void {
  const failure = checkSerialized(type, data);
  if (failure) {
    throw new ValidationError(failure.field, failure.reason, failure.detail);
  }
}

export const validatePublicKey = (data: Uint8Array): void => validateSerialized('publicKey', data);
export const validatePrivateKey = (data: Uint8Array): void =>
  validateSerialized('privateKey', data);
export const validateIdentityKeyPair = (data: Uint8Array): void =>
  validateSerialized('identityKeyPair', data);
export const validateKyberPublicKey = (data: Uint8Array): void =>
  validateSerialized('kyberPublicKey', data);
export const validateKyberSecretKey = (data: Uint8Array): void =>
  validateSerialized('kyberSecretKey', data);
export const validatePreKeyRecord = (data: Uint8Array): void =>
  validateSerialized('preKeyRecord', data);
export const validateSignedPreKeyRecord = (data: Uint8Array): void =>
  validateSerialized('signedPreKeyRecord', data);
export const validateKyberPreKeyRecord = (data: Uint8Array): void =>
  validateSerialized('kyberPreKeyRecord', data);
export const validateSessionRecord = (data: Uint8Array): void =>
  validateSerialized('sessionRecord', data);
export const validateSenderKeyRecord = (data: Uint8Array): void =>
  validateSerialized('senderKeyRecord', data);
export const validateSenderCertificate = (data: Uint8Array): void =>
  validateSerialized('senderCertificate', data);
export const validateServerCertificate = (data: Uint8Array): void =>
  validateSerialized('serverCertificate', data);
export const validateSignalMessage = (data: Uint8Array): void =>
  validateSerialized('signalMessage', data);
export const validateDecryptionErrorMessage = (data: Uint8Array): void =>
  validateSerialized('decryptionErrorMessage', data);
export const validateSenderKeyMessage = (data: Uint8Array): void =>
  validateSerialized('senderKeyMessage', data);
export const validateSenderKeyDistributionMessage = (data: Uint8Array): void =>
  validateSerialized('senderKeyDistributionMessage', data);
export const validatePreKeySignalMessage = (data: Uint8Array): void =>
  validateSerialized('preKeySignalMessage', data);
export const validateUnidentifiedSenderMessageContent = (data: Uint8Array): void =>
  validateSerialized('unidentifiedSenderMessageContent', data);
