/**
 * In-process stand-in for the native engine.
 *
 * Implements the full SignalFfi table over a tracked heap: every object,
 * error and owned buffer it hands out is recorded, and every destroy or
 * free is checked. Double frees, use after free and reads of released
 * buffers are collected in `violations` instead of crashing.
 *
 * The wire formats are simplified protobuf layouts, not the engine's own;
 * the builders exported here produce input the fake accepts.
 */

import * as crypto from 'crypto';
import { x25519 } from '@noble/curves/ed25519';
import { NativeErrorCode } from '../../src/exceptions.js';
import type {
  BorrowedBuffer,
  ConstPointer,
  FfiError,
  FfiIdentityKeyStore,
  FfiSenderKeyStore,
  FfiSessionStore,
  MutPointer,
  NativeLibrary,
  NativeMemory,
  NativePointer,
  NativeTypeName,
  Out,
  OwnedBuffer,
  SignalFfi,
} from '../../src/ffi/types.js';
import { FfiDirection } from '../../src/ffi/types.js';
import { ProtoError, ProtoMessage, ProtoWriter } from './proto.js';

export class FakeFailure extends Error {
  constructor(
    readonly code: NativeErrorCode,
    message: string
  ) {
    super(message);
  }
}

// ============================================================
// Key helpers
// ============================================================

const SIGNATURE_LENGTH = 64;
const MAC_LENGTH = 8;
const KYBER_PUBLIC_LENGTH = 1569;
const KYBER_SECRET_LENGTH = 3169;

export function concat(...parts: Uint8Array[]): Uint8Array {
  const out = new Uint8Array(parts.reduce((sum, part) => sum + part.length, 0));
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}

export function randomPrivateKey(): Uint8Array {
  return new Uint8Array(crypto.randomBytes(32));
}

export function publicFromPrivate(privateKey: Uint8Array): Uint8Array {
  return x25519.getPublicKey(privateKey);
}

/** 33-byte serialized form of a raw 32-byte public key. */
export function serializePublicKey(raw: Uint8Array): Uint8Array {
  return concat(Uint8Array.of(0x05), raw);
}

/**
 * Stand-in signature: SHA-512 over the signer's public key and the message.
 * Verifiable by anyone holding the public key; only good for tests.
 */
export function fakeSign(privateKey: Uint8Array, message: Uint8Array): Uint8Array {
  return fakeSignature(publicFromPrivate(privateKey), message);
}

function fakeSignature(publicKey: Uint8Array, message: Uint8Array): Uint8Array {
  return new Uint8Array(crypto.createHash('sha512').update(publicKey).update(message).digest());
}

function fakeVerify(publicKey: Uint8Array, message: Uint8Array, signature: Uint8Array): boolean {
  return signature.length === SIGNATURE_LENGTH && Buffer.from(fakeSignature(publicKey, message)).equals(signature);
}

function parsePublicKey(data: Uint8Array, code = NativeErrorCode.InvalidKey): Uint8Array {
  if (data.length !== 33 || data[0] !== 0x05) {
    throw new FakeFailure(code, 'bad public key');
  }
  return data.slice(1);
}

// ============================================================
// Wire builders
// ============================================================

export interface SessionStateFields {
  localRegistrationId: number;
  remoteRegistrationId: number;
  /** Raw 32-byte ratchet public key */
  ratchetKey: Uint8Array;
  /** Sender chain usable until this time, in milliseconds */
  senderChainExpires: number;
  /** Secret both sides derive when the session starts */
  rootKey?: Uint8Array;
  sendCounter?: number;
  /** Lowest counter still accepted from the remote side */
  receiveCounter?: number;
  /** Raw 32-byte identity key of the remote side */
  remoteIdentity?: Uint8Array;
  /** Raw 32-byte base key of the pre-key exchange */
  baseKey?: Uint8Array;
  /** Set until the remote side answers; messages go out as pre-key messages */
  pending?: PendingPreKey;
}

export interface PendingPreKey {
  preKeyId: number | null;
  signedPreKeyId: number;
  kyberPreKeyId: number | null;
}

function encodeSessionState(state: SessionStateFields): Uint8Array {
  const writer = new ProtoWriter()
    .varint(1, state.localRegistrationId)
    .varint(2, state.remoteRegistrationId)
    .bytes(3, serializePublicKey(state.ratchetKey))
    .fixed64(4, state.senderChainExpires);
  if (state.rootKey) {
    writer.bytes(5, state.rootKey);
  }
  if (state.sendCounter !== undefined) {
    writer.varint(6, state.sendCounter);
  }
  if (state.receiveCounter !== undefined) {
    writer.varint(7, state.receiveCounter);
  }
  if (state.remoteIdentity) {
    writer.bytes(8, serializePublicKey(state.remoteIdentity));
  }
  if (state.baseKey) {
    writer.bytes(9, serializePublicKey(state.baseKey));
  }
  if (state.pending) {
    const pending = new ProtoWriter();
    if (state.pending.preKeyId !== null) {
      pending.varint(1, state.pending.preKeyId);
    }
    pending.varint(2, state.pending.signedPreKeyId);
    if (state.pending.kyberPreKeyId !== null) {
      pending.varint(3, state.pending.kyberPreKeyId);
    }
    writer.bytes(10, pending.finish());
  }
  return writer.finish();
}

function decodeSessionState(data: Uint8Array): SessionStateFields {
  const message = new ProtoMessage(data);
  const state: SessionStateFields = {
    localRegistrationId: message.number(1),
    remoteRegistrationId: message.number(2),
    ratchetKey: parsePublicKey(message.requireBytes(3), NativeErrorCode.InvalidMessage),
    senderChainExpires: message.number(4),
  };
  const rootKey = message.bytes(5);
  if (rootKey) {
    state.rootKey = rootKey;
  }
  if (message.has(6)) {
    state.sendCounter = message.number(6);
  }
  if (message.has(7)) {
    state.receiveCounter = message.number(7);
  }
  const remoteIdentity = message.bytes(8);
  if (remoteIdentity) {
    state.remoteIdentity = parsePublicKey(remoteIdentity, NativeErrorCode.InvalidMessage);
  }
  const baseKey = message.bytes(9);
  if (baseKey) {
    state.baseKey = parsePublicKey(baseKey, NativeErrorCode.InvalidMessage);
  }
  const pending = message.bytes(10);
  if (pending) {
    const fields = new ProtoMessage(pending);
    state.pending = {
      preKeyId: fields.has(1) ? fields.number(1) : null,
      signedPreKeyId: fields.number(2),
      kyberPreKeyId: fields.has(3) ? fields.number(3) : null,
    };
  }
  return state;
}

export function buildSessionRecord(
  current: SessionStateFields | null,
  previous: SessionStateFields[] = []
): Uint8Array {
  const writer = new ProtoWriter();
  if (current) {
    writer.bytes(1, encodeSessionState(current));
  }
  for (const state of previous) {
    writer.bytes(2, encodeSessionState(state));
  }
  return writer.finish();
}

export interface SignalMessageFields {
  version?: number;
  ratchetKey: Uint8Array;
  counter: number;
  previousCounter?: number;
  body: Uint8Array;
}

export function buildSignalMessage(fields: SignalMessageFields): Uint8Array {
  const version = fields.version ?? 3;
  const body = new ProtoWriter()
    .bytes(1, serializePublicKey(fields.ratchetKey))
    .varint(2, fields.counter)
    .varint(3, fields.previousCounter ?? 0)
    .bytes(4, fields.body)
    .finish();
  return concat(Uint8Array.of((version << 4) | 3), body, new Uint8Array(MAC_LENGTH));
}

export interface DecryptionErrorFields {
  ratchetKey?: Uint8Array;
  timestamp: number;
  deviceId: number;
}

export function buildDecryptionErrorMessage(fields: DecryptionErrorFields): Uint8Array {
  const writer = new ProtoWriter();
  if (fields.ratchetKey) {
    writer.bytes(1, serializePublicKey(fields.ratchetKey));
  }
  return writer.varint(2, fields.timestamp).varint(3, fields.deviceId).finish();
}

export interface SenderKeyMessageFields {
  distributionId: Uint8Array;
  chainId: number;
  iteration: number;
  ciphertext: Uint8Array;
  /** Private signing key */
  signingKey: Uint8Array;
}

export function buildSenderKeyMessage(fields: SenderKeyMessageFields): Uint8Array {
  const signed = concat(
    Uint8Array.of(0x33),
    new ProtoWriter()
      .bytes(1, fields.distributionId)
      .varint(2, fields.chainId)
      .varint(3, fields.iteration)
      .bytes(4, fields.ciphertext)
      .finish()
  );
  return concat(signed, fakeSign(fields.signingKey, signed));
}

export interface SenderKeyDistributionFields {
  distributionId: Uint8Array;
  chainId: number;
  iteration: number;
  chainKey: Uint8Array;
  /** Raw 32-byte public signing key */
  signingKey: Uint8Array;
}

export function buildSenderKeyDistributionMessage(fields: SenderKeyDistributionFields): Uint8Array {
  return concat(
    Uint8Array.of(0x33),
    new ProtoWriter()
      .bytes(1, fields.distributionId)
      .varint(2, fields.chainId)
      .varint(3, fields.iteration)
      .bytes(4, fields.chainKey)
      .bytes(5, serializePublicKey(fields.signingKey))
      .finish()
  );
}

export interface SenderKeyRecordFields extends Omit<SenderKeyDistributionFields, 'distributionId'> {
  /** Private signing key; only the sender's own record holds it */
  signingPrivateKey?: Uint8Array;
}

export function buildSenderKeyRecord(fields: SenderKeyRecordFields): Uint8Array {
  return encodeSenderKeyRecord([
    {
      chainId: fields.chainId,
      iteration: fields.iteration,
      chainKey: fields.chainKey,
      signingKey: fields.signingKey,
      signingPrivateKey: fields.signingPrivateKey ?? null,
    },
  ]);
}

interface SenderKeyState {
  chainId: number;
  /** Iteration of chainKey: the next message key to use or accept */
  iteration: number;
  chainKey: Uint8Array;
  signingKey: Uint8Array;
  signingPrivateKey: Uint8Array | null;
}

function encodeSenderKeyRecord(states: SenderKeyState[]): Uint8Array {
  const writer = new ProtoWriter();
  for (const state of states) {
    const fields = new ProtoWriter()
      .varint(1, state.chainId)
      .varint(2, state.iteration)
      .bytes(3, state.chainKey)
      .bytes(4, serializePublicKey(state.signingKey));
    if (state.signingPrivateKey) {
      fields.bytes(5, state.signingPrivateKey);
    }
    writer.bytes(1, fields.finish());
  }
  return writer.finish();
}

function decodeSenderKeyRecord(record: Uint8Array): SenderKeyState[] {
  return new ProtoMessage(record).repeated(1).map((data) => {
    const state = new ProtoMessage(data);
    return {
      chainId: state.number(1),
      iteration: state.number(2),
      chainKey: state.requireBytes(3, 32),
      signingKey: parsePublicKey(state.requireBytes(4), NativeErrorCode.InvalidMessage),
      signingPrivateKey: state.bytes(5),
    };
  });
}

export interface PreKeySignalMessageFields {
  registrationId: number;
  preKeyId: number | null;
  signedPreKeyId: number;
  kyberPreKeyId: number | null;
  /** Raw 32-byte keys */
  baseKey: Uint8Array;
  identityKey: Uint8Array;
  /** A serialized SignalMessage */
  message: Uint8Array;
}

export function buildPreKeySignalMessage(fields: PreKeySignalMessageFields): Uint8Array {
  const writer = new ProtoWriter().varint(1, fields.registrationId);
  if (fields.preKeyId !== null) {
    writer.varint(2, fields.preKeyId);
  }
  writer
    .varint(3, fields.signedPreKeyId)
    .bytes(4, serializePublicKey(fields.baseKey))
    .bytes(5, serializePublicKey(fields.identityKey))
    .bytes(6, fields.message);
  if (fields.kyberPreKeyId !== null) {
    writer.varint(7, fields.kyberPreKeyId);
  }
  return concat(Uint8Array.of(0x33), writer.finish());
}

// ============================================================
// Stand-in cryptography
// ============================================================

/** Unknown pre-key ids on the wire */
const NO_ID = 0xffffffff;
const SESSION_LIFETIME_MS = 30 * 24 * 60 * 60 * 1000;
const SEALED_VERSION = 1;
const GCM_TAG_LENGTH = 16;
const EMPTY = new Uint8Array(0);

function u32(value: number): Uint8Array {
  const out = new Uint8Array(4);
  new DataView(out.buffer).setUint32(0, value);
  return out;
}

function sha256(...parts: Uint8Array[]): Uint8Array {
  const hash = crypto.createHash('sha256');
  for (const part of parts) {
    hash.update(part);
  }
  return new Uint8Array(hash.digest());
}

function sha512(...parts: Uint8Array[]): Uint8Array {
  const hash = crypto.createHash('sha512');
  for (const part of parts) {
    hash.update(part);
  }
  return new Uint8Array(hash.digest());
}

function agree(privateKey: Uint8Array, publicKey: Uint8Array): Uint8Array {
  try {
    return x25519.getSharedSecret(privateKey, publicKey);
  } catch (error) {
    throw new FakeFailure(NativeErrorCode.InvalidKey, String(error));
  }
}

/** AES-256-GCM key and nonce from 44 bytes of material. */
function gcmSeal(material: Uint8Array, plaintext: Uint8Array): Uint8Array {
  const cipher = crypto.createCipheriv('aes-256-gcm', material.subarray(0, 32), material.subarray(32, 44));
  return concat(cipher.update(plaintext), cipher.final(), cipher.getAuthTag());
}

function gcmOpen(material: Uint8Array, sealed: Uint8Array, code: NativeErrorCode): Uint8Array {
  if (sealed.length < GCM_TAG_LENGTH) {
    throw new FakeFailure(code, 'ciphertext too short');
  }
  const decipher = crypto.createDecipheriv('aes-256-gcm', material.subarray(0, 32), material.subarray(32, 44));
  decipher.setAuthTag(sealed.subarray(sealed.length - GCM_TAG_LENGTH));
  try {
    return concat(decipher.update(sealed.subarray(0, sealed.length - GCM_TAG_LENGTH)), decipher.final());
  } catch {
    throw new FakeFailure(code, 'authentication failed');
  }
}

function messageKey(rootKey: Uint8Array, ratchetKey: Uint8Array, counter: number): Uint8Array {
  return sha512(rootKey, ratchetKey, u32(counter));
}

function nextChainKey(chainKey: Uint8Array): Uint8Array {
  return sha256(chainKey, Uint8Array.of(2));
}

function senderMessageKey(chainKey: Uint8Array): Uint8Array {
  return sha512(chainKey, Uint8Array.of(1));
}

/** Digits of one side of a fingerprint: six groups of five. */
function fingerprintDigits(hash: Uint8Array): string {
  let digits = '';
  for (let offset = 0; offset < 30; offset += 5) {
    let chunk = 0;
    for (let i = 0; i < 5; i++) {
      chunk = chunk * 256 + (hash[offset + i] ?? 0);
    }
    digits += String(chunk % 100000).padStart(5, '0');
  }
  return digits;
}

function fingerprintHash(iterations: number, identifier: Uint8Array, key: Uint8Array): Uint8Array {
  const serialized = serializePublicKey(key);
  let hash = concat(Uint8Array.of(0, 0), serialized, identifier);
  for (let i = 0; i < iterations; i++) {
    hash = sha512(hash, serialized);
  }
  return hash.slice(0, 32);
}

function encodeScannable(version: number, local: Uint8Array, remote: Uint8Array): Uint8Array {
  return new ProtoWriter()
    .varint(1, version)
    .bytes(2, new ProtoWriter().bytes(1, local).finish())
    .bytes(3, new ProtoWriter().bytes(1, remote).finish())
    .finish();
}

function decodeScannable(data: Uint8Array): { version: number; local: Uint8Array; remote: Uint8Array } {
  try {
    const message = new ProtoMessage(data);
    if (!message.has(1)) {
      throw new ProtoError('missing version');
    }
    return {
      version: message.number(1),
      local: new ProtoMessage(message.requireBytes(2)).requireBytes(1, 32),
      remote: new ProtoMessage(message.requireBytes(3)).requireBytes(1, 32),
    };
  } catch (error) {
    if (error instanceof ProtoError) {
      throw new FakeFailure(NativeErrorCode.FingerprintParsingError, error.message);
    }
    throw error;
  }
}

function checkVersion(data: Uint8Array, trailer: number): Uint8Array {
  const version = (data[0] ?? 0) >> 4;
  if (version < 2 || version > 4) {
    throw new FakeFailure(NativeErrorCode.UnrecognizedMessageVersion, `version ${version}`);
  }
  if (data.length < 1 + trailer) {
    throw new FakeFailure(NativeErrorCode.InvalidMessage, 'message too short');
  }
  return data.subarray(1, data.length - trailer);
}

// ============================================================
// Tracked heap
// ============================================================

interface PreKeyValue {
  id: number;
  publicKey: Uint8Array;
  privateKey: Uint8Array;
}

interface SignedPreKeyValue extends PreKeyValue {
  timestamp: number;
  signature: Uint8Array;
}

interface KyberPreKeyValue {
  id: number;
  timestamp: number;
  publicKey: Uint8Array;
  secretKey: Uint8Array;
  signature: Uint8Array;
}

interface BundleValue {
  registrationId: number;
  deviceId: number;
  preKeyId: number;
  preKey: Uint8Array | null;
  signedPreKeyId: number;
  signedPreKey: Uint8Array;
  signedPreKeySignature: Uint8Array;
  identityKey: Uint8Array;
  kyberPreKeyId: number;
  kyberPreKey: Uint8Array | null;
  kyberPreKeySignature: Uint8Array;
}

interface SignalMessageValue {
  serialized: Uint8Array;
  version: number;
  ratchetKey: Uint8Array;
  counter: number;
  body: Uint8Array;
}

interface DecryptionErrorValue {
  serialized: Uint8Array;
  ratchetKey: Uint8Array | null;
  timestamp: number;
  deviceId: number;
}

interface SenderKeyMessageValue {
  serialized: Uint8Array;
  signed: Uint8Array;
  signature: Uint8Array;
  distributionId: Uint8Array;
  chainId: number;
  iteration: number;
  ciphertext: Uint8Array;
}

interface DistributionValue {
  serialized: Uint8Array;
  distributionId: Uint8Array;
  chainId: number;
  iteration: number;
  chainKey: Uint8Array;
  signingKey: Uint8Array;
}

interface ServerCertificateValue {
  serialized: Uint8Array;
  certificate: Uint8Array;
  signature: Uint8Array;
  keyId: number;
  key: Uint8Array;
}

interface SenderCertificateValue {
  serialized: Uint8Array;
  certificate: Uint8Array;
  signature: Uint8Array;
  senderUuid: string;
  senderE164: string | null;
  deviceId: number;
  expiration: number;
  key: Uint8Array;
  signer: ServerCertificateValue;
}

interface FingerprintValue {
  version: number;
  local: Uint8Array;
  remote: Uint8Array;
  display: string;
}

interface CiphertextValue {
  type: number;
  serialized: Uint8Array;
}

interface PreKeySignalMessageValue {
  serialized: Uint8Array;
  version: number;
  registrationId: number;
  preKeyId: number | null;
  signedPreKeyId: number;
  kyberPreKeyId: number | null;
  baseKey: Uint8Array;
  identityKey: Uint8Array;
  message: SignalMessageValue;
}

interface ContentValue {
  msgType: number;
  sender: SenderCertificateValue;
  contents: Uint8Array;
  contentHint: number;
  groupId: Uint8Array;
}

function encodeContent(value: ContentValue): Uint8Array {
  const writer = new ProtoWriter()
    .varint(1, value.msgType)
    .bytes(2, value.sender.serialized)
    .bytes(3, value.contents)
    .varint(4, value.contentHint);
  if (value.groupId.length > 0) {
    writer.bytes(5, value.groupId);
  }
  return writer.finish();
}

interface FakeValues {
  PublicKey: Uint8Array;
  PrivateKey: Uint8Array;
  KyberPublicKey: Uint8Array;
  KyberSecretKey: Uint8Array;
  KyberKeyPair: { publicKey: Uint8Array; secretKey: Uint8Array };
  PreKeyRecord: PreKeyValue;
  SignedPreKeyRecord: SignedPreKeyValue;
  KyberPreKeyRecord: KyberPreKeyValue;
  PreKeyBundle: BundleValue;
  ProtocolAddress: { name: string; deviceId: number };
  SessionRecord: { current: SessionStateFields | null; previous: SessionStateFields[] };
  SignalMessage: SignalMessageValue;
  DecryptionErrorMessage: DecryptionErrorValue;
  SenderKeyRecord: Uint8Array;
  SenderKeyMessage: SenderKeyMessageValue;
  SenderKeyDistributionMessage: DistributionValue;
  ServerCertificate: ServerCertificateValue;
  SenderCertificate: SenderCertificateValue;
  Aes256GcmSiv: Uint8Array;
  Fingerprint: FingerprintValue;
  CiphertextMessage: CiphertextValue;
  PreKeySignalMessage: PreKeySignalMessageValue;
  UnidentifiedSenderMessageContent: ContentValue;
}

export class Heap<T extends NativeTypeName, V> {
  private readonly live = new Map<NativePointer<T>, V>();
  private readonly released = new WeakSet<NativePointer<T>>();
  allocated = 0;
  destroyed = 0;

  constructor(
    readonly name: T,
    private readonly violations: string[]
  ) {}

  get liveCount(): number {
    return this.live.size;
  }

  alloc(value: V): MutPointer<T> {
    const pointer: NativePointer<T> = {};
    this.live.set(pointer, value);
    this.allocated++;
    return { raw: pointer };
  }

  get(pointer: ConstPointer<T>): V {
    const value = this.getOptional(pointer);
    if (value === null) {
      throw new FakeFailure(NativeErrorCode.NullParameter, `null ${this.name}`);
    }
    return value;
  }

  getOptional(pointer: ConstPointer<T>): V | null {
    const raw = pointer.raw;
    if (raw === null) {
      return null;
    }
    const value = this.live.get(raw);
    if (value === undefined) {
      this.violations.push(`${this.released.has(raw) ? 'use after free' : 'unknown pointer'}: ${this.name}`);
      throw new FakeFailure(NativeErrorCode.InternalError, `invalid ${this.name} pointer`);
    }
    return value;
  }

  free(pointer: MutPointer<T>): void {
    const raw = pointer.raw;
    if (raw === null) {
      return;
    }
    if (this.live.delete(raw)) {
      this.released.add(raw);
      this.destroyed++;
      return;
    }
    this.violations.push(`${this.released.has(raw) ? 'double free' : 'free of unknown pointer'}: ${this.name}`);
  }
}

type Heaps = { readonly [K in NativeTypeName]: Heap<K, FakeValues[K]> };

interface ErrorEntry {
  code: NativeErrorCode;
  message: string;
}

// ============================================================
// Fake library
// ============================================================

export class FakeSignalLibrary implements NativeLibrary {
  readonly violations: string[] = [];
  /** Buffers passed for secret parameters, by reference. */
  readonly secretInputs: Uint8Array[] = [];
  readonly heaps: Heaps;
  readonly symbols: SignalFfi;
  closed = false;
  errorsCreated = 0;

  private readonly errors = new Map<FfiError, ErrorEntry>();
  private readonly freedErrors = new WeakSet<FfiError>();
  private readonly buffers = new Map<NativeMemory, Uint8Array>();
  private readonly freedBuffers = new WeakSet<NativeMemory>();
  private readonly injected = new Map<keyof SignalFfi, ErrorEntry>();
  private readonly calls = new Map<keyof SignalFfi, number>();

  constructor() {
    const heap = <K extends NativeTypeName>(name: K): Heap<K, FakeValues[K]> =>
      new Heap<K, FakeValues[K]>(name, this.violations);
    this.heaps = {
      PublicKey: heap('PublicKey'),
      PrivateKey: heap('PrivateKey'),
      KyberPublicKey: heap('KyberPublicKey'),
      KyberSecretKey: heap('KyberSecretKey'),
      KyberKeyPair: heap('KyberKeyPair'),
      PreKeyRecord: heap('PreKeyRecord'),
      SignedPreKeyRecord: heap('SignedPreKeyRecord'),
      KyberPreKeyRecord: heap('KyberPreKeyRecord'),
      PreKeyBundle: heap('PreKeyBundle'),
      ProtocolAddress: heap('ProtocolAddress'),
      SessionRecord: heap('SessionRecord'),
      SignalMessage: heap('SignalMessage'),
      DecryptionErrorMessage: heap('DecryptionErrorMessage'),
      SenderKeyRecord: heap('SenderKeyRecord'),
      SenderKeyMessage: heap('SenderKeyMessage'),
      SenderKeyDistributionMessage: heap('SenderKeyDistributionMessage'),
      ServerCertificate: heap('ServerCertificate'),
      SenderCertificate: heap('SenderCertificate'),
      Aes256GcmSiv: heap('Aes256GcmSiv'),
      Fingerprint: heap('Fingerprint'),
      CiphertextMessage: heap('CiphertextMessage'),
      PreKeySignalMessage: heap('PreKeySignalMessage'),
      UnidentifiedSenderMessageContent: heap('UnidentifiedSenderMessageContent'),
    };
    this.symbols = this.buildSymbols();
  }

  // ------------------------------------------------------------
  // Inspection
  // ------------------------------------------------------------

  /** Native objects not yet destroyed. */
  liveObjects(): number {
    return Object.values(this.heaps).reduce((sum, heap) => sum + heap.liveCount, 0);
  }

  destroyCount(type: NativeTypeName): number {
    return this.heaps[type].destroyed;
  }

  /** Owned buffers handed out and not yet freed. */
  outstandingBuffers(): number {
    return this.buffers.size;
  }

  /** Error objects handed out and not yet freed. */
  outstandingErrors(): number {
    return this.errors.size;
  }

  /**
   * Calls made to `symbol`, or to every symbol when omitted. Store
   * callbacks are not counted.
   */
  callCount(symbol?: keyof SignalFfi): number {
    if (symbol !== undefined) {
      return this.calls.get(symbol) ?? 0;
    }
    let total = 0;
    for (const count of this.calls.values()) {
      total += count;
    }
    return total;
  }

  /**
   * Make the next call of `symbol` fail with `code`.
   */
  failNext(symbol: keyof SignalFfi, code: NativeErrorCode, message = 'injected failure'): void {
    this.injected.set(symbol, { code, message });
  }

  // ------------------------------------------------------------
  // NativeLibrary
  // ------------------------------------------------------------

  copyBuffer(base: NativeMemory, length: number): Uint8Array {
    const bytes = this.buffers.get(base);
    if (bytes === undefined) {
      this.violations.push(this.freedBuffers.has(base) ? 'read of freed buffer' : 'read of unknown buffer');
      return new Uint8Array(0);
    }
    if (bytes.length !== length) {
      this.violations.push(`buffer length mismatch: ${length} != ${bytes.length}`);
    }
    return Uint8Array.from(bytes);
  }

  close(): void {
    this.closed = true;
  }

  // ------------------------------------------------------------
  // Plumbing
  // ------------------------------------------------------------

  private error(code: NativeErrorCode, message: string): FfiError {
    const error: FfiError = {};
    this.errors.set(error, { code, message });
    this.errorsCreated++;
    return error;
  }

  private count(symbol: keyof SignalFfi): void {
    this.calls.set(symbol, (this.calls.get(symbol) ?? 0) + 1);
  }

  private run(symbol: keyof SignalFfi, body: () => void): FfiError | null {
    this.count(symbol);
    if (this.closed) {
      this.violations.push(`call after close: ${symbol}`);
    }
    const injected = this.injected.get(symbol);
    if (injected) {
      this.injected.delete(symbol);
      return this.error(injected.code, injected.message);
    }
    try {
      body();
      return null;
    } catch (error) {
      if (error instanceof FakeFailure) {
        return this.error(error.code, error.message);
      }
      if (error instanceof ProtoError) {
        return this.error(NativeErrorCode.ProtobufError, error.message);
      }
      throw error;
    }
  }

  private input(buffer: BorrowedBuffer, secret = false): Uint8Array {
    if (buffer.base === null) {
      if (buffer.length !== 0) {
        throw new FakeFailure(NativeErrorCode.NullParameter, 'null buffer with non-zero length');
      }
      return new Uint8Array(0);
    }
    if (secret) {
      this.secretInputs.push(buffer.base);
    }
    return Uint8Array.from(buffer.base.subarray(0, buffer.length));
  }

  private owned(out: Out<OwnedBuffer>, bytes: Uint8Array): void {
    const base: NativeMemory = {};
    this.buffers.set(base, Uint8Array.from(bytes));
    out[0] = { base, length: bytes.length };
  }

  private destroyer<K extends NativeTypeName>(
    symbol: keyof SignalFfi,
    heap: Heap<K, FakeValues[K]>
  ): (pointer: MutPointer<K>) => FfiError | null {
    return (pointer) => this.run(symbol, () => heap.free(pointer));
  }

  private cloner<K extends NativeTypeName>(
    symbol: keyof SignalFfi,
    heap: Heap<K, FakeValues[K]>
  ): (out: Out<MutPointer<K>>, pointer: ConstPointer<K>) => FfiError | null {
    return (out, pointer) =>
      this.run(symbol, () => {
        out[0] = heap.alloc(structuredClone(heap.get(pointer)));
      });
  }

  private parseServerCertificate(data: Uint8Array): ServerCertificateValue {
    const outer = new ProtoMessage(data);
    const certificate = outer.requireBytes(1);
    const signature = outer.requireBytes(2);
    const inner = new ProtoMessage(certificate);
    return {
      serialized: Uint8Array.from(data),
      certificate,
      signature,
      keyId: inner.number(1),
      key: parsePublicKey(inner.requireBytes(2), NativeErrorCode.InvalidMessage),
    };
  }

  private parseSenderCertificate(data: Uint8Array): SenderCertificateValue {
    const outer = new ProtoMessage(data);
    const certificate = outer.requireBytes(1);
    const signature = outer.requireBytes(2);
    const inner = new ProtoMessage(certificate);
    const senderUuid = inner.string(1);
    if (senderUuid === null) {
      throw new FakeFailure(NativeErrorCode.InvalidMessage, 'missing sender uuid');
    }
    return {
      serialized: Uint8Array.from(data),
      certificate,
      signature,
      senderUuid,
      senderE164: inner.string(2),
      deviceId: inner.number(3),
      expiration: inner.number(4),
      key: parsePublicKey(inner.requireBytes(5), NativeErrorCode.InvalidMessage),
      signer: this.parseServerCertificate(inner.requireBytes(6)),
    };
  }

  private parseSignalMessage(bytes: Uint8Array): SignalMessageValue {
    const message = new ProtoMessage(checkVersion(bytes, MAC_LENGTH));
    return {
      serialized: Uint8Array.from(bytes),
      version: (bytes[0] ?? 0) >> 4,
      ratchetKey: parsePublicKey(message.requireBytes(1), NativeErrorCode.InvalidMessage),
      counter: message.number(2),
      body: message.requireBytes(4),
    };
  }

  private parsePreKeySignalMessage(bytes: Uint8Array): PreKeySignalMessageValue {
    const message = new ProtoMessage(checkVersion(bytes, 0));
    return {
      serialized: Uint8Array.from(bytes),
      version: (bytes[0] ?? 0) >> 4,
      registrationId: message.number(1),
      preKeyId: message.has(2) ? message.number(2) : null,
      signedPreKeyId: message.number(3),
      baseKey: parsePublicKey(message.requireBytes(4), NativeErrorCode.InvalidMessage),
      identityKey: parsePublicKey(message.requireBytes(5), NativeErrorCode.InvalidMessage),
      message: this.parseSignalMessage(message.requireBytes(6)),
      kyberPreKeyId: message.has(7) ? message.number(7) : null,
    };
  }

  private parseSenderKeyMessage(bytes: Uint8Array): SenderKeyMessageValue {
    const message = new ProtoMessage(checkVersion(bytes, SIGNATURE_LENGTH));
    return {
      serialized: bytes,
      signed: bytes.slice(0, bytes.length - SIGNATURE_LENGTH),
      signature: bytes.slice(bytes.length - SIGNATURE_LENGTH),
      distributionId: message.requireBytes(1, 16),
      chainId: message.number(2),
      iteration: message.number(3),
      ciphertext: message.requireBytes(4),
    };
  }

  private parseContent(data: Uint8Array): ContentValue {
    const message = new ProtoMessage(data);
    return {
      msgType: message.number(1),
      sender: this.parseSenderCertificate(message.requireBytes(2)),
      contents: message.requireBytes(3),
      contentHint: message.number(4),
      groupId: message.bytes(5) ?? EMPTY,
    };
  }

  // ------------------------------------------------------------
  // Store callbacks
  // ------------------------------------------------------------

  private status(callback: string, status: number): number {
    if (status < 0) {
      throw new FakeFailure(NativeErrorCode.CallbackError, `${callback} failed`);
    }
    return status;
  }

  /**
   * Call a load callback and take the object it hands over: the value is
   * copied out and the engine's copy destroyed.
   */
  private load<K extends NativeTypeName>(
    callback: string,
    heap: Heap<K, FakeValues[K]>,
    fn: (out: Out<MutPointer<K>>) => number
  ): FakeValues[K] | null {
    const out: Out<MutPointer<K>> = [null];
    this.status(callback, fn(out));
    const pointer = out[0];
    if (pointer === null || pointer.raw === null) {
      return null;
    }
    const value = structuredClone(heap.get(pointer));
    heap.free(pointer);
    return value;
  }

  /**
   * Lend `value` to a store callback for the duration of the call.
   */
  private lend<K extends NativeTypeName>(
    callback: string,
    heap: Heap<K, FakeValues[K]>,
    value: FakeValues[K],
    fn: (pointer: ConstPointer<K>) => number
  ): number {
    const pointer = heap.alloc(value);
    try {
      return this.status(callback, fn(pointer));
    } finally {
      heap.free(pointer);
    }
  }

  private identityPrivateKey(store: FfiIdentityKeyStore): Uint8Array {
    const key = this.load('getIdentityKeyPair', this.heaps.PrivateKey, (out) => store.getIdentityKeyPair(out));
    if (key === null) {
      throw new FakeFailure(NativeErrorCode.InvalidState, 'no identity key pair');
    }
    return key;
  }

  private localRegistrationId(store: FfiIdentityKeyStore): number {
    const out: Out<number> = [null];
    this.status('getLocalRegistrationId', store.getLocalRegistrationId(out));
    return out[0] ?? 0;
  }

  private requireTrusted(
    store: FfiIdentityKeyStore,
    address: ConstPointer<'ProtocolAddress'>,
    key: Uint8Array,
    direction: number
  ): void {
    const trusted = this.lend('isTrustedIdentity', this.heaps.PublicKey, Uint8Array.from(key), (pointer) =>
      store.isTrustedIdentity(address, pointer, direction)
    );
    if (trusted === 0) {
      throw new FakeFailure(NativeErrorCode.UntrustedIdentity, 'untrusted identity');
    }
  }

  private loadSessionRecord(
    store: FfiSessionStore,
    address: ConstPointer<'ProtocolAddress'>
  ): FakeValues['SessionRecord'] | null {
    return this.load('loadSession', this.heaps.SessionRecord, (out) => store.loadSession(out, address));
  }

  private storeSessionRecord(
    store: FfiSessionStore,
    address: ConstPointer<'ProtocolAddress'>,
    record: FakeValues['SessionRecord']
  ): void {
    this.lend('storeSession', this.heaps.SessionRecord, record, (pointer) => store.storeSession(address, pointer));
  }

  private loadSenderKeyStates(
    store: FfiSenderKeyStore,
    sender: ConstPointer<'ProtocolAddress'>,
    distributionId: Uint8Array
  ): SenderKeyState[] {
    const record = this.load('loadSenderKey', this.heaps.SenderKeyRecord, (out) =>
      store.loadSenderKey(out, sender, distributionId)
    );
    return record === null ? [] : decodeSenderKeyRecord(record);
  }

  private storeSenderKeyStates(
    store: FfiSenderKeyStore,
    sender: ConstPointer<'ProtocolAddress'>,
    distributionId: Uint8Array,
    states: SenderKeyState[]
  ): void {
    this.lend('storeSenderKey', this.heaps.SenderKeyRecord, encodeSenderKeyRecord(states), (pointer) =>
      store.storeSenderKey(sender, distributionId, pointer)
    );
  }

  // ------------------------------------------------------------
  // Protocol
  // ------------------------------------------------------------

  private encryptWithState(state: SessionStateFields, plaintext: Uint8Array): SignalMessageValue {
    if (state.rootKey === undefined) {
      throw new FakeFailure(NativeErrorCode.InvalidSession, 'session has no root key');
    }
    const counter = state.sendCounter ?? 0;
    const body = gcmSeal(messageKey(state.rootKey, state.ratchetKey, counter), plaintext);
    state.sendCounter = counter + 1;
    return this.parseSignalMessage(buildSignalMessage({ ratchetKey: state.ratchetKey, counter, body }));
  }

  private decryptWithState(state: SessionStateFields, message: SignalMessageValue): Uint8Array {
    if (state.rootKey === undefined) {
      throw new FakeFailure(NativeErrorCode.InvalidSession, 'session has no root key');
    }
    if (message.counter < (state.receiveCounter ?? 0)) {
      throw new FakeFailure(NativeErrorCode.DuplicatedMessage, `message ${message.counter} already received`);
    }
    const plaintext = gcmOpen(
      messageKey(state.rootKey, message.ratchetKey, message.counter),
      message.body,
      NativeErrorCode.InvalidMessage
    );
    state.receiveCounter = message.counter + 1;
    delete state.pending;
    return plaintext;
  }

  // ------------------------------------------------------------
  // Symbols
  // ------------------------------------------------------------

  private buildSymbols(): SignalFfi {
    const h = this.heaps;

    return {
      // Errors and buffers
      signal_error_get_type: (error) => {
        this.count('signal_error_get_type');
        const entry = this.errors.get(error);
        if (entry === undefined) {
          this.violations.push(this.freedErrors.has(error) ? 'read of freed error' : 'read of unknown error');
          return NativeErrorCode.UnknownError;
        }
        return entry.code;
      },
      signal_error_get_message: (out, error) =>
        this.run('signal_error_get_message', () => {
          const entry = this.errors.get(error);
          if (entry === undefined) {
            this.violations.push('read of freed error');
            throw new FakeFailure(NativeErrorCode.InternalError, 'invalid error pointer');
          }
          out[0] = entry.message;
        }),
      signal_error_free: (error) => {
        this.count('signal_error_free');
        if (!this.errors.delete(error)) {
          this.violations.push(this.freedErrors.has(error) ? 'double free: error' : 'free of unknown error');
          return;
        }
        this.freedErrors.add(error);
      },
      signal_free_buffer: (base, length) => {
        this.count('signal_free_buffer');
        const bytes = this.buffers.get(base);
        if (bytes === undefined) {
          this.violations.push(this.freedBuffers.has(base) ? 'double free: buffer' : 'free of unknown buffer');
          return;
        }
        if (bytes.length !== length) {
          this.violations.push(`buffer freed with wrong length: ${length} != ${bytes.length}`);
        }
        this.buffers.delete(base);
        this.freedBuffers.add(base);
      },

      // PublicKey
      signal_publickey_deserialize: (out, data) =>
        this.run('signal_publickey_deserialize', () => {
          out[0] = h.PublicKey.alloc(parsePublicKey(this.input(data)));
        }),
      signal_publickey_serialize: (out, key) =>
        this.run('signal_publickey_serialize', () => this.owned(out, serializePublicKey(h.PublicKey.get(key)))),
      signal_publickey_get_public_key_bytes: (out, key) =>
        this.run('signal_publickey_get_public_key_bytes', () => this.owned(out, h.PublicKey.get(key))),
      signal_publickey_equals: (out, lhs, rhs) =>
        this.run('signal_publickey_equals', () => {
          out[0] = Buffer.from(h.PublicKey.get(lhs)).equals(h.PublicKey.get(rhs));
        }),
      signal_publickey_compare: (out, lhs, rhs) =>
        this.run('signal_publickey_compare', () => {
          out[0] = Buffer.compare(h.PublicKey.get(lhs), h.PublicKey.get(rhs));
        }),
      signal_publickey_verify: (out, key, message, signature) =>
        this.run('signal_publickey_verify', () => {
          out[0] = fakeVerify(h.PublicKey.get(key), this.input(message), this.input(signature));
        }),
      signal_publickey_clone: this.cloner('signal_publickey_clone', h.PublicKey),
      signal_publickey_destroy: this.destroyer('signal_publickey_destroy', h.PublicKey),

      // PrivateKey
      signal_privatekey_generate: (out) =>
        this.run('signal_privatekey_generate', () => {
          out[0] = h.PrivateKey.alloc(randomPrivateKey());
        }),
      signal_privatekey_deserialize: (out, data) =>
        this.run('signal_privatekey_deserialize', () => {
          const bytes = this.input(data, true);
          if (bytes.length !== 32) {
            throw new FakeFailure(NativeErrorCode.InvalidKey, 'bad private key');
          }
          out[0] = h.PrivateKey.alloc(bytes);
        }),
      signal_privatekey_serialize: (out, key) =>
        this.run('signal_privatekey_serialize', () => this.owned(out, h.PrivateKey.get(key))),
      signal_privatekey_get_public_key: (out, key) =>
        this.run('signal_privatekey_get_public_key', () => {
          out[0] = h.PublicKey.alloc(publicFromPrivate(h.PrivateKey.get(key)));
        }),
      signal_privatekey_sign: (out, key, message) =>
        this.run('signal_privatekey_sign', () =>
          this.owned(out, fakeSign(h.PrivateKey.get(key), this.input(message)))
        ),
      signal_privatekey_agree: (out, privateKey, publicKey) =>
        this.run('signal_privatekey_agree', () => {
          let shared: Uint8Array;
          try {
            shared = x25519.getSharedSecret(h.PrivateKey.get(privateKey), h.PublicKey.get(publicKey));
          } catch (error) {
            if (error instanceof FakeFailure) {
              throw error;
            }
            throw new FakeFailure(NativeErrorCode.InvalidKey, String(error));
          }
          this.owned(out, shared);
        }),
      signal_privatekey_clone: this.cloner('signal_privatekey_clone', h.PrivateKey),
      signal_privatekey_destroy: this.destroyer('signal_privatekey_destroy', h.PrivateKey),

      // IdentityKeyPair
      signal_identitykeypair_serialize: (out, publicKey, privateKey) =>
        this.run('signal_identitykeypair_serialize', () =>
          this.owned(
            out,
            concat(
              Uint8Array.of(0x0a, 0x21),
              serializePublicKey(h.PublicKey.get(publicKey)),
              Uint8Array.of(0x12, 0x20),
              h.PrivateKey.get(privateKey)
            )
          )
        ),
      signal_identitykeypair_sign_alternate_identity: (out, _publicKey, privateKey, other) =>
        this.run('signal_identitykeypair_sign_alternate_identity', () =>
          this.owned(out, fakeSign(h.PrivateKey.get(privateKey), serializePublicKey(h.PublicKey.get(other))))
        ),

      // Kyber
      signal_kyber_key_pair_generate: (out) =>
        this.run('signal_kyber_key_pair_generate', () => {
          out[0] = h.KyberKeyPair.alloc({
            publicKey: concat(Uint8Array.of(0x08), crypto.randomBytes(KYBER_PUBLIC_LENGTH - 1)),
            secretKey: new Uint8Array(crypto.randomBytes(KYBER_SECRET_LENGTH)),
          });
        }),
      signal_kyber_key_pair_get_public_key: (out, pair) =>
        this.run('signal_kyber_key_pair_get_public_key', () => {
          out[0] = h.KyberPublicKey.alloc(Uint8Array.from(h.KyberKeyPair.get(pair).publicKey));
        }),
      signal_kyber_key_pair_get_secret_key: (out, pair) =>
        this.run('signal_kyber_key_pair_get_secret_key', () => {
          out[0] = h.KyberSecretKey.alloc(Uint8Array.from(h.KyberKeyPair.get(pair).secretKey));
        }),
      signal_kyber_key_pair_clone: this.cloner('signal_kyber_key_pair_clone', h.KyberKeyPair),
      signal_kyber_key_pair_destroy: this.destroyer('signal_kyber_key_pair_destroy', h.KyberKeyPair),
      signal_kyber_public_key_deserialize: (out, data) =>
        this.run('signal_kyber_public_key_deserialize', () => {
          const bytes = this.input(data);
          if (bytes.length !== KYBER_PUBLIC_LENGTH || bytes[0] !== 0x08) {
            throw new FakeFailure(NativeErrorCode.InvalidKey, 'bad kyber public key');
          }
          out[0] = h.KyberPublicKey.alloc(bytes);
        }),
      signal_kyber_public_key_serialize: (out, key) =>
        this.run('signal_kyber_public_key_serialize', () => this.owned(out, h.KyberPublicKey.get(key))),
      signal_kyber_public_key_equals: (out, lhs, rhs) =>
        this.run('signal_kyber_public_key_equals', () => {
          out[0] = Buffer.from(h.KyberPublicKey.get(lhs)).equals(h.KyberPublicKey.get(rhs));
        }),
      signal_kyber_public_key_clone: this.cloner('signal_kyber_public_key_clone', h.KyberPublicKey),
      signal_kyber_public_key_destroy: this.destroyer('signal_kyber_public_key_destroy', h.KyberPublicKey),
      signal_kyber_secret_key_deserialize: (out, data) =>
        this.run('signal_kyber_secret_key_deserialize', () => {
          const bytes = this.input(data, true);
          if (bytes.length !== KYBER_SECRET_LENGTH) {
            throw new FakeFailure(NativeErrorCode.InvalidKey, 'bad kyber secret key');
          }
          out[0] = h.KyberSecretKey.alloc(bytes);
        }),
      signal_kyber_secret_key_serialize: (out, key) =>
        this.run('signal_kyber_secret_key_serialize', () => this.owned(out, h.KyberSecretKey.get(key))),
      signal_kyber_secret_key_clone: this.cloner('signal_kyber_secret_key_clone', h.KyberSecretKey),
      signal_kyber_secret_key_destroy: this.destroyer('signal_kyber_secret_key_destroy', h.KyberSecretKey),

      // PreKeyRecord
      signal_pre_key_record_new: (out, id, publicKey, privateKey) =>
        this.run('signal_pre_key_record_new', () => {
          out[0] = h.PreKeyRecord.alloc({
            id,
            publicKey: Uint8Array.from(h.PublicKey.get(publicKey)),
            privateKey: Uint8Array.from(h.PrivateKey.get(privateKey)),
          });
        }),
      signal_pre_key_record_deserialize: (out, data) =>
        this.run('signal_pre_key_record_deserialize', () => {
          const message = new ProtoMessage(this.input(data, true));
          out[0] = h.PreKeyRecord.alloc({
            id: message.number(1),
            publicKey: parsePublicKey(message.requireBytes(2)),
            privateKey: message.requireBytes(3, 32),
          });
        }),
      signal_pre_key_record_serialize: (out, record) =>
        this.run('signal_pre_key_record_serialize', () => {
          const value = h.PreKeyRecord.get(record);
          this.owned(
            out,
            new ProtoWriter()
              .varint(1, value.id)
              .bytes(2, serializePublicKey(value.publicKey))
              .bytes(3, value.privateKey)
              .finish()
          );
        }),
      signal_pre_key_record_get_id: (out, record) =>
        this.run('signal_pre_key_record_get_id', () => {
          out[0] = h.PreKeyRecord.get(record).id;
        }),
      signal_pre_key_record_get_public_key: (out, record) =>
        this.run('signal_pre_key_record_get_public_key', () => {
          out[0] = h.PublicKey.alloc(Uint8Array.from(h.PreKeyRecord.get(record).publicKey));
        }),
      signal_pre_key_record_get_private_key: (out, record) =>
        this.run('signal_pre_key_record_get_private_key', () => {
          out[0] = h.PrivateKey.alloc(Uint8Array.from(h.PreKeyRecord.get(record).privateKey));
        }),
      signal_pre_key_record_clone: this.cloner('signal_pre_key_record_clone', h.PreKeyRecord),
      signal_pre_key_record_destroy: this.destroyer('signal_pre_key_record_destroy', h.PreKeyRecord),

      // SignedPreKeyRecord
      signal_signed_pre_key_record_new: (out, id, timestamp, publicKey, privateKey, signature) =>
        this.run('signal_signed_pre_key_record_new', () => {
          out[0] = h.SignedPreKeyRecord.alloc({
            id,
            timestamp,
            publicKey: Uint8Array.from(h.PublicKey.get(publicKey)),
            privateKey: Uint8Array.from(h.PrivateKey.get(privateKey)),
            signature: this.input(signature),
          });
        }),
      signal_signed_pre_key_record_deserialize: (out, data) =>
        this.run('signal_signed_pre_key_record_deserialize', () => {
          const message = new ProtoMessage(this.input(data, true));
          out[0] = h.SignedPreKeyRecord.alloc({
            id: message.number(1),
            publicKey: parsePublicKey(message.requireBytes(2)),
            privateKey: message.requireBytes(3, 32),
            signature: message.requireBytes(4),
            timestamp: message.number(5),
          });
        }),
      signal_signed_pre_key_record_serialize: (out, record) =>
        this.run('signal_signed_pre_key_record_serialize', () => {
          const value = h.SignedPreKeyRecord.get(record);
          this.owned(
            out,
            new ProtoWriter()
              .varint(1, value.id)
              .bytes(2, serializePublicKey(value.publicKey))
              .bytes(3, value.privateKey)
              .bytes(4, value.signature)
              .fixed64(5, value.timestamp)
              .finish()
          );
        }),
      signal_signed_pre_key_record_get_id: (out, record) =>
        this.run('signal_signed_pre_key_record_get_id', () => {
          out[0] = h.SignedPreKeyRecord.get(record).id;
        }),
      signal_signed_pre_key_record_get_timestamp: (out, record) =>
        this.run('signal_signed_pre_key_record_get_timestamp', () => {
          out[0] = BigInt(h.SignedPreKeyRecord.get(record).timestamp);
        }),
      signal_signed_pre_key_record_get_signature: (out, record) =>
        this.run('signal_signed_pre_key_record_get_signature', () =>
          this.owned(out, h.SignedPreKeyRecord.get(record).signature)
        ),
      signal_signed_pre_key_record_get_public_key: (out, record) =>
        this.run('signal_signed_pre_key_record_get_public_key', () => {
          out[0] = h.PublicKey.alloc(Uint8Array.from(h.SignedPreKeyRecord.get(record).publicKey));
        }),
      signal_signed_pre_key_record_get_private_key: (out, record) =>
        this.run('signal_signed_pre_key_record_get_private_key', () => {
          out[0] = h.PrivateKey.alloc(Uint8Array.from(h.SignedPreKeyRecord.get(record).privateKey));
        }),
      signal_signed_pre_key_record_clone: this.cloner('signal_signed_pre_key_record_clone', h.SignedPreKeyRecord),
      signal_signed_pre_key_record_destroy: this.destroyer(
        'signal_signed_pre_key_record_destroy',
        h.SignedPreKeyRecord
      ),

      // KyberPreKeyRecord
      signal_kyber_pre_key_record_new: (out, id, timestamp, keyPair, signature) =>
        this.run('signal_kyber_pre_key_record_new', () => {
          const pair = h.KyberKeyPair.get(keyPair);
          out[0] = h.KyberPreKeyRecord.alloc({
            id,
            timestamp,
            publicKey: Uint8Array.from(pair.publicKey),
            secretKey: Uint8Array.from(pair.secretKey),
            signature: this.input(signature),
          });
        }),
      signal_kyber_pre_key_record_deserialize: (out, data) =>
        this.run('signal_kyber_pre_key_record_deserialize', () => {
          const message = new ProtoMessage(this.input(data, true));
          out[0] = h.KyberPreKeyRecord.alloc({
            id: message.number(1),
            publicKey: message.requireBytes(2, KYBER_PUBLIC_LENGTH),
            secretKey: message.requireBytes(3, KYBER_SECRET_LENGTH),
            signature: message.requireBytes(4),
            timestamp: message.number(5),
          });
        }),
      signal_kyber_pre_key_record_serialize: (out, record) =>
        this.run('signal_kyber_pre_key_record_serialize', () => {
          const value = h.KyberPreKeyRecord.get(record);
          this.owned(
            out,
            new ProtoWriter()
              .varint(1, value.id)
              .bytes(2, value.publicKey)
              .bytes(3, value.secretKey)
              .bytes(4, value.signature)
              .fixed64(5, value.timestamp)
              .finish()
          );
        }),
      signal_kyber_pre_key_record_get_id: (out, record) =>
        this.run('signal_kyber_pre_key_record_get_id', () => {
          out[0] = h.KyberPreKeyRecord.get(record).id;
        }),
      signal_kyber_pre_key_record_get_timestamp: (out, record) =>
        this.run('signal_kyber_pre_key_record_get_timestamp', () => {
          out[0] = BigInt(h.KyberPreKeyRecord.get(record).timestamp);
        }),
      signal_kyber_pre_key_record_get_signature: (out, record) =>
        this.run('signal_kyber_pre_key_record_get_signature', () =>
          this.owned(out, h.KyberPreKeyRecord.get(record).signature)
        ),
      signal_kyber_pre_key_record_get_public_key: (out, record) =>
        this.run('signal_kyber_pre_key_record_get_public_key', () => {
          out[0] = h.KyberPublicKey.alloc(Uint8Array.from(h.KyberPreKeyRecord.get(record).publicKey));
        }),
      signal_kyber_pre_key_record_get_secret_key: (out, record) =>
        this.run('signal_kyber_pre_key_record_get_secret_key', () => {
          out[0] = h.KyberSecretKey.alloc(Uint8Array.from(h.KyberPreKeyRecord.get(record).secretKey));
        }),
      signal_kyber_pre_key_record_get_key_pair: (out, record) =>
        this.run('signal_kyber_pre_key_record_get_key_pair', () => {
          const value = h.KyberPreKeyRecord.get(record);
          out[0] = h.KyberKeyPair.alloc({
            publicKey: Uint8Array.from(value.publicKey),
            secretKey: Uint8Array.from(value.secretKey),
          });
        }),
      signal_kyber_pre_key_record_clone: this.cloner('signal_kyber_pre_key_record_clone', h.KyberPreKeyRecord),
      signal_kyber_pre_key_record_destroy: this.destroyer(
        'signal_kyber_pre_key_record_destroy',
        h.KyberPreKeyRecord
      ),

      // PreKeyBundle
      signal_pre_key_bundle_new: (
        out,
        registrationId,
        deviceId,
        preKeyId,
        preKey,
        signedPreKeyId,
        signedPreKey,
        signedPreKeySignature,
        identityKey,
        kyberPreKeyId,
        kyberPreKey,
        kyberPreKeySignature
      ) =>
        this.run('signal_pre_key_bundle_new', () => {
          const preKeyValue = h.PublicKey.getOptional(preKey);
          const kyberValue = h.KyberPublicKey.getOptional(kyberPreKey);
          out[0] = h.PreKeyBundle.alloc({
            registrationId,
            deviceId,
            preKeyId,
            preKey: preKeyValue ? Uint8Array.from(preKeyValue) : null,
            signedPreKeyId,
            signedPreKey: Uint8Array.from(h.PublicKey.get(signedPreKey)),
            signedPreKeySignature: this.input(signedPreKeySignature),
            identityKey: Uint8Array.from(h.PublicKey.get(identityKey)),
            kyberPreKeyId,
            kyberPreKey: kyberValue ? Uint8Array.from(kyberValue) : null,
            kyberPreKeySignature: this.input(kyberPreKeySignature),
          });
        }),
      signal_pre_key_bundle_get_registration_id: (out, bundle) =>
        this.run('signal_pre_key_bundle_get_registration_id', () => {
          out[0] = h.PreKeyBundle.get(bundle).registrationId;
        }),
      signal_pre_key_bundle_get_device_id: (out, bundle) =>
        this.run('signal_pre_key_bundle_get_device_id', () => {
          out[0] = h.PreKeyBundle.get(bundle).deviceId;
        }),
      signal_pre_key_bundle_get_pre_key_id: (out, bundle) =>
        this.run('signal_pre_key_bundle_get_pre_key_id', () => {
          out[0] = h.PreKeyBundle.get(bundle).preKeyId;
        }),
      signal_pre_key_bundle_get_pre_key_public: (out, bundle) =>
        this.run('signal_pre_key_bundle_get_pre_key_public', () => {
          const key = h.PreKeyBundle.get(bundle).preKey;
          out[0] = key ? h.PublicKey.alloc(Uint8Array.from(key)) : { raw: null };
        }),
      signal_pre_key_bundle_get_signed_pre_key_id: (out, bundle) =>
        this.run('signal_pre_key_bundle_get_signed_pre_key_id', () => {
          out[0] = h.PreKeyBundle.get(bundle).signedPreKeyId;
        }),
      signal_pre_key_bundle_get_signed_pre_key_public: (out, bundle) =>
        this.run('signal_pre_key_bundle_get_signed_pre_key_public', () => {
          out[0] = h.PublicKey.alloc(Uint8Array.from(h.PreKeyBundle.get(bundle).signedPreKey));
        }),
      signal_pre_key_bundle_get_signed_pre_key_signature: (out, bundle) =>
        this.run('signal_pre_key_bundle_get_signed_pre_key_signature', () =>
          this.owned(out, h.PreKeyBundle.get(bundle).signedPreKeySignature)
        ),
      signal_pre_key_bundle_get_identity_key: (out, bundle) =>
        this.run('signal_pre_key_bundle_get_identity_key', () => {
          out[0] = h.PublicKey.alloc(Uint8Array.from(h.PreKeyBundle.get(bundle).identityKey));
        }),
      signal_pre_key_bundle_get_kyber_pre_key_id: (out, bundle) =>
        this.run('signal_pre_key_bundle_get_kyber_pre_key_id', () => {
          out[0] = h.PreKeyBundle.get(bundle).kyberPreKeyId;
        }),
      signal_pre_key_bundle_get_kyber_pre_key_public: (out, bundle) =>
        this.run('signal_pre_key_bundle_get_kyber_pre_key_public', () => {
          const key = h.PreKeyBundle.get(bundle).kyberPreKey;
          out[0] = key ? h.KyberPublicKey.alloc(Uint8Array.from(key)) : { raw: null };
        }),
      signal_pre_key_bundle_get_kyber_pre_key_signature: (out, bundle) =>
        this.run('signal_pre_key_bundle_get_kyber_pre_key_signature', () =>
          this.owned(out, h.PreKeyBundle.get(bundle).kyberPreKeySignature)
        ),
      signal_pre_key_bundle_clone: this.cloner('signal_pre_key_bundle_clone', h.PreKeyBundle),
      signal_pre_key_bundle_destroy: this.destroyer('signal_pre_key_bundle_destroy', h.PreKeyBundle),

      // ProtocolAddress
      signal_address_new: (out, name, deviceId) =>
        this.run('signal_address_new', () => {
          out[0] = h.ProtocolAddress.alloc({ name, deviceId });
        }),
      signal_address_get_name: (out, address) =>
        this.run('signal_address_get_name', () => {
          out[0] = h.ProtocolAddress.get(address).name;
        }),
      signal_address_get_device_id: (out, address) =>
        this.run('signal_address_get_device_id', () => {
          out[0] = h.ProtocolAddress.get(address).deviceId;
        }),
      signal_address_clone: this.cloner('signal_address_clone', h.ProtocolAddress),
      signal_address_destroy: this.destroyer('signal_address_destroy', h.ProtocolAddress),

      // SessionRecord
      signal_session_record_deserialize: (out, data) =>
        this.run('signal_session_record_deserialize', () => {
          const message = new ProtoMessage(this.input(data, true));
          const current = message.bytes(1);
          out[0] = h.SessionRecord.alloc({
            current: current ? decodeSessionState(current) : null,
            previous: message.repeated(2).map(decodeSessionState),
          });
        }),
      signal_session_record_serialize: (out, record) =>
        this.run('signal_session_record_serialize', () => {
          const value = h.SessionRecord.get(record);
          this.owned(out, buildSessionRecord(value.current, value.previous));
        }),
      signal_session_record_archive_current_state: (record) =>
        this.run('signal_session_record_archive_current_state', () => {
          const value = h.SessionRecord.get(record);
          if (value.current) {
            value.previous.unshift(value.current);
            value.current = null;
          }
        }),
      signal_session_record_has_usable_sender_chain: (out, record, now) =>
        this.run('signal_session_record_has_usable_sender_chain', () => {
          const current = h.SessionRecord.get(record).current;
          out[0] = current !== null && current.senderChainExpires > now;
        }),
      signal_session_record_current_ratchet_key_matches: (out, record, key) =>
        this.run('signal_session_record_current_ratchet_key_matches', () => {
          const current = h.SessionRecord.get(record).current;
          const candidate = h.PublicKey.get(key);
          out[0] = current !== null && Buffer.from(current.ratchetKey).equals(candidate);
        }),
      signal_session_record_get_local_registration_id: (out, record) =>
        this.run('signal_session_record_get_local_registration_id', () => {
          out[0] = this.currentSession(h.SessionRecord.get(record).current).localRegistrationId;
        }),
      signal_session_record_get_remote_registration_id: (out, record) =>
        this.run('signal_session_record_get_remote_registration_id', () => {
          out[0] = this.currentSession(h.SessionRecord.get(record).current).remoteRegistrationId;
        }),
      signal_session_record_clone: this.cloner('signal_session_record_clone', h.SessionRecord),
      signal_session_record_destroy: this.destroyer('signal_session_record_destroy', h.SessionRecord),

      // SignalMessage
      signal_message_deserialize: (out, data) =>
        this.run('signal_message_deserialize', () => {
          out[0] = h.SignalMessage.alloc(this.parseSignalMessage(this.input(data)));
        }),
      signal_message_get_serialized: (out, message) =>
        this.run('signal_message_get_serialized', () => this.owned(out, h.SignalMessage.get(message).serialized)),
      signal_message_get_body: (out, message) =>
        this.run('signal_message_get_body', () => this.owned(out, h.SignalMessage.get(message).body)),
      signal_message_get_counter: (out, message) =>
        this.run('signal_message_get_counter', () => {
          out[0] = h.SignalMessage.get(message).counter;
        }),
      signal_message_get_message_version: (out, message) =>
        this.run('signal_message_get_message_version', () => {
          out[0] = h.SignalMessage.get(message).version;
        }),
      signal_message_get_sender_ratchet_key: (out, message) =>
        this.run('signal_message_get_sender_ratchet_key', () => {
          out[0] = h.PublicKey.alloc(Uint8Array.from(h.SignalMessage.get(message).ratchetKey));
        }),
      signal_message_clone: this.cloner('signal_message_clone', h.SignalMessage),
      signal_message_destroy: this.destroyer('signal_message_destroy', h.SignalMessage),

      // DecryptionErrorMessage
      signal_decryption_error_message_deserialize: (out, data) =>
        this.run('signal_decryption_error_message_deserialize', () => {
          const bytes = this.input(data);
          const message = new ProtoMessage(bytes);
          const ratchetKey = message.bytes(1);
          out[0] = h.DecryptionErrorMessage.alloc({
            serialized: bytes,
            ratchetKey: ratchetKey ? parsePublicKey(ratchetKey, NativeErrorCode.InvalidMessage) : null,
            timestamp: message.number(2),
            deviceId: message.number(3),
          });
        }),
      signal_decryption_error_message_serialize: (out, message) =>
        this.run('signal_decryption_error_message_serialize', () =>
          this.owned(out, h.DecryptionErrorMessage.get(message).serialized)
        ),
      signal_decryption_error_message_get_timestamp: (out, message) =>
        this.run('signal_decryption_error_message_get_timestamp', () => {
          out[0] = BigInt(h.DecryptionErrorMessage.get(message).timestamp);
        }),
      signal_decryption_error_message_get_device_id: (out, message) =>
        this.run('signal_decryption_error_message_get_device_id', () => {
          out[0] = h.DecryptionErrorMessage.get(message).deviceId;
        }),
      signal_decryption_error_message_get_ratchet_key: (out, message) =>
        this.run('signal_decryption_error_message_get_ratchet_key', () => {
          const key = h.DecryptionErrorMessage.get(message).ratchetKey;
          out[0] = key ? h.PublicKey.alloc(Uint8Array.from(key)) : { raw: null };
        }),
      signal_decryption_error_message_clone: this.cloner(
        'signal_decryption_error_message_clone',
        h.DecryptionErrorMessage
      ),
      signal_decryption_error_message_destroy: this.destroyer(
        'signal_decryption_error_message_destroy',
        h.DecryptionErrorMessage
      ),

      // SenderKeyRecord
      signal_sender_key_record_deserialize: (out, data) =>
        this.run('signal_sender_key_record_deserialize', () => {
          const bytes = this.input(data, true);
          const states = new ProtoMessage(bytes).repeated(1);
          if (states.length === 0) {
            throw new FakeFailure(NativeErrorCode.InvalidMessage, 'no sender key states');
          }
          for (const state of states) {
            new ProtoMessage(state).requireBytes(3, 32);
          }
          out[0] = h.SenderKeyRecord.alloc(bytes);
        }),
      signal_sender_key_record_serialize: (out, record) =>
        this.run('signal_sender_key_record_serialize', () => this.owned(out, h.SenderKeyRecord.get(record))),
      signal_sender_key_record_clone: this.cloner('signal_sender_key_record_clone', h.SenderKeyRecord),
      signal_sender_key_record_destroy: this.destroyer('signal_sender_key_record_destroy', h.SenderKeyRecord),

      // SenderKeyMessage
      signal_sender_key_message_deserialize: (out, data) =>
        this.run('signal_sender_key_message_deserialize', () => {
          out[0] = h.SenderKeyMessage.alloc(this.parseSenderKeyMessage(this.input(data)));
        }),
      signal_sender_key_message_serialize: (out, message) =>
        this.run('signal_sender_key_message_serialize', () =>
          this.owned(out, h.SenderKeyMessage.get(message).serialized)
        ),
      signal_sender_key_message_get_cipher_text: (out, message) =>
        this.run('signal_sender_key_message_get_cipher_text', () =>
          this.owned(out, h.SenderKeyMessage.get(message).ciphertext)
        ),
      signal_sender_key_message_get_iteration: (out, message) =>
        this.run('signal_sender_key_message_get_iteration', () => {
          out[0] = h.SenderKeyMessage.get(message).iteration;
        }),
      signal_sender_key_message_get_chain_id: (out, message) =>
        this.run('signal_sender_key_message_get_chain_id', () => {
          out[0] = h.SenderKeyMessage.get(message).chainId;
        }),
      signal_sender_key_message_get_distribution_id: (out, message) =>
        this.run('signal_sender_key_message_get_distribution_id', () => {
          out[0] = { bytes: Uint8Array.from(h.SenderKeyMessage.get(message).distributionId) };
        }),
      signal_sender_key_message_verify_signature: (out, message, key) =>
        this.run('signal_sender_key_message_verify_signature', () => {
          const value = h.SenderKeyMessage.get(message);
          out[0] = fakeVerify(h.PublicKey.get(key), value.signed, value.signature);
        }),
      signal_sender_key_message_clone: this.cloner('signal_sender_key_message_clone', h.SenderKeyMessage),
      signal_sender_key_message_destroy: this.destroyer('signal_sender_key_message_destroy', h.SenderKeyMessage),

      // SenderKeyDistributionMessage
      signal_sender_key_distribution_message_deserialize: (out, data) =>
        this.run('signal_sender_key_distribution_message_deserialize', () => {
          const bytes = this.input(data, true);
          const message = new ProtoMessage(checkVersion(bytes, 0));
          out[0] = h.SenderKeyDistributionMessage.alloc({
            serialized: bytes,
            distributionId: message.requireBytes(1, 16),
            chainId: message.number(2),
            iteration: message.number(3),
            chainKey: message.requireBytes(4, 32),
            signingKey: parsePublicKey(message.requireBytes(5), NativeErrorCode.InvalidMessage),
          });
        }),
      signal_sender_key_distribution_message_serialize: (out, message) =>
        this.run('signal_sender_key_distribution_message_serialize', () =>
          this.owned(out, h.SenderKeyDistributionMessage.get(message).serialized)
        ),
      signal_sender_key_distribution_message_get_chain_key: (out, message) =>
        this.run('signal_sender_key_distribution_message_get_chain_key', () =>
          this.owned(out, h.SenderKeyDistributionMessage.get(message).chainKey)
        ),
      signal_sender_key_distribution_message_get_iteration: (out, message) =>
        this.run('signal_sender_key_distribution_message_get_iteration', () => {
          out[0] = h.SenderKeyDistributionMessage.get(message).iteration;
        }),
      signal_sender_key_distribution_message_get_chain_id: (out, message) =>
        this.run('signal_sender_key_distribution_message_get_chain_id', () => {
          out[0] = h.SenderKeyDistributionMessage.get(message).chainId;
        }),
      signal_sender_key_distribution_message_get_distribution_id: (out, message) =>
        this.run('signal_sender_key_distribution_message_get_distribution_id', () => {
          out[0] = { bytes: Uint8Array.from(h.SenderKeyDistributionMessage.get(message).distributionId) };
        }),
      signal_sender_key_distribution_message_get_signature_key: (out, message) =>
        this.run('signal_sender_key_distribution_message_get_signature_key', () => {
          out[0] = h.PublicKey.alloc(Uint8Array.from(h.SenderKeyDistributionMessage.get(message).signingKey));
        }),
      signal_sender_key_distribution_message_clone: this.cloner(
        'signal_sender_key_distribution_message_clone',
        h.SenderKeyDistributionMessage
      ),
      signal_sender_key_distribution_message_destroy: this.destroyer(
        'signal_sender_key_distribution_message_destroy',
        h.SenderKeyDistributionMessage
      ),

      // ServerCertificate
      signal_server_certificate_new: (out, keyId, serverKey, trustRoot) =>
        this.run('signal_server_certificate_new', () => {
          const key = h.PublicKey.get(serverKey);
          const certificate = new ProtoWriter().varint(1, keyId).bytes(2, serializePublicKey(key)).finish();
          const signature = fakeSign(h.PrivateKey.get(trustRoot), certificate);
          out[0] = h.ServerCertificate.alloc({
            serialized: new ProtoWriter().bytes(1, certificate).bytes(2, signature).finish(),
            certificate,
            signature,
            keyId,
            key: Uint8Array.from(key),
          });
        }),
      signal_server_certificate_deserialize: (out, data) =>
        this.run('signal_server_certificate_deserialize', () => {
          out[0] = h.ServerCertificate.alloc(this.parseServerCertificate(this.input(data)));
        }),
      signal_server_certificate_get_serialized: (out, cert) =>
        this.run('signal_server_certificate_get_serialized', () =>
          this.owned(out, h.ServerCertificate.get(cert).serialized)
        ),
      signal_server_certificate_get_certificate: (out, cert) =>
        this.run('signal_server_certificate_get_certificate', () =>
          this.owned(out, h.ServerCertificate.get(cert).certificate)
        ),
      signal_server_certificate_get_signature: (out, cert) =>
        this.run('signal_server_certificate_get_signature', () =>
          this.owned(out, h.ServerCertificate.get(cert).signature)
        ),
      signal_server_certificate_get_key_id: (out, cert) =>
        this.run('signal_server_certificate_get_key_id', () => {
          out[0] = h.ServerCertificate.get(cert).keyId;
        }),
      signal_server_certificate_get_key: (out, cert) =>
        this.run('signal_server_certificate_get_key', () => {
          out[0] = h.PublicKey.alloc(Uint8Array.from(h.ServerCertificate.get(cert).key));
        }),
      signal_server_certificate_clone: this.cloner('signal_server_certificate_clone', h.ServerCertificate),
      signal_server_certificate_destroy: this.destroyer('signal_server_certificate_destroy', h.ServerCertificate),

      // SenderCertificate
      signal_sender_certificate_new: (
        out,
        senderUuid,
        senderE164,
        senderDeviceId,
        senderKey,
        expiration,
        signerCertificate,
        signerKey
      ) =>
        this.run('signal_sender_certificate_new', () => {
          const key = h.PublicKey.get(senderKey);
          const signer = h.ServerCertificate.get(signerCertificate);
          const writer = new ProtoWriter().string(1, senderUuid);
          if (senderE164 !== null) {
            writer.string(2, senderE164);
          }
          const certificate = writer
            .varint(3, senderDeviceId)
            .fixed64(4, expiration)
            .bytes(5, serializePublicKey(key))
            .bytes(6, signer.serialized)
            .finish();
          const signature = fakeSign(h.PrivateKey.get(signerKey), certificate);
          out[0] = h.SenderCertificate.alloc({
            serialized: new ProtoWriter().bytes(1, certificate).bytes(2, signature).finish(),
            certificate,
            signature,
            senderUuid,
            senderE164,
            deviceId: senderDeviceId,
            expiration,
            key: Uint8Array.from(key),
            signer: structuredClone(signer),
          });
        }),
      signal_sender_certificate_deserialize: (out, data) =>
        this.run('signal_sender_certificate_deserialize', () => {
          out[0] = h.SenderCertificate.alloc(this.parseSenderCertificate(this.input(data)));
        }),
      signal_sender_certificate_get_serialized: (out, cert) =>
        this.run('signal_sender_certificate_get_serialized', () =>
          this.owned(out, h.SenderCertificate.get(cert).serialized)
        ),
      signal_sender_certificate_get_certificate: (out, cert) =>
        this.run('signal_sender_certificate_get_certificate', () =>
          this.owned(out, h.SenderCertificate.get(cert).certificate)
        ),
      signal_sender_certificate_get_signature: (out, cert) =>
        this.run('signal_sender_certificate_get_signature', () =>
          this.owned(out, h.SenderCertificate.get(cert).signature)
        ),
      signal_sender_certificate_get_sender_uuid: (out, cert) =>
        this.run('signal_sender_certificate_get_sender_uuid', () => {
          out[0] = h.SenderCertificate.get(cert).senderUuid;
        }),
      signal_sender_certificate_get_sender_e164: (out, cert) =>
        this.run('signal_sender_certificate_get_sender_e164', () => {
          out[0] = h.SenderCertificate.get(cert).senderE164;
        }),
      signal_sender_certificate_get_device_id: (out, cert) =>
        this.run('signal_sender_certificate_get_device_id', () => {
          out[0] = h.SenderCertificate.get(cert).deviceId;
        }),
      signal_sender_certificate_get_expiration: (out, cert) =>
        this.run('signal_sender_certificate_get_expiration', () => {
          out[0] = BigInt(h.SenderCertificate.get(cert).expiration);
        }),
      signal_sender_certificate_get_key: (out, cert) =>
        this.run('signal_sender_certificate_get_key', () => {
          out[0] = h.PublicKey.alloc(Uint8Array.from(h.SenderCertificate.get(cert).key));
        }),
      signal_sender_certificate_get_server_certificate: (out, cert) =>
        this.run('signal_sender_certificate_get_server_certificate', () => {
          out[0] = h.ServerCertificate.alloc(structuredClone(h.SenderCertificate.get(cert).signer));
        }),
      signal_sender_certificate_validate: (out, cert, trustRoots, time) =>
        this.run('signal_sender_certificate_validate', () => {
          const value = h.SenderCertificate.get(cert);
          const roots = trustRoots.base.slice(0, trustRoots.length).map((root) => h.PublicKey.get(root));
          const signer = value.signer;
          const signerValid = roots.some((root) => fakeVerify(root, signer.certificate, signer.signature));
          const senderValid = fakeVerify(signer.key, value.certificate, value.signature);
          out[0] = signerValid && senderValid && time <= value.expiration;
        }),
      signal_sender_certificate_clone: this.cloner('signal_sender_certificate_clone', h.SenderCertificate),
      signal_sender_certificate_destroy: this.destroyer('signal_sender_certificate_destroy', h.SenderCertificate),

      // Aes256GcmSiv
      signal_aes256_gcm_siv_new: (out, key) =>
        this.run('signal_aes256_gcm_siv_new', () => {
          const bytes = this.input(key, true);
          if (bytes.length !== 32) {
            throw new FakeFailure(NativeErrorCode.InvalidArgument, 'bad key length');
          }
          out[0] = h.Aes256GcmSiv.alloc(bytes);
        }),
      signal_aes256_gcm_siv_encrypt: (out, cipher, plaintext, nonce, associatedData) =>
        this.run('signal_aes256_gcm_siv_encrypt', () => {
          const encryptor = crypto.createCipheriv('aes-256-gcm', h.Aes256GcmSiv.get(cipher), this.input(nonce));
          encryptor.setAAD(this.input(associatedData));
          const body = concat(encryptor.update(this.input(plaintext)), encryptor.final());
          this.owned(out, concat(body, encryptor.getAuthTag()));
        }),
      signal_aes256_gcm_siv_decrypt: (out, cipher, ciphertext, nonce, associatedData) =>
        this.run('signal_aes256_gcm_siv_decrypt', () => {
          const sealed = this.input(ciphertext);
          const decryptor = crypto.createDecipheriv('aes-256-gcm', h.Aes256GcmSiv.get(cipher), this.input(nonce));
          decryptor.setAAD(this.input(associatedData));
          decryptor.setAuthTag(sealed.subarray(sealed.length - 16));
          let plaintext: Uint8Array;
          try {
            plaintext = concat(decryptor.update(sealed.subarray(0, sealed.length - 16)), decryptor.final());
          } catch {
            throw new FakeFailure(NativeErrorCode.VerificationFailure, 'tag mismatch');
          }
          this.owned(out, plaintext);
        }),
      signal_aes256_gcm_siv_destroy: this.destroyer('signal_aes256_gcm_siv_destroy', h.Aes256GcmSiv),

      // HKDF
      signal_hkdf_derive: (output, ikm, label, salt) =>
        this.run('signal_hkdf_derive', () => {
          const derived = crypto.hkdfSync(
            'sha256',
            this.input(ikm, true),
            this.input(salt),
            this.input(label),
            output.length
          );
          output.base.set(new Uint8Array(derived));
        }),

      // Fingerprint
      signal_fingerprint_new: (out, iterations, version, localIdentifier, localKey, remoteIdentifier, remoteKey) =>
        this.run('signal_fingerprint_new', () => {
          const local = fingerprintHash(iterations, this.input(localIdentifier), h.PublicKey.get(localKey));
          const remote = fingerprintHash(iterations, this.input(remoteIdentifier), h.PublicKey.get(remoteKey));
          const sides = [fingerprintDigits(local), fingerprintDigits(remote)].sort();
          out[0] = h.Fingerprint.alloc({ version, local, remote, display: sides.join('') });
        }),
      signal_fingerprint_display_string: (out, fingerprint) =>
        this.run('signal_fingerprint_display_string', () => {
          out[0] = h.Fingerprint.get(fingerprint).display;
        }),
      signal_fingerprint_scannable_encoding: (out, fingerprint) =>
        this.run('signal_fingerprint_scannable_encoding', () => {
          const value = h.Fingerprint.get(fingerprint);
          this.owned(out, encodeScannable(value.version, value.local, value.remote));
        }),
      signal_fingerprint_compare: (out, first, second) =>
        this.run('signal_fingerprint_compare', () => {
          const ours = decodeScannable(this.input(first));
          const theirs = decodeScannable(this.input(second));
          if (ours.version !== theirs.version) {
            throw new FakeFailure(
              NativeErrorCode.FingerprintVersionMismatch,
              `version ${theirs.version} != ${ours.version}`
            );
          }
          out[0] =
            Buffer.from(ours.local).equals(theirs.remote) && Buffer.from(ours.remote).equals(theirs.local);
        }),
      signal_fingerprint_clone: this.cloner('signal_fingerprint_clone', h.Fingerprint),
      signal_fingerprint_destroy: this.destroyer('signal_fingerprint_destroy', h.Fingerprint),

      // CiphertextMessage
      signal_ciphertext_message_type: (out, message) =>
        this.run('signal_ciphertext_message_type', () => {
          out[0] = h.CiphertextMessage.get(message).type;
        }),
      signal_ciphertext_message_serialize: (out, message) =>
        this.run('signal_ciphertext_message_serialize', () =>
          this.owned(out, h.CiphertextMessage.get(message).serialized)
        ),
      signal_ciphertext_message_destroy: this.destroyer('signal_ciphertext_message_destroy', h.CiphertextMessage),

      // PreKeySignalMessage
      signal_pre_key_signal_message_deserialize: (out, data) =>
        this.run('signal_pre_key_signal_message_deserialize', () => {
          out[0] = h.PreKeySignalMessage.alloc(this.parsePreKeySignalMessage(this.input(data)));
        }),
      signal_pre_key_signal_message_serialize: (out, message) =>
        this.run('signal_pre_key_signal_message_serialize', () =>
          this.owned(out, h.PreKeySignalMessage.get(message).serialized)
        ),
      signal_pre_key_signal_message_get_version: (out, message) =>
        this.run('signal_pre_key_signal_message_get_version', () => {
          out[0] = h.PreKeySignalMessage.get(message).version;
        }),
      signal_pre_key_signal_message_get_registration_id: (out, message) =>
        this.run('signal_pre_key_signal_message_get_registration_id', () => {
          out[0] = h.PreKeySignalMessage.get(message).registrationId;
        }),
      signal_pre_key_signal_message_get_pre_key_id: (out, message) =>
        this.run('signal_pre_key_signal_message_get_pre_key_id', () => {
          out[0] = h.PreKeySignalMessage.get(message).preKeyId ?? NO_ID;
        }),
      signal_pre_key_signal_message_get_signed_pre_key_id: (out, message) =>
        this.run('signal_pre_key_signal_message_get_signed_pre_key_id', () => {
          out[0] = h.PreKeySignalMessage.get(message).signedPreKeyId;
        }),
      signal_pre_key_signal_message_get_base_key: (out, message) =>
        this.run('signal_pre_key_signal_message_get_base_key', () => {
          out[0] = h.PublicKey.alloc(Uint8Array.from(h.PreKeySignalMessage.get(message).baseKey));
        }),
      signal_pre_key_signal_message_get_identity_key: (out, message) =>
        this.run('signal_pre_key_signal_message_get_identity_key', () => {
          out[0] = h.PublicKey.alloc(Uint8Array.from(h.PreKeySignalMessage.get(message).identityKey));
        }),
      signal_pre_key_signal_message_get_signal_message: (out, message) =>
        this.run('signal_pre_key_signal_message_get_signal_message', () => {
          out[0] = h.SignalMessage.alloc(structuredClone(h.PreKeySignalMessage.get(message).message));
        }),
      signal_pre_key_signal_message_clone: this.cloner('signal_pre_key_signal_message_clone', h.PreKeySignalMessage),
      signal_pre_key_signal_message_destroy: this.destroyer(
        'signal_pre_key_signal_message_destroy',
        h.PreKeySignalMessage
      ),

      // Sessions
      signal_process_prekey_bundle: (bundle, address, sessionStore, identityStore, now) =>
        this.run('signal_process_prekey_bundle', () => {
          const value = h.PreKeyBundle.get(bundle);
          this.requireTrusted(identityStore, address, value.identityKey, FfiDirection.Sending);
          if (!fakeVerify(value.identityKey, serializePublicKey(value.signedPreKey), value.signedPreKeySignature)) {
            throw new FakeFailure(NativeErrorCode.InvalidSignature, 'bad signed pre-key signature');
          }
          if (value.kyberPreKey && !fakeVerify(value.identityKey, value.kyberPreKey, value.kyberPreKeySignature)) {
            throw new FakeFailure(NativeErrorCode.InvalidSignature, 'bad Kyber pre-key signature');
          }
          const identityKey = this.identityPrivateKey(identityStore);
          const basePrivate = randomPrivateKey();
          const rootKey = sha256(
            agree(identityKey, value.signedPreKey),
            agree(basePrivate, value.identityKey),
            agree(basePrivate, value.signedPreKey),
            value.preKey ? agree(basePrivate, value.preKey) : EMPTY,
            value.kyberPreKey ?? EMPTY
          );
          const baseKey = publicFromPrivate(basePrivate);
          const state: SessionStateFields = {
            localRegistrationId: this.localRegistrationId(identityStore),
            remoteRegistrationId: value.registrationId,
            ratchetKey: baseKey,
            senderChainExpires: now + SESSION_LIFETIME_MS,
            rootKey,
            sendCounter: 0,
            receiveCounter: 0,
            remoteIdentity: Uint8Array.from(value.identityKey),
            baseKey,
            pending: {
              preKeyId: value.preKey ? value.preKeyId : null,
              signedPreKeyId: value.signedPreKeyId,
              kyberPreKeyId: value.kyberPreKey ? value.kyberPreKeyId : null,
            },
          };
          const record: FakeValues['SessionRecord'] = this.loadSessionRecord(sessionStore, address) ?? {
            current: null,
            previous: [],
          };
          if (record.current) {
            record.previous.unshift(record.current);
          }
          record.current = state;
          this.storeSessionRecord(sessionStore, address, record);
          this.lend('saveIdentity', h.PublicKey, Uint8Array.from(value.identityKey), (key) =>
            identityStore.saveIdentity(address, key)
          );
        }),
      signal_encrypt_message: (out, plaintext, address, sessionStore, identityStore, now) =>
        this.run('signal_encrypt_message', () => {
          const record = this.loadSessionRecord(sessionStore, address);
          const state = record?.current;
          if (!record || !state) {
            throw new FakeFailure(NativeErrorCode.SessionNotFound, 'no session');
          }
          if (state.senderChainExpires <= now) {
            throw new FakeFailure(NativeErrorCode.SessionNotFound, 'session expired');
          }
          if (state.remoteIdentity) {
            this.requireTrusted(identityStore, address, state.remoteIdentity, FfiDirection.Sending);
          }
          const message = this.encryptWithState(state, this.input(plaintext, true));
          let serialized = message.serialized;
          let type = 2;
          if (state.pending && state.baseKey) {
            serialized = buildPreKeySignalMessage({
              registrationId: state.localRegistrationId,
              preKeyId: state.pending.preKeyId,
              signedPreKeyId: state.pending.signedPreKeyId,
              kyberPreKeyId: state.pending.kyberPreKeyId,
              baseKey: state.baseKey,
              identityKey: publicFromPrivate(this.identityPrivateKey(identityStore)),
              message: message.serialized,
            });
            type = 3;
          }
          this.storeSessionRecord(sessionStore, address, record);
          out[0] = h.CiphertextMessage.alloc({ type, serialized });
        }),
      signal_decrypt_message: (out, message, address, sessionStore, _identityStore) =>
        this.run('signal_decrypt_message', () => {
          const value = h.SignalMessage.get(message);
          const record = this.loadSessionRecord(sessionStore, address);
          const state = record?.current;
          if (!record || !state) {
            throw new FakeFailure(NativeErrorCode.SessionNotFound, 'no session');
          }
          const plaintext = this.decryptWithState(state, value);
          this.storeSessionRecord(sessionStore, address, record);
          this.owned(out, plaintext);
        }),
      signal_decrypt_pre_key_message: (
        out,
        message,
        address,
        sessionStore,
        identityStore,
        preKeyStore,
        signedPreKeyStore,
        kyberPreKeyStore
      ) =>
        this.run('signal_decrypt_pre_key_message', () => {
          const value = h.PreKeySignalMessage.get(message);
          this.requireTrusted(identityStore, address, value.identityKey, FfiDirection.Receiving);
          const record: FakeValues['SessionRecord'] = this.loadSessionRecord(sessionStore, address) ?? {
            current: null,
            previous: [],
          };
          const existing = record.current;

          if (existing?.baseKey && Buffer.from(existing.baseKey).equals(value.baseKey)) {
            // A repeat of the message that started the current session.
            const plaintext = this.decryptWithState(existing, value.message);
            this.storeSessionRecord(sessionStore, address, record);
            this.owned(out, plaintext);
            return;
          }

          const signedPreKey = this.load('loadSignedPreKey', h.SignedPreKeyRecord, (slot) =>
            signedPreKeyStore.loadSignedPreKey(slot, value.signedPreKeyId)
          );
          if (signedPreKey === null) {
            throw new FakeFailure(NativeErrorCode.InvalidKeyIdentifier, `no signed pre-key ${value.signedPreKeyId}`);
          }
          const preKeyId = value.preKeyId;
          let preKey: PreKeyValue | null = null;
          if (preKeyId !== null) {
            preKey = this.load('loadPreKey', h.PreKeyRecord, (slot) => preKeyStore.loadPreKey(slot, preKeyId));
            if (preKey === null) {
              throw new FakeFailure(NativeErrorCode.InvalidKeyIdentifier, `no pre-key ${preKeyId}`);
            }
          }
          const kyberPreKeyId = value.kyberPreKeyId;
          let kyberPreKey: KyberPreKeyValue | null = null;
          if (kyberPreKeyId !== null) {
            kyberPreKey = this.load('loadKyberPreKey', h.KyberPreKeyRecord, (slot) =>
              kyberPreKeyStore.loadKyberPreKey(slot, kyberPreKeyId)
            );
            if (kyberPreKey === null) {
              throw new FakeFailure(NativeErrorCode.InvalidKeyIdentifier, `no Kyber pre-key ${kyberPreKeyId}`);
            }
          }

          const identityKey = this.identityPrivateKey(identityStore);
          const rootKey = sha256(
            agree(signedPreKey.privateKey, value.identityKey),
            agree(identityKey, value.baseKey),
            agree(signedPreKey.privateKey, value.baseKey),
            preKey ? agree(preKey.privateKey, value.baseKey) : EMPTY,
            kyberPreKey ? kyberPreKey.publicKey : EMPTY
          );
          const state: SessionStateFields = {
            localRegistrationId: this.localRegistrationId(identityStore),
            remoteRegistrationId: value.registrationId,
            ratchetKey: publicFromPrivate(randomPrivateKey()),
            senderChainExpires: Date.now() + SESSION_LIFETIME_MS,
            rootKey,
            sendCounter: 0,
            receiveCounter: 0,
            remoteIdentity: Uint8Array.from(value.identityKey),
            baseKey: Uint8Array.from(value.baseKey),
          };
          const plaintext = this.decryptWithState(state, value.message);

          if (record.current) {
            record.previous.unshift(record.current);
          }
          record.current = state;
          this.storeSessionRecord(sessionStore, address, record);
          if (preKeyId !== null) {
            this.status('removePreKey', preKeyStore.removePreKey(preKeyId));
          }
          if (kyberPreKeyId !== null) {
            this.lend('markKyberPreKeyUsed', h.PublicKey, Uint8Array.from(value.baseKey), (baseKey) =>
              kyberPreKeyStore.markKyberPreKeyUsed(kyberPreKeyId, value.signedPreKeyId, baseKey)
            );
          }
          this.lend('saveIdentity', h.PublicKey, Uint8Array.from(value.identityKey), (key) =>
            identityStore.saveIdentity(address, key)
          );
          this.owned(out, plaintext);
        }),

      // Sender keys
      signal_sender_key_distribution_message_create: (out, sender, distributionId, store) =>
        this.run('signal_sender_key_distribution_message_create', () => {
          const states = this.loadSenderKeyStates(store, sender, distributionId);
          let own = states.find((state) => state.signingPrivateKey !== null);
          if (own === undefined) {
            const signingPrivateKey = randomPrivateKey();
            own = {
              chainId: crypto.randomInt(1, 0x7fffffff),
              iteration: 0,
              chainKey: new Uint8Array(crypto.randomBytes(32)),
              signingKey: publicFromPrivate(signingPrivateKey),
              signingPrivateKey,
            };
            this.storeSenderKeyStates(store, sender, distributionId, [own, ...states]);
          }
          const fields: SenderKeyDistributionFields = {
            distributionId: Uint8Array.from(distributionId),
            chainId: own.chainId,
            iteration: own.iteration,
            chainKey: own.chainKey,
            signingKey: own.signingKey,
          };
          out[0] = h.SenderKeyDistributionMessage.alloc({
            serialized: buildSenderKeyDistributionMessage(fields),
            ...fields,
          });
        }),
      signal_process_sender_key_distribution_message: (sender, message, store) =>
        this.run('signal_process_sender_key_distribution_message', () => {
          const value = h.SenderKeyDistributionMessage.get(message);
          const states = this.loadSenderKeyStates(store, sender, value.distributionId).filter(
            (state) => state.chainId !== value.chainId
          );
          const received: SenderKeyState = {
            chainId: value.chainId,
            iteration: value.iteration,
            chainKey: Uint8Array.from(value.chainKey),
            signingKey: Uint8Array.from(value.signingKey),
            signingPrivateKey: null,
          };
          this.storeSenderKeyStates(store, sender, value.distributionId, [received, ...states]);
        }),
      signal_group_encrypt_message: (out, sender, distributionId, plaintext, store) =>
        this.run('signal_group_encrypt_message', () => {
          const states = this.loadSenderKeyStates(store, sender, distributionId);
          const own = states.find((state) => state.signingPrivateKey !== null);
          if (own === undefined || own.signingPrivateKey === null) {
            throw new FakeFailure(NativeErrorCode.InvalidSenderKeySession, 'no sender key to encrypt with');
          }
          const ciphertext = gcmSeal(senderMessageKey(own.chainKey), this.input(plaintext, true));
          const serialized = buildSenderKeyMessage({
            distributionId: Uint8Array.from(distributionId),
            chainId: own.chainId,
            iteration: own.iteration,
            ciphertext,
            signingKey: own.signingPrivateKey,
          });
          own.iteration += 1;
          own.chainKey = nextChainKey(own.chainKey);
          this.storeSenderKeyStates(store, sender, distributionId, states);
          out[0] = h.CiphertextMessage.alloc({ type: 7, serialized });
        }),
      signal_group_decrypt_message: (out, sender, ciphertext, store) =>
        this.run('signal_group_decrypt_message', () => {
          const message = this.parseSenderKeyMessage(this.input(ciphertext));
          const states = this.loadSenderKeyStates(store, sender, message.distributionId);
          const state = states.find((candidate) => candidate.chainId === message.chainId);
          if (state === undefined) {
            throw new FakeFailure(
              NativeErrorCode.InvalidSenderKeySession,
              `no sender key for chain ${message.chainId}`
            );
          }
          if (!fakeVerify(state.signingKey, message.signed, message.signature)) {
            throw new FakeFailure(NativeErrorCode.InvalidSignature, 'bad sender key signature');
          }
          if (message.iteration < state.iteration) {
            throw new FakeFailure(NativeErrorCode.DuplicatedMessage, `iteration ${message.iteration} already used`);
          }
          let chainKey = state.chainKey;
          for (let i = state.iteration; i < message.iteration; i++) {
            chainKey = nextChainKey(chainKey);
          }
          const plaintext = gcmOpen(senderMessageKey(chainKey), message.ciphertext, NativeErrorCode.InvalidMessage);
          state.iteration = message.iteration + 1;
          state.chainKey = nextChainKey(chainKey);
          this.storeSenderKeyStates(store, sender, message.distributionId, states);
          this.owned(out, plaintext);
        }),

      // UnidentifiedSenderMessageContent
      signal_unidentified_sender_message_content_new: (out, message, sender, contentHint, groupId) =>
        this.run('signal_unidentified_sender_message_content_new', () => {
          const inner = h.CiphertextMessage.get(message);
          out[0] = h.UnidentifiedSenderMessageContent.alloc({
            msgType: inner.type,
            sender: structuredClone(h.SenderCertificate.get(sender)),
            contents: Uint8Array.from(inner.serialized),
            contentHint,
            groupId: this.input(groupId),
          });
        }),
      signal_unidentified_sender_message_content_deserialize: (out, data) =>
        this.run('signal_unidentified_sender_message_content_deserialize', () => {
          out[0] = h.UnidentifiedSenderMessageContent.alloc(this.parseContent(this.input(data)));
        }),
      signal_unidentified_sender_message_content_serialize: (out, content) =>
        this.run('signal_unidentified_sender_message_content_serialize', () =>
          this.owned(out, encodeContent(h.UnidentifiedSenderMessageContent.get(content)))
        ),
      signal_unidentified_sender_message_content_get_contents: (out, content) =>
        this.run('signal_unidentified_sender_message_content_get_contents', () =>
          this.owned(out, h.UnidentifiedSenderMessageContent.get(content).contents)
        ),
      signal_unidentified_sender_message_content_get_group_id_or_empty: (out, content) =>
        this.run('signal_unidentified_sender_message_content_get_group_id_or_empty', () =>
          this.owned(out, h.UnidentifiedSenderMessageContent.get(content).groupId)
        ),
      signal_unidentified_sender_message_content_get_sender_cert: (out, content) =>
        this.run('signal_unidentified_sender_message_content_get_sender_cert', () => {
          out[0] = h.SenderCertificate.alloc(structuredClone(h.UnidentifiedSenderMessageContent.get(content).sender));
        }),
      signal_unidentified_sender_message_content_get_msg_type: (out, content) =>
        this.run('signal_unidentified_sender_message_content_get_msg_type', () => {
          out[0] = h.UnidentifiedSenderMessageContent.get(content).msgType;
        }),
      signal_unidentified_sender_message_content_get_content_hint: (out, content) =>
        this.run('signal_unidentified_sender_message_content_get_content_hint', () => {
          out[0] = h.UnidentifiedSenderMessageContent.get(content).contentHint;
        }),
      signal_unidentified_sender_message_content_destroy: this.destroyer(
        'signal_unidentified_sender_message_content_destroy',
        h.UnidentifiedSenderMessageContent
      ),

      // Sealed sender
      signal_sealed_session_cipher_encrypt: (out, destination, content, identityStore) =>
        this.run('signal_sealed_session_cipher_encrypt', () => {
          const serialized = encodeContent(h.UnidentifiedSenderMessageContent.get(content));
          const recipient = this.load('getIdentity', h.PublicKey, (slot) =>
            identityStore.getIdentity(slot, destination)
          );
          if (recipient === null) {
            throw new FakeFailure(NativeErrorCode.SessionNotFound, 'no identity for destination');
          }
          const ephemeralPrivate = randomPrivateKey();
          const ephemeral = publicFromPrivate(ephemeralPrivate);
          const material = sha512(agree(ephemeralPrivate, recipient), ephemeral, recipient);
          const header = Uint8Array.of((SEALED_VERSION << 4) | SEALED_VERSION);
          this.owned(out, concat(header, ephemeral, gcmSeal(material, serialized)));
        }),
      signal_sealed_session_cipher_decrypt_to_usmc: (out, ciphertext, identityStore) =>
        this.run('signal_sealed_session_cipher_decrypt_to_usmc', () => {
          const bytes = this.input(ciphertext);
          const version = (bytes[0] ?? 0) >> 4;
          if (version !== SEALED_VERSION) {
            throw new FakeFailure(NativeErrorCode.UnknownCiphertextVersion, `sealed sender version ${version}`);
          }
          if (bytes.length < 1 + 32 + GCM_TAG_LENGTH) {
            throw new FakeFailure(NativeErrorCode.InvalidMessage, 'sealed message too short');
          }
          const ephemeral = bytes.subarray(1, 33);
          const identityKey = this.identityPrivateKey(identityStore);
          const material = sha512(agree(identityKey, ephemeral), ephemeral, publicFromPrivate(identityKey));
          const opened = gcmOpen(material, bytes.subarray(33), NativeErrorCode.InvalidMessage);
          out[0] = h.UnidentifiedSenderMessageContent.alloc(this.parseContent(opened));
        }),
    };
  }

  private currentSession(current: SessionStateFields | null): SessionStateFields {
    if (current === null) {
      throw new FakeFailure(NativeErrorCode.InvalidState, 'no current session');
    }
    return current;
  }
}
