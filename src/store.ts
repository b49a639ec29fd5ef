/**
 * Protocol stores
 *
 * Key-value interfaces for the state the protocol keeps between messages,
 * and adapters that persist serialized records through a pluggable
 * storage backend. Loaded records are freshly deserialized and owned by
 * the caller, who must dispose them.
 */

import type { NativeContext } from './context.js';
import { InvalidArgumentError } from './exceptions.js';
import { SenderKeyRecord } from './groups.js';
import { IdentityKeyPair, PublicKey } from './keys.js';
import { constantTimeEquals, zeroBytes } from './memory.js';
import { KyberPreKeyRecord, PreKeyRecord, SignedPreKeyRecord } from './prekeys.js';
import { ProtocolAddress, SessionRecord } from './protocol.js';

// ============================================================
// Storage Backend Interface
// ============================================================

/**
 * Interface for pluggable storage backends holding raw bytes.
 */
export interface StorageBackend {
  /**
   * Store a value, replacing any previous one.
   * @param key - Storage key
   * @param value - Bytes to store; the backend keeps its own copy
   */
  set(key: string, value: Uint8Array): Promise<void>;

  /**
   * Retrieve a value by key.
   * @returns A copy of the stored bytes, or null if not found
   */
  get(key: string): Promise<Uint8Array | null>;

  /**
   * Delete a value by key.
   * @returns true if deleted, false if not found
   */
  delete(key: string): Promise<boolean>;

  exists(key: string): Promise<boolean>;

  /**
   * List stored keys, optionally only those starting with `prefix`.
   */
  keys(prefix?: string): Promise<string[]>;

  /**
   * Close the backend and release resources.
   */
  close(): Promise<void>;
}

// ============================================================
// Memory Backend
// ============================================================

/**
 * In-memory storage backend for testing and development.
 *
 * Values are zeroed when they are overwritten, deleted or the backend is
 * closed.
 */
export class MemoryBackend implements StorageBackend {
  private readonly data: Map<string, Uint8Array> = new Map();

  async set(key: string, value: Uint8Array): Promise<void> {
    zeroBytes(this.data.get(key));
    this.data.set(key, Uint8Array.from(value));
  }

  async get(key: string): Promise<Uint8Array | null> {
    const value = this.data.get(key);
    return value ? Uint8Array.from(value) : null;
  }

  async delete(key: string): Promise<boolean> {
    const value = this.data.get(key);
    if (!value) {
      return false;
    }
    zeroBytes(value);
    return this.data.delete(key);
  }

  async exists(key: string): Promise<boolean> {
    return this.data.has(key);
  }

  async keys(prefix = ''): Promise<string[]> {
    return [...this.data.keys()].filter((key) => key.startsWith(prefix));
  }

  async close(): Promise<void> {
    for (const value of this.data.values()) {
      zeroBytes(value);
    }
    this.data.clear();
  }
}

// ============================================================
// Backend Factory
// ============================================================

/**
 * Create a storage backend from a URL.
 *
 * Supported schemes:
 * - memory:// - In-memory storage
 *
 * @throws InvalidArgumentError for any other URL
 */
export function createBackend(backendUrl: string): StorageBackend {
  if (backendUrl === 'memory://' || backendUrl === 'memory') {
    return new MemoryBackend();
  }

  let scheme: string;
  try {
    scheme = new URL(backendUrl).protocol;
  } catch {
    throw new InvalidArgumentError('backend', `Invalid backend URL: ${backendUrl}`);
  }
  throw new InvalidArgumentError('backend', `Unsupported backend scheme: ${scheme}`);
}

// ============================================================
// Store Interfaces
// ============================================================

/**
 * Sessions, one per remote device.
 */
export interface SessionStore {
  /** @returns A caller-owned record, or null if none is stored */
  loadSession(address: ProtocolAddress): Promise<SessionRecord | null>;
  storeSession(address: ProtocolAddress, record: SessionRecord): Promise<void>;
  containsSession(address: ProtocolAddress): Promise<boolean>;
  deleteSession(address: ProtocolAddress): Promise<void>;
  /** Delete the sessions of every device of `name`. */
  deleteAllSessions(name: string): Promise<void>;
  /** Device ids of `name` that have a session. */
  getSubDeviceSessions(name: string): Promise<number[]>;
}

/**
 * How a presented identity key relates to the stored one.
 */
export enum IdentityTrustDecision {
  /** No identity stored yet */
  UNTRUSTED = 'untrusted',
  /** Matches the stored identity */
  TRUSTED = 'trusted',
  /** Differs from the stored identity */
  CHANGED = 'changed',
}

export enum Direction {
  SENDING = 'sending',
  RECEIVING = 'receiving',
}

/**
 * Our identity and the identities of remote accounts.
 */
export interface IdentityKeyStore {
  getIdentityKeyPair(): Promise<IdentityKeyPair>;
  getLocalRegistrationId(): Promise<number>;
  /**
   * @returns true if the identity is new or replaced a different one
   */
  saveIdentity(address: ProtocolAddress, identityKey: PublicKey): Promise<boolean>;
  /** @returns A caller-owned key, or null if none is stored */
  getIdentity(address: ProtocolAddress): Promise<PublicKey | null>;
  getTrustDecision(address: ProtocolAddress, identityKey: PublicKey): Promise<IdentityTrustDecision>;
  isTrustedIdentity(address: ProtocolAddress, identityKey: PublicKey, direction: Direction): Promise<boolean>;
}

export interface PreKeyStore {
  loadPreKey(preKeyId: number): Promise<PreKeyRecord | null>;
  storePreKey(preKeyId: number, record: PreKeyRecord): Promise<void>;
  containsPreKey(preKeyId: number): Promise<boolean>;
  removePreKey(preKeyId: number): Promise<void>;
  getAllPreKeyIds(): Promise<number[]>;
}

export interface SignedPreKeyStore {
  loadSignedPreKey(signedPreKeyId: number): Promise<SignedPreKeyRecord | null>;
  storeSignedPreKey(signedPreKeyId: number, record: SignedPreKeyRecord): Promise<void>;
  containsSignedPreKey(signedPreKeyId: number): Promise<boolean>;
  removeSignedPreKey(signedPreKeyId: number): Promise<void>;
  getAllSignedPreKeyIds(): Promise<number[]>;
}

export interface KyberPreKeyStore {
  loadKyberPreKey(kyberPreKeyId: number): Promise<KyberPreKeyRecord | null>;
  storeKyberPreKey(kyberPreKeyId: number, record: KyberPreKeyRecord): Promise<void>;
  containsKyberPreKey(kyberPreKeyId: number): Promise<boolean>;
  /** Record that a one-time Kyber pre-key has been consumed. */
  markKyberPreKeyUsed(kyberPreKeyId: number): Promise<void>;
  isKyberPreKeyUsed(kyberPreKeyId: number): Promise<boolean>;
  removeKyberPreKey(kyberPreKeyId: number): Promise<void>;
  getAllKyberPreKeyIds(): Promise<number[]>;
}

/**
 * Group sender keys, keyed by sender device and distribution id.
 */
export interface SenderKeyStore {
  loadSenderKey(sender: ProtocolAddress, distributionId: string): Promise<SenderKeyRecord | null>;
  storeSenderKey(sender: ProtocolAddress, distributionId: string, record: SenderKeyRecord): Promise<void>;
}

// ============================================================
// Backend-Backed Adapters
// ============================================================

/**
 * Shared plumbing: serialize into the backend, deserialize out of it.
 */
abstract class SerializedStore {
  constructor(
    protected readonly context: NativeContext,
    protected readonly backend: StorageBackend
  ) {}

  protected async put(key: string, data: Uint8Array): Promise<void> {
    try {
      await this.backend.set(key, data);
    } finally {
      zeroBytes(data);
    }
  }

  protected async load<T>(key: string, parse: (data: Uint8Array) => T): Promise<T | null> {
    const data = await this.backend.get(key);
    if (data === null) {
      return null;
    }
    try {
      return parse(data);
    } finally {
      zeroBytes(data);
    }
  }

  /**
   * Numeric ids stored under `prefix`.
   */
  protected async ids(prefix: string): Promise<number[]> {
    const keys = await this.backend.keys(prefix);
    return keys
      .map((key) => key.slice(prefix.length))
      .filter((suffix) => /^\d+$/.test(suffix))
      .map(Number)
      .sort((a, b) => a - b);
  }

  /**
   * Remove every entry this store owns.
   */
  async clear(): Promise<void> {
    for (const key of await this.backend.keys(this.prefix)) {
      await this.backend.delete(key);
    }
  }

  /**
   * Number of entries this store owns.
   */
  async count(): Promise<number> {
    return (await this.backend.keys(this.prefix)).length;
  }

  protected abstract readonly prefix: string;
}

function addressKey(address: ProtocolAddress): string {
  return `${address.name}:${address.deviceId}`;
}

export class InMemorySessionStore extends SerializedStore implements SessionStore {
  protected readonly prefix = 'session:';

  constructor(context: NativeContext, backend: StorageBackend = new MemoryBackend()) {
    super(context, backend);
  }

  async loadSession(address: ProtocolAddress): Promise<SessionRecord | null> {
    return this.load(this.key(address), (data) => SessionRecord.deserialize(this.context, data));
  }

  async storeSession(address: ProtocolAddress, record: SessionRecord): Promise<void> {
    await this.put(this.key(address), record.serialize());
  }

  async containsSession(address: ProtocolAddress): Promise<boolean> {
    return this.backend.exists(this.key(address));
  }

  async deleteSession(address: ProtocolAddress): Promise<void> {
    await this.backend.delete(this.key(address));
  }

  async deleteAllSessions(name: string): Promise<void> {
    const prefix = `${this.prefix}${name}:`;
    for (const deviceId of await this.ids(prefix)) {
      await this.backend.delete(`${prefix}${deviceId}`);
    }
  }

  async getSubDeviceSessions(name: string): Promise<number[]> {
    return this.ids(`${this.prefix}${name}:`);
  }

  private key(address: ProtocolAddress): string {
    return `${this.prefix}${addressKey(address)}`;
  }
}

/**
 * Identity store with a trust-on-first-use policy: an address is trusted
 * until an identity is saved for it, then only that identity is trusted.
 * Remote identities are keyed by account name, shared across devices.
 */
export class InMemoryIdentityKeyStore extends SerializedStore implements IdentityKeyStore {
  protected readonly prefix = 'identity:';

  /**
   * @param identityKeyPair - Our identity; stays owned by the caller
   * @param localRegistrationId - Our registration id
   */
  constructor(
    context: NativeContext,
    private readonly identityKeyPair: IdentityKeyPair,
    private readonly localRegistrationId: number,
    backend: StorageBackend = new MemoryBackend()
  ) {
    super(context, backend);
  }

  async getIdentityKeyPair(): Promise<IdentityKeyPair> {
    return this.identityKeyPair;
  }

  async getLocalRegistrationId(): Promise<number> {
    return this.localRegistrationId;
  }

  async saveIdentity(address: ProtocolAddress, identityKey: PublicKey): Promise<boolean> {
    const decision = await this.getTrustDecision(address, identityKey);
    if (decision === IdentityTrustDecision.TRUSTED) {
      return false;
    }
    await this.backend.set(this.key(address), identityKey.serialize());
    return true;
  }

  async getIdentity(address: ProtocolAddress): Promise<PublicKey | null> {
    return this.load(this.key(address), (data) => PublicKey.deserialize(this.context, data));
  }

  async getTrustDecision(address: ProtocolAddress, identityKey: PublicKey): Promise<IdentityTrustDecision> {
    const stored = await this.backend.get(this.key(address));
    if (stored === null) {
      return IdentityTrustDecision.UNTRUSTED;
    }
    return constantTimeEquals(stored, identityKey.serialize())
      ? IdentityTrustDecision.TRUSTED
      : IdentityTrustDecision.CHANGED;
  }

  async isTrustedIdentity(
    address: ProtocolAddress,
    identityKey: PublicKey,
    _direction: Direction
  ): Promise<boolean> {
    const decision = await this.getTrustDecision(address, identityKey);
    return decision !== IdentityTrustDecision.CHANGED;
  }

  private key(address: ProtocolAddress): string {
    return `${this.prefix}${address.name}`;
  }
}

export class InMemoryPreKeyStore extends SerializedStore implements PreKeyStore {
  protected readonly prefix = 'prekey:';

  constructor(context: NativeContext, backend: StorageBackend = new MemoryBackend()) {
    super(context, backend);
  }

  async loadPreKey(preKeyId: number): Promise<PreKeyRecord | null> {
    return this.load(`${this.prefix}${preKeyId}`, (data) => PreKeyRecord.deserialize(this.context, data));
  }

  async storePreKey(preKeyId: number, record: PreKeyRecord): Promise<void> {
    await this.put(`${this.prefix}${preKeyId}`, record.serialize());
  }

  async containsPreKey(preKeyId: number): Promise<boolean> {
    return this.backend.exists(`${this.prefix}${preKeyId}`);
  }

  async removePreKey(preKeyId: number): Promise<void> {
    await this.backend.delete(`${this.prefix}${preKeyId}`);
  }

  async getAllPreKeyIds(): Promise<number[]> {
    return this.ids(this.prefix);
  }
}

export class InMemorySignedPreKeyStore extends SerializedStore implements SignedPreKeyStore {
  protected readonly prefix = 'signed-prekey:';

  constructor(context: NativeContext, backend: StorageBackend = new MemoryBackend()) {
    super(context, backend);
  }

  async loadSignedPreKey(signedPreKeyId: number): Promise<SignedPreKeyRecord | null> {
    return this.load(`${this.prefix}${signedPreKeyId}`, (data) =>
      SignedPreKeyRecord.deserialize(this.context, data)
    );
  }

  async storeSignedPreKey(signedPreKeyId: number, record: SignedPreKeyRecord): Promise<void> {
    await this.put(`${this.prefix}${signedPreKeyId}`, record.serialize());
  }

  async containsSignedPreKey(signedPreKeyId: number): Promise<boolean> {
    return this.backend.exists(`${this.prefix}${signedPreKeyId}`);
  }

  async removeSignedPreKey(signedPreKeyId: number): Promise<void> {
    await this.backend.delete(`${this.prefix}${signedPreKeyId}`);
  }

  async getAllSignedPreKeyIds(): Promise<number[]> {
    return this.ids(this.prefix);
  }
}

const USED_MARKER = Uint8Array.of(1);

export class InMemoryKyberPreKeyStore extends SerializedStore implements KyberPreKeyStore {
  protected readonly prefix = 'kyber-prekey:';
  private readonly usedPrefix = 'kyber-prekey-used:';

  constructor(context: NativeContext, backend: StorageBackend = new MemoryBackend()) {
    super(context, backend);
  }

  async loadKyberPreKey(kyberPreKeyId: number): Promise<KyberPreKeyRecord | null> {
    return this.load(`${this.prefix}${kyberPreKeyId}`, (data) =>
      KyberPreKeyRecord.deserialize(this.context, data)
    );
  }

  async storeKyberPreKey(kyberPreKeyId: number, record: KyberPreKeyRecord): Promise<void> {
    await this.put(`${this.prefix}${kyberPreKeyId}`, record.serialize());
  }

  async containsKyberPreKey(kyberPreKeyId: number): Promise<boolean> {
    return this.backend.exists(`${this.prefix}${kyberPreKeyId}`);
  }

  async markKyberPreKeyUsed(kyberPreKeyId: number): Promise<void> {
    await this.backend.set(`${this.usedPrefix}${kyberPreKeyId}`, USED_MARKER);
  }

  async isKyberPreKeyUsed(kyberPreKeyId: number): Promise<boolean> {
    return this.backend.exists(`${this.usedPrefix}${kyberPreKeyId}`);
  }

  async removeKyberPreKey(kyberPreKeyId: number): Promise<void> {
    await this.backend.delete(`${this.prefix}${kyberPreKeyId}`);
    await this.backend.delete(`${this.usedPrefix}${kyberPreKeyId}`);
  }

  async getAllKyberPreKeyIds(): Promise<number[]> {
    return this.ids(this.prefix);
  }

  override async clear(): Promise<void> {
    await super.clear();
    for (const key of await this.backend.keys(this.usedPrefix)) {
      await this.backend.delete(key);
    }
  }
}

export class InMemorySenderKeyStore extends SerializedStore implements SenderKeyStore {
  protected readonly prefix = 'sender-key:';

  constructor(context: NativeContext, backend: StorageBackend = new MemoryBackend()) {
    super(context, backend);
  }

  async loadSenderKey(sender: ProtocolAddress, distributionId: string): Promise<SenderKeyRecord | null> {
    return this.load(this.key(sender, distributionId), (data) =>
      SenderKeyRecord.deserialize(this.context, data)
    );
  }

  async storeSenderKey(sender: ProtocolAddress, distributionId: string, record: SenderKeyRecord): Promise<void> {
    await this.put(this.key(sender, distributionId), record.serialize());
  }

  private key(sender: ProtocolAddress, distributionId: string): string {
    return `${this.prefix}${addressKey(sender)}:${distributionId.toLowerCase()}`;
  }
}
