/**
 * Store bridge
 *
 * The engine calls its stores synchronously from inside one native call,
 * while the store interfaces are async. A StoreBridge therefore loads up
 * front everything the engine may ask for, answers the callbacks from
 * those objects and records what the engine writes. The writes reach the
 * async stores in commit(), after the native call has returned.
 *
 * A callback never throws into the engine: its error is kept, the engine
 * is told the callback failed, and call() rethrows the kept error in
 * place of the engine's CallbackError.
 */

import { parse as uuidParse, stringify as uuidStringify, validate as uuidValidate } from 'uuid';
import type { NativeContext } from './context.js';
import {
  errorFromNativeCode,
  InvalidArgumentError,
  NativeErrorCode,
  SignalError,
  UnsupportedError,
} from './exceptions.js';
import { NativeType, NativeTypes } from './ffi/native-types.js';
import type {
  ConstPointer,
  FfiIdentityKeyStore,
  FfiKyberPreKeyStore,
  FfiPreKeyStore,
  FfiSenderKeyStore,
  FfiSessionStore,
  FfiSignedPreKeyStore,
  MutPointer,
  NativeTypeName,
  Out,
} from './ffi/types.js';
import { Disposable, ResourceHandle } from './handle.js';
import { PublicKey } from './keys.js';
import type { Logger } from './logger.js';
import { KyberPreKeyRecord, PreKeyRecord, SignedPreKeyRecord } from './prekeys.js';
import { ProtocolAddress, SessionRecord } from './protocol.js';
import { SenderKeyRecord } from './groups.js';
import { DisposalScope } from './scope.js';
import type {
  Direction,
  IdentityKeyStore,
  KyberPreKeyStore,
  PreKeyStore,
  SenderKeyStore,
  SessionStore,
  SignedPreKeyStore,
} from './store.js';

/** Status a callback returns when it succeeded. */
export const CALLBACK_OK = 0;

/** Status a callback returns to fail the engine call. */
export const CALLBACK_FAILED = -1;

const TRUSTED = 1;
const UNTRUSTED = 0;

function describe(error: unknown): string {
  return error instanceof SignalError ? error.toString() : String(error);
}

export class StoreBridge implements Disposable {
  private readonly scope: DisposalScope;
  private readonly writes = new Map<string, () => Promise<void>>();
  private readonly log: Logger;
  private failure: { error: unknown } | null = null;

  /**
   * @param operation - Native function the callbacks serve, for logging
   */
  constructor(
    private readonly context: NativeContext,
    private readonly operation: string
  ) {
    this.log = context.logger('StoreBridge');
    this.scope = new DisposalScope(this.log);
  }

  /**
   * Run the native call. If a callback failed, its error is thrown instead
   * of the error the engine reported for it.
   */
  call<R>(fn: () => R): R {
    try {
      return fn();
    } catch (error) {
      if (this.failure !== null) {
        throw this.failure.error;
      }
      throw error;
    }
  }

  /**
   * Apply the recorded writes to the stores, in the order the engine made
   * them. A key written twice keeps only its last value.
   */
  async commit(): Promise<void> {
    const writes = [...this.writes.values()];
    this.writes.clear();
    for (const write of writes) {
      await write();
    }
  }

  /** Number of writes waiting for commit(). */
  get pendingWrites(): number {
    return this.writes.size;
  }

  /**
   * Dispose every object loaded for, or copied out of, the engine.
   */
  dispose(): void {
    this.writes.clear();
    this.scope.dispose();
  }

  // ============================================================
  // Stores
  // ============================================================

  async sessions(store: SessionStore, address: ProtocolAddress): Promise<FfiSessionStore> {
    let current = this.hold(await store.loadSession(address));
    return {
      loadSession: (out) =>
        this.guard('loadSession', () => {
          if (current !== null) {
            this.handOver(out, current._handle);
          }
          return CALLBACK_OK;
        }),
      storeSession: (_address, record) =>
        this.guard('storeSession', () => {
          const copy = this.keep(SessionRecord.fromHandle(this.adopt(NativeTypes.SessionRecord, record)));
          current = copy;
          this.record('session', () => store.storeSession(address, copy));
          return CALLBACK_OK;
        }),
    };
  }

  /**
   * @param remote - Device the operation talks to. Without one, identities
   *   the engine saves are dropped and every identity is trusted.
   */
  async identities(store: IdentityKeyStore, remote?: ProtocolAddress): Promise<FfiIdentityKeyStore> {
    const identity = await store.getIdentityKeyPair();
    const registrationId = await store.getLocalRegistrationId();
    const known = remote === undefined ? null : this.hold(await store.getIdentity(remote));

    return {
      getIdentityKeyPair: (out) =>
        this.guard('getIdentityKeyPair', () => {
          this.handOver(out, identity.privateKey._handle);
          return CALLBACK_OK;
        }),
      getLocalRegistrationId: (out) =>
        this.guard('getLocalRegistrationId', () => {
          out[0] = registrationId;
          return CALLBACK_OK;
        }),
      saveIdentity: (_address, key) =>
        this.guard('saveIdentity', () => {
          if (remote === undefined) {
            return CALLBACK_OK;
          }
          const copy = this.keep(PublicKey.fromHandle(this.adopt(NativeTypes.PublicKey, key)));
          this.record('identity', async () => {
            await store.saveIdentity(remote, copy);
          });
          return CALLBACK_OK;
        }),
      getIdentity: (out) =>
        this.guard('getIdentity', () => {
          if (known !== null) {
            this.handOver(out, known._handle);
          }
          return CALLBACK_OK;
        }),
      isTrustedIdentity: (_address, key) =>
        this.guard('isTrustedIdentity', () => {
          if (known === null) {
            return TRUSTED;
          }
          const same = known._handle.use((stored) =>
            this.context.getBoolean('signal_publickey_equals', (out) =>
              this.context.ffi.signal_publickey_equals(out, stored, key)
            )
          );
          return same ? TRUSTED : UNTRUSTED;
        }),
    };
  }

  /**
   * @param id - The one-time pre-key the message names, if any
   */
  async preKeys(store: PreKeyStore, id: number | null): Promise<FfiPreKeyStore> {
    const loaded = id === null ? null : this.hold(await store.loadPreKey(id));
    return {
      loadPreKey: (out, requested) =>
        this.guard('loadPreKey', () => {
          if (loaded !== null && requested === id) {
            this.handOver(out, loaded._handle);
          }
          return CALLBACK_OK;
        }),
      storePreKey: (requested, record) =>
        this.guard('storePreKey', () => {
          const copy = this.keep(PreKeyRecord.fromHandle(this.adopt(NativeTypes.PreKeyRecord, record)));
          this.record(`prekey:${requested}`, () => store.storePreKey(requested, copy));
          return CALLBACK_OK;
        }),
      removePreKey: (requested) =>
        this.guard('removePreKey', () => {
          this.record(`prekey:${requested}`, () => store.removePreKey(requested));
          return CALLBACK_OK;
        }),
    };
  }

  async signedPreKeys(store: SignedPreKeyStore, id: number): Promise<FfiSignedPreKeyStore> {
    const loaded = this.hold(await store.loadSignedPreKey(id));
    return {
      loadSignedPreKey: (out, requested) =>
        this.guard('loadSignedPreKey', () => {
          if (loaded !== null && requested === id) {
            this.handOver(out, loaded._handle);
          }
          return CALLBACK_OK;
        }),
      storeSignedPreKey: (requested, record) =>
        this.guard('storeSignedPreKey', () => {
          const copy = this.keep(
            SignedPreKeyRecord.fromHandle(this.adopt(NativeTypes.SignedPreKeyRecord, record))
          );
          this.record(`signed-prekey:${requested}`, () => store.storeSignedPreKey(requested, copy));
          return CALLBACK_OK;
        }),
    };
  }

  /**
   * Pre-key messages do not expose which Kyber pre-key they used, so every
   * stored one is loaded.
   */
  async kyberPreKeys(store: KyberPreKeyStore): Promise<FfiKyberPreKeyStore> {
    const loaded = new Map<number, KyberPreKeyRecord>();
    for (const id of await store.getAllKyberPreKeyIds()) {
      const record = this.hold(await store.loadKyberPreKey(id));
      if (record !== null) {
        loaded.set(id, record);
      }
    }
    return {
      loadKyberPreKey: (out, requested) =>
        this.guard('loadKyberPreKey', () => {
          const record = loaded.get(requested);
          if (record !== undefined) {
            this.handOver(out, record._handle);
          }
          return CALLBACK_OK;
        }),
      storeKyberPreKey: (requested, record) =>
        this.guard('storeKyberPreKey', () => {
          const copy = this.keep(
            KyberPreKeyRecord.fromHandle(this.adopt(NativeTypes.KyberPreKeyRecord, record))
          );
          this.record(`kyber-prekey:${requested}`, () => store.storeKyberPreKey(requested, copy));
          return CALLBACK_OK;
        }),
      markKyberPreKeyUsed: (requested) =>
        this.guard('markKyberPreKeyUsed', () => {
          this.record(`kyber-used:${requested}`, () => store.markKyberPreKeyUsed(requested));
          return CALLBACK_OK;
        }),
    };
  }

  /**
   * @param distributionId - Lowercase UUID string of the group distribution
   */
  async senderKeys(
    store: SenderKeyStore,
    sender: ProtocolAddress,
    distributionId: string
  ): Promise<FfiSenderKeyStore> {
    let current = this.hold(await store.loadSenderKey(sender, distributionId));
    return {
      loadSenderKey: (out, _sender, requested) =>
        this.guard('loadSenderKey', () => {
          if (current !== null && uuidStringify(requested) === distributionId) {
            this.handOver(out, current._handle);
          }
          return CALLBACK_OK;
        }),
      storeSenderKey: (_sender, requested, record) =>
        this.guard('storeSenderKey', () => {
          const id = uuidStringify(requested);
          const copy = this.keep(SenderKeyRecord.fromHandle(this.adopt(NativeTypes.SenderKeyRecord, record)));
          if (id === distributionId) {
            current = copy;
          }
          this.record(`sender-key:${id}`, () => store.storeSenderKey(sender, id, copy));
          return CALLBACK_OK;
        }),
    };
  }

  // ============================================================
  // Plumbing
  // ============================================================

  private guard(callback: string, fn: () => number): number {
    try {
      return fn();
    } catch (error) {
      if (this.failure === null) {
        this.failure = { error };
      }
      this.log.debug(`${this.operation}: ${callback} failed: ${describe(error)}`);
      return CALLBACK_FAILED;
    }
  }

  private record(key: string, write: () => Promise<void>): void {
    this.writes.delete(key);
    this.writes.set(key, write);
  }

  private keep<T extends Disposable>(resource: T): T {
    return this.scope.track(resource);
  }

  private hold<T extends Disposable>(resource: T | null): T | null {
    return resource === null ? null : this.keep(resource);
  }

  /**
   * Write an engine-owned copy of `handle` into a callback's out-parameter.
   */
  private handOver<T extends NativeTypeName>(out: Out<MutPointer<T>>, handle: ResourceHandle<T>): void {
    const clone = this.cloneOf(handle.type);
    handle.use((pointer) =>
      this.context.check(`${handle.type.name}.clone`, clone(this.context.ffi, out, pointer))
    );
  }

  /**
   * Take our own copy of an object the engine lends to a callback.
   */
  private adopt<T extends NativeTypeName>(type: NativeType<T>, pointer: ConstPointer<T>): ResourceHandle<T> {
    const clone = this.cloneOf(type);
    return this.context.create(type, `${type.name}.clone`, (out) => clone(this.context.ffi, out, pointer));
  }

  private cloneOf<T extends NativeTypeName>(type: NativeType<T>): NonNullable<NativeType<T>['clone']> {
    if (type.clone === undefined) {
      throw new UnsupportedError(`${type.name}.clone`, 'not provided by the native engine');
    }
    return type.clone;
  }
}

function isDisposable(value: unknown): value is Disposable {
  return typeof value === 'object' && value !== null && 'dispose' in value && typeof value.dispose === 'function';
}

/**
 * Run `fn` with a fresh bridge, then commit what the engine wrote. A
 * disposable result is disposed if the commit fails.
 */
export async function withStoreBridge<R>(
  context: NativeContext,
  operation: string,
  fn: (bridge: StoreBridge) => Promise<R>
): Promise<R> {
  const bridge = new StoreBridge(context, operation);
  try {
    const result = await fn(bridge);
    try {
      await bridge.commit();
    } catch (error) {
      if (isDisposable(result)) {
        result.dispose();
      }
      throw error;
    }
    return result;
  } finally {
    bridge.dispose();
  }
}

/**
 * Ask the async store whether `key` may be used for `address`.
 * @throws NativeError with code UntrustedIdentity when it may not
 */
export async function requireTrustedIdentity(
  store: IdentityKeyStore,
  address: ProtocolAddress,
  key: PublicKey,
  direction: Direction,
  operation: string
): Promise<void> {
  if (!(await store.isTrustedIdentity(address, key, direction))) {
    throw errorFromNativeCode(
      NativeErrorCode.UntrustedIdentity,
      operation,
      `untrusted identity for ${address.toString()}`
    );
  }
}

/**
 * 16 bytes of a distribution id given as a UUID string.
 * @throws InvalidArgumentError for anything but a UUID
 */
export function distributionIdBytes(distributionId: string): Uint8Array {
  if (!uuidValidate(distributionId)) {
    throw new InvalidArgumentError('distributionId', `Not a UUID: ${distributionId}`);
  }
  return Uint8Array.from(uuidParse(distributionId));
}
