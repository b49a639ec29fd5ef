/**
 * Native context
 *
 * Owns a loaded engine and everything a call across the boundary needs:
 * error translation, buffer marshalling, logging and the GC backstop.
 * Every wrapper is created against one context, passed explicitly.
 */

import {
  DisposedError,
  InvalidArgumentError,
  NativeError,
  NativeErrorCode,
  NullPointerError,
  SignalError,
  errorFromNativeCode,
} from './exceptions.js';
import { loadLibrary, LoadLibraryOptions } from './ffi/library.js';
import type { NativeType } from './ffi/native-types.js';
import type {
  BorrowedBuffer,
  FfiError,
  MutPointer,
  NativeLibrary,
  NativePointer,
  NativeTypeName,
  Out,
  OwnedBuffer,
  SignalFfi,
  Uuid,
} from './ffi/types.js';
import { ResourceHandle } from './handle.js';
import { createLogger, Logger, LogLevel, LogSink } from './logger.js';
import { SecureBuffer, zeroBytes } from './memory.js';

/** Largest input buffer handed to the engine by default (10 MiB). */
export const DEFAULT_MAX_BUFFER_SIZE = 10 * 1024 * 1024;

/**
 * Something the GC backstop can release. Must not reference the object
 * whose collection triggers it.
 */
export interface Releasable {
  release(leaked: boolean): void;
}

/**
 * GC backstop used by resource handles.
 */
export interface FinalizerRegistry {
  register(target: object, cell: Releasable, token: object): void;
  unregister(token: object): void;
}

/**
 * Backstop built on FinalizationRegistry.
 */
export class GcFinalizers implements FinalizerRegistry {
  private readonly registry = new FinalizationRegistry<Releasable>((cell) => {
    cell.release(true);
  });

  register(target: object, cell: Releasable, token: object): void {
    this.registry.register(target, cell, token);
  }

  unregister(token: object): void {
    this.registry.unregister(token);
  }
}

export interface NativeContextOptions {
  /** Receives (level, target, message); defaults to the console */
  logger?: LogSink;
  /** Most verbose level forwarded to the sink */
  logLevel?: LogLevel;
  /** Read the engine's message text for failed calls */
  errorMessages?: boolean;
  /** GC backstop for handles created by this context */
  finalizers?: FinalizerRegistry;
  /** Largest input buffer accepted, in bytes */
  maxBufferSize?: number;
}

/**
 * Explicit handle on a loaded native engine.
 *
 * @example
 * ```typescript
 * const context = NativeContext.load({ logLevel: LogLevel.Info });
 * const key = PrivateKey.generate(context);
 * const signature = key.sign(new TextEncoder().encode('hello'));
 * key.dispose();
 * ```
 */
export class NativeContext {
  public readonly finalizers: FinalizerRegistry;
  public readonly errorMessages: boolean;
  public readonly maxBufferSize: number;
  private readonly sink: LogSink | undefined;
  private readonly logLevel: LogLevel;
  private readonly log: Logger;
  private library: NativeLibrary | null;

  constructor(library: NativeLibrary, options: NativeContextOptions = {}) {
    this.library = library;
    this.finalizers = options.finalizers ?? new GcFinalizers();
    this.errorMessages = options.errorMessages ?? false;
    this.maxBufferSize = options.maxBufferSize ?? DEFAULT_MAX_BUFFER_SIZE;
    this.sink = options.logger;
    this.logLevel = options.logLevel ?? LogLevel.Warn;
    this.log = this.logger('NativeContext');
  }

  /**
   * Load the engine and wrap it in a context.
   */
  static load(options: NativeContextOptions & LoadLibraryOptions = {}): NativeContext {
    const context = new NativeContext(loadLibrary(options), options);
    context.log.info('native library loaded');
    return context;
  }

  /**
   * Logger for one component, sharing this context's sink and level.
   */
  logger(target: string): Logger {
    return createLogger(target, this.sink, this.logLevel);
  }

  get isClosed(): boolean {
    return this.library === null;
  }

  /**
   * Native symbols.
   * @throws DisposedError once the context is closed
   */
  get ffi(): SignalFfi {
    return this.loaded().symbols;
  }

  /**
   * Unload the engine. Live handles are not destroyed.
   */
  close(): void {
    if (this.library === null) {
      return;
    }
    const library = this.library;
    this.library = null;
    library.close();
    this.log.info('native library closed');
  }

  private loaded(): NativeLibrary {
    if (this.library === null) {
      throw new DisposedError('NativeContext');
    }
    return this.library;
  }

  // ============================================================
  // Error translation
  // ============================================================

  /**
   * Translate a native error pointer. Reads the code (and message, if
   * enabled), frees the error exactly once, then throws.
   *
   * @param operation - Native function that produced `error`
   */
  check(operation: string, error: FfiError | null): void {
    if (error === null) {
      return;
    }
    const ffi = this.ffi;
    let code = 0;
    let detail: string | undefined;
    try {
      code = ffi.signal_error_get_type(error);
      if (this.errorMessages) {
        detail = this.readErrorMessage(ffi, error);
      }
    } finally {
      ffi.signal_error_free(error);
    }
    const translated = errorFromNativeCode(code, operation, detail);
    this.log.debug(`${operation} failed: ${translated.toString()}`);
    throw translated;
  }

  private readErrorMessage(ffi: SignalFfi, error: FfiError): string | undefined {
    const out: Out<string> = [null];
    const nested = ffi.signal_error_get_message(out, error);
    if (nested !== null) {
      ffi.signal_error_free(nested);
      return undefined;
    }
    return out[0] ?? undefined;
  }

  // ============================================================
  // Input buffers
  // ============================================================

  /**
   * Describe caller-owned bytes for one call.
   * @throws InvalidArgumentError when `data` exceeds maxBufferSize
   */
  borrow(data: Uint8Array, argument = 'data'): BorrowedBuffer {
    if (data.length > this.maxBufferSize) {
      throw new InvalidArgumentError(
        argument,
        `Buffer too large: ${data.length} bytes exceeds limit of ${this.maxBufferSize}`
      );
    }
    return { base: data.length > 0 ? data : null, length: data.length };
  }

  /**
   * Hand secret bytes to one call through a scratch copy that is zeroed on
   * every exit path.
   */
  withSecretCopy<R>(data: Uint8Array, fn: (buffer: BorrowedBuffer) => R, argument = 'data'): R {
    const scratch = Uint8Array.from(data);
    try {
      return fn(this.borrow(scratch, argument));
    } finally {
      zeroBytes(scratch);
    }
  }

  // ============================================================
  // Results
  // ============================================================

  /**
   * Call a function returning an engine-owned buffer; copy it out and free
   * the engine's copy exactly once.
   */
  takeBuffer(operation: string, call: (out: Out<OwnedBuffer>) => FfiError | null): Uint8Array {
    const out: Out<OwnedBuffer> = [null];
    this.check(operation, call(out));
    const owned = out[0];
    if (owned === null || owned.base === null) {
      return new Uint8Array(0);
    }
    const library = this.loaded();
    try {
      return owned.length === 0 ? new Uint8Array(0) : library.copyBuffer(owned.base, owned.length);
    } finally {
      library.symbols.signal_free_buffer(owned.base, owned.length);
    }
  }

  /**
   * As takeBuffer, for secret results.
   */
  takeSecret(operation: string, call: (out: Out<OwnedBuffer>) => FfiError | null): SecureBuffer {
    return new SecureBuffer(this.takeBuffer(operation, call));
  }

  /**
   * Call a function with a scalar out-parameter.
   * @throws NullPointerError when the call succeeds without writing a value
   */
  getValue<V extends number | bigint | boolean>(
    operation: string,
    call: (out: Out<V>) => FfiError | null
  ): V {
    const out: Out<V> = [null];
    this.check(operation, call(out));
    const value = out[0];
    if (value === null) {
      throw new NullPointerError(operation);
    }
    return value;
  }

  getBoolean(operation: string, call: (out: Out<boolean>) => FfiError | null): boolean {
    return this.getValue(operation, call);
  }

  getNumber(operation: string, call: (out: Out<number>) => FfiError | null): number {
    return this.getValue(operation, call);
  }

  /**
   * Call a function with a 64-bit out-parameter, as a number.
   * @throws NativeError when the value does not fit in a safe integer
   */
  getU64(operation: string, call: (out: Out<number | bigint>) => FfiError | null): number {
    const value = this.getValue(operation, call);
    const result = Number(value);
    if (!Number.isSafeInteger(result) || BigInt(result) !== BigInt(value)) {
      throw new NativeError(
        NativeErrorCode.InvalidState,
        operation,
        `64-bit value ${value} exceeds the safe integer range`
      );
    }
    return result;
  }

  /**
   * Call a function returning a string, or null when the engine writes none.
   */
  getOptionalString(operation: string, call: (out: Out<string>) => FfiError | null): string | null {
    const out: Out<string> = [null];
    this.check(operation, call(out));
    return out[0];
  }

  /**
   * Call a function returning a string.
   * @throws NullPointerError when the engine writes none
   */
  getString(operation: string, call: (out: Out<string>) => FfiError | null): string {
    const value = this.getOptionalString(operation, call);
    if (value === null) {
      throw new NullPointerError(operation);
    }
    return value;
  }

  /**
   * Call a function returning a 16-byte UUID.
   */
  getUuid(operation: string, call: (out: Out<Uuid>) => FfiError | null): Uint8Array {
    const out: Out<Uuid> = [null];
    this.check(operation, call(out));
    const uuid = out[0];
    if (uuid === null || uuid.bytes.length !== 16) {
      throw new NullPointerError(operation);
    }
    return Uint8Array.from(uuid.bytes);
  }

  // ============================================================
  // Handles
  // ============================================================

  /**
   * Call a constructor and take ownership of the object it returns.
   * @throws NullPointerError when the call succeeds without an object
   */
  create<T extends NativeTypeName>(
    type: NativeType<T>,
    operation: string,
    call: (out: Out<MutPointer<T>>) => FfiError | null
  ): ResourceHandle<T> {
    const handle = this.createOptional(type, operation, call);
    if (handle === null) {
      throw new NullPointerError(operation);
    }
    return handle;
  }

  /**
   * As create, for accessors whose result may be absent.
   */
  createOptional<T extends NativeTypeName>(
    type: NativeType<T>,
    operation: string,
    call: (out: Out<MutPointer<T>>) => FfiError | null
  ): ResourceHandle<T> | null {
    const out: Out<MutPointer<T>> = [null];
    this.check(operation, call(out));
    const raw = out[0]?.raw ?? null;
    return raw === null ? null : new ResourceHandle(this, type, raw);
  }

  /**
   * Run a native destructor. Failures are logged; a destructor error is
   * freed like any other.
   */
  destroy<T extends NativeTypeName>(type: NativeType<T>, pointer: NativePointer<T>): void {
    const ffi = this.ffi;
    const error = type.destroy(ffi, { raw: pointer });
    if (error === null) {
      return;
    }
    let code = 0;
    try {
      code = ffi.signal_error_get_type(error);
    } finally {
      ffi.signal_error_free(error);
    }
    this.log.error(`${type.name} destroy failed (error code: ${code})`);
  }

  /**
   * Report an error raised while releasing a handle outside any caller.
   */
  reportReleaseFailure(typeName: string, error: unknown): void {
    const text = error instanceof SignalError ? error.toString() : String(error);
    this.log.error(`failed to release ${typeName}: ${text}`);
  }
}
