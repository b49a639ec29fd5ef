/**
 * Resource handles
 *
 * A ResourceHandle owns exactly one native object. It is live until the
 * first dispose(), after which every use fails with DisposedError and the
 * native destructor has run exactly once. A handle that is never disposed
 * is destroyed by the context's GC backstop instead.
 */

import type { NativeContext, Releasable } from './context.js';
import { DisposedError, UnsupportedError } from './exceptions.js';
import type { NativeType } from './ffi/native-types.js';
import type {
  ConstPointer,
  FfiError,
  MutPointer,
  NativePointer,
  NativeTypeName,
  Out,
  OwnedBuffer,
  SignalFfi,
  Uuid,
} from './ffi/types.js';
import type { SecureBuffer } from './memory.js';

/**
 * Anything with an explicit, idempotent release.
 */
export interface Disposable {
  dispose(): void;
}

/**
 * Holds the pointer on behalf of a handle. The GC backstop keeps the cell
 * alive, never the handle, so the handle stays collectable.
 */
class NativeCell<T extends NativeTypeName> implements Releasable {
  private pointer: NativePointer<T> | null;

  constructor(
    private readonly context: NativeContext,
    private readonly type: NativeType<T>,
    pointer: NativePointer<T>
  ) {
    this.pointer = pointer;
  }

  get current(): NativePointer<T> | null {
    return this.pointer;
  }

  release(leaked: boolean): void {
    const pointer = this.pointer;
    if (pointer === null) {
      return;
    }
    this.pointer = null;

    if (!leaked) {
      this.context.destroy(this.type, pointer);
      return;
    }

    this.context
      .logger('ResourceHandle')
      .warn(`${this.type.name} was never disposed; destroyed by garbage collector`);
    try {
      this.context.destroy(this.type, pointer);
    } catch (error) {
      // No caller to throw to from a finalizer.
      this.context.reportReleaseFailure(this.type.name, error);
    }
  }
}

export class ResourceHandle<T extends NativeTypeName> implements Disposable {
  private readonly cell: NativeCell<T>;

  /**
   * Take ownership of a freshly returned native object.
   */
  constructor(
    public readonly context: NativeContext,
    public readonly type: NativeType<T>,
    pointer: NativePointer<T>
  ) {
    this.cell = new NativeCell(context, type, pointer);
    context.finalizers.register(this, this.cell, this);
  }

  get disposed(): boolean {
    return this.cell.current === null;
  }

  /**
   * Lend the pointer to one native call.
   * @throws DisposedError after dispose()
   */
  use<R>(fn: (pointer: ConstPointer<T>) => R): R {
    const raw = this.cell.current;
    if (raw === null) {
      throw new DisposedError(this.type.name);
    }
    return fn({ raw });
  }

  /**
   * Destroy the native object. Later calls do nothing.
   */
  dispose(): void {
    if (this.disposed) {
      return;
    }
    // Unregister first so a queued finalizer finds nothing to release.
    this.context.finalizers.unregister(this);
    this.cell.release(false);
  }

  /**
   * Ask the engine for an independent copy.
   * @throws UnsupportedError for types without a native clone
   */
  clone(): ResourceHandle<T> {
    const clone = this.type.clone;
    if (clone === undefined) {
      throw new UnsupportedError(`${this.type.name}.clone`, 'not provided by the native engine');
    }
    return this.use((pointer) =>
      this.context.create(this.type, `${this.type.name}.clone`, (out) =>
        clone(this.context.ffi, out, pointer)
      )
    );
  }
}

type Call<T extends NativeTypeName, V> = (
  ffi: SignalFfi,
  out: Out<V>,
  self: ConstPointer<T>
) => FfiError | null;

/**
 * Base for wrappers holding a single handle.
 *
 * The protected read helpers lend the handle to one native call and
 * unmarshal its out-parameter.
 */
export abstract class NativeObject<T extends NativeTypeName> implements Disposable {
  /** @internal */
  readonly _handle: ResourceHandle<T>;

  protected constructor(handle: ResourceHandle<T>) {
    this._handle = handle;
  }

  protected get context(): NativeContext {
    return this._handle.context;
  }

  get isDisposed(): boolean {
    return this._handle.disposed;
  }

  dispose(): void {
    this._handle.dispose();
  }

  protected readBytes(operation: string, call: Call<T, OwnedBuffer>): Uint8Array {
    return this._handle.use((self) =>
      this.context.takeBuffer(operation, (out) => call(this.context.ffi, out, self))
    );
  }

  protected readSecret(operation: string, call: Call<T, OwnedBuffer>): SecureBuffer {
    return this._handle.use((self) =>
      this.context.takeSecret(operation, (out) => call(this.context.ffi, out, self))
    );
  }

  protected readNumber(operation: string, call: Call<T, number>): number {
    return this._handle.use((self) =>
      this.context.getNumber(operation, (out) => call(this.context.ffi, out, self))
    );
  }

  protected readU64(operation: string, call: Call<T, number | bigint>): number {
    return this._handle.use((self) =>
      this.context.getU64(operation, (out) => call(this.context.ffi, out, self))
    );
  }

  protected readBoolean(operation: string, call: Call<T, boolean>): boolean {
    return this._handle.use((self) =>
      this.context.getBoolean(operation, (out) => call(this.context.ffi, out, self))
    );
  }

  protected readString(operation: string, call: Call<T, string>): string {
    return this._handle.use((self) =>
      this.context.getString(operation, (out) => call(this.context.ffi, out, self))
    );
  }

  protected readOptionalString(operation: string, call: Call<T, string>): string | null {
    return this._handle.use((self) =>
      this.context.getOptionalString(operation, (out) => call(this.context.ffi, out, self))
    );
  }

  protected readUuid(operation: string, call: Call<T, Uuid>): Uint8Array {
    return this._handle.use((self) =>
      this.context.getUuid(operation, (out) => call(this.context.ffi, out, self))
    );
  }

  protected readChild<C extends NativeTypeName>(
    type: NativeType<C>,
    operation: string,
    call: Call<T, MutPointer<C>>
  ): ResourceHandle<C> {
    return this._handle.use((self) =>
      this.context.create(type, operation, (out) => call(this.context.ffi, out, self))
    );
  }

  protected readOptionalChild<C extends NativeTypeName>(
    type: NativeType<C>,
    operation: string,
    call: Call<T, MutPointer<C>>
  ): ResourceHandle<C> | null {
    return this._handle.use((self) =>
      this.context.createOptional(type, operation, (out) => call(this.context.ffi, out, self))
    );
  }
}
