/**
 * Disposal scopes
 *
 * A DisposalScope collects resources and cleanup callbacks and releases
 * them in reverse order of registration when the scope ends, whether the
 * body returned, threw or rejected.
 *
 * @example
 * ```typescript
 * const signature = withDisposalScope((scope) => {
 *   const key = scope.track(PrivateKey.generate(context));
 *   return key.sign(message);
 * });
 * // key is disposed here
 * ```
 */

import { DisposedError, SignalError } from './exceptions.js';
import type { Disposable } from './handle.js';
import { createLogger, Logger } from './logger.js';

function describe(error: unknown): string {
  return error instanceof SignalError ? error.toString() : String(error);
}

export class DisposalScope implements Disposable {
  private readonly cleanups: Array<() => void> = [];
  private closed = false;

  constructor(private readonly log: Logger = createLogger('DisposalScope')) {}

  get isDisposed(): boolean {
    return this.closed;
  }

  /**
   * Dispose `resource` when the scope ends.
   *
   * @returns The same resource
   * @throws DisposedError if the scope has already ended; the resource is
   *   disposed before the error is raised
   */
  track<T extends Disposable>(resource: T): T {
    if (this.closed) {
      resource.dispose();
      throw new DisposedError('DisposalScope');
    }
    this.cleanups.push(() => resource.dispose());
    return resource;
  }

  /**
   * Run `callback` when the scope ends.
   * @throws DisposedError if the scope has already ended
   */
  onCleanup(callback: () => void): void {
    if (this.closed) {
      throw new DisposedError('DisposalScope');
    }
    this.cleanups.push(callback);
  }

  /**
   * Run every cleanup, most recent first. All cleanups run even when some
   * fail; the first failure is then rethrown.
   */
  dispose(): void {
    const errors = this.release();
    if (errors.length > 0) {
      throw errors[0];
    }
  }

  /**
   * Run every cleanup and return the failures, each already logged.
   * @internal
   */
  release(): unknown[] {
    if (this.closed) {
      return [];
    }
    this.closed = true;

    const errors: unknown[] = [];
    while (this.cleanups.length > 0) {
      const cleanup = this.cleanups.pop();
      if (cleanup === undefined) {
        break;
      }
      try {
        cleanup();
      } catch (error) {
        this.log.error(`cleanup failed: ${describe(error)}`);
        errors.push(error);
      }
    }
    return errors;
  }
}

/**
 * Run `fn` with a fresh scope and end the scope when `fn` settles.
 *
 * If `fn` fails, its error is rethrown and cleanup failures are only
 * logged. If `fn` succeeds and a cleanup fails, the first cleanup error is
 * thrown instead of the result.
 */
export function withDisposalScope<T>(fn: (scope: DisposalScope) => Promise<T>, logger?: Logger): Promise<T>;
export function withDisposalScope<T>(fn: (scope: DisposalScope) => T, logger?: Logger): T;
export function withDisposalScope<T>(
  fn: (scope: DisposalScope) => T | Promise<T>,
  logger?: Logger
): T | Promise<T> {
  const scope = new DisposalScope(logger);
  let result: T | Promise<T>;
  try {
    result = fn(scope);
  } catch (error) {
    scope.release();
    throw error;
  }

  if (result instanceof Promise) {
    return result.then(
      (value) => {
        scope.dispose();
        return value;
      },
      (error: unknown) => {
        scope.release();
        throw error;
      }
    );
  }

  scope.dispose();
  return result;
}
