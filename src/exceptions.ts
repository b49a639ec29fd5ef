/**
 * Error taxonomy
 *
 * Every failure raised by the bridge is a SignalError carrying one of a
 * closed set of kinds. Native failures are translated from the engine's
 * numeric error codes at a single point (see NativeContext.check).
 */

/**
 * The closed set of failure kinds.
 */
export enum ErrorKind {
  InvalidArgument = 'InvalidArgument',
  NullPointer = 'NullPointer',
  Serialization = 'Serialization',
  CryptoError = 'CryptoError',
  Disposed = 'Disposed',
  Unsupported = 'Unsupported',
  Native = 'Native',
}

/**
 * Plain-data view of an error, safe to log or send across threads.
 */
export interface ErrorRecord {
  readonly kind: ErrorKind;
  readonly nativeCode?: number;
  readonly context: string;
  readonly message: string;
}

/**
 * Base error class for all bridge errors.
 */
export class SignalError extends Error {
  constructor(
    public readonly kind: ErrorKind,
    message: string,
    public readonly context: string,
    public readonly nativeCode?: number
  ) {
    super(message);
    this.name = 'SignalError';
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toRecord(): ErrorRecord {
    const record: ErrorRecord = {
      kind: this.kind,
      context: this.context,
      message: this.message,
    };
    return this.nativeCode === undefined
      ? record
      : { ...record, nativeCode: this.nativeCode };
  }

  override toString(): string {
    let text = `${this.name}: ${this.message}`;
    if (this.nativeCode !== undefined) {
      text += ` (error code: ${this.nativeCode})`;
    }
    return `${text} [context: ${this.context}]`;
  }
}

/**
 * Raised when an argument is rejected before or by the native engine.
 * Rejections by the engine carry the failing function as their context.
 */
export class InvalidArgumentError extends SignalError {
  constructor(
    public readonly argument: string,
    reason: string,
    nativeCode?: number,
    context = 'argument_validation'
  ) {
    super(ErrorKind.InvalidArgument, `Invalid argument "${argument}": ${reason}`, context, nativeCode);
    this.name = 'InvalidArgumentError';
  }
}

/**
 * Why a serialized buffer was rejected by a validation rule.
 */
export type ValidationReason =
  | 'empty'
  | 'length'
  | 'key-type'
  | 'low-order-point'
  | 'too-short'
  | 'field-tag'
  | 'version'
  | 'wire-type'
  | 'format';

/**
 * Raised when input validation fails.
 */
export class ValidationError extends InvalidArgumentError {
  constructor(
    public readonly field: string,
    public readonly reason: ValidationReason,
    detail: string
  ) {
    super(field, detail);
    this.name = 'ValidationError';
  }
}

/**
 * Raised when the engine reports success but hands back no value.
 */
export class NullPointerError extends SignalError {
  constructor(
    public readonly operation: string,
    nativeCode?: number,
    detail?: string
  ) {
    super(
      ErrorKind.NullPointer,
      `Null pointer returned from native library${detail ? `: ${detail}` : ''}`,
      operation,
      nativeCode
    );
    this.name = 'NullPointerError';
  }
}

/**
 * Raised when serialized data cannot be decoded or encoded.
 */
export class SerializationError extends SignalError {
  constructor(
    public readonly typeName: string,
    reason?: string,
    nativeCode?: number,
    context = 'serialization'
  ) {
    super(
      ErrorKind.Serialization,
      `Failed to serialize/deserialize ${typeName}${reason ? `: ${reason}` : ''}`,
      context,
      nativeCode
    );
    this.name = 'SerializationError';
  }
}

/**
 * Raised when a cryptographic operation fails.
 */
export class CryptoError extends SignalError {
  constructor(
    public readonly operation: string,
    nativeCode?: number,
    detail?: string
  ) {
    super(
      ErrorKind.CryptoError,
      `Cryptographic operation failed: ${operation}${detail ? `: ${detail}` : ''}`,
      operation,
      nativeCode
    );
    this.name = 'CryptoError';
  }
}

/**
 * Raised when an object is used after dispose().
 */
export class DisposedError extends SignalError {
  constructor(public readonly objectType: string) {
    super(ErrorKind.Disposed, `${objectType} has been disposed`, 'disposed');
    this.name = 'DisposedError';
  }
}

/**
 * Raised for operations the platform or engine build cannot perform.
 */
export class UnsupportedError extends SignalError {
  constructor(
    public readonly operation: string,
    reason?: string
  ) {
    super(
      ErrorKind.Unsupported,
      `Unsupported operation: ${operation}${reason ? ` (${reason})` : ''}`,
      operation
    );
    this.name = 'UnsupportedError';
  }
}

/**
 * Raised for engine failures without a more specific kind.
 */
export class NativeError extends SignalError {
  constructor(code: number, operation: string, detail?: string) {
    super(
      ErrorKind.Native,
      `Error in ${operation} (code: ${code})${detail ? `: ${detail}` : ''}`,
      operation,
      code
    );
    this.name = 'NativeError';
  }
}

/**
 * Error codes reported by signal_error_get_type.
 */
export enum NativeErrorCode {
  UnknownError = 1,
  InvalidState = 2,
  InternalError = 3,
  NullParameter = 4,
  InvalidArgument = 5,
  InvalidType = 6,
  InvalidUtf8String = 7,
  Cancelled = 8,
  ProtobufError = 10,
  LegacyCiphertextVersion = 21,
  UnknownCiphertextVersion = 22,
  UnrecognizedMessageVersion = 23,
  InvalidMessage = 30,
  SealedSenderSelfSend = 31,
  InvalidKey = 40,
  InvalidSignature = 41,
  InvalidAttestationData = 42,
  FingerprintVersionMismatch = 51,
  FingerprintParsingError = 52,
  UntrustedIdentity = 60,
  InvalidKeyIdentifier = 70,
  SessionNotFound = 80,
  InvalidRegistrationId = 81,
  InvalidSession = 82,
  InvalidSenderKeySession = 83,
  DuplicatedMessage = 90,
  CallbackError = 100,
  VerificationFailure = 110,
}

/**
 * Build the typed error for a native error code.
 *
 * @param code - Value of signal_error_get_type
 * @param operation - Native function that failed
 * @param detail - Message text, when the context reads it
 */
export function errorFromNativeCode(
  code: number,
  operation: string,
  detail?: string
): SignalError {
  switch (code) {
    case NativeErrorCode.NullParameter:
      return new NullPointerError(operation, code, detail);
    case NativeErrorCode.InvalidArgument:
    case NativeErrorCode.InvalidType:
    case NativeErrorCode.InvalidUtf8String:
      return new InvalidArgumentError(
        operation,
        detail ?? `rejected by engine (code: ${code})`,
        code,
        operation
      );
    case NativeErrorCode.ProtobufError:
    case NativeErrorCode.LegacyCiphertextVersion:
    case NativeErrorCode.UnknownCiphertextVersion:
    case NativeErrorCode.UnrecognizedMessageVersion:
    case NativeErrorCode.InvalidMessage:
      return new SerializationError(operation, detail ?? NativeErrorCode[code], code, operation);
    case NativeErrorCode.InvalidKey:
    case NativeErrorCode.InvalidSignature:
    case NativeErrorCode.InvalidAttestationData:
    case NativeErrorCode.VerificationFailure:
      return new CryptoError(operation, code, detail);
    default:
      return new NativeError(code, operation, detail);
  }
}
