/**
 * Error taxonomy of the transfer pipeline.
 *
 * Authentication and user lookup failures end the run; everything raised while
 * moving a single recording is caught by TransferService and recorded against
 * that recording only.
 */

export class TransferPipelineError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransferPipelineError';
    this.code = code;
    this.details = details;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class AuthenticationError extends TransferPipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'AUTHENTICATION_ERROR', undefined, options);
    this.name = 'AuthenticationError';
  }
}

export class UserNotFoundError extends TransferPipelineError {
  constructor(public readonly email: string) {
    super(`User with email ${email} not found`, 'USER_NOT_FOUND', { email });
    this.name = 'UserNotFoundError';
  }
}

export type TransferStage = 'download' | 'upload' | 'metadata';

export class TransferError extends TransferPipelineError {
  constructor(
    public readonly stage: TransferStage,
    message: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, 'TRANSFER_ERROR', { stage, ...details }, options);
    this.name = 'TransferError';
  }
}

export class IncompleteTransferError extends TransferError {
  constructor(
    public readonly path: string,
    public readonly expectedBytes: number,
    public readonly receivedBytes: number,
  ) {
    super('download', `Download incomplete for ${path}: received ${receivedBytes} of ${expectedBytes} bytes`, {
      path,
      expectedBytes,
      receivedBytes,
    });
    this.name = 'IncompleteTransferError';
  }
}

export class MetadataNotFoundError extends TransferPipelineError {
  constructor(remotePath: string, reason: string) {
    super(`No file id for ${remotePath}: ${reason}`, 'METADATA_NOT_FOUND', { remotePath });
    this.name = 'MetadataNotFoundError';
  }
}

export class NotificationDeliveryError extends TransferPipelineError {
  constructor(fileName: string, reason: string, options?: { cause?: unknown }) {
    super(`Slack notification for ${fileName} failed: ${reason}`, 'NOTIFICATION_DELIVERY_ERROR', { fileName }, options);
    this.name = 'NotificationDeliveryError';
  }
}

export class CleanupError extends TransferPipelineError {
  constructor(entry: string, reason: string, options?: { cause?: unknown }) {
    super(`Could not remove ${entry}: ${reason}`, 'CLEANUP_ERROR', { entry }, options);
    this.name = 'CleanupError';
  }
}

export class RemoteConfigurationError extends TransferPipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'REMOTE_CONFIGURATION_ERROR', undefined, options);
    this.name = 'RemoteConfigurationError';
  }
}

export class StateTransitionError extends TransferPipelineError {
  constructor(recording: string, from: string, to: string) {
    super(`Invalid state transition from ${from} to ${to} for "${recording}"`, 'STATE_TRANSITION_ERROR', {
      recording,
      from,
      to,
    });
    this.name = 'StateTransitionError';
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
