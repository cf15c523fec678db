import { formatMegabytes } from './policy.js';

export type ValidationReason = 'unsupported_type' | 'too_large' | 'empty';

export class PhotoValidationError extends Error {
  public readonly reason: ValidationReason;
  public readonly details: Record<string, unknown>;

  constructor(reason: ValidationReason, message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = 'PhotoValidationError';
    this.reason = reason;
    this.details = details;
  }

  static tooLarge(maxFileSizeBytes: number, sizeBytes?: number): PhotoValidationError {
    return new PhotoValidationError(
      'too_large',
      `File too large. Maximum size: ${formatMegabytes(maxFileSizeBytes)}`,
      { maxFileSizeBytes, ...(sizeBytes !== undefined ? { sizeBytes } : {}) }
    );
  }
}

export class NamingExhaustedError extends Error {
  public readonly attempts: number;

  constructor(attempts: number) {
    super(`Could not find a free storage key after ${attempts} attempts`);
    this.name = 'NamingExhaustedError';
    this.attempts = attempts;
  }
}

export type UploadStage = 'received' | 'validated' | 'key_assigned' | 'payload_stored' | 'metadata_stored' | 'complete';

export type UploadFailureStage = 'key_assignment' | 'payload_store' | 'metadata_store';

export class UploadFailure extends Error {
  public readonly stage: UploadFailureStage;
  public readonly key: string | null;
  /** True when the payload could not be removed after a metadata failure. */
  public readonly orphaned: boolean;

  constructor(params: { stage: UploadFailureStage; cause: unknown; key?: string | null; orphaned?: boolean }) {
    const causeMessage = params.cause instanceof Error ? params.cause.message : String(params.cause);
    super(`Upload failed at ${params.stage}: ${causeMessage}`, { cause: params.cause });
    this.name = 'UploadFailure';
    this.stage = params.stage;
    this.key = params.key ?? null;
    this.orphaned = params.orphaned ?? false;
  }
}

export class PhotoNotFoundError extends Error {
  constructor(public readonly key: string) {
    super(`Photo not found: ${key}`);
    this.name = 'PhotoNotFoundError';
  }
}

/** The record exists but its payload is gone (deleted concurrently or lost). */
export class PhotoUnavailableError extends Error {
  constructor(public readonly key: string) {
    super(`Photo no longer available: ${key}`);
    this.name = 'PhotoUnavailableError';
  }
}

export class PartialDeleteError extends Error {
  public readonly key: string;
  public readonly metadataDeleted: boolean;
  public readonly payloadDeleted: boolean;

  constructor(params: { key: string; metadataDeleted: boolean; payloadDeleted: boolean; cause: unknown }) {
    super(`Photo ${params.key} was only partially deleted`, { cause: params.cause });
    this.name = 'PartialDeleteError';
    this.key = params.key;
    this.metadataDeleted = params.metadataDeleted;
    this.payloadDeleted = params.payloadDeleted;
  }
}
