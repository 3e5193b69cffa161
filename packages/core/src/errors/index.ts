/**
 * Custom Error Classes
 */

/**
 * Base error class for all pack-merger errors
 */
export class PackMergeError extends Error {
  public readonly code: string;
  public readonly exitCode: number;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    exitCode: number = 1,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'PackMergeError';
    this.code = code;
    this.exitCode = exitCode;
    this.details = details;

    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Validation error for invalid options
 */
export class ValidationError extends PackMergeError {
  constructor(field: string, message: string) {
    super(
      `Validation failed for ${field}: ${message}`,
      'VALIDATION_ERROR',
      1,
      { field, message }
    );
    this.name = 'ValidationError';
  }
}

/**
 * One or more explicitly named inputs do not exist
 */
export class PackNotFoundError extends PackMergeError {
  public readonly missing: readonly string[];

  constructor(missing: string[]) {
    super(
      `Pack paths do not exist: ${missing.join(', ')}`,
      'PACK_NOT_FOUND',
      2,
      { missing }
    );
    this.name = 'PackNotFoundError';
    this.missing = [...missing];
  }
}

/**
 * Nothing to merge
 */
export class NoPackagesError extends PackMergeError {
  constructor(message = 'No packs provided and none autodetected') {
    super(message, 'NO_PACKAGES', 2);
    this.name = 'NoPackagesError';
  }
}

/**
 * Archive could not be expanded
 */
export class ArchiveError extends PackMergeError {
  constructor(archivePath: string, reason: string) {
    super(
      `Failed to extract ${archivePath}: ${reason}`,
      'ARCHIVE_ERROR',
      1,
      { archivePath, reason }
    );
    this.name = 'ArchiveError';
  }
}

/**
 * A single payload file failed to merge
 */
export class MergeFileError extends PackMergeError {
  constructor(relativePath: string, packName: string, cause: Error) {
    super(
      `Failed to merge ${relativePath} from ${packName}: ${cause.message}`,
      'MERGE_FILE_ERROR',
      1,
      { relativePath, packName }
    );
    this.name = 'MergeFileError';
  }
}

/**
 * The merged descriptor or icon could not be written
 */
export class MetadataWriteError extends PackMergeError {
  constructor(relativePath: string, cause: Error) {
    super(
      `Failed to write ${relativePath}: ${cause.message}`,
      'METADATA_WRITE_ERROR',
      1,
      { relativePath }
    );
    this.name = 'MetadataWriteError';
  }
}
