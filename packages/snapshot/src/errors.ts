/**
 * Snapshot Error Types
 */

export type SnapshotErrorKind = 'InvalidSnapshot' | 'WrongFileExtension'

/**
 * Base error for snapshot encoding and decoding.
 */
export class SnapshotError extends Error {
  public override readonly cause?: Error

  constructor(
    message: string,
    public readonly kind: SnapshotErrorKind,
    cause?: Error,
  ) {
    super(message)
    this.name = 'SnapshotError'
    this.cause = cause
  }
}

/**
 * Error when data is not a graph snapshot.
 */
export class InvalidSnapshotError extends SnapshotError {
  constructor(
    message: string,
    public readonly path: Array<string | number> = [],
    cause?: Error,
  ) {
    const location = path.length > 0 ? ` at ${path.join('.')}` : ''
    super(`Invalid snapshot${location}: ${message}`, 'InvalidSnapshot', cause)
    this.name = 'InvalidSnapshotError'
  }
}

/**
 * Error when a snapshot file does not end in .json.
 */
export class WrongFileExtensionError extends SnapshotError {
  constructor(public readonly filePath: string) {
    super(`Wrong file extension: '${filePath}' must end in .json`, 'WrongFileExtension')
    this.name = 'WrongFileExtensionError'
  }
}
