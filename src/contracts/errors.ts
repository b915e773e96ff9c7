export class InvalidRecordError extends Error {
  constructor(readonly path: string, message = 'change path is empty') {
    super(`Invalid change record "${path}": ${message}`)
    this.name = 'InvalidRecordError'
  }
}

/**
 * Raised by a content classifier when a file cannot be classified.
 * The analyzer keeps the record unclassified and moves on.
 */
export class ClassificationUnavailableError extends Error {
  constructor(readonly path: string, readonly reason: string, options?: { cause?: unknown }) {
    super(`Classification unavailable for ${path}: ${reason}`, options)
    this.name = 'ClassificationUnavailableError'
  }
}

export class InvalidWindowError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'InvalidWindowError'
  }
}
