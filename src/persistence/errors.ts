export class StorageError extends Error {
  constructor(
    message: string,
    readonly filePath: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "StorageError";
  }
}

/** The document exists but cannot be read as a portfolio. It is never rewritten. */
export class CorruptDocumentError extends StorageError {
  constructor(message: string, filePath: string, options?: { cause?: unknown }) {
    super(message, filePath, options);
    this.name = "CorruptDocumentError";
  }
}

export default StorageError;
