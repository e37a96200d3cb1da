import { SDKError } from "./base.js";

export interface FileErrorDetails {
  /** Path or file name of the rejected upload */
  path?: string;
  /** Size in bytes, when it was known */
  size?: number;
  cause?: Error;
}

/**
 * Error thrown when an upload is rejected before any request is sent
 */
export class FileError extends SDKError {
  public readonly path?: string;
  public readonly size?: number;

  constructor(message: string, details: FileErrorDetails = {}) {
    super(message, "FILE_ERROR", undefined, details.cause);
    this.path = details.path;
    this.size = details.size;
  }
}
