/**
 * Custom exceptions for pipeline operations.
 */

export class InvalidRunRequestError extends Error {
  issues: string[];

  constructor(issues: string[]) {
    super(`Invalid run request: ${issues.join("; ")}`);
    this.name = "InvalidRunRequestError";
    this.issues = issues;
  }
}

export class RunFailedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RunFailedError";
  }
}

export class ProviderRequestError extends Error {
  identifier: string;
  status: number | null;

  constructor(identifier: string, status: number | null, message?: string) {
    super(
      message ??
        `Provider request for ${identifier} failed` +
          (status === null ? "" : ` with status ${status}`),
    );
    this.name = "ProviderRequestError";
    this.identifier = identifier;
    this.status = status;
  }
}

export class ArtifactFetchError extends Error {
  url: string;

  constructor(url: string, message?: string) {
    super(message ? `Fetch of ${url} failed: ${message}` : `Fetch of ${url} failed`);
    this.name = "ArtifactFetchError";
    this.url = url;
  }
}

export class UploadFailedException extends Error {
  constructor(message?: string) {
    super(message ? `Upload failed: ${message}` : "Upload failed");
    this.name = "UploadFailedException";
  }
}

export class MetadataWriteException extends Error {
  constructor(message?: string) {
    super(message ? `Metadata write failed: ${message}` : "Metadata write failed");
    this.name = "MetadataWriteException";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
