/**
 * Custom exceptions for archive handling and the donation flow.
 */

export class BadArchiveError extends Error {
  constructor(message?: string) {
    super(message ? `Bad archive: ${message}` : "Bad archive");
    this.name = "BadArchiveError";
  }
}

/** Readable upload that is not any export the platform produces. */
export class UnhandledFormatError extends Error {
  constructor(message?: string) {
    super(message ? `Unhandled format: ${message}` : "Unhandled format");
    this.name = "UnhandledFormatError";
  }
}

export class ExtractionFailedException extends Error {
  constructor(message?: string) {
    super(message ? `Extraction failed: ${message}` : "Extraction failed");
    this.name = "ExtractionFailedException";
  }
}

export class UnsupportedPlatformError extends Error {
  constructor(platform: string) {
    super(`Unsupported platform: ${platform}`);
    this.name = "UnsupportedPlatformError";
  }
}

export class UnknownStatusCodeError extends Error {
  statusId: number;

  constructor(statusId: number) {
    super(`Status code ${statusId} is not in the platform catalogue`);
    this.name = "UnknownStatusCodeError";
    this.statusId = statusId;
  }
}

export class SessionClosedError extends Error {
  constructor(sessionId: string) {
    super(`Session ${sessionId} has finished; no further input is accepted`);
    this.name = "SessionClosedError";
  }
}
