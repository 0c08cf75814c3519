/**
 * otakeeper Engine — Error Types
 *
 * Internal modules throw UpdateRejection; the engine turns it into the
 * `error` field of an UpdateResult. Nothing outside the engine should
 * need to catch it.
 */

import { ErrorCategory } from "./types";

export class UpdateRejection extends Error {
  constructor(
    readonly category: ErrorCategory,
    message: string,
    readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "UpdateRejection";
  }
}

export class PackageFormatError extends UpdateRejection {
  constructor(message: string, details?: Record<string, unknown>) {
    super("PACKAGE_FORMAT_ERROR", message, details);
    this.name = "PackageFormatError";
  }
}
