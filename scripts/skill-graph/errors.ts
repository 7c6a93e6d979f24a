import type { LoadErrorCode, LoadFailure, RegistryCollection } from "../../src/registry/index.js";

interface RecordLocation {
  collection: RegistryCollection;
  index?: number;
  recordId?: string;
  path?: string;
}

/**
 * Fatal load error. Thrown only by the loader, before any derived
 * computation runs; everything downstream reports findings as data.
 */
export class RegistryLoadError extends Error {
  readonly code: LoadErrorCode;
  readonly location: RecordLocation;

  constructor(code: LoadErrorCode, message: string, location: RecordLocation) {
    super(message);
    this.name = "RegistryLoadError";
    this.code = code;
    this.location = location;
  }

  toFailure(): LoadFailure {
    return {
      code: this.code,
      message: this.message,
      collection: this.location.collection,
      ...(this.location.index !== undefined && { index: this.location.index }),
      ...(this.location.recordId !== undefined && { recordId: this.location.recordId }),
      ...(this.location.path !== undefined && { path: this.location.path }),
    };
  }
}

export function malformedRecord(message: string, location: RecordLocation): RegistryLoadError {
  return new RegistryLoadError("MALFORMED_RECORD", message, location);
}

export function duplicateRecord(message: string, location: RecordLocation): RegistryLoadError {
  return new RegistryLoadError("DUPLICATE_RECORD", message, location);
}
