import { Data } from "effect";

// =============================================================================
// Adapter Errors
// =============================================================================

/**
 * Storage operation failed.
 */
export class StorageError extends Data.TaggedError("StorageError")<{
  readonly operation: "get" | "put" | "delete" | "deleteAll" | "list";
  readonly key?: string;
  readonly cause: unknown;
}> {
  get message(): string {
    const keyPart = this.key ? ` for key "${this.key}"` : "";
    return `Storage ${this.operation}${keyPart} failed: ${
      this.cause instanceof Error ? this.cause.message : String(this.cause)
    }`;
  }
}
