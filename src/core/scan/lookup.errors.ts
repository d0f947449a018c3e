import type { Identifier } from "./scan.types";

export type LookupFailureKind = "timeout" | "network" | "http_status" | "invalid_body";

/**
 * Transport-level failure of one lookup request. Carries no response body.
 */
export class LookupRequestError extends Error {
  readonly kind: LookupFailureKind;
  readonly identifier: Identifier;
  readonly status?: number;
  readonly retryDelayMs?: number;

  constructor(args: {
    kind: LookupFailureKind;
    message: string;
    identifier: Identifier;
    status?: number;
    retryDelayMs?: number;
    cause?: unknown;
  }) {
    super(args.message, { cause: args.cause });
    this.name = "LookupRequestError";
    this.kind = args.kind;
    this.identifier = args.identifier;
    this.status = args.status;
    this.retryDelayMs = args.retryDelayMs;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export const isLookupRequestError = (err: unknown): err is LookupRequestError => err instanceof LookupRequestError;
