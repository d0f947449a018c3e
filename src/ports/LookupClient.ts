import type { Identifier } from "../core/scan/scan.types";

/**
 * Remote per-identifier lookup. Resolves with the decoded JSON body of a 2xx response;
 * any transport-level problem rejects.
 */
export interface LookupClient {
  lookup(identifier: Identifier): Promise<unknown>;
}
