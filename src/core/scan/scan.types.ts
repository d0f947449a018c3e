export type Identifier = number;

export type LookupValue = string | number | boolean | null;

/** One row returned by the lookup endpoint, flattened to scalar values. */
export type LookupRecord = Record<string, LookupValue>;

export type FetchSuccess = {
  kind: "success";
  identifier: Identifier;
  record: LookupRecord;
};

export type FetchNotFound = {
  kind: "not_found";
  identifier: Identifier;
};

export type FetchFailure = {
  kind: "failure";
  identifier: Identifier;
  reason: string;
  at: Date;
};

export type FetchOutcome = FetchSuccess | FetchNotFound | FetchFailure;

export type ResultSnapshot = {
  records: LookupRecord[];
  errors: FetchFailure[];
};

export const success = (identifier: Identifier, record: LookupRecord): FetchSuccess => ({
  kind: "success",
  identifier,
  record
});

export const notFound = (identifier: Identifier): FetchNotFound => ({ kind: "not_found", identifier });

export const failure = (identifier: Identifier, reason: string, at: Date): FetchFailure => ({
  kind: "failure",
  identifier,
  reason,
  at
});
