import type { CreateIndexesOptions, IndexSpecification } from "mongodb";

type IndexDefinition = { keys: IndexSpecification; options: CreateIndexesOptions };

/**
 * Applied on first use by MongoSnapshotWriter:
 * - records: unique { identifier: 1 }, plus { code: 1 } for registration-code lookups
 * - fetch_errors: unique { identifier: 1 }
 */
export const mongoIndexes: { recordCollection: IndexDefinition[]; errorCollection: IndexDefinition[] } = {
  recordCollection: [
    { keys: { identifier: 1 }, options: { unique: true } },
    { keys: { code: 1 }, options: {} }
  ],
  errorCollection: [
    { keys: { identifier: 1 }, options: { unique: true } }
  ]
};
