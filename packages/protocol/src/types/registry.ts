// Registry types - commit results and store statistics

import type { Id, Timestamp } from './common.js';
import type { GraphDiff } from './graphs.js';

/**
 * One entity re-versioned by a commit.
 */
export type VersionedEntity = {
  lineageId: Id;
  previousId: Id;
  newId: Id;
};

/**
 * Outcome of committing a tree.
 */
export type CommitReport = {
  /**
   * False when the tree matched its stored version and nothing was written
   */
  changed: boolean;
  forced: boolean;
  lineageId: Id;
  previousRootId: Id;
  rootPermanentId: Id;
  versioned: VersionedEntity[];
  diff: GraphDiff;
  committedAt: Timestamp;
};

/**
 * Counts describing the store's contents.
 */
export type RegistryStatus = {
  graphs: number;
  indexedVersions: number;
  lineages: number;
  liveEntities: number;
  entityTypes: number;
};
