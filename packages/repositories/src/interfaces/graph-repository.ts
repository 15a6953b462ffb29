import type { Entity, EntityGraph, Id } from '@lineage/protocol';

/**
 * Read side of the graph store.
 */
export interface GraphRepositoryReader {
  /**
   * Stored graph whose root has this permanentId
   */
  getGraph(rootPermanentId: Id): EntityGraph | null;

  /**
   * Root permanentId of the most recent stored graph containing a version
   */
  getRootIdOf(permanentId: Id): Id | null;

  /**
   * Every permanentId minted for a lineage, oldest first
   */
  getLineageHistory(lineageId: Id): Id[];

  /**
   * Lineages of a given entity type, first-seen order
   */
  listLineagesByType(typeName: string): Id[];

  /**
   * Live (mutable) entity registered under an ephemeral handle
   */
  getLive(ephemeralId: Id): Entity | null;

  status(): GraphRepositoryStatus;
}

/**
 * Writes available inside a transaction. Reads see staged writes.
 */
export interface GraphRepositoryWriter extends GraphRepositoryReader {
  putGraph(graph: EntityGraph): void;
  indexNode(permanentId: Id, rootPermanentId: Id): void;
  appendLineage(lineageId: Id, permanentId: Id): void;
  indexType(typeName: string, lineageId: Id): void;
  putLive(entity: Entity): void;
  removeLive(ephemeralId: Id): void;
}

export type GraphRepositoryStatus = {
  graphs: number;
  indexedVersions: number;
  lineages: number;
  liveEntities: number;
};

/**
 * Storage for versioned entity graphs.
 *
 * Stored graphs are write-once: putGraph never replaces an existing root id.
 * Callers swap a whole commit in through transaction(); readers outside the
 * transaction keep seeing the previous state until it returns.
 */
export interface GraphRepository extends GraphRepositoryReader {
  /**
   * Execute a function against staged state.
   *
   * @param fn Function receiving the writer
   * @returns The return value of the function
   * @throws Discards every staged write if the function throws
   */
  transaction<T>(fn: (writer: GraphRepositoryWriter) => T): T;
}
