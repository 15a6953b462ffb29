// In-memory graph repository for development and testing
//
// Writes inside a transaction go to copies of the index maps. The copies
// replace the live state only when the transaction function returns, so a
// throw leaves the store exactly as it was.
//
// Data does not persist between restarts.

import type { Entity, EntityGraph, Id } from '@lineage/protocol';
import type {
  GraphRepository,
  GraphRepositoryReader,
  GraphRepositoryWriter,
} from '../interfaces/index.js';

/**
 * In-memory data store that can be accessed for debugging/inspection.
 */
export interface InMemoryDataStore {
  graphs: Map<Id, EntityGraph>;
  rootIndex: Map<Id, Id>;
  lineageHistory: Map<Id, Id[]>;
  liveEntities: Map<Id, Entity>;
  typeIndex: Map<string, Id[]>;
}

/**
 * Graph repository with access to underlying data and clear function.
 */
export interface InMemoryGraphRepository extends GraphRepository {
  /** Direct access to the current (committed) state */
  readonly _data: InMemoryDataStore;
  /** Clear all data */
  clear(): void;
}

function createEmptyStore(): InMemoryDataStore {
  return {
    graphs: new Map(),
    rootIndex: new Map(),
    lineageHistory: new Map(),
    liveEntities: new Map(),
    typeIndex: new Map(),
  };
}

function copyStore(store: InMemoryDataStore): InMemoryDataStore {
  // List values are replaced, never pushed to, so shallow copies suffice
  return {
    graphs: new Map(store.graphs),
    rootIndex: new Map(store.rootIndex),
    lineageHistory: new Map(store.lineageHistory),
    liveEntities: new Map(store.liveEntities),
    typeIndex: new Map(store.typeIndex),
  };
}

function createReader(getStore: () => InMemoryDataStore): GraphRepositoryReader {
  return {
    getGraph(rootPermanentId) {
      return getStore().graphs.get(rootPermanentId) ?? null;
    },

    getRootIdOf(permanentId) {
      return getStore().rootIndex.get(permanentId) ?? null;
    },

    getLineageHistory(lineageId) {
      return [...(getStore().lineageHistory.get(lineageId) ?? [])];
    },

    listLineagesByType(typeName) {
      return [...(getStore().typeIndex.get(typeName) ?? [])];
    },

    getLive(ephemeralId) {
      return getStore().liveEntities.get(ephemeralId) ?? null;
    },

    status() {
      const store = getStore();
      return {
        graphs: store.graphs.size,
        indexedVersions: store.rootIndex.size,
        lineages: store.lineageHistory.size,
        liveEntities: store.liveEntities.size,
      };
    },
  };
}

function createWriter(stage: InMemoryDataStore): GraphRepositoryWriter {
  return {
    ...createReader(() => stage),

    putGraph(graph) {
      if (stage.graphs.has(graph.rootPermanentId)) {
        throw new Error(`Graph already stored for root ${graph.rootPermanentId}`);
      }
      stage.graphs.set(graph.rootPermanentId, graph);
    },

    indexNode(permanentId, rootPermanentId) {
      stage.rootIndex.set(permanentId, rootPermanentId);
    },

    appendLineage(lineageId, permanentId) {
      const history = stage.lineageHistory.get(lineageId) ?? [];
      if (history.includes(permanentId)) return;
      stage.lineageHistory.set(lineageId, [...history, permanentId]);
    },

    indexType(typeName, lineageId) {
      const lineages = stage.typeIndex.get(typeName) ?? [];
      if (lineages.includes(lineageId)) return;
      stage.typeIndex.set(typeName, [...lineages, lineageId]);
    },

    putLive(entity) {
      stage.liveEntities.set(entity.ephemeralId, entity);
    },

    removeLive(ephemeralId) {
      stage.liveEntities.delete(ephemeralId);
    },
  };
}

/**
 * Create an in-memory graph repository.
 *
 * @example
 * ```typescript
 * const repository = createInMemoryGraphRepository();
 * const registry = createRegistry({ repository });
 *
 * // Access underlying data for debugging
 * console.log(repository._data.graphs.size);
 *
 * // Clear all data
 * repository.clear();
 * ```
 */
export function createInMemoryGraphRepository(): InMemoryGraphRepository {
  let state = createEmptyStore();
  let staging = false;

  return {
    ...createReader(() => state),

    transaction<T>(fn: (writer: GraphRepositoryWriter) => T): T {
      if (staging) {
        throw new Error('Nested transactions are not supported');
      }
      staging = true;
      try {
        const stage = copyStore(state);
        const result = fn(createWriter(stage));
        state = stage;
        return result;
      } finally {
        staging = false;
      }
    },

    get _data() {
      return state;
    },

    clear() {
      state = createEmptyStore();
    },
  };
}
