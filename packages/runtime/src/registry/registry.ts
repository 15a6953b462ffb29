// Registry - the versioning boundary
//
// Every write to the store goes through the Registry:
// 1. Resolves the live root of the tree being written
// 2. Validates payloads and builds the graph
// 3. Diffs against the stored version and re-versions what changed
// 4. Stores a frozen snapshot and swaps the indexes in one transaction

import type {
  CommitReport,
  Entity,
  EntityGraph,
  EntityTypeDefinition,
  Id,
  RegistryConfig,
  RegistryStatus,
  ResolvedRegistryConfig,
  VersionedEntity,
} from '@lineage/protocol';
import { parseRegistryConfig, validateEntityFields } from '@lineage/protocol';
import type { GraphRepository, GraphRepositoryWriter } from '@lineage/repositories';
import { createInMemoryGraphRepository } from '@lineage/repositories';
import {
  AlreadyRegisteredError,
  ConfigValidationError,
  EntityNotFoundError,
  EntityValidationError,
  LineageNotFoundError,
  NotARootError,
  RegistryBusyError,
  ValidationError,
} from '../errors.js';
import type { RegistryLogger } from '../logging.js';
import { silentLogger, withLogContext } from '../logging.js';
import { newId, now } from '../entities/ids.js';
import {
  clearRoot,
  defineEntityType,
  forkEntity,
  isMarkedRoot,
  isRootEntity,
  markRoot,
} from '../entities/lifecycle.js';
import { syncProvenance } from '../entities/provenance.js';
import { cloneTree, copyGraph, freezeGraph, refreshEphemeralIds } from '../entities/snapshot.js';
import { buildGraph } from '../graph/builder.js';
import { diffGraphs } from '../graph/diff.js';

/**
 * Options for creating a Registry instance.
 */
export type RegistryOptions = {
  /** Storage for graphs and indexes (defaults to in-memory) */
  repository?: GraphRepository;

  /** Structured logger (defaults to silent) */
  logger?: RegistryLogger;

  /** Entity types whose schemas validate payloads */
  types?: EntityTypeDefinition[];

  config?: RegistryConfig;

  /** Called after every commit that wrote a new version */
  onCommit?: (report: CommitReport) => void;
};

export type CommitOptions = {
  /** Re-version every node even when nothing changed */
  force?: boolean;
};

type PreparedTree = {
  /** Graph over the live objects */
  live: EntityGraph;
  /** Graph over an independent copy, to become the stored snapshot */
  snapshot: EntityGraph;
};

/**
 * Registry - versioned storage for entity trees
 *
 * @example
 * ```ts
 * const registry = createRegistry({ types: [Course, Section] });
 *
 * const course = createEntity(Course, { title: 'Algebra', sections: [] });
 * registry.register(course);
 *
 * course.fields.title = 'Algebra I';
 * registry.commit(course); // true: course has a new permanentId
 * ```
 */
export class Registry {
  private readonly repository: GraphRepository;
  private readonly logger: RegistryLogger;
  private readonly config: ResolvedRegistryConfig;
  private readonly onCommit: (report: CommitReport) => void;
  private readonly types = new Map<string, EntityTypeDefinition>();
  private activeOperation: string | null = null;

  constructor(options: RegistryOptions = {}) {
    const parsed = parseRegistryConfig(options.config);
    if (!parsed.success) {
      throw new ConfigValidationError(parsed.issues);
    }
    this.config = parsed.config;
    this.repository = options.repository ?? createInMemoryGraphRepository();
    this.logger = withLogContext(options.logger ?? silentLogger, { component: 'registry' });
    this.onCommit = options.onCommit ?? (() => {});
    for (const definition of options.types ?? []) {
      this.addType(definition);
    }
  }

  // ========================================
  // Reads
  // ========================================

  /**
   * A stored (immutable) version by permanentId.
   */
  get(permanentId: Id): Entity | null {
    const rootId = this.repository.getRootIdOf(permanentId);
    if (!rootId) return null;
    return this.repository.getGraph(rootId)?.nodes.get(permanentId) ?? null;
  }

  /**
   * The most recently minted stored version of a lineage.
   */
  getByLineageLatest(lineageId: Id): Entity | null {
    const history = this.repository.getLineageHistory(lineageId);
    const latest = history[history.length - 1];
    return latest === undefined ? null : this.get(latest);
  }

  /**
   * The live (mutable) object behind an ephemeral handle.
   */
  getLive(ephemeralId: Id): Entity | null {
    return this.repository.getLive(ephemeralId);
  }

  /**
   * A stored graph. The maps are copies; the nodes are the stored versions.
   */
  getGraph(rootPermanentId: Id): EntityGraph | null {
    const graph = this.repository.getGraph(rootPermanentId);
    return graph ? copyGraph(graph) : null;
  }

  getRootIdOf(permanentId: Id): Id | null {
    return this.repository.getRootIdOf(permanentId);
  }

  getLineageHistory(lineageId: Id): Id[] {
    return this.repository.getLineageHistory(lineageId);
  }

  listLineagesByType(typeName: string): Id[] {
    return this.repository.listLineagesByType(typeName);
  }

  getType(name: string): EntityTypeDefinition | null {
    return this.types.get(name) ?? null;
  }

  getStatus(): RegistryStatus {
    return { ...this.repository.status(), entityTypes: this.types.size };
  }

  // ========================================
  // Mutators
  // ========================================

  /**
   * Add an entity type to the validation catalog.
   */
  defineType(definition: EntityTypeDefinition): EntityTypeDefinition {
    return this.exclusive('defineType', () => this.addType(definition));
  }

  /**
   * Store a new tree.
   *
   * @returns The stored graph
   * @throws NotARootError when the entity is embedded in another tree
   * @throws AlreadyRegisteredError when the root version is already stored
   */
  register(entity: Entity): EntityGraph {
    return this.exclusive('register', () => {
      if (!isRootEntity(entity)) {
        throw new NotARootError(entity.permanentId, entity.rootPermanentId);
      }
      if (this.repository.getGraph(entity.permanentId)) {
        throw new AlreadyRegisteredError(entity.permanentId);
      }

      const tree = this.prepare(entity);
      const minted = tree.live.topologicalOrder.filter((id) => this.repository.getRootIdOf(id) === null);
      this.store(tree, minted);

      this.logger.info('Registered entity tree', {
        rootPermanentId: entity.permanentId,
        lineageId: entity.lineageId,
        nodes: tree.live.nodes.size,
      });
      return copyGraph(tree.snapshot);
    });
  }

  /**
   * Commit the tree an entity belongs to.
   *
   * @returns Whether a new version was written
   */
  commit(entity: Entity, force = false): boolean {
    return this.commitWithReport(entity, { force }).changed;
  }

  /**
   * Commit the tree an entity belongs to and describe what happened.
   *
   * @throws LineageNotFoundError when the tree was never registered
   */
  commitWithReport(entity: Entity, options: CommitOptions = {}): CommitReport {
    const report = this.exclusive('commit', () => this.commitTree(entity, options.force ?? false));
    if (report.changed) this.onCommit(report);
    return report;
  }

  /**
   * A mutable working copy of a stored tree with fresh ephemeral handles.
   * Committing its root branches the lineage from that version.
   */
  checkout(rootPermanentId: Id): Entity {
    return this.exclusive('checkout', () => {
      const root = this.repository.getGraph(rootPermanentId)?.nodes.get(rootPermanentId);
      if (!root) {
        throw new EntityNotFoundError(rootPermanentId);
      }
      const copy = buildGraph(cloneTree(root));
      refreshEphemeralIds(copy);
      const copyRoot = copy.nodes.get(copy.rootPermanentId);
      if (!copyRoot) {
        throw new EntityNotFoundError(rootPermanentId);
      }
      this.logger.debug('Checked out entity tree', {
        rootPermanentId,
        rootEphemeralId: copyRoot.ephemeralId,
      });
      return copyRoot;
    });
  }

  /**
   * Make an embedded entity the root of its own tree.
   * The caller removes it from its old parent and commits that tree separately.
   *
   * @returns The stored graph of the new tree
   */
  promoteToRoot(entity: Entity): EntityGraph {
    return this.exclusive('promoteToRoot', () => {
      if (isMarkedRoot(entity) && this.repository.getGraph(entity.permanentId)) {
        throw new AlreadyRegisteredError(entity.permanentId);
      }

      const previousId = entity.permanentId;
      let tree = this.prepare(entity);
      const minted = tree.live.topologicalOrder.filter((id) => this.repository.getRootIdOf(id) === null);

      if (this.repository.getRootIdOf(previousId) !== null) {
        const nextId = newId();
        const forkedAt = now();
        const copy = tree.snapshot.nodes.get(previousId);
        forkEntity(entity, nextId, forkedAt);
        if (copy) forkEntity(copy, nextId, forkedAt);
        tree = this.rebuild(entity, tree);
        minted.push(nextId);
      }

      this.store(tree, minted);

      this.logger.info('Promoted entity to root', {
        previousId,
        rootPermanentId: entity.permanentId,
        lineageId: entity.lineageId,
      });
      return copyGraph(tree.snapshot);
    });
  }

  /**
   * Move a registered root into another tree.
   * The caller has already placed it in one of parent's fields.
   */
  attach(entity: Entity, parent: Entity): CommitReport {
    const report = this.exclusive('attach', () => {
      if (!isMarkedRoot(entity) || !this.repository.getGraph(entity.permanentId)) {
        throw new NotARootError(entity.permanentId, entity.rootPermanentId);
      }
      const root = this.resolveLiveRoot(parent);
      if (root === entity) {
        throw new ValidationError(`Cannot attach entity ${entity.permanentId} to its own tree`);
      }

      const saved = { rootPermanentId: entity.rootPermanentId, rootEphemeralId: entity.rootEphemeralId };
      clearRoot(entity);
      try {
        const reachable = buildGraph(root, { maxNodes: this.config.maxGraphSize }).nodes.get(entity.permanentId);
        if (reachable !== entity) {
          throw new ValidationError(
            `Entity ${entity.permanentId} is not held by the tree of ${parent.permanentId}`
          );
        }
        return this.commitTree(root, false);
      } catch (error) {
        entity.rootPermanentId = saved.rootPermanentId;
        entity.rootEphemeralId = saved.rootEphemeralId;
        throw error;
      }
    });
    if (report.changed) this.onCommit(report);
    return report;
  }

  // ========================================
  // Internals
  // ========================================

  private addType(definition: EntityTypeDefinition): EntityTypeDefinition {
    const existing = this.types.get(definition.name);
    if (existing && existing !== definition) {
      throw new ValidationError(`Entity type "${definition.name}" is already defined`, {
        field: 'name',
      });
    }
    this.types.set(definition.name, defineEntityType(definition));
    return definition;
  }

  /**
   * Run a mutator under the single writer guard.
   */
  private exclusive<T>(operation: string, fn: () => T): T {
    if (this.activeOperation !== null) {
      const error = new RegistryBusyError(operation, this.activeOperation);
      this.logger.warn('Registry operation rejected', { operation, error: error.message });
      throw error;
    }

    this.activeOperation = operation;
    try {
      return fn();
    } catch (error) {
      this.logger.warn('Registry operation rejected', {
        operation,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    } finally {
      this.activeOperation = null;
    }
  }

  private resolveLiveRoot(entity: Entity): Entity {
    if (isRootEntity(entity)) {
      if (!this.repository.getGraph(entity.permanentId)) {
        throw new LineageNotFoundError(entity.permanentId, entity.lineageId, 'tree was never registered');
      }
      return entity;
    }

    const root = entity.rootEphemeralId ? this.repository.getLive(entity.rootEphemeralId) : null;
    if (!root) {
      throw new LineageNotFoundError(
        entity.permanentId,
        entity.lineageId,
        `no live root for tree ${entity.rootPermanentId ?? '(unknown)'}`
      );
    }
    return root;
  }

  private validatePayload(entity: Entity): void {
    if (!this.config.validatePayloads) return;
    const definition = this.types.get(entity.type);
    if (!definition) return;

    const result = validateEntityFields(definition, entity.fields);
    if (!result.valid) {
      throw new EntityValidationError(entity.type, result.issues, entity.permanentId);
    }
  }

  /**
   * Build and validate the live graph, and copy it for storage.
   * Nothing live is changed apart from reshaping provenance.
   */
  private prepare(root: Entity): PreparedTree {
    const live = buildGraph(root, { maxNodes: this.config.maxGraphSize });
    for (const node of live.nodes.values()) {
      syncProvenance(node);
      this.validatePayload(node);
    }
    return { live, snapshot: buildGraph(cloneTree(root)) };
  }

  /**
   * Rebuild both graphs after ids changed, so edges point at the new ids.
   */
  private rebuild(root: Entity, tree: PreparedTree): PreparedTree {
    const snapshotRoot = tree.snapshot.nodes.get(tree.snapshot.rootPermanentId);
    return {
      live: buildGraph(root),
      snapshot: snapshotRoot ? buildGraph(snapshotRoot) : buildGraph(cloneTree(root)),
    };
  }

  private commitTree(entity: Entity, force: boolean): CommitReport {
    const root = this.resolveLiveRoot(entity);
    const previousRootId = root.permanentId;
    const stored = this.repository.getGraph(previousRootId);
    if (!stored) {
      throw new LineageNotFoundError(entity.permanentId, entity.lineageId, `root ${previousRootId} is not stored`);
    }

    let tree = this.prepare(root);
    if (tree.live.nodes.get(entity.permanentId) !== entity) {
      throw new LineageNotFoundError(
        entity.permanentId,
        entity.lineageId,
        `entity is no longer held by tree ${previousRootId}`
      );
    }
    const diff = diffGraphs(stored, tree.live);
    const changed = force ? new Set(tree.live.nodes.keys()) : diff.changed;
    const committedAt = now();

    if (changed.size === 0) {
      this.logger.debug('Commit skipped, tree unchanged', { rootPermanentId: previousRootId });
      return {
        changed: false,
        forced: force,
        lineageId: root.lineageId,
        previousRootId,
        rootPermanentId: previousRootId,
        versioned: [],
        diff,
        committedAt,
      };
    }

    // Leaves first
    const depth = (id: Id) => tree.live.ancestryPaths.get(id)?.length ?? 0;
    const ordered = [...changed].sort((a, b) => depth(b) - depth(a));

    const versioned: VersionedEntity[] = [];
    for (const id of ordered) {
      const live = tree.live.nodes.get(id);
      const copy = tree.snapshot.nodes.get(id);
      if (!live || !copy) continue;
      const nextId = newId();
      forkEntity(live, nextId, committedAt);
      forkEntity(copy, nextId, committedAt);
      versioned.push({ lineageId: live.lineageId, previousId: id, newId: nextId });
    }

    tree = this.rebuild(root, tree);
    this.store(
      tree,
      versioned.map((entry) => entry.newId),
      stored
    );

    const report: CommitReport = {
      changed: true,
      forced: force,
      lineageId: root.lineageId,
      previousRootId,
      rootPermanentId: root.permanentId,
      versioned,
      diff,
      committedAt,
    };
    this.logger.info('Committed entity tree', {
      lineageId: report.lineageId,
      previousRootId,
      rootPermanentId: report.rootPermanentId,
      versioned: versioned.length,
      forced: force,
    });
    return report;
  }

  /**
   * Mark root ownership and swap the snapshot and indexes in.
   *
   * @param minted - permanentIds stored for the first time
   * @param previous - stored version the tree was committed from; live handles
   *   of its nodes that left the tree are dropped
   */
  private store(tree: PreparedTree, minted: Id[], previous?: EntityGraph): void {
    for (const graph of [tree.live, tree.snapshot]) {
      const root = graph.nodes.get(graph.rootPermanentId);
      if (!root) continue;
      for (const node of graph.nodes.values()) markRoot(node, root);
    }

    const snapshot = tree.snapshot;
    if (this.config.freezeSnapshots) freezeGraph(snapshot);

    this.repository.transaction((writer) => {
      writer.putGraph(snapshot);
      for (const node of snapshot.nodes.values()) {
        writer.indexNode(node.permanentId, snapshot.rootPermanentId);
        writer.indexType(node.type, node.lineageId);
      }
      for (const id of minted) {
        const node = snapshot.nodes.get(id);
        if (node) writer.appendLineage(node.lineageId, id);
      }
      for (const node of tree.live.nodes.values()) {
        writer.putLive(node);
      }
      if (previous) this.dropDetached(writer, tree.live, previous);
    });
  }

  /**
   * Forget live handles of nodes removed from a tree since its previous version.
   * Handles owned by another tree (a checkout, a promoted root) are kept.
   */
  private dropDetached(writer: GraphRepositoryWriter, live: EntityGraph, previous: EntityGraph): void {
    const root = live.nodes.get(live.rootPermanentId);
    if (!root) return;
    const present = new Set([...live.nodes.values()].map((node) => node.ephemeralId));

    for (const node of previous.nodes.values()) {
      if (present.has(node.ephemeralId)) continue;
      const detached = writer.getLive(node.ephemeralId);
      if (detached && detached.rootEphemeralId === root.ephemeralId) {
        writer.removeLive(node.ephemeralId);
      }
    }
  }
}

/**
 * Create a Registry instance.
 */
export function createRegistry(options: RegistryOptions = {}): Registry {
  return new Registry(options);
}
