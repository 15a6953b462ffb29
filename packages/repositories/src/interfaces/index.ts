// Re-export all repository interfaces

export type {
  GraphRepository,
  GraphRepositoryReader,
  GraphRepositoryWriter,
  GraphRepositoryStatus,
} from './graph-repository.js';
