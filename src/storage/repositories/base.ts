/**
 * Base Repository Interfaces
 *
 * `Repository` is the generic CRUD contract entity repositories implement.
 * `ProjectStore` is the narrower key/value view of a project's mastery state
 * that the engine depends on: it reads and writes the syllabus, ledger and
 * schedule blobs without knowing how they are stored.
 */

import type { ConceptRecord, Project, SRSEntry } from '@/core/models';

/**
 * Generic repository interface defining standard CRUD operations.
 *
 * @typeParam T - The domain model type returned by the repository
 * @typeParam CreateInput - The type for creating new entities
 * @typeParam UpdateInput - The type for updating entities
 */
export interface Repository<T, CreateInput, UpdateInput> {
  /**
   * Retrieves an entity by its unique identifier.
   *
   * @returns The domain model if found, or null if not found
   */
  findById(id: string): Promise<T | null>;

  findAll(): Promise<T[]>;

  create(input: CreateInput): Promise<T>;

  /**
   * Updates an existing entity with partial data.
   *
   * @throws Error if the entity with the given id does not exist
   */
  update(id: string, input: UpdateInput): Promise<T>;

  /**
   * Permanently deletes an entity.
   *
   * @throws Error if the entity with the given id does not exist
   */
  delete(id: string): Promise<void>;
}

/**
 * The JSON blobs stored per project, by field name.
 */
export interface ProjectStateFields {
  syllabus: string[];
  ledger: ConceptRecord[];
  schedule: SRSEntry[];
}

export type ProjectStateField = keyof ProjectStateFields;

/**
 * Per-project key/value state store used by the mastery engine.
 */
export interface ProjectStore {
  findById(projectId: string): Promise<Project | null>;

  /**
   * Reads one state field.
   *
   * @returns The validated value, or null if the project does not exist
   * @throws DataCorruptionError if the stored value fails validation
   */
  getField<F extends ProjectStateField>(
    projectId: string,
    field: F
  ): Promise<ProjectStateFields[F] | null>;

  /**
   * Writes one state field.
   *
   * @throws ProjectNotFoundError if the project does not exist
   */
  setField<F extends ProjectStateField>(
    projectId: string,
    field: F,
    value: ProjectStateFields[F]
  ): Promise<void>;

  /**
   * Reads one state field, applies `update` and writes the result back in a
   * single transaction. Concurrent updates of the same project are applied
   * one after the other.
   *
   * @returns The value written
   * @throws ProjectNotFoundError if the project does not exist
   * @throws DataCorruptionError if the stored value fails validation
   */
  updateField<F extends ProjectStateField>(
    projectId: string,
    field: F,
    update: (current: ProjectStateFields[F]) => ProjectStateFields[F]
  ): Promise<ProjectStateFields[F]>;

  /**
   * Writes ledger and schedule together in a single statement, so a reader
   * never sees one updated without the other.
   *
   * @throws ProjectNotFoundError if the project does not exist
   */
  saveProgress(projectId: string, ledger: ConceptRecord[], schedule: SRSEntry[]): Promise<void>;
}
