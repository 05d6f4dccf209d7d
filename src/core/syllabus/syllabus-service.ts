/**
 * Syllabus Service
 *
 * Owns the lifecycle of a project's canonical vocabulary:
 *
 * - lazily generated from the project's source text on first use
 * - explicitly redefinable only while no progress exists under it
 *
 * Every concept name the ledger or scheduler ever sees comes from here, so a
 * redefinition after progress exists would orphan recorded attempts.
 */

import {
  ProjectNotFoundError,
  SyllabusLockedError,
  SyllabusUnavailableError,
  isConfigurationError,
} from '../errors';
import type { SyllabusGenerator } from '../generation/types';
import type { ProjectStore } from '@/storage/repositories';
import { canonicalizeSyllabus, type CanonicalizeOptions } from './canonicalize';

export class SyllabusService {
  private readonly options: Partial<CanonicalizeOptions>;

  constructor(
    private readonly store: ProjectStore,
    private readonly generator: SyllabusGenerator,
    options: Partial<CanonicalizeOptions> = {}
  ) {
    this.options = options;
  }

  /**
   * Returns the stored syllabus, generating and persisting one if the
   * project has none yet.
   *
   * @throws ProjectNotFoundError if the project does not exist
   * @throws SyllabusUnavailableError if generation fails or yields no usable concept
   */
  async ensureSyllabus(projectId: string, signal?: AbortSignal): Promise<string[]> {
    const project = await this.store.findById(projectId);
    if (!project) {
      throw new ProjectNotFoundError(projectId);
    }

    const stored = await this.store.getField(projectId, 'syllabus');
    if (stored && stored.length > 0) {
      return stored;
    }

    if (project.sourceText.trim().length === 0) {
      throw new SyllabusUnavailableError(
        `Project '${projectId}' has no source text to derive a syllabus from`,
        projectId
      );
    }

    let candidates: string[];
    try {
      candidates = await this.generator.generate(project.sourceText, signal);
    } catch (error) {
      if (isConfigurationError(error)) {
        throw error;
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new SyllabusUnavailableError(
        `Syllabus generation failed for project '${projectId}': ${reason}`,
        projectId
      );
    }

    const syllabus = canonicalizeSyllabus(candidates, this.options);
    if (syllabus.length === 0) {
      throw new SyllabusUnavailableError(
        `Syllabus generation produced no usable concepts for project '${projectId}'`,
        projectId
      );
    }

    await this.store.setField(projectId, 'syllabus', syllabus);
    console.log(`[Syllabus] Generated ${syllabus.length} concepts for project ${projectId}`);
    return syllabus;
  }

  /**
   * Replaces the syllabus with an explicit list (canonicalized the same way
   * generated lists are).
   *
   * @throws ProjectNotFoundError if the project does not exist
   * @throws SyllabusLockedError if the ledger or schedule hold any entries
   * @throws SyllabusUnavailableError if no usable concept remains
   */
  async defineSyllabus(projectId: string, concepts: readonly string[]): Promise<string[]> {
    const [ledger, schedule] = await Promise.all([
      this.store.getField(projectId, 'ledger'),
      this.store.getField(projectId, 'schedule'),
    ]);
    if (ledger === null || schedule === null) {
      throw new ProjectNotFoundError(projectId);
    }
    if (ledger.length > 0 || schedule.length > 0) {
      throw new SyllabusLockedError(projectId);
    }

    const syllabus = canonicalizeSyllabus(concepts, this.options);
    if (syllabus.length === 0) {
      throw new SyllabusUnavailableError(
        'A syllabus needs at least one concept name within the length bound',
        projectId
      );
    }

    await this.store.setField(projectId, 'syllabus', syllabus);
    return syllabus;
  }
}
