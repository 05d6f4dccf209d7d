/**
 * Project Repository Implementation
 *
 * Data access for projects and their mastery state. Besides CRUD it
 * implements ProjectStore, the key/value view the engine uses for the
 * syllabus, ledger and schedule JSON columns.
 *
 * Every read of a state column is validated with Zod. Invalid stored state
 * (negative counters, correct > total, malformed dates) raises a
 * DataCorruptionError; it is never repaired silently. Over-length concept
 * names pass validation here and are reported by the classifier instead,
 * since they are visible corruption the user can act on.
 */

import { asc, eq } from 'drizzle-orm';
import { z } from 'zod';
import type { AppDatabase } from '../db';
import { projects, type ProjectRow } from '../schema';
import type { Project } from '@/core/models';
import { DataCorruptionError, ProjectNotFoundError } from '@/core/errors';
import { parseDateKey } from '@/core/srs';
import type {
  ProjectStateField,
  ProjectStateFields,
  ProjectStore,
  Repository,
} from './base';

/**
 * Input type for creating a new Project.
 */
export interface CreateProjectInput {
  /** Unique identifier - typically a prefixed UUID (e.g., 'prj_xyz789') */
  id: string;
  name: string;
  sourceText: string;
  level?: string;
  notes?: string;
}

/**
 * Input type for updating a Project's metadata. State columns are written
 * through setField/saveProgress only.
 */
export interface UpdateProjectInput {
  name?: string;
  level?: string;
  notes?: string;
  sourceText?: string;
}

// =============================================================================
// Stored State Validation
// =============================================================================

const conceptRecordSchema = z
  .object({
    concept: z.string().min(1),
    correct: z.number().int().nonnegative(),
    total: z.number().int().nonnegative(),
  })
  .refine((record) => record.correct <= record.total, {
    message: 'correct must not exceed total',
  });

const srsEntrySchema = z.object({
  concept: z.string().min(1),
  intervalDays: z.number().int().min(1),
  nextReview: z
    .string()
    .refine((value) => parseDateKey(value) !== null, 'must be a YYYY-MM-DD date'),
});

const stateSchemas: { [F in ProjectStateField]: z.ZodType<ProjectStateFields[F]> } = {
  syllabus: z.array(z.string().min(1)),
  ledger: z.array(conceptRecordSchema),
  schedule: z.array(srsEntrySchema),
};

function parseStateField<F extends ProjectStateField>(
  projectId: string,
  field: F,
  raw: unknown
): ProjectStateFields[F] {
  const result = stateSchemas[field].safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new DataCorruptionError(
      `Stored ${field} for project '${projectId}' is invalid (${issues}).`
    );
  }
  return result.data;
}

/**
 * Metadata columns. The JSON state columns are read only through getField,
 * so a damaged state column never breaks a metadata lookup.
 */
const metadataColumns = {
  id: projects.id,
  name: projects.name,
  level: projects.level,
  sourceText: projects.sourceText,
  notes: projects.notes,
  createdAt: projects.createdAt,
  updatedAt: projects.updatedAt,
};

type ProjectMetadataRow = Pick<
  ProjectRow,
  'id' | 'name' | 'level' | 'sourceText' | 'notes' | 'createdAt' | 'updatedAt'
>;

/**
 * Maps a database row to a Project domain model.
 */
function mapToDomain(row: ProjectMetadataRow): Project {
  return {
    id: row.id,
    name: row.name,
    level: row.level,
    sourceText: row.sourceText,
    notes: row.notes,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

/**
 * Repository for Project data access.
 *
 * @example
 * ```typescript
 * const repo = new ProjectRepository(db);
 * const project = await repo.create({
 *   id: 'prj_abc',
 *   name: 'Algorithms',
 *   sourceText: extractedText,
 * });
 * const ledger = await repo.getField(project.id, 'ledger');
 * ```
 */
export class ProjectRepository
  implements Repository<Project, CreateProjectInput, UpdateProjectInput>, ProjectStore
{
  constructor(private readonly db: AppDatabase) {}

  async findById(id: string): Promise<Project | null> {
    const result = await this.db
      .select(metadataColumns)
      .from(projects)
      .where(eq(projects.id, id))
      .limit(1);

    if (result.length === 0) {
      return null;
    }

    return mapToDomain(result[0]);
  }

  /**
   * Retrieves all projects ordered by creation time.
   */
  async findAll(): Promise<Project[]> {
    const results = await this.db
      .select(metadataColumns)
      .from(projects)
      .orderBy(asc(projects.createdAt));
    return results.map(mapToDomain);
  }

  async findByName(name: string): Promise<Project | null> {
    const result = await this.db
      .select(metadataColumns)
      .from(projects)
      .where(eq(projects.name, name))
      .limit(1);
    return result.length === 0 ? null : mapToDomain(result[0]);
  }

  /**
   * Creates a new project with empty syllabus, ledger and schedule.
   */
  async create(input: CreateProjectInput): Promise<Project> {
    const now = new Date();

    const result = await this.db
      .insert(projects)
      .values({
        id: input.id,
        name: input.name,
        level: input.level ?? 'general',
        sourceText: input.sourceText,
        notes: input.notes ?? '',
        syllabus: [],
        ledger: [],
        schedule: [],
        createdAt: now,
        updatedAt: now,
      })
      .returning(metadataColumns);

    return mapToDomain(result[0]);
  }

  /**
   * Updates project metadata.
   *
   * @throws ProjectNotFoundError if the project does not exist
   */
  async update(id: string, input: UpdateProjectInput): Promise<Project> {
    const result = await this.db
      .update(projects)
      .set({
        ...input,
        updatedAt: new Date(),
      })
      .where(eq(projects.id, id))
      .returning(metadataColumns);

    if (result.length === 0) {
      throw new ProjectNotFoundError(id);
    }

    return mapToDomain(result[0]);
  }

  /**
   * Permanently deletes a project together with all of its state.
   *
   * @throws ProjectNotFoundError if the project does not exist
   */
  async delete(id: string): Promise<void> {
    const result = await this.db
      .delete(projects)
      .where(eq(projects.id, id))
      .returning({ id: projects.id });

    if (result.length === 0) {
      throw new ProjectNotFoundError(id);
    }
  }

  // ===========================================================================
  // ProjectStore
  // ===========================================================================

  async getField<F extends ProjectStateField>(
    projectId: string,
    field: F
  ): Promise<ProjectStateFields[F] | null> {
    return this.readField(this.db, projectId, field);
  }

  async updateField<F extends ProjectStateField>(
    projectId: string,
    field: F,
    update: (current: ProjectStateFields[F]) => ProjectStateFields[F]
  ): Promise<ProjectStateFields[F]> {
    // better-sqlite3 transactions are synchronous, so nothing else runs
    // between the read and the write
    return this.db.transaction(
      (tx) => {
        const current = this.readField(tx, projectId, field);
        if (current === null) {
          throw new ProjectNotFoundError(projectId);
        }

        const next = update(current);
        const changes: Partial<ProjectRow> = { updatedAt: new Date() };
        changes[field] = next;
        tx.update(projects).set(changes).where(eq(projects.id, projectId)).run();
        return next;
      },
      { behavior: 'immediate' }
    );
  }

  async setField<F extends ProjectStateField>(
    projectId: string,
    field: F,
    value: ProjectStateFields[F]
  ): Promise<void> {
    const changes: Partial<ProjectRow> = { updatedAt: new Date() };
    changes[field] = value;

    const result = await this.db
      .update(projects)
      .set(changes)
      .where(eq(projects.id, projectId))
      .returning({ id: projects.id });

    if (result.length === 0) {
      throw new ProjectNotFoundError(projectId);
    }
  }

  /**
   * Synchronous read of one state field on the database or a transaction.
   */
  private readField<F extends ProjectStateField>(
    db: Pick<AppDatabase, 'select'>,
    projectId: string,
    field: F
  ): ProjectStateFields[F] | null {
    let result: { value: unknown }[];
    try {
      result = db
        .select({ value: projects[field] })
        .from(projects)
        .where(eq(projects.id, projectId))
        .limit(1)
        .all();
    } catch (err) {
      if (err instanceof SyntaxError) {
        throw new DataCorruptionError(`Stored ${field} for project '${projectId}' is not valid JSON.`);
      }
      throw err;
    }

    if (result.length === 0) {
      return null;
    }

    return parseStateField(projectId, field, result[0].value);
  }

  async saveProgress(
    projectId: string,
    ledger: ProjectStateFields['ledger'],
    schedule: ProjectStateFields['schedule']
  ): Promise<void> {
    const result = await this.db
      .update(projects)
      .set({ ledger, schedule, updatedAt: new Date() })
      .where(eq(projects.id, projectId))
      .returning({ id: projects.id });

    if (result.length === 0) {
      throw new ProjectNotFoundError(projectId);
    }
  }
}
