/**
 * Repository Layer - Barrel Export
 *
 * @example
 * ```typescript
 * import { ProjectRepository } from '@/storage/repositories';
 *
 * const projectRepo = new ProjectRepository(db);
 * ```
 */

export type {
  Repository,
  ProjectStore,
  ProjectStateField,
  ProjectStateFields,
} from './base';

export {
  ProjectRepository,
  type CreateProjectInput,
  type UpdateProjectInput,
} from './project.repository';
