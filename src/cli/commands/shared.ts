/**
 * Helpers shared by the CLI commands.
 */

import type { Project } from '../../core/models';
import type { ProjectRepository } from '../../storage/repositories';
import { parseDateKey } from '../../core/srs';

/**
 * Error raised for bad CLI input. The entry point prints its message and
 * exits with status 1, without a stack trace.
 */
export class CliError extends Error {
  constructor(message: string, readonly hint?: string) {
    super(message);
    this.name = 'CliError';
  }
}

/**
 * Looks a project up by ID, then by exact name.
 *
 * @throws CliError if neither matches
 */
export async function findProject(projects: ProjectRepository, idOrName: string): Promise<Project> {
  const project = (await projects.findById(idOrName)) ?? (await projects.findByName(idOrName));
  if (!project) {
    throw new CliError(`Project "${idOrName}" not found.`, 'Use "mastery projects" to see available projects.');
  }
  return project;
}

/**
 * Parses a --as-of option (YYYY-MM-DD) to a Date at UTC midnight.
 *
 * @throws CliError if the value is not a calendar date
 */
export function parseAsOf(value: string | undefined): Date | undefined {
  if (value === undefined) return undefined;
  const date = parseDateKey(value);
  if (date === null) {
    throw new CliError(`Invalid date "${value}"; expected YYYY-MM-DD.`);
  }
  return date;
}
