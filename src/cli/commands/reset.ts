/**
 * `reset` command: clears a project's ledger and review schedule. The
 * syllabus is kept. This is the only way to clear corrupted concept entries.
 */

import type { MasteryEngine } from '../../core/engine';
import type { Project } from '../../core/models';
import { CliError } from './shared';
import { green } from '../utils/terminal';

export async function runResetCommand(
  engine: MasteryEngine,
  project: Project,
  options: { yes?: boolean }
): Promise<void> {
  if (!options.yes) {
    throw new CliError(
      `Resetting "${project.name}" deletes all of its quiz history.`,
      'Re-run with --yes to confirm.'
    );
  }

  await engine.resetProgress(project.id);
  console.log(green(`Progress for "${project.name}" has been reset.`));
}
