/**
 * `projects` command: lists every project with its syllabus size and how
 * many concepts have been quizzed.
 */

import { DataCorruptionError } from '../../core/errors';
import type { ProjectRepository } from '../../storage/repositories';
import { bold, dim, red, yellow, formatSeparator, truncate } from '../utils/terminal';

export interface ProjectSummaryLine {
  id: string;
  name: string;
  level: string;
  conceptCount: number;
  testedCount: number;
  /** Stored state failed validation; counts are zero */
  corrupted: boolean;
}

/**
 * Collects one summary per project, in name order.
 */
export async function summarizeProjects(projects: ProjectRepository): Promise<ProjectSummaryLine[]> {
  const all = await projects.findAll();
  const summaries: ProjectSummaryLine[] = [];

  for (const project of all) {
    const base = { id: project.id, name: project.name, level: project.level };
    try {
      const syllabus = (await projects.getField(project.id, 'syllabus')) ?? [];
      const ledger = (await projects.getField(project.id, 'ledger')) ?? [];
      summaries.push({
        ...base,
        conceptCount: syllabus.length,
        testedCount: ledger.filter((record) => record.total > 0).length,
        corrupted: false,
      });
    } catch (err) {
      if (!(err instanceof DataCorruptionError)) throw err;
      summaries.push({ ...base, conceptCount: 0, testedCount: 0, corrupted: true });
    }
  }

  return summaries.sort((a, b) => a.name.localeCompare(b.name));
}

/**
 * Renders the project list.
 */
export function formatProjectList(summaries: readonly ProjectSummaryLine[]): string[] {
  const lines = [bold('Projects:'), formatSeparator(60)];

  if (summaries.length === 0) {
    lines.push(yellow('  No projects found.'));
    lines.push(dim('  Create one with POST /api/projects.'));
  }

  for (const summary of summaries) {
    lines.push(`  ${bold(truncate(summary.name, 40))} ${dim(`(${summary.level})`)}`);
    const counts = summary.corrupted
      ? red('stored state is corrupted; run "mastery reset" on it')
      : `${summary.conceptCount} concepts, ${summary.testedCount} quizzed`;
    lines.push(`    ${dim(summary.id)} | ${counts}`);
  }

  lines.push(formatSeparator(60));
  return lines;
}

export async function runProjectsCommand(projects: ProjectRepository): Promise<void> {
  for (const line of formatProjectList(await summarizeProjects(projects))) {
    console.log(line);
  }
}
