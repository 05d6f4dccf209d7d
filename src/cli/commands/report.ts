/**
 * `report` command: prints a project's mastery report.
 *
 * Sections:
 * 1. Summary - syllabus size and tested/weak/strong counts
 * 2. Review Priority - what the next focused quiz would target
 * 3. Concepts - per-concept accuracy and next review date
 * 4. Corrupted Entries - only when present, with the reset instruction
 */

import type { MasteryEngine, MasteryReport } from '../../core/engine';
import { CORRUPTION_RESOLUTION } from '../../core/errors';
import { daysUntil } from '../../core/srs';
import {
  bold,
  cyan,
  dim,
  red,
  yellow,
  formatAccuracy,
  formatSeparator,
  truncate,
} from '../utils/terminal';

/** Longest concept name shown before truncation */
const MAX_CONCEPT_DISPLAY = 40;

function formatDue(nextReview: string | undefined, asOf: Date): string {
  if (nextReview === undefined) return dim('not scheduled');
  const days = daysUntil(nextReview, asOf);
  if (days <= 0) return yellow(`due ${nextReview}`);
  return dim(`next ${nextReview} (in ${days}d)`);
}

/**
 * Renders a report as terminal lines.
 *
 * @param threshold - Weak threshold used to color accuracies
 */
export function formatReport(report: MasteryReport, projectName: string, threshold: number): string[] {
  const asOf = new Date(`${report.asOf}T00:00:00.000Z`);
  const { classification } = report;
  const lines: string[] = [];

  lines.push(bold(cyan(`===== Mastery Report: ${projectName} =====`)));
  lines.push(dim(`As of ${report.asOf}`));
  lines.push('');

  lines.push(bold(yellow('Summary')));
  lines.push(formatSeparator(40));
  lines.push(`  Syllabus: ${report.syllabus.length} concepts`);
  lines.push(
    `  Weak: ${classification.weak.length} | Strong: ${classification.strong.length} | Untested: ${classification.untested.length}`
  );
  lines.push(`  Due for review: ${report.due.length}`);
  lines.push('');

  lines.push(bold(yellow('Review Priority')));
  lines.push(formatSeparator(40));
  if (report.corrupted.length > 0) {
    lines.push(red('  Focused quizzes are blocked by corrupted entries; the next quiz is general.'));
  } else if (report.priority.length === 0) {
    lines.push(dim('  Nothing weak or due; the next quiz covers the whole syllabus.'));
  } else {
    report.priority.forEach((concept, index) => {
      const tag = classification.weak.includes(concept) ? red('weak') : yellow('due');
      lines.push(`  ${index + 1}. ${concept} ${dim('[')}${tag}${dim(']')}`);
    });
  }
  lines.push('');

  lines.push(bold(yellow('Concepts')));
  lines.push(formatSeparator(40));
  if (report.syllabus.length === 0) {
    lines.push(dim('  No syllabus yet. One is generated with the first quiz.'));
  }
  const records = new Map(report.ledger.map((record) => [record.concept, record]));
  const entries = new Map(report.schedule.map((entry) => [entry.concept, entry]));
  for (const concept of report.syllabus) {
    const record = records.get(concept);
    const accuracy = formatAccuracy(record?.correct ?? 0, record?.total ?? 0, threshold);
    lines.push(`  ${truncate(concept, MAX_CONCEPT_DISPLAY).padEnd(MAX_CONCEPT_DISPLAY)} ${accuracy}`);
    lines.push(`    ${formatDue(entries.get(concept)?.nextReview, asOf)}`);
  }

  if (report.corrupted.length > 0) {
    lines.push('');
    lines.push(bold(red('Corrupted Entries')));
    lines.push(formatSeparator(40));
    for (const concept of report.corrupted) {
      lines.push(`  ${red(truncate(concept, 60))}`);
    }
    lines.push(dim(`  ${CORRUPTION_RESOLUTION}`));
    lines.push(dim('  Run: mastery reset <project>'));
  }

  lines.push(formatSeparator(60));
  return lines;
}

export async function runReportCommand(
  engine: MasteryEngine,
  projectId: string,
  projectName: string,
  options: { asOf?: Date; threshold: number }
): Promise<void> {
  const report = await engine.getReport(projectId, options.asOf);
  console.log('');
  for (const line of formatReport(report, projectName, options.threshold)) {
    console.log(line);
  }
}
