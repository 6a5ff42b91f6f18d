import chalk from 'chalk';
import type { AdvisorResponse } from '../types/api.js';

export function renderJson(response: AdvisorResponse): string {
  return JSON.stringify(response, null, 2);
}

export function renderText(response: AdvisorResponse): string {
  const status =
    response.status === 'auto_sent'
      ? chalk.green('AUTO-SENT')
      : chalk.yellow('NEEDS REVIEW');

  const lines = [
    `${chalk.bold('Status:')} ${status} ${chalk.dim(`(confidence ${response.confidence.toFixed(3)})`)}`,
    `${chalk.bold('Subject:')} ${response.subject}`,
    '',
    response.body,
    '',
    chalk.bold('Reasons:'),
    ...response.reasons.map((reason) => `  - ${reason}`),
  ];

  if (response.topMatches.length > 0) {
    lines.push('', chalk.bold('Top matches:'));
    for (const match of response.topMatches) {
      lines.push(`  ${match.score.toFixed(3)}  ${match.id} ${chalk.dim(match.subject)}`);
    }
  }

  if (response.followUpQuestions.length > 0) {
    lines.push('', chalk.bold('Follow-up questions:'));
    lines.push(...response.followUpQuestions.map((q) => `  ? ${q}`));
  }

  if (response.references.length > 0) {
    lines.push('', chalk.bold('References:'));
    response.references.forEach((ref, i) => {
      lines.push(`  [${i + 1}] ${ref.title} ${chalk.dim(`(${ref.score.toFixed(3)})`)}`);
      lines.push(`      ${ref.snippet}`);
    });
  }

  return lines.join('\n');
}
