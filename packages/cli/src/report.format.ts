import type { RequestOutcome, ResearchReport } from '@tickertape/shared';

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  const seconds = Math.round(ms / 100) / 10;
  if (seconds < 60) return `${seconds}s`;
  return `${Math.floor(seconds / 60)}m ${Math.round(seconds % 60)}s`;
}

export function formatOutcome(outcome: RequestOutcome): string {
  const tasks = outcome.taskIds.length === 1 ? '1 task' : `${outcome.taskIds.length} tasks`;
  return `${outcome.text}\n\n(${tasks}, ${formatDuration(outcome.durationMs)})`;
}

/** Header block followed by the full analysis. */
export function formatResearchReport(report: ResearchReport): string {
  const { params } = report;
  const lines = [
    `Deep research: ${params.token_symbol}${params.token_name ? ` (${params.token_name})` : ''}`,
    `Recommendation: ${report.recommendation}`,
    `Risk profile: ${params.risk_profile} · Lookback: ${params.days_lookback} days · Chain: ${params.chain}`,
  ];
  if (report.degraded) {
    lines.push('! Could not read your answers; default research settings were used.');
  }
  if (report.summary) {
    lines.push('', report.summary);
  }
  lines.push('', report.fullReport);
  return lines.join('\n');
}

export function formatQuestions(symbol: string, questions: string[]): string {
  return [
    `Before researching ${symbol}, a few questions:`,
    ...questions.map((q, i) => `  ${i + 1}. ${q}`),
    '',
    'Answer them in one message.',
  ].join('\n');
}
