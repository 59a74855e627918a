import type { MergedReport, ProviderAdapter, TaskResult, TaskSummaryInfo } from '@tickertape/shared';
import type { TaskLedger } from './task.ledger.js';
import type { Logger } from '../logging/logger.js';
import { errorMessage } from '../utils/guards.js';

const REPORT_SECTIONS = [
  'Executive summary: 3-5 sentences with the key findings',
  'Price overview: prices, volumes, market cap, trend',
  'Technical analysis: patterns, indicators, support and resistance',
  'Market and news context: key news, social signals, events',
  'Protocol and on-chain signals: TVL, liquidity, holder concentration',
  'Risks: what could go wrong, with the data behind it',
  'Outlook: a reasoned view with confidence and time horizon',
  'Notes: which tasks were incomplete or missing and what that leaves out',
];

export function renderResult(result: TaskResult | null): string {
  if (result === null) return '(no result)';
  return typeof result === 'string' ? result : JSON.stringify(result, null, 2);
}

function buildReportPrompt(
  summaryTitle: string,
  sections: Array<{ title: string; agent: string | null; result: string }>,
  incomplete: string[],
  missing: string[],
  originalRequest?: string,
): string {
  const numbered = REPORT_SECTIONS.map((s, i) => `${i + 1}. ${s}`).join('\n');
  const results = sections
    .map((s) => `### ${s.title} (${s.agent ?? 'unassigned'})\n${s.result}`)
    .join('\n\n');

  return `\
Write one Markdown research report from the task results below.

Title: ${summaryTitle}
${originalRequest ? `User request: ${originalRequest}\n` : ''}
Use these sections, as ## headings, in this order:
${numbered}

Formatting:
- Bold the important numbers and conclusions
- Give every number its unit and date; point out sources that disagree
- Use short bullet lists; use a table when comparing several values
- Do not invent figures that are not in the results

## Task results

${results || '(none)'}

## Incomplete tasks
${incomplete.length > 0 ? incomplete.join(', ') : 'none'}

## Missing tasks
${missing.length > 0 ? missing.join(', ') : 'none'}`;
}

/**
 * Combines finished task results into one report. The model writes the report;
 * if that call fails the results are concatenated instead.
 */
export class ReportMerger {
  constructor(
    private readonly provider: ProviderAdapter,
    private readonly ledger: TaskLedger,
    private readonly logger: Logger,
  ) {}

  async mergeResults(taskIds: string[], summaryTitle: string, originalRequest?: string): Promise<MergedReport> {
    const rawResults: Record<string, TaskResult | null> = {};
    const tasksInfo: Record<string, TaskSummaryInfo> = {};
    const missingTasks: string[] = [];
    const incompleteTasks: string[] = [];
    const completed: Array<{ title: string; agent: string | null; result: string }> = [];

    for (const id of taskIds) {
      const task = this.ledger.get(id);
      if (!task) {
        missingTasks.push(id);
        continue;
      }

      tasksInfo[id] = { title: task.title, agent: task.assignedAgentId, status: task.status };
      if (task.status !== 'completed') {
        incompleteTasks.push(id);
        continue;
      }

      rawResults[id] = task.result;
      completed.push({ title: task.title, agent: task.assignedAgentId, result: renderResult(task.result) });
    }

    let structuredReport: string;
    let usedFallback = false;
    try {
      const prompt = buildReportPrompt(summaryTitle, completed, incompleteTasks, missingTasks, originalRequest);
      const response = await this.provider.chat([{ role: 'user', content: prompt }]);
      structuredReport = response.content.trim();
      if (!structuredReport) throw new Error('empty response from model');
    } catch (err) {
      this.logger.warn(`report formatting failed, concatenating results: ${errorMessage(err)}`);
      structuredReport = fallbackReport(summaryTitle, completed, incompleteTasks, missingTasks, errorMessage(err));
      usedFallback = true;
    }

    return {
      summaryTitle,
      structuredReport,
      rawResults,
      tasksInfo,
      missingTasks,
      incompleteTasks,
      timestamp: Date.now(),
      usedFallback,
    };
  }
}

export function fallbackReport(
  summaryTitle: string,
  completed: Array<{ title: string; result: string }>,
  incomplete: string[],
  missing: string[],
  error: string,
): string {
  let report = `# ${summaryTitle}\n\n## Completed task results\n\n`;
  for (const { title, result } of completed) {
    report += `### ${title}\n\n${result}\n\n---\n\n`;
  }
  report += `Note: the report could not be formatted (${error}).`;
  if (incomplete.length > 0) report += `\nIncomplete tasks: ${incomplete.join(', ')}`;
  if (missing.length > 0) report += `\nMissing tasks: ${missing.join(', ')}`;
  return report;
}
