import type { ToolImpl } from '../tool.types.js';
import { optionalNumber, requireString, stringList } from '../tool.params.js';
import type { TaskLedger } from '../../tasks/task.ledger.js';
import type { AgentRegistry } from '../../agents/agent.registry.js';
import type { ReportMerger } from '../../tasks/report.merger.js';

export interface SupervisorToolDeps {
  ledger: TaskLedger;
  agents: AgentRegistry;
  merger: ReportMerger;
}

/** The supervisor's three tools, bound to this system's ledger and roster. */
export function createSupervisorTools({ ledger, agents, merger }: SupervisorToolDeps): ToolImpl[] {
  const delegateTask: ToolImpl = {
    definition: {
      name: 'delegate_task',
      description: 'Create a task for one analyst. The task runs after you reply.',
      parameters: {
        agent_id: { type: 'string', description: 'Analyst id, e.g. "market_analyst"', required: true },
        title: { type: 'string', description: 'Short task title', required: true },
        description: {
          type: 'string',
          description: 'Self-contained instructions: token, period, what to analyse',
          required: true,
        },
        priority: { type: 'number', description: '1 (low) to 5 (high); default 1', required: false },
      },
    },

    async execute(params) {
      const requested = requireString('delegate_task', params, 'agent_id');
      const title = requireString('delegate_task', params, 'title');
      const description = requireString('delegate_task', params, 'description');
      const priority = optionalNumber('delegate_task', params, 'priority', 1, { min: 1, max: 5 });

      const agentId = agents.resolveId(requested);
      if (!agentId) {
        return `Error: agent '${requested}' not found. Available agents: ${agents.ids().join(', ')}`;
      }

      const task = ledger.create({ title, description, assignedAgentId: agentId, priority });
      return `Task delegated to ${agentId}. Task ID: ${task.id}`;
    },
  };

  const checkTaskStatus: ToolImpl = {
    definition: {
      name: 'check_task_status',
      description: 'Status of a delegated task, with its result once completed.',
      parameters: {
        task_id: { type: 'string', description: 'Task ID returned by delegate_task', required: true },
      },
    },

    async execute(params) {
      const taskId = requireString('check_task_status', params, 'task_id');
      const task = ledger.get(taskId);
      if (!task) {
        return JSON.stringify({ error: `Task ${taskId} not found` });
      }

      return JSON.stringify({
        task_id: task.id,
        title: task.title,
        status: task.status,
        assigned_agent_id: task.assignedAgentId,
        ...(task.status === 'completed' ? { result: task.result } : {}),
      });
    },
  };

  const mergeResults: ToolImpl = {
    definition: {
      name: 'merge_results',
      description: 'Combine the results of finished tasks into one structured Markdown report.',
      parameters: {
        task_ids: { type: 'array', items: { type: 'string' }, description: 'Task IDs to merge', required: true },
        summary_title: { type: 'string', description: 'Report title', required: true },
      },
    },

    async execute(params) {
      const taskIds = stringList('merge_results', params, 'task_ids');
      const title = requireString('merge_results', params, 'summary_title');
      const report = await merger.mergeResults(taskIds, title);
      return report.structuredReport;
    },
  };

  return [delegateTask, checkTaskStatus, mergeResults];
}
