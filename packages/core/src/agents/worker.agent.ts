import { EventEmitter } from 'node:events';
import type {
  AgentInfo,
  AgentLogEntry,
  AgentRole,
  AgentState,
  ChatResponse,
  ProviderAdapter,
  TokenUsage,
  ToolCallRequest,
} from '@tickertape/shared';
import type { ToolRegistry, ToolCaller } from '../tools/tool.registry.js';
import type { AgentLockRegistry } from '../locks/agent.lock.js';
import type { Logger } from '../logging/logger.js';
import { errorMessage } from '../utils/guards.js';
import { ConversationState } from './conversation.state.js';

export interface WorkerAgentConfig {
  /** Unique agent identifier, e.g. "market_analyst". */
  id: string;
  role: AgentRole;
  /** One line for `/agents`. */
  description: string;
  systemPrompt: string;
  /** Model round trips per `process` call. */
  maxIterations: number;
  /** Non-system messages sent with each call. */
  maxHistoryMessages: number;
}

export interface AgentDeps {
  provider: ProviderAdapter;
  tools: ToolRegistry;
  locks: AgentLockRegistry;
  logger: Logger;
}

export interface ProcessOptions {
  /** Lock holder label, usually the task id. */
  holder?: string;
}

// ---------------------------------------------------------------------------
// Event declarations
// ---------------------------------------------------------------------------

// eslint-disable-next-line @typescript-eslint/no-unsafe-declaration-merging
export interface WorkerAgent {
  on(event: 'state', listener: (state: AgentState) => void): this;
  emit(event: 'state', state: AgentState): boolean;
}

const MAX_BROADCAST_LOG = 50;

/**
 * Tool-calling loop around one conversation: call the model, run any tools it
 * asks for, feed the outputs back, stop on the first reply without tool calls.
 *
 * The supervisor and every worker are instances of this class with different
 * prompts and tool sets.
 */
// eslint-disable-next-line @typescript-eslint/no-unsafe-declaration-merging
export class WorkerAgent extends EventEmitter {
  readonly conversation = new ConversationState();

  private readonly config: WorkerAgentConfig;
  private readonly deps: AgentDeps;
  private readonly logger: Logger;
  private _state: AgentState;
  private usage: TokenUsage = { promptTokens: 0, completionTokens: 0, totalTokens: 0 };

  constructor(config: WorkerAgentConfig, deps: AgentDeps) {
    super();
    this.config = config;
    this.deps = deps;
    this.logger = deps.logger.child(config.id);
    this._state = { id: config.id, role: config.role, status: 'idle', currentAction: null, log: [] };
    this.conversation.append('system', config.systemPrompt);
  }

  get id(): string {
    return this.config.id;
  }

  get role(): AgentRole {
    return this.config.role;
  }

  get state(): AgentState {
    return { ...this._state, log: this._state.log.slice(-MAX_BROADCAST_LOG) };
  }

  get tokenUsage(): TokenUsage {
    return { ...this.usage };
  }

  info(): AgentInfo {
    return {
      id: this.config.id,
      role: this.config.role,
      description: this.config.description,
      tools: this.deps.tools.getToolsFor(this.caller).map((tool) => tool.name),
      messageCount: this.conversation.length,
    };
  }

  /**
   * Handle one instruction and resolve with the final answer. Calls on the
   * same agent run one at a time. Provider errors reject; tool errors are fed
   * back to the model as `Error: ...` tool output.
   */
  process(instruction: string, options: ProcessOptions = {}): Promise<string> {
    return this.deps.locks.runExclusive(this.config.id, options.holder ?? 'direct', () => this.run(instruction));
  }

  /** Drop the conversation and start again from the system prompt. */
  reset(): void {
    this.conversation.clear();
    this.conversation.append('system', this.config.systemPrompt);
    this._state = { id: this.config.id, role: this.config.role, status: 'idle', currentAction: null, log: [] };
    this.emit('state', this.state);
  }

  // ---------------------------------------------------------------------------
  // Loop
  // ---------------------------------------------------------------------------

  private get caller(): ToolCaller {
    return { agentId: this.config.id, role: this.config.role };
  }

  private async run(instruction: string): Promise<string> {
    const { maxIterations, maxHistoryMessages } = this.config;
    const schemas = this.deps.tools.getFunctionSchemas(this.caller);

    this.conversation.append('user', instruction);
    this.addLog({ type: 'message', content: instruction });

    let lastText = '';

    for (let iteration = 0; iteration < maxIterations; iteration++) {
      this.setStatus('thinking', iteration === 0 ? 'Processing request...' : 'Reading tool results...');

      let response: ChatResponse;
      try {
        response = await this.deps.provider.chat(this.conversation.toPrompt(maxHistoryMessages), schemas);
      } catch (err) {
        this.setStatus('error', null, errorMessage(err));
        throw err;
      }
      this.trackUsage(response.usage);

      const text = response.content.trim();
      if (text) {
        lastText = text;
        this.addLog({ type: 'thought', content: text });
      }

      if (response.toolCalls.length === 0) {
        this.conversation.append('assistant', response.content);
        this.setStatus('done', null, text);
        return response.content;
      }

      this.conversation.append('assistant', response.content, { toolCalls: response.toolCalls });
      for (const call of response.toolCalls) {
        await this.runTool(call);
      }
    }

    const note = `[Stopped after ${maxIterations} model calls without a final answer]`;
    const answer = lastText ? `${lastText}\n\n${note}` : note;
    this.logger.warn(`iteration limit reached (${maxIterations})`);
    this.conversation.append('assistant', answer);
    this.setStatus('done', null, answer);
    return answer;
  }

  private async runTool(call: ToolCallRequest): Promise<void> {
    this.conversation.recordToolCall(call);
    this.setStatus('acting', `Calling tool: ${call.name}`);
    this.addLog({ type: 'tool_call', content: JSON.stringify({ tool: call.name, arguments: call.arguments }) });

    const started = Date.now();
    let output: string;
    let error: string | null = null;
    try {
      output = await this.deps.tools.execute({ id: call.id, tool: call.name, parameters: call.arguments }, this.caller);
    } catch (err) {
      error = errorMessage(err);
      output = `Error: ${error}`;
      this.logger.warn(`tool ${call.name} failed: ${error}`);
    }

    this.conversation.append('tool', output, { toolCallId: call.id });
    this.conversation.recordToolResult({
      callId: call.id,
      toolName: call.name,
      success: error === null,
      error,
      executionMs: Date.now() - started,
    });
    this.addLog({ type: 'tool_result', content: output });
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private trackUsage(last: TokenUsage | undefined): void {
    if (!last) return;
    this.usage = {
      promptTokens: this.usage.promptTokens + last.promptTokens,
      completionTokens: this.usage.completionTokens + last.completionTokens,
      totalTokens: this.usage.totalTokens + last.totalTokens,
    };
  }

  private setStatus(status: AgentState['status'], currentAction: string | null, summary?: string): void {
    this._state = { ...this._state, status, currentAction };
    if (summary !== undefined) {
      this._state = { ...this._state, summary };
    }
    this.emit('state', this.state);
  }

  private addLog(entry: Omit<AgentLogEntry, 'timestamp'>): void {
    const logEntry: AgentLogEntry = { timestamp: Date.now(), ...entry };
    this._state = { ...this._state, log: [...this._state.log, logEntry] };
    this.emit('state', this.state);
  }
}
