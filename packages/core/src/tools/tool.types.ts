import type { AgentRole, SchemaProperty } from '@tickertape/shared';
import type { DataSources } from './sources/data.sources.js';

export interface ToolParameter extends SchemaProperty {
  required: boolean;
}

export interface ToolDefinition {
  name: string;
  description: string;
  parameters: Record<string, ToolParameter>;
}

export interface ToolCall {
  id: string;
  tool: string;
  parameters: Record<string, unknown>;
}

export class ToolNotAllowedError extends Error {
  constructor(tool: string, agentId: string) {
    super(`Tool "${tool}" is not allowed for agent "${agentId}"`);
    this.name = 'ToolNotAllowedError';
  }
}

export class ToolArgumentError extends Error {
  constructor(tool: string, message: string) {
    super(`${tool}: ${message}`);
    this.name = 'ToolArgumentError';
  }
}

/** Context passed to every tool at execution time */
export interface ToolContext {
  agentId: string;
  role: AgentRole;
  sources: DataSources;
}

/** A callable tool implementation. Throws on failure; the caller decides how to report it. */
export interface ToolImpl {
  definition: ToolDefinition;
  execute(params: Record<string, unknown>, ctx: ToolContext): Promise<string>;
}
