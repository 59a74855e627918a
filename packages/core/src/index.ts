// @tickertape/core: entry point
export * from './config/config.defaults.js';
export * from './config/config.loader.js';
export { createLogger, silentLogger } from './logging/logger.js';
export { errorMessage } from './utils/guards.js';
export type { Logger, LogSink } from './logging/logger.js';
// Providers
export { OpenAIAdapter } from './providers/openai/openai.adapter.js';
export { OllamaAdapter } from './providers/ollama/ollama.adapter.js';
export { createProvider } from './providers/provider.factory.js';
export { withRetry } from './providers/provider.retry.js';
// Data sources and tools
export { createDataSources } from './tools/sources/data.sources.js';
export type { DataSources } from './tools/sources/data.sources.js';
export { SourceRequestError } from './tools/sources/http.source.js';
export type { FetchLike } from './tools/sources/http.source.js';
export { ToolRegistry, DATA_TOOLS } from './tools/tool.registry.js';
export { ToolNotAllowedError, ToolArgumentError } from './tools/tool.types.js';
export type { ToolDefinition, ToolCall, ToolContext, ToolImpl, ToolParameter } from './tools/tool.types.js';
export { createSupervisorTools } from './tools/tools/supervisor.tools.js';
// Agents
export { ConversationState } from './agents/conversation.state.js';
export { WorkerAgent } from './agents/worker.agent.js';
export type { WorkerAgentConfig, AgentDeps, ProcessOptions } from './agents/worker.agent.js';
export { AgentRegistry, DuplicateAgentError } from './agents/agent.registry.js';
export { AgentLockRegistry } from './locks/agent.lock.js';
export type { AgentLockRegistryOptions } from './locks/agent.lock.js';
// Tasks
export { TaskLedger, TaskNotFoundError, TaskTransitionError } from './tasks/task.ledger.js';
export type { CreateTaskInput } from './tasks/task.ledger.js';
export { TaskScheduler } from './tasks/task.scheduler.js';
export { ReportMerger, renderResult } from './tasks/report.merger.js';
// Research
export { DeepResearch } from './research/deep.research.js';
export { ResearchSession, ResearchInputError } from './research/research.session.js';
export type { ResearchStage } from './research/research.session.js';
// System and bridge
export { AgentSystem, AgentSystemBusyError } from './orchestrator/agent.system.js';
export type { AgentSystemOptions } from './orchestrator/agent.system.js';
export { CommandDispatcher } from './commands/command.dispatcher.js';
export { TickertapeServer } from './server/websocket.server.js';
export type { TickertapeServerOptions } from './server/websocket.server.js';
