// @tickertape/shared: barrel export
export type {
  AgentRole,
  WorkerRole,
  AgentStatus,
  AgentLogEntry,
  AgentState,
  AgentInfo,
  SystemStats,
} from './agent.types.js';
export type {
  TaskStatus,
  TaskResult,
  Task,
  TaskStats,
  TaskExecution,
  TaskSummaryInfo,
  MergedReport,
  RequestOutcome,
} from './task.types.js';
export type {
  MessageRole,
  ToolCallRequest,
  ConversationMessage,
  ToolCallRecord,
  ToolResultRecord,
} from './conversation.types.js';
export type { AgentLock } from './lock.types.js';
export type {
  TickertapeConfig,
  ProviderConfig,
  OllamaProviderConfig,
  OpenAIProviderConfig,
  SourcesConfig,
  LogLevel,
} from './config.types.js';
export type {
  ProviderAdapter,
  ChatMessage,
  ChatResponse,
  FunctionSchema,
  FunctionParameters,
  SchemaProperty,
  TokenUsage,
} from './provider.types.js';
export type {
  RiskProfile,
  ResearchParams,
  Recommendation,
  ResearchDataKey,
  ResearchData,
  ResearchReport,
} from './research.types.js';
export type { SystemPhase, ClientMessage, ServerMessage } from './websocket.types.js';
