import type { AgentRole, FunctionSchema } from '@tickertape/shared';
import {
  type ToolImpl,
  type ToolCall,
  type ToolDefinition,
  type ToolContext,
  ToolNotAllowedError,
} from './tool.types.js';
import type { DataSources } from './sources/data.sources.js';
import {
  getTokenPriceTool,
  getTrendingCoinsTool,
  searchCryptocurrenciesTool,
  getTokenHistoricalDataTool,
} from './tools/coingecko.tools.js';
import { getCryptoPriceTool, getKlinesHistoryTool, getMarketInfoTool } from './tools/hyperliquid.tools.js';
import {
  getCryptoNewsTool,
  getCryptoTweetsTool,
  getCryptoHacksTool,
  getTokenUnlocksTool,
  getProjectRaisesTool,
  getPolymarketDataTool,
  getMarketSummaryTool,
} from './tools/llamafeed.tools.js';
import { analyzeProtocolTool, analyzePoolsTool, analyzeTokenHoldersTool } from './tools/protocol.tools.js';

/** Map of which tools each agent role may call. Supervisor tools are registered at runtime. */
const ROLE_TOOLS: Record<AgentRole, string[]> = {
  supervisor: [],
  market_analyst: ['get_token_price', 'get_trending_coins', 'search_cryptocurrencies', 'get_crypto_price'],
  technical_analyst: ['get_token_historical_data', 'get_klines_history', 'get_market_info'],
  news_researcher: [
    'get_crypto_news',
    'get_crypto_tweets',
    'get_crypto_hacks',
    'get_token_unlocks',
    'get_project_raises',
    'get_polymarket_data',
    'get_market_summary',
  ],
  protocol_analyst: ['analyze_protocol', 'analyze_pools_geckoterminal', 'analyze_token_holders'],
  custom: [],
};

export const DATA_TOOLS: ToolImpl[] = [
  getTokenPriceTool,
  getTrendingCoinsTool,
  searchCryptocurrenciesTool,
  getCryptoPriceTool,
  getTokenHistoricalDataTool,
  getKlinesHistoryTool,
  getMarketInfoTool,
  getCryptoNewsTool,
  getCryptoTweetsTool,
  getCryptoHacksTool,
  getTokenUnlocksTool,
  getProjectRaisesTool,
  getPolymarketDataTool,
  getMarketSummaryTool,
  analyzeProtocolTool,
  analyzePoolsTool,
  analyzeTokenHoldersTool,
];

export interface ToolCaller {
  agentId: string;
  role: AgentRole;
}

export function toFunctionSchema(definition: ToolDefinition): FunctionSchema {
  const properties: FunctionSchema['parameters']['properties'] = {};
  const required: string[] = [];
  for (const [name, { required: isRequired, ...schema }] of Object.entries(definition.parameters)) {
    properties[name] = schema;
    if (isRequired) required.push(name);
  }
  return {
    name: definition.name,
    description: definition.description,
    parameters: { type: 'object', properties, required },
  };
}

export class ToolRegistry {
  private tools: Map<string, ToolImpl> = new Map();
  private roleTools: Record<AgentRole, string[]>;
  /** Per-agent grants; these replace the role list for that agent. */
  private agentTools: Map<string, string[]> = new Map();

  constructor(
    private readonly sources: DataSources,
    tools: ToolImpl[] = DATA_TOOLS,
  ) {
    for (const tool of tools) {
      this.tools.set(tool.definition.name, tool);
    }
    this.roleTools = structuredClone(ROLE_TOOLS);
  }

  /** Add a tool and allow it for the given roles. */
  register(tool: ToolImpl, roles: AgentRole[]): void {
    this.tools.set(tool.definition.name, tool);
    for (const role of roles) {
      const names = this.roleTools[role];
      if (!names.includes(tool.definition.name)) {
        this.roleTools[role] = [...names, tool.definition.name];
      }
    }
  }

  /** Give one agent an explicit tool set. Throws on names that are not registered. */
  grant(agentId: string, toolNames: string[]): void {
    const unknown = toolNames.filter((name) => !this.tools.has(name));
    if (unknown.length > 0) {
      throw new Error(`Unknown tool(s): ${unknown.join(', ')}. Available: ${this.getAllToolNames().join(', ')}`);
    }
    this.agentTools.set(agentId, [...toolNames]);
  }

  allowedTools(caller: ToolCaller): string[] {
    return this.agentTools.get(caller.agentId) ?? this.roleTools[caller.role];
  }

  /**
   * Execute a tool call on behalf of an agent.
   * Throws ToolNotAllowedError if the agent doesn't have access to the tool.
   */
  async execute(call: ToolCall, caller: ToolCaller): Promise<string> {
    if (!this.allowedTools(caller).includes(call.tool)) {
      throw new ToolNotAllowedError(call.tool, caller.agentId);
    }

    const impl = this.tools.get(call.tool);
    if (!impl) {
      throw new Error(`Unknown tool: "${call.tool}"`);
    }

    const ctx: ToolContext = { ...caller, sources: this.sources };
    return impl.execute(call.parameters, ctx);
  }

  /** Returns all tool definitions available to a given agent. */
  getToolsFor(caller: ToolCaller): ToolDefinition[] {
    return this.allowedTools(caller)
      .map((name) => this.tools.get(name)?.definition)
      .filter((d): d is ToolDefinition => d != null);
  }

  getFunctionSchemas(caller: ToolCaller): FunctionSchema[] {
    return this.getToolsFor(caller).map(toFunctionSchema);
  }

  /** Returns all registered tool names. */
  getAllToolNames(): string[] {
    return Array.from(this.tools.keys());
  }
}
