import { z } from 'zod';
import type {
  ChatMessage,
  ProviderAdapter,
  Recommendation,
  ResearchData,
  ResearchDataKey,
  ResearchParams,
} from '@tickertape/shared';
import type { ToolContext, ToolImpl } from '../tools/tool.types.js';
import type { DataSources } from '../tools/sources/data.sources.js';
import type { Logger } from '../logging/logger.js';
import { errorMessage } from '../utils/guards.js';
import {
  getTokenHistoricalDataTool,
  getTokenPriceTool,
  getTrendingCoinsTool,
  searchCryptocurrenciesTool,
} from '../tools/tools/coingecko.tools.js';
import {
  getCryptoHacksTool,
  getCryptoNewsTool,
  getCryptoTweetsTool,
  getMarketSummaryTool,
  getProjectRaisesTool,
  getTokenUnlocksTool,
} from '../tools/tools/llamafeed.tools.js';
import { analyzeTokenHoldersTool } from '../tools/tools/protocol.tools.js';

// ---------------------------------------------------------------------------
// Parameters
// ---------------------------------------------------------------------------

export const researchParamsSchema = z.object({
  token_symbol: z.string().trim().min(1).transform((s) => s.toUpperCase()),
  token_name: z.string().default(''),
  token_id: z.string().nullable().default(null),
  token_address: z.string().nullable().default(null),
  chain: z.string().min(1).default('ethereum'),
  days_lookback: z.coerce.number().int().min(1).max(365).default(30),
  risk_profile: z.enum(['low', 'moderate', 'high']).default('moderate'),
});

/** Output contract handed to the model for parameter extraction. */
const PARAMS_JSON_SCHEMA: Record<string, unknown> = {
  type: 'object',
  additionalProperties: false,
  required: ['token_symbol', 'token_name', 'token_id', 'token_address', 'chain', 'days_lookback', 'risk_profile'],
  properties: {
    token_symbol: { type: 'string', description: 'Ticker, e.g. BTC' },
    token_name: { type: 'string', description: 'Full name, or empty' },
    token_id: { type: ['string', 'null'], description: 'CoinGecko id, e.g. "bitcoin"' },
    token_address: { type: ['string', 'null'], description: 'Contract address, if given' },
    chain: { type: 'string', description: 'Chain of the contract; "ethereum" when unknown' },
    days_lookback: { type: 'integer', description: 'History window in days; 30 when unknown' },
    risk_profile: { type: 'string', enum: ['low', 'moderate', 'high'] },
  },
};

export type ParsedRequirements =
  | { params: ResearchParams; degraded: false }
  | { params: ResearchParams; degraded: true; reason: string };

/** Defaults for a symbol; used when the model's answer cannot be trusted. */
export function defaultParams(symbol: string): ResearchParams {
  return researchParamsSchema.parse({ token_symbol: symbol });
}

// ---------------------------------------------------------------------------
// Report parsing
// ---------------------------------------------------------------------------

export function extractRecommendation(report: string): Recommendation {
  if (report.includes('BUY')) return 'BUY';
  if (report.includes('SELL')) return 'SELL';
  return 'HOLD';
}

const SECTION_START = /^\s*(#|\*\*\s*\d+\.|\d+\.\s+[A-Z])/;

/** Text under the SUMMARY heading, up to the next heading. */
export function extractSummary(report: string): string {
  const lines = report.split('\n');
  const start = lines.findIndex((line) => line.includes('SUMMARY'));
  if (start === -1) return '';

  const headingLine = lines[start] ?? '';
  const inline = headingLine.slice(headingLine.indexOf('SUMMARY') + 'SUMMARY'.length).replace(/^[\s*:#-]+/, '');
  const body: string[] = inline ? [inline] : [];

  for (const line of lines.slice(start + 1)) {
    if (SECTION_START.test(line)) break;
    body.push(line);
  }
  return body.join('\n').trim();
}

/** One question per line; list markers dropped. */
export function parseQuestions(text: string): string[] {
  return text
    .split('\n')
    .map((line) => line.replace(/^\s*(?:[-*•]|\d+[.)])\s*/, '').trim())
    .filter((line) => line.length > 0)
    .slice(0, 5);
}

// ---------------------------------------------------------------------------
// Data gathering plan
// ---------------------------------------------------------------------------

interface GatherStep {
  key: ResearchDataKey;
  label: string;
  tool: ToolImpl;
  params: (p: ResearchParams) => Record<string, unknown>;
}

const GATHER_STEPS: GatherStep[] = [
  { key: 'basic_info', label: 'basic info', tool: searchCryptocurrenciesTool, params: (p) => ({ query: p.token_symbol }) },
  { key: 'price', label: 'current price', tool: getTokenPriceTool, params: (p) => ({ symbol: p.token_symbol }) },
  {
    key: 'historical_data',
    label: 'historical data',
    tool: getTokenHistoricalDataTool,
    params: (p) => ({
      token_id: p.token_id ?? p.token_symbol.toLowerCase(),
      token_label: p.token_name || p.token_symbol,
      vs_currency: 'usd',
      days: p.days_lookback,
    }),
  },
  { key: 'news', label: 'news', tool: getCryptoNewsTool, params: (p) => ({ days: p.days_lookback }) },
  { key: 'tweets', label: 'tweets', tool: getCryptoTweetsTool, params: (p) => ({ days: p.days_lookback }) },
  {
    key: 'trending',
    label: 'trending coins',
    tool: getTrendingCoinsTool,
    params: () => ({ limit: 10, include_platform: true }),
  },
  {
    key: 'market_summary',
    label: 'market summary',
    tool: getMarketSummaryTool,
    params: (p) => ({ days: p.days_lookback }),
  },
  { key: 'hacks', label: 'hacks', tool: getCryptoHacksTool, params: (p) => ({ days: p.days_lookback }) },
  { key: 'unlocks', label: 'token unlocks', tool: getTokenUnlocksTool, params: (p) => ({ days: p.days_lookback }) },
  { key: 'raises', label: 'fundraising rounds', tool: getProjectRaisesTool, params: (p) => ({ days: p.days_lookback }) },
];

const HOLDERS_STEP: GatherStep = {
  key: 'holders',
  label: 'holder data',
  tool: analyzeTokenHoldersTool,
  params: (p) => ({
    token_address: p.token_address ?? '',
    token_label: p.token_name || p.token_symbol,
    chain: p.chain,
  }),
};

// ---------------------------------------------------------------------------
// Prompts
// ---------------------------------------------------------------------------

function questionsPrompt(symbol: string): string {
  return `\
I want to research the crypto asset ${symbol}. Which 3-5 clarifying questions would you ask
to understand my goals for this token? Cover:
1. The purpose (investing, trading, general understanding)
2. The time horizon
3. The aspects that matter most (technology, tokenomics, team, on-chain activity)
4. My risk profile
Return only the questions, one per line, without numbering.`;
}

function requirementsPrompt(history: ChatMessage[]): string {
  const dialogue = history
    .filter((m) => m.role === 'user' || m.role === 'assistant')
    .map((m) => `${m.role === 'user' ? 'User' : 'Assistant'}: ${m.content}`)
    .join('\n');

  return `\
From the dialogue below, extract the research parameters for one crypto token:
token_symbol, token_name, token_id (CoinGecko id), token_address (contract), chain
(default "ethereum"), days_lookback (default 30), risk_profile ("low" | "moderate" | "high",
default "moderate"). Use null for ids and addresses that were not given.

Dialogue:
${dialogue}`;
}

function analysisPrompt(params: ResearchParams, data: ResearchData): string {
  const sections = Object.entries(data)
    .map(([key, value]) => `=== ${key.toUpperCase()} ===\n${value ?? ''}`)
    .join('\n\n');

  return `\
You are an experienced crypto analyst. Analyse the data below about ${params.token_symbol} and write
a complete report.

RESEARCH PARAMETERS:
- Token: ${params.token_name || params.token_symbol} (${params.token_symbol})
- Horizon: ${params.days_lookback} days
- Risk profile: ${params.risk_profile}

COLLECTED DATA:
${sections}

Write the report with these numbered Markdown sections:
1. SUMMARY: the token and where it stands now (3-4 sentences)
2. PRICE ANALYSIS: current price and change over the period, key support and resistance, volatility
3. TECHNICAL ANALYSIS: short and medium-term trend, volume dynamics
4. MARKET ANALYSIS: market cap and position, liquidity, venues
5. SOCIAL SIGNALS: social activity, community mood, recent news and its impact
6. RISK ASSESSMENT: technical, market and regulatory risks
7. RECOMMENDATION: exactly one of BUY / HOLD / SELL, the reasoning for a ${params.risk_profile}
   risk profile, and optimistic, neutral and pessimistic scenarios

Some data may read "Unable to fetch ...": say what that leaves uncertain instead of guessing.`;
}

// ---------------------------------------------------------------------------
// DeepResearch
// ---------------------------------------------------------------------------

export interface DeepResearchDeps {
  provider: ProviderAdapter;
  sources: DataSources;
  logger: Logger;
}

export interface ResearchAnalysis {
  fullReport: string;
  recommendation: Recommendation;
  summary: string;
}

/** Single-token research: clarify, extract parameters, fan out to the data tools, analyse. */
export class DeepResearch {
  private readonly provider: ProviderAdapter;
  private readonly logger: Logger;
  private readonly ctx: ToolContext;

  constructor(deps: DeepResearchDeps) {
    this.provider = deps.provider;
    this.logger = deps.logger.child('research');
    this.ctx = { agentId: 'deep_research', role: 'custom', sources: deps.sources };
  }

  async getClarificationQuestions(symbol: string): Promise<string[]> {
    const response = await this.provider.chat([{ role: 'user', content: questionsPrompt(symbol) }]);
    return parseQuestions(response.content);
  }

  /**
   * Ask the model for the parameters under a JSON schema. Anything it returns
   * that does not validate falls back to defaults, flagged as degraded.
   */
  async parseUserRequirements(history: ChatMessage[], requestedSymbol?: string): Promise<ParsedRequirements> {
    try {
      const raw = await this.provider.structured(
        [{ role: 'user', content: requirementsPrompt(history) }],
        'research_params',
        PARAMS_JSON_SCHEMA,
      );
      let candidate: unknown;
      try {
        candidate = JSON.parse(raw);
      } catch {
        throw new Error('model returned invalid JSON');
      }
      const parsed = researchParamsSchema.safeParse(candidate);
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new Error(`invalid parameters: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'unknown'}`);
      }
      return { params: parsed.data, degraded: false };
    } catch (err) {
      const reason = errorMessage(err);
      this.logger.warn(`parameter extraction degraded: ${reason}`);
      const symbol = symbolFromHistory(history) ?? requestedSymbol ?? 'BTC';
      return { params: defaultParams(symbol), degraded: true, reason };
    }
  }

  /** Run every source concurrently. A failing source leaves a placeholder; it never fails the whole. */
  async gatherResearchData(params: ResearchParams): Promise<ResearchData> {
    const steps = params.token_address ? [...GATHER_STEPS, HOLDERS_STEP] : GATHER_STEPS;

    const results = await Promise.all(
      steps.map(async (step): Promise<[ResearchDataKey, string]> => {
        try {
          return [step.key, await step.tool.execute(step.params(params), this.ctx)];
        } catch (err) {
          const message = errorMessage(err);
          this.logger.warn(`${step.label} unavailable: ${message}`);
          return [step.key, `Unable to fetch ${step.label}: ${message}`];
        }
      }),
    );

    const data: ResearchData = {};
    for (const [key, value] of results) {
      data[key] = value;
    }
    return data;
  }

  async analyzeResearchData(params: ResearchParams, data: ResearchData): Promise<ResearchAnalysis> {
    const response = await this.provider.chat([{ role: 'user', content: analysisPrompt(params, data) }]);
    const fullReport = response.content.trim();
    return {
      fullReport,
      recommendation: extractRecommendation(fullReport),
      summary: extractSummary(fullReport),
    };
  }
}

/** First 2-10 letter all-caps word in the user's messages. */
export function symbolFromHistory(history: ChatMessage[]): string | undefined {
  for (const message of history) {
    if (message.role !== 'user') continue;
    const match = /\b[A-Z]{2,10}\b/.exec(message.content);
    if (match) return match[0];
  }
  return undefined;
}
