import type { ResearchReport } from '@tickertape/shared';
import { ConversationState } from '../agents/conversation.state.js';
import type { DeepResearch } from './deep.research.js';

export type ResearchStage = 'questioning' | 'gathering' | 'analyzing';

export class ResearchInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ResearchInputError';
  }
}

const SYMBOL_PATTERN = /^[A-Za-z0-9]{1,15}$/;

/**
 * Two-step research dialogue: `start` asks the clarifying questions, the
 * next `answer` runs the research. One research at a time.
 */
export class ResearchSession {
  private readonly conversation = new ConversationState();
  private symbol: string | null = null;

  constructor(
    private readonly research: DeepResearch,
    private readonly onStage: (stage: ResearchStage) => void = () => undefined,
  ) {}

  /** Symbol awaiting answers, or null when no research is open. */
  get pendingSymbol(): string | null {
    return this.symbol;
  }

  async start(rawSymbol: string): Promise<string[]> {
    const symbol = rawSymbol.trim().toUpperCase();
    if (!SYMBOL_PATTERN.test(symbol)) {
      throw new ResearchInputError(`Invalid token symbol: "${rawSymbol.trim()}"`);
    }

    this.onStage('questioning');
    const questions = await this.research.getClarificationQuestions(symbol);

    this.conversation.clear();
    this.conversation.append('user', `I want to research ${symbol}.`);
    this.conversation.append('assistant', questions.map((q) => `- ${q}`).join('\n'));
    this.symbol = symbol;
    return questions;
  }

  async answer(text: string): Promise<ResearchReport> {
    const symbol = this.symbol;
    if (!symbol) {
      throw new ResearchInputError('No research in progress. Start one with /research <SYMBOL>.');
    }
    this.symbol = null;
    this.conversation.append('user', text);

    const parsed = await this.research.parseUserRequirements(this.conversation.getHistory(), symbol);
    // The symbol the user asked for wins over whatever was extracted.
    const params = { ...parsed.params, token_symbol: symbol };

    this.onStage('gathering');
    const data = await this.research.gatherResearchData(params);

    this.onStage('analyzing');
    const analysis = await this.research.analyzeResearchData(params, data);

    return {
      params,
      degraded: parsed.degraded,
      data,
      fullReport: analysis.fullReport,
      recommendation: analysis.recommendation,
      summary: analysis.summary,
      timestamp: Date.now(),
    };
  }

  cancel(): void {
    this.symbol = null;
    this.conversation.clear();
  }
}
