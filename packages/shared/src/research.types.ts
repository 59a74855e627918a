export type RiskProfile = 'low' | 'moderate' | 'high';

export interface ResearchParams {
  token_symbol: string;
  token_name: string;
  token_id: string | null;
  token_address: string | null;
  chain: string;
  days_lookback: number;
  risk_profile: RiskProfile;
}

export type Recommendation = 'BUY' | 'HOLD' | 'SELL';

export type ResearchDataKey =
  | 'basic_info'
  | 'price'
  | 'historical_data'
  | 'news'
  | 'tweets'
  | 'trending'
  | 'market_summary'
  | 'hacks'
  | 'unlocks'
  | 'raises'
  | 'holders';

export type ResearchData = Partial<Record<ResearchDataKey, string>>;

export interface ResearchReport {
  params: ResearchParams;
  /** True when parameters came from the heuristic fallback rather than the model. */
  degraded: boolean;
  data: ResearchData;
  fullReport: string;
  recommendation: Recommendation;
  summary: string;
  timestamp: number;
}
