/** Tickertape color palette: amber ticker text on black, green/red for up/down. */
export const THEME = {
  /** Amber: labels, active agents, the prompt */
  primary: '#FBBF24',
  /** Deep amber: borders */
  accent: '#D97706',
  /** Gray: inactive text */
  dim: '#6B7280',
  /** Dark gray: inactive borders */
  dimBorder: '#374151',
  /** Green: completed / BUY */
  success: '#22C55E',
  /** Red: errors / failed / SELL */
  error: '#EF4444',
  /** Sky: research questions */
  info: '#38BDF8',
  /** Orange: in-progress work */
  warning: '#F97316',
  text: 'white',
  /** Light gray: secondary text */
  textDim: '#9CA3AF',
} as const;
