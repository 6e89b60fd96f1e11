/**
 * Wire contract between the analysis prompt and the response interpreter.
 * Both sides read their key names from here.
 */

export const RESPONSE_KEYS = {
  trend: 'trend',
  leakProbability: 'leak_probability',
  recommendation: 'recommendation',
  details: 'details',
} as const;

export const DETAIL_KEYS = {
  identifiedPatterns: 'identified_patterns',
  anomalies: 'anomalies',
  explanation: 'explanation',
} as const;

/** Trend values the model is asked to choose from */
export const REQUESTED_TRENDS = ['stable', 'increasing', 'decreasing', 'fluctuating'] as const;

/** Key under which fallback results keep the unparsed model output */
export const RAW_RESPONSE_KEY = 'raw_response';

/**
 * Example object shown to the model as the mandatory output shape.
 */
export const RESPONSE_SHAPE_EXAMPLE = {
  [RESPONSE_KEYS.trend]: REQUESTED_TRENDS.join('|'),
  [RESPONSE_KEYS.leakProbability]: '<number between 0 and 100>',
  [RESPONSE_KEYS.recommendation]: '<recommended action>',
  [RESPONSE_KEYS.details]: {
    [DETAIL_KEYS.identifiedPatterns]: ['<pattern>'],
    [DETAIL_KEYS.anomalies]: ['<anomaly>'],
    [DETAIL_KEYS.explanation]: '<explanation of the analysis>',
  },
};
