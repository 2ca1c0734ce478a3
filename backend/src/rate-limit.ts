export const RATE_LIMITS = {
  LAX: { max: 120, timeWindow: '1 minute' },
  MODERATE: { max: 30, timeWindow: '1 minute' },
} as const;
