/**
 * Drill pipeline settings, validated once and passed into each pipeline
 * at construction time
 */

import { z } from 'zod';
import { DIFFICULTIES, SELECTION_STRATEGIES } from '../types/index.js';

export const drillConfigSchema = z.object({
  defaultDifficulty: z.enum(DIFFICULTIES),
  defaultStrategy: z.enum(SELECTION_STRATEGIES),
  questionTemperature: z.number().min(0).max(1.5),
  evaluationTemperature: z.number().min(0).max(1.5),
  /** Added to the question temperature on every retry */
  temperatureStep: z.number().min(0).max(0.5),
  maxContextLength: z.number().int().min(200).max(32000),
  maxQuestionLength: z.number().int().min(20).max(2000),
  /** Total model attempts per call, validation and transport failures alike */
  maxRetries: z.number().int().min(1).max(10),
  modelTimeoutMs: z.number().int().min(100).max(600000),
  retrievalTimeoutMs: z.number().int().min(100).max(600000),
  retryDelayMs: z.number().int().min(0).max(60000),
  /** Scores at or above this count as correct */
  correctThreshold: z.number().gt(0).max(10),
  duplicateSimilarity: z.number().gt(0).max(1),
  recentQuestionLimit: z.number().int().min(1).max(1000),
  usedFragmentLimit: z.number().int().min(1).max(10000),
  recentTierRatio: z.number().gt(0).max(1),
  evaluationTopK: z.number().int().min(1).max(50),
  questionMaxTokens: z.number().int().min(16).max(8192),
  evaluationMaxTokens: z.number().int().min(64).max(8192),
});

export type DrillConfig = z.infer<typeof drillConfigSchema>;

export const DEFAULT_DRILL_CONFIG: DrillConfig = {
  defaultDifficulty: 'medium',
  defaultStrategy: 'diverse',
  questionTemperature: 0.7,
  evaluationTemperature: 0.3,
  temperatureStep: 0.1,
  maxContextLength: 4000,
  maxQuestionLength: 500,
  maxRetries: 3,
  modelTimeoutMs: 60000,
  retrievalTimeoutMs: 15000,
  retryDelayMs: 500,
  correctThreshold: 6,
  duplicateSimilarity: 0.85,
  recentQuestionLimit: 20,
  usedFragmentLimit: 500,
  recentTierRatio: 0.25,
  evaluationTopK: 5,
  questionMaxTokens: 512,
  evaluationMaxTokens: 1500,
};

/**
 * Merge overrides onto the defaults and validate the result
 */
export function resolveDrillConfig(overrides: Partial<DrillConfig> = {}): DrillConfig {
  const result = drillConfigSchema.safeParse({ ...DEFAULT_DRILL_CONFIG, ...overrides });
  if (!result.success) {
    const issues = result.error.errors
      .map(e => `${e.path.join('.')}: ${e.message}`)
      .join('; ');
    throw new Error(`Invalid drill configuration: ${issues}`);
  }
  return result.data;
}
