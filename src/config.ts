/**
 * Environment configuration for the CLI and embedding applications.
 *
 *   CHESS_AI_DIFFICULTY   beginner | easy | medium | hard | expert (default medium)
 *   CHESS_AI_MAX_TIME_MS  per-move time budget override
 *   CHESS_AI_STRATEGY     minimax | mcts (default minimax)
 *   CHESS_LOG             1/true/on enables tagged console logging
 *   CHESS_STATE_FILE      file the game-state logger writes after every move
 */

import { z } from 'zod';
import { ChessAI } from './chess/ChessAI.js';
import { ChessError } from './chess/ChessErrors.js';
import type { AIDifficulty, AIStrategy } from './chess/types.js';
import { setLoggingEnabled, setStateFile } from './core/GameStateLogger.js';

export const EngineEnvSchema = z.object({
  CHESS_AI_DIFFICULTY: z.enum(['beginner', 'easy', 'medium', 'hard', 'expert']).default('medium'),
  CHESS_AI_MAX_TIME_MS: z.coerce.number().int().positive().optional(),
  CHESS_AI_STRATEGY: z.enum(['minimax', 'mcts']).default('minimax'),
  CHESS_LOG: z
    .enum(['1', '0', 'true', 'false', 'on', 'off'])
    .optional()
    .transform(value => value === '1' || value === 'true' || value === 'on'),
  CHESS_STATE_FILE: z.string().min(1).optional(),
});

export interface EngineConfig {
  difficulty: AIDifficulty;
  /** Overrides the difficulty preset's time budget */
  maxTime?: number;
  strategy: AIStrategy;
  logging: boolean;
  stateFile: string | null;
}

/**
 * Parse engine settings from an environment. Invalid values raise
 * INVALID_CONFIG naming every offending variable.
 */
export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const parsed = EngineEnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ChessError('INVALID_CONFIG', `Invalid environment: ${problems.join('; ')}`, { problems });
  }
  const data = parsed.data;
  return {
    difficulty: data.CHESS_AI_DIFFICULTY,
    maxTime: data.CHESS_AI_MAX_TIME_MS,
    strategy: data.CHESS_AI_STRATEGY,
    logging: data.CHESS_LOG,
    stateFile: data.CHESS_STATE_FILE ?? null,
  };
}

/** Point the game-state logger at the configured outputs */
export function applyLoggingConfig(config: EngineConfig): void {
  setLoggingEnabled(config.logging);
  setStateFile(config.stateFile);
}

export function createConfiguredAI(config: EngineConfig): ChessAI {
  return ChessAI.fromDifficulty(config.difficulty, {
    strategy: config.strategy,
    ...(config.maxTime !== undefined ? { maxTime: config.maxTime } : {}),
  });
}
