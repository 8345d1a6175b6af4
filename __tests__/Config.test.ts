/**
 * Environment configuration tests
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { describe, it, expect, afterEach } from 'vitest';
import { ChessEngine } from '../src/chess/ChessEngine.js';
import { isChessError } from '../src/chess/ChessErrors.js';
import { applyLoggingConfig, createConfiguredAI, loadEngineConfig } from '../src/config.js';
import { isLoggingEnabled } from '../src/core/GameStateLogger.js';

function configError(env: NodeJS.ProcessEnv): unknown {
  try {
    loadEngineConfig(env);
  } catch (error) {
    return error;
  }
  return null;
}

describe('loadEngineConfig', () => {
  it('falls back to defaults', () => {
    expect(loadEngineConfig({})).toEqual({
      difficulty: 'medium',
      maxTime: undefined,
      strategy: 'minimax',
      logging: false,
      stateFile: null,
    });
  });

  it('reads every variable', () => {
    expect(
      loadEngineConfig({
        CHESS_AI_DIFFICULTY: 'hard',
        CHESS_AI_MAX_TIME_MS: '1500',
        CHESS_AI_STRATEGY: 'mcts',
        CHESS_LOG: 'on',
        CHESS_STATE_FILE: '/tmp/chess-state.txt',
      })
    ).toEqual({
      difficulty: 'hard',
      maxTime: 1500,
      strategy: 'mcts',
      logging: true,
      stateFile: '/tmp/chess-state.txt',
    });
    expect(loadEngineConfig({ CHESS_LOG: 'false' }).logging).toBe(false);
  });

  it('ignores unrelated variables', () => {
    expect(loadEngineConfig({ PATH: '/usr/bin', HOME: '/root' }).difficulty).toBe('medium');
  });

  it('raises INVALID_CONFIG naming each bad variable', () => {
    const error = configError({ CHESS_AI_DIFFICULTY: 'grandmaster', CHESS_AI_MAX_TIME_MS: '-5' });
    expect(isChessError(error, 'INVALID_CONFIG')).toBe(true);
    if (!isChessError(error)) return;
    const problems = error.details?.problems;
    expect(Array.isArray(problems) && problems.length).toBe(2);
    expect(error.message).toContain('CHESS_AI_DIFFICULTY');
    expect(error.message).toContain('CHESS_AI_MAX_TIME_MS');
  });

  it('rejects a time budget that is not a number', () => {
    expect(isChessError(configError({ CHESS_AI_MAX_TIME_MS: 'soon' }), 'INVALID_CONFIG')).toBe(true);
  });
});

describe('createConfiguredAI', () => {
  it('applies the difficulty preset', () => {
    const ai = createConfiguredAI(loadEngineConfig({ CHESS_AI_DIFFICULTY: 'easy' }));
    expect(ai.getConfig()).toMatchObject({ difficulty: 'easy', maxDepth: 2, maxTime: 1000 });
  });

  it('overrides the preset time budget', () => {
    const ai = createConfiguredAI(loadEngineConfig({ CHESS_AI_DIFFICULTY: 'hard', CHESS_AI_MAX_TIME_MS: '1500' }));
    expect(ai.getConfig()).toMatchObject({ difficulty: 'hard', maxDepth: 4, maxTime: 1500 });
  });

  it('selects the tree search strategy', () => {
    const ai = createConfiguredAI(loadEngineConfig({ CHESS_AI_STRATEGY: 'mcts' }));
    expect(ai.getConfig()).toMatchObject({ difficulty: 'medium', strategy: 'mcts', maxTime: 2000 });
    expect(isChessError(configError({ CHESS_AI_STRATEGY: 'alphazero' }), 'INVALID_CONFIG')).toBe(true);
  });
});

describe('applyLoggingConfig', () => {
  afterEach(() => {
    applyLoggingConfig({ difficulty: 'medium', strategy: 'minimax', logging: false, stateFile: null });
  });

  it('writes the game state to the configured file', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'chess-state-'));
    const file = path.join(dir, 'state.txt');
    applyLoggingConfig(loadEngineConfig({ CHESS_STATE_FILE: file }));
    expect(isLoggingEnabled()).toBe(false);

    const engine = new ChessEngine();
    engine.move({ from: 'e2', to: 'e4' });

    const content = fs.readFileSync(file, 'utf-8');
    expect(content).toContain('CURRENT SCREEN: Chess\n');
    expect(content).toContain('STATUS: Played e2e4. Black to move\n');
    expect(content).toContain('"fen": "rnbqkbnr/pppppppp/8/8/4P3/8/PPPP1PPP/RNBQKBNR b KQkq e3 0 1"');

    fs.rmSync(dir, { recursive: true, force: true });
  });
});
