#!/usr/bin/env node
/**
 * Chess engine CLI
 *
 * Usage: chess-minimax [command] [args]
 *
 * Commands:
 *   perft <depth>    - Count move-tree leaves
 *   divide <depth>   - Perft split by root move
 *   verify <depth>   - Compare move generation with chess.js
 *   analyze          - Evaluate and search a position
 *   selfplay         - Let two AIs play each other
 */

import meow from 'meow';
import {
  AI_DIFFICULTIES,
  ChessBoard,
  ChessMatch,
  STARTING_FEN,
  divide,
  isChessError,
  moveToString,
  perft,
  verifyPerft,
} from './chess/index.js';
import type { AIDifficulty } from './chess/index.js';
import { applyLoggingConfig, createConfiguredAI, loadEngineConfig } from './config.js';

const cli = meow(`
  Usage
    $ chess-minimax [command] [args]

  Commands
    perft <depth>     Count leaf nodes of the legal move tree
    divide <depth>    Perft split by root move
    verify <depth>    Compare move generation with chess.js
    analyze           Evaluate and search a position
    selfplay          Let two AIs play each other
    help              Show this help

  Options
    --fen, -f         Position to use (default: starting position)
    --depth, -d       Search depth for analyze
    --time, -t        Time budget in ms for analyze
    --difficulty      beginner | easy | medium | hard | expert (selfplay)
    --strategy        minimax | mcts (selfplay)
    --max-moves       Ply limit for selfplay (default 100)
    --verbose, -v     Print stack traces on error

  Environment
    CHESS_AI_DIFFICULTY, CHESS_AI_MAX_TIME_MS, CHESS_AI_STRATEGY, CHESS_LOG, CHESS_STATE_FILE

  Examples
    $ chess-minimax perft 4
    $ chess-minimax verify 3 --fen "r3k2r/8/8/8/8/8/8/R3K2R w KQkq - 0 1"
    $ chess-minimax analyze --depth 4
    $ chess-minimax selfplay --difficulty easy --max-moves 40
    $ chess-minimax selfplay --strategy mcts --max-moves 20
`, {
  importMeta: import.meta,
  flags: {
    fen: {
      type: 'string',
      shortFlag: 'f',
      default: STARTING_FEN,
    } as const,
    depth: {
      type: 'number',
      shortFlag: 'd',
    } as const,
    time: {
      type: 'number',
      shortFlag: 't',
    } as const,
    difficulty: {
      type: 'string',
    } as const,
    strategy: {
      type: 'string',
      choices: ['minimax', 'mcts'],
    } as const,
    maxMoves: {
      type: 'number',
      default: 100,
    } as const,
    verbose: {
      type: 'boolean',
      shortFlag: 'v',
      default: false,
    } as const,
  },
});

function parseDepth(raw: string | undefined): number {
  const depth = Number(raw);
  if (!Number.isInteger(depth) || depth < 1) {
    throw new Error(`Depth must be a positive integer, got "${raw ?? ''}"`);
  }
  return depth;
}

function parseDifficulty(raw: string): AIDifficulty {
  const match = AI_DIFFICULTIES.find(d => d === raw);
  if (!match) {
    throw new Error(`Unknown difficulty "${raw}" (expected ${AI_DIFFICULTIES.join(', ')})`);
  }
  return match;
}

function main(): void {
  const [command, depthArg] = cli.input;

  if (!command || command === 'help') {
    cli.showHelp();
    return;
  }

  try {
    const config = loadEngineConfig(process.env);
    applyLoggingConfig(config);
    const fen = cli.flags.fen;

    switch (command) {
      case 'perft': {
        const depth = parseDepth(depthArg);
        const start = Date.now();
        const nodes = perft(ChessBoard.fromFen(fen), depth);
        console.log(`perft(${depth}) = ${nodes}  (${Date.now() - start} ms)`);
        break;
      }

      case 'divide': {
        const depth = parseDepth(depthArg);
        const counts = divide(ChessBoard.fromFen(fen), depth);
        let total = 0;
        for (const [move, count] of [...counts].sort(([a], [b]) => a.localeCompare(b))) {
          console.log(`${move}: ${count}`);
          total += count;
        }
        console.log(`\nMoves: ${counts.size}`);
        console.log(`Nodes: ${total}`);
        break;
      }

      case 'verify': {
        const depth = parseDepth(depthArg);
        const result = verifyPerft(fen, depth);
        if (result.mismatches.length === 0) {
          console.log(`✅ perft(${depth}) = ${result.actual}, matches chess.js`);
        } else {
          console.log(`❌ perft(${depth}) = ${result.actual}, chess.js says ${result.expected}`);
          for (const m of result.mismatches) {
            console.log(`  ${m.move}: ours ${m.actual ?? 'missing'}, chess.js ${m.expected ?? 'missing'}`);
          }
          process.exitCode = 1;
        }
        break;
      }

      case 'analyze': {
        const board = ChessBoard.fromFen(fen);
        const ai = createConfiguredAI(config);
        const analysis = ai.analyzePosition(board, cli.flags.depth, cli.flags.time);
        console.log(board.ascii());
        console.log('');
        for (const [term, value] of Object.entries(analysis.breakdown)) {
          console.log(`  ${term.padEnd(14)} ${value}`);
        }
        console.log('');
        console.log(`Best move: ${analysis.bestMove ? moveToString(analysis.bestMove) : '(none)'}`);
        console.log(`Score:     ${analysis.score}`);
        console.log(`Depth:     ${analysis.depth} (${analysis.nodes} nodes)`);
        console.log(`PV:        ${analysis.pv.join(' ')}`);
        break;
      }

      case 'selfplay': {
        const difficulty = cli.flags.difficulty ? parseDifficulty(cli.flags.difficulty) : config.difficulty;
        const strategy = cli.flags.strategy === 'mcts' || cli.flags.strategy === 'minimax' ? cli.flags.strategy : config.strategy;
        const preset = createConfiguredAI({ ...config, difficulty, strategy }).getConfig();
        const match = new ChessMatch({ ...preset, name: 'White' }, { ...preset, name: 'Black' }, fen);
        match.onMoveCallback((snapshot, aiMove) => {
          const mover = snapshot.turn === 'w' ? 'Black' : 'White';
          const played = snapshot.history[snapshot.history.length - 1] ?? '';
          console.log(`${String(snapshot.history.length).padStart(3)}. ${mover.padEnd(5)} ${played.padEnd(6)} ${aiMove.evaluation}`);
        });
        const result = match.playGame(cli.flags.maxMoves);
        console.log(`\nResult: ${result.result} (${result.reason})`);
        console.log(`Final:  ${result.finalFen}`);
        break;
      }

      default: {
        console.error(`❌ Unknown command "${command}"`);
        cli.showHelp(2);
      }
    }
  } catch (error) {
    const prefix = isChessError(error) ? error.code : 'Error';
    console.error(`\n❌ ${prefix}: ${error instanceof Error ? error.message : String(error)}`);
    if (cli.flags.verbose) {
      console.error(error);
    }
    process.exit(1);
  }
}

main();
