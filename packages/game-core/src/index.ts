// packages/game-core/src/index.ts
//
// Entry point for the game-core package.
// Re-exports the solving engine so consumers can import from one place.
//
// Includes:
//   • alphabet.ts → letter-expression expansion and the puzzle alphabet
//   • filter.ts   → dictionary filtering (matches + special words)
//   • scoring.ts  → per-word and total scores
//   • report.ts   → text report of an outcome
//   • solver.ts   → the whole pipeline (solvePuzzle, solvePuzzleStream)
//   • errors.ts   → input errors
//   • words.ts    → built-in fallback word list
//
// Example usage:
//   import { solvePuzzle, formatReport, SAMPLE_WORDS } from '@hive/game-core';

export * from './alphabet.js';
export * from './errors.js';
export * from './filter.js';
export * from './report.js';
export * from './scoring.js';
export * from './solver.js';
export * from './words.js';
