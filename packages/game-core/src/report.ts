// packages/game-core/src/report.ts
//
// Plain-text report of a solve outcome. Returns lines; where they are
// written (HTTP response, terminal) is up to the caller.
//
// Layout:
//   Alphabet: oavtleg (may use: oavtle, must use: g)   ┐ summary,
//   Minimum word length: 4                             ┘ optional
//   Special words: 1
//     voltage
//   Special bonus: 7
//   All words: 1
//     voltage (14)
//   Max score: 14

import type { SolveOutcome } from './solver.js';

/**
 * Presentation hooks. Each receives a fragment of text and returns it
 * decorated (e.g. wrapped in terminal colour codes).
 */
export type ReportTheme = {
  label: (text: string) => string;
  special: (text: string) => string;
  total: (text: string) => string;
};

const same = (text: string) => text;

export const plainTheme: ReportTheme = { label: same, special: same, total: same };

export type ReportOptions = {
  /** include the alphabet / letter-set summary (default true) */
  showAlphabet?: boolean;
  theme?: ReportTheme;
};

export function formatReport(outcome: SolveOutcome, options: ReportOptions = {}): string[] {
  const { showAlphabet = true, theme = plainTheme } = options;
  const lines: string[] = [];

  if (showAlphabet) {
    lines.push(
      `${theme.label('Alphabet:')} ${outcome.alphabet.join('')} ` +
        `(may use: ${outcome.mayUse.join('')}, must use: ${outcome.mustUse.join('')})`,
      `${theme.label('Minimum word length:')} ${outcome.minWordLength}`,
    );
  }

  if (outcome.kind === 'no-matches') {
    lines.push(theme.label('No matching words.'));
    return lines;
  }

  lines.push(`${theme.label('Special words:')} ${outcome.specialWords.length}`);
  for (const w of outcome.specialWords) lines.push(`  ${theme.special(w)}`);
  lines.push(`${theme.label('Special bonus:')} ${theme.total(String(outcome.specialBonus))}`);

  lines.push(`${theme.label('All words:')} ${outcome.allWords.length}`);
  for (const s of outcome.scores) {
    const word = s.special ? theme.special(s.word) : s.word;
    lines.push(`  ${word} (${s.score})`);
  }
  lines.push(`${theme.label('Max score:')} ${theme.total(String(outcome.maxScore))}`);

  return lines;
}
