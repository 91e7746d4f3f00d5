// packages/game-core/src/errors.ts
//
// Error types raised while building a puzzle from user input.
//
// Both are fatal: they are thrown before any dictionary scan starts.
// An empty match set is *not* an error; see FilterOutcome in filter.ts.

export type LetterSide = 'may-use' | 'must-use';

export class HiveError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** The minimum word length is not a positive integer. */
export class InvalidMinLengthError extends HiveError {
  readonly input: string;

  constructor(input: string) {
    super(
      'INVALID_MIN_LENGTH',
      `Minimum word length must be a positive integer, got "${input}"`,
    );
    this.input = input;
  }
}

/** One of the two letter expressions normalized to nothing. */
export class EmptyLetterSetError extends HiveError {
  readonly side: LetterSide;

  constructor(side: LetterSide) {
    super('EMPTY_LETTER_SET', `No ${side} letters left after normalization`);
    this.side = side;
  }
}
