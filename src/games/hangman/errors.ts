/**
 * Error taxonomy for the hangman core.
 *
 * Only WordDataError is fatal (no words at all at startup). WordSourceError
 * aborts a single game start; the persistence errors are recovered where
 * they happen and only ever logged.
 */

export class HangmanError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** No word could be drawn for the requested category */
export class WordSourceError extends HangmanError {}

export class NoWordsAvailableError extends WordSourceError {
  constructor(readonly category: string | null) {
    super(category ? `No words available in category '${category}'` : 'No words available');
  }
}

export class UnknownCategoryError extends WordSourceError {
  constructor(readonly category: string) {
    super(`Category '${category}' not found`);
  }
}

/** No word list could be loaded at all */
export class WordDataError extends HangmanError {}

export class PersistenceReadError extends HangmanError {
  constructor(readonly path: string, cause: unknown) {
    super(`Could not read ${path}: ${describeCause(cause)}`, { cause });
  }
}

export class PersistenceWriteError extends HangmanError {
  constructor(readonly path: string, cause: unknown) {
    super(`Could not write ${path}: ${describeCause(cause)}`, { cause });
  }
}

/** A guess was made after the game reached Won or Lost */
export class GameOverError extends HangmanError {
  constructor() {
    super('Game is already over');
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
