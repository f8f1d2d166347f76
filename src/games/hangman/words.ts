/**
 * Word source backed by plain text files, one word per line:
 *
 *   <wordsDir>/words.txt                 every word (the "mixed" pool)
 *   <wordsDir>/categories/<file>.txt     one file per category
 *
 * The category → file mapping is injected, so the engine never knows how
 * words are stored.
 */

import { existsSync, readFileSync } from 'fs';
import { resolve } from 'path';
import { MIXED_CATEGORY } from './engine';
import { NoWordsAvailableError, UnknownCategoryError, WordDataError } from './errors';

export interface DrawnWord {
  word: string;
  /** Category the word came from, or 'mixed' */
  category: string;
}

export interface WordSource {
  /** Pass null for a draw across every word */
  getRandomWord(category: string | null): DrawnWord;
  getAvailableCategories(): string[];
}

export interface FileWordSourceOptions {
  wordsDir: string;
  categoryFiles: Readonly<Record<string, string>>;
  /** Defaults to Math.random */
  random?: () => number;
}

const ALL_WORDS_FILE = 'words.txt';
const CATEGORIES_DIR = 'categories';

export function parseWordList(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map(line => line.trim().toLowerCase())
    .filter(line => line.length > 0);
}

export class FileWordSource implements WordSource {
  private allWords: string[] = [];
  private readonly categoryWords = new Map<string, string[]>();
  private readonly random: () => number;

  constructor(private readonly options: FileWordSourceOptions) {
    this.random = options.random ?? Math.random;
  }

  /**
   * Read every word file. Missing files are skipped; finding no words at
   * all throws WordDataError.
   */
  load(): this {
    const { wordsDir, categoryFiles } = this.options;

    this.categoryWords.clear();
    for (const [category, filename] of Object.entries(categoryFiles)) {
      const words = readWordFile(resolve(wordsDir, CATEGORIES_DIR, filename));
      if (words) this.categoryWords.set(category.toLowerCase(), words);
    }

    // Without a usable words.txt, the mixed pool is every category combined
    const listed = readWordFile(resolve(wordsDir, ALL_WORDS_FILE));
    this.allWords = listed && listed.length > 0
      ? listed
      : [...new Set([...this.categoryWords.values()].flat())];

    if (this.allWords.length === 0) {
      throw new WordDataError(`No word lists found in ${wordsDir}`);
    }
    return this;
  }

  getAvailableCategories(): string[] {
    return [...this.categoryWords.keys()];
  }

  getRandomWord(category: string | null): DrawnWord {
    if (category === null) {
      if (this.allWords.length === 0) throw new NoWordsAvailableError(null);
      const word = this.pick(this.allWords);
      return { word, category: this.determineCategory(word) };
    }

    const key = category.toLowerCase();
    const words = this.categoryWords.get(key);
    if (!words) throw new UnknownCategoryError(key);
    if (words.length === 0) throw new NoWordsAvailableError(key);
    return { word: this.pick(words), category: key };
  }

  /**
   * First category list containing the word, or 'mixed'
   */
  determineCategory(word: string): string {
    for (const [category, words] of this.categoryWords) {
      if (words.includes(word)) return category;
    }
    return MIXED_CATEGORY;
  }

  getWordCount(category?: string): number {
    if (category === undefined) return this.allWords.length;
    return this.categoryWords.get(category.toLowerCase())?.length ?? 0;
  }

  /**
   * Which expected word files exist, keyed by path relative to wordsDir
   */
  validateWordFiles(): Record<string, boolean> {
    const { wordsDir, categoryFiles } = this.options;
    const results: Record<string, boolean> = {
      [ALL_WORDS_FILE]: existsSync(resolve(wordsDir, ALL_WORDS_FILE)),
    };
    for (const filename of Object.values(categoryFiles)) {
      results[`${CATEGORIES_DIR}/${filename}`] = existsSync(resolve(wordsDir, CATEGORIES_DIR, filename));
    }
    return results;
  }

  private pick(words: string[]): string {
    return words[Math.floor(this.random() * words.length)];
  }
}

function readWordFile(path: string): string[] | null {
  if (!existsSync(path)) return null;
  try {
    return parseWordList(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new WordDataError(`Could not read ${path}`, { cause: err });
  }
}
