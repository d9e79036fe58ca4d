/**
 * Substring filter for history commands.
 */

/** Matches commands containing any of a set of words. */
export class WordFilter {
  private readonly words: string[];

  constructor(
    words: readonly string[],
    private readonly ignoreCase: boolean,
  ) {
    // An empty word would match every command.
    const nonEmpty = words.filter((w) => w.length > 0);
    this.words = ignoreCase ? nonEmpty.map((w) => w.toLowerCase()) : nonEmpty;
  }

  /** `true` if no command can match. */
  get isEmpty(): boolean {
    return this.words.length === 0;
  }

  matches(command: string): boolean {
    const haystack = this.ignoreCase ? command.toLowerCase() : command;
    return this.words.some((word) => haystack.includes(word));
  }
}
