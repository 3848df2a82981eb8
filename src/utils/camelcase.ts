/**
 * Splitting of "CamelCase" identifiers into their words.
 *
 * Scanning works on code points so that identifiers with non-BMP characters
 * never get cut in half. Concatenating the returned segments always yields the
 * original input.
 */

export interface CamelCaseOptions {
  /**
   * Literals that must never be split, even though they contain an uppercase
   * boundary (e.g. `HostBuilder`).
   */
  noSplit?: readonly string[];
}

const uppercasePattern = /^\p{Lu}$/u;
const loneSurrogatePattern = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

const isUpper = (char: string | undefined): boolean =>
  char !== undefined && uppercasePattern.test(char);

/**
 * Cursor over an immutable sequence of code points.
 */
class CamelCaseReader {
  private pos = 0;

  constructor(
    private readonly chars: readonly string[],
    private readonly noSplit: readonly string[]
  ) {}

  get done(): boolean {
    return this.pos >= this.chars.length;
  }

  private read(): void {
    this.pos++;
  }

  private unread(): void {
    this.pos--;
  }

  private peek(): string | undefined {
    return this.chars[this.pos];
  }

  // The text read so far for the current word, plus the code point under the cursor.
  private isNoSplitWord(start: number): boolean {
    if (this.noSplit.length === 0) return false;
    const candidate = this.chars.slice(start, this.pos + 1).join('');
    return this.noSplit.some((literal) => literal.startsWith(candidate));
  }

  /**
   * Read the next word. A word ends at the next uppercase character, unless
   * it is an uppercase run (acronym), which ends right before the uppercase
   * character that starts the following word.
   */
  readWord(): string {
    const start = this.pos;
    this.read();

    if (!this.done && isUpper(this.peek())) {
      while (!this.done && (isUpper(this.peek()) || this.isNoSplitWord(start))) {
        this.read();
      }
      if (!this.done) {
        this.unread();
      }
      return this.chars.slice(start, this.pos).join('');
    }

    while (!this.done && (!isUpper(this.peek()) || this.isNoSplitWord(start))) {
      this.read();
    }
    return this.chars.slice(start, this.pos).join('');
  }
}

/**
 * Split `input` into its CamelCase words.
 *
 * Empty input, or input that isn't well-formed UTF-16, comes back unchanged as
 * a single segment.
 *
 * @example
 * splitCamelCase('PDFLoader'); // ['PDF', 'Loader']
 * splitCamelCase('UseHostBuilder', { noSplit: ['HostBuilder'] }); // ['Use', 'HostBuilder']
 */
export function splitCamelCase(input: string, options: CamelCaseOptions = {}): string[] {
  if (input.length === 0 || loneSurrogatePattern.test(input)) {
    return [input];
  }

  const reader = new CamelCaseReader(Array.from(input), options.noSplit ?? []);
  const words: string[] = [];

  while (!reader.done) {
    words.push(reader.readWord());
  }

  return words;
}
