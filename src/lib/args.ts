/**
 * Smyklot - src/lib/args.ts
 * WHAT: Delimiter-aware tokenizer and the Args cursor handed to command handlers.
 * FLOWS:
 *  - tokenize(text, delimiters) → tokens with their offsets in the original text
 *  - Args.single()/parse()/rest() → walk the tokens left to right
 *
 * At each position the first delimiter in list order that matches wins, so
 * [", ", ","] splits "a, b" into ["a", "b"] and not ["a", " b"].
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

export type Token = { value: string; start: number; end: number };

function delimiterAt(text: string, index: number, delimiters: readonly string[]): string | undefined {
  return delimiters.find((d) => d.length > 0 && text.startsWith(d, index));
}

export function tokenize(text: string, delimiters: readonly string[]): Token[] {
  const tokens: Token[] = [];
  let start = 0;
  let i = 0;
  while (i < text.length) {
    const delimiter = delimiterAt(text, i, delimiters);
    if (delimiter) {
      if (i > start) tokens.push({ value: text.slice(start, i), start, end: i });
      i += delimiter.length;
      start = i;
    } else {
      i += 1;
    }
  }
  if (start < text.length) tokens.push({ value: text.slice(start), start, end: text.length });
  return tokens;
}

/**
 * True when `index` is the end of the text or the start of a delimiter, i.e.
 * a name that ends there is a whole word.
 */
export function isBoundary(text: string, index: number, delimiters: readonly string[]): boolean {
  return index >= text.length || delimiterAt(text, index, delimiters) !== undefined;
}

/**
 * Drops leading delimiters (and plain whitespace when `whitespace` is set).
 */
export function skipDelimiters(text: string, delimiters: readonly string[], whitespace = false): string {
  let i = 0;
  for (;;) {
    const delimiter = delimiterAt(text, i, delimiters);
    if (delimiter) {
      i += delimiter.length;
    } else if (whitespace && i < text.length && /\s/.test(text[i])) {
      i += 1;
    } else {
      break;
    }
  }
  return text.slice(i);
}

export class Args {
  /** The unparsed argument text as the user typed it */
  readonly message: string;
  private readonly tokens: Token[];
  private offset = 0;

  constructor(message: string, delimiters: readonly string[] = [" "]) {
    this.message = message;
    this.tokens = tokenize(message, delimiters);
  }

  get length(): number {
    return this.tokens.length;
  }

  /** Tokens not consumed yet */
  remaining(): number {
    return this.tokens.length - this.offset;
  }

  isEmpty(): boolean {
    return this.remaining() === 0;
  }

  current(): string | undefined {
    return this.tokens[this.offset]?.value;
  }

  single(): string | undefined {
    const token = this.tokens[this.offset];
    if (!token) return undefined;
    this.offset += 1;
    return token.value;
  }

  /**
   * Parses the current token and advances only on success, so a failed parse
   * can fall back to current() for another interpretation.
   */
  parse<T>(parser: (token: string) => T | null): T | null {
    const token = this.tokens[this.offset];
    if (!token) return null;
    const value = parser(token.value);
    if (value !== null) this.offset += 1;
    return value;
  }

  /**
   * Everything from the current token to the end, delimiters included.
   */
  rest(): string {
    const token = this.tokens[this.offset];
    if (!token) return "";
    return this.message.slice(token.start).trim();
  }

  all(): string[] {
    return this.tokens.map((t) => t.value);
  }
}
