/**
 * Lexical scan for `field <operator> value` triples in statement text.
 *
 * This is pattern matching, not parsing: it recognizes the common shapes of
 * comparisons in WHERE clauses and nothing more. Callers go through
 * {@link StatementScanner} so a grammar-based scanner can replace it.
 */

export interface ValueMatch {
  field: string;
  /** Operator as written, including the spaces around `in` / `like`. */
  operator: string;
  value: string;
  start: number;
  valueStart: number;
  end: number;
}

export interface StatementScanner {
  /** First match starting at or after `from`, or null. */
  nextMatch(text: string, from: number): ValueMatch | null;
}

const FIELD = '[A-Za-z0-9_.]+';
// Two-character operators first so `>=` never reads as `>` followed by a value `=`.
const OPERATOR = '==|>=|<=|=|>|<| in | like ';
const QUOTED = `'[^']*'|"[^"]*"`;
const ARRAY = '\\[[^\\]]*\\]';
// Text glued to a quoted value or array (`'2024-01-01'::date`, `'a'||b`) belongs to it.
const ATTACHED = '[^\\s,)\\]]*';
const UNQUOTED = `[^'",\\s]+`;

const MATCH_SOURCE = `(${FIELD})\\s*(${OPERATOR})\\s*((?:${QUOTED}|${ARRAY})${ATTACHED}|${UNQUOTED})`;

const CLOSER_OF: Record<string, string> = { '(': ')', '[': ']' };

/**
 * Drops trailing closers that have no opener inside the token, so the `)`
 * of `(a = 1)` stays with the surrounding text.
 */
export function trimUnbalancedClosers(token: string): string {
  const open: string[] = [];
  for (let i = 0; i < token.length; i++) {
    const ch = token[i];
    if (ch === '(' || ch === '[') {
      open.push(CLOSER_OF[ch]);
    } else if (ch === ')' || ch === ']') {
      if (open.length === 0 || open[open.length - 1] !== ch) {
        return token.slice(0, i);
      }
      open.pop();
    }
  }
  return token;
}

export class PatternStatementScanner implements StatementScanner {
  private readonly pattern = new RegExp(MATCH_SOURCE, 'gi');

  nextMatch(text: string, from: number): ValueMatch | null {
    this.pattern.lastIndex = from;

    let found: RegExpExecArray | null;
    while ((found = this.pattern.exec(text)) !== null) {
      const [whole, field, operator, rawValue] = found;
      const quotedOrArray = /^['"[]/.test(rawValue);
      const value = quotedOrArray ? rawValue : trimUnbalancedClosers(rawValue);

      if (value.length > 0) {
        const end = found.index + whole.length - (rawValue.length - value.length);
        return {
          field,
          operator,
          value,
          start: found.index,
          valueStart: end - value.length,
          end,
        };
      }

      this.pattern.lastIndex = found.index + 1;
    }

    return null;
  }
}

/** All non-overlapping matches, in document order. */
export function scanMatches(text: string, scanner: StatementScanner = new PatternStatementScanner()): ValueMatch[] {
  const matches: ValueMatch[] = [];
  let match = scanner.nextMatch(text, 0);
  while (match) {
    matches.push(match);
    match = scanner.nextMatch(text, match.end);
  }
  return matches;
}
