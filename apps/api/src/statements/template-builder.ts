import { ReservedKeywords } from './reserved-keywords';
import { PatternStatementScanner, StatementScanner, ValueMatch } from './value-matcher';

export const IN_LIST_PLACEHOLDER = '[?, ?, ...]';

interface Rewrite {
  fragment: string;
  end: number;
}

/**
 * Index of the bracket closing the one at `openIndex`, skipping quoted text.
 * -1 when the list is unterminated or its brackets are mismatched.
 */
export function findClosingBracket(text: string, openIndex: number): number {
  const expected: string[] = [];
  let quote: string | null = null;

  for (let i = openIndex; i < text.length; i++) {
    const ch = text[i];

    if (quote) {
      if (ch === '\\') i++;
      else if (ch === quote) quote = null;
      continue;
    }

    if (ch === "'" || ch === '"') {
      quote = ch;
    } else if (ch === '(') {
      expected.push(')');
    } else if (ch === '[') {
      expected.push(']');
    } else if (ch === ')' || ch === ']') {
      if (expected.pop() !== ch) return -1;
      if (expected.length === 0) return i;
    }
  }

  return -1;
}

/**
 * Turns a statement into its template: literal values become `?`, literal
 * lists become `IN [?, ?, ...]`. Statements that differ only in literals
 * share a template. Applying the builder to a template returns it unchanged.
 */
export class TemplateBuilder {
  constructor(
    private readonly keywords: ReservedKeywords = ReservedKeywords.defaults(),
    private readonly scanner: StatementScanner = new PatternStatementScanner(),
  ) {}

  build(statement: string): string {
    let template = '';
    let cursor = 0;

    let match = this.scanner.nextMatch(statement, cursor);
    while (match) {
      template += statement.slice(cursor, match.start);
      const { fragment, end } = this.rewrite(statement, match);
      template += fragment;
      // IN-lists can end past the match, so resume from the rewrite's end.
      cursor = end;
      match = this.scanner.nextMatch(statement, cursor);
    }

    return template + statement.slice(cursor);
  }

  private rewrite(statement: string, match: ValueMatch): Rewrite {
    const verbatim: Rewrite = { fragment: statement.slice(match.start, match.end), end: match.end };

    // Already a placeholder.
    if (match.value.startsWith('$')) return verbatim;

    const operator = match.operator.trim();

    if (operator.toLowerCase() === 'in') {
      // A bare identifier names a collection, not a literal list.
      if (!match.value.startsWith('[') && !match.value.startsWith('(')) return verbatim;
      const close = findClosingBracket(statement, match.valueStart);
      if (close === -1) return verbatim;
      return { fragment: `${match.field} IN ${IN_LIST_PLACEHOLDER}`, end: close + 1 };
    }

    if (this.isStructural(match.value)) return verbatim;

    return { fragment: `${match.field} ${operator} ?`, end: match.end };
  }

  /** `(SELECT ...`, `(NULL)`, `( ...`: parentheses that carry syntax, not a value. */
  private isStructural(value: string): boolean {
    if (!value.startsWith('(')) return false;

    let inner = value.slice(1);
    if (inner.endsWith(')')) inner = inner.slice(0, -1);
    inner = inner.trim();
    if (!inner) return true;

    const [firstWord] = inner.split(/[\s(]/);
    return this.keywords.has(firstWord);
  }
}

const defaultBuilder = new TemplateBuilder();

export function createTemplate(statement: string): string {
  return defaultBuilder.build(statement);
}
