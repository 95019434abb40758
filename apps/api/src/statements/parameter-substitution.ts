import { DiagnosticSink, silentSink } from './diagnostics';

const POSITIONAL_PLACEHOLDER = /\$(\d+)/g;
const NAMED_PLACEHOLDER = /\$\w+/g;

/**
 * Literal text for a bound value. Strings are wrapped in single quotes
 * without escaping embedded quotes.
 */
export function formatBoundValue(value: unknown): string {
  if (typeof value === 'string') return `'${value}'`;
  if (value === null || value === undefined) return 'null';
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

/**
 * Replaces `$1`, `$2`, ... with `args[0]`, `args[1]`, ...
 * Placeholders without a bound value are left as written.
 */
export function substitutePositional(
  statement: string,
  args: readonly unknown[],
  sink: DiagnosticSink = silentSink,
  recordIndex?: number,
): string {
  return statement.replace(POSITIONAL_PLACEHOLDER, (placeholder: string, digits: string) => {
    const position = Number(digits);

    if (!Number.isSafeInteger(position)) {
      sink.warn('POSITIONAL_INDEX_INVALID', `Invalid positional argument ${placeholder}`, recordIndex);
      return placeholder;
    }

    if (position < 1 || position > args.length) {
      sink.warn(
        'POSITIONAL_INDEX_OUT_OF_RANGE',
        `Positional argument index ${position} out of range (${args.length} bound)`,
        recordIndex,
      );
      return placeholder;
    }

    return formatBoundValue(args[position - 1]);
  });
}

/**
 * Replaces `$name` placeholders. Keys of `args` include the `$` sigil.
 */
export function substituteNamed(
  statement: string,
  args: Readonly<Record<string, unknown>>,
  sink: DiagnosticSink = silentSink,
  recordIndex?: number,
): string {
  return statement.replace(NAMED_PLACEHOLDER, (placeholder: string) => {
    if (!Object.hasOwn(args, placeholder)) {
      sink.warn('NAMED_ARG_MISSING', `Named argument '${placeholder}' not found in provided arguments`, recordIndex);
      return placeholder;
    }
    return formatBoundValue(args[placeholder]);
  });
}
