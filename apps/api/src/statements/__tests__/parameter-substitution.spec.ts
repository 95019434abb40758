import { DiagnosticsCollector } from '../diagnostics';
import { formatBoundValue, substituteNamed, substitutePositional } from '../parameter-substitution';

function collector(): DiagnosticsCollector {
  return new DiagnosticsCollector({ warn: jest.fn(), error: jest.fn() });
}

describe('formatBoundValue', () => {
  it('quotes strings without escaping', () => {
    expect(formatBoundValue('abc')).toBe("'abc'");
    expect(formatBoundValue("O'Brien")).toBe("'O'Brien'");
  });

  it('prints other scalars as written', () => {
    expect(formatBoundValue(42)).toBe('42');
    expect(formatBoundValue(1.5)).toBe('1.5');
    expect(formatBoundValue(true)).toBe('true');
    expect(formatBoundValue(null)).toBe('null');
  });

  it('prints arrays and objects as JSON', () => {
    expect(formatBoundValue([1, 'a'])).toBe('[1,"a"]');
    expect(formatBoundValue({ a: 1 })).toBe('{"a":1}');
  });
});

describe('substitutePositional', () => {
  it('replaces 1-based placeholders with their values', () => {
    expect(substitutePositional('SELECT * FROM t WHERE a = $1 AND b = $2', ['x', 5])).toBe(
      "SELECT * FROM t WHERE a = 'x' AND b = 5",
    );
  });

  it('reads multi-digit positions whole', () => {
    const args = ['a', 'b', 'c', 'd', 'e', 'f', 'g', 'h', 'i', 'j'];
    expect(substitutePositional('$10, $1', args)).toBe("'j', 'a'");
  });

  it('leaves out-of-range placeholders and reports them', () => {
    const diagnostics = collector();

    expect(substitutePositional('a = $3 AND b = $0 AND c = $1', [7], diagnostics, 4)).toBe(
      'a = $3 AND b = $0 AND c = 7',
    );
    expect(diagnostics.list()).toEqual([
      {
        level: 'warn',
        code: 'POSITIONAL_INDEX_OUT_OF_RANGE',
        message: 'Positional argument index 3 out of range (1 bound)',
        recordIndex: 4,
      },
      {
        level: 'warn',
        code: 'POSITIONAL_INDEX_OUT_OF_RANGE',
        message: 'Positional argument index 0 out of range (1 bound)',
        recordIndex: 4,
      },
    ]);
  });

  it('leaves positions too large to be an index', () => {
    const diagnostics = collector();

    expect(substitutePositional('a = $99999999999999999999', ['x'], diagnostics)).toBe('a = $99999999999999999999');
    expect(diagnostics.count('POSITIONAL_INDEX_INVALID')).toBe(1);
  });
});

describe('substituteNamed', () => {
  it('replaces named placeholders using keys with the sigil', () => {
    expect(
      substituteNamed('SELECT * FROM users WHERE name = $name AND age > $age', { $name: 'John', $age: 18 }),
    ).toBe("SELECT * FROM users WHERE name = 'John' AND age > 18");
  });

  it('leaves unknown names and reports them', () => {
    const diagnostics = collector();

    expect(substituteNamed('name = $name AND age > $age', { $name: 'John', age: 18 }, diagnostics)).toBe(
      "name = 'John' AND age > $age",
    );
    expect(diagnostics.list()).toEqual([
      {
        level: 'warn',
        code: 'NAMED_ARG_MISSING',
        message: "Named argument '$age' not found in provided arguments",
      },
    ]);
  });

  it('mirrors diagnostics to the logger', () => {
    const logger = { warn: jest.fn(), error: jest.fn() };
    substituteNamed('a = $missing', {}, new DiagnosticsCollector(logger), 2);

    expect(logger.warn).toHaveBeenCalledWith(
      "[NAMED_ARG_MISSING] record 2: Named argument '$missing' not found in provided arguments",
    );
  });
});
