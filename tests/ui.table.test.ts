import { formatTable, ui } from '../src/cli/ui.js';

describe('summary table', () => {
  const plain = (s: string) => s;

  test('pads columns to the widest cell', () => {
    expect(formatTable([{ Result: 'Ties', Rounds: 2 }, { Result: 'Player wins', Rounds: 10 }], plain)).toEqual([
      'Result       Rounds',
      'Ties         2',
      'Player wins  10',
    ]);
  });

  test('empty table', () => {
    expect(formatTable([], plain)).toEqual(['(none)']);
  });
});

describe('ui output switches', () => {
  const saved = { ...process.env };
  let printed: jest.SpyInstance;

  beforeEach(() => {
    // ui stays silent under Jest unless these are cleared
    delete process.env.JEST_WORKER_ID;
    delete process.env.NODE_ENV;
    printed = jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    printed.mockRestore();
    process.env = { ...saved };
  });

  test('prints the summary table', () => {
    ui.table([{ Result: 'Ties', Rounds: 1 }]);
    expect(printed.mock.calls).toEqual([['Result  Rounds'], ['Ties    1']]);
  });

  test('quiet mode hides the summary table', () => {
    process.env.QUIET = '1';
    ui.table([{ Result: 'Ties', Rounds: 1 }]);
    expect(printed).not.toHaveBeenCalled();
  });

  test('colour settings are read when output is formatted, not at import', () => {
    delete process.env.NO_COLOR;
    expect(formatTable([{ A: 'x' }])).toEqual(['\u001b[1mA\u001b[22m', 'x']);
  });
});
