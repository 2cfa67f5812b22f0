import { describe, expect, it } from 'vitest';

import { parseArgs } from '../scripts/cli-args.js';

describe('parseArgs', () => {
  it('reads flag values and bare switches', () => {
    expect(parseArgs(['--labeled', 'set.json', '--verbose', '--output', 'report.json'])).toEqual({
      labeled: 'set.json',
      verbose: 'true',
      output: 'report.json'
    });
  });

  it('ignores positional arguments', () => {
    expect(parseArgs(['extra', '--finalCount', '5'])).toEqual({ finalCount: '5' });
  });
});
