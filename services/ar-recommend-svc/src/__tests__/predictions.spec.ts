import { fileURLToPath } from 'node:url';

import { describe, expect, it } from 'vitest';

import { escapeCsvField, formatPredictionsCsv, generatePredictions, loadTestQueries } from '../predictions.js';
import { buildComponents, knowledgeItems, personalityItems, urls } from './fixtures.js';

const TEST_QUERIES_FILE = fileURLToPath(new URL('../../data/test-queries.json', import.meta.url));

describe('escapeCsvField', () => {
  it.each([
    ['plain', 'plain'],
    ['Java, SQL', '"Java, SQL"'],
    ['say "hi"', '"say ""hi"""'],
    ['two\nlines', '"two\nlines"']
  ])('escapes %j', (value, expected) => {
    expect(escapeCsvField(value)).toBe(expected);
  });
});

describe('formatPredictionsCsv', () => {
  it('writes one row per recommendation', () => {
    expect(
      formatPredictionsCsv([
        { query: 'Java, SQL', url: 'https://assessments.example.com/a' },
        { query: 'team', url: 'https://assessments.example.com/b' }
      ])
    ).toBe('Query,Assessment_url\n"Java, SQL",https://assessments.example.com/a\nteam,https://assessments.example.com/b\n');
  });

  it('writes only the header for no rows', () => {
    expect(formatPredictionsCsv([])).toBe('Query,Assessment_url\n');
  });
});

describe('generatePredictions', () => {
  it('emits rows in recommendation order', async () => {
    const { recommendations } = buildComponents([...knowledgeItems(10), ...personalityItems(2)]);

    const rows = await generatePredictions(['teamwork leadership'], recommendations, 5);

    expect(rows.every((row) => row.query === 'teamwork leadership')).toBe(true);
    expect(urls(rows)).toEqual(['k1', 'k2', 'k3', 'p1', 'p2']);
  });
});

describe('loadTestQueries', () => {
  it('reads the bundled queries', async () => {
    expect(await loadTestQueries(TEST_QUERIES_FILE)).toEqual([
      'QA engineer with Selenium automation experience',
      'Graduate trainee who adapts quickly and works well in a team',
      'Cloud engineer with Python scripting'
    ]);
  });
});
