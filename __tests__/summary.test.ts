jest.mock('../lib/logger', () => ({
  __esModule: true,
  default: { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() },
}));

import logger from '../lib/logger';
import { elapsedSeconds, reportSummary } from '../lib/summary';

const log = logger as unknown as { info: jest.Mock };

describe('reportSummary', () => {
  beforeEach(() => jest.clearAllMocks());

  test('logs processed, failed and duration', () => {
    const duration = reportSummary({ total: 500, processed: 500, failed: 12, lookups: 988 }, 1_000, 43_400);

    expect(duration).toBe(42);
    expect(log.info.mock.calls).toEqual([
      ['Cache warming complete!'],
      ['  Domains processed: 500'],
      ['  Failed lookups: 12'],
      ['  Duration: 42s'],
    ]);
  });
});

describe('elapsedSeconds', () => {
  test('rounds to whole seconds and never goes negative', () => {
    expect(elapsedSeconds(0, 1_499)).toBe(1);
    expect(elapsedSeconds(0, 1_500)).toBe(2);
    expect(elapsedSeconds(5_000, 4_000)).toBe(0);
  });
});
