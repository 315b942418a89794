import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import path from 'node:path';
import { computeEventId } from '../../../src/catalog/csv-loader.js';
import { createTempDir, getFixturePath, SAMPLE_EVENTS_CSV, type TempDirResult } from '../../helpers/fixtures.js';

const beachId = computeEventId('Beach Cleanup', 'Rockaway Coastal Trust', '2025-06-14');

describe('CLI commands', () => {
  let temp: TempDirResult;
  let common: string[];
  let logSpy: MockInstance<typeof console.log>;
  let errorSpy: MockInstance<typeof console.error>;

  const logged = (): string[] => logSpy.mock.calls.map(call => call.map(String).join(' '));

  beforeEach(() => {
    vi.resetModules();
    temp = createTempDir('event-scout-cli-');
    common = [
      '--config', getFixturePath('configs', 'minimal-config.json'),
      '--events', SAMPLE_EVENTS_CSV,
      '--database', path.join(temp.dir, 'ratings.db'),
    ];
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`process.exit(${String(code)})`);
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    temp.cleanup();
  });

  describe('search', () => {
    it('should print ranked results with score breakdowns', async () => {
      const { searchCommand } = await import('../../../src/cli/commands/search.js');

      await searchCommand.parseAsync(['cleanup', '--rank', ...common], { from: 'user' });

      const lines = logged();
      expect(lines[0]).toBe('Found 2 events matching keyword "cleanup":\n');
      expect(lines.slice(1, 7)).toEqual([
        'Park Cleanup',
        '  Org: Green Brooklyn',
        '  When: 2025-08-15 | Where: Brooklyn',
        '  Theme: Environment | Mood: Hands-on',
        '  Rating: not rated yet',
        '  Score: 3.00 = 3 term(s) x 1 ("cleanup", "litter", "trash") + unrated',
      ]);
      expect(lines).toContain('Beach Cleanup');
    });

    it('should print filters and the shown count', async () => {
      const { searchCommand } = await import('../../../src/cli/commands/search.js');

      await searchCommand.parseAsync(['--theme', 'Environment', '--limit', '1', ...common], { from: 'user' });

      expect(logged()[0]).toBe('Found 3 events matching theme "Environment" (showing 1):\n');
    });

    it('should match only the typed keyword with --no-synonyms', async () => {
      const { searchCommand } = await import('../../../src/cli/commands/search.js');

      await searchCommand.parseAsync(['kids', '--no-synonyms', ...common], { from: 'user' });

      expect(logged()[0]).toBe('No events match keyword "kids".');
    });

    it('should print JSON', async () => {
      const { searchCommand } = await import('../../../src/cli/commands/search.js');

      await searchCommand.parseAsync(['--location', 'queens', '--json', ...common], { from: 'user' });

      const parsed: unknown = JSON.parse(logged()[0] ?? '');
      expect(parsed).toMatchObject({ total: 2, ranked: false, suggestions: [] });
    });

    it('should exit with an error for a bad date', async () => {
      const { searchCommand } = await import('../../../src/cli/commands/search.js');

      await expect(searchCommand.parseAsync(['--from', 'soon', ...common], { from: 'user' }))
        .rejects.toThrow('process.exit(1)');

      expect(errorSpy).toHaveBeenCalledWith('Error:', 'Invalid from date "soon". Expected YYYY-MM-DD.');
    });

    it('should exit with an error when the catalog is missing', async () => {
      const { searchCommand } = await import('../../../src/cli/commands/search.js');
      const missing = path.join(temp.dir, 'missing.csv');

      await expect(searchCommand.parseAsync([...common, '--events', missing], { from: 'user' }))
        .rejects.toThrow('process.exit(1)');

      expect(errorSpy).toHaveBeenCalledWith('Error:', `Events file not found: ${missing}`);
    });
  });

  describe('rate', () => {
    it('should store a rating and print the new average', async () => {
      const { rateCommand } = await import('../../../src/cli/commands/rate.js');

      await rateCommand.parseAsync([beachId, '5', ...common], { from: 'user' });

      expect(logged()).toEqual([
        'Rated "Beach Cleanup" 5.',
        'Average is now 5.0 from 1 rating(s).',
      ]);
    });

    it('should reject an out-of-range score', async () => {
      const { rateCommand } = await import('../../../src/cli/commands/rate.js');

      await expect(rateCommand.parseAsync([beachId, '6', ...common], { from: 'user' }))
        .rejects.toThrow('process.exit(1)');

      expect(errorSpy).toHaveBeenCalledWith('Error:', 'Score 6 is out of range (1-5)');
    });

    it('should reject a score that is not a number', async () => {
      const { rateCommand } = await import('../../../src/cli/commands/rate.js');

      await expect(rateCommand.parseAsync([beachId, 'great', ...common], { from: 'user' }))
        .rejects.toThrow('process.exit(1)');

      expect(errorSpy).toHaveBeenCalledWith('Error:', 'Score must be a whole number from 1 to 5');
    });
  });

  describe('show', () => {
    it('should print the event', async () => {
      const { showCommand } = await import('../../../src/cli/commands/show.js');

      await showCommand.parseAsync([beachId, ...common], { from: 'user' });

      expect(logged()).toEqual([
        'Beach Cleanup',
        'Org: Rockaway Coastal Trust',
        'When: 2025-06-14',
        'Where: Queens',
        'Theme: Environment',
        'Mood: Hands-on',
        'Rating: not rated yet',
        '',
        'Help clear litter from the shoreline at Rockaway.',
      ]);
    });

    it('should exit for an unknown id', async () => {
      const { showCommand } = await import('../../../src/cli/commands/show.js');

      await expect(showCommand.parseAsync(['nope', ...common], { from: 'user' }))
        .rejects.toThrow('process.exit(1)');

      expect(errorSpy).toHaveBeenCalledWith('Event not found: nope');
    });
  });

  describe('stats', () => {
    it('should print counts and top rated events', async () => {
      const { rateCommand } = await import('../../../src/cli/commands/rate.js');
      await rateCommand.parseAsync([beachId, '4', ...common], { from: 'user' });
      logSpy.mockClear();

      const { statsCommand } = await import('../../../src/cli/commands/stats.js');
      await statsCommand.parseAsync([...common], { from: 'user' });

      const lines = logged();
      expect(lines.slice(0, 4)).toEqual([
        'Catalog Statistics\n',
        'Total Events: 7',
        'Undated Events: 1',
        'Ratings: 1 across 1 event(s)',
      ]);
      expect(lines.slice(4, 9)).toEqual([
        '\nBy Theme:',
        '  Environment  3',
        '  Social       2',
        '  Animals      1',
        '  Education    1',
      ]);
      expect(lines.slice(-2)).toEqual(['\nTop Rated:', '  1. Beach Cleanup  4.0 (1)']);
    });

    it('should print JSON', async () => {
      const { statsCommand } = await import('../../../src/cli/commands/stats.js');

      await statsCommand.parseAsync(['--json', ...common], { from: 'user' });

      const parsed: unknown = JSON.parse(logged()[0] ?? '');
      expect(parsed).toMatchObject({ totalEvents: 7, undated: 1, totalRatings: 0, topRated: [] });
    });
  });
});
