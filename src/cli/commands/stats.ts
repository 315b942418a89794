/**
 * stats command - Show catalog statistics
 */

import { Command } from 'commander';
import type { FacetCount } from '../../types/index.js';
import { addCommonOptions, errorMessage, openAgent, parsePositiveInt, type CommonOptions } from '../shared.js';

interface StatsCommandOptions extends CommonOptions {
  top: number;
  json: boolean;
}

function printCounts(heading: string, counts: FacetCount[]): void {
  console.log(`\n${heading}:`);
  if (counts.length === 0) {
    console.log('  (none)');
    return;
  }
  const width = Math.max(...counts.map(c => c.value.length));
  for (const { value, count } of counts) {
    console.log(`  ${value.padEnd(width)}  ${count}`);
  }
}

export const statsCommand = addCommonOptions(new Command('stats'))
  .description('Show catalog statistics and top rated events')
  .option('--top <number>', 'Number of top rated events to list', parsePositiveInt, 5)
  .option('--json', 'Output as JSON', false)
  .action(async (options: StatsCommandOptions) => {
    try {
      const agent = await openAgent(options);

      try {
        const stats = agent.getStats(options.top);

        if (options.json) {
          console.log(JSON.stringify(stats, null, 2));
        } else {
          console.log('Catalog Statistics\n');
          console.log(`Total Events: ${stats.totalEvents}`);
          console.log(`Undated Events: ${stats.undated}`);
          console.log(`Ratings: ${stats.totalRatings} across ${stats.ratedEvents} event(s)`);

          printCounts('By Theme', stats.byTheme);
          printCounts('By Mood', stats.byMood);
          printCounts('By Month', stats.byMonth);

          console.log('\nTop Rated:');
          if (stats.topRated.length === 0) {
            console.log('  No ratings yet.');
          }
          stats.topRated.forEach((entry, i) => {
            console.log(`  ${i + 1}. ${entry.event.title}  ${entry.average.toFixed(1)} (${entry.count})`);
          });
        }
      } finally {
        await agent.close();
      }
    } catch (error) {
      console.error('Error:', errorMessage(error));
      process.exit(1);
    }
  });
