/**
 * search command - Filter the catalog from the CLI
 */

import { Command } from 'commander';
import type { FilterCriteria, RankedEvent } from '../../types/index.js';
import { describeCriteria, explainScore, previewDescription, type ScoringWeights } from '../../search/index.js';
import { addCommonOptions, errorMessage, openAgent, parsePositiveInt, type CommonOptions } from '../shared.js';

interface SearchCommandOptions extends CommonOptions {
  theme?: string;
  mood?: string;
  from?: string;
  to?: string;
  location?: string;
  synonyms: boolean;
  rank: boolean;
  limit?: number;
  json: boolean;
}

function printEvent(result: RankedEvent, ranked: boolean, weights: Partial<ScoringWeights>): void {
  const { event, rating } = result;

  console.log(event.title);
  console.log(`  Org: ${event.orgTitle || 'Unknown'}`);
  console.log(`  When: ${event.startDate ?? 'Date TBD'} | Where: ${event.location || 'Location TBD'}`);
  console.log(`  Theme: ${event.theme || '-'} | Mood: ${event.mood || '-'}`);
  console.log(`  Rating: ${rating ? `${rating.average.toFixed(1)} (${rating.count})` : 'not rated yet'}`);
  if (ranked) {
    console.log(`  Score: ${explainScore(result, weights)}`);
  }
  console.log(`  Description: ${previewDescription(event.description) || 'No description'}`);
  console.log(`  ID: ${event.id}`);
  console.log('');
}

export const searchCommand = addCommonOptions(new Command('search'))
  .description('Search volunteer events by keyword and filters')
  .argument('[keyword]', 'Words to look for in title, description or organization')
  .option('-t, --theme <theme>', 'Exact topical theme')
  .option('-m, --mood <mood>', 'Exact mood/intent')
  .option('--from <date>', 'Earliest start date (YYYY-MM-DD)')
  .option('--to <date>', 'Latest start date (YYYY-MM-DD)')
  .option('-l, --location <text>', 'Part of the location name')
  .option('--no-synonyms', 'Match the keyword only as typed')
  .option('-r, --rank', 'Order by recommendation score', false)
  .option('-n, --limit <number>', 'Maximum number of results', parsePositiveInt)
  .option('--json', 'Output as JSON', false)
  .action(async (keyword: string | undefined, options: SearchCommandOptions) => {
    try {
      const agent = await openAgent(options);

      try {
        const criteria: FilterCriteria = {
          keyword,
          theme: options.theme,
          mood: options.mood,
          dateRange: { from: options.from, to: options.to },
          location: options.location,
        };

        const response = agent.search(criteria, {
          // Leave the default to config unless synonyms were switched off here
          expandSynonyms: options.synonyms ? undefined : false,
          rank: options.rank,
          limit: options.limit,
        });

        if (options.json) {
          console.log(JSON.stringify(response, null, 2));
        } else if (response.total === 0) {
          console.log(`No events match ${describeCriteria(criteria)}.`);
          if (response.suggestions.length > 0) {
            console.log(`Did you mean: ${response.suggestions.map(s => `"${s}"`).join(', ')}?`);
          }
        } else {
          const shown = response.results.length < response.total ? ` (showing ${response.results.length})` : '';
          console.log(`Found ${response.total} events matching ${describeCriteria(criteria)}${shown}:\n`);

          for (const result of response.results) {
            printEvent(result, response.ranked, agent.getConfig().scoring);
          }
        }
      } finally {
        await agent.close();
      }
    } catch (error) {
      console.error('Error:', errorMessage(error));
      process.exit(1);
    }
  });
