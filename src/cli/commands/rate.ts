/**
 * rate command - Submit a rating for an event
 */

import { Command } from 'commander';
import { addCommonOptions, errorMessage, openAgent, type CommonOptions } from '../shared.js';

interface RateCommandOptions extends CommonOptions {
  comment?: string;
  json: boolean;
}

export const rateCommand = addCommonOptions(new Command('rate'))
  .description('Rate an event and print its new average')
  .argument('<eventId>', 'Event id as printed by search')
  .argument('<score>', 'Whole-number score (1-5 unless configured otherwise)')
  .option('-m, --comment <text>', 'Optional comment')
  .option('--json', 'Output as JSON', false)
  .action(async (eventId: string, score: string, options: RateCommandOptions) => {
    try {
      const agent = await openAgent(options);

      try {
        const result = await agent.rate({
          eventId,
          score: Number(score),
          comment: options.comment,
        });

        if (options.json) {
          console.log(JSON.stringify(result, null, 2));
        } else {
          const title = agent.getEvent(result.rating.eventId)?.title ?? result.rating.eventId;
          console.log(`Rated "${title}" ${result.rating.score}.`);
          console.log(`Average is now ${result.average.toFixed(1)} from ${result.count} rating(s).`);
        }
      } finally {
        await agent.close();
      }
    } catch (error) {
      console.error('Error:', errorMessage(error));
      process.exit(1);
    }
  });
