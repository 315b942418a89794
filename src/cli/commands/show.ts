/**
 * show command - Print one event in full
 */

import { Command } from 'commander';
import { addCommonOptions, errorMessage, openAgent, type CommonOptions } from '../shared.js';

interface ShowCommandOptions extends CommonOptions {
  json: boolean;
}

export const showCommand = addCommonOptions(new Command('show'))
  .description('Show an event and its rating')
  .argument('<eventId>', 'Event id as printed by search')
  .option('--json', 'Output as JSON', false)
  .action(async (eventId: string, options: ShowCommandOptions) => {
    try {
      const agent = await openAgent(options);

      try {
        const event = agent.getEvent(eventId);
        if (!event) {
          console.error(`Event not found: ${eventId}`);
          process.exit(1);
        }

        const rating = agent.getRating(event.id);

        if (options.json) {
          console.log(JSON.stringify({ event, rating }, null, 2));
        } else {
          console.log(event.title);
          console.log(`Org: ${event.orgTitle || 'Unknown'}`);
          console.log(`When: ${event.startDate ?? 'Date TBD'}`);
          console.log(`Where: ${event.location || 'Location TBD'}`);
          console.log(`Theme: ${event.theme || '-'}`);
          console.log(`Mood: ${event.mood || '-'}`);
          console.log(`Rating: ${rating ? `${rating.average.toFixed(1)} from ${rating.count} rating(s)` : 'not rated yet'}`);
          console.log('');
          console.log(event.description || 'No description');
        }
      } finally {
        await agent.close();
      }
    } catch (error) {
      console.error('Error:', errorMessage(error));
      process.exit(1);
    }
  });
