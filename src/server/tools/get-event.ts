/**
 * get_event tool implementation
 */

import type { EventAgent } from '../../agent/index.js';
import { textResponse, type ToolResponse } from './compact-format.js';

export interface GetEventInput {
  event_id: string;
}

export async function getEventTool(agent: EventAgent, input: GetEventInput): Promise<ToolResponse> {
  const event = agent.getEvent(input.event_id);
  if (!event) {
    return textResponse(`Event not found: ${input.event_id}. Use search_events to look up ids.`);
  }

  const rating = agent.getRating(event.id);

  const output = [
    `# ${event.title}`,
    '',
    `**Org:** ${event.orgTitle || 'Unknown'}`,
    `**When:** ${event.startDate ?? 'Date TBD'}`,
    `**Where:** ${event.location || 'Location TBD'}`,
    `**Theme:** ${event.theme || '-'}`,
    `**Mood:** ${event.mood || '-'}`,
    `**Rating:** ${rating ? `${rating.average.toFixed(1)} from ${rating.count} rating(s)` : 'not rated yet'}`,
    '',
    event.description || 'No description',
    '',
    `\`id: ${event.id}\``,
  ];

  return textResponse(output.join('\n'));
}
