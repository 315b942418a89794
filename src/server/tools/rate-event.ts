/**
 * rate_event tool implementation
 */

import type { EventAgent } from '../../agent/index.js';
import { ValidationError } from '../../errors.js';
import { textResponse, type ToolResponse } from './compact-format.js';

export interface RateEventInput {
  event_id: string;
  score: number;
  comment?: string;
}

export async function rateEventTool(agent: EventAgent, input: RateEventInput): Promise<ToolResponse> {
  try {
    const result = await agent.rate({
      eventId: input.event_id,
      score: input.score,
      comment: input.comment,
    });

    const title = agent.getEvent(result.rating.eventId)?.title ?? result.rating.eventId;
    let text = `Rated "${title}" ${result.rating.score}. Average is now ${result.average.toFixed(1)} from ${result.count} rating(s).`;
    if (!result.persisted) {
      text += '\nWarning: the rating could not be saved and only counts for this session.';
    }
    return textResponse(text);
  } catch (error) {
    if (error instanceof ValidationError) {
      return textResponse(`Rating rejected: ${error.message}`);
    }
    throw error;
  }
}
