/**
 * search_events tool implementation
 */

import type { EventAgent, SearchResponse } from '../../agent/index.js';
import type { FilterCriteria, RankedEvent } from '../../types/index.js';
import { ValidationError } from '../../errors.js';
import { describeCriteria, previewDescription } from '../../search/index.js';
import { enforceOutputBudget, formatCompactTable, textResponse, type ToolResponse } from './compact-format.js';

const DEFAULT_MAX_BYTES = 4000;

export interface SearchEventsInput {
  keyword?: string;
  theme?: string;
  mood?: string;
  date_from?: string;
  date_to?: string;
  location?: string;
  expand_synonyms?: boolean;
  rank?: boolean;
  limit?: number;
  format?: 'compact' | 'markdown';
}

export function toCriteria(input: SearchEventsInput): FilterCriteria {
  return {
    keyword: input.keyword,
    theme: input.theme,
    mood: input.mood,
    dateRange: { from: input.date_from, to: input.date_to },
    location: input.location,
  };
}

export async function searchEventsTool(
  agent: EventAgent,
  input: SearchEventsInput
): Promise<ToolResponse> {
  const criteria = toCriteria(input);

  let response: SearchResponse;
  try {
    response = agent.search(criteria, {
      expandSynonyms: input.expand_synonyms,
      rank: input.rank,
      limit: input.limit,
    });
  } catch (error) {
    if (error instanceof ValidationError) {
      return textResponse(`Invalid search: ${error.message}`);
    }
    throw error;
  }

  if (response.total === 0) {
    let text = `No events match ${describeCriteria(criteria)}.`;
    if (response.suggestions.length > 0) {
      text += ` Did you mean: ${response.suggestions.map(s => `"${s}"`).join(', ')}?`;
    }
    return textResponse(text);
  }

  if ((input.format ?? 'compact') === 'compact') {
    const header = `matches: ${response.total} (showing ${response.results.length})`;
    return textResponse(enforceOutputBudget(`${header}\n${formatSearchCompact(response.results)}`, DEFAULT_MAX_BYTES));
  }

  let output = `# Events matching ${describeCriteria(criteria)}\n\n`;

  const synonymTerms = response.terms.slice(1);
  if (synonymTerms.length > 0) {
    output += `**Expanded with synonyms**: ${synonymTerms.slice(0, 8).map(t => `\`${t}\``).join(', ')}\n\n`;
  }

  output += `Found ${response.total} event(s)`;
  output += response.results.length < response.total ? `, showing ${response.results.length}` : '';
  output += response.ranked ? ', ranked by recommendation score\n\n' : '\n\n';
  output += response.results.map((result, i) => formatEventMarkdown(result, i + 1, response.ranked)).join('\n');

  return textResponse(output);
}

function formatSearchCompact(results: RankedEvent[]): string {
  return formatCompactTable(
    results.map(({ event, score, rating, matchedTerms }) => ({
      id: event.id,
      title: event.title,
      org: event.orgTitle,
      date: event.startDate,
      location: event.location,
      theme: event.theme,
      mood: event.mood,
      avg: rating ? Number(rating.average.toFixed(2)) : null,
      score: Number(score.toFixed(2)),
      matched: matchedTerms.join('|'),
    })),
    { columns: ['id', 'title', 'org', 'date', 'location', 'theme', 'mood', 'avg', 'score', 'matched'] }
  );
}

function formatEventMarkdown(result: RankedEvent, position: number, ranked: boolean): string {
  const { event, rating } = result;
  const lines = [
    `## ${position}. ${event.title}`,
    `**Org:** ${event.orgTitle || 'Unknown'}`,
    `**When:** ${event.startDate ?? 'Date TBD'} | **Where:** ${event.location || 'Location TBD'}`,
    `**Theme:** ${event.theme || '-'} | **Mood:** ${event.mood || '-'}`,
    `**Rating:** ${rating ? `${rating.average.toFixed(1)} (${rating.count})` : 'not rated yet'}`,
  ];
  if (ranked) {
    lines.push(`**Score:** ${result.score.toFixed(2)}`);
  }
  lines.push(`**Description:** ${previewDescription(event.description) || 'No description'}`);
  lines.push(`\`id: ${event.id}\``);
  return `${lines.join('\n')}\n`;
}
