/**
 * catalog_stats tool implementation
 */

import type { EventAgent } from '../../agent/index.js';
import type { FacetCount } from '../../types/index.js';
import { formatCompactTable, textResponse, type ToolResponse } from './compact-format.js';

export interface CatalogStatsInput {
  top?: number;
  format?: 'compact' | 'markdown';
}

function formatFacetLines(counts: FacetCount[]): string {
  return counts.map(c => `- ${c.value}: ${c.count}`).join('\n');
}

export async function catalogStatsTool(agent: EventAgent, input: CatalogStatsInput): Promise<ToolResponse> {
  const stats = agent.getStats(input.top);

  if ((input.format ?? 'compact') === 'compact') {
    const sections = [
      `events: ${stats.totalEvents} undated: ${stats.undated} ratings: ${stats.totalRatings} rated_events: ${stats.ratedEvents}`,
      formatCompactTable(stats.byTheme.map(c => ({ theme: c.value, count: c.count })), { columns: ['theme', 'count'] }),
      formatCompactTable(stats.byMood.map(c => ({ mood: c.value, count: c.count })), { columns: ['mood', 'count'] }),
      formatCompactTable(stats.byMonth.map(c => ({ month: c.value, count: c.count })), { columns: ['month', 'count'] }),
      formatCompactTable(
        stats.topRated.map(t => ({ id: t.event.id, title: t.event.title, avg: Number(t.average.toFixed(2)), ratings: t.count })),
        { columns: ['id', 'title', 'avg', 'ratings'] }
      ),
    ];
    return textResponse(sections.join('\n\n'));
  }

  let output = '# Catalog Statistics\n\n';
  output += `**Events:** ${stats.totalEvents} (${stats.undated} without a date)\n`;
  output += `**Ratings:** ${stats.totalRatings} across ${stats.ratedEvents} event(s)\n\n`;
  output += `## By Theme\n${formatFacetLines(stats.byTheme)}\n\n`;
  output += `## By Mood\n${formatFacetLines(stats.byMood)}\n\n`;
  output += `## By Month\n${formatFacetLines(stats.byMonth) || '- none'}\n\n`;
  output += '## Top Rated\n';
  output += stats.topRated.length > 0
    ? stats.topRated.map((t, i) => `${i + 1}. ${t.event.title}: ${t.average.toFixed(1)} (${t.count})`).join('\n')
    : 'No ratings yet.';

  return textResponse(output);
}
