/**
 * MCP Tool registration
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { EventAgent } from '../../agent/index.js';
import { catalogStatsTool } from './catalog-stats.js';
import { getEventTool } from './get-event.js';
import { listFacetsTool } from './list-facets.js';
import { rateEventTool } from './rate-event.js';
import { searchEventsTool } from './search-events.js';

const responseFormatSchema = z.enum(['compact', 'markdown']).optional().default('compact')
  .describe('Response format');

export function registerTools(server: McpServer, agent: EventAgent): void {
  server.tool(
    'search_events',
    'Find volunteer events. All filters are optional and combine with AND; the keyword is matched in title, description and organization, widened with synonyms.',
    {
      keyword: z.string().optional().describe('Words to look for, e.g. "dogs", "kids", "environment"'),
      theme: z.string().optional().describe('Exact topical theme (see list_facets)'),
      mood: z.string().optional().describe('Exact mood/intent (see list_facets)'),
      date_from: z.string().optional().describe('Earliest start date, YYYY-MM-DD (inclusive)'),
      date_to: z.string().optional().describe('Latest start date, YYYY-MM-DD (inclusive)'),
      location: z.string().optional().describe('Part of the location name, e.g. "Brooklyn"'),
      expand_synonyms: z.boolean().optional().describe('Match synonyms of the keyword (default from config)'),
      rank: z.boolean().optional().default(false).describe('Order by keyword hits and average rating instead of catalog order'),
      limit: z.number().int().min(1).max(100).optional().describe('Maximum number of events to return'),
      format: responseFormatSchema,
    },
    { title: 'Search Events' },
    async ({ keyword, theme, mood, date_from, date_to, location, expand_synonyms, rank, limit, format }) => {
      return searchEventsTool(agent, {
        keyword,
        theme,
        mood,
        date_from,
        date_to,
        location,
        expand_synonyms,
        rank,
        limit,
        format,
      });
    }
  );

  server.tool(
    'get_event',
    'Show one event in full, with its rating so far.',
    {
      event_id: z.string().describe('Event id from search_events'),
    },
    { title: 'Event Details' },
    async ({ event_id }) => getEventTool(agent, { event_id })
  );

  server.tool(
    'rate_event',
    'Rate an event on the configured scale (1-5 by default) with an optional comment. Returns the new average.',
    {
      event_id: z.string().describe('Event id from search_events'),
      score: z.number().describe('Whole-number score'),
      comment: z.string().optional().describe('Optional free-text feedback'),
    },
    { title: 'Rate Event' },
    async ({ event_id, score, comment }) => rateEventTool(agent, { event_id, score, comment })
  );

  server.tool(
    'catalog_stats',
    'Summarize the catalog: events per theme, mood and month, plus the top rated events.',
    {
      top: z.number().int().min(1).max(50).optional().default(5).describe('How many top rated events to list'),
      format: responseFormatSchema,
    },
    { title: 'Catalog Statistics' },
    async ({ top, format }) => catalogStatsTool(agent, { top, format })
  );

  server.tool(
    'list_facets',
    'List the distinct themes and moods available for filtering.',
    {},
    { title: 'List Facets' },
    async () => listFacetsTool(agent)
  );
}
