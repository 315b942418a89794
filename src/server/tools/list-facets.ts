/**
 * list_facets tool implementation
 */

import type { EventAgent } from '../../agent/index.js';
import { textResponse, type ToolResponse } from './compact-format.js';

export async function listFacetsTool(agent: EventAgent): Promise<ToolResponse> {
  const { themes, moods } = agent.getFacets();
  return textResponse([
    `themes: ${themes.join(' | ') || '(none)'}`,
    `moods: ${moods.join(' | ') || '(none)'}`,
  ].join('\n'));
}
