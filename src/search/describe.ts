/**
 * Plain-text renderings of criteria and events shared by the CLI and MCP tools
 */

import type { FilterCriteria } from '../types/index.js';

export const DESCRIPTION_PREVIEW = 200;

export function describeCriteria(criteria: FilterCriteria): string {
  const parts: string[] = [];
  const keyword = criteria.keyword?.trim();
  const theme = criteria.theme?.trim();
  const mood = criteria.mood?.trim();
  const from = criteria.dateRange?.from?.trim();
  const to = criteria.dateRange?.to?.trim();
  const location = criteria.location?.trim();

  if (keyword) parts.push(`keyword "${keyword}"`);
  if (theme) parts.push(`theme "${theme}"`);
  if (mood) parts.push(`mood "${mood}"`);
  if (from || to) parts.push(`dates ${from || '...'} to ${to || '...'}`);
  if (location) parts.push(`location "${location}"`);

  return parts.length > 0 ? parts.join(', ') : 'no filters';
}

/**
 * First part of a description, marked with "..." when cut
 */
export function previewDescription(description: string, maxLength: number = DESCRIPTION_PREVIEW): string {
  if (description.length <= maxLength) return description;
  return `${description.slice(0, maxLength)}...`;
}
