import type { RecommendationResult } from '../types/index.js';

export const IMAGE_PLACEHOLDER = '[image unavailable]';
const TITLE_WIDTH = 48;

export function renderRecommendations(result: RecommendationResult): string[] {
  if (result.kind === 'no-recommendations') {
    const lines = [`No recommendations for "${result.title}": ${result.reason}`];
    if (result.suggestions.length > 0) {
      lines.push(`Did you mean: ${result.suggestions.map((title) => `"${title}"`).join(', ')}?`);
    }
    return lines;
  }

  const titles = result.items.map((item) => fitTitle(item.title));
  const column = Math.max(0, ...titles.map((title) => title.length));
  return [
    `Recommended for "${result.title}":`,
    ...result.items.map(
      (item, index) =>
        `${String(index + 1).padStart(2, ' ')}. ${(titles[index] ?? '').padEnd(column)} - ${item.imageUrl ?? IMAGE_PLACEHOLDER}`,
    ),
  ];
}

/** Titles longer than the column are cut and end in an ellipsis. */
function fitTitle(title: string): string {
  return title.length <= TITLE_WIDTH ? title : `${title.slice(0, TITLE_WIDTH - 1)}…`;
}
