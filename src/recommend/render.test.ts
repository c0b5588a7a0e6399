import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { IMAGE_PLACEHOLDER, renderRecommendations } from './render.js';

describe('renderRecommendations', () => {
  it('lists recommendations in order with a placeholder for missing images', () => {
    const lines = renderRecommendations({
      kind: 'recommendations',
      title: 'A',
      items: [
        { id: 2, title: 'B', imageUrl: 'https://image.test/b.jpg' },
        { id: 4, title: 'D', imageUrl: null },
      ],
    });
    assert.deepEqual(lines, ['Recommended for "A":', ' 1. B - https://image.test/b.jpg', ` 2. D - ${IMAGE_PLACEHOLDER}`]);
  });

  it('shortens long titles', () => {
    const [, line] = renderRecommendations({
      kind: 'recommendations',
      title: 'A',
      items: [{ id: 1, title: 'x'.repeat(60), imageUrl: null }],
    });
    assert.equal(line, ` 1. ${'x'.repeat(47)}… - [image unavailable]`);
  });

  it('aligns image URLs after the longest title', () => {
    const lines = renderRecommendations({
      kind: 'recommendations',
      title: 'Ronin',
      items: [
        { id: 949, title: 'Heat', imageUrl: 'https://image.test/heat.jpg' },
        { id: 14160, title: 'Up', imageUrl: null },
      ],
    });
    assert.deepEqual(lines, [
      'Recommended for "Ronin":',
      ' 1. Heat - https://image.test/heat.jpg',
      ' 2. Up   - [image unavailable]',
    ]);
  });

  it('explains a missing title and offers suggestions', () => {
    assert.deepEqual(
      renderRecommendations({
        kind: 'no-recommendations',
        title: 'alien',
        reason: 'No catalog item titled "alien".',
        suggestions: ['Alien', 'Aliens'],
      }),
      ['No recommendations for "alien": No catalog item titled "alien".', 'Did you mean: "Alien", "Aliens"?'],
    );
    assert.deepEqual(
      renderRecommendations({ kind: 'no-recommendations', title: 'zzz', reason: 'No catalog item titled "zzz".', suggestions: [] }),
      ['No recommendations for "zzz": No catalog item titled "zzz".'],
    );
  });
});
