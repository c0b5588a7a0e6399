import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { exponentialBackoffMs, formatDuration, parseRetryAfter } from './time.js';

describe('parseRetryAfter', () => {
  const now = Date.parse('Wed, 21 Oct 2015 07:28:00 GMT');

  it('reads delta-seconds', () => {
    assert.equal(parseRetryAfter('2', now), 2000);
    assert.equal(parseRetryAfter(' 0.5 ', now), 500);
  });

  it('reads HTTP dates relative to now', () => {
    assert.equal(parseRetryAfter('Wed, 21 Oct 2015 07:28:05 GMT', now), 5000);
    assert.equal(parseRetryAfter('Wed, 21 Oct 2015 07:27:00 GMT', now), 0);
  });

  it('ignores missing or unreadable values', () => {
    assert.equal(parseRetryAfter(null, now), undefined);
    assert.equal(parseRetryAfter('', now), undefined);
    assert.equal(parseRetryAfter('soon', now), undefined);
  });
});

describe('exponentialBackoffMs', () => {
  it('doubles per attempt up to the cap', () => {
    assert.deepEqual(
      [0, 1, 2, 3, 4, 5].map((attempt) => exponentialBackoffMs(attempt, 10)),
      [1000, 2000, 4000, 8000, 10000, 10000],
    );
  });
});

describe('formatDuration', () => {
  it('uses ms below a second and seconds above', () => {
    assert.equal(formatDuration(250), '250ms');
    assert.equal(formatDuration(2000), '2s');
    assert.equal(formatDuration(1500), '1.5s');
  });
});
