import { describe, expect, it } from 'vitest';
import { snapshot } from '../test/fake-pbs-client';
import {
  TaskCommentMap,
  buildCommentIndex,
  lookupComment,
  mergeTaskComments,
  truncateComment,
  workerIdFor,
} from './comments';

describe('buildCommentIndex', () => {
  it('keeps the comment of the newest snapshot per group', () => {
    const index = buildCommentIndex([
      snapshot('vm', '100', 1000, { comment: 'old' }),
      snapshot('vm', '100', 3000, { comment: 'newest' }),
      snapshot('vm', '100', 2000, { comment: 'middle' }),
      snapshot('ct', '200', 500, { comment: 'container' }),
    ]);

    expect(lookupComment(index, 'vm', '100')).toBe('newest');
    expect(lookupComment(index, 'ct', '200')).toBe('container');
  });

  it('keeps the first snapshot seen when times are equal', () => {
    const index = buildCommentIndex([
      snapshot('vm', '100', 1000, { comment: 'first' }),
      snapshot('vm', '100', 1000, { comment: 'second' }),
    ]);

    expect(lookupComment(index, 'vm', '100')).toBe('first');
  });

  it('uses the newest snapshot even when it has no comment', () => {
    const index = buildCommentIndex([
      snapshot('vm', '100', 1000, { comment: 'older' }),
      snapshot('vm', '100', 2000),
    ]);

    expect(lookupComment(index, 'vm', '100')).toBe('');
  });

  it('keeps groups apart when an id contains a slash', () => {
    const index = buildCommentIndex([
      snapshot('vm', 'a/b', 1000, { comment: 'slashed id' }),
      snapshot('vm/a', 'b', 1000, { comment: 'slashed type' }),
    ]);

    expect(index.size).toBe(2);
    expect(lookupComment(index, 'vm', 'a/b')).toBe('slashed id');
    expect(lookupComment(index, 'vm/a', 'b')).toBe('slashed type');
  });

  it('returns an empty comment for unknown groups', () => {
    expect(lookupComment(buildCommentIndex([]), 'vm', '999')).toBe('');
  });
});

describe('mergeTaskComments', () => {
  it('adds non-empty comments keyed by worker-id', () => {
    const target: TaskCommentMap = new Map();
    const index = buildCommentIndex([
      snapshot('vm', '100', 1000, { comment: 'nightly' }),
      snapshot('vm', '101', 1000, { comment: '' }),
      snapshot('ct', '200', 1000),
    ]);

    mergeTaskComments(target, 'backup', index);

    expect([...target.entries()]).toEqual([['backup:vm/100', 'nightly']]);
  });

  it('does not truncate comments', () => {
    const long = 'x'.repeat(60);
    const target: TaskCommentMap = new Map();

    mergeTaskComments(target, 'ds', buildCommentIndex([snapshot('vm', '1', 1, { comment: long })]));

    expect(target.get(workerIdFor('ds', 'vm', '1'))).toBe(long);
  });
});

describe('truncateComment', () => {
  it('leaves comments of up to 50 characters alone', () => {
    const fifty = 'a'.repeat(50);
    expect(truncateComment(fifty)).toBe(fifty);
    expect(truncateComment('')).toBe('');
  });

  it('cuts longer comments to their first 47 characters', () => {
    expect(truncateComment('b'.repeat(51))).toBe('b'.repeat(47));
    expect(truncateComment('c'.repeat(60))).toHaveLength(47);
  });

  it('counts code points, not UTF-16 units', () => {
    const emoji = '\u{1F4BE}'.repeat(51);
    const result = truncateComment(emoji);

    expect(Array.from(result)).toHaveLength(47);
    expect(result).toBe('\u{1F4BE}'.repeat(47));
  });
});
