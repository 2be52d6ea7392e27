import { describe, it, expect } from 'vitest';

import { ResolutionError } from '@shiplog/utils';

import { attributeTag, buildTagReachability, compareTags } from '../src/tag-attributor.js';

import { FakeRepository, sha } from './helpers/fake-repository.js';
import { tag } from './helpers/records.js';

describe('compareTags', () => {
  it('should order by creation date, then name', () => {
    const tags = [tag('v1.1', 10), tag('v1.0-b', 5), tag('v1.0-a', 5), { name: 'undated', date: new Date('nope') }];

    expect([...tags].sort(compareTags).map(entry => entry.name)).toEqual(['v1.0-a', 'v1.0-b', 'v1.1', 'undated']);
  });
});

describe('buildTagReachability / attributeTag', () => {
  const repo = new FakeRepository({
    tags: [
      { ...tag('v1.1', 10), commits: [sha(1), sha(2), sha(3)] },
      { ...tag('v1.0', 5), commits: [sha(1), sha(2)] },
    ],
  });
  const tags = repo.listTags();

  it('should attribute the earliest containing tag', () => {
    const reachability = buildTagReachability(repo, tags, [sha(1), sha(3), sha(4)]);

    expect(attributeTag(sha(1), reachability)).toEqual(tag('v1.0', 5));
    expect(attributeTag(sha(3), reachability)).toEqual(tag('v1.1', 10));
  });

  it('should leave commits in no tag unreleased', () => {
    const reachability = buildTagReachability(repo, tags, [sha(4)]);

    expect(attributeTag(sha(4), reachability)).toBeUndefined();
  });

  it('should only keep commits of the range', () => {
    const reachability = buildTagReachability(repo, tags, [sha(1)]);

    expect(reachability.entries.map(entry => [entry.tag.name, [...entry.commits]])).toEqual([
      ['v1.0', [sha(1)]],
      ['v1.1', [sha(1)]],
    ]);
    // sha(2) is in both tags but outside the range
    expect(attributeTag(sha(2), reachability)).toBeUndefined();
  });

  it('should break date ties by ascending name', () => {
    const tied = new FakeRepository({
      tags: [
        { ...tag('release-b', 7), commits: [sha(9)] },
        { ...tag('release-a', 7), commits: [sha(9)] },
      ],
    });

    const reachability = buildTagReachability(tied, tied.listTags(), [sha(9)]);

    expect(attributeTag(sha(9), reachability)?.name).toBe('release-a');
  });

  it('should be idempotent', () => {
    const first = buildTagReachability(repo, tags, [sha(1), sha(2), sha(3)]);
    const second = buildTagReachability(repo, [...tags].reverse(), [sha(3), sha(2), sha(1)]);

    for (const seed of [1, 2, 3]) {
      expect(attributeTag(sha(seed), second)).toEqual(attributeTag(sha(seed), first));
    }
  });

  it('should not run git for an empty range', () => {
    const fresh = new FakeRepository({ tags: [{ ...tag('v1.0', 5), commits: [sha(1)] }] });

    const reachability = buildTagReachability(fresh, fresh.listTags(), []);

    expect(reachability.entries).toEqual([]);
    expect(fresh.tagLookups).toEqual([]);
  });

  it('should wrap git failures as ResolutionError', () => {
    const broken = new FakeRepository();

    expect(() => buildTagReachability(broken, [tag('ghost', 1)], [sha(1)])).toThrow(
      new ResolutionError("Could not list commits of tag ghost\nfatal: bad revision 'refs/tags/ghost'"),
    );
  });
});
