// tests/unit/Normalizer.test.ts

import { describe, it, expect } from 'vitest';
import { Normalizer } from '../../src/core/normalizer/Normalizer';
import { FetchFailedError } from '../../src/utils/errors';
import { youtubeVideo } from '../helpers/fixtures';

describe('Normalizer', () => {
  const normalizer = new Normalizer();

  describe('youtube', () => {
    it('should map a liked video to a watch URL and thumbnail', () => {
      const records = normalizer.normalize('youtube', [youtubeVideo('dQw4', 'First video')]);

      expect(records).toEqual([
        {
          title: 'First video',
          url: 'https://www.youtube.com/watch?v=dQw4',
          subtitle: 'https://i.ytimg.com/vi/dQw4/default.jpg',
        },
      ]);
    });

    it('should keep provider order', () => {
      const records = normalizer.normalize('youtube', [
        youtubeVideo('b'),
        youtubeVideo('a'),
        youtubeVideo('c'),
      ]);

      expect(records.map((r) => r.title)).toEqual(['Video b', 'Video a', 'Video c']);
    });

    it('should fail the whole batch when one video lacks a thumbnail', () => {
      const broken = { id: 'bad', snippet: { title: 'No thumbnail', thumbnails: {} } };

      expect(() =>
        normalizer.normalize('youtube', [youtubeVideo('ok'), broken, youtubeVideo('ok2')])
      ).toThrow(FetchFailedError);
      expect(() => normalizer.normalize('youtube', [youtubeVideo('ok'), broken])).toThrow(
        'Schema validation failed for youtube item 1'
      );
    });

    it('should return an empty list for no items', () => {
      expect(normalizer.normalize('youtube', [])).toEqual([]);
    });
  });

  describe('reddit', () => {
    it('should map a saved submission to a permalink and subreddit', () => {
      const records = normalizer.normalize('reddit', [
        {
          title: 'Narrowing unknown safely',
          permalink: '/r/typescript/comments/abc123/narrowing_unknown_safely/',
          subreddit: 'typescript',
        },
      ]);

      expect(records).toEqual([
        {
          title: 'Narrowing unknown safely',
          url: 'https://reddit.com/r/typescript/comments/abc123/narrowing_unknown_safely/',
          subtitle: 'typescript',
        },
      ]);
    });

    it('should skip saved comments, which have no title', () => {
      const records = normalizer.normalize('reddit', [
        { body: 'comment', permalink: '/r/node/comments/x/y/z/', subreddit: 'node' },
        { title: 'Kept', permalink: '/r/node/comments/k/kept/', subreddit: 'node' },
      ]);

      expect(records).toEqual([
        { title: 'Kept', url: 'https://reddit.com/r/node/comments/k/kept/', subtitle: 'node' },
      ]);
    });

    it('should fail when a submission lacks a permalink', () => {
      expect(() => normalizer.normalize('reddit', [{ title: 'x', subreddit: 'node' }])).toThrow(
        'Schema validation failed for reddit item 0'
      );
    });
  });
});
