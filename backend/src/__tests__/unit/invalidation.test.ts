/**
 * Unit Tests: Invalidation Controller
 */

import { describe, it, expect, beforeEach } from 'vitest';
import type { PostRecord, User } from '@photofeed/shared';
import { createHarness, type TestHarness } from '../mocks/harness.js';

describe('Invalidation Controller', () => {
  let h: TestHarness;
  let alice: User;
  let bob: User;
  let alicePost: PostRecord;

  beforeEach(() => {
    h = createHarness();
    alice = h.store.addUser('alice');
    bob = h.store.addUser('bob');
    alicePost = h.store.addPost(alice.id, 'sunset');
    for (const key of ['index_posts', 'account:alice', 'account:bob', 'user:1', 'user:2']) {
      h.redis.seed(key, 'cached');
    }
  });

  describe('onPostCreated', () => {
    it('should evict the feed and the author profile only', async () => {
      await h.services.invalidation.onPostCreated(alice.id);

      expect(h.redis.peek('index_posts')).toBeUndefined();
      expect(h.redis.peek('account:alice')).toBeUndefined();
      expect(h.redis.peek('account:bob')).toBe('cached');
    });

    it('should make the next feed and profile reads show the new post', async () => {
      h.redis.clear();
      await h.services.feed.getFeed('csrf-1');
      await h.services.feed.getProfile('alice', 'csrf-1');

      h.store.addPost(alice.id, 'fresh');
      await h.services.invalidation.onPostCreated(alice.id);

      const feed = await h.services.feed.getFeed('csrf-1');
      const profile = await h.services.feed.getProfile('alice', 'csrf-1');
      expect(feed[0]?.body).toBe('fresh');
      expect(profile?.postCount).toBe(2);
    });
  });

  describe('onCommentCreated', () => {
    it('should evict the feed, the commenter profile and the post owner profile', async () => {
      h.redis.seed('account:carol', 'cached');

      await h.services.invalidation.onCommentCreated(bob.id, alicePost.id);

      expect(h.redis.peek('index_posts')).toBeUndefined();
      expect(h.redis.peek('account:bob')).toBeUndefined();
      expect(h.redis.peek('account:alice')).toBeUndefined();
      expect(h.redis.peek('account:carol')).toBe('cached');
    });

    it('should skip the owner profile when the post does not exist', async () => {
      await expect(h.services.invalidation.onCommentCreated(bob.id, 404)).resolves.toBeUndefined();

      expect(h.redis.peek('index_posts')).toBeUndefined();
      expect(h.redis.peek('account:bob')).toBeUndefined();
      expect(h.redis.peek('account:alice')).toBe('cached');
    });

    it('should not fail when the owner lookup query fails', async () => {
      h.redis.clear();
      await h.services.userLookup.getUser(bob.id);
      h.redis.seed('account:bob', 'cached');
      h.redis.seed('account:alice', 'cached');
      h.store.setFailing(true);

      await expect(h.services.invalidation.onCommentCreated(bob.id, alicePost.id)).resolves.toBeUndefined();

      expect(h.redis.peek('account:bob')).toBeUndefined();
      expect(h.redis.peek('account:alice')).toBe('cached');
    });
  });

  describe('onUserBanned', () => {
    it('should evict the user entry and the feed', async () => {
      await h.services.invalidation.onUserBanned(bob.id);

      expect(h.redis.peek('user:2')).toBeUndefined();
      expect(h.redis.peek('index_posts')).toBeUndefined();
      expect(h.redis.peek('user:1')).toBe('cached');
      expect(h.redis.peek('account:bob')).toBe('cached');
    });
  });

  it('should complete every hook while the cache is down', async () => {
    h.redis.setMode('fail');

    await expect(h.services.invalidation.onPostCreated(alice.id)).resolves.toBeUndefined();
    await expect(h.services.invalidation.onCommentCreated(bob.id, alicePost.id)).resolves.toBeUndefined();
    await expect(h.services.invalidation.onUserBanned(bob.id)).resolves.toBeUndefined();
  });
});
