import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ReviewSchedulingService } from './reviewSchedulingService.js';
import { InMemoryReviewProgressStore } from '../test/inMemoryStores.js';
import { DAY_MS } from '../utils/time.js';

const NOW = new Date('2026-03-01T12:00:00Z');
const HOUR_MS = 60 * 60 * 1000;
const hoursAgo = (hours: number) => new Date(NOW.getTime() - hours * HOUR_MS);

describe('ReviewSchedulingService', () => {
  let store: InMemoryReviewProgressStore;
  let service: ReviewSchedulingService;

  beforeEach(() => {
    store = new InMemoryReviewProgressStore();
    service = new ReviewSchedulingService({ store, clock: () => new Date(NOW) });
  });

  describe('getDueItems', () => {
    it('returns the 10 most overdue of 12 due items by default', async () => {
      const seeded = Array.from({ length: 12 }, (_, i) =>
        store.seed({ userId: 1, itemId: i + 1, nextReviewTime: hoursAgo(i + 1) })
      );
      store.seed({ userId: 1, itemId: 50, nextReviewTime: new Date(NOW.getTime() + HOUR_MS) });

      const due = await service.getDueItems(1);

      expect(due).toHaveLength(10);
      expect(due.map(item => item.itemId)).toEqual([12, 11, 10, 9, 8, 7, 6, 5, 4, 3]);
      expect(due[0].id).toBe(seeded[11].id);
    });

    it('never returns items scheduled in the future', async () => {
      store.seed({ userId: 1, itemId: 1, nextReviewTime: new Date(NOW) });
      store.seed({ userId: 1, itemId: 2, nextReviewTime: new Date(NOW.getTime() + 1) });
      store.seed({ userId: 2, itemId: 3, nextReviewTime: hoursAgo(5) });

      const due = await service.getDueItems(1, 50);

      expect(due.map(item => item.itemId)).toEqual([1]);
    });

    it('respects an explicit limit', async () => {
      for (let i = 1; i <= 5; i++) {
        store.seed({ userId: 1, itemId: i, nextReviewTime: hoursAgo(i) });
      }

      const due = await service.getDueItems(1, 3);

      expect(due.map(item => item.itemId)).toEqual([5, 4, 3]);
    });

    it('returns an empty list when nothing is due', async () => {
      expect(await service.getDueItems(1)).toEqual([]);
      expect(await service.getDueItems(1, 0)).toEqual([]);
    });

    it('rejects a negative limit', async () => {
      await expect(service.getDueItems(1, -1)).rejects.toMatchObject({ code: 'INVALID_INPUT' });
    });
  });

  describe('applyAnswer', () => {
    it('schedules a fresh item one day out, then six days out', async () => {
      const progress = store.seed({ userId: 1, itemId: 7, nextReviewTime: hoursAgo(1) });

      const first = await service.applyAnswer(progress.id, 5, true);

      expect(first).not.toBeNull();
      expect(first?.intervalDays).toBe(1);
      expect(first?.repetitions).toBe(1);
      expect(first?.easinessFactor).toBeCloseTo(2.6, 10);
      expect(first?.nextReviewTime).toEqual(new Date(NOW.getTime() + DAY_MS));
      expect(first?.lastReviewed).toEqual(NOW);
      expect(first?.lastQuality).toBe(5);
      expect(first?.timesReviewed).toBe(1);
      expect(first?.timesCorrect).toBe(1);
      expect(first?.timesWrong).toBe(0);
      expect(first?.stage).toBe(1);

      const second = await service.applyAnswer(progress.id, 5, true);

      expect(second?.intervalDays).toBe(6);
      expect(second?.repetitions).toBe(2);
      expect(second?.stage).toBe(2);
      expect(second?.timesReviewed).toBe(2);
      expect(store.rows.get(progress.id)?.intervalDays).toBe(6);
    });

    it('resets the schedule on a lapse and counts the wrong answer', async () => {
      const progress = store.seed({
        userId: 1,
        itemId: 7,
        repetitions: 3,
        intervalDays: 15,
        stage: 3,
        timesReviewed: 3,
        timesCorrect: 3
      });

      const updated = await service.applyAnswer(progress.id, 1, false);

      expect(updated).toMatchObject({
        repetitions: 0,
        intervalDays: 0,
        stage: 0,
        lastQuality: 1,
        timesReviewed: 4,
        timesCorrect: 3,
        timesWrong: 1
      });
      expect(updated?.nextReviewTime).toEqual(NOW);
      expect(updated?.easinessFactor).toBeCloseTo(1.96, 10);
    });

    it('caps the stage at 5', async () => {
      const progress = store.seed({ userId: 1, itemId: 7, repetitions: 6, intervalDays: 100, stage: 5 });

      const updated = await service.applyAnswer(progress.id, 4, true);

      expect(updated?.repetitions).toBe(7);
      expect(updated?.intervalDays).toBe(250);
      expect(updated?.stage).toBe(5);
    });

    it('ignores an unknown progress id without touching the store', async () => {
      const existing = store.seed({ userId: 1, itemId: 7 });
      const before = JSON.stringify([...store.rows.entries()]);

      await expect(service.applyAnswer(999, 4, true)).resolves.toBeNull();

      expect(JSON.stringify([...store.rows.entries()])).toBe(before);
      expect(store.rows.get(existing.id)?.timesReviewed).toBe(0);
    });

    it('rejects an invalid quality before reading the store', async () => {
      const progress = store.seed({ userId: 1, itemId: 7 });

      await expect(service.applyAnswer(progress.id, 7, true)).rejects.toMatchObject({ code: 'INVALID_INPUT' });
      expect(store.transactions).toBe(0);
    });

    it('propagates storage failures', async () => {
      const failure = new Error('connection terminated');
      vi.spyOn(store, 'findById').mockRejectedValue(failure);

      await expect(service.applyAnswer(1, 4, true)).rejects.toBe(failure);
    });
  });

  describe('addItemToUser', () => {
    it('creates a record that is due immediately', async () => {
      const created = await service.addItemToUser(3, 42);

      expect(created).toMatchObject({
        userId: 3,
        itemId: 42,
        repetitions: 0,
        easinessFactor: 2.5,
        intervalDays: 0,
        lastQuality: 0,
        lastReviewed: null,
        stage: 0
      });
      expect(created?.nextReviewTime).toEqual(NOW);
      expect((await service.getDueItems(3)).map(item => item.itemId)).toEqual([42]);
    });

    it('returns null when the item is already tracked', async () => {
      await service.addItemToUser(3, 42);

      expect(await service.addItemToUser(3, 42)).toBeNull();
      expect(store.rows.size).toBe(1);
    });
  });

  describe('removeItemFromUser', () => {
    it('deletes only the matching record', async () => {
      store.seed({ userId: 3, itemId: 42 });
      store.seed({ userId: 4, itemId: 42 });

      expect(await service.removeItemFromUser(3, 42)).toBe(true);
      expect(await service.removeItemFromUser(3, 42)).toBe(false);
      expect(store.rows.size).toBe(1);
    });
  });

  describe('getReviewStats', () => {
    it('counts records by stage and due time', async () => {
      store.seed({ userId: 1, itemId: 1, stage: 0, nextReviewTime: hoursAgo(1) });
      store.seed({ userId: 1, itemId: 2, stage: 0, nextReviewTime: hoursAgo(2) });
      store.seed({ userId: 1, itemId: 3, stage: 2, nextReviewTime: new Date(NOW.getTime() + DAY_MS) });
      store.seed({ userId: 1, itemId: 4, stage: 4, nextReviewTime: hoursAgo(3) });
      store.seed({ userId: 1, itemId: 5, stage: 5, nextReviewTime: new Date(NOW.getTime() + 6 * DAY_MS) });
      store.seed({ userId: 2, itemId: 1, stage: 1, nextReviewTime: hoursAgo(1) });

      expect(await service.getReviewStats(1)).toEqual({
        total: 5,
        dueNow: 3,
        mastered: 2,
        learning: 1,
        new: 2
      });
    });

    it('returns zeros for a user without records', async () => {
      expect(await service.getReviewStats(9)).toEqual({ total: 0, dueNow: 0, mastered: 0, learning: 0, new: 0 });
    });
  });
});
