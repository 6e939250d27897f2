/**
 * Unit tests for the captcha lifecycle and its deadline timers
 */

import type { Mock } from 'vitest';
import type { DatabaseHandle } from '../../src/database';
import { CaptchaLifecycle } from '../../src/services/captchaLifecycle';
import { DeadlineTimers } from '../../src/services/deadlineTimers';
import { CaptchaStore } from '../../src/store/captchaStore';
import type { CaptchaRecord } from '../../src/types';
import { createTestDatabase } from '../helpers';

const key = { groupId: -100123, userId: 42 };

describe('CaptchaLifecycle', () => {
  let db: DatabaseHandle;
  let timers: DeadlineTimers;
  let onExpired: Mock<(record: CaptchaRecord) => Promise<void>>;
  let lifecycle: CaptchaLifecycle;

  beforeEach(() => {
    db = createTestDatabase();
    timers = new DeadlineTimers();
    onExpired = vi.fn(async (_record: CaptchaRecord) => {});
    lifecycle = new CaptchaLifecycle(new CaptchaStore(db), {
      timeoutSeconds: 120,
      timers,
      onExpired,
    });
  });

  afterEach(() => {
    timers.clear();
    db.close();
    vi.useRealTimers();
  });

  describe('create', () => {
    it('opens a pending challenge and arms its deadline', () => {
      const result = lifecycle.create(key, 1000, { userFullName: 'Alice Smith' });

      expect(result.ok && result.value.status).toBe('pending');
      expect(result.ok && result.value.deadline).toBe(1120);
      expect(result.ok && result.value.attempts).toBe(0);
      expect(result.ok && result.value.user_full_name).toBe('Alice Smith');
      expect(timers.has(key)).toBe(true);
    });

    it('refuses a second challenge while one is pending', () => {
      lifecycle.create(key, 1000);

      const result = lifecycle.create(key, 1010);
      expect(result).toEqual({
        ok: false,
        reason: 'AlreadyPending',
        message: 'Captcha already pending until 1120',
      });
    });

    it('allows a new challenge once the previous one is resolved', () => {
      lifecycle.create(key, 1000);
      lifecycle.verify(key, 1050);

      const result = lifecycle.create(key, 2000);
      expect(result.ok && result.value.deadline).toBe(2120);
    });
  });

  describe('verify', () => {
    it('marks the challenge verified and cancels the timer', () => {
      lifecycle.create(key, 1000);

      const result = lifecycle.verify(key, 1050);
      expect(result.ok && result.value.status).toBe('verified');
      expect(result.ok && result.value.attempts).toBe(1);
      expect(result.ok && result.value.resolved_at).toBe(1050);
      expect(timers.has(key)).toBe(false);
    });

    it('reports AlreadyTerminal for a resolved challenge', () => {
      lifecycle.create(key, 1000);
      lifecycle.verify(key, 1050);

      const result = lifecycle.verify(key, 1060);
      expect(!result.ok && result.reason).toBe('AlreadyTerminal');
    });

    it('reports NotFound for a member without a challenge', () => {
      const result = lifecycle.verify(key, 1000);
      expect(!result.ok && result.reason).toBe('NotFound');
    });

    it('still accepts a press after the deadline while the record is pending', () => {
      lifecycle.create(key, 1000);

      const result = lifecycle.verify(key, 1500);
      expect(result.ok && result.value.status).toBe('verified');
    });
  });

  describe('expire', () => {
    it('rejects a call before the deadline', async () => {
      lifecycle.create(key, 1000);

      const result = await lifecycle.expire(key, 1119);
      expect(result).toEqual({
        ok: false,
        reason: 'TooEarly',
        message: 'Deadline 1120 not reached',
      });
      const pending = lifecycle.getPending(key);
      expect(pending.ok && pending.value?.status).toBe('pending');
    });

    it('expires at the deadline and notifies the listener once', async () => {
      lifecycle.create(key, 1000);

      const first = await lifecycle.expire(key, 1120);
      const second = await lifecycle.expire(key, 1121);

      expect(first.ok && first.value.status).toBe('expired');
      expect(!second.ok && second.reason).toBe('AlreadyTerminal');
      expect(onExpired).toHaveBeenCalledTimes(1);
      expect(onExpired.mock.calls[0][0].user_id).toBe(42);
    });

    it('keeps the expiry when the listener fails', async () => {
      onExpired.mockRejectedValueOnce(new Error('send failed'));
      lifecycle.create(key, 1000);

      const result = await lifecycle.expire(key, 1200);
      expect(result.ok).toBe(true);
      const latest = lifecycle.getLatest(key);
      expect(latest.ok && latest.value?.status).toBe('expired');
    });

    it('turns a later verify into AlreadyTerminal', async () => {
      lifecycle.create(key, 1000);
      await lifecycle.expire(key, 1120);

      const result = lifecycle.verify(key, 1130);
      expect(!result.ok && result.reason).toBe('AlreadyTerminal');
    });
  });

  describe('reads', () => {
    it('attaches the challenge message only to a pending record', () => {
      lifecycle.create(key, 1000);

      expect(lifecycle.attachChallenge(key, -100123, 555)).toEqual({ ok: true, value: true });
      const pending = lifecycle.getPending(key);
      expect(pending.ok && pending.value?.message_id).toBe(555);
      expect(pending.ok && pending.value?.chat_id).toBe(-100123);

      lifecycle.verify(key, 1010);
      expect(lifecycle.attachChallenge(key, -100123, 556)).toEqual({ ok: true, value: false });
    });

    it('lists overdue records by deadline', () => {
      lifecycle.create(key, 1000);
      lifecycle.create({ groupId: -100123, userId: 43 }, 1100);

      const overdue = lifecycle.listOverdue(1120);
      expect(overdue.ok && overdue.value.map((r) => r.user_id)).toEqual([42]);
      expect(lifecycle.listOverdue(1119)).toEqual({ ok: true, value: [] });

      const pending = lifecycle.listPending();
      expect(pending.ok && pending.value.map((r) => r.user_id)).toEqual([42, 43]);
    });
  });

  describe('deadline timer', () => {
    it('expires the challenge when the timer fires', async () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date(1_700_000_000_000));

      lifecycle.create(key);
      await vi.advanceTimersByTimeAsync(119_000);
      expect(onExpired).not.toHaveBeenCalled();

      await vi.advanceTimersByTimeAsync(1_000);
      expect(onExpired).toHaveBeenCalledTimes(1);
      const latest = lifecycle.getLatest(key);
      expect(latest.ok && latest.value?.status).toBe('expired');
      expect(timers.size).toBe(0);
    });
  });
});

describe('DeadlineTimers', () => {
  let timers: DeadlineTimers;

  beforeEach(() => {
    vi.useFakeTimers();
    timers = new DeadlineTimers();
  });

  afterEach(() => {
    timers.clear();
    vi.useRealTimers();
  });

  it('fires the callback at the deadline', () => {
    const callback = vi.fn(async () => {});
    timers.arm(key, 1005, callback, 1000);

    vi.advanceTimersByTime(4_999);
    expect(callback).not.toHaveBeenCalled();

    vi.advanceTimersByTime(1);
    expect(callback).toHaveBeenCalledTimes(1);
    expect(timers.has(key)).toBe(false);
  });

  it('replaces the timer armed for the same key', () => {
    const first = vi.fn(async () => {});
    const second = vi.fn(async () => {});
    timers.arm(key, 1005, first, 1000);
    timers.arm(key, 1010, second, 1000);

    vi.advanceTimersByTime(10_000);
    expect(first).not.toHaveBeenCalled();
    expect(second).toHaveBeenCalledTimes(1);
  });

  it('fires a past deadline on the next tick', () => {
    const callback = vi.fn(async () => {});
    timers.arm(key, 900, callback, 1000);

    vi.advanceTimersByTime(1);
    expect(callback).toHaveBeenCalledTimes(1);
  });

  it('cancels a timer', () => {
    const callback = vi.fn(async () => {});
    timers.arm(key, 1005, callback, 1000);

    expect(timers.cancel(key)).toBe(true);
    expect(timers.cancel(key)).toBe(false);
    vi.advanceTimersByTime(10_000);
    expect(callback).not.toHaveBeenCalled();
  });

  it('absorbs a failing callback', async () => {
    const callback = vi.fn(async () => {
      throw new Error('boom');
    });
    timers.arm(key, 1001, callback, 1000);

    await vi.advanceTimersByTimeAsync(1_000);
    expect(callback).toHaveBeenCalledTimes(1);
    expect(timers.size).toBe(0);
  });
});
