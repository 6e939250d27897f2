/**
 * Unit tests for private chat self-service unrestriction
 */

import type { User } from 'telegraf/types';
import { handleDirectMessage } from '../../src/handlers/directMessages';
import {
  CAPTCHA_PENDING_DM,
  DM_ALREADY_UNRESTRICTED,
  DM_NO_RESTRICTION,
  DM_NOT_IN_GROUP,
  DM_OTHER_RESTRICTION,
  DM_UNRESTRICTION_FAILED,
  DM_UNRESTRICTION_SUCCESS,
} from '../../src/utils/messages';
import {
  createTestServices,
  createTestUser,
  createTwoGroupConfig,
  GROUP_ID,
  type TestServices,
  textOf,
} from '../helpers';

const OTHER_GROUP_ID = -100456;

describe('handleDirectMessage', () => {
  let env: TestServices;
  let alice: User;
  const key = { groupId: GROUP_ID, userId: 42 };

  const restrictBySystem = () => {
    for (const now of [1000, 1010, 1020]) {
      env.services.profile.recordViolation(key, now);
    }
  };

  beforeEach(() => {
    env = createTestServices();
    alice = createTestUser(42);
  });

  afterEach(() => {
    env.dispose();
  });

  it('asks non-members to join first', async () => {
    expect(await handleDirectMessage(env.bot, alice, 2000)).toBe(DM_NOT_IN_GROUP);

    env.gateway.addMember(alice, 'left');
    expect(await handleDirectMessage(env.bot, alice, 2000)).toBe(DM_NOT_IN_GROUP);
  });

  it('points to a pending challenge', async () => {
    env.gateway.addMember(alice, 'restricted');
    env.services.captcha.create(key, 1000);

    expect(await handleDirectMessage(env.bot, alice, 1010)).toBe(CAPTCHA_PENDING_DM);
  });

  it('lists what the profile still lacks', async () => {
    env.gateway.addMember(alice, 'restricted');
    restrictBySystem();

    const reply = await handleDirectMessage(env.bot, alice, 2000);

    expect(textOf(reply).split('\n')[0]).toBe('❌ You do not meet the requirements yet.');
    expect(textOf(reply)).toContain('Please add a public profile photo, then message this bot again.');
    expect(env.gateway.unrestrictMember).not.toHaveBeenCalled();
  });

  describe('with a complete profile', () => {
    beforeEach(() => {
      env.gateway.addPhoto(42);
    });

    it('lifts a restriction the bot applied', async () => {
      env.gateway.addMember(alice, 'restricted');
      restrictBySystem();

      expect(await handleDirectMessage(env.bot, alice, 2000)).toBe(DM_UNRESTRICTION_SUCCESS);
      expect(env.gateway.statusOf(42)).toBe('member');
      expect(env.services.profile.status(key)).toEqual({ ok: true, value: undefined });
      expect(env.gateway.sent[0].text).toBe(
        '✅ Alice Smith completed their profile and was unrestricted via DM.',
      );
    });

    it('only clears the record when the platform already lifted it', async () => {
      env.gateway.addMember(alice, 'member');
      restrictBySystem();

      expect(await handleDirectMessage(env.bot, alice, 2000)).toBe(DM_ALREADY_UNRESTRICTED);
      expect(env.gateway.unrestrictMember).not.toHaveBeenCalled();
      expect(env.services.profile.status(key)).toEqual({ ok: true, value: undefined });
    });

    it('keeps the record when unrestricting fails', async () => {
      env.gateway.addMember(alice, 'restricted');
      restrictBySystem();
      env.gateway.unrestrictMember.mockRejectedValueOnce(new Error('not enough rights'));

      expect(await handleDirectMessage(env.bot, alice, 2000)).toBe(DM_UNRESTRICTION_FAILED);
      const status = env.services.profile.status(key);
      expect(status.ok && status.value?.restricted_by).toBe('system');
    });

    it('never lifts an administrator restriction', async () => {
      env.gateway.addMember(alice, 'restricted');
      env.services.profile.markAdministratorRestricted(key, 1000);

      expect(await handleDirectMessage(env.bot, alice, 2000)).toBe(DM_NO_RESTRICTION);
      expect(env.gateway.unrestrictMember).not.toHaveBeenCalled();
    });

    it('lifts the mute left by an expired challenge and starts probation', async () => {
      env.gateway.addMember(alice, 'restricted');
      env.services.captcha.create(key, 1000);
      await env.services.captcha.expire(key, 1120);

      expect(await handleDirectMessage(env.bot, alice, 1200)).toBe(DM_UNRESTRICTION_SUCCESS);
      expect(env.gateway.statusOf(42)).toBe('member');
      expect(env.services.probation.isOnProbation(key, 1201)).toEqual({ ok: true, value: true });
    });

    it('never lifts a probation restriction', async () => {
      env.gateway.addMember(alice, 'restricted');
      env.services.captcha.create(key, 1000);
      env.services.captcha.verify(key, 1010);
      env.services.probation.startProbation(key, 1010);
      for (const now of [1100, 1110, 1120]) {
        env.services.probation.recordViolation(key, now);
      }

      expect(await handleDirectMessage(env.bot, alice, 1200)).toBe(DM_NO_RESTRICTION);
      expect(env.gateway.unrestrictMember).not.toHaveBeenCalled();
    });

    it('keeps a member restricted while probation still holds them', async () => {
      env.gateway.addMember(alice, 'restricted');
      env.services.probation.startProbation(key, 1000);
      for (const now of [1100, 1110, 1120]) {
        env.services.probation.recordViolation(key, now);
      }
      for (const now of [1130, 1140, 1150]) {
        env.services.profile.recordViolation(key, now);
      }

      expect(await handleDirectMessage(env.bot, alice, 1200)).toBe(DM_OTHER_RESTRICTION);
      expect(env.gateway.unrestrictMember).not.toHaveBeenCalled();
      expect(env.gateway.statusOf(42)).toBe('restricted');
      expect(env.services.profile.status(key, 1200)).toEqual({ ok: true, value: undefined });
      const probation = env.services.probation.status(key, 1200);
      expect(probation.ok && probation.value?.restricted).toBe(true);
      expect(env.gateway.sent).toHaveLength(0);
    });

    it('reports nothing to lift for an unrestricted member', async () => {
      env.gateway.addMember(alice, 'member');

      expect(await handleDirectMessage(env.bot, alice, 2000)).toBe(DM_NO_RESTRICTION);
    });
  });
});

describe('handleDirectMessage across groups', () => {
  let env: TestServices;
  let alice: User;
  const first = { groupId: GROUP_ID, userId: 42 };
  const second = { groupId: OTHER_GROUP_ID, userId: 42 };

  beforeEach(() => {
    env = createTestServices({}, createTwoGroupConfig(OTHER_GROUP_ID));
    alice = createTestUser(42);
    env.gateway.addPhoto(42);
  });

  afterEach(() => {
    env.dispose();
  });

  it('lifts the bot restriction in every group that holds one', async () => {
    env.gateway.addMember(alice, 'restricted', GROUP_ID);
    env.gateway.addMember(alice, 'restricted', OTHER_GROUP_ID);
    const [one, two] = env.bot.groups;
    for (const now of [1000, 1010, 1020]) {
      one.profile.recordViolation(first, now);
      two.profile.recordViolation(second, now);
    }

    expect(await handleDirectMessage(env.bot, alice, 2000)).toBe(DM_UNRESTRICTION_SUCCESS);
    expect(env.gateway.statusOf(42, GROUP_ID)).toBe('member');
    expect(env.gateway.statusOf(42, OTHER_GROUP_ID)).toBe('member');
    expect(env.gateway.sent.map((m) => m.chatId)).toEqual([GROUP_ID, OTHER_GROUP_ID]);
  });

  it('serves a member of the second group only', async () => {
    env.gateway.addMember(alice, 'restricted', OTHER_GROUP_ID);
    const [, two] = env.bot.groups;
    for (const now of [1000, 1010, 1020]) {
      two.profile.recordViolation(second, now);
    }

    expect(await handleDirectMessage(env.bot, alice, 2000)).toBe(DM_UNRESTRICTION_SUCCESS);
    expect(env.gateway.unrestrictMember).toHaveBeenCalledWith(OTHER_GROUP_ID, 42);
  });

  it('points to a challenge pending in any group', async () => {
    env.gateway.addMember(alice, 'member', GROUP_ID);
    env.gateway.addMember(alice, 'restricted', OTHER_GROUP_ID);
    env.bot.groups[1].captcha.create(second, 1000);

    expect(await handleDirectMessage(env.bot, alice, 1010)).toBe(CAPTCHA_PENDING_DM);
  });
});
