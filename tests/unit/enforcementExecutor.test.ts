/**
 * Unit tests for turning decisions into platform actions
 */

import { EnforcementExecutor } from '../../src/services/enforcementExecutor';
import type { CaptchaRecord, ViolationDecision, ViolationRecord } from '../../src/types';
import { createTestGroupConfig, createTestUser, FakeGateway, GROUP_ID } from '../helpers';

const member = { id: 42, fullName: 'Alice Smith' };

const record = (overrides: Partial<ViolationRecord> = {}): ViolationRecord => ({
  group_id: GROUP_ID,
  user_id: 42,
  kind: 'profile',
  count: 1,
  first_seen_at: 1000,
  last_seen_at: 1000,
  restricted: false,
  restricted_by: 'none',
  probation_until: null,
  ...overrides,
});

const decision = (
  action: ViolationDecision['action'],
  count: number,
  overrides: Partial<ViolationRecord> = {},
): ViolationDecision => ({ action, count, record: record({ count, ...overrides }) });

const captchaRecord = (overrides: Partial<CaptchaRecord> = {}): CaptchaRecord => ({
  id: 1,
  group_id: GROUP_ID,
  user_id: 42,
  status: 'expired',
  joined_at: 1000,
  deadline: 1120,
  attempts: 0,
  resolved_at: 1120,
  chat_id: null,
  message_id: null,
  user_full_name: 'Alice Smith',
  ...overrides,
});

describe('EnforcementExecutor', () => {
  let gateway: FakeGateway;
  let executor: EnforcementExecutor;

  beforeEach(() => {
    gateway = new FakeGateway();
    executor = new EnforcementExecutor(gateway, createTestGroupConfig({ WARNING_TOPIC_ID: '7' }));
  });

  describe('applyProfileDecision', () => {
    it('warns into the warning topic with the enforcement limits', async () => {
      await executor.applyProfileDecision(member, decision('warn', 1), ['username']);

      expect(gateway.sent).toHaveLength(1);
      expect(gateway.sent[0].chatId).toBe(GROUP_ID);
      expect(gateway.sent[0].options).toEqual({ threadId: 7 });
      expect(gateway.sent[0].text.split('\n')).toEqual([
        '⚠️ Hi Alice Smith, please add a username to follow the group rules.',
        'You will be restricted after 3 messages or 1 hour.',
        '',
        '📖 Read the group rules',
      ]);
    });

    it('leaves the limits out when enforcement is off', async () => {
      executor = new EnforcementExecutor(
        gateway,
        createTestGroupConfig({ RESTRICT_FAILED_USERS: 'false' }),
      );

      await executor.applyProfileDecision(member, decision('warn', 4), ['username']);

      expect(gateway.sent[0].text).toBe(
        '⚠️ Hi Alice Smith, please add a username to follow the group rules.\n\n📖 Read the group rules',
      );
      expect(gateway.restrictMember).not.toHaveBeenCalled();
    });

    it('restricts and posts the notice at the threshold', async () => {
      await executor.applyProfileDecision(member, decision('restrict', 3), [
        'public profile photo',
        'username',
      ]);

      expect(gateway.restrictMember).toHaveBeenCalledWith(GROUP_ID, 42);
      expect(gateway.sent[0].text.split('\n').slice(0, 2)).toEqual([
        '🚫 Alice Smith has been restricted after 3 messages.',
        'Please add a public profile photo and username to follow the group rules.',
      ]);
      const notice = gateway.sendMessage.mock.calls[0][1];
      expect(
        typeof notice !== 'string' &&
          notice.entities?.some((e) => 'url' in e && e.url === 'https://t.me/groupkeeper_test_bot'),
      ).toBe(true);
    });

    it('sends nothing for silent and no_op decisions', async () => {
      await executor.applyProfileDecision(member, decision('silent', 2), ['username']);
      await executor.applyProfileDecision(member, decision('no_op', 5), ['username']);

      expect(gateway.sendMessage).not.toHaveBeenCalled();
      expect(gateway.restrictMember).not.toHaveBeenCalled();
    });

    it('still posts the notice when the restriction call fails', async () => {
      gateway.restrictMember.mockRejectedValueOnce(new Error('not enough rights'));

      await executor.applyProfileDecision(member, decision('restrict', 3), ['username']);

      expect(gateway.sendMessage).toHaveBeenCalledTimes(1);
    });
  });

  describe('applyProbationDecision', () => {
    it('warns with the window length', async () => {
      await executor.applyProbationDecision(member, decision('warn', 1, { kind: 'probation' }));

      expect(gateway.sent[0].text.split('\n').slice(0, 2)).toEqual([
        '⚠️ Alice Smith joined recently and is on probation.',
        'For 1 hour you may not forward messages or post links.',
      ]);
    });

    it('restricts at the threshold', async () => {
      await executor.applyProbationDecision(
        member,
        decision('restrict', 3, { kind: 'probation' }),
      );

      expect(gateway.restrictMember).toHaveBeenCalledWith(GROUP_ID, 42);
      expect(gateway.sent[0].text.split('\n')[0]).toBe(
        '🚫 Alice Smith has been restricted for posting forbidden content (forward/link/external quote) 3 times during probation.',
      );
    });
  });

  describe('applyEscalation', () => {
    it('restricts using the member name from the platform', async () => {
      gateway.addMember(createTestUser(42, { first_name: 'Alicia', last_name: undefined }));

      await executor.applyEscalation(decision('restrict', 1, { restricted: true }));

      expect(gateway.restrictMember).toHaveBeenCalledWith(GROUP_ID, 42);
      expect(gateway.sent[0].text.split('\n')[0]).toBe(
        '🚫 Alicia has been restricted for not completing their profile within 1 hour.',
      );
    });

    it('falls back to the user id when the member is unknown', async () => {
      await executor.applyEscalation(decision('restrict', 1));

      expect(gateway.sent[0].text.split('\n')[0]).toBe(
        '🚫 User 42 has been restricted for not completing their profile within 1 hour.',
      );
    });

    it('ignores anything but restrict', async () => {
      await executor.applyEscalation(decision('no_op', 1));

      expect(gateway.restrictMember).not.toHaveBeenCalled();
      expect(gateway.sendMessage).not.toHaveBeenCalled();
    });
  });

  describe('onCaptchaExpired', () => {
    it('edits the challenge message', async () => {
      await executor.onCaptchaExpired(captchaRecord({ chat_id: GROUP_ID, message_id: 100 }));

      expect(gateway.editMessage).toHaveBeenCalledTimes(1);
      expect(gateway.editMessage.mock.calls[0].slice(0, 2)).toEqual([GROUP_ID, 100]);
      expect(gateway.sendMessage).not.toHaveBeenCalled();
    });

    it('posts a notice when there is no message to edit', async () => {
      await executor.onCaptchaExpired(captchaRecord());

      expect(gateway.sent[0].text.split('\n')[0]).toBe(
        '🚫 Alice Smith did not complete verification in time.',
      );
    });

    it('posts a notice when the edit fails', async () => {
      gateway.editMessage.mockRejectedValueOnce(new Error('message to edit not found'));

      await executor.onCaptchaExpired(captchaRecord({ chat_id: GROUP_ID, message_id: 100 }));

      expect(gateway.sendMessage).toHaveBeenCalledTimes(1);
    });
  });

  it('absorbs a failed notice', async () => {
    gateway.sendMessage.mockRejectedValueOnce(new Error('network down'));

    await expect(
      executor.notify('hello', { userId: 42, action: 'test' }),
    ).resolves.toBeUndefined();
  });

  it('falls back to the bare link when the bot name is unavailable', async () => {
    gateway.getBotUsername.mockRejectedValueOnce(new Error('network down'));

    expect(await executor.dmLink()).toBe('https://t.me');
  });
});
