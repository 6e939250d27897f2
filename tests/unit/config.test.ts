/**
 * Unit tests for configuration loading and validation
 */

import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { GroupRegistry, loadConfig, loadEnvFile, validateConfig } from '../../src/config';
import { ConfigError } from '../../src/utils/errors';
import { createTestConfig, createTestGroupConfig } from '../helpers';

const NO_GROUPS_FILE = { GROUPS_CONFIG_PATH: 'groups.missing-in-tests.json' };

describe('Configuration', () => {
  describe('loadConfig', () => {
    it('applies defaults for every optional setting', () => {
      const config = loadConfig(NO_GROUPS_FILE);
      const [group] = config.groups;

      expect(config.botToken).toBe('');
      expect(config.groups).toHaveLength(1);
      expect(group.groupId).toBe(0);
      expect(group.warningTopicId).toBeUndefined();
      expect(config.databasePath).toBe('./data/bot.db');
      expect(config.logLevel).toBe('info');
      expect(group.profile).toEqual({
        restrictFailedUsers: false,
        warningThreshold: 3,
        escalateAfterSeconds: 10800,
      });
      expect(group.captcha).toEqual({ enabled: false, timeoutSeconds: 120 });
      expect(group.probation).toEqual({
        windowSeconds: 259200,
        violationThreshold: 3,
      });
      expect(config.sweep).toEqual({
        intervalSeconds: 300,
        startupDelaySeconds: 300,
      });
    });

    it('parses numbers, booleans and unit conversions', () => {
      const [group] = loadConfig({
        ...NO_GROUPS_FILE,
        GROUP_ID: '-1001234',
        WARNING_TOPIC_ID: '42',
        RESTRICT_FAILED_USERS: 'yes',
        CAPTCHA_ENABLED: 'TRUE',
        WARNING_TIME_THRESHOLD_MINUTES: '30',
        NEW_USER_PROBATION_HOURS: '2',
      }).groups;

      expect(group.groupId).toBe(-1001234);
      expect(group.warningTopicId).toBe(42);
      expect(group.profile.restrictFailedUsers).toBe(true);
      expect(group.captcha.enabled).toBe(true);
      expect(group.profile.escalateAfterSeconds).toBe(1800);
      expect(group.probation.windowSeconds).toBe(7200);
    });

    it('treats unrecognised boolean text as false', () => {
      const config = loadConfig({ ...NO_GROUPS_FILE, CAPTCHA_ENABLED: 'maybe' });
      expect(config.groups[0].captcha.enabled).toBe(false);
    });

    it('returns a frozen object', () => {
      const config = loadConfig(NO_GROUPS_FILE);
      expect(Object.isFrozen(config)).toBe(true);
      expect(Object.isFrozen(config.groups[0].profile)).toBe(true);
    });
  });

  describe('validateConfig', () => {
    it('accepts a complete configuration', () => {
      expect(() => validateConfig(createTestConfig())).not.toThrow();
    });

    it('requires a bot token', () => {
      expect(() => validateConfig(createTestConfig({ BOT_TOKEN: '' }))).toThrow(
        'BOT_TOKEN is required in environment variables',
      );
    });

    it('requires a negative group id', () => {
      expect(() => validateConfig(createTestConfig({ GROUP_ID: '123' }))).toThrow(
        ConfigError,
      );
      expect(() => validateConfig(createTestConfig({ GROUP_ID: 'abc' }))).toThrow(
        ConfigError,
      );
    });

    it('bounds the captcha timeout', () => {
      expect(() =>
        validateConfig(createTestConfig({ CAPTCHA_TIMEOUT_SECONDS: '5' })),
      ).toThrow('CAPTCHA_TIMEOUT_SECONDS must be between 10 and 600 seconds');
      expect(() =>
        validateConfig(createTestConfig({ CAPTCHA_TIMEOUT_SECONDS: '601' })),
      ).toThrow(ConfigError);
      expect(() =>
        validateConfig(createTestConfig({ CAPTCHA_TIMEOUT_SECONDS: '600' })),
      ).not.toThrow();
    });

    it('rejects non-positive thresholds', () => {
      expect(() =>
        validateConfig(createTestConfig({ WARNING_THRESHOLD: '0' })),
      ).toThrow('WARNING_THRESHOLD must be greater than 0');
      expect(() =>
        validateConfig(createTestConfig({ NEW_USER_VIOLATION_THRESHOLD: '-1' })),
      ).toThrow('NEW_USER_VIOLATION_THRESHOLD must be greater than 0');
    });

    it('rejects a non-integer warning topic', () => {
      expect(() =>
        validateConfig(createTestConfig({ WARNING_TOPIC_ID: '1.5' })),
      ).toThrow('WARNING_TOPIC_ID must be an integer');
    });
  });

  describe('groups file', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'groupkeeper-groups-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    const writeGroups = (content: string): string => {
      const file = join(dir, 'groups.json');
      writeFileSync(file, content);
      return file;
    };

    it('replaces the environment group with every listed group', () => {
      const file = writeGroups(
        JSON.stringify([
          {
            group_id: -1001,
            warning_topic_id: 5,
            restrict_failed_users: true,
            warning_threshold: 2,
            warning_time_threshold_minutes: 30,
            captcha_enabled: true,
            captcha_timeout_seconds: 60,
            new_user_probation_hours: 24,
            new_user_violation_threshold: 4,
            rules_link: 'https://example.com/one',
          },
          { group_id: -1002 },
        ]),
      );

      const config = loadConfig({ GROUPS_CONFIG_PATH: file, GROUP_ID: '-999' });

      expect(config.groupsConfigPath).toBe(file);
      expect(config.groups).toEqual([
        {
          groupId: -1001,
          warningTopicId: 5,
          rulesLink: 'https://example.com/one',
          profile: { restrictFailedUsers: true, warningThreshold: 2, escalateAfterSeconds: 1800 },
          captcha: { enabled: true, timeoutSeconds: 60 },
          probation: { windowSeconds: 86400, violationThreshold: 4 },
        },
        {
          groupId: -1002,
          warningTopicId: undefined,
          rulesLink: '',
          profile: { restrictFailedUsers: false, warningThreshold: 3, escalateAfterSeconds: 10800 },
          captcha: { enabled: false, timeoutSeconds: 120 },
          probation: { windowSeconds: 259200, violationThreshold: 3 },
        },
      ]);
    });

    it('rejects a file that is not valid JSON', () => {
      const file = writeGroups('[{ group_id: ');

      expect(() => loadConfig({ GROUPS_CONFIG_PATH: file })).toThrow(
        'groups.json could not be read',
      );
    });

    it('rejects anything but a non-empty array', () => {
      expect(() => loadConfig({ GROUPS_CONFIG_PATH: writeGroups('{}') })).toThrow(
        'groups.json must contain a JSON array of group objects',
      );
      expect(() => loadConfig({ GROUPS_CONFIG_PATH: writeGroups('[]') })).toThrow(
        'groups.json must contain at least one group',
      );
    });

    it('rejects entries with missing or mistyped fields', () => {
      expect(() =>
        loadConfig({ GROUPS_CONFIG_PATH: writeGroups('[{ "rules_link": "x" }]') }),
      ).toThrow('groups.json: group_id is required');
      expect(() =>
        loadConfig({
          GROUPS_CONFIG_PATH: writeGroups('[{ "group_id": -1, "captcha_enabled": "yes" }]'),
        }),
      ).toThrow('groups.json: captcha_enabled must be true or false');
      expect(() =>
        loadConfig({ GROUPS_CONFIG_PATH: writeGroups('[{ "group_id": "-1" }]') }),
      ).toThrow('groups.json: group_id must be a number');
    });

    it('fails validation when two entries share a group id', () => {
      const file = writeGroups('[{ "group_id": -1001 }, { "group_id": -1001 }]');
      const config = { ...loadConfig({ GROUPS_CONFIG_PATH: file }), botToken: 'test-token' };

      expect(() => validateConfig(config)).toThrow('Duplicate group_id: -1001');
    });

    it('names the failing group in validation errors', () => {
      const file = writeGroups('[{ "group_id": -1001 }, { "group_id": -1002, "warning_threshold": 0 }]');
      const config = { ...loadConfig({ GROUPS_CONFIG_PATH: file }), botToken: 'test-token' };

      expect(() => validateConfig(config)).toThrow(
        'WARNING_THRESHOLD must be greater than 0 (group -1002)',
      );
    });
  });

  describe('GroupRegistry', () => {
    it('looks groups up by id', () => {
      const first = createTestGroupConfig();
      const second = { ...first, groupId: -100456 };
      const registry = new GroupRegistry([first, second]);

      expect(registry.get(-100456)).toBe(second);
      expect(registry.get(-1)).toBeUndefined();
      expect(registry.isMonitored(first.groupId)).toBe(true);
      expect(registry.isMonitored(-1)).toBe(false);
      expect(registry.all()).toEqual([first, second]);
    });

    it('refuses a second registration of the same id', () => {
      const registry = new GroupRegistry([createTestGroupConfig()]);

      expect(() => registry.register(createTestGroupConfig())).toThrow(ConfigError);
    });
  });

  describe('loadEnvFile', () => {
    it('loads values from the given file without overriding the environment', () => {
      const dir = mkdtempSync(join(tmpdir(), 'groupkeeper-env-'));
      const file = join(dir, '.env');
      writeFileSync(file, 'GK_TEST_FROM_FILE=file-value\nGK_TEST_PRESET=file-value\n');
      process.env.GK_TEST_PRESET = 'preset-value';

      try {
        loadEnvFile(file);
        expect(process.env.GK_TEST_FROM_FILE).toBe('file-value');
        expect(process.env.GK_TEST_PRESET).toBe('preset-value');
      } finally {
        delete process.env.GK_TEST_FROM_FILE;
        delete process.env.GK_TEST_PRESET;
        rmSync(dir, { recursive: true, force: true });
      }
    });
  });
});
