import { describe, expect, it } from 'vitest';
import { ConfigError, parseConfig } from '../src/config.js';

const requiredEnv = {
  TOGGL_API_TOKEN: 'test-token',
  OPENPROJECT_API_KEY: 'test-key',
  OPENPROJECT_HOST: 'op.example.test',
};

describe('parseConfig', () => {
  it('fills defaults', () => {
    expect(parseConfig(requiredEnv)).toEqual({
      ...requiredEnv,
      TOGGL_WORKSPACE_ID: undefined,
      TOGGL_BASE_URL: 'https://api.track.toggl.com',
      OPENPROJECT_HTTP_SCHEMA: 'https',
      OPENPROJECT_DEFAULT_ACTIVITY_ID: undefined,
      IMPORT_CONCURRENCY: 4,
      IMPORT_MAX_RETRIES: 3,
      IMPORT_DURATION_SOURCE: 'reported',
      IMPORT_MIN_DURATION_SECONDS: 60,
      IMPORT_USER_ALIASES: {},
      IMPORT_PROJECT_ALIASES: {},
    });
  });

  it('coerces numbers and parses alias maps', () => {
    const config = parseConfig({
      ...requiredEnv,
      TOGGL_WORKSPACE_ID: '77',
      IMPORT_CONCURRENCY: '8',
      IMPORT_DURATION_SOURCE: 'timestamps',
      IMPORT_USER_ALIASES: '{"Jane Doe":"jdoe"}',
    });

    expect(config.TOGGL_WORKSPACE_ID).toBe(77);
    expect(config.IMPORT_CONCURRENCY).toBe(8);
    expect(config.IMPORT_DURATION_SOURCE).toBe('timestamps');
    expect(config.IMPORT_USER_ALIASES).toEqual({ 'Jane Doe': 'jdoe' });
  });

  it('treats a blank workspace id as unset', () => {
    expect(parseConfig({ ...requiredEnv, TOGGL_WORKSPACE_ID: '  ' }).TOGGL_WORKSPACE_ID).toBeUndefined();
  });

  it('lists every problem', () => {
    let caught: unknown;
    try {
      parseConfig({ OPENPROJECT_HOST: 'op.example.test', IMPORT_USER_ALIASES: 'not json', IMPORT_CONCURRENCY: '0' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    const issues = caught instanceof ConfigError ? caught.issues.map((issue) => issue.split(' ')[0]) : [];
    expect(issues.sort()).toEqual(['IMPORT_CONCURRENCY', 'IMPORT_USER_ALIASES', 'OPENPROJECT_API_KEY', 'TOGGL_API_TOKEN']);
  });
});
