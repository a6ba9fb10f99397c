import { describe, expect, it } from '@jest/globals';
import { ConfigError, loadConfig } from './env';

describe('loadConfig', () => {
  it('fills in defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      MONGODB_URI: 'mongodb://localhost:27017',
      DB_NAME: 'SurveyAPI',
      QUESTIONS_COL: 'questions',
      RESPONSES_COL: 'responses',
      PORT: 5000,
      MIGRATION_BATCH_SIZE: 100,
    });
  });

  it('coerces numeric settings and keeps overrides', () => {
    const config = loadConfig({ PORT: '8080', QUESTIONS_COL: 'question_sets', DB_NAME: 'SurveyTest' });

    expect(config.PORT).toBe(8080);
    expect(config.QUESTIONS_COL).toBe('question_sets');
    expect(config.DB_NAME).toBe('SurveyTest');
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('reports every invalid key at once', () => {
    let caught: unknown;
    try {
      loadConfig({ PORT: 'abc', MIGRATION_BATCH_SIZE: '0' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    if (caught instanceof ConfigError) {
      expect(caught.issues.map((issue) => issue.split(':')[0])).toEqual(['PORT', 'MIGRATION_BATCH_SIZE']);
      expect(caught.message).toMatch(/^Invalid configuration: PORT: /);
    }
  });
});
