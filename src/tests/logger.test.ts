import { afterEach, describe, expect, test, vi } from 'vitest';
import winston from 'winston';

import type { TestScenario } from '../walker/tests/types';
import { resolveScenarioInput } from '../walker/tests/test-utils';
import type { LogLevel } from '../logger';
import { log, resetLogger, resolveLogLevel } from '../logger';

/**
 * Logger configuration.
 * Focus: level resolution from the environment, lazy creation.
 */
describe('Logger: level resolution, lazy creation.', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
    resetLogger();
  });

  describe('Level Resolution', () => {
    const scenarios: Array<TestScenario<string | undefined, LogLevel>> = [
      {
        id: 'Unset',
        description: 'Defaults to warn.',
        input: undefined,
        expected: 'warn'
      },
      {
        id: 'Known Level',
        description: 'Known levels are accepted.',
        input: 'debug',
        expected: 'debug'
      },
      {
        id: 'Case and Whitespace',
        description: 'Levels are trimmed and lower-cased.',
        input: ' ERROR ',
        expected: 'error'
      },
      {
        id: 'Unknown Level',
        description: 'Unknown levels fall back to warn.',
        input: 'verbose',
        expected: 'warn'
      }
    ];

    test.for(scenarios)('[$id] $description', ({ input, expected }) => {
      expect(resolveLogLevel(resolveScenarioInput(input))).toBe(expected);
    });

    test('reads the environment when called without an argument', () => {
      vi.stubEnv('OBJECT_WALKER_LOG_LEVEL', 'info');

      expect(resolveLogLevel()).toBe('info');
    });
  });

  describe('Lazy Creation', () => {
    test('creates the logger on first use and reuses it', () => {
      const create = vi.spyOn(winston, 'createLogger');

      log.error('first');
      log.error('second');

      expect(create).toHaveBeenCalledTimes(1);
      expect(create.mock.results[0]?.value).toHaveProperty('level', 'warn');
    });

    test('picks up the environment again after a reset', () => {
      vi.stubEnv('OBJECT_WALKER_LOG_LEVEL', 'debug');
      const create = vi.spyOn(winston, 'createLogger');

      log.debug('probe');

      expect(create.mock.results[0]?.value).toHaveProperty('level', 'debug');
    });
  });
});
