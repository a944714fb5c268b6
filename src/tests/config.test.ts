import { describe, expect, test } from 'vitest';

import { loadConfig } from '../config';
import { ConfigurationError } from '../errors';

describe('loadConfig', () => {
  const scenarios = [
    {
      id: 'Defaults',
      env: {},
      expected: { logLevel: 'info', previewColor: true }
    },
    {
      id: 'NO_COLOR',
      env: { BRIDGE_LOG_LEVEL: 'debug', NO_COLOR: '1' },
      expected: { logLevel: 'debug', previewColor: false }
    },
    {
      id: 'Empty NO_COLOR',
      env: { NO_COLOR: '' },
      expected: { logLevel: 'info', previewColor: true }
    },
    {
      id: 'Explicit Colour Wins',
      env: { NO_COLOR: '1', BRIDGE_PREVIEW_COLOR: 'true' },
      expected: { logLevel: 'info', previewColor: true }
    },
    {
      id: 'Colour Off',
      env: { BRIDGE_PREVIEW_COLOR: '0', BRIDGE_LOG_LEVEL: 'silent' },
      expected: { logLevel: 'silent', previewColor: false }
    }
  ];

  test.for(scenarios)('[$id] reads the environment', ({ env, expected }) => {
    expect(loadConfig(env)).toStrictEqual(expected);
  });

  test('rejects unknown values, naming the variable', () => {
    let caught: unknown;
    try {
      loadConfig({ BRIDGE_LOG_LEVEL: 'loud', BRIDGE_PREVIEW_COLOR: 'yes' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    expect(caught).toMatchObject({
      code: 'CONFIGURATION',
      details: {
        issues: [
          { variable: 'BRIDGE_LOG_LEVEL' },
          { variable: 'BRIDGE_PREVIEW_COLOR' }
        ]
      }
    });
    expect(caught instanceof Error ? caught.message : '').toMatch(
      /^invalid bridge configuration: BRIDGE_LOG_LEVEL \(.+\), BRIDGE_PREVIEW_COLOR \(.+\)$/
    );
  });
});
