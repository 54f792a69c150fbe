/**
 * Configuration Tests
 *
 * Tests loading the application configuration from environment variables
 */

import { createAppConfig, getConfigurationSummary } from '../../../src/config/app-config.js';
import { REFERENCE_TOPOLOGY } from '../../../src/config/defaults.js';
import { ConfigurationError } from '../../../src/errors/index.js';

describe('createAppConfig', () => {
  it('uses defaults for an empty environment', () => {
    expect(createAppConfig({})).toEqual({
      server: { nodeEnv: 'production', logLevel: 'info' },
      compose: { strict: false, interpolate: true },
      output: { format: 'text' },
    });
  });

  it('applies environment variable overrides', () => {
    const config = createAppConfig({
      NODE_ENV: 'development',
      LOG_LEVEL: 'debug',
      COMPOSE_FILE: 'stack.yml',
      COMPOSE_STRICT: '1',
      COMPOSE_INTERPOLATE: 'false',
      COMPOSE_OUTPUT_FORMAT: 'json',
    });

    expect(config).toEqual({
      server: { nodeEnv: 'development', logLevel: 'debug' },
      compose: { file: 'stack.yml', strict: true, interpolate: false },
      output: { format: 'json' },
    });
  });

  it('treats blank values as unset', () => {
    const config = createAppConfig({ LOG_LEVEL: '  ', COMPOSE_FILE: '' });
    expect(config.server.logLevel).toBe('info');
    expect(config.compose.file).toBeUndefined();
  });

  it('reads process.env by default', () => {
    const originalEnv = { ...process.env };
    try {
      process.env.COMPOSE_OUTPUT_FORMAT = 'json';
      expect(createAppConfig().output.format).toBe('json');
    } finally {
      process.env = originalEnv;
    }
  });

  it('rejects invalid values with the offending key', () => {
    expect(() => createAppConfig({ COMPOSE_STRICT: 'yes' })).toThrow(ConfigurationError);

    try {
      createAppConfig({ LOG_LEVEL: 'loud' });
      throw new Error('expected a configuration error');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error instanceof ConfigurationError && error.configKey).toBe('server.logLevel');
      expect(error instanceof ConfigurationError && error.code).toBe('CONFIG_ERROR');
      expect(error instanceof Error && error.message.startsWith('Configuration validation failed: server.logLevel: ')).toBe(
        true,
      );
    }
  });
});

describe('getConfigurationSummary', () => {
  it('prints every setting as text', () => {
    expect(getConfigurationSummary(createAppConfig({ COMPOSE_INTERPOLATE: '0' }))).toEqual({
      environment: 'production',
      logLevel: 'info',
      composeFile: '(auto-detect)',
      strict: 'false',
      interpolate: 'false',
      outputFormat: 'text',
    });
  });
});

describe('REFERENCE_TOPOLOGY', () => {
  it('publishes the database and backend on different host ports', () => {
    expect(REFERENCE_TOPOLOGY.database.hostPort).not.toBe(REFERENCE_TOPOLOGY.backend.hostPort);
  });
});
