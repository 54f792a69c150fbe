import { jest } from '@jest/globals';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import * as yaml from 'js-yaml';
import { createProgram, toTopologyOptions } from '../../../src/cli/program.js';
import type { ContextOverrides } from '../../../src/cli/context.js';
import { ConfigurationError } from '../../../src/errors/index.js';
import { createTestContext, type TestContext } from '../../__support__/utilities/mock-logger.js';
import { readComposeFixture } from '../../__support__/fixtures/compose/index.js';

describe('createProgram', () => {
  let dir: string;
  let ctx: TestContext;
  let exitCodes: number[];
  let overrides: ContextOverrides[];

  const run = async (...args: string[]): Promise<void> => {
    const program = createProgram(
      '1.2.3',
      (code) => exitCodes.push(code),
      (received) => {
        overrides.push(received);
        return ctx;
      },
    );
    await program.parseAsync(['node', 'compose-topology', ...args]);
  };

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'compose-program-'));
    ctx = createTestContext(dir, { DATABASE_URL: 'mysql://db/app' });
    exitCodes = [];
    overrides = [];
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('runs validate with --strict', async () => {
    await writeFile(join(dir, 'docker-compose.yml'), readComposeFixture('db-backend.yml'));
    await writeFile(join(dir, 'docker.env'), 'MYSQL_ROOT_PASSWORD=test-secret\n');

    await run('validate', '--strict');

    expect(exitCodes).toEqual([1]);
    expect(ctx.stdout.text().split('\n')[0]).toBe('❌ docker-compose.yml is invalid (0 errors, 1 warning)');
  });

  it('passes --no-interpolate through', async () => {
    await writeFile(join(dir, 'compose.yaml'), 'services:\n  app:\n    image: "example/app:${TAG:?set a tag}"\n');

    await run('validate', '--no-interpolate');
    expect(exitCodes).toEqual([0]);

    await run('validate');
    expect(exitCodes).toEqual([0, 1]);
  });

  it('hands the global log level to the context factory', async () => {
    await run('--log-level', 'debug', 'config', '--format', 'json');

    expect(overrides).toEqual([{ logLevel: 'debug' }]);
    expect(exitCodes).toEqual([0]);
    expect(JSON.parse(ctx.stdout.text())).toMatchObject({ composeFile: '(auto-detect)' });
  });

  it('maps generate flags onto topology options', async () => {
    await run('generate', '--db-service', 'pg', '--db-image', 'postgres:16', '--db-port', '5433', '--db-container-port', '5432');

    expect(exitCodes).toEqual([0]);
    expect(yaml.load(ctx.stdout.text())).toMatchObject({
      services: {
        pg: { image: 'postgres:16', ports: ['5433:5432'] },
        'ave-backend': { depends_on: { pg: { condition: 'service_healthy' } } },
      },
    });
  });

  it('reports errors raised while building the context', async () => {
    const write = jest.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const program = createProgram(
      '1.2.3',
      (code) => exitCodes.push(code),
      () => {
        throw new ConfigurationError('Configuration validation failed: server.logLevel: Invalid enum value', 'server.logLevel');
      },
    );

    try {
      await program.parseAsync(['node', 'compose-topology', 'config']);
      expect(write).toHaveBeenCalledWith('❌ Configuration validation failed: server.logLevel: Invalid enum value\n');
    } finally {
      write.mockRestore();
    }

    expect(exitCodes).toEqual([1]);
  });
});

describe('toTopologyOptions', () => {
  it('keeps only the flags that were given', () => {
    expect(toTopologyOptions({ dbPort: 5433, network: 'backplane', healthTimeout: '5s' })).toEqual({
      databaseHostPort: 5433,
      network: 'backplane',
      healthcheckTimeout: '5s',
    });
    expect(toTopologyOptions({})).toEqual({});
  });
});
