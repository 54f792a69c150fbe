import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import * as yaml from 'js-yaml';
import { runConfig } from '../../../src/cli/commands/config.js';
import { runFormat } from '../../../src/cli/commands/format.js';
import { runGenerate } from '../../../src/cli/commands/generate.js';
import { runInspect } from '../../../src/cli/commands/inspect.js';
import { runValidate } from '../../../src/cli/commands/validate.js';
import { createTestContext } from '../../__support__/utilities/mock-logger.js';
import { readComposeFixture } from '../../__support__/fixtures/compose/index.js';

const UNPINNED_LINE =
  '  ⚠️  [image-unpinned] services.db.image: Image "mysql:latest" of "db" is not pinned to a version\n';

describe('CLI commands', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'compose-cli-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function writeReference(): Promise<void> {
    await writeFile(join(dir, 'docker-compose.yml'), readComposeFixture('db-backend.yml'));
    await writeFile(join(dir, 'docker.env'), 'MYSQL_ROOT_PASSWORD=test-secret\n');
  }

  describe('validate', () => {
    it('passes the reference topology with a warning', async () => {
      await writeReference();
      const ctx = createTestContext(dir, { DATABASE_URL: 'mysql://db/app' });

      expect(await runValidate(undefined, {}, ctx)).toBe(0);
      expect(ctx.stdout.text()).toBe(`✅ docker-compose.yml is valid (0 errors, 1 warning)\n${UNPINNED_LINE}`);
      expect(ctx.stderr.text()).toBe('');
    });

    it('fails in strict mode', async () => {
      await writeReference();
      const ctx = createTestContext(dir, { DATABASE_URL: 'mysql://db/app' });

      expect(await runValidate(undefined, { strict: true }, ctx)).toBe(1);
      expect(ctx.stdout.text()).toBe(`❌ docker-compose.yml is invalid (0 errors, 1 warning)\n${UNPINNED_LINE}`);
    });

    it('takes strict mode from COMPOSE_STRICT', async () => {
      await writeReference();
      const ctx = createTestContext(dir, { DATABASE_URL: 'mysql://db/app', COMPOSE_STRICT: 'true' });

      expect(await runValidate(undefined, {}, ctx)).toBe(1);
    });

    it('reports unset variables', async () => {
      await writeReference();
      const ctx = createTestContext(dir, {});

      expect(await runValidate(undefined, {}, ctx)).toBe(0);
      expect(ctx.stdout.text()).toContain(
        '  ⚠️  [variable-unset] DATABASE_URL: Variable DATABASE_URL is not set; substituting an empty string\n',
      );
    });

    it('writes JSON reports', async () => {
      await writeFile(join(dir, 'stack.yml'), readComposeFixture('port-collision.yml'));
      const ctx = createTestContext(dir, { COMPOSE_OUTPUT_FORMAT: 'json' });

      expect(await runValidate('stack.yml', {}, ctx)).toBe(1);
      expect(JSON.parse(ctx.stdout.text())).toEqual({
        file: 'stack.yml',
        valid: false,
        errors: [
          {
            rule: 'port-collision',
            severity: 'error',
            message: 'Host port 8080/tcp of "admin" is already published by "web" (8080:80)',
            path: 'services.admin.ports[1]',
            service: 'admin',
          },
        ],
        warnings: [],
      });
    });

    it('resolves --env-file against the working directory', async () => {
      await mkdir(join(dir, 'stack'));
      await writeFile(join(dir, 'stack', 'compose.yaml'), 'services:\n  app:\n    image: example/app:${TAG}\n');
      await writeFile(join(dir, 'stack', 'release.env'), 'TAG=2.4.1\n');
      const ctx = createTestContext(dir);

      expect(await runValidate(join('stack', 'compose.yaml'), { envFile: join('stack', 'release.env') }, ctx)).toBe(0);
      expect(ctx.stdout.text()).toBe(`✅ ${join('stack', 'compose.yaml')} is valid (0 errors, 0 warnings)\n`);
      expect(ctx.stderr.text()).toBe('');

      const inspectCtx = createTestContext(dir);
      expect(
        await runInspect(join('stack', 'compose.yaml'), { envFile: join('stack', 'release.env'), format: 'json' }, inspectCtx),
      ).toBe(0);
      expect(JSON.parse(inspectCtx.stdout.text())).toMatchObject({ services: [{ name: 'app', source: 'image example/app:2.4.1' }] });
    });

    it('uses COMPOSE_FILE when no argument is given', async () => {
      await writeFile(join(dir, 'other.yml'), readComposeFixture('missing-healthcheck.yml'));
      const ctx = createTestContext(dir, { COMPOSE_FILE: 'other.yml' });

      expect(await runValidate(undefined, {}, ctx)).toBe(1);
      expect(ctx.stdout.text().split('\n')[0]).toBe('❌ other.yml is invalid (1 error, 0 warnings)');
    });

    it('fails when no compose file exists', async () => {
      const ctx = createTestContext(dir);

      expect(await runValidate(undefined, {}, ctx)).toBe(1);
      expect(ctx.stderr.text()).toBe(
        `❌ No compose file found in ${dir} (looked for compose.yaml, compose.yml, docker-compose.yaml, docker-compose.yml)\n`,
      );
      expect(ctx.stdout.text()).toBe('');
    });
  });

  describe('inspect', () => {
    it('prints the startup order as JSON', async () => {
      await writeReference();
      const ctx = createTestContext(dir, { DATABASE_URL: 'mysql://db/app' });

      expect(await runInspect(undefined, { format: 'json' }, ctx)).toBe(0);
      const description: unknown = JSON.parse(ctx.stdout.text());
      expect(description).toMatchObject({
        volumes: ['mysql_data'],
        networks: ['mynetwork'],
        variables: ['DATABASE_URL'],
        startupTiers: [['db'], ['backend']],
      });
    });

    it('prints text by default', async () => {
      await writeReference();
      const ctx = createTestContext(dir, { DATABASE_URL: 'mysql://db/app' });

      expect(await runInspect(undefined, {}, ctx)).toBe(0);
      expect(ctx.stdout.text().split('\n').slice(-4)).toEqual(['Startup order:', '  1. db', '  2. backend', '']);
    });
  });

  describe('format', () => {
    it('confirms the reference file round-trips', async () => {
      await writeReference();
      const ctx = createTestContext(dir);

      expect(await runFormat(undefined, { check: true }, ctx)).toBe(0);
      expect(ctx.stdout.text()).toBe('✅ docker-compose.yml round-trips without changes\n');
    });

    it('prints canonical YAML', async () => {
      await writeReference();
      const ctx = createTestContext(dir);

      expect(await runFormat(undefined, {}, ctx)).toBe(0);
      expect(yaml.load(ctx.stdout.text())).toEqual(yaml.load(readComposeFixture('db-backend.yml')));
    });

    it('rewrites the file in place', async () => {
      await writeReference();
      const ctx = createTestContext(dir);

      expect(await runFormat(undefined, { write: true }, ctx)).toBe(0);
      expect(ctx.stdout.text()).toBe('✅ Wrote docker-compose.yml\n');

      const rewritten = await readFile(join(dir, 'docker-compose.yml'), 'utf-8');
      expect(rewritten.includes('#')).toBe(false);
      expect(yaml.load(rewritten)).toEqual(yaml.load(readComposeFixture('db-backend.yml')));
    });

    it('fails on documents that do not parse', async () => {
      await writeFile(join(dir, 'compose.yaml'), 'name: demo\n');
      const ctx = createTestContext(dir);

      expect(await runFormat(undefined, { check: true }, ctx)).toBe(1);
      expect(ctx.stderr.text()).toBe('❌ compose.yaml: Invalid compose document: services: Required\n');
    });
  });

  describe('generate', () => {
    it('prints the reference topology', async () => {
      const ctx = createTestContext(dir);

      expect(await runGenerate({}, ctx)).toBe(0);
      expect(yaml.load(ctx.stdout.text())).toEqual(yaml.load(readComposeFixture('reference.yml')));
      expect(ctx.logger.warn).toHaveBeenCalledWith(
        { rule: 'image-unpinned', path: 'services.db.image' },
        'Image "mysql:latest" of "db" is not pinned to a version',
      );
    });

    it('writes to a file', async () => {
      const ctx = createTestContext(dir);

      expect(await runGenerate({ output: 'generated.yml', databaseImage: 'mysql:8.4' }, ctx)).toBe(0);
      expect(ctx.stdout.text()).toBe('✅ Wrote generated.yml\n');

      const written = yaml.load(await readFile(join(dir, 'generated.yml'), 'utf-8'));
      expect(written).toMatchObject({ services: { db: { image: 'mysql:8.4' } } });
    });

    it('rejects conflicting options', async () => {
      const ctx = createTestContext(dir);

      expect(await runGenerate({ backendHostPort: 3305 }, ctx)).toBe(1);
      expect(ctx.stderr.text()).toBe(
        '❌ Invalid topology options: backendHostPort: Database and backend cannot publish the same host port\n',
      );
    });
  });

  describe('config', () => {
    it('prints a summary', () => {
      const ctx = createTestContext(dir, { COMPOSE_FILE: 'stack.yml' });

      expect(runConfig({}, ctx)).toBe(0);
      expect(ctx.stdout.text()).toBe(
        [
          '📋 Configuration Summary:',
          '  • environment: production',
          '  • logLevel: info',
          '  • composeFile: stack.yml',
          '  • strict: false',
          '  • interpolate: true',
          '  • outputFormat: text',
          '',
        ].join('\n'),
      );
    });

    it('prints JSON', () => {
      const ctx = createTestContext(dir, { COMPOSE_STRICT: '1' });

      runConfig({ format: 'json' }, ctx);
      expect(JSON.parse(ctx.stdout.text())).toEqual({
        environment: 'production',
        logLevel: 'info',
        composeFile: '(auto-detect)',
        strict: 'true',
        interpolate: 'true',
        outputFormat: 'text',
      });
    });
  });
});
