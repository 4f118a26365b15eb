/**
 * Unit tests for Configuration Resolver
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { DEFAULTS, loadDeclaration, resolveSettings } from '../../../src/config/resolver.js';
import { ConfigLoadError } from '../../../src/config/loader.js';
import { ConfigError, ValidationError } from '../../../src/core/errors.js';
import { STATE_DIR_NAME } from '../../../src/lib/paths.js';

const FIXTURES_DIR = fileURLToPath(new URL('../../fixtures/', import.meta.url));

describe('resolveSettings', () => {
  const configPath = join(FIXTURES_DIR, 'network.yaml');

  it('should apply defaults', () => {
    const settings = resolveSettings(undefined, configPath, 'demo-test', {});

    assert.deepStrictEqual(settings, {
      concurrency: DEFAULTS.concurrency,
      maxAttempts: DEFAULTS.maxAttempts,
      backoffMs: DEFAULTS.backoffMs,
      maxBackoffMs: DEFAULTS.maxBackoffMs,
      operationTimeoutMs: DEFAULTS.operationTimeoutMs,
      pollIntervalMs: DEFAULTS.pollIntervalMs,
      subscriptionId: null,
      stateDir: join(FIXTURES_DIR, STATE_DIR_NAME, 'demo-test'),
    });
  });

  it('should read the subscription from the environment', () => {
    const settings = resolveSettings(undefined, configPath, 'demo-test', {
      AZURE_SUBSCRIPTION_ID: '11111111-1111-1111-1111-111111111111',
    });

    assert.strictEqual(settings.subscriptionId, '11111111-1111-1111-1111-111111111111');
  });

  it('should prefer the declared subscription', () => {
    const settings = resolveSettings(
      { subscription_id: '22222222-2222-2222-2222-222222222222' },
      configPath,
      'demo-test',
      { AZURE_SUBSCRIPTION_ID: '11111111-1111-1111-1111-111111111111' }
    );

    assert.strictEqual(settings.subscriptionId, '22222222-2222-2222-2222-222222222222');
  });

  it('should keep the backoff ceiling at or above the first delay', () => {
    const settings = resolveSettings({ backoff_ms: 2000, max_backoff_ms: 100 }, configPath, 'demo-test', {});

    assert.strictEqual(settings.maxBackoffMs, 2000);
  });
});

describe('loadDeclaration', () => {
  it('should resolve workspace, variables and settings', async () => {
    const config = await loadDeclaration(join(FIXTURES_DIR, 'network.yaml'), { env: {} });

    assert.deepStrictEqual(config.workspace, { project: 'demo', environment: 'test', name: 'demo-test' });
    assert.strictEqual(config.settings.subscriptionId, '00000000-0000-0000-0000-000000000000');
    assert.strictEqual(config.settings.pollIntervalMs, 0);
    assert.strictEqual(config.variables['vm_count']?.value, 1);
    assert.strictEqual(config.variables['admin_password']?.sensitive, true);
    assert.strictEqual(config.configPath, join(FIXTURES_DIR, 'network.yaml'));
    assert.strictEqual(config.configHash.length, 8);
    assert.strictEqual(config.resources.length, 5);
    assert.deepStrictEqual(Object.keys(config.outputs), ['resource_group', 'vm_names', 'private_ips', 'password']);
  });

  it('should apply variable files and assignments', async () => {
    const config = await loadDeclaration(join(FIXTURES_DIR, 'network.yaml'), {
      env: {},
      varFiles: [join(FIXTURES_DIR, 'vars.json')],
      assignments: ['location=uksouth'],
    });

    assert.strictEqual(config.variables['vm_count']?.value, 2);
    assert.strictEqual(config.variables['location']?.value, 'uksouth');
  });

  it('should reject invalid variable values', async () => {
    await assert.rejects(
      loadDeclaration(join(FIXTURES_DIR, 'network.yaml'), { env: {}, assignments: ['vm_count=0'] }),
      (error: unknown) => {
        assert.ok(error instanceof ValidationError);
        assert.strictEqual(error.message, 'Variable "vm_count": vm_count must be a positive integer');
        return true;
      }
    );
  });

  it('should throw ConfigError with field errors on schema violations', async () => {
    await assert.rejects(loadDeclaration(join(FIXTURES_DIR, 'invalid-schema.yaml')), (error: unknown) => {
      assert.ok(error instanceof ConfigError);
      assert.strictEqual(error.code, 'CONFIG_VALIDATION_FAILED');
      assert.strictEqual(error.exitCode, 1);
      const paths = (error.validationErrors ?? []).map((entry) => entry.path);
      assert.ok(paths.includes('/workspace/project'));
      assert.ok(paths.includes('/resources/0'));
      return true;
    });
  });

  it('should pass load errors through', async () => {
    await assert.rejects(loadDeclaration(join(FIXTURES_DIR, 'missing.yaml')), ConfigLoadError);
  });
});
