/**
 * Unit tests for Configuration Validator
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import { validateConfig } from '../../../src/config/validator.js';

function baseConfig(): Record<string, unknown> {
  return {
    workspace: { project: 'demo', environment: 'test' },
    resources: [
      {
        type: 'azurerm_resource_group',
        name: 'main',
        attributes: { name: 'rg-demo', location: 'eastus' },
      },
    ],
  };
}

describe('validateConfig', () => {
  it('should accept a minimal declaration', () => {
    const result = validateConfig(baseConfig());

    assert.strictEqual(result.valid, true);
    if (result.valid) {
      assert.strictEqual(result.config.workspace.project, 'demo');
    }
  });

  it('should accept variables, settings, counts and outputs', () => {
    const result = validateConfig({
      ...baseConfig(),
      settings: {
        concurrency: 8,
        subscription_id: '00000000-0000-0000-0000-000000000000',
      },
      variables: {
        vm_count: { type: 'number', default: 2, validation: [{ min: 1, integer: true }] },
      },
      resources: [
        {
          type: 'azurerm_public_ip',
          name: 'vm',
          count: '${var.vm_count}',
          attributes: { name: 'pip-${count.index}' },
        },
      ],
      outputs: { ips: { value: '${azurerm_public_ip.vm[*].ip_address}' } },
    });

    assert.strictEqual(result.valid, true);
  });

  it('should report a missing required section', () => {
    const result = validateConfig({ workspace: { project: 'demo', environment: 'test' } });

    assert.strictEqual(result.valid, false);
    if (!result.valid) {
      assert.strictEqual(result.errors.length, 1);
      assert.strictEqual(result.errors[0]?.path, '/');
      assert.strictEqual(result.errors[0]?.message, "must have required property 'resources'");
    }
  });

  it('should report an invalid project name with its path', () => {
    const config = baseConfig();
    config['workspace'] = { project: 'Demo_Project', environment: 'test' };

    const result = validateConfig(config);

    assert.strictEqual(result.valid, false);
    if (!result.valid) {
      assert.ok(result.errors.some((error) => error.path === '/workspace/project'));
    }
  });

  it('should reject an invalid subscription id format', () => {
    const result = validateConfig({ ...baseConfig(), settings: { subscription_id: 'not-a-uuid' } });

    assert.strictEqual(result.valid, false);
    if (!result.valid) {
      assert.ok(result.errors.some((error) => error.path === '/settings/subscription_id'));
    }
  });

  it('should reject a negative count', () => {
    const config = baseConfig();
    config['resources'] = [
      { type: 'azurerm_resource_group', name: 'main', count: -1, attributes: {} },
    ];

    assert.strictEqual(validateConfig(config).valid, false);
  });

  it('should reject unknown top-level keys', () => {
    const result = validateConfig({ ...baseConfig(), machines: [] });

    assert.strictEqual(result.valid, false);
  });

  it('should reject non-object input', () => {
    assert.strictEqual(validateConfig('text').valid, false);
    assert.strictEqual(validateConfig(null).valid, false);
  });
});
