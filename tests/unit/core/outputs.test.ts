/**
 * Unit tests for Output Evaluation
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import type { OutputConfig, ResolvedVariable, ResourceConfig } from '../../../src/config/types.js';
import {
  SENSITIVE_PLACEHOLDER,
  displayValue,
  evaluateOutputs,
} from '../../../src/core/outputs.js';
import { makeRecord } from '../../support/records.js';

const RESOURCES: ResourceConfig[] = [
  { type: 'fake_group', name: 'main', attributes: { name: 'main' } },
  { type: 'fake_item', name: 'vm', count: 2, attributes: { name: 'vm' } },
];

const VARIABLES: Record<string, ResolvedVariable> = {
  location: { name: 'location', type: 'string', value: 'eastus', sensitive: false },
  password: { name: 'password', type: 'string', value: 'test-secret', sensitive: true },
};

const RECORDS = [
  makeRecord('fake_group.main', { providerId: '/fake/main', outputs: { address: 'addr-main' } }),
  makeRecord('fake_item.vm[0]', { attributes: { name: 'vm-0' }, outputs: { address: '10.0.0.4' } }),
  makeRecord('fake_item.vm[1]', { attributes: { name: 'vm-1' }, outputs: { address: '10.0.0.5' } }),
];

function evaluate(outputs: Record<string, OutputConfig>, records = RECORDS) {
  return evaluateOutputs({ outputs, resources: RESOURCES, variables: VARIABLES }, records);
}

describe('evaluateOutputs', () => {
  it('should resolve references against recorded state', () => {
    const [output] = evaluate({
      group_id: { value: '${fake_group.main.id}', description: 'Group id' },
    });

    assert.deepStrictEqual(output, {
      name: 'group_id',
      value: '/fake/main',
      sensitive: false,
      description: 'Group id',
    });
  });

  it('should turn splat references into lists ordered by index', () => {
    const [addresses, names] = evaluate({
      addresses: { value: '${fake_item.vm[*].address}' },
      names: { value: '${fake_item.vm[*].name}' },
    });

    assert.deepStrictEqual(addresses?.value, ['10.0.0.4', '10.0.0.5']);
    assert.deepStrictEqual(names?.value, ['vm-0', 'vm-1']);
  });

  it('should render templates and variables', () => {
    const [output] = evaluate({
      summary: { value: '${fake_item.vm[1].name} in ${var.location}' },
    });

    assert.strictEqual(output?.value, 'vm-1 in eastus');
  });

  it('should report unapplied resources as null with a reason', () => {
    const [output] = evaluate(
      { addresses: { value: '${fake_item.vm[*].address}' } },
      RECORDS.slice(0, 2)
    );

    assert.strictEqual(output?.value, null);
    assert.strictEqual(output?.reason, 'not yet applied: fake_item.vm[1]');
  });

  it('should mark outputs that read a sensitive attribute', () => {
    const [output] = evaluateOutputs(
      {
        outputs: { passwords: { value: '${fake_item.vm[*].password}' } },
        resources: [{ type: 'fake_item', name: 'vm', count: 2, attributes: { password: '${var.password}' } }],
        variables: VARIABLES,
      },
      [
        makeRecord('fake_item.vm[0]', { attributes: { password: 'test-secret' } }),
        makeRecord('fake_item.vm[1]', { attributes: { password: 'test-secret' } }),
      ]
    );

    assert.deepStrictEqual(output?.value, ['test-secret', 'test-secret']);
    assert.strictEqual(output?.sensitive, true);
    assert.strictEqual(output && displayValue(output), SENSITIVE_PLACEHOLDER);
  });

  it('should mark outputs derived from sensitive variables', () => {
    const [derived, declared] = evaluate({
      password: { value: '${var.password}' },
      group: { value: '${fake_group.main.address}', sensitive: true },
    });

    assert.strictEqual(derived?.sensitive, true);
    assert.strictEqual(derived?.value, 'test-secret');
    assert.strictEqual(declared?.sensitive, true);
  });

  it('should keep declaration order', () => {
    const outputs = evaluate({
      zeta: { value: 'z' },
      alpha: { value: 'a' },
    });

    assert.deepStrictEqual(outputs.map((output) => output.name), ['zeta', 'alpha']);
  });
});

describe('displayValue', () => {
  it('should mask sensitive values', () => {
    assert.strictEqual(
      displayValue({ name: 'password', value: 'test-secret', sensitive: true }),
      SENSITIVE_PLACEHOLDER
    );
    assert.deepStrictEqual(
      displayValue({ name: 'ips', value: ['10.0.0.4'], sensitive: false }),
      ['10.0.0.4']
    );
  });
});
