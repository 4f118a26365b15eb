/**
 * Unit tests for Provider Registry
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import type { ResourceConfig } from '../../../src/config/types.js';
import { ValidationError } from '../../../src/core/errors.js';
import { buildResourceGraph } from '../../../src/core/graph.js';
import { ProviderRegistry } from '../../../src/provider/registry.js';
import { FakeAdapter } from '../../support/fake-provider.js';

function registry(): ProviderRegistry {
  return new ProviderRegistry([new FakeAdapter('fake_item'), new FakeAdapter('fake_group')]);
}

function problemsFor(resources: ResourceConfig[]): string[] {
  try {
    registry().validateDefinitions(buildResourceGraph({ resources, variables: {} }));
  } catch (error) {
    if (error instanceof ValidationError) {
      return error.problems;
    }
    throw error;
  }
  return [];
}

describe('ProviderRegistry', () => {
  it('should list kinds in sorted order', () => {
    assert.deepStrictEqual(registry().kinds(), ['fake_group', 'fake_item']);
    assert.strictEqual(registry().has('fake_item'), true);
    assert.strictEqual(registry().has('fake_disk'), false);
  });

  it('should reject duplicate adapters', () => {
    assert.throws(() => registry().register(new FakeAdapter('fake_item')), {
      message: 'Adapter for fake_item is already registered',
    });
  });

  it('should name supported types for an unknown kind', () => {
    assert.throws(() => registry().get('fake_disk'), {
      name: 'ValidationError',
      message: 'Unsupported resource type "fake_disk" (supported: fake_group, fake_item)',
    });
  });

  it('should accept well-formed definitions', () => {
    assert.deepStrictEqual(
      problemsFor([
        { type: 'fake_group', name: 'main', attributes: { name: 'main' } },
        {
          type: 'fake_item',
          name: 'a',
          attributes: { name: 'a', parent: '${fake_group.main.address}', size: '${fake_group.main.id}' },
        },
      ]),
      []
    );
  });

  it('should report every problem at once', () => {
    assert.deepStrictEqual(
      problemsFor([
        { type: 'fake_group', name: 'main', attributes: { colour: 'blue' } },
        { type: 'fake_item', name: 'a', attributes: { name: 'a', parent: '${fake_group.main.region}' } },
        { type: 'fake_disk', name: 'd', attributes: {} },
      ]),
      [
        'fake_group.main: missing required attribute "name"',
        'fake_group.main: unknown attribute "colour"',
        'fake_item.a: fake_group.main has no attribute "region"',
        'fake_disk.d: unsupported resource type "fake_disk"',
      ]
    );
  });

  it('should use the single problem as the message', () => {
    assert.throws(
      () =>
        registry().validateDefinitions(
          buildResourceGraph({
            resources: [{ type: 'fake_group', name: 'main', attributes: {} }],
            variables: {},
          })
        ),
      { message: 'fake_group.main: missing required attribute "name"' }
    );
  });
});
