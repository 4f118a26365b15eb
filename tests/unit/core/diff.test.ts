/**
 * Unit tests for Diff Engine
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import type { ResourceConfig } from '../../../src/config/types.js';
import { changedAttributeNames, diffResources } from '../../../src/core/diff.js';
import { buildResourceGraph } from '../../../src/core/graph.js';
import { UNKNOWN_VALUE } from '../../../src/core/references.js';
import type { ResourceGraph } from '../../../src/core/types.js';
import { makeRecord } from '../../support/records.js';

function networkGraph(location = 'eastus'): ResourceGraph {
  const resources: ResourceConfig[] = [
    {
      type: 'azurerm_resource_group',
      name: 'main',
      attributes: { name: 'rg-dev', location },
    },
    {
      type: 'azurerm_virtual_network',
      name: 'main',
      attributes: {
        name: 'vnet',
        resource_group_name: '${azurerm_resource_group.main.name}',
        address_space: ['10.0.0.0/16'],
      },
    },
  ];
  return buildResourceGraph({ resources, variables: {} });
}

const appliedGroup = makeRecord('azurerm_resource_group.main', {
  attributes: { name: 'rg-dev', location: 'eastus' },
  outputs: { name: 'rg-dev' },
});

const appliedVnet = makeRecord('azurerm_virtual_network.main', {
  attributes: { name: 'vnet', resource_group_name: 'rg-dev', address_space: ['10.0.0.0/16'] },
  dependencies: ['azurerm_resource_group.main'],
});

describe('changedAttributeNames', () => {
  it('should list added, removed and changed names in sorted order', () => {
    assert.deepStrictEqual(
      changedAttributeNames({ b: 1, a: [1, 2], keep: 'x', gone: true }, { b: 2, a: [1, 2], keep: 'x', added: null }),
      ['added', 'b', 'gone']
    );
  });
});

describe('diffResources', () => {
  it('should create everything when nothing is recorded', () => {
    const operations = diffResources(networkGraph(), []);

    assert.deepStrictEqual(operations.map((op) => [op.kind, op.resourceId]), [
      ['create', 'azurerm_resource_group.main'],
      ['create', 'azurerm_virtual_network.main'],
    ]);
    assert.deepStrictEqual(operations[1]?.changedAttributes, ['address_space', 'name', 'resource_group_name']);
    assert.strictEqual(operations[1]?.newAttributes?.['resource_group_name'], UNKNOWN_VALUE);
  });

  it('should report noop when recorded attributes match', () => {
    const operations = diffResources(networkGraph(), [appliedGroup, appliedVnet]);

    assert.deepStrictEqual(operations.map((op) => op.kind), ['noop', 'noop']);
  });

  it('should propagate a pending change to dependents as an update', () => {
    const operations = diffResources(networkGraph('westus'), [appliedGroup, appliedVnet]);
    const [groupOp, vnetOp] = operations;

    assert.strictEqual(groupOp?.kind, 'update');
    assert.deepStrictEqual(groupOp?.changedAttributes, ['location']);
    assert.deepStrictEqual(groupOp?.oldAttributes, { name: 'rg-dev', location: 'eastus' });
    assert.strictEqual(vnetOp?.kind, 'update');
    assert.deepStrictEqual(vnetOp?.changedDependencies, ['azurerm_resource_group.main']);
    assert.deepStrictEqual(vnetOp?.changedAttributes, ['resource_group_name']);
  });

  it('should update dependents of a resource being created', () => {
    const operations = diffResources(networkGraph(), [appliedVnet]);

    assert.deepStrictEqual(operations.map((op) => op.kind), ['create', 'update']);
  });

  it('should delete undeclared records after declared operations, in state order', () => {
    const operations = diffResources(networkGraph(), [
      makeRecord('azurerm_subnet.old'),
      appliedGroup,
      makeRecord('azurerm_public_ip.old'),
      appliedVnet,
    ]);

    assert.deepStrictEqual(operations.map((op) => [op.kind, op.resourceId, op.order]), [
      ['noop', 'azurerm_resource_group.main', 0],
      ['noop', 'azurerm_virtual_network.main', 1],
      ['delete', 'azurerm_subnet.old', 2],
      ['delete', 'azurerm_public_ip.old', 3],
    ]);
    assert.strictEqual(operations[2]?.definition, null);
    assert.strictEqual(operations[2]?.newAttributes, null);
  });
});
