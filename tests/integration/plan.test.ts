/**
 * Integration tests for plan and refresh
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';

import { computePlan, formatPlanSummary } from '../../src/core/planner.js';
import { refreshRecords } from '../../src/core/refresh.js';
import { describeOperation } from '../../src/core/reconciler.js';
import { StateDir, openWorkspace, planFor, run } from '../support/workspace.js';

const NETWORK =
  '/subscriptions/00000000-0000-0000-0000-000000000000/resourceGroups/rg-demo/providers/Microsoft.Network';

describe('plan', () => {
  let dir: StateDir;

  beforeEach(async () => {
    dir = await StateDir.create();
  });

  afterEach(async () => {
    await dir.remove();
  });

  it('should plan every resource for creation in an empty workspace', async () => {
    const workspace = await openWorkspace('network.yaml', dir);

    const plan = await planFor(workspace);

    assert.strictEqual(plan.workspace, 'demo-test');
    assert.deepStrictEqual(plan.operations.map(describeOperation), [
      'Create azurerm_resource_group.main',
      'Create azurerm_virtual_network.main',
      'Create azurerm_subnet.internal',
      'Create azurerm_network_interface.vm[0]',
      'Create azurerm_linux_virtual_machine.vm[0]',
    ]);
    assert.strictEqual(
      formatPlanSummary(plan.summary),
      'Plan: 5 to create, 0 to update, 0 to delete, 0 unchanged.'
    );
    assert.deepStrictEqual(workspace.arm.requests, []);
  });

  it('should not touch the provider or state while planning', async () => {
    const workspace = await openWorkspace('network.yaml', dir);
    await run(workspace, await planFor(workspace));
    const requests = workspace.arm.requests.length;
    const serial = workspace.store.getState().serial;

    await planFor(workspace);

    assert.strictEqual(workspace.arm.requests.length, requests);
    assert.strictEqual(workspace.store.getState().serial, serial);
  });

  it('should re-create resources deleted outside the tool after a refresh', async () => {
    const workspace = await openWorkspace('network.yaml', dir);
    await run(workspace, await planFor(workspace));
    workspace.arm.remove(`${NETWORK}/networkInterfaces/nic-0`);
    const records = await workspace.store.list();

    const refreshed = await refreshRecords(records, { registry: workspace.registry });
    const plan = computePlan(workspace.graph, refreshed.records, 'demo-test');

    assert.deepStrictEqual(refreshed.removed, ['azurerm_network_interface.vm[0]']);
    assert.deepStrictEqual(plan.summary, { create: 1, update: 1, delete: 0, noop: 3 });
    assert.deepStrictEqual(
      plan.operations.filter((op) => op.kind !== 'noop').map(describeOperation),
      [
        'Create azurerm_network_interface.vm[0]',
        'Update azurerm_linux_virtual_machine.vm[0] (changed: network_interface_ids; depends on pending: azurerm_network_interface.vm[0])',
      ]
    );
    assert.strictEqual((await workspace.store.list()).length, 5);
  });

  it('should plan against recorded state without a refresh', async () => {
    const workspace = await openWorkspace('network.yaml', dir);
    await run(workspace, await planFor(workspace));
    workspace.arm.remove(`${NETWORK}/networkInterfaces/nic-0`);

    const plan = await planFor(workspace);

    assert.deepStrictEqual(plan.summary, { create: 0, update: 0, delete: 0, noop: 5 });
  });
});
