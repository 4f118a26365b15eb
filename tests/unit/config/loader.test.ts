/**
 * Unit tests for Configuration Loader
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { mkdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';
import { fileURLToPath } from 'node:url';

import { ConfigLoadError, loadVarFile, loadYamlFile } from '../../../src/config/loader.js';

const FIXTURES_DIR = fileURLToPath(new URL('../../fixtures/', import.meta.url));

describe('loadYamlFile', () => {
  it('should parse a declaration file', async () => {
    const result = await loadYamlFile(join(FIXTURES_DIR, 'minimal.yaml'));

    assert.deepStrictEqual(result, {
      workspace: { project: 'demo', environment: 'test' },
      resources: [
        {
          type: 'azurerm_resource_group',
          name: 'main',
          attributes: { name: 'rg-demo', location: 'eastus' },
        },
      ],
    });
  });

  it('should throw ConfigLoadError for a missing file', async () => {
    const missing = join(FIXTURES_DIR, 'does-not-exist.yaml');

    await assert.rejects(loadYamlFile(missing), (error: unknown) => {
      assert.ok(error instanceof ConfigLoadError);
      assert.strictEqual(error.message, `Configuration file not found: ${missing}`);
      assert.strictEqual(error.filePath, missing);
      return true;
    });
  });

  it('should throw ConfigLoadError for invalid YAML syntax', async () => {
    await assert.rejects(loadYamlFile(join(FIXTURES_DIR, 'invalid-syntax.yaml')), (error: unknown) => {
      assert.ok(error instanceof ConfigLoadError);
      assert.ok(error.message.startsWith('Invalid YAML syntax in '));
      return true;
    });
  });
});

describe('loadVarFile', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = join(tmpdir(), `vmforge-loader-test-${randomUUID()}`);
    await mkdir(tempDir, { recursive: true });
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('should parse .json files as JSON', async () => {
    assert.deepStrictEqual(await loadVarFile(join(FIXTURES_DIR, 'vars.json')), {
      location: 'westeurope',
      vm_count: 2,
    });
  });

  it('should parse other files as YAML', async () => {
    assert.deepStrictEqual(await loadVarFile(join(FIXTURES_DIR, 'vars.yaml')), {
      location: 'northeurope',
    });
  });

  it('should treat an empty file as no values', async () => {
    const file = join(tempDir, 'empty.yaml');
    await writeFile(file, '');

    assert.deepStrictEqual(await loadVarFile(file), {});
  });

  it('should reject a document that is not a mapping', async () => {
    const file = join(tempDir, 'list.json');
    await writeFile(file, '["a", "b"]');

    await assert.rejects(loadVarFile(file), {
      name: 'ConfigLoadError',
      message: `Variable file must contain a mapping of names to values: ${file}`,
    });
  });

  it('should reject invalid JSON', async () => {
    const file = join(tempDir, 'broken.json');
    await writeFile(file, '{"location": ');

    await assert.rejects(loadVarFile(file), (error: unknown) => {
      assert.ok(error instanceof ConfigLoadError);
      assert.ok(error.message.startsWith(`Invalid syntax in variable file ${file}: `));
      return true;
    });
  });

  it('should report a missing file', async () => {
    const file = join(tempDir, 'missing.json');

    await assert.rejects(loadVarFile(file), {
      name: 'ConfigLoadError',
      message: `Variable file not found: ${file}`,
    });
  });
});
