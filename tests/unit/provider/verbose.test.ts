/**
 * Unit tests for Verbose Output Helpers
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import { REDACTED, formatCommand, redactSecrets } from '../../../src/provider/verbose.js';

describe('redactSecrets', () => {
  it('should replace secret keys at any depth', () => {
    const body = {
      properties: {
        osProfile: { adminUsername: 'azureuser', adminPassword: 'test-secret' },
        linuxConfiguration: { ssh: { publicKeys: [{ path: '/home/azureuser', keyData: 'ssh-rsa test' }] } },
      },
    };

    assert.deepStrictEqual(redactSecrets(body), {
      properties: {
        osProfile: { adminUsername: 'azureuser', adminPassword: REDACTED },
        linuxConfiguration: { ssh: { publicKeys: [{ path: '/home/azureuser', keyData: REDACTED }] } },
      },
    });
  });

  it('should leave scalars untouched', () => {
    assert.strictEqual(redactSecrets('adminPassword'), 'adminPassword');
    assert.strictEqual(redactSecrets(null), null);
  });
});

describe('formatCommand', () => {
  it('should prefix the command line', () => {
    assert.strictEqual(
      formatCommand(['rest', '--method', 'get'], undefined, false),
      '\n[az] az rest --method get\n\n'
    );
  });

  it('should indent the request body', () => {
    assert.strictEqual(
      formatCommand(['rest'], { adminPassword: 'test-secret' }, false),
      '\n[az] az rest\n     {\n       "adminPassword": "***"\n     }\n\n'
    );
  });

  it('should wrap output in gray when ANSI is supported', () => {
    assert.strictEqual(formatCommand(['rest'], undefined, true), '\x1b[90m\n[az] az rest\n\n\x1b[0m');
  });
});
