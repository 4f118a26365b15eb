/**
 * Virtual machine adapters.
 */

import { PermanentProviderError } from '../../core/errors.js';
import type { JsonObject } from '../../core/types.js';
import type { ArmOptions } from '../arm.js';
import {
  compact,
  optionalNumber,
  optionalObject,
  optionalString,
  property,
  requireString,
  stringList,
  tagsOf,
} from './attributes.js';
import { ArmResourceAdapter } from './base.js';

const COMPUTE_API = '2023-09-01';

const SHARED_REQUIRED = [
  'name',
  'resource_group_name',
  'location',
  'size',
  'admin_username',
  'network_interface_ids',
  'image',
];

const SHARED_OPTIONAL = ['computer_name', 'os_disk', 'custom_data', 'zone', 'tags'];

abstract class VirtualMachineAdapter extends ArmResourceAdapter {
  override readonly computedAttributes = ['vm_id', 'provisioning_state'];

  constructor(options: ArmOptions) {
    super(options, COMPUTE_API);
  }

  /**
   * `osProfile` minus the common fields.
   */
  protected abstract osConfiguration(attributes: JsonObject): JsonObject;

  /**
   * Computer name when none is declared.
   */
  protected defaultComputerName(name: string): string {
    return name;
  }

  protected resourcePath(attributes: JsonObject): string {
    return `${this.groupPath(attributes, 'Microsoft.Compute')}/virtualMachines/${requireString(attributes, 'name')}`;
  }

  protected buildBody(attributes: JsonObject): JsonObject {
    const image = optionalObject(attributes, 'image') ?? {};
    const osDisk = optionalObject(attributes, 'os_disk') ?? {};
    const nicIds = stringList(attributes, 'network_interface_ids');
    if (nicIds.length === 0) {
      throw new PermanentProviderError(
        'Attribute "network_interface_ids" must name at least one network interface',
        'INVALID_REQUEST'
      );
    }
    const customData = optionalString(attributes, 'custom_data');
    const zone = optionalString(attributes, 'zone');

    return compact({
      location: requireString(attributes, 'location'),
      tags: tagsOf(attributes),
      zones: zone ? [zone] : undefined,
      properties: {
        hardwareProfile: { vmSize: requireString(attributes, 'size') },
        storageProfile: {
          imageReference: {
            publisher: requireString(image, 'publisher'),
            offer: requireString(image, 'offer'),
            sku: requireString(image, 'sku'),
            version: optionalString(image, 'version') ?? 'latest',
          },
          osDisk: compact({
            createOption: 'FromImage',
            caching: optionalString(osDisk, 'caching') ?? 'ReadWrite',
            managedDisk: {
              storageAccountType: optionalString(osDisk, 'storage_account_type') ?? 'Standard_LRS',
            },
            diskSizeGB: optionalNumber(osDisk, 'disk_size_gb'),
            deleteOption: 'Delete',
          }),
        },
        osProfile: compact({
          computerName:
            optionalString(attributes, 'computer_name') ??
            this.defaultComputerName(requireString(attributes, 'name')),
          adminUsername: requireString(attributes, 'admin_username'),
          customData: customData ? Buffer.from(customData, 'utf-8').toString('base64') : undefined,
          ...this.osConfiguration(attributes),
        }),
        networkProfile: {
          networkInterfaces: nicIds.map((id, i) => ({
            id,
            properties: { primary: i === 0, deleteOption: 'Detach' },
          })),
        },
      },
    });
  }

  protected override resultAttributes(resource: JsonObject): JsonObject {
    return compact({
      ...super.resultAttributes(resource),
      vm_id: property(resource, 'properties', 'vmId'),
    });
  }
}

export class LinuxVirtualMachineAdapter extends VirtualMachineAdapter {
  readonly kind = 'azurerm_linux_virtual_machine';
  readonly requiredAttributes = SHARED_REQUIRED;
  readonly optionalAttributes = [...SHARED_OPTIONAL, 'admin_password', 'ssh_public_key'];

  protected osConfiguration(attributes: JsonObject): JsonObject {
    const password = optionalString(attributes, 'admin_password');
    const sshKey = optionalString(attributes, 'ssh_public_key');
    if (!password && !sshKey) {
      throw new PermanentProviderError(
        'Linux virtual machines need "admin_password" or "ssh_public_key"',
        'INVALID_REQUEST'
      );
    }
    const user = requireString(attributes, 'admin_username');
    return compact({
      adminPassword: password,
      linuxConfiguration: compact({
        disablePasswordAuthentication: !password,
        ssh: sshKey
          ? { publicKeys: [{ path: `/home/${user}/.ssh/authorized_keys`, keyData: sshKey }] }
          : undefined,
      }),
    });
  }
}

export class WindowsVirtualMachineAdapter extends VirtualMachineAdapter {
  readonly kind = 'azurerm_windows_virtual_machine';
  readonly requiredAttributes = [...SHARED_REQUIRED, 'admin_password'];
  readonly optionalAttributes = SHARED_OPTIONAL;

  /** Windows computer names are limited to 15 characters */
  protected override defaultComputerName(name: string): string {
    return name.slice(0, 15);
  }

  protected osConfiguration(attributes: JsonObject): JsonObject {
    return {
      adminPassword: requireString(attributes, 'admin_password'),
      windowsConfiguration: { provisionVMAgent: true, enableAutomaticUpdates: true },
    };
  }
}
