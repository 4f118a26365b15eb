/**
 * Azure adapters
 */

import type { ArmOptions } from '../arm.js';
import { ProviderRegistry } from '../registry.js';
import { LinuxVirtualMachineAdapter, WindowsVirtualMachineAdapter } from './compute.js';
import {
  NetworkInterfaceAdapter,
  NetworkInterfaceSecurityGroupAssociationAdapter,
  NetworkSecurityGroupAdapter,
  PublicIpAdapter,
  ResourceGroupAdapter,
  SubnetAdapter,
  VirtualNetworkAdapter,
} from './network.js';

export * from './compute.js';
export * from './network.js';

/**
 * Registry with an adapter for every supported azurerm resource type.
 */
export function createAzureRegistry(options: ArmOptions): ProviderRegistry {
  return new ProviderRegistry([
    new ResourceGroupAdapter(options),
    new VirtualNetworkAdapter(options),
    new SubnetAdapter(options),
    new NetworkSecurityGroupAdapter(options),
    new PublicIpAdapter(options),
    new NetworkInterfaceAdapter(options),
    new NetworkInterfaceSecurityGroupAssociationAdapter(options),
    new LinuxVirtualMachineAdapter(options),
    new WindowsVirtualMachineAdapter(options),
  ]);
}
