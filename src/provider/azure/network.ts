/**
 * Resource group and networking adapters.
 */

import { PermanentProviderError } from '../../core/errors.js';
import type { JsonObject, JsonValue } from '../../core/types.js';
import { isJsonObject } from '../../lib/json.js';
import { ArmOperations, type ArmOptions } from '../arm.js';
import type { ProviderAdapter, ProviderContext, ProviderResult } from '../types.js';
import {
  compact,
  objectList,
  optionalNumber,
  optionalString,
  property,
  requireString,
  stringList,
  tagsOf,
} from './attributes.js';
import { ArmResourceAdapter } from './base.js';

const NETWORK_API = '2023-09-01';
const RESOURCES_API = '2021-04-01';

export class ResourceGroupAdapter extends ArmResourceAdapter {
  readonly kind = 'azurerm_resource_group';
  readonly requiredAttributes = ['name', 'location'];
  readonly optionalAttributes = ['tags'];
  override readonly computedAttributes = ['provisioning_state'];

  constructor(options: ArmOptions) {
    super(options, RESOURCES_API);
  }

  protected resourcePath(attributes: JsonObject): string {
    return `/subscriptions/${this.arm.subscriptionId()}/resourceGroups/${requireString(attributes, 'name')}`;
  }

  protected buildBody(attributes: JsonObject): JsonObject {
    return { location: requireString(attributes, 'location'), tags: tagsOf(attributes) };
  }
}

export class VirtualNetworkAdapter extends ArmResourceAdapter {
  readonly kind = 'azurerm_virtual_network';
  readonly requiredAttributes = ['name', 'resource_group_name', 'location', 'address_space'];
  readonly optionalAttributes = ['dns_servers', 'tags'];
  override readonly computedAttributes = ['provisioning_state'];

  constructor(options: ArmOptions) {
    super(options, NETWORK_API);
  }

  protected resourcePath(attributes: JsonObject): string {
    return `${this.groupPath(attributes, 'Microsoft.Network')}/virtualNetworks/${requireString(attributes, 'name')}`;
  }

  protected buildBody(attributes: JsonObject, existing: JsonObject | null): JsonObject {
    const dnsServers = stringList(attributes, 'dns_servers');
    // Subnets are managed as their own resources; a PUT without them would delete them
    const subnets = property(existing, 'properties', 'subnets') ?? [];
    return {
      location: requireString(attributes, 'location'),
      tags: tagsOf(attributes),
      properties: compact({
        addressSpace: { addressPrefixes: stringList(attributes, 'address_space') },
        dhcpOptions: dnsServers.length > 0 ? { dnsServers } : undefined,
        subnets,
      }),
    };
  }
}

export class SubnetAdapter extends ArmResourceAdapter {
  readonly kind = 'azurerm_subnet';
  readonly requiredAttributes = [
    'name',
    'resource_group_name',
    'virtual_network_name',
    'address_prefixes',
  ];
  readonly optionalAttributes: readonly string[] = [];
  override readonly computedAttributes = ['provisioning_state'];

  constructor(options: ArmOptions) {
    super(options, NETWORK_API);
  }

  protected resourcePath(attributes: JsonObject): string {
    const vnet = requireString(attributes, 'virtual_network_name');
    return `${this.groupPath(attributes, 'Microsoft.Network')}/virtualNetworks/${vnet}/subnets/${requireString(attributes, 'name')}`;
  }

  protected buildBody(attributes: JsonObject, existing: JsonObject | null): JsonObject {
    return {
      properties: compact({
        addressPrefixes: stringList(attributes, 'address_prefixes'),
        networkSecurityGroup: property(existing, 'properties', 'networkSecurityGroup'),
        routeTable: property(existing, 'properties', 'routeTable'),
      }),
    };
  }
}

function securityRule(rule: JsonObject): JsonObject {
  return {
    name: requireString(rule, 'name'),
    properties: {
      priority: optionalNumber(rule, 'priority') ?? 1000,
      direction: optionalString(rule, 'direction') ?? 'Inbound',
      access: optionalString(rule, 'access') ?? 'Allow',
      protocol: optionalString(rule, 'protocol') ?? 'Tcp',
      sourcePortRange: optionalString(rule, 'source_port_range') ?? '*',
      destinationPortRange: optionalString(rule, 'destination_port_range') ?? '*',
      sourceAddressPrefix: optionalString(rule, 'source_address_prefix') ?? '*',
      destinationAddressPrefix: optionalString(rule, 'destination_address_prefix') ?? '*',
    },
  };
}

export class NetworkSecurityGroupAdapter extends ArmResourceAdapter {
  readonly kind = 'azurerm_network_security_group';
  readonly requiredAttributes = ['name', 'resource_group_name', 'location'];
  readonly optionalAttributes = ['security_rules', 'tags'];
  override readonly computedAttributes = ['provisioning_state'];

  constructor(options: ArmOptions) {
    super(options, NETWORK_API);
  }

  protected resourcePath(attributes: JsonObject): string {
    return `${this.groupPath(attributes, 'Microsoft.Network')}/networkSecurityGroups/${requireString(attributes, 'name')}`;
  }

  protected buildBody(attributes: JsonObject): JsonObject {
    return {
      location: requireString(attributes, 'location'),
      tags: tagsOf(attributes),
      properties: {
        securityRules: objectList(attributes, 'security_rules').map(securityRule),
      },
    };
  }
}

export class PublicIpAdapter extends ArmResourceAdapter {
  readonly kind = 'azurerm_public_ip';
  readonly requiredAttributes = ['name', 'resource_group_name', 'location'];
  readonly optionalAttributes = ['allocation_method', 'sku', 'domain_name_label', 'tags'];
  override readonly computedAttributes = ['ip_address', 'fqdn', 'provisioning_state'];

  constructor(options: ArmOptions) {
    super(options, NETWORK_API);
  }

  protected resourcePath(attributes: JsonObject): string {
    return `${this.groupPath(attributes, 'Microsoft.Network')}/publicIPAddresses/${requireString(attributes, 'name')}`;
  }

  protected buildBody(attributes: JsonObject): JsonObject {
    const label = optionalString(attributes, 'domain_name_label');
    return {
      location: requireString(attributes, 'location'),
      tags: tagsOf(attributes),
      sku: { name: optionalString(attributes, 'sku') ?? 'Standard' },
      properties: compact({
        publicIPAllocationMethod: optionalString(attributes, 'allocation_method') ?? 'Static',
        dnsSettings: label ? { domainNameLabel: label } : undefined,
      }),
    };
  }

  protected override resultAttributes(resource: JsonObject): JsonObject {
    return compact({
      ...super.resultAttributes(resource),
      ip_address: property(resource, 'properties', 'ipAddress') ?? null,
      fqdn: property(resource, 'properties', 'dnsSettings', 'fqdn'),
    });
  }
}

export class NetworkInterfaceAdapter extends ArmResourceAdapter {
  readonly kind = 'azurerm_network_interface';
  readonly requiredAttributes = ['name', 'resource_group_name', 'location', 'subnet_id'];
  readonly optionalAttributes = [
    'private_ip_address_allocation',
    'private_ip_address',
    'public_ip_address_id',
    'tags',
  ];
  override readonly computedAttributes = ['private_ip_address', 'mac_address', 'provisioning_state'];

  constructor(options: ArmOptions) {
    super(options, NETWORK_API);
  }

  protected resourcePath(attributes: JsonObject): string {
    return `${this.groupPath(attributes, 'Microsoft.Network')}/networkInterfaces/${requireString(attributes, 'name')}`;
  }

  protected buildBody(attributes: JsonObject, existing: JsonObject | null): JsonObject {
    const publicIp = optionalString(attributes, 'public_ip_address_id');
    const privateIp = optionalString(attributes, 'private_ip_address');
    return {
      location: requireString(attributes, 'location'),
      tags: tagsOf(attributes),
      properties: compact({
        ipConfigurations: [
          {
            name: 'internal',
            properties: compact({
              primary: true,
              subnet: { id: requireString(attributes, 'subnet_id') },
              privateIPAllocationMethod:
                optionalString(attributes, 'private_ip_address_allocation') ??
                (privateIp ? 'Static' : 'Dynamic'),
              privateIPAddress: privateIp,
              publicIPAddress: publicIp ? { id: publicIp } : undefined,
            }),
          },
        ],
        // Attached through azurerm_network_interface_security_group_association
        networkSecurityGroup: property(existing, 'properties', 'networkSecurityGroup'),
      }),
    };
  }

  protected override resultAttributes(resource: JsonObject): JsonObject {
    return compact({
      ...super.resultAttributes(resource),
      private_ip_address:
        property(resource, 'properties', 'ipConfigurations', '0', 'properties', 'privateIPAddress') ??
        null,
      mac_address: property(resource, 'properties', 'macAddress'),
    });
  }
}

const ASSOCIATION_SEPARATOR = '|';

function sameId(a: JsonValue | undefined, b: string): boolean {
  return typeof a === 'string' && a.toLowerCase() === b.toLowerCase();
}

/**
 * Attaches a network security group to a network interface by
 * read-modify-write of the interface. The provider id is
 * `{nicId}|{nsgId}`.
 */
export class NetworkInterfaceSecurityGroupAssociationAdapter implements ProviderAdapter {
  readonly kind = 'azurerm_network_interface_security_group_association';
  readonly requiredAttributes = ['network_interface_id', 'network_security_group_id'];
  readonly optionalAttributes: readonly string[] = [];
  readonly computedAttributes: readonly string[] = [];

  private readonly arm: ArmOperations;

  constructor(options: ArmOptions) {
    this.arm = new ArmOperations(options, NETWORK_API);
  }

  private splitId(providerId: string): { nicId: string; nsgId: string } {
    const [nicId, nsgId] = providerId.split(ASSOCIATION_SEPARATOR);
    if (!nicId || !nsgId) {
      throw new PermanentProviderError(
        `Malformed association id "${providerId}"`,
        'INVALID_REQUEST'
      );
    }
    return { nicId, nsgId };
  }

  private async setGroup(
    nicId: string,
    nsgId: string | null,
    ctx: ProviderContext
  ): Promise<JsonObject | null> {
    const nic = await this.arm.get(nicId, ctx);
    if (!nic) {
      if (nsgId === null) {
        return null;
      }
      throw new PermanentProviderError(
        `${ctx.resourceId}: network interface ${nicId} does not exist`,
        'NOT_FOUND'
      );
    }
    const current = nic['properties'];
    const properties: JsonObject = isJsonObject(current) ? { ...current } : {};
    if (nsgId === null) {
      delete properties['networkSecurityGroup'];
    } else {
      properties['networkSecurityGroup'] = { id: nsgId };
    }
    return this.arm.putAndWait(nicId, { ...nic, properties }, ctx);
  }

  async create(attributes: JsonObject, ctx: ProviderContext): Promise<ProviderResult> {
    const nicId = requireString(attributes, 'network_interface_id');
    const nsgId = requireString(attributes, 'network_security_group_id');
    await this.setGroup(nicId, nsgId, ctx);
    return { providerId: `${nicId}${ASSOCIATION_SEPARATOR}${nsgId}`, attributes: {} };
  }

  async read(providerId: string, ctx: ProviderContext): Promise<ProviderResult | null> {
    const { nicId, nsgId } = this.splitId(providerId);
    const nic = await this.arm.get(nicId, ctx);
    if (!sameId(property(nic, 'properties', 'networkSecurityGroup', 'id'), nsgId)) {
      return null;
    }
    return { providerId, attributes: {} };
  }

  async update(
    providerId: string,
    attributes: JsonObject,
    ctx: ProviderContext
  ): Promise<ProviderResult> {
    const { nicId } = this.splitId(providerId);
    if (!sameId(requireString(attributes, 'network_interface_id'), nicId)) {
      await this.delete(providerId, ctx);
    }
    return this.create(attributes, ctx);
  }

  async delete(providerId: string, ctx: ProviderContext): Promise<void> {
    const { nicId, nsgId } = this.splitId(providerId);
    const nic = await this.arm.get(nicId, ctx);
    if (!sameId(property(nic, 'properties', 'networkSecurityGroup', 'id'), nsgId)) {
      return;
    }
    await this.setGroup(nicId, null, ctx);
  }
}
