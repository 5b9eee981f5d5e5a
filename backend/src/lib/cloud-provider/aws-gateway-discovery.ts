/**
 * AWS Gateway Discovery
 *
 * Lists the NAT Gateways and Internet Gateways of one region and resolves the
 * VPC each one belongs to.
 */

import type { InternetGateway, NatGateway, Tag } from '@aws-sdk/client-ec2';
import type { Gateway, GatewayDiscovery, GatewayKind } from '../../types/gateway.js';
import { withAwsCircuitBreaker } from '../circuit-breaker.js';
import { logger } from '../logger.js';
import type { Ec2Api } from './aws-clients.js';

export function getNameTag(tags: Tag[] | undefined): string | undefined {
  const value = tags?.find(t => t.Key === 'Name')?.Value;
  return value ? value : undefined;
}

/**
 * Name tag first, then "<kind>-<vpc name>", then the gateway id.
 */
export function resolveDisplayName(
  gatewayId: string,
  kind: GatewayKind,
  nameTag: string | undefined,
  networkName: string | null
): string {
  if (nameTag) return nameTag;
  if (networkName) return `${kind}-${networkName}`;
  return gatewayId;
}

export class AwsGatewayDiscovery implements GatewayDiscovery {
  private vpcNames = new Map<string, string>();

  constructor(private ec2: Ec2Api) {}

  async listGateways(): Promise<Gateway[]> {
    const natGateways = await this.listNatGateways();
    const internetGateways = await this.listInternetGateways();

    const gateways: Gateway[] = [];

    for (const nat of natGateways) {
      if (!nat.NatGatewayId) continue;
      // Deleted NAT Gateways stay listed for about an hour
      if (nat.State === 'deleted') {
        logger.debug('Skipping deleted NAT Gateway', { gatewayId: nat.NatGatewayId });
        continue;
      }
      gateways.push(await this.toGateway(nat.NatGatewayId, 'NAT', nat.Tags, nat.VpcId));
    }

    for (const igw of internetGateways) {
      if (!igw.InternetGatewayId) continue;
      const vpcId = igw.Attachments?.[0]?.VpcId;
      gateways.push(await this.toGateway(igw.InternetGatewayId, 'IGW', igw.Tags, vpcId));
    }

    logger.info('Discovered gateways', {
      nat: gateways.filter(g => g.kind === 'NAT').length,
      igw: gateways.filter(g => g.kind === 'IGW').length,
    });

    return gateways;
  }

  private async toGateway(
    id: string,
    kind: GatewayKind,
    tags: Tag[] | undefined,
    vpcId: string | undefined
  ): Promise<Gateway> {
    const networkId = vpcId ?? null;
    const networkName = networkId ? await this.resolveNetworkName(networkId) : null;

    return {
      id,
      kind,
      displayName: resolveDisplayName(id, kind, getNameTag(tags), networkName),
      networkId,
      networkName,
    };
  }

  /** VPC Name tag, else the VPC id. A failed lookup also falls back to the id. */
  private async resolveNetworkName(vpcId: string): Promise<string> {
    const cached = this.vpcNames.get(vpcId);
    if (cached !== undefined) return cached;

    let name = vpcId;
    try {
      const response = await withAwsCircuitBreaker('ec2', () =>
        this.ec2.describeVpcs({ VpcIds: [vpcId] })
      );
      name = getNameTag(response.Vpcs?.[0]?.Tags) ?? vpcId;
    } catch (err) {
      logger.warn('Could not describe VPC, using its id as name', {
        vpcId,
        error: err instanceof Error ? err.message : String(err),
      });
    }

    this.vpcNames.set(vpcId, name);
    return name;
  }

  private async listNatGateways(): Promise<NatGateway[]> {
    const gateways: NatGateway[] = [];
    let nextToken: string | undefined;

    do {
      const response = await withAwsCircuitBreaker('ec2', () =>
        this.ec2.describeNatGateways({ MaxResults: 100, NextToken: nextToken })
      );
      gateways.push(...(response.NatGateways ?? []));
      nextToken = response.NextToken;
    } while (nextToken);

    return gateways;
  }

  private async listInternetGateways(): Promise<InternetGateway[]> {
    const gateways: InternetGateway[] = [];
    let nextToken: string | undefined;

    do {
      const response = await withAwsCircuitBreaker('ec2', () =>
        this.ec2.describeInternetGateways({ MaxResults: 100, NextToken: nextToken })
      );
      gateways.push(...(response.InternetGateways ?? []));
      nextToken = response.NextToken;
    } while (nextToken);

    return gateways;
  }
}
