/**
 * @format
 * Compute Configuration Types
 *
 * Plain, serialisable shapes shared by the per-project configurations
 * and the constructs that consume them.
 */

import { fromEnv } from './environments';

// =============================================================================
// NETWORK
// =============================================================================

/**
 * Where instances are placed.
 * VPC resolution order: vpcId, then vpcName, then the account's default VPC.
 */
export interface NetworkConfig {
    readonly vpcId?: string;
    readonly vpcName?: string;
    /** Subnet tier for instances */
    readonly subnetType: 'public' | 'private';
}

// =============================================================================
// ACCESS
// =============================================================================

export type IngressProtocol = 'tcp' | 'udp' | 'icmp' | 'all';

/**
 * One security group ingress rule.
 * Either `port` or `fromPort`/`toPort` (tcp/udp only).
 */
export interface IngressRuleConfig {
    readonly protocol: IngressProtocol;
    readonly port?: number;
    readonly fromPort?: number;
    readonly toPort?: number;
    readonly cidr: string;
    readonly description: string;
}

export interface AccessConfig {
    /**
     * Open the OS management port (SSH for Linux, RDP for Windows)
     * to `trustedCidrs`. Session Manager works without it.
     */
    readonly allowRemoteAccess: boolean;
    /** CIDRs allowed on the management port */
    readonly trustedCidrs: string[];
    /** Application ingress rules */
    readonly ingressRules: IngressRuleConfig[];
    /** Limit egress to HTTP/HTTPS instead of all traffic */
    readonly restrictEgress: boolean;
}

// =============================================================================
// STORAGE
// =============================================================================

/**
 * Additional EBS data volume.
 */
export interface VolumeConfig {
    /** Device name, e.g. /dev/sdf */
    readonly deviceName: string;
    readonly sizeGb: number;
    readonly iops?: number;
    readonly throughput?: number;
    /** @default true */
    readonly deleteOnTermination?: boolean;
}

// =============================================================================
// SPOT
// =============================================================================

export type SpotAllocation = 'lowest-price' | 'capacity-optimized' | 'price-capacity-optimized';

/**
 * Spot distribution for a fleet. On-demand base capacity is the fallback
 * that keeps running when spot capacity is reclaimed.
 */
export interface SpotConfig {
    readonly onDemandBaseCapacity: number;
    /** Percentage of capacity above the base that is on-demand (0-100) */
    readonly onDemandPercentageAboveBase: number;
    readonly allocationStrategy: SpotAllocation;
    /** Extra instance types the fleet may launch, e.g. ['t3a.micro'] */
    readonly instanceTypeOverrides: string[];
    /** Maximum hourly price in USD @default on-demand price */
    readonly maxPrice?: string;
}

// =============================================================================
// ENVIRONMENT PARSING
// =============================================================================

/**
 * Split a comma-separated environment variable into trimmed, non-empty parts.
 */
export function listFromEnv(key: string): string[] | undefined {
    const raw = fromEnv(key);
    if (!raw) {
        return undefined;
    }
    return raw.split(',').map((part) => part.trim()).filter((part) => part.length > 0);
}

/**
 * Network placement from VPC_ID / VPC_NAME. With neither set the stacks use
 * the account's default VPC, which has public subnets only, so placement
 * switches to `public`.
 */
export function networkFromEnv(subnetType: NetworkConfig['subnetType']): NetworkConfig {
    const vpcId = fromEnv('VPC_ID');
    const vpcName = fromEnv('VPC_NAME');
    return {
        vpcId,
        vpcName,
        subnetType: vpcId || vpcName ? subnetType : 'public',
    };
}
