/**
 * @format
 * Shared test constants
 *
 * Centralized constants for CDK stack tests to ensure consistency
 * and reduce duplication across test files.
 */

import { AccessConfig, NetworkConfig } from '../../lib/config/compute';

/**
 * Standard AWS environment for testing
 * Uses a fake account ID that follows AWS account format
 */
export const TEST_ENV = {
    account: '123456789012',
    region: 'us-east-1',
} as const;

/**
 * EU region environment for testing
 */
export const TEST_ENV_EU = {
    account: '123456789012',
    region: 'eu-west-1',
} as const;

/**
 * Create a test environment with custom region
 */
export function createTestEnv(region: string = 'us-east-1') {
    return {
        account: '123456789012',
        region,
    };
}

/**
 * Common CIDR blocks for security group testing
 */
export const TEST_CIDRS = {
    /** Single host /32 CIDR */
    single: ['10.0.0.1/32'],
    /** Multiple CIDRs for testing multi-source rules */
    multiple: ['10.0.0.1/32', '192.168.1.0/24'],
    /** Network range CIDR */
    network: ['172.16.0.0/16'],
};

/**
 * Default VPC configuration for testing.
 * One NAT gateway so PRIVATE_WITH_EGRESS subnets exist.
 */
export const DEFAULT_VPC_CONFIG = {
    maxAzs: 2,
    natGateways: 1,
} as const;

/** Placement used by stack tests (lookups resolve to CDK's dummy VPC) */
export const TEST_NETWORK: NetworkConfig = {
    vpcName: 'test-vpc',
    subnetType: 'private',
};

/** Access settings with one HTTPS rule and no management port */
export const TEST_ACCESS: AccessConfig = {
    allowRemoteAccess: false,
    trustedCidrs: [],
    ingressRules: [
        { protocol: 'tcp', port: 443, cidr: '0.0.0.0/0', description: 'HTTPS from anywhere' },
    ],
    restrictEgress: false,
};
