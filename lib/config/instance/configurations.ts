/**
 * @format
 * EC2 Instance Project Configuration
 *
 * Per-environment settings for the standalone instance project.
 * Site-specific values come from the process environment:
 * VPC_ID, VPC_NAME, KEY_PAIR_NAME, TRUSTED_CIDRS, AMI_ID.
 *
 * Usage:
 * ```typescript
 * import { getInstanceConfig } from '../config/instance';
 * const config = getInstanceConfig(Environment.DEVELOPMENT);
 * ```
 */

import { AccessConfig, IngressRuleConfig, NetworkConfig, VolumeConfig, listFromEnv, networkFromEnv } from '../compute';
import { Environment, fromEnv } from '../environments';
import { OperatingSystem } from '../operating-systems';

// =============================================================================
// TYPE DEFINITIONS
// =============================================================================

export interface InstanceConfig {
    readonly os: OperatingSystem;
    /** Short workload code used in instance names, e.g. 'web' */
    readonly purpose: string;
    /** Instance type, e.g. 't3.micro' */
    readonly instanceType: string;
    /** Number of instances (names are indexed 01..N) */
    readonly instanceCount: number;
    /** Pin an AMI instead of the latest public image */
    readonly amiId?: string;
    /** Root volume size @default OS minimum */
    readonly rootVolumeSizeGb?: number;
    readonly additionalVolumes: VolumeConfig[];
    readonly keyPairName?: string;
    readonly detailedMonitoring: boolean;
    /** Block API termination */
    readonly terminationProtection: boolean;
    /** Recover the instance when the system status check fails */
    readonly autoRecovery: boolean;
    readonly associatePublicIp: boolean;
    /** Install the CloudWatch agent and forward system logs */
    readonly forwardLogs: boolean;
    readonly logRetentionDays: number;
    readonly network: NetworkConfig;
    readonly access: AccessConfig;
}

/**
 * Static part of the configuration; the getter overlays environment values.
 */
type StaticInstanceConfig = Omit<InstanceConfig, 'network' | 'access' | 'keyPairName' | 'amiId'> & {
    readonly subnetType: NetworkConfig['subnetType'];
    readonly allowRemoteAccess: boolean;
    readonly ingressRules: IngressRuleConfig[];
    readonly restrictEgress: boolean;
};

const WEB_INGRESS: IngressRuleConfig[] = [
    { protocol: 'tcp', port: 443, cidr: '0.0.0.0/0', description: 'HTTPS from anywhere' },
];

// =============================================================================
// CONFIGURATIONS BY ENVIRONMENT
// =============================================================================

export const INSTANCE_CONFIGS: Record<Environment, StaticInstanceConfig> = {
    [Environment.DEVELOPMENT]: {
        os: OperatingSystem.AMAZON_LINUX_2023,
        purpose: 'web',
        instanceType: 't3.micro',
        instanceCount: 1,
        additionalVolumes: [],
        detailedMonitoring: false,
        terminationProtection: false,
        autoRecovery: false,
        associatePublicIp: false,
        forwardLogs: true,
        logRetentionDays: 7,
        subnetType: 'private',
        allowRemoteAccess: false,
        ingressRules: WEB_INGRESS,
        restrictEgress: false,
    },

    [Environment.STAGING]: {
        os: OperatingSystem.AMAZON_LINUX_2023,
        purpose: 'web',
        instanceType: 't3.small',
        instanceCount: 1,
        additionalVolumes: [],
        detailedMonitoring: true,
        terminationProtection: false,
        autoRecovery: true,
        associatePublicIp: false,
        forwardLogs: true,
        logRetentionDays: 30,
        subnetType: 'private',
        allowRemoteAccess: false,
        ingressRules: WEB_INGRESS,
        restrictEgress: false,
    },

    [Environment.PRODUCTION]: {
        os: OperatingSystem.AMAZON_LINUX_2023,
        purpose: 'web',
        instanceType: 't3.medium',
        instanceCount: 2,
        rootVolumeSizeGb: 20,
        additionalVolumes: [
            { deviceName: '/dev/sdf', sizeGb: 50, deleteOnTermination: false },
        ],
        detailedMonitoring: true,
        terminationProtection: true,
        autoRecovery: true,
        associatePublicIp: false,
        forwardLogs: true,
        logRetentionDays: 90,
        subnetType: 'private',
        allowRemoteAccess: false,
        ingressRules: WEB_INGRESS,
        restrictEgress: true,
    },
};

// =============================================================================
// HELPER FUNCTIONS
// =============================================================================

/**
 * Get the instance project configuration for an environment,
 * with site-specific values read from the process environment.
 */
export function getInstanceConfig(env: Environment): InstanceConfig {
    const { subnetType, allowRemoteAccess, ingressRules, restrictEgress, ...rest } = INSTANCE_CONFIGS[env];
    const trustedCidrs = listFromEnv('TRUSTED_CIDRS') ?? [];

    return {
        ...rest,
        amiId: fromEnv('AMI_ID'),
        keyPairName: fromEnv('KEY_PAIR_NAME'),
        network: networkFromEnv(subnetType),
        access: {
            allowRemoteAccess: allowRemoteAccess || trustedCidrs.length > 0,
            trustedCidrs,
            ingressRules,
            restrictEgress,
        },
    };
}
