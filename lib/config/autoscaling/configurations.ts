/**
 * @format
 * Auto Scaling Project Configuration
 *
 * Per-environment fleet settings. `source` selects how instances are
 * described to the Auto Scaling group:
 * - 'launchTemplate': a launch template carries AMI, type, volumes and role
 * - 'instance': AMI and type are given to the group directly
 *
 * Spot distribution requires the launch template source.
 */

import { AccessConfig, IngressRuleConfig, NetworkConfig, SpotConfig, listFromEnv, networkFromEnv } from '../compute';
import { Environment, fromEnv } from '../environments';
import { OperatingSystem } from '../operating-systems';

// =============================================================================
// TYPE DEFINITIONS
// =============================================================================

export type FleetSource = 'launchTemplate' | 'instance';

export interface ScalingConfig {
    readonly targetCpuUtilization: number;
    readonly cooldownSeconds: number;
    readonly estimatedInstanceWarmupSeconds: number;
}

export interface AutoScalingConfig {
    readonly os: OperatingSystem;
    readonly purpose: string;
    readonly instanceType: string;
    readonly source: FleetSource;
    readonly amiId?: string;
    readonly rootVolumeSizeGb?: number;
    readonly keyPairName?: string;
    readonly minCapacity: number;
    readonly maxCapacity: number;
    /** Leave undefined to keep the current size on redeploy */
    readonly desiredCapacity?: number;
    /** Undefined disables the CPU target tracking policy */
    readonly scaling?: ScalingConfig;
    /** Undefined runs on-demand only */
    readonly spot?: SpotConfig;
    readonly detailedMonitoring: boolean;
    readonly healthCheckGracePeriodSeconds: number;
    readonly useSignals: boolean;
    readonly enableTerminationLifecycleHook: boolean;
    readonly forwardLogs: boolean;
    readonly logRetentionDays: number;
    readonly network: NetworkConfig;
    readonly access: AccessConfig;
}

type StaticAutoScalingConfig = Omit<AutoScalingConfig, 'network' | 'access' | 'keyPairName' | 'amiId'> & {
    readonly subnetType: NetworkConfig['subnetType'];
    readonly ingressRules: IngressRuleConfig[];
    readonly restrictEgress: boolean;
};

const APP_INGRESS: IngressRuleConfig[] = [
    { protocol: 'tcp', port: 8080, cidr: '10.0.0.0/8', description: 'Application port from the VPC range' },
];

const DEFAULT_SCALING: ScalingConfig = {
    targetCpuUtilization: 70,
    cooldownSeconds: 300,
    estimatedInstanceWarmupSeconds: 300,
};

// =============================================================================
// CONFIGURATIONS BY ENVIRONMENT
// =============================================================================

export const AUTO_SCALING_CONFIGS: Record<Environment, StaticAutoScalingConfig> = {
    [Environment.DEVELOPMENT]: {
        os: OperatingSystem.AMAZON_LINUX_2023,
        purpose: 'app',
        instanceType: 't3.micro',
        source: 'launchTemplate',
        minCapacity: 1,
        maxCapacity: 2,
        scaling: DEFAULT_SCALING,
        spot: {
            onDemandBaseCapacity: 0,
            onDemandPercentageAboveBase: 0,
            allocationStrategy: 'price-capacity-optimized',
            instanceTypeOverrides: ['t3a.micro'],
        },
        detailedMonitoring: false,
        healthCheckGracePeriodSeconds: 300,
        useSignals: false,
        enableTerminationLifecycleHook: false,
        forwardLogs: true,
        logRetentionDays: 7,
        subnetType: 'private',
        ingressRules: APP_INGRESS,
        restrictEgress: false,
    },

    [Environment.STAGING]: {
        os: OperatingSystem.AMAZON_LINUX_2023,
        purpose: 'app',
        instanceType: 't3.small',
        source: 'launchTemplate',
        minCapacity: 1,
        maxCapacity: 3,
        scaling: DEFAULT_SCALING,
        spot: {
            onDemandBaseCapacity: 1,
            onDemandPercentageAboveBase: 0,
            allocationStrategy: 'price-capacity-optimized',
            instanceTypeOverrides: ['t3a.small'],
        },
        detailedMonitoring: true,
        healthCheckGracePeriodSeconds: 300,
        useSignals: true,
        enableTerminationLifecycleHook: false,
        forwardLogs: true,
        logRetentionDays: 30,
        subnetType: 'private',
        ingressRules: APP_INGRESS,
        restrictEgress: false,
    },

    [Environment.PRODUCTION]: {
        os: OperatingSystem.AMAZON_LINUX_2023,
        purpose: 'app',
        instanceType: 't3.medium',
        source: 'launchTemplate',
        rootVolumeSizeGb: 20,
        minCapacity: 2,
        maxCapacity: 6,
        scaling: { ...DEFAULT_SCALING, targetCpuUtilization: 60 },
        spot: {
            onDemandBaseCapacity: 2,
            onDemandPercentageAboveBase: 50,
            allocationStrategy: 'capacity-optimized',
            instanceTypeOverrides: ['t3a.medium', 'm5.large'],
        },
        detailedMonitoring: true,
        healthCheckGracePeriodSeconds: 300,
        useSignals: true,
        enableTerminationLifecycleHook: true,
        forwardLogs: true,
        logRetentionDays: 90,
        subnetType: 'private',
        ingressRules: APP_INGRESS,
        restrictEgress: true,
    },
};

// =============================================================================
// HELPER FUNCTIONS
// =============================================================================

/**
 * Get the Auto Scaling project configuration for an environment,
 * with site-specific values read from the process environment.
 */
export function getAutoScalingConfig(env: Environment): AutoScalingConfig {
    const { subnetType, ingressRules, restrictEgress, ...rest } = AUTO_SCALING_CONFIGS[env];
    const trustedCidrs = listFromEnv('TRUSTED_CIDRS') ?? [];

    return {
        ...rest,
        amiId: fromEnv('AMI_ID'),
        keyPairName: fromEnv('KEY_PAIR_NAME'),
        network: networkFromEnv(subnetType),
        access: {
            allowRemoteAccess: trustedCidrs.length > 0,
            trustedCidrs,
            ingressRules,
            restrictEgress,
        },
    };
}
