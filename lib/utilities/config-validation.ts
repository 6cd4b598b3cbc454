/**
 * @format
 * Configuration Validation
 *
 * Whole-configuration checks run before any construct is created.
 * Each validator returns every problem it finds so a single run reports
 * all of them; `assertValidConfig` throws with the combined list.
 */

import { AutoScalingConfig } from '../config/autoscaling/configurations';
import { AccessConfig, IngressRuleConfig, NetworkConfig, SpotConfig, VolumeConfig } from '../config/compute';
import { Environment } from '../config/environments';
import { InstanceConfig } from '../config/instance/configurations';
import { getOperatingSystemProfile, isWindows, OperatingSystem } from '../config/operating-systems';

import { instanceName } from './naming';
import {
    ValidationResult,
    validateAmiId,
    validateCapacity,
    validateCidr,
    validateGp3Volume,
    validateInstanceThroughput,
    validateInstanceType,
    validateLogRetentionDays,
    validatePort,
    validatePortRange,
    validateVolumeSize,
} from './validation';

/** Device names AWS recommends for attached EBS data volumes */
export const DATA_DEVICE_NAME_PATTERN = /^\/dev\/(sd[f-p]|xvd[f-p])$/;

function collect(errors: string[], result: ValidationResult, context?: string): void {
    if (!result.valid && result.error) {
        errors.push(context ? `${context}: ${result.error}` : result.error);
    }
}

function collectThrown(errors: string[], check: () => unknown): void {
    try {
        check();
    } catch (error) {
        errors.push(error instanceof Error ? error.message : String(error));
    }
}

// =============================================================================
// SHARED SECTIONS
// =============================================================================

export function validateIngressRule(rule: IngressRuleConfig): ValidationResult {
    const cidr = validateCidr(rule.cidr);
    if (!cidr.valid) {
        return cidr;
    }

    if (rule.protocol === 'all' || rule.protocol === 'icmp') {
        if (rule.port !== undefined || rule.fromPort !== undefined || rule.toPort !== undefined) {
            return { valid: false, error: `Protocol '${rule.protocol}' rules cannot specify ports` };
        }
        return { valid: true };
    }

    if (rule.port !== undefined) {
        if (rule.fromPort !== undefined || rule.toPort !== undefined) {
            return { valid: false, error: 'Specify either port or fromPort/toPort, not both' };
        }
        return validatePort(rule.port);
    }

    if (rule.fromPort === undefined || rule.toPort === undefined) {
        return { valid: false, error: `Protocol '${rule.protocol}' rules need port or fromPort/toPort` };
    }
    return validatePortRange(rule.fromPort, rule.toPort);
}

export function validateAccessConfig(access: AccessConfig): string[] {
    const errors: string[] = [];

    if (access.allowRemoteAccess && access.trustedCidrs.length === 0) {
        errors.push('allowRemoteAccess requires at least one trusted CIDR');
    }
    access.trustedCidrs.forEach((cidr) => collect(errors, validateCidr(cidr), 'trustedCidrs'));
    access.ingressRules.forEach((rule, index) =>
        collect(errors, validateIngressRule(rule), `ingressRules[${index}]`),
    );

    return errors;
}

export function validateVolumes(
    os: OperatingSystem,
    rootVolumeSizeGb: number | undefined,
    additionalVolumes: VolumeConfig[],
): string[] {
    const errors: string[] = [];
    const profile = getOperatingSystemProfile(os);

    if (rootVolumeSizeGb !== undefined) {
        collect(errors, validateVolumeSize(rootVolumeSizeGb, profile.minimumRootVolumeGb), 'rootVolumeSizeGb');
    }

    const seen = new Set<string>();
    additionalVolumes.forEach((volume, index) => {
        const context = `additionalVolumes[${index}]`;
        if (!DATA_DEVICE_NAME_PATTERN.test(volume.deviceName)) {
            errors.push(`${context}: Invalid device name '${volume.deviceName}'. Use /dev/sd[f-p] or /dev/xvd[f-p]`);
        }
        if (seen.has(volume.deviceName)) {
            errors.push(`${context}: Duplicate device name '${volume.deviceName}'`);
        }
        seen.add(volume.deviceName);
        collect(errors, validateVolumeSize(volume.sizeGb), context);
        collect(errors, validateGp3Volume(volume.iops, volume.throughput), context);
    });

    return errors;
}

export function validateNetworkConfig(network: NetworkConfig): string[] {
    if (network.subnetType === 'private' && !network.vpcId && !network.vpcName) {
        return ['subnetType private requires vpcId or vpcName (the default VPC has public subnets only)'];
    }
    return [];
}

export function validateSpotConfig(spot: SpotConfig, maxCapacity: number): string[] {
    const errors: string[] = [];

    if (!Number.isInteger(spot.onDemandBaseCapacity) || spot.onDemandBaseCapacity < 0) {
        errors.push(`spot.onDemandBaseCapacity (${spot.onDemandBaseCapacity}) must be a non-negative integer`);
    } else if (spot.onDemandBaseCapacity > maxCapacity) {
        errors.push(
            `spot.onDemandBaseCapacity (${spot.onDemandBaseCapacity}) cannot exceed maxCapacity (${maxCapacity})`,
        );
    }
    if (spot.onDemandPercentageAboveBase < 0 || spot.onDemandPercentageAboveBase > 100) {
        errors.push(`spot.onDemandPercentageAboveBase (${spot.onDemandPercentageAboveBase}) must be 0-100`);
    }
    spot.instanceTypeOverrides.forEach((type) => collect(errors, validateInstanceType(type), 'spot.instanceTypeOverrides'));
    if (spot.maxPrice !== undefined && !/^\d+(\.\d+)?$/.test(spot.maxPrice)) {
        errors.push(`spot.maxPrice '${spot.maxPrice}' must be a decimal number of USD per hour`);
    }

    return errors;
}

// =============================================================================
// PROJECT CONFIGURATIONS
// =============================================================================

/**
 * Validate an EC2 instance project configuration.
 */
export function validateInstanceConfig(config: InstanceConfig, environment: Environment): string[] {
    const errors: string[] = [];

    collect(errors, validateInstanceType(config.instanceType));
    if (config.amiId !== undefined) {
        collect(errors, validateAmiId(config.amiId));
    }
    if (!Number.isInteger(config.instanceCount) || config.instanceCount < 1 || config.instanceCount > 99) {
        errors.push(`instanceCount (${config.instanceCount}) must be an integer between 1 and 99`);
    }
    collectThrown(errors, () =>
        instanceName({ os: config.os, environment, purpose: config.purpose, index: 1 }),
    );
    collect(errors, validateLogRetentionDays(config.logRetentionDays));
    errors.push(...validateNetworkConfig(config.network));
    if (config.associatePublicIp && config.network.subnetType !== 'public') {
        errors.push('associatePublicIp requires subnetType public');
    }

    errors.push(...validateVolumes(config.os, config.rootVolumeSizeGb, config.additionalVolumes));
    config.additionalVolumes.forEach((volume, index) =>
        collect(errors, validateInstanceThroughput(volume.deviceName, volume.throughput), `additionalVolumes[${index}]`),
    );
    errors.push(...validateAccessConfig(config.access));

    return errors;
}

/**
 * Validate an Auto Scaling project configuration.
 */
export function validateAutoScalingConfig(config: AutoScalingConfig, environment: Environment): string[] {
    const errors: string[] = [];

    collect(errors, validateInstanceType(config.instanceType));
    if (config.amiId !== undefined) {
        collect(errors, validateAmiId(config.amiId));
    }
    collectThrown(errors, () => instanceName({ os: config.os, environment, purpose: config.purpose }));
    collect(errors, validateCapacity(config.minCapacity, config.maxCapacity, config.desiredCapacity));
    collect(errors, validateLogRetentionDays(config.logRetentionDays));
    errors.push(...validateNetworkConfig(config.network));

    if (config.scaling) {
        const target = config.scaling.targetCpuUtilization;
        if (target <= 0 || target > 100) {
            errors.push(`scaling.targetCpuUtilization (${target}) must be within (0, 100]`);
        }
    }

    if (config.useSignals && isWindows(config.os)) {
        errors.push('useSignals requires a Linux operating system (user data sends the signal)');
    }

    if (config.spot) {
        if (config.source !== 'launchTemplate') {
            errors.push(`spot requires source 'launchTemplate' (got '${config.source}')`);
        }
        errors.push(...validateSpotConfig(config.spot, config.maxCapacity));
    }

    errors.push(...validateVolumes(config.os, config.rootVolumeSizeGb, []));
    errors.push(...validateAccessConfig(config.access));

    return errors;
}

/**
 * Throw a single Error listing every problem.
 */
export function assertValidConfig(label: string, errors: string[]): void {
    if (errors.length > 0) {
        throw new Error(`Invalid ${label} configuration:\n  - ${errors.join('\n  - ')}`);
    }
}
