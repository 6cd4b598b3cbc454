/**
 * @format
 * Validation Utilities
 *
 * Input validation helpers for CDK constructs, stacks and configurations.
 * Predicates return a ValidationResult; `assertValid` turns a failed
 * result into a thrown Error at synth time.
 */

import * as logs from 'aws-cdk-lib/aws-logs';

import {
    ALLOWED_LOG_RETENTION_DAYS,
    GP3_BASELINE_IOPS,
    GP3_BASELINE_THROUGHPUT,
    GP3_MAX_IOPS,
    GP3_MAX_THROUGHPUT,
    MAX_VOLUME_SIZE_GB,
} from '../config/defaults';

/**
 * Validation result
 */
export interface ValidationResult {
    readonly valid: boolean;
    readonly error?: string;
}

const VALID: ValidationResult = { valid: true };

function invalid(error: string): ValidationResult {
    return { valid: false, error };
}

/**
 * Throw when a validation result is invalid
 */
export function assertValid(result: ValidationResult): void {
    if (!result.valid) {
        throw new Error(result.error);
    }
}

/**
 * Validate CIDR block format
 */
export function validateCidr(cidr: string): ValidationResult {
    const cidrRegex = /^(\d{1,3}\.){3}\d{1,3}\/\d{1,2}$/;
    if (!cidrRegex.test(cidr)) {
        return invalid(`Invalid CIDR format: ${cidr}. Expected format: x.x.x.x/y`);
    }

    // Validate IP octets
    const [address, prefixText] = cidr.split('/');
    const octets = address.split('.').map(Number);
    for (const octet of octets) {
        if (octet < 0 || octet > 255) {
            return invalid(`Invalid IP octet in CIDR: ${cidr}`);
        }
    }

    // Validate prefix
    const prefix = parseInt(prefixText, 10);
    if (prefix < 0 || prefix > 32) {
        return invalid(`Invalid prefix length in CIDR: ${cidr}. Must be 0-32`);
    }

    return VALID;
}

/**
 * Validate multiple CIDRs, throws on first invalid
 */
export function validateCidrs(cidrs: string[]): void {
    if (cidrs.length === 0) {
        throw new Error('At least one CIDR must be provided');
    }

    for (const cidr of cidrs) {
        assertValid(validateCidr(cidr));
    }
}

/**
 * Validate port number
 */
export function validatePort(port: number): ValidationResult {
    if (!Number.isInteger(port) || port < 1 || port > 65535) {
        return invalid(`Invalid port number: ${port}. Must be 1-65535`);
    }
    return VALID;
}

/**
 * Validate an inclusive port range
 */
export function validatePortRange(fromPort: number, toPort: number): ValidationResult {
    const from = validatePort(fromPort);
    if (!from.valid) {
        return from;
    }
    const to = validatePort(toPort);
    if (!to.valid) {
        return to;
    }
    if (fromPort > toPort) {
        return invalid(`Invalid port range: ${fromPort}-${toPort}. fromPort must not exceed toPort`);
    }
    return VALID;
}

/**
 * Validate GP3 volume configuration
 */
export function validateGp3Volume(iops?: number, throughput?: number): ValidationResult {
    if (iops !== undefined) {
        if (iops < GP3_BASELINE_IOPS || iops > GP3_MAX_IOPS) {
            return invalid(`GP3 IOPS must be between ${GP3_BASELINE_IOPS} and ${GP3_MAX_IOPS}`);
        }
    }

    if (throughput !== undefined) {
        if (throughput < GP3_BASELINE_THROUGHPUT || throughput > GP3_MAX_THROUGHPUT) {
            return invalid(
                `GP3 throughput must be between ${GP3_BASELINE_THROUGHPUT} and ${GP3_MAX_THROUGHPUT} MiB/s`,
            );
        }
    }

    return VALID;
}

/**
 * Validate GP3 throughput for a volume attached at instance launch.
 * The instance block device mapping carries no throughput, so only the
 * baseline applies; a launch template is needed for anything else.
 */
export function validateInstanceThroughput(deviceName: string, throughput?: number): ValidationResult {
    if (throughput === undefined || throughput === GP3_BASELINE_THROUGHPUT) {
        return VALID;
    }
    return invalid(
        `GP3 throughput ${throughput} MiB/s on ${deviceName} requires a launch template; ` +
        `standalone instances use the ${GP3_BASELINE_THROUGHPUT} MiB/s baseline`,
    );
}

/**
 * Validate an EBS volume size against the GP3 limits and an optional floor
 * (the root volume of an image cannot be smaller than its snapshot).
 */
export function validateVolumeSize(sizeGb: number, minimumGb = 1): ValidationResult {
    if (!Number.isInteger(sizeGb) || sizeGb < minimumGb || sizeGb > MAX_VOLUME_SIZE_GB) {
        return invalid(
            `Invalid volume size: ${sizeGb} GB. Must be an integer between ${minimumGb} and ${MAX_VOLUME_SIZE_GB}`,
        );
    }
    return VALID;
}

/**
 * Validate an instance type name such as 't3.micro' or 'm7i-flex.large'
 */
export function validateInstanceType(instanceType: string): ValidationResult {
    if (!/^[a-z][a-z0-9-]*\.[a-z0-9]+$/.test(instanceType)) {
        return invalid(`Invalid instance type: '${instanceType}'. Expected format: family.size (e.g. t3.micro)`);
    }
    return VALID;
}

/**
 * Validate an AMI id: 'ami-' followed by 8 or 17 hex characters
 */
export function validateAmiId(amiId: string): ValidationResult {
    if (!/^ami-([0-9a-f]{8}|[0-9a-f]{17})$/.test(amiId)) {
        return invalid(`Invalid AMI id: '${amiId}'. Expected 'ami-' followed by 8 or 17 hex characters`);
    }
    return VALID;
}

/**
 * Validate Auto Scaling capacity bounds
 */
export function validateCapacity(minCapacity: number, maxCapacity: number, desiredCapacity?: number): ValidationResult {
    for (const [label, value] of [['minCapacity', minCapacity], ['maxCapacity', maxCapacity]] as const) {
        if (!Number.isInteger(value) || value < 0) {
            return invalid(`ASG ${label} (${value}) must be a non-negative integer`);
        }
    }

    if (minCapacity > maxCapacity) {
        return invalid(`ASG capacity invalid: minCapacity (${minCapacity}) cannot exceed maxCapacity (${maxCapacity})`);
    }

    if (desiredCapacity !== undefined) {
        if (desiredCapacity < minCapacity || desiredCapacity > maxCapacity) {
            return invalid(
                `ASG desiredCapacity (${desiredCapacity}) must be between ` +
                `minCapacity (${minCapacity}) and maxCapacity (${maxCapacity})`,
            );
        }
    }

    return VALID;
}

/**
 * Validate a log retention period against the values CloudWatch Logs accepts
 */
export function validateLogRetentionDays(days: number): ValidationResult {
    if (!ALLOWED_LOG_RETENTION_DAYS.includes(days)) {
        return invalid(
            `Invalid log retention: ${days} days. Allowed: ${ALLOWED_LOG_RETENTION_DAYS.join(', ')}`,
        );
    }
    return VALID;
}

/**
 * Validate membership in a fixed set of values
 */
export function validateEnum(label: string, value: string, allowed: readonly string[]): ValidationResult {
    if (!allowed.includes(value)) {
        return invalid(`Invalid ${label}: '${value}'. Allowed: ${allowed.join(', ')}`);
    }
    return VALID;
}

/**
 * Convert a validated number of days into the CDK retention enum
 */
export function toRetentionDays(days: number): logs.RetentionDays {
    assertValid(validateLogRetentionDays(days));
    const match = Object.values(logs.RetentionDays).find(
        (value): value is logs.RetentionDays => typeof value === 'number' && value === days,
    );
    if (match === undefined) {
        throw new Error(`No CloudWatch retention period matches ${days} days`);
    }
    return match;
}
