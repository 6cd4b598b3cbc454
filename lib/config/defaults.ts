/**
 * @format
 * Default Configuration Values
 *
 * Centralized defaults shared by the compute constructs and stacks.
 */

import * as ec2 from 'aws-cdk-lib/aws-ec2';
import * as logs from 'aws-cdk-lib/aws-logs';

// =============================================================================
// Global Constants - Immutable compile-time values
// =============================================================================

/** Default AWS region if not specified */
export const DEFAULT_REGION = 'eu-west-1';

/** Default instance type for standalone instances and fleets */
export const DEFAULT_INSTANCE_TYPE = 't3.micro';

/** Root volume size for Linux images in GB (smallest size the public AMIs accept) */
export const LINUX_ROOT_VOLUME_GB = 8;

/** Root volume size for Windows images in GB */
export const WINDOWS_ROOT_VOLUME_GB = 30;

/** Largest GP3 volume in GB */
export const MAX_VOLUME_SIZE_GB = 16384;

/** GP3 baseline IOPS */
export const GP3_BASELINE_IOPS = 3000;

/** GP3 maximum IOPS */
export const GP3_MAX_IOPS = 16000;

/** GP3 baseline throughput in MiB/s */
export const GP3_BASELINE_THROUGHPUT = 125;

/** GP3 maximum throughput in MiB/s */
export const GP3_MAX_THROUGHPUT = 1000;

/** SSH port */
export const SSH_PORT = 22;

/** RDP port */
export const RDP_PORT = 3389;

/** HTTP port */
export const HTTP_PORT = 80;

/** HTTPS port */
export const HTTPS_PORT = 443;

/** Longest name an EC2 hostname label accepts */
export const MAX_INSTANCE_NAME_LENGTH = 63;

/**
 * Retention periods CloudWatch Logs accepts, in days.
 * Mirrors the values of `logs.RetentionDays` except INFINITE.
 */
export const ALLOWED_LOG_RETENTION_DAYS: readonly number[] = [
    1, 3, 5, 7, 14, 30, 60, 90, 120, 150, 180, 365, 400, 545, 731,
    1096, 1827, 2192, 2557, 2922, 3288, 3653,
];

// =============================================================================
// Configuration Objects - Grouped defaults using the constants above
// =============================================================================

/**
 * EBS defaults
 */
export const EBS_DEFAULTS = {
    /** Default volume type */
    volumeType: ec2.EbsDeviceVolumeType.GP3,
    /** GP3 IOPS */
    iops: GP3_BASELINE_IOPS,
    /** GP3 throughput */
    throughput: GP3_BASELINE_THROUGHPUT,
    /** Always encrypt */
    encrypted: true,
} as const;

/**
 * EC2 instance defaults
 */
export const INSTANCE_DEFAULTS = {
    /** Detailed (1-minute) CloudWatch monitoring */
    detailedMonitoring: true,
    /** Log group retention */
    logRetention: logs.RetentionDays.ONE_MONTH,
    /** Evaluation periods for the auto-recovery alarm */
    recoveryEvaluationPeriods: 2,
} as const;

/**
 * Auto Scaling defaults
 */
export const AUTO_SCALING_DEFAULTS = {
    minCapacity: 1,
    maxCapacity: 2,
    targetCpuUtilization: 70,
    healthCheckGracePeriodSeconds: 300,
    signalsTimeoutMinutes: 10,
} as const;
