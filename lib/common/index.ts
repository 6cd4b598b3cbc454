/**
 * @format
 * Common Constructs - Central Export
 *
 * Reusable CDK constructs organized by resource type.
 */

// Compute constructs (EC2 instance, launch template, ASG) and builders
export * from './compute';

// IAM constructs (instance role / profile)
export * from './iam';

// Security constructs (security groups)
export * from './security';
