/**
 * @format
 * Compute Module - Central Export
 *
 * Organized into:
 * - constructs/ - CDK constructs (EC2 instance, launch template, ASG, machine image)
 * - builders/   - Builder patterns (UserDataBuilder)
 */

// Constructs
export * from './constructs';

// Builders
export * from './builders';
