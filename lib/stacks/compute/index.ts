/**
 * @format
 * Compute Stacks - Central Export
 */

export * from './base-stack';
export * from './instance-stack';
export * from './auto-scaling-stack';
