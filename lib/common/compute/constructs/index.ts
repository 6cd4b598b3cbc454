/**
 * @format
 * Compute Constructs - Central Export
 */

export * from './auto-scaling-group';
export * from './block-devices';
export * from './ec2-instance';
export * from './launch-template';
export * from './machine-image';
