/**
 * @format
 * EC2 Compute Modules - Library Entry Point
 */

export * from './aspects';
export * from './common';
export * from './config';
export * from './factories';
export * from './projects';
export * from './stacks';
export * from './utilities';
