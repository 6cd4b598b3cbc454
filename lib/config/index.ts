/**
 * @format
 * Configuration - Central Export
 *
 * Exports global configs (environments, defaults, projects) and
 * project-specific configs (instance, autoscaling).
 */

// Global configuration
export * from './environments';
export * from './defaults';
export * from './projects';
export * from './operating-systems';
export * from './compute';

// Project-specific configuration
export * as instanceConfig from './instance';
export * as autoScalingConfig from './autoscaling';
