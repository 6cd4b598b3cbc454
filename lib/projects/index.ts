/**
 * @format
 * Projects - Central Export
 */

export * from './instance';
export * from './autoscaling';
