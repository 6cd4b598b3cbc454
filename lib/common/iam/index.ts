/**
 * @format
 * IAM Constructs - Central Export
 */

export * from './instance-role';
