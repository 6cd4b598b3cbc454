/**
 * @format
 * Security Constructs - Central Export
 */

export * from './security-group';
