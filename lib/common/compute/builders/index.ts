/**
 * @format
 * Compute Builders - Central Export
 */

export * from './user-data-builder';
