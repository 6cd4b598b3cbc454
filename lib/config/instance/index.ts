/**
 * @format
 * EC2 Instance Project Configuration - Central Export
 */

export * from './configurations';
