/**
 * Rainflow Engine - Utilities
 */

export * from './logger';
