/**
 * Rainflow Engine - Session Module
 */

export * from './manager';
