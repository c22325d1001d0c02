/**
 * Rainflow Engine - Engine Module
 * ===============================
 * Exports all engine components
 */

export * from './classes';
export * from './turning-points';
export * from './residue';
export * from './woehler';
export * from './damage';
export * from './tp-store';
export * from './rainflow-config';
export * from './counts';
export * from './counting';
export * from './engine';
export * from './finalizer';
export * from './histograms';
export * from './session';
export * from './rfc';
