/**
 * Rainflow Engine - Main Entry Point
 * ==================================
 * Exports all public API
 */

// Types
export * from './types';

// Core
export * from './core/config';
export * from './core/errors';
export * from './core/schemas';

// Engine
export * from './engine';

// Session
export * from './session';

// Utils
export * from './utils';

// CLI
export { startCLI, RainflowCLI } from './cli';

// Web
export { startWebServer, createApiHandlers, handleWebSocketMessage } from './web/server';
