// Main export file - re-exports all public APIs

// Core layer exports
export * from './core/index.js';

// Built-in providers
export * from './providers/index.js';

// Configuration exports
export * from './config/index.js';
