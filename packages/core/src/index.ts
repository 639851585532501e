/**
 * loadramp Core Package
 * Scenario catalog, run-state stores and the services that execute load ramps
 * @module @loadramp/core
 */

// Export artifact and run-state stores
export * from './stores';

// Export models
export * from './models';

// Export services
export * from './services';
