/**
 * CLI Commands
 *
 * Exports all CLI command builders.
 * @module @loadramp/cli/commands
 */

export { createScenarioCommand } from './scenario.js';
export { createRunCommand, createSoakCommand, createFinalizeCommand } from './run.js';
export { createSuiteCommand } from './suite.js';
export { createClusterCommand } from './cluster.js';
export { createJobCommand } from './job.js';
export { createConfigCommand } from './config.js';
export { createCleanupCommand } from './cleanup.js';
