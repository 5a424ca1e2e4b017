/**
 * @trainlaunch/cli - training run launcher
 *
 * Public API exports for the CLI package
 */

export * from './core/argument-parser.js';
export * from './core/config-loader.js';
export * from './core/error-handler.js';
export * from './core/launch-command.js';
export * from './core/launch-context.js';
export * from './core/launcher.js';
export * from './core/run-cli.js';
export * from './core/run-log.js';
export * from './core/snapshot.js';
export * from './core/snapshot-filter.js';
export * from './core/tee.js';
export * from './command-defs/launch.js';
export * from './handlers/launch/snapshot-and-launch.js';
