/**
 * Hooks barrel export.
 *
 * @module ui/hooks
 */

export { isFirstRun, markFirstRunComplete, useElapsedTime } from './useFirstRun.js';
export { useCommand, useExitOnComplete, type CommandState, type CommandStatus, type ExitOnCompleteOptions } from './useCommand.js';
