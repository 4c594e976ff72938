/**
 * Quarry CLI
 *
 * @module packages/cli
 */

export { createProgram, registerCommands } from './commands/index.js';
export { createContext, withOperator, type CommandContext, type GlobalOptions } from './commands/context.js';
export {
  ExitCodes,
  exitCodeFor,
  formatError,
  handleError,
  shouldUseColor,
  isInteractive,
  findSimilarCommands,
  type ExitCode,
} from './commands/utils.js';
