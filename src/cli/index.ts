/**
 * CLI Module Exports
 *
 * Barrel export for all CLI components.
 * This is the main entry point for importing CLI functionality.
 */

// ============================================
// Program Configuration
// ============================================

export {
  // Main program creation
  createProgram,
  // Option parsing
  parseCliOptions,
  // Types
  type InvocationHandler,
} from './program.js';

// ============================================
// Command Execution
// ============================================

export {
  // Main command function
  runCommand,
  // Frequency rendering
  renderAnalysis,
  // Types
  type CommandIO,
  type CommandResult,
} from './runCommand.js';

// ============================================
// Error Handling
// ============================================

export {
  // Error handling wrapper
  withErrorHandling,
  // Error handler
  handleCommandError,
  // Exit codes
  EXIT_CODES,
  // Error classification
  isConfigError,
  getExitCode,
  createErrorContext,
  // Types
  type ExitCode,
  type ErrorContext,
  type ErrorHandlingResult,
} from './errorHandler.js';
