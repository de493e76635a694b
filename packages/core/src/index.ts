/**
 * @pegforge/core
 *
 * Shared infrastructure for the pegforge passes: configuration, scoped
 * logging and the diagnostic catalog with its CLI renderer.
 *
 * @module
 */

export {
  config,
  defineConfig,
  loadConfigFromEnv,
  type PegforgeConfig,
  type MemoizationMode,
  type MemoizationConfig,
  type TokenizerConfig,
  type CodegenConfig,
} from "./config.js";

export { createLogger, silentLogger, type Logger, type LoggerOptions } from "./logger.js";

export {
  DiagnosticCategory,
  DiagnosticBuilder,
  PegforgeError,
  getDiagnosticDescriptor,
  explainDiagnostic,
  renderDiagnosticCLI,
  renderDiagnosticsCLI,
  DIAGNOSTIC_CATALOG,
  PEG1001,
  PEG1002,
  PEG1003,
  PEG1004,
  PEG1005,
  PEG1006,
  PEG2001,
  PEG2002,
  PEG3001,
  PEG3002,
  PEG3003,
  PEG4001,
  PEG5001,
  type DiagnosticDescriptor,
  type RichDiagnostic,
  type SourceSpan,
  type Severity,
  type CLIRenderOptions,
} from "./diagnostics.js";
