// ============================================
// Re-export all schemas and types
// ============================================

// Text - normalized text and keys
export {
  NormalizedTextSchema,
  KeySchema,
  type NormalizedText,
  type Key,
} from './text.js';

// Report - frequency analysis output
export {
  LetterSchema,
  LetterCountSchema,
  LetterReportSchema,
  DigramSchema,
  DigramCountSchema,
  DigramReportSchema,
  type LetterCount,
  type LetterReport,
  type DigramCount,
  type DigramReport,
  type FrequencyReport,
} from './report.js';

// CommandConfig - resolved CLI configuration
export {
  CipherNameSchema,
  DirectionSchema,
  AnalysisKindSchema,
  OutputSettingsSchema,
  CipherCommandConfigSchema,
  FrequencyCommandConfigSchema,
  CommandConfigSchema,
  type CipherName,
  type Direction,
  type AnalysisKind,
  type OutputSettings,
  type CipherCommandConfig,
  type FrequencyCommandConfig,
  type CommandConfig,
} from './commandConfig.js';
