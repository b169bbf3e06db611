export {
  CONFLICT_STRATEGIES,
  ConfigError,
  createRenameConfig,
  DEFAULT_CONFIG,
  paddingWidth,
  parseConflictStrategy,
  parsePadding,
  parseSortMethod,
  SORT_METHODS,
} from "./config.js";
export type { ConflictStrategy, PaddingMode, RenameConfig, SortMethod } from "./config.js";
export { describeRenameError, executePlan, undoSession, verifyResults } from "./executor.js";
export type { ExecuteOptions, ProgressSink, RenameResult, VerifyStats } from "./executor.js";
export { DEFAULT_HISTORY_PATH, HistoryLog } from "./history.js";
export type { HistoryLogOptions, RenameRecord, Session, SessionRecorder } from "./history.js";
export { generatePlan, resolveConflicts, sortFiles, summarizePlan, synthesizeName } from "./planner.js";
export type { PlanDraft, PlanEntry, PlanSummary } from "./planner.js";
export { readSettings, setHistoryPath, writeSettings } from "./settings.js";
export type { Settings } from "./settings.js";
export {
  resolvePath,
  validateBaseName,
  validateConfig,
  validateFileAccess,
  validateFileList,
  validatePathLength,
  validateRenamePair,
  validatePadding,
  validateSeparator,
  validateStartNumber,
} from "./validators.js";
export type { FileListReport, ValidationResult } from "./validators.js";
