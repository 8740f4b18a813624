export * from './lib/names';
export * from './lib/sheets';
export * from './lib/matching';
export { mergeSheets, assignmentIndex } from './lib/merge/mergeEngine';
export type { MergeResult } from './lib/merge/mergeEngine';
export { MergedTable } from './lib/merge/mergedTable';
export { formatWarning, formatWarnings, summarizeMerge } from './lib/merge/report';
export type { MergeSummary } from './lib/merge/report';
export { composeFusionSheet, blockPositions } from './lib/output/composeFusionSheet';
export { ExcelWorkbook, outputPathFor, toCellValue } from './lib/workbook/excelWorkbook';
export { loadConfig, configFromEnv, FusionConfigSchema, DEFAULT_CONFIG } from './lib/config';
export type { FusionConfig, FusionConfigInput } from './lib/config';
export { FusionError, WorkbookFormatError, EmptyRosterError, ConfigError } from './lib/errors';
export type { FusionErrorCode } from './lib/errors';
export type * from './types/fusion';
export type * from './types/workbook';
