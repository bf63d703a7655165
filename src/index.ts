export {
  buildSubjectPaths,
  listDatasetFiles,
  listRootFiles,
  listSubjectLabels,
} from "./files/partition.ts";
export { materializeSubject, withTemporaryDataset } from "./files/materialize.ts";
export {
  formatIssueTable,
  formatSubjectIssueTable,
  writeValidationFiles,
} from "./files/tsv.ts";
export type { WrittenFiles } from "./files/tsv.ts";
export {
  MalformedReportError,
  NoSubjectsFoundError,
  ValidatorExecutionError,
} from "./issues/errors.ts";
export { describeColumn, getFieldCatalog } from "./issues/fieldCatalog.ts";
export {
  decodeReport,
  flattenReport,
  ISSUE_TABLE_COLUMNS,
  parseValidatorOutput,
} from "./issues/flatten.ts";
export { ISSUE_FIELDS, normalizeIssue } from "./issues/normalize.ts";
export type { FieldRule } from "./issues/normalize.ts";
export { buildValidatorCall, DEFAULT_VALIDATOR } from "./setup/validatorCall.ts";
export type { ValidatorCallOptions } from "./setup/validatorCall.ts";
export { parseOptions } from "./setup/options.ts";
export type { ValidatorOptions } from "./setup/options.ts";
export { createLogger, LogLevels, silentLogger } from "./utils/logger.ts";
export type { LevelName, Logger, LoggerOptions } from "./utils/logger.ts";
export { consoleFormat } from "./utils/output.ts";
export { SubjectProgressTracker } from "./utils/progressTracker.ts";
export type { ValidationEvents } from "./utils/events.ts";
export { validate } from "./validators/bids.ts";
export type { ValidateOptions } from "./validators/bids.ts";
export { runValidator } from "./validators/runValidator.ts";
export type { ValidatorRun, ValidatorRunner } from "./validators/runValidator.ts";
export { run } from "./main.ts";
export type {
  CatalogColumn,
  FieldCatalog,
  FieldCatalogEntry,
  IssueTable,
  NormalizedIssueRecord,
  RawIssue,
  SubjectIssueRecord,
} from "./types/issues.ts";
export type { SubjectManifest } from "./types/manifest.ts";
export type { SummaryOutput, ValidationResult } from "./types/validation-result.ts";
