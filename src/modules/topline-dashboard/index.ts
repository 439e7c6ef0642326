// Constants
export {
  DASHBOARD_MODES,
  DEFAULT_INPUT_BUCKET,
  DEFAULT_INPUT_PREFIX,
  DIMENSIONS,
  HISTORICAL_COLUMNS,
  OTHER_REGION,
  REGION_ALLOW_LIST,
  TOPLINE_AGGREGATE_FIELDS,
  WILDCARD_LABEL,
  isDashboardMode,
} from './core/constants.js';

// Use cases
export { parseSummaryRecords } from './core/usecases/parse-summary-records.js';
export {
  normalizeRegion,
  normalizeSummaryRecord,
  parseDateToken,
} from './core/usecases/normalize-dimensions.js';
export {
  aggregateCube,
  dimensionSubsets,
  encodeDimensionKey,
  mergeCubes,
  type CubeBuild,
} from './core/usecases/aggregate-cube.js';
export { cubeRowTotal, filterCube, type FilteredCube } from './core/usecases/filter-cube.js';
export {
  reconcileSchema,
  serializeDimension,
  sortReportRows,
} from './core/usecases/reconcile-schema.js';
export {
  DEFAULT_REFORMAT_OPTIONS,
  reformatTopline,
  reformatToplinePartitions,
} from './core/usecases/reformat-topline.js';
export {
  buildInputLocation,
  buildOutputLocation,
  formatStorageUri,
  generateDashboard,
  type GenerateDashboardDeps,
  type GenerateDashboardInput,
  type GenerateDashboardResult,
} from './core/usecases/generate-dashboard.js';

// Shell
export {
  createS3Client,
  createS3ObjectStore,
  type S3ObjectStoreOptions,
} from './shell/storage/s3-object-store.js';
export {
  applyInputTyping,
  createParquetSummaryReader,
  parsePartitionColumns,
  type ParquetDecoder,
  type ParquetSummaryReaderOptions,
} from './shell/repo/parquet-summary-reader.js';
export {
  createCsvDashboardWriter,
  formatDashboardCsv,
  type CsvDashboardWriterOptions,
} from './shell/repo/csv-dashboard-writer.js';

// Ports
export type { DashboardWriter, ObjectStore, SummaryReader } from './core/ports.js';

// Types
export {
  WILDCARD,
  type Cube,
  type CubeRow,
  type DashboardMode,
  type Dimension,
  type DimensionValue,
  type DimensionValues,
  type NormalizedRecord,
  type ObjectLocation,
  type OutputCell,
  type OutputRow,
  type RawSummaryRow,
  type ReformatOptions,
  type ReformatResult,
  type ReformatStats,
  type ReportTable,
  type StorageLocation,
  type SummaryRecord,
  type Wildcard,
} from './core/types.js';

// Errors
export type {
  DecodeError,
  NoInputDataError,
  SchemaMismatchError,
  StorageError,
  StorageOperation,
  ToplineError,
} from './core/errors.js';
