export type * from './types'
export * from './lib/errors'
export { loadSettings, LOG_LEVELS, T_TEST_MINIMUM_NUMBER_OF_RECORDS, type LogLevel, type Settings } from './lib/config'
export { createLogger, type Logger } from './lib/log'
export { fSurvival, logGamma, regularizedIncompleteBeta, studentTCdf, tTwoSidedPValue } from './lib/distributions'
export { symmetricEigen } from './lib/linalg'
export { combineGroupSummaries, combineMoments, combineScalarSummaries, pooledTTest, type PooledTTest } from './lib/pooling'
export { parseCSV } from './lib/csvParse'
export {
  aggregateGroupedTTest,
  aggregateLegacyTTest,
  extractTTestPartial,
  type TTestColumnResult,
  type TTestPartialOptions,
  type TTestResult,
} from './lib/ttest'
export { aggregateAnova, extractAnovaPartial, type AnovaPartialOptions, type AnovaResult } from './lib/anova'
export {
  aggregatePca,
  covarianceFromMoments,
  extractPcaPartial,
  type PcaOptions,
  type PcaPartialOptions,
  type PcaResult,
} from './lib/pca'
export {
  addStandardDeviations,
  aggregateSummaries,
  extractSummaryPartial,
  extractVariancePartial,
  globalMeans,
  type GlobalNumericSummary,
  type SummaryPartialOptions,
  type SummaryResult,
  type VariancePartialOptions,
} from './lib/summary'
export * from './lib/wire'
export { runPartial, type TaskMethod, type TaskRequest } from './lib/station'
export {
  InProcessStationClient,
  runAnova,
  runPca,
  runSummary,
  runTTest,
  type AnovaOptions,
  type InProcessClientOptions,
  type PcaRunOptions,
  type StationClient,
  type SummaryOptions,
  type TaskHandle,
  type TTestOptions,
} from './lib/federation'
export { validateAnalysisResult, type AnalysisOutput, type ResultValidation } from './lib/resultValidator'
export { formatP, toResultTable, type ResultRow, type ResultTable } from './lib/report'
