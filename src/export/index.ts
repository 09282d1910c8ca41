/**
 * Report, ranking and chart output.
 */

export {
  exportResults,
  buildChartSpecs,
  REPORT_FILE,
  TOP_CUSTOMERS_FILE,
  TOP_PRODUCTS_FILE,
  FIGURES_DIR,
  type ExportInput,
  type ExportedFiles,
  type ExportedFigures,
} from './exporter'

export {
  buildSummaryReport,
  benchmarkSection,
  bestPeriod,
  type CleaningSummary,
  type ReportFiles,
  type ReportInput,
} from './report-generator'

export { formatRankingCsv, writeRankingCsv } from './ranking-csv'

export {
  layoutBarChart,
  renderBarChart,
  writeChart,
  niceCeil,
  DEFAULT_CHART_DIMENSIONS,
  type BarSeries,
  type BarChartSpec,
  type BarRect,
  type AxisTick,
  type ChartDimensions,
  type ChartLayout,
  type ChartMargin,
  type Rect,
} from './charts'

export {
  formatCents,
  formatPercent,
  formatGrowth,
  formatDuration,
  formatRatio,
  generateTable,
  heading,
} from './format'
