import { mkdirSync, writeFileSync } from 'node:fs'
import { join, relative } from 'node:path'
import type { SalesAnalysis } from '../analysis'
import { allComparisons, type AlgorithmBenchmarkReport } from '../benchmark'
import { createSilentLogger, type Logger } from '../utils/logger'
import { writeChart, type BarChartSpec } from './charts'
import { buildSummaryReport, type CleaningSummary } from './report-generator'
import { writeRankingCsv } from './ranking-csv'

export const REPORT_FILE = 'summary_report.txt'
export const TOP_CUSTOMERS_FILE = 'top_customers.csv'
export const TOP_PRODUCTS_FILE = 'top_products.csv'
export const FIGURES_DIR = 'figures'

export interface ExportInput {
  outputDir: string
  sourcePath: string
  /** Where the cleaned dataset was written */
  cleanedDataPath: string
  cleaning: CleaningSummary
  analysis: SalesAnalysis
  benchmarks: AlgorithmBenchmarkReport
}

export interface ExportedFigures {
  revenueByPeriod: string
  topProducts: string
  topCustomers: string
  lineTotalDistribution: string
  algorithmTiming: string
}

export interface ExportedFiles {
  report: string
  topCustomers: string
  topProducts: string
  figures: ExportedFigures
}

const FIGURE_KEYS: ReadonlyArray<keyof ExportedFigures> = [
  'revenueByPeriod',
  'topProducts',
  'topCustomers',
  'lineTotalDistribution',
  'algorithmTiming',
]

const toCurrency = (cents: number) => cents / 100
const formatAmount = (value: number) => value.toFixed(2)

/**
 * Chart specs for every figure, keyed like {@link ExportedFigures}.
 */
export function buildChartSpecs(
  analysis: SalesAnalysis,
  benchmarks: AlgorithmBenchmarkReport
): Record<keyof ExportedFigures, BarChartSpec> {
  const comparisons = allComparisons(benchmarks)

  return {
    revenueByPeriod: {
      title: `Revenue by ${analysis.granularity}`,
      xLabel: analysis.granularity,
      yLabel: 'Revenue',
      categories: analysis.revenueByPeriod.map((entry) => entry.period),
      series: [
        {
          name: 'Revenue',
          values: analysis.revenueByPeriod.map((entry) => toCurrency(entry.revenueCents)),
        },
      ],
      formatValue: formatAmount,
    },
    topProducts: {
      title: `Top ${analysis.topProducts.length} products by revenue`,
      yLabel: 'Revenue',
      categories: analysis.topProducts.map((entry) => entry.key),
      series: [
        {
          name: 'Revenue',
          values: analysis.topProducts.map((entry) => toCurrency(entry.revenueCents)),
        },
      ],
      formatValue: formatAmount,
    },
    topCustomers: {
      title: `Top ${analysis.topCustomers.length} customers by revenue`,
      yLabel: 'Revenue',
      categories: analysis.topCustomers.map((entry) => entry.key),
      series: [
        {
          name: 'Revenue',
          values: analysis.topCustomers.map((entry) => toCurrency(entry.revenueCents)),
        },
      ],
      formatValue: formatAmount,
    },
    lineTotalDistribution: {
      title: 'Order amount distribution',
      xLabel: 'Order amount (bin start)',
      yLabel: 'Orders',
      categories: analysis.lineTotalDistribution.map((bin) =>
        formatAmount(toCurrency(bin.lowerCents))
      ),
      series: [
        {
          name: 'Orders',
          values: analysis.lineTotalDistribution.map((bin) => bin.count),
        },
      ],
    },
    algorithmTiming: {
      title: 'Custom vs built-in mean time',
      yLabel: 'Mean time (ms)',
      categories: comparisons.map((result) => result.label),
      series: [
        { name: 'Custom', values: comparisons.map((result) => result.custom.meanMs) },
        { name: 'Built-in', values: comparisons.map((result) => result.builtin.meanMs) },
      ],
      formatValue: (value) => value.toFixed(3),
    },
  }
}

/**
 * Writes the ranked CSVs, the figures and the summary report under
 * `outputDir`. The report is written last so that it only lists files
 * that exist.
 *
 * @returns Paths of everything written
 */
export function exportResults(
  input: ExportInput,
  logger: Logger = createSilentLogger()
): ExportedFiles {
  const { outputDir, analysis, benchmarks } = input
  mkdirSync(outputDir, { recursive: true })

  const topCustomers = join(outputDir, TOP_CUSTOMERS_FILE)
  const topProducts = join(outputDir, TOP_PRODUCTS_FILE)
  writeRankingCsv(topCustomers, 'customer', analysis.topCustomers)
  writeRankingCsv(topProducts, 'product', analysis.topProducts)
  logger.info('Wrote rankings', { topCustomers, topProducts })

  const figuresDir = join(outputDir, FIGURES_DIR)
  const figures: ExportedFigures = {
    revenueByPeriod: join(figuresDir, 'revenue_by_period.png'),
    topProducts: join(figuresDir, 'top_products.png'),
    topCustomers: join(figuresDir, 'top_customers.png'),
    lineTotalDistribution: join(figuresDir, 'order_amount_distribution.png'),
    algorithmTiming: join(figuresDir, 'algorithm_timing.png'),
  }

  const specs = buildChartSpecs(analysis, benchmarks)
  for (const key of FIGURE_KEYS) {
    writeChart(figures[key], specs[key])
  }
  logger.info('Wrote figures', { directory: figuresDir })

  const report = join(outputDir, REPORT_FILE)
  const text = buildSummaryReport({
    sourcePath: input.sourcePath,
    cleaning: input.cleaning,
    analysis,
    benchmarks,
    files: {
      cleanedData: relative(outputDir, input.cleanedDataPath),
      topCustomers: relative(outputDir, topCustomers),
      topProducts: relative(outputDir, topProducts),
      figures: FIGURE_KEYS.map((key) => relative(outputDir, figures[key])),
    },
  })
  writeFileSync(report, text, 'utf8')
  logger.info('Wrote summary report', { path: report })

  return { report, topCustomers, topProducts, figures }
}
