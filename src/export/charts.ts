/**
 * Grouped bar charts rendered to PNG.
 *
 * Geometry is computed by {@link layoutBarChart} without touching a canvas,
 * so it can be checked directly; {@link renderBarChart} only draws it.
 * @module export/charts
 */

import { mkdirSync, writeFileSync } from 'node:fs'
import { dirname } from 'node:path'
import { createCanvas } from '@napi-rs/canvas'

export interface BarSeries {
  name: string
  values: number[]
}

export interface BarChartSpec {
  title: string
  xLabel?: string
  yLabel: string
  categories: string[]
  series: BarSeries[]
  /** Tick label formatter (default: up to two decimals) */
  formatValue?: (value: number) => string
}

export interface ChartMargin {
  top: number
  right: number
  bottom: number
  left: number
}

export interface ChartDimensions {
  width: number
  height: number
  margin: ChartMargin
}

export interface Rect {
  x: number
  y: number
  width: number
  height: number
}

export interface BarRect extends Rect {
  series: number
  category: number
  value: number
}

export interface AxisTick {
  value: number
  y: number
  label: string
}

export interface ChartLayout {
  width: number
  height: number
  plot: Rect
  /** Top of the value axis */
  maxValue: number
  bars: BarRect[]
  ticks: AxisTick[]
  /** Horizontal centre of each category group */
  categoryCenters: number[]
}

export const DEFAULT_CHART_DIMENSIONS: ChartDimensions = {
  width: 960,
  height: 540,
  margin: { top: 60, right: 30, bottom: 110, left: 100 },
}

const TICK_INTERVALS = 5
const GROUP_PADDING = 0.1
const NICE_STEPS = [1, 2, 2.5, 5, 10]
const PALETTE = ['#4e79a7', '#f28e2b', '#59a14f', '#e15759', '#76b7b2']
const MAX_LABEL_LENGTH = 16

/**
 * Rounds up to 1, 2, 2.5 or 5 times a power of ten. Non-positive input
 * gives 1 so an all-zero chart still has an axis.
 *
 * @example
 * ```typescript
 * niceCeil(3000) // 5000
 * niceCeil(180)  // 200
 * niceCeil(0)    // 1
 * ```
 */
export function niceCeil(value: number): number {
  if (!(value > 0)) return 1

  const magnitude = 10 ** Math.floor(Math.log10(value))
  const fraction = value / magnitude
  const step = NICE_STEPS.find((candidate) => fraction <= candidate) ?? 10
  return step * magnitude
}

function defaultFormat(value: number): string {
  return String(Math.round(value * 100) / 100)
}

/**
 * Computes bar, tick and label positions for a grouped bar chart.
 * Each category gets an equal slot; bars of the same category sit side by
 * side in series order, with 10% of the slot left empty on either side.
 */
export function layoutBarChart(
  spec: BarChartSpec,
  dimensions: ChartDimensions = DEFAULT_CHART_DIMENSIONS
): ChartLayout {
  const { width, height, margin } = dimensions
  const plot: Rect = {
    x: margin.left,
    y: margin.top,
    width: width - margin.left - margin.right,
    height: height - margin.top - margin.bottom,
  }

  const values = spec.series.flatMap((series) => series.values)
  const maxValue = niceCeil(Math.max(0, ...values))
  const format = spec.formatValue ?? defaultFormat

  const categoryCount = spec.categories.length
  const groupWidth = categoryCount > 0 ? plot.width / categoryCount : 0
  const padding = groupWidth * GROUP_PADDING
  const barWidth =
    spec.series.length > 0
      ? (groupWidth - 2 * padding) / spec.series.length
      : 0
  const baseline = plot.y + plot.height

  const bars: BarRect[] = []
  spec.series.forEach((series, seriesIndex) => {
    spec.categories.forEach((_, categoryIndex) => {
      const value = Math.max(0, series.values[categoryIndex] ?? 0)
      const barHeight = (value / maxValue) * plot.height
      bars.push({
        series: seriesIndex,
        category: categoryIndex,
        value,
        x: plot.x + categoryIndex * groupWidth + padding + seriesIndex * barWidth,
        y: baseline - barHeight,
        width: barWidth,
        height: barHeight,
      })
    })
  })

  const ticks: AxisTick[] = []
  for (let i = 0; i <= TICK_INTERVALS; i++) {
    const value = (maxValue * i) / TICK_INTERVALS
    ticks.push({
      value,
      y: baseline - (plot.height * i) / TICK_INTERVALS,
      label: format(value),
    })
  }

  return {
    width,
    height,
    plot,
    maxValue,
    bars,
    ticks,
    categoryCenters: spec.categories.map(
      (_, index) => plot.x + index * groupWidth + groupWidth / 2
    ),
  }
}

function truncateLabel(label: string): string {
  return label.length > MAX_LABEL_LENGTH
    ? `${label.slice(0, MAX_LABEL_LENGTH - 1)}…`
    : label
}

/**
 * Draws a chart and encodes it as PNG.
 */
export function renderBarChart(
  spec: BarChartSpec,
  dimensions: ChartDimensions = DEFAULT_CHART_DIMENSIONS
): Buffer {
  const layout = layoutBarChart(spec, dimensions)
  const { plot } = layout
  const canvas = createCanvas(layout.width, layout.height)
  const ctx = canvas.getContext('2d')

  ctx.fillStyle = '#ffffff'
  ctx.fillRect(0, 0, layout.width, layout.height)

  ctx.fillStyle = '#222222'
  ctx.font = 'bold 20px sans-serif'
  ctx.textAlign = 'center'
  ctx.textBaseline = 'middle'
  ctx.fillText(spec.title, layout.width / 2, plot.y / 2)

  // Grid and value axis
  ctx.font = '12px sans-serif'
  ctx.textAlign = 'right'
  ctx.lineWidth = 1
  for (const tick of layout.ticks) {
    ctx.strokeStyle = '#e0e0e0'
    ctx.beginPath()
    ctx.moveTo(plot.x, tick.y)
    ctx.lineTo(plot.x + plot.width, tick.y)
    ctx.stroke()
    ctx.fillStyle = '#444444'
    ctx.fillText(tick.label, plot.x - 8, tick.y)
  }

  for (const bar of layout.bars) {
    ctx.fillStyle = PALETTE[bar.series % PALETTE.length]
    ctx.fillRect(bar.x, bar.y, bar.width, bar.height)
  }

  ctx.strokeStyle = '#444444'
  ctx.beginPath()
  ctx.moveTo(plot.x, plot.y)
  ctx.lineTo(plot.x, plot.y + plot.height)
  ctx.lineTo(plot.x + plot.width, plot.y + plot.height)
  ctx.stroke()

  // Category labels, slanted so long names do not overlap
  ctx.fillStyle = '#444444'
  ctx.textAlign = 'right'
  ctx.textBaseline = 'middle'
  spec.categories.forEach((category, index) => {
    ctx.save()
    ctx.translate(layout.categoryCenters[index], plot.y + plot.height + 12)
    ctx.rotate(-Math.PI / 6)
    ctx.fillText(truncateLabel(category), 0, 0)
    ctx.restore()
  })

  ctx.font = '14px sans-serif'
  ctx.textAlign = 'center'
  ctx.save()
  ctx.translate(24, plot.y + plot.height / 2)
  ctx.rotate(-Math.PI / 2)
  ctx.fillText(spec.yLabel, 0, 0)
  ctx.restore()

  if (spec.xLabel) {
    ctx.fillText(spec.xLabel, plot.x + plot.width / 2, layout.height - 16)
  }

  if (spec.series.length > 1) {
    ctx.font = '12px sans-serif'
    ctx.textAlign = 'left'
    spec.series.forEach((series, index) => {
      const y = plot.y + 10 + index * 18
      const x = plot.x + plot.width - 150
      ctx.fillStyle = PALETTE[index % PALETTE.length]
      ctx.fillRect(x, y - 6, 12, 12)
      ctx.fillStyle = '#222222'
      ctx.fillText(series.name, x + 18, y)
    })
  }

  return canvas.toBuffer('image/png')
}

/**
 * Renders a chart and writes it to `path`, creating the directory.
 */
export function writeChart(
  path: string,
  spec: BarChartSpec,
  dimensions: ChartDimensions = DEFAULT_CHART_DIMENSIONS
): void {
  mkdirSync(dirname(path), { recursive: true })
  writeFileSync(path, renderBarChart(spec, dimensions))
}
