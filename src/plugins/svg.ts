/**
 * Minimal SVG bar chart writer shared by the built-in modules.
 *
 * Bars are horizontal, one per row, each spanning [start, end] on a shared
 * linear axis that always includes zero.
 */

import { mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import type { PlotConfig } from "../types/module.js";

export interface Bar {
  label: string;
  start: number;
  end: number;
}

export interface BarChartSpec {
  title: string;
  axisLabel: string;
  bars: readonly Bar[];
  /** Output resolution; the drawing is laid out at 100 dpi and scaled */
  dpi: number;
}

const LAYOUT = {
  width: 800,
  marginLeft: 180,
  marginRight: 60,
  marginTop: 56,
  marginBottom: 48,
  rowHeight: 26,
  barHeight: 18,
} as const;

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

export function formatValue(value: number): string {
  return Number.isInteger(value) ? String(value) : value.toFixed(2);
}

export function renderBarChart(spec: BarChartSpec): string {
  const { width, marginLeft, marginRight, marginTop, marginBottom, rowHeight, barHeight } = LAYOUT;
  const height = marginTop + spec.bars.length * rowHeight + marginBottom;
  const scale = spec.dpi / 100;

  const lo = Math.min(0, ...spec.bars.map((b) => b.start));
  let hi = Math.max(0, ...spec.bars.map((b) => b.end));
  if (hi === lo) {
    hi = lo + 1;
  }
  const plotWidth = width - marginLeft - marginRight;
  const x = (value: number): number => marginLeft + ((value - lo) / (hi - lo)) * plotWidth;

  const rows = spec.bars.map((bar, i) => {
    const y = marginTop + i * rowHeight;
    const x0 = x(Math.min(bar.start, bar.end));
    const x1 = x(Math.max(bar.start, bar.end));
    return [
      `  <text x="${marginLeft - 8}" y="${y + barHeight - 4}" text-anchor="end">${escapeXml(bar.label)}</text>`,
      `  <rect x="${x0.toFixed(1)}" y="${y}" width="${(x1 - x0).toFixed(1)}" height="${barHeight}" fill="#4c78a8"/>`,
      `  <text x="${(x1 + 4).toFixed(1)}" y="${y + barHeight - 4}">${formatValue(bar.end)}</text>`,
    ].join("\n");
  });

  const axisY = marginTop + spec.bars.length * rowHeight + 8;

  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${Math.round(width * scale)}" height="${Math.round(height * scale)}" viewBox="0 0 ${width} ${height}" font-family="sans-serif" font-size="12">`,
    `  <title>${escapeXml(spec.title)}</title>`,
    `  <text x="${width / 2}" y="28" text-anchor="middle" font-size="16">${escapeXml(spec.title)}</text>`,
    ...rows,
    `  <line x1="${marginLeft}" y1="${axisY}" x2="${width - marginRight}" y2="${axisY}" stroke="#333"/>`,
    `  <text x="${marginLeft}" y="${axisY + 16}">${formatValue(lo)}</text>`,
    `  <text x="${width - marginRight}" y="${axisY + 16}" text-anchor="end">${formatValue(hi)}</text>`,
    `  <text x="${width / 2}" y="${axisY + 32}" text-anchor="middle">${escapeXml(spec.axisLabel)}</text>`,
    `</svg>`,
    "",
  ].join("\n");
}

/**
 * Write a chart to `<outputDir>/<itemId>_<runId>.svg` and return the path.
 */
export function writeSvgPlot(config: PlotConfig, itemId: string, svg: string): string {
  mkdirSync(config.outputDir, { recursive: true });
  const outputPath = join(config.outputDir, `${itemId}_${config.runId}.svg`);
  writeFileSync(outputPath, svg, "utf-8");
  return outputPath;
}
