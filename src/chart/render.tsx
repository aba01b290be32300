/**
 * Static chart output: the recharts tree is rendered to markup on the server
 * and written as a standalone HTML page.
 */

import { mkdirSync, writeFileSync } from 'fs';
import { isAbsolute, join } from 'path';
import { renderToStaticMarkup } from 'react-dom/server';
import { createChildLogger } from '@/utils/logger';
import RateChart from './RateChart';
import { chartTitle, type ChartSeries } from './series';

const logger = createChildLogger('chart');

export interface ChartOutputOptions {
  width: number;
  height: number;
  /** Relative to `baseDir` */
  outputDir: string;
  baseDir: string;
}

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

export function renderChartDocument(series: ChartSeries, width: number, height: number): string {
  const [heading, subheading] = chartTitle(series).split('\n').map(escapeHtml);
  const chart = renderToStaticMarkup(<RateChart series={series} width={width} height={height} />);

  return [
    '<!DOCTYPE html>',
    '<html lang="en">',
    '<head>',
    '<meta charset="utf-8" />',
    `<title>${heading}</title>`,
    '<style>body{font-family:system-ui,sans-serif;margin:24px;color:#111827}h1{font-size:18px;margin:0}h2{font-size:14px;font-weight:400;margin:4px 0 16px}</style>',
    '</head>',
    '<body>',
    `<h1>${heading}</h1>`,
    `<h2>${subheading}</h2>`,
    chart,
    '</body>',
    '</html>',
    '',
  ].join('\n');
}

export function chartFileName(series: ChartSeries): string {
  const first = series.points[0]?.date ?? 'empty';
  const last = series.points[series.points.length - 1]?.date ?? 'empty';
  return `rates_${series.base}_${first}_${last}.html`;
}

export function writeChart(series: ChartSeries, options: ChartOutputOptions): string {
  const dir = isAbsolute(options.outputDir) ? options.outputDir : join(options.baseDir, options.outputDir);
  mkdirSync(dir, { recursive: true });

  const filePath = join(dir, chartFileName(series));
  writeFileSync(filePath, renderChartDocument(series, options.width, options.height), 'utf-8');

  logger.info({ filePath, points: series.points.length, currencies: series.currencies }, 'Chart written');
  return filePath;
}
