/**
 * Production line chart: d3 scales and path generators build an SVG string,
 * resvg rasterizes it to PNG. Nothing touches the filesystem.
 */
import resvgJs from '@resvg/resvg-js';
import { extent, line, max, scaleLinear, scaleUtc, utcFormat } from 'd3';
import { listAggregatesChronological, withRead, type DatabaseHandle } from '../database.js';
import { NotFoundError } from '../errors.js';
import type { AggregateProductionRecord, TimeSeriesPoint } from '../types/production.js';

export interface ChartOptions {
  width: number;
  height: number;
  title?: string;
}

type SeriesKey = 'gold' | 'silver' | 'diamond';

interface Series {
  key: SeriesKey;
  label: string;
  color: string;
}

export const SERIES: readonly Series[] = [
  { key: 'gold', label: 'Arany', color: '#d4a017' },
  { key: 'silver', label: 'Ezüst', color: '#8c8c8c' },
  { key: 'diamond', label: 'Gyémánt', color: '#1f77b4' },
];

const MARGIN = { top: 40, right: 110, bottom: 40, left: 50 };
const DAY_MS = 24 * 60 * 60 * 1000;
const formatDay = utcFormat('%Y-%m-%d');

function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

function utcDate(year: number, month: number, day: number): Date {
  const date = new Date(Date.UTC(2000, month - 1, day));
  date.setUTCFullYear(year);
  return date;
}

export function toTimeSeries(records: readonly AggregateProductionRecord[]): TimeSeriesPoint[] {
  return records.map((record) => ({
    date: utcDate(record.ev, record.honap, record.nap),
    gold: record.aranytermeles,
    silver: record.ezusttermeles,
    diamond: record.gyemanttermeles,
  }));
}

export function buildTimeSeriesSvg(points: readonly TimeSeriesPoint[], options: ChartOptions): string {
  const [first, last] = extent(points, (point) => point.date);
  if (!first || !last) {
    throw new Error('Cannot chart an empty series');
  }

  const { width, height } = options;
  const title = options.title ?? 'Napi termelés';
  const left = MARGIN.left;
  const right = width - MARGIN.right;
  const top = MARGIN.top;
  const bottom = height - MARGIN.bottom;

  // A single day gets a two-day window so the point sits in the middle.
  const domain: [Date, Date] = first.getTime() === last.getTime()
    ? [new Date(first.getTime() - DAY_MS), new Date(last.getTime() + DAY_MS)]
    : [first, last];

  const x = scaleUtc().domain(domain).range([left, right]);
  const peak = max(points, (point) => Math.max(point.gold, point.silver, point.diamond)) ?? 0;
  const y = scaleLinear()
    .domain([0, peak > 0 ? peak : 1])
    .nice()
    .range([bottom, top]);

  const parts: string[] = [];
  parts.push(
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">`,
    `<rect width="${width}" height="${height}" fill="#ffffff"/>`,
    `<text x="${width / 2}" y="${top / 2 + 6}" text-anchor="middle" font-family="sans-serif" font-size="16">${escapeXml(title)}</text>`
  );

  // Axes
  parts.push(`<g class="axis axis-x" font-family="sans-serif" font-size="10">`);
  parts.push(`<line x1="${left}" y1="${bottom}" x2="${right}" y2="${bottom}" stroke="#333"/>`);
  // Short ranges tick every few hours; only label whole days.
  for (const tick of x.ticks(6).filter((date) => date.getUTCHours() === 0)) {
    const tx = x(tick);
    parts.push(
      `<line x1="${tx}" y1="${bottom}" x2="${tx}" y2="${bottom + 5}" stroke="#333"/>`,
      `<text x="${tx}" y="${bottom + 18}" text-anchor="middle">${formatDay(tick)}</text>`
    );
  }
  parts.push('</g>');

  const formatValue = y.tickFormat(5);
  parts.push(`<g class="axis axis-y" font-family="sans-serif" font-size="10">`);
  parts.push(`<line x1="${left}" y1="${top}" x2="${left}" y2="${bottom}" stroke="#333"/>`);
  for (const tick of y.ticks(5)) {
    const ty = y(tick);
    parts.push(
      `<line x1="${left - 5}" y1="${ty}" x2="${right}" y2="${ty}" stroke="#e0e0e0"/>`,
      `<text x="${left - 8}" y="${ty + 3}" text-anchor="end">${formatValue(tick)}</text>`
    );
  }
  parts.push('</g>');

  // Series
  for (const series of SERIES) {
    const path = line<TimeSeriesPoint>()
      .x((point) => x(point.date))
      .y((point) => y(point[series.key]))(points);

    if (path) {
      parts.push(`<path class="series series-${series.key}" d="${path}" fill="none" stroke="${series.color}" stroke-width="2"/>`);
    }
    for (const point of points) {
      parts.push(`<circle cx="${x(point.date)}" cy="${y(point[series.key])}" r="3" fill="${series.color}"/>`);
    }
  }

  // Legend
  SERIES.forEach((series, index) => {
    const ly = top + index * 20;
    parts.push(
      `<line x1="${right + 15}" y1="${ly}" x2="${right + 35}" y2="${ly}" stroke="${series.color}" stroke-width="2"/>`,
      `<text x="${right + 40}" y="${ly + 4}" font-family="sans-serif" font-size="12">${escapeXml(series.label)}</text>`
    );
  });

  parts.push('</svg>');
  return parts.join('\n');
}

export function rasterize(svg: string, width: number): Buffer {
  const resvg = new resvgJs.Resvg(svg, {
    fitTo: { mode: 'width', value: width },
    background: '#ffffff',
    font: { loadSystemFonts: true, defaultFontFamily: 'sans-serif' },
  });
  return resvg.render().asPng();
}

export function renderTimeSeries(db: DatabaseHandle, options: ChartOptions): Buffer {
  const records = withRead(() => listAggregatesChronological(db));
  if (records.length === 0) throw new NotFoundError();

  return rasterize(buildTimeSeriesSvg(toTimeSeries(records), options), options.width);
}
