import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { countAt, type AggregateSnapshot } from '../consumer/aggregate.js';
import { DAYS_OF_WEEK, HISTOGRAM_LAYOUT } from '../shared/constants.js';
import logger from '../logger.js';
import { metrics } from '../metrics.js';

export interface HistogramData {
  snapshot: AggregateSnapshot;
  /** Bar order within each weekday group, also the legend order */
  courses: string[];
}

const TITLE = 'Course Visits by Weekday';
const X_LABEL = 'Weekday';
const Y_LABEL = 'Number of Visits';

function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

function round(value: number): string {
  return String(Math.round(value * 100) / 100);
}

function maxCount({ snapshot, courses }: HistogramData): number {
  let max = 0;
  for (const day of DAYS_OF_WEEK) {
    for (const course of courses) {
      max = Math.max(max, countAt(snapshot, day, course));
    }
  }
  return max;
}

/**
 * Render the aggregate as a grouped bar chart in SVG
 *
 * Days run Mon..Sun along the x-axis with one bar per course in each group.
 * The y-axis is split into `HISTOGRAM_LAYOUT.Y_TICKS` whole-number steps.
 */
export function renderHistogramSvg(data: HistogramData): string {
  const {
    WIDTH,
    HEIGHT,
    MARGIN_TOP,
    MARGIN_RIGHT,
    MARGIN_BOTTOM,
    MARGIN_LEFT,
    Y_TICKS,
    PALETTE,
  } = HISTOGRAM_LAYOUT;
  const { snapshot, courses } = data;

  const plotWidth = WIDTH - MARGIN_LEFT - MARGIN_RIGHT;
  const plotHeight = HEIGHT - MARGIN_TOP - MARGIN_BOTTOM;
  const baseline = MARGIN_TOP + plotHeight;
  const step = Math.max(1, Math.ceil(maxCount(data) / Y_TICKS));
  const yMax = step * Y_TICKS;
  const groupWidth = plotWidth / DAYS_OF_WEEK.length;
  const barWidth = (groupWidth * 0.8) / Math.max(1, courses.length);
  const colorOf = (index: number) => PALETTE[index % PALETTE.length];

  const parts: string[] = [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${WIDTH}" height="${HEIGHT}" viewBox="0 0 ${WIDTH} ${HEIGHT}" font-family="sans-serif">`,
    `<rect width="${WIDTH}" height="${HEIGHT}" fill="#ffffff"/>`,
    `<text x="${WIDTH / 2}" y="${MARGIN_TOP / 2}" text-anchor="middle" font-size="20">${TITLE}</text>`,
  ];

  for (let tick = 0; tick <= Y_TICKS; tick++) {
    const y = round(baseline - (tick / Y_TICKS) * plotHeight);
    parts.push(
      `<line x1="${MARGIN_LEFT}" y1="${y}" x2="${MARGIN_LEFT + plotWidth}" y2="${y}" stroke="#dddddd"/>`,
      `<text x="${MARGIN_LEFT - 8}" y="${y}" text-anchor="end" dominant-baseline="middle" font-size="12">${tick * step}</text>`
    );
  }

  DAYS_OF_WEEK.forEach((day, dayIndex) => {
    const groupX = MARGIN_LEFT + dayIndex * groupWidth;

    courses.forEach((course, courseIndex) => {
      const count = countAt(snapshot, day, course);
      const height = (count / yMax) * plotHeight;
      const x = groupX + groupWidth * 0.1 + courseIndex * barWidth;
      parts.push(
        `<rect class="bar" data-day="${day}" data-course="${escapeXml(course)}" data-count="${count}" x="${round(x)}" y="${round(baseline - height)}" width="${round(barWidth)}" height="${round(height)}" fill="${colorOf(courseIndex)}"/>`
      );
    });

    parts.push(
      `<text x="${round(groupX + groupWidth / 2)}" y="${baseline + 20}" text-anchor="middle" font-size="12">${day}</text>`
    );
  });

  parts.push(
    `<line x1="${MARGIN_LEFT}" y1="${baseline}" x2="${MARGIN_LEFT + plotWidth}" y2="${baseline}" stroke="#333333"/>`,
    `<text x="${round(MARGIN_LEFT + plotWidth / 2)}" y="${HEIGHT - 20}" text-anchor="middle" font-size="14">${X_LABEL}</text>`,
    `<text x="20" y="${round(MARGIN_TOP + plotHeight / 2)}" text-anchor="middle" font-size="14" transform="rotate(-90 20 ${round(MARGIN_TOP + plotHeight / 2)})">${Y_LABEL}</text>`
  );

  const legendX = MARGIN_LEFT + plotWidth + 20;
  courses.forEach((course, index) => {
    const y = MARGIN_TOP + index * 22;
    parts.push(
      `<rect x="${legendX}" y="${y}" width="14" height="14" fill="${colorOf(index)}"/>`,
      `<text x="${legendX + 20}" y="${y + 11}" font-size="12">${escapeXml(course)}</text>`
    );
  });

  parts.push('</svg>');
  return parts.join('\n') + '\n';
}

/**
 * Summarize the aggregate as one line per weekday for terminal output
 *
 * @example
 * renderHistogramText({ snapshot, courses: ['Math'] });
 * // => ['Mon  Math=5', 'Tue  Math=0', ...]
 */
export function renderHistogramText({
  snapshot,
  courses,
}: HistogramData): string[] {
  return DAYS_OF_WEEK.map((day) => {
    const cells = courses.map(
      (course) => `${course}=${countAt(snapshot, day, course)}`
    );
    return [day, ...cells].join('  ');
  });
}

/**
 * Write the SVG histogram to `filePath`, creating its directory
 *
 * @returns false when there is nothing to plot yet, true once written
 */
export async function writeHistogram(
  filePath: string,
  data: HistogramData
): Promise<boolean> {
  if (data.courses.length === 0) {
    logger.warn('No data available for plotting yet');
    return false;
  }

  const endTimer = metrics.renderDurationSeconds.startTimer();
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, renderHistogramSvg(data), 'utf8');
  endTimer();

  logger.info({ filePath, courses: data.courses.length }, 'Histogram written');
  return true;
}
