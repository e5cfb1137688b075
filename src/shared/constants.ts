/**
 * Day-of-week labels in histogram order (Monday first).
 * Index 0 is Monday; `Date#getUTCDay` is shifted accordingly.
 */
export const DAYS_OF_WEEK = [
  'Mon',
  'Tue',
  'Wed',
  'Thu',
  'Fri',
  'Sat',
  'Sun',
] as const;

export type DayOfWeek = (typeof DAYS_OF_WEEK)[number];

/**
 * Kafka message header names written by the producer
 */
export const MESSAGE_HEADERS = {
  RUN_ID: 'run-id',
  PRODUCED_AT: 'produced-at',
} as const;

/**
 * Shutdown timing
 */
export const TIMING = {
  GRACEFUL_SHUTDOWN_TIMEOUT_MS: 10000,
} as const;

/**
 * Histogram layout in SVG user units
 */
export const HISTOGRAM_LAYOUT = {
  WIDTH: 960,
  HEIGHT: 540,
  MARGIN_TOP: 60,
  MARGIN_RIGHT: 180,
  MARGIN_BOTTOM: 70,
  MARGIN_LEFT: 70,
  Y_TICKS: 5,
  PALETTE: [
    '#4e79a7',
    '#f28e2b',
    '#e15759',
    '#76b7b2',
    '#59a14f',
    '#edc948',
    '#b07aa1',
    '#ff9da7',
  ],
} as const;
