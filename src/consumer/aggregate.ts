import type { VisitRecord } from '../records/schema.js';
import { DAYS_OF_WEEK, type DayOfWeek } from '../shared/constants.js';

export type AggregateSnapshot = Record<DayOfWeek, Record<string, number>>;

/**
 * Weekday of a YYYY-MM-DD date, read as a UTC calendar day
 *
 * @example
 * dayOfWeek('2024-01-01'); // => 'Mon'
 */
export function dayOfWeek(date: string): DayOfWeek {
  const sundayFirst = new Date(`${date}T00:00:00Z`).getUTCDay();
  return DAYS_OF_WEEK[(sundayFirst + 6) % 7];
}

/**
 * Count of one snapshot cell, 0 when the course has no visits that day
 *
 * Only own keys count, so course names such as `constructor` read as 0.
 */
export function countAt(
  snapshot: AggregateSnapshot,
  day: DayOfWeek,
  course: string
): number {
  const byCourse = snapshot[day];
  return Object.hasOwn(byCourse, course) ? (byCourse[course] ?? 0) : 0;
}

/**
 * Running visit totals per (weekday, course)
 *
 * Counts only ever grow; the aggregate lives for one consumer run.
 */
export class VisitAggregate {
  private readonly counts = new Map<DayOfWeek, Map<string, number>>();
  private readonly knownCourses = new Set<string>();
  private totalVisits = 0;

  /**
   * Add a record's visits to its weekday and course
   * @returns The updated count for that cell
   */
  add(record: VisitRecord): number {
    const day = dayOfWeek(record.date);
    let byCourse = this.counts.get(day);
    if (!byCourse) {
      byCourse = new Map();
      this.counts.set(day, byCourse);
    }

    const next = (byCourse.get(record.course) ?? 0) + record.count;
    byCourse.set(record.course, next);
    this.knownCourses.add(record.course);
    this.totalVisits += record.count;
    return next;
  }

  get(day: DayOfWeek, course: string): number {
    return this.counts.get(day)?.get(course) ?? 0;
  }

  /** Courses in the order they were first seen */
  courses(): string[] {
    return [...this.knownCourses];
  }

  total(): number {
    return this.totalVisits;
  }

  isEmpty(): boolean {
    return this.knownCourses.size === 0;
  }

  /** Plain copy of the counts, safe to hand to renderers */
  snapshot(): AggregateSnapshot {
    const countsFor = (day: DayOfWeek) =>
      Object.fromEntries(this.counts.get(day) ?? []);

    return {
      Mon: countsFor('Mon'),
      Tue: countsFor('Tue'),
      Wed: countsFor('Wed'),
      Thu: countsFor('Thu'),
      Fri: countsFor('Fri'),
      Sat: countsFor('Sat'),
      Sun: countsFor('Sun'),
    };
  }
}
