/**
 * Environment probe
 *
 * Supplies the environment fragment of the dynamic layer. Only the time
 * of day is wired; weather and system status report a placeholder.
 */

import { PLACEHOLDERS } from '../constants.js';
import type { EnvironmentProbe } from '../types/index.js';

const WEEKDAYS = [
  'Sunday',
  'Monday',
  'Tuesday',
  'Wednesday',
  'Thursday',
  'Friday',
  'Saturday',
] as const;

/**
 * `HH:MM Weekday` in local time
 */
export function formatTimeOfDay(date: Date): string {
  const hours = String(date.getHours()).padStart(2, '0');
  const minutes = String(date.getMinutes()).padStart(2, '0');
  return `${hours}:${minutes} ${WEEKDAYS[date.getDay()]}`;
}

export class ClockEnvironmentProbe implements EnvironmentProbe {
  private readonly now: () => Date;

  constructor(now: () => Date = () => new Date()) {
    this.now = now;
  }

  describe(): string {
    return [
      `Time: ${formatTimeOfDay(this.now())}`,
      `Weather: ${PLACEHOLDERS.NOT_AVAILABLE}`,
      `System: ${PLACEHOLDERS.NOT_AVAILABLE}`,
    ].join('\n');
  }
}
