/**
 * Scheduler
 *
 * Fires the sync once a day at a local time in the configured timezone
 */

import cron, { type ScheduledTask } from 'node-cron';
import { logger } from './utils/logger.js';

export interface DailySchedule {
  hour: number;
  minute: number;
  timezone: string;
}

interface WallClock {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

function wallClock(date: Date, timeZone: string): WallClock {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    hourCycle: 'h23',
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
  }).formatToParts(date);

  const part = (type: Intl.DateTimeFormatPartTypes): number =>
    Number(parts.find((p) => p.type === type)?.value ?? 0);

  return {
    year: part('year'),
    month: part('month'),
    day: part('day'),
    hour: part('hour'),
    minute: part('minute'),
    second: part('second'),
  };
}

/**
 * Offset of `timeZone` from UTC at `instant`, in ms
 */
function zoneOffset(instant: number, timeZone: string): number {
  const wall = wallClock(new Date(instant), timeZone);
  const asUtc = Date.UTC(wall.year, wall.month - 1, wall.day, wall.hour, wall.minute, wall.second);
  return asUtc - Math.floor(instant / 1000) * 1000;
}

/**
 * Next instant strictly after `now` when the wall clock in `timeZone` reads hour:minute
 */
export function nextDailyRun(hour: number, minute: number, timeZone: string, now: Date = new Date()): Date {
  const wall = wallClock(now, timeZone);
  const passed = wall.hour > hour || (wall.hour === hour && wall.minute >= minute);
  const day = passed ? wall.day + 1 : wall.day;

  const guess = Date.UTC(wall.year, wall.month - 1, day, hour, minute);
  let instant = guess - zoneOffset(guess, timeZone);
  // DST transition between guess and result
  instant = guess - zoneOffset(instant, timeZone);

  return new Date(instant);
}

export class SyncScheduler {
  private task: ScheduledTask | null = null;
  private schedule: DailySchedule | null = null;
  private enabled = false;

  constructor(private readonly onTick: () => Promise<unknown>) {}

  /**
   * (Re)schedule the daily job; replaces any previous schedule
   */
  scheduleDaily({ hour, minute, timezone }: DailySchedule, enabled: boolean = true): void {
    this.stop();

    const expression = `${minute} ${hour} * * *`;
    if (!cron.validate(expression)) {
      throw new Error(`Invalid daily schedule: ${expression}`);
    }

    this.task = cron.schedule(
      expression,
      () => {
        logger.info({ hour, minute, timezone }, 'Scheduled sync starting');
        this.onTick().catch((error: unknown) => {
          logger.error({ error }, 'Scheduled sync failed');
        });
      },
      { scheduled: enabled, timezone }
    );
    this.schedule = { hour, minute, timezone };
    this.enabled = enabled;

    logger.info({ expression, timezone, enabled }, 'Daily sync scheduled');
  }

  pause(): void {
    if (this.task && this.enabled) {
      this.task.stop();
      this.enabled = false;
      logger.info('Daily sync paused');
    }
  }

  resume(): void {
    if (this.task && !this.enabled) {
      this.task.start();
      this.enabled = true;
      logger.info('Daily sync resumed');
    }
  }

  stop(): void {
    if (this.task) {
      this.task.stop();
      this.task = null;
      this.schedule = null;
      this.enabled = false;
      logger.info('Scheduler stopped');
    }
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  getSchedule(): DailySchedule | null {
    return this.schedule;
  }

  getNextRun(now: Date = new Date()): Date | null {
    if (!this.enabled || !this.schedule) {
      return null;
    }
    return nextDailyRun(this.schedule.hour, this.schedule.minute, this.schedule.timezone, now);
  }
}
