import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { isValid } from 'date-fns';
import { formatInTimeZone, fromZonedTime } from 'date-fns-tz';
import { AppConfig } from '../config/configuration';

export interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

export interface WallTime {
  hours: number;
  minutes: number;
}

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const TIME_PATTERN = /^(\d{1,2}):(\d{2})$/;
const MINUTE_MS = 60_000;

const pad = (value: number) => value.toString().padStart(2, '0');

/** Strict `YYYY-MM-DD`. */
export function parseDate(value: string): CalendarDate {
  const match = DATE_PATTERN.exec(value.trim());
  if (!match) {
    throw new Error(`Invalid date "${value}", expected YYYY-MM-DD`);
  }
  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
  const probe = new Date(Date.UTC(year, month - 1, day));
  if (
    !isValid(probe) ||
    probe.getUTCFullYear() !== year ||
    probe.getUTCMonth() !== month - 1 ||
    probe.getUTCDate() !== day
  ) {
    throw new Error(`Invalid date "${value}", expected YYYY-MM-DD`);
  }
  return { year, month, day };
}

/** 24-hour `HH:MM`; a single-digit hour is tolerated. */
export function parseTime(value: string): WallTime {
  const match = TIME_PATTERN.exec(value.trim());
  if (!match) {
    throw new Error(`Invalid time "${value}", expected HH:MM`);
  }
  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  if (hours > 23 || minutes > 59) {
    throw new Error(`Invalid time "${value}", expected HH:MM`);
  }
  return { hours, minutes };
}

export function parseDateTimeInZone(date: string, time: string, timeZone: string): Date {
  const d = parseDate(date);
  const t = parseTime(time);
  return fromZonedTime(`${d.year}-${pad(d.month)}-${pad(d.day)}T${pad(t.hours)}:${pad(t.minutes)}:00`, timeZone);
}

/** Minute resolution: seconds on either side are ignored. */
export function isPastOrNow(scheduled: Date, now: Date): boolean {
  return Math.floor(now.getTime() / MINUTE_MS) >= Math.floor(scheduled.getTime() / MINUTE_MS);
}

export function formatInZone(value: Date, timeZone: string, includeTime = true): string {
  return formatInTimeZone(value, timeZone, includeTime ? 'yyyy-MM-dd HH:mm' : 'yyyy-MM-dd');
}

export function toStorage(value: Date): Date {
  return new Date(value.getTime());
}

export function fromStorage(value: Date | string): Date {
  return value instanceof Date ? new Date(value.getTime()) : new Date(value);
}

export function optionalFromStorage(value: Date | string | null | undefined): Date | undefined {
  return value === null || value === undefined ? undefined : fromStorage(value);
}

/**
 * Every "now" and every wall-clock conversion in the app goes through here,
 * so the configured zone is applied in one place.
 */
@Injectable()
export class Clock {
  readonly timeZone: string;

  constructor(configService: ConfigService<AppConfig, true>) {
    this.timeZone = configService.get('scheduler', { infer: true }).timezone;
  }

  now(): Date {
    return new Date();
  }

  today(): string {
    return formatInZone(this.now(), this.timeZone, false);
  }

  parseDateTime(date: string, time: string): Date {
    return parseDateTimeInZone(date, time, this.timeZone);
  }

  /** Start of the given calendar day in the configured zone. */
  parseDay(date: string): Date {
    return parseDateTimeInZone(date, '00:00', this.timeZone);
  }

  isPastOrNow(scheduled: Date): boolean {
    return isPastOrNow(scheduled, this.now());
  }

  format(value: Date, includeTime = true): string {
    return formatInZone(value, this.timeZone, includeTime);
  }
}
