/**
 * Time utilities for consistent date handling
 */

import { differenceInMilliseconds, formatISO, isValid, parseISO } from 'date-fns';

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export const EPOCH = new Date(0);

export function ageMs(since: Date, now: Date = new Date()): number {
  return differenceInMilliseconds(now, since);
}

export function isOlderThan(since: Date, maxAgeMs: number, now: Date = new Date()): boolean {
  return ageMs(since, now) > maxAgeMs;
}

export function toIsoString(date: Date): string {
  return formatISO(date);
}

export function parseTimestamp(value: string): Date | null {
  const parsed = parseISO(value);
  return isValid(parsed) ? parsed : null;
}

export function minutesToMs(minutes: number): number {
  return minutes * 60 * 1000;
}

export function secondsToMs(seconds: number): number {
  return seconds * 1000;
}
