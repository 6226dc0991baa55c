// src/sinks/naming.ts

const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * YYYYMMDD in UTC
 */
export function formatDate(date: Date): string {
  return `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}`;
}

/**
 * YYYYMMDD_HHmmss in UTC
 */
export function formatTimestamp(date: Date): string {
  return `${formatDate(date)}_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`;
}

/**
 * 1 -> A, 14 -> N, 27 -> AA
 */
export function columnLetter(index: number): string {
  let letters = '';
  let n = index;
  while (n > 0) {
    const remainder = (n - 1) % 26;
    letters = String.fromCharCode(65 + remainder) + letters;
    n = Math.floor((n - 1) / 26);
  }
  return letters || 'A';
}
