/**
 * Utility functions shared across the engine
 */

import type { RawValue } from './types.js';

/**
 * Parse a provider cell into a finite number, or null when it is missing or unparseable
 */
export function parseOptionalNumber(value: RawValue): number | null {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  const trimmed = value.trim();
  if (trimmed === '') return null;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * Parse a provider cell into an integer id, or null
 */
export function parseOptionalInteger(value: RawValue): number | null {
  const parsed = parseOptionalNumber(value);
  return parsed !== null && Number.isInteger(parsed) ? parsed : null;
}

/**
 * Read a provider cell as trimmed text ('' when missing)
 */
export function parseText(value: RawValue): string {
  if (value === null || value === undefined) return '';
  return String(value).trim();
}

/**
 * Round to a fixed number of decimal places
 */
export function roundTo(value: number, decimals: number): number {
  const factor = Math.pow(10, decimals);
  return Math.round(value * factor) / factor;
}

/**
 * Round a possibly absent value; absent stays absent
 */
export function safeRound(value: number | null, decimals: number = 3): number | null {
  return value === null ? null : roundTo(value, decimals);
}

/**
 * Format name from "Last, First" to "First Last"
 */
export function formatNameFirstLast(name: string): string {
  const trimmed = name.trim();
  const commaIndex = trimmed.indexOf(',');
  if (commaIndex === -1) return trimmed;
  return `${trimmed.slice(commaIndex + 1).trim()} ${trimmed.slice(0, commaIndex).trim()}`;
}
