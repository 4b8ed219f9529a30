import type { HistoryEntry } from '../types/models';

const MAX_LABEL_LENGTH = 50;
const NOT_A_LABEL = ['cannot identify', 'not food'];

/**
 * Pull the food name off the first line of an analysis.
 * The prompt asks the model to put the name alone on that line.
 */
export function extractFoodLabel(text: string): string | null {
  const firstLine = text.split('\n')[0] ?? '';
  const name = firstLine.trim().replace(/^#+\s*/, '').replace(/^\*\*(.*)\*\*$/, '$1').trim();

  if (!name || name.length > MAX_LABEL_LENGTH) return null;
  if (name.startsWith('-') || name.startsWith('•')) return null;

  const lower = name.toLowerCase();
  if (NOT_A_LABEL.some((phrase) => lower.includes(phrase))) return null;

  return name;
}

export function truncateText(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  return `${text.slice(0, maxLength)}...`;
}

export function formatScanDate(date: Date, locale = 'en-US', timeZone?: string): string {
  return new Intl.DateTimeFormat(locale, { dateStyle: 'medium', timeStyle: 'short', timeZone }).format(date);
}

export function displayLabel(entry: Pick<HistoryEntry, 'label'>): string {
  return entry.label ?? 'Unknown Food';
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
