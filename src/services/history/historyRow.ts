/**
 * Stored shape of a scan history row and its decoding into HistoryEntry.
 *
 * Table `scan_history`:
 *   id uuid, user_id text, created_at timestamptz default now(),
 *   food_label text null, result_text text not null
 */
import { z } from 'zod';
import type { HistoryEntry, NewHistoryRecord } from '../../types/models';

export const HISTORY_COLUMNS = 'id, user_id, created_at, food_label, result_text';

export const HistoryRowSchema = z.object({
  id: z.string().min(1),
  user_id: z.string().min(1),
  created_at: z.string().refine((value) => !Number.isNaN(Date.parse(value)), 'invalid timestamp'),
  food_label: z.string().nullish(),
  result_text: z.string().min(1),
});

export type HistoryRow = z.infer<typeof HistoryRowSchema>;

export type HistoryInsertRow = Pick<HistoryRow, 'user_id' | 'result_text'> & { food_label: string | null };

export function normalizeLabel(label: string | null | undefined): string | null {
  const trimmed = label?.trim();
  return trimmed ? trimmed : null;
}

export function toInsertRow(record: NewHistoryRecord): HistoryInsertRow {
  return {
    user_id: record.ownerId,
    food_label: record.label,
    result_text: record.analysisText,
  };
}

export function toHistoryEntry(row: HistoryRow): HistoryEntry {
  return {
    id: row.id,
    ownerId: row.user_id,
    createdAt: new Date(row.created_at),
    label: normalizeLabel(row.food_label),
    analysisText: row.result_text,
  };
}

/**
 * Decode every row of a snapshot. Rows that fail are reported and skipped;
 * the rest keep their relative order.
 */
export function decodeSnapshot(
  rows: readonly unknown[],
  onFailure: (index: number, reason: string) => void,
): HistoryEntry[] {
  const entries: HistoryEntry[] = [];
  rows.forEach((row, index) => {
    const parsed = HistoryRowSchema.safeParse(row);
    if (parsed.success) {
      entries.push(toHistoryEntry(parsed.data));
    } else {
      onFailure(
        index,
        parsed.error.issues.map((issue) => `${issue.path.join('.') || 'row'}: ${issue.message}`).join('; '),
      );
    }
  });
  return entries;
}
