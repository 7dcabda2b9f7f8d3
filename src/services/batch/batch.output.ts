import type { OutputRow, Row } from './batch.types';

/** Flatten a row for export. Unmapped rows export empty names. */
export function toOutputRow(row: Row): OutputRow {
  return {
    rawInput: row.rawInput,
    commonName: row.mapping?.common ?? '',
    latinName: row.mapping?.latin ?? '',
    matchedLevel: row.mapping?.level ?? null,
    status: row.status,
    locked: row.locked,
    originalCommon: row.originalCommon,
    originalLatin: row.originalLatin,
  };
}
