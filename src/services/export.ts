/**
 * services/export.ts — Candidate table → CSV file
 *
 * UTF-8 with a byte-order mark so spreadsheet apps pick up the Hangul
 * headings. Cells are quoted only when they need it (RFC 4180).
 */
import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import type { LabelTable } from '../config/labels.ts';
import { EXPORT_FIELDS, type Candidate, type ExportRow } from '../types.ts';
import { fileTimestamp } from './helpers.ts';

const BOM = '\uFEFF';

export function toExportRow(c: Candidate): ExportRow {
  const { listing, detail } = c;
  return {
    listingName: listing.name,
    listingId: listing.id,
    tradeTypeLabel: listing.tradeType,
    saleWon: c.saleWon,
    floorInfo: listing.attributes.floorInfo,
    grossArea: listing.attributes.grossArea,
    netArea: listing.attributes.netArea,
    direction: listing.attributes.direction,
    featureText: listing.attributes.featureText,
    registeredAt: listing.attributes.registeredAt,
    agencyName: detail.agencyName,
    agentName: detail.agentName,
    phone1: detail.phone1,
    phone2: detail.phone2,
    leasePeriodYears: detail.leasePeriodYears,
    leaseMaxWon: detail.leaseMaxWon,
    leaseMinWon: detail.leaseMinWon,
    previousLeaseWon: detail.previousLeaseWon,
    gapAmountWon: c.gapAmountWon,
    gapRatio: c.gapRatio,
  };
}

export function csvCell(value: string | number | null): string {
  if (value === null) return '';
  const s = String(value);
  return /[",\r\n]/.test(s) ? `"${s.replace(/"/g, '""')}"` : s;
}

/** Header line plus one line per row, CRLF-terminated */
export function renderCsv(rows: readonly ExportRow[], labels: LabelTable): string {
  const header = EXPORT_FIELDS.map((f) => csvCell(labels.columns.get(f) ?? f)).join(',');
  const lines = rows.map((row) => EXPORT_FIELDS.map((f) => csvCell(row[f])).join(','));
  return [header, ...lines].map((l) => `${l}\r\n`).join('');
}

/** Write the ranked candidates; returns the file path. */
export async function writeCandidatesCsv(
  candidates: readonly Candidate[],
  dir: string,
  labels: LabelTable,
  now: Date = new Date(),
): Promise<string> {
  await mkdir(dir, { recursive: true });
  const path = join(dir, `${labels.filePrefix}_${fileTimestamp(now)}.csv`);
  await writeFile(path, BOM + renderCsv(candidates.map(toExportRow), labels), 'utf8');
  return path;
}
