/**
 * config/labels.ts — Column headings per output locale
 *
 * The export schema is fixed (EXPORT_FIELDS); only its presentation varies.
 * Headings live in field-labels.json and are checked for completeness on load.
 */
import { z } from 'zod';
import fieldLabels from './field-labels.json';
import { EXPORT_FIELDS, type ExportField, type OutputLocale } from '../types.ts';

const LocaleLabelsSchema = z.object({
  filePrefix: z.string().min(1),
  columns: z.record(z.string(), z.string().min(1)),
});

export interface LabelTable {
  filePrefix: string;
  columns: ReadonlyMap<ExportField, string>;
}

/** Validate a locale's raw label entry into a table covering every export field. */
export function toLabelTable(raw: unknown): LabelTable {
  const parsed = LocaleLabelsSchema.parse(raw);
  const columns = new Map<ExportField, string>();
  const missing: string[] = [];
  for (const field of EXPORT_FIELDS) {
    const heading = parsed.columns[field];
    if (heading) columns.set(field, heading);
    else missing.push(field);
  }
  if (missing.length > 0) throw new Error(`Label table is missing columns: ${missing.join(', ')}`);
  return { filePrefix: parsed.filePrefix, columns };
}

const tables: Record<OutputLocale, LabelTable> = {
  ko: toLabelTable(fieldLabels.ko),
  en: toLabelTable(fieldLabels.en),
};

export function labelsFor(locale: OutputLocale): LabelTable {
  return tables[locale];
}
