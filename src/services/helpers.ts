// ═══════════════════════════════════════════════════════
// helpers.ts — Pure utility functions (zero dependencies)
// ═══════════════════════════════════════════════════════

/** Promise-based delay */
export const sleep = (ms: number): Promise<void> => new Promise(r => setTimeout(r, ms));

export type Sleep = (ms: number) => Promise<void>;
export type RandomSource = () => number;

/** Clamp n into [lo, hi] */
export function clamp(n: number, lo: number, hi: number): number {
  return Math.max(lo, Math.min(n, hi));
}

/** Uniform integer in [min, max], both inclusive */
export function randomInt(min: number, max: number, random: RandomSource = Math.random): number {
  return min + Math.floor(random() * (max - min + 1));
}

/** Trimmed string form of a scalar payload field; '' for anything else */
export function text(v: unknown): string {
  if (typeof v === 'string') return v.trim();
  if (typeof v === 'number' && Number.isFinite(v)) return String(v);
  return '';
}

/** First non-empty candidate, or '' */
export function firstText(...values: unknown[]): string {
  for (const v of values) {
    const t = text(v);
    if (t) return t;
  }
  return '';
}

/** "20240315_142501" in local time */
export function fileTimestamp(d: Date): string {
  const p = (n: number) => String(n).padStart(2, '0');
  return `${d.getFullYear()}${p(d.getMonth() + 1)}${p(d.getDate())}_${p(d.getHours())}${p(d.getMinutes())}${p(d.getSeconds())}`;
}
