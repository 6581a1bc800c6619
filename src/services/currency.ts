// ═══════════════════════════════════════════════════════
// currency.ts — Korean price notation → won
//   "3억 8,000만원" → 380,000,000     "8,500"       → 85,000,000
//   "7.5억"         → 750,000,000     "320000000원" → 320,000,000
//   "3억2천"        → 320,000,000     ""            → null
// ═══════════════════════════════════════════════════════

export const EOK = 100_000_000;
export const MAN = 10_000;
const CHEON_IN_MAN = 1_000;   // 천 after 억 counts thousands of 만

const EOK_QTY = /(\d+(?:\.\d+)?)억/;
const MAN_AFTER_EOK = /억(\d+)만/;
const BARE_AFTER_EOK = /억(\d+)$/;
const CHEON_AFTER_EOK = /억(\d+)천/;
const MAN_QTY = /(\d+)만/;
const CHEON_QTY = /(\d+)천만?/;
const BARE_INT = /^\d+$/;

/**
 * Parse an amount written in 억/만/천 notation into integer won.
 * A bare number is read as 만 unless it carried a trailing 원.
 * Returns null when nothing recognizable is present.
 */
export function parseAmount(input: string | null | undefined): number | null {
  if (!input) return null;

  let t = input.replace(/\s/g, '').replace(/,/g, '');
  const hasWon = t.includes('원');
  t = t.replace(/원/g, '');
  if (!t) return null;

  const eok = t.match(EOK_QTY);
  if (eok?.[1] !== undefined) {
    const eokValue = Math.round(Number(eok[1]) * EOK);
    const man = t.match(MAN_AFTER_EOK) ?? t.match(BARE_AFTER_EOK);
    if (man?.[1] !== undefined) return eokValue + Number(man[1]) * MAN;
    const cheon = t.match(CHEON_AFTER_EOK);
    if (cheon?.[1] !== undefined) return eokValue + Number(cheon[1]) * CHEON_IN_MAN * MAN;
    return eokValue;
  }

  const man = t.match(MAN_QTY);
  if (man?.[1] !== undefined) return Number(man[1]) * MAN;

  const cheon = t.match(CHEON_QTY);
  if (cheon?.[1] !== undefined) return Number(cheon[1]) * CHEON_IN_MAN * MAN;

  if (BARE_INT.test(t)) return hasWon ? Number(t) : Number(t) * MAN;

  return null;
}
