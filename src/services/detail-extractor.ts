/**
 * services/detail-extractor.ts — Broker and lease facts from a listing page
 *
 * The page is read as plain text and searched with patterns. The previous
 * lease deposit is looked up first: when it is required and missing the
 * listing is skipped before anything else is parsed. Every other fact is
 * optional and may come back empty.
 */
import type { DetailSurface } from '../browser/surface.ts';
import type { DetailRecord, DetailResult } from '../types.ts';
import { childLogger } from '../shared/logger.ts';
import { detailTotal } from '../shared/metrics.ts';
import { failure, ok, type FailureKind, type Outcome } from '../shared/outcome.ts';
import { parseAmount } from './currency.ts';
import { sleep as defaultSleep, type Sleep } from './helpers.ts';

export interface DetailUrlTemplate {
  primary: string;     // {id} is replaced by the listing id
  alternate: string;
  hosts: string[];     // landing anywhere else counts as a bounce
}

export const MOBILE_DETAIL: DetailUrlTemplate = {
  primary: 'https://m.land.naver.com/article/info/{id}',
  alternate: 'https://m.land.naver.com/article/view/{id}',
  hosts: ['m.land.naver.com'],
};

export const DESKTOP_DETAIL: DetailUrlTemplate = {
  primary: 'https://fin.land.naver.com/articles/{id}',
  alternate: 'https://m.land.naver.com/article/info/{id}',
  hosts: ['fin.land.naver.com', 'm.land.naver.com'],
};

export interface DetailExtractorOptions {
  template: DetailUrlTemplate;
  requirePreviousLease: boolean;
  /** Tab path to the lease history view; each step is a prioritized label list */
  leaseTabPath: readonly (readonly string[])[];
  settleMs: number;
  tabSettleMs: number;
}

export const DEFAULT_LEASE_TAB_PATH: readonly (readonly string[])[] = [['실거래가'], ['전세']];

const NOT_FOUND_NOTICE = '요청하신 페이지를 찾을 수 없어요';
const MIN_BODY_LENGTH = 50;

// Amounts stop at the end of the line; a following line's digits must not run into them
const AMOUNT = '([\\d,억천만 \\t]+)';
const PREVIOUS_LEASE = new RegExp(`기전세금\\s*${AMOUNT}`);
const LEASE_MAX = new RegExp(`(\\d+)\\s*년\\s*내\\s*최고\\s*${AMOUNT}`);
const LEASE_MIN = new RegExp(`(\\d+)\\s*년\\s*내\\s*최저\\s*${AMOUNT}`);
const PHONE = /0\d{1,2}-\d{3,4}-\d{4}/g;

const BROKER_NAME = /^[가-힣]{2,4}$/;
const BROKER_STOPLIST = ['이미지', '상세보기', '중개사', '중개소'];
const BROKER_CONTEXT = ['중개사', '프로필', '중개소'];
const AGENCY_NAME = /(공인중개사|부동산)/;
const AGENCY_EXCLUDE = ['상세보기', '전화'];
const AGENCY_FALLBACK = /중개소\s+([^\n]+)/;
const AGENCY_LOOKAHEAD = 5;

/** 기전세금 amount in won, or null */
export function findPreviousLease(body: string): number | null {
  const m = body.match(PREVIOUS_LEASE);
  return m?.[1] !== undefined ? parseAmount(m[1].trim()) : null;
}

/** Broker name and the line it sits on */
export function findBroker(lines: readonly string[]): { name: string; index: number } | null {
  for (const [i, line] of lines.entries()) {
    if (!BROKER_NAME.test(line) || BROKER_STOPLIST.includes(line)) continue;
    const context = lines.slice(Math.max(0, i - 3), i + 2).join('\n');
    if (BROKER_CONTEXT.some((k) => context.includes(k))) return { name: line, index: i };
  }
  return null;
}

/** Agency line below the broker, falling back to a "중개소 <name>" label anywhere. */
export function findAgency(body: string, lines: readonly string[], brokerIndex: number | null): string {
  if (brokerIndex !== null) {
    for (const line of lines.slice(brokerIndex + 1, brokerIndex + 1 + AGENCY_LOOKAHEAD)) {
      if (AGENCY_NAME.test(line) && !AGENCY_EXCLUDE.some((k) => line.includes(k))) return line;
    }
  }
  const m = body.match(AGENCY_FALLBACK);
  const label = m?.[1]?.trim() ?? '';
  return label && !label.includes('이미지') ? label : '';
}

/** Parse every optional fact out of the page text. */
export function parseDetailText(body: string, previousLeaseWon: number | null): DetailRecord {
  const lines = body.split(/\r?\n/).map((l) => l.trim()).filter(Boolean);
  const broker = findBroker(lines);

  const max = body.match(LEASE_MAX);
  const min = body.match(LEASE_MIN);
  const years = max?.[1] ?? min?.[1];

  const phones = body.match(PHONE) ?? [];

  return {
    skip: false,
    agencyName: findAgency(body, lines, broker?.index ?? null),
    agentName: broker?.name ?? '',
    phone1: phones[0] ?? '',
    phone2: phones[1] ?? '',
    leasePeriodYears: years !== undefined ? Number(years) : null,
    leaseMaxWon: max?.[2] !== undefined ? parseAmount(max[2].trim()) : null,
    leaseMinWon: min?.[2] !== undefined ? parseAmount(min[2].trim()) : null,
    previousLeaseWon,
  };
}

export class DetailExtractor {
  private readonly opts: DetailExtractorOptions;
  private readonly sleep: Sleep;
  private readonly log = childLogger({ module: 'detail' });

  constructor(
    options: Partial<DetailExtractorOptions> & Pick<DetailExtractorOptions, 'template' | 'requirePreviousLease'>,
    deps: { sleep?: Sleep } = {},
  ) {
    this.opts = { leaseTabPath: DEFAULT_LEASE_TAB_PATH, settleMs: 300, tabSettleMs: 250, ...options };
    this.sleep = deps.sleep ?? defaultSleep;
  }

  urlFor(kind: 'primary' | 'alternate', listingId: string): string {
    return this.opts.template[kind].replace('{id}', encodeURIComponent(listingId));
  }

  async extract(page: DetailSurface, listingId: string): Promise<DetailResult> {
    let body = await this.load(page, listingId);

    const previousLeaseWon = findPreviousLease(body);
    if (this.opts.requirePreviousLease && !previousLeaseWon) {
      return { skip: true, reason: 'missing_previous_lease' };
    }

    const switched = await this.openLeaseTab(page);
    if (switched !== null) body = switched;

    return parseDetailText(body, previousLeaseWon);
  }

  /** Primary URL, then one retry on the alternate if it bounced or came back empty. */
  private async load(page: DetailSurface, listingId: string): Promise<string> {
    const first = await this.visit(page, this.urlFor('primary', listingId));
    if (first.kind === 'ok' && !this.looksEmpty(first.value)) return first.value;

    detailTotal.inc({ outcome: 'redirect_retry' });
    const [errorKind, message]: [FailureKind, string] = first.kind === 'error'
      ? [first.errorKind, first.message]
      : ['redirect_anomaly', `listing ${listingId} came back empty`];
    this.log.debug({ listingId, errorKind }, `${message}; trying alternate URL`);

    const second = await this.visit(page, this.urlFor('alternate', listingId));
    return second.kind === 'ok' ? second.value : '';
  }

  /** Body text after navigation; landing off-site is a redirect anomaly */
  private async visit(page: DetailSurface, url: string): Promise<Outcome<string>> {
    const nav = await page.goto(url);
    if (nav.kind === 'error') return failure<string>(nav.errorKind, nav.message);
    await this.sleep(this.opts.settleMs);
    const landed = page.url();
    if (!this.onSite(landed)) return failure<string>('redirect_anomaly', `${url} bounced to ${landed}`);
    return ok((await page.bodyText()) ?? '');
  }

  private onSite(url: string): boolean {
    try {
      return this.opts.template.hosts.includes(new URL(url).hostname);
    } catch {
      return false;
    }
  }

  private looksEmpty(body: string): boolean {
    return body.includes(NOT_FOUND_NOTICE) || body.trim().length < MIN_BODY_LENGTH;
  }

  /** Walk the tab path; returns the refreshed text, or null if any step was missing. */
  private async openLeaseTab(page: DetailSurface): Promise<string | null> {
    for (const labels of this.opts.leaseTabPath) {
      const hit = await page.clickByLabel(labels);
      if (!hit.found) return null;
      await this.sleep(this.opts.tabSettleMs);
    }
    return page.bodyText();
  }
}
