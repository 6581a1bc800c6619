/**
 * services/ingestor.ts — Captures backend responses produced by map movement
 *
 * Each response URL is classified into one inbound channel:
 *   markers       — complexes/single-markers, houses/single-markers
 *   listings      — /api/articles/{complex|house}/{id}
 *   priceHistory  — /api/complexes/{id}/prices
 *   generic       — any other /api/ call, scanned for listing arrays
 *
 * Payloads are validated record by record; a bad payload is an outcome,
 * never an exception, so capture can't stall navigation.
 */
import type { ZodTypeAny, z } from 'zod';
import type { NetworkExchange } from '../browser/surface.ts';
import type { LeaseHistoryRecord, ListingSummary, MarkerKind } from '../types.ts';
import {
  ArticleListPayloadSchema,
  ArticleRecordSchema,
  MarkerPayloadSchema,
  MarkerRecordSchema,
  PricePayloadSchema,
  PriceRecordSchema,
  type ArticleRecord,
  type MarkerRecord,
} from '../schemas.ts';
import { childLogger } from '../shared/logger.ts';
import { responsesTotal } from '../shared/metrics.ts';
import { absent, errorMessage, failure, ok, type FailureKind, type Outcome } from '../shared/outcome.ts';
import { firstText, text } from './helpers.ts';
import type { CollectionSession } from './session.ts';

export type InboundChannel =
  | { channel: 'markers'; kind: MarkerKind; typeRestricted: boolean }
  | { channel: 'listings'; parentId: string | null; typeRestricted: boolean }
  | { channel: 'priceHistory' }
  | { channel: 'generic' }
  | { channel: 'ignored' };

export type ChannelName = Exclude<InboundChannel['channel'], 'ignored'>;

export interface Ingested {
  channel: ChannelName;
  added: number;
}

const VILLA_KEYWORDS = ['빌라', '연립', '다세대'];
const SALE_TRADE_CODES = ['A1'];
const SALE_TRADE_NAMES = ['매매', 'SALE'];
const MAX_SCAN_DEPTH = 32;

const ARTICLE_URL = /\/api\/articles\/(complex|house)\/(\d+)/;

/** Route a response URL to its inbound channel. */
export function classifyEndpoint(url: string): InboundChannel {
  if (url.includes('complexes/single-markers')) {
    return { channel: 'markers', kind: 'complexes', typeRestricted: false };
  }
  if (url.includes('houses/single-markers')) {
    // the houses family also returns non-villa buildings
    return { channel: 'markers', kind: 'houses', typeRestricted: true };
  }
  if (url.includes('/api/articles/complex/') || url.includes('/api/articles/house/')) {
    const m = url.match(ARTICLE_URL);
    return {
      channel: 'listings',
      parentId: m?.[2] ?? null,
      typeRestricted: url.includes('/api/articles/house/'),
    };
  }
  if (url.includes('/api/complexes/') && url.includes('/prices')) return { channel: 'priceHistory' };
  if (url.includes('/api/')) return { channel: 'generic' };
  return { channel: 'ignored' };
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

type TypeTagged = Pick<MarkerRecord,
  'realEstateTypeCode' | 'realEstateTypeName' | 'estateType' | 'estateTypeName' | 'rletTpCd' | 'rletTpNm'>;

/** Villa / row-house test; the type code wins over the name when both exist. */
export function isVilla(rec: TypeTagged): boolean {
  const code = firstText(rec.realEstateTypeCode, rec.estateType, rec.rletTpCd).toUpperCase();
  if (code) return code === 'VL';
  const name = firstText(rec.realEstateTypeName, rec.estateTypeName, rec.rletTpNm);
  return VILLA_KEYWORDS.some((k) => name.includes(k));
}

/** Only sale transactions are kept; lease and monthly-rent listings are dropped. */
export function isSaleTrade(rec: Pick<ArticleRecord, 'tradeType' | 'tradTp' | 'tradeTypeName' | 'tradTpNm'>): boolean {
  const code = firstText(rec.tradeType, rec.tradTp).toUpperCase();
  const name = firstText(rec.tradeTypeName, rec.tradTpNm);
  return SALE_TRADE_CODES.includes(code) || SALE_TRADE_NAMES.includes(name);
}

/** Normalize desktop and mobile article records onto one summary shape. */
export function toListingSummary(rec: ArticleRecord, parentMarkerId: string | null): ListingSummary | null {
  const id = firstText(rec.articleNo, rec.atclNo);
  if (!id) return null;
  return {
    id,
    name: firstText(rec.articleName, rec.atclNm),
    tradeType: firstText(rec.tradeTypeName, rec.tradTpNm),
    tradeTypeCode: firstText(rec.tradeType, rec.tradTp).toUpperCase(),
    rawPriceText: firstText(rec.dealOrWarrantPrc, rec.prc),
    parentMarkerId,
    attributes: {
      floorInfo: firstText(rec.floorInfo, rec.flrInfo),
      grossArea: firstText(rec.area1, rec.spc1),
      netArea: firstText(rec.area2, rec.spc2),
      direction: text(rec.direction),
      featureText: firstText(rec.articleFeatureDesc, rec.atclFetrDesc),
      registeredAt: firstText(rec.articleConfirmYmd, rec.atclCfmYmd),
    },
  };
}

function firstCount(...values: Array<number | null | undefined>): number {
  for (const v of values) {
    if (v) return v;
  }
  return 0;
}

function nullableText(v: string | number | null | undefined): string | null {
  return v === null || v === undefined ? null : String(v);
}

export class ResponseIngestor {
  private readonly log = childLogger({ module: 'ingestor' });
  private readonly pending = new Set<Promise<Outcome<Ingested>>>();

  constructor(private readonly session: CollectionSession) {}

  /** Handle a response in the background; drain() waits for all of them. */
  enqueue(exchange: NetworkExchange): void {
    const task: Promise<Outcome<Ingested>> = this.handle(exchange).finally(() => {
      this.pending.delete(task);
    });
    this.pending.add(task);
  }

  async drain(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }

  async handle(exchange: NetworkExchange): Promise<Outcome<Ingested>> {
    if (!this.session.captureActive) return absent<Ingested>();
    const route = classifyEndpoint(exchange.url);
    if (route.channel === 'ignored') return absent<Ingested>();

    let body: unknown;
    try {
      body = await exchange.json();
    } catch (err) {
      return this.fail(route.channel, 'unreadable_body', errorMessage(err), exchange.url);
    }

    let outcome: Outcome<Ingested>;
    try {
      outcome = this.dispatch(route, body);
    } catch (err) {
      outcome = failure<Ingested>('malformed_payload', errorMessage(err));
    }

    if (outcome.kind === 'error') {
      return this.fail(route.channel, outcome.errorKind, outcome.message, exchange.url);
    }
    if (outcome.kind === 'ok') {
      responsesTotal.inc({ channel: route.channel, outcome: 'ingested' });
      if (route.channel === 'generic' && outcome.value.added > 0) {
        this.log.info(`Listings found: +${outcome.value.added} / total ${this.session.counts().listings}`);
      }
    }
    return outcome;
  }

  /** Feed an already-parsed payload through its channel. */
  dispatch(route: Exclude<InboundChannel, { channel: 'ignored' }>, body: unknown): Outcome<Ingested> {
    switch (route.channel) {
      case 'markers':
        return this.ingestMarkers(body, route.kind, route.typeRestricted);
      case 'listings':
        return this.ingestListings(body, route.parentId, route.typeRestricted);
      case 'priceHistory':
        return this.ingestPriceHistory(body);
      case 'generic':
        return ok<Ingested>({ channel: 'generic', added: this.scanForListings(body, 0) });
    }
  }

  ingestMarkers(body: unknown, kind: MarkerKind, typeRestricted: boolean): Outcome<Ingested> {
    const payload = MarkerPayloadSchema.safeParse(body);
    if (!payload.success) return failure<Ingested>('malformed_payload', 'marker payload is not a list');

    let added = 0;
    for (const rec of this.records(payload.data, MarkerRecordSchema)) {
      if (typeRestricted && !isVilla(rec)) continue;
      const id = firstText(rec.markerId, rec.complexNo, rec.houseNo);
      if (!id) continue;
      const isNew = this.session.upsertMarker({
        id,
        displayName: firstText(rec.complexName, rec.houseName),
        reportedCount: firstCount(rec.articleCount, rec.dealCount, rec.totalCount, rec.cnt),
        kind: rec.houseNo ? 'houses' : kind,
      });
      if (isNew) added++;
    }
    return ok<Ingested>({ channel: 'markers', added });
  }

  ingestListings(body: unknown, parentId: string | null, typeRestricted: boolean): Outcome<Ingested> {
    const payload = ArticleListPayloadSchema.safeParse(body);
    if (!payload.success) return failure<Ingested>('malformed_payload', 'article list payload is not an object');

    const total = firstCount(payload.data.totalCount, payload.data.count);
    if (parentId && total) this.session.noteMarkerCount(parentId, total);

    let added = 0;
    const articles = payload.data.articleList ?? payload.data.articles ?? [];
    for (const rec of this.records(articles, ArticleRecordSchema)) {
      if (typeRestricted && !isVilla(rec)) continue;
      if (!isSaleTrade(rec)) continue;
      const listing = toListingSummary(rec, parentId);
      if (listing && this.session.addListing(listing)) added++;
    }
    return ok<Ingested>({ channel: 'listings', added });
  }

  ingestPriceHistory(body: unknown): Outcome<Ingested> {
    const payload = PricePayloadSchema.safeParse(body);
    if (!payload.success) return failure<Ingested>('malformed_payload', 'price payload is not a list');

    let added = 0;
    for (const rec of this.records(payload.data, PriceRecordSchema)) {
      const record: LeaseHistoryRecord = {
        dealDate: nullableText(rec.dealDate),
        area: nullableText(rec.area),
        floor: nullableText(rec.floor),
        dealPrice: nullableText(rec.dealPrice),
      };
      if (this.session.addPriceRecord(record)) added++;
    }
    return ok<Ingested>({ channel: 'priceHistory', added });
  }

  /**
   * Walk an arbitrary payload; any object carrying articleNo/atclNo inside a
   * list is treated as a listing. An `articleList` key short-circuits the walk.
   */
  private scanForListings(node: unknown, depth: number): number {
    if (depth > MAX_SCAN_DEPTH) return 0;
    let added = 0;
    if (Array.isArray(node)) {
      for (const item of node) {
        if (isRecord(item) && (item.articleNo || item.atclNo)) {
          const parsed = ArticleRecordSchema.safeParse(item);
          if (!parsed.success || !isSaleTrade(parsed.data)) continue;
          const listing = toListingSummary(parsed.data, null);
          if (listing && this.session.addListing(listing)) added++;
        } else {
          added += this.scanForListings(item, depth + 1);
        }
      }
    } else if (isRecord(node)) {
      if (Array.isArray(node.articleList)) return this.scanForListings(node.articleList, depth + 1);
      for (const value of Object.values(node)) {
        added += this.scanForListings(value, depth + 1);
      }
    }
    return added;
  }

  /** Records that pass the schema; the rest are dropped one by one. */
  private *records<S extends ZodTypeAny>(items: readonly unknown[], schema: S): Generator<z.output<S>> {
    for (const item of items) {
      const parsed = schema.safeParse(item);
      if (parsed.success) yield parsed.data;
    }
  }

  private fail(channel: ChannelName, errorKind: FailureKind, message: string, url: string): Outcome<Ingested> {
    responsesTotal.inc({ channel, outcome: errorKind });
    this.log.debug({ channel, errorKind, url }, `Response skipped: ${message}`);
    return failure<Ingested>(errorKind, message);
  }
}
