// ═══════════════════════════════════════════════════════
// Zod Schemas — Shapes of the map backend's JSON payloads
// Only the fields the collector reads; everything else passes through.
// ═══════════════════════════════════════════════════════
import { z } from 'zod';

// ids and counts arrive as either strings or numbers depending on the endpoint.
// A field of the wrong type reads as null; the record survives unless it has no id.
const IdLike = z.union([z.string(), z.number()]).transform(String).nullish().catch(null);
const Scalar = z.union([z.string(), z.number()]).nullish().catch(null);
const Text = z.string().nullish().catch(null);
const Count = z.union([
  z.number().int().nonnegative(),
  z.string().regex(/^\d+$/).transform(Number),
]).nullish().catch(null);
const List = z.array(z.unknown()).nullish().catch(null);

const RealEstateTypeFields = {
  realEstateTypeCode: Text,
  realEstateTypeName: Text,
  estateType: Text,
  estateTypeName: Text,
  rletTpCd: Text,
  rletTpNm: Text,
};

// ── */single-markers ──

export const MarkerRecordSchema = z.object({
  markerId: IdLike,
  complexNo: IdLike,
  houseNo: IdLike,
  complexName: Text,
  houseName: Text,
  articleCount: Count,
  dealCount: Count,
  totalCount: Count,
  cnt: Count,
  ...RealEstateTypeFields,
}).passthrough();

export type MarkerRecord = z.infer<typeof MarkerRecordSchema>;

export const MarkerPayloadSchema = z.array(z.unknown());

// ── /api/articles/{complex|house}/{id} ──

export const ArticleRecordSchema = z.object({
  articleNo: IdLike,
  atclNo: IdLike,
  articleName: Scalar,
  atclNm: Scalar,
  tradeType: Text,
  tradTp: Text,
  tradeTypeName: Text,
  tradTpNm: Text,
  dealOrWarrantPrc: Scalar,
  prc: Scalar,
  floorInfo: Scalar,
  flrInfo: Scalar,
  area1: Scalar,
  spc1: Scalar,
  area2: Scalar,
  spc2: Scalar,
  direction: Scalar,
  articleFeatureDesc: Scalar,
  atclFetrDesc: Scalar,
  articleConfirmYmd: Scalar,
  atclCfmYmd: Scalar,
  ...RealEstateTypeFields,
}).passthrough();

export type ArticleRecord = z.infer<typeof ArticleRecordSchema>;

export const ArticleListPayloadSchema = z.object({
  totalCount: Count,
  count: Count,
  articleList: List,
  articles: List,
}).passthrough();

// ── /api/complexes/{id}/prices ──

export const PriceRecordSchema = z.object({
  dealDate: Scalar,
  area: Scalar,
  floor: Scalar,
  dealPrice: Scalar,
}).passthrough();

export const PricePayloadSchema = z.array(z.unknown());
