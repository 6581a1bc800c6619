import { describe, it, expect, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { labelsFor, toLabelTable } from '../config/labels.ts';
import { csvCell, renderCsv, toExportRow, writeCandidatesCsv } from '../services/export.ts';
import { buildCandidate } from '../services/gap-analyzer.ts';
import type { Candidate } from '../types.ts';

const EN_HEADER = [
  'Listing Name', 'Listing ID', 'Trade Type', 'Sale Price (KRW)', 'Floor', 'Area (sqm)', 'Net Area',
  'Direction', 'Features', 'Registered', 'Agency', 'Agent', 'Phone 1', 'Phone 2', 'Lease Period (yrs)',
  'Lease Max in Period (KRW)', 'Lease Min in Period (KRW)', 'Previous Lease (KRW)', 'Gap Amount (KRW)', 'Gap Ratio',
].join(',');

function sampleCandidate(): Candidate {
  return buildCandidate(
    {
      id: '2401',
      name: '한빛 101동',
      tradeType: '매매',
      tradeTypeCode: 'A1',
      rawPriceText: '3억',
      parentMarkerId: '111',
      attributes: {
        floorInfo: '5/15',
        grossArea: '84',
        netArea: '59',
        direction: '남향',
        featureText: '올수리, "급매"',
        registeredAt: '20240301',
      },
    },
    {
      skip: false,
      agencyName: '행복공인중개사',
      agentName: '김민수',
      phone1: '02-123-4567',
      phone2: '',
      leasePeriodYears: 2,
      leaseMaxWon: 360_000_000,
      leaseMinWon: null,
      previousLeaseWon: 375_000_000,
    },
  );
}

const SAMPLE_LINE = '한빛 101동,2401,매매,300000000,5/15,84,59,남향,"올수리, ""급매""",20240301,'
  + '행복공인중개사,김민수,02-123-4567,,2,360000000,,375000000,-75000000,-0.25';

describe('labels', () => {
  it('covers every export field in both locales', () => {
    expect(labelsFor('ko').columns.size).toBe(20);
    expect(labelsFor('en').columns.size).toBe(20);
    expect(labelsFor('ko').columns.get('gapRatio')).toBe('갭비율');
    expect(labelsFor('ko').filePrefix).toBe('매물정보_확장');
  });

  it('rejects a table with missing headings', () => {
    expect(() => toLabelTable({ filePrefix: 'x', columns: { listingName: 'Name' } }))
      .toThrow(/Label table is missing columns: listingId, tradeTypeLabel/);
  });
});

describe('csvCell', () => {
  it('quotes only when needed', () => {
    expect(csvCell(null)).toBe('');
    expect(csvCell(-0.25)).toBe('-0.25');
    expect(csvCell('plain')).toBe('plain');
    expect(csvCell('a,b')).toBe('"a,b"');
    expect(csvCell('say "hi"')).toBe('"say ""hi"""');
    expect(csvCell('two\nlines')).toBe('"two\nlines"');
  });
});

describe('renderCsv', () => {
  it('writes the header and one line per candidate', () => {
    const csv = renderCsv([toExportRow(sampleCandidate())], labelsFor('en'));
    expect(csv).toBe(`${EN_HEADER}\r\n${SAMPLE_LINE}\r\n`);
  });

  it('writes only the header for an empty result', () => {
    expect(renderCsv([], labelsFor('en'))).toBe(`${EN_HEADER}\r\n`);
  });
});

describe('writeCandidatesCsv', () => {
  let dir = '';

  afterEach(async () => {
    if (dir) await rm(dir, { recursive: true, force: true });
  });

  it('writes a timestamped UTF-8 file with a byte-order mark', async () => {
    dir = await mkdtemp(join(tmpdir(), 'gap-export-'));
    const out = join(dir, 'nested');

    const path = await writeCandidatesCsv([sampleCandidate()], out, labelsFor('en'), new Date(2024, 2, 15, 14, 25, 1));

    expect(path).toBe(join(out, 'listings_extended_20240315_142501.csv'));
    const content = await readFile(path, 'utf8');
    expect(content).toBe(`\uFEFF${EN_HEADER}\r\n${SAMPLE_LINE}\r\n`);
  });
});
