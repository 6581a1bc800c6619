/**
 * cli.ts — gap-collector entry point
 *
 *   gap-collector [--lat N] [--lon N] [--zoom N]
 *
 * Missing coordinates are asked for on a TTY and defaulted otherwise.
 * Writes the ranked candidates as CSV into OUTPUT_DIR.
 */
import 'dotenv/config';
import { createInterface } from 'node:readline/promises';
import { env, toCollectorConfig } from './config/env.ts';
import { labelsFor } from './config/labels.ts';
import { PlaywrightHost } from './browser/playwright.ts';
import { logger } from './shared/logger.ts';
import { writeMetricsFile } from './shared/metrics.ts';
import { runCollection } from './services/collector.ts';
import { writeCandidatesCsv } from './services/export.ts';
import { clampTarget, parseTargetArgs, promptMissing, withDefaults, type PartialTarget } from './services/target.ts';
import type { CollectionTarget } from './types.ts';

const TOP_N = 5;

async function readTarget(partial: PartialTarget): Promise<CollectionTarget> {
  if (!process.stdin.isTTY) return withDefaults(partial);
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    return await promptMissing(partial, (q) => rl.question(q));
  } finally {
    rl.close();
  }
}

const pct = (ratio: number | null) => (ratio === null ? '-' : `${(ratio * 100).toFixed(1)}%`);
const won = (n: number | null) => (n === null ? '-' : n.toLocaleString('ko-KR'));

async function main(): Promise<void> {
  const config = toCollectorConfig(env);
  const requested = await readTarget(parseTargetArgs(process.argv.slice(2)));
  const target = clampTarget(requested, config.bounds, config.zoomMin, config.zoomMax);
  logger.info({ target, assetTypes: config.assetTypes, workers: config.workerCount }, 'Starting collection');

  const host = await PlaywrightHost.launch({
    headless: env.HEADLESS,
    channel: env.BROWSER_CHANNEL,
    executablePath: env.BROWSER_EXECUTABLE,
    useMobileDetail: config.useMobileDetail,
    blockHeavyResources: config.blockHeavyResources,
  });

  try {
    const t0 = Date.now();
    const report = await runCollection(host, target, config);
    const file = await writeCandidatesCsv(report.candidates, env.OUTPUT_DIR, labelsFor(env.OUTPUT_LOCALE));
    logger.info({ file, ...report.details, elapsedMs: Date.now() - t0 }, `Saved ${report.candidates.length} candidates`);

    for (const [i, c] of report.candidates.slice(0, TOP_N).entries()) {
      logger.info(
        `${i + 1}. ${c.listing.name} (${c.listing.id}) sale ${won(c.saleWon)} / prev lease ${won(c.detail.previousLeaseWon)} / gap ${pct(c.gapRatio)}`,
      );
    }

    if (env.METRICS_FILE) {
      await writeMetricsFile(env.METRICS_FILE);
      logger.info({ file: env.METRICS_FILE }, 'Metrics written');
    }
  } finally {
    await host.close();
  }
}

process.on('unhandledRejection', (reason) => {
  logger.error({ err: reason }, 'Unhandled rejection');
});

main().catch((err: unknown) => {
  logger.fatal({ err }, 'Collection failed');
  process.exitCode = 1;
});
