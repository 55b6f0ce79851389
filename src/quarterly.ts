#!/usr/bin/env node
import { runQuarterlyScrape } from './monitor/quarterly.js';
import type { QuarterlyRunOptions } from './monitor/types.js';

const USAGE = 'Usage: quarterly <company_name|all> [--no-details] [--max-pages N]';

function parseArgs(argv: string[]): QuarterlyRunOptions | null {
  const positional: string[] = [];
  const options: Omit<QuarterlyRunOptions, 'target'> = { fetchDetails: true };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg === '--no-details') {
      options.fetchDetails = false;
      continue;
    }
    if (arg === '--max-pages' && argv[i + 1]) {
      const parsed = Number(argv[i + 1]);
      if (Number.isFinite(parsed) && parsed > 0) {
        options.maxPages = Math.floor(parsed);
      }
      i += 1;
      continue;
    }
    positional.push(arg);
  }

  const target = positional.join(' ').trim();
  return target ? { ...options, target } : null;
}

async function main(): Promise<void> {
  const options = parseArgs(process.argv.slice(2));
  if (!options) {
    console.error(USAGE);
    process.exitCode = 1;
    return;
  }
  await runQuarterlyScrape(options);
}

main().catch((error) => {
  console.error(`Quarterly scrape failed: ${String(error)}`);
  process.exitCode = 1;
});
