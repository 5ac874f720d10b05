/**
 * Batch entry point.
 *
 *   node dist/pipeline.js derive          # expand -> genome-wide summary -> gap candidates
 *   node dist/pipeline.js enrich --top 20 # external lookups for the top candidates
 *
 * Exit code 1 when a phase failed.
 */

import { parseArgs } from 'node:util';
import { loadConfig } from './src/config.js';
import { runDerivation } from './src/integrations/run_derivation_stage.js';
import { runEnrichmentStage } from './src/integrations/run_enrichment_stage.js';

const USAGE = 'usage: pipeline.js <derive | enrich [--top N]>';

async function main(argv: string[]): Promise<number> {
  const { positionals, values } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: { top: { type: 'string' } },
  });
  const config = loadConfig();

  switch (positionals[0]) {
    case 'derive': {
      const status = await runDerivation(config.paths);
      const failed = Object.entries(status.phases).filter(([, o]) => o === 'failed').map(([p]) => p);
      console.log(`[derive] Done in ${status.duration_seconds}s: ${JSON.stringify(status.phases)}`);
      return failed.length ? 1 : 0;
    }
    case 'enrich': {
      const top = values.top === undefined ? config.enrichment.top : Number(values.top);
      if (!Number.isInteger(top) || top < 1) {
        console.error(`[enrich] --top must be a positive integer, got ${values.top}`);
        return 2;
      }
      await runEnrichmentStage(config.paths, { ...config.enrichment, top });
      return 0;
    }
    default:
      console.error(USAGE);
      return 2;
  }
}

main(process.argv.slice(2))
  .then(code => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error(`[pipeline] ${err instanceof Error ? err.message : String(err)}`);
    process.exitCode = 1;
  });
