/**
 * One refresh cycle in the foreground, then the top-N report.
 *
 * Usage:
 *   npm run refresh -- [--live] [--force] [--all] [--concurrency 20] [--top 25]
 */
import "dotenv/config";
import { loadConfig } from "./config";
import { createPipelineDeps } from "./modules/pipeline/deps";
import { parseArgs } from "./modules/pipeline/args";
import { formatReport, runPipeline } from "./modules/pipeline/service";

const main = async () => {
  const config = loadConfig();
  const { top, ...options } = parseArgs(process.argv.slice(2));
  let lastLogged = 0;

  const result = await runPipeline(createPipelineDeps(config), {
    ...options,
    onProgress: (stage, progress) => {
      if (!progress) {
        console.log(`[${stage}]`);
        return;
      }
      // log every 10%
      const step = Math.max(1, Math.ceil(progress.total / 10));
      if (progress.done === progress.total || progress.done - lastLogged >= step) {
        lastLogged = progress.done === progress.total ? 0 : progress.done;
        console.log(`  ${stage}: ${progress.done}/${progress.total} (${progress.failed} failed)`);
      }
    },
  });

  console.log(formatReport(result.rankings, top));
};

main().catch((error: unknown) => {
  console.error("Relic refresh failed:", error);
  process.exit(1);
});
