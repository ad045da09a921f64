import 'dotenv/config';
import { loadConfig } from './config.js';

const config = loadConfig();

if (process.env.PORT) {
  // Server mode: runs are started over HTTP
  const { startServer } = await import('./server.js');
  startServer(config);
} else {
  // One-shot mode: local CLI / dry-run
  const { runPipeline } = await import('./pipeline.js');
  const { createRedditSource } = await import('./scrapers/reddit.js');
  try {
    await runPipeline({
      source: createRedditSource({
        clientId: config.REDDIT_CLIENT_ID,
        clientSecret: config.REDDIT_CLIENT_SECRET,
        userAgent: config.REDDIT_USER_AGENT,
      }),
      sourceId: config.SUBREDDIT,
      monthsBack: config.MONTHS_BACK,
      maxCount: config.FETCH_LIMIT,
      outputDir: config.OUTPUT_DIR,
      dryRun: config.DRY_RUN,
    });
    process.exit(0);
  } catch {
    // runPipeline has already logged the failure
    process.exit(1);
  }
}
