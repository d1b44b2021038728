import type { Express } from 'express';
import { loadConfig } from '../config/env.js';
import type { AppConfig } from '../config/env.js';
import { createStaticConfig } from '../config/static-config.js';
import { XlsxWorkbookSink } from '../exporter/workbook-sink.js';
import { createDownloadDeps, createPipelineRunner } from '../scrapers/award-orchestrator.js';
import { consoleLogger } from '../utils/logger.js';
import { createApp } from './app.js';

export function buildApp(appConfig: AppConfig = loadConfig()): Express {
  const staticConfig = createStaticConfig(appConfig.keywords);
  const downloadDeps = createDownloadDeps(appConfig, staticConfig, consoleLogger);

  return createApp({
    appConfig,
    staticConfig,
    runPipeline: createPipelineRunner(appConfig, staticConfig, downloadDeps),
    sink: new XlsxWorkbookSink(appConfig.outputPath, consoleLogger),
    logger: consoleLogger,
  });
}

export async function startServer(): Promise<void> {
  const appConfig = loadConfig();
  const app = buildApp(appConfig);

  await new Promise<void>(resolve => {
    app.listen(appConfig.port, () => {
      console.log(`Server running at http://localhost:${appConfig.port}`);
      console.log(`API available at http://localhost:${appConfig.port}/api`);
      console.log('\nEndpoints:');
      console.log('  GET  /api/config           - Keywords, time period and award-type groups');
      console.log('  GET  /api/awards           - Run the pipeline (?keywords=a,b)');
      console.log('  GET  /api/awards/export    - Same run as an .xlsx download');
      console.log('  POST /api/awards/refresh   - Rewrite the workbook at AWARDS_OUTPUT_PATH');
      console.log('\nAward routes start three USAspending export jobs per request and give up on');
      console.log(`a job after ${(appConfig.pollDeadlineMs ?? appConfig.httpPollDeadlineMs) / 1000}s (POLL_DEADLINE_SECONDS or HTTP_POLL_DEADLINE_SECONDS).`);
      resolve();
    });
  });
}
