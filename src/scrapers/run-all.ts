/**
 * Run the award pipeline once and write the workbook
 *
 * Usage: npm run fetch-awards -- "keyword one,keyword two"
 */

import dotenv from 'dotenv';
import { loadConfig, parseKeywordList } from '../config/env.js';
import { createStaticConfig } from '../config/static-config.js';
import { XlsxWorkbookSink } from '../exporter/workbook-sink.js';
import { consoleLogger } from '../utils/logger.js';
import { createDownloadDeps, runAwardPipeline } from './award-orchestrator.js';

dotenv.config({ path: '.env.local' });

async function runAll(): Promise<void> {
  const appConfig = loadConfig();
  const keywordArg = process.argv[2];
  const keywords = keywordArg === undefined ? appConfig.keywords : parseKeywordList(keywordArg);
  const staticConfig = createStaticConfig(appConfig.keywords);

  console.log('='.repeat(60));
  console.log('USAspending Award Tracker - Data Collection');
  console.log('='.repeat(60));
  console.log(`Keywords: ${keywords.length > 0 ? keywords.join(', ') : '(none)'}`);
  console.log();

  const controller = new AbortController();
  process.once('SIGINT', () => {
    console.log('\nInterrupted, stopping the award run...');
    controller.abort();
  });

  const report = await runAwardPipeline({
    config: staticConfig,
    keywords,
    failFast: appConfig.failFast,
    pollDeadlineMs: appConfig.pollDeadlineMs,
    signal: controller.signal,
  }, createDownloadDeps(appConfig, staticConfig, consoleLogger));

  console.log('-'.repeat(60));
  for (const group of report.groups) {
    const status = group.error ? `FAILED (${group.error})` : `${group.rowCount} rows`;
    console.log(`  ${group.group.padEnd(14)} ${status}`);
  }
  for (const warning of report.warnings) {
    console.log(`  ! ${warning}`);
  }
  console.log(`Active awards matching keywords: ${report.awards.length}`);

  const sink = new XlsxWorkbookSink(appConfig.outputPath, consoleLogger);
  await sink.publish(report.awards, new Date(report.evaluatedAt));
  console.log('='.repeat(60));
}

runAll().catch(error => {
  console.error('Award pipeline failed:', error);
  process.exitCode = 1;
});
