/**
 * Scheduled award refresh
 * Daily 6 AM UTC: rerun the USAspending download pipeline and rewrite the workbook
 */

import { schedules, logger } from "@trigger.dev/sdk";
import { loadConfig } from "../config/env.js";
import { createStaticConfig } from "../config/static-config.js";
import { XlsxWorkbookSink } from "../exporter/workbook-sink.js";
import { createDownloadDeps, runAwardPipeline } from "../scrapers/award-orchestrator.js";

export const refreshAwardsTask = schedules.task({
  id: "refresh-awards",
  cron: "0 6 * * *",
  maxDuration: 3600,
  run: async (payload, { signal }) => {
    const appConfig = loadConfig();
    const staticConfig = createStaticConfig(appConfig.keywords);

    logger.info("Award refresh started", {
      scheduledAt: payload.timestamp.toISOString(),
      keywords: appConfig.keywords,
    });

    const report = await runAwardPipeline({
      config: staticConfig,
      failFast: appConfig.failFast,
      pollDeadlineMs: appConfig.pollDeadlineMs,
      signal,
    }, createDownloadDeps(appConfig, staticConfig, logger));

    const lastUpdated = new Date(report.evaluatedAt);
    await new XlsxWorkbookSink(appConfig.outputPath, logger).publish(report.awards, lastUpdated);

    logger.info("Award refresh complete", {
      awards: report.awards.length,
      warnings: report.warnings,
    });

    return {
      evaluatedAt: report.evaluatedAt,
      count: report.awards.length,
      groups: report.groups,
      warnings: report.warnings,
    };
  },
});
