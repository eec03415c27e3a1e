import path from 'path';
import schedule from 'node-schedule';
import app from './server.js';
import { getAnalysisService } from './analysis/AnalysisService.js';
import { ConfigurationError, getConfigurationManager } from './analysis/ConfigurationManager.js';
import { analysisErrorHandler } from './analysis/ErrorHandler.js';
import { ReportWriter } from './report/ReportWriter.js';
import { setLatestReport } from './report/reportStore.js';

const PORT = process.env.PORT || 3000;
const LOG_DIR = process.env.LOG_DIR || path.resolve(process.cwd(), 'logs');

async function runAnalysis(): Promise<void> {
  const report = await getAnalysisService().analyzeDirectory(LOG_DIR);
  setLatestReport(report);

  const { statistics } = report.blockPlan;
  console.log(
    `Analysis ${report.runId}: ${report.summary.totalSources} sources, ${statistics.totalSuspicious} suspicious, ${statistics.highRisk} high risk`,
  );

  await new ReportWriter().write(report);
}

async function initializeServer() {
  try {
    getConfigurationManager();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      analysisErrorHandler.handleConfigurationError(error);
      process.exitCode = 1;
      return;
    }
    throw error;
  }

  try {
    console.log(`Analyzing edge logs in ${LOG_DIR}...`);
    await runAnalysis();
  } catch (error) {
    console.error('Initial analysis failed:', error);
    console.log('Server will start without a report');
  }

  const cron = process.env.ANALYSIS_CRON;
  if (cron) {
    schedule.scheduleJob(cron, () => {
      runAnalysis().catch((error) => console.error('Scheduled analysis failed:', error));
    });
    console.log(`Re-analysis scheduled with "${cron}"`);
  }

  app.listen(PORT, () => {
    console.log(`Edge traffic analyzer running on port ${PORT}`);
  });
}

initializeServer().catch(console.error);
