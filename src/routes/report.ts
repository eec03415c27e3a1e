import { Response, Router } from 'express';
import { z } from 'zod';
import { getAnalysisService } from '../analysis/AnalysisService.js';
import { BlockAdvisor } from '../analysis/BlockAdvisor.js';
import { RiskScorer } from '../analysis/RiskScorer.js';
import type { AnalysisReport } from '../analysis/types/Report.js';
import { strictLimiter } from '../middleware/rateLimiter.js';
import { getLatestReport, setLatestReport } from '../report/reportStore.js';
import {
  serializeNetworkRiskAssessment,
  serializeRiskAssessment,
  serializeSourceStats,
} from '../report/serializeReport.js';

const limitSchema = z.coerce.number().int().min(1).max(500).default(50);

const analyzeBodySchema = z.object({
  lines: z.array(z.string()).max(100_000),
});

const router = Router();

const requireReport = (res: Response): AnalysisReport | null => {
  const report = getLatestReport();
  if (!report) {
    res.status(404).json({ error: 'No analysis has been run yet' });
    return null;
  }
  return report;
};

const summarize = (report: AnalysisReport) => ({
  runId: report.runId,
  origin: report.origin,
  generatedAt: new Date(report.generatedAt).toISOString(),
  ingestion: report.ingestion,
  summary: report.summary,
  timePatterns: report.timePatterns,
  baseline: report.baseline,
  blockPlanStatistics: report.blockPlan.statistics,
});

router.get('/summary', (req, res) => {
  const report = requireReport(res);
  if (report) {
    res.json(summarize(report));
  }
});

router.get('/sources', (req, res) => {
  const limit = limitSchema.safeParse(req.query.limit);
  if (!limit.success) {
    return res.status(400).json({ error: 'limit must be an integer between 1 and 500' });
  }

  const report = requireReport(res);
  if (report) {
    res.json({
      total: report.suspiciousSources.length,
      sources: report.suspiciousSources.slice(0, limit.data).map(serializeRiskAssessment),
    });
  }
});

router.get('/sources/:address', (req, res) => {
  const report = requireReport(res);
  if (!report) {
    return;
  }

  const stats = report.snapshot.sources.get(req.params.address);
  if (!stats) {
    return res.status(404).json({ error: `No traffic recorded for ${req.params.address}` });
  }

  // Assess with the configuration the stored run used
  const scorer = new RiskScorer(report.config);
  const assessment =
    report.suspiciousSources.find((source) => source.address === stats.address) ??
    scorer.assessSource(stats, report.baseline);

  res.json({
    stats: serializeSourceStats(stats),
    riskScore: assessment.riskScore,
    reasons: assessment.reasons,
    contributions: assessment.contributions,
    suspicious: scorer.isSuspiciousSource(assessment),
    tier: new BlockAdvisor(report.config.blockPlan).classifyTier(assessment.riskScore),
  });
});

router.get('/networks', (req, res) => {
  const limit = limitSchema.safeParse(req.query.limit);
  if (!limit.success) {
    return res.status(400).json({ error: 'limit must be an integer between 1 and 500' });
  }

  const report = requireReport(res);
  if (report) {
    res.json({
      total: report.suspiciousNetworks.length,
      networks: report.suspiciousNetworks.slice(0, limit.data).map(serializeNetworkRiskAssessment),
    });
  }
});

router.get('/block-plan', (req, res) => {
  const report = requireReport(res);
  if (report) {
    res.json(report.blockPlan);
  }
});

router.post('/analyze', strictLimiter, async (req, res) => {
  const body = analyzeBodySchema.safeParse(req.body);
  if (!body.success) {
    return res.status(400).json({
      error: 'Body must be { lines: string[] }',
      issues: body.error.issues.map((issue) => issue.message),
    });
  }

  try {
    const report = await getAnalysisService().analyzeLines(body.data.lines, { origin: 'http' });
    setLatestReport(report);
    res.json({ ...summarize(report), blockPlan: report.blockPlan });
  } catch (error) {
    console.error('Analysis request failed:', error);
    res.status(500).json({ error: 'Analysis failed' });
  }
});

export default router;
