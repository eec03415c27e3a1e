import type { AnalysisReport } from '../analysis/types/Report.js';

let latestReport: AnalysisReport | null = null;

export function getLatestReport(): AnalysisReport | null {
  return latestReport;
}

export function setLatestReport(report: AnalysisReport): void {
  latestReport = report;
}

export function clearLatestReport(): void {
  latestReport = null;
}
