export * from './LogRecord.js';
export * from './SourceStats.js';
export * from './NetworkStats.js';
export * from './RiskAssessment.js';
export * from './BlockPlan.js';
export * from './Configuration.js';
export * from './Report.js';
