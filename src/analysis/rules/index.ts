export * from './types.js';
export { SOURCE_RULES, countAutomationAgents } from './sourceRules.js';
export { NETWORK_RULES } from './networkRules.js';
