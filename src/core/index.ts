export * from './cells.js';
export * from './errors.js';
export {
  createScoreDomain,
  detectScoreDomains,
  domainContains,
  ScoreDomainRegistry
} from './score-domains.js';
export {
  decideStrategy,
  detectStrategy,
  numericFirstColumnShare,
  type StrategyDecision,
  type StrategyReason
} from './strategy-detector.js';
export {
  fragmentSchema,
  scoreDomainSchema,
  tableStitcherConfigSchema,
  parseFragments,
  parsePageTexts,
  parseDocumentInput,
  parseTableStitcherConfig
} from './schemas.js';
