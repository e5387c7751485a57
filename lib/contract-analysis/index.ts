export * from "./types"
export { segmentClauses, MIN_CLAUSE_LENGTH } from "./segmenter"
export { classifyContract } from "./contract-classifier"
export { extractEntities } from "./entity-extractor"
export { tagClause } from "./clause-tagger"
export { detectRisks, riskLevelFor } from "./risk-detector"
export { explainRisks, mitigationFor } from "./explainer"
export { compositeRiskScore } from "./scoring"
export { analyzeContract, analyzeClause } from "./analyze"
export { RULES } from "./rules"
