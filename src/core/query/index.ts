export {
  QueryAnalyzer,
  parseAnalysis,
  defaultAnalysis,
  QUERY_INTENTS,
  type QueryAnalysis,
  type QueryIntent,
} from "./query-analyzer.js";
