export {
  firstDifference,
  formatFailure,
  formatSummary,
  verifyJsonl,
  verifyRecord,
} from "./verify.js";
export type { LineResult, RecordVerdict, VerifyOptions, VerifySummary } from "./verify.js";
