export {
  createBackendSummarizer,
  excerptSummary,
  SummarizationStrategy,
  summaryHeader,
  type BackendSummarizerOptions,
} from "./summarization.js";
export { pruneText, ToolOutputPruningStrategy } from "./tool-output-pruning.js";
export { TruncationStrategy, truncationMarker } from "./truncation.js";
