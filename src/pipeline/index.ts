export {
  Orchestrator,
  runDigest,
  createComponents,
  type OrchestratorOptions,
  type PipelineComponents,
  type StorySource,
  type StorySummarizer,
} from "./orchestrator.js";
export {
  aggregateStatus,
  exitCode,
  formatRunReport,
  type RunReport,
  type RunStage,
  type RunStatus,
} from "./report.js";
