export { TranscriptStage, type TranscriptClient } from './transcript-stage';
export {
  SummarizationStage,
  type Summarizer,
  type SummarizationInput,
} from './summarization-stage';
export { classifyStageError, type StageOutcome, type FailedOutcome } from './outcome';
