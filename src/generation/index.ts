export {
  type DispatchOptions,
  type DispatchProgressInfo,
  type DispatchSummary,
  dispatchChapters,
  summarizeResults
} from './dispatcher'
export {
  buildChapterPrompt,
  buildChapterRequests,
  buildMetadataPrompt,
  type ChapterPromptContext,
  type ManuscriptSection
} from './prompt'
export {
  type ChapterRunner,
  ChapterTaskRunner,
  type ChapterTaskRunnerOptions,
  failedResult,
  type GenerationLogger
} from './runner'
