export { EventPipeline, type AnalysisResult } from './backend/eventPipeline';
export { EventClassifier } from './backend/eventClassifier';
export { SessionReconstructor, stepReaderState } from './backend/sessionReconstructor';
export type { ReaderState, ReaderStep, SessionReconstruction } from './backend/sessionReconstructor';
export { extractBookmarks, extractBrightness, extractDictionaryLookups, summarizeTerms } from './backend/extractors';
export { BrightnessHistory, ReadingSessions, interpolatedPercentiles } from './backend/statistics';
export { planExtraction, type ExtractionPlan } from './backend/selection';
export { resolveAnalysisOptions, type AnalysisOptions } from './backend/config';
export { MemoryRowSource, type RowSource } from './backend/rowSource';
export { KoboDatabase, type KoboDatabaseOptions } from './backend/storage';
export { AnalysisError, EmptyInputError, InvalidArgumentError, MissingSourceError } from './backend/errors';
export type * from './shared/types';
