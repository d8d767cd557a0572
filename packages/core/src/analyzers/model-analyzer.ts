import type { ModelStats, ProcessAnalysis } from '../model/model-types.js';
import type { AnalyzerMetadata } from './analyzer-metadata.js';

/** Analyzer interface for parsing a model document and classifying its processes. */
export interface ModelAnalyzer {
  /** Format-specific display info */
  readonly metadata: AnalyzerMetadata;

  /** Parse the document text into the analyzer's internal index. */
  parse(content: string): void;

  /** Classify business processes of the parsed model. */
  analyze(): ProcessAnalysis;

  /** Counts over the parsed model. */
  getModelStats(): ModelStats;
}
