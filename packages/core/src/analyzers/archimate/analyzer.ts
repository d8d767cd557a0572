import { AnalyzerError, ErrorCode, ModelParseError } from '../../errors.js';
import { ModelIndex } from '../../model/model-index.js';
import { ElementType } from '../../model/model-types.js';
import type { ModelStats, ProcessAnalysis } from '../../model/model-types.js';
import type { ModelAnalyzer } from '../model-analyzer.js';
import { ARCHIMATE_METADATA } from './metadata.js';
import { classifyProcesses } from './process-classifier.js';

export class ArchimateAnalyzer implements ModelAnalyzer {
  readonly metadata = ARCHIMATE_METADATA;
  protected index: ModelIndex | null = null;

  parse(content: string): void {
    try {
      this.index = new ModelIndex(content);
    } catch (error) {
      this.index = null;
      const suggestions = this.metadata.errorSuggestions[ErrorCode.MODEL_PARSE_FAILED];
      if (error instanceof ModelParseError) {
        throw new ModelParseError(
          error.message,
          { line: error.line, column: error.column },
          suggestions
        );
      }
      throw AnalyzerError.fromError(error, 'archimate', this.metadata.displayName, suggestions);
    }
  }

  analyze(): ProcessAnalysis {
    return classifyProcesses(this.requireIndex());
  }

  getModelStats(): ModelStats {
    const index = this.requireIndex();
    let businessProcesses = 0;
    for (const element of index.elements()) {
      if (element.type === ElementType.BusinessProcess) businessProcesses++;
    }
    return {
      elements: index.elementCount,
      relationships: index.relationshipCount,
      businessProcesses,
    };
  }

  private requireIndex(): ModelIndex {
    if (!this.index) {
      throw AnalyzerError.notLoaded('archimate');
    }
    return this.index;
  }
}
