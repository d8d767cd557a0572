import { ConfigurationError } from '../errors.js';
import type { ModelAnalyzer } from './model-analyzer.js';
import { ArchimateAnalyzer } from './archimate/analyzer.js';

type ModelFormat = 'archimate';

const SUPPORTED_FORMATS: readonly ModelFormat[] = ['archimate'];

function isModelFormat(format: string): format is ModelFormat {
  return SUPPORTED_FORMATS.some((supported) => supported === format);
}

export function createAnalyzer(format = 'archimate'): ModelAnalyzer {
  if (!isModelFormat(format)) {
    throw new ConfigurationError(
      `Unknown model format: "${format}". Supported formats: ${SUPPORTED_FORMATS.join(', ')}`,
      'ARCHI_MODEL_FORMAT'
    );
  }

  return new ArchimateAnalyzer();
}
