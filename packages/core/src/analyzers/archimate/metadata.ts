import { ErrorCode } from '../../errors.js';
import type { AnalyzerMetadata } from '../analyzer-metadata.js';

export const ARCHIMATE_METADATA: AnalyzerMetadata = {
  id: 'archimate',
  displayName: 'ArchiMate',
  errorSuggestions: {
    [ErrorCode.MODEL_PARSE_FAILED]: [
      'Ensure the file is a well-formed XML document',
      'Export the model with File > Export > Model to Open Exchange File in Archi',
      'Check that the document root is a <model> element',
    ],
  },
};
