export interface AnalyzerMetadata {
  id: string;
  displayName: string;
  errorSuggestions: Partial<Record<string, string[]>>;
}
