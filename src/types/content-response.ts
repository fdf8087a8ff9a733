export interface GenerationInfo {
  input_tokens: number;
  output_tokens: number;
  [key: string]: unknown;
}

export interface ContentChoice {
  content: string;
  /** Provider stop reason, copied verbatim */
  stopReason: string;
  generationInfo: GenerationInfo;
}

export interface ContentResponse {
  choices: ContentChoice[];
}
