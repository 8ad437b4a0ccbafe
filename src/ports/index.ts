// Port interfaces - abstractions for external dependencies
export type { ILLMProvider, LLMChatOptions, LLMMessage, LLMResponse } from './ILLMProvider';
export type {
  ExtractedText,
  IDocumentTextExtractor,
  UploadedDocument,
} from './IDocumentTextExtractor';
