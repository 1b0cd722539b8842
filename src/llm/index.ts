export {
  CompletionClient,
  createCompletionClient,
  DEFAULT_MODEL,
  DEFAULT_BASE_URL,
  DEFAULT_TIMEOUT_MS,
  type CompletionClientConfig,
  type ChatMessage,
  type FetchLike,
} from './client.js';

export {
  buildDocumentPrompt,
  loadPromptTemplate,
  readSourceFile,
  templateCandidates,
  SOURCE_HEADING,
} from './prompts/document.js';

export { redactSecrets } from './redact.js';
