export { buildSummaryPrompt, getSystemPrompt, type SummaryFormat } from './prompt.js';
export {
  DigestSummarizer,
  createOpenAIClient,
  formatSummaryFallback,
  type ChatCompletionClient,
  type ChatCompletionRequest,
  type ChatCompletionResponse,
  type ChatMessage,
  type DigestSummarizerOptions,
} from './summarizer.js';
export {
  buildDigestEmail,
  formatMailPreview,
  formatUtcMinute,
  formatUtcSecond,
  type DigestEmail,
  type DigestEmailInput,
} from './email.js';
