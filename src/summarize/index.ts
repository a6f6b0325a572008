export {
  Summarizer,
  truncateSummary,
  type Summary,
  type SummaryStatus,
  type SummarizerOptions,
} from "./summarizer.js";
export {
  createProvider,
  buildPrompt,
  AnthropicProvider,
  OpenAIProvider,
  GeminiProvider,
  LocalModelProvider,
  type SummaryProvider,
  type SummaryRequest,
} from "./providers.js";
