import type { ChatCompletionCreateParamsNonStreaming } from 'openai/resources/chat/completions';
import type { SummarizerService, SummaryRequest } from '../types/collaborators';
import { getOpenAIClient, hasOpenAIKey, OPENAI_MODELS } from './openaiClient';
import { truncateWords } from '../utils/textSegmenter';

/** The part of the OpenAI client the summarizer calls. */
export interface ChatCompletionClient {
  chat: {
    completions: {
      create(body: ChatCompletionCreateParamsNonStreaming): Promise<{
        choices: Array<{ message: { content: string | null } }>;
      }>;
    };
  };
}

export function buildSummaryPrompt(request: SummaryRequest): string {
  return `${request.prompt}\n\nText to summarize (keep under ${request.maxWords} words):\n\n${request.text}`;
}

export class OpenAISummarizer implements SummarizerService {
  constructor(
    private readonly client: ChatCompletionClient = getOpenAIClient(),
    private readonly model: string = OPENAI_MODELS.SUMMARY
  ) {}

  async summarize(request: SummaryRequest): Promise<string> {
    if (!request.text.trim()) {
      return '[No text provided to summarize]';
    }

    const response = await this.client.chat.completions.create({
      model: this.model,
      messages: [{ role: 'user', content: buildSummaryPrompt(request) }],
      max_tokens: request.maxWords * 2,
      temperature: request.temperature
    });

    const summary = response.choices[0]?.message?.content?.trim() ?? '';
    const wordCount = summary.split(/\s+/).filter(Boolean).length;
    if (wordCount > request.maxWords) {
      console.warn(`⚠️ Summary has ${wordCount} words, trimming to ${request.maxWords}`);
    }
    return truncateWords(summary, request.maxWords);
  }
}

/**
 * The OpenAI summarizer when an API key is configured, otherwise null so AI
 * directives report that no summarizer is available.
 */
export function createSummarizer(): SummarizerService | null {
  if (!hasOpenAIKey()) {
    console.warn('⚠️ OPENAI_API_KEY not set, AI keywords are disabled');
    return null;
  }
  return new OpenAISummarizer();
}
