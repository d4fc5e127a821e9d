/**
 * Natural-language summary of an analysis report.
 *
 * The chat model sits behind {@link ChatCompletionClient}, a subset of the
 * openai SDK surface, so tests can substitute a stub. Summarizing never
 * throws: any failure yields a fallback text carrying the raw report.
 */

import OpenAI from 'openai';
import type { WindowReport } from '../types/index.js';
import { createLogger } from '../utils/logger.js';
import { buildSummaryPrompt, getSystemPrompt, type SummaryFormat } from './prompt.js';

const log = createLogger('digest:summarizer');

export interface ChatMessage {
  role: 'system' | 'user';
  content: string;
}

export interface ChatCompletionRequest {
  model: string;
  messages: ChatMessage[];
}

export interface ChatCompletionResponse {
  choices: Array<{ message: { content: string | null } }>;
}

export interface ChatCompletionClient {
  chat: {
    completions: {
      create(request: ChatCompletionRequest): Promise<ChatCompletionResponse>;
    };
  };
}

/**
 * Adapt the openai SDK to {@link ChatCompletionClient}.
 */
export function createOpenAIClient(apiKey: string): ChatCompletionClient {
  const openai = new OpenAI({ apiKey });
  return {
    chat: {
      completions: {
        async create(request) {
          const completion = await openai.chat.completions.create({
            model: request.model,
            messages: request.messages.map(message =>
              message.role === 'system'
                ? { role: 'system' as const, content: message.content }
                : { role: 'user' as const, content: message.content }
            ),
          });
          return {
            choices: completion.choices.map(choice => ({
              message: { content: choice.message.content },
            })),
          };
        },
      },
    },
  };
}

export interface DigestSummarizerOptions {
  /** null when no model key is configured */
  client: ChatCompletionClient | null;
  model: string;
}

export function formatSummaryFallback(report: WindowReport, reason: string): string {
  return `Failed to generate summary: ${reason}\n\nRaw analysis:\n${JSON.stringify(report, null, 2)}`;
}

export class DigestSummarizer {
  private readonly client: ChatCompletionClient | null;
  private readonly model: string;

  constructor(options: DigestSummarizerOptions) {
    this.client = options.client;
    this.model = options.model;
  }

  async summarize(report: WindowReport, format: SummaryFormat = 'text'): Promise<string> {
    if (!this.client) {
      log.warn('No summary model configured');
      return formatSummaryFallback(report, 'no summary model configured (set OPENAI_API_KEY)');
    }

    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        messages: [
          { role: 'system', content: getSystemPrompt(format) },
          { role: 'user', content: buildSummaryPrompt(report) },
        ],
      });

      const content = response.choices[0]?.message.content?.trim() ?? '';
      if (content === '') {
        throw new Error('empty response from summary model');
      }

      log.debug({ model: this.model, format, length: content.length }, 'Summary generated');
      return content;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      log.warn({ model: this.model, error: reason }, 'Summary generation failed');
      return formatSummaryFallback(report, reason);
    }
  }
}
