import { Logger } from '@nestjs/common';
import OpenAI from 'openai';

import type {
  ContentGenerator,
  ContentRequest,
} from '@/modules/content/application/ports/content-generator.port';
import { buildPrompt } from '@/modules/content/infra/openai/prompts';
import { errorMessage, ProviderUnavailableError } from '@/modules/leads/domain/errors';
import type { Lead } from '@/modules/leads/domain/lead';

/**
 * Chat-completion backed copy. An empty completion falls back to the
 * deterministic generator; a failed request surfaces as ProviderUnavailable.
 */
export class OpenAiContentGenerator implements ContentGenerator {
  private readonly logger = new Logger(OpenAiContentGenerator.name);

  constructor(
    private readonly client: OpenAI,
    private readonly model: string,
    private readonly fallback: ContentGenerator,
  ) {}

  async generate(lead: Lead, request: ContentRequest): Promise<string> {
    let completion: OpenAI.Chat.Completions.ChatCompletion;
    try {
      completion = await this.client.chat.completions.create({
        model: this.model,
        temperature: 0.3,
        messages: [{ role: 'user', content: buildPrompt(lead, request) }],
      });
    } catch (error) {
      throw new ProviderUnavailableError('openai', errorMessage(error));
    }

    const text = completion.choices[0]?.message.content?.trim();
    if (text) return text;

    this.logger.warn(`Empty ${request.kind} completion for ${lead.lead_id}, using template`);
    return this.fallback.generate(lead, request);
  }
}
