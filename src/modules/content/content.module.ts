import { Module } from '@nestjs/common';
import OpenAI from 'openai';

import { type ScoutConfig, scoutConfig } from '@/config/scout.config';
import {
  CONTENT_GENERATOR,
  PLACEHOLDER_CONTENT_GENERATOR,
  type ContentGenerator,
} from '@/modules/content/application/ports/content-generator.port';
import { OpenAiContentGenerator } from '@/modules/content/infra/openai/openai-content.generator';
import { TemplateContentGenerator } from '@/modules/content/infra/templates/template-content.generator';

export function createContentGenerator(config: ScoutConfig, template: ContentGenerator): ContentGenerator {
  if (!config.openAiApiKey) return template;
  return new OpenAiContentGenerator(new OpenAI({ apiKey: config.openAiApiKey }), config.openAiModel, template);
}

@Module({
  providers: [
    TemplateContentGenerator,
    { provide: PLACEHOLDER_CONTENT_GENERATOR, useExisting: TemplateContentGenerator },
    {
      provide: CONTENT_GENERATOR,
      inject: [scoutConfig.KEY, TemplateContentGenerator],
      useFactory: createContentGenerator,
    },
  ],
  exports: [CONTENT_GENERATOR, PLACEHOLDER_CONTENT_GENERATOR],
})
export class ContentModule {}
