import type { ContentRequest } from '@/modules/content/application/ports/content-generator.port';
import type { Lead } from '@/modules/leads/domain/lead';

const PAGE_TEXT_LIMIT = 3000;

const TONE = 'Calm, respectful and concise. No hype, no buzzwords, no exaggerated claims.';

export function buildPrompt(lead: Lead, request: ContentRequest): string {
  const school = lead.name ?? 'the school';
  const city = lead.extras.city ?? 'unknown city';
  const hook = lead.personalization_hook ?? '';

  switch (request.kind) {
    case 'personalization_hook':
      return [
        'Write exactly one sentence for a cold email to a private K-12 school.',
        'It must reference something specific from the website text below.',
        'Avoid generic praise. Under 30 words.',
        '',
        `School: ${school}`,
        `City: ${city}`,
        'Website text:',
        (request.pageText ?? '').slice(0, PAGE_TEXT_LIMIT),
      ].join('\n');

    case 'email':
      return [
        'Write a cold email body (90-130 words) to the leadership team of a private K-12 school.',
        `Tone: ${TONE}`,
        'Include the personalization sentence, one practical value statement and a soft call to action for a 15-minute call.',
        'Do not include a subject line.',
        `School: ${school}`,
        `City: ${city}`,
        `Personalization: ${hook}`,
      ].join('\n');

    case 'contact_form':
      return [
        'Write a website contact-form message (60-90 words) to a private K-12 school.',
        `Tone: ${TONE}`,
        'End with a soft request for a 15-minute conversation.',
        `School: ${school}`,
        `Personalization: ${hook}`,
      ].join('\n');

    case 'linkedin':
      return [
        'Write a LinkedIn connection note under 300 characters to a school leader.',
        'Calm and specific, with a soft ask for a brief call.',
        `School: ${school}`,
        `Personalization: ${hook}`,
      ].join('\n');

    case 'followup':
      return [
        'Write a short follow-up email body (50-80 words) to a private school.',
        `It is ${request.days ?? 5} days after the first message.`,
        `Tone: ${TONE}`,
        'Restate the practical value once and close with a gentle ask for a 15-minute call.',
        `School: ${school}`,
      ].join('\n');

    case 'brief':
      return [
        'Create a one-page markdown call brief for a sales call with a private K-12 school.',
        'Use these sections exactly: Context Summary, Likely Priorities, Discovery Questions, Objection Handling, Next-Step Ask.',
        'Keep it practical and concise.',
        `School: ${school}`,
        `City: ${city}`,
        `Website: ${lead.website ?? ''}`,
        `Primary contact: ${lead.primary_contact ?? 'General Office'}`,
        `Personalization: ${hook}`,
      ].join('\n');
  }
}
