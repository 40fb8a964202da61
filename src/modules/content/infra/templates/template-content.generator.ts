import { Injectable } from '@nestjs/common';

import type {
  ContentGenerator,
  ContentRequest,
} from '@/modules/content/application/ports/content-generator.port';
import type { Lead } from '@/modules/leads/domain/lead';

function cityOf(lead: Lead): string {
  return lead.extras.city ?? 'your community';
}

function schoolOf(lead: Lead): string {
  return lead.name ?? 'your school';
}

/** Fixed copy for every content kind. Output depends only on the lead. */
@Injectable()
export class TemplateContentGenerator implements ContentGenerator {
  async generate(lead: Lead, request: ContentRequest): Promise<string> {
    const school = schoolOf(lead);

    switch (request.kind) {
      case 'personalization_hook':
        return `I noticed ${school} puts real weight on its mission for students and families in ${cityOf(lead)}.`;

      case 'email':
        return [
          `Hi ${school} team,`,
          '',
          `${lead.personalization_hook ?? 'I came across your school and its focus on student support.'} ` +
            'We help school leaders take routine work off their staff and keep follow-through consistent day to day. ' +
            'If it is useful, I can share a short example shaped around your campus. ' +
            'Would you be open to a 15-minute call next week?',
        ].join('\n');

      case 'contact_form':
        return (
          `Hello ${school} team, I am reaching out because we help school leaders reduce routine ` +
          'administrative work and keep day-to-day follow-through consistent. ' +
          'I would be glad to share one simple example that fits your school. ' +
          'Would a 15-minute call next week be possible?'
        );

      case 'linkedin':
        return (
          `Hi, I work with private schools like ${school} to lighten routine administrative load ` +
          'for staff and families. I can share one practical example if helpful. ' +
          'Would you be open to a brief 15-minute conversation?'
        );

      case 'followup':
        return [
          `Hi ${school} team,`,
          '',
          `Following up on my note from ${request.days ?? 5} days ago in case it got buried. ` +
            'We support school administrators with practical workflow improvements so staff can stay focused on students and families. ' +
            'Would you be open to a 15-minute call?',
        ].join('\n');

      case 'brief':
        return [
          `# Call Brief: ${school}`,
          '',
          '## Context Summary',
          `- Private K-12 school in ${cityOf(lead)}.`,
          `- Hook: ${lead.personalization_hook ?? 'n/a'}`,
          '',
          '## Likely Priorities',
          '- Staff workload balance',
          '- Consistent student support',
          '- Responsiveness to families',
          '',
          '## Discovery Questions',
          '- Where does administrative follow-through break down most often?',
          '- Which weekly routines take the most staff time?',
          '- What outcomes matter most this term?',
          '',
          '## Objection Handling',
          '- Keep the approach practical and lightweight.',
          '- Build on existing workflows and staff capacity.',
          '',
          '## Next-Step Ask',
          '- Confirm a 15-minute follow-up with key stakeholders.',
        ].join('\n');
    }
  }
}
