import type { ContactClassification, ContactSignals } from '@/modules/enrichment/domain/contact';

export function classifyContact(signals: ContactSignals): ContactClassification {
  const { email, linkedinUrl, contactFormUrl, phone } = signals;

  if (email && linkedinUrl) return { method: 'email', tier: 'Tier 1', score: 100 };
  if (linkedinUrl) return { method: 'linkedin', tier: 'Tier 2', score: 80 };
  if (email) return { method: 'email', tier: 'Tier 3', score: 70 };
  if (contactFormUrl) return { method: 'contact_form', tier: 'Tier 4', score: 50 };
  if (phone) return { method: 'phone_only', tier: 'Tier 5', score: 20 };
  return { method: 'none', tier: 'Tier 5', score: 0 };
}
