/**
 * Message Templates
 *
 * Template families, the prompt handed to the generation service, the
 * canonical colleague disclosure line and the fixed follow-up template.
 *
 * @module outreach/templates
 */

import type { ContactVariant } from './contracts/treatment';
import type { FactPayload, Framing, TemplateFamily } from './contracts/generated-message';

// ===========================================
// Families
// ===========================================

export const TEMPLATE_FAMILY_BY_VARIANT: Record<ContactVariant, Exclude<TemplateFamily, 'follow_up'>> = {
  'top-tier-personalized': 'top_tier',
  'standard-personalized': 'standard',
  'exhibitor-sales': 'exhibitor_sales',
};

export const FRAMING_BY_FAMILY: Record<Exclude<TemplateFamily, 'follow_up'>, Framing> = {
  top_tier: 'meet_privately',
  standard: 'booth_visit',
  exhibitor_sales: 'light_touch',
};

const FAMILY_GUIDANCE: Record<Exclude<TemplateFamily, 'follow_up'>, string> = {
  top_tier: [
    'Tone: direct and senior. Offer to meet privately during the show at a time that suits them.',
    'Open with the hook if one is supplied, connect it to their distribution or yard footprint, then make the ask.',
  ].join('\n'),
  standard: [
    'Tone: friendly and brief. Invite them to stop by the booth during expo hours.',
    'Mention one supplied fact about their company, then the invitation.',
  ].join('\n'),
  exhibitor_sales: [
    'Tone: light and peer-to-peer. They are exhibiting too, so acknowledge the busy week.',
    'Do not propose a meeting, call, calendar slot or time to talk. Leave the door open for them to reply.',
  ].join('\n'),
};

// ===========================================
// Disclosure
// ===========================================

/**
 * Matches any sentence telling the reader that colleagues are being
 * contacted too, whoever wrote it
 */
export const DISCLOSURE_PATTERN =
  /\b(?:also|am|are|'m)\s+(?:reaching|writing|emailing)\s+(?:out\s+)?to\s+(?:a\s+few\s+|some\s+|other\s+|your\s+)?(?:of\s+your\s+)?(?:colleagues|others|teammates|people)\b/i;

export function disclosureLine(companyName: string): string {
  return `I'm also reaching out to a few of your colleagues at ${companyName}, so feel free to pass this to whoever is best placed.`;
}

export function hasDisclosure(text: string): boolean {
  return DISCLOSURE_PATTERN.test(text);
}

/**
 * Remove every disclosure sentence, dropping lines left empty
 */
export function stripDisclosure(body: string): string {
  const lines = body.split('\n').map((line) =>
    line
      .split(/(?<=[.!?])\s+/)
      .filter((sentence) => !hasDisclosure(sentence))
      .join(' '),
  );

  return lines
    .filter((line, i) => line.trim() !== '' || (i > 0 && lines[i - 1].trim() !== ''))
    .join('\n')
    .trim();
}

export function withDisclosure(body: string, companyName: string, include: boolean): string {
  const stripped = stripDisclosure(body);
  return include ? `${stripped}\n\n${disclosureLine(companyName)}` : stripped;
}

// ===========================================
// Meeting Offer Language
// ===========================================

/** Phrases that offer a meeting slot; kept out of exhibitor-sales messages */
export const MEETING_OFFER_PHRASES = [
  'meet privately',
  'meet up',
  'meet at the show',
  'meet during',
  'time to meet',
  'set up a meeting',
  'schedule a meeting',
  'book a meeting',
  'grab a meeting',
  'a quick call',
  'hop on a call',
  'jump on a call',
  'schedule a call',
  'set up a call',
  'book time',
  'grab time',
  'find time',
  'sit down with',
  'my calendar',
  'calendar link',
  'minutes on your calendar',
] as const;

const MEETING_OFFER_PATTERN = new RegExp(
  `\\b(?:${MEETING_OFFER_PHRASES.map((p) => p.replace(/ /g, '\\s+')).join('|')})\\b`,
  'i',
);

export function findMeetingOffer(text: string): string | null {
  const match = MEETING_OFFER_PATTERN.exec(text);
  return match ? match[0] : null;
}

// ===========================================
// Generation Prompt
// ===========================================

export interface PromptConstraints {
  /** Problems with the previous draft; switches to strict mode */
  rejected?: string[];
}

export function buildGenerationPrompt(
  family: Exclude<TemplateFamily, 'follow_up'>,
  payload: FactPayload,
  constraints: PromptConstraints = {},
): string {
  const { include_disclosure: _include, ...facts } = payload;

  const sections = [
    `Write a first-touch email to ${payload.first_name} at ${payload.company_name}, who is attending the conference.`,
    FAMILY_GUIDANCE[family],
    '',
    'Facts you may use (and nothing else):',
    JSON.stringify(facts, null, 2),
    '',
    'Rules:',
    '- Use no number that does not appear in the facts above. If no count is supplied, make no numeric claims.',
    '- List every fact you used in claimed_facts, naming the field it came from and quoting it closely.',
    '- Do not say that you are contacting their colleagues; that line is added separately.',
    '- Under 120 words. No sign-off name or signature block.',
  ];

  if (constraints.rejected && constraints.rejected.length > 0) {
    sections.push(
      '',
      'Your previous draft was rejected for:',
      ...constraints.rejected.map((reason) => `- ${reason}`),
      'Write a new draft that avoids all of these. When in doubt, leave a fact out.',
    );
  }

  return sections.join('\n');
}

// ===========================================
// Follow-up Template
// ===========================================

export function followUpSubject(firstName: string): string {
  return `Following up, ${firstName}`;
}

export function followUpBody(firstName: string, companyName: string): string {
  return [
    `Hi ${firstName},`,
    '',
    `Following up on my note from last week in case it got buried. If gate or yard flow is on the radar at ${companyName}, I'd be glad to share what we're seeing from similar teams.`,
    '',
    'Either way, thanks for reading.',
  ].join('\n');
}
