/**
 * Built-in email templates
 *
 * `{{field}}` must resolve to a non-empty lead value; `{{field?}}` may be
 * empty. Fields: name, company, role, email, industry, location, website,
 * signals, and any key of the lead's custom map.
 */

import { InvalidInput } from '../common/errors.js';

export interface EmailTemplate {
  id: string;
  description: string;
  /** System instructions for the model */
  instructions: string;
  /** User message body, before the knowledge section */
  body: string;
}

const SHARED_RULES = [
  'Write in plain text, no markdown.',
  'Keep it under 150 words.',
  'Use only facts from the company knowledge section; never invent numbers, customers or claims.',
  'No pressure tactics, no exaggerated promises, no ALL-CAPS, at most one link.',
  'End with one clear, low-friction call to action.',
].join('\n- ');

export const COLD_INTRO_TEMPLATE: EmailTemplate = {
  id: 'cold_intro',
  description: 'First-touch cold email introducing our offer to a new lead',
  instructions: `You are an SDR writing a first cold email on behalf of our company.
Rules:
- ${SHARED_RULES}`,
  body: `Write a first-touch email to {{name}} at {{company}}.
Their role: {{role?}}
Industry: {{industry?}}
Location: {{location?}}
What we know about them: {{signals?}}

Connect one relevant point from our company knowledge to their situation.`,
};

export const FOLLOW_UP_TEMPLATE: EmailTemplate = {
  id: 'follow_up',
  description: 'Short follow-up to a lead who has not replied',
  instructions: `You are an SDR writing a short follow-up to a cold email that got no reply.
Rules:
- ${SHARED_RULES}
- Do not guilt-trip the reader about not replying.`,
  body: `Write a brief follow-up to {{name}} at {{company}}.
Their role: {{role?}}
Recent signals: {{signals?}}

Add one new, concrete reason to talk, taken from our company knowledge.`,
};

const TEMPLATES: ReadonlyMap<string, EmailTemplate> = new Map(
  [COLD_INTRO_TEMPLATE, FOLLOW_UP_TEMPLATE].map(template => [template.id, template])
);

export const DEFAULT_TEMPLATE_ID = COLD_INTRO_TEMPLATE.id;

/**
 * @throws InvalidInput for an unknown id
 */
export function getTemplate(id: string = DEFAULT_TEMPLATE_ID): EmailTemplate {
  const template = TEMPLATES.get(id);
  if (!template) {
    const known = [...TEMPLATES.keys()].join(', ');
    throw new InvalidInput(`Unknown template "${id}". Available: ${known}`, [`template_id: unknown value "${id}"`]);
  }
  return template;
}
