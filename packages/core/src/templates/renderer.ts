import { format } from 'date-fns';

import { MAX_SUBJECT_LENGTH } from '../email/types';
import { getLeadFullName, type Lead } from '../leads/types';
import { getUserFullName, type User } from '../users/types';
import { htmlToText } from './html-to-text';

export const TEMPLATE_PLACEHOLDERS = [
  'lead_name',
  'first_name',
  'last_name',
  'company',
  'email',
  'phone',
  'user_name',
  'user_email',
  'current_date',
  'current_time',
] as const;

export type TemplatePlaceholder = (typeof TEMPLATE_PLACEHOLDERS)[number];
export type TemplateContext = Record<TemplatePlaceholder, string>;

export interface TemplateContent {
  subject: string;
  bodyHtml: string;
  bodyText?: string | null;
}

export interface RenderedEmail {
  subject: string;
  htmlBody: string;
  textBody: string;
}

export type RenderLead = Pick<Lead, 'firstName' | 'lastName' | 'company' | 'email' | 'phone'>;
export type RenderUser = Pick<User, 'firstName' | 'lastName' | 'email'>;

const PLACEHOLDER_PATTERN = /\{\{\s*([A-Za-z0-9_]+)\s*\}\}/g;
// Any braced token; validation reports names outside the placeholder set.
const BRACED_TOKEN_PATTERN = /\{\{\s*([^}]+?)\s*\}\}/g;
const placeholderSet: ReadonlySet<string> = new Set(TEMPLATE_PLACEHOLDERS);

const isTemplatePlaceholder = (name: string): name is TemplatePlaceholder => placeholderSet.has(name);

export const buildTemplateContext = (lead: RenderLead, user: RenderUser, now: Date = new Date()): TemplateContext => ({
  lead_name: getLeadFullName(lead),
  first_name: lead.firstName,
  last_name: lead.lastName ?? '',
  company: lead.company ?? '',
  email: lead.email,
  phone: lead.phone ?? '',
  user_name: getUserFullName(user),
  user_email: user.email,
  current_date: format(now, 'MMMM dd, yyyy'),
  current_time: format(now, 'HH:mm'),
});

export const substitutePlaceholders = (text: string, context: TemplateContext): string =>
  text.replace(PLACEHOLDER_PATTERN, (match, name: string) => (isTemplatePlaceholder(name) ? context[name] : match));

export const renderTemplate = (
  template: TemplateContent,
  lead: RenderLead,
  user: RenderUser,
  now: Date = new Date()
): RenderedEmail => {
  const context = buildTemplateContext(lead, user, now);
  const htmlBody = substitutePlaceholders(template.bodyHtml, context);
  const textSource = template.bodyText?.trim() ? template.bodyText : null;

  return {
    subject: substitutePlaceholders(template.subject, context),
    htmlBody,
    textBody: textSource ? substitutePlaceholders(textSource, context) : htmlToText(htmlBody),
  };
};

export const extractPlaceholders = (text: string): string[] => {
  const names = new Set<string>();
  for (const match of text.matchAll(BRACED_TOKEN_PATTERN)) {
    names.add(match[1] ?? '');
  }
  return [...names];
};

/** Error messages for a template draft; an empty list means it can be saved. */
export const validateTemplate = (template: TemplateContent): string[] => {
  const errors: string[] = [];

  if (!template.subject.trim()) {
    errors.push('Subject is required');
  } else if (template.subject.length > MAX_SUBJECT_LENGTH) {
    errors.push(`Subject must be ${MAX_SUBJECT_LENGTH} characters or fewer`);
  }

  if (!template.bodyHtml.trim()) {
    errors.push('Email body is required');
  }

  const sources = [template.subject, template.bodyHtml, template.bodyText ?? ''];
  const unknown = new Set<string>();
  for (const source of sources) {
    for (const name of extractPlaceholders(source)) {
      if (!isTemplatePlaceholder(name)) {
        unknown.add(name);
      }
    }
  }

  for (const name of unknown) {
    errors.push(`Unknown template variable: {{${name}}}`);
  }

  return errors;
};
