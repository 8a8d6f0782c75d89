import { describe, expect, it } from 'vitest';

import { htmlToText } from './html-to-text';
import { buildTemplateContext, renderTemplate, validateTemplate } from './renderer';

const lead = {
  firstName: 'Ann',
  lastName: 'Lee',
  company: 'Acme Corp',
  email: 'ann@example.com',
  phone: null,
};

const user = { firstName: 'Sam', lastName: 'Rep', email: 'sam@example.com' };

// Local-time constructor keeps the formatted values independent of the host time zone.
const now = new Date(2024, 2, 5, 9, 7);

describe('renderTemplate', () => {
  it('substitutes blank lead fields with empty strings', () => {
    const rendered = renderTemplate(
      { subject: 'Hello', bodyHtml: 'Hi {{first_name}}, from {{company}}' },
      { ...lead, company: '' },
      user,
      now
    );

    expect(rendered.htmlBody).toBe('Hi Ann, from ');
  });

  it('fills every placeholder in subject, html and text', () => {
    const rendered = renderTemplate(
      {
        subject: 'Welcome {{lead_name}}',
        bodyHtml: '<p>{{ first_name }} at {{company}} ({{phone}})</p>',
        bodyText: 'Sent by {{user_name}} <{{user_email}}> on {{current_date}} {{current_time}}',
      },
      lead,
      user,
      now
    );

    expect(rendered).toEqual({
      subject: 'Welcome Ann Lee',
      htmlBody: '<p>Ann at Acme Corp ()</p>',
      textBody: 'Sent by Sam Rep <sam@example.com> on March 05, 2024 09:07',
    });
  });

  it('leaves unknown placeholders verbatim', () => {
    const rendered = renderTemplate({ subject: '{{deal_size}} for {{first_name}}', bodyHtml: 'x' }, lead, user, now);

    expect(rendered.subject).toBe('{{deal_size}} for Ann');
  });

  it('derives the text body from the rendered html when none is given', () => {
    const rendered = renderTemplate(
      { subject: 'Hi', bodyHtml: '<p>Hi {{first_name}},</p>\n<p>Thanks<br>Sam</p>', bodyText: '  ' },
      lead,
      user,
      now
    );

    expect(rendered.textBody).toBe('Hi Ann,\n\nThanks\nSam');
  });

  it('builds the lead name from the first name alone when the last name is missing', () => {
    const context = buildTemplateContext({ ...lead, lastName: null }, user, now);

    expect(context.lead_name).toBe('Ann');
    expect(context.last_name).toBe('');
  });
});

describe('htmlToText', () => {
  it('drops scripts and styles and collapses whitespace', () => {
    const html = '<style>p{color:red}</style><div>One   two</div><script>alert(1)</script><div>\tthree</div>';

    expect(htmlToText(html)).toBe('One two\n three');
  });
});

describe('validateTemplate', () => {
  it('accepts known placeholders', () => {
    expect(validateTemplate({ subject: 'Hi {{first_name}}', bodyHtml: '<p>{{current_time}}</p>' })).toEqual([]);
  });

  it('reports unknown placeholders once each', () => {
    expect(
      validateTemplate({ subject: 'Hi {{nickname}}', bodyHtml: '{{nickname}} {{deal}}', bodyText: null })
    ).toEqual(['Unknown template variable: {{nickname}}', 'Unknown template variable: {{deal}}']);
  });

  it('reports tokens that are not plain placeholder names', () => {
    expect(validateTemplate({ subject: 'Hi {{first-name}}', bodyHtml: '<p>{{ lead.company }} {{ company }}</p>' })).toEqual([
      'Unknown template variable: {{first-name}}',
      'Unknown template variable: {{lead.company}}',
    ]);
  });

  it('requires a subject of at most 300 characters and a body', () => {
    expect(validateTemplate({ subject: ' ', bodyHtml: '' })).toEqual(['Subject is required', 'Email body is required']);
    expect(validateTemplate({ subject: 'x'.repeat(301), bodyHtml: 'ok' })).toEqual([
      'Subject must be 300 characters or fewer',
    ]);
  });
});
