import type { TemplateType } from '@salesdesk/core';

export interface DefaultTemplate {
  name: string;
  templateType: TemplateType;
  subject: string;
  bodyHtml: string;
}

export const DEFAULT_TEMPLATES: readonly DefaultTemplate[] = [
  {
    name: 'Welcome Email',
    templateType: 'welcome',
    subject: "Welcome {{first_name}}! Let's get started",
    bodyHtml: [
      '<p>Hi {{first_name}},</p>',
      "<p>Thank you for your interest in our services! I'm {{user_name}} and I'll be your point of contact.</p>",
      "<p>I'd love to learn more about {{company}} and how we can help you achieve your goals.</p>",
      '<p>Would you be available for a quick 15-minute call this week? I have some availability on:</p>',
      '<ul>',
      '  <li>Tomorrow at 2:00 PM</li>',
      '  <li>Wednesday at 10:00 AM</li>',
      '  <li>Thursday at 3:00 PM</li>',
      '</ul>',
      '<p>Looking forward to connecting with you!</p>',
      '<p>Best regards,<br>{{user_name}}<br>{{user_email}}</p>',
    ].join('\n'),
  },
  {
    name: 'Follow-up Email',
    templateType: 'follow_up',
    subject: 'Following up on our conversation',
    bodyHtml: [
      '<p>Hi {{first_name}},</p>',
      "<p>I wanted to follow up on our previous conversation about {{company}}'s needs.</p>",
      "<p>Have you had a chance to review the information I sent? I'd be happy to answer any questions you might have.</p>",
      "<p>If you'd like to move forward, we could schedule a more detailed discussion about your requirements.</p>",
      '<p>Please let me know your thoughts!</p>',
      '<p>Best regards,<br>{{user_name}}<br>{{user_email}}</p>',
    ].join('\n'),
  },
];
