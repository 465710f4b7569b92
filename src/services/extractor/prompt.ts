/**
 * @fileoverview Few-shot prompt for bank-notification extraction.
 */

import type { SampleEmail } from './types.js';

/** Upper bound on user-supplied samples included in one prompt */
export const MAX_USER_SAMPLES = 5;

/** Longest email body sent to the model */
const MAX_BODY_LENGTH = 6000;

export const EXTRACTION_SYSTEM_PROMPT = `You extract transaction details from bank notification emails.

Respond with a single JSON object and nothing else, using exactly these keys:
- "amount": the debited amount as digits with an optional decimal part, no currency symbol
- "date": the transaction date as it appears in the email
- "transaction_time": the transaction time as it appears in the email
- "account_number": the (usually masked) account or card number the money left from
- "recipient": the merchant, payee or UPI handle that received the money

Use the string "Unknown" for any field the email does not state. If the email is
not about a debit transaction, every field is "Unknown".`;

interface WorkedExample {
  email: string;
  output: Record<string, string>;
}

const BUILT_IN_EXAMPLES: WorkedExample[] = [
  {
    email: 'Dear Customer, INR 1,250.00 has been debited from your A/c no. XX4821 on 03-02-25 at 14:05:11 towards UPI/P2M/cafe.brew@okbank. Not you? Call the helpline.',
    output: { amount: '1,250.00', date: '03-02-25', transaction_time: '14:05:11', account_number: 'XX4821', recipient: 'cafe.brew@okbank' },
  },
  {
    email: 'Your Credit Card ending 7734 was used for USD 18.99 at STREAMFLIX on Mar 14, 2025 at 09:30 PM.',
    output: { amount: '18.99', date: 'Mar 14, 2025', transaction_time: '09:30 PM', account_number: '7734', recipient: 'STREAMFLIX' },
  },
  {
    email: 'Rs.560 spent on your debit card XX0912 at GREEN GROCERS on 21/06/2025 18:42. Avl bal Rs.10,440.',
    output: { amount: '560', date: '21/06/2025', transaction_time: '18:42', account_number: 'XX0912', recipient: 'GREEN GROCERS' },
  },
  {
    email: 'Thank you for registering for online banking. Your user id is active from today.',
    output: { amount: 'Unknown', date: 'Unknown', transaction_time: 'Unknown', account_number: 'Unknown', recipient: 'Unknown' },
  },
];

function formatExample(index: number, email: string, output?: Record<string, string>): string {
  const lines = [`Example ${index}:`, `Email: ${email}`];
  if (output) {
    lines.push(`Output: ${JSON.stringify(output)}`);
  }
  return lines.join('\n');
}

/**
 * Build the user turn: built-in worked examples, the user's own sample
 * emails (input only), then the email to extract from.
 */
export function buildExtractionPrompt(emailBody: string, samples: readonly SampleEmail[]): string {
  const sections = BUILT_IN_EXAMPLES.map((example, i) => formatExample(i + 1, example.email, example.output));

  const userSamples = samples.slice(0, MAX_USER_SAMPLES);
  if (userSamples.length > 0) {
    sections.push('Emails this user typically receives from their bank:');
    userSamples.forEach((sample, i) => {
      const text = sample.subject ? `Subject: ${sample.subject}\n${sample.body}` : sample.body;
      sections.push(formatExample(BUILT_IN_EXAMPLES.length + i + 1, text.slice(0, MAX_BODY_LENGTH)));
    });
  }

  sections.push(`Now extract from this email:\n${emailBody.slice(0, MAX_BODY_LENGTH)}`);
  return sections.join('\n\n');
}
