import { describe, expect, it } from 'vitest';
import { MAX_USER_SAMPLES, buildExtractionPrompt } from '../../../src/services/extractor/prompt.js';

describe('buildExtractionPrompt', () => {
  it('ends with the email to extract from', () => {
    const prompt = buildExtractionPrompt('INR 99 debited', []);
    expect(prompt.endsWith('Now extract from this email:\nINR 99 debited')).toBe(true);
  });

  it('includes built-in examples with their expected output', () => {
    const prompt = buildExtractionPrompt('x', []);
    expect(prompt).toContain('Example 1:\nEmail: ');
    expect(prompt).toContain('"recipient":"cafe.brew@okbank"');
    expect(prompt).not.toContain('Emails this user typically receives');
  });

  it('numbers user samples after the built-in examples and caps them', () => {
    const samples = Array.from({ length: MAX_USER_SAMPLES + 2 }, (_, i) => ({ subject: '', body: `sample ${i}` }));

    const prompt = buildExtractionPrompt('x', samples);

    expect(prompt).toContain('Example 5:\nEmail: sample 0');
    expect(prompt).toContain(`Email: sample ${MAX_USER_SAMPLES - 1}`);
    expect(prompt).not.toContain(`Email: sample ${MAX_USER_SAMPLES}`);
  });

  it('prefixes a sample subject when there is one', () => {
    const prompt = buildExtractionPrompt('x', [{ subject: 'Debit alert', body: 'INR 5 debited' }]);
    expect(prompt).toContain('Email: Subject: Debit alert\nINR 5 debited');
  });
});
