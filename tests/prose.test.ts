import { describe, expect, it } from 'vitest';
import { extractProse } from '../src/extraction/prose.js';

describe('extractProse', () => {
  it('removes boilerplate phrases and paragraphs', () => {
    const html =
      '<p>Change the world. Love your job. Put your talent to work with us and grow.</p>' +
      '<p>Texas Instruments Incorporated (TI) is a global semiconductor design company.</p>' +
      '<p>As a test engineer you will develop production test programs for analog devices.</p>' +
      '<p>Short one.</p>';

    expect(extractProse(html)).toBe(
      'As a test engineer you will develop production test programs for analog devices.',
    );
  });

  it('keeps substantive paragraphs and drops the equal opportunity notice', () => {
    const html =
      '<p>Design bandgap references for automotive power management ICs.</p>' +
      '<p>Texas Instruments is an equal opportunity employer.</p>' +
      '<p>Work with layout engineers to close silicon validation issues.</p>';

    expect(extractProse(html)).toBe(
      'Design bandgap references for automotive power management ICs.\n\n' +
        'Work with layout engineers to close silicon validation issues.',
    );
  });

  it('joins paragraphs with a blank line', () => {
    const html =
      '<p>You will own wafer-level reliability qualification.</p>' +
      '<ul><li>Partner with process integration on failure analysis.</li></ul>';

    expect(extractProse(html)).toBe(
      'You will own wafer-level reliability qualification.\n\nPartner with process integration on failure analysis.',
    );
  });

  it('returns undefined when only boilerplate remains', () => {
    const html = '<p>Change the world. Love your job.</p><p>Why TI</p>';
    expect(extractProse(html)).toBeUndefined();
  });

  it('returns undefined when the result is too short', () => {
    expect(extractProse('<p>Tune the wafer test cards.</p>')).toBeUndefined();
  });

  it('accepts custom boilerplate rules', () => {
    const html = '<p>Acme Semi is hiring now. Build mixed-signal test fixtures for the lab.</p>';
    expect(extractProse(html, { phrases: ['Acme Semi is hiring now\\.\\s*'], paragraphs: [] })).toBe(
      'Build mixed-signal test fixtures for the lab.',
    );
  });
});
