import { describe, expect, it } from 'vitest';
import { DEFAULT_SECTION_PATTERNS } from '../src/extraction/patterns.js';
import { extractJobSections, extractSection } from '../src/extraction/sections.js';

describe('extractSection', () => {
  it('prefers earlier patterns over later ones', () => {
    const text = "Bachelor's degree applicants welcome. Minimum Education: PhD required";
    expect(extractSection(text, DEFAULT_SECTION_PATTERNS.education)).toBe('PhD required');
  });

  it('falls back to the degree heuristic', () => {
    expect(extractSection("Applicants need a Master's degree in EE", DEFAULT_SECTION_PATTERNS.education)).toBe(
      "Master's",
    );
  });

  it('falls back to a years-of-experience phrase', () => {
    expect(extractSection('Needs 5+ years of relevant experience', DEFAULT_SECTION_PATTERNS.experience)).toBe(
      '5+ years',
    );
  });

  it('returns the whole match for patterns without a group', () => {
    expect(extractSection('Pay: $95,000 - $135,000 per year', DEFAULT_SECTION_PATTERNS.salary)).toBe(
      '$95,000 - $135,000',
    );
  });

  it('matches shorthand and en dash currency ranges', () => {
    expect(extractSection('Target pay $90K-$120K plus bonus', DEFAULT_SECTION_PATTERNS.salary)).toBe('$90K-$120K');
    expect(extractSection('Pay: $95,000 \u2013 $135,000 per year', DEFAULT_SECTION_PATTERNS.salary)).toBe(
      '$95,000 \u2013 $135,000',
    );
  });

  it('returns undefined when nothing matches', () => {
    expect(extractSection('Nothing relevant here', DEFAULT_SECTION_PATTERNS.salary)).toBeUndefined();
    expect(extractSection('', DEFAULT_SECTION_PATTERNS.salary)).toBeUndefined();
  });

  it('skips patterns that do not compile', () => {
    expect(extractSection('Salary Range: $1', ['(', 'Salary Range:?(.+)'])).toBe('$1');
  });
});

describe('extractJobSections', () => {
  it('extracts every labeled section', () => {
    const text =
      'Responsibilities: Design analog front ends. Education: BS in Electrical Engineering. ' +
      'Experience: 3 years with CMOS layout. Skills: SPICE simulation. ' +
      'Preferred Qualifications: Tapeout experience. Salary Range: $120,000 - $150,000. Benefits: medical';

    expect(extractJobSections(text)).toEqual({
      responsibilities: 'Design analog front ends.',
      minEducation: 'BS in Electrical Engineering.',
      minExperience: '3 years with CMOS layout.',
      preferredQualifications: 'Tapeout experience.',
      salaryRange: '$120,000 - $150,000.',
    });
  });

  it('returns an empty record for empty input', () => {
    expect(extractJobSections('')).toEqual({});
    expect(extractJobSections(undefined)).toEqual({});
  });

  it('bounds field length', () => {
    const sections = extractJobSections(`Responsibilities: ${'a'.repeat(6000)}`);
    expect(sections.responsibilities).toHaveLength(5000);
  });
});
