export type PatternLike = string | RegExp;

export type SectionField =
  | 'responsibilities'
  | 'education'
  | 'experience'
  | 'preferredQualifications'
  | 'salary';

export type SectionPatterns = Record<SectionField, readonly PatternLike[]>;

export interface BoilerplateRules {
  /** Removed from inside a paragraph, leaving the rest of it. */
  phrases: readonly PatternLike[];
  /** A paragraph matching any of these is dropped entirely. */
  paragraphs: readonly PatternLike[];
}

export interface ExtractionProfile {
  sectionPatterns: SectionPatterns;
  responsibilityHeadings: readonly PatternLike[];
  looseResponsibilityHeadings: readonly PatternLike[];
  minimumRequirementHeadings: readonly PatternLike[];
  preferredQualificationHeadings: readonly PatternLike[];
  salaryRangePattern: PatternLike;
  exportControlPattern: PatternLike;
  boilerplate: BoilerplateRules;
}

export type ExtractionProfileOverride = Partial<Omit<ExtractionProfile, 'sectionPatterns' | 'boilerplate'>> & {
  sectionPatterns?: Partial<SectionPatterns>;
  boilerplate?: Partial<BoilerplateRules>;
};

// Labeled sections first, loose keyword matches last.
export const DEFAULT_SECTION_PATTERNS: SectionPatterns = {
  responsibilities: [
    "Responsibilities:?(.+?)(?=Qualifications|Requirements|Education|Experience|$)",
    "Job Description:?(.+?)(?=Qualifications|Requirements|Education|$)",
    "What You'll Do:?(.+?)(?=What You'll Need|Qualifications|$)",
  ],
  education: [
    'Minimum Education:?(.+?)(?=Experience|Preferred|$)',
    'Required Education:?(.+?)(?=Experience|Preferred|$)',
    'Education:?(.+?)(?=Experience|Qualifications|Skills|$)',
    "(Bachelor's|Master's|PhD|Associate's).{0,100}(?:degree|required)",
    '(?:BS|MS|PhD).{0,50}in.{0,50}(?:Engineering|Science|Computer)',
  ],
  experience: [
    'Minimum Experience:?(.+?)(?=Education|Preferred|$)',
    'Required Experience:?(.+?)(?=Preferred|$)',
    'Experience:?(.+?)(?=Education|Skills|Qualifications|$)',
    '(\\d+\\+?\\s*years?).{0,100}(?:experience|of experience)',
  ],
  preferredQualifications: [
    'Preferred Qualifications:?(.+?)(?=Salary|Benefits|Equal|$)',
    'Nice to Have:?(.+?)(?=Salary|Benefits|$)',
    'Preferred:?(.+?)(?=Salary|Benefits|Equal|$)',
  ],
  salary: [
    'Salary Range:?(.+?)(?=Benefits|Equal|$)',
    'Compensation:?(.+?)(?=Benefits|Equal|$)',
    '\\$[0-9,]+\\s*[-–]\\s*\\$[0-9,]+',
    '\\$[0-9,.]+K?\\s*[-–]\\s*\\$[0-9,.]+K?',
  ],
};

export const DEFAULT_RESPONSIBILITY_HEADINGS: readonly PatternLike[] = [
  'Responsibilities\\s+include\\s*:?',
  'Specific\\s+responsibilities\\s+(?:could|may|will)\\s+include\\s*:?',
  'Key\\s+Responsibilities\\s*:?',
  'responsibilities\\s+of\\s+a\\s+[^:]+\\s+in\\s+this\\s+role\\s+include\\s*:?',
  'you\\s+will\\s+be\\s+responsible\\s+for\\s*:?',
  'About\\s+the\\s+job',
];

export const DEFAULT_BOILERPLATE: BoilerplateRules = {
  phrases: [
    'Change the world\\.\\s*Love your job\\.\\s*',
    'Put your talent to work with us[^.!]*[.!]\\s*',
    'Texas Instruments will not sponsor[^.]*\\.\\s*',
    'TI will not sponsor[^.]*\\.\\s*',
  ],
  paragraphs: [
    '^Texas Instruments Incorporated \\(TI\\) is a global semiconductor',
    '^Texas Instruments is an equal opportunity',
    '^If you are interested in this position',
    '^All qualified applicants will receive',
    '^Why TI\\s*$',
    '^About Texas Instruments\\s*$',
    '^\\s*$',
  ],
};

export const DEFAULT_EXTRACTION_PROFILE: ExtractionProfile = {
  sectionPatterns: DEFAULT_SECTION_PATTERNS,
  responsibilityHeadings: DEFAULT_RESPONSIBILITY_HEADINGS,
  looseResponsibilityHeadings: ['^'],
  minimumRequirementHeadings: ['Minimum\\s+[Rr]equirements\\s*:?'],
  preferredQualificationHeadings: ['Preferred\\s+[Qq]ualifications\\s*:?'],
  salaryRangePattern: '\\$[0-9,]+\\s*[-–]\\s*\\$[0-9,]+',
  exportControlPattern: 'export control|export license|\\bECL\\b|\\bGTC\\b',
  boilerplate: DEFAULT_BOILERPLATE,
};

/**
 * Compiles a pattern case-insensitively. Sources that do not compile yield
 * `null` so a bad override only disables itself.
 */
export function compilePattern(value: PatternLike, extraFlags = ''): RegExp | null {
  const source = typeof value === 'string' ? value : value.source;
  const baseFlags = typeof value === 'string' ? '' : value.flags.replace(/[gy]/g, '');
  const flags = [...new Set(`${baseFlags}i${extraFlags}`)].join('');
  try {
    return new RegExp(source, flags);
  } catch {
    return null;
  }
}

export function mergeProfile(
  base: ExtractionProfile,
  override: ExtractionProfileOverride | undefined,
): ExtractionProfile {
  if (!override) {
    return base;
  }

  return {
    ...base,
    ...override,
    sectionPatterns: { ...base.sectionPatterns, ...override.sectionPatterns },
    boilerplate: { ...base.boilerplate, ...override.boilerplate },
  };
}
