import type { ExtractedJobFields } from '../types.js';
import { cleanText } from '../utils/text.js';
import { extractBullets } from './bullets.js';
import { compilePattern } from './patterns.js';
import type { ExtractionProfile, PatternLike } from './patterns.js';
import { extractProse } from './prose.js';

export type Extractor<I, O> = (input: I) => O | undefined;

/** Runs extractors in order and returns the first defined result. */
export function firstMatch<I, O>(input: I, extractors: ReadonlyArray<Extractor<I, O>>): O | undefined {
  for (const extract of extractors) {
    const result = extract(input);
    if (result !== undefined) {
      return result;
    }
  }
  return undefined;
}

export interface ResponsibilitySources {
  descriptionHtml?: string;
  responsibilitiesHtml?: string;
}

/** Structured headings, then the loose pass, then prose; in that order. */
export function responsibilityTiers(profile: ExtractionProfile): Array<Extractor<ResponsibilitySources, string>> {
  return [
    (sources) => extractBullets(sources.descriptionHtml, profile.responsibilityHeadings),
    (sources) => extractBullets(sources.responsibilitiesHtml, profile.looseResponsibilityHeadings),
    (sources) => extractProse(sources.descriptionHtml, profile.boilerplate),
  ];
}

export function extractResponsibilities(
  sources: ResponsibilitySources,
  profile: ExtractionProfile,
): string | undefined {
  return firstMatch(sources, responsibilityTiers(profile));
}

/** Fields of an Oracle CX requisition detail payload used for extraction. */
export interface OracleRequisitionDetail {
  Id?: string;
  Category?: string;
  StudyLevel?: string;
  OrganizationDescriptionStr?: string;
  ExternalDescriptionStr?: string;
  ExternalResponsibilitiesStr?: string;
  ExternalQualificationsStr?: string;
}

function firstPatternMatch(pattern: PatternLike, sources: Array<string | undefined>): string | undefined {
  const compiled = compilePattern(pattern);
  if (!compiled) {
    return undefined;
  }
  for (const source of sources) {
    const match = source ? compiled.exec(source) : null;
    const value = match ? cleanText(match[0]) : undefined;
    if (value) {
      return value;
    }
  }
  return undefined;
}

function exportControlFlag(organizationDescription: string | undefined, pattern: PatternLike): string | undefined {
  if (!organizationDescription) {
    return undefined;
  }
  const compiled = compilePattern(pattern);
  return compiled?.test(organizationDescription) ? 'Yes' : 'No';
}

export function buildOracleDetailFields(
  detail: OracleRequisitionDetail,
  profile: ExtractionProfile,
): ExtractedJobFields {
  const descriptionHtml = detail.ExternalDescriptionStr;
  const qualificationsHtml = detail.ExternalQualificationsStr;

  return {
    responsibilities: extractResponsibilities(
      { descriptionHtml, responsibilitiesHtml: detail.ExternalResponsibilitiesStr },
      profile,
    ),
    minEducation: extractBullets(qualificationsHtml, profile.minimumRequirementHeadings),
    minExperience: undefined,
    preferredQualifications: extractBullets(qualificationsHtml, profile.preferredQualificationHeadings),
    salaryRange: firstPatternMatch(profile.salaryRangePattern, [descriptionHtml, qualificationsHtml]),
    jobIdentification: cleanText(detail.Id),
    jobCategory: cleanText(detail.Category),
    degreeLevel: cleanText(detail.StudyLevel),
    eclGtcRequired: exportControlFlag(detail.OrganizationDescriptionStr, profile.exportControlPattern),
  };
}
