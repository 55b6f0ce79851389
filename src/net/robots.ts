import type { HttpClient } from '../utils/http.js';
import type { Logger } from '../utils/logger.js';

/**
 * `Disallow` rules from the `User-agent: *` groups of a robots.txt body.
 * Empty `Disallow:` lines allow everything and are dropped.
 */
export function wildcardDisallowRules(robotsBody: string): string[] {
  const rules: string[] = [];
  let groupAgents: string[] = [];
  let inRules = false;

  for (const rawLine of robotsBody.split(/\r?\n/)) {
    const line = rawLine.replace(/#.*$/, '').trim();
    const match = line.match(/^([A-Za-z-]+)\s*:\s*(.*)$/);
    if (!match) {
      continue;
    }
    const field = match[1].toLowerCase();
    const value = match[2].trim();

    if (field === 'user-agent') {
      if (inRules) {
        groupAgents = [];
        inRules = false;
      }
      groupAgents.push(value);
      continue;
    }

    inRules = true;
    if (field === 'disallow' && value && groupAgents.includes('*')) {
      rules.push(value);
    }
  }
  return rules;
}

/**
 * Compiles a rule path to a prefix matcher: `*` spans any run of characters
 * and a trailing `$` anchors the end. Paths compare case-sensitively.
 */
export function ruleToRegExp(rule: string): RegExp {
  const anchored = rule.endsWith('$');
  const body = (anchored ? rule.slice(0, -1) : rule)
    .split('*')
    .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'))
    .join('.*');
  return new RegExp(`^${body}${anchored ? '$' : ''}`);
}

export function isPathDisallowed(robotsBody: string, path: string): boolean {
  return wildcardDisallowRules(robotsBody).some((rule) => ruleToRegExp(rule).test(path));
}

/** Unreachable or missing robots.txt counts as allowed. */
export async function isScrapingAllowed(careersUrl: string, httpClient: HttpClient, logger: Logger): Promise<boolean> {
  let parsed: URL;
  try {
    parsed = new URL(careersUrl);
  } catch {
    return true;
  }

  const response = await httpClient.requestMaybe(`${parsed.origin}/robots.txt`, {
    retries: 0,
    timeoutMs: 10_000,
    headers: { accept: 'text/plain,*/*' },
  });
  if (!response) {
    await logger.debug(`Could not fetch robots.txt for ${parsed.origin}`);
    return true;
  }

  const path = parsed.pathname || '/';
  if (isPathDisallowed(response.body, path)) {
    await logger.warn(`robots.txt disallows scraping ${path}`);
    return false;
  }
  return true;
}
