export interface RobotsRule {
  allow: boolean;
  pattern: string;
}

/**
 * Allow/Disallow rules from the `User-agent: *` groups of a robots.txt body.
 * Other agents' groups are ignored; an empty rule value matches nothing.
 */
export function parseRobotsRules(robotsTxt: string): RobotsRule[] {
  const rules: RobotsRule[] = [];
  let agents: string[] = [];
  let inRules = false;

  for (const rawLine of robotsTxt.split(/\r?\n/)) {
    const line = rawLine.replace(/#.*$/, '').trim();
    const separator = line.indexOf(':');
    if (separator < 0) continue;

    const field = line.slice(0, separator).trim().toLowerCase();
    const value = line.slice(separator + 1).trim();

    if (field === 'user-agent') {
      // consecutive User-agent lines share one group
      if (inRules) {
        agents = [];
        inRules = false;
      }
      agents.push(value);
      continue;
    }

    if (field !== 'disallow' && field !== 'allow') continue;
    inRules = true;
    if (value && agents.includes('*')) rules.push({ allow: field === 'allow', pattern: value });
  }

  return rules;
}

/** `*` matches any run of characters, a trailing `$` anchors the end. */
function matches(path: string, pattern: string): boolean {
  const anchored = pattern.endsWith('$');
  const body = anchored ? pattern.slice(0, -1) : pattern;
  const source = body
    .split('*')
    .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'))
    .join('.*');
  return new RegExp(`^${source}${anchored ? '$' : ''}`).test(path);
}

/** The longest matching pattern decides; Allow wins a tie. No match allows. */
export function isPathAllowed(path: string, rules: readonly RobotsRule[]): boolean {
  let best: RobotsRule | null = null;

  for (const rule of rules) {
    if (!matches(path, rule.pattern)) continue;
    if (
      !best ||
      rule.pattern.length > best.pattern.length ||
      (rule.pattern.length === best.pattern.length && rule.allow)
    ) {
      best = rule;
    }
  }

  return best?.allow ?? true;
}
