import { isPathAllowed, parseRobotsRules } from '@/modules/enrichment/application/utils/robots';

const ROBOTS = [
  'User-agent: Googlebot',
  'Disallow: /private-google',
  '',
  'User-agent: *',
  'Disallow: /admin',
  'Disallow:',
  'Allow: /public',
  '',
  'User-agent: other',
  'User-agent: *',
  'Disallow: /tmp # scratch space',
  'Sitemap: https://riverside.edu/sitemap.xml',
].join('\n');

describe('robots rules', () => {
  it('collects the rules of the wildcard groups only', () => {
    expect(parseRobotsRules(ROBOTS)).toEqual([
      { allow: false, pattern: '/admin' },
      { allow: true, pattern: '/public' },
      { allow: false, pattern: '/tmp' },
    ]);
  });

  it('checks paths by prefix', () => {
    const rules = parseRobotsRules(ROBOTS);

    expect(isPathAllowed('/admin/login', rules)).toBe(false);
    expect(isPathAllowed('/about', rules)).toBe(true);
    expect(isPathAllowed('/contact', [])).toBe(true);
  });

  it('lets the longest match decide between Allow and Disallow', () => {
    const rules = parseRobotsRules('User-agent: *\nDisallow: /\nAllow: /contact\n');

    expect(isPathAllowed('/contact', rules)).toBe(true);
    expect(isPathAllowed('/contact/send', rules)).toBe(true);
    expect(isPathAllowed('/about', rules)).toBe(false);
  });

  it('prefers Allow on a tie', () => {
    const rules = parseRobotsRules('User-agent: *\nDisallow: /about\nAllow: /about\n');

    expect(isPathAllowed('/about', rules)).toBe(true);
  });

  it('understands wildcards and end anchors', () => {
    const rules = parseRobotsRules('User-agent: *\nDisallow: /*.pdf$\nDisallow: /private*/\n');

    expect(isPathAllowed('/files/brochure.pdf', rules)).toBe(false);
    expect(isPathAllowed('/files/brochure.pdf?download=1', rules)).toBe(true);
    expect(isPathAllowed('/private-area/staff', rules)).toBe(false);
    expect(isPathAllowed('/privacy', rules)).toBe(true);
  });
});
