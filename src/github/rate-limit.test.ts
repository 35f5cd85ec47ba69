import {
  formatRateLimitDiagnostic,
  formatRateLimitFacts,
  formatResetTime,
  hasRateLimitInfo,
  parseRateLimitHeaders,
  readHeader,
} from './rate-limit.js';

describe('readHeader', () => {
  it('matches record keys case-insensitively', () => {
    expect(readHeader({ 'x-ratelimit-limit': '60' }, 'X-RateLimit-Limit')).toBe('60');
  });

  it('takes the first value of a repeated header', () => {
    expect(readHeader({ 'Retry-After': ['30', '60'] }, 'retry-after')).toBe('30');
  });

  it('treats an empty value list as absent', () => {
    expect(readHeader({ 'Retry-After': [] }, 'retry-after')).toBeUndefined();
    expect(parseRateLimitHeaders({ 'retry-after': [], 'x-ratelimit-reset': [] })).toEqual({});
  });

  it('reads from a Headers-like lookup', () => {
    const headers = new Headers({ 'X-RateLimit-Remaining': '5' });
    expect(readHeader(headers, 'x-ratelimit-remaining')).toBe('5');
    expect(readHeader(headers, 'retry-after')).toBeUndefined();
  });
});

describe('parseRateLimitHeaders', () => {
  it('parses every known header', () => {
    const info = parseRateLimitHeaders({
      'x-ratelimit-limit': '60',
      'x-ratelimit-remaining': '0',
      'x-ratelimit-reset': '1893456000',
      'retry-after': '120',
    });

    expect(info).toEqual({
      limit: 60,
      remaining: 0,
      resetEpoch: 1893456000,
      resetTime: new Date(Date.UTC(2030, 0, 1, 0, 0, 0)),
      retryAfterSeconds: 120,
    });
  });

  it('leaves absent headers absent', () => {
    expect(parseRateLimitHeaders({ 'x-ratelimit-remaining': '7' })).toEqual({ remaining: 7 });
    expect(parseRateLimitHeaders({})).toEqual({});
  });

  it('drops a non-integer limit or remaining', () => {
    expect(parseRateLimitHeaders({ 'x-ratelimit-limit': 'lots', 'x-ratelimit-remaining': '1.5' })).toEqual({});
  });

  it('treats a reset of 0 as absent', () => {
    expect(parseRateLimitHeaders({ 'x-ratelimit-reset': '0' })).toEqual({});
  });

  it('keeps a non-numeric reset verbatim', () => {
    expect(parseRateLimitHeaders({ 'x-ratelimit-reset': ' soon ' })).toEqual({ resetRaw: 'soon' });
  });

  it('keeps a date-form Retry-After verbatim', () => {
    expect(parseRateLimitHeaders({ 'retry-after': 'Wed, 21 Oct 2015 07:28:00 GMT' })).toEqual({
      retryAfter: 'Wed, 21 Oct 2015 07:28:00 GMT',
    });
  });
});

describe('hasRateLimitInfo', () => {
  it('is false for an empty record and true otherwise', () => {
    expect(hasRateLimitInfo({})).toBe(false);
    expect(hasRateLimitInfo({ remaining: 0 })).toBe(true);
  });
});

describe('formatResetTime', () => {
  it('renders local time with the UTC offset', () => {
    expect(formatResetTime(new Date(Date.UTC(2030, 0, 1, 0, 0, 0)))).toBe('2030-01-01 00:00:00 +00:00');
  });
});

describe('formatRateLimitFacts', () => {
  it('is empty when nothing was parsed', () => {
    expect(formatRateLimitFacts({})).toEqual([]);
  });

  it('lists only the facts that are present', () => {
    expect(formatRateLimitFacts({ limit: 5000, retryAfter: 'later' })).toEqual([
      'Rate Limit Information:',
      '  • Rate Limit: 5000 requests/hour',
      '  • Retry after: later',
    ]);
  });

  it('falls back to the raw reset value', () => {
    expect(formatRateLimitFacts({ resetRaw: 'soon' })).toEqual(['Rate Limit Information:', '  • Resets at: soon']);
  });
});

describe('formatRateLimitDiagnostic', () => {
  const url = 'https://api.github.com/repos/forgeloop/forgeloop/releases/latest';

  it('includes the parsed facts and troubleshooting tips', () => {
    const report = formatRateLimitDiagnostic(
      403,
      { 'X-RateLimit-Limit': '60', 'X-RateLimit-Remaining': '0', 'X-RateLimit-Reset': '1893456000' },
      url
    );

    expect(report.split('\n')).toEqual([
      `GitHub API returned status 403 for ${url}`,
      '',
      'Rate Limit Information:',
      '  • Rate Limit: 60 requests/hour',
      '  • Remaining: 0',
      '  • Resets at: 2030-01-01 00:00:00 +00:00',
      '',
      'Troubleshooting Tips:',
      "  • If you're on a shared CI or corporate environment, you may be rate-limited.",
      '  • Consider using a GitHub token via --github-token or the GH_TOKEN/GITHUB_TOKEN environment variable.',
      '  • Authenticated requests have a limit of 5,000/hour vs 60/hour for unauthenticated.',
    ]);
  });

  it('omits the rate-limit section when no headers are present', () => {
    const report = formatRateLimitDiagnostic(429, {}, url);

    expect(report.split('\n').slice(0, 3)).toEqual([
      `GitHub API returned status 429 for ${url}`,
      '',
      'Troubleshooting Tips:',
    ]);
    expect(report).not.toContain('Rate Limit Information:');
  });
});
