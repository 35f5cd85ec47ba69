// GitHub rate-limit headers: parsing and the user-facing diagnostic

import chalk from 'chalk';
import { format } from 'date-fns';

export interface HeaderLookup {
  get(name: string): string | null;
}

export type HeaderSource = HeaderLookup | Record<string, string | string[] | undefined>;

export interface RateLimitInfo {
  limit?: number;
  remaining?: number;
  /** Reset instant in epoch seconds */
  resetEpoch?: number;
  /** Reset instant (a Date is always UTC internally; rendered in local time) */
  resetTime?: Date;
  retryAfterSeconds?: number;
  /** Retry-After value that was not an integer, kept verbatim */
  retryAfter?: string;
  /** X-RateLimit-Reset value that was not an epoch, kept verbatim */
  resetRaw?: string;
}

export const RATE_LIMIT_STATUSES: ReadonlySet<number> = new Set([403, 429]);

const RESET_FORMAT = 'yyyy-MM-dd HH:mm:ss xxx';

function isHeaderLookup(headers: HeaderSource): headers is HeaderLookup {
  return typeof headers.get === 'function';
}

export function readHeader(headers: HeaderSource, name: string): string | undefined {
  if (isHeaderLookup(headers)) {
    return headers.get(name) ?? undefined;
  }

  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() !== wanted || value === undefined) continue;
    if (Array.isArray(value)) {
      return value.length > 0 ? value[0] : undefined;
    }
    return value;
  }
  return undefined;
}

function parseInteger(value: string): number | undefined {
  const trimmed = value.trim();
  return /^-?\d+$/.test(trimmed) ? Number.parseInt(trimmed, 10) : undefined;
}

export function parseRateLimitHeaders(headers: HeaderSource): RateLimitInfo {
  const info: RateLimitInfo = {};

  const limit = readHeader(headers, 'X-RateLimit-Limit');
  if (limit !== undefined) {
    const parsed = parseInteger(limit);
    if (parsed !== undefined) info.limit = parsed;
  }

  const remaining = readHeader(headers, 'X-RateLimit-Remaining');
  if (remaining !== undefined) {
    const parsed = parseInteger(remaining);
    if (parsed !== undefined) info.remaining = parsed;
  }

  const reset = readHeader(headers, 'X-RateLimit-Reset');
  if (reset !== undefined) {
    const epoch = parseInteger(reset);
    // A zero epoch is treated as no reset at all
    if (epoch !== 0) {
      const resetTime = epoch === undefined ? undefined : new Date(epoch * 1000);
      if (epoch !== undefined && resetTime && !Number.isNaN(resetTime.getTime())) {
        info.resetEpoch = epoch;
        info.resetTime = resetTime;
      } else if (reset.trim()) {
        info.resetRaw = reset.trim();
      }
    }
  }

  const retryAfter = readHeader(headers, 'Retry-After');
  if (retryAfter !== undefined) {
    const seconds = parseInteger(retryAfter);
    if (seconds !== undefined) {
      info.retryAfterSeconds = seconds;
    } else if (retryAfter.trim()) {
      info.retryAfter = retryAfter.trim();
    }
  }

  return info;
}

export function hasRateLimitInfo(info: RateLimitInfo): boolean {
  return Object.values(info).some((value) => value !== undefined);
}

export function formatResetTime(resetTime: Date): string {
  return format(resetTime, RESET_FORMAT);
}

/**
 * Multi-line report of the rate-limit facts, empty when none were parsed.
 */
export function formatRateLimitFacts(info: RateLimitInfo): string[] {
  if (!hasRateLimitInfo(info)) return [];

  const lines = [chalk.bold('Rate Limit Information:')];
  if (info.limit !== undefined) {
    lines.push(`  • Rate Limit: ${info.limit} requests/hour`);
  }
  if (info.remaining !== undefined) {
    lines.push(`  • Remaining: ${info.remaining}`);
  }
  if (info.resetTime) {
    lines.push(`  • Resets at: ${formatResetTime(info.resetTime)}`);
  } else if (info.resetRaw) {
    lines.push(`  • Resets at: ${info.resetRaw}`);
  }
  if (info.retryAfterSeconds !== undefined) {
    lines.push(`  • Retry after: ${info.retryAfterSeconds} seconds`);
  } else if (info.retryAfter) {
    lines.push(`  • Retry after: ${info.retryAfter}`);
  }
  return lines;
}

export const TROUBLESHOOTING_TIPS: readonly string[] = [
  "If you're on a shared CI or corporate environment, you may be rate-limited.",
  'Consider using a GitHub token via --github-token or the GH_TOKEN/GITHUB_TOKEN environment variable.',
  'Authenticated requests have a limit of 5,000/hour vs 60/hour for unauthenticated.',
];

export function formatRateLimitDiagnostic(status: number, headers: HeaderSource, url: string): string {
  const lines = [`GitHub API returned status ${status} for ${url}`, ''];

  const facts = formatRateLimitFacts(parseRateLimitHeaders(headers));
  if (facts.length > 0) {
    lines.push(...facts, '');
  }

  lines.push(chalk.bold('Troubleshooting Tips:'));
  for (const tip of TROUBLESHOOTING_TIPS) {
    lines.push(`  • ${tip}`);
  }
  return lines.join('\n');
}
