import { randomBytes } from 'node:crypto';

export interface JobIdParts {
  yyyyMMdd: string; // YYYYMMDD
  suffix: string; // 8 lowercase hex chars
}

export function formatJobId(parts: JobIdParts): string {
  return `j-${parts.yyyyMMdd}-${parts.suffix}`;
}

export function parseJobId(jobId: string): JobIdParts | null {
  const m = /^j-(\d{8})-([0-9a-f]{8})$/.exec(jobId);
  if (!m) return null;
  return { yyyyMMdd: m[1], suffix: m[2] };
}

export function isJobId(value: string): boolean {
  return parseJobId(value) !== null;
}

/**
 * Job ids sort by creation day and stay unique across processes writing to the same
 * state directory, so the suffix is random rather than a per-process counter.
 */
export class JobIdGenerator {
  constructor(private entropy: () => string = () => randomBytes(4).toString('hex')) {}

  next(now: Date = new Date()): string {
    return formatJobId({ yyyyMMdd: formatDate(now), suffix: this.entropy() });
  }
}

function formatDate(d: Date): string {
  const yyyy = d.getUTCFullYear();
  const mm = String(d.getUTCMonth() + 1).padStart(2, '0');
  const dd = String(d.getUTCDate()).padStart(2, '0');
  return `${yyyy}${mm}${dd}`;
}
