import type { ScoreDomain } from '../types/table.js';
import { DEFAULT_SEGMENTATION_THRESHOLDS } from '../types/config.js';
import { InvalidScoreDomainError } from './errors.js';

export function createScoreDomain(
  name: string,
  minScore: number,
  maxScore: number,
  description: string = ''
): ScoreDomain {
  if (!Number.isFinite(minScore) || !Number.isFinite(maxScore)) {
    throw new InvalidScoreDomainError(`Score domain "${name}" needs finite bounds`);
  }
  if (minScore > maxScore) {
    throw new InvalidScoreDomainError(
      `Score domain "${name}" has min_score ${minScore} above max_score ${maxScore}`
    );
  }
  return Object.freeze({ name, min_score: minScore, max_score: maxScore, description });
}

export function domainContains(domain: ScoreDomain, value: number): boolean {
  return value >= domain.min_score && value <= domain.max_score;
}

/**
 * Groups distinct values into contiguous ranges, splitting wherever two
 * neighbouring sorted values are more than `gap` apart.
 */
export function detectScoreDomains(
  values: number[],
  gap: number = DEFAULT_SEGMENTATION_THRESHOLDS.domainGap
): ScoreDomain[] {
  const sorted = [...new Set(values)].sort((a, b) => a - b);
  if (sorted.length === 0) return [];

  const domains: ScoreDomain[] = [];
  let start = sorted[0];
  for (let i = 1; i < sorted.length; i++) {
    if (sorted[i] - sorted[i - 1] > gap) {
      domains.push(rangeDomain(start, sorted[i - 1]));
      start = sorted[i];
    }
  }
  domains.push(rangeDomain(start, sorted[sorted.length - 1]));
  return domains;
}

function rangeDomain(min: number, max: number): ScoreDomain {
  return createScoreDomain(`Score Range ${min}-${max}`, min, max);
}

/**
 * Ordered, immutable set of score domains. Order matters: segmentation
 * emits one table per domain in this order. Overlap is allowed.
 */
export class ScoreDomainRegistry {
  private readonly domains: readonly ScoreDomain[];

  constructor(domains: Iterable<ScoreDomain> = []) {
    this.domains = Object.freeze(
      [...domains].map((d) => createScoreDomain(d.name, d.min_score, d.max_score, d.description))
    );
  }

  static fromScores(values: number[], gap?: number): ScoreDomainRegistry {
    return new ScoreDomainRegistry(detectScoreDomains(values, gap));
  }

  get size(): number {
    return this.domains.length;
  }

  isEmpty(): boolean {
    return this.domains.length === 0;
  }

  list(): ScoreDomain[] {
    return [...this.domains];
  }

  get(name: string): ScoreDomain | undefined {
    return this.domains.find((d) => d.name === name);
  }

  /** Every domain that admits the value, in registry order. */
  domainsFor(value: number): ScoreDomain[] {
    return this.domains.filter((d) => domainContains(d, value));
  }

  /** Name pairs of domains whose ranges intersect. */
  overlaps(): Array<[string, string]> {
    const pairs: Array<[string, string]> = [];
    for (let i = 0; i < this.domains.length; i++) {
      for (let j = i + 1; j < this.domains.length; j++) {
        const a = this.domains[i];
        const b = this.domains[j];
        if (a.min_score <= b.max_score && b.min_score <= a.max_score) {
          pairs.push([a.name, b.name]);
        }
      }
    }
    return pairs;
  }
}
