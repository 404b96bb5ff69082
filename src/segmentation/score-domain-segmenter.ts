import type { Fragment, Row } from '../types/fragment.js';
import type { LogicalTable, ScoreDomain } from '../types/table.js';
import { DEFAULT_SEGMENTATION_THRESHOLDS } from '../types/config.js';
import { mergeFragments, parseNumber } from '../core/cells.js';
import { detectScoreDomains, domainContains, ScoreDomainRegistry } from '../core/score-domains.js';
import { createDebugLogger } from '../utils/debug.js';
import { createLogicalTable } from './table-builder.js';

const debug = createDebugLogger('score-domain');

export type ScoreDomainSegmenterOptions = {
  domainGap?: number;
};

function leadingScore(row: Row): number | null {
  if (row.length === 0) return null;
  return parseNumber(row[0]);
}

/**
 * Merges every fragment, ignoring page breaks, then routes each data row
 * to the domain(s) its leading value falls into. A row inside several
 * overlapping domains lands in each of their tables.
 */
export function segmentByScoreDomain(
  fragments: Fragment[],
  domains?: ScoreDomain[] | ScoreDomainRegistry,
  options: ScoreDomainSegmenterOptions = {}
): LogicalTable[] {
  const { rows, pages } = mergeFragments(fragments);
  if (rows.length === 0) return [];

  const header = rows[0];
  const dataRows = rows.slice(1);

  let active = domains instanceof ScoreDomainRegistry ? domains.list() : domains ?? [];
  if (active.length === 0) {
    const scores = dataRows.map(leadingScore).filter((v): v is number => v !== null);
    active = detectScoreDomains(scores, options.domainGap ?? DEFAULT_SEGMENTATION_THRESHOLDS.domainGap);
    debug('auto-detected domains', active.map((d) => d.name));
  }

  const tables: LogicalTable[] = [];
  for (const domain of active) {
    const matched = dataRows.filter((row) => {
      const score = leadingScore(row);
      return score !== null && domainContains(domain, score);
    });
    if (matched.length === 0) continue;

    tables.push(
      createLogicalTable(header, matched, pages, {
        strategy: 'score_domain',
        scoreDomain: domain
      })
    );
  }

  return tables;
}
