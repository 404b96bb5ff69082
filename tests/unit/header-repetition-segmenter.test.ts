import { describe, it, expect } from 'vitest';
import {
  detectHeaderPattern,
  matchesHeader,
  sectionTitleOf,
  segmentByHeaderRepetition
} from '../../src/segmentation/header-repetition-segmenter.js';
import { fragment } from '../fixtures.js';

const header = ['Name', 'Position'];

describe('detectHeaderPattern', () => {
  it('should normalise and count fully populated rows', () => {
    const rows = [['Name', 'Dept'], ['Ann', 'Finance'], ['NAME ', 'dept']];
    expect(detectHeaderPattern(rows)).toEqual(['NAME', 'DEPT']);
  });

  it('should ignore rows with blank cells', () => {
    expect(detectHeaderPattern([['Name', ''], ['Name', '']])).toBeNull();
  });

  it('should respect the repeat threshold', () => {
    const rows = [header, ['Ann', 'Clerk'], header];
    expect(detectHeaderPattern(rows, 3)).toBeNull();
  });
});

describe('row predicates', () => {
  it('should match a header regardless of case and padding', () => {
    expect(matchesHeader([' name', 'POSITION '], ['NAME', 'POSITION'])).toBe(true);
    expect(matchesHeader(['Name'], ['NAME', 'POSITION'])).toBe(false);
  });

  it('should read single-cell rows as section titles', () => {
    expect(sectionTitleOf(['', ' Finance ', ''])).toBe('Finance');
    expect(sectionTitleOf(['Finance'])).toBeNull();
    expect(sectionTitleOf(['Ann', 'Clerk'])).toBeNull();
    expect(sectionTitleOf(['', ''])).toBeNull();
  });
});

describe('segmentByHeaderRepetition', () => {
  it('should start a table at each repeated header and label it by section title', () => {
    const tables = segmentByHeaderRepetition([
      fragment(1, [header, ['Finance', ''], ['Ann', 'Clerk'], ['Bo', 'Driver']]),
      fragment(2, [header, ['Cy', 'Cook']])
    ]);

    expect(tables).toHaveLength(2);
    expect(tables[0].section_title).toBe('Finance');
    expect(tables[0].data).toEqual([header, ['Ann', 'Clerk'], ['Bo', 'Driver']]);
    expect(tables[1].section_title).toBeUndefined();
    expect(tables[1].data).toEqual([header, ['Cy', 'Cook']]);
    expect(tables[1].source_pages).toEqual([1, 2]);
    expect(tables[1].segmentation_strategy).toBe('header_repetition');
  });

  it('should label a section with a title seen after its first data row', () => {
    const tables = segmentByHeaderRepetition([
      fragment(1, [header, ['Ann', 'Clerk'], ['Sales', ''], ['Bo', 'Driver'], header, ['Cy', 'Cook']])
    ]);
    expect(tables[0].section_title).toBe('Sales');
    expect(tables[0].data).toEqual([header, ['Ann', 'Clerk'], ['Bo', 'Driver']]);
  });

  it('should drop rows ahead of the first header', () => {
    const tables = segmentByHeaderRepetition([
      fragment(1, [['Intro', 'x'], header, ['Ann', 'Clerk'], header, ['Bo', 'Driver']])
    ]);
    expect(tables.map((t) => t.data)).toEqual([
      [header, ['Ann', 'Clerk']],
      [header, ['Bo', 'Driver']]
    ]);
  });

  it('should return the merged rows as one table when no header repeats', () => {
    const tables = segmentByHeaderRepetition([
      fragment(1, [['Name', 'Role'], ['Ann', 'Clerk']]),
      fragment(2, [['Bo', 'Driver']])
    ]);

    expect(tables).toHaveLength(1);
    expect(tables[0].data).toEqual([['Name', 'Role'], ['Ann', 'Clerk'], ['Bo', 'Driver']]);
    expect(tables[0].schema.headers).toEqual(['Name', 'Role']);
    expect(tables[0].source_pages).toEqual([1, 2]);
    expect(tables[0].segmentation_strategy).toBe('header_repetition');
  });

  it('should fall back to one table when the header never frames any rows', () => {
    const tables = segmentByHeaderRepetition([fragment(1, [header, header])]);
    expect(tables).toHaveLength(1);
    expect(tables[0].data).toEqual([header, header]);
  });

  it('should return nothing for no rows', () => {
    expect(segmentByHeaderRepetition([])).toEqual([]);
  });
});
