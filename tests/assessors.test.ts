import { describe, it, expect } from 'vitest';
import { assessContent, assessSpeed, gradeContent, gradeLoadTime } from '../api/lib/assessors/index.js';
import { emptyHeadings } from '../api/lib/records.js';
import { makeRecord } from './helpers.js';

// ─── Speed ───────────────────────────────────────────────────────────────────

describe('assessSpeed', () => {
  it('grades by load time breakpoints', () => {
    expect(gradeLoadTime(1.99)).toBe('A');
    expect(gradeLoadTime(2)).toBe('B');
    expect(gradeLoadTime(3)).toBe('C');
    expect(gradeLoadTime(4.99)).toBe('C');
    expect(gradeLoadTime(5)).toBe('F');
  });

  it('flags optimization strictly above 3 seconds', () => {
    expect(assessSpeed({ loadTime: 3 })).toEqual({
      loadTime: 3,
      grade: 'C',
      needsOptimization: false,
      severity: 'low',
    });
    expect(assessSpeed({ loadTime: 3.5 }).needsOptimization).toBe(true);
    expect(assessSpeed({ loadTime: 3.5 }).severity).toBe('medium');
  });

  it('uses high severity strictly above 5 seconds', () => {
    expect(assessSpeed({ loadTime: 5 }).severity).toBe('medium');
    expect(assessSpeed({ loadTime: 6 })).toEqual({
      loadTime: 6,
      grade: 'F',
      needsOptimization: true,
      severity: 'high',
    });
  });

  it('treats a zero load time as fast', () => {
    expect(assessSpeed({ loadTime: 0 }).grade).toBe('A');
  });
});

// ─── Content ─────────────────────────────────────────────────────────────────

describe('assessContent', () => {
  it('awards full marks to a complete page', () => {
    const result = assessContent(makeRecord());
    expect(result.qualityScore).toBe(100);
    expect(result.grade).toBe('Excellent');
  });

  it('scores word count buckets on strict thresholds', () => {
    const base = { title: null, metaDescription: null, headings: emptyHeadings() };
    expect(assessContent({ ...base, wordCount: 800 }).qualityScore).toBe(45);
    expect(assessContent({ ...base, wordCount: 801 }).qualityScore).toBe(60);
    expect(assessContent({ ...base, wordCount: 500 }).qualityScore).toBe(30);
    expect(assessContent({ ...base, wordCount: 200 }).qualityScore).toBe(20);
  });

  it('adds heading points for a heading map even when every level is zero', () => {
    const result = assessContent(makeRecord({ wordCount: 600, title: 'T', metaDescription: null, headings: emptyHeadings() }));
    expect(result.qualityScore).toBe(65);
    expect(result.grade).toBe('Good');
    expect(assessContent({ wordCount: 0, title: null, metaDescription: null, headings: { ...emptyHeadings(), h4: 2 } }).qualityScore).toBe(20);
  });

  it('treats an empty title as missing', () => {
    const result = assessContent({ wordCount: 300, title: '', metaDescription: 'Described', headings: emptyHeadings() });
    expect(result.hasTitle).toBe(false);
    expect(result.hasMetaDescription).toBe(true);
    expect(result.qualityScore).toBe(50);
    expect(result.grade).toBe('Fair');
  });

  it('maps scores to grades', () => {
    expect(gradeContent(80)).toBe('Excellent');
    expect(gradeContent(79)).toBe('Good');
    expect(gradeContent(60)).toBe('Good');
    expect(gradeContent(40)).toBe('Fair');
    expect(gradeContent(39)).toBe('Poor');
  });
});
