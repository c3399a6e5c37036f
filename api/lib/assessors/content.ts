/**
 * Content Assessor
 *
 * Scores on-page content from independent point buckets:
 *   word count  >800: 40  >500: 25  >200: 10
 *   meta description: 20
 *   title: 20
 *   heading map present: 20
 */

import type { ContentAssessment, ContentGrade, MetricsRecord } from '../types.js';

function wordCountPoints(wordCount: number): number {
  if (wordCount > 800) return 40;
  if (wordCount > 500) return 25;
  if (wordCount > 200) return 10;
  return 0;
}

export function gradeContent(score: number): ContentGrade {
  if (score >= 80) return 'Excellent';
  if (score >= 60) return 'Good';
  if (score >= 40) return 'Fair';
  return 'Poor';
}

export function assessContent(
  record: Pick<MetricsRecord, 'wordCount' | 'title' | 'metaDescription' | 'headings'>
): ContentAssessment {
  const wordCount = record.wordCount || 0;
  const hasMetaDescription = Boolean(record.metaDescription);
  const hasTitle = Boolean(record.title);

  let qualityScore = wordCountPoints(wordCount);
  if (hasMetaDescription) qualityScore += 20;
  if (hasTitle) qualityScore += 20;
  // Awarded for the map itself, zero counts included
  if (record.headings) qualityScore += 20;

  return {
    wordCount,
    qualityScore,
    hasMetaDescription,
    hasTitle,
    grade: gradeContent(qualityScore),
  };
}
