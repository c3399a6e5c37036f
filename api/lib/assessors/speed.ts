/**
 * Speed Assessor
 *
 * Grades page load time against fixed breakpoints.
 */

import type { MetricsRecord, PerformanceGrade, Severity, SpeedAssessment } from '../types.js';

export function gradeLoadTime(loadTime: number): PerformanceGrade {
  if (loadTime < 2) return 'A';
  if (loadTime < 3) return 'B';
  if (loadTime < 5) return 'C';
  return 'F';
}

export function loadTimeSeverity(loadTime: number): Severity {
  if (loadTime > 5) return 'high';
  if (loadTime > 3) return 'medium';
  return 'low';
}

export function assessSpeed(record: Pick<MetricsRecord, 'loadTime'>): SpeedAssessment {
  const loadTime = record.loadTime || 0;
  return {
    loadTime,
    grade: gradeLoadTime(loadTime),
    needsOptimization: loadTime > 3,
    severity: loadTimeSeverity(loadTime),
  };
}
