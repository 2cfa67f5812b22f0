import type { AssessmentRecord, RecommendedAssessment, TestType } from './types.js';

const TEST_TYPE_LABELS: Readonly<Record<TestType, string[]>> = {
  K: ['Knowledge & Skills'],
  P: ['Personality & Behavior']
};

export function mapTestType(testType: TestType): string[] {
  return [...TEST_TYPE_LABELS[testType]];
}

export function toRecommendedAssessment(record: AssessmentRecord, durationMinutes: number): RecommendedAssessment {
  return {
    name: record.name,
    url: record.url,
    adaptive_support: 'Yes',
    description: record.description,
    duration: durationMinutes,
    remote_support: 'Yes',
    test_type: mapTestType(record.testType)
  };
}
