import { stringify } from 'csv-stringify/sync';
import { TestPlan } from './schemas';

/**
 * Test plan export in the work tracker's test case import layout.
 */

export const TEST_PLAN_CSV_FILENAME = 'test_plan.csv';

export const TEST_PLAN_CSV_COLUMNS = [
  'Work Item Type',
  'Title',
  'Description',
  'Test Step',
  'Step Action',
  'Step Expected',
] as const;

export function testPlanToCsv(plan: TestPlan): string {
  const rows: string[][] = [];

  if (Array.isArray(plan.test_cases)) {
    for (const title of plan.test_cases) {
      rows.push(['Test Case', title, '', '', '', '']);
    }
  } else {
    for (const cases of Object.values(plan.test_cases)) {
      for (const testCase of cases) {
        if (typeof testCase === 'string') {
          rows.push(['Test Case', testCase, '', '', '', '']);
        } else {
          rows.push(['Test Case', testCase.name, testCase.description, '', '', '']);
        }
      }
    }
  }

  return stringify([[...TEST_PLAN_CSV_COLUMNS], ...rows]);
}
