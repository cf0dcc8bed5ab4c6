import path from 'node:path';

import type { DhatuField, ReviewCategory } from '@shared/types';

export const REVIEW_CATEGORIES = [
  'multiple_dhatu_ids_without_gati',
  'multiple_dhatu_ids_with_gati',
  'not_found_dhatu_ids_without_gati',
  'not_found_dhatu_ids_with_gati',
] as const satisfies readonly ReviewCategory[];

const MULTIPLE_LINES = [
  'Format: Each entry shows the verb form with its multiple dhatu_ids',
  'Manually edit this file to select the correct dhatu_id for each case',
  'After editing, run the backport command to sync changes back to the Data files',
];

const NOT_FOUND_LINES = [
  'Format: Each entry shows the verb form that needs a dhatu_id assigned',
  'Manually edit this file to add the correct dhatu_id for each case',
  'After editing, run the backport command to sync changes back to the Data files',
  '',
  'Instructions:',
  '  1. Find the correct dhatu_id for each verb',
  "  2. Change dhatu_id from 'Not Found' to the correct ID (e.g., '01.0594')",
  '  3. Keep the gati field as is',
  '  4. Run the backport command to apply changes',
];

export const CATEGORY_DESCRIPTIONS: Record<ReviewCategory, readonly string[]> = {
  multiple_dhatu_ids_without_gati: ['Cases where a verb has more than one dhatu_id (verbs WITHOUT gati)', ...MULTIPLE_LINES],
  multiple_dhatu_ids_with_gati: ['Cases where a verb has more than one dhatu_id (verbs WITH gati)', ...MULTIPLE_LINES],
  not_found_dhatu_ids_without_gati: ["Cases where a verb has 'Not Found' dhatu_id (verbs WITHOUT gati)", ...NOT_FOUND_LINES],
  not_found_dhatu_ids_with_gati: ["Cases where a verb has 'Not Found' dhatu_id (verbs WITH gati)", ...NOT_FOUND_LINES],
};

export function isReviewCategory(value: string): value is ReviewCategory {
  return REVIEW_CATEGORIES.some((category) => category === value);
}

export function fieldForCategory(category: ReviewCategory): DhatuField {
  return category.startsWith('multiple_') ? 'dhatu_ids' : 'dhatu_id';
}

/** `output/multiple_dhatu_ids_with_gati.yaml` -> `multiple_dhatu_ids_with_gati`. */
export function categoryFromPath(filePath: string): ReviewCategory | null {
  const base = path.basename(filePath, path.extname(filePath));
  return isReviewCategory(base) ? base : null;
}
