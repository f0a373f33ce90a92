/**
 * User feedback on an extracted field value.
 */

export type FeedbackType = 'correction' | 'confirmation' | 'rejection';

export const FEEDBACK_TYPES: readonly FeedbackType[] = ['correction', 'confirmation', 'rejection'];

export interface FeedbackRecord {
  id: string;
  field_name: string;
  domain_category: string | null;
  variant: string | null;
  context_hash: string | null;
  original_prediction: string;
  corrected_value: string;
  feedback_type: FeedbackType;
  /** Example whose output produced original_prediction, when known */
  example_id: string | null;
  user_context: string | null;
  timestamp: string;
}
