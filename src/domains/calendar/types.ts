/**
 * Calendar domain types.
 */

import type { CanonicalRecordBase } from '../../types/domain.js';

/**
 * Calendar event as emitted in the brief. Empty strings stand in for
 * missing provider data.
 */
export interface CalendarRecord extends CanonicalRecordBase {
  title: string;
  start: string; // dateTime, or date for all-day events
  end: string;
  location: string;
  status: string;
  /** The account owner's RSVP (accepted, declined, tentative, needsAction) */
  response: string;
}
