/**
 * @fileoverview Email domain type definitions.
 */

import type { CanonicalRecordBase } from '../../types/domain.js';

/** Message as emitted in the brief. */
export interface MailRecord extends CanonicalRecordBase {
  date: string;
  subject: string;
  fromName: string;
  fromEmail: string;
  /** Provider labels without the UNREAD marker */
  labels: string[];
  isUnread: boolean;
}

/** Sender split out of a From header. */
export interface ParsedSender {
  name: string;
  email: string;
}
