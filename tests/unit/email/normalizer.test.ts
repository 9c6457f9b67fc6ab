import { describe, expect, it } from 'vitest';
import { normalizeMessage, parseFrom } from '../../../src/domains/email/service/normalizer.js';

describe('parseFrom', () => {
  it('splits a display name and address', () => {
    expect(parseFrom('Jane Doe <jane@example.com>')).toEqual({ name: 'Jane Doe', email: 'jane@example.com' });
  });

  it('keeps quotes around the display name', () => {
    expect(parseFrom('"Doe, Jane" <jane@example.com>')).toEqual({
      name: '"Doe, Jane"',
      email: 'jane@example.com',
    });
  });

  it('uses a bare address as both name and email', () => {
    expect(parseFrom('  jane@example.com ')).toEqual({ name: 'jane@example.com', email: 'jane@example.com' });
  });

  it('leaves the name empty for a bracketed address alone', () => {
    expect(parseFrom('<jane@example.com>')).toEqual({ name: '', email: 'jane@example.com' });
  });

  it('uses the whole value when the bracket is not closed', () => {
    expect(parseFrom('Jane <jane@example.com')).toEqual({
      name: 'Jane <jane@example.com',
      email: 'Jane <jane@example.com',
    });
  });

  it('handles an empty header', () => {
    expect(parseFrom('')).toEqual({ name: '', email: '' });
  });
});

describe('normalizeMessage', () => {
  const message = {
    id: '18c0f',
    threadId: '18c0f',
    date: 'Wed, 10 Jan 2024 09:00:00 -0500',
    subject: 'Invoice <#42> & receipt',
    from: 'Billing Team <billing@example.com>',
    labels: ['INBOX', 'UNREAD', 'IMPORTANT'],
  };

  it('maps an unread message', () => {
    expect(normalizeMessage(message, 'personal')).toEqual({
      date: 'Wed, 10 Jan 2024 09:00:00 -0500',
      subject: 'Invoice <#42> & receipt',
      fromName: 'Billing Team',
      fromEmail: 'billing@example.com',
      labels: ['INBOX', 'IMPORTANT'],
      isUnread: true,
      accountClassification: 'personal',
    });
  });

  it('fills defaults for a sparse message', () => {
    expect(normalizeMessage({ id: 'm2' }, 'work')).toEqual({
      date: '',
      subject: '(No subject)',
      fromName: '',
      fromEmail: '',
      labels: [],
      isUnread: false,
      accountClassification: 'work',
    });
  });

  it('drops non-string labels', () => {
    const record = normalizeMessage({ labels: ['INBOX', 3, null, 'CATEGORY_UPDATES'] }, 'work');
    expect(record.labels).toEqual(['INBOX', 'CATEGORY_UPDATES']);
    expect(record.isUnread).toBe(false);
  });

  it('gives the same record for the same input', () => {
    expect(normalizeMessage(message, 'work')).toEqual(normalizeMessage(message, 'work'));
  });
});
