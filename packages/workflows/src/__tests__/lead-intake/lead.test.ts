/**
 * Lead identity tests
 *
 * @module __tests__/lead-intake/lead.test
 */

import { describe, it, expect } from 'vitest';
import { createLead, deriveLeadId } from '../../lead-intake/lead';
import { NOW, createSubmission } from './fixtures';

describe('deriveLeadId', () => {
  it('should take the first 12 hex chars of md5(lowercase(email + phone))', () => {
    expect(deriveLeadId('jane@corp.com', '+1-212-555-0100')).toBe('c0ef8a4bd04e');
  });

  it('should ignore letter case in the email', () => {
    expect(deriveLeadId('JANE@Corp.com', '+1-212-555-0100')).toBe('c0ef8a4bd04e');
  });

  it('should differ when the phone differs', () => {
    expect(deriveLeadId('jane@corp.com', '+1-212-555-0101')).not.toBe('c0ef8a4bd04e');
  });
});

describe('createLead', () => {
  it('should give the same id regardless of name, model and time', () => {
    const first = createLead(createSubmission(), NOW);
    const second = createLead(
      createSubmission({
        name: 'J. Doe',
        car_model: 'Compact Hatch',
        appointment_datetime: '2026-05-01T09:00:00Z',
      }),
      NOW
    );

    expect(first.lead_id).toBe(second.lead_id);
  });

  it('should default the timestamp to creation time', () => {
    const lead = createLead(createSubmission(), NOW);
    expect(lead.timestamp).toBe('2026-03-02T15:00:00.000Z');
  });

  it('should keep a submitted timestamp', () => {
    const lead = createLead(createSubmission({ timestamp: '2026-03-01T08:00:00Z' }), NOW);
    expect(lead.timestamp).toBe('2026-03-01T08:00:00Z');
  });

  it('should be frozen', () => {
    const lead = createLead(createSubmission(), NOW);
    expect(Object.isFrozen(lead)).toBe(true);
  });
});
