import { InvalidStreamEntryError } from '../../src/errors/invalid-stream-entry.error';
import {
  decodeStreamEntry,
  encodeStreamEntry,
} from '../../src/utils/stream-entry-codec';
import { makeEvent } from '../helpers';

describe('stream entry codec', () => {
  it('should encode an event into wire fields', () => {
    expect(encodeStreamEntry(makeEvent())).toEqual({
      event_id: 'sub-1',
      template_id: 'form_submitted',
      org_id: '7',
      data: '{"email":"a@b.com","name":"Ada"}',
      submitted_at: '2025-01-01T00:00:00.000Z',
    });
  });

  it('should decode wire fields back into an event', () => {
    const event = makeEvent();
    const decoded = decodeStreamEntry({
      id: '1700000000000-0',
      fields: encodeStreamEntry(event),
      deliveryCount: 1,
    });
    expect(decoded).toEqual(event);
  });

  it('should default org_id and fall back to the entry id timestamp', () => {
    const decoded = decodeStreamEntry({
      id: '1700000000000-3',
      fields: { event_id: 'sub-9', template_id: 'contact', data: '{}' },
      deliveryCount: 1,
    });

    expect(decoded.orgId).toBe('0');
    expect(decoded.submittedAt.toISOString()).toBe('2023-11-14T22:13:20.000Z');
  });

  it.each([
    [{ template_id: 't', data: '{}' }, 'Log entry 1-0 has no event_id'],
    [{ event_id: 'e', data: '{}' }, 'Log entry 1-0 has no template_id'],
    [
      { event_id: 'e', template_id: 't', data: '{oops' },
      'Log entry 1-0 has a data field that is not valid JSON',
    ],
    [
      { event_id: 'e', template_id: 't', data: '[1,2]' },
      'Log entry 1-0 has a data field that is not a JSON object',
    ],
    [
      { event_id: 'e', template_id: 't', data: '{}', submitted_at: 'yesterday' },
      'Log entry 1-0 has an invalid submitted_at',
    ],
  ])('should reject %j', (fields: Record<string, string>, message: string) => {
    const decode = () =>
      decodeStreamEntry({ id: '1-0', fields, deliveryCount: 1 });

    expect(decode).toThrow(InvalidStreamEntryError);
    expect(decode).toThrow(message);
  });
});
