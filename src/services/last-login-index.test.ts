import { LoginEvent } from '@/types/audit.types';
import { LastLoginIndex } from './last-login-index';

function login(userId: string, loggedAt: string): LoginEvent {
  return { userId, activity: 'Log on', loggedAt };
}

describe('LastLoginIndex', () => {
  const timestamps = [
    '2024-02-10T08:00:00Z',
    '2024-05-01T23:59:59Z',
    '2023-12-31T00:00:00Z',
    '2024-05-01T00:00:00Z',
    '2024-04-30T12:30:00Z'
  ];

  it('should hold the maximum timestamp whatever the arrival order', () => {
    const orders = [
      timestamps,
      [...timestamps].reverse(),
      [timestamps[2], timestamps[4], timestamps[1], timestamps[0], timestamps[3]]
    ];

    for (const order of orders) {
      const index = new LastLoginIndex();
      order.forEach(ts => index.record(login('u1', ts)));
      expect(index.get('u1')).toBe('2024-05-01T23:59:59Z');
    }
  });

  it('should never move a stored value backwards', () => {
    const index = new LastLoginIndex();
    expect(index.record(login('u1', '2024-05-01T00:00:00Z'))).toBe(true);
    expect(index.record(login('u1', '2024-04-01T00:00:00Z'))).toBe(false);
    expect(index.get('u1')).toBe('2024-05-01T00:00:00Z');
  });

  it('should keep the first value seen on a tie', () => {
    const index = new LastLoginIndex();
    expect(index.record(login('u1', '2024-05-01T00:00:00Z'))).toBe(true);
    expect(index.record(login('u1', '2024-05-01T00:00:00Z'))).toBe(false);
  });

  it('should keep users separate', () => {
    const index = new LastLoginIndex();
    index.record(login('u1', '2024-05-01T00:00:00Z'));
    index.record(login('u2', '2024-01-01T00:00:00Z'));

    expect(index.size).toBe(2);
    expect(index.get('u2')).toBe('2024-01-01T00:00:00Z');
    expect(index.has('u3')).toBe(false);
    expect(index.get('u1')).toBe('2024-05-01T00:00:00Z');
    expect(index.get('u3')).toBeUndefined();
  });
});
