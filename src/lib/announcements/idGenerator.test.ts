import { describe, it, expect } from 'vitest';
import { generateAnnouncementId, isAnnouncementId } from './idGenerator';

describe('generateAnnouncementId', () => {
  it('produces 12 characters from A-Z, a-z, 0-9 by default', () => {
    for (let i = 0; i < 50; i += 1) {
      expect(generateAnnouncementId()).toMatch(/^[A-Za-z0-9]{12}$/);
    }
  });

  it('honours a custom length', () => {
    expect(generateAnnouncementId(20)).toHaveLength(20);
  });

  it('does not repeat across a batch', () => {
    const ids = new Set(Array.from({ length: 500 }, () => generateAnnouncementId()));
    expect(ids.size).toBe(500);
  });
});

describe('isAnnouncementId', () => {
  it('accepts generated ids and rejects path-like values', () => {
    expect(isAnnouncementId('Ab3dEf9hIj0K')).toBe(true);
    expect(isAnnouncementId('../secrets')).toBe(false);
    expect(isAnnouncementId('a.json')).toBe(false);
    expect(isAnnouncementId('')).toBe(false);
  });
});
