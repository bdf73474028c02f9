import { describe, test, expect } from '@jest/globals';
import { buildContentCalendar } from '../content-calendar';

describe('buildContentCalendar', () => {
  test('should fill two slots per day from the start date', () => {
    const calendar = buildContentCalendar(
      [{ hook: 'Dry skin?', concept: 'Night routine' }, { hook: 'Shea vs cocoa' }, { concept: 'Unboxing' }],
      new Date(2026, 2, 14, 22, 5)
    );

    expect(calendar).toEqual([
      { slot: 1, scheduledAt: new Date(2026, 2, 14, 11, 30), hook: 'Dry skin?', concept: 'Night routine' },
      { slot: 2, scheduledAt: new Date(2026, 2, 14, 18, 30), hook: 'Shea vs cocoa', concept: '' },
      { slot: 3, scheduledAt: new Date(2026, 2, 15, 11, 30), hook: '', concept: 'Unboxing' },
    ]);
  });

  test('should roll over month ends', () => {
    const calendar = buildContentCalendar([{}, {}, {}, {}], new Date(2026, 0, 31, 8, 0));

    expect(calendar.map((slot) => slot.scheduledAt)).toEqual([
      new Date(2026, 0, 31, 11, 30),
      new Date(2026, 0, 31, 18, 30),
      new Date(2026, 1, 1, 11, 30),
      new Date(2026, 1, 1, 18, 30),
    ]);
  });

  test('should return no slots without ideas', () => {
    expect(buildContentCalendar([], new Date(2026, 2, 14))).toEqual([]);
  });
});
