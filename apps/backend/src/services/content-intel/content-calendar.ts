export interface ContentIdea {
  hook?: string;
  concept?: string;
}

export interface CalendarSlot {
  slot: number;
  scheduledAt: Date;
  hook: string;
  concept: string;
}

// Local wall-clock posting times, cycled per day
const DEFAULT_POST_TIMES: ReadonlyArray<readonly [hours: number, minutes: number]> = [
  [11, 30],
  [18, 30],
];

/**
 * One slot per idea, two per day starting on `start`'s local date.
 */
export function buildContentCalendar(ideas: readonly ContentIdea[], start: Date = new Date()): CalendarSlot[] {
  const day = new Date(start.getFullYear(), start.getMonth(), start.getDate());
  const perDay = DEFAULT_POST_TIMES.length;

  return ideas.map((idea, index) => {
    const [hours, minutes] = DEFAULT_POST_TIMES[index % perDay];
    const dayOffset = Math.floor(index / perDay);
    const scheduledAt = new Date(day.getFullYear(), day.getMonth(), day.getDate() + dayOffset, hours, minutes);
    return {
      slot: index + 1,
      scheduledAt,
      hook: idea.hook ?? '',
      concept: idea.concept ?? '',
    };
  });
}
