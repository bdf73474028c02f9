const MINUTE_MS = 60 * 1000;

/**
 * Times spaced so that at most `perHour` actions fall in an hour, with a repeating
 * -jitter / 0 / +jitter offset to avoid an exact period. Sorted ascending.
 */
export function scheduleActions(count: number, startAt: Date, perHour = 25, jitterMinutes = 6): Date[] {
  const rate = perHour > 0 ? perHour : 25;
  const stepMinutes = Math.max(2, Math.floor(60 / rate));
  const times: Date[] = [];

  for (let i = 0; i < count; i += 1) {
    const jitter = (i % 3) * jitterMinutes - jitterMinutes;
    times.push(new Date(startAt.getTime() + (i * stepMinutes + jitter) * MINUTE_MS));
  }

  return times.sort((a, b) => a.getTime() - b.getTime());
}
