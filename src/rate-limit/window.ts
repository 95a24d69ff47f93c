export const WINDOW_TYPES = ["minute", "hour", "day"] as const;

export type WindowType = (typeof WINDOW_TYPES)[number];

export const WINDOW_DURATION_MS: Record<WindowType, number> = {
  minute: 60_000,
  hour: 3_600_000,
  day: 86_400_000,
};

/**
 * End of the UTC-aligned window containing `now`. A fresh counter for a
 * request at 12:00:45 in a minute window closes at 12:01:00.
 */
export function windowEnd(now: Date, windowType: WindowType): Date {
  const duration = WINDOW_DURATION_MS[windowType];
  return new Date(Math.floor(now.getTime() / duration) * duration + duration);
}
