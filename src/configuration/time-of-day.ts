// Time-of-day helpers. Minutes are counted from local market midnight.

export const MINUTES_PER_DAY = 24 * 60;

export type TimeWindow = {
  readonly start: string; // "HH:MM"
  readonly end: string; // "HH:MM", "24:00" allowed
};

type Segment = readonly [from: number, to: number];

export const TIME_OF_DAY_PATTERN = /^(?:([01]\d|2[0-3]):([0-5]\d)|24:00)$/;

export const parseTimeOfDay = (value: string): number => {
  const match = TIME_OF_DAY_PATTERN.exec(value);
  if (!match) {
    throw new Error(`Invalid time of day: ${value}`);
  }
  if (match[1] === undefined || match[2] === undefined) {
    return MINUTES_PER_DAY;
  }
  return parseInt(match[1], 10) * 60 + parseInt(match[2], 10);
};

// A window whose start is after its end wraps past midnight. Equal bounds mean an empty window.
const toSegments = (window: TimeWindow): readonly Segment[] => {
  const start = parseTimeOfDay(window.start) % MINUTES_PER_DAY;
  const end = parseTimeOfDay(window.end);

  if (start === end % MINUTES_PER_DAY && end !== MINUTES_PER_DAY) {
    return [];
  }
  if (start < end) {
    return [[start, end]];
  }
  const segments: Segment[] = [[start, MINUTES_PER_DAY]];
  if (end > 0) {
    segments.push([0, end]);
  }
  return segments;
};

export const isInWindow = (minuteOfDay: number, window: TimeWindow): boolean =>
  toSegments(window).some(([from, to]) => minuteOfDay >= from && minuteOfDay < to);

export const windowsOverlap = (a: TimeWindow, b: TimeWindow): boolean =>
  toSegments(a).some(([aFrom, aTo]) =>
    toSegments(b).some(([bFrom, bTo]) => aFrom < bTo && bFrom < aTo)
  );

export const windowDurationMinutes = (window: TimeWindow): number =>
  toSegments(window).reduce((total, [from, to]) => total + (to - from), 0);

export const minuteOfDay = (timestamp: Date, utcOffsetMinutes: number): number => {
  const shifted = new Date(timestamp.getTime() + utcOffsetMinutes * 60_000);
  return shifted.getUTCHours() * 60 + shifted.getUTCMinutes();
};
