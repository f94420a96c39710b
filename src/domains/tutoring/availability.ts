/**
 * Teacher availability windows
 *
 * Windows are weekly and expressed in server local time.
 */

export const WEEKDAYS = [
  "Monday",
  "Tuesday",
  "Wednesday",
  "Thursday",
  "Friday",
  "Saturday",
  "Sunday",
] as const;

export type Weekday = (typeof WEEKDAYS)[number];

const WEEKDAY_LABELS: Record<Weekday, string> = {
  Monday: "Mon",
  Tuesday: "Tue",
  Wednesday: "Wed",
  Thursday: "Thu",
  Friday: "Fri",
  Saturday: "Sat",
  Sunday: "Sun",
};

export interface AvailabilityWindow {
  dayOfWeek: Weekday;
  /** "HH:MM" */
  startTime: string;
  /** "HH:MM" */
  endTime: string;
}

export type AvailabilityCheck =
  | { available: true }
  | { available: false; reason: string };

/** Monday = 0 ... Sunday = 6 */
function weekdayIndex(date: Date): number {
  return (date.getDay() + 6) % 7;
}

function toMinutes(time: string): number {
  const [hours = "0", minutes = "0"] = time.split(":");
  return Number(hours) * 60 + Number(minutes);
}

function formatTime(time: string): string {
  const total = toMinutes(time);
  const hours = String(Math.floor(total / 60)).padStart(2, "0");
  const minutes = String(total % 60).padStart(2, "0");
  return `${hours}:${minutes}`;
}

function formatSlot(window: AvailabilityWindow): string {
  return `${formatTime(window.startTime)}-${formatTime(window.endTime)}`;
}

function byStart(a: AvailabilityWindow, b: AvailabilityWindow): number {
  return toMinutes(a.startTime) - toMinutes(b.startTime);
}

export function checkAvailability(
  windows: AvailabilityWindow[],
  now: Date = new Date(),
): AvailabilityCheck {
  const today = weekdayIndex(now);
  const currentMinutes = now.getHours() * 60 + now.getMinutes();

  const todays = windows
    .filter((window) => WEEKDAYS.indexOf(window.dayOfWeek) === today)
    .sort(byStart);

  for (const window of todays) {
    if (
      toMinutes(window.startTime) <= currentMinutes &&
      currentMinutes < toMinutes(window.endTime)
    ) {
      return { available: true };
    }
  }

  if (todays.length > 0) {
    const slots = todays.map(formatSlot).join(", ");
    return {
      available: false,
      reason: `❌ That teacher only holds tutoring today between ${slots}. Try again within their hours.`,
    };
  }

  // No window falls on today, so any next slot is 1 to 6 days away
  const daysAhead = (window: AvailabilityWindow) =>
    (WEEKDAYS.indexOf(window.dayOfWeek) - today + 7) % 7;
  const [next] = [...windows].sort(
    (a, b) => daysAhead(a) - daysAhead(b) || byStart(a, b),
  );
  if (!next) {
    return { available: false, reason: "❌ This teacher has not set up tutoring hours." };
  }

  const deltaDays = daysAhead(next);
  const hint = deltaDays === 1 ? "tomorrow" : `on ${next.dayOfWeek}`;
  return {
    available: false,
    reason: `❌ The teacher is not available now. Next slot ${hint}: ${formatSlot(next)}.`,
  };
}

/**
 * One line per weekday, e.g. `Mon: 09:00-11:00; 15:00-16:00`
 */
export function formatAvailabilityWindows(windows: AvailabilityWindow[]): string {
  const lines: string[] = [];
  for (const day of WEEKDAYS) {
    const slots = windows
      .filter((window) => window.dayOfWeek === day)
      .sort(byStart)
      .map(formatSlot);
    if (slots.length > 0) {
      lines.push(`${WEEKDAY_LABELS[day]}: ${slots.join("; ")}`);
    }
  }
  return lines.length > 0 ? lines.join("\n") : "no published hours";
}
