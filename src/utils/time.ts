export function nowUtcIso(): string {
  return new Date().toISOString();
}

function clockParts(date: Date, timezone: string) {
  const parts = new Intl.DateTimeFormat("en-GB", {
    timeZone: timezone,
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
    hourCycle: "h23"
  }).formatToParts(date);

  const get = (type: string) => parts.find((p) => p.type === type)?.value ?? "00";
  return { hh: get("hour"), mi: get("minute"), ss: get("second") };
}

export function formatClock(date: Date, timezone: string): string {
  const { hh, mi, ss } = clockParts(date, timezone);
  return `${hh}:${mi}:${ss}`;
}

export function formatHourLabel(date: Date, timezone: string): string {
  return `${clockParts(date, timezone).hh}:00`;
}
