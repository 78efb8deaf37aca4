import type { EasternTimeParts, TimeInfo } from "./types.ts";

export type DisplayZone = "UTC" | "ET";

const ZONE_IDS: Record<DisplayZone, string> = {
  UTC: "UTC",
  ET: "America/New_York",
};

const formatters = new Map<DisplayZone, Intl.DateTimeFormat>();

function formatterFor(zone: DisplayZone): Intl.DateTimeFormat {
  let formatter = formatters.get(zone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat("en-US", {
      timeZone: ZONE_IDS[zone],
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit",
      hourCycle: "h23",
      timeZoneName: "short",
    });
    formatters.set(zone, formatter);
  }
  return formatter;
}

interface ZonedParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  zoneName: string;
}

function zonedParts(timestampSeconds: number, zone: DisplayZone): ZonedParts {
  const parts = formatterFor(zone).formatToParts(
    new Date(timestampSeconds * 1000),
  );
  const lookup = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((part) => part.type === type)?.value ?? "";

  return {
    year: Number(lookup("year")),
    month: Number(lookup("month")),
    day: Number(lookup("day")),
    hour: Number(lookup("hour")),
    minute: Number(lookup("minute")),
    second: Number(lookup("second")),
    zoneName: zone === "UTC" ? "UTC" : lookup("timeZoneName"),
  };
}

const pad = (value: number) => String(value).padStart(2, "0");

/**
 * Formats as `YYYY-MM-DD HH:MM:SS ZONE`, e.g. `2024-01-15 07:30:00 EST`.
 */
export function formatTime(
  timestampSeconds: number,
  zone: DisplayZone = "UTC",
): string {
  const p = zonedParts(timestampSeconds, zone);
  return `${p.year}-${pad(p.month)}-${pad(p.day)} ${pad(p.hour)}:${pad(p.minute)}:${pad(p.second)} ${p.zoneName}`;
}

export function toEasternParts(timestampSeconds: number): EasternTimeParts {
  const p = zonedParts(timestampSeconds, "ET");
  return {
    year: p.year,
    month: p.month,
    day: p.day,
    hour: p.hour,
    minute: p.minute,
    second: p.second,
    formatted: formatTime(timestampSeconds, "ET"),
  };
}

export function describeTime(timestampSeconds: number): TimeInfo {
  const etParts = toEasternParts(timestampSeconds);
  return {
    utc: formatTime(timestampSeconds, "UTC"),
    et: etParts.formatted,
    etParts,
  };
}
