import { isValid, parseISO } from "date-fns";

export type ParsedTimestamp = {
  instant: number;
  utcOffsetMinutes: number;
};

// Only the shape git's `%aI` can produce; parseISO would also take dates without a time or offset.
const ISO_TIMESTAMP = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(?:\.\d+)?(Z|([+-])(\d{2}):?(\d{2}))$/;

const parseOffset = (sign: string | undefined, hours: string | undefined, minutes: string | undefined): number | null => {
  if (sign === undefined || hours === undefined || minutes === undefined) {
    return null;
  }

  const hourValue = Number.parseInt(hours, 10);
  const minuteValue = Number.parseInt(minutes, 10);
  if (hourValue > 23 || minuteValue > 59) {
    return null;
  }

  const magnitude = hourValue * 60 + minuteValue;
  return sign === "-" ? -magnitude : magnitude;
};

/**
 * Parses an ISO-8601 timestamp with an embedded offset, such as git's `%aI`
 * output, into Unix seconds plus the offset it was written in.
 */
export const parseIsoTimestamp = (value: string): ParsedTimestamp | null => {
  const trimmed = value.trim();
  const match = trimmed.match(ISO_TIMESTAMP);
  if (match === null) {
    return null;
  }

  const [, zone, sign, offsetHours, offsetMinutes] = match;
  const utcOffsetMinutes = zone === "Z" ? 0 : parseOffset(sign, offsetHours, offsetMinutes);
  if (utcOffsetMinutes === null) {
    return null;
  }

  const parsed = parseISO(trimmed);
  if (!isValid(parsed)) {
    return null;
  }

  return {
    instant: Math.floor(parsed.getTime() / 1000),
    utcOffsetMinutes,
  };
};
