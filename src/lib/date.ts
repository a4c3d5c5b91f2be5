interface CalendarParts {
  year: string;
  month: string;
  day: string;
  hour: string;
  minute: string;
  second: string;
}

/**
 * Wall-clock parts of `date` in `timeZone` (host zone when omitted), zero-padded.
 */
export function getCalendarParts(date: Date, timeZone?: string): CalendarParts {
  const formatter = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hourCycle: 'h23',
  });
  const parts = formatter.formatToParts(date);
  const pick = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((part) => part.type === type)?.value ?? '00';

  return {
    year: pick('year'),
    month: pick('month'),
    day: pick('day'),
    hour: pick('hour'),
    minute: pick('minute'),
    second: pick('second'),
  };
}

/** YYYY-MM-DD HH:MM:SS */
export function formatReportTimestamp(date: Date, timeZone?: string): string {
  const { year, month, day, hour, minute, second } = getCalendarParts(date, timeZone);
  return `${year}-${month}-${day} ${hour}:${minute}:${second}`;
}

/** YYYYMMDD, used in download file names */
export function getDateStamp(date: Date, timeZone?: string): string {
  const { year, month, day } = getCalendarParts(date, timeZone);
  return `${year}${month}${day}`;
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}
