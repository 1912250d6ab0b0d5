export const INVALID_TIMESTAMP = '<invalid-timestamp>';

const MONTHS = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December',
];

type ZonedParts = {
  weekday: string;
  month: string;
  monthNumber: string;
  day: string;
  year: string;
  hour: string;
  minute: string;
  second: string;
  zone: string;
};

// en-US short zone names: `UTC`, `EST`/`PDT`, and a GMT offset (`GMT+1`) for
// zones without a US abbreviation.
function zonedParts(date: Date, timeZone?: string): ZonedParts {
  const fmt = new Intl.DateTimeFormat('en-US', {
    timeZone,
    weekday: 'long',
    year: 'numeric',
    month: 'long',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hourCycle: 'h23',
    timeZoneName: 'short',
  });
  const parts = new Map(fmt.formatToParts(date).map((p) => [p.type, p.value]));
  const month = parts.get('month') ?? '';
  return {
    weekday: parts.get('weekday') ?? '',
    month,
    monthNumber: String(MONTHS.indexOf(month) + 1).padStart(2, '0'),
    day: parts.get('day') ?? '',
    year: parts.get('year') ?? '',
    hour: parts.get('hour') ?? '',
    minute: parts.get('minute') ?? '',
    second: parts.get('second') ?? '',
    zone: parts.get('timeZoneName') ?? '',
  };
}

/** Renders a duration as `1h2m3s`, dropping leading zero units (`45s`, `2m0s`). */
export function formatDuration(ms: number): string {
  const total = Math.floor(Math.abs(ms) / 1000);
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  const seconds = total % 60;
  if (hours > 0) return `${hours}h${minutes}m${seconds}s`;
  if (minutes > 0) return `${minutes}m${seconds}s`;
  return `${seconds}s`;
}

/**
 * Render a Discord `<t:epoch:code>` timestamp as plain text.
 * Unparsable epochs and unknown codes yield `<invalid-timestamp>`; a missing
 * code is Discord's default short date/time (`f`).
 */
export function formatDiscordTimestamp(
  epoch: string,
  code: string | undefined,
  now: Date,
  timeZone?: string,
): string {
  if (!/^[+-]?\d+$/.test(epoch)) return INVALID_TIMESTAMP;
  const date = new Date(Number(epoch) * 1000);
  if (Number.isNaN(date.getTime())) return INVALID_TIMESTAMP;

  const p = zonedParts(date, timeZone);
  switch (code ?? 'f') {
    case 't':
      return `${p.hour}:${p.minute} ${p.zone}`;
    case 'T':
      return `${p.hour}:${p.minute}:${p.second} ${p.zone}`;
    case 'd':
      return `${p.year}/${p.monthNumber}/${p.day} ${p.zone}`;
    case 'D':
      return `${p.month} ${p.day}, ${p.year} ${p.zone}`;
    case 'f':
      return `${p.month} ${p.day}, ${p.year} at ${p.hour}:${p.minute} ${p.zone}`;
    case 'F':
      return `${p.weekday}, ${p.month} ${p.day}, ${p.year} at ${p.hour}:${p.minute} ${p.zone}`;
    case 'R': {
      const delta = now.getTime() - date.getTime();
      return delta > 0 ? `${formatDuration(delta)} ago` : `in ${formatDuration(delta)}`;
    }
    default:
      return INVALID_TIMESTAMP;
  }
}
