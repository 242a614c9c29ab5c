// The provider gives unix seconds plus the city's UTC offset in seconds.
// Shifting by the offset and reading UTC fields yields the city's wall clock.
function shifted(unixSeconds: number, offsetSeconds: number): Date {
  return new Date((unixSeconds + offsetSeconds) * 1000);
}

export function formatLocalTime(
  unixSeconds: number,
  offsetSeconds: number,
  withSeconds = true
): string {
  const iso = shifted(unixSeconds, offsetSeconds).toISOString();
  return withSeconds ? iso.slice(11, 19) : iso.slice(11, 16);
}

export function localDateKey(unixSeconds: number, offsetSeconds: number): string {
  return shifted(unixSeconds, offsetSeconds).toISOString().slice(0, 10);
}

export function formatUtcOffset(offsetSeconds: number): string {
  const totalMinutes = Math.trunc(offsetSeconds / 60);
  const sign = totalMinutes >= 0 ? '+' : '-';
  const abs = Math.abs(totalMinutes);
  const hours = String(Math.floor(abs / 60)).padStart(2, '0');
  const minutes = String(abs % 60).padStart(2, '0');
  return `UTC${sign}${hours}:${minutes}`;
}

/** "2025-01-06" -> "Monday, 06 January" */
export function formatDayLabel(dateKey: string): string {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone: 'UTC',
    weekday: 'long',
    day: '2-digit',
    month: 'long',
  }).formatToParts(new Date(`${dateKey}T00:00:00Z`));

  const part = (type: Intl.DateTimeFormatPartTypes) =>
    parts.find((p) => p.type === type)?.value ?? '';

  return `${part('weekday')}, ${part('day')} ${part('month')}`;
}
