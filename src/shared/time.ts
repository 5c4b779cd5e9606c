function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

/**
 * Format a Date in the host's local timezone as ISO 8601 with offset.
 *
 * Example output: 2026-01-27T16:30:00-08:00
 */
export function formatLocalIso(date: Date): string {
  const offsetMinutes = -date.getTimezoneOffset();
  const sign = offsetMinutes >= 0 ? "+" : "-";
  const abs = Math.abs(offsetMinutes);

  const year = String(date.getFullYear());
  const month = pad2(date.getMonth() + 1);
  const day = pad2(date.getDate());
  const hour = pad2(date.getHours());
  const minute = pad2(date.getMinutes());
  const second = pad2(date.getSeconds());

  return `${year}-${month}-${day}T${hour}:${minute}:${second}${sign}${pad2(Math.floor(abs / 60))}:${pad2(abs % 60)}`;
}

export function nowLocalIso(): string {
  return formatLocalIso(new Date());
}
