/**
 * Human-readable duration and date formatting.
 */

const MONTHS_SHORT = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];
const MONTHS_LONG = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December',
];
const WEEKDAYS = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'];

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Format a duration in minutes: "45m", "2h", "2h 30m".
 * Fractional minutes (averages) are rounded.
 */
export function formatDuration(minutes: number): string {
  const total = Math.max(0, Math.round(minutes));
  if (total < 60) return `${total}m`;

  const hours = Math.floor(total / 60);
  const remaining = total % 60;
  return remaining === 0 ? `${hours}h` : `${hours}h ${remaining}m`;
}

/** 12-hour clock with zero-padded hour: "09:05 AM". */
export function formatClock(date: Date): string {
  const hours = date.getHours();
  const hour12 = hours % 12 === 0 ? 12 : hours % 12;
  return `${pad2(hour12)}:${pad2(date.getMinutes())} ${hours < 12 ? 'AM' : 'PM'}`;
}

/** "Oct 09" */
export function formatShortDate(date: Date): string {
  return `${MONTHS_SHORT[date.getMonth()] ?? ''} ${pad2(date.getDate())}`;
}

/** "Oct 09, 2026" */
export function formatMediumDate(date: Date): string {
  return `${formatShortDate(date)}, ${date.getFullYear()}`;
}

/** "Monday, October 19, 2026" */
export function formatLongDate(date: Date): string {
  const weekday = WEEKDAYS[date.getDay()] ?? '';
  const month = MONTHS_LONG[date.getMonth()] ?? '';
  return `${weekday}, ${month} ${pad2(date.getDate())}, ${date.getFullYear()}`;
}

/** "Oct 09, 10:42 AM" */
export function formatDateTime(date: Date): string {
  return `${formatShortDate(date)}, ${formatClock(date)}`;
}

function plural(count: number, unit: string): string {
  return `${count} ${unit}${count === 1 ? '' : 's'} ago`;
}

/** Relative past time: "just now", "5 minutes ago", "yesterday", "2 weeks ago". */
export function formatTimeAgo(date: Date, now: Date = new Date()): string {
  const seconds = Math.max(0, Math.floor((now.getTime() - date.getTime()) / 1000));
  const days = Math.floor(seconds / 86_400);

  if (days > 0) {
    if (days === 1) return 'yesterday';
    if (days < 7) return `${days} days ago`;
    if (days < 30) return plural(Math.floor(days / 7), 'week');
    return plural(Math.floor(days / 30), 'month');
  }

  const hours = Math.floor(seconds / 3600);
  if (hours > 0) return plural(hours, 'hour');

  const minutes = Math.floor(seconds / 60);
  if (minutes > 0) return plural(minutes, 'minute');

  return 'just now';
}

/** Cut text to at most `width` code points, never splitting a surrogate pair. */
export function truncate(text: string, width: number): string {
  const chars = Array.from(text);
  return chars.length <= width ? text : chars.slice(0, width).join('');
}
