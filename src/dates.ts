function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/** `YYYY-MM` of a timestamp in local time */
export function formatMonth(timestamp: number | Date): string {
  const date = new Date(timestamp);
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}`;
}

/** `YYYY-MM-DD` of a timestamp in local time */
export function formatDay(timestamp: number | Date): string {
  const date = new Date(timestamp);
  return `${formatMonth(date)}-${pad(date.getDate())}`;
}

/** `YYYYMMDD_HHMMSS` in local time, used in report file names */
export function formatFileStamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}
