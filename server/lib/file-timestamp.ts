const pad = (value: number, width = 2): string => String(value).padStart(width, "0");

/** `YYYYMMDD_HHMMSS` in local time, optionally suffixed with `_mmm`. */
export function fileTimestamp(date: Date, withMillis = false): string {
  const stamp =
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return withMillis ? `${stamp}_${pad(date.getMilliseconds(), 3)}` : stamp;
}
