function pad2(value: number) {
  return String(value).padStart(2, "0");
}

// YYYY-MM-DD HH:MM:SS UTC, independent of the host locale and timezone.
export function formatUtcTimestamp(date: Date) {
  const day = `${date.getUTCFullYear()}-${pad2(date.getUTCMonth() + 1)}-${pad2(date.getUTCDate())}`;
  const time = `${pad2(date.getUTCHours())}:${pad2(date.getUTCMinutes())}:${pad2(date.getUTCSeconds())}`;
  return `${day} ${time} UTC`;
}
