export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = ms =>
  new Promise<void>(resolve => setTimeout(resolve, ms));

const pad = (n: number) => n.toString().padStart(2, "0");

/**
 * Local-time stamp used in output file names: YYYYMMDD_HHmmss
 */
export function formatFileStamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/**
 * UTC calendar day of an epoch-ms timestamp: YYYY-MM-DD
 */
export function formatDay(timestamp: number): string {
  return new Date(timestamp).toISOString().slice(0, 10);
}

export function parseIsoDate(value: string): number | undefined {
  const parsed = Date.parse(value);
  return Number.isNaN(parsed) ? undefined : parsed;
}
