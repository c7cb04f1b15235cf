/**
 * Clock abstraction so components can be driven by fixed dates in tests
 */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

function pad(value: number, width = 2): string {
  return value.toString().padStart(width, '0');
}

/**
 * Local-time stamp in the form YYYYMMDD_HHMMSS
 */
export function compactTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}
