/**
 * Cron expression for a fixed cadence in seconds. Sub-minute cadences use the
 * six-field form node-cron accepts; longer ones round to whole minutes.
 */
export function secondsToCron(seconds: number): string {
  if (seconds < 60) return `*/${Math.max(1, Math.floor(seconds))} * * * * *`;
  const minutes = Math.max(1, Math.round(seconds / 60));
  if (minutes < 60) return `*/${minutes} * * * *`;
  return hoursToCron(Math.max(1, Math.round(minutes / 60)));
}

export function hoursToCron(hours: number): string {
  if (hours >= 24) return '0 0 * * *';
  if (hours <= 1) return '0 * * * *';
  return `0 */${hours} * * *`;
}

/**
 * True when `seconds` maps onto an evenly spaced cron step: a divisor of a
 * minute, of an hour in whole minutes, or of a day in whole hours.
 */
export function isEvenCronCadence(seconds: number): boolean {
  if (!Number.isInteger(seconds) || seconds <= 0) return false;
  if (seconds < 60) return 60 % seconds === 0;
  if (seconds < 3600) return seconds % 60 === 0 && 60 % (seconds / 60) === 0;
  return seconds % 3600 === 0 && 24 % (seconds / 3600) === 0;
}
