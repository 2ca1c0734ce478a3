export const NOT_AVAILABLE = 'N/A';

/** `sei-network` -> `Sei Network` */
export function displayName(assetId: string): string {
  return assetId
    .split('-')
    .filter(Boolean)
    .map((part) => part[0].toUpperCase() + part.slice(1))
    .join(' ');
}

export function formatUsd(value: number | null, digits = 2): string {
  if (value === null) return NOT_AVAILABLE;
  return `$${value.toLocaleString('en-US', {
    minimumFractionDigits: digits,
    maximumFractionDigits: digits,
  })}`;
}

export function formatFixed(value: number | null, digits = 2): string {
  return value === null ? NOT_AVAILABLE : value.toFixed(digits);
}

export function formatSignedPct(value: number | null, digits = 2): string {
  if (value === null) return NOT_AVAILABLE;
  return `${value >= 0 ? '+' : ''}${value.toFixed(digits)}%`;
}

/** `2026-10-19 22:00:05 UTC` */
export function formatUtc(date: Date): string {
  return `${date.toISOString().slice(0, 19).replace('T', ' ')} UTC`;
}
