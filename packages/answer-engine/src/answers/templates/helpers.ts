import type { PriceEntry, RoomType } from '@campus-assist/knowledge-catalog';

export const PLACEHOLDER = '—';

export function orPlaceholder(value: string | undefined): string {
  return value && value.trim() ? value.trim() : PLACEHOLDER;
}

export function joinOrPlaceholder(values: readonly string[]): string {
  return values.length > 0 ? values.join(', ') : PLACEHOLDER;
}

/** Cuts by code point so a surrogate pair is never split. */
export function takeCodePoints(value: string, count: number): string {
  return Array.from(value).slice(0, count).join('');
}

export function truncate(value: string, maxLength: number): string {
  const codePoints = Array.from(value);
  if (codePoints.length <= maxLength) {
    return value;
  }
  return `${codePoints.slice(0, maxLength - 1).join('').trimEnd()}…`;
}

export function formatAmount(amount: number): string {
  return `£${amount.toFixed(2)}`;
}

export function formatYesNo(value: boolean | undefined): string {
  if (value === undefined) {
    return PLACEHOLDER;
  }
  return value ? 'yes' : 'no';
}

/** With neither amount present the line is just the year. */
export function formatPrice(price: PriceEntry): string {
  const year = orPlaceholder(price.year);
  const amounts: string[] = [];
  if (price.perWeek !== undefined) {
    amounts.push(`${formatAmount(price.perWeek)} per week`);
  }
  if (price.total !== undefined) {
    amounts.push(`${formatAmount(price.total)} total`);
  }
  return amounts.length > 0 ? `${year}: ${amounts.join(', ')}` : year;
}

export function currentPrice(room: RoomType): PriceEntry | undefined {
  return room.prices[room.prices.length - 1];
}

export function formatRoomType(room: RoomType): string {
  const price = currentPrice(room);
  const tenancy = room.tenancyWeeks ? `${room.tenancyWeeks} weeks` : PLACEHOLDER;
  return [
    `- ${orPlaceholder(room.name)}`,
    `ensuite: ${formatYesNo(room.ensuite)}`,
    `tenancy: ${tenancy}`,
    `current price: ${price ? formatPrice(price) : PLACEHOLDER}`,
  ].join(' | ');
}
