import type { InstallmentSpec } from "@shared/sales";
import { ValidationError } from "./errors";

export const MAX_INSTALLMENTS = 360;

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

export function parseISODate(value: string): { year: number; month: number; day: number } | null {
  const match = ISO_DATE.exec(value);
  if (!match) return null;
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (month < 1 || month > 12 || day < 1) return null;
  if (day > daysInMonth(year, month - 1)) return null;
  return { year, month, day };
}

export function isISODate(value: string): boolean {
  return parseISODate(value) !== null;
}

function daysInMonth(year: number, monthIndex: number) {
  return new Date(Date.UTC(year, monthIndex + 1, 0)).getUTCDate();
}

/**
 * Calendar month arithmetic anchored on `start`: the day of month is kept and
 * clamped to the target month's length, so Jan 31 + 1 is Feb 29 (2024) and
 * Jan 31 + 2 is Mar 31.
 */
export function addMonthsISO(start: string, months: number): string {
  const parsed = parseISODate(start);
  if (!parsed) throw new ValidationError(`Invalid date: ${start}`);
  const monthOffset = parsed.month - 1 + months;
  const yyyy = parsed.year + Math.floor(monthOffset / 12);
  const monthIndex = ((monthOffset % 12) + 12) % 12;
  const dd = Math.min(parsed.day, daysInMonth(yyyy, monthIndex));
  return `${yyyy}-${String(monthIndex + 1).padStart(2, "0")}-${String(dd).padStart(2, "0")}`;
}

/**
 * Half-up rounding on the decimal value as written: 1.005 is 101 cents even
 * though `1.005 * 100` is 100.49999999999999 in binary floating point.
 */
export function toCents(value: number): number {
  const shifted = Number(`${value}e2`);
  return Math.round(Number.isFinite(shifted) ? shifted : value * 100);
}

export function fromCents(cents: number): number {
  return cents / 100;
}

/**
 * Splits `totalValue` into `count` monthly installments of equal amount.
 * The amount is rounded half-up to cents and the remainder is not
 * redistributed, so `amount * count` may differ from `totalValue` by up to
 * `count / 2` cents.
 */
export function generateInstallmentPlan(
  totalValue: number,
  count: number,
  firstDueDate: string,
): InstallmentSpec[] {
  if (!Number.isInteger(count) || count < 1 || count > MAX_INSTALLMENTS) {
    throw new ValidationError(
      `Installment count must be an integer between 1 and ${MAX_INSTALLMENTS}`,
    );
  }
  if (!Number.isFinite(totalValue) || totalValue <= 0) {
    throw new ValidationError("Total value must be greater than zero");
  }
  if (!isISODate(firstDueDate)) {
    throw new ValidationError(`Invalid first due date: ${firstDueDate}`);
  }

  const amount = fromCents(Math.round(toCents(totalValue) / count));
  if (amount <= 0) {
    throw new ValidationError("Installment amount rounds to zero");
  }

  const installments: InstallmentSpec[] = [];
  for (let i = 0; i < count; i++) {
    installments.push({
      number: i + 1,
      dueDate: addMonthsISO(firstDueDate, i),
      amount,
    });
  }
  return installments;
}

/** totalValue minus what the installments add up to, in currency units. */
export function roundingDrift(totalValue: number, installments: InstallmentSpec[]): number {
  const billed = installments.reduce((sum, item) => sum + toCents(item.amount), 0);
  return fromCents(toCents(totalValue) - billed);
}
