import { WEEKDAYS, formatCivilDate, type CivilDate, type Weekday } from "@commitgrid/core";

export { formatCivilDate };

export const SECONDS_PER_DAY = 86_400;

const DAYS_PER_ERA = 146_097;
// Day number of 0000-03-01 relative to 1970-01-01.
const EPOCH_SHIFT = 719_468;

const floorDiv = (value: number, divisor: number): number => Math.floor(value / divisor);

const mod = (value: number, divisor: number): number => ((value % divisor) + divisor) % divisor;

export const isLeapYear = (year: number): boolean =>
  (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;

export const daysInMonth = (year: number, month: number): number => {
  if (month === 2) {
    return isLeapYear(year) ? 29 : 28;
  }

  return month === 4 || month === 6 || month === 9 || month === 11 ? 30 : 31;
};

export const isValidCivilDate = (date: CivilDate): boolean =>
  Number.isInteger(date.year) &&
  Number.isInteger(date.month) &&
  Number.isInteger(date.day) &&
  date.month >= 1 &&
  date.month <= 12 &&
  date.day >= 1 &&
  date.day <= daysInMonth(date.year, date.month);

/**
 * Days since 1970-01-01 in the proleptic Gregorian calendar. Works on 400-year
 * eras starting in March so that the leap day is always the last day of a year.
 */
export const toDayNumber = (date: CivilDate): number => {
  const year = date.month <= 2 ? date.year - 1 : date.year;
  const era = floorDiv(year, 400);
  const yearOfEra = year - era * 400;
  const monthFromMarch = (date.month + 9) % 12;
  const dayOfYear = floorDiv(153 * monthFromMarch + 2, 5) + date.day - 1;
  const dayOfEra =
    yearOfEra * 365 + floorDiv(yearOfEra, 4) - floorDiv(yearOfEra, 100) + dayOfYear;
  return era * DAYS_PER_ERA + dayOfEra - EPOCH_SHIFT;
};

export const fromDayNumber = (dayNumber: number): CivilDate => {
  const shifted = dayNumber + EPOCH_SHIFT;
  const era = floorDiv(shifted, DAYS_PER_ERA);
  const dayOfEra = shifted - era * DAYS_PER_ERA;
  const yearOfEra = floorDiv(
    dayOfEra - floorDiv(dayOfEra, 1460) + floorDiv(dayOfEra, 36_524) - floorDiv(dayOfEra, 146_096),
    365,
  );
  const dayOfYear = dayOfEra - (365 * yearOfEra + floorDiv(yearOfEra, 4) - floorDiv(yearOfEra, 100));
  const monthFromMarch = floorDiv(5 * dayOfYear + 2, 153);
  const day = dayOfYear - floorDiv(153 * monthFromMarch + 2, 5) + 1;
  const month = monthFromMarch < 10 ? monthFromMarch + 3 : monthFromMarch - 9;
  const year = yearOfEra + era * 400 + (month <= 2 ? 1 : 0);
  return { year, month, day };
};

export const addDays = (date: CivilDate, days: number): CivilDate =>
  fromDayNumber(toDayNumber(date) + days);

export const daysBetween = (from: CivilDate, to: CivilDate): number =>
  toDayNumber(to) - toDayNumber(from);

export const weekdayIndexOfDayNumber = (dayNumber: number): number => mod(dayNumber + 4, 7);

export const weekdayOf = (date: CivilDate): Weekday =>
  WEEKDAYS[weekdayIndexOfDayNumber(toDayNumber(date))] ?? "sunday";

export const weekdayIndex = (weekday: Weekday): number => WEEKDAYS.indexOf(weekday);

export const civilDateFromUnixSeconds = (seconds: number): CivilDate =>
  fromDayNumber(floorDiv(seconds, SECONDS_PER_DAY));

export const parseCivilDate = (value: string): CivilDate | null => {
  const match = value.trim().match(/^(-?\d{4,})-(\d{2})-(\d{2})$/);
  if (match === null) {
    return null;
  }

  const [, yearRaw, monthRaw, dayRaw] = match;
  if (yearRaw === undefined || monthRaw === undefined || dayRaw === undefined) {
    return null;
  }

  const date = {
    year: Number.parseInt(yearRaw, 10),
    month: Number.parseInt(monthRaw, 10),
    day: Number.parseInt(dayRaw, 10),
  };
  return isValidCivilDate(date) ? date : null;
};
