// packages/jobs/src/cycle/iso-duration.ts

import { DateTime, Option } from "effect";

/**
 * An ISO 8601 duration split into its calendar and clock parts.
 *
 * Years, months and days are added on the UTC calendar rather than as a
 * fixed number of milliseconds.
 */
export interface IsoDuration {
  readonly years: number;
  readonly months: number;
  readonly days: number;
  readonly hours: number;
  readonly minutes: number;
  readonly millis: number;
}

const ISO_DURATION =
  /^P(?!$)(?:(\d+)Y)?(?:(\d+)M)?(?:(\d+)W)?(?:(\d+)D)?(?:T(?=\d)(?:(\d+)H)?(?:(\d+)M)?(?:(\d+(?:[.,]\d+)?)S)?)?$/;

const toInt = (part: string | undefined): number =>
  part === undefined ? 0 : Number.parseInt(part, 10);

/**
 * Parse `PnYnMnWnDTnHnMnS`. Only seconds may carry a fraction. Components
 * beyond the safe integer range are rejected.
 */
export const parseIsoDuration = (text: string): Option.Option<IsoDuration> => {
  const match = ISO_DURATION.exec(text.trim());
  if (match === null) {
    return Option.none();
  }
  const [, years, months, weeks, days, hours, minutes, seconds] = match;
  const duration: IsoDuration = {
    years: toInt(years),
    months: toInt(months),
    days: toInt(weeks) * 7 + toInt(days),
    hours: toInt(hours),
    minutes: toInt(minutes),
    millis:
      seconds === undefined
        ? 0
        : Math.round(Number.parseFloat(seconds.replace(",", ".")) * 1000),
  };
  const parts = [
    duration.years,
    duration.months,
    duration.days,
    duration.hours,
    duration.minutes,
    duration.millis,
  ];
  return parts.every(Number.isSafeInteger)
    ? Option.some(duration)
    : Option.none();
};

export const isIsoDuration = (text: string): boolean =>
  Option.isSome(parseIsoDuration(text));

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Length in millis of a duration without calendar parts. Days count as 24
 * hours, which holds on the UTC calendar.
 */
export const fixedLengthMillis = (duration: IsoDuration): Option.Option<number> =>
  duration.years === 0 && duration.months === 0
    ? Option.some(
        duration.days * DAY_MS +
          duration.hours * 60 * 60 * 1000 +
          duration.minutes * 60 * 1000 +
          duration.millis
      )
    : Option.none();

/**
 * Largest distance from the epoch a date can have.
 */
export const MAX_INSTANT_MILLIS = 8_640_000_000_000_000;

export const isRepresentableInstant = (epochMillis: number): boolean =>
  Number.isFinite(epochMillis) && Math.abs(epochMillis) <= MAX_INSTANT_MILLIS;

/**
 * Add a duration to an instant (epoch millis), in UTC. None when the result
 * falls outside the representable date range.
 */
export const addIsoDuration = (
  epochMillis: number,
  duration: IsoDuration
): Option.Option<number> =>
  Option.liftThrowable(() =>
    DateTime.toEpochMillis(
      DateTime.add(DateTime.unsafeMake(epochMillis), {
        years: duration.years,
        months: duration.months,
        days: duration.days,
        hours: duration.hours,
        minutes: duration.minutes,
        millis: duration.millis,
      })
    )
  )().pipe(Option.filter(isRepresentableInstant));
