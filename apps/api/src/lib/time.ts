import { z } from "zod";
import type { IsoDate } from "../types/library";

// IsoDate values are zero-padded YYYY-MM-DD strings, so plain string
// comparison orders them chronologically.
const isoDateRegex = /^\d{4}-\d{2}-\d{2}$/;
const dayMs = 24 * 60 * 60 * 1000;

export type Clock = {
  today: () => IsoDate;
};

export type ManualClock = Clock & {
  set: (date: IsoDate) => void;
  advance: (days: number) => void;
};

export const toDateOnly = (date: Date): IsoDate => date.toISOString().slice(0, 10);

export const isIsoDate = (value: string): boolean => {
  if (!isoDateRegex.test(value)) {
    return false;
  }
  const parsed = new Date(`${value}T00:00:00.000Z`);
  return !Number.isNaN(parsed.getTime()) && toDateOnly(parsed) === value;
};

const parseIsoDate = (value: IsoDate): Date => {
  if (!isIsoDate(value)) {
    throw new Error(`Unsupported date: ${value}`);
  }
  return new Date(`${value}T00:00:00.000Z`);
};

export const addDays = (date: IsoDate, days: number): IsoDate => {
  return toDateOnly(new Date(parseIsoDate(date).getTime() + days * dayMs));
};

export const isoDateSchema = z.string().trim().refine(isIsoDate, {
  message: "Expected a calendar date in YYYY-MM-DD format"
});

/** Today's date in UTC. */
export const systemClock: Clock = {
  today: () => toDateOnly(new Date())
};

export const createManualClock = (start: IsoDate): ManualClock => {
  let current = toDateOnly(parseIsoDate(start));
  return {
    today: () => current,
    set: (date) => {
      current = toDateOnly(parseIsoDate(date));
    },
    advance: (days) => {
      current = addDays(current, days);
    }
  };
};
