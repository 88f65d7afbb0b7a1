/**
 * Candidate discovery. Both pipeline passes walk the same generator so the
 * counting pass and the processing pass always agree.
 */
import type { Candidate, CompanyRecord, DocumentCategory } from "./types.js";

export interface DateWindow {
  /** Inclusive, YYYY-MM-DD. */
  start: string;
  /** Inclusive, YYYY-MM-DD. */
  end: string;
}

export function inWindow(date: string, window: DateWindow): boolean {
  return window.start <= date && date <= window.end;
}

/**
 * Yields candidates in company order, then event order, then the caller's
 * category order.
 */
export function* enumerateCandidates(
  companies: CompanyRecord[],
  window: DateWindow,
  categories: readonly DocumentCategory[],
): Generator<Candidate> {
  for (const company of companies) {
    for (const event of company.events) {
      if (!inWindow(event.date, window)) continue;
      for (const category of categories) {
        const url = event.urls[category];
        if (!url) continue;
        yield { company, event, category, url };
      }
    }
  }
}

export function countCandidates(
  companies: CompanyRecord[],
  window: DateWindow,
  categories: readonly DocumentCategory[],
): number {
  let total = 0;
  for (const _ of enumerateCandidates(companies, window, categories)) total++;
  return total;
}
