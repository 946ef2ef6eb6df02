// backend/services/blog/src/lib/dates.ts

const POST_DATE = new Intl.DateTimeFormat("en-US", {
  month: "long",
  day: "2-digit",
  year: "numeric",
});

/** "October 05, 2026": the display date stored on a post at creation. */
export function formatPostDate(d: Date): string {
  return POST_DATE.format(d);
}
