const postDateFormat = new Intl.DateTimeFormat('en-US', {
  month: 'long',
  day: 'numeric',
  year: 'numeric',
  timeZone: 'UTC',
});

/** Display date stored on a post, e.g. "October 19, 2026". */
export function formatPostDate(date: Date): string {
  return postDateFormat.format(date);
}
