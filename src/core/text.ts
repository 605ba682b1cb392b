/** Keeps the first `max` characters and says how many were cut. */
export const clipHead = (text: string, max: number): string =>
  text.length <= max ? text : `${text.slice(0, max)}\n[... ${text.length - max} more characters]`;

/** Keeps the last `max` characters; simulator errors tend to sit at the end. */
export const clipTail = (text: string, max: number): string =>
  text.length <= max ? text : `[... ${text.length - max} earlier characters]\n${text.slice(text.length - max)}`;
