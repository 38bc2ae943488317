/**
 * Truncate text for reports and log lines, marking the cut with "...".
 */
export function previewText(text: string, maxLength: number): string {
  return text.length > maxLength ? `${text.slice(0, maxLength)}...` : text;
}
