const STYLE_ELEMENT = /<style\b[^>]*>[\s\S]*?<\/style\s*>/gi;
const SCRIPT_ELEMENT = /<script\b[^>]*>[\s\S]*?<\/script\s*>/gi;

/**
 * Removes `<style>` and `<script>` elements (tags and content) from raw HTML
 * before it is handed to the Markdown converter.
 */
export function stripStylesAndScripts(html: string): string {
  return html.replace(STYLE_ELEMENT, '').replace(SCRIPT_ELEMENT, '');
}

export function sanitizeText(text: string | null | undefined): string {
  if (text == null) return '';
  return text.replace(/\s+/g, ' ').trim();
}

export function truncateText(text: string, maxLength: number): string {
  if (maxLength < 4) {
    return text.length > 0 ? text.charAt(0) : '';
  }
  if (text.length <= maxLength) {
    return text;
  }
  return text.substring(0, maxLength - 3) + '...';
}

/** Shortens user-supplied text for log lines. */
export function truncateForLog(text: string, maxLength: number): string {
  return truncateText(text.trim(), maxLength);
}
