const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#x27;",
};

/** Every piece of user-controlled text goes through here before it reaches markup. */
export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

/** Escaped message body with line breaks preserved as `<br>`. */
export function formatMessageBody(text: string): string {
  return escapeHtml(text).replace(/\r\n|\r|\n/g, "<br>");
}
