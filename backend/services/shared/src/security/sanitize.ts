// backend/services/shared/src/security/sanitize.ts

/**
 * Rich-text cleanup for HTML that is rendered unescaped (editor output).
 * Not a full HTML parser: it removes the constructs that execute script.
 */

const BLOCK_TAGS = ["script", "style", "iframe", "object"];
const VOID_TAGS = ["embed", "form", "input", "button", "link", "meta", "base"];

export function stripSpecificTags(str: string, tags: string[]): string {
  const pattern = new RegExp(`</?(?:${tags.join("|")})\\b[^>]*>`, "gi");
  return str.replace(pattern, "");
}

export function sanitizeHtml(str: string): string {
  let result = str;

  // Drop executable blocks together with their content
  for (const tag of BLOCK_TAGS) {
    result = result.replace(
      new RegExp(`<${tag}\\b[^>]*>[\\s\\S]*?</${tag}\\s*>`, "gi"),
      ""
    );
  }
  result = stripSpecificTags(result, [...BLOCK_TAGS, ...VOID_TAGS]);

  // Inline event handlers
  result = result.replace(/\s+on\w+\s*=\s*(?:"[^"]*"|'[^']*'|[^\s>]+)/gi, "");

  // Script-bearing URLs
  result = result.replace(/javascript\s*:/gi, "");
  result = result.replace(/data\s*:\s*text\/html/gi, "data-blocked:");

  return result;
}
