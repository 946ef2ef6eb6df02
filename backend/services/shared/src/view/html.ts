// backend/services/shared/src/view/html.ts

/**
 * Tagged-template HTML for server-rendered views.
 *
 * Interpolated values are escaped unless they are already `SafeHtml`
 * (another `html` fragment, or content passed through `raw()`).
 *
 * @example
 * const name = '<script>alert("x")</script>';
 * html`<p>Hello, ${name}!</p>`.toString();
 * // <p>Hello, &lt;script&gt;alert(&quot;x&quot;)&lt;/script&gt;!</p>
 */

export class SafeHtml {
  constructor(public readonly content: string) {}

  toString(): string {
    return this.content;
  }
}

export function escape(value: unknown): string {
  if (value instanceof SafeHtml) return value.content;
  if (Array.isArray(value)) return value.map(escape).join("");

  return String(value ?? "")
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

/** Mark trusted content as safe. Callers sanitize first. */
export function raw(content: string): SafeHtml {
  return new SafeHtml(content);
}

export function html(
  strings: TemplateStringsArray,
  ...values: unknown[]
): SafeHtml {
  let result = "";
  for (let i = 0; i < strings.length; i++) {
    result += strings[i];
    if (i < values.length) result += escape(values[i]);
  }
  return new SafeHtml(result);
}

export function when(
  condition: boolean,
  render: () => SafeHtml
): SafeHtml {
  return condition ? render() : new SafeHtml("");
}

export function each<T>(
  items: readonly T[],
  render: (item: T, index: number) => SafeHtml
): SafeHtml {
  return new SafeHtml(items.map((item, i) => render(item, i).content).join(""));
}
