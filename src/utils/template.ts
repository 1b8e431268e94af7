/**
 * `{key}` placeholder formatting for hook messages and commands.
 * `{{` and `}}` produce literal braces. A placeholder whose key is absent
 * from the context throws.
 */
export class MissingTemplateKeyError extends Error {
  constructor(public readonly key: string) {
    super(`Missing template key: ${key}`);
    this.name = "MissingTemplateKeyError";
  }
}

const PLACEHOLDER_RE = /\{\{|\}\}|\{([^{}]*)\}/g;

export function formatTemplate(template: string, context: Record<string, unknown>): string {
  return template.replace(PLACEHOLDER_RE, (match: string, key: string | undefined) => {
    if (match === "{{") return "{";
    if (match === "}}") return "}";
    const name = (key ?? "").trim();
    if (!Object.prototype.hasOwnProperty.call(context, name)) {
      throw new MissingTemplateKeyError(name);
    }
    const value = context[name];
    if (typeof value === "string") return value;
    if (value === null || value === undefined) return String(value);
    if (typeof value === "object") return JSON.stringify(value);
    return String(value);
  });
}
