export class TemplateNotFoundError extends Error {
  constructor(
    public readonly templateName: string,
    public readonly path: string,
  ) {
    super(`Template not found: ${path}`);
    this.name = 'TemplateNotFoundError';
  }
}

export class ConfigError extends Error {
  constructor(message: string, public readonly path: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Message of an unknown thrown value */
export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
