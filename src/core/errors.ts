export class PortalError extends Error {
  public readonly code: string;

  constructor(message: string, options: { code: string; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.code = options.code;
  }
}

/** Missing or malformed configuration.  Fatal before any navigation. */
export class ConfigError extends PortalError {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n  - ${issues.join('\n  - ')}`, { code: 'CONFIG_ERROR' });
    this.issues = issues;
  }
}

export class ElementNotFoundError extends PortalError {
  public readonly locator: string;

  constructor(locator: string, cause?: unknown) {
    super(`No element matches ${locator}`, { code: 'ELEMENT_NOT_FOUND', cause });
    this.locator = locator;
  }
}

export class WaitTimeoutError extends PortalError {
  public readonly timeoutMs: number;

  constructor(what: string, timeoutMs: number, cause?: unknown) {
    super(`Timed out after ${timeoutMs}ms waiting for ${what}`, { code: 'WAIT_TIMEOUT', cause });
    this.timeoutMs = timeoutMs;
  }
}

/** The catalog page itself never rendered its header. */
export class CatalogLoadError extends PortalError {
  constructor(catalogUrl: string, cause?: unknown) {
    super(`Catalog page ${catalogUrl} did not load`, { code: 'CATALOG_LOAD_ERROR', cause });
  }
}

export class LoginError extends PortalError {
  constructor(message: string, cause?: unknown) {
    super(message, { code: 'LOGIN_ERROR', cause });
  }
}
