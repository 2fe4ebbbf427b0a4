export class PdfLoadError extends Error {
  code = 'PDF_LOAD_ERROR';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'PdfLoadError';
  }
}

export class PageLimitExceededError extends Error {
  code = 'PAGE_LIMIT_EXCEEDED';
  constructor(public pageCount: number, public maxPages: number) {
    super(`Document has ${pageCount} pages, limit is ${maxPages}`);
    this.name = 'PageLimitExceededError';
  }
}

export class ConfigError extends Error {
  code = 'CONFIG_ERROR';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'ConfigError';
  }
}
