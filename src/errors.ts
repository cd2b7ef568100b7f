/**
 * Error classes for the sync pipeline.
 *
 * Fatal errors abort the whole run; the others are contained to a single
 * zone and reported as that zone's outcome.
 */

export class ConfigError extends Error {
  code = "CONFIG_ERROR" as const;
  fatal = true;
  missing: string[];

  constructor(message: string, missing: string[] = []) {
    super(message);
    this.name = "ConfigError";
    this.missing = missing;
  }
}

export class CzdsApiError extends Error {
  code = "CZDS_API_ERROR" as const;
  fatal = false;
  statusCode?: number;
  url: string;

  constructor(message: string, url: string, statusCode?: number) {
    super(message);
    this.name = "CzdsApiError";
    this.url = url;
    this.statusCode = statusCode;
  }
}

export class ListingError extends Error {
  code = "LISTING_ERROR" as const;
  fatal = true;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ListingError";
  }
}

export class SchemaError extends Error {
  code = "SCHEMA_ERROR" as const;
  fatal = true;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "SchemaError";
  }
}

export class DownloadError extends Error {
  code = "DOWNLOAD_ERROR" as const;
  fatal = false;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "DownloadError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
