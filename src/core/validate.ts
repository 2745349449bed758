import { ok, err, type Result } from "neverthrow";

const URL_SCHEMES = ["http:", "https:"] as const;

const AUTHORITY_FORM = /^[a-z][a-z0-9+.-]*:\/\//i;

const parseUrl = (value: string): URL | undefined => {
  try {
    return new URL(value);
  } catch {
    return undefined;
  }
};

/**
 * Accepts absolute http(s) URLs that name a host. Returns an error message
 * for anything else.
 */
export const validateUrlWithHttpOrHttps = (value: unknown, field: string): Result<string, string> => {
  if (typeof value !== "string") {
    return err(`expected "${field}" to be a string`);
  }
  if (value === "") {
    return err(`expected "${field}" url to not be empty`);
  }
  const url = AUTHORITY_FORM.test(value) ? parseUrl(value) : undefined;
  if (url === undefined) {
    return err(`expected "${field}" to be a valid url, got ${value}`);
  }
  if (url.host === "") {
    return err(`expected "${field}" to have a host, got ${value}`);
  }
  if (!URL_SCHEMES.some((scheme) => scheme === url.protocol)) {
    return err(`expected "${field}" to have a url with schema of: "http,https", got ${value}`);
  }
  return ok(value);
};

export const isUrlWithHttpOrHttps = (value: unknown): boolean =>
  validateUrlWithHttpOrHttps(value, "url").isOk();

const TRUE_VALUES = new Set(["1", "t", "T", "TRUE", "true", "True"]);
const FALSE_VALUES = new Set(["0", "f", "F", "FALSE", "false", "False"]);

export const parseBool = (value: string): boolean | undefined => {
  if (TRUE_VALUES.has(value)) return true;
  if (FALSE_VALUES.has(value)) return false;
  return undefined;
};
