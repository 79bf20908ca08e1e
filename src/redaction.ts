export const REDACTED_PLACEHOLDER = "[redacted]" as const;

const URL_CREDENTIALS_PATTERN = /\/\/([^@/?#]*):([^@/?#]*)@/g;

/**
 * Masks the password of basic authentication credentials embedded in a URL,
 * keeping the user name and the rest of the URL readable.
 */
export function redactUrlCredentials(url: string): string {
  if (url.length === 0) {
    return url;
  }

  return url.replace(URL_CREDENTIALS_PATTERN, (_match, username: string) => {
    return `//${username}:${REDACTED_PLACEHOLDER}@`;
  });
}

export function redactOptionalUrlCredentials(url: string | undefined): string | undefined {
  if (typeof url !== "string") {
    return url;
  }

  return redactUrlCredentials(url);
}

/**
 * Masks every value of a header map, e.g. before logging configured request
 * headers that may carry tokens.
 */
export function redactRecordValues(
  record: Readonly<Record<string, string>> | undefined,
): Record<string, string> | undefined {
  if (!record) {
    return undefined;
  }

  const result: Record<string, string> = {};

  for (const key of Object.keys(record)) {
    result[key] = REDACTED_PLACEHOLDER;
  }

  return result;
}
