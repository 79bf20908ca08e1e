import type { Schema } from "ajv";

import { DURATION_PATTERN } from "../duration";

const durationProperty = (label: string) =>
  ({
    type: "string",
    pattern: DURATION_PATTERN,
    errorMessage: {
      pattern: `${label} must be expressed as a duration like 500ms, 3s or 1m`,
    },
  }) as const;

const trimmedStringList = (label: string) =>
  ({
    type: "array",
    items: {
      type: "string",
      transform: ["trim"],
      minLength: 1,
      errorMessage: {
        type: `${label} entries must be strings`,
        minLength: `${label} entries must not be empty`,
      },
    },
    errorMessage: {
      type: `${label} must be a list`,
    },
  }) as const;

const headerMap = (label: string) =>
  ({
    type: "object",
    propertyNames: {
      type: "string",
      minLength: 1,
      errorMessage: {
        minLength: "Header names must not be empty",
      },
    },
    additionalProperties: {
      type: "string",
      errorMessage: {
        type: `${label} values must be strings`,
      },
    },
  }) as const;

export const sitecheckConfigSchema = {
  $id: "sitecheck/config.json",
  type: "object",
  additionalProperties: false,
  properties: {
    targets: trimmedStringList("targets"),
    targets_file: {
      type: "string",
      minLength: 1,
      errorMessage: {
        minLength: "targets_file must not be empty",
      },
    },
    workers: {
      type: "integer",
      minimum: 0,
      errorMessage: {
        type: "Workers must be an integer",
        minimum: "Workers cannot be negative",
      },
    },
    retries: {
      type: "integer",
      minimum: 0,
      errorMessage: {
        type: "Retries must be an integer",
        minimum: "Retries cannot be negative",
      },
    },
    timeout: durationProperty("Timeout"),
    interval: durationProperty("Interval"),
    time_source: {
      type: "string",
      enum: ["network", "system"],
      errorMessage: {
        enum: "time_source must be one of: network, system",
      },
    },
    time_api_url: {
      type: "string",
      format: "uri",
      errorMessage: {
        format: "time_api_url must be a valid URI",
      },
    },
    proxy: {
      type: "string",
      format: "uri",
      errorMessage: {
        format: "Proxy must be a valid URI",
      },
    },
    insecure: {
      type: "boolean",
    },
    request_headers: headerMap("request_headers"),
    validation: {
      type: "object",
      additionalProperties: false,
      properties: {
        https_required: {
          type: "boolean",
        },
        required_headers: {
          ...trimmedStringList("required_headers"),
          uniqueItems: true,
          errorMessage: {
            type: "required_headers must be a list",
            uniqueItems: "required_headers must not repeat a header",
          },
        },
        content_type_allow: trimmedStringList("content_type_allow"),
        header_equals: headerMap("header_equals"),
        header_contains: headerMap("header_contains"),
        max_body_bytes: {
          type: "integer",
          minimum: 1,
          errorMessage: {
            type: "max_body_bytes must be an integer",
            minimum: "max_body_bytes must be greater than 0",
          },
        },
        body_contains_all: trimmedStringList("body_contains_all"),
        body_contains_any: trimmedStringList("body_contains_any"),
      },
    },
  },
  not: {
    required: ["targets", "targets_file"],
  },
  errorMessage: {
    type: "The configuration must be a mapping",
    not: "Use either targets or targets_file, not both",
  },
} as const satisfies Schema & { errorMessage?: unknown };
