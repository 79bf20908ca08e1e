export type DurationString = string;

export type TimeSourceKind = "network" | "system";

export interface RawValidationConfig {
  https_required?: boolean;
  required_headers?: string[];
  content_type_allow?: string[];
  header_equals?: Record<string, string>;
  header_contains?: Record<string, string>;
  max_body_bytes?: number;
  body_contains_all?: string[];
  body_contains_any?: string[];
}

export interface RawSitecheckFile {
  targets?: string[];
  targets_file?: string;
  workers?: number;
  retries?: number;
  timeout?: DurationString;
  interval?: DurationString;
  time_source?: TimeSourceKind;
  time_api_url?: string;
  proxy?: string;
  insecure?: boolean;
  request_headers?: Record<string, string>;
  validation?: RawValidationConfig;
}
