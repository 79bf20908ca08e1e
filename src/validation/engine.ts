import {
  createValidationReport,
  type ValidationPolicy,
  type ValidationReport,
} from "../domain";
import { containsToken } from "./token";
import type { BodyCheckResult, ResponseView } from "./types";

const HTTPS_SCHEME_PATTERN = /^https:\/\//i;

const utf8Decoder = new TextDecoder("utf-8", { fatal: false });

type HttpsPolicy = Pick<ValidationPolicy, "httpsRequired">;

type HeaderPolicy = Pick<
  ValidationPolicy,
  "requiredHeaders" | "contentTypeAllowlist" | "headerEquals" | "headerContains"
>;

type BodyPolicy = Pick<ValidationPolicy, "bodyContainsAll" | "bodyContainsAny">;

export interface HeaderSource {
  header(name: string): string | undefined;
}

export interface TransportFailure {
  readonly transportError: string;
}

export function enforceHttpsPolicy(
  target: string,
  report: ValidationReport,
  policy: HttpsPolicy,
): void {
  if (!policy.httpsRequired || HTTPS_SCHEME_PATTERN.test(target)) {
    report.httpsPolicyOk = true;
    return;
  }

  report.httpsPolicyOk = false;
  report.issues.push("HTTPS required by policy, but URL is not https");
}

export function validateHeaders(
  source: HeaderSource,
  policy: HeaderPolicy,
  report: ValidationReport,
): void {
  let ok = true;

  const fail = (issue: string) => {
    ok = false;
    report.issues.push(issue);
  };

  for (const name of policy.requiredHeaders) {
    if (source.header(name) === undefined) {
      fail(`Missing header: ${name}`);
    }
  }

  if (policy.contentTypeAllowlist.length > 0) {
    const contentType = source.header("Content-Type");

    if (contentType === undefined) {
      fail("Missing header: Content-Type");
    } else {
      const lower = contentType.toLowerCase();
      const allowed = policy.contentTypeAllowlist.some((prefix) =>
        lower.startsWith(prefix.toLowerCase()),
      );

      if (!allowed) {
        fail(`Content-Type not allowed: ${contentType}`);
      }
    }
  }

  for (const rule of policy.headerEquals) {
    const actual = source.header(rule.name);

    if (actual === undefined) {
      fail(`Missing header: ${rule.name}`);
    } else if (actual !== rule.value) {
      fail(`Header ${rule.name} mismatch: got '${actual}', expected '${rule.value}'`);
    }
  }

  for (const rule of policy.headerContains) {
    const actual = source.header(rule.name);

    if (actual === undefined) {
      fail(`Missing header: ${rule.name}`);
    } else if (!actual.includes(rule.value)) {
      fail(`Header ${rule.name} does not contain '${rule.value}': got '${actual}'`);
    }
  }

  report.headerOk = ok;
}

function formatNeedleList(needles: readonly string[]): string {
  return `[${needles.map((needle) => JSON.stringify(needle)).join(", ")}]`;
}

export function checkBodyText(text: string, policy: BodyPolicy): BodyCheckResult {
  const issues: string[] = [];

  for (const needle of policy.bodyContainsAll) {
    if (!containsToken(text, needle)) {
      issues.push(`Body missing required text: '${needle}'`);
    }
  }

  let ok = issues.length === 0;

  if (policy.bodyContainsAny.length > 0) {
    const anyHit = policy.bodyContainsAny.some((needle) => containsToken(text, needle));

    if (!anyHit) {
      issues.push(`Body did not contain ANY of: ${formatNeedleList(policy.bodyContainsAny)}`);
    }

    ok = ok && anyHit;
  }

  return { ok, issues };
}

export function hasBodyRules(policy: BodyPolicy): boolean {
  return policy.bodyContainsAll.length > 0 || policy.bodyContainsAny.length > 0;
}

export function decodeBody(bytes: Uint8Array): string {
  return utf8Decoder.decode(bytes);
}

async function validateBody(
  response: ResponseView,
  policy: ValidationPolicy,
  report: ValidationReport,
): Promise<void> {
  if (!hasBodyRules(policy)) {
    report.bodyOk = true;
    await response.discard();
    return;
  }

  let bytes: Uint8Array;

  try {
    bytes = await response.readBody(policy.maxBodyBytes);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    report.bodyOk = false;
    report.issues.push(`Failed to read response body: ${message}`);
    return;
  }

  const { ok, issues } = checkBodyText(decodeBody(bytes), policy);
  report.bodyOk = ok;
  report.issues.push(...issues);
}

export async function validateResponse(
  response: ResponseView,
  policy: ValidationPolicy,
  report: ValidationReport,
): Promise<void> {
  validateHeaders(response, policy, report);
  await validateBody(response, policy, report);
}

export function recordTransportFailure(failure: TransportFailure, report: ValidationReport): void {
  report.headerOk = false;
  report.bodyOk = false;
  report.issues.push(`Transport error: ${failure.transportError}`);
}

function isTransportFailure(value: ResponseView | TransportFailure): value is TransportFailure {
  return "transportError" in value;
}

/**
 * Evaluates a single probe outcome against the policy and returns a fresh
 * report. The HTTPS policy is checked first and never short-circuits the
 * header and body rules.
 */
export async function evaluateResponse(
  target: string,
  response: ResponseView | TransportFailure,
  policy: ValidationPolicy,
): Promise<ValidationReport> {
  const report = createValidationReport();

  enforceHttpsPolicy(target, report, policy);

  if (isTransportFailure(response)) {
    recordTransportFailure(response, report);
  } else {
    await validateResponse(response, policy, report);
  }

  return report;
}
