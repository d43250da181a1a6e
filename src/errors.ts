/**
 * Error classes for SAML response verification and trust-anchor extraction.
 *
 * Every failure carries one of a closed set of codes so callers can map it to
 * an opaque rejection for the end user while logging the precise kind.
 */

export type ErrorDetails = Record<string, unknown>;

export type ErrorCode =
  | "decode_error"
  | "parse_error"
  | "response_not_signed"
  | "signature_invalid"
  | "invalid_issuer"
  | "invalid_recipient"
  | "assertion_expired"
  | "certificate_parse_error"
  | "no_redirect_binding";

export class SAMLGateError extends Error {
  public code: ErrorCode;
  public details?: ErrorDetails;

  constructor(message: string, code: ErrorCode, details?: ErrorDetails) {
    super(message);
    this.code = code;
    this.details = details;
  }
}

export const isSAMLGateError = (err: unknown): err is SAMLGateError =>
  err instanceof SAMLGateError;

export class Base64DecodeError extends SAMLGateError {
  constructor(what: string) {
    super(`Invalid input: ${what} is not valid base64`, "decode_error");
  }
}

export class XMLParseError extends SAMLGateError {
  constructor(reason: string, details?: ErrorDetails) {
    super(`Invalid input: ${reason}`, "parse_error", {
      ...details,
      invalid_input: reason,
    });
  }
}

export class XPathError extends XMLParseError {
  constructor(xpath: string, expected: string, received: string) {
    super(`expected a ${expected} at path "${xpath}" but received ${received}`);
  }
}

export class XMLExpectedSingletonError extends XMLParseError {
  constructor(xpath: string, expected: string, count: number) {
    super(
      `expected exactly one ${expected} at path "${xpath}" but received ${count}`,
    );
  }
}

export class XMLExpectedOptionalSingletonError extends XMLParseError {
  constructor(xpath: string, expected: string, count: number) {
    super(
      `expected at most one ${expected} at path "${xpath}" but received ${count}`,
    );
  }
}

export class XMLExternalEntitiesForbiddenError extends XMLParseError {
  constructor() {
    super("External Entities are forbidden");
  }
}

export class URLParseError extends XMLParseError {
  constructor(url: string) {
    super(`malformed URL: ${url}`, { url });
  }
}

export class SAMLResponseNotSignedError extends SAMLGateError {
  constructor() {
    super(
      "Invalid input: SAML response is not signed",
      "response_not_signed",
    );
  }
}

export class SAMLSignatureInvalidError extends SAMLGateError {
  constructor(cause: string) {
    super("SAML response signature is invalid", "signature_invalid", {
      cause,
    });
  }
}

export class SAMLInvalidIssuerError extends SAMLGateError {
  constructor(expected: string, received: string) {
    super("SAML assertion has an unexpected issuer", "invalid_issuer", {
      expected,
      received,
    });
  }
}

export class SAMLInvalidRecipientError extends SAMLGateError {
  constructor(expected: string, received: string) {
    super("SAML assertion has an unexpected recipient", "invalid_recipient", {
      expected,
      received,
    });
  }
}

export type ExpiryReason =
  | "not_yet_valid"
  | "conditions_expired"
  | "subject_confirmation_expired";

export class SAMLAssertionExpiredError extends SAMLGateError {
  public reason: ExpiryReason;

  constructor(reason: ExpiryReason, now: Date, boundary: Date) {
    super(
      reason === "not_yet_valid"
        ? "SAML assertion not yet valid"
        : "SAML assertion expired",
      "assertion_expired",
      { reason, now: now.toISOString(), boundary: boundary.toISOString() },
    );
    this.reason = reason;
  }
}

export class SAMLAssertionNotYetValidError extends SAMLAssertionExpiredError {
  constructor(now: Date, notBefore: Date) {
    super("not_yet_valid", now, notBefore);
  }
}

export class CertificateParseError extends SAMLGateError {
  constructor(cause: string) {
    super(
      "Invalid input: certificate is not a valid X.509 certificate",
      "certificate_parse_error",
      { cause },
    );
  }
}

export class NoRedirectBindingError extends SAMLGateError {
  constructor() {
    super(
      "IdP metadata has no HTTP-Redirect SingleSignOnService",
      "no_redirect_binding",
    );
  }
}

export type FailedResult = {
  valid: false;
  code: ErrorCode;
  errors: string[];
};

/**
 * Converts a verdict into a result object. Anything that is not a
 * SAMLGateError is a programming error and is rethrown.
 */
export function toFailedResult(error: unknown): FailedResult {
  if (!isSAMLGateError(error)) {
    throw error;
  }
  return {
    valid: false,
    code: error.code,
    errors: [error.message],
  };
}
