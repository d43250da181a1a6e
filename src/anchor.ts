import { X509Certificate } from "node:crypto";
import { BINDING_HTTP_REDIRECT } from "./bindings";
import {
  CertificateParseError,
  FailedResult,
  NoRedirectBindingError,
  toFailedResult,
  URLParseError,
} from "./errors";
import { EntityDescriptor } from "./metadata";
import { decodeBase64 } from "./xml";

/**
 * What a service provider needs to keep from an IdP's metadata in order to
 * verify every later login from that IdP.
 */
export type TrustAnchor = {
  readonly issuer: string;
  readonly certificate: X509Certificate;
  readonly redirectURL: URL;
};

/**
 * A trust anchor in a form that can be stored as JSON or in database
 * columns. `x509` is the base64 DER of the certificate.
 */
export type StoredTrustAnchor = {
  issuer: string;
  x509: string;
  redirect_url: string;
};

export type ExtractResult =
  | {
      valid: true;
      trust_anchor: TrustAnchor;
    }
  | FailedResult;

// Metadata certificates are routinely wrapped and indented
const CERTIFICATE_WHITESPACE = /\s/g;

const parseCertificate = (encoded: string): X509Certificate => {
  const der = decodeBase64(encoded, "X509Certificate", CERTIFICATE_WHITESPACE);
  try {
    return new X509Certificate(der);
  } catch (e: unknown) {
    throw new CertificateParseError(e instanceof Error ? e.message : String(e));
  }
};

const parseURL = (location: string): URL => {
  try {
    return new URL(location);
  } catch {
    throw new URLParseError(location);
  }
};

/**
 * Extracts the issuer, signing certificate and HTTP-Redirect login URL from
 * IdP metadata.
 *
 * The certificate is only parsed: its validity period and chain are not
 * checked.
 *
 * @throws Base64DecodeError, CertificateParseError, URLParseError or
 * NoRedirectBindingError
 */
export function extractTrustAnchor(descriptor: EntityDescriptor): TrustAnchor {
  const certificate = parseCertificate(
    descriptor.idpSSODescriptor.keyDescriptor.certificate,
  );

  const redirect = descriptor.idpSSODescriptor.singleSignOnServices.find(
    (service) => service.binding === BINDING_HTTP_REDIRECT,
  );
  if (!redirect) {
    throw new NoRedirectBindingError();
  }

  return {
    issuer: descriptor.entityID,
    certificate,
    redirectURL: parseURL(redirect.location),
  };
}

/**
 * A wrapper around extractTrustAnchor that returns a result object instead of
 * throwing
 */
export function safeExtractTrustAnchor(
  descriptor: EntityDescriptor,
): ExtractResult {
  try {
    return { valid: true, trust_anchor: extractTrustAnchor(descriptor) };
  } catch (error) {
    return toFailedResult(error);
  }
}

export function toStoredTrustAnchor(anchor: TrustAnchor): StoredTrustAnchor {
  return {
    issuer: anchor.issuer,
    x509: anchor.certificate.raw.toString("base64"),
    redirect_url: anchor.redirectURL.href,
  };
}

/**
 * Rebuilds a trust anchor from storage. The certificate and URL are parsed
 * again and fail with the same errors as extractTrustAnchor.
 */
export function fromStoredTrustAnchor(stored: StoredTrustAnchor): TrustAnchor {
  return {
    issuer: stored.issuer,
    certificate: parseCertificate(stored.x509),
    redirectURL: parseURL(stored.redirect_url),
  };
}
