import { X509Certificate } from "node:crypto";
import {
  FailedResult,
  SAMLAssertionExpiredError,
  SAMLAssertionNotYetValidError,
  SAMLInvalidIssuerError,
  SAMLInvalidRecipientError,
  SAMLResponseNotSignedError,
  SAMLSignatureInvalidError,
  toFailedResult,
} from "./errors";
import { parseResponse, Response } from "./response";
import { SignatureVerifier, XmlCryptoSignatureVerifier } from "./signature";
import { decodeBase64, decodeUTF8 } from "./xml";

export type VerifyArgs = {
  /** The SAMLResponse POST parameter, still base64 encoded. */
  saml_response: string;
  expected_issuer: string;
  certificate: X509Certificate;
  expected_recipient: string;
  now: Date;
  /** Defaults to an XmlCryptoSignatureVerifier. */
  signature_verifier?: SignatureVerifier;
};

export type VerifyResult =
  | {
      valid: true;
      response: Response;
    }
  | FailedResult;

function checkSignature(
  verifier: SignatureVerifier,
  certificate: X509Certificate,
  document: Buffer,
): void {
  let verified: boolean;
  try {
    verified = verifier.verifySignature(certificate, document);
  } catch (e: unknown) {
    throw new SAMLSignatureInvalidError(
      e instanceof Error ? e.message : String(e),
    );
  }
  if (!verified) {
    throw new SAMLSignatureInvalidError("signature did not verify");
  }
}

// NotBefore is inclusive, both NotOnOrAfter bounds are exclusive
function checkValidityWindow(response: Response, now: Date): void {
  const { conditions, subject } = response.assertion;
  const time = now.getTime();

  if (time < conditions.notBefore.getTime()) {
    throw new SAMLAssertionNotYetValidError(now, conditions.notBefore);
  }
  if (time >= conditions.notOnOrAfter.getTime()) {
    throw new SAMLAssertionExpiredError(
      "conditions_expired",
      now,
      conditions.notOnOrAfter,
    );
  }

  const { notOnOrAfter } = subject.subjectConfirmation.data;
  if (time >= notOnOrAfter.getTime()) {
    throw new SAMLAssertionExpiredError(
      "subject_confirmation_expired",
      now,
      notOnOrAfter,
    );
  }
}

/**
 * Decodes, parses and verifies a SAML response, returning it only once every
 * check has passed.
 *
 * The signature is checked against the bytes that were received, before any
 * field of the response is compared with what the caller expects. Only a
 * signature over the whole response is accepted.
 *
 * The certificate's own validity period is not checked.
 *
 * @throws SAMLGateError subclasses, one per failure kind
 */
export function verifySAMLResponse({
  saml_response,
  expected_issuer,
  certificate,
  expected_recipient,
  now,
  signature_verifier = new XmlCryptoSignatureVerifier(),
}: VerifyArgs): Response {
  const decoded = decodeBase64(saml_response, "SAMLResponse");

  const response = parseResponse(decodeUTF8(decoded));

  if (!response.signature || response.signature.value === "") {
    throw new SAMLResponseNotSignedError();
  }

  checkSignature(signature_verifier, certificate, decoded);

  const { issuer, subject } = response.assertion;
  if (issuer !== expected_issuer) {
    throw new SAMLInvalidIssuerError(expected_issuer, issuer);
  }

  const { recipient } = subject.subjectConfirmation.data;
  if (recipient !== expected_recipient) {
    throw new SAMLInvalidRecipientError(expected_recipient, recipient);
  }

  checkValidityWindow(response, now);

  return response;
}

/**
 * A wrapper around verifySAMLResponse that returns a result object instead of
 * throwing
 */
export function safeVerifySAMLResponse(args: VerifyArgs): VerifyResult {
  try {
    return { valid: true, response: verifySAMLResponse(args) };
  } catch (error) {
    return toFailedResult(error);
  }
}
