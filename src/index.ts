/**
 * samlgate - SAML 2.0 response verification for service providers
 *
 * Turns the SAMLResponse an IdP posts back into a trusted statement of who
 * logged in, and extracts the trust anchor needed for that from IdP metadata.
 *
 * Security posture:
 * - Only responses signed as a whole are accepted; assertion-only signatures are not
 * - The signature is checked over the received bytes before any field is read as trusted
 * - DOCTYPE, entity, comment and processing-instruction nodes are rejected
 * - Elements hidden outside their expected location are rejected
 */

// Response verification
export { verifySAMLResponse, safeVerifySAMLResponse } from "./verify";
export type { VerifyArgs, VerifyResult } from "./verify";

export { parseResponse } from "./response";
export type {
  Response,
  SignatureInfo,
  Assertion,
  Subject,
  NameID,
  SubjectConfirmation,
  SubjectConfirmationData,
  Conditions,
  Attribute,
} from "./response";

export {
  XmlCryptoSignatureVerifier,
  DEFAULT_SIGNATURE_ALGORITHMS,
} from "./signature";
export type {
  SignatureVerifier,
  XmlCryptoSignatureVerifierOptions,
} from "./signature";

// IdP metadata
export { parseEntityDescriptor } from "./metadata";
export type {
  EntityDescriptor,
  IDPSSODescriptor,
  KeyDescriptor,
  SingleSignOnService,
} from "./metadata";

export {
  extractTrustAnchor,
  safeExtractTrustAnchor,
  toStoredTrustAnchor,
  fromStoredTrustAnchor,
} from "./anchor";
export type { TrustAnchor, StoredTrustAnchor, ExtractResult } from "./anchor";

// HTTP bindings
export {
  PARAM_SAML_RESPONSE,
  PARAM_RELAY_STATE,
  BINDING_HTTP_REDIRECT,
  BINDING_HTTP_POST,
  readPostBinding,
  createRedirectURL,
} from "./bindings";
export type { PostBindingParams } from "./bindings";

// Error classes
export {
  SAMLGateError,
  isSAMLGateError,
  Base64DecodeError,
  XMLParseError,
  XPathError,
  XMLExpectedSingletonError,
  XMLExpectedOptionalSingletonError,
  XMLExternalEntitiesForbiddenError,
  URLParseError,
  SAMLResponseNotSignedError,
  SAMLSignatureInvalidError,
  SAMLInvalidIssuerError,
  SAMLInvalidRecipientError,
  SAMLAssertionExpiredError,
  SAMLAssertionNotYetValidError,
  CertificateParseError,
  NoRedirectBindingError,
} from "./errors";
export type {
  ErrorCode,
  ErrorDetails,
  ExpiryReason,
  FailedResult,
} from "./errors";
