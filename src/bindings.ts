/**
 * HTTP plumbing around the SAML POST and Redirect bindings.
 *
 * RelayState is opaque: it is carried to the IdP and echoed back untouched,
 * and nothing here reads its contents.
 */

/** Name of the HTTP POST body parameter carrying the base64 SAML response. */
export const PARAM_SAML_RESPONSE = "SAMLResponse";

/**
 * Name of the HTTP POST body parameter carrying the relay state back from the
 * IdP, and of the query parameter that sends it there.
 */
export const PARAM_RELAY_STATE = "RelayState";

export const BINDING_HTTP_REDIRECT =
  "urn:oasis:names:tc:SAML:2.0:bindings:HTTP-Redirect";

export const BINDING_HTTP_POST =
  "urn:oasis:names:tc:SAML:2.0:bindings:HTTP-POST";

export type PostBindingParams = {
  saml_response: string | null;
  relay_state: string | null;
};

/**
 * Reads the SAML parameters out of an application/x-www-form-urlencoded body.
 */
export function readPostBinding(
  body: string | URLSearchParams,
): PostBindingParams {
  const params = typeof body === "string" ? new URLSearchParams(body) : body;
  return {
    saml_response: params.get(PARAM_SAML_RESPONSE),
    relay_state: params.get(PARAM_RELAY_STATE),
  };
}

/**
 * Returns a copy of the IdP's redirect URL that starts a login, with the
 * relay state set on its query string. Other query parameters are kept.
 */
export function createRedirectURL(redirectURL: URL, relayState?: string): URL {
  const url = new URL(redirectURL.href);
  if (relayState !== undefined) {
    url.searchParams.set(PARAM_RELAY_STATE, relayState);
  }
  return url;
}
