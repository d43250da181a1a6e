import { XmlCryptoSignatureVerifier, XMLParseError } from "../src";
import {
  buildResponseXML,
  generateSigningKeys,
  signXML,
  SigningKeys,
} from "./fixtures";

const verdict = (fn: () => boolean): boolean => {
  try {
    return fn();
  } catch {
    return false;
  }
};

describe("XmlCryptoSignatureVerifier", () => {
  let keys: SigningKeys;
  let otherKeys: SigningKeys;
  let signed: string;

  beforeAll(() => {
    keys = generateSigningKeys();
    otherKeys = generateSigningKeys();
    signed = signXML(buildResponseXML(), keys.privateKey);
  });

  const verify = (xml: string, verifier = new XmlCryptoSignatureVerifier()) =>
    verifier.verifySignature(keys.certificate, Buffer.from(xml, "utf8"));

  it("accepts a response signed with the certificate's key", () => {
    expect(verify(signed)).toBe(true);
  });

  it("rejects a response signed with another key", () => {
    const other = signXML(buildResponseXML(), otherKeys.privateKey);
    expect(verdict(() => verify(other))).toBe(false);
  });

  it("rejects a response modified after signing", () => {
    const modified = signed.replace(
      "user-1234@idp-a.example",
      "admin@idp-a.example",
    );
    expect(modified).not.toBe(signed);
    expect(verdict(() => verify(modified))).toBe(false);
  });

  it("requires the signature to be on the response", () => {
    const assertionSigned = signXML(
      buildResponseXML(),
      keys.privateKey,
      "Assertion",
    );
    expect(() => verify(assertionSigned)).toThrow(
      'Invalid input: expected exactly one ELEMENT_NODE at path "./ds:Signature" but received 0',
    );
  });

  it("requires the reference to point at the response", () => {
    const retargeted = signed.replace(
      'URI="#_response-1"',
      'URI="#_assertion-1"',
    );
    expect(() => verify(retargeted)).toThrow(
      "Invalid input: Doesn't dereference to parent element",
    );
  });

  it("rejects a reference whose ID appears twice", () => {
    const duplicated = signed.replace(
      'ID="_assertion-1"',
      'ID="_response-1"',
    );
    expect(() => verify(duplicated)).toThrow(
      "Invalid input: Reference URI #_response-1 dereferences to 2 elements",
    );
  });

  it("rejects signature algorithms that are not allowed", () => {
    const verifier = new XmlCryptoSignatureVerifier({
      signatureAlgorithms: ["http://www.w3.org/2000/09/xmldsig#rsa-sha1"],
    });
    expect(() => verify(signed, verifier)).toThrow(XMLParseError);
  });

  it("never allows HMAC signature methods", () => {
    const hmac = signed.replace(
      'Algorithm="http://www.w3.org/2001/04/xmldsig-more#rsa-sha256"',
      'Algorithm="http://www.w3.org/2001/04/xmldsig-more#hmac-sha256"',
    );
    const verifier = new XmlCryptoSignatureVerifier({
      signatureAlgorithms: ["http://www.w3.org/2001/04/xmldsig-more#hmac-sha256"],
    });
    expect(() => verify(hmac, verifier)).toThrow(
      "Invalid input: Invalid SignatureMethod algorithm: http://www.w3.org/2001/04/xmldsig-more#hmac-sha256",
    );
  });
});
