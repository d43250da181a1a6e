import { X509Certificate } from "node:crypto";
import { SignedXml } from "xml-crypto";
import { XMLParseError } from "./errors";
import { createSelector, decodeUTF8, Selector, xmlStringToDOM } from "./xml";

/**
 * Checks the enveloped signature of a SAML response.
 *
 * `document` is exactly the decoded bytes that were received. Implementations
 * must read it afresh rather than trust any structure parsed from it earlier,
 * and must not keep the certificate or document after returning.
 *
 * Return false, or throw, when the signature does not verify.
 */
export interface SignatureVerifier {
  verifySignature(certificate: X509Certificate, document: Buffer): boolean;
}

export type XmlCryptoSignatureVerifierOptions = {
  /** SignatureMethod algorithms to accept. HMAC algorithms are never accepted. */
  signatureAlgorithms?: string[];
};

const HMAC_SIGNATURE_ALGORITHMS = [
  "http://www.w3.org/2000/09/xmldsig#hmac-sha1",
  "http://www.w3.org/2001/04/xmldsig-more#hmac-sha256",
  "http://www.w3.org/2001/04/xmldsig-more#hmac-sha384",
  "http://www.w3.org/2001/04/xmldsig-more#hmac-sha512",
];

export const DEFAULT_SIGNATURE_ALGORITHMS = [
  "http://www.w3.org/2000/09/xmldsig#rsa-sha1",
  "http://www.w3.org/2001/04/xmldsig-more#rsa-sha256",
  "http://www.w3.org/2001/04/xmldsig-more#rsa-sha384",
  "http://www.w3.org/2001/04/xmldsig-more#rsa-sha512",
  "http://www.w3.org/2001/04/xmldsig-more#ecdsa-sha1",
  "http://www.w3.org/2001/04/xmldsig-more#ecdsa-sha256",
  "http://www.w3.org/2001/04/xmldsig-more#ecdsa-sha384",
  "http://www.w3.org/2001/04/xmldsig-more#ecdsa-sha512",
];

const ALLOWED_TRANSFORMS = [
  "http://www.w3.org/2000/09/xmldsig#enveloped-signature",
  "http://www.w3.org/2001/10/xml-exc-c14n#",
  "http://www.w3.org/2001/10/xml-exc-c14n#WithComments",
];

/**
 * Verifies the response signature with xml-crypto.
 *
 * Only a signature that is a direct child of the root Response, whose single
 * Reference dereferences to that root, is checked. An IdP that signs only the
 * assertion fails here.
 */
export class XmlCryptoSignatureVerifier implements SignatureVerifier {
  private readonly signatureAlgorithms: string[];

  constructor(options: XmlCryptoSignatureVerifierOptions = {}) {
    this.signatureAlgorithms = (
      options.signatureAlgorithms ?? DEFAULT_SIGNATURE_ALGORITHMS
    ).filter((algorithm) => !HMAC_SIGNATURE_ALGORITHMS.includes(algorithm));
  }

  verifySignature(certificate: X509Certificate, document: Buffer): boolean {
    const xml = decodeUTF8(document);
    const dom = xmlStringToDOM(xml);

    const responseElement = createSelector(dom).selectSingleElement(
      "/samlp:Response",
    );
    const signature = createSelector(responseElement).selectSingleElement(
      "./ds:Signature",
    );

    this.validateSignatureProfile(signature, responseElement);

    const signedXml = new SignedXml({
      publicCert: certificate.toString(),
      // Never take the key from the document itself
      getCertFromKeyInfo: () => null,
    });
    signedXml.loadSignature(signature);
    return signedXml.checkSignature(xml);
  }

  private validateSignatureProfile(
    signature: Element,
    responseElement: Element,
  ): void {
    const signatureSelector = createSelector(signature);

    // Liberal and strict searches must find the same single SignedInfo
    const foundSignedInfo = signatureSelector.selectElements(
      ".//*[local-name()='SignedInfo']",
    );
    const signedInfo = signatureSelector.selectSingleElement("./ds:SignedInfo");
    if (foundSignedInfo.length !== 1 || foundSignedInfo[0] !== signedInfo) {
      throw new XMLParseError(
        `Expected exactly one SignedInfo element, found ${foundSignedInfo.length}`,
      );
    }

    const signedInfoSelector = createSelector(signedInfo);

    const foundReferences = signatureSelector.selectElements(
      ".//*[local-name()='Reference']",
    );
    const reference = signedInfoSelector.selectSingleElement("./ds:Reference");
    if (foundReferences.length !== 1 || foundReferences[0] !== reference) {
      throw new XMLParseError(
        `Expected exactly one Reference element, found ${foundReferences.length}`,
      );
    }

    this.validateReferenceTarget(reference, responseElement);

    const signatureMethod = signedInfoSelector.selectSingleElement(
      "./ds:SignatureMethod",
    );
    const signatureAlgorithm = signatureMethod.getAttribute("Algorithm") ?? "";
    if (!this.signatureAlgorithms.includes(signatureAlgorithm)) {
      throw new XMLParseError(
        `Invalid SignatureMethod algorithm: ${signatureAlgorithm}`,
      );
    }

    const transforms = signatureSelector.selectElements(
      ".//*[local-name()='Transform']",
    );
    if (transforms.length > 2) {
      throw new XMLParseError(
        `Too many transforms: ${transforms.length}. Maximum 2 allowed`,
      );
    }
    for (const transform of transforms) {
      const algorithm = transform.getAttribute("Algorithm") ?? "";
      if (!ALLOWED_TRANSFORMS.includes(algorithm)) {
        throw new XMLParseError(
          `Unexpected transform algorithm: ${algorithm}`,
        );
      }
    }
  }

  // URIs need to be "#ID" or "", and either way must land on the root
  private validateReferenceTarget(
    reference: Element,
    responseElement: Element,
  ): void {
    const uri = reference.getAttributeNode("URI")?.value;
    if (uri === undefined) {
      throw new XMLParseError("No URI attribute");
    }

    const document = responseElement.ownerDocument;

    if (uri === "") {
      if (document.documentElement !== responseElement) {
        throw new XMLParseError(
          "Doesn't dereference to root parent element (for empty URI)",
        );
      }
      return;
    }

    if (!uri.startsWith("#")) {
      throw new XMLParseError(`Malformed URI: ${uri}`);
    }

    const referencedId = uri.substring(1);
    const dereferenced = findElementsById(createSelector(document), referencedId);
    if (dereferenced.length !== 1) {
      throw new XMLParseError(
        `Reference URI ${uri} dereferences to ${dereferenced.length} elements`,
      );
    }
    if (dereferenced[0] !== responseElement) {
      throw new XMLParseError("Doesn't dereference to parent element");
    }
  }
}

/**
 * Escape XPath attribute values to prevent injection
 */
function escapeXPathAttribute(value: string): string {
  if (!value.includes("'")) {
    return `'${value}'`;
  }
  if (!value.includes('"')) {
    return `"${value}"`;
  }
  const parts = value.split("'");
  return `concat('${parts.join("', \"'\", '")}')`;
}

// xml-crypto resolves references against any ID-like attribute, so every one
// of them counts when looking for duplicates
function findElementsById(selector: Selector, id: string): Element[] {
  const escapedId = escapeXPathAttribute(id);
  return selector.selectElements(
    `//*[@ID=${escapedId} or @Id=${escapedId} or @id=${escapedId}]`,
  );
}
